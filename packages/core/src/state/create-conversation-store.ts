import { MemoryConfig } from "../config/agent-config.js";
import { Logger } from "../utils/logger.js";
import { ConversationStore, InMemoryConversationStore } from "./conversation-store.js";
import { FileConversationStore } from "./file-conversation-store.js";

/**
 * Picks the store strategy once; file stores are loaded before being handed out.
 */
export async function createConversationStore(config: MemoryConfig, logger?: Logger): Promise<ConversationStore> {
    if (config.type === "memory") {
        return new InMemoryConversationStore();
    }
    const store = new FileConversationStore({ dataDir: config.dataDir, logger: logger?.child("ConversationStore") });
    await store.load();
    return store;
}
