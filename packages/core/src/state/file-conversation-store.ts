import * as fs from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { Conversation } from "../types/messages.js";
import { PersistenceError, toErrorMessage } from "../types/errors.js";
import { Logger, silentLogger } from "../utils/logger.js";
import { InMemoryConversationStore } from "./conversation-store.js";

export interface FileConversationStoreOptions {
    dataDir: string;
    logger?: Logger;
}

const conversationSchema = z.object({
    id: z.string().min(1),
    title: z.string(),
    messages: z.array(z.object({
        role: z.enum(["system", "user", "assistant"]),
        content: z.string(),
        timestamp: z.string()
    })),
    createdAt: z.string(),
    updatedAt: z.string()
});

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One pretty-printed JSON file per conversation under `dataDir`.
 * Call `load()` once before use to pick up what earlier runs wrote.
 */
export class FileConversationStore extends InMemoryConversationStore {
    private readonly dataDir: string;
    private readonly logger: Logger;

    constructor(options: FileConversationStoreOptions) {
        super();
        this.dataDir = options.dataDir;
        this.logger = options.logger ?? silentLogger;
    }

    async load(): Promise<number> {
        return this.mutex.runExclusive(async () => {
            await this.ensureDir();
            const entries = await fs.readdir(this.dataDir);
            let loaded = 0;
            for (const entry of entries) {
                if (!entry.endsWith(".json")) continue;
                const filePath = join(this.dataDir, entry);
                try {
                    const raw = await fs.readFile(filePath, "utf8");
                    const parsed = conversationSchema.safeParse(JSON.parse(raw));
                    if (!parsed.success) {
                        this.logger.warn("Skipping malformed conversation file", { file: entry });
                        continue;
                    }
                    this.conversations.set(parsed.data.id, parsed.data);
                    loaded++;
                } catch (error) {
                    this.logger.warn("Skipping unreadable conversation file", { file: entry, error: toErrorMessage(error) });
                }
            }
            this.logger.info(`Loaded ${loaded} conversation(s)`, { dataDir: this.dataDir });
            return loaded;
        });
    }

    protected override async persist(conversation: Conversation): Promise<void> {
        if (!ID_PATTERN.test(conversation.id)) {
            throw new PersistenceError(`Refusing to write conversation with unsafe id: ${conversation.id}`);
        }
        try {
            await this.ensureDir();
            await fs.writeFile(
                join(this.dataDir, `${conversation.id}.json`),
                JSON.stringify(conversation, null, 2),
                "utf8"
            );
        } catch (error) {
            throw new PersistenceError(`Failed to save conversation ${conversation.id}: ${toErrorMessage(error)}`, {
                cause: error,
                details: { conversationId: conversation.id }
            });
        }
    }

    private async ensureDir(): Promise<void> {
        await fs.mkdir(this.dataDir, { recursive: true });
    }
}
