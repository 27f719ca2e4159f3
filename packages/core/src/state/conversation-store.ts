import { randomUUID } from "node:crypto";
import { ChatMessage, Conversation, Role } from "../types/messages.js";
import { NotFoundError } from "../types/errors.js";
import { Mutex } from "./mutex.js";

/**
 * Persistence collaborator for conversation transcripts.
 */
export interface ConversationStore {
    createConversation(title: string): Promise<string>;
    addMessage(conversationId: string, role: Role, content: string): Promise<ChatMessage>;
    /** Rejects with NotFoundError for an unknown id. */
    getConversation(conversationId: string): Promise<Conversation>;
    /** Most recently updated first; `limit <= 0` returns everything. */
    listConversations(limit?: number): Promise<Conversation[]>;
}

export function newConversationId(): string {
    return `conv_${randomUUID().replace(/-/g, "")}`;
}

export function cloneConversation(conversation: Conversation): Conversation {
    return { ...conversation, messages: conversation.messages.map((message) => ({ ...message })) };
}

export function sortByRecency(conversations: Conversation[], limit = 0): Conversation[] {
    const sorted = [...conversations].sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    return limit > 0 ? sorted.slice(0, limit) : sorted;
}

/**
 * Process-local store. Callers get copies, never the live records.
 */
export class InMemoryConversationStore implements ConversationStore {
    protected readonly conversations = new Map<string, Conversation>();
    protected readonly mutex = new Mutex();

    async createConversation(title: string): Promise<string> {
        return this.mutex.runExclusive(async () => {
            const now = new Date().toISOString();
            const conversation: Conversation = {
                id: newConversationId(),
                title,
                messages: [],
                createdAt: now,
                updatedAt: now
            };
            this.conversations.set(conversation.id, conversation);
            await this.persist(conversation);
            return conversation.id;
        });
    }

    async addMessage(conversationId: string, role: Role, content: string): Promise<ChatMessage> {
        return this.mutex.runExclusive(async () => {
            const conversation = this.require(conversationId);
            const message: ChatMessage = { role, content, timestamp: new Date().toISOString() };
            conversation.messages.push(message);
            conversation.updatedAt = message.timestamp;
            await this.persist(conversation);
            return { ...message };
        });
    }

    async getConversation(conversationId: string): Promise<Conversation> {
        return this.mutex.runExclusive(() => cloneConversation(this.require(conversationId)));
    }

    async listConversations(limit = 0): Promise<Conversation[]> {
        return this.mutex.runExclusive(() =>
            sortByRecency(Array.from(this.conversations.values()), limit).map(cloneConversation)
        );
    }

    /**
     * Hook for durable subclasses; called under the lock after every mutation.
     */
    protected async persist(_conversation: Conversation): Promise<void> {}

    private require(conversationId: string): Conversation {
        const conversation = this.conversations.get(conversationId);
        if (!conversation) {
            throw new NotFoundError(`Conversation not found: ${conversationId}`, { details: { conversationId } });
        }
        return conversation;
    }
}
