import { Logger, silentLogger } from "../utils/logger.js";
import { newConversationId } from "./conversation-store.js";
import { Mutex } from "./mutex.js";

/**
 * Where the binder gets internal sessions from. The engine implements this.
 */
export interface SessionSource {
    getConversationId(): string;
    openConversation(title?: string): Promise<string>;
}

export interface BindingEntry {
    /** Caller-facing conversation handle. */
    handle: string;
    /** Internal session id in the conversation store. */
    sessionId: string;
    createdAt: string;
}

export interface ConversationBinderOptions {
    sessions: SessionSource;
    logger?: Logger;
    /** Handle generator, replaceable in tests. */
    mintHandle?: () => string;
}

/**
 * Process-wide table of caller handles to internal session ids.
 * Entries are created on first contact and never change afterwards.
 */
export class ConversationBinder {
    private readonly sessions: SessionSource;
    private readonly logger: Logger;
    private readonly mintHandle: () => string;
    private readonly mutex = new Mutex();
    private readonly byHandle = new Map<string, BindingEntry>();
    private readonly bySession = new Map<string, string>();

    constructor(options: ConversationBinderOptions) {
        this.sessions = options.sessions;
        this.logger = options.logger ?? silentLogger;
        this.mintHandle = options.mintHandle ?? newConversationId;
    }

    /**
     * Returns the binding for `handle`, creating it on first contact.
     * An absent or blank handle gets a freshly minted one. A new handle takes over
     * the engine's active session while no other handle holds it; otherwise it gets
     * a session of its own.
     */
    async resolve(handle?: string): Promise<BindingEntry> {
        return this.mutex.runExclusive(async () => {
            const requested = handle?.trim() ?? "";
            const existing = requested ? this.byHandle.get(requested) : undefined;
            if (existing) return { ...existing };

            const newHandle = requested || this.uniqueHandle();
            const active = this.sessions.getConversationId();
            let sessionId: string;
            if (active && !this.bySession.has(active)) {
                sessionId = active;
            } else {
                sessionId = await this.sessions.openConversation();
            }

            const entry: BindingEntry = { handle: newHandle, sessionId, createdAt: new Date().toISOString() };
            this.byHandle.set(newHandle, entry);
            this.bySession.set(sessionId, newHandle);
            this.logger.info("Bound conversation", { handle: newHandle, sessionId, minted: !requested });
            return { ...entry };
        });
    }

    async lookup(handle: string): Promise<BindingEntry | undefined> {
        return this.mutex.runExclusive(() => {
            const entry = this.byHandle.get(handle);
            return entry ? { ...entry } : undefined;
        });
    }

    async handleFor(sessionId: string): Promise<string | undefined> {
        return this.mutex.runExclusive(() => this.bySession.get(sessionId));
    }

    async entries(): Promise<BindingEntry[]> {
        return this.mutex.runExclusive(() => Array.from(this.byHandle.values(), (entry) => ({ ...entry })));
    }

    private uniqueHandle(): string {
        let candidate = this.mintHandle();
        while (this.byHandle.has(candidate)) {
            candidate = this.mintHandle();
        }
        return candidate;
    }
}
