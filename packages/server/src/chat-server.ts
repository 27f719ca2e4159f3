import { once } from "node:events";
import * as http from "node:http";
import { AddressInfo } from "node:net";
import { z } from "zod";
import {
    AgentEngine,
    AgentError,
    AgentStreamEvent,
    BindingEntry,
    BoundedChannel,
    ChatMessage,
    ConversationBinder,
    ConversationStore,
    DEFAULT_CONVERSATION_TITLE,
    Logger,
    Mutex,
    NotFoundError,
    ValidationError,
    createLogger,
    formatSseError,
    formatSseFrame,
    isAbortError,
    toErrorMessage
} from "@parley/core";

export interface ChatServerOptions {
    engine: AgentEngine;
    binder: ConversationBinder;
    store: ConversationStore;
    logger?: Logger;
    /** Upper bound on a JSON request body, in bytes. */
    maxBodyBytes?: number;
    /** Capacity of the per-request event channel. */
    channelCapacity?: number;
}

export const TITLE_LENGTH = 30;

interface TurnLock {
    mutex: Mutex;
    /** Turns holding or waiting for the mutex. */
    holders: number;
}

const chatRequestSchema = z.object({
    conversation_id: z.string().optional(),
    message: z.string({ required_error: "message is required" })
});

interface ConversationSummary {
    id: string;
    agent_conversation_id: string;
    title: string;
    created_at: string;
    message_count: number;
}

/**
 * HTTP front end for the engine:
 *   - POST /api/chat              → one full turn, JSON reply
 *   - GET  /api/chat/stream       → one turn as Server-Sent Events
 *   - GET  /api/conversations     → bound conversations, newest first
 *   - GET  /api/conversations/:id → one conversation's messages
 *   - GET  /health                → liveness probe
 */
export class ChatServer {
    private readonly server: http.Server;
    private readonly engine: AgentEngine;
    private readonly binder: ConversationBinder;
    private readonly store: ConversationStore;
    private readonly logger: Logger;
    private readonly maxBodyBytes: number;
    private readonly channelCapacity?: number;
    private readonly turnLocks = new Map<string, TurnLock>();

    constructor(options: ChatServerOptions) {
        this.engine = options.engine;
        this.binder = options.binder;
        this.store = options.store;
        this.logger = options.logger ?? createLogger("ChatServer");
        this.maxBodyBytes = options.maxBodyBytes ?? 1024 * 1024;
        this.channelCapacity = options.channelCapacity;
        this.server = http.createServer((req, res) => {
            this.handleRequest(req, res).catch((error: unknown) => this.sendError(res, error));
        });
    }

    /**
     * Starts listening and resolves with the bound port (useful with port 0).
     */
    listen(port: number = 8080, host?: string): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once("error", reject);
            this.server.listen(port, host, () => {
                this.server.off("error", reject);
                const bound = this.port;
                this.logger.info("Chat server listening", { port: bound });
                resolve(bound);
            });
        });
    }

    get port(): number {
        const address: AddressInfo | string | null = this.server.address();
        return address !== null && typeof address === "object" ? address.port : 0;
    }

    /**
     * Sessions with a turn running or queued.
     */
    get activeTurns(): number {
        return this.turnLocks.size;
    }

    close(): Promise<void> {
        this.logger.info("Chat server closing", { activeTurns: this.activeTurns });
        return new Promise((resolve, reject) => {
            this.server.closeAllConnections();
            this.server.close((err) => (err ? reject(err) : resolve()));
        });
    }

    private setCorsHeaders(res: http.ServerResponse): void {
        res.setHeader("Access-Control-Allow-Origin", "*");
        res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Accept");
    }

    private sendJson(res: http.ServerResponse, code: number, body: unknown): void {
        res.writeHead(code, { "Content-Type": "application/json; charset=utf-8" });
        res.end(JSON.stringify(body));
    }

    private sendError(res: http.ServerResponse, error: unknown): void {
        const status = statusFor(error);
        if (status >= 500) {
            this.logger.error("Request failed", { error: toErrorMessage(error) });
        } else {
            this.logger.warn("Request rejected", { status, error: toErrorMessage(error) });
        }
        if (res.headersSent) {
            res.end();
            return;
        }
        this.sendJson(res, status, { error: toErrorMessage(error) });
    }

    private methodNotAllowed(res: http.ServerResponse, req: http.IncomingMessage, allowed: string): void {
        this.logger.warn("Method not allowed", { method: req.method, path: req.url });
        res.setHeader("Allow", allowed);
        this.sendJson(res, 405, { error: "Method not allowed" });
    }

    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        this.setCorsHeaders(res);

        if (req.method === "OPTIONS") {
            res.writeHead(204);
            res.end();
            return;
        }

        const url = new URL(req.url ?? "/", "http://localhost");
        const { pathname } = url;

        if (pathname === "/health") {
            if (req.method !== "GET") return this.methodNotAllowed(res, req, "GET");
            return this.sendJson(res, 200, { status: "healthy", timestamp: Math.floor(Date.now() / 1000) });
        }

        if (pathname === "/api/chat") {
            if (req.method !== "POST") return this.methodNotAllowed(res, req, "POST");
            return this.handleChat(req, res);
        }

        if (pathname === "/api/chat/stream") {
            if (req.method !== "GET") return this.methodNotAllowed(res, req, "GET");
            return this.handleChatStream(req, res, url);
        }

        if (pathname === "/api/conversations") {
            if (req.method !== "GET") return this.methodNotAllowed(res, req, "GET");
            return this.sendJson(res, 200, await this.listConversations());
        }

        if (pathname.startsWith("/api/conversations/")) {
            const handle = decodeURIComponent(pathname.slice("/api/conversations/".length));
            if (!handle) throw new ValidationError("Conversation ID required");
            if (req.method !== "GET") return this.methodNotAllowed(res, req, "GET");
            return this.sendJson(res, 200, await this.getConversation(handle));
        }

        this.sendJson(res, 404, { error: "Not Found" });
    }

    private async handleChat(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const request = await this.readChatRequest(req);
        const entry = await this.binder.resolve(request.conversation_id);
        this.logger.debug("Processing message", { conversationId: entry.handle, length: request.message.length });

        const content = await this.withTurnLock(entry.sessionId, () =>
            this.engine.process(request.message, { sessionId: entry.sessionId, conversationId: entry.handle })
        );

        this.sendJson(res, 200, {
            conversation_id: entry.handle,
            agent_conversation_id: entry.sessionId,
            message: { role: "assistant", content }
        });
    }

    private async handleChatStream(req: http.IncomingMessage, res: http.ServerResponse, url: URL): Promise<void> {
        const message = url.searchParams.get("message") ?? "";
        if (!message.trim()) {
            throw new ValidationError("message is required");
        }
        const entry = await this.binder.resolve(url.searchParams.get("conversation_id") ?? undefined);

        const controller = new AbortController();
        res.on("close", () => {
            if (!res.writableEnded) {
                this.logger.info("Client disconnected, aborting turn", { conversationId: entry.handle });
                controller.abort();
            }
        });

        res.writeHead(200, {
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache",
            "Connection": "keep-alive",
            "X-Accel-Buffering": "no"
        });
        res.flushHeaders();

        const channel = new BoundedChannel<AgentStreamEvent>(this.channelCapacity);
        const [turn] = await Promise.allSettled([
            this.withTurnLock(entry.sessionId, () =>
                this.engine.processStream(message, channel, {
                    sessionId: entry.sessionId,
                    conversationId: entry.handle,
                    signal: controller.signal
                })
            ),
            this.relay(channel, res)
        ]);

        if (turn.status === "rejected") {
            if (controller.signal.aborted || isAbortError(turn.reason)) {
                this.logger.info("Stream ended early", { conversationId: entry.handle });
            } else {
                this.logger.error("Stream failed", { conversationId: entry.handle, error: toErrorMessage(turn.reason) });
                if (!res.writableEnded) res.write(formatSseError(toErrorMessage(turn.reason)));
            }
        }
        if (!res.writableEnded) res.end();
    }

    /**
     * Writes each event as an SSE frame. A full socket buffer stalls the loop until
     * it drains, which in turn leaves the channel full and blocks the producer.
     */
    private async relay(channel: BoundedChannel<AgentStreamEvent>, res: http.ServerResponse): Promise<void> {
        for await (const event of channel) {
            if (res.writableEnded || res.destroyed) continue;
            if (!res.write(formatSseFrame(event)) && !res.destroyed) {
                await waitForDrain(res);
            }
        }
    }

    private async listConversations(): Promise<{ conversations: ConversationSummary[]; total: number }> {
        const summaries: ConversationSummary[] = [];
        for (const entry of await this.binder.entries()) {
            const messages = await this.visibleMessages(entry);
            if (!messages) continue;
            summaries.push({
                id: entry.handle,
                agent_conversation_id: entry.sessionId,
                title: titleFor(messages),
                created_at: entry.createdAt,
                message_count: messages.length
            });
        }
        summaries.sort((a, b) => b.created_at.localeCompare(a.created_at));
        return { conversations: summaries, total: summaries.length };
    }

    private async getConversation(handle: string) {
        const entry = await this.binder.lookup(handle);
        const messages = entry ? await this.visibleMessages(entry) : undefined;
        if (!entry || !messages) {
            throw new NotFoundError(`Conversation not found: ${handle}`);
        }
        return {
            id: entry.handle,
            agent_conversation_id: entry.sessionId,
            messages: messages.map(({ role, content, timestamp }) => ({ role, content, timestamp })),
            created_at: entry.createdAt
        };
    }

    /**
     * User and assistant messages of a bound session; tool output and feedback
     * notes stay internal. Undefined when the session is gone from the store.
     */
    private async visibleMessages(entry: BindingEntry): Promise<ChatMessage[] | undefined> {
        try {
            const conversation = await this.store.getConversation(entry.sessionId);
            return conversation.messages.filter((message) => message.role !== "system");
        } catch (error) {
            if (error instanceof NotFoundError) {
                this.logger.warn("Bound session missing from store", { handle: entry.handle, sessionId: entry.sessionId });
                return undefined;
            }
            throw error;
        }
    }

    private async readChatRequest(req: http.IncomingMessage): Promise<z.infer<typeof chatRequestSchema>> {
        const chunks: Buffer[] = [];
        let size = 0;
        for await (const chunk of req) {
            const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
            size += buffer.length;
            if (size > this.maxBodyBytes) {
                throw new ValidationError("Request body too large");
            }
            chunks.push(buffer);
        }

        let body: unknown;
        try {
            body = JSON.parse(Buffer.concat(chunks).toString("utf8"));
        } catch (error) {
            throw new ValidationError("Invalid request", { cause: error });
        }

        const parsed = chatRequestSchema.safeParse(body);
        if (!parsed.success) {
            throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
        }
        if (!parsed.data.message.trim()) {
            throw new ValidationError("message is required");
        }
        return parsed.data;
    }

    private async withTurnLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
        let lock = this.turnLocks.get(sessionId);
        if (!lock) {
            lock = { mutex: new Mutex(), holders: 0 };
            this.turnLocks.set(sessionId, lock);
        }
        lock.holders++;
        try {
            return await lock.mutex.runExclusive(fn);
        } finally {
            lock.holders--;
            if (lock.holders === 0) this.turnLocks.delete(sessionId);
        }
    }
}

/**
 * Resolves on `drain`, or on `close` when the client goes away first.
 */
async function waitForDrain(res: http.ServerResponse): Promise<void> {
    const settled = new AbortController();
    try {
        await Promise.race([
            once(res, "drain", { signal: settled.signal }),
            once(res, "close", { signal: settled.signal })
        ]);
    } finally {
        settled.abort();
    }
}

export function titleFor(messages: readonly ChatMessage[]): string {
    const first = messages.find((message) => message.role === "user");
    if (!first) return DEFAULT_CONVERSATION_TITLE;
    return first.content.length > TITLE_LENGTH ? `${first.content.slice(0, TITLE_LENGTH)}...` : first.content;
}

export function statusFor(error: unknown): number {
    if (!(error instanceof AgentError)) return 500;
    switch (error.code) {
        case "NOT_FOUND":
            return 404;
        case "VALIDATION_FAILED":
        case "INVALID_ARGUMENT":
            return 400;
        default:
            return 500;
    }
}
