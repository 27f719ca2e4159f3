import { ConversationStore } from "../state/conversation-store.js";
import { ConversationSession } from "../state/session.js";
import { SessionSource } from "../state/conversation-binder.js";
import { CapabilityRegistry } from "../tools/capability-registry.js";
import { ModelBackend } from "../providers/model-backend.js";
import { BoundedChannel, ChannelSink, DEFAULT_CHANNEL_CAPACITY } from "../events/stream-channel.js";
import { thinkingEvent } from "../events/stream-events.js";
import { buildPrompt, buildSystemInstruction, DEFAULT_HISTORY_LIMIT } from "../helpers/prompt-builder.js";
import { extractToolCall, LEGACY_TOOL_MARKERS } from "../helpers/tool-call-extractor.js";
import {
    AgentStreamEvent,
    CapabilityResult,
    Role,
    ToolInvocation,
    ToolParams,
    TurnPhase
} from "../types/messages.js";
import {
    AgentError,
    InitError,
    InvalidArgumentError,
    NotFoundError,
    PersistenceError,
    isAbortError,
    toErrorMessage
} from "../types/errors.js";
import { createLogger, Logger } from "../utils/logger.js";

export const FALLBACK_REPLY = "Sorry, I couldn't generate a valid response. Please try again.";
export const DEFAULT_CONVERSATION_TITLE = "New conversation";

export interface AgentEngineOptions {
    store: ConversationStore;
    systemPrompt?: string;
    historyLimit?: number;
    logger?: Logger;
    /** Capacity of the internal content channel used while streaming. */
    channelCapacity?: number;
    legacyMarkers?: readonly string[];
}

export interface TurnOptions {
    /** Internal session for this turn; defaults to the engine's active session. */
    sessionId?: string;
    /** Caller-facing handle reported in the `meta` event; defaults to the session id. */
    conversationId?: string;
    signal?: AbortSignal;
}

interface TurnState {
    sessionId: string;
    phase: TurnPhase;
    startedAt: number;
}

/**
 * Two-phase tool-calling engine. Phase one asks the backend for a reply and
 * looks for a tool call in it; when one is found the capability runs once, its
 * output is injected as a system message and phase two produces the answer.
 */
export class AgentEngine implements SessionSource {
    private readonly store: ConversationStore;
    private readonly systemPrompt: string;
    private readonly historyLimit: number;
    private readonly logger: Logger;
    private readonly channelCapacity: number;
    private readonly legacyMarkers: readonly string[];

    private backend?: ModelBackend;
    private registry?: CapabilityRegistry;
    private activeSessionId = "";

    constructor(options: AgentEngineOptions) {
        this.store = options.store;
        this.systemPrompt = options.systemPrompt ?? "";
        this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
        this.logger = options.logger ?? createLogger("AgentEngine");
        this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
        this.legacyMarkers = options.legacyMarkers ?? LEGACY_TOOL_MARKERS;
    }

    async initialize(backend: ModelBackend, registry: CapabilityRegistry): Promise<void> {
        this.backend = backend;
        this.registry = registry;
        try {
            this.activeSessionId = await this.openConversation(DEFAULT_CONVERSATION_TITLE);
        } catch (error) {
            throw new InitError(`Failed to create the initial conversation: ${toErrorMessage(error)}`, { cause: error });
        }
        this.logger.info("Engine initialized", {
            backend: backend.name,
            capabilities: registry.list().map((capability) => capability.name),
            sessionId: this.activeSessionId
        });
    }

    get initialized(): boolean {
        return this.backend !== undefined && this.registry !== undefined;
    }

    getConversationId(): string {
        return this.activeSessionId;
    }

    setConversationId(id: string): void {
        if (!id || !id.trim()) {
            throw new InvalidArgumentError("Conversation id must not be empty");
        }
        this.activeSessionId = id.trim();
        this.logger.debug("Active conversation switched", { sessionId: this.activeSessionId });
    }

    async openConversation(title: string = DEFAULT_CONVERSATION_TITLE): Promise<string> {
        try {
            return await this.store.createConversation(title);
        } catch (error) {
            if (error instanceof AgentError) throw error;
            throw new PersistenceError(`Failed to create conversation: ${toErrorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Fresh copy of a session's transcript. An id the store does not know yields an empty session.
     */
    async loadSession(sessionId: string): Promise<ConversationSession> {
        try {
            const conversation = await this.store.getConversation(sessionId);
            return ConversationSession.fromConversation(conversation);
        } catch (error) {
            if (error instanceof NotFoundError) {
                this.logger.warn("Conversation not found, starting with an empty history", { sessionId });
                return new ConversationSession({ id: sessionId });
            }
            throw error;
        }
    }

    getSystemInstruction(): string {
        return buildSystemInstruction(this.systemPrompt, this.registry?.list() ?? []);
    }

    /**
     * Runs one capability and returns its value. Lookup and capability errors propagate.
     */
    async executeTool(name: string, params: ToolParams, options: TurnOptions = {}): Promise<unknown> {
        const { registry } = this.requireReady();
        return registry.invoke(name, params, { signal: options.signal, sessionId: options.sessionId });
    }

    async process(input: string, options: TurnOptions = {}): Promise<string> {
        const { backend } = this.requireReady();
        const turn = this.startTurn(options);
        try {
            const session = await this.beginTurn(turn, input);

            this.enter(turn, "awaiting_pre_response");
            const preResponse = await backend.generate(this.renderPrompt(session), { signal: options.signal });
            const invocation = extractToolCall(preResponse, { legacyMarkers: this.legacyMarkers });

            let reply: string;
            if (invocation) {
                await this.runInvocation(turn, session, invocation, options);
                this.enter(turn, "awaiting_final_response");
                reply = this.orFallback(await backend.generate(this.renderPrompt(session), { signal: options.signal }), turn);
            } else {
                reply = this.orFallback(preResponse, turn);
            }

            await this.record(session, "assistant", reply);
            this.enter(turn, "respond");
            return reply;
        } catch (error) {
            this.fail(turn, error);
            throw error;
        }
    }

    /**
     * Streams one turn into `sink`: meta, thinking markers, content deltas, done.
     * The sink is closed exactly once when this returns or throws; `done` is only
     * sent on success.
     */
    async processStream(input: string, sink: ChannelSink<AgentStreamEvent>, options: TurnOptions = {}): Promise<void> {
        const turn = this.startTurn(options);
        const { signal } = options;
        try {
            const { backend } = this.requireReady();
            await sink.send({
                type: "meta",
                conversationId: options.conversationId ?? turn.sessionId,
                agentConversationId: turn.sessionId
            }, signal);

            const session = await this.beginTurn(turn, input);
            await sink.send(thinkingEvent("analyzing"), signal);

            this.enter(turn, "awaiting_pre_response");
            const preResponse = await backend.generate(this.renderPrompt(session), { signal });
            const invocation = extractToolCall(preResponse, { legacyMarkers: this.legacyMarkers });

            if (invocation) {
                await sink.send(thinkingEvent("tool_call", invocation.tool), signal);
                const result = await this.runInvocation(turn, session, invocation, options);
                await sink.send(result.ok ? thinkingEvent("tool_result") : thinkingEvent("tool_error", result.error), signal);
                this.enter(turn, "awaiting_final_response");
            }

            await sink.send(thinkingEvent("generating"), signal);
            const emitted = await this.streamReply(backend, this.renderPrompt(session), sink, signal);

            let reply = emitted;
            if (!emitted.trim()) {
                reply = this.orFallback(emitted, turn);
                await sink.send({ type: "content", delta: reply }, signal);
            }

            await this.record(session, "assistant", reply);
            await sink.send({ type: "done" }, signal);
            this.enter(turn, "respond");
        } catch (error) {
            this.fail(turn, error);
            throw error;
        } finally {
            sink.close();
        }
    }

    /**
     * Appends a timestamped feedback note to the conversation as a system message.
     */
    async recordFeedback(feedback: string, options: Pick<TurnOptions, "sessionId"> = {}): Promise<void> {
        const sessionId = options.sessionId ?? this.activeSessionId;
        if (!sessionId) {
            throw new InitError("No conversation to record feedback against");
        }
        const stamp = new Date().toISOString().replace("T", " ").slice(0, 19);
        try {
            await this.store.addMessage(sessionId, "system", `Feedback (${stamp}): ${feedback}`);
        } catch (error) {
            throw new PersistenceError(`Failed to record feedback: ${toErrorMessage(error)}`, {
                cause: error,
                details: { sessionId }
            });
        }
    }

    private requireReady(): { backend: ModelBackend; registry: CapabilityRegistry } {
        if (!this.backend || !this.registry) {
            throw new InitError("AgentEngine.initialize() must be called first");
        }
        return { backend: this.backend, registry: this.registry };
    }

    private startTurn(options: TurnOptions): TurnState {
        const sessionId = options.sessionId ?? this.activeSessionId;
        return { sessionId, phase: "building_prompt", startedAt: Date.now() };
    }

    private async beginTurn(turn: TurnState, input: string): Promise<ConversationSession> {
        if (!turn.sessionId) {
            throw new InitError("No active conversation; call initialize() or pass a sessionId");
        }
        this.enter(turn, "building_prompt");
        const session = await this.loadSession(turn.sessionId);
        await this.record(session, "user", input);
        return session;
    }

    private async runInvocation(
        turn: TurnState,
        session: ConversationSession,
        invocation: ToolInvocation,
        options: TurnOptions
    ): Promise<CapabilityResult> {
        this.enter(turn, "executing");
        this.logger.info("Tool call detected", { tool: invocation.tool, format: invocation.format, sessionId: turn.sessionId });
        let result: CapabilityResult;
        try {
            const value = await this.executeTool(invocation.tool, invocation.params, { ...options, sessionId: turn.sessionId });
            result = { ok: true, value };
        } catch (error) {
            result = { ok: false, error: toErrorMessage(error) };
        }

        this.enter(turn, "injecting_result");
        let text: string;
        if (result.ok) {
            text = `Tool(${invocation.tool}) output: ${formatToolValue(result.value)}`;
        } else {
            this.logger.warn("Tool execution failed", { tool: invocation.tool, error: result.error });
            text = `Tool(${invocation.tool}) output: Tool ${invocation.tool} failed: ${result.error}`;
        }
        await this.record(session, "system", text);
        return result;
    }

    /**
     * Relays backend deltas through an internal bounded channel into the caller's
     * sink and returns everything that was relayed.
     */
    private async streamReply(
        backend: ModelBackend,
        prompt: string,
        sink: ChannelSink<AgentStreamEvent>,
        signal?: AbortSignal
    ): Promise<string> {
        const internal = new BoundedChannel<string>(this.channelCapacity);
        let collected = "";

        const produce = backend.generateStream(prompt, internal, { signal }).finally(() => internal.close());
        const relay = (async () => {
            try {
                for await (const delta of internal) {
                    collected += delta;
                    await sink.send({ type: "content", delta }, signal);
                }
            } catch (error) {
                internal.close();
                throw error;
            }
        })();

        const [produced, relayed] = await Promise.allSettled([produce, relay]);
        if (relayed.status === "rejected") throw relayed.reason;
        if (produced.status === "rejected") throw produced.reason;
        return collected;
    }

    private renderPrompt(session: ConversationSession): string {
        return buildPrompt(this.getSystemInstruction(), session.getMessages(), this.historyLimit);
    }

    private orFallback(text: string, turn: TurnState): string {
        if (text.trim()) return text;
        this.logger.warn("Backend returned an empty reply, using fallback", { sessionId: turn.sessionId, phase: turn.phase });
        return FALLBACK_REPLY;
    }

    /**
     * Appends to the working session and persists. Store failures are logged and swallowed
     * so a computed reply is never lost to them.
     */
    private async record(session: ConversationSession, role: Role, content: string): Promise<void> {
        session.addMessage(role, content);
        try {
            await this.store.addMessage(session.id, role, content);
        } catch (error) {
            this.logger.warn("Failed to persist message", { sessionId: session.id, role, error: toErrorMessage(error) });
        }
    }

    private enter(turn: TurnState, phase: TurnPhase): void {
        turn.phase = phase;
        this.logger.debug(`Turn phase: ${phase}`, { sessionId: turn.sessionId, elapsedMs: Date.now() - turn.startedAt });
    }

    private fail(turn: TurnState, error: unknown): void {
        const from = turn.phase;
        turn.phase = "failed";
        if (isAbortError(error)) {
            this.logger.info("Turn cancelled", { sessionId: turn.sessionId, phase: from });
        } else {
            this.logger.error("Turn failed", { sessionId: turn.sessionId, phase: from, error: toErrorMessage(error) });
        }
    }
}

function formatToolValue(value: unknown): string {
    if (typeof value === "string") return value;
    if (value === undefined) return "";
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}
