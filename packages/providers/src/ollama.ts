import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import {
    BackendError,
    ChannelSink,
    GenerateOptions,
    Logger,
    ModelBackend,
    createLogger,
    isAbortError,
    toErrorMessage
} from "@parley/core";
import { isChatPrompt, parsePromptToMessages, PromptMessage } from "./utils/prompt-messages.js";

export interface RetryPolicy {
    attempts: number;
    baseDelayMs: number;
}

export interface LoadRetryPolicy {
    retries: number;
    delayMs: number;
}

export interface OllamaBackendOptions {
    baseURL?: string;
    model?: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    /** Connection failures: exponential backoff from `baseDelayMs`. */
    connectionRetry?: RetryPolicy;
    /** `done_reason: "load"` replies: fixed delay between retries. */
    loadRetry?: LoadRetryPolicy;
    logger?: Logger;
    fetch?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface OllamaRequest {
    model: string;
    prompt?: string;
    messages?: PromptMessage[];
    stream: boolean;
    options: { temperature: number; num_predict: number };
}

const payloadSchema = z.object({
    response: z.string().optional(),
    message: z.object({ content: z.string().optional() }).passthrough().optional(),
    done: z.boolean().optional(),
    done_reason: z.string().optional(),
    error: z.string().optional()
}).passthrough();

type OllamaPayload = z.infer<typeof payloadSchema>;

/**
 * Cancellation for one request. `signal` joins the caller's signal with the
 * request timeout and goes to fetch, which also aborts the body read.
 */
interface RequestDeadline {
    caller?: AbortSignal;
    timeout: AbortSignal;
    signal: AbortSignal;
}

type Completion =
    | { kind: "text"; text: string }
    | { kind: "loading" };

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

/**
 * Ollama HTTP backend. Role-prefixed transcripts go to `/api/chat`, anything
 * else to `/api/generate`. Connection failures and "model still loading"
 * replies are retried by two separate loops with their own counters.
 */
export class OllamaBackend implements ModelBackend {
    public readonly name = "ollama";
    private readonly baseURL: string;
    private readonly model: string;
    private readonly maxTokens: number;
    private readonly temperature: number;
    private readonly timeoutMs: number;
    private readonly connectionRetry: RetryPolicy;
    private readonly loadRetry: LoadRetryPolicy;
    private readonly logger: Logger;
    private readonly fetchImpl: typeof fetch;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(options: OllamaBackendOptions = {}) {
        this.baseURL = (options.baseURL || DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, "");
        this.model = options.model || "llama3.1";
        this.maxTokens = options.maxTokens ?? 1000;
        this.temperature = options.temperature ?? 0.7;
        this.timeoutMs = options.timeoutMs ?? 180_000;
        this.connectionRetry = options.connectionRetry ?? { attempts: 3, baseDelayMs: 2000 };
        this.loadRetry = options.loadRetry ?? { retries: 3, delayMs: 5000 };
        this.logger = options.logger ?? createLogger("OllamaBackend");
        this.fetchImpl = options.fetch ?? fetch;
        this.sleep = options.sleep ?? (async (ms, signal) => {
            await delay(ms, undefined, { signal });
        });
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        for (let loadAttempt = 0; ; loadAttempt++) {
            const deadline = this.deadline(options.signal);
            const response = await this.post(this.buildRequest(prompt, false), deadline);
            const body = await this.readBody(response, deadline);
            if (!body.trim()) {
                throw new BackendError("empty", "Backend returned an empty body");
            }
            const completion = parseCompletion(body);
            if (completion.kind === "text") return completion.text;
            await this.waitForModel(loadAttempt, options.signal);
        }
    }

    async generateStream(prompt: string, sink: ChannelSink<string>, options: GenerateOptions = {}): Promise<void> {
        try {
            for (let loadAttempt = 0; ; loadAttempt++) {
                const deadline = this.deadline(options.signal);
                const response = await this.post(this.buildRequest(prompt, true), deadline);
                const outcome = await this.relayStream(response, sink, deadline);
                if (outcome === "loading") {
                    await this.waitForModel(loadAttempt, options.signal);
                    continue;
                }
                if (outcome === 0) {
                    throw new BackendError("empty", "Backend streamed an empty reply");
                }
                return;
            }
        } finally {
            sink.close();
        }
    }

    private buildRequest(prompt: string, stream: boolean): OllamaRequest {
        const request: OllamaRequest = {
            model: this.model,
            stream,
            options: { temperature: this.temperature, num_predict: this.maxTokens }
        };
        const messages = isChatPrompt(prompt) ? parsePromptToMessages(prompt) : [];
        if (messages.length > 0) {
            request.messages = messages;
        } else {
            request.prompt = prompt;
        }
        return request;
    }

    /**
     * The timeout starts here and covers the POST, its connection retries and the body read.
     */
    private deadline(caller?: AbortSignal): RequestDeadline {
        const timeout = AbortSignal.timeout(this.timeoutMs);
        return { caller, timeout, signal: caller ? AbortSignal.any([caller, timeout]) : timeout };
    }

    /**
     * Maps a failed fetch or body read: caller cancellation, then the request timeout,
     * then anything else as a connection failure.
     */
    private failure(error: unknown, deadline: RequestDeadline, what: string): BackendError {
        if (error instanceof BackendError) return error;
        if (deadline.caller?.aborted) return abortedError(error);
        if (deadline.timeout.aborted) {
            return new BackendError("timeout", `Backend did not answer within ${this.timeoutMs}ms`, { cause: error });
        }
        if (isAbortError(error)) return abortedError(error);
        return new BackendError("connection", `${what}: ${toErrorMessage(error)}`, { cause: error });
    }

    /**
     * POSTs with bounded exponential backoff on connection failures.
     * HTTP error statuses are not retried.
     */
    private async post(request: OllamaRequest, deadline: RequestDeadline): Promise<Response> {
        const endpoint = request.messages ? "/api/chat" : "/api/generate";
        const { attempts, baseDelayMs } = this.connectionRetry;

        for (let attempt = 1; ; attempt++) {
            let response: Response;
            try {
                response = await this.fetchImpl(`${this.baseURL}${endpoint}`, {
                    method: "POST",
                    headers: { "Content-Type": "application/json" },
                    body: JSON.stringify(request),
                    signal: deadline.signal
                });
            } catch (error) {
                if (deadline.caller?.aborted || deadline.timeout.aborted) throw this.failure(error, deadline, "Request failed");
                if (attempt >= attempts) {
                    throw new BackendError("connection", `Backend unreachable after ${attempts} attempt(s): ${toErrorMessage(error)}`, {
                        cause: error
                    });
                }
                const wait = baseDelayMs * 2 ** (attempt - 1);
                this.logger.warn("Request failed, retrying", { attempt, waitMs: wait, error: toErrorMessage(error) });
                await this.pause(wait, deadline.caller);
                continue;
            }

            if (!response.ok) {
                const text = await this.readBody(response, deadline);
                throw new BackendError("http", `Backend returned status ${response.status}: ${text.trim()}`, {
                    details: { status: response.status }
                });
            }
            return response;
        }
    }

    private async waitForModel(loadAttempt: number, signal?: AbortSignal): Promise<void> {
        if (loadAttempt >= this.loadRetry.retries) {
            throw new BackendError("loading", `Model still loading after ${this.loadRetry.retries} retries`);
        }
        this.logger.info("Model is loading, retrying", {
            retry: loadAttempt + 1,
            of: this.loadRetry.retries,
            waitMs: this.loadRetry.delayMs
        });
        await this.pause(this.loadRetry.delayMs, signal);
    }

    /**
     * Forwards NDJSON deltas to the sink. Returns the number of deltas sent, or
     * "loading" when the model reported it is still loading before sending anything.
     */
    private async relayStream(response: Response, sink: ChannelSink<string>, deadline: RequestDeadline): Promise<number | "loading"> {
        if (!response.body) {
            throw new BackendError("empty", "Backend returned no stream body");
        }
        const reader = response.body.getReader();
        const decoder = new TextDecoder();
        let buffer = "";
        let sent = 0;

        const handleLine = async (line: string): Promise<"done" | "loading" | "more"> => {
            if (!line.trim()) return "more";
            const payload = parsePayload(line);
            if (!payload) {
                this.logger.warn("Skipping unparseable stream line", { line: line.slice(0, 200) });
                return "more";
            }
            if (payload.error) {
                throw new BackendError("http", `Backend error: ${payload.error}`);
            }
            if (payload.done_reason === "load") {
                if (sent > 0) throw new BackendError("loading", "Model reloaded in the middle of a reply");
                return "loading";
            }
            const delta = payload.response ?? payload.message?.content ?? "";
            if (delta) {
                await sink.send(delta, deadline.caller);
                sent++;
            }
            return payload.done ? "done" : "more";
        };

        try {
            for (;;) {
                const { done, value } = await reader.read();
                if (value) buffer += decoder.decode(value, { stream: true });
                if (done) buffer += decoder.decode();

                let newline = buffer.indexOf("\n");
                while (newline !== -1) {
                    const state = await handleLine(buffer.slice(0, newline));
                    buffer = buffer.slice(newline + 1);
                    if (state === "loading") return "loading";
                    if (state === "done") return sent;
                    newline = buffer.indexOf("\n");
                }

                if (done) {
                    const state = await handleLine(buffer);
                    return state === "loading" ? "loading" : sent;
                }
            }
        } catch (error) {
            throw this.failure(error, deadline, "Stream interrupted");
        } finally {
            await reader.cancel().catch((error: unknown) => {
                this.logger.debug("Stream cancel failed", { error: toErrorMessage(error) });
            });
        }
    }

    private async readBody(response: Response, deadline: RequestDeadline): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            throw this.failure(error, deadline, "Failed to read response");
        }
    }

    private async pause(ms: number, signal?: AbortSignal): Promise<void> {
        try {
            await this.sleep(ms, signal);
        } catch (error) {
            throw abortedError(error);
        }
    }
}

function parsePayload(text: string): OllamaPayload | undefined {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        return undefined;
    }
    const parsed = payloadSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}

/**
 * Reads a non-streamed body as a generate or chat payload; bodies that are
 * not JSON are taken as plain text.
 */
function parseCompletion(body: string): Completion {
    const payload = parsePayload(body.trim());
    if (!payload) {
        return { kind: "text", text: body.trim() };
    }
    if (payload.error) {
        throw new BackendError("http", `Backend error: ${payload.error}`);
    }
    if (payload.done_reason === "load") {
        return { kind: "loading" };
    }
    return { kind: "text", text: payload.response ?? payload.message?.content ?? "" };
}

function abortedError(cause: unknown): BackendError {
    return new BackendError("aborted", "Request aborted", { cause });
}
