import { OpenAI } from "openai";
import {
    BackendError,
    ChannelSink,
    GenerateOptions,
    Logger,
    ModelBackend,
    createLogger,
    toErrorMessage
} from "@parley/core";

export interface OpenAIBackendOptions {
    apiKey?: string;
    model?: string;
    baseURL?: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    /** Connection retries performed by the SDK. */
    maxRetries?: number;
    logger?: Logger;
    fetch?: typeof fetch;
}

/**
 * Chat-completions backend. The whole rendered prompt is sent as one user message.
 */
export class OpenAIBackend implements ModelBackend {
    public readonly name = "openai";
    protected client: OpenAI;
    private readonly model: string;
    private readonly maxTokens: number;
    private readonly temperature: number;
    private readonly logger: Logger;

    constructor(options: OpenAIBackendOptions = {}) {
        this.model = options.model || "gpt-4o-mini";
        this.maxTokens = options.maxTokens ?? 1000;
        this.temperature = options.temperature ?? 0.7;
        this.logger = options.logger ?? createLogger("OpenAIBackend");

        this.client = new OpenAI({
            apiKey: options.apiKey || process.env.OPENAI_API_KEY || "",
            baseURL: options.baseURL,
            timeout: options.timeoutMs ?? 180_000,
            maxRetries: options.maxRetries ?? 2,
            fetch: options.fetch
        });
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [{ role: "user", content: prompt }],
                    max_tokens: this.maxTokens,
                    temperature: this.temperature
                },
                { signal: options.signal }
            );
            return response.choices[0]?.message?.content ?? "";
        } catch (error) {
            throw this.toBackendError(error);
        }
    }

    async generateStream(prompt: string, sink: ChannelSink<string>, options: GenerateOptions = {}): Promise<void> {
        try {
            const stream = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [{ role: "user", content: prompt }],
                    max_tokens: this.maxTokens,
                    temperature: this.temperature,
                    stream: true
                },
                { signal: options.signal }
            );
            let sent = 0;
            for await (const chunk of stream) {
                const delta = chunk.choices[0]?.delta?.content;
                if (delta) {
                    await sink.send(delta, options.signal);
                    sent++;
                }
            }
            if (sent === 0) {
                throw new BackendError("empty", "Backend streamed an empty reply");
            }
        } catch (error) {
            throw this.toBackendError(error);
        } finally {
            sink.close();
        }
    }

    private toBackendError(error: unknown): BackendError {
        if (error instanceof BackendError) return error;
        if (error instanceof OpenAI.APIUserAbortError) {
            return new BackendError("aborted", "Request aborted", { cause: error });
        }
        if (error instanceof OpenAI.APIConnectionTimeoutError) {
            return new BackendError("timeout", "Backend request timed out", { cause: error });
        }
        if (error instanceof OpenAI.APIConnectionError) {
            return new BackendError("connection", `Backend unreachable: ${error.message}`, { cause: error });
        }
        if (error instanceof OpenAI.APIError) {
            this.logger.warn("Backend returned an error", { status: error.status, error: error.message });
            return new BackendError("http", `Backend returned status ${error.status ?? "unknown"}: ${error.message}`, {
                cause: error,
                details: { status: error.status }
            });
        }
        return new BackendError("connection", toErrorMessage(error), { cause: error });
    }
}
