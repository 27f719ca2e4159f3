import { BackendRegistry, ModelBackend, ModelConfig, Logger } from "@parley/core";
import { OllamaBackend, OllamaBackendOptions } from "./ollama.js";
import { OpenAIBackend, OpenAIBackendOptions } from "./openai.js";

export interface DefaultRegistryOptions {
    ollama?: Partial<OllamaBackendOptions>;
    openai?: Partial<OpenAIBackendOptions>;
}

export function createDefaultBackendRegistry(options: DefaultRegistryOptions = {}): BackendRegistry {
    const registry = new BackendRegistry();

    registry.register({
        name: "ollama",
        description: "Local Ollama server (/api/generate and /api/chat)",
        create: (config, context) => new OllamaBackend({
            baseURL: config.baseURL,
            model: config.model,
            maxTokens: config.maxTokens,
            temperature: config.temperature,
            timeoutMs: config.timeoutMs,
            logger: context.logger?.child("OllamaBackend"),
            ...options.ollama
        })
    });

    registry.register({
        name: "openai",
        description: "OpenAI chat completions",
        create: (config, context) => new OpenAIBackend({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            model: config.model,
            maxTokens: config.maxTokens,
            temperature: config.temperature,
            timeoutMs: config.timeoutMs,
            logger: context.logger?.child("OpenAIBackend"),
            ...options.openai
        })
    });

    return registry;
}

/**
 * Builds the backend named by `config.provider` from the default registry.
 */
export function createBackend(config: ModelConfig, logger?: Logger, options?: DefaultRegistryOptions): ModelBackend {
    return createDefaultBackendRegistry(options).create(config, { logger });
}
