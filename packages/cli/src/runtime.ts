import {
    AgentConfig,
    AgentEngine,
    CapabilityRegistry,
    ConversationBinder,
    ConversationStore,
    Logger,
    ModelBackend,
    createConversationStore,
    createLogger
} from "@parley/core";
import { createBackend } from "@parley/providers";
import { registerDefaultCapabilities } from "@parley/tools";

export interface Runtime {
    config: AgentConfig;
    logger: Logger;
    store: ConversationStore;
    backend: ModelBackend;
    registry: CapabilityRegistry;
    engine: AgentEngine;
    binder: ConversationBinder;
}

export interface RuntimeOptions {
    logger?: Logger;
    /** Replaces the backend chosen from `config.model`. */
    backend?: ModelBackend;
    /** Forwarded to the web_search capability. */
    fetch?: typeof fetch;
}

/**
 * Wires store, backend, capabilities, engine and binder from one config.
 */
export async function createRuntime(config: AgentConfig, options: RuntimeOptions = {}): Promise<Runtime> {
    const logger = options.logger ?? createLogger("Parley", config.logLevel);
    const store = await createConversationStore(config.memory, logger.child("ConversationStore"));
    const backend = options.backend ?? createBackend(config.model, logger.child("Backend"));
    const registry = registerDefaultCapabilities(new CapabilityRegistry(), config.tools, {
        logger: logger.child("Capabilities"),
        fetch: options.fetch
    });

    const engine = new AgentEngine({
        store,
        systemPrompt: config.systemPrompt,
        historyLimit: config.historyLimit,
        logger: logger.child("AgentEngine")
    });
    await engine.initialize(backend, registry);

    const binder = new ConversationBinder({ sessions: engine, logger: logger.child("ConversationBinder") });
    logger.info("Runtime ready", {
        backend: backend.name,
        model: config.model.model,
        capabilities: registry.list().map((entry) => entry.name),
        memory: config.memory.type
    });
    return { config, logger, store, backend, registry, engine, binder };
}
