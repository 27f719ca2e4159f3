import { Capability, CapabilityRegistry, Logger, ToolsConfig, silentLogger } from "@parley/core";
import { calculatorTool } from "./calculator.js";
import { knowledgeBaseTool } from "./knowledge-base.js";
import { webSearchTool } from "./web-search.js";

export * from "./calculator.js";
export * from "./knowledge-base.js";
export * from "./web-search.js";
export * from "./utils/workspace-path.js";

export interface DefaultCapabilityOptions {
    logger?: Logger;
    /** Forwarded to web_search. */
    fetch?: typeof fetch;
}

type CapabilityFactory = (config: ToolsConfig, options: DefaultCapabilityOptions) => Capability;

const BUILTIN_FACTORIES = new Map<string, CapabilityFactory>([
    ["calculator", () => calculatorTool()],
    ["knowledge_base", (config) => knowledgeBaseTool(config.knowledgeBasePath)],
    [
        "web_search",
        (config, options) =>
            webSearchTool({ engine: config.searchEngine, apiKey: config.searchApiKey, fetch: options.fetch })
    ]
]);

export const BUILTIN_CAPABILITIES = Array.from(BUILTIN_FACTORIES.keys());

/**
 * Builds the built-in capabilities named in `config.enabled`, in that order.
 * Unknown names are skipped with a warning.
 */
export function createDefaultCapabilities(config: ToolsConfig, options: DefaultCapabilityOptions = {}): Capability[] {
    const logger = options.logger ?? silentLogger;
    const capabilities: Capability[] = [];
    for (const name of new Set(config.enabled)) {
        const factory = BUILTIN_FACTORIES.get(name);
        if (!factory) {
            logger.warn("Unknown capability in config, skipping", { name });
            continue;
        }
        capabilities.push(factory(config, options));
    }
    return capabilities;
}

export function registerDefaultCapabilities(
    registry: CapabilityRegistry,
    config: ToolsConfig,
    options: DefaultCapabilityOptions = {}
): CapabilityRegistry {
    for (const capability of createDefaultCapabilities(config, options)) {
        registry.add(capability);
    }
    return registry;
}
