import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { InitError, toErrorMessage } from "../types/errors.js";

export const DEFAULT_SYSTEM_PROMPT =
    "You are Parley, a helpful assistant. Answer clearly and concisely, and use a tool when it helps.";

const modelSchema = z.object({
    provider: z.enum(["ollama", "openai"]).default("ollama"),
    model: z.string().min(1).default("llama3.1"),
    baseURL: z.string().url().optional(),
    apiKey: z.string().optional(),
    maxTokens: z.number().int().positive().default(1000),
    temperature: z.number().min(0).max(2).default(0.7),
    timeoutMs: z.number().int().positive().default(180_000)
});

const memorySchema = z.object({
    type: z.enum(["file", "memory"]).default("file"),
    dataDir: z.string().min(1).default("./data/conversations")
});

const toolsSchema = z.object({
    enabled: z.array(z.string()).default(["calculator", "knowledge_base", "web_search"]),
    knowledgeBasePath: z.string().min(1).default("./knowledge_base"),
    searchEngine: z.enum(["duckduckgo", "searchapi", "mock"]).default("duckduckgo"),
    searchApiKey: z.string().optional()
});

const serverSchema = z.object({
    port: z.number().int().min(0).max(65535).default(8080)
});

export const agentConfigSchema = z.object({
    name: z.string().min(1).default("parley"),
    systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
    historyLimit: z.number().int().min(0).default(10),
    model: modelSchema.default({}),
    memory: memorySchema.default({}),
    tools: toolsSchema.default({}),
    server: serverSchema.default({}),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;
export type ModelConfig = AgentConfig["model"];
export type MemoryConfig = AgentConfig["memory"];
export type ToolsConfig = AgentConfig["tools"];

type Env = Record<string, string | undefined>;

/**
 * Validates a raw config object and fills in defaults.
 */
export function parseAgentConfig(input: unknown): AgentConfig {
    const parsed = agentConfigSchema.safeParse(input ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
            .join("; ");
        throw new InitError(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}

/**
 * Environment variables win over file values.
 */
export function applyEnvOverrides(config: AgentConfig, rawEnv: Env = process.env): AgentConfig {
    const env = withoutEmpty(rawEnv);
    const provider = env.PARLEY_PROVIDER ?? config.model.provider;
    const model = { ...config.model, provider };
    if (provider === "ollama") {
        if (env.OLLAMA_BASE_URL) model.baseURL = env.OLLAMA_BASE_URL;
        if (env.OLLAMA_MODEL) model.model = env.OLLAMA_MODEL;
    } else if (provider === "openai") {
        if (env.OPENAI_API_KEY) model.apiKey = env.OPENAI_API_KEY;
        if (env.OPENAI_MODEL) model.model = env.OPENAI_MODEL;
    }

    const merged = {
        ...config,
        systemPrompt: env.AGENT_PROMPT ?? config.systemPrompt,
        logLevel: env.PARLEY_LOG_LEVEL ?? config.logLevel,
        model,
        memory: { ...config.memory, dataDir: env.PARLEY_DATA_DIR ?? config.memory.dataDir },
        tools: {
            ...config.tools,
            knowledgeBasePath: env.KNOWLEDGE_BASE_PATH ?? config.tools.knowledgeBasePath,
            searchEngine: env.SEARCH_ENGINE ?? config.tools.searchEngine,
            searchApiKey: env.SEARCH_API_KEY ?? config.tools.searchApiKey
        },
        server: { ...config.server, port: env.PORT ? Number(env.PORT) : config.server.port }
    };
    return parseAgentConfig(merged);
}

function withoutEmpty(env: Env): Env {
    const result: Env = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== "") result[key] = value;
    }
    return result;
}

/**
 * Reads a YAML (js-yaml) or JSON config file,
 * applies defaults, then environment overrides. Without a path only defaults and env apply.
 */
export async function loadAgentConfig(path?: string, env: Env = process.env): Promise<AgentConfig> {
    let raw: unknown = {};
    if (path) {
        let text: string;
        try {
            text = await readFile(path, "utf8");
        } catch (error) {
            throw new InitError(`Cannot read config file ${path}: ${toErrorMessage(error)}`, { cause: error });
        }
        try {
            raw = extname(path) === ".json" ? JSON.parse(text) : yaml.load(text);
        } catch (error) {
            throw new InitError(`Cannot parse config file ${path}: ${toErrorMessage(error)}`, { cause: error });
        }
    }
    return applyEnvOverrides(parseAgentConfig(raw), env);
}
