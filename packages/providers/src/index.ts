export * from "./ollama.js";
export * from "./openai.js";
export * from "./registry.js";
export * from "./utils/prompt-messages.js";
