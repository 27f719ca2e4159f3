// Core Types
export * from "./types/messages.js";
export * from "./types/errors.js";

// Core State
export * from "./state/mutex.js";
export * from "./state/session.js";
export * from "./state/conversation-store.js";
export * from "./state/file-conversation-store.js";
export * from "./state/create-conversation-store.js";
export * from "./state/conversation-binder.js";

// Core Loops
export * from "./loops/agent-engine.js";

// Core Events
export * from "./events/stream-channel.js";
export * from "./events/stream-events.js";

// Core Helpers
export * from "./helpers/json-fallback-parser.js";
export * from "./helpers/tool-call-extractor.js";
export * from "./helpers/prompt-builder.js";

// Capabilities
export * from "./tools/capability.js";
export * from "./tools/capability-registry.js";

// Backends
export * from "./providers/model-backend.js";
export * from "./providers/registry.js";

// Config & Logging
export * from "./config/agent-config.js";
export * from "./utils/logger.js";
