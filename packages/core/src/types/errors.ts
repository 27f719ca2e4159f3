export type AgentErrorCode =
    | "VALIDATION_FAILED"
    | "NOT_FOUND"
    | "ALREADY_REGISTERED"
    | "INVALID_ARGUMENT"
    | "EXECUTION_FAILED"
    | "BACKEND_FAILED"
    | "PERSISTENCE_FAILED"
    | "INIT_FAILED";

export interface AgentErrorOptions {
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
}

/**
 * Base class of every error the runtime raises on purpose.
 * `code` is stable and safe to match on; `message` is for humans.
 */
export class AgentError extends Error {
    public readonly code: AgentErrorCode;
    public readonly retryable: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(code: AgentErrorCode, message: string, options: AgentErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "AgentError";
        this.code = code;
        this.retryable = options.retryable ?? false;
        this.details = options.details;

        // Fix prototype chain for subclassing built-ins in TS
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ValidationError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("VALIDATION_FAILED", message, options);
        this.name = "ValidationError";
    }
}

export class NotFoundError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("NOT_FOUND", message, options);
        this.name = "NotFoundError";
    }
}

export class AlreadyRegisteredError extends AgentError {
    constructor(name: string, kind = "Capability") {
        super("ALREADY_REGISTERED", `${kind} already registered: ${name}`, { details: { name } });
        this.name = "AlreadyRegisteredError";
    }
}

export class InvalidArgumentError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("INVALID_ARGUMENT", message, options);
        this.name = "InvalidArgumentError";
    }
}

export class ExecutionError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("EXECUTION_FAILED", message, options);
        this.name = "ExecutionError";
    }
}

export type BackendFailureReason = "timeout" | "connection" | "http" | "empty" | "loading" | "aborted";

export class BackendError extends AgentError {
    public readonly reason: BackendFailureReason;

    constructor(reason: BackendFailureReason, message: string, options: AgentErrorOptions = {}) {
        super("BACKEND_FAILED", message, {
            retryable: reason === "connection" || reason === "loading",
            ...options
        });
        this.name = "BackendError";
        this.reason = reason;
    }
}

export class PersistenceError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("PERSISTENCE_FAILED", message, options);
        this.name = "PersistenceError";
    }
}

export class InitError extends AgentError {
    constructor(message: string, options: AgentErrorOptions = {}) {
        super("INIT_FAILED", message, options);
        this.name = "InitError";
    }
}

export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    try {
        return JSON.stringify(error);
    } catch {
        return String(error);
    }
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof BackendError) return error.reason === "aborted";
    return error instanceof Error && error.name === "AbortError";
}
