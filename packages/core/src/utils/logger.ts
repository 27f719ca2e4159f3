import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    child(component: string): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Defaults to stderr so stdout stays free for replies. */
    destination?: DestinationStream;
}

/**
 * Root pino instance. Lines are JSON with a string `level`, an ISO `time`,
 * the `component` binding and any fields.
 */
export function createPinoLogger(options: LoggerOptions = {}): PinoLogger {
    return pino(
        {
            level: options.level ?? "info",
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        },
        options.destination ?? pino.destination({ dest: 2, sync: true })
    );
}

/**
 * Adapts a pino logger to `(message, fields)` calls. `child()` binds a new
 * component on the root so nested children replace it instead of repeating the key.
 */
export function wrapLogger(root: PinoLogger, component?: string): Logger {
    const logger = component ? root.child({ component }) : root;
    return {
        debug: (message, fields) => (fields ? logger.debug(fields, message) : logger.debug(message)),
        info: (message, fields) => (fields ? logger.info(fields, message) : logger.info(message)),
        warn: (message, fields) => (fields ? logger.warn(fields, message) : logger.warn(message)),
        error: (message, fields) => (fields ? logger.error(fields, message) : logger.error(message)),
        child: (name) => wrapLogger(root, name)
    };
}

export function createLogger(component: string, level: LogLevel = "info", destination?: DestinationStream): Logger {
    return wrapLogger(createPinoLogger({ level, destination }), component);
}

export const silentLogger: Logger = wrapLogger(pino({ level: "silent" }));
