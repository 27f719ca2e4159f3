export interface JsonParseResult<T = unknown> {
    success: boolean;
    data?: T;
    error?: string;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function tryParseJson(raw: string): JsonParseResult<unknown> {
    try {
        return { success: true, data: JSON.parse(raw) };
    } catch (error) {
        return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
}

/**
 * Parses `raw` and accepts the result only when it is a JSON object.
 */
export function parseJsonObject(raw: string): JsonParseResult<Record<string, unknown>> {
    const trimmed = raw.trim();
    if (!trimmed) {
        return { success: false, error: "Empty input" };
    }
    const parsed = tryParseJson(trimmed);
    if (!parsed.success) {
        return { success: false, error: parsed.error };
    }
    if (!isPlainObject(parsed.data)) {
        return { success: false, error: "Expected a JSON object" };
    }
    return { success: true, data: parsed.data };
}

/**
 * Returns the index of the `}` closing the object that opens at `start`,
 * skipping braces inside string literals. `undefined` when unbalanced.
 */
export function findBalancedObjectEnd(text: string, start: number): number | undefined {
    if (text[start] !== "{") return undefined;
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
        const char = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === "\\") {
                escaped = true;
            } else if (char === "\"") {
                inString = false;
            }
            continue;
        }
        if (char === "\"") {
            inString = true;
        } else if (char === "{") {
            depth++;
        } else if (char === "}") {
            depth--;
            if (depth === 0) return i;
        }
    }
    return undefined;
}
