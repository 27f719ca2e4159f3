import { ToolInvocation, ToolParams } from "../types/messages.js";
import { findBalancedObjectEnd, isPlainObject, parseJsonObject, tryParseJson } from "./json-fallback-parser.js";

/**
 * Marker phrases of the legacy plain-text call format: `Use tool: <name> <params>`.
 */
export const LEGACY_TOOL_MARKERS: readonly string[] = ["Use tool:", "使用工具:"];

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;
const TOOL_NAME_PREFIX = /^[A-Za-z0-9_.-]+/;
const NAME_FIELDS = ["tool", "name"] as const;
const PARAM_FIELDS = ["params", "parameters", "arguments"] as const;

export interface ToolCallExtractorOptions {
    legacyMarkers?: readonly string[];
}

/**
 * Finds the tool call a model asked for, trying the structured, fenced and
 * legacy formats in that order. Every format is anchored to a line start so
 * prose that merely mentions a tool does not count as a call.
 */
export function extractToolCall(output: string, options: ToolCallExtractorOptions = {}): ToolInvocation | null {
    if (!output.trim()) return null;
    return (
        extractStructuredCall(output) ??
        extractFencedCall(output) ??
        extractLegacyCall(output, options.legacyMarkers ?? LEGACY_TOOL_MARKERS)
    );
}

/**
 * JSON object first, then `key=value, key2=value2`. Never throws; unusable
 * text yields an empty mapping.
 */
export function parseToolParams(text: string): ToolParams {
    const trimmed = text.trim();
    if (!trimmed) return {};

    const json = parseJsonObject(trimmed);
    if (json.success && json.data) return json.data;

    const params: ToolParams = {};
    for (const part of trimmed.split(",")) {
        const separator = part.indexOf("=");
        if (separator <= 0) continue;
        const key = part.slice(0, separator).trim();
        if (!key) continue;
        params[key] = part.slice(separator + 1).trim();
    }
    return params;
}

export function extractStructuredCall(output: string): ToolInvocation | null {
    for (const start of lineStartObjectOffsets(output)) {
        const end = findBalancedObjectEnd(output, start);
        if (end === undefined) continue;
        if (!restOfLineIsBlank(output, end + 1)) continue;

        const parsed = tryParseJson(output.slice(start, end + 1));
        if (!parsed.success) continue;
        const invocation = toStructuredInvocation(parsed.data);
        if (invocation) return invocation;
    }
    return null;
}

export function extractFencedCall(output: string): ToolInvocation | null {
    const opener = /^[ \t]*```[ \t]*tool:/gm;
    let match: RegExpExecArray | null;
    while ((match = opener.exec(output)) !== null) {
        const bodyStart = match.index + match[0].length;
        const close = output.indexOf("```", bodyStart);
        if (close === -1) return null;

        const block = output.slice(bodyStart, close).trim();
        const newline = block.indexOf("\n");
        const name = (newline === -1 ? block : block.slice(0, newline)).trim();
        const body = newline === -1 ? "" : block.slice(newline + 1).trim();
        if (TOOL_NAME_PATTERN.test(name)) {
            return { tool: name, params: parseToolParams(body), format: "fenced" };
        }
        opener.lastIndex = close + 3;
    }
    return null;
}

export function extractLegacyCall(output: string, markers: readonly string[] = LEGACY_TOOL_MARKERS): ToolInvocation | null {
    const usable = markers.filter((marker) => marker.length > 0);
    if (usable.length === 0) return null;

    const pattern = new RegExp(`^[ \\t]*(?:${usable.map(escapeRegExp).join("|")})`, "gm");
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(output)) !== null) {
        const rest = output.slice(match.index + match[0].length).replace(/^[ \t]+/, "");
        const name = TOOL_NAME_PREFIX.exec(rest)?.[0];
        if (!name) continue;

        const afterName = rest.slice(name.length);
        if (afterName.length > 0 && !/^[\s{]/.test(afterName)) continue;

        return { tool: name, params: parseToolParams(legacyParamText(afterName)), format: "legacy" };
    }
    return null;
}

function legacyParamText(afterName: string): string {
    const trimmed = afterName.trimStart();
    if (trimmed.startsWith("{")) {
        const end = findBalancedObjectEnd(trimmed, 0);
        if (end !== undefined) return trimmed.slice(0, end + 1);
    }
    const line = afterName.replace(/^[ \t]+/, "");
    const newline = line.indexOf("\n");
    return (newline === -1 ? line : line.slice(0, newline)).trim();
}

function toStructuredInvocation(value: unknown): ToolInvocation | null {
    if (!isPlainObject(value)) return null;

    const nameField = NAME_FIELDS.find((field) => typeof value[field] === "string");
    const paramField = PARAM_FIELDS.find((field) => field in value);
    if (!nameField || !paramField) return null;

    const tool = String(value[nameField]).trim();
    if (!TOOL_NAME_PATTERN.test(tool)) return null;

    const rawParams = value[paramField];
    let params: ToolParams;
    if (isPlainObject(rawParams)) {
        params = rawParams;
    } else if (typeof rawParams === "string") {
        params = parseToolParams(rawParams);
    } else if (rawParams === null) {
        params = {};
    } else {
        return null;
    }
    return { tool, params, format: "structured" };
}

function* lineStartObjectOffsets(text: string): Generator<number> {
    let lineStart = 0;
    while (lineStart <= text.length) {
        let i = lineStart;
        while (text[i] === " " || text[i] === "\t") i++;
        if (text[i] === "{") yield i;
        const next = text.indexOf("\n", lineStart);
        if (next === -1) return;
        lineStart = next + 1;
    }
}

function restOfLineIsBlank(text: string, from: number): boolean {
    const newline = text.indexOf("\n", from);
    const rest = newline === -1 ? text.slice(from) : text.slice(from, newline);
    return rest.trim().length === 0;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
