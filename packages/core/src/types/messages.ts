/**
 * Conversation and orchestration types shared by the engine, the stores,
 * the backends and the transport layer.
 */

export type Role = "system" | "user" | "assistant";

export const ROLES: readonly Role[] = ["system", "user", "assistant"];

export function isRole(value: unknown): value is Role {
    return ROLES.some((role) => role === value);
}

export interface ChatMessage {
    role: Role;
    content: string;
    /** ISO-8601 timestamp assigned when the message is appended. */
    timestamp: string;
}

export interface Conversation {
    id: string;
    title: string;
    messages: ChatMessage[];
    createdAt: string;
    updatedAt: string;
}

export type ToolParams = Record<string, unknown>;

/**
 * Which textual format a tool call was recovered from.
 */
export type ToolCallFormat = "structured" | "fenced" | "legacy";

export interface ToolInvocation {
    tool: string;
    params: ToolParams;
    format: ToolCallFormat;
}

export type CapabilityResult =
    | { ok: true; value: unknown }
    | { ok: false; error: string };

export type ThinkingStage = "analyzing" | "tool_call" | "tool_result" | "tool_error" | "generating";

/**
 * Events delivered to the caller of a streamed turn, in protocol order:
 * meta, thinking markers, content deltas, done.
 */
export type AgentStreamEvent =
    | { type: "meta"; conversationId: string; agentConversationId: string }
    | { type: "thinking"; stage: ThinkingStage; message: string }
    | { type: "content"; delta: string }
    | { type: "done" };

export type TurnPhase =
    | "building_prompt"
    | "awaiting_pre_response"
    | "executing"
    | "injecting_result"
    | "awaiting_final_response"
    | "respond"
    | "failed";
