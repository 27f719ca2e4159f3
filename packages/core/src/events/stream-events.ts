import { AgentStreamEvent, ThinkingStage } from "../types/messages.js";

export const DONE_SENTINEL = "[DONE]";

const THINKING_MESSAGES: Record<ThinkingStage, string> = {
    analyzing: "Analyzing your question...",
    tool_call: "Preparing to call tool",
    tool_result: "Tool returned a result, generating the final reply...",
    tool_error: "Tool execution failed",
    generating: "Generating reply..."
};

export function thinkingEvent(stage: ThinkingStage, detail?: string): AgentStreamEvent {
    const base = THINKING_MESSAGES[stage];
    return { type: "thinking", stage, message: detail ? `${base}: ${detail}` : base };
}

/**
 * Serializes one event as a Server-Sent Events frame. Content deltas are JSON
 * string literals so embedded newlines cannot break framing.
 */
export function formatSseFrame(event: AgentStreamEvent): string {
    switch (event.type) {
        case "meta":
            return frame("meta", JSON.stringify({
                conversation_id: event.conversationId,
                agent_conversation_id: event.agentConversationId
            }));
        case "thinking":
            return frame("thinking", JSON.stringify({ stage: event.stage, message: event.message }));
        case "content":
            return frame(undefined, JSON.stringify(event.delta));
        case "done":
            return frame("done", DONE_SENTINEL);
    }
}

export function formatSseError(message: string): string {
    return frame("error", JSON.stringify({ message }));
}

function frame(eventName: string | undefined, data: string): string {
    const head = eventName ? `event: ${eventName}\n` : "";
    return `${head}data: ${data}\n\n`;
}

/**
 * Plain-text rendering used by terminals: thinking markers become
 * `[THINKING:<stage>:<message>]` lines, content passes through.
 */
export function renderEventText(event: AgentStreamEvent): string {
    switch (event.type) {
        case "meta":
            return "";
        case "thinking":
            return `[THINKING:${event.stage}:${event.message}]\n`;
        case "content":
            return event.delta;
        case "done":
            return "\n";
    }
}
