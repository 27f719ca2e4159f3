import { ChatMessage } from "../types/messages.js";
import { CapabilitySummary } from "../tools/capability-registry.js";

export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * The most recent `limit` messages, oldest first.
 */
export function selectRecentHistory(history: readonly ChatMessage[], limit: number = DEFAULT_HISTORY_LIMIT): ChatMessage[] {
    if (limit <= 0) return [];
    return history.slice(Math.max(0, history.length - limit));
}

/**
 * Renders the transcript prompt sent to text-completion backends:
 *
 *     system: <instruction>
 *
 *     user: <message>
 *
 *     assistant:
 */
export function buildPrompt(
    systemInstruction: string,
    history: readonly ChatMessage[],
    limit: number = DEFAULT_HISTORY_LIMIT
): string {
    let prompt = "";
    if (systemInstruction.trim()) {
        prompt += `system: ${systemInstruction}\n\n`;
    }
    for (const message of selectRecentHistory(history, limit)) {
        prompt += `${message.role}: ${message.content}\n\n`;
    }
    return `${prompt}assistant: `;
}

/**
 * Appends the capability catalog and the accepted call formats to the configured prompt.
 */
export function buildSystemInstruction(basePrompt: string, capabilities: readonly CapabilitySummary[]): string {
    if (capabilities.length === 0) return basePrompt;

    const catalog = capabilities.map((capability, index) => `${index + 1}. ${capability.name}: ${capability.description}`);
    const sections = [
        basePrompt.trim(),
        "You can use the following tools:",
        catalog.join("\n"),
        [
            "To call a tool, reply with only a JSON object on its own line:",
            '{"tool": "<tool name>", "params": {<parameters>}}',
            "Call at most one tool per reply. Once the tool output is in the conversation, answer the user directly."
        ].join("\n")
    ];
    return sections.filter(Boolean).join("\n\n");
}
