import { Role, isRole } from "@parley/core";

export interface PromptMessage {
    role: Role;
    content: string;
}

const ROLE_LINE = /^(system|user|assistant):(.*)$/;

/**
 * True when the prompt is a role-prefixed transcript that chat endpoints can take.
 */
export function isChatPrompt(prompt: string): boolean {
    return prompt.includes("user:") && prompt.includes("assistant:");
}

/**
 * Splits a `role: content` transcript back into messages. Lines without a role
 * prefix continue the previous message; blank lines inside a message are kept;
 * messages with no content (such as the trailing `assistant:` cue) are dropped.
 */
export function parsePromptToMessages(prompt: string): PromptMessage[] {
    const messages: PromptMessage[] = [];
    let role: Role | undefined;
    let content = "";

    const flush = () => {
        const text = content.trim();
        if (role && text) messages.push({ role, content: text });
    };

    for (const rawLine of prompt.split("\n")) {
        const line = rawLine.trim();
        if (!line) {
            if (content) content += "\n";
            continue;
        }
        const match = ROLE_LINE.exec(line);
        const prefix = match?.[1];
        if (match && isRole(prefix)) {
            flush();
            role = prefix;
            content = match[2].trim();
        } else {
            content = content ? `${content}\n${line}` : line;
        }
    }
    flush();
    return messages;
}
