import { ChatMessage, Conversation, Role } from "../types/messages.js";

export interface ConversationSessionOptions {
    id: string;
    messages?: readonly ChatMessage[];
}

/**
 * Working copy of one conversation's transcript for the duration of a turn.
 * Messages are only ever appended; each one is frozen once added.
 */
export class ConversationSession {
    public readonly id: string;
    private readonly messages: ChatMessage[] = [];

    constructor(options: ConversationSessionOptions) {
        this.id = options.id;
        for (const message of options.messages ?? []) {
            this.messages.push(Object.freeze({ ...message }));
        }
    }

    getMessages(): readonly ChatMessage[] {
        return this.messages;
    }

    get length(): number {
        return this.messages.length;
    }

    addMessage(role: Role, content: string, timestamp: string = new Date().toISOString()): ChatMessage {
        const message: ChatMessage = Object.freeze({ role, content, timestamp });
        this.messages.push(message);
        return message;
    }

    static fromConversation(conversation: Conversation): ConversationSession {
        return new ConversationSession({ id: conversation.id, messages: conversation.messages });
    }
}
