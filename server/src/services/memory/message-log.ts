import type { Clock, Message, MessageRole, Thread } from './memory.types.js';

const SUMMARY_TRUNCATE_AT = 100;

/**
 * Append-only conversational history for a thread.
 */
export class MessageLog {
    constructor(private readonly clock: Clock = () => new Date()) { }

    /**
     * Never validates content; empty text is recorded as-is.
     */
    append(thread: Thread, role: MessageRole, text: string): void {
        const message: Message = Object.freeze({ role, text, createdAt: this.clock() });
        thread.messages.push(message);
    }

    /**
     * Live read-only view: later appends show up without calling again.
     * Copy it if you need a point-in-time list.
     */
    history(thread: Thread): readonly Message[] {
        return thread.messages;
    }

    /**
     * Last k messages, oldest first (copy).
     */
    recent(thread: Thread, k: number): Message[] {
        return k <= 0 ? [] : thread.messages.slice(-k);
    }

    clear(thread: Thread): void {
        thread.messages.length = 0;
    }

    /**
     * "User: ..." / "Assistant: ..." lines for the last `max` messages.
     */
    summary(thread: Thread, max = 5): string {
        return summarizeMessages(thread.messages, max);
    }
}

export function summarizeMessages(messages: readonly Message[], max = 5): string {
    if (messages.length === 0) {
        return 'No previous conversation.';
    }

    return messages
        .slice(-max)
        .map(m => {
            const role = m.role === 'user' ? 'User' : 'Assistant';
            const text = m.text.length > SUMMARY_TRUNCATE_AT
                ? `${m.text.slice(0, SUMMARY_TRUNCATE_AT)}...`
                : m.text;
            return `${role}: ${text}`;
        })
        .join('\n');
}
