import type { LLMProvider, Message as LlmMessage } from '../../llm/types.js';
import type { ContextPayload } from '../context/context.types.js';
import { ModelUnavailable } from '../conversation/errors.js';
import { SYSTEM_PROMPT } from '../conversation/prompts.js';
import type { ChatModel } from '../ports/chat-model.js';
import { MODEL_UNAVAILABLE_MESSAGE } from '../../config/messages.js';

/**
 * System message carrying everything the model may rely on for this turn.
 */
export function renderSystemContext(context: ContextPayload): string {
    const sections = [
        SYSTEM_PROMPT,
        `Detected intent: ${context.intent}`,
        `User preferences:\n${context.preferenceSummary}`,
        `Recent searches:\n${context.searchHistorySummary}`,
        `Search context:\n${context.searchContext ?? 'No restaurants found yet.'}`
    ];
    return sections.join('\n\n');
}

export function toLlmMessages(prompt: string, context: ContextPayload): LlmMessage[] {
    return [
        { role: 'system', content: renderSystemContext(context) },
        ...context.recentHistory.map((m): LlmMessage => ({ role: m.role, content: m.text })),
        { role: 'user', content: prompt }
    ];
}

/**
 * ChatModel backed by an LLMProvider. A missing provider behaves like an
 * unavailable model so the service's failure path stays the same.
 */
export class LlmChatModel implements ChatModel {
    constructor(private readonly provider: LLMProvider | null) {}

    async complete(prompt: string, context: ContextPayload, signal?: AbortSignal): Promise<string> {
        if (!this.provider) {
            throw new ModelUnavailable(MODEL_UNAVAILABLE_MESSAGE);
        }
        try {
            return await this.provider.complete(toLlmMessages(prompt, context), signal ? { signal } : undefined);
        } catch (err) {
            throw new ModelUnavailable(MODEL_UNAVAILABLE_MESSAGE, { cause: err });
        }
    }
}
