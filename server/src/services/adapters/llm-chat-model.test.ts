import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { z } from 'zod';
import type { CompletionOptions, LLMProvider, Message } from '../../llm/types.js';
import { assembleContext } from '../context/context-assembler.js';
import { ModelUnavailable } from '../conversation/errors.js';
import { LlmChatModel, toLlmMessages } from './llm-chat-model.js';

const at = new Date(0);
const context = assembleContext(
  {
    threadId: 't1',
    history: [
      { role: 'user', text: 'italian in delhi', createdAt: at },
      { role: 'assistant', text: 'Found two.', createdAt: at }
    ],
    search: { query: 'italian in delhi', results: [{ id: 'r1', name: 'Trattoria Verde' }], capturedAt: at },
    searchHistory: [],
    preferences: { cuisine: 'italian' }
  },
  'FollowUp',
  'which is best?'
);

class RecordingLlm implements LLMProvider {
  readonly calls: Array<{ messages: Message[]; opts: CompletionOptions | undefined }> = [];

  constructor(private readonly outcome: string | Error) {}

  async completeJSON<T extends z.ZodTypeAny>(_messages: Message[], schema: T): Promise<z.infer<T>> {
    return schema.parse({});
  }

  async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, opts });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

describe('toLlmMessages', () => {
  it('puts context in the system message, then history, then the prompt', () => {
    const messages = toLlmMessages('Answer the follow-up.', context);

    assert.deepEqual(messages.map(m => m.role), ['system', 'user', 'assistant', 'user']);
    assert.equal(messages[3]?.content, 'Answer the follow-up.');
    assert.match(messages[0]?.content ?? '', /Detected intent: FollowUp/);
    assert.match(messages[0]?.content ?? '', /Cuisine: italian/);
    assert.match(messages[0]?.content ?? '', /1\. Trattoria Verde \[id: r1\]/);
  });
});

describe('LlmChatModel', () => {
  it('returns the provider reply and forwards the signal', async () => {
    const llm = new RecordingLlm('Trattoria Verde.');
    const controller = new AbortController();

    const reply = await new LlmChatModel(llm).complete('prompt', context, controller.signal);

    assert.equal(reply, 'Trattoria Verde.');
    assert.equal(llm.calls[0]?.opts?.signal, controller.signal);
  });

  it('provider failures become ModelUnavailable', async () => {
    const model = new LlmChatModel(new RecordingLlm(new Error('429')));
    await assert.rejects(model.complete('prompt', context), (err: unknown) => err instanceof ModelUnavailable);
  });

  it('a missing provider is ModelUnavailable', async () => {
    await assert.rejects(new LlmChatModel(null).complete('prompt', context), (err: unknown) => err instanceof ModelUnavailable);
  });
});
