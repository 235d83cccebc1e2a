import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MessageLog, summarizeMessages } from './message-log.js';
import { ThreadStore } from './thread-store.js';

describe('MessageLog', () => {
  it('preserves append order exactly', () => {
    const store = new ThreadStore();
    const log = new MessageLog();
    const thread = store.getOrCreate('t1');

    log.append(thread, 'user', 'one');
    log.append(thread, 'assistant', 'two');
    log.append(thread, 'user', 'three');

    assert.deepEqual(log.history(thread).map(m => m.text), ['one', 'two', 'three']);
    assert.deepEqual(log.history(thread).map(m => m.role), ['user', 'assistant', 'user']);
  });

  it('history is a live view', () => {
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog();
    const view = log.history(thread);

    log.append(thread, 'user', 'later');

    assert.equal(view.length, 1);
  });

  it('records empty text as-is', () => {
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog();
    log.append(thread, 'user', '');

    assert.equal(log.history(thread)[0]?.text, '');
  });

  it('messages are frozen', () => {
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog();
    log.append(thread, 'user', 'hello');

    assert.equal(Object.isFrozen(log.history(thread)[0]), true);
  });

  it('stamps messages with the injected clock', () => {
    const at = new Date('2024-03-01T12:00:00.000Z');
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog(() => at);
    log.append(thread, 'assistant', 'hi');

    assert.equal(log.history(thread)[0]?.createdAt.toISOString(), '2024-03-01T12:00:00.000Z');
  });

  it('recent returns the last k oldest first', () => {
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog();
    for (const text of ['a', 'b', 'c', 'd']) log.append(thread, 'user', text);

    assert.deepEqual(log.recent(thread, 2).map(m => m.text), ['c', 'd']);
    assert.deepEqual(log.recent(thread, 0), []);
  });

  it('clear empties the log and later appends work', () => {
    const thread = new ThreadStore().getOrCreate('t1');
    const log = new MessageLog();
    log.append(thread, 'user', 'a');
    log.clear(thread);
    log.append(thread, 'user', 'b');

    assert.deepEqual(log.history(thread).map(m => m.text), ['b']);
  });
});

describe('summarizeMessages', () => {
  it('reports an empty conversation', () => {
    assert.equal(summarizeMessages([]), 'No previous conversation.');
  });

  it('labels roles and truncates long text', () => {
    const long = 'x'.repeat(120);
    const summary = summarizeMessages([
      { role: 'user', text: 'hi', createdAt: new Date(0) },
      { role: 'assistant', text: long, createdAt: new Date(0) }
    ]);

    assert.equal(summary, `User: hi\nAssistant: ${'x'.repeat(100)}...`);
  });

  it('keeps only the last max messages', () => {
    const messages = ['a', 'b', 'c'].map(text => ({ role: 'user' as const, text, createdAt: new Date(0) }));
    assert.equal(summarizeMessages(messages, 2), 'User: b\nUser: c');
  });
});
