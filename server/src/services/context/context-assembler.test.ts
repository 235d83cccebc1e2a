import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { assembleContext, renderSearchSnapshot } from './context-assembler.js';
import type { Message, SearchSnapshot, ThreadSnapshot } from '../memory/memory.types.js';

const at = new Date(0);

function thread(overrides: Partial<ThreadSnapshot> = {}): ThreadSnapshot {
  return {
    threadId: 't1',
    history: [],
    search: null,
    searchHistory: [],
    preferences: {},
    ...overrides
  };
}

const search: SearchSnapshot = {
  query: 'italian in delhi',
  location: 'New Delhi',
  results: [
    { id: 'r1', name: 'Trattoria Verde', cuisine: 'Italian', location: 'New Delhi', rating: 4.5, priceRange: '$$$' },
    { id: 'r2', name: 'Casa Nonna' },
    { id: 'r3', name: 'Pasta Piccola', cuisine: 'Italian' }
  ],
  capturedAt: at
};

describe('renderSearchSnapshot', () => {
  it('renders one line per result and leaves unknown fields out', () => {
    assert.equal(
      renderSearchSnapshot(search),
      [
        'Query: italian in delhi',
        'Location: New Delhi',
        'Results (3):',
        '1. Trattoria Verde - Italian in New Delhi | ⭐ 4.5 | $$$ [id: r1]',
        '2. Casa Nonna [id: r2]',
        '3. Pasta Piccola - Italian [id: r3]'
      ].join('\n')
    );
  });

  it('summarizes results past the listing limit', () => {
    const lines = renderSearchSnapshot(search, 1).split('\n');
    assert.deepEqual(lines.slice(3), ['1. Trattoria Verde - Italian in New Delhi | ⭐ 4.5 | $$$ [id: r1]', '...and 2 more']);
  });

  it('marks an empty result set', () => {
    const empty: SearchSnapshot = { query: 'q', results: [], capturedAt: at };
    assert.equal(renderSearchSnapshot(empty), 'Query: q\nLocation: not specified\nResults (0):\nnone');
  });
});

describe('assembleContext', () => {
  it('CollectionCreate carries the cached ids in order', () => {
    const ctx = assembleContext(thread({ search }), 'CollectionCreate', 'create a collection called X');

    assert.deepEqual(ctx.collectionCandidateIds, ['r1', 'r2', 'r3']);
    assert.equal(ctx.unsatisfiable, false);
  });

  it('CollectionCreate with nothing cached is unsatisfiable', () => {
    const ctx = assembleContext(thread(), 'CollectionCreate', 'save these');

    assert.deepEqual(ctx.collectionCandidateIds, []);
    assert.equal(ctx.unsatisfiable, true);
  });

  it('CollectionCreate with an empty cached result set is unsatisfiable', () => {
    const ctx = assembleContext(
      thread({ search: { query: 'q', results: [], capturedAt: at } }),
      'CollectionCreate',
      'save these'
    );
    assert.equal(ctx.unsatisfiable, true);
  });

  it('other intents never carry candidate ids', () => {
    const ctx = assembleContext(thread({ search }), 'FollowUp', 'what about those?');

    assert.deepEqual(ctx.collectionCandidateIds, []);
    assert.equal(ctx.unsatisfiable, false);
  });

  it('includes the last K messages oldest first', () => {
    const history: Message[] = Array.from({ length: 12 }, (_, i): Message => ({
      role: i % 2 === 0 ? 'user' : 'assistant',
      text: `m${i}`,
      createdAt: at
    }));

    const ctx = assembleContext(thread({ history }), 'Unknown', 'x', { historyWindow: 3 });

    assert.deepEqual(ctx.recentHistory.map(m => m.text), ['m9', 'm10', 'm11']);
  });

  it('defaults to a window of ten', () => {
    const history: Message[] = Array.from({ length: 15 }, (_, i): Message => ({ role: 'user', text: `m${i}`, createdAt: at }));
    const ctx = assembleContext(thread({ history }), 'Unknown', 'x');

    assert.equal(ctx.recentHistory.length, 10);
    assert.equal(ctx.recentHistory[0]?.text, 'm5');
  });

  it('uses null as the empty search marker', () => {
    const ctx = assembleContext(thread(), 'Search', 'pizza');

    assert.equal(ctx.searchContext, null);
    assert.equal(ctx.searchHistorySummary, 'No previous searches.');
    assert.equal(ctx.preferenceSummary, 'No known preferences.');
  });

  it('summarizes preferences and keeps the raw text', () => {
    const ctx = assembleContext(thread({ preferences: { budget: 'high' } }), 'Search', '  Fancy Dinner ');

    assert.equal(ctx.preferenceSummary, 'Budget: open to upscale places');
    assert.equal(ctx.rawText, '  Fancy Dinner ');
    assert.equal(ctx.intent, 'Search');
  });

  it('does not mutate its input', () => {
    const snapshot = Object.freeze(thread({ search, history: Object.freeze([]) }));
    assert.doesNotThrow(() => assembleContext(snapshot, 'CollectionCreate', 'save these'));
  });
});
