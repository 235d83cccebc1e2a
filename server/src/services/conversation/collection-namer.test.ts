import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { z } from 'zod';
import type { CompletionOptions, LLMProvider, Message } from '../../llm/types.js';
import type { SearchSnapshot } from '../memory/memory.types.js';
import { CollectionNamer, extractCollectionName } from './collection-namer.js';

const search: SearchSnapshot = {
  query: 'italian in delhi',
  location: 'New Delhi',
  results: [
    { id: 'r1', name: 'Trattoria Verde', cuisine: 'Italian', location: 'New Delhi' },
    { id: 'r2', name: 'Casa Nonna', cuisine: 'Italian', location: 'New Delhi' }
  ],
  capturedAt: new Date(0)
};

class StubLlm implements LLMProvider {
  readonly prompts: Message[][] = [];

  constructor(private readonly json: unknown) {}

  async completeJSON<T extends z.ZodTypeAny>(messages: Message[], schema: T): Promise<z.infer<T>> {
    this.prompts.push(messages);
    return schema.parse(this.json);
  }

  async complete(_messages: Message[], _opts?: CompletionOptions): Promise<string> {
    return '';
  }
}

describe('extractCollectionName', () => {
  it('reads quoted and unquoted names', () => {
    assert.equal(extractCollectionName("create a collection called 'My Delhi Favorites'"), 'My Delhi Favorites');
    assert.equal(extractCollectionName('save these as a list named Date Night.'), 'Date Night');
    assert.equal(extractCollectionName('make a collection titled "Brunch Spots"!'), 'Brunch Spots');
  });

  it('returns undefined without a naming phrase', () => {
    assert.equal(extractCollectionName('create a collection'), undefined);
    assert.equal(extractCollectionName('a list called'), undefined);
  });

  it('caps the length', () => {
    const name = extractCollectionName(`a list called ${'x'.repeat(200)}`);
    assert.equal(name?.length, 80);
  });
});

describe('CollectionNamer', () => {
  it('an explicit name wins and tags come from the results', async () => {
    const llm = new StubLlm({ name: 'ignored', description: 'ignored', tags: [] });
    const details = await new CollectionNamer(llm).describe(search, 'Date Night');

    assert.deepEqual(details, {
      name: 'Date Night',
      description: 'Restaurants saved from the search "italian in delhi".',
      tags: ['italian', 'new delhi']
    });
    assert.equal(llm.prompts.length, 0);
  });

  it('uses the model proposal when valid', async () => {
    const llm = new StubLlm({ name: 'Italian Spots (Delhi)', description: 'Top Italian picks.', tags: ['italian', 'delhi'] });
    const details = await new CollectionNamer(llm).describe(search);

    assert.deepEqual(details, { name: 'Italian Spots (Delhi)', description: 'Top Italian picks.', tags: ['italian', 'delhi'] });
    assert.match(llm.prompts[0]?.[1]?.content ?? '', /Cuisines Found: Italian/);
  });

  it('falls back to a timestamped name when the model returns junk', async () => {
    const llm = new StubLlm({ title: 'wrong shape' });
    const at = new Date(2024, 4, 1, 9, 5);
    const details = await new CollectionNamer(llm, () => at).describe(search);

    assert.deepEqual(details, {
      name: 'Restaurant Collection - 20240501_0905',
      description: 'A curated collection of restaurants from search: italian in delhi',
      tags: ['curated', 'restaurants', 'search_results']
    });
  });

  it('falls back without a model', async () => {
    const at = new Date(2024, 0, 2, 18, 30);
    const details = await new CollectionNamer(null, () => at).describe(search);

    assert.equal(details.name, 'Restaurant Collection - 20240102_1830');
  });
});
