import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { COLLECTION_FAILED_MESSAGE, SEARCH_FAILED_MESSAGE } from '../../config/messages.js';
import { AuthError, ProviderError } from '../conversation/errors.js';
import { HttpCollectionStore, bearer } from './http-collection-store.js';
import { HttpRestaurantSearch } from './http-restaurant-search.js';

interface Captured {
  url: string;
  init: RequestInit | undefined;
}

function stubFetch(respond: () => Response | Promise<Response>): Captured[] {
  const captured: Captured[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    captured.push({ url: String(input), init });
    return respond();
  });
  return captured;
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HttpRestaurantSearch', () => {
  afterEach(() => mock.restoreAll());

  const search = new HttpRestaurantSearch({
    baseUrl: 'http://restaurants.test',
    timeoutMs: 1_000,
    defaultLocation: 'New Delhi'
  });

  it('calls the questions endpoint with type, place and query', async () => {
    const captured = stubFetch(() => json({ restaurants: [] }));

    await search.search('italian food', 'Mumbai');

    const url = new URL(captured[0]?.url ?? '');
    assert.equal(url.pathname, '/api/questions');
    assert.equal(url.searchParams.get('type'), 'current');
    assert.equal(url.searchParams.get('place'), 'Mumbai');
    assert.equal(url.searchParams.get('q'), 'italian food');
  });

  it('uses the default location when none is given', async () => {
    const captured = stubFetch(() => json({ restaurants: [] }));

    await search.search('pizza');

    assert.equal(new URL(captured[0]?.url ?? '').searchParams.get('place'), 'New Delhi');
  });

  it('normalizes id and location field variants', async () => {
    stubFetch(() => json({
      restaurants: [
        { _id: 'a1', name: 'Alpha', place: 'Bandra', price_range: '$$', rating: '4.2' },
        { id: 7, name: 'Beta', address: '12 MG Road', cuisine: 'Thai' },
        { id: 'c3', name: 'Gamma', area: 'Koramangala', description: '' }
      ]
    }));

    const { restaurants } = await search.search('food', 'Mumbai');

    assert.deepEqual(restaurants, [
      { id: 'a1', name: 'Alpha', location: 'Bandra', rating: 4.2, priceRange: '$$' },
      { id: '7', name: 'Beta', cuisine: 'Thai', location: '12 MG Road' },
      { id: 'c3', name: 'Gamma', location: 'Koramangala' }
    ]);
  });

  it('skips entries without an id or name', async () => {
    stubFetch(() => json({ restaurants: [{ name: 'No Id' }, { id: 'x' }, { id: 'ok', name: 'Fine' }] }));

    const { restaurants } = await search.search('food');

    assert.deepEqual(restaurants.map(r => r.id), ['ok']);
  });

  it('treats a missing restaurants array as no results', async () => {
    stubFetch(() => json({ message: 'no matches' }));

    const { restaurants } = await search.search('food');

    assert.deepEqual(restaurants, []);
  });

  it('non-2xx responses are ProviderError with the status', async () => {
    stubFetch(() => json({ error: 'boom' }, 502));

    await assert.rejects(search.search('food'), (err: unknown) =>
      err instanceof ProviderError
        && err.statusCode === 502
        && err.provider === 'search'
        && err.message === SEARCH_FAILED_MESSAGE
    );
  });

  it('transport failures are ProviderError', async () => {
    stubFetch(() => { throw new TypeError('fetch failed'); });

    await assert.rejects(search.search('food'), (err: unknown) => err instanceof ProviderError);
  });
});

describe('HttpCollectionStore', () => {
  afterEach(() => mock.restoreAll());

  const store = new HttpCollectionStore({ baseUrl: 'http://restaurants.test', timeoutMs: 1_000 });
  const details = { name: 'Date Night', description: 'Saved picks', tags: ['italian'] };

  it('posts the collection with a bearer token and returns its id', async () => {
    const captured = stubFetch(() => json({ _id: 'col-1', name: 'Date Night' }, 201));

    const id = await store.createCollection(details, ['r1', 'r2'], 'test-token');

    assert.equal(id, 'col-1');
    assert.equal(captured[0]?.url, 'http://restaurants.test/api/collections');
    assert.equal(captured[0]?.init?.method, 'POST');
    assert.deepEqual(captured[0]?.init?.headers, {
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token'
    });
    assert.deepEqual(JSON.parse(String(captured[0]?.init?.body)), {
      name: 'Date Night',
      description: 'Saved picks',
      isPublic: true,
      tags: ['italian'],
      restaurantIds: ['r1', 'r2']
    });
  });

  it('reads a nested collection id', async () => {
    stubFetch(() => json({ collection: { id: 99 } }));

    assert.equal(await store.createCollection(details, ['r1'], 'test-token'), '99');
  });

  it('no token is AuthError without a request', async () => {
    const captured = stubFetch(() => json({}));

    await assert.rejects(store.createCollection(details, ['r1']), (err: unknown) => err instanceof AuthError);
    assert.equal(captured.length, 0);
  });

  for (const status of [401, 403]) {
    it(`${status} is AuthError`, async () => {
      stubFetch(() => json({ error: 'denied' }, status));

      await assert.rejects(store.createCollection(details, ['r1'], 'test-token'), (err: unknown) => err instanceof AuthError);
    });
  }

  it('other failures are retriable ProviderError with a user-facing message', async () => {
    stubFetch(() => json({ error: 'oops' }, 500));

    await assert.rejects(store.createCollection(details, ['r1'], 'test-token'), (err: unknown) => {
      assert.ok(err instanceof ProviderError);
      assert.equal(err.provider, 'collections');
      assert.equal(err.statusCode, 500);
      assert.equal(err.retriable, true);
      assert.equal(err.message, COLLECTION_FAILED_MESSAGE);
      assert.equal(err.detail, 'Collection creation failed with status 500');
      return true;
    });
  });

  it('a 2xx response without an id is a ProviderError that must not be retried', async () => {
    stubFetch(() => json({ success: true }, 201));

    await assert.rejects(store.createCollection(details, ['r1'], 'test-token'), (err: unknown) =>
      err instanceof ProviderError && err.retriable === false && err.statusCode === 201
    );
  });

  it('a 2xx response with invalid JSON must not be retried', async () => {
    stubFetch(() => new Response('not json', { status: 201 }));

    await assert.rejects(store.createCollection(details, ['r1'], 'test-token'), (err: unknown) =>
      err instanceof ProviderError && err.retriable === false
    );
  });
});

describe('bearer', () => {
  it('adds the scheme only once', () => {
    assert.equal(bearer('abc'), 'Bearer abc');
    assert.equal(bearer('Bearer abc'), 'Bearer abc');
  });
});
