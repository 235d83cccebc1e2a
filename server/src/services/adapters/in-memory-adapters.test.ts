import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AuthError } from '../conversation/errors.js';
import { InMemoryCollectionStore } from './in-memory-collection-store.js';
import { InMemoryRestaurantSearch, loadSampleRestaurants } from './in-memory-restaurant-search.js';

const ids = (result: { restaurants: readonly { id: string }[] }) => result.restaurants.map(r => r.id);

describe('InMemoryRestaurantSearch', () => {
  const search = new InMemoryRestaurantSearch();

  it('loads the bundled sample data', () => {
    assert.equal(loadSampleRestaurants().length, 12);
  });

  it('filters by location and cuisine', async () => {
    assert.deepEqual(ids(await search.search('italian restaurants', 'New Delhi')), ['r-101', 'r-102']);
    assert.deepEqual(ids(await search.search('south indian food', 'Bangalore')), ['r-301']);
  });

  it('accepts singular cuisine words', async () => {
    assert.deepEqual(ids(await search.search('a dessert place', 'Mumbai')), ['r-204']);
  });

  it('returns everything in the location when no cuisine matches', async () => {
    assert.deepEqual(ids(await search.search('somewhere nice', 'bangalore')), ['r-301', 'r-302', 'r-303']);
  });

  it('returns nothing for an unknown location', async () => {
    assert.deepEqual(ids(await search.search('italian', 'Atlantis')), []);
  });

  it('records calls', async () => {
    const local = new InMemoryRestaurantSearch([]);
    await local.search('pizza', 'Mumbai');
    assert.deepEqual(local.calls, [{ query: 'pizza', location: 'Mumbai' }]);
  });
});

describe('InMemoryCollectionStore', () => {
  it('stores the collection with its restaurants', async () => {
    const store = new InMemoryCollectionStore();
    const id = await store.createCollection({ name: 'Date Night', tags: ['italian'] }, ['r-101', 'r-102'], 'test-token');

    const stored = store.get(id);
    assert.equal(stored?.name, 'Date Night');
    assert.deepEqual(stored?.restaurantIds, ['r-101', 'r-102']);
    assert.equal(store.list().length, 1);
  });

  it('requires a token', async () => {
    const store = new InMemoryCollectionStore();
    await assert.rejects(store.createCollection({ name: 'x' }, ['r-101']), AuthError);
    assert.equal(store.list().length, 0);
  });

  it('rejects tokens outside the accepted set', async () => {
    const store = new InMemoryCollectionStore(new Set(['test-token']));
    await assert.rejects(store.createCollection({ name: 'x' }, ['r-101'], 'other-token'), AuthError);
    assert.ok(await store.createCollection({ name: 'x' }, ['r-101'], 'test-token'));
  });
});
