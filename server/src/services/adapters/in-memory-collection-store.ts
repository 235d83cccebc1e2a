import { v4 as uuidv4 } from 'uuid';
import { AuthError } from '../conversation/errors.js';
import type { CollectionDetails, CollectionId, CollectionStore } from '../ports/collection-store.js';

export interface StoredCollection extends CollectionDetails {
    id: CollectionId;
    restaurantIds: string[];
    createdAt: Date;
}

/**
 * Process-local CollectionStore. Any non-empty token is accepted unless
 * `acceptedTokens` is given.
 */
export class InMemoryCollectionStore implements CollectionStore {
    private readonly collections = new Map<CollectionId, StoredCollection>();

    constructor(private readonly acceptedTokens?: ReadonlySet<string>) {}

    async createCollection(
        details: CollectionDetails,
        restaurantIds: readonly string[],
        authToken?: string
    ): Promise<CollectionId> {
        if (!authToken) {
            throw new AuthError('An auth token is required to create a collection');
        }
        if (this.acceptedTokens && !this.acceptedTokens.has(authToken)) {
            throw new AuthError('Auth token rejected');
        }

        const id = uuidv4();
        this.collections.set(id, {
            ...details,
            id,
            restaurantIds: [...restaurantIds],
            createdAt: new Date()
        });
        return id;
    }

    get(id: CollectionId): StoredCollection | undefined {
        return this.collections.get(id);
    }

    list(): StoredCollection[] {
        return [...this.collections.values()];
    }
}
