import { logger } from '../../lib/logger/structured-logger.js';
import { fetchWithTimeout } from '../../utils/fetch-with-timeout.js';
import { AuthError, ProviderError } from '../conversation/errors.js';
import type { CollectionDetails, CollectionId, CollectionStore } from '../ports/collection-store.js';
import { collectionIdOf, CollectionResponseSchema } from './restaurant-api.schemas.js';

export interface HttpCollectionStoreConfig {
    baseUrl: string;
    timeoutMs: number;
}

export function bearer(token: string): string {
    return token.startsWith('Bearer ') ? token : `Bearer ${token}`;
}

/**
 * CollectionStore over POST {baseUrl}/api/collections.
 * 401 and 403 map to AuthError; everything else that is not 2xx is a ProviderError.
 * An unusable 2xx body is a ProviderError that must not be retried.
 */
export class HttpCollectionStore implements CollectionStore {
    constructor(private readonly config: HttpCollectionStoreConfig) {}

    async createCollection(
        details: CollectionDetails,
        restaurantIds: readonly string[],
        authToken?: string,
        signal?: AbortSignal
    ): Promise<CollectionId> {
        if (!authToken) {
            throw new AuthError('An auth token is required to create a collection');
        }

        let response: Response;
        try {
            response = await fetchWithTimeout(
                new URL('/api/collections', this.config.baseUrl).toString(),
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        Authorization: bearer(authToken)
                    },
                    body: JSON.stringify({
                        name: details.name,
                        description: details.description ?? '',
                        isPublic: true,
                        tags: details.tags ?? [],
                        restaurantIds
                    })
                },
                { timeoutMs: this.config.timeoutMs, provider: 'collection-store', stage: 'create', signal }
            );
        } catch (err) {
            throw new ProviderError('collections', { detail: 'Collection service is unreachable', cause: err });
        }

        if (response.status === 401 || response.status === 403) {
            throw new AuthError(`Collection service rejected the token (${response.status})`);
        }
        if (!response.ok) {
            throw new ProviderError('collections', {
                detail: `Collection creation failed with status ${response.status}`,
                statusCode: response.status
            });
        }

        // From here on the collection may already exist upstream
        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new ProviderError('collections', {
                detail: 'Collection service returned invalid JSON',
                statusCode: response.status,
                retriable: false,
                cause: err
            });
        }

        const parsed = CollectionResponseSchema.safeParse(body);
        const id = parsed.success ? collectionIdOf(parsed.data) : undefined;
        if (!id) {
            throw new ProviderError('collections', {
                detail: 'Collection service response had no id',
                statusCode: response.status,
                retriable: false
            });
        }

        logger.info({ collectionId: id, restaurantCount: restaurantIds.length }, '[CollectionStore] Collection created');
        return id;
    }
}
