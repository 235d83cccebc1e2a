import { logger } from '../../lib/logger/structured-logger.js';
import { fetchWithTimeout } from '../../utils/fetch-with-timeout.js';
import { ProviderError } from '../conversation/errors.js';
import type { RestaurantSearch, RestaurantSearchResult } from '../ports/restaurant-search.js';
import { parseRestaurants, SearchResponseSchema } from './restaurant-api.schemas.js';

export interface HttpRestaurantSearchConfig {
    baseUrl: string;
    timeoutMs: number;
    defaultLocation: string;
}

/**
 * RestaurantSearch over the upstream questions endpoint:
 * GET {baseUrl}/api/questions?type=current&place=...&q=...
 */
export class HttpRestaurantSearch implements RestaurantSearch {
    constructor(private readonly config: HttpRestaurantSearchConfig) {}

    async search(query: string, location?: string, signal?: AbortSignal): Promise<RestaurantSearchResult> {
        const place = location ?? this.config.defaultLocation;
        const url = new URL('/api/questions', this.config.baseUrl);
        url.searchParams.set('type', 'current');
        url.searchParams.set('place', place);
        url.searchParams.set('q', query);

        let response: Response;
        try {
            response = await fetchWithTimeout(
                url.toString(),
                { method: 'GET', headers: { Accept: 'application/json' } },
                { timeoutMs: this.config.timeoutMs, provider: 'restaurant-search', stage: 'search', signal }
            );
        } catch (err) {
            throw new ProviderError('search', { detail: 'Restaurant search is unreachable', cause: err });
        }

        if (!response.ok) {
            throw new ProviderError('search', {
                detail: `Restaurant search failed with status ${response.status}`,
                statusCode: response.status
            });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new ProviderError('search', {
                detail: 'Restaurant search returned invalid JSON',
                statusCode: response.status,
                cause: err
            });
        }

        const parsed = SearchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ProviderError('search', {
                detail: 'Restaurant search returned an unexpected payload',
                statusCode: response.status,
                cause: parsed.error
            });
        }

        const { restaurants, skipped } = parseRestaurants(parsed.data.restaurants);
        logger.info({ place, resultCount: restaurants.length, skipped }, '[RestaurantSearch] Search completed');
        return { restaurants };
    }
}
