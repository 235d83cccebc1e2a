import type { RestaurantRecord } from '../memory/memory.types.js';

export interface RestaurantSearchResult {
    restaurants: RestaurantRecord[];
}

/**
 * External restaurant lookup. Result order is the order shown to the user.
 * Implementations throw ProviderError on failure.
 */
export interface RestaurantSearch {
    search(query: string, location?: string, signal?: AbortSignal): Promise<RestaurantSearchResult>;
}
