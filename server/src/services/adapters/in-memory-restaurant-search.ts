import { z } from 'zod';
import { readJsonFile } from '../../utils/read-json.js';
import { containsAnyPhrase, normalizeText } from '../intent/lexicon.js';
import type { RestaurantRecord } from '../memory/memory.types.js';
import type { RestaurantSearch, RestaurantSearchResult } from '../ports/restaurant-search.js';

const SampleRestaurantSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    cuisine: z.string().optional(),
    location: z.string().optional(),
    rating: z.number().optional(),
    priceRange: z.string().optional(),
    description: z.string().optional()
});

export function loadSampleRestaurants(): RestaurantRecord[] {
    return z.array(SampleRestaurantSchema).parse(
        readJsonFile('../../data/sample-restaurants.json', import.meta.url)
    );
}

function mentionsCuisine(normalizedQuery: string, cuisine: string): boolean {
    const term = normalizeText(cuisine);
    return containsAnyPhrase(normalizedQuery, [term, term.replace(/s$/, '')]);
}

/**
 * Offline RestaurantSearch over a fixed record list.
 * Filters by exact location, then by any cuisine named in the query;
 * when no cuisine matches, every restaurant in the location is returned.
 */
export class InMemoryRestaurantSearch implements RestaurantSearch {
    readonly calls: Array<{ query: string; location?: string | undefined }> = [];

    constructor(private readonly records: readonly RestaurantRecord[] = loadSampleRestaurants()) {}

    async search(query: string, location?: string): Promise<RestaurantSearchResult> {
        this.calls.push({ query, location });
        const normalized = normalizeText(query);
        const place = location?.toLowerCase();

        const inPlace = place
            ? this.records.filter(r => r.location?.toLowerCase() === place)
            : [...this.records];
        const byCuisine = inPlace.filter(r => r.cuisine !== undefined && mentionsCuisine(normalized, r.cuisine));

        return { restaurants: byCuisine.length > 0 ? byCuisine : inPlace };
    }
}
