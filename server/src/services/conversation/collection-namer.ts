import { z } from 'zod';
import type { LLMProvider } from '../../llm/types.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { Clock, SearchSnapshot } from '../memory/memory.types.js';
import type { CollectionDetails } from '../ports/collection-store.js';
import { buildCollectionNamingPrompt, COLLECTION_NAMER_SYSTEM_PROMPT } from './prompts.js';

export const MAX_COLLECTION_NAME_LENGTH = 80;

const CollectionDetailsSchema = z.object({
    name: z.string().trim().min(1).max(MAX_COLLECTION_NAME_LENGTH),
    description: z.string().trim().min(1),
    tags: z.array(z.string().trim().min(1)).max(5)
});

const NAMED_AS = /\b(?:called|named|titled)\s+(.+)$/i;

/**
 * Name given explicitly in the request, e.g.
 * `create a collection called 'My Delhi Favorites'` -> `My Delhi Favorites`.
 */
export function extractCollectionName(rawText: string): string | undefined {
    const match = NAMED_AS.exec(rawText.trim());
    if (!match?.[1]) return undefined;

    const name = match[1]
        .replace(/[.!?]+$/, '')
        .trim()
        .replace(/^["'“‘]+|["'”’]+$/g, '')
        .trim();
    return name ? name.slice(0, MAX_COLLECTION_NAME_LENGTH) : undefined;
}

function distinct(values: (string | undefined)[]): string[] {
    return [...new Set(values.filter((v): v is string => Boolean(v)))];
}

function stamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}

/**
 * CollectionNamer
 * Picks name, description and tags for a new collection.
 * An explicit name wins; otherwise the model proposes one, with a
 * timestamped fallback when it is unavailable or returns junk.
 */
export class CollectionNamer {
    constructor(
        private readonly llm: LLMProvider | null,
        private readonly clock: Clock = () => new Date()
    ) {}

    async describe(
        search: SearchSnapshot,
        requestedName?: string,
        signal?: AbortSignal
    ): Promise<CollectionDetails> {
        const cuisines = distinct(search.results.map(r => r.cuisine));
        const locations = distinct(search.results.map(r => r.location));

        if (requestedName) {
            return {
                name: requestedName,
                description: `Restaurants saved from the search "${search.query}".`,
                tags: distinct([...cuisines, ...locations].map(t => t.toLowerCase())).slice(0, 5)
            };
        }

        if (this.llm) {
            try {
                return await this.llm.completeJSON(
                    [
                        { role: 'system', content: COLLECTION_NAMER_SYSTEM_PROMPT },
                        {
                            role: 'user',
                            content: buildCollectionNamingPrompt({
                                query: search.query,
                                restaurantCount: search.results.length,
                                cuisines,
                                locations
                            })
                        }
                    ],
                    CollectionDetailsSchema,
                    { temperature: 0.3, ...(signal ? { signal } : {}) }
                );
            } catch (err) {
                logger.warn({
                    error: err instanceof Error ? err.message : String(err)
                }, '[CollectionNamer] Model naming failed, using fallback');
            }
        }

        return this.fallback(search.query);
    }

    fallback(query: string): CollectionDetails {
        return {
            name: `Restaurant Collection - ${stamp(this.clock())}`,
            description: `A curated collection of restaurants from search: ${query}`,
            tags: ['curated', 'restaurants', 'search_results']
        };
    }
}
