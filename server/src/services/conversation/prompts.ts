import type { Intent } from '../intent/intent.types.js';

export const SYSTEM_PROMPT = `You are a friendly, knowledgeable restaurant assistant.
- Answer only from the restaurants listed in the context; never invent places, ratings or prices.
- Keep replies short and conversational, one question at a time at most.
- When there are no results, say so plainly and suggest a different area or cuisine.`;

export const COLLECTION_NAMER_SYSTEM_PROMPT =
    'You generate restaurant collection details. Always respond with valid JSON only.';

/** Intents answered by the model; Help and CollectionCreate are answered locally */
export type ModelIntent = Exclude<Intent, 'Help' | 'CollectionCreate'>;

/**
 * Instruction for the turn. The context payload carries the data;
 * this says what to do with it.
 */
export function buildTurnPrompt(intent: ModelIntent, rawText: string, resultCount?: number): string {
    switch (intent) {
        case 'Search':
            return resultCount
                ? `The user asked: "${rawText}". ${resultCount} restaurants were found and are listed in the search context. Introduce the best few briefly.`
                : `The user asked: "${rawText}". The search returned no restaurants. Say so and suggest how to broaden the search.`;
        case 'FollowUp':
            return `The user is following up on the earlier results: "${rawText}". Answer using the restaurants in the search context.`;
        case 'Unknown':
            return `The user said: "${rawText}". Reply helpfully, steering the conversation toward finding restaurants.`;
    }
}

export interface CollectionNamingInput {
    query: string;
    restaurantCount: number;
    cuisines: string[];
    locations: string[];
}

export function buildCollectionNamingPrompt(input: CollectionNamingInput): string {
    return `Generate collection details for a restaurant collection based on this context:

Search Query: ${input.query}
Number of Restaurants: ${input.restaurantCount}
Cuisines Found: ${input.cuisines.length ? input.cuisines.join(', ') : 'Mixed'}
Locations: ${input.locations.length ? input.locations.join(', ') : 'Various'}

Respond with a JSON object:
- "name": short, catchy and descriptive (e.g. "Italian Spots (Delhi)")
- "description": one concise sentence mentioning the search
- "tags": 3-5 lowercase tags about the cuisine, location or search`;
}
