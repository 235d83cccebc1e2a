import type { Intent } from '../intent/intent.types.js';
import type { Message } from '../memory/memory.types.js';

/**
 * Everything the model call needs for one turn.
 * `searchContext` is null when the thread has no cached search.
 */
export interface ContextPayload {
    readonly intent: Intent;
    readonly rawText: string;
    readonly recentHistory: readonly Message[];
    readonly preferenceSummary: string;
    readonly searchContext: string | null;
    readonly searchHistorySummary: string;
    readonly collectionCandidateIds: readonly string[];
    /** CollectionCreate with nothing cached to attach */
    readonly unsatisfiable: boolean;
}

export interface AssembleOptions {
    /** Messages of recent history to include, oldest first */
    historyWindow?: number;
    /** Restaurants listed in the rendered search context */
    maxListedResults?: number;
}
