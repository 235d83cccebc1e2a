import type { Intent } from '../intent/intent.types.js';
import type { SearchSnapshot, ThreadSnapshot } from '../memory/memory.types.js';
import { summarizePreferences } from '../memory/preference-tracker.js';
import { snapshotResultIds, summarizeSearchHistory } from '../memory/search-result-cache.js';
import type { AssembleOptions, ContextPayload } from './context.types.js';

export const DEFAULT_HISTORY_WINDOW = 10;
export const DEFAULT_MAX_LISTED_RESULTS = 10;

/**
 * One line per restaurant: "1. Name - cuisine in location | ⭐ 4.5 | $$ [id: r1]".
 * Unknown fields are left out, never filled in.
 */
export function renderSearchSnapshot(
    snapshot: SearchSnapshot,
    maxListed: number = DEFAULT_MAX_LISTED_RESULTS
): string {
    const lines = [
        `Query: ${snapshot.query}`,
        `Location: ${snapshot.location ?? 'not specified'}`,
        `Results (${snapshot.results.length}):`
    ];

    if (snapshot.results.length === 0) {
        lines.push('none');
        return lines.join('\n');
    }

    snapshot.results.slice(0, maxListed).forEach((r, i) => {
        let line = `${i + 1}. ${r.name}`;
        if (r.cuisine) line += ` - ${r.cuisine}`;
        if (r.location) line += ` in ${r.location}`;
        if (r.rating !== undefined) line += ` | ⭐ ${r.rating}`;
        if (r.priceRange) line += ` | ${r.priceRange}`;
        line += ` [id: ${r.id}]`;
        lines.push(line);
    });

    const hidden = snapshot.results.length - maxListed;
    if (hidden > 0) {
        lines.push(`...and ${hidden} more`);
    }
    return lines.join('\n');
}

/**
 * Build the model-facing context for a turn. Pure: reads only its arguments.
 */
export function assembleContext(
    snapshot: ThreadSnapshot,
    intent: Intent,
    rawText: string,
    opts: AssembleOptions = {}
): ContextPayload {
    const historyWindow = opts.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    const maxListed = opts.maxListedResults ?? DEFAULT_MAX_LISTED_RESULTS;

    const collectionCandidateIds = intent === 'CollectionCreate'
        ? snapshotResultIds(snapshot.search)
        : [];

    return Object.freeze({
        intent,
        rawText,
        recentHistory: Object.freeze(historyWindow > 0 ? snapshot.history.slice(-historyWindow) : []),
        preferenceSummary: summarizePreferences(snapshot.preferences),
        searchContext: snapshot.search ? renderSearchSnapshot(snapshot.search, maxListed) : null,
        searchHistorySummary: summarizeSearchHistory(snapshot.searchHistory),
        collectionCandidateIds: Object.freeze(collectionCandidateIds),
        unsatisfiable: intent === 'CollectionCreate' && collectionCandidateIds.length === 0
    });
}
