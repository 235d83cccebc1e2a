import type { Clock, RestaurantRecord, SearchHistoryEntry, SearchSnapshot, Thread } from './memory.types.js';

export const SEARCH_HISTORY_LIMIT = 10;

/**
 * SearchResultCache
 * One live SearchSnapshot per thread, last write wins.
 *
 * Results are stored in the order the user saw them. Nothing is merged,
 * re-sorted or de-duplicated: "create a collection from these" refers to
 * exactly this list.
 */
export class SearchResultCache {
    constructor(private readonly clock: Clock = () => new Date()) { }

    setSnapshot(
        thread: Thread,
        query: string,
        location: string | undefined,
        results: readonly RestaurantRecord[]
    ): void {
        const capturedAt = this.clock();
        const snapshot: SearchSnapshot = Object.freeze({
            query,
            ...(location !== undefined && { location }),
            results: Object.freeze(results.map(r => Object.freeze({ ...r }))),
            capturedAt
        });
        thread.snapshot = snapshot;

        const entry: SearchHistoryEntry = Object.freeze({
            query,
            ...(location !== undefined && { location }),
            resultCount: results.length,
            at: capturedAt
        });
        thread.searchHistory.push(entry);
        if (thread.searchHistory.length > SEARCH_HISTORY_LIMIT) {
            thread.searchHistory.splice(0, thread.searchHistory.length - SEARCH_HISTORY_LIMIT);
        }
    }

    getSnapshot(thread: Thread): SearchSnapshot | null {
        return thread.snapshot;
    }

    resultIds(thread: Thread): string[] {
        return snapshotResultIds(thread.snapshot);
    }

    searchHistory(thread: Thread): readonly SearchHistoryEntry[] {
        return thread.searchHistory;
    }

    historySummary(thread: Thread, max = 3): string {
        return summarizeSearchHistory(thread.searchHistory, max);
    }

    clear(thread: Thread): void {
        thread.snapshot = null;
        thread.searchHistory.length = 0;
    }
}

export function snapshotResultIds(snapshot: SearchSnapshot | null): string[] {
    return snapshot ? snapshot.results.map(r => r.id) : [];
}

export function summarizeSearchHistory(history: readonly SearchHistoryEntry[], max = 3): string {
    if (history.length === 0) {
        return 'No previous searches.';
    }

    return history
        .slice(-max)
        .map(s => `- ${s.query}${s.location ? ` @ ${s.location}` : ''} (${s.resultCount} results)`)
        .join('\n');
}
