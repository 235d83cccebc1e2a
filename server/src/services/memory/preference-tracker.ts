import { detectCuisine, detectPlace, earliestPhrase, lexicon, normalizeText, phraseIndex } from '../intent/lexicon.js';
import type { BudgetPreference, PreferenceKey, PreferenceSet, Thread } from './memory.types.js';

/**
 * A detector owns exactly one preference key and never writes any other.
 */
interface PreferenceDetector<K extends PreferenceKey> {
    readonly key: K;
    detect(normalized: string): PreferenceSet[K] | undefined;
}

const cuisineDetector: PreferenceDetector<'cuisine'> = {
    key: 'cuisine',
    detect: detectCuisine
};

const budgetDetector: PreferenceDetector<'budget'> = {
    key: 'budget',
    detect(normalized: string): BudgetPreference | undefined {
        const low = earliestPhrase(normalized, lexicon.budget.low);
        const high = earliestPhrase(normalized, lexicon.budget.high);
        if (low === undefined) return high === undefined ? undefined : 'high';
        if (high === undefined) return 'low';
        // Both present: the later mention is the user's final word
        return phraseIndex(normalized, high) > phraseIndex(normalized, low) ? 'high' : 'low';
    }
};

const locationDetector: PreferenceDetector<'location'> = {
    key: 'location',
    detect: (normalized: string) => detectPlace(normalized)
};

const DETECTORS: ReadonlyArray<
    PreferenceDetector<'cuisine'> | PreferenceDetector<'budget'> | PreferenceDetector<'location'>
> = [cuisineDetector, budgetDetector, locationDetector];

function applyDetector<K extends PreferenceKey>(
    prefs: PreferenceSet,
    detector: PreferenceDetector<K>,
    normalized: string
): K | null {
    const value = detector.detect(normalized);
    if (value === undefined) {
        return null;
    }
    prefs[detector.key] = value;
    return detector.key;
}

/**
 * PreferenceTracker
 * Best-effort keyword learning from user turns.
 * False negatives are fine; unmatched text is a no-op.
 */
export class PreferenceTracker {
    constructor(private readonly enabled: boolean = true) { }

    /**
     * Upsert every key whose detector matches. Returns the keys written.
     * Only call with user text; assistant messages must not shape preferences.
     */
    observe(thread: Thread, userText: string): PreferenceKey[] {
        if (!this.enabled) {
            return [];
        }

        const normalized = normalizeText(userText);
        if (!normalized) {
            return [];
        }

        const written: PreferenceKey[] = [];
        for (const detector of DETECTORS) {
            const key = applyDetector(thread.preferences, detector, normalized);
            if (key) written.push(key);
        }
        return written;
    }

    snapshot(thread: Thread): Readonly<PreferenceSet> {
        return Object.freeze({ ...thread.preferences });
    }

    clear(thread: Thread): void {
        thread.preferences = {};
    }
}

export function summarizePreferences(prefs: Readonly<PreferenceSet>): string {
    const lines: string[] = [];
    if (prefs.cuisine) lines.push(`Cuisine: ${prefs.cuisine}`);
    if (prefs.budget) lines.push(`Budget: ${prefs.budget === 'low' ? 'budget-conscious' : 'open to upscale places'}`);
    if (prefs.location) lines.push(`Location: ${prefs.location}`);
    return lines.length > 0 ? lines.join('\n') : 'No known preferences.';
}
