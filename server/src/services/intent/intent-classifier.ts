import type { Message, SearchSnapshot } from '../memory/memory.types.js';
import {
    containsAnyPhrase,
    detectCuisine,
    detectPlace,
    lexicon,
    normalizeText
} from './lexicon.js';
import type { Intent, IntentDecision, IntentRuleName } from './intent.types.js';

/**
 * The slice of thread state the classifier reads.
 * ThreadSnapshot satisfies it.
 */
export interface ClassifierSnapshot {
    readonly history: readonly Message[];
    readonly search: SearchSnapshot | null;
}

export interface TurnFeatures {
    collectionRequest: boolean;
    searchTerms: boolean;
    backReference: boolean;
    helpOrGreeting: boolean;
    hasResults: boolean;
    hasHistory: boolean;
}

interface IntentRule {
    readonly name: Exclude<IntentRuleName, 'fallback'>;
    readonly intent: Intent;
    readonly matches: (f: TurnFeatures) => boolean;
}

/**
 * Priority-ordered rule table, first match wins.
 * Collection phrases outrank search phrases: a misread here triggers an
 * external write.
 */
export const INTENT_RULES: readonly IntentRule[] = [
    {
        name: 'collection_with_results',
        intent: 'CollectionCreate',
        matches: f => f.collectionRequest && f.hasResults
    },
    {
        // Still CollectionCreate; the context assembler marks it unsatisfiable
        name: 'collection_without_results',
        intent: 'CollectionCreate',
        matches: f => f.collectionRequest && !f.hasResults
    },
    {
        name: 'explicit_search',
        intent: 'Search',
        matches: f => f.searchTerms && !f.backReference
    },
    {
        name: 'follow_up',
        intent: 'FollowUp',
        matches: f => f.backReference && f.hasHistory
    },
    {
        name: 'help_or_greeting',
        intent: 'Help',
        matches: f => f.helpOrGreeting
    }
];

const COLLECTION_VERB_NOUN =
    /(?:^|[^\p{L}])(?:create|make|save|build|start|add|put|turn)(?=[^\p{L}]).*?(?:^|[^\p{L}])(?:collections?|lists?)(?=$|[^\p{L}])/u;
const SAVE_THESE = /(?:^|[^\p{L}])(?:save|keep|bookmark)\s+(?:all\s+)?(?:of\s+)?(?:these|those|them)(?=$|[^\p{L}])/u;
const POLITE_WORDS = ['please', 'thanks', 'thank you'];

function lastAssistantText(history: readonly Message[]): string | undefined {
    for (let i = history.length - 1; i >= 0; i--) {
        const m = history[i];
        if (m && m.role === 'assistant') return m.text;
    }
    return undefined;
}

/**
 * Text made only of affirmatives and polite words: "yes", "sure, go ahead",
 * "yes please". Anything else ("yes show me more") is not a bare yes.
 */
function isBareAffirmative(normalized: string): boolean {
    const phrases = [...lexicon.affirmatives, ...POLITE_WORDS];
    let rest = normalized;
    let affirmed = false;
    while (rest) {
        const phrase = phrases.find(p => rest === p || rest.startsWith(`${p} `));
        if (phrase === undefined) return false;
        if (lexicon.affirmatives.includes(phrase)) affirmed = true;
        rest = rest.slice(phrase.length).trim();
    }
    return affirmed;
}

/**
 * A bare affirmative counts as a collection request when the assistant's
 * last message offered to create one.
 */
function isAffirmativeToCollectionOffer(normalized: string, history: readonly Message[]): boolean {
    if (!isBareAffirmative(normalized)) return false;
    if (hasSearchTerms(normalized) || hasBackReference(normalized)) return false;

    const offer = lastAssistantText(history);
    return offer !== undefined && /collection/i.test(offer);
}

export function isCollectionRequest(normalized: string, history: readonly Message[] = []): boolean {
    return COLLECTION_VERB_NOUN.test(normalized)
        || SAVE_THESE.test(normalized)
        || isAffirmativeToCollectionOffer(normalized, history);
}

export function hasSearchTerms(normalized: string): boolean {
    return detectCuisine(normalized) !== undefined
        || detectPlace(normalized) !== undefined
        || containsAnyPhrase(normalized, lexicon.foodTerms)
        || containsAnyPhrase(normalized, lexicon.locationTerms);
}

export function hasBackReference(normalized: string): boolean {
    return containsAnyPhrase(normalized, lexicon.backReferences);
}

export function extractTurnFeatures(snapshot: ClassifierSnapshot, rawText: string): TurnFeatures {
    const normalized = normalizeText(rawText);
    return {
        collectionRequest: isCollectionRequest(normalized, snapshot.history),
        searchTerms: hasSearchTerms(normalized),
        backReference: hasBackReference(normalized),
        helpOrGreeting: containsAnyPhrase(normalized, lexicon.help),
        hasResults: (snapshot.search?.results.length ?? 0) > 0,
        hasHistory: snapshot.history.length > 0
    };
}

export function matchIntentRule(snapshot: ClassifierSnapshot, rawText: string): IntentDecision {
    const features = extractTurnFeatures(snapshot, rawText);
    for (const rule of INTENT_RULES) {
        if (rule.matches(features)) {
            return { intent: rule.intent, rule: rule.name };
        }
    }
    return { intent: 'Unknown', rule: 'fallback' };
}

/**
 * Deterministic, stateless: same snapshot and text always give the same intent.
 */
export function classifyIntent(snapshot: ClassifierSnapshot, rawText: string): Intent {
    return matchIntentRule(snapshot, rawText).intent;
}
