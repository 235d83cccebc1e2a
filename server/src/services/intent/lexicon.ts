/**
 * Keyword lexicon shared by intent routing and preference learning.
 * Word lists live in server/src/data so they can be tuned without code changes.
 */

import { z } from 'zod';
import { readJsonFile } from '../../utils/read-json.js';

const LexiconSchema = z.object({
    cuisines: z.array(z.string().min(1)),
    foodTerms: z.array(z.string().min(1)),
    locationTerms: z.array(z.string().min(1)),
    budget: z.object({
        low: z.array(z.string().min(1)),
        high: z.array(z.string().min(1)),
    }),
    backReferences: z.array(z.string().min(1)),
    help: z.array(z.string().min(1)),
    affirmatives: z.array(z.string().min(1)),
});

const PlacesSchema = z.record(z.string().min(1), z.string().min(1));

export type Lexicon = z.infer<typeof LexiconSchema>;
export type PlaceAliases = z.infer<typeof PlacesSchema>;

export const lexicon: Lexicon = LexiconSchema.parse(readJsonFile('../../data/lexicon.json', import.meta.url));
export const placeAliases: PlaceAliases = PlacesSchema.parse(readJsonFile('../../data/places.json', import.meta.url));

const BOUNDARY = '[^\\p{L}\\p{N}]';
const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
    let re = patternCache.get(phrase);
    if (!re) {
        re = new RegExp(`(?:^|${BOUNDARY})(${escapeRegExp(phrase)})(?=$|${BOUNDARY})`, 'u');
        patternCache.set(phrase, re);
    }
    return re;
}

/**
 * Lowercase, fold punctuation to spaces and collapse whitespace.
 * Hyphens and apostrophes are kept so "high-end" and "don't" survive.
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}'\-\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Index of the first whole-phrase occurrence in already-normalized text, or -1.
 */
export function phraseIndex(normalized: string, phrase: string): number {
    const m = phrasePattern(phrase).exec(normalized);
    if (!m || m[1] === undefined) return -1;
    return m.index + m[0].length - m[1].length;
}

export function containsAnyPhrase(normalized: string, phrases: readonly string[]): boolean {
    return phrases.some(p => phraseIndex(normalized, p) !== -1);
}

/**
 * Earliest phrase found in the text; ties go to the longer phrase
 * so "north indian" wins over "indian".
 */
export function earliestPhrase(normalized: string, phrases: readonly string[]): string | undefined {
    let best: { phrase: string; index: number } | undefined;
    for (const phrase of phrases) {
        const index = phraseIndex(normalized, phrase);
        if (index === -1) continue;
        if (!best || index < best.index || (index === best.index && phrase.length > best.phrase.length)) {
            best = { phrase, index };
        }
    }
    return best?.phrase;
}

/**
 * Canonical place name mentioned in the text ("delhi" -> "New Delhi").
 */
export function detectPlace(normalized: string, aliases: PlaceAliases = placeAliases): string | undefined {
    const alias = earliestPhrase(normalized, Object.keys(aliases));
    return alias === undefined ? undefined : aliases[alias];
}

export function detectCuisine(normalized: string): string | undefined {
    return earliestPhrase(normalized, lexicon.cuisines);
}
