import type { RestaurantRecordDTO } from '../../../../shared/api/index.js';
import type { Intent } from '../intent/intent.types.js';

export type Clock = () => Date;

export type MessageRole = 'user' | 'assistant';

export interface Message {
    readonly role: MessageRole;
    readonly text: string;
    readonly createdAt: Date;
}

export type RestaurantRecord = Readonly<RestaurantRecordDTO>;

/**
 * Most recent search results for a thread.
 * `results` keeps the exact order the user was shown.
 */
export interface SearchSnapshot {
    readonly query: string;
    readonly location?: string;
    readonly results: readonly RestaurantRecord[];
    readonly capturedAt: Date;
}

export interface SearchHistoryEntry {
    readonly query: string;
    readonly location?: string;
    readonly resultCount: number;
    readonly at: Date;
}

export type BudgetPreference = 'low' | 'high';

export interface PreferenceSet {
    cuisine?: string;
    budget?: BudgetPreference;
    location?: string;
}

export type PreferenceKey = keyof PreferenceSet;

/**
 * Live per-thread state. Only memory components mutate it,
 * and only while holding the thread's lock.
 */
export interface Thread {
    readonly id: string;
    readonly createdAt: Date;
    lastActiveAt: Date;
    readonly messages: Message[];
    snapshot: SearchSnapshot | null;
    readonly searchHistory: SearchHistoryEntry[];
    preferences: PreferenceSet;
    lastIntent: Intent | null;
}

/**
 * Consistent read-only copy of a thread taken under its lock.
 * Safe to use after the lock is released.
 */
export interface ThreadSnapshot {
    readonly threadId: string;
    readonly history: readonly Message[];
    readonly search: SearchSnapshot | null;
    readonly searchHistory: readonly SearchHistoryEntry[];
    readonly preferences: Readonly<PreferenceSet>;
}

export interface ThreadStats {
    threadId: string;
    messageCount: number;
    searchCount: number;
    hasRestaurants: boolean;
    cachedResultCount: number;
    preferenceCount: number;
    lastIntent: Intent | null;
    createdAt: string;
    lastActiveAt: string;
}
