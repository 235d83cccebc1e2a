import { KeyedMutex } from '../../lib/concurrency/keyed-mutex.js';
import { TurnSequencer, type Ticket } from '../../lib/concurrency/turn-sequencer.js';
import type { Intent } from '../intent/intent.types.js';
import { MessageLog } from './message-log.js';
import { PreferenceTracker } from './preference-tracker.js';
import { SearchResultCache } from './search-result-cache.js';
import { ThreadStore } from './thread-store.js';
import type {
    Clock,
    Message,
    RestaurantRecord,
    Thread,
    ThreadSnapshot,
    ThreadStats
} from './memory.types.js';

export type TurnTicket = Ticket;

export interface ThreadMemoryOptions {
    clock?: Clock;
    preferenceLearning?: boolean;
}

/**
 * Everything a completed turn writes back, applied as one unit.
 */
export interface TurnWriteBack {
    userText: string;
    assistantText: string;
    search?: {
        query: string;
        location?: string | undefined;
        results: readonly RestaurantRecord[];
    };
}

/**
 * ThreadMemory
 * Flat composition of the per-thread memory components behind one interface.
 *
 * Every read and write goes through a per-thread lock. Callers hold it only
 * for snapshot reads and write-backs, never across collaborator calls.
 */
export class ThreadMemory {
    readonly store: ThreadStore;
    readonly messages: MessageLog;
    readonly searches: SearchResultCache;
    readonly preferences: PreferenceTracker;
    private readonly locks = new KeyedMutex();
    private readonly turns = new TurnSequencer();

    constructor(opts: ThreadMemoryOptions = {}) {
        const clock = opts.clock ?? (() => new Date());
        this.store = new ThreadStore(clock);
        this.messages = new MessageLog(clock);
        this.searches = new SearchResultCache(clock);
        this.preferences = new PreferenceTracker(opts.preferenceLearning ?? true);
    }

    /**
     * Run fn against the thread while holding its lock.
     * The thread is created on first reference.
     */
    withThread<T>(threadId: string, fn: (thread: Thread) => T | Promise<T>): Promise<T> {
        return this.locks.runExclusive(threadId, () => fn(this.store.getOrCreate(threadId)));
    }

    /**
     * Point-in-time copy of the thread. Call while holding the lock.
     */
    snapshotOf(thread: Thread): ThreadSnapshot {
        return Object.freeze({
            threadId: thread.id,
            history: Object.freeze([...this.messages.history(thread)]),
            search: this.searches.getSnapshot(thread),
            searchHistory: Object.freeze([...this.searches.searchHistory(thread)]),
            preferences: this.preferences.snapshot(thread)
        });
    }

    readSnapshot(threadId: string): Promise<ThreadSnapshot> {
        return this.withThread(threadId, thread => this.snapshotOf(thread));
    }

    recordIntent(thread: Thread, intent: Intent): void {
        thread.lastIntent = intent;
    }

    /**
     * Apply a completed turn atomically: user message, learned preferences,
     * replacement search snapshot (if any), then the assistant reply.
     * Waits until every earlier turn on the thread has committed or been
     * abandoned, so write-backs land in arrival order.
     */
    async commitTurn(ticket: TurnTicket, writeBack: TurnWriteBack): Promise<void> {
        try {
            await ticket.ready;
            await this.withThread(ticket.key, thread => {
                this.messages.append(thread, 'user', writeBack.userText);
                this.preferences.observe(thread, writeBack.userText);
                if (writeBack.search) {
                    this.searches.setSnapshot(
                        thread,
                        writeBack.search.query,
                        writeBack.search.location,
                        writeBack.search.results
                    );
                }
                this.messages.append(thread, 'assistant', writeBack.assistantText);
                this.store.touch(thread);
            });
        } finally {
            ticket.done();
        }
    }

    /**
     * Copy of the full history; empty for unknown ids (does not create the thread).
     */
    async history(threadId: string): Promise<Message[]> {
        return this.locks.runExclusive(threadId, () => {
            const thread = this.store.get(threadId);
            return thread ? [...this.messages.history(thread)] : [];
        });
    }

    clear(threadId: string): Promise<boolean> {
        return this.locks.runExclusive(threadId, () => this.store.clear(threadId));
    }

    exists(threadId: string): boolean {
        return this.store.exists(threadId);
    }

    async stats(threadId: string): Promise<ThreadStats | null> {
        return this.locks.runExclusive(threadId, () => {
            const thread = this.store.get(threadId);
            if (!thread) {
                return null;
            }
            const prefs = this.preferences.snapshot(thread);
            return {
                threadId,
                messageCount: thread.messages.length,
                searchCount: thread.searchHistory.length,
                hasRestaurants: (thread.snapshot?.results.length ?? 0) > 0,
                cachedResultCount: thread.snapshot?.results.length ?? 0,
                preferenceCount: Object.keys(prefs).length,
                lastIntent: thread.lastIntent,
                createdAt: thread.createdAt.toISOString(),
                lastActiveAt: thread.lastActiveAt.toISOString()
            };
        });
    }

    /**
     * Reserve the turn's place in the thread's write-back order.
     * Call while holding the thread's lock, right after the snapshot read.
     * `done()` abandons the turn; commitTurn calls it itself.
     */
    beginTurn(thread: Thread): TurnTicket {
        return this.turns.issue(thread.id);
    }

    /**
     * Retention sweep. Threads that are locked or have a turn in flight are skipped.
     */
    evictIdle(maxIdleMs: number): string[] {
        return this.store.evictIdle(
            maxIdleMs,
            id => this.locks.isLocked(id) || this.turns.pending(id) > 0
        );
    }

    threadCount(): number {
        return this.store.size();
    }
}
