import type { Clock, Thread } from './memory.types.js';

/**
 * ThreadStore
 * Process-lifetime map of conversation threads keyed by caller-supplied id.
 *
 * Threads are created on first reference and never evicted implicitly;
 * `evictIdle` exists for an optional retention sweep driven by the server.
 */
export class ThreadStore {
    private threads = new Map<string, Thread>();

    constructor(private readonly clock: Clock = () => new Date()) { }

    getOrCreate(threadId: string): Thread {
        const existing = this.threads.get(threadId);
        if (existing) {
            return existing;
        }

        const now = this.clock();
        const thread: Thread = {
            id: threadId,
            createdAt: now,
            lastActiveAt: now,
            messages: [],
            snapshot: null,
            searchHistory: [],
            preferences: {},
            lastIntent: null
        };
        this.threads.set(threadId, thread);
        return thread;
    }

    get(threadId: string): Thread | undefined {
        return this.threads.get(threadId);
    }

    exists(threadId: string): boolean {
        return this.threads.has(threadId);
    }

    /**
     * Wipe history, cached results and preferences; the id stays registered.
     * Arrays are emptied in place so live history views observe the clear.
     * Returns false when the id was never seen.
     */
    clear(threadId: string): boolean {
        const thread = this.threads.get(threadId);
        if (!thread) {
            return false;
        }

        thread.messages.length = 0;
        thread.searchHistory.length = 0;
        thread.snapshot = null;
        thread.preferences = {};
        thread.lastIntent = null;
        thread.lastActiveAt = this.clock();
        return true;
    }

    touch(thread: Thread): void {
        thread.lastActiveAt = this.clock();
    }

    /**
     * Drop threads idle for longer than maxIdleMs, skipping any the caller
     * reports as busy. Returns evicted ids.
     */
    evictIdle(maxIdleMs: number, isBusy: (threadId: string) => boolean = () => false): string[] {
        const now = this.clock().getTime();
        const evicted: string[] = [];
        for (const [id, thread] of this.threads.entries()) {
            if (now - thread.lastActiveAt.getTime() > maxIdleMs && !isBusy(id)) {
                this.threads.delete(id);
                evicted.push(id);
            }
        }
        return evicted;
    }

    ids(): string[] {
        return [...this.threads.keys()];
    }

    size(): number {
        return this.threads.size;
    }
}
