import { v4 as uuidv4 } from 'uuid';
import {
    AUTH_REQUIRED_MESSAGE,
    CANCELLED_MESSAGE,
    COLLECTION_FAILED_MESSAGE,
    COLLECTION_OFFER,
    collectionCreatedMessage,
    EMPTY_INPUT_MESSAGE,
    HELP_MESSAGE,
    MODEL_UNAVAILABLE_MESSAGE,
    NO_RESULTS_FOR_COLLECTION_MESSAGE,
    SEARCH_FAILED_MESSAGE
} from '../../config/messages.js';
import type { Logger } from '../../lib/logger/structured-logger.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import { type RetryConfig, RetryHandler } from '../../lib/reliability/retry-handler.js';
import { CancelledError, TimeoutError, withTimeout } from '../../lib/reliability/timeout-guard.js';
import { assembleContext } from '../context/context-assembler.js';
import type { ContextPayload } from '../context/context.types.js';
import { hasSearchTerms, matchIntentRule } from '../intent/intent-classifier.js';
import type { Intent } from '../intent/intent.types.js';
import { detectPlace, normalizeText } from '../intent/lexicon.js';
import type { Message, RestaurantRecord, SearchSnapshot, ThreadSnapshot, ThreadStats } from '../memory/memory.types.js';
import type { ThreadMemory, TurnWriteBack } from '../memory/thread-memory.js';
import type { ChatModel } from '../ports/chat-model.js';
import type { CollectionStore } from '../ports/collection-store.js';
import type { RestaurantSearch } from '../ports/restaurant-search.js';
import type { CollectionNamer } from './collection-namer.js';
import { extractCollectionName } from './collection-namer.js';
import {
    AuthError,
    type ConversationError,
    InputError,
    isConversationError,
    ModelUnavailable,
    ProviderError,
    type SurfacedError,
    UnsatisfiableIntent
} from './errors.js';
import { buildTurnPrompt } from './prompts.js';

export interface ConversationServiceConfig {
    historyWindow: number;
    modelTimeoutMs: number;
    defaultLocation?: string | undefined;
    /** Collaborator retries; ProviderError is retried once by default */
    providerRetry?: RetryConfig;
}

export interface ConversationServiceDeps {
    memory: ThreadMemory;
    search: RestaurantSearch;
    collections: CollectionStore;
    model: ChatModel;
    namer: CollectionNamer;
    config: ConversationServiceConfig;
    logger?: Logger;
    generateThreadId?: () => string;
}

export interface TurnRequest {
    text: string;
    threadId?: string | undefined;
    authToken?: string | undefined;
    signal?: AbortSignal | undefined;
    traceId?: string | undefined;
}

export interface CreatedCollection {
    id: string;
    name: string;
    restaurantCount: number;
}

export interface TurnResult {
    threadId: string;
    intent: Intent;
    message: string;
    restaurants: RestaurantRecord[];
    error?: SurfacedError;
    collection?: CreatedCollection;
}

/**
 * What a handled turn produced, before write-back.
 */
interface TurnOutcome {
    message: string;
    restaurants: readonly RestaurantRecord[];
    search?: TurnWriteBack['search'];
    error?: ConversationError;
    collection?: CreatedCollection;
}

interface TurnScope {
    threadId: string;
    text: string;
    snapshot: ThreadSnapshot;
    context: ContextPayload;
    request: TurnRequest;
    log: Logger;
}

const DEFAULT_PROVIDER_RETRY: RetryConfig = { maxAttempts: 2, backoffMs: [0, 250] };

function isProviderFailure(err: unknown): boolean {
    return err instanceof ProviderError && err.retriable;
}

/**
 * Anything a search or collection collaborator throws that is not already
 * one of ours becomes a ProviderError.
 */
function asCollaboratorError(err: unknown, provider: ProviderError['provider']): ConversationError {
    if (isConversationError(err)) return err;
    const detail = err instanceof Error ? err.message : String(err);
    return new ProviderError(provider, { detail, cause: err });
}

function failureDetail(error: ConversationError): Record<string, unknown> {
    return error instanceof ProviderError
        ? { errorKind: error.kind, detail: error.detail, statusCode: error.statusCode }
        : { errorKind: error.kind };
}

function errorName(err: unknown): string {
    return err instanceof Error ? err.name : typeof err;
}

/**
 * ConversationService
 * Turn entry point: snapshot, classify and assemble under the thread lock,
 * call collaborators with the lock released, then write back atomically.
 */
export class ConversationService {
    private readonly memory: ThreadMemory;
    private readonly search: RestaurantSearch;
    private readonly collections: CollectionStore;
    private readonly model: ChatModel;
    private readonly namer: CollectionNamer;
    private readonly config: ConversationServiceConfig;
    private readonly logger: Logger;
    private readonly generateThreadId: () => string;
    private readonly retry: RetryHandler;

    constructor(deps: ConversationServiceDeps) {
        this.memory = deps.memory;
        this.search = deps.search;
        this.collections = deps.collections;
        this.model = deps.model;
        this.namer = deps.namer;
        this.config = deps.config;
        this.logger = deps.logger ?? rootLogger;
        this.generateThreadId = deps.generateThreadId ?? (() => uuidv4());
        this.retry = new RetryHandler(deps.config.providerRetry ?? DEFAULT_PROVIDER_RETRY);
    }

    async handleTurn(request: TurnRequest): Promise<TurnResult> {
        const threadId = request.threadId ?? this.generateThreadId();
        const text = request.text.trim();
        const log = this.logger.child({ threadId, ...(request.traceId ? { traceId: request.traceId } : {}) });

        if (!text) {
            const error = new InputError(EMPTY_INPUT_MESSAGE);
            log.info({ errorKind: error.kind }, '[Conversation] Empty input, answering with help');
            return { threadId, intent: 'Help', message: HELP_MESSAGE, restaurants: [], error: error.toJSON() };
        }

        const { snapshot, intent, rule, context, ticket } = await this.memory.withThread(threadId, thread => {
            const snapshot = this.memory.snapshotOf(thread);
            const decision = matchIntentRule(snapshot, text);
            this.memory.recordIntent(thread, decision.intent);
            const context = assembleContext(snapshot, decision.intent, text, {
                historyWindow: this.config.historyWindow
            });
            return {
                snapshot,
                intent: decision.intent,
                rule: decision.rule,
                context,
                ticket: this.memory.beginTurn(thread)
            };
        });

        try {
            log.info({ intent, rule, historyLength: snapshot.history.length }, '[Conversation] Turn classified');

            const scope: TurnScope = { threadId, text, snapshot, context, request, log };
            let outcome: TurnOutcome;
            try {
                outcome = await this.dispatch(intent, scope);
            } catch (err) {
                if (err instanceof ModelUnavailable) {
                    log.warn({ intent, cause: errorName(err.cause) }, '[Conversation] Model unavailable, nothing written');
                    return this.failWithoutWrite(threadId, intent, err);
                }
                throw err;
            }

            // Once the store has accepted a collection the turn is recorded even if cancelled
            if (request.signal?.aborted && !outcome.collection) {
                log.info({ intent }, '[Conversation] Turn cancelled, nothing written');
                return this.failWithoutWrite(threadId, intent, new ModelUnavailable(CANCELLED_MESSAGE));
            }

            await this.memory.commitTurn(ticket, {
                userText: text,
                assistantText: outcome.message,
                ...(outcome.search ? { search: outcome.search } : {})
            });

            const result: TurnResult = {
                threadId,
                intent,
                message: outcome.message,
                restaurants: [...outcome.restaurants]
            };
            if (outcome.error) result.error = outcome.error.toJSON();
            if (outcome.collection) result.collection = outcome.collection;

            log.info({
                intent,
                resultCount: result.restaurants.length,
                errorKind: outcome.error?.kind
            }, '[Conversation] Turn completed');
            return result;
        } finally {
            ticket.done();
        }
    }

    async getHistory(threadId: string): Promise<Message[]> {
        return this.memory.history(threadId);
    }

    /**
     * Returns false when the thread was never seen.
     */
    async clearThread(threadId: string): Promise<boolean> {
        const cleared = await this.memory.clear(threadId);
        this.logger.info({ threadId, cleared }, '[Conversation] Thread cleared');
        return cleared;
    }

    async getStats(threadId: string): Promise<ThreadStats | null> {
        return this.memory.stats(threadId);
    }

    /**
     * Drop threads idle for longer than maxIdleMs. Returns evicted ids.
     */
    sweepIdleThreads(maxIdleMs: number): string[] {
        const evicted = this.memory.evictIdle(maxIdleMs);
        if (evicted.length > 0) {
            this.logger.info({ evicted: evicted.length, remaining: this.memory.threadCount() }, '[Conversation] Idle threads evicted');
        }
        return evicted;
    }

    private dispatch(intent: Intent, scope: TurnScope): Promise<TurnOutcome> {
        switch (intent) {
            case 'Help':
                return Promise.resolve({ message: HELP_MESSAGE, restaurants: [] });
            case 'Search':
                return this.handleSearch(scope, this.searchLocation(scope, false));
            case 'FollowUp':
                return this.handleFollowUp(scope);
            case 'CollectionCreate':
                return this.handleCollectionCreate(scope);
            case 'Unknown':
                return this.handleUnknown(scope);
        }
    }

    /**
     * Location named in the text, then (for refinements) the previous search's,
     * then the learned preference, then the configured default.
     */
    private searchLocation(scope: TurnScope, refine: boolean): string | undefined {
        return detectPlace(normalizeText(scope.text))
            ?? (refine ? scope.snapshot.search?.location : undefined)
            ?? scope.snapshot.preferences.location
            ?? this.config.defaultLocation;
    }

    private async handleSearch(scope: TurnScope, location: string | undefined): Promise<TurnOutcome> {
        const query = scope.text;
        let restaurants: RestaurantRecord[];
        try {
            restaurants = await this.withProviderRetry('restaurant_search', scope, async () => {
                const result = await this.search.search(query, location, scope.request.signal);
                return result.restaurants;
            }, 'search');
        } catch (err) {
            const error = asCollaboratorError(err, 'search');
            scope.log.warn(failureDetail(error), '[Conversation] Search failed');
            return { message: SEARCH_FAILED_MESSAGE, restaurants: [], error };
        }

        const search: SearchSnapshot = {
            query,
            ...(location !== undefined ? { location } : {}),
            results: restaurants,
            capturedAt: new Date()
        };
        // Model sees the fresh results, not the stale cached ones
        const context = assembleContext({ ...scope.snapshot, search }, 'Search', scope.text, {
            historyWindow: this.config.historyWindow
        });

        const reply = await this.callModel(buildTurnPrompt('Search', scope.text, restaurants.length), context, scope);
        const message = restaurants.length > 0 ? withCollectionOffer(reply) : reply;

        return { message, restaurants, search: { query, location, results: restaurants } };
    }

    private async handleFollowUp(scope: TurnScope): Promise<TurnOutcome> {
        if (hasSearchTerms(normalizeText(scope.text))) {
            return this.handleSearch(scope, this.searchLocation(scope, true));
        }
        const message = await this.callModel(buildTurnPrompt('FollowUp', scope.text), scope.context, scope);
        return { message, restaurants: scope.snapshot.search?.results ?? [] };
    }

    private async handleUnknown(scope: TurnScope): Promise<TurnOutcome> {
        const message = await this.callModel(buildTurnPrompt('Unknown', scope.text), scope.context, scope);
        return { message, restaurants: [] };
    }

    private async handleCollectionCreate(scope: TurnScope): Promise<TurnOutcome> {
        const cached = scope.snapshot.search;
        if (scope.context.unsatisfiable || !cached) {
            return {
                message: NO_RESULTS_FOR_COLLECTION_MESSAGE,
                restaurants: [],
                error: new UnsatisfiableIntent(NO_RESULTS_FOR_COLLECTION_MESSAGE)
            };
        }

        const ids = scope.context.collectionCandidateIds;
        const details = await this.namer.describe(cached, extractCollectionName(scope.text), scope.request.signal);

        try {
            const id = await this.withProviderRetry('create_collection', scope, () =>
                this.collections.createCollection(details, ids, scope.request.authToken, scope.request.signal),
                'collections'
            );
            return {
                message: collectionCreatedMessage(details.name, ids.length),
                restaurants: cached.results,
                collection: { id, name: details.name, restaurantCount: ids.length }
            };
        } catch (err) {
            const error = asCollaboratorError(err, 'collections');
            scope.log.warn(failureDetail(error), '[Conversation] Collection creation failed');
            const message = error instanceof AuthError ? AUTH_REQUIRED_MESSAGE : COLLECTION_FAILED_MESSAGE;
            return { message, restaurants: cached.results, error };
        }
    }

    /**
     * A retriable ProviderError gets one more attempt; AuthError and anything else fail immediately.
     */
    private withProviderRetry<T>(
        operation: string,
        scope: TurnScope,
        fn: () => Promise<T>,
        provider: ProviderError['provider']
    ): Promise<T> {
        return this.retry.executeWithRetry(
            async () => {
                try {
                    return await fn();
                } catch (err) {
                    throw asCollaboratorError(err, provider);
                }
            },
            {
                operation,
                traceId: scope.request.traceId,
                isRetriable: isProviderFailure,
                signal: scope.request.signal
            }
        );
    }

    /**
     * Model call bounded by the configured timeout and the caller's signal.
     * Every failure, including an empty reply, surfaces as ModelUnavailable.
     */
    private async callModel(prompt: string, context: ContextPayload, scope: TurnScope): Promise<string> {
        const { signal } = scope.request;
        let reply: string;
        try {
            reply = await withTimeout(
                this.model.complete(prompt, context, signal),
                this.config.modelTimeoutMs,
                'chat_model.complete',
                undefined,
                signal
            );
        } catch (err) {
            if (err instanceof ModelUnavailable) throw err;
            const message = err instanceof CancelledError ? CANCELLED_MESSAGE : MODEL_UNAVAILABLE_MESSAGE;
            if (err instanceof TimeoutError) {
                scope.log.warn({ timeoutMs: err.timeoutMs }, '[Conversation] Model call timed out');
            }
            throw new ModelUnavailable(message, { cause: err });
        }

        const trimmed = reply.trim();
        if (!trimmed) {
            throw new ModelUnavailable(MODEL_UNAVAILABLE_MESSAGE);
        }
        return trimmed;
    }

    private failWithoutWrite(threadId: string, intent: Intent, error: ModelUnavailable): TurnResult {
        return {
            threadId,
            intent,
            message: error.message,
            restaurants: [],
            error: error.toJSON()
        };
    }
}

function withCollectionOffer(reply: string): string {
    return /collection/i.test(reply) ? reply : `${reply}\n\n${COLLECTION_OFFER}`;
}
