import type { AppConfig } from '../../config/env.js';
import { createLLMProvider } from '../../llm/factory.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { HttpCollectionStore } from '../adapters/http-collection-store.js';
import { HttpRestaurantSearch } from '../adapters/http-restaurant-search.js';
import { InMemoryCollectionStore } from '../adapters/in-memory-collection-store.js';
import { InMemoryRestaurantSearch } from '../adapters/in-memory-restaurant-search.js';
import { LlmChatModel } from '../adapters/llm-chat-model.js';
import { ThreadMemory } from '../memory/thread-memory.js';
import type { CollectionStore } from '../ports/collection-store.js';
import type { RestaurantSearch } from '../ports/restaurant-search.js';
import { CollectionNamer } from './collection-namer.js';
import { ConversationService } from './conversation.service.js';

/**
 * Wire the service from configuration. Without RESTAURANT_API_URL the
 * in-memory search and collection store are used.
 */
export function createConversationService(config: AppConfig): ConversationService {
    const llm = createLLMProvider(config);

    let search: RestaurantSearch;
    let collections: CollectionStore;
    if (config.RESTAURANT_API_URL) {
        search = new HttpRestaurantSearch({
            baseUrl: config.RESTAURANT_API_URL,
            timeoutMs: config.RESTAURANT_API_TIMEOUT_MS,
            defaultLocation: config.DEFAULT_LOCATION
        });
        collections = new HttpCollectionStore({
            baseUrl: config.RESTAURANT_API_URL,
            timeoutMs: config.RESTAURANT_API_TIMEOUT_MS
        });
    } else {
        logger.warn('[Conversation] RESTAURANT_API_URL not set, using in-memory restaurants and collections');
        search = new InMemoryRestaurantSearch();
        collections = new InMemoryCollectionStore();
    }

    return new ConversationService({
        memory: new ThreadMemory({ preferenceLearning: config.ENABLE_PREFERENCE_LEARNING }),
        search,
        collections,
        model: new LlmChatModel(llm),
        namer: new CollectionNamer(llm),
        config: {
            historyWindow: config.CONTEXT_HISTORY_WINDOW,
            modelTimeoutMs: config.LLM_COMPLETION_TIMEOUT_MS,
            defaultLocation: config.DEFAULT_LOCATION
        }
    });
}
