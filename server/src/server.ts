import { createApp } from './app.js';
import { ConfigError, getConfig, type AppConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { createConversationService } from './services/conversation/conversation.factory.js';

function loadConfig(): AppConfig {
    try {
        return getConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.fatal({ issues: err.issues }, err.message);
        }
        throw err;
    }
}

const config = loadConfig();

if (config.LLM_PROVIDER === 'openai' && !config.OPENAI_API_KEY) {
    logger.warn('OPENAI_API_KEY is not set. Model replies will fall back to the unavailable message.');
}

const conversationService = createConversationService(config);
const app = createApp({ conversationService });

const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, env: config.NODE_ENV }, `Server listening on http://localhost:${config.PORT}`);
});

let sweepTimer: NodeJS.Timeout | undefined;
if (config.THREAD_IDLE_TTL_MS > 0) {
    sweepTimer = setInterval(() => {
        conversationService.sweepIdleThreads(config.THREAD_IDLE_TTL_MS);
    }, config.THREAD_SWEEP_INTERVAL_MS);
    sweepTimer.unref();
    logger.info({
        ttlMs: config.THREAD_IDLE_TTL_MS,
        intervalMs: config.THREAD_SWEEP_INTERVAL_MS
    }, 'Idle thread sweep enabled');
}

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    if (sweepTimer) clearInterval(sweepTimer);
    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
