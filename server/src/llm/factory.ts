import type { AppConfig } from "../config/env.js";
import { logger } from "../lib/logger/structured-logger.js";
import { OpenAiProvider } from "./openai.provider.js";
import type { LLMProvider } from "./types.js";

type LlmConfig = Pick<
    AppConfig,
    'LLM_PROVIDER' | 'OPENAI_API_KEY' | 'OPENAI_MODEL' | 'LLM_TEMPERATURE' | 'LLM_COMPLETION_TIMEOUT_MS'
>;

export function createLLMProvider(config: LlmConfig): LLMProvider | null {
    switch (config.LLM_PROVIDER) {
        case "openai": {
            if (!config.OPENAI_API_KEY) {
                logger.warn('[LLM] OPENAI_API_KEY not set, model calls disabled');
                return null;
            }
            return new OpenAiProvider({
                apiKey: config.OPENAI_API_KEY,
                model: config.OPENAI_MODEL,
                temperature: config.LLM_TEMPERATURE,
                timeoutMs: config.LLM_COMPLETION_TIMEOUT_MS
            });
        }
        case "none":
            return null;
    }
}
