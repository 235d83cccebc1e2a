import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanish = z
    .enum(['true', 'false'])
    .transform(v => v === 'true');

const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    LLM_PROVIDER: z.enum(['openai', 'none']).default('openai'),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

    RESTAURANT_API_URL: z.string().url().optional(),
    RESTAURANT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    DEFAULT_LOCATION: z.string().min(1).default('New Delhi'),

    CONTEXT_HISTORY_WINDOW: z.coerce.number().int().positive().default(10),
    THREAD_IDLE_TTL_MS: z.coerce.number().int().min(0).default(0),
    THREAD_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),

    ENABLE_PREFERENCE_LEARNING: booleanish.default('true'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[]) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Parse and validate process environment.
 * Throws ConfigError listing every invalid variable so startup fails fast.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigError(`Invalid configuration (${issues.length} issue(s))`, issues);
    }
    return parsed.data;
}
