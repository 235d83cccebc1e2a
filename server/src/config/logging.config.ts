/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import type { LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggingConfig {
  level: LevelWithSilent;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

function parseLevel(raw: string | undefined): LevelWithSilent {
  const match = LEVELS.find(l => l === raw);
  return match ?? 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

  return {
    level: env.NODE_ENV === 'test' && !env.LOG_LEVEL ? 'silent' : parseLevel(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,authToken,token,password,apiKey,api_key,secret,req.headers.authorization')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
