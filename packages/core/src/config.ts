/**
 * Environment-level configuration.
 * Parsed once with zod; anything unset falls back to SAFE_DEFAULTS.
 */

import { z } from 'zod';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { ConnectionDescriptor } from './db/types.js';

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (value === undefined || value === '') return defaultValue;
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    }
    return value;
  }, z.boolean());

const numberFromEnv = (defaultValue: number, min = 1, max?: number) =>
  z.preprocess(
    (value) => {
      if (value === undefined || value === null || value === '') return defaultValue;
      if (typeof value === 'string') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : value;
      }
      return value;
    },
    max === undefined ? z.number().int().min(min) : z.number().int().min(min).max(max),
  );

const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().min(1).optional());

const envSchema = z.object({
  ASKDB_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional()),
  ASKDB_MODEL: z.string().min(1).default('gpt-4o-mini'),

  ASKDB_CACHE_ENABLED: booleanFromEnv(true),
  ASKDB_CACHE_TTL_MS: numberFromEnv(SAFE_DEFAULTS.cacheTtlMs, 0),
  ASKDB_CACHE_MAX_ENTRIES: numberFromEnv(SAFE_DEFAULTS.cacheMaxEntries, 1),

  ASKDB_HISTORY_ENABLED: booleanFromEnv(true),
  ASKDB_HISTORY_PATH: z.string().min(1).default(':memory:'),
  ASKDB_HISTORY_TAIL: numberFromEnv(SAFE_DEFAULTS.historyTail, 0, 50),

  ASKDB_MAX_ROWS: numberFromEnv(SAFE_DEFAULTS.maxRows, 1, 1_000_000),
  ASKDB_COMPILE_TIMEOUT_MS: numberFromEnv(SAFE_DEFAULTS.compileTimeoutMs, 100, 600_000),
  ASKDB_EXECUTION_TIMEOUT_MS: numberFromEnv(SAFE_DEFAULTS.executionTimeoutMs, 100, 600_000),
  ASKDB_PROMPT_TOKEN_BUDGET: numberFromEnv(SAFE_DEFAULTS.promptTokenBudget, 100),
  ASKDB_BUSY_POLICY: z.enum(['wait', 'reject']).default('wait'),

  ASKDB_DB_ENGINE: z.enum(['postgres', 'mysql', 'sqlite']).optional(),
  ASKDB_DB_HOST: optionalString,
  ASKDB_DB_PORT: z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(1).max(65535).optional(),
  ),
  ASKDB_DB_NAME: optionalString,
  ASKDB_DB_USER: optionalString,
  ASKDB_DB_PASSWORD: optionalString,
  ASKDB_DB_PATH: optionalString,
  ASKDB_DB_SSL: booleanFromEnv(false),
});

export type BusyPolicySetting = 'wait' | 'reject';

export interface AppConfig {
  logLevel: z.infer<typeof envSchema>['ASKDB_LOG_LEVEL'];
  llm: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
  };
  cache: { enabled: boolean; ttlMs: number; maxEntries: number };
  history: { enabled: boolean; path: string; tail: number };
  limits: {
    maxRows: number;
    compileTimeoutMs: number;
    executionTimeoutMs: number;
    promptTokenBudget: number;
  };
  busyPolicy: BusyPolicySetting;
  /** Connection to open on startup, when ASKDB_DB_ENGINE is set */
  defaultConnection: ConnectionDescriptor | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const defaultConnection: ConnectionDescriptor | null = parsed.ASKDB_DB_ENGINE
    ? {
        engine: parsed.ASKDB_DB_ENGINE,
        host: parsed.ASKDB_DB_HOST,
        port: parsed.ASKDB_DB_PORT,
        database: parsed.ASKDB_DB_NAME,
        user: parsed.ASKDB_DB_USER,
        password: parsed.ASKDB_DB_PASSWORD,
        path: parsed.ASKDB_DB_PATH,
        ssl: parsed.ASKDB_DB_SSL,
      }
    : null;

  return {
    logLevel: parsed.ASKDB_LOG_LEVEL,
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.OPENAI_BASE_URL,
      model: parsed.ASKDB_MODEL,
    },
    cache: {
      enabled: parsed.ASKDB_CACHE_ENABLED,
      ttlMs: parsed.ASKDB_CACHE_TTL_MS,
      maxEntries: parsed.ASKDB_CACHE_MAX_ENTRIES,
    },
    history: {
      enabled: parsed.ASKDB_HISTORY_ENABLED,
      path: parsed.ASKDB_HISTORY_PATH,
      tail: parsed.ASKDB_HISTORY_TAIL,
    },
    limits: {
      maxRows: parsed.ASKDB_MAX_ROWS,
      compileTimeoutMs: parsed.ASKDB_COMPILE_TIMEOUT_MS,
      executionTimeoutMs: parsed.ASKDB_EXECUTION_TIMEOUT_MS,
      promptTokenBudget: parsed.ASKDB_PROMPT_TOKEN_BUDGET,
    },
    busyPolicy: parsed.ASKDB_BUSY_POLICY,
    defaultConnection,
  };
}
