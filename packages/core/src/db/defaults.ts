/**
 * Safe session defaults for compilation and execution.
 * loadConfig() starts from these when the environment is silent.
 */

export const SAFE_DEFAULTS = {
  /** Row ceiling for SELECT results; extra rows are dropped and flagged */
  maxRows: 1000,
  /** Statement timeout in milliseconds */
  executionTimeoutMs: 15_000,
  /** Language model request timeout in milliseconds */
  compileTimeoutMs: 30_000,
  connectTimeoutMs: 10_000,
  /** Query cache TTL in milliseconds */
  cacheTtlMs: 300_000,
  cacheMaxEntries: 500,
  /** Approximate token budget for the schema section of a prompt */
  promptTokenBudget: 2_000,
  /** History entries included for follow-up questions */
  historyTail: 5,
} as const;

export const DEFAULT_PORTS: Record<'postgres' | 'mysql', number> = {
  postgres: 5432,
  mysql: 3306,
};
