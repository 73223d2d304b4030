/**
 * @askdb/core barrel export
 *
 * The request pipeline shared by the CLI and any other tool host.
 */

// Errors
export {
  PipelineError,
  isPipelineError,
  isRejectionKind,
  toErrorPayload,
  errorMessage,
} from './errors.js';
export type { ErrorKind, RejectionKind, ErrorPayload } from './errors.js';

// Configuration and logging
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export type { BusyPolicy } from './utils/lock.js';

// Database types
export type {
  EngineKind,
  ConnectionDescriptor,
  SqlParam,
  KeyRole,
  ColumnInfo,
  TableInfo,
  SchemaSnapshot,
  DbDriver,
  DriverResult,
} from './db/types.js';
export { ENGINE_KINDS } from './db/types.js';

// Safe session defaults
export { SAFE_DEFAULTS, DEFAULT_PORTS } from './db/defaults.js';

// Connections
export { ConnectionManager } from './db/connection-manager.js';
export { connectionDescriptorSchema, parseDescriptor } from './db/descriptor.js';
export type { ConnectionHandle, ConnectionStatus, ConnectionManagerOptions } from './db/connection-manager.js';
export { createDriver } from './db/drivers.js';
export type { DriverFactory } from './db/drivers.js';
export { connectionIdentity, normalizeDescriptor, redactDescriptor } from './db/identity.js';
export { findPlaceholders, maxPlaceholderIndex, toPositional, toNamed } from './db/placeholders.js';

// Schema cache
export { SchemaCache, findTable, summarizeSchema } from './schema/schema-cache.js';
export type { SchemaSummary, TableSummary } from './schema/schema-cache.js';

// Policy
export type {
  StatementKind,
  MutationKind,
  CandidateStatement,
  StatementAnalysis,
  Verdict,
  ValidateOptions,
} from './policy/types.js';
export { parseSql } from './policy/parse.js';
export type { Dialect, ParseOutcome } from './policy/parse.js';
export { analyzeStatement, leadingKeyword } from './policy/classify.js';
export { validate, SafetyValidator } from './policy/validator.js';
export { ensureLimit } from './policy/rewrite.js';

// LLM module
export * from './llm/index.js';

// Execution and caching
export { QueryExecutor } from './executor.js';
export type { QueryResult } from './executor.js';
export { QueryCache, cacheKey, normalizeRequest } from './cache/query-cache.js';
export type { QueryCacheStats } from './cache/query-cache.js';

// Local storage
export { LocalStore, defaultDbPath, MEMORY_PATH } from './storage/sqlite.js';
export { HistoryStore, similarity } from './storage/history.js';
export type { HistoryEntry, HistoryOutcome, HistoryStats, NewHistoryEntry, Suggestions } from './storage/history.js';

// Sessions
export { Session, DEFAULT_SESSION_SETTINGS, settingsFromConfig, isMutationKind } from './session.js';
export type { Explanation, SessionOptions, SessionSettings, RequestOptions } from './session.js';
export { SessionRegistry, createRuntime } from './sessions.js';
export type { Runtime, RuntimeOverrides, SessionFactory } from './sessions.js';

// Tool boundary
export {
  createTools,
  isErrorPayload,
  describeTarget,
  toStatusPayload,
  toColumnPayloads,
  toQueryPayload,
  toMutatePayload,
  toHistoryPayload,
  toSuggestPayload,
  toExplainPayload,
  toSummaryPayload,
} from './tools.js';
export type {
  Tools,
  ToolResult,
  ConnectPayload,
  StatusPayload,
  ColumnPayload,
  QueryPayload,
  MutatePayload,
  HistoryItemPayload,
  SuggestPayload,
  ExplainPayload,
  SummaryPayload,
} from './tools.js';
