/**
 * A session owns one connection and everything keyed to it: schema snapshots,
 * cached read results, and its slice of the history log.
 *
 * Request flow: cache check → prompt (schema + history tail) → compile →
 * validate → execute → cache store or invalidation → history.
 * Validator rejections are surfaced as-is; nothing is sent back to the model.
 */

import { randomUUID } from 'node:crypto';
import type { AppConfig } from './config.js';
import { ConnectionManager, type ConnectionHandle, type ConnectionStatus } from './db/connection-manager.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { DriverFactory } from './db/drivers.js';
import type { ConnectionDescriptor, SchemaSnapshot, SqlParam, TableInfo } from './db/types.js';
import { errorMessage, invalidRequest, isPipelineError, rejection, type ErrorKind } from './errors.js';
import { QueryExecutor, type QueryResult } from './executor.js';
import { QueryCache, cacheKey } from './cache/query-cache.js';
import { SqlCompiler } from './llm/compiler.js';
import { PromptBuilder, type HistoryTurn, type Intent } from './llm/prompt.js';
import type { LanguageModel } from './llm/types.js';
import type { CandidateStatement, MutationKind, StatementKind, Verdict } from './policy/types.js';
import { SafetyValidator } from './policy/validator.js';
import { SchemaCache, summarizeSchema, type SchemaSummary } from './schema/schema-cache.js';
import type { HistoryEntry, HistoryStats, HistoryStore, Suggestions } from './storage/history.js';
import type { BusyPolicy } from './utils/lock.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface SessionSettings {
  maxRows: number;
  compileTimeoutMs: number;
  executionTimeoutMs: number;
  promptTokenBudget: number;
  historyTail: number;
  busyPolicy: BusyPolicy;
  cacheEnabled: boolean;
  cacheTtlMs: number;
  cacheMaxEntries: number;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  maxRows: SAFE_DEFAULTS.maxRows,
  compileTimeoutMs: SAFE_DEFAULTS.compileTimeoutMs,
  executionTimeoutMs: SAFE_DEFAULTS.executionTimeoutMs,
  promptTokenBudget: SAFE_DEFAULTS.promptTokenBudget,
  historyTail: SAFE_DEFAULTS.historyTail,
  busyPolicy: 'wait',
  cacheEnabled: true,
  cacheTtlMs: SAFE_DEFAULTS.cacheTtlMs,
  cacheMaxEntries: SAFE_DEFAULTS.cacheMaxEntries,
};

export function settingsFromConfig(config: AppConfig): SessionSettings {
  return {
    maxRows: config.limits.maxRows,
    compileTimeoutMs: config.limits.compileTimeoutMs,
    executionTimeoutMs: config.limits.executionTimeoutMs,
    promptTokenBudget: config.limits.promptTokenBudget,
    historyTail: config.history.tail,
    busyPolicy: config.busyPolicy,
    cacheEnabled: config.cache.enabled,
    cacheTtlMs: config.cache.ttlMs,
    cacheMaxEntries: config.cache.maxEntries,
  };
}

export interface SessionOptions {
  id?: string;
  model: LanguageModel;
  settings?: Partial<SessionSettings>;
  /** Omit to run without history */
  history?: HistoryStore | null;
  logger?: Logger;
  driverFactory?: DriverFactory;
  /** Milliseconds clock for cache expiry */
  now?: () => number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

const MUTATION_KINDS: readonly MutationKind[] = ['insert', 'update', 'delete'];

export function isMutationKind(value: string): value is MutationKind {
  return MUTATION_KINDS.some((kind) => kind === value);
}

function parseIntent(kind: string): Intent {
  if (kind === 'select' || isMutationKind(kind)) return kind;
  throw invalidRequest(`Statement kind must be select, ${MUTATION_KINDS.join(', ')}; got "${kind}".`);
}

/** A compiled and validated statement that was not run */
export interface Explanation {
  requestText: string;
  kind: StatementKind;
  sql: string;
  params: readonly SqlParam[];
  tables: readonly string[];
  verdict: Verdict;
  assumptions: string[];
  confidence: number | null;
}

/** What the pipeline learned before it stopped, for the history entry */
interface RequestTrace {
  candidate?: CandidateStatement;
}

export class Session {
  readonly id: string;
  readonly settings: SessionSettings;
  private readonly logger: Logger;
  private readonly connections: ConnectionManager;
  private readonly schemaCache: SchemaCache;
  private readonly queryCache: QueryCache | null;
  private readonly promptBuilder: PromptBuilder;
  private readonly compiler: SqlCompiler;
  private readonly validator = new SafetyValidator();
  private readonly executor: QueryExecutor;
  private readonly history: HistoryStore | null;

  constructor(options: SessionOptions) {
    this.id = options.id ?? randomUUID();
    this.settings = { ...DEFAULT_SESSION_SETTINGS, ...options.settings };
    this.logger = (options.logger ?? createLogger('silent')).child({ sessionId: this.id });
    this.history = options.history ?? null;

    this.connections = new ConnectionManager({
      busyPolicy: this.settings.busyPolicy,
      driverFactory: options.driverFactory,
      logger: this.logger,
    });
    this.schemaCache = new SchemaCache(this.connections, {
      timeoutMs: this.settings.executionTimeoutMs,
      logger: this.logger,
    });
    this.queryCache = this.settings.cacheEnabled
      ? new QueryCache({
          ttlMs: this.settings.cacheTtlMs,
          maxEntries: this.settings.cacheMaxEntries,
          now: options.now,
          logger: this.logger,
        })
      : null;
    this.promptBuilder = new PromptBuilder({
      tokenBudget: this.settings.promptTokenBudget,
      historyTail: this.settings.historyTail,
    });
    this.compiler = new SqlCompiler(options.model, this.logger);
    this.executor = new QueryExecutor(this.connections, {
      maxRows: this.settings.maxRows,
      timeoutMs: this.settings.executionTimeoutMs,
      logger: this.logger,
    });
  }

  // ── Connection ───────────────────────────────────────────────────

  async connect(descriptor: ConnectionDescriptor): Promise<ConnectionHandle> {
    const handle = await this.connections.connect(descriptor);
    // a reconnect to the same identity may see a different schema and data
    this.schemaCache.invalidate(handle.connectionId);
    this.queryCache?.invalidateConnection(handle.connectionId);
    return handle;
  }

  async disconnect(): Promise<void> {
    const { connectionId } = this.connections.status();
    await this.connections.disconnect();
    if (connectionId) {
      this.schemaCache.invalidate(connectionId);
    }
  }

  status(): ConnectionStatus {
    return this.connections.status();
  }

  // ── Schema ───────────────────────────────────────────────────────

  async listTables(options: RequestOptions = {}): Promise<string[]> {
    const handle = this.connections.activeHandle();
    return this.schemaCache.listTables(handle.connectionId, options.signal);
  }

  async describeTable(name: string, options: RequestOptions = {}): Promise<TableInfo> {
    const handle = this.connections.activeHandle();
    return this.schemaCache.describeTable(handle.connectionId, name, options.signal);
  }

  /** Drop the memoized snapshot so the next request introspects again */
  refreshSchema(): void {
    const { connectionId } = this.connections.status();
    if (connectionId) {
      this.schemaCache.invalidate(connectionId);
    }
  }

  // ── Requests ─────────────────────────────────────────────────────

  async query(requestText: string, options: RequestOptions = {}): Promise<QueryResult> {
    return this.handle(requestText, 'select', options.signal);
  }

  async mutate(requestText: string, kind: string, options: RequestOptions = {}): Promise<QueryResult> {
    if (!isMutationKind(kind)) {
      throw invalidRequest(`Mutation kind must be one of ${MUTATION_KINDS.join(', ')}; got "${kind}".`);
    }
    return this.handle(requestText, kind, options.signal);
  }

  /** Re-run a past SELECT request of this session against the current database state */
  async repeat(seq: number, options: RequestOptions = {}): Promise<QueryResult> {
    const entry = this.history?.get(seq);
    if (!entry || entry.sessionId !== this.id) {
      throw invalidRequest(`History entry ${seq} was not found in this session.`);
    }
    if (entry.kind !== 'select') {
      throw invalidRequest('Only SELECT requests can be repeated.');
    }
    return this.query(entry.requestText, options);
  }

  private async handle(requestText: string, intent: Intent, signal?: AbortSignal): Promise<QueryResult> {
    const request = requestText.trim();
    const trace: RequestTrace = {};
    let connectionId: string | null = null;

    try {
      if (!request) {
        throw invalidRequest('Request text is empty.');
      }
      const handle = this.connections.activeHandle();
      connectionId = handle.connectionId;

      const compute = (): Promise<QueryResult> => this.pipeline(request, intent, handle, trace, signal);
      const result =
        intent === 'select' && this.queryCache
          ? await this.queryCache.getOrCompute(cacheKey(handle.connectionId, request), handle.connectionId, compute)
          : await compute();

      if (result.kind !== 'select') {
        this.queryCache?.invalidateConnection(handle.connectionId);
      }
      this.record(request, connectionId, result);
      return result;
    } catch (err: unknown) {
      this.recordFailure(request, connectionId, trace, err);
      throw err;
    }
  }

  private async compile(
    request: string,
    intent: Intent,
    handle: ConnectionHandle,
    signal?: AbortSignal,
  ): Promise<{ candidate: CandidateStatement; snapshot: SchemaSnapshot }> {
    const snapshot = await this.schemaCache.getSnapshot(handle.connectionId, signal);
    const prompt = this.promptBuilder.build({
      request,
      snapshot,
      historyTail: this.historyTurns(),
      dialect: handle.descriptor.engine,
      intent,
    });
    this.logger.debug({ tables: prompt.tables, estimatedTokens: prompt.estimatedTokens }, 'prompt built');

    const candidate = await this.compiler.compile(prompt, { timeoutMs: this.settings.compileTimeoutMs, signal });
    return { candidate, snapshot };
  }

  private async pipeline(
    request: string,
    intent: Intent,
    handle: ConnectionHandle,
    trace: RequestTrace,
    signal?: AbortSignal,
  ): Promise<QueryResult> {
    const { candidate, snapshot } = await this.compile(request, intent, handle, signal);
    trace.candidate = candidate;

    const verdict = this.validator.validate(candidate, snapshot, { expectedKind: intent });
    if (!verdict.accepted) {
      this.logger.warn({ reason: verdict.reason, sql: candidate.sql }, 'candidate rejected');
      throw rejection(verdict.reason, verdict.message, { sql: candidate.sql, suggestedFix: verdict.suggestedFix });
    }

    return this.executor.run(candidate, handle, { signal, warnings: verdict.warnings });
  }

  /**
   * Compile and validate a request without running it. A rejection is part of
   * the returned verdict; nothing is cached or written to history.
   */
  async explain(requestText: string, kind = 'select', options: RequestOptions = {}): Promise<Explanation> {
    const request = requestText.trim();
    if (!request) {
      throw invalidRequest('Request text is empty.');
    }
    const intent = parseIntent(kind);
    const handle = this.connections.activeHandle();
    const { candidate, snapshot } = await this.compile(request, intent, handle, options.signal);
    const verdict = this.validator.validate(candidate, snapshot, { expectedKind: intent });
    this.logger.debug({ accepted: verdict.accepted, sql: candidate.sql }, 'request explained');
    return {
      requestText: request,
      kind: candidate.kind,
      sql: candidate.sql,
      params: candidate.params,
      tables: candidate.referencedTables,
      verdict,
      assumptions: candidate.model.assumptions,
      confidence: candidate.model.confidence,
    };
  }

  /** Table, column and key counts of the connected database */
  async summary(options: RequestOptions = {}): Promise<SchemaSummary> {
    const handle = this.connections.activeHandle();
    const snapshot = await this.schemaCache.getSnapshot(handle.connectionId, options.signal);
    return summarizeSchema(snapshot, handle.descriptor.engine);
  }

  // ── History ──────────────────────────────────────────────────────

  private historyTurns(): HistoryTurn[] {
    if (!this.history || this.settings.historyTail <= 0) return [];
    return this.history
      .tail(this.id, this.settings.historyTail)
      .filter((entry) => entry.outcome === 'accepted')
      .map((entry) => ({ requestText: entry.requestText, sql: entry.sql }));
  }

  private record(request: string, connectionId: string, result: QueryResult): void {
    this.history?.append({
      sessionId: this.id,
      connectionId,
      requestText: request,
      kind: result.kind,
      sql: result.sql,
      params: result.params,
      tables: result.tables,
      outcome: 'accepted',
      errorKind: null,
      errorMessage: null,
      summary: {
        rowCount: result.rowCount,
        affectedRows: result.affectedRows,
        truncated: result.truncated,
        fromCache: result.fromCache,
        executionMs: result.executionMs,
      },
    });
  }

  private recordFailure(request: string, connectionId: string | null, trace: RequestTrace, err: unknown): void {
    const kind: ErrorKind = isPipelineError(err) ? err.kind : 'ExecutionError';
    const rejected = isPipelineError(err) && err.isRejection;
    if (!rejected) {
      this.logger.error({ errorKind: kind, err: errorMessage(err) }, 'request failed');
    }

    const candidate = trace.candidate;
    this.history?.append({
      sessionId: this.id,
      connectionId,
      requestText: request,
      kind: candidate?.kind ?? null,
      sql: candidate?.sql ?? null,
      params: candidate?.params ?? [],
      tables: candidate?.referencedTables ?? [],
      outcome: rejected ? 'rejected' : 'failed',
      errorKind: kind,
      errorMessage: errorMessage(err),
      summary: null,
    });
  }

  listHistory(limit = 10): HistoryEntry[] {
    return this.history?.list({ sessionId: this.id, limit }) ?? [];
  }

  historyStats(): HistoryStats | null {
    return this.history?.stats(this.id) ?? null;
  }

  async suggestions(current?: string): Promise<Suggestions> {
    let tables: string[] = [];
    const { connectionId } = this.connections.status();
    if (connectionId) {
      tables = await this.schemaCache.listTables(connectionId);
    }
    if (!this.history) {
      return { suggestions: [], similar: [] };
    }
    return this.history.suggest(this.id, current, tables);
  }

  cacheStats(): { size: number; hits: number; misses: number } | null {
    return this.queryCache?.getStats() ?? null;
  }

  async close(): Promise<void> {
    await this.disconnect();
  }
}
