/**
 * Tool boundary: session operations as plain, snake_case payloads.
 * Handlers never throw; failures come back as { error_kind, message }.
 */

import type { ConnectionStatus } from './db/connection-manager.js';
import { parseDescriptor } from './db/descriptor.js';
import type { ConnectionDescriptor, SqlParam, TableInfo } from './db/types.js';
import { toErrorPayload, type ErrorPayload } from './errors.js';
import type { QueryResult } from './executor.js';
import type { SchemaSummary } from './schema/schema-cache.js';
import type { Explanation, Session } from './session.js';
import type { HistoryEntry, Suggestions } from './storage/history.js';

export interface ConnectPayload {
  connected: boolean;
  detail: string;
}

export interface StatusPayload {
  connected: boolean;
  engine: string | null;
  host: string | null;
  database: string | null;
}

export interface ColumnPayload {
  column: string;
  type: string;
  nullable: boolean;
  key_role: string;
}

export interface QueryPayload {
  sql: string;
  rows: Array<Record<string, unknown>>;
  row_count: number;
  truncated: boolean;
  from_cache: boolean;
  execution_ms: number;
}

export interface MutatePayload {
  sql: string;
  affected_rows: number;
}

export interface HistoryItemPayload {
  seq: number;
  request_text: string;
  sql: string | null;
  outcome: string;
  error_kind: string | null;
  row_count: number | null;
  execution_ms: number | null;
  created_at: string;
}

export interface SuggestPayload {
  suggestions: string[];
  similar: Array<{ seq: number; request_text: string; sql: string | null }>;
}

export interface ExplainPayload {
  sql: string;
  params: SqlParam[];
  kind: string;
  tables: string[];
  accepted: boolean;
  rejection: { kind: string; message: string; suggested_fix: string | null } | null;
  warnings: string[];
  assumptions: string[];
}

export interface SummaryPayload {
  engine: string;
  table_count: number;
  column_count: number;
  foreign_key_count: number;
  tables: Array<{ name: string; schema: string | null; column_count: number; primary_key: string[]; foreign_keys: string[] }>;
}

export type ToolResult<T> = T | ErrorPayload;

export function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null && 'error_kind' in value && 'message' in value;
}

async function guard<T>(fn: () => Promise<T>): Promise<ToolResult<T>> {
  try {
    return await fn();
  } catch (err: unknown) {
    return toErrorPayload(err);
  }
}

/** Where a descriptor points, for humans: host/database or the file path */
export function describeTarget(descriptor: ConnectionDescriptor): string {
  if (descriptor.engine === 'sqlite') {
    return descriptor.path ?? '(no path)';
  }
  const port = descriptor.port ? `:${descriptor.port}` : '';
  return `${descriptor.host ?? 'localhost'}${port}/${descriptor.database ?? ''}`;
}

export function toStatusPayload(status: ConnectionStatus): StatusPayload {
  const { connected, descriptor } = status;
  if (!descriptor) {
    return { connected, engine: null, host: null, database: null };
  }
  const fileBased = descriptor.engine === 'sqlite';
  return {
    connected,
    engine: descriptor.engine,
    host: fileBased ? null : (descriptor.host ?? 'localhost'),
    database: fileBased ? (descriptor.path ?? null) : (descriptor.database ?? null),
  };
}

export function toColumnPayloads(table: TableInfo): ColumnPayload[] {
  return table.columns.map((col) => ({
    column: col.name,
    type: col.dataType,
    nullable: col.nullable,
    key_role: col.keyRole,
  }));
}

export function toQueryPayload(result: QueryResult): QueryPayload {
  return {
    sql: result.sql,
    rows: result.rows.map((row) => ({ ...row })),
    row_count: result.rowCount,
    truncated: result.truncated,
    from_cache: result.fromCache,
    execution_ms: result.executionMs,
  };
}

export function toMutatePayload(result: QueryResult): MutatePayload {
  return { sql: result.sql, affected_rows: result.affectedRows };
}

export function toHistoryPayload(entry: HistoryEntry): HistoryItemPayload {
  return {
    seq: entry.seq,
    request_text: entry.requestText,
    sql: entry.sql,
    outcome: entry.outcome,
    error_kind: entry.errorKind,
    row_count: entry.summary?.rowCount ?? null,
    execution_ms: entry.summary?.executionMs ?? null,
    created_at: entry.createdAt,
  };
}

export function toSuggestPayload({ suggestions, similar }: Suggestions): SuggestPayload {
  return {
    suggestions,
    similar: similar.map((entry) => ({ seq: entry.seq, request_text: entry.requestText, sql: entry.sql })),
  };
}

export function toExplainPayload(explanation: Explanation): ExplainPayload {
  const { verdict } = explanation;
  return {
    sql: explanation.sql,
    params: [...explanation.params],
    kind: explanation.kind,
    tables: [...explanation.tables],
    accepted: verdict.accepted,
    rejection: verdict.accepted
      ? null
      : { kind: verdict.reason, message: verdict.message, suggested_fix: verdict.suggestedFix ?? null },
    warnings: verdict.accepted ? verdict.warnings : [],
    assumptions: explanation.assumptions,
  };
}

export function toSummaryPayload(summary: SchemaSummary): SummaryPayload {
  return {
    engine: summary.engine,
    table_count: summary.tableCount,
    column_count: summary.columnCount,
    foreign_key_count: summary.foreignKeyCount,
    tables: summary.tables.map((table) => ({
      name: table.name,
      schema: table.schema ?? null,
      column_count: table.columnCount,
      primary_key: table.primaryKey,
      foreign_keys: table.foreignKeys,
    })),
  };
}

export interface Tools {
  /** Takes untyped input; the descriptor is validated before anything is torn down */
  connect(descriptor: unknown): Promise<ToolResult<ConnectPayload>>;
  disconnect(): Promise<ToolResult<{ ok: true }>>;
  status(): Promise<ToolResult<StatusPayload>>;
  list_tables(): Promise<ToolResult<string[]>>;
  describe_table(name: string): Promise<ToolResult<ColumnPayload[]>>;
  query(requestText: string): Promise<ToolResult<QueryPayload>>;
  mutate(requestText: string, kind: string): Promise<ToolResult<MutatePayload>>;
  /** Compile and validate only */
  explain(requestText: string, kind?: string): Promise<ToolResult<ExplainPayload>>;
  summary(): Promise<ToolResult<SummaryPayload>>;
  history(limit?: number): Promise<ToolResult<HistoryItemPayload[]>>;
  suggest(current?: string): Promise<ToolResult<SuggestPayload>>;
}

export function createTools(session: Session): Tools {
  return {
    connect: (input) =>
      guard(async () => {
        const descriptor = parseDescriptor(input);
        const handle = await session.connect(descriptor);
        return {
          connected: true,
          detail: `Connected to ${descriptor.engine} at ${describeTarget(handle.descriptor)} (${handle.serverVersion})`,
        };
      }),

    disconnect: () =>
      guard(async () => {
        await session.disconnect();
        return { ok: true as const };
      }),

    status: () => guard(async () => toStatusPayload(session.status())),

    list_tables: () => guard(() => session.listTables()),

    describe_table: (name) => guard(async () => toColumnPayloads(await session.describeTable(name))),

    query: (requestText) => guard(async () => toQueryPayload(await session.query(requestText))),

    mutate: (requestText, kind) => guard(async () => toMutatePayload(await session.mutate(requestText, kind))),

    explain: (requestText, kind) => guard(async () => toExplainPayload(await session.explain(requestText, kind))),

    summary: () => guard(async () => toSummaryPayload(await session.summary())),

    history: (limit = 10) => guard(async () => session.listHistory(limit).map(toHistoryPayload)),

    suggest: (current) => guard(async () => toSuggestPayload(await session.suggestions(current))),
  };
}
