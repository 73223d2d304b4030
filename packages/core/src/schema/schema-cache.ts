/**
 * Per-connection schema snapshots, introspected lazily and memoized.
 * Concurrent first calls for one identity share a single introspection.
 */

import { connectionInactive, isPipelineError, rejection } from '../errors.js';
import type { ConnectionHandle, ConnectionManager } from '../db/connection-manager.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { EngineKind, SchemaSnapshot, TableInfo } from '../db/types.js';
import type { Logger } from '../utils/logger.js';

export interface SchemaCacheOptions {
  /** Introspection timeout */
  timeoutMs?: number;
  logger?: Logger;
}

function freezeSnapshot(snapshot: SchemaSnapshot): SchemaSnapshot {
  const copy: SchemaSnapshot = {
    tables: snapshot.tables.map((table) => ({ ...table, columns: table.columns.map((col) => ({ ...col })) })),
    capturedAt: snapshot.capturedAt,
  };
  for (const table of copy.tables) {
    table.columns.forEach((col) => Object.freeze(col));
    Object.freeze(table.columns);
    Object.freeze(table);
  }
  Object.freeze(copy.tables);
  return Object.freeze(copy);
}

export class SchemaCache {
  private readonly snapshots = new Map<string, SchemaSnapshot>();
  private readonly inflight = new Map<string, Promise<SchemaSnapshot>>();
  /** Bumped on invalidate so an introspection started earlier is not stored */
  private readonly generations = new Map<string, number>();
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    private readonly connections: ConnectionManager,
    options: SchemaCacheOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? SAFE_DEFAULTS.executionTimeoutMs;
    this.logger = options.logger;
  }

  private liveHandle(connectionId: string): ConnectionHandle {
    const status = this.connections.status();
    if (!status.connected || status.connectionId !== connectionId) {
      throw connectionInactive(`No live connection matches ${connectionId.slice(0, 12)}.`);
    }
    return this.connections.activeHandle();
  }

  async getSnapshot(connectionId: string, signal?: AbortSignal): Promise<SchemaSnapshot> {
    const handle = this.liveHandle(connectionId);

    const cached = this.snapshots.get(connectionId);
    if (cached) return cached;

    const pending = this.inflight.get(connectionId);
    if (pending) {
      return pending.catch((error: unknown) => {
        // only the caller that started the introspection cancelled it
        if (isPipelineError(error) && error.kind === 'Cancelled' && !signal?.aborted) {
          return this.getSnapshot(connectionId, signal);
        }
        throw error;
      });
    }

    const generation = this.generations.get(connectionId) ?? 0;
    const task: Promise<SchemaSnapshot> = this.connections
      .introspect(handle, { timeoutMs: this.timeoutMs, signal })
      .then((snapshot) => {
        const frozen = freezeSnapshot(snapshot);
        if ((this.generations.get(connectionId) ?? 0) === generation) {
          this.snapshots.set(connectionId, frozen);
          this.logger?.debug({ connectionId, tables: frozen.tables.length }, 'schema snapshot captured');
        }
        return frozen;
      })
      .finally(() => {
        if (this.inflight.get(connectionId) === task) {
          this.inflight.delete(connectionId);
        }
      });

    this.inflight.set(connectionId, task);
    return task;
  }

  invalidate(connectionId: string): void {
    this.generations.set(connectionId, (this.generations.get(connectionId) ?? 0) + 1);
    this.snapshots.delete(connectionId);
    this.inflight.delete(connectionId);
    this.logger?.debug({ connectionId }, 'schema snapshot invalidated');
  }

  async listTables(connectionId: string, signal?: AbortSignal): Promise<string[]> {
    const snapshot = await this.getSnapshot(connectionId, signal);
    return snapshot.tables.map((table) => table.name);
  }

  /** Case-insensitive lookup by bare or schema-qualified name */
  async describeTable(connectionId: string, name: string, signal?: AbortSignal): Promise<TableInfo> {
    const snapshot = await this.getSnapshot(connectionId, signal);
    const table = findTable(snapshot, name);
    if (!table) {
      throw rejection('UnknownTable', `Table "${name}" does not exist in the current schema.`);
    }
    return table;
  }
}

export function findTable(snapshot: SchemaSnapshot, name: string): TableInfo | undefined {
  const wanted = name.trim().toLowerCase();
  return snapshot.tables.find((table) => {
    const bare = table.name.toLowerCase();
    return bare === wanted || (table.schema !== undefined && `${table.schema.toLowerCase()}.${bare}` === wanted);
  });
}

export interface TableSummary {
  name: string;
  schema?: string;
  columnCount: number;
  primaryKey: string[];
  foreignKeys: string[];
}

export interface SchemaSummary {
  engine: EngineKind;
  tableCount: number;
  columnCount: number;
  foreignKeyCount: number;
  tables: TableSummary[];
}

/** Counts drawn from the snapshot; each column carries one key role, primary first */
export function summarizeSchema(snapshot: SchemaSnapshot, engine: EngineKind): SchemaSummary {
  const tables = snapshot.tables.map((table): TableSummary => {
    const named = (role: string) => table.columns.filter((col) => col.keyRole === role).map((col) => col.name);
    return {
      name: table.name,
      ...(table.schema !== undefined && { schema: table.schema }),
      columnCount: table.columns.length,
      primaryKey: named('primary'),
      foreignKeys: named('foreign'),
    };
  });
  return {
    engine,
    tableCount: tables.length,
    columnCount: tables.reduce((sum, table) => sum + table.columnCount, 0),
    foreignKeyCount: tables.reduce((sum, table) => sum + table.foreignKeys.length, 0),
    tables,
  };
}
