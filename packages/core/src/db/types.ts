/**
 * Database abstraction types for askdb.
 * Drivers for Postgres, MySQL and SQLite implement DbDriver.
 */

export type EngineKind = 'postgres' | 'mysql' | 'sqlite';

export const ENGINE_KINDS: readonly EngineKind[] = ['postgres', 'mysql', 'sqlite'];

export interface ConnectionDescriptor {
  engine: EngineKind;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  /** Path for file-based engines like SQLite */
  path?: string;
  /** Connection timeout in milliseconds */
  connectTimeoutMs?: number;
}

/** Parameter values the drivers bind natively */
export type SqlParam = string | number | boolean | null;

export type KeyRole = 'primary' | 'foreign' | 'unique' | 'none';

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  keyRole: KeyRole;
}

export interface TableInfo {
  name: string;
  schema?: string;
  columns: ColumnInfo[];
  rowCountEstimate?: number;
}

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface RunOptions {
  timeoutMs: number;
  /** Aborted on timeout or caller cancellation; drivers cancel server-side work */
  signal: AbortSignal;
}

export interface DriverResult {
  columns: string[];
  rows: Record<string, unknown>[];
  /** True when the statement produced a result set */
  reader: boolean;
  affectedRows: number;
}

/**
 * One live connection to one engine. Owned by the ConnectionManager;
 * callers never hold a driver directly.
 */
export interface DbDriver {
  readonly engine: EngineKind;

  open(): Promise<void>;
  close(): Promise<void>;

  /** Run one statement with canonical $n placeholders bound to params */
  run(sql: string, params: readonly SqlParam[], options: RunOptions): Promise<DriverResult>;

  /** Snapshot the current schema */
  introspect(): Promise<SchemaSnapshot>;

  serverVersion(): Promise<string>;
}
