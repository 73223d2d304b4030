/**
 * Shared test fixtures: a throwaway SQLite shop database and a scripted
 * language model that replays canned answers.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { ColumnInfo, SqlParam, SchemaSnapshot, TableInfo } from '../db/types.js';
import { analyzeStatement } from '../policy/classify.js';
import type { Dialect } from '../policy/parse.js';
import type { CandidateStatement } from '../policy/types.js';
import type { ChatMessage, CompletionOptions, LanguageModel, ParamType } from '../llm/types.js';

export interface ShopDb {
  path: string;
  cleanup(): void;
}

/**
 * customers(id PK, email UNIQUE, full_name) and orders(id PK, customer_id FK,
 * status, total_cents, created_at). Orders 455 and 456 are years old, 457 is recent.
 */
export function createShopDb(): ShopDb {
  const dir = mkdtempSync(join(tmpdir(), 'askdb-test-'));
  const path = join(dir, 'shop.sqlite');
  const db = new Database(path);
  db.exec(`
    CREATE TABLE customers (
      id INTEGER PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      full_name TEXT NOT NULL
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL REFERENCES customers(id),
      status TEXT NOT NULL,
      total_cents INTEGER NOT NULL,
      note TEXT,
      created_at TEXT NOT NULL
    );
    INSERT INTO customers (id, email, full_name) VALUES
      (1, 'alice@example.com', 'Alice Nguyen'),
      (2, 'bob@example.com', 'Bob Okafor');
    INSERT INTO orders (id, customer_id, status, total_cents, note, created_at) VALUES
      (455, 1, 'paid', 1200, NULL, '2015-03-01'),
      (456, 1, 'pending', 3400, 'gift wrap', '2016-07-20'),
      (457, 2, 'paid', 990, NULL, date('now', '-10 days'));
  `);
  db.close();
  return {
    path,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export type ScriptStep =
  | string
  | Error
  | ((messages: readonly ChatMessage[], options: CompletionOptions) => Promise<string>);

/** Replays `steps` in order, one per completion call, and records every call */
export class ScriptedModel implements LanguageModel {
  readonly id = 'scripted-model';
  readonly calls: ChatMessage[][] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  push(...steps: ScriptStep[]): void {
    this.steps.push(...steps);
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push([...messages]);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedModel ran out of responses');
    }
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(messages, options);
    return step;
  }
}

/** A completion that only settles when its signal aborts */
export const hangUntilAborted: ScriptStep = (_messages, options) =>
  new Promise<string>((_resolve, reject) => {
    options.signal.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
  });

function paramType(value: SqlParam): ParamType {
  if (value === null) return 'null';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return 'string';
}

/** JSON plan text in the shape the prompt asks the model for */
export function plan(sql: string, params: SqlParam[] = [], assumptions: string[] = []): string {
  return JSON.stringify({
    sql,
    params: params.map((value, i) => ({ name: `p${i + 1}`, type: paramType(value), value })),
    assumptions,
    confidence: 0.9,
  });
}

export function candidateFor(
  sql: string,
  params: SqlParam[],
  requestText: string,
  dialect: Dialect = 'postgres',
): CandidateStatement {
  const outcome = analyzeStatement(sql, params, dialect);
  if (!outcome.ok) {
    throw new Error(outcome.error);
  }
  return Object.freeze({
    ...outcome.analysis,
    requestText,
    sql,
    params,
    dialect,
    model: { modelId: 'test', retried: false, assumptions: [], confidence: null },
  });
}

export function table(name: string, columns: string[], schema?: string): TableInfo {
  return {
    name,
    ...(schema !== undefined && { schema }),
    columns: columns.map((col, i): ColumnInfo => ({
      name: col,
      dataType: i === 0 ? 'integer' : 'text',
      nullable: i !== 0,
      keyRole: i === 0 ? 'primary' : 'none',
    })),
  };
}

export function snapshotOf(...tables: TableInfo[]): SchemaSnapshot {
  return { tables, capturedAt: new Date('2026-01-01T00:00:00Z') };
}
