/**
 * AST-based SQL parser for the safety pipeline.
 * Uses node-sql-parser; every structural fact the validator relies on comes from here.
 *
 * Canonical `$n` placeholders are rewritten to `:pn` named params before parsing,
 * since that form reads the same in every parser dialect.
 */

import pkg from 'node-sql-parser';
import { toNamed } from '../db/placeholders.js';
import type { EngineKind } from '../db/types.js';

const { Parser } = pkg;

const parser = new Parser();

export type Dialect = EngineKind;

/**
 * SQLite goes through the PostgreSQL grammar: both quote identifiers with
 * double quotes and share the function-call syntax models emit for dates.
 */
export function parserOptions(dialect: Dialect): { database: string } {
  return { database: dialect === 'mysql' ? 'MySQL' : 'PostgresQL' };
}

export interface ParsedSql {
  /** One AST per statement, in source order */
  statements: unknown[];
  /** `kind::schema::table` entries reported by the parser */
  tableList: string[];
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export type ParseOutcome = ({ ok: true } & ParsedSql) | { ok: false; error: string };

export function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/(?:;\s*)+$/, '').trim();
}

export function parseSql(sql: string, dialect: Dialect): ParseOutcome {
  const normalizedSql = stripTrailingSemicolons(sql);

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const result = parser.parse(toNamed(normalizedSql), parserOptions(dialect));
    const statements: unknown[] = Array.isArray(result.ast) ? result.ast : [result.ast];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    return { ok: true, statements, tableList: result.tableList, normalizedSql };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}
