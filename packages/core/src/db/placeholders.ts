/**
 * Canonical placeholder handling.
 *
 * Compiled statements carry Postgres-style `$1..$n` placeholders. This scanner
 * finds them outside string literals, quoted identifiers, dollar-quoted bodies
 * and comments, so each driver can bind values in its own positional form.
 */

import { invalidRequest } from '../errors.js';
import type { SqlParam } from './types.js';

export interface PlaceholderRef {
  /** 1-based parameter index */
  index: number;
  start: number;
  end: number;
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_$]/.test(ch);
}

function skipQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

export function findPlaceholders(sql: string): PlaceholderRef[] {
  const refs: PlaceholderRef[] = [];
  const n = sql.length;
  let i = 0;

  while (i < n) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'" || ch === '"' || ch === '`') {
      i = skipQuoted(sql, i, ch);
      continue;
    }
    if (ch === '-' && next === '-') {
      const nl = sql.indexOf('\n', i);
      i = nl === -1 ? n : nl + 1;
      continue;
    }
    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? n : close + 2;
      continue;
    }
    if (ch === '$' && !isIdentChar(sql[i - 1])) {
      if (isDigit(next)) {
        let j = i + 1;
        while (isDigit(sql[j])) j++;
        refs.push({ index: Number(sql.slice(i + 1, j)), start: i, end: j });
        i = j;
        continue;
      }
      const tag = /^\$[A-Za-z_]*\$/.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        i = close === -1 ? n : close + tag[0].length;
        continue;
      }
    }
    i++;
  }

  return refs;
}

function replaceRefs(sql: string, refs: PlaceholderRef[], render: (ref: PlaceholderRef) => string): string {
  let out = '';
  let cursor = 0;
  for (const ref of refs) {
    out += sql.slice(cursor, ref.start) + render(ref);
    cursor = ref.end;
  }
  return out + sql.slice(cursor);
}

/** Highest placeholder index used, 0 when none */
export function maxPlaceholderIndex(sql: string): number {
  return findPlaceholders(sql).reduce((max, ref) => Math.max(max, ref.index), 0);
}

/**
 * Rewrite `$n` into `?` and expand the value list in occurrence order
 * (MySQL and SQLite bind positionally; a reused `$1` binds twice).
 */
export function toPositional(sql: string, params: readonly SqlParam[]): { sql: string; values: SqlParam[] } {
  const refs = findPlaceholders(sql);
  const values: SqlParam[] = [];
  for (const ref of refs) {
    if (ref.index < 1 || ref.index > params.length) {
      throw invalidRequest(`Placeholder $${ref.index} has no bound parameter (${params.length} supplied).`);
    }
    values.push(params[ref.index - 1]);
  }
  return { sql: replaceRefs(sql, refs, () => '?'), values };
}

/** Rewrite `$n` into `:pn` named params, which every parser dialect accepts */
export function toNamed(sql: string): string {
  return replaceRefs(sql, findPlaceholders(sql), (ref) => `:p${ref.index}`);
}
