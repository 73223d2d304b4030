/**
 * SQL rewriter for row ceilings.
 *
 * The LIMIT is appended to the original text rather than re-rendered from the
 * AST, so the statement keeps its dialect quoting and `$n` placeholders.
 */

import { stripTrailingSemicolons } from './parse.js';

export interface LimitRewrite {
  sql: string;
  limitApplied: boolean;
}

/**
 * Append `LIMIT <limit>` to a SELECT that has none. The clause goes on its own
 * line so a trailing `--` comment cannot swallow it.
 */
export function ensureLimit(sql: string, hasLimit: boolean, limit: number): LimitRewrite {
  const trimmed = stripTrailingSemicolons(sql);
  if (hasLimit) {
    return { sql: trimmed, limitApplied: false };
  }
  return { sql: `${trimmed}\nLIMIT ${limit}`, limitApplied: true };
}
