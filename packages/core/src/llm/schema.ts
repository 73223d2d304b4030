/**
 * Schema retrieval heuristic: selects relevant tables/columns
 * for the model prompt based on the user's request, within a token budget.
 */

import type { ColumnInfo, KeyRole, SchemaSnapshot, TableInfo } from '../db/types.js';

interface ScoredTable {
  table: TableInfo;
  score: number;
  scoredColumns: Array<{ col: ColumnInfo; score: number }>;
}

export interface SchemaSelection {
  /** Qualified names of the included tables, in prompt order */
  tables: string[];
  text: string;
  estimatedTokens: number;
}

/** Rough token count: four characters per token */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the request tokens.
 * Supports matching against underscore-separated parts too.
 */
export function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

export function qualifiedName(table: TableInfo): string {
  return table.schema ? `${table.schema}.${table.name}` : table.name;
}

function scoreTables(request: string, snapshot: SchemaSnapshot): ScoredTable[] {
  const tokens = tokenize(request);
  return snapshot.tables.map((table) => {
    let tableScore = scoreMatch(table.name, tokens);
    if (table.schema) {
      tableScore += scoreMatch(table.schema, tokens);
    }

    const scoredColumns = table.columns.map((col) => ({ col, score: scoreMatch(col.name, tokens) }));

    // Boost table score by its best column matches
    const colBoost = scoredColumns
      .map((sc) => sc.score)
      .sort((a, b) => b - a)
      .slice(0, 3)
      .reduce((sum, s) => sum + s, 0);

    return { table, score: tableScore + colBoost, scoredColumns };
  });
}

const KEY_MARKERS: Record<KeyRole, string> = { primary: ' PK', foreign: ' FK', unique: ' UNIQUE', none: '' };

function orderedColumns(entry: ScoredTable): ColumnInfo[] {
  // Primary keys first, then by score; ties keep declaration order
  return entry.scoredColumns
    .map((sc, index) => ({ ...sc, index }))
    .sort((a, b) => {
      const aPk = a.col.keyRole === 'primary';
      const bPk = b.col.keyRole === 'primary';
      if (aPk !== bPk) return aPk ? -1 : 1;
      if (b.score !== a.score) return b.score - a.score;
      return a.index - b.index;
    })
    .map((sc) => sc.col);
}

function renderTable(table: TableInfo, columns: ColumnInfo[], omitted: number): string {
  const rows = table.rowCountEstimate !== undefined ? ` -- ~${table.rowCountEstimate} rows` : '';
  const lines = [`TABLE ${qualifiedName(table)}${rows}`];
  for (const col of columns) {
    const nullable = col.nullable ? ' NULL' : ' NOT NULL';
    lines.push(`  ${col.name} ${col.dataType}${nullable}${KEY_MARKERS[col.keyRole]}`);
  }
  if (omitted > 0) {
    lines.push(`  -- ${omitted} more columns omitted`);
  }
  return lines.join('\n') + '\n';
}

/** Largest column prefix whose rendering fits `budget`; at least one column */
function truncatedBlock(table: TableInfo, columns: ColumnInfo[], budget: number): string {
  for (let keep = columns.length - 1; keep > 1; keep--) {
    const block = renderTable(table, columns.slice(0, keep), columns.length - keep);
    if (estimateTokens(block) <= budget) return block;
  }
  return renderTable(table, columns.slice(0, 1), Math.max(0, columns.length - 1));
}

/**
 * Pick the tables to show the model. Matching tables go in by descending
 * score until the budget runs out; with no match at all, every table is a
 * candidate in name order. The first candidate is always included, with its
 * columns cut down if it alone exceeds the budget.
 */
export function selectSchemaContext(request: string, snapshot: SchemaSnapshot, tokenBudget: number): SchemaSelection {
  const scored = scoreTables(request, snapshot);
  const matching = scored.filter((s) => s.score > 0);
  const candidates =
    matching.length > 0
      ? matching.sort((a, b) => b.score - a.score || a.table.name.localeCompare(b.table.name))
      : scored.sort((a, b) => a.table.name.localeCompare(b.table.name));

  const blocks: string[] = [];
  const tables: string[] = [];
  let used = 0;

  for (const entry of candidates) {
    const columns = orderedColumns(entry);
    let block = renderTable(entry.table, columns, 0);
    let cost = estimateTokens(block);

    if (used + cost > tokenBudget) {
      if (blocks.length > 0) break;
      block = truncatedBlock(entry.table, columns, tokenBudget);
      cost = estimateTokens(block);
    }

    blocks.push(block);
    tables.push(qualifiedName(entry.table));
    used += cost;
  }

  const text = ['-- Database schema (relevant subset)', '', ...blocks].join('\n');
  return { tables, text, estimatedTokens: estimateTokens(text) };
}
