/**
 * Validation rules for candidate statements.
 *
 * Every rule reads the facts extracted from the parsed AST, never the raw SQL
 * text. Rules return a structured violation with a reason code and suggested fix.
 */

import type { RejectionKind } from '../errors.js';
import type { SchemaSnapshot } from '../db/types.js';
import { PERMITTED_KINDS, type CandidateStatement, type StatementKind } from './types.js';

export interface RuleViolation {
  reason: RejectionKind;
  message: string;
  suggestedFix?: string;
}

export type Rule = (candidate: CandidateStatement, snapshot: SchemaSnapshot, expectedKind?: StatementKind) => RuleViolation | null;

/** Rule 1: one statement, of a permitted kind, matching what the caller asked for, calling no denied function */
export const permittedKind: Rule = (candidate, _snapshot, expectedKind) => {
  if (!PERMITTED_KINDS.includes(candidate.kind)) {
    return {
      reason: 'DisallowedStatementKind',
      message: 'Only SELECT, INSERT, UPDATE and DELETE statements may run. DDL and administrative commands are blocked.',
    };
  }
  if (candidate.statementCount !== 1) {
    return {
      reason: 'DisallowedStatementKind',
      message: `Multiple statements detected (${candidate.statementCount}). Only single statements are allowed.`,
      suggestedFix: 'Split the request into separate questions.',
    };
  }
  if (expectedKind && candidate.kind !== expectedKind) {
    return {
      reason: 'DisallowedStatementKind',
      message: `Expected a ${expectedKind.toUpperCase()} statement, but the compiled SQL is ${candidate.kind.toUpperCase()}.`,
      suggestedFix:
        expectedKind === 'select' ? 'Use mutate for requests that change data.' : 'Rephrase the request so it describes that change.',
    };
  }
  const [denied] = candidate.deniedFunctions;
  if (denied !== undefined) {
    return {
      reason: 'DisallowedStatementKind',
      message: `Function ${denied}() is not allowed; it acts on the server beyond reading or changing rows.`,
    };
  }
  return null;
};

/** Rule 2: UPDATE/DELETE need a WHERE predicate that references a column */
export const filterPredicate: Rule = (candidate) => {
  if (candidate.kind !== 'update' && candidate.kind !== 'delete') return null;
  if (candidate.predicateColumns.length > 0) return null;
  return {
    reason: 'MissingFilterPredicate',
    message: `${candidate.kind.toUpperCase()} without a WHERE clause on a column would affect every row.`,
    suggestedFix: 'Say which rows to change, for example by id or by date.',
  };
};

function knownTableNames(snapshot: SchemaSnapshot): { qualified: Set<string>; bare: Set<string>; unscoped: Set<string> } {
  const qualified = new Set<string>();
  const bare = new Set<string>();
  const unscoped = new Set<string>();
  for (const table of snapshot.tables) {
    const name = table.name.toLowerCase();
    bare.add(name);
    if (table.schema) {
      qualified.add(`${table.schema.toLowerCase()}.${name}`);
    } else {
      unscoped.add(name);
    }
  }
  return { qualified, bare, unscoped };
}

/** Rule 3: every referenced table exists in the snapshot */
export const knownTables: Rule = (candidate, snapshot) => {
  const known = knownTableNames(snapshot);
  for (const table of candidate.referencedTables) {
    const lower = table.toLowerCase();
    const dot = lower.lastIndexOf('.');
    const exists =
      dot === -1 ? known.bare.has(lower) : known.qualified.has(lower) || known.unscoped.has(lower.slice(dot + 1));
    if (!exists) {
      return {
        reason: 'UnknownTable',
        message: `Table "${table}" does not exist in the current schema.`,
        suggestedFix: 'Check the table name with list_tables, or refresh the schema if it was just created.',
      };
    }
  }
  return null;
};

function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function requestNumbers(request: string): Set<number> {
  const numbers = new Set<number>();
  // a leading minus may be a sign or a range dash, so keep both readings
  for (const match of request.matchAll(/-?\d+(?:\.\d+)?/g)) {
    const value = Number(match[0]);
    numbers.add(value);
    numbers.add(Math.abs(value));
  }
  return numbers;
}

/** True when `phrase` appears in `text` with no word character on either side */
function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`(^|[^a-z0-9_])${escapeRegExp(phrase)}($|[^a-z0-9_])`).test(text);
}

/** Rule 4: values taken from the request must be bound, not embedded */
export const parameterizedLiterals: Rule = (candidate) => {
  const request = normalizeText(candidate.requestText);
  const numbers = requestNumbers(request);

  for (const literal of candidate.literals) {
    if (literal.type === 'number') {
      if (numbers.has(literal.value)) {
        return unparameterized(String(literal.value));
      }
      continue;
    }
    // LIKE wildcards wrap the value; the value itself is what must be bound
    const phrase = normalizeText(literal.value.replace(/^%+|%+$/g, ''));
    if (phrase.length >= 2 && containsPhrase(request, phrase)) {
      return unparameterized(`'${literal.value}'`);
    }
  }
  return null;
};

function unparameterized(literal: string): RuleViolation {
  return {
    reason: 'UnparameterizedLiteral',
    message: `The value ${literal} from the request is embedded in the SQL text instead of being bound as a parameter.`,
    suggestedFix: 'Retry the request; values must be passed as $n placeholders.',
  };
}

/** Rules in evaluation order; the first violation wins */
export const RULES: readonly Rule[] = [permittedKind, filterPredicate, knownTables, parameterizedLiterals];

export const DEFAULT_MAX_JOINS = 6;

/** Non-blocking findings attached to an accepted verdict */
export function lintWarnings(candidate: CandidateStatement, maxJoins = DEFAULT_MAX_JOINS): string[] {
  const warnings: string[] = [];
  const { features } = candidate;

  if (candidate.kind === 'select' && features.selectStar) {
    warnings.push('SELECT * returns every column; naming the needed columns is cheaper.');
  }
  if (features.joinCount > maxJoins) {
    warnings.push(`Query has ${features.joinCount} joins, more than ${maxJoins}.`);
  }
  if (features.leadingWildcardLike) {
    warnings.push('LIKE pattern starts with a wildcard and cannot use an index.');
  }
  if (candidate.kind === 'select' && !features.hasLimit) {
    warnings.push('SELECT has no LIMIT; the result is capped at the row ceiling.');
  }
  return warnings;
}
