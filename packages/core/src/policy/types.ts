/**
 * Candidate statements and validation verdicts.
 *
 * The compiler produces a frozen CandidateStatement; the validator turns it
 * into a Verdict without touching the database.
 */

import type { RejectionKind } from '../errors.js';
import type { SqlParam } from '../db/types.js';
import type { Dialect } from './parse.js';

export type StatementKind = 'select' | 'insert' | 'update' | 'delete' | 'other';

export const PERMITTED_KINDS: readonly StatementKind[] = ['select', 'insert', 'update', 'delete'];

export type MutationKind = 'insert' | 'update' | 'delete';

export type SqlLiteral = { type: 'number'; value: number } | { type: 'string'; value: string };

/** Structural facts the lint heuristics read */
export interface StatementFeatures {
  selectStar: boolean;
  joinCount: number;
  leadingWildcardLike: boolean;
  hasLimit: boolean;
}

/** Everything structural parsing tells us about one SQL text */
export interface StatementAnalysis {
  kind: StatementKind;
  statementCount: number;
  /** Tables written by INSERT/UPDATE/DELETE; the FROM tables for SELECT */
  targetTables: string[];
  /** Every table the statement touches, CTE names excluded */
  referencedTables: string[];
  /** Columns referenced by the top-level WHERE clause */
  predicateColumns: string[];
  /** Literal values embedded in the text, LIMIT/OFFSET and intervals excluded */
  literals: SqlLiteral[];
  /** Calls to functions on the deny list, lower-cased */
  deniedFunctions: string[];
  features: StatementFeatures;
}

export interface ModelMetadata {
  modelId: string;
  retried: boolean;
  assumptions: string[];
  confidence: number | null;
}

export interface CandidateStatement extends Readonly<StatementAnalysis> {
  readonly requestText: string;
  /** SQL with canonical `$1..$n` placeholders */
  readonly sql: string;
  readonly params: readonly SqlParam[];
  readonly dialect: Dialect;
  readonly model: ModelMetadata;
}

export interface AcceptedVerdict {
  accepted: true;
  /** Non-blocking lint findings */
  warnings: string[];
}

export interface RejectedVerdict {
  accepted: false;
  reason: RejectionKind;
  message: string;
  suggestedFix?: string;
}

export type Verdict = AcceptedVerdict | RejectedVerdict;

export interface ValidateOptions {
  /** Kind the caller asked for (`query` expects select, `mutate` its mutation kind) */
  expectedKind?: StatementKind;
  /** JOIN count above which an accepted SELECT carries a warning. Default: 6 */
  maxJoins?: number;
}
