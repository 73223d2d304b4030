/**
 * Safety validator: a pure function of candidate + snapshot.
 * Rejections are terminal; the pipeline surfaces them and stops.
 */

import type { SchemaSnapshot } from '../db/types.js';
import { RULES, lintWarnings } from './rules.js';
import type { CandidateStatement, ValidateOptions, Verdict } from './types.js';

export function validate(candidate: CandidateStatement, snapshot: SchemaSnapshot, options: ValidateOptions = {}): Verdict {
  for (const rule of RULES) {
    const violation = rule(candidate, snapshot, options.expectedKind);
    if (violation) {
      return { accepted: false, ...violation };
    }
  }
  return { accepted: true, warnings: lintWarnings(candidate, options.maxJoins) };
}

export class SafetyValidator {
  constructor(private readonly defaults: Omit<ValidateOptions, 'expectedKind'> = {}) {}

  validate(candidate: CandidateStatement, snapshot: SchemaSnapshot, options: ValidateOptions = {}): Verdict {
    return validate(candidate, snapshot, { ...this.defaults, ...options });
  }
}
