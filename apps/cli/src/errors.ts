import { ZodError } from 'zod';
import { isPipelineError, type ErrorKind } from '@askdb/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'INVALID_CONFIG'
  | 'NO_CONNECTION'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'POLICY_BLOCKED'
  | 'COMPILE_FAILED'
  | 'TIMEOUT'
  | 'BUSY'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

const RUNTIME_CODES: Partial<Record<ErrorKind, CliErrorCode>> = {
  ConnectionError: 'DB_CONN_FAILED',
  ConnectionInactive: 'NO_CONNECTION',
  CompilationError: 'COMPILE_FAILED',
  Timeout: 'TIMEOUT',
  Busy: 'BUSY',
  Cancelled: 'CANCELLED',
};

/** Map pipeline and configuration failures onto CLI error kinds */
export function toCliError(error: unknown): CliError | null {
  if (error instanceof CliError) return error;
  if (error instanceof ZodError) {
    const fields = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return usageError(`Invalid configuration: ${fields}`, 'INVALID_CONFIG');
  }
  if (!isPipelineError(error)) return null;

  const details = { errorKind: error.kind, details: error.details };
  if (error.isRejection) {
    return policyError(error.message, details);
  }
  if (error.kind === 'InvalidRequest') {
    return usageError(error.message, 'INVALID_ARGS', details);
  }
  return runtimeError(error.message, RUNTIME_CODES[error.kind] ?? 'DB_QUERY_FAILED', details);
}

export function toExitCode(error: unknown): number {
  const cliError = toCliError(error);
  if (cliError) {
    if (cliError.kind === 'usage') return EXIT_CODE_USAGE;
    if (cliError.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
