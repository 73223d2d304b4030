/**
 * Typed failure taxonomy for the askdb pipeline.
 * Every failure path surfaces one of these kinds; nothing is downgraded to an empty result.
 */

export type RejectionKind =
  | 'DisallowedStatementKind'
  | 'MissingFilterPredicate'
  | 'UnknownTable'
  | 'UnparameterizedLiteral';

export type ErrorKind =
  | RejectionKind
  | 'ConnectionError'
  | 'ConnectionInactive'
  | 'CompilationError'
  | 'ExecutionError'
  | 'EngineRejected'
  | 'Timeout'
  | 'Busy'
  | 'Cancelled'
  | 'InvalidRequest';

const REJECTION_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'DisallowedStatementKind',
  'MissingFilterPredicate',
  'UnknownTable',
  'UnparameterizedLiteral',
]);

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.details = details;
  }

  /** Validator rejections: terminal, never retried */
  get isRejection(): boolean {
    return REJECTION_KINDS.has(this.kind);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isRejectionKind(kind: ErrorKind): kind is RejectionKind {
  return REJECTION_KINDS.has(kind);
}

export function connectionError(message: string, details?: unknown): PipelineError {
  return new PipelineError('ConnectionError', message, details);
}

export function connectionInactive(message = 'No active database connection. Call connect first.'): PipelineError {
  return new PipelineError('ConnectionInactive', message);
}

export function compilationError(message: string, details?: unknown): PipelineError {
  return new PipelineError('CompilationError', message, details);
}

export function rejection(kind: RejectionKind, message: string, details?: unknown): PipelineError {
  return new PipelineError(kind, message, details);
}

export function engineRejected(message: string, details?: unknown): PipelineError {
  return new PipelineError('EngineRejected', message, details);
}

export function executionError(message: string, details?: unknown): PipelineError {
  return new PipelineError('ExecutionError', message, details);
}

export function timeoutError(phase: 'compile' | 'execute' | 'connect', timeoutMs: number): PipelineError {
  return new PipelineError('Timeout', `The ${phase} phase exceeded its ${timeoutMs}ms timeout.`, { phase, timeoutMs });
}

export function cancelledError(phase: 'compile' | 'execute' | 'connect'): PipelineError {
  return new PipelineError('Cancelled', `The request was cancelled during the ${phase} phase.`, { phase });
}

export function busyError(): PipelineError {
  return new PipelineError('Busy', 'Another statement is already running on this connection.');
}

export function invalidRequest(message: string): PipelineError {
  return new PipelineError('InvalidRequest', message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wire form used by the tool boundary. */
export interface ErrorPayload {
  error_kind: ErrorKind;
  message: string;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (isPipelineError(error)) {
    return { error_kind: error.kind, message: error.message };
  }
  return { error_kind: 'ExecutionError', message: errorMessage(error) };
}
