/**
 * Language model types for SQL generation.
 */

export type ParamType = 'string' | 'number' | 'boolean' | 'date' | 'timestamp' | 'null';

export interface LlmSqlPlan {
  /** Single SQL statement with $1-style placeholders */
  sql: string;
  /** Bound values, in placeholder order */
  params: Array<{
    name: string;
    type: ParamType;
    value: string | number | boolean | null;
  }>;
  /** Assumptions the model made about the request */
  assumptions: string[];
  /** Confidence score 0..1 */
  confidence: number;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  /** Aborted on compile timeout or caller cancellation */
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * The model is a fallible black box: text in, text out, no format guarantee.
 */
export interface LanguageModel {
  readonly id: string;
  complete(messages: readonly ChatMessage[], options: CompletionOptions): Promise<string>;
}
