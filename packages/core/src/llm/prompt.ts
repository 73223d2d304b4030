/**
 * Prompt construction for SQL generation.
 * Deterministic: the same request, snapshot and history always give the same messages.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { SchemaSnapshot } from '../db/types.js';
import type { Dialect } from '../policy/parse.js';
import type { MutationKind } from '../policy/types.js';
import { estimateTokens, selectSchemaContext } from './schema.js';
import type { ChatMessage } from './types.js';

/** What the caller wants the statement to do */
export type Intent = 'select' | MutationKind;

/** A prior request and the SQL it compiled to */
export interface HistoryTurn {
  requestText: string;
  sql: string | null;
}

export interface PromptInput {
  request: string;
  snapshot: SchemaSnapshot;
  historyTail: readonly HistoryTurn[];
  dialect: Dialect;
  intent: Intent;
}

export interface Prompt {
  readonly request: string;
  readonly dialect: Dialect;
  readonly intent: Intent;
  readonly messages: readonly ChatMessage[];
  /** Tables included in the schema section */
  readonly tables: readonly string[];
  readonly estimatedTokens: number;
}

export interface PromptBuilderOptions {
  /** Token budget for the schema section */
  tokenBudget?: number;
  /** How many history turns to include */
  historyTail?: number;
}

const JSON_FORMAT_INSTRUCTIONS = `You must respond with ONLY a JSON object matching this exact schema:
{
  "sql": "<single SQL statement with $1, $2 etc. placeholders>",
  "params": [{"name": "<param_name>", "type": "<string|number|boolean|date|timestamp|null>", "value": <literal>}],
  "assumptions": ["<assumption 1>", ...],
  "confidence": <0.0 to 1.0>
}

Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

const DIALECT_NAMES: Record<Dialect, string> = {
  postgres: 'PostgreSQL',
  mysql: 'MySQL',
  sqlite: 'SQLite',
};

const DATE_HINTS: Record<Dialect, string> = {
  postgres: "For relative dates use NOW() - INTERVAL '<n> <unit>'.",
  mysql: 'For relative dates use DATE_SUB(NOW(), INTERVAL <n> <UNIT>).',
  sqlite: "For relative dates use date('now', '-<n> <unit>').",
};

function intentConstraint(intent: Intent): string {
  switch (intent) {
    case 'select':
      return 'You MUST generate only a SELECT statement (a WITH ... SELECT is fine). Never modify data.';
    case 'insert':
      return 'You MUST generate exactly one INSERT statement.';
    case 'update':
      return 'You MUST generate exactly one UPDATE statement with a WHERE clause that identifies the rows to change.';
    case 'delete':
      return 'You MUST generate exactly one DELETE statement with a WHERE clause that identifies the rows to remove.';
  }
}

function historySection(turns: readonly HistoryTurn[]): string {
  const lines = ['Previous requests in this session (oldest first):'];
  for (const turn of turns) {
    lines.push(`- Request: ${turn.requestText}`);
    lines.push(`  SQL: ${turn.sql ?? '(none)'}`);
  }
  return lines.join('\n');
}

export function buildMessages(
  input: Omit<PromptInput, 'snapshot' | 'historyTail'>,
  schemaContext: string,
  history: readonly HistoryTurn[],
): ChatMessage[] {
  const systemPrompt = `You are a SQL generator for ${DIALECT_NAMES[input.dialect]} databases.

CONSTRAINTS:
- Generate a SINGLE SQL statement only. Never multiple statements.
- ${intentConstraint(input.intent)}
- Never generate DDL (CREATE, ALTER, DROP, TRUNCATE) or administrative commands.
- Prefer explicit column lists over SELECT *.
- Every value taken from the request (ids, names, dates, amounts) MUST go into the params array and be referenced as $1, $2, etc. Never write such values into the SQL text.
- ${DATE_HINTS[input.dialect]}
- Do NOT reference tables not present in the provided schema.

${JSON_FORMAT_INSTRUCTIONS}`;

  const sections = [schemaContext];
  if (history.length > 0) {
    sections.push(historySection(history));
  }
  sections.push(`Request: ${input.request}`, 'Generate the SQL statement as a JSON object.');

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

/**
 * Build a repair prompt quoting why the first answer could not be used.
 */
export function buildRepairMessages(
  originalMessages: readonly ChatMessage[],
  rawAssistantOutput: string,
  failure: string,
): ChatMessage[] {
  return [
    ...originalMessages,
    { role: 'assistant', content: rawAssistantOutput },
    {
      role: 'user',
      content: `Your previous response could not be used: ${failure}\n\nPlease return ONLY a corrected JSON object matching the required schema, containing exactly one SQL statement. No explanation, no markdown fences.`,
    },
  ];
}

export class PromptBuilder {
  private readonly tokenBudget: number;
  private readonly historyTail: number;

  constructor(options: PromptBuilderOptions = {}) {
    this.tokenBudget = options.tokenBudget ?? SAFE_DEFAULTS.promptTokenBudget;
    this.historyTail = options.historyTail ?? SAFE_DEFAULTS.historyTail;
  }

  build(input: PromptInput): Prompt {
    const schema = selectSchemaContext(input.request, input.snapshot, this.tokenBudget);
    const history =
      this.historyTail > 0 ? input.historyTail.filter((turn) => turn.sql !== null).slice(-this.historyTail) : [];
    const messages = buildMessages(input, schema.text, history);

    return Object.freeze({
      request: input.request,
      dialect: input.dialect,
      intent: input.intent,
      messages: Object.freeze(messages),
      tables: Object.freeze(schema.tables),
      estimatedTokens: messages.reduce((sum, message) => sum + estimateTokens(message.content), 0),
    });
  }
}
