/**
 * SQL compiler: turns a prompt into a frozen CandidateStatement.
 *
 * The model is expected to answer with a JSON plan. When it does not, a lone
 * SQL statement in a fenced block or in the bare text is accepted instead.
 * One repair round-trip is allowed; after that the failure is permanent.
 */

import { Ajv } from 'ajv';
import { compilationError, errorMessage } from '../errors.js';
import { maxPlaceholderIndex } from '../db/placeholders.js';
import type { SqlParam } from '../db/types.js';
import { withDeadline } from '../utils/deadline.js';
import type { Logger } from '../utils/logger.js';
import { ADMIN_KEYWORDS, analyzeStatement, leadingKeyword } from '../policy/classify.js';
import { stripTrailingSemicolons } from '../policy/parse.js';
import type { CandidateStatement, StatementAnalysis } from '../policy/types.js';
import { buildRepairMessages, type Prompt } from './prompt.js';
import { llmSqlPlanSchema } from './schema_json.js';
import type { ChatMessage, LanguageModel, LlmSqlPlan } from './types.js';

const ajv = new Ajv({ allErrors: true });
const validatePlan = ajv.compile<LlmSqlPlan>(llmSqlPlanSchema);

const SQL_KEYWORDS: ReadonlySet<string> = new Set(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'WITH', ...ADMIN_KEYWORDS]);
const SQL_FENCE_LANGS: ReadonlySet<string> = new Set(['', 'sql', 'postgresql', 'postgres', 'mysql', 'sqlite']);

interface ExtractedPlan {
  sql: string;
  params: SqlParam[];
  assumptions: string[];
  confidence: number | null;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: string };

function fail(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

function parseJsonPlan(jsonText: string): Attempt<ExtractedPlan> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch {
    return fail(`Invalid JSON: ${jsonText.slice(0, 100)}...`);
  }

  if (!validatePlan(parsed)) {
    const errors = validatePlan.errors?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
    return fail(`The JSON plan does not match the required schema: ${errors ?? 'unknown validation error'}`);
  }

  return {
    ok: true,
    value: {
      sql: parsed.sql,
      params: parsed.params.map((p) => p.value),
      assumptions: parsed.assumptions,
      confidence: parsed.confidence,
    },
  };
}

/**
 * Pull the SQL plan out of a raw model answer.
 */
export function extractPlan(raw: string): Attempt<ExtractedPlan> {
  const text = raw.trim();
  if (!text) {
    return fail('The response was empty.');
  }

  const fences = [...text.matchAll(/```([A-Za-z]*)[^\n]*\n?([\s\S]*?)```/g)].map((m) => ({
    lang: m[1].toLowerCase(),
    body: m[2].trim(),
  }));

  const jsonFence = fences.find((f) => f.lang === 'json' || (f.lang === '' && f.body.startsWith('{')));
  if (jsonFence) {
    return parseJsonPlan(jsonFence.body);
  }
  if (text.startsWith('{') || (fences.length === 0 && text.includes('"sql"'))) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    return parseJsonPlan(end > start ? text.slice(start, end + 1) : text);
  }

  const sqlFences = fences.filter((f) => SQL_FENCE_LANGS.has(f.lang));
  if (sqlFences.length > 1) {
    return fail(`The response contains ${sqlFences.length} SQL blocks; exactly one statement is required.`);
  }
  const sql = sqlFences.length === 1 ? sqlFences[0].body : text;
  if (!SQL_KEYWORDS.has(leadingKeyword(sql))) {
    return fail('The response does not contain a SQL statement.');
  }
  return { ok: true, value: { sql, params: [], assumptions: [], confidence: null } };
}

/**
 * Extract, check placeholders against params, and analyze structurally.
 */
export function interpretResponse(raw: string, prompt: Prompt): Attempt<ExtractedPlan & { analysis: StatementAnalysis }> {
  const extracted = extractPlan(raw);
  if (!extracted.ok) return extracted;

  const plan = { ...extracted.value, sql: stripTrailingSemicolons(extracted.value.sql) };
  if (!plan.sql) {
    return fail('The response contains no SQL statement.');
  }

  const highest = maxPlaceholderIndex(plan.sql);
  if (highest !== plan.params.length) {
    return fail(`The SQL uses placeholders up to $${highest} but ${plan.params.length} parameter values were supplied.`);
  }

  const analyzed = analyzeStatement(plan.sql, plan.params, prompt.dialect);
  if (!analyzed.ok) {
    return fail(`The SQL could not be parsed: ${analyzed.error}`);
  }
  return { ok: true, value: { ...plan, analysis: analyzed.analysis } };
}

export interface CompileOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export class SqlCompiler {
  constructor(
    private readonly model: LanguageModel,
    private readonly logger?: Logger,
  ) {}

  get modelId(): string {
    return this.model.id;
  }

  async compile(prompt: Prompt, options: CompileOptions): Promise<CandidateStatement> {
    return withDeadline('compile', options.timeoutMs, options.signal, async (signal) => {
      const firstOutput = await this.ask(prompt.messages, signal, options.timeoutMs);
      const first = interpretResponse(firstOutput, prompt);
      if (first.ok) {
        return this.toCandidate(prompt, first.value, false);
      }

      this.logger?.warn({ failure: first.error, model: this.model.id }, 'model output unusable, retrying with repair prompt');

      const repairOutput = await this.ask(buildRepairMessages(prompt.messages, firstOutput, first.error), signal, options.timeoutMs);
      const second = interpretResponse(repairOutput, prompt);
      if (second.ok) {
        return this.toCandidate(prompt, second.value, true);
      }

      const snippet = repairOutput.slice(0, 200) + (repairOutput.length > 200 ? '...' : '');
      throw compilationError(`Model output was unusable after one repair attempt: ${second.error}`, { output: snippet });
    });
  }

  private async ask(messages: readonly ChatMessage[], signal: AbortSignal, timeoutMs: number): Promise<string> {
    try {
      return await this.model.complete(messages, { signal, timeoutMs });
    } catch (err: unknown) {
      // an aborted call is reported as Timeout/Cancelled by the deadline
      if (signal.aborted) throw err;
      throw compilationError(`Language model request failed: ${errorMessage(err)}`);
    }
  }

  private toCandidate(
    prompt: Prompt,
    plan: ExtractedPlan & { analysis: StatementAnalysis },
    retried: boolean,
  ): CandidateStatement {
    const candidate: CandidateStatement = {
      ...plan.analysis,
      requestText: prompt.request,
      sql: plan.sql,
      params: Object.freeze([...plan.params]),
      dialect: prompt.dialect,
      model: {
        modelId: this.model.id,
        retried,
        assumptions: plan.assumptions,
        confidence: plan.confidence,
      },
    };
    return Object.freeze(candidate);
  }
}
