import type { Command } from 'commander';
import {
  toExplainPayload,
  toMutatePayload,
  toQueryPayload,
  toSummaryPayload,
  type Explanation,
  type QueryResult,
  type SchemaSummary,
} from '@askdb/core';
import { formatTable } from './util/table.js';
import { toCliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, unknown>>[],
  output: OutputOptions,
): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const cliError = toCliError(error);
  const message = cliError ? cliError.message : error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: cliError ? cliError.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = cliError
        ? (cliError.details ?? null)
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (cliError && cliError.details !== undefined) {
      console.error('Details:', JSON.stringify(cliError.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function printQueryResult(result: QueryResult, output: OutputOptions): void {
  if (output.json) {
    printCommandSuccess(result.kind === 'select' ? toQueryPayload(result) : toMutatePayload(result), output);
    return;
  }

  printHuman(`SQL: ${result.sql}`, output);
  if (result.params.length > 0) {
    printHuman(`  Params: ${JSON.stringify(result.params)}`, output);
  }
  for (const warning of result.warnings) {
    printWarning(warning, output);
  }
  printHuman('', output);

  if (result.kind !== 'select') {
    printHuman(`${result.affectedRows} row${result.affectedRows !== 1 ? 's' : ''} affected in ${result.executionMs}ms`, output);
    return;
  }

  printHumanTable(result.columns, result.rows, output);
  printHuman('', output);
  printHuman(
    `${result.rowCount} row${result.rowCount !== 1 ? 's' : ''} returned` +
      (result.truncated ? ` (truncated to ${result.rowCount})` : '') +
      (result.fromCache ? ' from cache' : ` in ${result.executionMs}ms`),
    output,
  );
}

export function printExplanation(explanation: Explanation, output: OutputOptions): void {
  const payload = toExplainPayload(explanation);
  if (output.json) {
    printCommandSuccess(payload, output);
    return;
  }

  printHuman(`SQL: ${payload.sql}`, output);
  if (payload.params.length > 0) {
    printHuman(`  Params: ${JSON.stringify(payload.params)}`, output);
  }
  printHuman(`Kind:   ${payload.kind.toUpperCase()}`, output);
  printHuman(`Tables: ${payload.tables.join(', ') || '-'}`, output);
  for (const assumption of payload.assumptions) {
    printHuman(`  Assumes: ${assumption}`, output);
  }
  printHuman('', output);
  if (payload.rejection) {
    printHuman(`Would be rejected: ${payload.rejection.kind}`, output);
    printHuman(`  ${payload.rejection.message}`, output);
    if (payload.rejection.suggested_fix) {
      printHuman(`  Fix: ${payload.rejection.suggested_fix}`, output);
    }
    return;
  }
  printHuman('Would run. Nothing was executed.', output);
  for (const warning of payload.warnings) {
    printWarning(warning, output);
  }
}

export function printSummary(summary: SchemaSummary, output: OutputOptions): void {
  const payload = toSummaryPayload(summary);
  if (output.json) {
    printCommandSuccess(payload, output);
    return;
  }

  printHuman(
    `${payload.engine}: ${payload.table_count} tables, ${payload.column_count} columns, ${payload.foreign_key_count} foreign keys`,
    output,
  );
  printHuman('', output);
  printHumanTable(
    ['table', 'columns', 'primary_key', 'foreign_keys'],
    payload.tables.map((table) => ({
      table: table.schema ? `${table.schema}.${table.name}` : table.name,
      columns: table.column_count,
      primary_key: table.primary_key.join(', ') || '-',
      foreign_keys: table.foreign_keys.join(', ') || '-',
    })),
    output,
  );
}
