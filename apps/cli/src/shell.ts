/**
 * Interactive shell over one session. Plain lines are read-only requests;
 * backslash commands cover the other tool operations.
 */

import { createInterface } from 'node:readline';
import { toColumnPayloads, toHistoryPayload, toStatusPayload, type Session } from '@askdb/core';
import { usageError } from './errors.js';
import {
  printError,
  printExplanation,
  printHuman,
  printHumanTable,
  printQueryResult,
  printSummary,
  type OutputOptions,
} from './output.js';

export type ShellCommand =
  | { type: 'quit' }
  | { type: 'help' }
  | { type: 'status' }
  | { type: 'tables' }
  | { type: 'refresh' }
  | { type: 'describe'; table: string }
  | { type: 'summary' }
  | { type: 'explain'; kind: string; request: string }
  | { type: 'history'; limit: number }
  | { type: 'suggest'; current?: string }
  | { type: 'repeat'; seq: number }
  | { type: 'mutate'; kind: string; request: string }
  | { type: 'query'; request: string };

export const SHELL_HELP = [
  '\\tables              list tables',
  '\\d <table>           describe a table',
  '\\summary             table, column and key counts',
  '\\refresh             re-read the schema',
  '\\mutate <kind> <request>  insert, update or delete',
  '\\explain [kind] <request>  compile and validate only',
  '\\repeat <seq>        re-run a past SELECT',
  '\\history [n]         recent requests',
  '\\suggest [text]      follow-up ideas',
  '\\status              connection target',
  '\\q                   quit',
  'anything else is asked as a read-only question',
].join('\n');

const EXPLAIN_KINDS: readonly string[] = ['select', 'insert', 'update', 'delete'];

/** Parse one non-empty input line; throws a usage error on a malformed command */
export function parseShellLine(line: string): ShellCommand {
  const trimmed = line.trim();
  if (trimmed === 'exit' || trimmed === 'quit') return { type: 'quit' };
  if (!trimmed.startsWith('\\')) return { type: 'query', request: trimmed };

  const [head, ...rest] = trimmed.slice(1).split(/\s+/);
  const arg = rest.join(' ');
  switch (head.toLowerCase()) {
    case 'q':
    case 'quit':
      return { type: 'quit' };
    case 'h':
    case 'help':
    case '?':
      return { type: 'help' };
    case 'status':
      return { type: 'status' };
    case 'tables':
    case 'dt':
      return { type: 'tables' };
    case 'refresh':
      return { type: 'refresh' };
    case 'summary':
      return { type: 'summary' };
    case 'explain': {
      const [first, ...words] = rest;
      const kind = first?.toLowerCase();
      if (kind && EXPLAIN_KINDS.includes(kind) && words.length > 0) {
        return { type: 'explain', kind, request: words.join(' ') };
      }
      if (!arg) throw usageError('Usage: \\explain [select|insert|update|delete] <request>');
      return { type: 'explain', kind: 'select', request: arg };
    }
    case 'd':
    case 'describe':
      if (!arg) throw usageError('Usage: \\d <table>');
      return { type: 'describe', table: arg };
    case 'history': {
      const limit = arg ? Number(arg) : 10;
      if (!Number.isInteger(limit) || limit <= 0) throw usageError('Usage: \\history [n]');
      return { type: 'history', limit };
    }
    case 'suggest':
      return arg ? { type: 'suggest', current: arg } : { type: 'suggest' };
    case 'repeat': {
      const seq = Number(arg);
      if (!Number.isInteger(seq) || seq <= 0) throw usageError('Usage: \\repeat <seq>');
      return { type: 'repeat', seq };
    }
    case 'mutate': {
      const [kind, ...words] = rest;
      if (!kind || words.length === 0) throw usageError('Usage: \\mutate <insert|update|delete> <request>');
      return { type: 'mutate', kind: kind.toLowerCase(), request: words.join(' ') };
    }
    default:
      throw usageError(`Unknown command \\${head}. Type \\help for the list.`);
  }
}

async function dispatch(session: Session, command: ShellCommand, output: OutputOptions, signal: AbortSignal): Promise<void> {
  switch (command.type) {
    case 'quit':
      return;
    case 'help':
      printHuman(SHELL_HELP, output);
      return;
    case 'status': {
      const status = toStatusPayload(session.status());
      printHuman(`${status.engine ?? '-'} ${status.host ?? ''} ${status.database ?? ''}`.replace(/\s+/g, ' ').trim(), output);
      return;
    }
    case 'tables':
      for (const table of await session.listTables({ signal })) {
        printHuman(table, output);
      }
      return;
    case 'refresh':
      session.refreshSchema();
      printHuman('Schema will be re-read on the next request.', output);
      return;
    case 'describe': {
      const columns = toColumnPayloads(await session.describeTable(command.table, { signal }));
      printHumanTable(['column', 'type', 'nullable', 'key_role'], columns.map((col) => ({ ...col })), output);
      return;
    }
    case 'summary':
      printSummary(await session.summary({ signal }), output);
      return;
    case 'explain':
      printExplanation(await session.explain(command.request, command.kind, { signal }), output);
      return;
    case 'history': {
      const items = session.listHistory(command.limit).map(toHistoryPayload);
      printHumanTable(
        ['seq', 'request', 'outcome'],
        items.map((item) => ({ seq: item.seq, request: item.request_text, outcome: item.outcome })),
        output,
      );
      return;
    }
    case 'suggest': {
      const { suggestions } = await session.suggestions(command.current);
      for (const suggestion of suggestions) {
        printHuman(`- ${suggestion}`, output);
      }
      return;
    }
    case 'repeat':
      printQueryResult(await session.repeat(command.seq, { signal }), output);
      return;
    case 'mutate':
      printQueryResult(await session.mutate(command.request, command.kind, { signal }), output);
      return;
    case 'query':
      printQueryResult(await session.query(command.request, { signal }), output);
      return;
  }
}

export async function runShell(session: Session, output: OutputOptions): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'askdb> ' });
  let inFlight: AbortController | null = null;

  // Ctrl-C cancels the running request, or leaves when idle
  rl.on('SIGINT', () => {
    if (inFlight) {
      inFlight.abort();
    } else {
      rl.close();
    }
  });

  printHuman('Type a question, or \\help for commands.', output);
  rl.prompt();
  for await (const line of rl) {
    if (line.trim()) {
      const controller = new AbortController();
      inFlight = controller;
      try {
        const command = parseShellLine(line);
        if (command.type === 'quit') break;
        await dispatch(session, command, output, controller.signal);
      } catch (error: unknown) {
        printError(error, output);
      } finally {
        inFlight = null;
      }
    }
    rl.prompt();
  }
  rl.close();
}
