#!/usr/bin/env -S node --import tsx

/**
 * askdb CLI entrypoint.
 * One-shot commands open a session, run, and close; `shell` keeps one open.
 */

import { Command, CommanderError } from 'commander';
import { existsSync } from 'node:fs';
import {
  SAFE_DEFAULTS,
  createLogger,
  createRuntime,
  defaultDbPath,
  describeTarget,
  loadConfig,
  toColumnPayloads,
  toHistoryPayload,
  toStatusPayload,
  toSuggestPayload,
  type Runtime,
  type Session,
} from '@askdb/core';
import { getPassword } from './util/password.js';
import { descriptorFromFlags, needsPassword, type ConnectionFlags } from './connection.js';
import { EXIT_CODE_SUCCESS, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printExplanation,
  printHumanTable,
  printQueryResult,
  printSummary,
  type OutputOptions,
} from './output.js';
import { runShell } from './shell.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

/** History persists across invocations unless ASKDB_HISTORY_PATH says otherwise */
function openRuntime(output: OutputOptions): Runtime {
  const config = loadConfig({ ASKDB_HISTORY_PATH: defaultDbPath(), ASKDB_LOG_LEVEL: 'warn', ...process.env });
  const level = output.debug ? 'debug' : output.verbose ? 'info' : config.logLevel;
  return createRuntime(config, { logger: createLogger(level, process.stderr) });
}

interface GlobalFlags extends ConnectionFlags {
  session: string;
  passwordStdin?: boolean;
}

function globalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals();
  const text = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
  return {
    session: text(opts.session) ?? 'cli',
    engine: text(opts.engine),
    host: text(opts.host),
    port: text(opts.port),
    database: text(opts.database),
    user: text(opts.user),
    path: text(opts.path),
    ssl: opts.ssl === true,
    passwordStdin: opts.passwordStdin === true,
  };
}

async function connectSession(session: Session, runtime: Runtime, flags: GlobalFlags): Promise<void> {
  const descriptor = descriptorFromFlags(flags, runtime.config.defaultConnection);
  if (!descriptor) {
    throw usageError('No connection given. Pass --engine/--path or set ASKDB_DB_ENGINE.');
  }
  if (needsPassword(descriptor)) {
    descriptor.password = flags.passwordStdin ? await readStdin() : await getPassword();
  }
  await session.connect(descriptor);
}

interface SessionContext {
  session: Session;
  runtime: Runtime;
  output: OutputOptions;
  signal: AbortSignal;
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void>): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

async function withSession(
  command: Command,
  connect: boolean,
  fn: (ctx: SessionContext) => Promise<void>,
): Promise<void> {
  await runCommand(command, async (output) => {
    const flags = globalFlags(command);
    const runtime = openRuntime(output);
    const interrupt = new AbortController();
    const onSigint = (): void => interrupt.abort();
    process.once('SIGINT', onSigint);
    try {
      const session = runtime.registry.create(flags.session);
      if (connect) {
        await connectSession(session, runtime, flags);
      }
      await fn({ session, runtime, output, signal: interrupt.signal });
    } finally {
      process.off('SIGINT', onSigint);
      await runtime.shutdown();
    }
  });
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askdb')
  .description('Ask a relational database questions in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .option('--session <id>', 'Session id that history entries are kept under', 'cli')
  .option('--engine <engine>', 'Database engine (postgres|mysql|sqlite)')
  .option('--host <host>', 'Database host')
  .option('--port <port>', 'Database port')
  .option('--database <database>', 'Database name')
  .option('--user <user>', 'Database user')
  .option('--path <file>', 'SQLite database file')
  .option('--ssl', 'Enable SSL', false)
  .option('--password-stdin', 'Read password from stdin for non-interactive usage', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, status
  Schema:   tables, describe, summary
  Query:    query, mutate, explain, repeat, shell
  History:  history, suggest
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  program
    .command('doctor')
    .description('Check environment and configuration')
    .action(async function (this: Command) {
      await runCommand(this, async (output) => {
        const nodeVersion = process.version;
        const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
        const config = loadConfig({ ASKDB_HISTORY_PATH: defaultDbPath(), ...process.env });
        const historyPath = config.history.path;

        const payload = {
          node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
          openAiKeySet: Boolean(config.llm.apiKey),
          model: config.llm.model,
          history: {
            enabled: config.history.enabled,
            path: historyPath,
            exists: existsSync(historyPath),
          },
          defaultConnection: config.defaultConnection ? describeTarget(config.defaultConnection) : null,
          limits: config.limits,
          cache: config.cache,
          busyPolicy: config.busyPolicy,
        };

        if (output.json) {
          printCommandSuccess(payload, output);
          return;
        }

        printHuman('askdb doctor', output);
        printHuman('============', output);
        printHuman('', output);
        printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
        printHuman(`OpenAI key: ${payload.openAiKeySet ? 'set ✓' : 'not set'}`, output);
        printHuman(`LLM model:  ${config.llm.model}`, output);
        printHuman(
          `History:    ${config.history.enabled ? `${historyPath} ${payload.history.exists ? '(exists)' : '(will be created)'}` : 'disabled'}`,
          output,
        );
        printHuman(`Connection: ${payload.defaultConnection ?? 'none (pass --engine/--path)'}`, output);
        printHuman('', output);
        printHuman('Limits:', output);
        printHuman(`  Max rows:          ${config.limits.maxRows} (default ${SAFE_DEFAULTS.maxRows})`, output);
        printHuman(`  Compile timeout:   ${config.limits.compileTimeoutMs}ms`, output);
        printHuman(`  Execution timeout: ${config.limits.executionTimeoutMs}ms`, output);
        printHuman(`  Query cache:       ${config.cache.enabled ? `${config.cache.ttlMs}ms TTL` : 'disabled'}`, output);
      });
    }),
  ['askdb doctor', 'askdb doctor --json'],
);

// ── status ───────────────────────────────────────────────────────────

withExamples(
  program
    .command('status')
    .description('Connect and report the connection target')
    .action(async function (this: Command) {
      await withSession(this, true, async ({ session, output }) => {
        const payload = toStatusPayload(session.status());
        if (output.json) {
          printCommandSuccess(payload, output);
          return;
        }
        printHuman(`Connected: ${payload.connected ? 'yes' : 'no'}`, output);
        printHuman(`Engine:    ${payload.engine ?? '-'}`, output);
        printHuman(`Host:      ${payload.host ?? '-'}`, output);
        printHuman(`Database:  ${payload.database ?? '-'}`, output);
      });
    }),
  ['askdb status --path ./shop.db', 'askdb status --engine postgres --host 127.0.0.1 --database shop --user app'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  program
    .command('tables')
    .description('List the tables of the connected database')
    .action(async function (this: Command) {
      await withSession(this, true, async ({ session, output, signal }) => {
        const tables = await session.listTables({ signal });
        if (output.json) {
          printCommandSuccess(tables, output);
          return;
        }
        if (tables.length === 0) {
          printHuman('No tables found.', output);
          return;
        }
        for (const table of tables) {
          printHuman(table, output);
        }
      });
    }),
  ['askdb tables --path ./shop.db'],
);

withExamples(
  program
    .command('describe')
    .description('Show the columns of one table')
    .argument('<table>', 'Table name, bare or schema-qualified')
    .action(async function (this: Command, table: string) {
      await withSession(this, true, async ({ session, output, signal }) => {
        const columns = toColumnPayloads(await session.describeTable(table, { signal }));
        if (output.json) {
          printCommandSuccess(columns, output);
          return;
        }
        printHumanTable(['column', 'type', 'nullable', 'key_role'], columns.map((col) => ({ ...col })), output);
      });
    }),
  ['askdb describe orders --path ./shop.db'],
);

withExamples(
  program
    .command('summary')
    .description('Count tables, columns and keys of the connected database')
    .action(async function (this: Command) {
      await withSession(this, true, async ({ session, output, signal }) => {
        printSummary(await session.summary({ signal }), output);
      });
    }),
  ['askdb summary --path ./shop.db', 'askdb --json summary'],
);

// ── query / mutate ───────────────────────────────────────────────────

withExamples(
  program
    .command('query')
    .description('Ask a read-only question; compiles, validates and runs a SELECT')
    .argument('<request...>', 'Natural language request')
    .action(async function (this: Command, words: string[]) {
      await withSession(this, true, async ({ session, output, signal }) => {
        const request = words.join(' ');
        if (output.verbose) {
          printHuman(`Request: "${request}"`, output);
        }
        printQueryResult(await session.query(request, { signal }), output);
      });
    }),
  ['askdb query "orders placed in the last 7 days" --path ./shop.db', 'askdb --json query "top 5 customers by spend"'],
);

withExamples(
  program
    .command('mutate')
    .description('Request a data change of the given kind (insert|update|delete)')
    .argument('<kind>', 'insert, update or delete')
    .argument('<request...>', 'Natural language request')
    .action(async function (this: Command, kind: string, words: string[]) {
      await withSession(this, true, async ({ session, output, signal }) => {
        printQueryResult(await session.mutate(words.join(' '), kind.toLowerCase(), { signal }), output);
      });
    }),
  ['askdb mutate delete "the order with ID 456" --path ./shop.db'],
);

withExamples(
  program
    .command('explain')
    .description('Compile and validate a request without running it')
    .option('--kind <kind>', 'Statement kind to expect (select|insert|update|delete)', 'select')
    .argument('<request...>', 'Natural language request')
    .action(async function (this: Command, words: string[], opts: { kind: string }) {
      await withSession(this, true, async ({ session, output, signal }) => {
        printExplanation(await session.explain(words.join(' '), opts.kind.toLowerCase(), { signal }), output);
      });
    }),
  ['askdb explain "orders placed in the last 7 days" --path ./shop.db', 'askdb explain --kind delete "the order with ID 456"'],
);

withExamples(
  program
    .command('repeat')
    .description('Re-run a past SELECT request from history')
    .argument('<seq>', 'History sequence number')
    .action(async function (this: Command, seqText: string) {
      await withSession(this, true, async ({ session, output, signal }) => {
        const seq = Number(seqText);
        if (!Number.isInteger(seq) || seq <= 0) {
          throw usageError('History sequence must be a positive integer.');
        }
        printQueryResult(await session.repeat(seq, { signal }), output);
      });
    }),
  ['askdb repeat 12 --path ./shop.db'],
);

// ── history ──────────────────────────────────────────────────────────

withExamples(
  program
    .command('history')
    .description('List recent requests of this session id')
    .option('--limit <n>', 'Number of items', '20')
    .option('--stats', 'Show totals instead of entries', false)
    .action(async function (this: Command, opts: { limit: string; stats: boolean }) {
      await withSession(this, false, async ({ session, output }) => {
        if (opts.stats) {
          const stats = session.historyStats();
          if (output.json) {
            printCommandSuccess(stats, output);
            return;
          }
          if (!stats) {
            printHuman('History is disabled.', output);
            return;
          }
          printHuman(`Total:      ${stats.total}`, output);
          printHuman(`Successful: ${stats.successful} (${stats.successRate}%)`, output);
          printHuman(`Rejected:   ${stats.rejected}`, output);
          printHuman(`Failed:     ${stats.failed}`, output);
          printHuman(
            `Avg time:   ${stats.averageExecutionMs === null ? '-' : `${stats.averageExecutionMs.toFixed(2)}ms`}`,
            output,
          );
          return;
        }

        const items = session.listHistory(parseInt(opts.limit, 10) || 20).map(toHistoryPayload);
        if (output.json) {
          printCommandSuccess(items, output);
          return;
        }
        if (items.length === 0) {
          printHuman('No requests in history. Use "askdb query" to ask something.', output);
          return;
        }
        printHumanTable(
          ['seq', 'request', 'outcome', 'rows', 'ms', 'created_at'],
          items.map((item) => ({
            seq: item.seq,
            request: item.request_text.length > 50 ? item.request_text.slice(0, 47) + '...' : item.request_text,
            outcome: item.error_kind ? `${item.outcome} (${item.error_kind})` : item.outcome,
            rows: item.row_count ?? '-',
            ms: item.execution_ms ?? '-',
            created_at: item.created_at,
          })),
          output,
        );
      });
    }),
  ['askdb history', 'askdb history --stats --json'],
);

withExamples(
  program
    .command('suggest')
    .description('Suggest follow-up requests from history and schema')
    .argument('[current...]', 'Request being drafted, to find similar past ones')
    .option('--offline', 'Skip connecting; suggest from history only', false)
    .action(async function (this: Command, words: string[], opts: { offline: boolean }) {
      await withSession(this, !opts.offline, async ({ session, output }) => {
        const current = words.length > 0 ? words.join(' ') : undefined;
        const payload = toSuggestPayload(await session.suggestions(current));
        if (output.json) {
          printCommandSuccess(payload, output);
          return;
        }
        for (const suggestion of payload.suggestions) {
          printHuman(`- ${suggestion}`, output);
        }
        if (payload.similar.length > 0) {
          printHuman('', output);
          printHuman('Similar past requests:', output);
          for (const item of payload.similar) {
            printHuman(`  #${item.seq} ${item.request_text}`, output);
          }
        }
      });
    }),
  ['askdb suggest --path ./shop.db', 'askdb suggest --offline "orders by month"'],
);

// ── shell ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('shell')
    .description('Interactive session: every line is a request; \\help lists commands')
    .action(async function (this: Command) {
      await withSession(this, true, async ({ session, output }) => {
        await runShell(session, output);
      });
    }),
  ['askdb shell --path ./shop.db'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), outputOptionsFromCommand(program));
      process.exitCode = toExitCode(usageError(error.message));
      return;
    }
    printError(error, outputOptionsFromCommand(program));
    process.exitCode = toExitCode(error);
  }
}

void main();
