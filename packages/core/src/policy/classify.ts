/**
 * Statement classifier.
 * Determines the statement kind from its leading keyword and extracts tables,
 * predicate columns and embedded literals from the parsed AST.
 */

import type { SqlParam } from '../db/types.js';
import { columnRefName, cteNames, functionName, isNode, nodeType, selectsInto, walkAst, type AstNode } from './ast.js';
import { parseSql, type Dialect } from './parse.js';
import type { SqlLiteral, StatementAnalysis, StatementFeatures, StatementKind } from './types.js';

const LEADING_KINDS: Record<string, StatementKind> = {
  SELECT: 'select',
  INSERT: 'insert',
  UPDATE: 'update',
  DELETE: 'delete',
};

/**
 * Administrative and DDL keywords. The parser does not read all of these
 * (GRANT, VACUUM, ATTACH...), so an unparseable statement that starts with
 * one still classifies as `other` instead of failing compilation.
 */
export const ADMIN_KEYWORDS: ReadonlySet<string> = new Set([
  'ALTER',
  'ANALYZE',
  'ATTACH',
  'BEGIN',
  'CALL',
  'COMMIT',
  'COPY',
  'CREATE',
  'DETACH',
  'DO',
  'DROP',
  'EXEC',
  'EXECUTE',
  'GRANT',
  'KILL',
  'LOCK',
  'MERGE',
  'PRAGMA',
  'REINDEX',
  'RENAME',
  'REPLACE',
  'RESET',
  'REVOKE',
  'ROLLBACK',
  'SET',
  'SHUTDOWN',
  'TRUNCATE',
  'USE',
  'VACUUM',
]);

/**
 * Functions that sleep, signal other backends, or touch the server's
 * filesystem or network. A SELECT calling one is not a read.
 */
export const DENIED_FUNCTIONS: ReadonlySet<string> = new Set([
  // postgres
  'pg_sleep',
  'pg_sleep_for',
  'pg_sleep_until',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'pg_reload_conf',
  'pg_rotate_logfile',
  'lo_import',
  'lo_export',
  'lo_unlink',
  'dblink',
  'dblink_exec',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'set_config',
  // mysql
  'sleep',
  'benchmark',
  'load_file',
  'get_lock',
  'release_lock',
  'sys_exec',
  'sys_eval',
  // sqlite
  'load_extension',
  'writefile',
  'readfile',
  'fts3_tokenizer',
]);

const STRING_LITERAL_TYPES: ReadonlySet<string> = new Set(['single_quote_string', 'string', 'natural_string']);

export type AnalysisOutcome = { ok: true; analysis: StatementAnalysis } | { ok: false; error: string };

/** First keyword of the statement, upper-cased, ignoring comments and opening parentheses */
export function leadingKeyword(sql: string): string {
  let rest = sql;
  for (;;) {
    const trimmed = rest.replace(/^[\s(]+/, '');
    if (trimmed.startsWith('--')) {
      const nl = trimmed.indexOf('\n');
      rest = nl === -1 ? '' : trimmed.slice(nl + 1);
    } else if (trimmed.startsWith('/*')) {
      const close = trimmed.indexOf('*/');
      rest = close === -1 ? '' : trimmed.slice(close + 2);
    } else {
      rest = trimmed;
      break;
    }
  }
  const match = /^[A-Za-z]+/.exec(rest);
  return match ? match[0].toUpperCase() : '';
}

function kindFromType(type: string | null): StatementKind {
  if (type === null) return 'other';
  return LEADING_KINDS[type.toUpperCase()] ?? 'other';
}

export function statementKind(sql: string, firstStatement: unknown): StatementKind {
  const keyword = leadingKeyword(sql);
  if (keyword === 'WITH') {
    return kindFromType(nodeType(firstStatement));
  }
  return LEADING_KINDS[keyword] ?? 'other';
}

function emptyFeatures(): StatementFeatures {
  return { selectStar: false, joinCount: 0, leadingWildcardLike: false, hasLimit: false };
}

/**
 * Analyze one SQL text. Parse failures are errors unless the statement starts
 * with an administrative keyword, in which case it becomes kind `other`.
 */
export function analyzeStatement(sql: string, params: readonly SqlParam[], dialect: Dialect): AnalysisOutcome {
  const parsed = parseSql(sql, dialect);

  if (!parsed.ok) {
    const keyword = leadingKeyword(sql);
    if (ADMIN_KEYWORDS.has(keyword)) {
      const statementCount = Math.max(1, sql.split(';').filter((part) => part.trim() !== '').length);
      return {
        ok: true,
        analysis: {
          kind: 'other',
          statementCount,
          targetTables: [],
          referencedTables: [],
          predicateColumns: [],
          literals: [],
          deniedFunctions: [],
          features: emptyFeatures(),
        },
      };
    }
    return { ok: false, error: parsed.error };
  }

  const [first] = parsed.statements;
  const leading = statementKind(parsed.normalizedSql, first);
  // SELECT ... INTO creates a table or writes a file; it is not a read
  const kind = leading === 'select' && hasSelectInto(parsed.statements) ? 'other' : leading;
  const ctes = new Set(parsed.statements.flatMap(cteNames).map((name) => name.toLowerCase()));
  const { referencedTables, targetTables } = extractTables(parsed.tableList, kind, ctes);

  return {
    ok: true,
    analysis: {
      kind,
      statementCount: parsed.statements.length,
      targetTables,
      referencedTables,
      predicateColumns: isNode(first) ? predicateColumns(first.where) : [],
      literals: collectLiterals(parsed.statements, dialect),
      deniedFunctions: findDeniedFunctions(parsed.statements),
      features: extractFeatures(first, params),
    },
  };
}

/**
 * node-sql-parser reports tables as `kind::schema::table`, with `null` for an
 * unqualified schema.
 */
function extractTables(
  tableList: string[],
  kind: StatementKind,
  ctes: ReadonlySet<string>,
): { referencedTables: string[]; targetTables: string[] } {
  const referenced: string[] = [];
  const targets: string[] = [];

  for (const entry of tableList) {
    const [action, schema, table] = entry.split('::');
    if (!table) continue;
    const unqualified = schema === undefined || schema === 'null' || schema === '';
    if (unqualified && ctes.has(table.toLowerCase())) continue;

    const name = unqualified ? table : `${schema}.${table}`;
    if (!referenced.includes(name)) referenced.push(name);
    const isTarget = kind === 'select' ? action === 'select' : action === kind;
    if (isTarget && !targets.includes(name)) targets.push(name);
  }

  return { referencedTables: referenced, targetTables: targets };
}

function predicateColumns(where: unknown): string[] {
  const columns: string[] = [];
  walkAst(where, (node) => {
    if (node.type === 'column_ref') {
      const name = columnRefName(node);
      if (name !== null && name !== '*' && !columns.includes(name)) {
        columns.push(name);
      }
      return false;
    }
    return true;
  });
  return columns;
}

function collectLiterals(statements: unknown[], dialect: Dialect): SqlLiteral[] {
  const literals: SqlLiteral[] = [];
  walkAst(statements, (node, key) => {
    // LIMIT/OFFSET counts and interval arithmetic are shape, not user data
    if (key === 'limit' || node.type === 'interval' || node.type === 'column_ref') {
      return false;
    }
    if (node.type === 'number') {
      const value = Number(node.value);
      if (Number.isFinite(value)) literals.push({ type: 'number', value });
      return false;
    }
    const isString =
      typeof node.type === 'string' &&
      (STRING_LITERAL_TYPES.has(node.type) || (dialect === 'mysql' && node.type === 'double_quote_string'));
    if (isString && typeof node.value === 'string') {
      literals.push({ type: 'string', value: node.value });
      return false;
    }
    return true;
  });
  return literals;
}

function hasSelectInto(statements: unknown[]): boolean {
  let found = false;
  walkAst(statements, (node) => {
    if (node.type === 'select' && selectsInto(node)) found = true;
    return !found;
  });
  return found;
}

function findDeniedFunctions(statements: unknown[]): string[] {
  const found: string[] = [];
  walkAst(statements, (node) => {
    if (node.type !== 'function' && node.type !== 'aggr_func') return true;
    const name = functionName(node)?.toLowerCase();
    if (name !== undefined && DENIED_FUNCTIONS.has(name) && !found.includes(name)) {
      found.push(name);
    }
    return true;
  });
  return found;
}

function hasSelectStar(statement: AstNode): boolean {
  if (statement.columns === '*') return true;
  if (!Array.isArray(statement.columns)) return false;
  return statement.columns.some((col: unknown) => {
    if (!isNode(col) || !isNode(col.expr)) return false;
    const expr = col.expr;
    return expr.type === 'star' || (expr.type === 'column_ref' && columnRefName(expr) === '*');
  });
}

function paramIndex(node: AstNode): number | null {
  if (node.type !== 'param' || typeof node.value !== 'string') return null;
  const match = /^p(\d+)$/.exec(node.value);
  return match ? Number(match[1]) : null;
}

function isLeadingWildcard(right: unknown, params: readonly SqlParam[]): boolean {
  if (!isNode(right)) return false;
  if (typeof right.value === 'string' && right.type !== 'param') {
    return right.value.startsWith('%');
  }
  const index = paramIndex(right);
  if (index === null) return false;
  const bound = params[index - 1];
  return typeof bound === 'string' && bound.startsWith('%');
}

function extractFeatures(statement: unknown, params: readonly SqlParam[]): StatementFeatures {
  const features = emptyFeatures();
  if (!isNode(statement)) return features;

  features.hasLimit = isNode(statement.limit) && Array.isArray(statement.limit.value) && statement.limit.value.length > 0;

  walkAst(statement, (node) => {
    if (node.type === 'select' && hasSelectStar(node)) {
      features.selectStar = true;
    }
    if (Array.isArray(node.from)) {
      features.joinCount += node.from.filter((entry: unknown) => isNode(entry) && Boolean(entry.join)).length;
    }
    if (
      node.type === 'binary_expr' &&
      typeof node.operator === 'string' &&
      /LIKE$/i.test(node.operator) &&
      isLeadingWildcard(node.right, params)
    ) {
      features.leadingWildcardLike = true;
    }
    return true;
  });

  return features;
}
