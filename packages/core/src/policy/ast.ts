/**
 * Narrowing helpers for node-sql-parser ASTs.
 * The parser's node shapes vary across statement kinds and releases, so
 * callers read them as plain records and check every field they touch.
 */

export type AstNode = Record<string, unknown>;

export function isNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nodeType(value: unknown): string | null {
  return isNode(value) && typeof value.type === 'string' ? value.type : null;
}

/**
 * Depth-first walk over every record in the tree. Returning `false` from the
 * visitor skips the node's children.
 */
export function walkAst(
  node: unknown,
  visitor: (node: AstNode, key: string | null) => boolean | void,
  key: string | null = null,
): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      walkAst(item, visitor, key);
    }
    return;
  }
  if (!isNode(node)) return;

  if (visitor(node, key) === false) return;

  for (const [childKey, child] of Object.entries(node)) {
    if (child !== null && typeof child === 'object') {
      walkAst(child, visitor, childKey);
    }
  }
}

/** Column name of a column_ref node; quoted names arrive wrapped in `{ expr: { value } }` */
export function columnRefName(node: AstNode): string | null {
  const column = node.column;
  if (typeof column === 'string') return column;
  if (isNode(column) && isNode(column.expr)) {
    const value = column.expr.value;
    return typeof value === 'string' ? value : null;
  }
  return null;
}

/** CTE names declared by a statement's WITH clause */
export function cteNames(statement: unknown): string[] {
  if (!isNode(statement) || !Array.isArray(statement.with)) return [];
  const names: string[] = [];
  for (const cte of statement.with) {
    if (!isNode(cte)) continue;
    const name = cte.name;
    if (typeof name === 'string') {
      names.push(name);
    } else if (isNode(name) && typeof name.value === 'string') {
      names.push(name.value);
    }
  }
  return names;
}

/**
 * Name of a function or aggregate call. Older parser releases give a plain
 * string; newer ones nest it as `{ name: [{ value }] }` with an optional schema.
 */
export function functionName(node: AstNode): string | null {
  const name = node.name;
  if (typeof name === 'string') return name;
  if (isNode(name) && Array.isArray(name.name)) {
    const last: unknown = name.name[name.name.length - 1];
    if (isNode(last) && typeof last.value === 'string') return last.value;
  }
  return null;
}

/** True when a SELECT node writes its result somewhere (`INTO table`, `INTO OUTFILE`, `INTO @var`) */
export function selectsInto(node: AstNode): boolean {
  const into = node.into;
  if (!isNode(into)) return false;
  return (typeof into.position === 'string' && into.position !== '') || (into.expr !== undefined && into.expr !== null);
}
