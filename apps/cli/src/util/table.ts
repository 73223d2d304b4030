/**
 * ASCII table formatter for CLI output.
 */

export const MAX_CELL_WIDTH = 60;

export function formatTable(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, unknown>>[],
  maxWidth = MAX_CELL_WIDTH,
): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((col) => formatValue(row[col])));
  const widths = columns.map((col, i) =>
    Math.min(Math.max(col.length, ...cells.map((line) => line[i].length)), maxWidth),
  );

  const lines = [
    columns.map((col, i) => col.padEnd(widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (const line of cells) {
    lines.push(line.map((val, i) => (val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val.padEnd(widths[i]))).join(' | '));
  }
  return lines.join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (Buffer.isBuffer(val)) return `<${val.length} bytes>`;
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
