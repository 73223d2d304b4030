import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isPipelineError } from '../../errors.js';
import { findPlaceholders, maxPlaceholderIndex, toNamed, toPositional } from '../placeholders.js';

describe('findPlaceholders', () => {
  it('finds $n outside string literals', () => {
    const refs = findPlaceholders("SELECT id FROM t WHERE a = $1 AND b = '$2' AND c = $2");
    assert.deepEqual(
      refs.map((ref) => ref.index),
      [1, 2],
    );
  });

  it('skips comments and quoted identifiers', () => {
    const sql = 'SELECT "$4" FROM t -- $3\nWHERE a = $1 /* $5 */ AND b = $2';
    assert.deepEqual(
      findPlaceholders(sql).map((ref) => ref.index),
      [1, 2],
    );
  });

  it('skips dollar-quoted bodies', () => {
    assert.deepEqual(findPlaceholders('SELECT $$ $7 $$, $tag$ $8 $tag$, $1'), [{ index: 1, start: 33, end: 35 }]);
  });

  it('ignores $ inside identifiers', () => {
    assert.deepEqual(findPlaceholders('SELECT a$1 FROM t'), []);
  });

  it('reports the highest index', () => {
    assert.equal(maxPlaceholderIndex('SELECT 1'), 0);
    assert.equal(maxPlaceholderIndex('SELECT $2, $10, $1'), 10);
  });
});

describe('toPositional', () => {
  it('expands values in occurrence order', () => {
    const result = toPositional('UPDATE t SET a = $2 WHERE b = $1 OR c = $2', ['x', 'y']);
    assert.equal(result.sql, 'UPDATE t SET a = ? WHERE b = ? OR c = ?');
    assert.deepEqual(result.values, ['y', 'x', 'y']);
  });

  it('rejects a placeholder without a value', () => {
    assert.throws(
      () => toPositional('SELECT $3', ['a']),
      (err: unknown) =>
        isPipelineError(err) &&
        err.kind === 'InvalidRequest' &&
        err.message === 'Placeholder $3 has no bound parameter (1 supplied).',
    );
  });
});

describe('toNamed', () => {
  it('rewrites to :pn', () => {
    assert.equal(toNamed("a = $1 and b = $10 and c = '$2'"), "a = :p1 and b = :p10 and c = '$2'");
  });
});
