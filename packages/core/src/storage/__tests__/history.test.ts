import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LocalStore } from '../sqlite.js';
import { HistoryStore, similarity, type NewHistoryEntry } from '../history.js';

function entry(requestText: string, overrides: Partial<NewHistoryEntry> = {}): NewHistoryEntry {
  return {
    sessionId: 's1',
    connectionId: 'conn-1',
    requestText,
    kind: 'select',
    sql: 'SELECT id FROM orders',
    params: [],
    tables: ['orders'],
    outcome: 'accepted',
    errorKind: null,
    errorMessage: null,
    summary: { rowCount: 2, affectedRows: 0, truncated: false, fromCache: false, executionMs: 10 },
    ...overrides,
  };
}

const rejected: Partial<NewHistoryEntry> = {
  outcome: 'rejected',
  kind: 'delete',
  sql: 'DELETE FROM orders',
  errorKind: 'MissingFilterPredicate',
  errorMessage: 'DELETE without a WHERE clause on a column would affect every row.',
  summary: null,
};

describe('LocalStore', () => {
  it('applies every migration once', () => {
    const store = new LocalStore();
    store.migrate();
    store.migrate();
    assert.equal(store.schemaVersion(), 3);
    store.close();
  });
});

describe('HistoryStore', () => {
  let store: LocalStore;
  let history: HistoryStore;

  beforeEach(() => {
    store = new LocalStore();
    store.migrate();
    history = new HistoryStore(store.getDb(), { now: () => new Date('2026-03-01T12:00:00Z') });
  });

  afterEach(() => {
    store.close();
  });

  it('round-trips an entry with sequential seq numbers', () => {
    const first = history.append(entry('show orders', { params: ['paid', 3, true, null] }));
    const second = history.append(entry('delete all orders', rejected));

    assert.equal(first.seq, 1);
    assert.equal(second.seq, 2);
    assert.deepEqual(first.params, ['paid', 3, true, null]);
    assert.equal(first.createdAt, '2026-03-01T12:00:00.000Z');
    assert.deepEqual(first.summary, { rowCount: 2, affectedRows: 0, truncated: false, fromCache: false, executionMs: 10 });
    assert.equal(second.summary, null);
    assert.equal(second.errorKind, 'MissingFilterPredicate');
    assert.deepEqual(history.get(2), second);
    assert.equal(history.get(99), undefined);
  });

  it('returns the tail oldest first and lists newest first', () => {
    for (const text of ['one', 'two', 'three']) {
      history.append(entry(text));
    }
    history.append(entry('elsewhere', { sessionId: 's2' }));

    assert.deepEqual(
      history.tail('s1', 2).map((e) => e.requestText),
      ['two', 'three'],
    );
    assert.deepEqual(history.tail('s1', 0), []);
    assert.deepEqual(
      history.list({ sessionId: 's1', limit: 2 }).map((e) => e.requestText),
      ['three', 'two'],
    );
    assert.equal(history.list().length, 4);
  });

  it('filters by outcome', () => {
    history.append(entry('show orders'));
    history.append(entry('delete all orders', rejected));
    assert.deepEqual(
      history.list({ sessionId: 's1', outcome: 'rejected' }).map((e) => e.seq),
      [2],
    );
  });

  it('summarizes a session', () => {
    history.append(entry('show orders'));
    history.append(entry('show customers', { summary: { rowCount: 1, affectedRows: 0, truncated: false, fromCache: false, executionMs: 20 } }));
    history.append(entry('delete all orders', rejected));
    history.append(entry('show invoices', { outcome: 'failed', errorKind: 'EngineRejected', errorMessage: 'no such table: invoices', summary: null }));

    assert.deepEqual(history.stats('s1'), {
      total: 4,
      successful: 2,
      rejected: 1,
      failed: 1,
      successRate: 50,
      averageExecutionMs: 15,
    });
    assert.deepEqual(history.stats('nobody'), {
      total: 0,
      successful: 0,
      rejected: 0,
      failed: 0,
      successRate: 0,
      averageExecutionMs: null,
    });
  });

  it('finds similar successful requests', () => {
    assert.equal(similarity('show paid orders', 'show pending orders'), 0.5);

    history.append(entry('show pending orders'));
    history.append(entry('count customers'));
    history.append(entry('show paid orders today', rejected));

    assert.deepEqual(
      history.similar('s1', 'show paid orders').map((e) => e.requestText),
      ['show pending orders'],
    );
  });

  it('suggests follow-ups from recent tables and the schema', () => {
    history.append(entry('show orders'));
    const { suggestions } = history.suggest('s1', undefined, ['customers', 'orders']);
    assert.equal(suggestions.length, 9);
    assert.deepEqual(suggestions.slice(0, 4), [
      'Show me the total count of records in orders',
      'What are the different categories in orders?',
      'Show me the most recent entries in orders',
      'Show me the structure of the customers table',
    ]);
  });

  it('falls back to starter suggestions', () => {
    assert.deepEqual(history.suggest('s1', 'anything', []), {
      suggestions: ['Show me all tables in the database', 'Show me the latest 10 entries', 'Give me a summary of the data'],
      similar: [],
    });
  });
});
