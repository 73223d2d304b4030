import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { SqliteDriver } from '../db/adapters/sqlite.js';
import type { ConnectionDescriptor, DriverResult, RunOptions, SqlParam } from '../db/types.js';
import { isPipelineError, type ErrorKind } from '../errors.js';
import { Session, type SessionSettings } from '../session.js';
import { HistoryStore } from '../storage/history.js';
import { LocalStore } from '../storage/sqlite.js';
import { ScriptedModel, createShopDb, hangUntilAborted, plan, type ShopDb } from './fixtures.js';

/** Records every statement sent to the engine */
class RecordingDriver extends SqliteDriver {
  constructor(
    descriptor: ConnectionDescriptor,
    private readonly log: string[],
  ) {
    super(descriptor);
  }

  override async run(sql: string, params: readonly SqlParam[], options: RunOptions): Promise<DriverResult> {
    this.log.push(sql);
    return super.run(sql, params, options);
  }
}

function failsWith(kind: ErrorKind, message?: string) {
  return (error: unknown): boolean => {
    assert.ok(isPipelineError(error), `expected a PipelineError, got ${String(error)}`);
    assert.equal(error.kind, kind);
    if (message !== undefined) {
      assert.equal(error.message, message);
    }
    return true;
  };
}

const PAID_ORDERS = 'SELECT id FROM orders WHERE status = $1 ORDER BY id';

describe('Session', () => {
  let shop: ShopDb;
  let store: LocalStore;
  let history: HistoryStore;
  let model: ScriptedModel;
  let executed: string[];
  let session: Session;

  function openSession(settings: Partial<SessionSettings> = {}): Session {
    return new Session({
      id: 's1',
      model,
      settings,
      history,
      driverFactory: (descriptor) => new RecordingDriver(descriptor, executed),
    });
  }

  function orderIds(): number[] {
    const db = new Database(shop.path, { readonly: true });
    const rows = db.prepare('SELECT id FROM orders ORDER BY id').all() as Array<{ id: number }>;
    db.close();
    return rows.map((row) => row.id);
  }

  beforeEach(async () => {
    shop = createShopDb();
    store = new LocalStore();
    store.migrate();
    history = new HistoryStore(store.getDb());
    model = new ScriptedModel();
    executed = [];
    session = openSession();
    await session.connect({ engine: 'sqlite', path: shop.path });
  });

  afterEach(async () => {
    await session.close();
    store.close();
    shop.cleanup();
  });

  it('deletes one order by a bound id', async () => {
    model.push(plan('DELETE FROM orders WHERE id = $1', [456]));
    const result = await session.mutate('delete order 456', 'delete');

    assert.equal(result.kind, 'delete');
    assert.equal(result.affectedRows, 1);
    assert.deepEqual(result.params, [456]);
    assert.deepEqual(executed, ['DELETE FROM orders WHERE id = $1']);
    assert.deepEqual(orderIds(), [455, 457]);
  });

  it('reports zero affected rows when nothing matches', async () => {
    model.push(plan('DELETE FROM orders WHERE id = $1', [999]));
    const result = await session.mutate('delete order 999', 'delete');

    assert.equal(result.affectedRows, 0);
    assert.deepEqual(orderIds(), [455, 456, 457]);
    assert.equal(session.listHistory()[0].outcome, 'accepted');
  });

  it('deletes orders older than two years', async () => {
    model.push(plan("DELETE FROM orders WHERE julianday('now') - julianday(created_at) > 730"));
    const result = await session.mutate('delete orders older than 2 years', 'delete');

    assert.equal(result.affectedRows, 2);
    assert.deepEqual(orderIds(), [457]);
  });

  it('rejects an unknown table without executing anything', async () => {
    model.push(plan('SELECT id FROM invoices'));
    await assert.rejects(
      session.query('list invoices'),
      failsWith('UnknownTable', 'Table "invoices" does not exist in the current schema.'),
    );
    assert.deepEqual(executed, []);

    const [entry] = session.listHistory();
    assert.equal(entry.outcome, 'rejected');
    assert.equal(entry.errorKind, 'UnknownTable');
    assert.equal(entry.sql, 'SELECT id FROM invoices');
  });

  it('rejects a DELETE without a predicate and leaves the data alone', async () => {
    model.push(plan('DELETE FROM orders'));
    await assert.rejects(session.mutate('delete every order', 'delete'), failsWith('MissingFilterPredicate'));
    assert.deepEqual(executed, []);
    assert.deepEqual(orderIds(), [455, 456, 457]);
  });

  it('rejects a mutation compiled from a read-only request', async () => {
    model.push(plan('DELETE FROM orders WHERE id = $1', [456]));
    await assert.rejects(
      session.query('remove order 456'),
      failsWith('DisallowedStatementKind', 'Expected a SELECT statement, but the compiled SQL is DELETE.'),
    );
    assert.deepEqual(orderIds(), [455, 456, 457]);
  });

  it('answers a repeated question from the cache', async () => {
    model.push(plan(PAID_ORDERS, ['paid']));
    const first = await session.query('show paid orders');
    const second = await session.query('  Show paid orders? ');

    assert.deepEqual(first.rows, [{ id: 455 }, { id: 457 }]);
    assert.equal(first.fromCache, false);
    assert.deepEqual(first.warnings, ['SELECT has no LIMIT; the result is capped at the row ceiling.']);
    assert.equal(first.executedSql, `${PAID_ORDERS}\nLIMIT 1001`);
    assert.equal(second.fromCache, true);
    assert.deepEqual(second.rows, first.rows);
    assert.equal(model.calls.length, 1);
    assert.equal(executed.length, 1);
    assert.deepEqual(session.cacheStats(), { size: 1, hits: 1, misses: 1 });
  });

  it('invalidates cached reads after a mutation', async () => {
    model.push(
      plan(PAID_ORDERS, ['paid']),
      plan('UPDATE orders SET status = $1 WHERE id = $2', ['paid', 456]),
      plan(PAID_ORDERS, ['paid']),
    );
    await session.query('show paid orders');
    const update = await session.mutate('mark order 456 as paid', 'update');
    const after = await session.query('show paid orders');

    assert.equal(update.affectedRows, 1);
    assert.equal(after.fromCache, false);
    assert.deepEqual(after.rows, [{ id: 455 }, { id: 456 }, { id: 457 }]);
    assert.equal(model.calls.length, 3);
  });

  it('flags results cut at the row ceiling', async () => {
    await session.close();
    session = openSession({ maxRows: 2 });
    await session.connect({ engine: 'sqlite', path: shop.path });

    model.push(plan('SELECT id FROM orders ORDER BY id'));
    const result = await session.query('list orders');
    assert.equal(result.truncated, true);
    assert.equal(result.rowCount, 2);
    assert.deepEqual(result.rows, [{ id: 455 }, { id: 456 }]);
    assert.equal(result.executedSql, 'SELECT id FROM orders ORDER BY id\nLIMIT 3');
  });

  it('passes engine errors through as EngineRejected', async () => {
    model.push(plan('SELECT nope FROM orders LIMIT 1'));
    await assert.rejects(session.query('show nope'), failsWith('EngineRejected', 'no such column: nope'));
    assert.equal(session.listHistory()[0].outcome, 'failed');
  });

  it('reports unusable model output as CompilationError', async () => {
    model.push('no idea', 'still no idea');
    await assert.rejects(session.query('show orders'), failsWith('CompilationError'));
    const [entry] = session.listHistory();
    assert.equal(entry.outcome, 'failed');
    assert.equal(entry.sql, null);
  });

  it('includes accepted history in the next prompt', async () => {
    model.push(plan(PAID_ORDERS, ['paid']), plan('SELECT id FROM orders WHERE status = $1 ORDER BY id', ['pending']));
    await session.query('show paid orders');
    await session.query('and the pending ones');

    const followUp = model.calls[1][1].content;
    assert.ok(
      followUp.includes(
        'Previous requests in this session (oldest first):\n- Request: show paid orders\n  SQL: ' + PAID_ORDERS,
      ),
    );
  });

  it('repeats a past SELECT', async () => {
    model.push(plan(PAID_ORDERS, ['paid']), plan('DELETE FROM orders WHERE id = $1', [457]));
    const original = await session.query('show paid orders');
    await session.mutate('delete order 457', 'delete');

    model.push(plan(PAID_ORDERS, ['paid']));
    const again = await session.repeat(1);
    assert.deepEqual(original.rows, [{ id: 455 }, { id: 457 }]);
    assert.deepEqual(again.rows, [{ id: 455 }]);

    await assert.rejects(session.repeat(2), failsWith('InvalidRequest', 'Only SELECT requests can be repeated.'));
    await assert.rejects(session.repeat(99), failsWith('InvalidRequest', 'History entry 99 was not found in this session.'));
  });

  it('refuses an unknown mutation kind', async () => {
    await assert.rejects(
      session.mutate('drop the orders table', 'drop'),
      failsWith('InvalidRequest', 'Mutation kind must be one of insert, update, delete; got "drop".'),
    );
    assert.equal(model.calls.length, 0);
  });

  it('refuses empty request text', async () => {
    await assert.rejects(session.query('   '), failsWith('InvalidRequest', 'Request text is empty.'));
  });

  it('cancels an in-flight compile', async () => {
    model.push(hangUntilAborted);
    const controller = new AbortController();
    const pending = session.query('show orders', { signal: controller.signal });
    setTimeout(() => controller.abort(), 10);
    await assert.rejects(pending, failsWith('Cancelled'));
    assert.equal(session.listHistory()[0].errorKind, 'Cancelled');
    assert.deepEqual(executed, []);
  });

  it('finishes a joined read when the caller that started it cancels', async () => {
    let compileStarted = (): void => undefined;
    const started = new Promise<void>((resolve) => {
      compileStarted = resolve;
    });
    model.push(
      (_messages, options) => {
        compileStarted();
        return new Promise<string>((_resolve, reject) => {
          options.signal.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
        });
      },
      plan(PAID_ORDERS, ['paid']),
    );

    const controller = new AbortController();
    const first = session.query('list paid orders', { signal: controller.signal });
    const second = session.query('list paid orders');
    await started;
    controller.abort();

    await assert.rejects(first, failsWith('Cancelled'));
    const result = await second;
    assert.deepEqual(result.rows, [{ id: 455 }, { id: 457 }]);
    assert.equal(result.fromCache, false);
    assert.equal(model.calls.length, 2);
    assert.deepEqual(
      session.listHistory().map((entry) => [entry.outcome, entry.errorKind]),
      [
        ['accepted', null],
        ['failed', 'Cancelled'],
      ],
    );
  });

  it('explains a request without running it', async () => {
    model.push(plan(PAID_ORDERS, ['paid'], ['paid means settled']));
    const explanation = await session.explain('show paid orders');

    assert.deepEqual(explanation, {
      requestText: 'show paid orders',
      kind: 'select',
      sql: PAID_ORDERS,
      params: ['paid'],
      tables: ['orders'],
      verdict: { accepted: true, warnings: ['SELECT has no LIMIT; the result is capped at the row ceiling.'] },
      assumptions: ['paid means settled'],
      confidence: 0.9,
    });
    assert.deepEqual(executed, []);
    assert.deepEqual(session.listHistory(), []);
  });

  it('returns the rejection of an explained request instead of throwing', async () => {
    model.push(plan('DELETE FROM orders'));
    const explanation = await session.explain('delete every order', 'delete');

    assert.deepEqual(explanation.verdict, {
      accepted: false,
      reason: 'MissingFilterPredicate',
      message: 'DELETE without a WHERE clause on a column would affect every row.',
      suggestedFix: 'Say which rows to change, for example by id or by date.',
    });
    assert.deepEqual(orderIds(), [455, 456, 457]);
    await assert.rejects(
      session.explain('drop the orders table', 'drop'),
      failsWith('InvalidRequest', 'Statement kind must be select, insert, update, delete; got "drop".'),
    );
  });

  it('summarizes tables, columns and keys', async () => {
    assert.deepEqual(await session.summary(), {
      engine: 'sqlite',
      tableCount: 2,
      columnCount: 9,
      foreignKeyCount: 1,
      tables: [
        { name: 'customers', schema: 'main', columnCount: 3, primaryKey: ['id'], foreignKeys: [] },
        { name: 'orders', schema: 'main', columnCount: 6, primaryKey: ['id'], foreignKeys: ['customer_id'] },
      ],
    });
  });

  it('lists and describes tables', async () => {
    assert.deepEqual(await session.listTables(), ['customers', 'orders']);
    const customers = await session.describeTable('customers');
    assert.deepEqual(
      customers.columns.map((col) => col.keyRole),
      ['primary', 'unique', 'none'],
    );
  });

  it('summarizes the session history', async () => {
    model.push(plan(PAID_ORDERS, ['paid']), plan('SELECT id FROM invoices'));
    await session.query('show paid orders');
    await assert.rejects(session.query('list invoices'));

    const stats = session.historyStats();
    assert.ok(stats);
    assert.equal(stats.total, 2);
    assert.equal(stats.successful, 1);
    assert.equal(stats.rejected, 1);
    assert.equal(stats.successRate, 50);
  });
});

describe('Session without a connection', () => {
  it('fails with ConnectionInactive before calling the model', async () => {
    const model = new ScriptedModel([plan('SELECT 1')]);
    const session = new Session({ model });
    await assert.rejects(session.query('show orders'), failsWith('ConnectionInactive'));
    await assert.rejects(session.listTables(), failsWith('ConnectionInactive'));
    assert.equal(model.calls.length, 0);
    assert.deepEqual(session.status(), { connected: false, descriptor: null, connectionId: null });
  });

  it('suggests nothing without a history store', async () => {
    const session = new Session({ model: new ScriptedModel() });
    assert.deepEqual(await session.suggestions(), { suggestions: [], similar: [] });
    assert.deepEqual(session.listHistory(), []);
    assert.equal(session.historyStats(), null);
  });
});
