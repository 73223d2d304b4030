import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConnectionManager } from '../../db/connection-manager.js';
import { SqliteDriver } from '../../db/adapters/sqlite.js';
import type { SchemaSnapshot } from '../../db/types.js';
import { isPipelineError } from '../../errors.js';
import { SchemaCache } from '../schema-cache.js';
import { createShopDb, type ShopDb } from '../../__tests__/fixtures.js';

class CountingDriver extends SqliteDriver {
  introspections = 0;

  override async introspect(): Promise<SchemaSnapshot> {
    this.introspections++;
    return super.introspect();
  }
}

describe('SchemaCache', () => {
  let shop: ShopDb;
  let drivers: CountingDriver[];
  let manager: ConnectionManager;
  let cache: SchemaCache;
  let connectionId: string;

  beforeEach(async () => {
    shop = createShopDb();
    drivers = [];
    manager = new ConnectionManager({
      driverFactory: (descriptor) => {
        const driver = new CountingDriver(descriptor);
        drivers.push(driver);
        return driver;
      },
    });
    cache = new SchemaCache(manager);
    connectionId = (await manager.connect({ engine: 'sqlite', path: shop.path })).connectionId;
  });

  afterEach(async () => {
    await manager.disconnect();
    shop.cleanup();
  });

  it('introspects once and shares the snapshot', async () => {
    const [a, b] = await Promise.all([cache.getSnapshot(connectionId), cache.getSnapshot(connectionId)]);
    const c = await cache.getSnapshot(connectionId);
    assert.equal(a, b);
    assert.equal(a, c);
    assert.equal(drivers[0].introspections, 1);
  });

  it('introspects again for a joined caller when the first caller cancels', async () => {
    const controller = new AbortController();
    controller.abort();
    const first = cache.getSnapshot(connectionId, controller.signal);
    const second = cache.getSnapshot(connectionId);

    await assert.rejects(first, (error: unknown) => isPipelineError(error) && error.kind === 'Cancelled');
    const snapshot = await second;
    assert.deepEqual(
      snapshot.tables.map((table) => table.name),
      ['customers', 'orders'],
    );
  });

  it('hands out a frozen snapshot', async () => {
    const snapshot = await cache.getSnapshot(connectionId);
    assert.equal(Object.isFrozen(snapshot), true);
    assert.equal(Object.isFrozen(snapshot.tables), true);
    assert.equal(Object.isFrozen(snapshot.tables[0].columns[0]), true);
  });

  it('re-introspects after invalidate', async () => {
    await cache.getSnapshot(connectionId);
    cache.invalidate(connectionId);
    await cache.getSnapshot(connectionId);
    assert.equal(drivers[0].introspections, 2);
  });

  it('lists and describes tables', async () => {
    assert.deepEqual(await cache.listTables(connectionId), ['customers', 'orders']);
    const orders = await cache.describeTable(connectionId, 'MAIN.Orders');
    assert.equal(orders.name, 'orders');
    assert.deepEqual(
      orders.columns.map((col) => col.name),
      ['id', 'customer_id', 'status', 'total_cents', 'note', 'created_at'],
    );
  });

  it('reports an unknown table', async () => {
    await assert.rejects(cache.describeTable(connectionId, 'invoices'), (error: unknown) => {
      assert.ok(isPipelineError(error));
      assert.equal(error.kind, 'UnknownTable');
      assert.equal(error.message, 'Table "invoices" does not exist in the current schema.');
      return true;
    });
  });

  it('refuses an identity that is not the live connection', async () => {
    await assert.rejects(cache.getSnapshot('abc'), { message: 'No live connection matches abc.' });
    await manager.disconnect();
    await assert.rejects(
      cache.getSnapshot(connectionId),
      (error: unknown) => isPipelineError(error) && error.kind === 'ConnectionInactive',
    );
  });
});
