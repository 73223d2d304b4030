import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConnectionManager } from '../connection-manager.js';
import type { ConnectionDescriptor, DbDriver, DriverResult, RunOptions, SchemaSnapshot, SqlParam } from '../types.js';
import { isPipelineError } from '../../errors.js';

/** In-process driver; `run` waits for `release` when gated */
class FakeDriver implements DbDriver {
  readonly engine = 'postgres' as const;
  opened = false;
  closed = false;
  readonly statements: string[] = [];
  gate: Promise<void> | null = null;
  /** Keep running after the abort signal, like an engine that has not seen the cancel yet */
  ignoreAbort = false;

  constructor(
    readonly descriptor: ConnectionDescriptor,
    private readonly failOpen = false,
  ) {}

  async open(): Promise<void> {
    if (this.failOpen) throw new Error('password authentication failed');
    this.opened = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async run(sql: string, _params: readonly SqlParam[], options: RunOptions): Promise<DriverResult> {
    this.statements.push(sql);
    if (this.gate) {
      const gate = this.gate;
      await new Promise<void>((resolve, reject) => {
        if (!this.ignoreAbort) {
          options.signal.addEventListener('abort', () => reject(new Error('canceling statement')), { once: true });
        }
        gate.then(resolve, reject);
      });
    }
    return { columns: ['n'], rows: [{ n: 1 }], reader: true, affectedRows: 0 };
  }

  async introspect(): Promise<SchemaSnapshot> {
    return { tables: [], capturedAt: new Date(0) };
  }

  async serverVersion(): Promise<string> {
    return 'PostgreSQL 16.2';
  }
}

const shop: ConnectionDescriptor = { engine: 'postgres', host: 'db.local', database: 'shop', user: 'app', password: 'test-secret' };
const billing: ConnectionDescriptor = { engine: 'postgres', host: 'db.local', database: 'billing', user: 'app' };

function managerWithFakes(options: { busyPolicy?: 'wait' | 'reject'; failOpen?: boolean } = {}) {
  const drivers: FakeDriver[] = [];
  const manager = new ConnectionManager({
    busyPolicy: options.busyPolicy,
    driverFactory: (descriptor) => {
      const driver = new FakeDriver(descriptor, options.failOpen);
      drivers.push(driver);
      return driver;
    },
  });
  return { manager, drivers };
}

function kindOf(expected: string) {
  return (error: unknown): boolean => isPipelineError(error) && error.kind === expected;
}

describe('ConnectionManager', () => {
  it('reports no connection before connect', () => {
    const { manager } = managerWithFakes();
    assert.deepEqual(manager.status(), { connected: false, descriptor: null, connectionId: null });
    assert.throws(() => manager.activeHandle(), kindOf('ConnectionInactive'));
  });

  it('redacts the password in the handle', async () => {
    const { manager } = managerWithFakes();
    const handle = await manager.connect(shop);
    assert.equal(handle.descriptor.password, '***');
    assert.equal(handle.serverVersion, 'PostgreSQL 16.2');
    assert.equal(manager.status().connectionId, handle.connectionId);
  });

  it('closes the prior connection and invalidates its handle on reconnect', async () => {
    const { manager, drivers } = managerWithFakes();
    const first = await manager.connect(shop);
    const second = await manager.connect(billing);

    assert.equal(drivers[0].closed, true);
    assert.notEqual(first.connectionId, second.connectionId);
    await assert.rejects(manager.execute(first, 'SELECT 1', [], { timeoutMs: 1000 }), {
      message: 'The connection handle is no longer active.',
    });
    const result = await manager.execute(second, 'SELECT 1', [], { timeoutMs: 1000 });
    assert.deepEqual(result.rows, [{ n: 1 }]);
    assert.deepEqual(drivers[1].statements, ['SELECT 1']);
  });

  it('keeps the connection id across reconnects to the same target', async () => {
    const { manager } = managerWithFakes();
    const first = await manager.connect(shop);
    const again = await manager.connect({ ...shop, password: 'rotated' });
    assert.equal(first.connectionId, again.connectionId);
    assert.notEqual(first.handleId, again.handleId);
  });

  it('treats disconnect as idempotent', async () => {
    const { manager, drivers } = managerWithFakes();
    await manager.disconnect();
    await manager.connect(shop);
    await manager.disconnect();
    await manager.disconnect();
    assert.equal(drivers[0].closed, true);
    assert.equal(manager.status().connected, false);
  });

  it('wraps open failures as ConnectionError and leaves nothing active', async () => {
    const { manager, drivers } = managerWithFakes({ failOpen: true });
    await assert.rejects(manager.connect(shop), (error: unknown) => {
      assert.ok(isPipelineError(error));
      assert.equal(error.kind, 'ConnectionError');
      assert.equal(error.message, 'password authentication failed');
      return true;
    });
    assert.equal(drivers[0].closed, true);
    assert.equal(manager.status().connected, false);
  });

  it('reports a descriptor no driver takes as ConnectionError and keeps the live connection', async () => {
    const drivers: FakeDriver[] = [];
    const manager = new ConnectionManager({
      driverFactory: (descriptor) => {
        if (descriptor.database === 'legacy') throw new Error('Unsupported database engine: legacy');
        const driver = new FakeDriver(descriptor);
        drivers.push(driver);
        return driver;
      },
    });
    const live = await manager.connect(shop);

    await assert.rejects(manager.connect({ ...shop, database: 'legacy' }), (error: unknown) => {
      assert.ok(isPipelineError(error));
      assert.equal(error.kind, 'ConnectionError');
      assert.equal(error.message, 'Unsupported database engine: legacy');
      return true;
    });
    assert.equal(drivers[0].closed, false);
    assert.equal(manager.status().connectionId, live.connectionId);
  });

  it('rejects a second statement with Busy under the reject policy', async () => {
    const { manager, drivers } = managerWithFakes({ busyPolicy: 'reject' });
    const handle = await manager.connect(shop);
    let release = (): void => undefined;
    drivers[0].gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const first = manager.execute(handle, 'SELECT pg_sleep(1)', [], { timeoutMs: 1000 });
    await assert.rejects(manager.execute(handle, 'SELECT 2', [], { timeoutMs: 1000 }), kindOf('Busy'));
    release();
    await first;
    assert.deepEqual(drivers[0].statements, ['SELECT pg_sleep(1)']);
  });

  it('queues statements under the wait policy', async () => {
    const { manager, drivers } = managerWithFakes();
    const handle = await manager.connect(shop);
    let release = (): void => undefined;
    drivers[0].gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const first = manager.execute(handle, 'SELECT 1', [], { timeoutMs: 1000 });
    const second = manager.execute(handle, 'SELECT 2', [], { timeoutMs: 1000 });
    release();
    await Promise.all([first, second]);
    assert.deepEqual(drivers[0].statements, ['SELECT 1', 'SELECT 2']);
  });

  it('surfaces Timeout when a statement overruns', async () => {
    const { manager, drivers } = managerWithFakes();
    const handle = await manager.connect(shop);
    drivers[0].gate = new Promise<void>(() => undefined);
    await assert.rejects(manager.execute(handle, 'SELECT 1', [], { timeoutMs: 20 }), (error: unknown) => {
      assert.ok(isPipelineError(error));
      assert.equal(error.kind, 'Timeout');
      assert.equal(error.message, 'The execute phase exceeded its 20ms timeout.');
      return true;
    });
  });

  it('holds the next statement until a timed-out one has settled in the engine', async () => {
    const { manager, drivers } = managerWithFakes();
    const handle = await manager.connect(shop);
    const driver = drivers[0];
    let release = (): void => undefined;
    driver.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    driver.ignoreAbort = true;

    const slow = manager.execute(handle, 'SELECT slow', [], { timeoutMs: 20 });
    const next = manager.execute(handle, 'SELECT next', [], { timeoutMs: 1000 });
    await new Promise((resolve) => setTimeout(resolve, 60));
    assert.deepEqual(driver.statements, ['SELECT slow']);

    driver.gate = null;
    release();
    await assert.rejects(slow, kindOf('Timeout'));
    await next;
    assert.deepEqual(driver.statements, ['SELECT slow', 'SELECT next']);
  });

  it('surfaces Cancelled when the caller aborts', async () => {
    const { manager, drivers } = managerWithFakes();
    const handle = await manager.connect(shop);
    drivers[0].gate = new Promise<void>(() => undefined);
    const controller = new AbortController();
    const pending = manager.execute(handle, 'SELECT 1', [], { timeoutMs: 5000, signal: controller.signal });
    controller.abort();
    await assert.rejects(pending, kindOf('Cancelled'));
  });
});
