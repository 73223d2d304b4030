/**
 * Connection manager: owns exactly one live connection per session.
 *
 * Connecting while connected tears the prior driver down first. Statements on
 * the live connection are serialized through an ExclusiveLock, and every call
 * carries its own timeout and optional caller signal. The lock is held until
 * the driver settles, even after the caller has been told Timeout/Cancelled.
 */

import { randomUUID } from 'node:crypto';
import {
  PipelineError,
  connectionError,
  connectionInactive,
  errorMessage,
  isPipelineError,
} from '../errors.js';
import { ExclusiveLock, type BusyPolicy } from '../utils/lock.js';
import { withDeadline } from '../utils/deadline.js';
import type { Logger } from '../utils/logger.js';
import { SAFE_DEFAULTS } from './defaults.js';
import { createDriver, type DriverFactory } from './drivers.js';
import { connectionIdentity, redactDescriptor } from './identity.js';
import type { ConnectionDescriptor, DbDriver, DriverResult, SchemaSnapshot, SqlParam } from './types.js';

export interface ConnectionHandle {
  /** Unique per connect() call; a replaced handle becomes stale */
  readonly handleId: string;
  /** Stable identity of the descriptor, shared by reconnects to the same target */
  readonly connectionId: string;
  readonly descriptor: ConnectionDescriptor;
  readonly serverVersion: string;
  readonly openedAt: Date;
}

export interface ConnectionStatus {
  connected: boolean;
  descriptor: ConnectionDescriptor | null;
  connectionId: string | null;
}

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ConnectionManagerOptions {
  busyPolicy?: BusyPolicy;
  driverFactory?: DriverFactory;
  logger?: Logger;
}

interface LiveConnection {
  handle: ConnectionHandle;
  driver: DbDriver;
}

export class ConnectionManager {
  private live: LiveConnection | null = null;
  private readonly lock = new ExclusiveLock();
  private readonly busyPolicy: BusyPolicy;
  private readonly driverFactory: DriverFactory;
  private readonly logger?: Logger;

  constructor(options: ConnectionManagerOptions = {}) {
    this.busyPolicy = options.busyPolicy ?? 'wait';
    this.driverFactory = options.driverFactory ?? createDriver;
    this.logger = options.logger;
  }

  async connect(descriptor: ConnectionDescriptor): Promise<ConnectionHandle> {
    return this.lock.run('wait', async () => {
      // a descriptor no driver accepts leaves the current connection alone
      const driver = this.createDriver(descriptor);
      await this.teardown();

      let serverVersion: string;
      try {
        await withDeadline('connect', descriptor.connectTimeoutMs ?? SAFE_DEFAULTS.connectTimeoutMs, undefined, () =>
          driver.open(),
        );
        serverVersion = await driver.serverVersion();
      } catch (err: unknown) {
        await driver.close().catch(() => undefined);
        if (isPipelineError(err)) throw err;
        throw connectionError(errorMessage(err), { descriptor: redactDescriptor(descriptor) });
      }

      const handle: ConnectionHandle = Object.freeze({
        handleId: randomUUID(),
        connectionId: connectionIdentity(descriptor),
        descriptor: redactDescriptor(descriptor),
        serverVersion,
        openedAt: new Date(),
      });
      this.live = { handle, driver };
      this.logger?.info({ connectionId: handle.connectionId, engine: descriptor.engine }, 'connected');
      return handle;
    });
  }

  private createDriver(descriptor: ConnectionDescriptor): DbDriver {
    try {
      return this.driverFactory(descriptor);
    } catch (err: unknown) {
      throw connectionError(errorMessage(err), { descriptor: redactDescriptor(descriptor) });
    }
  }

  /** Idempotent: disconnecting with nothing open is a no-op */
  async disconnect(): Promise<void> {
    await this.lock.run('wait', () => this.teardown());
  }

  private async teardown(): Promise<void> {
    const live = this.live;
    if (!live) return;
    this.live = null;
    try {
      await live.driver.close();
    } catch (err: unknown) {
      this.logger?.warn({ connectionId: live.handle.connectionId, err: errorMessage(err) }, 'error while closing connection');
    }
    this.logger?.info({ connectionId: live.handle.connectionId }, 'disconnected');
  }

  status(): ConnectionStatus {
    if (!this.live) {
      return { connected: false, descriptor: null, connectionId: null };
    }
    return {
      connected: true,
      descriptor: this.live.handle.descriptor,
      connectionId: this.live.handle.connectionId,
    };
  }

  /** The live handle, or ConnectionInactive */
  activeHandle(): ConnectionHandle {
    if (!this.live) {
      throw connectionInactive();
    }
    return this.live.handle;
  }

  private driverFor(handle: ConnectionHandle): DbDriver {
    if (!this.live || this.live.handle.handleId !== handle.handleId) {
      throw connectionInactive('The connection handle is no longer active.');
    }
    return this.live.driver;
  }

  /**
   * Execute one statement on the live connection. Driver failures propagate
   * as raised by the engine; Timeout/Cancelled surface from the deadline.
   */
  async execute(
    handle: ConnectionHandle,
    sql: string,
    params: readonly SqlParam[],
    options: ExecuteOptions,
  ): Promise<DriverResult> {
    return this.lock.run(this.busyPolicy, async () => {
      const driver = this.driverFor(handle);
      const started: Promise<unknown>[] = [];
      try {
        return await withDeadline('execute', options.timeoutMs, options.signal, (signal) => {
          const running = driver.run(sql, params, { timeoutMs: options.timeoutMs, signal });
          started.push(running);
          return running;
        });
      } finally {
        // a timed-out or cancelled statement keeps the lock until the engine lets go of it,
        // so a late cancel cannot land on the next statement
        await Promise.allSettled(started);
      }
    });
  }

  async introspect(handle: ConnectionHandle, options: ExecuteOptions): Promise<SchemaSnapshot> {
    return this.lock.run(this.busyPolicy, async () => {
      const driver = this.driverFor(handle);
      const started: Promise<unknown>[] = [];
      try {
        return await withDeadline('execute', options.timeoutMs, options.signal, () => {
          const running = driver.introspect();
          started.push(running);
          return running;
        });
      } catch (err: unknown) {
        if (err instanceof PipelineError) throw err;
        throw connectionError(`Schema introspection failed: ${errorMessage(err)}`);
      } finally {
        await Promise.allSettled(started);
      }
    });
  }
}
