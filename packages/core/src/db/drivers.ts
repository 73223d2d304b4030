/**
 * Driver dispatcher.
 * Selects the engine driver from the descriptor's engine kind.
 */

import { PostgresDriver } from './adapters/postgres.js';
import { MySqlDriver } from './adapters/mysql.js';
import { SqliteDriver } from './adapters/sqlite.js';
import { ENGINE_KINDS, type ConnectionDescriptor, type DbDriver } from './types.js';

export type DriverFactory = (descriptor: ConnectionDescriptor) => DbDriver;

export const createDriver: DriverFactory = (descriptor) => {
  switch (descriptor.engine) {
    case 'postgres':
      return new PostgresDriver(descriptor);
    case 'mysql':
      return new MySqlDriver(descriptor);
    case 'sqlite':
      return new SqliteDriver(descriptor);
    default:
      throw new Error(`Unsupported database engine: ${String(descriptor.engine)}. Supported: ${ENGINE_KINDS.join(', ')}.`);
  }
};
