/**
 * Connection flags → descriptor. Flags override the ASKDB_DB_* default
 * connection from the environment; a bare --path means SQLite.
 */

import { ENGINE_KINDS, type ConnectionDescriptor, type EngineKind } from '@askdb/core';
import { usageError } from './errors.js';

export interface ConnectionFlags {
  engine?: string;
  host?: string;
  port?: string;
  database?: string;
  user?: string;
  path?: string;
  ssl?: boolean;
}

function parseEngine(value: string): EngineKind {
  const engine = ENGINE_KINDS.find((kind) => kind === value.trim().toLowerCase());
  if (!engine) {
    throw usageError(`Invalid --engine "${value}". Expected one of ${ENGINE_KINDS.join(', ')}.`);
  }
  return engine;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw usageError('Invalid --port. Expected 1-65535.');
  }
  return port;
}

export function descriptorFromFlags(
  flags: ConnectionFlags,
  fallback: ConnectionDescriptor | null,
): ConnectionDescriptor | null {
  const engine = flags.engine ? parseEngine(flags.engine) : flags.path && !fallback ? 'sqlite' : fallback?.engine;
  if (!engine) {
    return null;
  }

  // a different engine starts from scratch instead of inheriting the env target
  const base: ConnectionDescriptor = fallback && fallback.engine === engine ? { ...fallback } : { engine };
  const descriptor: ConnectionDescriptor = {
    ...base,
    engine,
    ...(flags.host !== undefined && { host: flags.host }),
    ...(flags.port !== undefined && { port: parsePort(flags.port) }),
    ...(flags.database !== undefined && { database: flags.database }),
    ...(flags.user !== undefined && { user: flags.user }),
    ...(flags.path !== undefined && { path: flags.path }),
    ...(flags.ssl && { ssl: true }),
  };

  if (engine === 'sqlite' && !descriptor.path) {
    throw usageError('SQLite connections need --path <file>.');
  }
  if (engine !== 'sqlite' && !descriptor.database) {
    throw usageError(`A ${engine} connection needs --database <name>.`);
  }
  return descriptor;
}

export function needsPassword(descriptor: ConnectionDescriptor): boolean {
  return descriptor.engine !== 'sqlite' && descriptor.password === undefined;
}
