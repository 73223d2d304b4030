/**
 * Stable connection identity: SHA-256 over the normalized descriptor.
 * The password never takes part, so rotating it keeps caches and history keyed the same.
 */

import { createHash } from 'node:crypto';
import { resolve } from 'node:path';
import { DEFAULT_PORTS } from './defaults.js';
import type { ConnectionDescriptor } from './types.js';

export interface NormalizedDescriptor {
  engine: ConnectionDescriptor['engine'];
  host: string | null;
  port: number | null;
  database: string | null;
  user: string | null;
  path: string | null;
}

export function normalizeDescriptor(descriptor: ConnectionDescriptor): NormalizedDescriptor {
  if (descriptor.engine === 'sqlite') {
    return {
      engine: 'sqlite',
      host: null,
      port: null,
      database: null,
      user: null,
      path: descriptor.path ? resolve(descriptor.path) : null,
    };
  }
  return {
    engine: descriptor.engine,
    host: (descriptor.host ?? 'localhost').trim().toLowerCase(),
    port: descriptor.port ?? DEFAULT_PORTS[descriptor.engine],
    database: descriptor.database?.trim() || null,
    user: descriptor.user?.trim() || null,
    path: null,
  };
}

export function connectionIdentity(descriptor: ConnectionDescriptor): string {
  const n = normalizeDescriptor(descriptor);
  const material = [n.engine, n.host ?? '', n.port ?? '', n.database ?? '', n.user ?? '', n.path ?? ''].join('\u0000');
  return createHash('sha256').update(material).digest('hex');
}

/** Descriptor copy that is safe to log or return to callers */
export function redactDescriptor(descriptor: ConnectionDescriptor): ConnectionDescriptor {
  const { password, ...rest } = descriptor;
  return password === undefined ? rest : { ...rest, password: '***' };
}
