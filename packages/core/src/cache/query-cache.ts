/**
 * Read-result cache keyed on (connection identity, normalized request text).
 * Map with LRU eviction and per-entry TTL; only SELECT results are stored.
 */

import { createHash } from 'node:crypto';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { isPipelineError } from '../errors.js';
import type { QueryResult } from '../executor.js';
import type { Logger } from '../utils/logger.js';

export interface QueryCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  /** Milliseconds clock; tests pass a fake one */
  now?: () => number;
  logger?: Logger;
}

export interface QueryCacheStats {
  size: number;
  hits: number;
  misses: number;
}

interface CacheEntry {
  connectionId: string;
  result: QueryResult;
  expiresAt: number;
}

/**
 * Normalize request text for consistent cache keys
 * - Trim and convert to lowercase
 * - Collapse whitespace
 * - Drop trailing punctuation
 */
export function normalizeRequest(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[\s?.!;]+$/, '');
}

export function cacheKey(connectionId: string, requestText: string): string {
  return createHash('sha256').update(`${connectionId}\u0000${normalizeRequest(requestText)}`).digest('hex');
}

export class QueryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<QueryResult>>();
  /** Bumped on invalidation so computations already running are not stored */
  private readonly generations = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: QueryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? SAFE_DEFAULTS.cacheTtlMs;
    this.maxEntries = options.maxEntries ?? SAFE_DEFAULTS.cacheMaxEntries;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  /** A fresh entry, promoted to most recently used; expired entries are dropped */
  peek(key: string): QueryResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    // LRU promotion: delete and re-add to move to end of Map
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.result;
  }

  /**
   * Return the cached result tagged `fromCache: true`, or run `compute`.
   * Concurrent misses on one key share a single computation. A caller that
   * joined a computation cancelled by its starter runs its own `compute`.
   */
  async getOrCompute(key: string, connectionId: string, compute: () => Promise<QueryResult>): Promise<QueryResult> {
    const cached = this.peek(key);
    if (cached) {
      this.hits++;
      return Object.freeze({ ...cached, fromCache: true });
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.hits++;
      // the shared run belongs to the first caller; its cancellation is not ours
      return pending.catch((error: unknown) => {
        if (isPipelineError(error) && error.kind === 'Cancelled') {
          return this.getOrCompute(key, connectionId, compute);
        }
        throw error;
      });
    }

    this.misses++;
    const generation = this.generations.get(connectionId) ?? 0;
    const task: Promise<QueryResult> = compute()
      .then((result) => {
        if (result.kind === 'select' && (this.generations.get(connectionId) ?? 0) === generation) {
          this.store(key, connectionId, result);
        }
        return result;
      })
      .finally(() => {
        if (this.inflight.get(key) === task) {
          this.inflight.delete(key);
        }
      });

    this.inflight.set(key, task);
    return task;
  }

  private store(key: string, connectionId: string, result: QueryResult): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      // Map iterates in insertion order: the first key is the least recently used
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { connectionId, result, expiresAt: this.now() + this.ttlMs });
  }

  /** Drop every entry of one connection; returns how many were removed */
  invalidateConnection(connectionId: string): number {
    this.generations.set(connectionId, (this.generations.get(connectionId) ?? 0) + 1);
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.connectionId === connectionId) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.logger?.info({ connectionId, removed }, 'query cache invalidated');
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): QueryCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
