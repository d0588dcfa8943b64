/**
 * @fileoverview Result Cache - TTL + LRU key/value store with optional
 * write-through persistence.
 *
 * Expiry is lazy: `get` purges an expired entry before answering and `set`
 * sweeps all expired entries before inserting. There is no background
 * sweeper, yet `get` never returns an entry older than its TTL.
 *
 * With a persistence directory each entry is mirrored to
 * `<md5(key)>.json`. A fresh cache over the same directory reloads every
 * non-expired file; unreadable files are deleted.
 *
 * The cache is not safe to share between concurrently running agents: give
 * each agent its own instance and its own directory.
 *
 * @module explorer/cache/result-cache
 * @version 0.1.0
 */

import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { z } from 'zod';
import { toError } from '../types/errors.js';
import { Logger, createLogger } from '../observability/logger.js';

/** Persisted entries are named `<md5(key)>.json` */
const CACHE_FILE_PATTERN = /^[0-9a-f]{32}\.json$/;

/**
 * A single cached value with its timestamps.
 */
export interface CacheEntry {
  readonly key: string;
  readonly value: unknown;
  readonly createdAt: number;
  lastAccessAt: number;
}

/**
 * Options for the cache.
 */
export interface ResultCacheOptions {
  readonly maxSize: number;
  readonly ttlMs: number;
  /** Persistence directory; null or omitted keeps the cache in memory */
  readonly directory?: string | null;
  /** Time source, defaults to Date.now */
  readonly clock?: () => number;
  readonly logger?: Logger;
}

/**
 * Counters describing cache behaviour.
 */
export interface CacheStats {
  readonly size: number;
  readonly maxSize: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly expirations: number;
}

const PersistedEntrySchema = z.object({
  key: z.string(),
  value: z.unknown(),
  createdAt: z.number(),
  lastAccessAt: z.number(),
});

/**
 * Bounded cache for tool results.
 *
 * @example
 * ```typescript
 * const cache = new ResultCache({ maxSize: 100, ttlMs: 60_000, directory: '.cache' });
 * cache.set('read_file:{"filePath":"README.md"}', result);
 * cache.get('read_file:{"filePath":"README.md"}');
 * ```
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly directory: string | null;
  private readonly clock: () => number;
  private readonly logger: Logger;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: ResultCacheOptions) {
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.directory = options.directory ?? null;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('cache');

    if (this.directory !== null) {
      fs.mkdirSync(this.directory, { recursive: true });
      this.loadPersisted(this.directory);
    }
  }

  /**
   * Returns the value for a key, or undefined when absent or expired.
   */
  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    const now = this.clock();
    if (this.isExpired(entry, now)) {
      this.remove(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    entry.lastAccessAt = now;
    // Re-insert so map order follows access order for equal timestamps
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * True when a live entry exists. Does not refresh the access time.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.clock());
  }

  /**
   * Stores a value, sweeping expired entries and evicting the least
   * recently accessed entry when at capacity.
   */
  set(key: string, value: unknown): void {
    const now = this.clock();

    this.purgeExpired(now);

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      this.evictLeastRecentlyUsed();
    }

    const entry: CacheEntry = { key, value, createdAt: now, lastAccessAt: now };
    this.entries.set(key, entry);

    if (this.directory !== null) {
      this.persist(this.directory, entry);
    }
  }

  /**
   * Removes one key. Returns true when it was present.
   */
  delete(key: string): boolean {
    if (!this.entries.has(key)) return false;
    this.remove(key);
    return true;
  }

  /**
   * Removes every entry and every persisted cache file. Other files in
   * the directory are left alone.
   */
  clear(): void {
    this.entries.clear();

    if (this.directory === null) return;
    for (const file of fs.readdirSync(this.directory)) {
      if (CACHE_FILE_PATTERN.test(file)) {
        this.unlinkQuietly(path.join(this.directory, file));
      }
    }
  }

  /**
   * Number of entries currently held, including not-yet-purged expired ones.
   */
  size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  // ============ Private Methods ============

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt > this.ttlMs;
  }

  private purgeExpired(now: number): void {
    for (const entry of [...this.entries.values()]) {
      if (this.isExpired(entry, now)) {
        this.remove(entry.key);
        this.expirations++;
      }
    }
  }

  private evictLeastRecentlyUsed(): void {
    let oldest: CacheEntry | null = null;
    for (const entry of this.entries.values()) {
      if (oldest === null || entry.lastAccessAt < oldest.lastAccessAt) {
        oldest = entry;
      }
    }
    if (oldest === null) return;

    this.remove(oldest.key);
    this.evictions++;
    this.logger.debug('Evicted least recently used entry', { key: oldest.key });
  }

  private remove(key: string): void {
    this.entries.delete(key);
    if (this.directory !== null) {
      this.unlinkQuietly(this.entryPath(this.directory, key));
    }
  }

  private entryPath(directory: string, key: string): string {
    return path.join(directory, `${hashKey(key)}.json`);
  }

  private persist(directory: string, entry: CacheEntry): void {
    const filePath = this.entryPath(directory, entry.key);
    try {
      fs.writeFileSync(filePath, JSON.stringify(entry), 'utf-8');
    } catch (error) {
      // The in-memory entry stays valid; only persistence is lost
      this.logger.warn('Failed to persist cache entry', {
        key: entry.key,
        reason: toError(error).message,
      });
    }
  }

  private loadPersisted(directory: string): void {
    const now = this.clock();
    let loaded = 0;

    for (const file of fs.readdirSync(directory)) {
      if (!CACHE_FILE_PATTERN.test(file)) continue;
      const filePath = path.join(directory, file);

      const entry = this.readEntry(filePath);
      if (entry === null) {
        this.logger.warn('Removing corrupted cache file', { file });
        this.unlinkQuietly(filePath);
        continue;
      }
      if (this.isExpired(entry, now)) {
        this.unlinkQuietly(filePath);
        continue;
      }

      this.entries.set(entry.key, entry);
      loaded++;
    }

    // Oldest access first so eviction order survives a restart
    const sorted = [...this.entries.values()].sort((a, b) => a.lastAccessAt - b.lastAccessAt);
    this.entries.clear();
    for (const entry of sorted) {
      this.entries.set(entry.key, entry);
    }
    while (this.entries.size > this.maxSize) {
      this.evictLeastRecentlyUsed();
    }

    if (loaded > 0) {
      this.logger.debug('Loaded persisted cache entries', { loaded, directory });
    }
  }

  private readEntry(filePath: string): CacheEntry | null {
    try {
      const parsed = PersistedEntrySchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
      if (!parsed.success) return null;
      return {
        key: parsed.data.key,
        value: parsed.data.value,
        createdAt: parsed.data.createdAt,
        lastAccessAt: parsed.data.lastAccessAt,
      };
    } catch {
      return null;
    }
  }

  private unlinkQuietly(filePath: string): void {
    try {
      fs.unlinkSync(filePath);
    } catch (error) {
      if (isMissingFile(error)) return;
      this.logger.warn('Failed to remove cache file', {
        filePath,
        reason: toError(error).message,
      });
    }
  }
}

/**
 * File-name-safe digest of a cache key.
 */
export function hashKey(key: string): string {
  return createHash('md5').update(key).digest('hex');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
