/**
 * ResponseCache
 * Time-bounded memoization of read results: deterministic keys, lazy TTL
 * eviction, substring invalidation, byte quota and a local backup snapshot.
 */

import type { KeyValueStorage } from '../client/storage';
import { readJson, writeJson } from '../client/storage';
import { createLogger, type Logger } from '../utils/logger';
import {
  CACHE_BACKUP_KEY,
  CACHE_VERSION,
  DEFAULT_TTL_MS,
  QUOTA_LOW_WATERMARK,
  type CacheEntry,
  type CacheSnapshot,
  createCacheEntry,
  isCacheSnapshot,
  isExpired,
  isValidVersion,
} from './schema';

export interface ResponseCacheOptions {
  enabled?: boolean;
  ttlMs?: number;
  /** Byte quota; 0 or undefined disables it */
  maxBytes?: number;
  storage?: KeyValueStorage;
  backupKey?: string;
  logger?: Logger;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: string;
  entries: number;
  bytes: number;
  evictions: number;
}

export type ParamValue = string | number | boolean | null | undefined | Date | readonly unknown[] | object;

export class ResponseCache {
  private enabled: boolean;
  private ttlMs: number;
  private maxBytes: number;
  private storage?: KeyValueStorage;
  private backupKey: string;
  private logger: Logger;
  private entries = new Map<string, CacheEntry>();
  private bytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResponseCacheOptions = {}) {
    this.enabled = options.enabled !== false;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxBytes = options.maxBytes ?? 0;
    this.storage = options.storage;
    this.backupKey = options.backupKey ?? CACHE_BACKUP_KEY;
    this.logger = options.logger ?? createLogger('ResponseCache');
  }

  /**
   * Same endpoint and semantically equal params always give the same key,
   * whatever the object key order. Keys always carry a `?` so that
   * `/feedback?` only ever matches collection reads.
   */
  static generateCacheKey(endpoint: string, params: Record<string, ParamValue> = {}): string {
    const normalized = normalizeParams(params);
    const entries = Object.keys(normalized)
      .sort()
      .map((key) => `${encodeURIComponent(key)}=${encodeURIComponent(stableStringify(normalized[key]))}`);
    return `${endpoint}?${entries.join('&')}`;
  }

  getEnabled(): boolean {
    return this.enabled;
  }

  getTtl(): number {
    return this.ttlMs;
  }

  /**
   * Returns undefined when missing or expired; expired entries are deleted.
   */
  get(key: string): unknown {
    return this.getEntry(key)?.data;
  }

  getEntry(key: string): CacheEntry | undefined {
    if (!this.enabled) return undefined;

    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }

    if (isExpired(entry, this.ttlMs)) {
      this.remove(key);
      this.misses += 1;
      this.logger.debug('Expired', key);
      return undefined;
    }

    this.hits += 1;
    return entry;
  }

  /**
   * Looks an entry up without touching hit/miss statistics.
   */
  peek(key: string): unknown {
    return this.peekEntry(key)?.data;
  }

  peekEntry(key: string): CacheEntry | undefined {
    if (!this.enabled) return undefined;
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (isExpired(entry, this.ttlMs)) {
      this.remove(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, data: unknown, etag?: string): void {
    if (!this.enabled) return;

    this.remove(key);
    const entry = createCacheEntry(key, data, etag);
    this.entries.set(key, entry);
    this.bytes += entry.size;

    if (this.maxBytes > 0 && this.bytes > this.maxBytes) {
      this.evictToWatermark();
    }
  }

  delete(key: string): boolean {
    return this.remove(key);
  }

  /**
   * No argument clears everything; otherwise every key containing the
   * given text is removed (substring, not regex). Returns the count.
   */
  invalidate(keyOrPrefix?: string): number {
    if (keyOrPrefix === undefined) {
      const count = this.entries.size;
      this.entries.clear();
      this.bytes = 0;
      return count;
    }

    let count = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.includes(keyOrPrefix)) {
        this.remove(key);
        count += 1;
      }
    }
    if (count > 0) this.logger.debug(`Invalidated ${count} entries`, keyOrPrefix);
    return count;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getUsage(): number {
    return this.bytes;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    const hitRate = total > 0 ? ((this.hits / total) * 100).toFixed(2) + '%' : '0%';
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate,
      entries: this.entries.size,
      bytes: this.bytes,
      evictions: this.evictions,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Writes the unexpired entries to the backup storage key.
   */
  persist(): boolean {
    if (!this.storage) return false;
    const now = Date.now();
    const snapshot: CacheSnapshot = {
      version: CACHE_VERSION,
      savedAt: now,
      entries: Array.from(this.entries.values()).filter((entry) => !isExpired(entry, this.ttlMs, now)),
    };
    return writeJson(this.storage, this.backupKey, snapshot, this.logger);
  }

  /**
   * Loads the backup snapshot, skipping expired entries and other versions.
   * Returns the number of restored entries.
   */
  restore(): number {
    if (!this.storage || !this.enabled) return 0;
    const snapshot = readJson(this.storage, this.backupKey, isCacheSnapshot, this.logger);
    if (!snapshot || snapshot.version !== CACHE_VERSION) return 0;

    const now = Date.now();
    let restored = 0;
    for (const entry of snapshot.entries) {
      if (!isValidVersion(entry) || isExpired(entry, this.ttlMs, now)) continue;
      this.remove(entry.key);
      this.entries.set(entry.key, entry);
      this.bytes += entry.size;
      restored += 1;
    }
    if (this.maxBytes > 0 && this.bytes > this.maxBytes) this.evictToWatermark();
    return restored;
  }

  clearBackup(): void {
    this.storage?.removeItem(this.backupKey);
  }

  dispose(): void {
    this.entries.clear();
    this.bytes = 0;
    this.resetStats();
  }

  private remove(key: string): boolean {
    const existing = this.entries.get(key);
    if (!existing) return false;
    this.entries.delete(key);
    this.bytes -= existing.size;
    return true;
  }

  /**
   * Evicts oldest-stored first until usage is at or below 80% of the quota.
   */
  private evictToWatermark(): void {
    const target = this.maxBytes * QUOTA_LOW_WATERMARK;
    const byAge = Array.from(this.entries.values()).sort((a, b) => a.storedAt - b.storedAt);
    let evicted = 0;
    for (const entry of byAge) {
      if (this.bytes <= target) break;
      this.remove(entry.key);
      evicted += 1;
    }
    this.evictions += evicted;
    this.logger.info(`Quota exceeded, evicted ${evicted} entries`, { bytes: this.bytes, maxBytes: this.maxBytes });
  }
}

function normalizeParams(params: Record<string, ParamValue>): Record<string, ParamValue> {
  const normalized: Record<string, ParamValue> = {};
  Object.keys(params || {}).forEach((key) => {
    const value = params[key];
    if (value === null || value === undefined) return;
    normalized[key] = value;
  });
  return normalized;
}

function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object') {
    const record: Record<string, unknown> = { ...value };
    const keys = Object.keys(record).sort();
    const props = keys.map((key) => `${key}:${stableStringify(record[key])}`);
    return `{${props.join(',')}}`;
  }
  return String(value);
}

export { normalizeParams, stableStringify };
