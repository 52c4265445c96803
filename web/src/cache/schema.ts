/**
 * Response cache schema
 *
 * Entry shape, storage keys and sizing helpers shared by the response
 * cache and its local backup snapshot.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Storage key of the cache backup snapshot
 */
export const CACHE_BACKUP_KEY = 'api_response_cache';

/**
 * Cache format version
 * Snapshots written with another version are discarded on restore
 */
export const CACHE_VERSION = 1;

/**
 * Default time-to-live (5 minutes)
 */
export const DEFAULT_TTL_MS = 5 * 60 * 1000;

/**
 * Fraction of the byte quota that eviction drains down to
 */
export const QUOTA_LOW_WATERMARK = 0.8;

// ============================================================================
// Types
// ============================================================================

export interface CacheEntry<T = unknown> {
  /** Deterministic key built from endpoint and params */
  key: string;
  /** Raw server payload */
  data: T;
  /** Unix ms when the entry was stored */
  storedAt: number;
  /** Validator returned with the payload, replayed as If-None-Match */
  etag?: string;
  /** Approximate serialized size in bytes */
  size: number;
  version: number;
}

export interface CacheSnapshot {
  version: number;
  savedAt: number;
  entries: CacheEntry[];
}

// ============================================================================
// Helpers
// ============================================================================

export function isExpired(entry: Pick<CacheEntry, 'storedAt'>, ttlMs: number, now: number = Date.now()): boolean {
  return now - entry.storedAt > ttlMs;
}

export function isValidVersion(entry: Pick<CacheEntry, 'version'>): boolean {
  return entry.version === CACHE_VERSION;
}

/**
 * JSON length as an approximation of the byte size.
 */
export function estimateSize(data: unknown): number {
  try {
    return JSON.stringify(data)?.length ?? 0;
  } catch (error) {
    console.warn('[ResponseCache] Failed to estimate size:', error);
    return 0;
  }
}

export function createCacheEntry(key: string, data: unknown, etag?: string, now: number = Date.now()): CacheEntry {
  return {
    key,
    data,
    storedAt: now,
    etag,
    size: estimateSize(data),
    version: CACHE_VERSION,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    isRecord(value) &&
    typeof value.key === 'string' &&
    typeof value.storedAt === 'number' &&
    typeof value.size === 'number' &&
    typeof value.version === 'number' &&
    'data' in value &&
    (value.etag === undefined || typeof value.etag === 'string')
  );
}

export function isCacheSnapshot(value: unknown): value is CacheSnapshot {
  return (
    isRecord(value) &&
    typeof value.version === 'number' &&
    typeof value.savedAt === 'number' &&
    Array.isArray(value.entries) &&
    value.entries.every(isCacheEntry)
  );
}
