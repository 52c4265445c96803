/**
 * Cache module entry
 */

export {
  CACHE_BACKUP_KEY,
  CACHE_VERSION,
  DEFAULT_TTL_MS,
  QUOTA_LOW_WATERMARK,
  type CacheEntry,
  type CacheSnapshot,
  isExpired,
  isValidVersion,
  estimateSize,
  createCacheEntry,
} from './schema';

export {
  ResponseCache,
  type ResponseCacheOptions,
  type CacheStats,
  type ParamValue,
  normalizeParams,
  stableStringify,
} from './ResponseCache';

export { RequestDeduplicator, type DedupeFactory } from './RequestDeduplicator';
export { InvalidationService, type EntityChange } from './InvalidationService';
