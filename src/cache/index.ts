/**
 * @fileoverview Cache module public exports.
 *
 * @module explorer/cache
 * @version 0.1.0
 */

export {
  ResultCache,
  hashKey,
  type CacheEntry,
  type CacheStats,
  type ResultCacheOptions,
} from './result-cache.js';
