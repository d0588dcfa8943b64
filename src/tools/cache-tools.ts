/**
 * @fileoverview Cache tools: explicit lookup and store against the agent's
 * result cache.
 *
 * @module explorer/tools/cache-tools
 * @version 0.1.0
 */

import { ActionKind } from '../types/core.types.js';
import type { CacheLookupResult, CacheStoreResult, ToolFunction } from '../types/tools.types.js';
import type { ResultCache } from '../cache/result-cache.js';
import { CacheLookupParamsSchema, CacheStoreParamsSchema } from './validation.js';

/**
 * Creates the cache tools. With caching disabled (`null`), lookups always
 * miss and stores report `stored: false`.
 */
export function createCacheTools(
  cache: ResultCache | null,
): Readonly<Partial<Record<ActionKind, ToolFunction>>> {
  const lookup: ToolFunction<CacheLookupResult> = params => {
    const { key } = CacheLookupParamsSchema.parse(params);
    const value = cache?.get(key);
    return { key, found: value !== undefined, value: value ?? null };
  };

  const store: ToolFunction<CacheStoreResult> = params => {
    const { key, value } = CacheStoreParamsSchema.parse(params);
    if (cache === null) {
      return { key, stored: false };
    }
    cache.set(key, value ?? null);
    return { key, stored: true };
  };

  return {
    [ActionKind.CACHE_LOOKUP]: lookup,
    [ActionKind.CACHE_STORE]: store,
  };
}
