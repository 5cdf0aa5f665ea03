/**
 * @eventframe/core - Query Caching Middleware
 */

import { canonicalize } from 'json-canonicalize';
import type { Middleware, Payload, Response } from '../../application/cqrs/IHandler';
import type { CacheProvider } from '../cache/CacheManager';

export interface CachingOptions {
  /** TTL in ms for stored responses; the cache's default when omitted. */
  ttl?: number;
}

/**
 * Deterministic cache key: type tag plus the canonical JSON of the
 * request's fields, so field order never changes the key.
 *
 * @example
 * ```typescript
 * // payload.data = { queryType: 'GetOrder', orderId: 'order-1' }
 * cacheKeyFor(payload);
 * // 'GetOrder_{"orderId":"order-1","queryType":"GetOrder"}'
 * ```
 */
export function cacheKeyFor(payload: Payload): string {
  return `${payload.type}_${canonicalize(payload.data)}`;
}

/**
 * Serve repeated queries from `cache`. Commands pass through untouched.
 * Only successful responses are stored.
 *
 * The cache holds its own structured clone of each response and hands out
 * a fresh clone on every hit, so callers may mutate what they receive.
 * Response data must therefore be structured-cloneable.
 */
export function cachingMiddleware(
  cache: CacheProvider<string, Response>,
  options: CachingOptions = {},
): Middleware {
  return (next) => async (ctx, logger, payload) => {
    if (payload.kind !== 'query') {
      return next(ctx, logger, payload);
    }

    const key = cacheKeyFor(payload);
    const cached = cache.get(key);
    if (cached) {
      logger.debug('Query served from cache', 'type', payload.type, 'cacheKey', key);
      return structuredClone(cached);
    }

    const response = await next(ctx, logger, payload);
    if (!response.error) {
      cache.set(key, structuredClone(response), options.ttl);
    }
    return response;
  };
}
