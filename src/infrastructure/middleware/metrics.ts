/**
 * @eventframe/core - Metrics Middleware
 */

import type { Middleware } from '../../application/cqrs/IHandler';
import type { MetricsCollector } from '../metrics/InMemoryMetricsCollector';

/**
 * Record the duration of every request and count failures per type tag.
 * Results and errors pass through unchanged.
 */
export function metricsMiddleware(metrics: MetricsCollector): Middleware {
  return (next) => async (ctx, logger, payload) => {
    const started = Date.now();
    try {
      const response = await next(ctx, logger, payload);
      metrics.recordRequestDuration(payload.type, Date.now() - started);
      if (response.error) {
        metrics.incrementRequestErrors(payload.type);
      }
      return response;
    } catch (error) {
      metrics.recordRequestDuration(payload.type, Date.now() - started);
      metrics.incrementRequestErrors(payload.type);
      throw error;
    }
  };
}
