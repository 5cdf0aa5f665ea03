/**
 * @eventframe/core - Logging Middleware
 */

import { toError } from '../../domain/exceptions/exceptions';
import type { Middleware, Response } from '../../application/cqrs/IHandler';

/**
 * Log the start and outcome of every request.
 *
 * - start: `info` when the payload carries a trace or user id, else `debug`
 * - failure (thrown or `response.error`): `error` with duration
 * - success: `debug` with duration
 *
 * @example
 * ```typescript
 * bus.register('CreateOrder', createOrder, loggingMiddleware());
 * ```
 */
export function loggingMiddleware(): Middleware {
  return (next) => async (ctx, logger, payload) => {
    const started = Date.now();

    if (payload.traceId || payload.userId) {
      logger.info(
        'Processing request',
        'type', payload.type,
        'kind', payload.kind,
        'traceId', payload.traceId,
        'userId', payload.userId,
      );
    } else {
      logger.debug('Processing request', 'type', payload.type, 'kind', payload.kind);
    }

    let response: Response;
    try {
      response = await next(ctx, logger, payload);
    } catch (error) {
      logger.error(
        'Request failed',
        'type', payload.type,
        'durationMs', Date.now() - started,
        'error', toError(error),
        'traceId', payload.traceId,
      );
      throw error;
    }

    const durationMs = Date.now() - started;
    if (response.error) {
      logger.error(
        'Request failed',
        'type', payload.type,
        'durationMs', durationMs,
        'error', response.error,
        'traceId', payload.traceId,
      );
    } else {
      logger.debug(
        'Request completed',
        'type', payload.type,
        'durationMs', durationMs,
        'traceId', payload.traceId,
      );
    }

    return response;
  };
}
