/**
 * @eventframe/core - Error Handling Middleware
 */

import {
  ApplicationError,
  isKnownError,
} from '../../domain/exceptions/exceptions';
import { fail } from '../../application/cqrs/IHandler';
import type { Middleware, Payload, Response } from '../../application/cqrs/IHandler';
import type { ILogger } from '../../application/logging/ILogger';

/**
 * Whether a thrown value is a runtime fault rather than a reported
 * failure: anything that is not an `Error`, and `TypeError` or
 * `ReferenceError`.
 */
export function isPanic(thrown: unknown): boolean {
  return (
    !(thrown instanceof Error) ||
    thrown instanceof TypeError ||
    thrown instanceof ReferenceError
  );
}

/**
 * Normalise every failure into a response error.
 *
 * - panics are logged at `fatal` and become
 *   `ApplicationError('HANDLER_PANIC')`; the process keeps running
 * - `ApplicationError`, `ValidationError` and `ConcurrencyError` pass
 *   through unchanged
 * - any other error becomes `ApplicationError('REQUEST_ERROR')` with the
 *   original as `cause`
 *
 * Register it outermost so it also covers the other middleware.
 */
export function errorHandlingMiddleware(): Middleware {
  return (next) => async (ctx, logger, payload) => {
    let response: Response;
    try {
      response = await next(ctx, logger, payload);
    } catch (thrown) {
      if (isPanic(thrown)) {
        logger.fatal(
          'Handler panicked',
          'type', payload.type,
          'panic', thrown,
          'traceId', payload.traceId,
        );
        return fail(new ApplicationError('HANDLER_PANIC', 'Handler panicked', thrown));
      }
      return fail(wrap(thrown, logger, payload));
    }

    if (response.error) {
      return { ...response, error: wrap(response.error, logger, payload) };
    }
    return response;
  };
}

function wrap(error: unknown, logger: ILogger, payload: Payload): Error {
  if (isKnownError(error)) {
    return error;
  }
  logger.error(
    'Wrapping unexpected error',
    'type', payload.type,
    'error', error,
    'traceId', payload.traceId,
  );
  return new ApplicationError('REQUEST_ERROR', 'Request execution failed', error);
}
