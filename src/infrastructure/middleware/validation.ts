/**
 * @eventframe/core - Validation Middleware
 */

import type { z } from 'zod';
import { ValidationError, toError } from '../../domain/exceptions/exceptions';
import { fail, isValidatable } from '../../application/cqrs/IHandler';
import type { Middleware, Payload } from '../../application/cqrs/IHandler';

export interface ValidationOptions {
  /**
   * zod schemas keyed by type tag, checked before the request's own
   * `validate()`.
   */
  schemas?: Record<string, z.ZodTypeAny>;
}

/**
 * Reject invalid requests before they reach the handler.
 *
 * A request fails when its zod schema (if one is registered for its type)
 * does not parse, or when its `validate()` returns or throws an error. The
 * handler is then never called; the response carries a `ValidationError`
 * and `{ validation_failed: true }` metadata.
 *
 * @example
 * ```typescript
 * bus.register(
 *   'CreateOrder',
 *   createOrder,
 *   validationMiddleware({
 *     schemas: { CreateOrder: z.object({ orderId: z.string().min(1) }) },
 *   }),
 * );
 * ```
 */
export function validationMiddleware(options: ValidationOptions = {}): Middleware {
  return (next) => async (ctx, logger, payload) => {
    const error = validatePayload(payload, options.schemas);
    if (error) {
      logger.warn(
        'Request validation failed',
        'type', payload.type,
        'field', error.field,
        'error', error.detail,
        'traceId', payload.traceId,
      );
      return fail(error, { validation_failed: true });
    }
    return next(ctx, logger, payload);
  };
}

function validatePayload(
  payload: Payload,
  schemas: Record<string, z.ZodTypeAny> | undefined,
): ValidationError | undefined {
  const schema = schemas && Object.hasOwn(schemas, payload.type) ? schemas[payload.type] : undefined;
  if (schema) {
    const result = schema.safeParse(payload.data);
    if (!result.success) {
      const issue = result.error.issues[0];
      return new ValidationError(
        issue ? issue.path.join('.') : '',
        issue ? issue.message : 'invalid request',
        payload.data,
      );
    }
  }

  const data = payload.data;
  if (!isValidatable(data)) {
    return undefined;
  }

  let outcome: Error | undefined | void;
  try {
    outcome = data.validate();
  } catch (thrown) {
    outcome = toError(thrown);
  }

  if (!outcome) {
    return undefined;
  }
  return outcome instanceof ValidationError
    ? outcome
    : new ValidationError('', outcome.message);
}
