/**
 * @fileoverview Handler & Middleware - CQRS Dispatch Abstractions
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Every command and query travels through the same shapes:
 *
 * - a {@link Payload} wraps the request with its kind, type tag, trace id
 *   and user id;
 * - a {@link Handler} turns a payload into a {@link Response};
 * - a {@link Middleware} wraps one handler to produce another.
 *
 * Handlers report failure either by throwing or by returning a response
 * with `error` set. The buses check both.
 *
 * ```
 *   bus.handle ──► M1 ──► M2 ──► M3 ──► handler
 *                  ◄──    ◄──    ◄──    ◄──
 * ```
 *
 * @example
 * ```typescript
 * const timing: Middleware = (next) => async (ctx, logger, payload) => {
 *   const started = Date.now();
 *   const response = await next(ctx, logger, payload);
 *   return { ...response, metadata: { ...response.metadata, took: Date.now() - started } };
 * };
 * ```
 */

import type { IContext } from '../../domain/context/IContext';
import { ValidationError } from '../../domain/exceptions/exceptions';
import type { RequestKind } from '../../domain/exceptions/exceptions';
import type { ILogger } from '../logging/ILogger';

// ============================================================================
// Envelopes
// ============================================================================

/**
 * Request envelope built by the bus.
 *
 * @template T - Request type
 */
export interface Payload<T = unknown> {
  readonly data: T;
  readonly kind: RequestKind;
  /** Type tag the request was routed by. */
  readonly type: string;
  readonly metadata: Record<string, unknown>;
  readonly traceId?: string;
  readonly userId?: string;
}

/**
 * Response envelope returned by handlers and middleware.
 *
 * @template T - Result type
 */
export interface Response<T = unknown> {
  data?: T;
  metadata: Record<string, unknown>;
  /** Set when the request failed without throwing. */
  error?: Error;
}

/**
 * Successful response.
 */
export function ok<T>(data?: T, metadata: Record<string, unknown> = {}): Response<T> {
  return { data, metadata };
}

/**
 * Failed response.
 */
export function fail<T = never>(
  error: Error,
  metadata: Record<string, unknown> = {},
): Response<T> {
  return { metadata, error };
}

// ============================================================================
// Handler & Middleware
// ============================================================================

/**
 * Terminal or composed request handler.
 */
export type Handler<TRequest = unknown, TResult = unknown> = (
  ctx: IContext,
  logger: ILogger,
  payload: Payload<TRequest>,
) => Promise<Response<TResult>>;

/**
 * Decorator around a handler. Composed once at registration time.
 */
export type Middleware = (next: Handler) => Handler;

// ============================================================================
// Validation Capability
// ============================================================================

/**
 * Requests that can check themselves. Returning an `Error` (or throwing)
 * fails validation; returning nothing passes.
 */
export interface Validatable {
  validate(): Error | undefined | void;
}

export function isValidatable(value: unknown): value is Validatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'validate' in value &&
    typeof value.validate === 'function'
  );
}

// ============================================================================
// Typed Handlers
// ============================================================================

/**
 * Constructor of a request class.
 */
export type RequestClass<T> = new (...args: never[]) => T;

/**
 * Adapt a handler written against one request class to the bus's untyped
 * {@link Handler}. A payload whose data is not an instance of
 * `requestClass` yields a `ValidationError` response.
 *
 * @example
 * ```typescript
 * commandBus.register(
 *   'CreateOrder',
 *   typedHandler(CreateOrder, async (ctx, logger, payload) => {
 *     payload.data.orderId; // typed
 *     return ok();
 *   }),
 * );
 * ```
 */
export function typedHandler<TRequest, TResult>(
  requestClass: RequestClass<TRequest>,
  handler: Handler<TRequest, TResult>,
): Handler {
  return async (ctx, logger, payload) => {
    const data = payload.data;
    if (!(data instanceof requestClass)) {
      return fail(
        new ValidationError(
          '',
          `expected ${requestClass.name} for type ${payload.type}`,
        ),
      );
    }
    return handler(ctx, logger, { ...payload, data });
  };
}
