/**
 * @fileoverview Request Bus - shared registry and dispatch for commands and queries
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A bus maps type tags to fully composed handlers. Composition happens in
 * {@link RequestBus.register}: the base handler is wrapped by the bus-wide
 * middleware (see {@link RequestBus.use}) and then by the registration's
 * own middleware, first-listed outermost. {@link RequestBus.dispatch} only
 * looks up and invokes.
 *
 * ## Request State Machine
 *
 * ```
 * Registered ──handle──► Dispatching ──► Success
 *                                    ├─► HandlerError  (thrown or response.error)
 *                                    └─► NotFound      (HandlerNotFoundError)
 * ```
 *
 * Registration is synchronous and meant to finish before traffic is
 * served. A request keeps the handler it looked up even if its tag is
 * re-registered while it is in flight.
 */

import type { IContext } from '../../domain/context/IContext';
import { HandlerNotFoundError } from '../../domain/exceptions/exceptions';
import type { RequestKind } from '../../domain/exceptions/exceptions';
import type { ILogger } from '../logging/ILogger';
import { createPipeline } from '../pipeline/builder';
import type { Handler, Middleware, Payload, Response } from './IHandler';

/**
 * RequestBus - common base of {@link CommandBus} and {@link QueryBus}.
 */
export abstract class RequestBus<TRequest> {
  private readonly handlers = new Map<string, Handler>();
  private readonly globalMiddleware: Middleware[] = [];

  protected constructor(readonly kind: RequestKind) {}

  /**
   * Read the routing tag of a request.
   */
  protected abstract typeOf(request: TRequest): string;

  /**
   * Register `handler` for `type`, wrapped by `middleware` (first listed
   * outermost). Re-registering a type replaces the previous handler.
   *
   * @example
   * ```typescript
   * bus.register('CreateOrder', createOrder, loggingMiddleware(), validationMiddleware());
   * ```
   */
  register(type: string, handler: Handler, ...middleware: Middleware[]): this {
    const composed = createPipeline()
      .use(...this.globalMiddleware)
      .use(...middleware)
      .compose(handler);
    this.handlers.set(type, composed);
    return this;
  }

  /**
   * Add bus-wide middleware. It wraps every handler registered **after**
   * this call, outside that registration's own middleware.
   */
  use(...middleware: Middleware[]): this {
    this.globalMiddleware.push(...middleware);
    return this;
  }

  hasHandler(type: string): boolean {
    return this.handlers.has(type);
  }

  registeredTypes(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Route `request` to its handler and return the successful response.
   *
   * @throws HandlerNotFoundError when no handler is registered for the tag
   * @throws whatever the handler threw, or the `error` of its response
   */
  protected async dispatch(
    ctx: IContext,
    logger: ILogger,
    request: TRequest,
  ): Promise<Response> {
    const type = this.typeOf(request);
    const handler = this.handlers.get(type);
    if (!handler) {
      throw new HandlerNotFoundError(type, this.kind);
    }

    const payload: Payload = {
      data: request,
      kind: this.kind,
      type,
      metadata: {},
      traceId: ctx.get('traceId'),
      userId: ctx.get('userId'),
    };

    const response = await handler(ctx, logger, payload);
    if (response.error) {
      throw response.error;
    }
    return response;
  }
}
