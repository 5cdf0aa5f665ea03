/**
 * @eventframe/core - Pipeline Builder
 *
 * Fluent API for assembling the middleware chain of a handler. The chain
 * is folded right-to-left when {@link PipelineBuilder.compose} is called,
 * so the first middleware added is the outermost layer:
 *
 * ```
 * use(A).use(B).use(C).compose(H)
 *
 * A-before → B-before → C-before → H → C-after → B-after → A-after
 * ```
 *
 * Composition happens once; the resulting handler is invoked many times
 * with no per-call chain walking.
 */

import type { RequestKind } from '../../domain/exceptions/exceptions';
import type { Handler, Middleware, Payload } from '../cqrs/IHandler';

/**
 * PipelineBuilder - ordered middleware list.
 *
 * @example
 * ```typescript
 * const handler = createPipeline()
 *   .use(errorHandlingMiddleware())
 *   .use(loggingMiddleware())
 *   .useIf(config.cacheEnabled, cachingMiddleware(cache))
 *   .compose(getOrderHandler);
 * ```
 */
export class PipelineBuilder {
  private middlewares: Middleware[] = [];

  /**
   * Append a middleware (innermost so far).
   */
  use(...middleware: Middleware[]): this {
    this.middlewares.push(...middleware);
    return this;
  }

  /**
   * Append only when `condition` holds.
   */
  useIf(condition: boolean | (() => boolean), middleware: Middleware): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(middleware);
    }
    return this;
  }

  /**
   * Insert as the outermost middleware.
   */
  prepend(middleware: Middleware): this {
    this.middlewares.unshift(middleware);
    return this;
  }

  insertAt(index: number, middleware: Middleware): this {
    this.middlewares.splice(index, 0, middleware);
    return this;
  }

  /**
   * Copy of the middleware list, outermost first.
   */
  build(): Middleware[] {
    return [...this.middlewares];
  }

  /**
   * Wrap `handler` with every middleware, first-added outermost.
   */
  compose(handler: Handler): Handler {
    return this.middlewares.reduceRight<Handler>(
      (next, middleware) => middleware(next),
      handler,
    );
  }

  get length(): number {
    return this.middlewares.length;
  }

  clear(): this {
    this.middlewares = [];
    return this;
  }
}

/**
 * Create a new pipeline builder.
 */
export function createPipeline(): PipelineBuilder {
  return new PipelineBuilder();
}

/**
 * Wrap `handler` with `middleware`, first argument outermost.
 *
 * @example
 * ```typescript
 * const handler = compose(createOrder, errorHandlingMiddleware(), loggingMiddleware());
 * ```
 */
export function compose(handler: Handler, ...middleware: Middleware[]): Handler {
  return createPipeline()
    .use(...middleware)
    .compose(handler);
}

/**
 * Apply `ifTrue` when `condition` holds for the payload, `ifFalse`
 * otherwise. Without `ifFalse` the request passes through untouched.
 */
export function branch(
  condition: (payload: Payload) => boolean,
  ifTrue: Middleware,
  ifFalse?: Middleware,
): Middleware {
  return (next) => {
    const whenTrue = ifTrue(next);
    const whenFalse = ifFalse ? ifFalse(next) : next;
    return (ctx, logger, payload) =>
      condition(payload)
        ? whenTrue(ctx, logger, payload)
        : whenFalse(ctx, logger, payload);
  };
}

/**
 * Apply `middleware` only to requests of the given kinds.
 *
 * @example
 * ```typescript
 * forKinds(['query'], cachingMiddleware(cache));
 * ```
 */
export function forKinds(kinds: RequestKind[], middleware: Middleware): Middleware {
  return branch((payload) => kinds.includes(payload.kind), middleware);
}

/**
 * Apply `middleware` only to the listed type tags.
 */
export function forTypes(types: string[], middleware: Middleware): Middleware {
  return branch((payload) => types.includes(payload.type), middleware);
}
