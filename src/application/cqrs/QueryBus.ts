/**
 * @fileoverview Query Bus
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * @example
 * ```typescript
 * const queryBus = new QueryBus().register(
 *   'GetOrder',
 *   typedHandler(GetOrder, async (ctx, logger, payload) =>
 *     ok(await readModel.find(payload.data.orderId)),
 *   ),
 *   cachingMiddleware(cache),
 * );
 *
 * const order = await queryBus.handle(ctx, logger, new GetOrder('order-1'));
 * ```
 */

import type { IContext } from '../../domain/context/IContext';
import type { ILogger } from '../logging/ILogger';
import type { IQuery } from './IQuery';
import { RequestBus } from './RequestBus';

/**
 * QueryBus - routes queries by `queryType`.
 */
export class QueryBus extends RequestBus<IQuery> {
  constructor() {
    super('query');
  }

  protected typeOf(query: IQuery): string {
    return query.queryType;
  }

  /**
   * Execute a query.
   *
   * @returns the handler's `response.data`
   * @throws HandlerNotFoundError with kind `query`
   */
  async handle(ctx: IContext, logger: ILogger, query: IQuery): Promise<unknown> {
    const response = await this.dispatch(ctx, logger, query);
    return response.data;
  }
}
