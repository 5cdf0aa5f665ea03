/**
 * @fileoverview Command Bus
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * @example
 * ```typescript
 * const commandBus = new CommandBus()
 *   .use(errorHandlingMiddleware())
 *   .register(
 *     'CreateOrder',
 *     typedHandler(CreateOrder, async (ctx, logger, payload) => {
 *       const order = Order.create(ctx, payload.data.orderId);
 *       const uow = new UnitOfWork(store, dispatcher);
 *       uow.registerEvents(order.uncommittedEvents());
 *       await uow.commit(ctx);
 *       order.markEventsAsCommitted();
 *       return ok();
 *     }),
 *     loggingMiddleware(),
 *     validationMiddleware(),
 *   );
 *
 * await commandBus.handle(ctx, logger, new CreateOrder('order-1'));
 * ```
 */

import type { IContext } from '../../domain/context/IContext';
import type { ILogger } from '../logging/ILogger';
import type { ICommand } from './ICommand';
import { RequestBus } from './RequestBus';

/**
 * CommandBus - routes commands by `commandType`.
 */
export class CommandBus extends RequestBus<ICommand> {
  constructor() {
    super('command');
  }

  protected typeOf(command: ICommand): string {
    return command.commandType;
  }

  /**
   * Execute a command.
   *
   * @throws HandlerNotFoundError with kind `command`
   */
  async handle(ctx: IContext, logger: ILogger, command: ICommand): Promise<void> {
    await this.dispatch(ctx, logger, command);
  }
}
