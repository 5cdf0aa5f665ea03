/**
 * @eventframe/core - Basic Example
 *
 * Demonstrates the core concepts end to end:
 * - An event-sourced aggregate
 * - Command and query buses with a middleware pipeline
 * - Persist-then-publish through the unit of work
 * - Context propagation into events and logs
 */

import {
  AggregateRoot,
  CacheManager,
  CommandBase,
  CommandBus,
  IContext,
  IDomainEvent,
  IQuery,
  InMemoryEventDispatcher,
  InMemoryEventStore,
  InMemoryMetricsCollector,
  QueryBus,
  RequestContext,
  Response,
  UnitOfWork,
  ValidationError,
  cachingMiddleware,
  createDomainEvent,
  createPinoLogger,
  errorHandlingMiddleware,
  fromEnvelope,
  loadConfig,
  loggingMiddleware,
  metricsMiddleware,
  ok,
  typedHandler,
  validationMiddleware,
} from '../src';

// ==================== Domain ====================

class Order extends AggregateRoot {
  private status: 'open' | 'shipped' = 'open';

  static open(ctx: IContext, id: string, customerId: string): Order {
    const order = new Order(id);
    order.addEvent(
      createDomainEvent(ctx, {
        eventType: 'order.opened',
        aggregateId: id,
        payload: { customerId },
      }),
    );
    return order;
  }

  ship(ctx: IContext): void {
    if (this.status === 'shipped') {
      this.addError(new Error(`order ${this.id} already shipped`));
      return;
    }
    this.status = 'shipped';
    this.addEvent(
      createDomainEvent(ctx, { eventType: 'order.shipped', aggregateId: this.id, payload: {} }),
    );
  }

  override loadFromHistory(events: readonly IDomainEvent[]): void {
    this.status = events.some((event) => event.eventType === 'order.shipped')
      ? 'shipped'
      : 'open';
    super.loadFromHistory(events);
  }

  get isShipped(): boolean {
    return this.status === 'shipped';
  }

  protected override createInstance(): Order {
    return new Order(this.id);
  }
}

// ==================== Requests ====================

class OpenOrder extends CommandBase {
  readonly commandType = 'OpenOrder';

  constructor(
    readonly orderId: string,
    readonly customerId: string,
  ) {
    super();
  }

  validate(): Error | undefined {
    return this.customerId ? undefined : new ValidationError('customerId', 'customer is required');
  }
}

class ShipOrder extends CommandBase {
  readonly commandType = 'ShipOrder';

  constructor(readonly orderId: string) {
    super();
  }
}

class GetOrderStatus implements IQuery {
  readonly queryType = 'GetOrderStatus';

  constructor(readonly orderId: string) {}
}

// ==================== Wiring ====================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createPinoLogger(config);
  const store = new InMemoryEventStore();
  const dispatcher = new InMemoryEventDispatcher();
  const metrics = new InMemoryMetricsCollector(config.METRICS_MAX_SAMPLES);
  const cache = new CacheManager<string, Response>({
    capacity: config.CACHE_CAPACITY,
    defaultTtl: config.CACHE_TTL_MS,
  });

  dispatcher.subscribe('order.*', (ctx, envelope) => {
    logger.info('Event published', 'eventType', envelope.eventType, 'traceId', ctx.get('traceId'));
    cache.clear();
  });

  async function loadOrder(ctx: IContext, id: string): Promise<Order> {
    const order = new Order(id);
    order.loadFromHistory((await store.load(ctx, id)).map(fromEnvelope));
    return order;
  }

  async function saveOrder(ctx: IContext, order: Order): Promise<void> {
    const uow = new UnitOfWork(store, dispatcher, logger);
    uow.registerEvents(order.uncommittedEvents());
    await uow.commit(ctx);
    order.markEventsAsCommitted();
  }

  const commandBus = new CommandBus()
    .use(errorHandlingMiddleware(), loggingMiddleware(), metricsMiddleware(metrics))
    .register(
      'OpenOrder',
      typedHandler(OpenOrder, async (ctx, _logger, { data }) => {
        await saveOrder(ctx, Order.open(ctx, data.orderId, data.customerId));
        return ok();
      }),
      validationMiddleware(),
    )
    .register(
      'ShipOrder',
      typedHandler(ShipOrder, async (ctx, _logger, { data }) => {
        const order = await loadOrder(ctx, data.orderId);
        order.ship(ctx);
        const [violation] = order.errors();
        if (violation) {
          throw violation;
        }
        await saveOrder(ctx, order);
        return ok();
      }),
    );

  const queryBus = new QueryBus()
    .use(errorHandlingMiddleware(), loggingMiddleware())
    .register(
      'GetOrderStatus',
      typedHandler(GetOrderStatus, async (ctx, _logger, { data }) => {
        const order = await loadOrder(ctx, data.orderId);
        return ok(order.isShipped ? 'shipped' : 'open');
      }),
      cachingMiddleware(cache),
    );

  await RequestContext.run({ traceId: 'trace-example', userId: 'user-1' }, async () => {
    const ctx = RequestContext.current() ?? RequestContext.create();

    await commandBus.handle(ctx, logger, new OpenOrder('order-1', 'customer-1'));
    logger.info('Status', 'status', await queryBus.handle(ctx, logger, new GetOrderStatus('order-1')));

    await commandBus.handle(ctx, logger, new ShipOrder('order-1'));
    logger.info('Status', 'status', await queryBus.handle(ctx, logger, new GetOrderStatus('order-1')));

    try {
      await commandBus.handle(ctx, logger, new ShipOrder('order-1'));
    } catch (error) {
      logger.warn('Second shipment rejected', 'error', error);
    }
  });

  logger.info('Request metrics', 'ShipOrder', metrics.getSummaryStats('ShipOrder'));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
