/**
 * @fileoverview Unit tests for UnitOfWork
 */

import {
  ApplicationError,
  DomainError,
  DomainEvent,
  EventEnvelope,
  IContext,
  IDomainEvent,
  IEventDispatcher,
  IEventStore,
  InMemoryEventDispatcher,
  InMemoryEventStore,
  RequestContext,
  TransactionState,
  UnitOfWork,
} from '../../../src';
import { RecordingLogger } from '../../helpers/recording-logger';

function eventAt(sequenceNo: number) {
  return new DomainEvent({
    eventType: 'order.updated',
    aggregateId: 'order-1',
    payload: {},
    sequenceNo,
  });
}

/**
 * Store whose save fails a configurable number of times before delegating.
 */
class FlakyStore extends InMemoryEventStore implements IEventStore {
  constructor(private failures: number) {
    super();
  }

  override async save(ctx: IContext, events: readonly IDomainEvent[]): Promise<EventEnvelope[]> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('connection refused');
    }
    return super.save(ctx, events);
  }
}

class FailingDispatcher implements IEventDispatcher {
  async dispatch(): Promise<void> {
    throw new Error('broker unavailable');
  }

  subscribe(): void {}

  subscribeWildcard(): void {}
}

describe('UnitOfWork', () => {
  const ctx = RequestContext.create();
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('should start active and empty', () => {
    const uow = new UnitOfWork(new InMemoryEventStore(), new InMemoryEventDispatcher());

    expect(uow.state).toBe(TransactionState.Active);
    expect(uow.eventCount).toBe(0);
    expect(uow.isCommitted).toBe(false);
  });

  it('should persist, clear and dispatch on commit', async () => {
    const store = new InMemoryEventStore();
    const dispatcher = new InMemoryEventDispatcher();
    const delivered: number[] = [];
    dispatcher.subscribe('order.*', (_ctx, envelope) => {
      delivered.push(envelope.sequenceNo);
    });
    const uow = new UnitOfWork(store, dispatcher, logger);

    uow.registerEvents([eventAt(1), eventAt(2)]);
    const envelopes = await uow.commit(ctx);

    expect(envelopes.map((e) => e.sequenceNo)).toEqual([1, 2]);
    expect(delivered).toEqual([1, 2]);
    expect(uow.state).toBe(TransactionState.Committed);
    expect(uow.eventCount).toBe(0);
    expect(await store.currentVersion(ctx, 'order-1')).toBe(2);
    expect(logger.lines()).toEqual(['debug: Events persisted']);
  });

  it('should commit an empty unit of work without touching the store', async () => {
    const store = new InMemoryEventStore();
    const save = jest.spyOn(store, 'save');
    const uow = new UnitOfWork(store, new InMemoryEventDispatcher());

    expect(await uow.commit(ctx)).toEqual([]);
    expect(uow.state).toBe(TransactionState.Committed);
    expect(save).not.toHaveBeenCalled();
  });

  it('should keep events registered when persisting fails and allow a retry', async () => {
    const store = new FlakyStore(1);
    const uow = new UnitOfWork(store, new InMemoryEventDispatcher(), logger);
    uow.registerEvents([eventAt(1)]);

    const failed = uow.commit(ctx);
    await expect(failed).rejects.toBeInstanceOf(ApplicationError);
    await expect(failed).rejects.toThrow(
      'PERSIST_FAILED: failed to persist events (caused by: connection refused)',
    );
    expect(uow.state).toBe(TransactionState.Failed);
    expect(uow.eventCount).toBe(1);

    await uow.commit(ctx);

    expect(uow.state).toBe(TransactionState.Committed);
    expect(await store.currentVersion(ctx, 'order-1')).toBe(1);
    expect(logger.lines()).toEqual(['error: Failed to persist events', 'debug: Events persisted']);
  });

  it('should stay committed when dispatch fails', async () => {
    const store = new InMemoryEventStore();
    const uow = new UnitOfWork(store, new FailingDispatcher(), logger);
    uow.registerEvents([eventAt(1)]);

    await expect(uow.commit(ctx)).rejects.toThrow(
      'DISPATCH_FAILED: events persisted but dispatch failed (caused by: broker unavailable)',
    );

    expect(uow.state).toBe(TransactionState.Committed);
    expect(await store.currentVersion(ctx, 'order-1')).toBe(1);
    expect(logger.lines()).toEqual([
      'debug: Events persisted',
      'error: Events persisted but dispatch failed',
    ]);
  });

  it('should refuse to be used again after a commit', async () => {
    const uow = new UnitOfWork(new InMemoryEventStore(), new InMemoryEventDispatcher());
    await uow.commit(ctx);

    expect(() => uow.registerEvents([eventAt(1)])).toThrow(
      'cannot register events after unit of work has been committed',
    );
    await expect(uow.commit(ctx)).rejects.toBeInstanceOf(DomainError);
    await expect(uow.commit(ctx)).rejects.toThrow('unit of work has already been committed');
    await expect(uow.rollback()).rejects.toThrow(
      'cannot rollback: unit of work has already been committed',
    );
  });

  it('should reject a second commit while the first is in flight', async () => {
    const store = new InMemoryEventStore();
    const dispatcher = new InMemoryEventDispatcher();
    const delivered: number[] = [];
    dispatcher.subscribe('order.*', (_ctx, envelope) => {
      delivered.push(envelope.sequenceNo);
    });
    const uow = new UnitOfWork(store, dispatcher);
    uow.registerEvents([eventAt(1)]);

    const [first, second] = await Promise.allSettled([uow.commit(ctx), uow.commit(ctx)]);

    expect([first.status, second.status]).toEqual(['fulfilled', 'rejected']);
    if (second.status === 'rejected') {
      expect(second.reason).toBeInstanceOf(DomainError);
      expect(second.reason).toHaveProperty('code', 'UOW_COMMITTING');
    }
    expect(uow.state).toBe(TransactionState.Committed);
    expect(await store.currentVersion(ctx, 'order-1')).toBe(1);
    expect(delivered).toEqual([1]);
  });

  it('should refuse registration and rollback during a pending commit', async () => {
    const uow = new UnitOfWork(new InMemoryEventStore(), new InMemoryEventDispatcher());
    uow.registerEvents([eventAt(1)]);

    const pending = uow.commit(ctx);

    expect(uow.state).toBe(TransactionState.Committing);
    expect(() => uow.registerEvents([eventAt(2)])).toThrow(
      'cannot register events while a commit is in progress',
    );
    await expect(uow.rollback()).rejects.toThrow('cannot rollback while a commit is in progress');

    await pending;
    expect(uow.state).toBe(TransactionState.Committed);
    expect(uow.eventCount).toBe(0);
  });

  it('should discard events on rollback', async () => {
    const uow = new UnitOfWork(new InMemoryEventStore(), new InMemoryEventDispatcher());
    uow.registerEvents([eventAt(1), eventAt(2)]);

    await uow.rollback();

    expect(uow.state).toBe(TransactionState.RolledBack);
    expect(uow.registeredEvents()).toEqual([]);

    uow.registerEvents([eventAt(1)]);
    expect(uow.state).toBe(TransactionState.Active);
  });
});
