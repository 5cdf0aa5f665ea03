/**
 * @eventframe/core - Unit of Work
 *
 * Persist-then-publish transaction boundary over an {@link IEventStore}
 * and an {@link IEventDispatcher}.
 */

import type { IContext } from '../../domain/context/IContext';
import type { EventEnvelope } from '../../domain/events/EventEnvelope';
import type { IDomainEvent } from '../../domain/events/IDomainEvent';
import { ApplicationError, DomainError } from '../../domain/exceptions/exceptions';
import type { IEventDispatcher, IEventStore } from '../../domain/repository/IEventStore';
import { TransactionState } from '../../domain/repository/IUnitOfWork';
import type { IUnitOfWork } from '../../domain/repository/IUnitOfWork';
import { noopLogger } from '../../application/logging/ILogger';
import type { ILogger } from '../../application/logging/ILogger';

/**
 * UnitOfWork - one commit per instance.
 *
 * - `commit` moves to `Committing` before its first await; a second
 *   `commit`, `registerEvents` or `rollback` issued meanwhile is rejected
 *   with `UOW_COMMITTING`.
 * - A failed save leaves the events registered and the state `Failed`, so
 *   `commit` may be retried.
 * - A failed dispatch still leaves the state `Committed`: the events are
 *   durable and must not be saved twice.
 *
 * @example
 * ```typescript
 * const uow = new UnitOfWork(store, dispatcher, logger);
 * uow.registerEvents(order.uncommittedEvents());
 * const envelopes = await uow.commit(ctx);
 * order.markEventsAsCommitted();
 * ```
 */
export class UnitOfWork implements IUnitOfWork {
  private events: IDomainEvent[] = [];
  private _state = TransactionState.Active;

  constructor(
    private readonly store: IEventStore,
    private readonly dispatcher: IEventDispatcher,
    private readonly logger: ILogger = noopLogger,
  ) {}

  get state(): TransactionState {
    return this._state;
  }

  get isCommitted(): boolean {
    return this._state === TransactionState.Committed;
  }

  get eventCount(): number {
    return this.events.length;
  }

  /** Copy of the queued events. */
  registeredEvents(): IDomainEvent[] {
    return [...this.events];
  }

  registerEvents(events: readonly IDomainEvent[]): void {
    this.assertNotCommitted('cannot register events after unit of work has been committed');
    this.assertNotCommitting('cannot register events while a commit is in progress');
    this.events.push(...events);
    this._state = TransactionState.Active;
  }

  async commit(ctx: IContext): Promise<EventEnvelope[]> {
    this.assertNotCommitted('unit of work has already been committed');
    this.assertNotCommitting('a commit is already in progress');

    if (this.events.length === 0) {
      this._state = TransactionState.Committed;
      return [];
    }

    const batch = [...this.events];
    this._state = TransactionState.Committing;

    let envelopes: EventEnvelope[];
    try {
      envelopes = await this.store.save(ctx, batch);
    } catch (error) {
      this._state = TransactionState.Failed;
      this.logger.error(
        'Failed to persist events',
        'eventCount', batch.length,
        'error', error,
      );
      throw new ApplicationError('PERSIST_FAILED', 'failed to persist events', error);
    }

    this._state = TransactionState.Committed;
    this.events = this.events.slice(batch.length);
    this.logger.debug('Events persisted', 'eventCount', envelopes.length);

    try {
      await this.dispatcher.dispatch(ctx, envelopes);
    } catch (error) {
      this.logger.error(
        'Events persisted but dispatch failed',
        'eventCount', envelopes.length,
        'error', error,
      );
      throw new ApplicationError(
        'DISPATCH_FAILED',
        'events persisted but dispatch failed',
        error,
      );
    }

    return envelopes;
  }

  async rollback(): Promise<void> {
    this.assertNotCommitted('cannot rollback: unit of work has already been committed');
    this.assertNotCommitting('cannot rollback while a commit is in progress');
    this.events = [];
    this._state = TransactionState.RolledBack;
  }

  private assertNotCommitted(message: string): void {
    if (this._state === TransactionState.Committed) {
      throw new DomainError('UOW_COMMITTED', message);
    }
  }

  private assertNotCommitting(message: string): void {
    if (this._state === TransactionState.Committing) {
      throw new DomainError('UOW_COMMITTING', message);
    }
  }
}
