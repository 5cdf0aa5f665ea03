/**
 * @fileoverview Unit of Work Pattern - Domain Layer Interface
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/repository
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * The unit of work is the transaction boundary of a command: it batches the
 * events produced by one or more aggregates, persists them together and
 * publishes them only once persistence succeeded.
 *
 * ## Transaction Flow
 *
 * ```
 * handler
 *   │ order.ship()
 *   │ uow.registerEvents(order.uncommittedEvents())
 *   │ await uow.commit(ctx) ──► store.save ──► dispatcher.dispatch
 *   │ order.markEventsAsCommitted()
 * ```
 *
 * If `store.save` fails nothing is published and the aggregate keeps its
 * uncommitted events. If dispatch fails the events are already durable;
 * the caller sees the error but must not retry the save.
 *
 * @example
 * ```typescript
 * const uow = new UnitOfWork(store, dispatcher);
 * uow.registerEvents(order.uncommittedEvents());
 * await uow.commit(ctx);
 * order.markEventsAsCommitted();
 * ```
 */

import type { IContext } from '../context/IContext';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { IDomainEvent } from '../events/IDomainEvent';

/**
 * Unit of work lifecycle.
 *
 * ```
 * Active ──commit──► Committing ──save ok──► Committed
 *   │                    └──save failed──► Failed ──commit──► Committing
 *   └──rollback──► RolledBack ──register──► Active
 * ```
 *
 * While `Committing`, every other call is rejected with `UOW_COMMITTING`.
 */
export enum TransactionState {
  Active = 'ACTIVE',
  Committing = 'COMMITTING',
  Committed = 'COMMITTED',
  RolledBack = 'ROLLED_BACK',
  Failed = 'FAILED',
}

/**
 * IUnitOfWork - batches events for one atomic persist-then-publish.
 */
export interface IUnitOfWork {
  readonly state: TransactionState;

  /**
   * Queue events for the next commit.
   *
   * @throws DomainError `UOW_COMMITTED` after a successful commit
   * @throws DomainError `UOW_COMMITTING` while a commit is in flight
   */
  registerEvents(events: readonly IDomainEvent[]): void;

  /**
   * Persist then dispatch the queued events.
   *
   * @returns the persisted envelopes (empty when nothing was queued)
   * @throws DomainError `UOW_COMMITTED` when already committed
   * @throws DomainError `UOW_COMMITTING` while another commit is in flight
   * @throws ApplicationError `PERSIST_FAILED` or `DISPATCH_FAILED`
   */
  commit(ctx: IContext): Promise<EventEnvelope[]>;

  /**
   * Drop the queued events.
   *
   * @throws DomainError `UOW_COMMITTED` after a successful commit
   * @throws DomainError `UOW_COMMITTING` while a commit is in flight
   */
  rollback(): Promise<void>;
}
