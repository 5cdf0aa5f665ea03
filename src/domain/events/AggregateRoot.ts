/**
 * @fileoverview AggregateRoot - Event-Sourced Aggregate Base
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/events
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Base class for event-sourced aggregates. It owns the bookkeeping every
 * aggregate needs and nothing domain-specific:
 *
 * - **identity**: `id`, fixed at construction
 * - **sequence**: a gapless counter starting at 0; the Nth event added
 *   gets sequence number N
 * - **uncommitted events**: added since the last commit or history load
 * - **committed events**: confirmed history
 * - **errors**: recorded business-rule violations
 *
 * ## Lifecycle
 *
 * ```
 * new / loadFromHistory ──► addEvent* ──► UnitOfWork.commit ──► markEventsAsCommitted
 *                              ▲                                        │
 *                              └────────────────────────────────────────┘
 * ```
 *
 * ## Concurrency
 *
 * Every mutator runs to completion without awaiting, so on Node's single
 * event loop no two of them can interleave. Concurrent `addEvent` calls
 * scheduled through `Promise.all` therefore still produce a gapless,
 * strictly increasing sequence.
 *
 * @example
 * ```typescript
 * class Order extends AggregateRoot {
 *   private status: 'open' | 'shipped' = 'open';
 *
 *   ship(ctx: IContext): void {
 *     if (this.status === 'shipped') {
 *       this.addError(new DomainError('ALREADY_SHIPPED', 'order already shipped'));
 *       return;
 *     }
 *     this.status = 'shipped';
 *     this.addEvent(createDomainEvent(ctx, {
 *       eventType: 'order.shipped',
 *       aggregateId: this.id,
 *       payload: {},
 *     }));
 *   }
 *
 *   protected override createInstance(): Order {
 *     return new Order(this.id);
 *   }
 * }
 * ```
 */

import { MissingSourceError } from '../exceptions/exceptions';
import type { IDomainEvent } from './IDomainEvent';

/**
 * AggregateRoot - identity, sequence and event accumulation.
 */
export class AggregateRoot {
  private readonly _id: string;
  private _sequenceNo = 0;
  private _committedEvents: IDomainEvent[] = [];
  private _uncommittedEvents: IDomainEvent[] = [];
  private _errors: Error[] = [];

  constructor(id: string) {
    this._id = id;
  }

  // ==================== Accessors ====================

  get id(): string {
    return this._id;
  }

  /**
   * Number of events added since creation, the last {@link reset} or the
   * last {@link loadFromHistory}.
   */
  get sequenceNo(): number {
    return this._sequenceNo;
  }

  /**
   * Copy of the events not yet committed. Mutating the returned array does
   * not affect the aggregate.
   */
  uncommittedEvents(): IDomainEvent[] {
    return [...this._uncommittedEvents];
  }

  /** Copy of the committed history. */
  committedEvents(): IDomainEvent[] {
    return [...this._committedEvents];
  }

  hasUncommittedEvents(): boolean {
    return this._uncommittedEvents.length > 0;
  }

  uncommittedEventCount(): number {
    return this._uncommittedEvents.length;
  }

  // ==================== Event Lifecycle ====================

  /**
   * Record a new event: increments the sequence, stamps the event with it
   * and appends it to the uncommitted list.
   */
  addEvent(event: IDomainEvent): void {
    this._sequenceNo++;
    event.setSequenceNo(this._sequenceNo);
    this._uncommittedEvents.push(event);
  }

  /**
   * Move the uncommitted events into the committed history. Call after a
   * successful `UnitOfWork.commit`.
   */
  markEventsAsCommitted(): void {
    this._committedEvents.push(...this._uncommittedEvents);
    this._uncommittedEvents = [];
  }

  /**
   * Replace all event state with `events`. Sequence numbers on the events
   * are kept as stored; the aggregate's counter becomes `events.length`.
   *
   * Subclasses apply their domain state transitions for each event before
   * calling `super.loadFromHistory(events)`; this method handles the
   * bookkeeping only.
   */
  loadFromHistory(events: readonly IDomainEvent[]): void {
    this._committedEvents = [...events];
    this._uncommittedEvents = [];
    this._errors = [];
    this._sequenceNo = events.length;
  }

  /**
   * Append `source`'s uncommitted events, unmodified, to this aggregate's
   * uncommitted list. Neither `source` nor this aggregate's sequence number
   * changes.
   *
   * @throws MissingSourceError when `source` is null or undefined
   *
   * @example
   * ```typescript
   * // a: seq 2 uncommitted; b: seq 2 and 3 uncommitted
   * a.mergeEventsFrom(b);
   * a.uncommittedEvents().map((e) => e.sequenceNo); // [2, 2, 3]
   * a.sequenceNo; // 2
   * ```
   */
  mergeEventsFrom(source: AggregateRoot | null | undefined): void {
    if (source === null || source === undefined) {
      throw new MissingSourceError();
    }
    if (source._uncommittedEvents.length === 0) {
      return;
    }
    this._uncommittedEvents.push(...source._uncommittedEvents);
  }

  /**
   * Clear sequence, events and errors. The id is kept. Meant for tests.
   */
  reset(): void {
    this._sequenceNo = 0;
    this._committedEvents = [];
    this._uncommittedEvents = [];
    this._errors = [];
  }

  // ==================== Copying ====================

  /**
   * Independent copy: lists are copied, event objects are shared.
   */
  clone(): AggregateRoot {
    const copy = this.createInstance();
    this.copyStateTo(copy);
    return copy;
  }

  /**
   * Empty instance with the same id. Subclasses override this so that
   * {@link clone} returns their own type.
   */
  protected createInstance(): AggregateRoot {
    return new AggregateRoot(this._id);
  }

  /**
   * Copy the bookkeeping state into `target`.
   */
  protected copyStateTo(target: AggregateRoot): void {
    target._sequenceNo = this._sequenceNo;
    target._committedEvents = [...this._committedEvents];
    target._uncommittedEvents = [...this._uncommittedEvents];
    target._errors = [...this._errors];
  }

  // ==================== Errors ====================

  /**
   * Record a business-rule violation. Never throws and does not block
   * further {@link addEvent} calls.
   */
  addError(error: Error): void {
    this._errors.push(error);
  }

  errors(): Error[] {
    return [...this._errors];
  }

  isValid(): boolean {
    return this._errors.length === 0;
  }

  toString(): string {
    return `AggregateRoot{id: ${this._id}, sequenceNo: ${this._sequenceNo}, uncommittedEvents: ${this._uncommittedEvents.length}, errors: ${this._errors.length}}`;
  }
}
