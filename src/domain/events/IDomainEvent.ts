/**
 * @fileoverview Domain Events - Event-Driven Architecture Interfaces
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/events
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * A domain event is an immutable fact about a state change of one
 * aggregate. Events are created by business logic and handed to
 * {@link AggregateRoot.addEvent}, which assigns the event's position in
 * the aggregate's stream. Apart from metadata annotations, that assignment
 * is the only mutation an event sees.
 *
 * ```
 * Business logic → DomainEvent → AggregateRoot.addEvent → UnitOfWork → EventStore
 *                                                                    ↘ EventDispatcher
 * ```
 *
 * ## Event Type Naming
 *
 * Event types are dotted `entity.action` strings such as `user.created`.
 * The dispatcher matches subscriptions against them with `*` wildcards
 * (`user.*`, `*.created`, `*.*`), so keep to two segments where possible.
 *
 * @example
 * ```typescript
 * const event = new DomainEvent({
 *   eventType: eventTypeFor('order', StandardEventTypes.CREATED),
 *   aggregateId: 'order-1',
 *   payload: { total: 42 },
 * });
 * order.addEvent(event);
 * event.sequenceNo; // 1
 * ```
 */

import { v4 as uuidv4 } from 'uuid';
import type { IContext } from '../context/IContext';

// ============================================================================
// Event Metadata
// ============================================================================

/**
 * Metadata carried alongside every event.
 *
 * `correlationId`, `actorId` and `accountId` are typically copied from the
 * request context by {@link createDomainEvent}.
 */
export interface EventMetadata {
  /** Trace or correlation id of the request that produced the event. */
  correlationId?: string;

  /** User who caused the event. */
  actorId?: string;

  /** Account or tenant the event belongs to. */
  accountId?: string;

  [key: string]: unknown;
}

// ============================================================================
// IDomainEvent
// ============================================================================

/**
 * IDomainEvent - contract every event handled by an aggregate satisfies.
 *
 * @template TPayload - Event-specific data
 */
export interface IDomainEvent<TPayload = unknown> {
  /** Unique id of this event instance. */
  readonly eventId: string;

  /** Dotted type tag, e.g. `order.created`. */
  readonly eventType: string;

  /** Id of the aggregate that owns this event. */
  readonly aggregateId: string;

  /**
   * Position in the aggregate's stream, starting at 1. `0` until the
   * owning aggregate assigns it.
   */
  readonly sequenceNo: number;

  readonly occurredAt: Date;

  readonly payload: TPayload;

  readonly metadata: EventMetadata;

  /**
   * Assign the stream position. Called by the owning aggregate.
   */
  setSequenceNo(sequenceNo: number): void;
}

// ============================================================================
// Event Type Helpers
// ============================================================================

/**
 * Actions shared by most aggregates.
 */
export const StandardEventTypes = {
  CREATED: 'created',
  UPDATED: 'updated',
  DELETED: 'deleted',
  TRIPLE: 'triple',
} as const;

export type StandardEventType =
  (typeof StandardEventTypes)[keyof typeof StandardEventTypes];

/**
 * Build an `entity.action` event type.
 *
 * @example
 * ```typescript
 * eventTypeFor('user', 'created'); // 'user.created'
 * eventTypeFor('', 'created');     // 'created'
 * eventTypeFor('user', '');        // 'user'
 * ```
 */
export function eventTypeFor(entityType: string, action: string): string {
  if (!entityType) {
    return action;
  }
  if (!action) {
    return entityType;
  }
  return `${entityType}.${action}`;
}

// ============================================================================
// DomainEvent
// ============================================================================

/**
 * Constructor input for {@link DomainEvent}.
 */
export interface DomainEventInit<TPayload> {
  eventType: string;
  aggregateId: string;
  payload: TPayload;
  /** Defaults to a fresh v4 UUID. */
  eventId?: string;
  /** Defaults to now. */
  occurredAt?: Date;
  /** Pre-assigned stream position, used when re-hydrating from storage. */
  sequenceNo?: number;
  metadata?: EventMetadata;
}

/**
 * Default {@link IDomainEvent} implementation.
 *
 * Re-hydrated events arrive with their position already set; the aggregate
 * only assigns positions to events passed to `addEvent`.
 */
export class DomainEvent<TPayload = unknown> implements IDomainEvent<TPayload> {
  readonly eventId: string;
  readonly eventType: string;
  readonly aggregateId: string;
  readonly occurredAt: Date;
  readonly payload: TPayload;
  readonly metadata: EventMetadata;

  private _sequenceNo: number;

  constructor(init: DomainEventInit<TPayload>) {
    this.eventId = init.eventId ?? uuidv4();
    this.eventType = init.eventType;
    this.aggregateId = init.aggregateId;
    this.occurredAt = init.occurredAt ?? new Date();
    this.payload = init.payload;
    this.metadata = { ...init.metadata };
    this._sequenceNo = init.sequenceNo ?? 0;
  }

  get sequenceNo(): number {
    return this._sequenceNo;
  }

  setSequenceNo(sequenceNo: number): void {
    this._sequenceNo = sequenceNo;
  }

  getMetadata(key: string): unknown {
    return this.metadata[key];
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata[key] = value;
  }
}

/**
 * Create an event whose metadata is filled from the request context:
 * `traceId` becomes `correlationId`, `userId` becomes `actorId`, and
 * `accountId` is copied as is. Explicit metadata wins over context values.
 *
 * @example
 * ```typescript
 * const event = createDomainEvent(ctx, {
 *   eventType: 'order.shipped',
 *   aggregateId: order.id,
 *   payload: { carrier: 'dhl' },
 * });
 * ```
 */
export function createDomainEvent<TPayload>(
  ctx: IContext,
  init: DomainEventInit<TPayload>,
): DomainEvent<TPayload> {
  const fromContext: EventMetadata = {};
  const traceId = ctx.get('traceId');
  const userId = ctx.get('userId');
  const accountId = ctx.get('accountId');
  if (traceId) fromContext.correlationId = traceId;
  if (userId) fromContext.actorId = userId;
  if (accountId) fromContext.accountId = accountId;

  return new DomainEvent({
    ...init,
    metadata: { ...fromContext, ...init.metadata },
  });
}
