/**
 * @eventframe/core - Event Envelope
 *
 * Transport and storage form of a domain event. Envelopes are what event
 * stores return and what dispatchers deliver; aggregates work with
 * {@link IDomainEvent} instances.
 */

import { DomainEvent } from './IDomainEvent';
import type { EventMetadata, IDomainEvent } from './IDomainEvent';

/**
 * Stored or dispatched event.
 *
 * @template TPayload - Event-specific data
 */
export interface EventEnvelope<TPayload = unknown> {
  /** Event id; equal to the originating {@link IDomainEvent.eventId}. */
  readonly id: string;
  readonly aggregateId: string;
  readonly eventType: string;
  readonly payload: TPayload;
  readonly sequenceNo: number;
  readonly occurredAt: Date;
  readonly metadata: Readonly<EventMetadata>;
}

/**
 * Wrap an event for storage. The metadata object is copied.
 */
export function toEnvelope<TPayload>(
  event: IDomainEvent<TPayload>,
): EventEnvelope<TPayload> {
  return {
    id: event.eventId,
    aggregateId: event.aggregateId,
    eventType: event.eventType,
    payload: event.payload,
    sequenceNo: event.sequenceNo,
    occurredAt: event.occurredAt,
    metadata: { ...event.metadata },
  };
}

/**
 * Rebuild an event from storage, keeping its id and sequence number.
 *
 * @example
 * ```typescript
 * const history = (await store.load(ctx, 'order-1')).map(fromEnvelope);
 * order.loadFromHistory(history);
 * ```
 */
export function fromEnvelope<TPayload>(
  envelope: EventEnvelope<TPayload>,
): DomainEvent<TPayload> {
  return new DomainEvent({
    eventId: envelope.id,
    eventType: envelope.eventType,
    aggregateId: envelope.aggregateId,
    payload: envelope.payload,
    sequenceNo: envelope.sequenceNo,
    occurredAt: envelope.occurredAt,
    metadata: { ...envelope.metadata },
  });
}
