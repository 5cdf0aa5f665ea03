/**
 * @eventframe/core - In-Memory Event Store
 *
 * Reference {@link IEventStore} adapter for tests and single-process use.
 * Streams live in a `Map` keyed by aggregate id; nothing survives a
 * restart.
 */

import type { IContext } from '../../domain/context/IContext';
import { toEnvelope } from '../../domain/events/EventEnvelope';
import type { EventEnvelope } from '../../domain/events/EventEnvelope';
import type { IDomainEvent } from '../../domain/events/IDomainEvent';
import { ConcurrencyError, DomainError } from '../../domain/exceptions/exceptions';
import type { IEventStore } from '../../domain/repository/IEventStore';

/**
 * InMemoryEventStore - optimistic-concurrency event log.
 *
 * Each saved batch must continue every stream it touches: the first event
 * of an aggregate needs `sequenceNo === currentVersion + 1` and the rest
 * must follow without gaps. Otherwise the whole batch is rejected with a
 * {@link ConcurrencyError} and nothing is written.
 *
 * @example
 * ```typescript
 * const store = new InMemoryEventStore();
 * await store.save(ctx, order.uncommittedEvents());
 * await store.currentVersion(ctx, order.id); // 2
 * ```
 */
export class InMemoryEventStore implements IEventStore {
  private readonly streams = new Map<string, EventEnvelope[]>();
  private readonly byId = new Map<string, EventEnvelope>();

  async save(_ctx: IContext, events: readonly IDomainEvent[]): Promise<EventEnvelope[]> {
    const envelopes = events.map((event) => toEnvelope(event));

    const batches = new Map<string, EventEnvelope[]>();
    for (const envelope of envelopes) {
      const batch = batches.get(envelope.aggregateId) ?? [];
      batch.push(envelope);
      batches.set(envelope.aggregateId, batch);
    }

    // Validate every stream before writing any
    for (const [aggregateId, batch] of batches) {
      const current = this.versionOf(aggregateId);
      batch.forEach((envelope, index) => {
        if (envelope.sequenceNo !== current + 1 + index) {
          throw new ConcurrencyError(aggregateId, current, batch[0].sequenceNo - 1);
        }
      });
    }

    for (const [aggregateId, batch] of batches) {
      const stream = this.streams.get(aggregateId) ?? [];
      stream.push(...batch);
      this.streams.set(aggregateId, stream);
      for (const envelope of batch) {
        this.byId.set(envelope.id, envelope);
      }
    }

    return envelopes;
  }

  async load(_ctx: IContext, aggregateId: string): Promise<EventEnvelope[]> {
    return [...(this.streams.get(aggregateId) ?? [])];
  }

  async loadFromVersion(
    _ctx: IContext,
    aggregateId: string,
    fromVersion: number,
  ): Promise<EventEnvelope[]> {
    return (this.streams.get(aggregateId) ?? []).filter(
      (envelope) => envelope.sequenceNo >= fromVersion,
    );
  }

  async loadRange(
    _ctx: IContext,
    aggregateId: string,
    fromVersion: number,
    toVersion: number,
  ): Promise<EventEnvelope[]> {
    const from = fromVersion === -1 ? 1 : fromVersion;
    return (this.streams.get(aggregateId) ?? []).filter(
      (envelope) =>
        envelope.sequenceNo >= from &&
        (toVersion === -1 || envelope.sequenceNo <= toVersion),
    );
  }

  async getEventById(_ctx: IContext, eventId: string): Promise<EventEnvelope> {
    const envelope = this.byId.get(eventId);
    if (!envelope) {
      throw new DomainError('EVENT_NOT_FOUND', `event not found: ${eventId}`);
    }
    return envelope;
  }

  async currentVersion(_ctx: IContext, aggregateId: string): Promise<number> {
    return this.versionOf(aggregateId);
  }

  /** Drop every stream. */
  clear(): void {
    this.streams.clear();
    this.byId.clear();
  }

  private versionOf(aggregateId: string): number {
    const stream = this.streams.get(aggregateId);
    if (!stream || stream.length === 0) {
      return 0;
    }
    return stream[stream.length - 1].sequenceNo;
  }
}
