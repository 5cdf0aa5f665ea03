/**
 * @fileoverview Event Store and Event Dispatcher Ports
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/repository
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * Outbound ports for persisting and publishing events. Adapters live in the
 * infrastructure layer; `InMemoryEventStore` and `InMemoryEventDispatcher`
 * ship with this package for tests and single-process deployments.
 *
 * The byte layout of persisted events is entirely the adapter's concern.
 */

import type { IContext } from '../context/IContext';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { IDomainEvent } from '../events/IDomainEvent';

/**
 * Append-only event log keyed by aggregate id.
 *
 * Implementations enforce optimistic concurrency: a batch whose sequence
 * numbers do not continue an aggregate's stream is rejected with
 * `ConcurrencyError`.
 */
export interface IEventStore {
  /**
   * Persist events (possibly for several aggregates) atomically.
   *
   * @returns the stored envelopes, in input order
   * @throws ConcurrencyError when a stream has moved on
   */
  save(ctx: IContext, events: readonly IDomainEvent[]): Promise<EventEnvelope[]>;

  /** Full stream of an aggregate; empty when unknown. */
  load(ctx: IContext, aggregateId: string): Promise<EventEnvelope[]>;

  /** Events with `sequenceNo >= fromVersion`. */
  loadFromVersion(
    ctx: IContext,
    aggregateId: string,
    fromVersion: number,
  ): Promise<EventEnvelope[]>;

  /**
   * Events with `fromVersion <= sequenceNo <= toVersion`. `-1` leaves the
   * corresponding bound open.
   */
  loadRange(
    ctx: IContext,
    aggregateId: string,
    fromVersion: number,
    toVersion: number,
  ): Promise<EventEnvelope[]>;

  /**
   * @throws DomainError `EVENT_NOT_FOUND`
   */
  getEventById(ctx: IContext, eventId: string): Promise<EventEnvelope>;

  /** Highest stored sequence number; `0` for an unknown aggregate. */
  currentVersion(ctx: IContext, aggregateId: string): Promise<number>;
}

/**
 * Subscriber callback.
 */
export type EventHandler<TPayload = unknown> = (
  ctx: IContext,
  envelope: EventEnvelope<TPayload>,
) => Promise<void> | void;

/**
 * Publishes persisted events to subscribers.
 *
 * Subscriptions accept `*` wildcards per dotted segment: `order.*`,
 * `*.created`, `*.*`.
 */
export interface IEventDispatcher {
  /**
   * Deliver every envelope to its matching subscribers.
   *
   * @throws ApplicationError `DISPATCH_FAILED` when any subscriber failed
   */
  dispatch(ctx: IContext, envelopes: readonly EventEnvelope[]): Promise<void>;

  /**
   * @throws ValidationError when `eventType` is empty
   */
  subscribe(eventType: string, handler: EventHandler): void;

  /** Subscribe to every event regardless of type. */
  subscribeWildcard(handler: EventHandler): void;
}
