/**
 * @eventframe/core - Domain Events Module
 */

export {
  DomainEvent,
  StandardEventTypes,
  eventTypeFor,
  createDomainEvent,
} from './IDomainEvent';
export type {
  IDomainEvent,
  EventMetadata,
  DomainEventInit,
  StandardEventType,
} from './IDomainEvent';

export { AggregateRoot } from './AggregateRoot';

export { toEnvelope, fromEnvelope } from './EventEnvelope';
export type { EventEnvelope } from './EventEnvelope';
