/**
 * @fileoverview Domain Repository Layer Exports
 * @description
 * Outbound ports for event persistence, event publishing and the unit of
 * work transaction boundary.
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/repository
 */

// Unit of Work Pattern
export { TransactionState } from './IUnitOfWork';
export type { IUnitOfWork } from './IUnitOfWork';

// Event Store & Dispatcher
export type { IEventStore, IEventDispatcher, EventHandler } from './IEventStore';
