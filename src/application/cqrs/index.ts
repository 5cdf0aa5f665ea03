/**
 * @fileoverview CQRS (Command Query Responsibility Segregation) Exports
 * @description
 * Commands and queries, the handler and middleware abstractions, and the
 * buses that route requests by type tag.
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 */

// Requests
export { CommandBase } from './ICommand';
export type { ICommand, CommandMetadata } from './ICommand';
export { paginate } from './IQuery';
export type { IQuery, PaginationParams, PaginatedResult } from './IQuery';

// Handlers & middleware
export { ok, fail, isValidatable, typedHandler } from './IHandler';
export type {
  Payload,
  Response,
  Handler,
  Middleware,
  Validatable,
  RequestClass,
} from './IHandler';

// Buses
export { RequestBus } from './RequestBus';
export { CommandBus } from './CommandBus';
export { QueryBus } from './QueryBus';
