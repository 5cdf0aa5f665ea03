/**
 * @eventframe/core - Exceptions Module
 */

export {
  ApplicationError,
  ValidationError,
  ConcurrencyError,
  HandlerNotFoundError,
  DomainError,
  MissingSourceError,
  isKnownError,
  toError,
} from './exceptions';

export type { RequestKind } from './exceptions';
