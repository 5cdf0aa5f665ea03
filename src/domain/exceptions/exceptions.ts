/**
 * @eventframe/core - Error Taxonomy
 *
 * Typed errors raised by aggregates, buses and infrastructure adapters.
 *
 * | Error | Raised by | Caller reaction |
 * |---|---|---|
 * | {@link ValidationError} | validation middleware, config loader | fix the input |
 * | {@link ConcurrencyError} | event store on a version conflict | reload and retry |
 * | {@link HandlerNotFoundError} | command/query bus | fix registration |
 * | {@link ApplicationError} | error-handling middleware, unit of work | inspect `code` and `cause` |
 * | {@link MissingSourceError} | `AggregateRoot.mergeEventsFrom` | programming error |
 * | {@link DomainError} | domain objects | business rule failure |
 */

// ==================== Application Errors ====================

/**
 * Generic wrapped error carrying a stable `code` and the original `cause`.
 *
 * @example
 * ```typescript
 * new ApplicationError('REQUEST_ERROR', 'Request execution failed', err).message;
 * // 'REQUEST_ERROR: Request execution failed (caused by: connection reset)'
 * ```
 */
export class ApplicationError extends Error {
  constructor(
    public readonly code: string,
    public readonly detail: string,
    cause?: unknown,
  ) {
    super(ApplicationError.format(code, detail, cause), { cause });
    this.name = 'ApplicationError';
    Error.captureStackTrace(this, this.constructor);
  }

  private static format(code: string, detail: string, cause: unknown): string {
    const base = `${code}: ${detail}`;
    if (cause === undefined) {
      return base;
    }
    return `${base} (caused by: ${describeCause(cause)})`;
  }
}

/**
 * Invalid input. `field` is empty when the failure is not tied to one field.
 */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly detail: string,
    public readonly value?: unknown,
  ) {
    super(
      field
        ? `validation error on field '${field}': ${detail}`
        : `validation error: ${detail}`,
    );
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Optimistic concurrency conflict: the stream moved on since it was read.
 */
export class ConcurrencyError extends Error {
  constructor(
    public readonly aggregateId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      `concurrency error for aggregate ${aggregateId}: expected version ${expectedVersion}, got ${actualVersion}`,
    );
    this.name = 'ConcurrencyError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Which bus a request was sent to.
 */
export type RequestKind = 'command' | 'query';

/**
 * No handler registered for a type tag.
 */
export class HandlerNotFoundError extends Error {
  constructor(
    public readonly type: string,
    public readonly kind: RequestKind,
  ) {
    super(`no ${kind} handler registered for type: ${type}`);
    this.name = 'HandlerNotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Domain Errors ====================

/**
 * Business rule violation raised inside the domain layer.
 */
export class DomainError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'DomainError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * `mergeEventsFrom` was given no source aggregate.
 */
export class MissingSourceError extends DomainError {
  constructor() {
    super('MISSING_SOURCE', 'source entity cannot be null or undefined');
    this.name = 'MissingSourceError';
  }
}

// ==================== Helpers ====================

/**
 * Errors the error-handling middleware passes through unwrapped.
 */
export function isKnownError(
  error: unknown,
): error is ApplicationError | ValidationError | ConcurrencyError {
  return (
    error instanceof ApplicationError ||
    error instanceof ValidationError ||
    error instanceof ConcurrencyError
  );
}

/**
 * Normalise anything thrown into an `Error`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(describeCause(value));
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
