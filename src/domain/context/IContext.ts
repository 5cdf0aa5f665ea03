/**
 * @fileoverview Context Interface - Domain Layer Core Abstraction
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * The context carries request-scoped values (trace id, user id, account id)
 * through every command handler, query handler and middleware without
 * threading them as separate parameters.
 *
 * Every {@link Handler} receives an `IContext` as its first argument. The
 * buses read `traceId` and `userId` from it when building a payload, and
 * {@link createDomainEvent} copies the same values into event metadata.
 *
 * Cancellation is cooperative: the buses and aggregates never inspect it.
 * Handlers that perform I/O may check {@link IContext.isCancelled} or
 * register an {@link IContext.onCancel} callback.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-1', userId: 'user-1' }, async () => {
 *   const ctx = getCurrentContext();
 *   await commandBus.handle(ctx, logger, new CreateOrder('order-1'));
 * });
 * ```
 */

/**
 * Values known to the framework. Applications add their own keys through
 * the index signature or by extending this interface.
 */
export interface ContextData {
  /**
   * Trace ID for correlating log lines and events across services.
   * Copied into {@link Payload.traceId} and into event `correlationId`.
   */
  traceId?: string;

  /** Request ID unique to a single inbound request. */
  requestId?: string;

  /**
   * Authenticated user ID. Copied into {@link Payload.userId} and into
   * event `actorId`.
   */
  userId?: string;

  /** Tenant or account the request acts on behalf of. */
  accountId?: string;

  /** Request start (Unix milliseconds). */
  timestamp?: number;

  [key: string]: unknown;
}

/**
 * IContext - request-scoped key/value store with cooperative cancellation.
 *
 * @template T - Shape of the stored data
 */
export interface IContext<T extends ContextData = ContextData> {
  /**
   * Read a value.
   *
   * @example
   * ```typescript
   * const traceId = ctx.get('traceId'); // string | undefined
   * ```
   */
  get<K extends keyof T>(key: K): T[K] | undefined;

  /** Write a value. Visible to everything sharing this context. */
  set<K extends keyof T>(key: K, value: T[K]): void;

  has<K extends keyof T>(key: K): boolean;

  /** @returns true if the key existed */
  delete<K extends keyof T>(key: K): boolean;

  /** Whether {@link cancel} has been called. */
  isCancelled(): boolean;

  /**
   * Register a callback to run on cancellation. Runs immediately when the
   * context is already cancelled.
   */
  onCancel(callback: () => void): void;

  /**
   * Cancel the context. Idempotent; callbacks run once, in registration
   * order, and a throwing callback does not prevent the rest from running.
   */
  cancel(): void;

  /** Shallow copy of all stored values. */
  getAll(): Readonly<Partial<T>>;
}
