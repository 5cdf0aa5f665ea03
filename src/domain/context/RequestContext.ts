/**
 * @fileoverview RequestContext - AsyncLocalStorage-based Context Implementation
 *
 * @packageDocumentation
 * @module @eventframe/core/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core Implementation)
 *
 * Concrete {@link IContext} backed by Node.js `AsyncLocalStorage`. A context
 * entered with {@link RequestContext.run} is visible to every promise
 * continuation, timer and nested async function started inside it, and is
 * isolated from concurrently running requests.
 *
 * Contexts can also be created detached with {@link RequestContext.create}
 * and passed explicitly, which is what the command and query buses expect:
 *
 * ```typescript
 * const ctx = RequestContext.create({ traceId: 'trace-1' });
 * await queryBus.handle(ctx, logger, new GetOrder('order-1'));
 * ```
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { IContext, ContextData } from './IContext';

/**
 * Internal storage shared by every handle onto the same context.
 */
interface ContextStore {
  data: Partial<ContextData>;
  cancelCallbacks: Set<() => void>;
  cancelled: boolean;
}

function createStore(initialData: Partial<ContextData>): ContextStore {
  return {
    data: { ...initialData },
    cancelCallbacks: new Set(),
    cancelled: false,
  };
}

/**
 * RequestContext - ambient or explicit request context.
 *
 * Instances returned by {@link RequestContext.current} are lightweight
 * handles onto the active store: two handles obtained in the same scope
 * observe each other's writes.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-abc' }, async () => {
 *   await someAsyncWork();
 *   RequestContext.current()?.get('traceId'); // 'trace-abc'
 * });
 * ```
 */
export class RequestContext implements IContext<ContextData> {
  private static als = new AsyncLocalStorage<ContextStore>();

  private readonly store: ContextStore;

  private constructor(store: ContextStore) {
    this.store = store;
  }

  // ==================== Scope Management ====================

  /**
   * Run `callback` inside a new context seeded with `initialData`.
   *
   * @returns whatever `callback` returns (a promise for async callbacks)
   */
  static run<R>(initialData: Partial<ContextData>, callback: () => R): R {
    return RequestContext.als.run(createStore(initialData), callback);
  }

  /**
   * Run `callback` inside an existing context, for example one created
   * with {@link RequestContext.create} or captured earlier.
   */
  static runWithContext<R>(context: RequestContext, callback: () => R): R {
    return RequestContext.als.run(context.store, callback);
  }

  /**
   * Create a detached context. It becomes ambient only when entered with
   * {@link RequestContext.runWithContext}.
   */
  static create(initialData: Partial<ContextData> = {}): RequestContext {
    return new RequestContext(createStore(initialData));
  }

  /** The ambient context, or `undefined` outside any scope. */
  static current(): RequestContext | undefined {
    const store = RequestContext.als.getStore();
    if (!store) {
      return undefined;
    }
    return new RequestContext(store);
  }

  static hasContext(): boolean {
    return RequestContext.als.getStore() !== undefined;
  }

  // ==================== IContext Implementation ====================

  get<K extends keyof ContextData>(key: K): ContextData[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof ContextData>(key: K, value: ContextData[K]): void {
    this.store.data[key] = value;
  }

  has<K extends keyof ContextData>(key: K): boolean {
    return key in this.store.data;
  }

  delete<K extends keyof ContextData>(key: K): boolean {
    if (!(key in this.store.data)) {
      return false;
    }
    delete this.store.data[key];
    return true;
  }

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  onCancel(callback: () => void): void {
    if (this.store.cancelled) {
      // Already cancelled: invoke immediately
      try {
        callback();
      } catch (error) {
        console.error('Error in cancel callback:', error);
      }
    } else {
      this.store.cancelCallbacks.add(callback);
    }
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      try {
        callback();
      } catch (error) {
        console.error('Error in cancel callback:', error);
      }
    }

    this.store.cancelCallbacks.clear();
  }

  getAll(): Readonly<Partial<ContextData>> {
    return { ...this.store.data };
  }

  // ==================== Extensions ====================

  /**
   * Copy the values into a new, detached context. Cancellation state and
   * callbacks are not shared.
   */
  clone(additionalData?: Partial<ContextData>): RequestContext {
    return new RequestContext(
      createStore({ ...this.store.data, ...additionalData }),
    );
  }

  get traceId(): string | undefined {
    return this.get('traceId');
  }

  get userId(): string | undefined {
    return this.get('userId');
  }
}

/**
 * Get the ambient context or throw.
 *
 * @throws Error when called outside {@link RequestContext.run}
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new Error(
      'No active context. Make sure you are within a RequestContext.run() scope.',
    );
  }
  return context;
}

/**
 * Get the ambient context, or `null` outside any scope.
 */
export function tryGetCurrentContext(): RequestContext | null {
  return RequestContext.current() ?? null;
}
