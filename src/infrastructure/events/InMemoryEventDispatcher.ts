/**
 * @eventframe/core - In-Memory Event Dispatcher
 *
 * Delivers envelopes to subscribers in the same process. Subscriptions may
 * use `*` for any single dotted segment.
 */

import type { IContext } from '../../domain/context/IContext';
import type { EventEnvelope } from '../../domain/events/EventEnvelope';
import { ApplicationError, ValidationError, toError } from '../../domain/exceptions/exceptions';
import type { EventHandler, IEventDispatcher } from '../../domain/repository/IEventStore';

/**
 * Split a dotted event type, dropping empty segments.
 */
function segments(eventType: string): string[] {
  return eventType.split('.').filter((part) => part !== '');
}

/**
 * Every subscription key that matches `eventType`.
 *
 * ```
 * 'user'                 → ['user', '*']
 * 'user.created'         → ['user.created', 'user.*', '*.created', '*.*']
 * 'user.account.created' → ['user.account.created', '*.account.created',
 *                           'user.*.created', 'user.account.*', '*.*.*']
 * ```
 */
export function matchingPatterns(eventType: string): string[] {
  const parts = segments(eventType);
  if (parts.length === 0) {
    return [eventType];
  }
  if (parts.length === 1) {
    return [eventType, '*'];
  }
  if (parts.length === 2) {
    return [eventType, `${parts[0]}.*`, `*.${parts[1]}`, '*.*'];
  }

  const patterns = [eventType];
  parts.forEach((_, index) => {
    const wildcard = [...parts];
    wildcard[index] = '*';
    patterns.push(wildcard.join('.'));
  });
  patterns.push(parts.map(() => '*').join('.'));
  return patterns;
}

/**
 * InMemoryEventDispatcher - pattern-matching publish/subscribe.
 *
 * Envelopes are dispatched in order. The handlers of one envelope run
 * concurrently; every failure is collected and reported together once all
 * envelopes have been delivered.
 *
 * @example
 * ```typescript
 * const dispatcher = new InMemoryEventDispatcher();
 * dispatcher.subscribe('order.*', async (ctx, envelope) => {
 *   await projection.apply(envelope);
 * });
 * ```
 */
export class InMemoryEventDispatcher implements IEventDispatcher {
  private readonly handlers = new Map<string, EventHandler[]>();
  private readonly wildcardHandlers: EventHandler[] = [];

  subscribe(eventType: string, handler: EventHandler): void {
    if (!eventType) {
      throw new ValidationError('eventType', 'event type cannot be empty');
    }
    const list = this.handlers.get(eventType) ?? [];
    list.push(handler);
    this.handlers.set(eventType, list);
  }

  subscribeWildcard(handler: EventHandler): void {
    this.wildcardHandlers.push(handler);
  }

  /**
   * Handlers subscribed under several matching patterns run once per
   * pattern.
   */
  handlersFor(eventType: string): EventHandler[] {
    const matched = matchingPatterns(eventType).flatMap(
      (pattern) => this.handlers.get(pattern) ?? [],
    );
    return [...matched, ...this.wildcardHandlers];
  }

  /**
   * @throws ApplicationError `DISPATCH_FAILED` whose `cause` is an
   *   `AggregateError` of every handler failure
   */
  async dispatch(ctx: IContext, envelopes: readonly EventEnvelope[]): Promise<void> {
    const failures: Error[] = [];

    for (const envelope of envelopes) {
      const results = await Promise.allSettled(
        this.handlersFor(envelope.eventType).map(async (handler) => handler(ctx, envelope)),
      );
      for (const result of results) {
        if (result.status === 'rejected') {
          const reason = toError(result.reason);
          failures.push(
            new Error(
              `handler error for event type "${envelope.eventType}": ${reason.message}`,
              { cause: reason },
            ),
          );
        }
      }
    }

    if (failures.length > 0) {
      throw new ApplicationError(
        'DISPATCH_FAILED',
        `${failures.length} event handler(s) failed`,
        new AggregateError(failures, 'dispatch errors'),
      );
    }
  }
}
