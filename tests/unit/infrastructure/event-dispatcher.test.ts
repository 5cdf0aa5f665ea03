/**
 * @fileoverview Unit tests for InMemoryEventDispatcher
 */

import {
  ApplicationError,
  EventEnvelope,
  InMemoryEventDispatcher,
  RequestContext,
  ValidationError,
  matchingPatterns,
} from '../../../src';

function envelope(eventType: string, id = `${eventType}-1`): EventEnvelope {
  return {
    id,
    aggregateId: 'agg-1',
    eventType,
    payload: {},
    sequenceNo: 1,
    occurredAt: new Date('2024-01-01T00:00:00.000Z'),
    metadata: {},
  };
}

describe('matchingPatterns', () => {
  it('should expand one, two and three segment types', () => {
    expect(matchingPatterns('user')).toEqual(['user', '*']);
    expect(matchingPatterns('user.created')).toEqual([
      'user.created',
      'user.*',
      '*.created',
      '*.*',
    ]);
    expect(matchingPatterns('user.account.created')).toEqual([
      'user.account.created',
      '*.account.created',
      'user.*.created',
      'user.account.*',
      '*.*.*',
    ]);
  });
});

describe('InMemoryEventDispatcher', () => {
  const ctx = RequestContext.create();
  let dispatcher: InMemoryEventDispatcher;
  let received: string[];

  beforeEach(() => {
    dispatcher = new InMemoryEventDispatcher();
    received = [];
  });

  function recorder(name: string) {
    return async (_ctx: unknown, env: EventEnvelope) => {
      received.push(`${name}:${env.eventType}`);
    };
  }

  it('should deliver to exact, pattern and wildcard subscribers', async () => {
    dispatcher.subscribe('user.created', recorder('exact'));
    dispatcher.subscribe('user.*', recorder('entity'));
    dispatcher.subscribe('*.created', recorder('action'));
    dispatcher.subscribe('order.*', recorder('other'));
    dispatcher.subscribeWildcard(recorder('all'));

    await dispatcher.dispatch(ctx, [envelope('user.created')]);

    expect(received).toEqual([
      'exact:user.created',
      'entity:user.created',
      'action:user.created',
      'all:user.created',
    ]);
  });

  it('should deliver envelopes in order', async () => {
    dispatcher.subscribeWildcard(recorder('all'));

    await dispatcher.dispatch(ctx, [envelope('a.one'), envelope('b.two'), envelope('c')]);

    expect(received).toEqual(['all:a.one', 'all:b.two', 'all:c']);
  });

  it('should reject an empty event type', () => {
    expect(() => dispatcher.subscribe('', recorder('x'))).toThrowErrorType(ValidationError);
  });

  it('should run every handler and report all failures together', async () => {
    dispatcher.subscribe('user.created', async () => {
      throw new Error('projection down');
    });
    dispatcher.subscribe('user.*', recorder('entity'));
    dispatcher.subscribe('user.deleted', async () => {
      throw new Error('mailer down');
    });

    let caught: unknown;
    try {
      await dispatcher.dispatch(ctx, [envelope('user.created'), envelope('user.deleted')]);
    } catch (error) {
      caught = error;
    }

    expect(received).toEqual(['entity:user.created', 'entity:user.deleted']);
    expect(caught).toBeInstanceOf(ApplicationError);
    if (!(caught instanceof ApplicationError)) return;
    expect(caught.code).toBe('DISPATCH_FAILED');
    expect(caught.detail).toBe('2 event handler(s) failed');
    expect(caught.cause).toBeInstanceOf(AggregateError);
    if (!(caught.cause instanceof AggregateError)) return;
    expect(caught.cause.errors.map((e: Error) => e.message)).toEqual([
      'handler error for event type "user.created": projection down',
      'handler error for event type "user.deleted": mailer down',
    ]);
  });
});
