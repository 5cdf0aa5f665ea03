/**
 * @fileoverview Unit tests for AggregateRoot
 *
 * Sequence numbering, commit bookkeeping, history loading, merging and
 * cloning of event-sourced aggregates.
 */

import {
  AggregateRoot,
  DomainEvent,
  DomainError,
  IDomainEvent,
  MissingSourceError,
  eventTypeFor,
  StandardEventTypes,
} from '../../../src';

// ============================================================================
// Test Domain: Account Aggregate
// ============================================================================

interface DepositedPayload {
  amount: number;
}

/**
 * Account aggregate with a balance rebuilt from its events
 */
class Account extends AggregateRoot {
  balance = 0;

  deposit(amount: number): void {
    if (amount <= 0) {
      this.addError(new DomainError('INVALID_AMOUNT', `amount must be positive: ${amount}`));
      return;
    }
    this.balance += amount;
    this.addEvent(depositEvent(this.id, amount));
  }

  override loadFromHistory(events: readonly IDomainEvent[]): void {
    this.balance = 0;
    for (const event of events) {
      if (event instanceof DomainEvent && isDeposit(event.payload)) {
        this.balance += event.payload.amount;
      }
    }
    super.loadFromHistory(events);
  }

  protected override createInstance(): Account {
    return new Account(this.id);
  }

  override clone(): Account {
    const copy = this.createInstance();
    this.copyStateTo(copy);
    copy.balance = this.balance;
    return copy;
  }
}

function isDeposit(payload: unknown): payload is DepositedPayload {
  return typeof payload === 'object' && payload !== null && 'amount' in payload;
}

function depositEvent(aggregateId: string, amount: number, sequenceNo?: number) {
  return new DomainEvent<DepositedPayload>({
    eventType: eventTypeFor('account', 'deposited'),
    aggregateId,
    payload: { amount },
    sequenceNo,
  });
}

function sequenceNumbers(events: IDomainEvent[]): number[] {
  return events.map((event) => event.sequenceNo);
}

// ============================================================================
// Tests
// ============================================================================

describe('AggregateRoot', () => {
  describe('construction', () => {
    it('should start empty with sequence 0', () => {
      const account = new Account('acc-1');

      expect(account.id).toBe('acc-1');
      expect(account.sequenceNo).toBe(0);
      expect(account.uncommittedEvents()).toEqual([]);
      expect(account.committedEvents()).toEqual([]);
      expect(account.hasUncommittedEvents()).toBe(false);
      expect(account.isValid()).toBe(true);
    });
  });

  describe('addEvent', () => {
    it('should assign gapless sequence numbers starting at 1', () => {
      const account = new Account('acc-1');

      account.deposit(10);
      account.deposit(20);
      account.deposit(30);

      expect(account.sequenceNo).toBe(3);
      expect(sequenceNumbers(account.uncommittedEvents())).toEqual([1, 2, 3]);
      expect(account.uncommittedEventCount()).toBe(3);
      expect(account.balance).toBe(60);
    });

    it('should stamp the event object itself', () => {
      const aggregate = new AggregateRoot('agg-1');
      const event = new DomainEvent({
        eventType: eventTypeFor('agg', StandardEventTypes.CREATED),
        aggregateId: 'agg-1',
        payload: {},
      });

      expect(event.sequenceNo).toBe(0);
      aggregate.addEvent(event);

      expect(event.sequenceNo).toBe(1);
      expect(aggregate.uncommittedEvents()[0]).toBe(event);
    });

    it('should keep the sequence gapless under concurrent callers', async () => {
      const aggregate = new AggregateRoot('agg-1');

      await Promise.all(
        Array.from({ length: 50 }, async (_, i) => {
          await Promise.resolve();
          aggregate.addEvent(depositEvent('agg-1', i + 1));
        }),
      );

      expect(aggregate.sequenceNo).toBe(50);
      expect(sequenceNumbers(aggregate.uncommittedEvents())).toEqual(
        Array.from({ length: 50 }, (_, i) => i + 1),
      );
    });
  });

  describe('uncommittedEvents', () => {
    it('should return a defensive copy', () => {
      const account = new Account('acc-1');
      account.deposit(10);

      const events = account.uncommittedEvents();
      events.pop();
      events.push(depositEvent('acc-1', 99));
      events.push(depositEvent('acc-1', 100));

      expect(account.uncommittedEventCount()).toBe(1);
      expect(account.uncommittedEvents()[0].payload).toEqual({ amount: 10 });
    });
  });

  describe('markEventsAsCommitted', () => {
    it('should move uncommitted events into the committed history', () => {
      const account = new Account('acc-1');
      account.deposit(10);
      account.deposit(20);
      account.deposit(30);

      account.markEventsAsCommitted();

      expect(account.uncommittedEvents()).toEqual([]);
      expect(account.hasUncommittedEvents()).toBe(false);
      expect(sequenceNumbers(account.committedEvents())).toEqual([1, 2, 3]);
      expect(account.sequenceNo).toBe(3);
    });

    it('should continue numbering after a commit', () => {
      const account = new Account('acc-1');
      account.deposit(10);
      account.markEventsAsCommitted();

      account.deposit(5);

      expect(sequenceNumbers(account.uncommittedEvents())).toEqual([2]);
    });
  });

  describe('loadFromHistory', () => {
    it('should rebuild bookkeeping from stored events', () => {
      const history = [depositEvent('acc-1', 10, 1), depositEvent('acc-1', 15, 2)];
      const account = new Account('acc-1');
      account.deposit(1);
      account.addError(new Error('stale'));

      account.loadFromHistory(history);

      expect(account.sequenceNo).toBe(2);
      expect(account.uncommittedEvents()).toEqual([]);
      expect(account.errors()).toEqual([]);
      expect(account.committedEvents()).toEqual(history);
      expect(account.balance).toBe(25);
    });

    it('should not renumber historical events', () => {
      const history = [depositEvent('acc-1', 10, 5), depositEvent('acc-1', 20, 9)];
      const account = new Account('acc-1');

      account.loadFromHistory(history);

      expect(sequenceNumbers(account.committedEvents())).toEqual([5, 9]);
      expect(account.sequenceNo).toBe(2);
    });

    it('should be idempotent', () => {
      const history = [
        depositEvent('acc-1', 1, 1),
        depositEvent('acc-1', 2, 2),
        depositEvent('acc-1', 3, 3),
      ];
      const account = new Account('acc-1');

      account.loadFromHistory(history);
      const first = { seq: account.sequenceNo, pending: account.uncommittedEventCount() };
      account.loadFromHistory(history);

      expect(first).toEqual({ seq: 3, pending: 0 });
      expect(account.sequenceNo).toBe(3);
      expect(account.uncommittedEventCount()).toBe(0);
      expect(account.balance).toBe(6);
    });

    it('should copy the input array', () => {
      const history = [depositEvent('acc-1', 10, 1)];
      const account = new Account('acc-1');

      account.loadFromHistory(history);
      history.push(depositEvent('acc-1', 20, 2));

      expect(account.committedEvents()).toHaveLength(1);
    });
  });

  describe('mergeEventsFrom', () => {
    function aggregateWith(id: string, uncommitted: number): AggregateRoot {
      const aggregate = new AggregateRoot(id);
      aggregate.addEvent(depositEvent(id, 1));
      aggregate.markEventsAsCommitted();
      for (let i = 0; i < uncommitted; i++) {
        aggregate.addEvent(depositEvent(id, 1));
      }
      return aggregate;
    }

    it('should append the source events with their original sequence numbers', () => {
      const a = aggregateWith('a', 1);
      const b = aggregateWith('b', 2);

      a.mergeEventsFrom(b);

      expect(sequenceNumbers(a.uncommittedEvents())).toEqual([2, 2, 3]);
      expect(a.sequenceNo).toBe(2);
      expect(a.uncommittedEvents().slice(1)).toEqual(b.uncommittedEvents());
    });

    it('should leave the source unchanged', () => {
      const a = aggregateWith('a', 1);
      const b = aggregateWith('b', 2);

      a.mergeEventsFrom(b);

      expect(b.sequenceNo).toBe(3);
      expect(sequenceNumbers(b.uncommittedEvents())).toEqual([2, 3]);
      expect(b.committedEvents()).toHaveLength(1);
    });

    it('should be a no-op when the source has nothing uncommitted', () => {
      const a = aggregateWith('a', 1);
      const b = aggregateWith('b', 0);

      a.mergeEventsFrom(b);

      expect(sequenceNumbers(a.uncommittedEvents())).toEqual([2]);
    });

    it('should throw MissingSourceError for null and leave the target unchanged', () => {
      const a = aggregateWith('a', 1);

      expect(() => a.mergeEventsFrom(null)).toThrowErrorType(MissingSourceError);
      expect(() => a.mergeEventsFrom(undefined)).toThrow(
        'source entity cannot be null or undefined',
      );
      expect(a.sequenceNo).toBe(2);
      expect(sequenceNumbers(a.uncommittedEvents())).toEqual([2]);
    });
  });

  describe('reset', () => {
    it('should clear everything but the id', () => {
      const account = new Account('acc-1');
      account.deposit(10);
      account.markEventsAsCommitted();
      account.deposit(20);
      account.addError(new Error('boom'));

      account.reset();

      expect(account.id).toBe('acc-1');
      expect(account.sequenceNo).toBe(0);
      expect(account.committedEvents()).toEqual([]);
      expect(account.uncommittedEvents()).toEqual([]);
      expect(account.errors()).toEqual([]);
    });
  });

  describe('clone', () => {
    it('should produce an independent copy of the same class', () => {
      const account = new Account('acc-1');
      account.deposit(10);
      account.markEventsAsCommitted();
      account.deposit(20);

      const copy = account.clone();
      copy.deposit(30);
      copy.addError(new Error('only on copy'));

      expect(copy).toBeInstanceOf(Account);
      expect(copy.id).toBe('acc-1');
      expect(copy.balance).toBe(60);
      expect(copy.sequenceNo).toBe(3);
      expect(account.sequenceNo).toBe(2);
      expect(account.uncommittedEventCount()).toBe(1);
      expect(account.isValid()).toBe(true);
      expect(account.balance).toBe(30);
    });

    it('should copy a plain AggregateRoot', () => {
      const aggregate = new AggregateRoot('agg-1');
      aggregate.addEvent(depositEvent('agg-1', 1));

      const copy = aggregate.clone();
      copy.markEventsAsCommitted();

      expect(copy.committedEvents()).toHaveLength(1);
      expect(aggregate.committedEvents()).toHaveLength(0);
      expect(aggregate.uncommittedEventCount()).toBe(1);
    });
  });

  describe('errors', () => {
    it('should record business-rule violations without blocking events', () => {
      const account = new Account('acc-1');

      account.deposit(-5);
      account.deposit(10);

      expect(account.isValid()).toBe(false);
      expect(account.errors().map((e) => e.message)).toEqual([
        'amount must be positive: -5',
      ]);
      expect(account.sequenceNo).toBe(1);
    });

    it('should return a copy of the error list', () => {
      const account = new Account('acc-1');
      account.addError(new Error('one'));

      account.errors().push(new Error('two'));

      expect(account.errors()).toHaveLength(1);
    });
  });

  describe('toString', () => {
    it('should summarise the aggregate state', () => {
      const account = new Account('acc-1');
      account.deposit(10);
      account.deposit(-1);

      expect(account.toString()).toBe(
        'AggregateRoot{id: acc-1, sequenceNo: 1, uncommittedEvents: 1, errors: 1}',
      );
    });
  });
});
