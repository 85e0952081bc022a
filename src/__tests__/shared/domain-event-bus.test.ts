import { DomainEventBus, EventTypes, type DomainEvent } from '../../shared/events';

function rosterUpdated(teamId: number) {
  return {
    type: EventTypes.ROSTER_UPDATED,
    tournamentId: 1,
    payload: { teamId, rosterSize: 8, registrationComplete: true },
  };
}

describe('DomainEventBus', () => {
  let bus: DomainEventBus;
  let received: DomainEvent[];

  beforeEach(() => {
    bus = new DomainEventBus();
    received = [];
    bus.subscribe({ handle: (event) => void received.push(event) });
  });

  it('dispatches immediately outside a transaction', () => {
    bus.publish(rosterUpdated(3));

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ type: 'roster:updated', tournamentId: 1 });
    expect(received[0].timestamp).toBeInstanceOf(Date);
  });

  it('holds events until the transaction commits', async () => {
    await bus.runInTransaction(async () => {
      bus.publish(rosterUpdated(3));
      bus.publish(rosterUpdated(4));
      expect(bus.isInTransaction()).toBe(true);
      expect(bus.getPendingEventCount()).toBe(2);
      expect(received).toHaveLength(0);

      bus.commitTransaction();
    });

    expect(received.map((e) => e.payload)).toEqual([
      { teamId: 3, rosterSize: 8, registrationComplete: true },
      { teamId: 4, rosterSize: 8, registrationComplete: true },
    ]);
  });

  it('drops events on rollback', async () => {
    await bus.runInTransaction(async () => {
      bus.publish(rosterUpdated(3));
      bus.rollbackTransaction();
      expect(bus.getPendingEventCount()).toBe(0);
    });

    expect(received).toEqual([]);
  });

  it('keeps the queues of concurrent transactions apart', async () => {
    let releaseFirst: () => void = () => undefined;
    const firstMayCommit = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = bus.runInTransaction(async () => {
      bus.publish(rosterUpdated(1));
      await firstMayCommit;
      bus.rollbackTransaction();
    });
    const second = bus.runInTransaction(async () => {
      bus.publish(rosterUpdated(2));
      bus.commitTransaction();
    });

    await second;
    releaseFirst();
    await first;

    expect(received.map((e) => e.type === 'roster:updated' && e.payload.teamId)).toEqual([2]);
  });

  it('keeps dispatching when a subscriber throws', () => {
    const failing = { handle: jest.fn(() => { throw new Error('subscriber failed'); }) };
    const rejecting = { handle: jest.fn().mockRejectedValue(new Error('async subscriber failed')) };
    const later = { handle: jest.fn() };
    bus.subscribe(failing);
    bus.subscribe(rejecting);
    bus.subscribe(later);

    bus.publish(rosterUpdated(3));

    expect(failing.handle).toHaveBeenCalledTimes(1);
    expect(rejecting.handle).toHaveBeenCalledTimes(1);
    expect(later.handle).toHaveBeenCalledTimes(1);
    expect(received).toHaveLength(1);
  });

  it('stops delivering to unsubscribed handlers', () => {
    const subscriber = { handle: jest.fn() };
    bus.subscribe(subscriber);
    bus.unsubscribe(subscriber);

    bus.publish(rosterUpdated(3));

    expect(subscriber.handle).not.toHaveBeenCalled();
  });
});
