import type { PoolClient } from 'pg';
import {
  LockDomain,
  runInTransaction,
  runWithLock,
  runWithLocks,
  withClient,
  type PoolLike,
} from '../../shared/transaction-runner';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import { ContentionError, DatabaseException, NotFoundException } from '../../utils/exceptions';
import { recordEvents } from '../helpers/events';
import { createAbortingClient } from '../helpers/pg-clients';

function createMockPool() {
  const client = { query: jest.fn().mockResolvedValue({ rows: [] }), release: jest.fn() };
  const pool: PoolLike = { connect: jest.fn().mockResolvedValue(client as unknown as PoolClient) };
  return { client, pool };
}

function sqlOf(query: jest.Mock): unknown[] {
  return query.mock.calls.map((call: unknown[]) => call[0]);
}

function publishStandingsUpdated(): void {
  tryGetEventBus()?.publish({
    type: EventTypes.STANDINGS_UPDATED,
    tournamentId: 1,
    payload: { tournamentId: 1, groupNumber: 2 },
  });
}

describe('transaction runner', () => {
  it('commits and releases the client', async () => {
    const { client, pool } = createMockPool();

    const result = await runInTransaction(pool, async (tx) => {
      await tx.query('UPDATE matches SET status = $1', ['CONFIRMED']);
      return 42;
    });

    expect(result).toBe(42);
    expect(sqlOf(client.query)).toEqual(['BEGIN', 'UPDATE matches SET status = $1', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows application errors unchanged', async () => {
    const { client, pool } = createMockPool();
    const failure = new NotFoundException('Match 9 not found');

    await expect(
      runInTransaction(pool, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(sqlOf(client.query)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('translates a deadlock into a retryable ContentionError', async () => {
    const { pool } = createMockPool();

    const attempt = runInTransaction(pool, async () => {
      throw Object.assign(new Error('deadlock detected'), { code: '40P01' });
    });

    await expect(attempt).rejects.toBeInstanceOf(ContentionError);
    await expect(attempt).rejects.toThrow('transaction failed: deadlock detected');
  });

  it('takes the locks after BEGIN and names them in database errors', async () => {
    const { client, pool } = createMockPool();

    const attempt = runWithLocks(
      pool,
      [{ domain: LockDomain.MATCH, id: 7 }],
      async () => {
        throw Object.assign(new Error('relation "matches" does not exist'), { code: '42P01' });
      },
      { timeoutMs: 0 }
    );

    await expect(attempt).rejects.toBeInstanceOf(DatabaseException);
    await expect(attempt).rejects.toThrow('Database operation failed: locked transaction [3:7]');
    expect(sqlOf(client.query)).toEqual(['BEGIN', 'SELECT pg_advisory_xact_lock($1)', 'ROLLBACK']);
  });

  it('reports a lock timeout as contention after rolling back the aborted transaction', async () => {
    const { mock, client } = createAbortingClient();
    const pool: PoolLike = { connect: jest.fn().mockResolvedValue(client) };
    const body = jest.fn();

    const attempt = runWithLocks(pool, [{ domain: LockDomain.MATCH, id: 7 }], body, { timeoutMs: 50 });

    await expect(attempt).rejects.toBeInstanceOf(ContentionError);
    await expect(attempt).rejects.toMatchObject({ retryable: true });
    expect(body).not.toHaveBeenCalled();
    expect(sqlOf(mock.query)).toEqual([
      'BEGIN',
      'SET LOCAL statement_timeout = 50',
      'SELECT pg_advisory_xact_lock($1)',
      'ROLLBACK',
    ]);
    expect(mock.release).toHaveBeenCalledWith(undefined);
  });

  it('keeps the original error and discards the client when ROLLBACK fails', async () => {
    const { client, pool } = createMockPool();
    const connectionLost = new Error('Connection terminated unexpectedly');
    client.query.mockImplementation((text: string) =>
      text === 'ROLLBACK' ? Promise.reject(connectionLost) : Promise.resolve({ rows: [] })
    );
    const failure = new NotFoundException('Match 9 not found');

    await expect(
      runInTransaction(pool, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(client.release).toHaveBeenCalledWith(connectionLost);
  });

  it('runs a single-lock transaction', async () => {
    const { client, pool } = createMockPool();

    await runWithLock(pool, LockDomain.TEAM, 3, async () => 'ok', { timeoutMs: 0 });

    expect(client.query).toHaveBeenCalledWith('SELECT pg_advisory_xact_lock($1)', [200_000_003]);
    expect(sqlOf(client.query)).toEqual(['BEGIN', 'SELECT pg_advisory_xact_lock($1)', 'COMMIT']);
  });

  it('dispatches events published in the transaction after commit', async () => {
    const events = recordEvents();
    const { pool } = createMockPool();

    await runInTransaction(pool, async () => {
      publishStandingsUpdated();
      expect(events).toHaveLength(0);
    });

    expect(events.map((e) => e.type)).toEqual(['standings:updated']);
  });

  it('discards events published in a rolled back transaction', async () => {
    const events = recordEvents();
    const { pool } = createMockPool();

    await expect(
      runInTransaction(pool, async () => {
        publishStandingsUpdated();
        throw new NotFoundException('Tournament 1 not found');
      })
    ).rejects.toBeInstanceOf(NotFoundException);

    expect(events).toEqual([]);
  });

  it('releases the client of a plain read when it fails', async () => {
    const { client, pool } = createMockPool();

    await expect(
      withClient(pool, async () => {
        throw new Error('read failed');
      })
    ).rejects.toThrow('read failed');

    expect(client.query).not.toHaveBeenCalled();
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
