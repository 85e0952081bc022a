import type { PoolClient } from 'pg';
import { acquireLocks, type LockOptions, type LockSpec } from './locks';
import { tryGetEventBus } from './events';
import { translateDatabaseError } from '../utils/db-error-handler';
import { logger } from '../config/logger.config';

export interface PoolLike {
  connect(): Promise<PoolClient>;
}

/**
 * BEGIN, run, COMMIT. Domain events published by the body are dispatched
 * after COMMIT and dropped on ROLLBACK. A client whose ROLLBACK fails is
 * destroyed instead of going back to the pool.
 */
async function runTransactional<T>(
  pool: PoolLike,
  operation: string,
  body: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  const eventBus = tryGetEventBus();
  let broken: Error | undefined;

  const execute = async () => {
    try {
      await client.query('BEGIN');
      const result = await body(client);
      await client.query('COMMIT');
      eventBus?.commitTransaction();
      return result;
    } catch (error) {
      eventBus?.rollbackTransaction();
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.error(`ROLLBACK failed during ${operation}`, { error: broken.message });
      }
      throw translateDatabaseError(error, operation);
    }
  };

  try {
    return eventBus ? await eventBus.runInTransaction(execute) : await execute();
  } finally {
    client.release(broken);
  }
}

/**
 * Run reads and writes that must land together, without advisory locks.
 */
export async function runInTransaction<T>(
  pool: PoolLike,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  return runTransactional(pool, 'transaction', fn);
}

/**
 * Single-lock form of runWithLocks, e.g. the BRACKET lock for bracket generation.
 */
export async function runWithLock<T>(
  pool: PoolLike,
  domain: LockSpec['domain'],
  id: number,
  fn: (client: PoolClient) => Promise<T>,
  options?: LockOptions
): Promise<T> {
  return runWithLocks(pool, [{ domain, id }], fn, options);
}

/**
 * Take the advisory locks right after BEGIN, then run `fn`. Locks are held
 * until COMMIT or ROLLBACK; a lock wait past the timeout fails with
 * ContentionError.
 *
 * @example
 * await runWithLocks(pool, [{ domain: LockDomain.MATCH, id: matchId }], (client) =>
 *   matchesRepo.updateStatus(matchId, 'DISPUTED', version, client)
 * );
 */
export async function runWithLocks<T>(
  pool: PoolLike,
  locks: LockSpec[],
  fn: (client: PoolClient) => Promise<T>,
  options?: LockOptions
): Promise<T> {
  const label = locks.map((l) => `${l.domain}:${l.id}`).join(',');
  return runTransactional(pool, `locked transaction [${label}]`, async (client) => {
    await acquireLocks(client, locks, options);
    return fn(client);
  });
}

/**
 * Plain read on a pooled client, outside any transaction.
 */
export async function withClient<T>(
  pool: PoolLike,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export { LockDomain } from './locks';
