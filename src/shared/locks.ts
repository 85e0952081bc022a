/**
 * Centralized Advisory Lock Helper
 *
 * Provides consistent lock ordering across the engine to prevent deadlocks.
 * Uses PostgreSQL transaction-scoped advisory locks with deterministic ordering.
 *
 * Lock Ordering Priority (always acquire in this order):
 * 1. TOURNAMENT - lifecycle transitions (group draw, stage changes)
 * 2. TEAM - roster mutations
 * 3. MATCH - result submission / confirmation / dispute
 * 4. GROUP - standings recomputation for one group
 * 5. BRACKET - bracket generation and advancement
 *
 * Usage:
 *   await withLocks(client, [
 *     { domain: LockDomain.MATCH, id: matchId },
 *     { domain: LockDomain.GROUP, id: groupLockKey(tournamentId, groupNumber) },
 *   ], async () => {
 *     // Your transactional code here
 *   });
 */

import type { PoolClient } from 'pg';
import { logger } from '../config/logger.config';
import { ContentionError } from '../utils/exceptions';

/**
 * Lock domain enum with priority values.
 * Lower number = higher priority = acquired first.
 */
export enum LockDomain {
  TOURNAMENT = 1,
  TEAM = 2,
  MATCH = 3,
  GROUP = 4,
  BRACKET = 5,
}

/**
 * Lock specification for acquiring an advisory lock.
 */
export interface LockSpec {
  domain: LockDomain;
  id: number;
}

/**
 * Namespace offsets to prevent lock ID collisions between domains.
 * Each domain gets 100 million IDs.
 */
const LOCK_NAMESPACE_OFFSET: Record<LockDomain, number> = {
  [LockDomain.TOURNAMENT]: 100_000_000,
  [LockDomain.TEAM]: 200_000_000,
  [LockDomain.MATCH]: 300_000_000,
  [LockDomain.GROUP]: 400_000_000,
  [LockDomain.BRACKET]: 500_000_000,
};

/** Groups per tournament addressable by groupLockKey */
const MAX_GROUPS_PER_TOURNAMENT = 1000;

/**
 * Generates a deterministic lock ID from domain and entity ID.
 */
export function getLockId(domain: LockDomain, id: number): number {
  return LOCK_NAMESPACE_OFFSET[domain] + id;
}

/**
 * Entity id used for a group's GROUP lock.
 */
export function groupLockKey(tournamentId: number, groupNumber: number): number {
  return tournamentId * MAX_GROUPS_PER_TOURNAMENT + groupNumber;
}

/**
 * Sorts locks by domain priority, then by entity ID, and drops duplicates.
 */
export function orderLocks(locks: LockSpec[]): LockSpec[] {
  const sorted = [...locks].sort((a, b) => {
    if (a.domain !== b.domain) {
      return a.domain - b.domain;
    }
    return a.id - b.id;
  });

  return sorted.filter(
    (lock, i, arr) => i === 0 || lock.domain !== arr[i - 1].domain || lock.id !== arr[i - 1].id
  );
}

/**
 * PostgreSQL error code for statement cancellation due to statement_timeout.
 */
const PG_STATEMENT_TIMEOUT_ERROR_CODE = '57014';

/**
 * Options for lock acquisition.
 */
export interface LockOptions {
  /** Threshold in ms before logging a slow lock warning */
  slowThresholdMs?: number;
  /** Timeout in ms for lock acquisition; exceeded -> ContentionError. 0 disables the bound. */
  timeoutMs?: number;
}

let defaultLockOptions: Required<LockOptions> = {
  slowThresholdMs: 1000,
  timeoutMs: 5000,
};

/**
 * Override the process-wide lock defaults (wired from env by bootstrap).
 */
export function configureLockDefaults(options: LockOptions): void {
  defaultLockOptions = { ...defaultLockOptions, ...options };
}

function hasPgCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

/**
 * Acquires the given advisory locks in consistent order on an open transaction.
 * Uses pg_advisory_xact_lock (released on COMMIT/ROLLBACK). Each acquisition is
 * bounded by SET LOCAL statement_timeout; exceeding it raises ContentionError.
 */
export async function acquireLocks(
  client: PoolClient,
  locks: LockSpec[],
  options?: LockOptions
): Promise<void> {
  const slowThreshold = options?.slowThresholdMs ?? defaultLockOptions.slowThresholdMs;
  const lockTimeoutMs = options?.timeoutMs ?? defaultLockOptions.timeoutMs;

  for (const lock of orderLocks(locks)) {
    const lockId = getLockId(lock.domain, lock.id);
    const start = Date.now();

    if (lockTimeoutMs > 0) {
      await client.query(`SET LOCAL statement_timeout = ${lockTimeoutMs}`);
    }
    try {
      await client.query('SELECT pg_advisory_xact_lock($1)', [lockId]);
    } catch (err: unknown) {
      // The failed statement aborted the transaction; SET LOCAL ends with it
      if (hasPgCode(err, PG_STATEMENT_TIMEOUT_ERROR_CODE)) {
        throw ContentionError.lockTimeout(
          lockId,
          lockTimeoutMs,
          `domain=${LockDomain[lock.domain]} id=${lock.id}`
        );
      }
      throw err;
    }

    // Reset statement timeout so the callback runs without artificial time limits
    if (lockTimeoutMs > 0) {
      await client.query('SET LOCAL statement_timeout = 0');
    }

    const elapsed = Date.now() - start;
    if (elapsed > slowThreshold) {
      logger.warn(
        `Slow lock acquisition: domain=${LockDomain[lock.domain]} id=${lock.id} lockId=${lockId} took ${elapsed}ms`
      );
    }
  }
}

/**
 * Acquires multiple advisory locks in consistent order and executes the callback.
 *
 * @example
 * await withLocks(client, [
 *   { domain: LockDomain.GROUP, id: 1002 },
 *   { domain: LockDomain.MATCH, id: 7 },
 * ], async () => {
 *   // Locks acquired in order: MATCH(7), GROUP(1002)
 * });
 */
export async function withLocks<T>(
  client: PoolClient,
  locks: LockSpec[],
  fn: () => Promise<T>,
  options?: LockOptions
): Promise<T> {
  await acquireLocks(client, locks, options);
  return fn();
}

/**
 * Helper: Lock a single group for standings recomputation.
 */
export async function lockGroup<T>(
  client: PoolClient,
  tournamentId: number,
  groupNumber: number,
  fn: () => Promise<T>
): Promise<T> {
  return withLocks(
    client,
    [{ domain: LockDomain.GROUP, id: groupLockKey(tournamentId, groupNumber) }],
    fn
  );
}

/**
 * Helper: Lock a tournament's bracket.
 */
export async function lockBracket<T>(
  client: PoolClient,
  tournamentId: number,
  fn: () => Promise<T>
): Promise<T> {
  return withLocks(client, [{ domain: LockDomain.BRACKET, id: tournamentId }], fn);
}
