import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

// Pool health states for callers that want to shed load
export enum PoolHealth {
  HEALTHY = 'healthy', // < 70% capacity
  DEGRADED = 'degraded', // 70-95% capacity or waitingCount > 0
  CRITICAL = 'critical', // > 95% capacity or waitingCount > 5
}

/**
 * Create the database connection pool. Kept lazy so importing repositories
 * does not open connections or require DATABASE_URL.
 */
export function createPool(): Pool {
  const pool = new Pool(getDatabaseConfig());

  pool.on('connect', () => {
    if (process.env.NODE_ENV === 'development') {
      logger.debug('Database client connected');
    }
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message });
  });

  return pool;
}

export function getPoolMetrics(pool: Pool) {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}

export function getPoolHealth(pool: Pool): PoolHealth {
  const total = pool.totalCount;
  const idle = pool.idleCount;
  const waiting = pool.waitingCount;
  const usage = total > 0 ? (total - idle) / total : 0;

  if (waiting > 5 || usage > 0.95) return PoolHealth.CRITICAL;
  if (waiting > 0 || usage > 0.7) return PoolHealth.DEGRADED;
  return PoolHealth.HEALTHY;
}

// Health check function
export async function checkDatabaseHealth(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows[0]?.health_check === 1;
  } catch (error) {
    logger.error('Database health check failed', { error: String(error) });
    return false;
  }
}

// Graceful shutdown
export async function closePool(pool: Pool): Promise<void> {
  pool.removeAllListeners();
  await pool.end();
  logger.info('Database pool closed');
}
