import { PoolConfig } from 'pg';
import { getEnv } from './env.config';
import { logger } from './logger.config';

export function getDatabaseConfig(): PoolConfig {
  const env = getEnv();
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE || 20,
    min: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
    idle_in_transaction_session_timeout: 60000,
  };

  if (env.NODE_ENV === 'production') {
    const rejectUnauthorized = process.env.DATABASE_SSL_REJECT_UNAUTHORIZED === 'true';
    config.ssl = { rejectUnauthorized };

    if (!rejectUnauthorized) {
      logger.warn(
        '[SECURITY] Database SSL certificate validation is disabled. ' +
          'Set DATABASE_SSL_REJECT_UNAUTHORIZED=true to verify the server certificate.'
      );
    }
  }

  return config;
}
