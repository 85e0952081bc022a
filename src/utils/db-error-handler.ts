import { logger } from '../config/logger.config';
import { AppException, ContentionError, DatabaseException } from './exceptions';

/**
 * PostgreSQL SQLSTATE codes that mean "lost a race, try again".
 */
const RETRYABLE_PG_CODES: Record<string, string> = {
  '40001': 'serialization failure',
  '40P01': 'deadlock detected',
  '55P03': 'lock not available',
  '57014': 'statement timeout',
};

function getPgCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Convert a raw driver error into an application error.
 * Application errors pass through unchanged; retryable SQLSTATEs become ContentionError.
 */
export function translateDatabaseError(error: unknown, operation: string): AppException {
  if (error instanceof AppException) {
    return error;
  }

  const code = getPgCode(error);
  if (code !== null && code in RETRYABLE_PG_CODES) {
    return new ContentionError(`${operation} failed: ${RETRYABLE_PG_CODES[code]}`);
  }

  logger.error(`Database error during ${operation}`, { error: String(error), code });
  return DatabaseException.fromError(error, operation);
}
