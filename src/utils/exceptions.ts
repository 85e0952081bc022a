/**
 * Error codes for callers to distinguish between error types.
 * Use these to decide how to render a failure or whether to retry.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
  DATABASE_ERROR: 'DATABASE_ERROR',

  // Retryable
  CONTENTION: 'CONTENTION',

  // Progression errors
  INCOMPLETE_BRACKET: 'INCOMPLETE_BRACKET',

  // Roster errors
  ROSTER_FULL: 'ROSTER_FULL',
  PLAYER_NOT_ON_ROSTER: 'PLAYER_NOT_ON_ROSTER',
  PLAYER_ALREADY_ON_ROSTER: 'PLAYER_ALREADY_ON_ROSTER',

  // Result errors
  SCORE_MISMATCH: 'SCORE_MISMATCH',
  NO_WINNER: 'NO_WINNER',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when input is malformed (negative score, inconsistent flags, ...)
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when the acting user lacks permission for the requested side or action
 */
export class UnauthorizedException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.UNAUTHORIZED) {
    super(message, 403, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when an operation is not legal in the entity's current status
 */
export class InvalidStateException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.INVALID_STATE) {
    super(message, 409, errorCode);
  }
}

/**
 * Thrown when bracket or qualification data is read before every
 * prerequisite group match is confirmed.
 */
export class IncompleteBracketException extends AppException {
  constructor(message: string) {
    super(message, 409, ErrorCode.INCOMPLETE_BRACKET);
  }
}

/**
 * Thrown when a player is added to a roster already at its maximum size
 */
export class RosterFullException extends AppException {
  public readonly maxSize: number;

  constructor(maxSize: number) {
    super(`Roster is full (max ${maxSize} players)`, 409, ErrorCode.ROSTER_FULL);
    this.maxSize = maxSize;
  }
}

/**
 * Thrown when an advisory lock cannot be acquired within the configured timeout,
 * or when an optimistic version check / serializable transaction loses a race.
 * The only error a caller should retry automatically.
 */
export class ContentionError extends AppException {
  public readonly lockId: number | null;
  public readonly timeoutMs: number | null;

  constructor(message: string, lockId: number | null = null, timeoutMs: number | null = null) {
    super(message, 409, ErrorCode.CONTENTION, true);
    this.lockId = lockId;
    this.timeoutMs = timeoutMs;
  }

  static lockTimeout(lockId: number, timeoutMs: number, label?: string): ContentionError {
    return new ContentionError(
      `Failed to acquire lock ${label ?? lockId} within ${timeoutMs}ms`,
      lockId,
      timeoutMs
    );
  }
}

/**
 * Thrown when a database operation fails.
 * Wraps the original error to prevent schema leakage.
 */
export class DatabaseException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 500, ErrorCode.DATABASE_ERROR);
    this.originalError = originalError;
  }

  /**
   * Creates a DatabaseException from a raw database error.
   */
  static fromError(error: unknown, operation: string): DatabaseException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatabaseException(`Database operation failed: ${operation}`, originalError);
  }
}

// Domain-specific exception factory functions for common scenarios
export const MatchErrors = {
  notFound: (matchId: number) => new NotFoundException(`Match ${matchId} not found`),
  invalidStatus: (action: string, status: string) =>
    new InvalidStateException(`Cannot ${action} a match with status ${status}`),
  notAParticipant: () =>
    new UnauthorizedException('You do not manage either team in this match'),
  managesBothSides: () =>
    new UnauthorizedException('A manager of both teams cannot take part in result confirmation'),
  scoreMismatch: () =>
    new ValidationException(
      'Score does not match the submitted result; dispute it instead',
      ErrorCode.SCORE_MISMATCH
    ),
  versionConflict: (matchId: number) =>
    new ContentionError(`Match ${matchId} was modified concurrently`),
};

export const RosterErrors = {
  full: (maxSize: number) => new RosterFullException(maxSize),
  playerNotOnRoster: (playerName: string) =>
    new NotFoundException(`Player ${playerName} is not on this roster`, ErrorCode.PLAYER_NOT_ON_ROSTER),
  playerAlreadyOnRoster: (playerName: string) =>
    new ValidationException(
      `Player ${playerName} is already on this roster`,
      ErrorCode.PLAYER_ALREADY_ON_ROSTER
    ),
};

export const TournamentErrors = {
  notFound: (tournamentId: number) => new NotFoundException(`Tournament ${tournamentId} not found`),
  notOrganizer: () =>
    new UnauthorizedException('Only the tournament organizer can perform this action'),
  groupStageIncomplete: (remaining: number) =>
    new IncompleteBracketException(
      `Group stage is not complete: ${remaining} match(es) still awaiting confirmation`
    ),
  bracketNotGenerated: (tournamentId: number) =>
    new IncompleteBracketException(`Bracket for tournament ${tournamentId} has not been generated`),
};
