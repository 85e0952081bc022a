import { Pool, PoolClient } from 'pg';
import type { ConfirmationError, ConfirmationState, MatchStatus } from '../../../domain';
import type { MatchesRepository } from '../matches.repository';
import type { TournamentsRepository } from '../../tournaments/tournaments.repository';
import type { Tournament } from '../../tournaments/tournaments.model';
import { Match, MatchWithResult, scoreLineOf } from '../matches.model';
import {
  AppException,
  ErrorCode,
  InvalidStateException,
  MatchErrors,
  TournamentErrors,
  UnauthorizedException,
  ValidationException,
} from '../../../utils/exceptions';

/**
 * Dependencies shared by every result use case
 */
export interface ResultContext {
  db: Pool;
  matchesRepo: MatchesRepository;
  tournamentsRepo: TournamentsRepository;
}

export function toConfirmationState(match: MatchWithResult): ConfirmationState {
  return {
    status: match.status,
    stage: match.stage,
    homeManagerId: match.homeManagerId,
    awayManagerId: match.awayManagerId,
    result: match.result
      ? {
          score: scoreLineOf(match.result),
          submittedBySide: match.result.submittedBySide,
          homeConfirmed: match.result.homeConfirmed,
          awayConfirmed: match.result.awayConfirmed,
        }
      : null,
  };
}

/**
 * Map a state machine rejection onto the exception callers see.
 */
export function resultException(error: ConfirmationError): AppException {
  switch (error.code) {
    case 'NOT_A_PARTICIPANT':
      return MatchErrors.notAParticipant();
    case 'MANAGES_BOTH_SIDES':
      return MatchErrors.managesBothSides();
    case 'NOT_OPPOSING_SIDE':
      return new UnauthorizedException(error.message);
    case 'INVALID_STATUS':
    case 'ALREADY_CONFIRMED':
      return new InvalidStateException(error.message);
    case 'SCORE_MISMATCH':
      return MatchErrors.scoreMismatch();
    case 'NO_WINNER':
      return new ValidationException(error.message, ErrorCode.NO_WINNER);
    default:
      return new ValidationException(error.message);
  }
}

export async function loadMatch(
  ctx: ResultContext,
  matchId: number,
  client: PoolClient
): Promise<MatchWithResult> {
  const match = await ctx.matchesRepo.findWithResult(matchId, client);
  if (!match) throw MatchErrors.notFound(matchId);
  return match;
}

export async function loadTournament(
  ctx: ResultContext,
  tournamentId: number,
  client: PoolClient
): Promise<Tournament> {
  const tournament = await ctx.tournamentsRepo.findById(tournamentId, client);
  if (!tournament) throw TournamentErrors.notFound(tournamentId);
  return tournament;
}

/**
 * Write the new status against the version that was read; a concurrent
 * writer surfaces as a ContentionError.
 */
export async function setMatchStatus(
  ctx: ResultContext,
  match: Match,
  status: MatchStatus,
  client: PoolClient
): Promise<Match> {
  const updated = await ctx.matchesRepo.updateStatus(match.id, status, match.version, client);
  if (!updated) throw MatchErrors.versionConflict(match.id);
  return updated;
}
