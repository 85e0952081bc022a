import { oppositeSide, planSubmission } from '../../../domain';
import { MatchWithResult, teamIdForSide } from '../matches.model';
import { ScoreInput, actorIdSchema, matchIdSchema, scoreInputSchema } from '../matches.schemas';
import { EventTypes, tryGetEventBus } from '../../../shared/events';
import { runWithLocks, LockDomain } from '../../../shared/transaction-runner';
import { validateInput } from '../../../shared/validate-input';
import { logger } from '../../../config/logger.config';
import {
  ResultContext,
  loadMatch,
  loadTournament,
  resultException,
  setMatchStatus,
  toConfirmationState,
} from './result-helpers';

export type SubmitResultContext = ResultContext;

/**
 * Submit the score of a scheduled match.
 *
 * LOCK CONTRACT:
 * - Acquires MATCH lock (300M + matchId); the status check and the result
 *   insert happen under it, so two submissions cannot both succeed
 */
export async function submitResult(
  ctx: SubmitResultContext,
  matchId: number,
  submitterId: string,
  input: ScoreInput
): Promise<MatchWithResult> {
  const id = validateInput(matchIdSchema, matchId);
  const actorId = validateInput(actorIdSchema, submitterId);
  const score = validateInput(scoreInputSchema, input);

  const updated = await runWithLocks(ctx.db, [{ domain: LockDomain.MATCH, id }], async (client) => {
    const match = await loadMatch(ctx, id, client);
    const tournament = await loadTournament(ctx, match.tournamentId, client);

    const plan = planSubmission(toConfirmationState(match), actorId, score, tournament.rules);
    if (!plan.ok) throw resultException(plan.error);
    const { side, homeConfirmed, awayConfirmed } = plan.value;

    await ctx.matchesRepo.insertResult(id, score, side, actorId, { homeConfirmed, awayConfirmed }, client);
    await setMatchStatus(ctx, match, 'RESULT_SUBMITTED', client);

    tryGetEventBus()?.publish({
      type: EventTypes.RESULT_SUBMITTED,
      tournamentId: match.tournamentId,
      userId: actorId,
      payload: {
        matchId: id,
        tournamentId: match.tournamentId,
        submittedBy: actorId,
        submittedBySide: side,
        awaitingTeamId: teamIdForSide(match, oppositeSide(side)),
        homeScore: score.homeScore,
        awayScore: score.awayScore,
      },
    });

    return loadMatch(ctx, id, client);
  });

  logger.info(`Result submitted for match ${id}`, {
    tournamentId: updated.tournamentId,
    score: `${score.homeScore}-${score.awayScore}`,
  });
  return updated;
}
