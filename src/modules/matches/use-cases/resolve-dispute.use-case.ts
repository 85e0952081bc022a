import { planResolution } from '../../../domain';
import type { ProgressionService } from '../../progression/progression.service';
import { MatchWithResult } from '../matches.model';
import { ScoreInput, actorIdSchema, matchIdSchema, scoreInputSchema } from '../matches.schemas';
import { EventTypes, tryGetEventBus } from '../../../shared/events';
import { runWithLocks, LockDomain } from '../../../shared/transaction-runner';
import { validateInput } from '../../../shared/validate-input';
import { TournamentErrors } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';
import {
  ResultContext,
  loadMatch,
  loadTournament,
  resultException,
  setMatchStatus,
  toConfirmationState,
} from './result-helpers';

export interface ResolveDisputeContext extends ResultContext {
  progressionService: ProgressionService;
}

/**
 * Organizer action: discard a disputed result so it can be submitted again.
 *
 * LOCK CONTRACT:
 * - Acquires MATCH lock (300M + matchId)
 */
export async function reopenMatch(
  ctx: ResolveDisputeContext,
  matchId: number,
  organizerId: string
): Promise<MatchWithResult> {
  const id = validateInput(matchIdSchema, matchId);
  const actorId = validateInput(actorIdSchema, organizerId);

  const updated = await runWithLocks(ctx.db, [{ domain: LockDomain.MATCH, id }], async (client) => {
    const match = await loadMatch(ctx, id, client);
    const tournament = await loadTournament(ctx, match.tournamentId, client);
    if (tournament.organizerId !== actorId) throw TournamentErrors.notOrganizer();

    const plan = planResolution(toConfirmationState(match), 'reopen');
    if (!plan.ok) throw resultException(plan.error);

    await ctx.matchesRepo.deleteResult(id, client);
    await setMatchStatus(ctx, match, 'SCHEDULED', client);

    tryGetEventBus()?.publish({
      type: EventTypes.MATCH_REOPENED,
      tournamentId: match.tournamentId,
      userId: actorId,
      payload: { matchId: id, tournamentId: match.tournamentId, reopenedBy: actorId },
    });

    return loadMatch(ctx, id, client);
  });

  logger.info(`Disputed match ${id} reopened`, { tournamentId: updated.tournamentId });
  return updated;
}

/**
 * Organizer action: settle a dispute with an imposed score. Both sides
 * count as confirmed and recomputation runs as for a regular confirmation.
 *
 * LOCK CONTRACT:
 * - Acquires MATCH lock (300M + matchId), then GROUP/BRACKET during recomputation
 */
export async function forceConfirm(
  ctx: ResolveDisputeContext,
  matchId: number,
  organizerId: string,
  input: ScoreInput
): Promise<MatchWithResult> {
  const id = validateInput(matchIdSchema, matchId);
  const actorId = validateInput(actorIdSchema, organizerId);
  const score = validateInput(scoreInputSchema, input);

  const updated = await runWithLocks(ctx.db, [{ domain: LockDomain.MATCH, id }], async (client) => {
    const match = await loadMatch(ctx, id, client);
    const tournament = await loadTournament(ctx, match.tournamentId, client);
    if (tournament.organizerId !== actorId) throw TournamentErrors.notOrganizer();

    const plan = planResolution(
      toConfirmationState(match),
      'force confirm',
      score,
      tournament.rules.penaltiesRequireLevelScore
    );
    if (!plan.ok) throw resultException(plan.error);

    await ctx.matchesRepo.overrideResult(id, score, client);
    const confirmed = await setMatchStatus(ctx, match, 'CONFIRMED', client);
    await ctx.progressionService.onMatchConfirmed(client, confirmed, score);

    tryGetEventBus()?.publish({
      type: EventTypes.MATCH_CONFIRMED,
      tournamentId: match.tournamentId,
      payload: {
        matchId: id,
        tournamentId: match.tournamentId,
        homeScore: score.homeScore,
        awayScore: score.awayScore,
        timestamp: new Date(),
      },
    });

    return loadMatch(ctx, id, client);
  });

  logger.info(`Disputed match ${id} force-confirmed`, {
    tournamentId: updated.tournamentId,
    score: `${score.homeScore}-${score.awayScore}`,
  });
  return updated;
}
