import { planConfirmation, type ScoreLine } from '../../../domain';
import type { ProgressionService } from '../../progression/progression.service';
import { MatchWithResult, scoreLineOf } from '../matches.model';
import { ScoreInput, actorIdSchema, matchIdSchema, scoreInputSchema } from '../matches.schemas';
import { EventTypes, tryGetEventBus } from '../../../shared/events';
import { runWithLocks, LockDomain } from '../../../shared/transaction-runner';
import { validateInput } from '../../../shared/validate-input';
import { InvalidStateException } from '../../../utils/exceptions';
import { logger } from '../../../config/logger.config';
import {
  ResultContext,
  loadMatch,
  resultException,
  setMatchStatus,
  toConfirmationState,
} from './result-helpers';

export interface ConfirmResultContext extends ResultContext {
  progressionService: ProgressionService;
}

/**
 * Confirm a submitted result on behalf of the confirmer's side.
 *
 * Repeating a confirmation, or confirming an already CONFIRMED match, is a
 * successful no-op. When the second side confirms, the match becomes
 * CONFIRMED and standings or the bracket are recomputed in the same
 * transaction.
 *
 * LOCK CONTRACT:
 * - Acquires MATCH lock (300M + matchId)
 * - Recomputation then takes GROUP and/or BRACKET locks, which rank after MATCH
 */
export async function confirmResult(
  ctx: ConfirmResultContext,
  matchId: number,
  confirmerId: string,
  expectedScore?: ScoreInput
): Promise<MatchWithResult> {
  const id = validateInput(matchIdSchema, matchId);
  const actorId = validateInput(actorIdSchema, confirmerId);
  const expected: ScoreLine | null =
    expectedScore === undefined ? null : validateInput(scoreInputSchema, expectedScore);

  const { updated, confirmedNow } = await runWithLocks(
    ctx.db,
    [{ domain: LockDomain.MATCH, id }],
    async (client) => {
      const match = await loadMatch(ctx, id, client);

      const plan = planConfirmation(toConfirmationState(match), actorId, expected);
      if (!plan.ok) throw resultException(plan.error);
      if (plan.value.kind === 'NOOP') return { updated: match, confirmedNow: false };

      const { homeConfirmed, awayConfirmed, completes } = plan.value;
      if (!match.result) throw new InvalidStateException(`Match ${id} has no result to confirm`);
      const score = scoreLineOf(match.result);

      await ctx.matchesRepo.updateConfirmations(id, homeConfirmed, awayConfirmed, client);

      if (!completes) {
        await setMatchStatus(ctx, match, match.status, client);
        return { updated: await loadMatch(ctx, id, client), confirmedNow: false };
      }

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

      return { updated: await loadMatch(ctx, id, client), confirmedNow: true };
    }
  );

  if (confirmedNow) {
    logger.info(`Match ${id} confirmed`, { tournamentId: updated.tournamentId, stage: updated.stage });
  }
  return updated;
}
