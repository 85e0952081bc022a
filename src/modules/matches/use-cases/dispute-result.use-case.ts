import { planDispute } from '../../../domain';
import { MatchWithResult } from '../matches.model';
import { actorIdSchema, matchIdSchema } from '../matches.schemas';
import { EventTypes, tryGetEventBus } from '../../../shared/events';
import { runWithLocks, LockDomain } from '../../../shared/transaction-runner';
import { validateInput } from '../../../shared/validate-input';
import { logger } from '../../../config/logger.config';
import {
  ResultContext,
  loadMatch,
  resultException,
  setMatchStatus,
  toConfirmationState,
} from './result-helpers';

export type DisputeResultContext = ResultContext;

/**
 * Dispute a submitted result. Only the side that did not submit may
 * dispute, and only before it has confirmed. The result is kept for the
 * organizer to review.
 *
 * LOCK CONTRACT:
 * - Acquires MATCH lock (300M + matchId); a racing confirmation of the
 *   same match is serialized, so exactly one of the two wins
 */
export async function disputeResult(
  ctx: DisputeResultContext,
  matchId: number,
  disputerId: string
): Promise<MatchWithResult> {
  const id = validateInput(matchIdSchema, matchId);
  const actorId = validateInput(actorIdSchema, disputerId);

  const updated = await runWithLocks(ctx.db, [{ domain: LockDomain.MATCH, id }], async (client) => {
    const match = await loadMatch(ctx, id, client);

    const plan = planDispute(toConfirmationState(match), actorId);
    if (!plan.ok) throw resultException(plan.error);

    await setMatchStatus(ctx, match, 'DISPUTED', client);

    tryGetEventBus()?.publish({
      type: EventTypes.RESULT_DISPUTED,
      tournamentId: match.tournamentId,
      userId: actorId,
      payload: { matchId: id, disputerId: actorId },
    });

    return loadMatch(ctx, id, client);
  });

  logger.info(`Result disputed for match ${id}`, { tournamentId: updated.tournamentId });
  return updated;
}
