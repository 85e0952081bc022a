import { MatchesRepository } from './matches.repository';
import { MatchWithResult } from './matches.model';
import { actorIdSchema, matchIdSchema } from './matches.schemas';
import { validateInput } from '../../shared/validate-input';
import { MatchErrors } from '../../utils/exceptions';

/**
 * Read side of the match store
 */
export class MatchesService {
  constructor(private readonly matchesRepo: MatchesRepository) {}

  async getMatch(matchId: number): Promise<MatchWithResult> {
    const id = validateInput(matchIdSchema, matchId);
    const match = await this.matchesRepo.findWithResult(id);
    if (!match) throw MatchErrors.notFound(id);
    return match;
  }

  /**
   * Results submitted against this manager's teams that still need their confirmation
   */
  async listPendingConfirmations(managerId: string): Promise<MatchWithResult[]> {
    return this.matchesRepo.findPendingConfirmations(validateInput(actorIdSchema, managerId));
  }

  /**
   * Scheduled matches of this manager's teams, soonest first
   */
  async listUpcomingMatches(managerId: string): Promise<MatchWithResult[]> {
    return this.matchesRepo.findUpcoming(validateInput(actorIdSchema, managerId));
  }
}
