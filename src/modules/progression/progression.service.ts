import { Pool, PoolClient } from 'pg';
import type { TournamentsRepository } from '../tournaments/tournaments.repository';
import type { MatchesRepository } from '../matches/matches.repository';
import type { StandingsService } from '../standings/standings.service';
import type { BracketService } from '../bracket/bracket.service';
import type { Bracket } from '../bracket/bracket.model';
import type { Tournament } from '../tournaments/tournaments.model';
import { Match, teamIdForSide } from '../matches/matches.model';
import { recomputeTriggerFor, type RecomputeTrigger, type ScoreLine, type TournamentStatus } from '../../domain';
import { lockBracket } from '../../shared/locks';
import { runWithLock, LockDomain } from '../../shared/transaction-runner';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import { InvalidStateException, TournamentErrors } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

type KnockoutTrigger = Extract<RecomputeTrigger, { kind: 'KNOCKOUT' }>;

/**
 * Drives the tournament forward after each confirmed match:
 * group table recomputation, the group -> knockout transition, bracket
 * advancement and completion.
 */
export class ProgressionService {
  constructor(
    private readonly db: Pool,
    private readonly tournamentsRepo: TournamentsRepository,
    private readonly matchesRepo: MatchesRepository,
    private readonly standingsService: StandingsService,
    private readonly bracketService: BracketService
  ) {}

  /**
   * Runs inside the confirming transaction, exactly once per confirmation.
   *
   * LOCK CONTRACT (caller already holds MATCH):
   * - GROUP lock while the table is rebuilt
   * - BRACKET lock for the knockout transition check and for advancement,
   *   so concurrent "last group match" confirmations generate one bracket
   */
  async onMatchConfirmed(client: PoolClient, match: Match, score: ScoreLine): Promise<void> {
    const trigger = recomputeTriggerFor(match, score);
    if (!trigger) {
      throw new InvalidStateException(`Match ${match.id} cannot be placed in a group or bracket`);
    }

    switch (trigger.kind) {
      case 'GROUP':
        await this.standingsService.recomputeGroup(trigger.tournamentId, trigger.groupNumber, client);
        await lockBracket(client, trigger.tournamentId, () =>
          this.enterKnockoutIfGroupsComplete(client, trigger.tournamentId)
        );
        break;
      case 'KNOCKOUT':
        await lockBracket(client, trigger.tournamentId, () =>
          this.advanceKnockout(client, match, trigger)
        );
        break;
    }
  }

  /**
   * Generate the bracket on demand. Same result as the automatic transition
   * after the last group match; returns the existing bracket when present.
   *
   * LOCK CONTRACT:
   * - Acquires BRACKET lock (500M + tournamentId)
   */
  async generateBracket(tournamentId: number): Promise<Bracket> {
    return runWithLock(this.db, LockDomain.BRACKET, tournamentId, async (client) => {
      const tournament = await this.requireTournament(tournamentId, client);
      if (tournament.status === 'REGISTRATION') {
        throw new InvalidStateException('The group stage has not started');
      }

      const bracket = await this.bracketService.generate(client, tournament);
      if (tournament.status === 'GROUP_STAGE') {
        await this.transition(client, tournament, 'KNOCKOUT');
      }
      return bracket;
    });
  }

  private async enterKnockoutIfGroupsComplete(client: PoolClient, tournamentId: number): Promise<void> {
    const tournament = await this.requireTournament(tournamentId, client);
    if (tournament.status !== 'GROUP_STAGE') return;

    const remaining = await this.matchesRepo.countUnconfirmedGroupMatches(tournamentId, client);
    if (remaining > 0) return;

    await this.bracketService.generate(client, tournament);
    await this.transition(client, tournament, 'KNOCKOUT');
  }

  private async advanceKnockout(client: PoolClient, match: Match, trigger: KnockoutTrigger): Promise<void> {
    const tournament = await this.requireTournament(trigger.tournamentId, client);
    if (tournament.status !== 'KNOCKOUT') {
      throw new InvalidStateException(
        `Cannot advance the bracket of a tournament in ${tournament.status}`
      );
    }

    const winnerTeamId = teamIdForSide(match, trigger.winnerSide);
    const bracket = await this.bracketService.advance(client, tournament, trigger.bracketNode, winnerTeamId);
    if (bracket.championTeamId === null) return;

    const completed = await this.tournamentsRepo.complete(tournament.id, bracket.championTeamId, client);
    if (!completed) {
      throw new InvalidStateException(`Tournament ${tournament.id} could not be completed`);
    }

    const eventBus = tryGetEventBus();
    eventBus?.publish({
      type: EventTypes.TOURNAMENT_STAGE_CHANGED,
      tournamentId: tournament.id,
      payload: { tournamentId: tournament.id, from: 'KNOCKOUT', to: 'COMPLETED' },
    });
    eventBus?.publish({
      type: EventTypes.TOURNAMENT_COMPLETED,
      tournamentId: tournament.id,
      payload: { tournamentId: tournament.id, championTeamId: bracket.championTeamId },
    });
    logger.info(`Tournament ${tournament.id} completed`, { championTeamId: bracket.championTeamId });
  }

  private async transition(client: PoolClient, tournament: Tournament, to: TournamentStatus): Promise<void> {
    const updated = await this.tournamentsRepo.transitionStatus(tournament.id, tournament.status, to, client);
    if (!updated) {
      throw new InvalidStateException(`Tournament ${tournament.id} is no longer in ${tournament.status}`);
    }

    tryGetEventBus()?.publish({
      type: EventTypes.TOURNAMENT_STAGE_CHANGED,
      tournamentId: tournament.id,
      payload: { tournamentId: tournament.id, from: tournament.status, to },
    });
    logger.info(`Tournament ${tournament.id} moved from ${tournament.status} to ${to}`);
  }

  private async requireTournament(tournamentId: number, client: PoolClient): Promise<Tournament> {
    const tournament = await this.tournamentsRepo.findById(tournamentId, client);
    if (!tournament) throw TournamentErrors.notFound(tournamentId);
    return tournament;
  }
}
