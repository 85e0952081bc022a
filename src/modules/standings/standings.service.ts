import { Pool, PoolClient } from 'pg';
import { StandingsRepository } from './standings.repository';
import { StandingsRow } from './standings.model';
import type { MatchesRepository } from '../matches/matches.repository';
import type { TeamsRepository } from '../teams/teams.repository';
import type { TournamentsRepository } from '../tournaments/tournaments.repository';
import { Tournament, groupNumbers } from '../tournaments/tournaments.model';
import {
  computeGroupTable,
  selectQualifiers,
  type GroupQualifier,
  type GroupTableRow,
} from '../../domain';
import { lockGroup } from '../../shared/locks';
import { runInTransaction, withClient } from '../../shared/transaction-runner';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import { NotFoundException, TournamentErrors } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

export class StandingsService {
  constructor(
    private readonly db: Pool,
    private readonly standingsRepo: StandingsRepository,
    private readonly matchesRepo: MatchesRepository,
    private readonly teamsRepo: TeamsRepository,
    private readonly tournamentsRepo: TournamentsRepository
  ) {}

  /**
   * Rebuild a group's table from its confirmed matches and replace the cache.
   *
   * LOCK CONTRACT:
   * - Acquires GROUP lock (400M + groupLockKey) on the given transaction, or on
   *   a transaction of its own when called without one
   */
  async recomputeGroup(
    tournamentId: number,
    groupNumber: number,
    client?: PoolClient
  ): Promise<GroupTableRow[]> {
    if (!client) {
      return runInTransaction(this.db, (tx) => this.recomputeGroup(tournamentId, groupNumber, tx));
    }

    return lockGroup(client, tournamentId, groupNumber, async () => {
      const tournament = await this.requireTournament(tournamentId, client);
      const table = await this.computeTable(tournament, groupNumber, client);
      await this.standingsRepo.replaceGroup(tournamentId, groupNumber, table, client);

      tryGetEventBus()?.publish({
        type: EventTypes.STANDINGS_UPDATED,
        tournamentId,
        payload: { tournamentId, groupNumber },
      });
      logger.debug(`Standings recomputed for tournament ${tournamentId} group ${groupNumber}`);
      return table;
    });
  }

  /**
   * Cached table of one group, in rank order
   */
  async getStandings(tournamentId: number, groupNumber: number): Promise<StandingsRow[]> {
    const tournament = await this.requireTournament(tournamentId);
    if (!groupNumbers(tournament).includes(groupNumber)) {
      throw new NotFoundException(`Tournament ${tournamentId} has no group ${groupNumber}`);
    }
    return this.standingsRepo.findByGroup(tournamentId, groupNumber);
  }

  /**
   * Top finishers of every group. Only defined once every group match is CONFIRMED.
   */
  async getQualifiedTeams(tournamentId: number, client?: PoolClient): Promise<GroupQualifier[]> {
    if (!client) {
      return withClient(this.db, (conn) => this.getQualifiedTeams(tournamentId, conn));
    }

    const tournament = await this.requireTournament(tournamentId, client);
    const remaining = await this.matchesRepo.countUnconfirmedGroupMatches(tournamentId, client);
    if (remaining > 0) {
      throw TournamentErrors.groupStageIncomplete(remaining);
    }

    const tables = new Map<number, GroupTableRow[]>();
    for (const groupNumber of groupNumbers(tournament)) {
      tables.set(groupNumber, await this.computeTable(tournament, groupNumber, client));
    }
    return selectQualifiers(tables, tournament.qualifiersPerGroup);
  }

  private async computeTable(
    tournament: Tournament,
    groupNumber: number,
    client: PoolClient
  ): Promise<GroupTableRow[]> {
    const teams = await this.teamsRepo.findByGroup(tournament.id, groupNumber, client);
    const matches = await this.matchesRepo.findConfirmedGroupMatches(tournament.id, groupNumber, client);
    return computeGroupTable(
      teams.map((team) => team.id),
      matches,
      tournament.rules
    );
  }

  private async requireTournament(tournamentId: number, client?: PoolClient): Promise<Tournament> {
    const tournament = await this.tournamentsRepo.findById(tournamentId, client);
    if (!tournament) throw TournamentErrors.notFound(tournamentId);
    return tournament;
  }
}
