import { Pool } from 'pg';
import { TournamentsRepository } from './tournaments.repository';
import { Tournament, groupNumbers } from './tournaments.model';
import type { TeamsRepository } from '../teams/teams.repository';
import type { MatchesRepository } from '../matches/matches.repository';
import type { StandingsRepository } from '../standings/standings.repository';
import {
  addDays,
  computeGroupTable,
  drawGroups,
  isRegistrationComplete,
  roundRobinFixtures,
  type RandomSource,
} from '../../domain';
import { runWithLocks, LockDomain } from '../../shared/transaction-runner';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import {
  InvalidStateException,
  TournamentErrors,
  ValidationException,
} from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

export class TournamentsService {
  constructor(
    private readonly db: Pool,
    private readonly tournamentsRepo: TournamentsRepository,
    private readonly teamsRepo: TeamsRepository,
    private readonly matchesRepo: MatchesRepository,
    private readonly standingsRepo: StandingsRepository,
    private readonly random: RandomSource = Math.random
  ) {}

  async getTournament(tournamentId: number): Promise<Tournament> {
    const tournament = await this.tournamentsRepo.findById(tournamentId);
    if (!tournament) throw TournamentErrors.notFound(tournamentId);
    return tournament;
  }

  /**
   * Close registration: draw the groups, create the round-robin fixtures
   * and zeroed tables, and move the tournament to GROUP_STAGE.
   *
   * LOCK CONTRACT:
   * - Acquires TOURNAMENT lock (100M + tournamentId)
   * - Acquires TEAM locks for every team, so no roster changes while sizes are checked
   */
  async startGroupStage(tournamentId: number, organizerId: string): Promise<Tournament> {
    const tournament = await this.getTournament(tournamentId);
    if (tournament.organizerId !== organizerId) throw TournamentErrors.notOrganizer();

    const teams = await this.teamsRepo.findByTournament(tournamentId);
    const locks = [
      { domain: LockDomain.TOURNAMENT, id: tournamentId },
      ...teams.map((team) => ({ domain: LockDomain.TEAM, id: team.id })),
    ];

    const started = await runWithLocks(this.db, locks, async (client) => {
      const current = await this.tournamentsRepo.findById(tournamentId, client);
      if (!current) throw TournamentErrors.notFound(tournamentId);
      if (current.status !== 'REGISTRATION') {
        throw new InvalidStateException(`Cannot start the group stage of a tournament in ${current.status}`);
      }

      const entries = await this.teamsRepo.findByTournamentWithRosterSize(tournamentId, client);
      const expected = current.numberOfGroups * current.teamsPerGroup;
      if (entries.length !== expected) {
        throw new ValidationException(
          `Expected ${expected} teams (${current.numberOfGroups} groups of ${current.teamsPerGroup}), found ${entries.length}`
        );
      }
      const incomplete = entries.filter((entry) => !isRegistrationComplete(entry.rosterSize));
      if (incomplete.length > 0) {
        throw new ValidationException(
          `Registration incomplete for: ${incomplete.map((entry) => entry.team.name).join(', ')}`
        );
      }

      const assignments = drawGroups(
        entries.map((entry) => entry.team.id),
        current.teamsPerGroup,
        this.random
      );
      for (const { teamId, groupNumber } of assignments) {
        await this.teamsRepo.assignGroup(teamId, groupNumber, client);
      }

      let fixtureCount = 0;
      for (const groupNumber of groupNumbers(current)) {
        const groupTeamIds = assignments
          .filter((assignment) => assignment.groupNumber === groupNumber)
          .map((assignment) => assignment.teamId);

        for (const fixture of roundRobinFixtures(groupTeamIds)) {
          await this.matchesRepo.create(
            {
              tournamentId,
              stage: 'GROUP',
              groupNumber,
              bracketNode: null,
              scheduledAt: addDays(current.startsAt, fixture.round * current.rules.groupMatchIntervalDays),
              homeTeamId: fixture.homeTeamId,
              awayTeamId: fixture.awayTeamId,
            },
            client
          );
          fixtureCount++;
        }

        await this.standingsRepo.replaceGroup(
          tournamentId,
          groupNumber,
          computeGroupTable(groupTeamIds, [], current.rules),
          client
        );
      }

      const updated = await this.tournamentsRepo.transitionStatus(
        tournamentId,
        'REGISTRATION',
        'GROUP_STAGE',
        client
      );
      if (!updated) throw new InvalidStateException('Tournament left REGISTRATION concurrently');

      tryGetEventBus()?.publish({
        type: EventTypes.TOURNAMENT_STAGE_CHANGED,
        tournamentId,
        payload: { tournamentId, from: 'REGISTRATION', to: 'GROUP_STAGE' },
      });
      logger.info(`Group stage started for tournament ${tournamentId}`, {
        groups: current.numberOfGroups,
        fixtures: fixtureCount,
      });
      return updated;
    });

    return started;
  }
}
