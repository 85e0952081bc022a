import { Pool, PoolClient } from 'pg';
import { TeamsRepository } from './teams.repository';
import type { TournamentsRepository } from '../tournaments/tournaments.repository';
import { TeamWithRoster, withRoster } from './teams.model';
import { rosterChangeSchema } from './teams.schemas';
import { MAX_ROSTER_SIZE, canAddPlayer, isRegistrationComplete } from '../../domain';
import { runWithLock, LockDomain } from '../../shared/transaction-runner';
import { validateInput } from '../../shared/validate-input';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import {
  InvalidStateException,
  NotFoundException,
  RosterErrors,
  UnauthorizedException,
} from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

type RosterMutation = (client: PoolClient, roster: string[], playerName: string) => Promise<void>;

export class TeamsService {
  constructor(
    private readonly db: Pool,
    private readonly teamsRepo: TeamsRepository,
    private readonly tournamentsRepo: TournamentsRepository
  ) {}

  async getTeam(teamId: number): Promise<TeamWithRoster> {
    const team = await this.teamsRepo.findById(teamId);
    if (!team) throw new NotFoundException(`Team ${teamId} not found`);
    const roster = await this.teamsRepo.getRoster(teamId);
    return withRoster(team, roster);
  }

  async isRegistrationComplete(teamId: number): Promise<boolean> {
    const team = await this.getTeam(teamId);
    return isRegistrationComplete(team.roster.length);
  }

  /**
   * Add a player to a team roster.
   *
   * LOCK CONTRACT:
   * - Acquires TEAM lock (200M + teamId) so concurrent additions cannot
   *   push the roster past its maximum size
   */
  async registerPlayer(teamId: number, actorId: string, playerName: string): Promise<TeamWithRoster> {
    return this.mutateRoster('register player', { teamId, actorId, playerName }, async (client, roster, name) => {
      if (!canAddPlayer(roster.length)) {
        throw RosterErrors.full(MAX_ROSTER_SIZE);
      }
      if (roster.includes(name)) {
        throw RosterErrors.playerAlreadyOnRoster(name);
      }
      const added = await this.teamsRepo.addPlayer(teamId, name, client);
      if (!added) {
        throw RosterErrors.playerAlreadyOnRoster(name);
      }
    });
  }

  /**
   * Remove a player from a team roster. Same lock contract as registerPlayer.
   */
  async removePlayer(teamId: number, actorId: string, playerName: string): Promise<TeamWithRoster> {
    return this.mutateRoster('remove player', { teamId, actorId, playerName }, async (client, roster, name) => {
      if (!roster.includes(name)) {
        throw RosterErrors.playerNotOnRoster(name);
      }
      await this.teamsRepo.removePlayer(teamId, name, client);
    });
  }

  private async mutateRoster(
    action: string,
    input: { teamId: number; actorId: string; playerName: string },
    mutate: RosterMutation
  ): Promise<TeamWithRoster> {
    const { teamId, actorId, playerName } = validateInput(rosterChangeSchema, input);

    const updated = await runWithLock(this.db, LockDomain.TEAM, teamId, async (client) => {
      const team = await this.teamsRepo.findById(teamId, client);
      if (!team) throw new NotFoundException(`Team ${teamId} not found`);

      const tournament = await this.tournamentsRepo.findById(team.tournamentId, client);
      if (!tournament) throw new NotFoundException(`Tournament ${team.tournamentId} not found`);

      if (actorId !== team.managerId && actorId !== tournament.organizerId) {
        throw new UnauthorizedException('Only the team manager or the organizer can change this roster');
      }
      if (tournament.status !== 'REGISTRATION') {
        throw new InvalidStateException(`Cannot ${action} once the tournament is in ${tournament.status}`);
      }

      const roster = await this.teamsRepo.getRoster(teamId, client);
      await mutate(client, roster, playerName);

      const result = withRoster(team, await this.teamsRepo.getRoster(teamId, client));
      tryGetEventBus()?.publish({
        type: EventTypes.ROSTER_UPDATED,
        tournamentId: team.tournamentId,
        payload: {
          teamId,
          rosterSize: result.roster.length,
          registrationComplete: result.registrationComplete,
        },
      });
      return result;
    });

    logger.info(`Roster updated: ${action}`, {
      teamId,
      rosterSize: updated.roster.length,
      registrationStatus: updated.registrationStatus,
    });
    return updated;
  }
}
