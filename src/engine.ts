import { Pool } from 'pg';
import { container, KEYS } from './container';
import type { TournamentsRepository } from './modules/tournaments/tournaments.repository';
import type { MatchesRepository } from './modules/matches/matches.repository';
import type { TeamsService } from './modules/teams/teams.service';
import type { MatchesService } from './modules/matches/matches.service';
import type { StandingsService } from './modules/standings/standings.service';
import type { BracketService } from './modules/bracket/bracket.service';
import type { ProgressionService } from './modules/progression/progression.service';
import type { TournamentsService } from './modules/tournaments/tournaments.service';
import type { TeamWithRoster } from './modules/teams/teams.model';
import type { MatchWithResult } from './modules/matches/matches.model';
import type { StandingsRow } from './modules/standings/standings.model';
import type { Bracket } from './modules/bracket/bracket.model';
import type { Tournament } from './modules/tournaments/tournaments.model';
import type { ScoreInput } from './modules/matches/matches.schemas';
import {
  confirmResult,
  disputeResult,
  forceConfirm,
  reopenMatch,
  submitResult,
  type ResolveDisputeContext,
} from './modules/matches/use-cases';
import type { GroupQualifier, RegistrationStatus } from './domain';

export interface TournamentEngineDeps {
  db: Pool;
  tournamentsRepo: TournamentsRepository;
  matchesRepo: MatchesRepository;
  teamsService: TeamsService;
  matchesService: MatchesService;
  standingsService: StandingsService;
  bracketService: BracketService;
  progressionService: ProgressionService;
  tournamentsService: TournamentsService;
}

/**
 * Inbound API of the engine. Callers (HTTP handlers, admin tools, jobs)
 * pass already-authenticated user ids; every state change is atomic.
 */
export class TournamentEngine {
  constructor(private readonly deps: TournamentEngineDeps) {}

  /**
   * Build an engine from the services registered by bootstrap()
   */
  static fromContainer(): TournamentEngine {
    return new TournamentEngine({
      db: container.resolve(KEYS.POOL),
      tournamentsRepo: container.resolve(KEYS.TOURNAMENTS_REPO),
      matchesRepo: container.resolve(KEYS.MATCHES_REPO),
      teamsService: container.resolve(KEYS.TEAMS_SERVICE),
      matchesService: container.resolve(KEYS.MATCHES_SERVICE),
      standingsService: container.resolve(KEYS.STANDINGS_SERVICE),
      bracketService: container.resolve(KEYS.BRACKET_SERVICE),
      progressionService: container.resolve(KEYS.PROGRESSION_SERVICE),
      tournamentsService: container.resolve(KEYS.TOURNAMENTS_SERVICE),
    });
  }

  private get resultContext(): ResolveDisputeContext {
    return {
      db: this.deps.db,
      matchesRepo: this.deps.matchesRepo,
      tournamentsRepo: this.deps.tournamentsRepo,
      progressionService: this.deps.progressionService,
    };
  }

  // Result confirmation

  submitResult(matchId: number, submitterId: string, score: ScoreInput): Promise<MatchWithResult> {
    return submitResult(this.resultContext, matchId, submitterId, score);
  }

  confirmResult(
    matchId: number,
    confirmerId: string,
    expectedScore?: ScoreInput
  ): Promise<MatchWithResult> {
    return confirmResult(this.resultContext, matchId, confirmerId, expectedScore);
  }

  disputeResult(matchId: number, disputerId: string): Promise<MatchWithResult> {
    return disputeResult(this.resultContext, matchId, disputerId);
  }

  reopenMatch(matchId: number, organizerId: string): Promise<MatchWithResult> {
    return reopenMatch(this.resultContext, matchId, organizerId);
  }

  forceConfirm(matchId: number, organizerId: string, score: ScoreInput): Promise<MatchWithResult> {
    return forceConfirm(this.resultContext, matchId, organizerId, score);
  }

  getMatch(matchId: number): Promise<MatchWithResult> {
    return this.deps.matchesService.getMatch(matchId);
  }

  listPendingConfirmations(managerId: string): Promise<MatchWithResult[]> {
    return this.deps.matchesService.listPendingConfirmations(managerId);
  }

  listUpcomingMatches(managerId: string): Promise<MatchWithResult[]> {
    return this.deps.matchesService.listUpcomingMatches(managerId);
  }

  // Team registry

  registerPlayer(teamId: number, actorId: string, playerName: string): Promise<TeamWithRoster> {
    return this.deps.teamsService.registerPlayer(teamId, actorId, playerName);
  }

  removePlayer(teamId: number, actorId: string, playerName: string): Promise<TeamWithRoster> {
    return this.deps.teamsService.removePlayer(teamId, actorId, playerName);
  }

  isRegistrationComplete(teamId: number): Promise<boolean> {
    return this.deps.teamsService.isRegistrationComplete(teamId);
  }

  async getRegistrationStatus(teamId: number): Promise<RegistrationStatus> {
    const team = await this.deps.teamsService.getTeam(teamId);
    return team.registrationStatus;
  }

  getTeam(teamId: number): Promise<TeamWithRoster> {
    return this.deps.teamsService.getTeam(teamId);
  }

  // Progression

  startGroupStage(tournamentId: number, organizerId: string): Promise<Tournament> {
    return this.deps.tournamentsService.startGroupStage(tournamentId, organizerId);
  }

  getTournament(tournamentId: number): Promise<Tournament> {
    return this.deps.tournamentsService.getTournament(tournamentId);
  }

  getStandings(tournamentId: number, groupNumber: number): Promise<StandingsRow[]> {
    return this.deps.standingsService.getStandings(tournamentId, groupNumber);
  }

  getQualifiedTeams(tournamentId: number): Promise<GroupQualifier[]> {
    return this.deps.standingsService.getQualifiedTeams(tournamentId);
  }

  getBracket(tournamentId: number): Promise<Bracket> {
    return this.deps.bracketService.getBracket(tournamentId);
  }

  generateBracket(tournamentId: number): Promise<Bracket> {
    return this.deps.progressionService.generateBracket(tournamentId);
  }
}
