import type { Pool } from 'pg';
import type { RandomSource, TournamentRules } from '../../domain';
import { TournamentEngine } from '../../engine';
import { TournamentsRepository } from '../../modules/tournaments/tournaments.repository';
import { TeamsRepository } from '../../modules/teams/teams.repository';
import { MatchesRepository } from '../../modules/matches/matches.repository';
import { StandingsRepository } from '../../modules/standings/standings.repository';
import { BracketRepository } from '../../modules/bracket/bracket.repository';
import { TeamsService } from '../../modules/teams/teams.service';
import { MatchesService } from '../../modules/matches/matches.service';
import { StandingsService } from '../../modules/standings/standings.service';
import { BracketService } from '../../modules/bracket/bracket.service';
import { ProgressionService } from '../../modules/progression/progression.service';
import { TournamentsService } from '../../modules/tournaments/tournaments.service';
import type { Tournament } from '../../modules/tournaments/tournaments.model';
import type { Team } from '../../modules/teams/teams.model';
import {
  FakeBracketRepository,
  FakeMatchesRepository,
  FakeStandingsRepository,
  FakeTeamsRepository,
  FakeTournamentsRepository,
  InMemoryDatabase,
  memoryDb,
} from './in-memory-db';

/**
 * Wires the real services over the in-memory repositories. Test files must
 * also mock shared/transaction-runner with ./in-memory-transaction-runner.
 */
export function createTestEngine(db: InMemoryDatabase = memoryDb, random?: RandomSource) {
  const pool = {} as unknown as Pool;
  const tournamentsRepo = new FakeTournamentsRepository(db) as unknown as TournamentsRepository;
  const teamsRepo = new FakeTeamsRepository(db) as unknown as TeamsRepository;
  const matchesRepo = new FakeMatchesRepository(db) as unknown as MatchesRepository;
  const standingsRepo = new FakeStandingsRepository(db) as unknown as StandingsRepository;
  const bracketRepo = new FakeBracketRepository(db) as unknown as BracketRepository;

  const teamsService = new TeamsService(pool, teamsRepo, tournamentsRepo);
  const matchesService = new MatchesService(matchesRepo);
  const standingsService = new StandingsService(pool, standingsRepo, matchesRepo, teamsRepo, tournamentsRepo);
  const bracketService = new BracketService(bracketRepo, matchesRepo, tournamentsRepo, standingsService);
  const progressionService = new ProgressionService(
    pool,
    tournamentsRepo,
    matchesRepo,
    standingsService,
    bracketService
  );
  const tournamentsService = new TournamentsService(
    pool,
    tournamentsRepo,
    teamsRepo,
    matchesRepo,
    standingsRepo,
    random
  );

  const engine = new TournamentEngine({
    db: pool,
    tournamentsRepo,
    matchesRepo,
    teamsService,
    matchesService,
    standingsService,
    bracketService,
    progressionService,
    tournamentsService,
  });

  return {
    engine,
    pool,
    repos: { tournamentsRepo, teamsRepo, matchesRepo, standingsRepo, bracketRepo },
    services: {
      teamsService,
      matchesService,
      standingsService,
      bracketService,
      progressionService,
      tournamentsService,
    },
  };
}

/** Always picks the last remaining index, so shuffles keep the input order */
export const keepOrder: RandomSource = () => 0.999999;

export interface SeededTournament {
  tournament: Tournament;
  teams: Team[];
}

/**
 * A tournament in REGISTRATION with full-strength rosters managed by
 * `manager-1`, `manager-2`, ...
 */
export function seedTournament(
  db: InMemoryDatabase,
  options: {
    numberOfGroups?: number;
    teamsPerGroup?: number;
    qualifiersPerGroup?: number;
    rosterSize?: number;
    rules?: Partial<TournamentRules>;
  } = {}
): SeededTournament {
  const numberOfGroups = options.numberOfGroups ?? 2;
  const teamsPerGroup = options.teamsPerGroup ?? 4;
  const base = db.addTournament({
    numberOfGroups,
    teamsPerGroup,
    qualifiersPerGroup: options.qualifiersPerGroup ?? 2,
  });
  const tournamentRow = db.tables.tournaments.find((t) => t.id === base.id);
  if (tournamentRow && options.rules) {
    tournamentRow.rules = { ...tournamentRow.rules, ...options.rules };
  }

  const teams: Team[] = [];
  for (let i = 1; i <= numberOfGroups * teamsPerGroup; i++) {
    teams.push(db.addTeam(base.id, `Team ${i}`, `manager-${i}`, options.rosterSize ?? 8));
  }
  return { tournament: db.tournament(base.id), teams };
}
