import type {
  BracketNodeData,
  ConfirmedGroupMatch,
  GroupTableRow,
  MatchSide,
  MatchStatus,
  ScoreLine,
  TournamentStatus,
} from '../../domain';
import { DEFAULT_TOURNAMENT_RULES } from '../../domain';
import type { Tournament } from '../../modules/tournaments/tournaments.model';
import type { TournamentsRepository } from '../../modules/tournaments/tournaments.repository';
import type { Team } from '../../modules/teams/teams.model';
import type { TeamsRepository, TeamWithSize } from '../../modules/teams/teams.repository';
import type {
  Match,
  MatchResult,
  MatchWithResult,
  NewMatch,
} from '../../modules/matches/matches.model';
import type { MatchesRepository } from '../../modules/matches/matches.repository';
import type { StandingsRow } from '../../modules/standings/standings.model';
import type { StandingsRepository } from '../../modules/standings/standings.repository';
import type { BracketRepository } from '../../modules/bracket/bracket.repository';

/**
 * In-process stand-in for the PostgreSQL tables. The fake repositories below
 * expose the same public methods as the real ones and return copies, so
 * callers never share state with the store.
 */

type PublicOf<T> = { [K in keyof T]: T[K] };

interface PlayerEntry {
  id: number;
  teamId: number;
  playerName: string;
}

interface Tables {
  tournaments: Tournament[];
  teams: Team[];
  players: PlayerEntry[];
  matches: Match[];
  results: MatchResult[];
  standings: StandingsRow[];
  bracketNodes: Array<BracketNodeData & { tournamentId: number }>;
  sequence: number;
}

function emptyTables(): Tables {
  return {
    tournaments: [],
    teams: [],
    players: [],
    matches: [],
    results: [],
    standings: [],
    bracketNodes: [],
    sequence: 0,
  };
}

export class InMemoryDatabase {
  tables: Tables = emptyTables();

  nextId(): number {
    this.tables.sequence += 1;
    return this.tables.sequence;
  }

  reset(): void {
    this.tables = emptyTables();
  }

  snapshot(): Tables {
    return structuredClone(this.tables);
  }

  restore(snapshot: Tables): void {
    this.tables = snapshot;
  }

  // Seeding helpers

  addTournament(overrides: Partial<Tournament> = {}): Tournament {
    const tournament: Tournament = {
      id: this.nextId(),
      name: 'Spring Cup',
      organizerId: 'organizer-1',
      startsAt: new Date('2026-05-01T18:00:00Z'),
      numberOfGroups: 2,
      teamsPerGroup: 4,
      qualifiersPerGroup: 2,
      status: 'REGISTRATION',
      championTeamId: null,
      rules: { ...DEFAULT_TOURNAMENT_RULES, tieBreakers: [...DEFAULT_TOURNAMENT_RULES.tieBreakers] },
      createdAt: new Date('2026-04-01T00:00:00Z'),
      updatedAt: new Date('2026-04-01T00:00:00Z'),
      ...overrides,
    };
    this.tables.tournaments.push(tournament);
    return structuredClone(tournament);
  }

  addTeam(tournamentId: number, name: string, managerId: string, rosterSize = 0): Team {
    const team: Team = {
      id: this.nextId(),
      tournamentId,
      name,
      managerId,
      groupNumber: null,
      createdAt: new Date('2026-04-02T00:00:00Z'),
    };
    this.tables.teams.push(team);
    for (let i = 1; i <= rosterSize; i++) {
      this.tables.players.push({ id: this.nextId(), teamId: team.id, playerName: `${name} Player ${i}` });
    }
    return structuredClone(team);
  }

  addMatch(match: NewMatch, status: MatchStatus = 'SCHEDULED'): Match {
    const created = createMatch(this, match);
    created.status = status;
    return structuredClone(created);
  }

  tournament(id: number): Tournament {
    const tournament = this.tables.tournaments.find((t) => t.id === id);
    if (!tournament) throw new Error(`No tournament ${id} in store`);
    return structuredClone(tournament);
  }

  match(id: number): Match {
    const match = this.tables.matches.find((m) => m.id === id);
    if (!match) throw new Error(`No match ${id} in store`);
    return structuredClone(match);
  }

  result(matchId: number): MatchResult | null {
    const result = this.tables.results.find((r) => r.matchId === matchId);
    return result ? structuredClone(result) : null;
  }

  setTournamentStatus(id: number, status: TournamentStatus): void {
    const tournament = this.tables.tournaments.find((t) => t.id === id);
    if (!tournament) throw new Error(`No tournament ${id} in store`);
    tournament.status = status;
  }
}

function createMatch(db: InMemoryDatabase, match: NewMatch): Match {
  const duplicate = db.tables.matches.some(
    (m) =>
      m.tournamentId === match.tournamentId &&
      m.homeTeamId === match.homeTeamId &&
      m.awayTeamId === match.awayTeamId &&
      m.stage === match.stage
  );
  if (duplicate || match.homeTeamId === match.awayTeamId) {
    throw Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
  }

  const created: Match = {
    id: db.nextId(),
    ...match,
    status: 'SCHEDULED',
    version: 0,
    createdAt: new Date('2026-04-10T00:00:00Z'),
    updatedAt: new Date('2026-04-10T00:00:00Z'),
  };
  db.tables.matches.push(created);
  return created;
}

export class FakeTournamentsRepository implements PublicOf<TournamentsRepository> {
  constructor(private readonly db: InMemoryDatabase) {}

  async findById(tournamentId: number): Promise<Tournament | null> {
    const tournament = this.db.tables.tournaments.find((t) => t.id === tournamentId);
    return tournament ? structuredClone(tournament) : null;
  }

  async transitionStatus(
    tournamentId: number,
    from: TournamentStatus,
    to: TournamentStatus
  ): Promise<Tournament | null> {
    const tournament = this.db.tables.tournaments.find((t) => t.id === tournamentId && t.status === from);
    if (!tournament) return null;
    tournament.status = to;
    return structuredClone(tournament);
  }

  async complete(tournamentId: number, championTeamId: number): Promise<Tournament | null> {
    const tournament = this.db.tables.tournaments.find(
      (t) => t.id === tournamentId && t.status === 'KNOCKOUT'
    );
    if (!tournament) return null;
    tournament.status = 'COMPLETED';
    tournament.championTeamId = championTeamId;
    return structuredClone(tournament);
  }
}

export class FakeTeamsRepository implements PublicOf<TeamsRepository> {
  constructor(private readonly db: InMemoryDatabase) {}

  async findById(teamId: number): Promise<Team | null> {
    const team = this.db.tables.teams.find((t) => t.id === teamId);
    return team ? structuredClone(team) : null;
  }

  async findByTournament(tournamentId: number): Promise<Team[]> {
    return structuredClone(this.db.tables.teams.filter((t) => t.tournamentId === tournamentId));
  }

  async findByTournamentWithRosterSize(tournamentId: number): Promise<TeamWithSize[]> {
    const teams = await this.findByTournament(tournamentId);
    return teams.map((team) => ({
      team,
      rosterSize: this.db.tables.players.filter((p) => p.teamId === team.id).length,
    }));
  }

  async findByGroup(tournamentId: number, groupNumber: number): Promise<Team[]> {
    return structuredClone(
      this.db.tables.teams.filter((t) => t.tournamentId === tournamentId && t.groupNumber === groupNumber)
    );
  }

  async findManagersForMatch(matchId: number): Promise<string[]> {
    const match = this.db.tables.matches.find((m) => m.id === matchId);
    if (!match) return [];
    const managers = this.db.tables.teams
      .filter((t) => t.id === match.homeTeamId || t.id === match.awayTeamId)
      .map((t) => t.managerId);
    return [...new Set(managers)];
  }

  async assignGroup(teamId: number, groupNumber: number): Promise<void> {
    const team = this.db.tables.teams.find((t) => t.id === teamId);
    if (team) team.groupNumber = groupNumber;
  }

  async getRoster(teamId: number): Promise<string[]> {
    return this.db.tables.players.filter((p) => p.teamId === teamId).map((p) => p.playerName);
  }

  async addPlayer(teamId: number, playerName: string): Promise<boolean> {
    if (this.db.tables.players.some((p) => p.teamId === teamId && p.playerName === playerName)) {
      return false;
    }
    this.db.tables.players.push({ id: this.db.nextId(), teamId, playerName });
    return true;
  }

  async removePlayer(teamId: number, playerName: string): Promise<boolean> {
    const before = this.db.tables.players.length;
    this.db.tables.players = this.db.tables.players.filter(
      (p) => !(p.teamId === teamId && p.playerName === playerName)
    );
    return this.db.tables.players.length < before;
  }
}

export class FakeMatchesRepository implements PublicOf<MatchesRepository> {
  constructor(private readonly db: InMemoryDatabase) {}

  async findWithResult(matchId: number): Promise<MatchWithResult | null> {
    const match = this.db.tables.matches.find((m) => m.id === matchId);
    return match ? this.withResult(match) : null;
  }

  async create(match: NewMatch): Promise<Match> {
    return structuredClone(createMatch(this.db, match));
  }

  async updateStatus(matchId: number, status: MatchStatus, expectedVersion: number): Promise<Match | null> {
    const match = this.db.tables.matches.find((m) => m.id === matchId && m.version === expectedVersion);
    if (!match) return null;
    match.status = status;
    match.version += 1;
    return structuredClone(match);
  }

  async insertResult(
    matchId: number,
    score: ScoreLine,
    submittedBySide: MatchSide,
    submittedBy: string,
    confirmations: { homeConfirmed: boolean; awayConfirmed: boolean }
  ): Promise<MatchResult> {
    if (this.db.tables.results.some((r) => r.matchId === matchId)) {
      throw Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
    }
    const result: MatchResult = {
      matchId,
      ...score,
      submittedBySide,
      submittedBy,
      ...confirmations,
    };
    this.db.tables.results.push(result);
    return structuredClone(result);
  }

  async updateConfirmations(matchId: number, homeConfirmed: boolean, awayConfirmed: boolean): Promise<void> {
    const result = this.db.tables.results.find((r) => r.matchId === matchId);
    if (result) {
      result.homeConfirmed = homeConfirmed;
      result.awayConfirmed = awayConfirmed;
    }
  }

  async overrideResult(matchId: number, score: ScoreLine): Promise<void> {
    const result = this.db.tables.results.find((r) => r.matchId === matchId);
    if (result) {
      Object.assign(result, score, { homeConfirmed: true, awayConfirmed: true });
    }
  }

  async deleteResult(matchId: number): Promise<void> {
    this.db.tables.results = this.db.tables.results.filter((r) => r.matchId !== matchId);
  }

  async findConfirmedGroupMatches(tournamentId: number, groupNumber: number): Promise<ConfirmedGroupMatch[]> {
    const confirmed: ConfirmedGroupMatch[] = [];
    for (const match of this.db.tables.matches) {
      if (
        match.tournamentId !== tournamentId ||
        match.stage !== 'GROUP' ||
        match.groupNumber !== groupNumber ||
        match.status !== 'CONFIRMED'
      ) {
        continue;
      }
      const result = this.db.tables.results.find((r) => r.matchId === match.id);
      if (!result) continue;
      confirmed.push({
        id: match.id,
        scheduledAt: new Date(match.scheduledAt),
        homeTeamId: match.homeTeamId,
        awayTeamId: match.awayTeamId,
        homeScore: result.homeScore,
        awayScore: result.awayScore,
      });
    }
    return confirmed.sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.id - b.id);
  }

  async countUnconfirmedGroupMatches(tournamentId: number): Promise<number> {
    return this.db.tables.matches.filter(
      (m) => m.tournamentId === tournamentId && m.stage === 'GROUP' && m.status !== 'CONFIRMED'
    ).length;
  }

  async latestScheduledAt(tournamentId: number, matchIds: number[]): Promise<Date | null> {
    const times = this.db.tables.matches
      .filter((m) => m.tournamentId === tournamentId && (matchIds.length === 0 || matchIds.includes(m.id)))
      .map((m) => m.scheduledAt.getTime());
    return times.length > 0 ? new Date(Math.max(...times)) : null;
  }

  async findPendingConfirmations(managerId: string): Promise<MatchWithResult[]> {
    const all = this.db.tables.matches.map((m) => this.withResult(m));
    return this.sorted(
      all.filter(
        (m) =>
          m.status === 'RESULT_SUBMITTED' &&
          m.result !== null &&
          ((m.homeManagerId === managerId && !m.result.homeConfirmed) ||
            (m.awayManagerId === managerId && !m.result.awayConfirmed))
      )
    );
  }

  async findUpcoming(managerId: string): Promise<MatchWithResult[]> {
    const all = this.db.tables.matches.map((m) => this.withResult(m));
    return this.sorted(
      all.filter(
        (m) => m.status === 'SCHEDULED' && (m.homeManagerId === managerId || m.awayManagerId === managerId)
      )
    );
  }

  private sorted(matches: MatchWithResult[]): MatchWithResult[] {
    return matches.sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.id - b.id);
  }

  private withResult(match: Match): MatchWithResult {
    const managerOf = (teamId: number): string => {
      const team = this.db.tables.teams.find((t) => t.id === teamId);
      if (!team) throw new Error(`No team ${teamId} in store`);
      return team.managerId;
    };
    return {
      ...structuredClone(match),
      homeManagerId: managerOf(match.homeTeamId),
      awayManagerId: managerOf(match.awayTeamId),
      result: this.db.result(match.id),
    };
  }
}

export class FakeStandingsRepository implements PublicOf<StandingsRepository> {
  constructor(private readonly db: InMemoryDatabase) {}

  async findByGroup(tournamentId: number, groupNumber: number): Promise<StandingsRow[]> {
    return structuredClone(
      this.db.tables.standings
        .filter((r) => r.tournamentId === tournamentId && r.groupNumber === groupNumber)
        .sort((a, b) => a.rank - b.rank)
    );
  }

  async findByTournament(tournamentId: number): Promise<StandingsRow[]> {
    return structuredClone(
      this.db.tables.standings
        .filter((r) => r.tournamentId === tournamentId)
        .sort((a, b) => a.groupNumber - b.groupNumber || a.rank - b.rank)
    );
  }

  async replaceGroup(tournamentId: number, groupNumber: number, rows: GroupTableRow[]): Promise<void> {
    this.db.tables.standings = this.db.tables.standings.filter(
      (r) => !(r.tournamentId === tournamentId && r.groupNumber === groupNumber)
    );
    for (const row of rows) {
      this.db.tables.standings.push({ ...row, tournamentId, groupNumber });
    }
  }
}

export class FakeBracketRepository implements PublicOf<BracketRepository> {
  constructor(private readonly db: InMemoryDatabase) {}

  async findByTournament(tournamentId: number): Promise<BracketNodeData[]> {
    return this.db.tables.bracketNodes
      .filter((n) => n.tournamentId === tournamentId)
      .sort((a, b) => a.index - b.index)
      .map(({ tournamentId: _tournamentId, ...node }) => structuredClone(node));
  }

  async insertNodes(tournamentId: number, nodes: BracketNodeData[]): Promise<void> {
    for (const node of nodes) {
      this.db.tables.bracketNodes.push({ ...structuredClone(node), tournamentId });
    }
  }

  async updateNodes(tournamentId: number, nodes: BracketNodeData[]): Promise<void> {
    for (const node of nodes) {
      const stored = this.db.tables.bracketNodes.find(
        (n) => n.tournamentId === tournamentId && n.index === node.index
      );
      if (stored) {
        stored.state = node.state;
        stored.teamId = node.teamId;
        stored.matchId = node.matchId;
      }
    }
  }
}

export const memoryDb = new InMemoryDatabase();
