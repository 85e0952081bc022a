import { Pool, PoolClient } from 'pg';
import { Team, TeamRow, TeamWithSizeRow, teamFromDatabase } from './teams.model';

export interface TeamWithSize {
  team: Team;
  rosterSize: number;
}

export class TeamsRepository {
  constructor(private readonly db: Pool) {}

  async findById(teamId: number, client?: PoolClient): Promise<Team | null> {
    const conn = client || this.db;
    const result = await conn.query<TeamRow>('SELECT * FROM teams WHERE id = $1', [teamId]);
    return result.rows.length > 0 ? teamFromDatabase(result.rows[0]) : null;
  }

  async findByTournament(tournamentId: number, client?: PoolClient): Promise<Team[]> {
    const conn = client || this.db;
    const result = await conn.query<TeamRow>(
      'SELECT * FROM teams WHERE tournament_id = $1 ORDER BY id',
      [tournamentId]
    );
    return result.rows.map(teamFromDatabase);
  }

  /**
   * Teams of a tournament with their current roster size
   */
  async findByTournamentWithRosterSize(
    tournamentId: number,
    client?: PoolClient
  ): Promise<TeamWithSize[]> {
    const conn = client || this.db;
    const result = await conn.query<TeamWithSizeRow>(
      `SELECT t.*, COUNT(p.id) AS roster_size
       FROM teams t
       LEFT JOIN team_players p ON p.team_id = t.id
       WHERE t.tournament_id = $1
       GROUP BY t.id
       ORDER BY t.id`,
      [tournamentId]
    );
    return result.rows.map((row) => ({
      team: teamFromDatabase(row),
      rosterSize: parseInt(row.roster_size, 10),
    }));
  }

  async findByGroup(tournamentId: number, groupNumber: number, client?: PoolClient): Promise<Team[]> {
    const conn = client || this.db;
    const result = await conn.query<TeamRow>(
      'SELECT * FROM teams WHERE tournament_id = $1 AND group_number = $2 ORDER BY id',
      [tournamentId, groupNumber]
    );
    return result.rows.map(teamFromDatabase);
  }

  /**
   * Manager user ids of both teams in a match (deduplicated)
   */
  async findManagersForMatch(matchId: number, client?: PoolClient): Promise<string[]> {
    const conn = client || this.db;
    const result = await conn.query<{ manager_id: string }>(
      `SELECT DISTINCT t.manager_id
       FROM matches m
       JOIN teams t ON t.id IN (m.home_team_id, m.away_team_id)
       WHERE m.id = $1`,
      [matchId]
    );
    return result.rows.map((row) => row.manager_id);
  }

  async assignGroup(teamId: number, groupNumber: number, client: PoolClient): Promise<void> {
    await client.query('UPDATE teams SET group_number = $2 WHERE id = $1', [teamId, groupNumber]);
  }

  async getRoster(teamId: number, client?: PoolClient): Promise<string[]> {
    const conn = client || this.db;
    const result = await conn.query<{ player_name: string }>(
      'SELECT player_name FROM team_players WHERE team_id = $1 ORDER BY id',
      [teamId]
    );
    return result.rows.map((row) => row.player_name);
  }

  /**
   * Add a player. Returns false when the name is already on the roster.
   */
  async addPlayer(teamId: number, playerName: string, client: PoolClient): Promise<boolean> {
    const result = await client.query(
      `INSERT INTO team_players (team_id, player_name) VALUES ($1, $2)
       ON CONFLICT (team_id, player_name) DO NOTHING`,
      [teamId, playerName]
    );
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Remove a player. Returns false when the name was not on the roster.
   */
  async removePlayer(teamId: number, playerName: string, client: PoolClient): Promise<boolean> {
    const result = await client.query(
      'DELETE FROM team_players WHERE team_id = $1 AND player_name = $2',
      [teamId, playerName]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
