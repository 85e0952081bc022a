import { Pool, PoolClient } from 'pg';
import type { GroupTableRow } from '../../domain';
import { StandingsRow, StandingsRowRecord, standingsRowFromDatabase } from './standings.model';

export class StandingsRepository {
  constructor(private readonly db: Pool) {}

  async findByGroup(
    tournamentId: number,
    groupNumber: number,
    client?: PoolClient
  ): Promise<StandingsRow[]> {
    const conn = client || this.db;
    const result = await conn.query<StandingsRowRecord>(
      `SELECT * FROM standings_rows
       WHERE tournament_id = $1 AND group_number = $2
       ORDER BY rank`,
      [tournamentId, groupNumber]
    );
    return result.rows.map(standingsRowFromDatabase);
  }

  async findByTournament(tournamentId: number, client?: PoolClient): Promise<StandingsRow[]> {
    const conn = client || this.db;
    const result = await conn.query<StandingsRowRecord>(
      `SELECT * FROM standings_rows
       WHERE tournament_id = $1
       ORDER BY group_number, rank`,
      [tournamentId]
    );
    return result.rows.map(standingsRowFromDatabase);
  }

  /**
   * Replace every cached row of a group. Caller must hold the GROUP lock.
   */
  async replaceGroup(
    tournamentId: number,
    groupNumber: number,
    rows: GroupTableRow[],
    client: PoolClient
  ): Promise<void> {
    await client.query('DELETE FROM standings_rows WHERE tournament_id = $1 AND group_number = $2', [
      tournamentId,
      groupNumber,
    ]);
    if (rows.length === 0) return;

    await client.query(
      `INSERT INTO standings_rows (
        tournament_id, group_number, team_id, rank, played, won, drawn, lost,
        goals_for, goals_against, points
      )
      SELECT $1, $2, * FROM unnest(
        $3::int[], $4::int[], $5::int[], $6::int[], $7::int[], $8::int[],
        $9::int[], $10::int[], $11::int[]
      )`,
      [
        tournamentId,
        groupNumber,
        rows.map((r) => r.teamId),
        rows.map((r) => r.rank),
        rows.map((r) => r.played),
        rows.map((r) => r.won),
        rows.map((r) => r.drawn),
        rows.map((r) => r.lost),
        rows.map((r) => r.goalsFor),
        rows.map((r) => r.goalsAgainst),
        rows.map((r) => r.points),
      ]
    );
  }
}
