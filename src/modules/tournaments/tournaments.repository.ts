import { Pool, PoolClient } from 'pg';
import type { TournamentStatus } from '../../domain';
import { Tournament, TournamentRow, tournamentFromDatabase } from './tournaments.model';

export class TournamentsRepository {
  constructor(private readonly db: Pool) {}

  async findById(tournamentId: number, client?: PoolClient): Promise<Tournament | null> {
    const conn = client || this.db;
    const result = await conn.query<TournamentRow>('SELECT * FROM tournaments WHERE id = $1', [
      tournamentId,
    ]);
    return result.rows.length > 0 ? tournamentFromDatabase(result.rows[0]) : null;
  }

  /**
   * Compare-and-set status transition.
   * Returns the updated tournament, or null if the status was no longer `from`.
   */
  async transitionStatus(
    tournamentId: number,
    from: TournamentStatus,
    to: TournamentStatus,
    client: PoolClient
  ): Promise<Tournament | null> {
    const result = await client.query<TournamentRow>(
      `UPDATE tournaments SET status = $3, updated_at = NOW()
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [tournamentId, from, to]
    );
    return result.rows.length > 0 ? tournamentFromDatabase(result.rows[0]) : null;
  }

  /**
   * Record the champion and complete the tournament in one statement.
   */
  async complete(
    tournamentId: number,
    championTeamId: number,
    client: PoolClient
  ): Promise<Tournament | null> {
    const result = await client.query<TournamentRow>(
      `UPDATE tournaments
       SET status = 'COMPLETED', champion_team_id = $2, updated_at = NOW()
       WHERE id = $1 AND status = 'KNOCKOUT'
       RETURNING *`,
      [tournamentId, championTeamId]
    );
    return result.rows.length > 0 ? tournamentFromDatabase(result.rows[0]) : null;
  }
}
