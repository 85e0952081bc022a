import { Pool, PoolClient } from 'pg';
import type { BracketNodeData } from '../../domain';
import { BracketNodeRow, bracketNodeFromDatabase } from './bracket.model';

export class BracketRepository {
  constructor(private readonly db: Pool) {}

  /**
   * All nodes of a tournament's bracket in index order (empty before generation)
   */
  async findByTournament(tournamentId: number, client?: PoolClient): Promise<BracketNodeData[]> {
    const conn = client || this.db;
    const result = await conn.query<BracketNodeRow>(
      'SELECT * FROM bracket_nodes WHERE tournament_id = $1 ORDER BY node_index',
      [tournamentId]
    );
    return result.rows.map(bracketNodeFromDatabase);
  }

  async insertNodes(tournamentId: number, nodes: BracketNodeData[], client: PoolClient): Promise<void> {
    for (const node of nodes) {
      await client.query(
        `INSERT INTO bracket_nodes (
          tournament_id, node_index, round, position, state, team_id, seed_label,
          source_group, left_child, right_child, parent_index, match_id
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
        [
          tournamentId,
          node.index,
          node.round,
          node.position,
          node.state,
          node.teamId,
          node.seedLabel,
          node.sourceGroup,
          node.left,
          node.right,
          node.parent,
          node.matchId,
        ]
      );
    }
  }

  /**
   * Persist the mutable part (state, team, match) of the given nodes
   */
  async updateNodes(tournamentId: number, nodes: BracketNodeData[], client: PoolClient): Promise<void> {
    for (const node of nodes) {
      await client.query(
        `UPDATE bracket_nodes SET state = $3, team_id = $4, match_id = $5, updated_at = NOW()
         WHERE tournament_id = $1 AND node_index = $2`,
        [tournamentId, node.index, node.state, node.teamId, node.matchId]
      );
    }
  }
}
