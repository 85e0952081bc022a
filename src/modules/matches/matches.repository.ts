import { Pool, PoolClient } from 'pg';
import type { ConfirmedGroupMatch, MatchSide, MatchStatus, ScoreLine } from '../../domain';
import {
  Match,
  MatchResult,
  MatchResultRow,
  MatchRow,
  MatchWithResult,
  MatchWithResultRow,
  NewMatch,
  matchFromDatabase,
  matchResultFromDatabase,
  matchWithResultFromDatabase,
} from './matches.model';

const MATCH_WITH_RESULT_SELECT = `
  SELECT m.*,
    ht.manager_id AS home_manager_id,
    at.manager_id AS away_manager_id,
    r.match_id AS r_match_id,
    r.home_score AS r_home_score,
    r.away_score AS r_away_score,
    r.extra_time AS r_extra_time,
    r.penalties AS r_penalties,
    r.penalty_winner AS r_penalty_winner,
    r.submitted_by_side AS r_submitted_by_side,
    r.submitted_by AS r_submitted_by,
    r.home_confirmed AS r_home_confirmed,
    r.away_confirmed AS r_away_confirmed
  FROM matches m
  JOIN teams ht ON ht.id = m.home_team_id
  JOIN teams at ON at.id = m.away_team_id
  LEFT JOIN match_results r ON r.match_id = m.id`;

interface ConfirmedGroupMatchRow {
  id: number;
  scheduled_at: Date;
  home_team_id: number;
  away_team_id: number;
  home_score: number;
  away_score: number;
}

export class MatchesRepository {
  constructor(private readonly db: Pool) {}

  /**
   * Find a match with its result and the managers of both teams
   */
  async findWithResult(matchId: number, client?: PoolClient): Promise<MatchWithResult | null> {
    const conn = client || this.db;
    const result = await conn.query<MatchWithResultRow>(`${MATCH_WITH_RESULT_SELECT} WHERE m.id = $1`, [
      matchId,
    ]);
    return result.rows.length > 0 ? matchWithResultFromDatabase(result.rows[0]) : null;
  }

  async create(match: NewMatch, client: PoolClient): Promise<Match> {
    const result = await client.query<MatchRow>(
      `INSERT INTO matches (
        tournament_id, stage, group_number, bracket_node, scheduled_at, home_team_id, away_team_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING *`,
      [
        match.tournamentId,
        match.stage,
        match.groupNumber,
        match.bracketNode,
        match.scheduledAt,
        match.homeTeamId,
        match.awayTeamId,
      ]
    );
    return matchFromDatabase(result.rows[0]);
  }

  /**
   * Set status and bump the version, only if the version is still `expectedVersion`.
   * Returns null when another writer got there first.
   */
  async updateStatus(
    matchId: number,
    status: MatchStatus,
    expectedVersion: number,
    client: PoolClient
  ): Promise<Match | null> {
    const result = await client.query<MatchRow>(
      `UPDATE matches SET status = $2, version = version + 1, updated_at = NOW()
       WHERE id = $1 AND version = $3
       RETURNING *`,
      [matchId, status, expectedVersion]
    );
    return result.rows.length > 0 ? matchFromDatabase(result.rows[0]) : null;
  }

  async insertResult(
    matchId: number,
    score: ScoreLine,
    submittedBySide: MatchSide,
    submittedBy: string,
    confirmations: { homeConfirmed: boolean; awayConfirmed: boolean },
    client: PoolClient
  ): Promise<MatchResult> {
    const result = await client.query<MatchResultRow>(
      `INSERT INTO match_results (
        match_id, home_score, away_score, extra_time, penalties, penalty_winner,
        submitted_by_side, submitted_by, home_confirmed, away_confirmed
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING *`,
      [
        matchId,
        score.homeScore,
        score.awayScore,
        score.extraTime,
        score.penalties,
        score.penaltyWinner,
        submittedBySide,
        submittedBy,
        confirmations.homeConfirmed,
        confirmations.awayConfirmed,
      ]
    );
    return matchResultFromDatabase(result.rows[0]);
  }

  async updateConfirmations(
    matchId: number,
    homeConfirmed: boolean,
    awayConfirmed: boolean,
    client: PoolClient
  ): Promise<void> {
    await client.query(
      `UPDATE match_results SET home_confirmed = $2, away_confirmed = $3, updated_at = NOW()
       WHERE match_id = $1`,
      [matchId, homeConfirmed, awayConfirmed]
    );
  }

  /**
   * Replace the score with an administrative decision; both sides count as confirmed.
   */
  async overrideResult(matchId: number, score: ScoreLine, client: PoolClient): Promise<void> {
    await client.query(
      `UPDATE match_results
       SET home_score = $2, away_score = $3, extra_time = $4, penalties = $5, penalty_winner = $6,
           home_confirmed = TRUE, away_confirmed = TRUE, updated_at = NOW()
       WHERE match_id = $1`,
      [matchId, score.homeScore, score.awayScore, score.extraTime, score.penalties, score.penaltyWinner]
    );
  }

  async deleteResult(matchId: number, client: PoolClient): Promise<void> {
    await client.query('DELETE FROM match_results WHERE match_id = $1', [matchId]);
  }

  /**
   * Confirmed matches of one group with their scores
   */
  async findConfirmedGroupMatches(
    tournamentId: number,
    groupNumber: number,
    client?: PoolClient
  ): Promise<ConfirmedGroupMatch[]> {
    const conn = client || this.db;
    const result = await conn.query<ConfirmedGroupMatchRow>(
      `SELECT m.id, m.scheduled_at, m.home_team_id, m.away_team_id, r.home_score, r.away_score
       FROM matches m
       JOIN match_results r ON r.match_id = m.id
       WHERE m.tournament_id = $1 AND m.stage = 'GROUP' AND m.group_number = $2
         AND m.status = 'CONFIRMED'
       ORDER BY m.scheduled_at, m.id`,
      [tournamentId, groupNumber]
    );
    return result.rows.map((row) => ({
      id: row.id,
      scheduledAt: row.scheduled_at,
      homeTeamId: row.home_team_id,
      awayTeamId: row.away_team_id,
      homeScore: row.home_score,
      awayScore: row.away_score,
    }));
  }

  async countUnconfirmedGroupMatches(tournamentId: number, client?: PoolClient): Promise<number> {
    const conn = client || this.db;
    const result = await conn.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM matches
       WHERE tournament_id = $1 AND stage = 'GROUP' AND status <> 'CONFIRMED'`,
      [tournamentId]
    );
    return parseInt(result.rows[0].count, 10);
  }

  /**
   * Latest kickoff among the given matches (or the whole tournament when empty)
   */
  async latestScheduledAt(
    tournamentId: number,
    matchIds: number[],
    client?: PoolClient
  ): Promise<Date | null> {
    const conn = client || this.db;
    const result = await conn.query<{ latest: Date | null }>(
      `SELECT MAX(scheduled_at) AS latest FROM matches
       WHERE tournament_id = $1 AND (cardinality($2::int[]) = 0 OR id = ANY($2::int[]))`,
      [tournamentId, matchIds]
    );
    return result.rows[0]?.latest ?? null;
  }

  /**
   * Submitted results still waiting for this manager's side to confirm
   */
  async findPendingConfirmations(managerId: string, client?: PoolClient): Promise<MatchWithResult[]> {
    const conn = client || this.db;
    const result = await conn.query<MatchWithResultRow>(
      `${MATCH_WITH_RESULT_SELECT}
       WHERE m.status = 'RESULT_SUBMITTED'
         AND ((ht.manager_id = $1 AND r.home_confirmed = FALSE)
           OR (at.manager_id = $1 AND r.away_confirmed = FALSE))
       ORDER BY m.scheduled_at, m.id`,
      [managerId]
    );
    return result.rows.map(matchWithResultFromDatabase);
  }

  /**
   * Scheduled matches of this manager's teams, soonest first
   */
  async findUpcoming(managerId: string, client?: PoolClient): Promise<MatchWithResult[]> {
    const conn = client || this.db;
    const result = await conn.query<MatchWithResultRow>(
      `${MATCH_WITH_RESULT_SELECT}
       WHERE m.status = 'SCHEDULED' AND (ht.manager_id = $1 OR at.manager_id = $1)
       ORDER BY m.scheduled_at, m.id`,
      [managerId]
    );
    return result.rows.map(matchWithResultFromDatabase);
  }
}
