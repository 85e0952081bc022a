import type { MatchSide, MatchStage, MatchStatus, ScoreLine } from '../../domain';

export interface Match {
  id: number;
  tournamentId: number;
  stage: MatchStage;
  groupNumber: number | null;
  bracketNode: number | null;
  scheduledAt: Date;
  homeTeamId: number;
  awayTeamId: number;
  status: MatchStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface MatchResult {
  matchId: number;
  homeScore: number;
  awayScore: number;
  extraTime: boolean;
  penalties: boolean;
  penaltyWinner: MatchSide | null;
  submittedBySide: MatchSide;
  submittedBy: string;
  homeConfirmed: boolean;
  awayConfirmed: boolean;
}

/**
 * Match with its result and the managers of both teams
 */
export interface MatchWithResult extends Match {
  homeManagerId: string;
  awayManagerId: string;
  result: MatchResult | null;
}

export interface NewMatch {
  tournamentId: number;
  stage: MatchStage;
  groupNumber: number | null;
  bracketNode: number | null;
  scheduledAt: Date;
  homeTeamId: number;
  awayTeamId: number;
}

export interface MatchRow {
  id: number;
  tournament_id: number;
  stage: MatchStage;
  group_number: number | null;
  bracket_node: number | null;
  scheduled_at: Date;
  home_team_id: number;
  away_team_id: number;
  status: MatchStatus;
  version: number;
  created_at: Date;
  updated_at: Date;
}

export interface MatchResultRow {
  match_id: number;
  home_score: number;
  away_score: number;
  extra_time: boolean;
  penalties: boolean;
  penalty_winner: MatchSide | null;
  submitted_by_side: MatchSide;
  submitted_by: string;
  home_confirmed: boolean;
  away_confirmed: boolean;
}

/**
 * Match row joined with managers and a LEFT JOINed result (r_* columns)
 */
export interface MatchWithResultRow extends MatchRow {
  home_manager_id: string;
  away_manager_id: string;
  r_match_id: number | null;
  r_home_score: number | null;
  r_away_score: number | null;
  r_extra_time: boolean | null;
  r_penalties: boolean | null;
  r_penalty_winner: MatchSide | null;
  r_submitted_by_side: MatchSide | null;
  r_submitted_by: string | null;
  r_home_confirmed: boolean | null;
  r_away_confirmed: boolean | null;
}

export function matchFromDatabase(row: MatchRow): Match {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    stage: row.stage,
    groupNumber: row.group_number,
    bracketNode: row.bracket_node,
    scheduledAt: row.scheduled_at,
    homeTeamId: row.home_team_id,
    awayTeamId: row.away_team_id,
    status: row.status,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function matchResultFromDatabase(row: MatchResultRow): MatchResult {
  return {
    matchId: row.match_id,
    homeScore: row.home_score,
    awayScore: row.away_score,
    extraTime: row.extra_time,
    penalties: row.penalties,
    penaltyWinner: row.penalty_winner,
    submittedBySide: row.submitted_by_side,
    submittedBy: row.submitted_by,
    homeConfirmed: row.home_confirmed,
    awayConfirmed: row.away_confirmed,
  };
}

function joinedResult(row: MatchWithResultRow): MatchResult | null {
  const {
    r_match_id: matchId,
    r_home_score: homeScore,
    r_away_score: awayScore,
    r_submitted_by_side: submittedBySide,
    r_submitted_by: submittedBy,
  } = row;
  if (
    matchId === null ||
    homeScore === null ||
    awayScore === null ||
    submittedBySide === null ||
    submittedBy === null
  ) {
    return null;
  }

  return {
    matchId,
    homeScore,
    awayScore,
    extraTime: row.r_extra_time ?? false,
    penalties: row.r_penalties ?? false,
    penaltyWinner: row.r_penalty_winner,
    submittedBySide,
    submittedBy,
    homeConfirmed: row.r_home_confirmed ?? false,
    awayConfirmed: row.r_away_confirmed ?? false,
  };
}

export function matchWithResultFromDatabase(row: MatchWithResultRow): MatchWithResult {
  return {
    ...matchFromDatabase(row),
    homeManagerId: row.home_manager_id,
    awayManagerId: row.away_manager_id,
    result: joinedResult(row),
  };
}

export function scoreLineOf(result: MatchResult): ScoreLine {
  return {
    homeScore: result.homeScore,
    awayScore: result.awayScore,
    extraTime: result.extraTime,
    penalties: result.penalties,
    penaltyWinner: result.penaltyWinner,
  };
}

export function teamIdForSide(match: Pick<Match, 'homeTeamId' | 'awayTeamId'>, side: MatchSide): number {
  return side === 'HOME' ? match.homeTeamId : match.awayTeamId;
}
