import type { GroupTableRow } from '../../domain';

export interface StandingsRow extends GroupTableRow {
  tournamentId: number;
  groupNumber: number;
}

export interface StandingsRowRecord {
  tournament_id: number;
  group_number: number;
  team_id: number;
  rank: number;
  played: number;
  won: number;
  drawn: number;
  lost: number;
  goals_for: number;
  goals_against: number;
  points: number;
}

export function standingsRowFromDatabase(row: StandingsRowRecord): StandingsRow {
  return {
    tournamentId: row.tournament_id,
    groupNumber: row.group_number,
    teamId: row.team_id,
    rank: row.rank,
    played: row.played,
    won: row.won,
    drawn: row.drawn,
    lost: row.lost,
    goalsFor: row.goals_for,
    goalsAgainst: row.goals_against,
    goalDifference: row.goals_for - row.goals_against,
    points: row.points,
  };
}
