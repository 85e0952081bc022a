import type { TournamentRules, TournamentStatus } from '../../domain';
import { parseTournamentRules } from './tournaments.schemas';

export interface Tournament {
  id: number;
  name: string;
  organizerId: string;
  startsAt: Date;
  numberOfGroups: number;
  teamsPerGroup: number;
  qualifiersPerGroup: number;
  status: TournamentStatus;
  championTeamId: number | null;
  rules: TournamentRules;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Row shape of the tournaments table (status is constrained by a CHECK)
 */
export interface TournamentRow {
  id: number;
  name: string;
  organizer_id: string;
  starts_at: Date;
  number_of_groups: number;
  teams_per_group: number;
  qualifiers_per_group: number;
  status: TournamentStatus;
  champion_team_id: number | null;
  rules: unknown;
  created_at: Date;
  updated_at: Date;
}

export function tournamentFromDatabase(row: TournamentRow): Tournament {
  return {
    id: row.id,
    name: row.name,
    organizerId: row.organizer_id,
    startsAt: row.starts_at,
    numberOfGroups: row.number_of_groups,
    teamsPerGroup: row.teams_per_group,
    qualifiersPerGroup: row.qualifiers_per_group,
    status: row.status,
    championTeamId: row.champion_team_id,
    rules: parseTournamentRules(row.rules),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function groupNumbers(tournament: Pick<Tournament, 'numberOfGroups'>): number[] {
  return Array.from({ length: tournament.numberOfGroups }, (_, i) => i + 1);
}
