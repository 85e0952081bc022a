import { getRegistrationStatus, type RegistrationStatus } from '../../domain';

export interface Team {
  id: number;
  tournamentId: number;
  name: string;
  managerId: string;
  groupNumber: number | null;
  createdAt: Date;
}

export interface TeamWithRoster extends Team {
  roster: string[];
  registrationStatus: RegistrationStatus;
  registrationComplete: boolean;
}

export interface TeamRow {
  id: number;
  tournament_id: number;
  name: string;
  manager_id: string;
  group_number: number | null;
  created_at: Date;
}

/** Team row joined with its roster size */
export interface TeamWithSizeRow extends TeamRow {
  roster_size: string;
}

export function teamFromDatabase(row: TeamRow): Team {
  return {
    id: row.id,
    tournamentId: row.tournament_id,
    name: row.name,
    managerId: row.manager_id,
    groupNumber: row.group_number,
    createdAt: row.created_at,
  };
}

export function withRoster(team: Team, roster: string[]): TeamWithRoster {
  const registrationStatus = getRegistrationStatus(roster.length);
  return {
    ...team,
    roster,
    registrationStatus,
    registrationComplete: registrationStatus === 'VALID',
  };
}
