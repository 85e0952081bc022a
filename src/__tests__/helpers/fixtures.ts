import type { Match } from '../../modules/matches/matches.model';
import type { InMemoryDatabase } from './in-memory-db';

/**
 * The stored match between two teams (either venue).
 */
export function matchBetween(db: InMemoryDatabase, teamA: number, teamB: number): Match {
  const match = db.tables.matches.find(
    (m) =>
      (m.homeTeamId === teamA && m.awayTeamId === teamB) ||
      (m.homeTeamId === teamB && m.awayTeamId === teamA)
  );
  if (!match) throw new Error(`No match between ${teamA} and ${teamB}`);
  return db.match(match.id);
}

export function managerOf(db: InMemoryDatabase, teamId: number): string {
  const team = db.tables.teams.find((t) => t.id === teamId);
  if (!team) throw new Error(`No team ${teamId}`);
  return team.managerId;
}
