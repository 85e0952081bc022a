/**
 * Team Registration Domain Logic
 *
 * Roster size thresholds and derived registration status.
 * No async I/O, no database access.
 */

export const MIN_ROSTER_SIZE = 8;
export const MAX_ROSTER_SIZE = 14;

export type RegistrationStatus = 'INCOMPLETE' | 'VALID' | 'OVER_LIMIT';

export function getRegistrationStatus(rosterSize: number): RegistrationStatus {
  if (rosterSize < MIN_ROSTER_SIZE) return 'INCOMPLETE';
  if (rosterSize > MAX_ROSTER_SIZE) return 'OVER_LIMIT';
  return 'VALID';
}

/**
 * True iff MIN_ROSTER_SIZE <= rosterSize <= MAX_ROSTER_SIZE.
 */
export function isRegistrationComplete(rosterSize: number): boolean {
  return getRegistrationStatus(rosterSize) === 'VALID';
}

export function canAddPlayer(rosterSize: number): boolean {
  return rosterSize < MAX_ROSTER_SIZE;
}
