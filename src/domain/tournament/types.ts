/**
 * Core tournament vocabulary shared by the domain and the modules.
 */

export type TournamentStatus = 'REGISTRATION' | 'GROUP_STAGE' | 'KNOCKOUT' | 'COMPLETED';

export type MatchStatus = 'SCHEDULED' | 'RESULT_SUBMITTED' | 'CONFIRMED' | 'DISPUTED';

export type MatchSide = 'HOME' | 'AWAY';

export type KnockoutStage = 'FINAL' | 'SEMIFINAL' | 'QUARTERFINAL' | `ROUND_OF_${number}`;

export type MatchStage = 'GROUP' | KnockoutStage;

export const TOURNAMENT_STATUSES: readonly TournamentStatus[] = [
  'REGISTRATION',
  'GROUP_STAGE',
  'KNOCKOUT',
  'COMPLETED',
];

export const MATCH_STATUSES: readonly MatchStatus[] = [
  'SCHEDULED',
  'RESULT_SUBMITTED',
  'CONFIRMED',
  'DISPUTED',
];

export function isTournamentStatus(value: string): value is TournamentStatus {
  return TOURNAMENT_STATUSES.some((status) => status === value);
}

export function isMatchStatus(value: string): value is MatchStatus {
  return MATCH_STATUSES.some((status) => status === value);
}

export function isMatchSide(value: string): value is MatchSide {
  return value === 'HOME' || value === 'AWAY';
}

export function isMatchStage(value: string): value is MatchStage {
  return (
    value === 'GROUP' ||
    value === 'FINAL' ||
    value === 'SEMIFINAL' ||
    value === 'QUARTERFINAL' ||
    /^ROUND_OF_\d+$/.test(value)
  );
}

export function oppositeSide(side: MatchSide): MatchSide {
  return side === 'HOME' ? 'AWAY' : 'HOME';
}

/**
 * Stage name for a knockout round contested by `teamsInRound` teams.
 * 2 -> FINAL, 4 -> SEMIFINAL, 8 -> QUARTERFINAL, otherwise ROUND_OF_N.
 */
export function knockoutStageForRound(teamsInRound: number): KnockoutStage {
  if (teamsInRound <= 2) return 'FINAL';
  if (teamsInRound === 4) return 'SEMIFINAL';
  if (teamsInRound === 8) return 'QUARTERFINAL';
  return `ROUND_OF_${teamsInRound}`;
}

/**
 * Group label used in seeding (1 -> "A", 2 -> "B", ...).
 */
export function groupLabel(groupNumber: number): string {
  if (groupNumber >= 1 && groupNumber <= 26) {
    return String.fromCharCode(64 + groupNumber);
  }
  return `G${groupNumber}`;
}
