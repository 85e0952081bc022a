/**
 * Tournament Rules
 *
 * Competition policy that differs between tournaments. Stored per tournament
 * and merged over these defaults.
 */

/**
 * Tie-breakers applied after points, goal difference and goals scored.
 * HEAD_TO_HEAD only separates a tie between exactly two teams.
 * Remaining ties fall back to team id so rankings stay deterministic.
 */
export type TieBreaker = 'HEAD_TO_HEAD' | 'MOST_WINS';

export interface TournamentRules {
  pointsForWin: number;
  pointsForDraw: number;
  pointsForLoss: number;
  tieBreakers: TieBreaker[];
  /** Submitting side is confirmed at submission; otherwise both sides confirm explicitly */
  selfConfirmOnSubmit: boolean;
  /** A penalty shoot-out may only follow a level score */
  penaltiesRequireLevelScore: boolean;
  knockoutRoundIntervalDays: number;
  groupMatchIntervalDays: number;
}

export const DEFAULT_TOURNAMENT_RULES: Readonly<TournamentRules> = {
  pointsForWin: 3,
  pointsForDraw: 1,
  pointsForLoss: 0,
  tieBreakers: ['HEAD_TO_HEAD'],
  selfConfirmOnSubmit: true,
  penaltiesRequireLevelScore: true,
  knockoutRoundIntervalDays: 3,
  groupMatchIntervalDays: 1,
};
