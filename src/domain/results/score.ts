/**
 * Match Score Domain Logic
 *
 * Validation of a submitted score line and winner resolution.
 * No async I/O, no database access.
 */

import type { MatchSide, MatchStage } from '../tournament/types';

export interface ScoreLine {
  homeScore: number;
  awayScore: number;
  extraTime: boolean;
  penalties: boolean;
  /** Shoot-out winner; set iff penalties */
  penaltyWinner: MatchSide | null;
}

export type ScoreErrorCode =
  | 'INVALID_SCORE'
  | 'PENALTY_WINNER_WITHOUT_PENALTIES'
  | 'PENALTIES_WITHOUT_WINNER'
  | 'PENALTIES_ON_DECIDED_SCORE'
  | 'GROUP_MATCH_EXTRA_TIME'
  | 'NO_WINNER';

export interface ScoreError {
  code: ScoreErrorCode;
  message: string;
}

export interface ScoreValidationContext {
  stage: MatchStage;
  penaltiesRequireLevelScore: boolean;
}

function isValidGoalCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validate a score line for a match of the given stage.
 *
 * Checks:
 * 1. Both scores are non-negative integers
 * 2. penaltyWinner is present iff penalties
 * 3. Penalties follow a level score (when the rule requires it)
 * 4. Group matches carry no extra-time or penalty flags
 * 5. A knockout score produces a winner
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validateScoreLine(score: ScoreLine, ctx: ScoreValidationContext): ScoreError[] {
  const errors: ScoreError[] = [];

  if (!isValidGoalCount(score.homeScore) || !isValidGoalCount(score.awayScore)) {
    errors.push({
      code: 'INVALID_SCORE',
      message: 'Scores must be non-negative integers',
    });
    return errors; // Remaining checks compare scores
  }

  if (score.penaltyWinner !== null && !score.penalties) {
    errors.push({
      code: 'PENALTY_WINNER_WITHOUT_PENALTIES',
      message: 'A penalty winner can only be given when penalties were taken',
    });
  }

  if (score.penalties && score.penaltyWinner === null) {
    errors.push({
      code: 'PENALTIES_WITHOUT_WINNER',
      message: 'A penalty shoot-out must name its winner',
    });
  }

  if (score.penalties && ctx.penaltiesRequireLevelScore && score.homeScore !== score.awayScore) {
    errors.push({
      code: 'PENALTIES_ON_DECIDED_SCORE',
      message: 'Penalties can only follow a level score',
    });
  }

  if (ctx.stage === 'GROUP') {
    if (score.extraTime || score.penalties) {
      errors.push({
        code: 'GROUP_MATCH_EXTRA_TIME',
        message: 'Group matches cannot go to extra time or penalties',
      });
    }
    return errors;
  }

  if (score.homeScore === score.awayScore && !score.penalties) {
    errors.push({
      code: 'NO_WINNER',
      message: 'A knockout match must produce a winner',
    });
  }

  return errors;
}

/**
 * Winning side of a score line, or null for a draw.
 * A level score is decided by the shoot-out when penalties were taken.
 */
export function resolveWinnerSide(score: ScoreLine): MatchSide | null {
  if (score.homeScore > score.awayScore) return 'HOME';
  if (score.awayScore > score.homeScore) return 'AWAY';
  if (score.penalties) return score.penaltyWinner;
  return null;
}

/**
 * Compare the facts two parties agree on: goals, and the shoot-out outcome.
 */
export function sameScore(a: ScoreLine, b: ScoreLine): boolean {
  return (
    a.homeScore === b.homeScore &&
    a.awayScore === b.awayScore &&
    a.extraTime === b.extraTime &&
    a.penalties === b.penalties &&
    a.penaltyWinner === b.penaltyWinner
  );
}
