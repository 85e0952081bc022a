/**
 * Result Confirmation Domain Logic
 *
 * Decides every transition of the result state machine:
 *
 *   SCHEDULED -> RESULT_SUBMITTED -> CONFIRMED
 *                       |
 *                       +--> DISPUTED --> SCHEDULED (reopen)
 *                                    \--> CONFIRMED (force confirm)
 *
 * Each planner returns the new state to persist, or a coded error.
 * Authorization is decided before status so a stranger never learns the
 * state of a match. No async I/O, no database access.
 */

import type { MatchSide, MatchStage, MatchStatus } from '../tournament/types';
import type { ScoreErrorCode, ScoreLine } from './score';
import { resolveWinnerSide, sameScore, validateScoreLine } from './score';

export type ConfirmationErrorCode =
  | 'NOT_A_PARTICIPANT'
  | 'MANAGES_BOTH_SIDES'
  | 'INVALID_STATUS'
  | 'SCORE_MISMATCH'
  | 'NOT_OPPOSING_SIDE'
  | 'ALREADY_CONFIRMED'
  | ScoreErrorCode;

export interface ConfirmationError {
  code: ConfirmationErrorCode;
  message: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: ConfirmationError };

function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

function fail<T>(code: ConfirmationErrorCode, message: string): Outcome<T> {
  return { ok: false, error: { code, message } };
}

export interface ResultSnapshot {
  score: ScoreLine;
  submittedBySide: MatchSide;
  homeConfirmed: boolean;
  awayConfirmed: boolean;
}

/**
 * Minimal match state needed by the planners.
 * Domain does not import from modules; callers map from their Match type.
 */
export interface ConfirmationState {
  status: MatchStatus;
  stage: MatchStage;
  homeManagerId: string;
  awayManagerId: string;
  result: ResultSnapshot | null;
}

/**
 * Side managed by the actor. A manager of both teams is rejected.
 */
export function resolveActorSide(state: ConfirmationState, actorId: string): Outcome<MatchSide> {
  const managesHome = state.homeManagerId === actorId;
  const managesAway = state.awayManagerId === actorId;

  if (managesHome && managesAway) {
    return fail('MANAGES_BOTH_SIDES', 'A manager of both teams cannot confirm their own result');
  }
  if (managesHome) return ok('HOME');
  if (managesAway) return ok('AWAY');
  return fail('NOT_A_PARTICIPANT', 'You do not manage either team in this match');
}

export interface SubmissionPlan {
  side: MatchSide;
  homeConfirmed: boolean;
  awayConfirmed: boolean;
}

export function planSubmission(
  state: ConfirmationState,
  actorId: string,
  score: ScoreLine,
  policy: { selfConfirmOnSubmit: boolean; penaltiesRequireLevelScore: boolean }
): Outcome<SubmissionPlan> {
  const actor = resolveActorSide(state, actorId);
  if (!actor.ok) return actor;

  if (state.status !== 'SCHEDULED') {
    return fail('INVALID_STATUS', `Cannot submit a result for a match with status ${state.status}`);
  }

  const [scoreError] = validateScoreLine(score, {
    stage: state.stage,
    penaltiesRequireLevelScore: policy.penaltiesRequireLevelScore,
  });
  if (scoreError) {
    return fail(scoreError.code, scoreError.message);
  }

  const side = actor.value;
  return ok({
    side,
    homeConfirmed: policy.selfConfirmOnSubmit && side === 'HOME',
    awayConfirmed: policy.selfConfirmOnSubmit && side === 'AWAY',
  });
}

export type ConfirmationPlan =
  | { kind: 'NOOP'; side: MatchSide }
  | {
      kind: 'CONFIRM';
      side: MatchSide;
      homeConfirmed: boolean;
      awayConfirmed: boolean;
      /** Both flags are set: the match becomes CONFIRMED */
      completes: boolean;
    };

export function planConfirmation(
  state: ConfirmationState,
  actorId: string,
  expectedScore: ScoreLine | null = null
): Outcome<ConfirmationPlan> {
  const actor = resolveActorSide(state, actorId);
  if (!actor.ok) return actor;
  const side = actor.value;

  // A named score must match the stored one, even when the call would be a no-op
  if (expectedScore !== null && state.result !== null && !sameScore(expectedScore, state.result.score)) {
    return fail('SCORE_MISMATCH', 'Score does not match the submitted result; dispute it instead');
  }
  if (state.status === 'CONFIRMED') {
    return ok({ kind: 'NOOP', side });
  }
  if (state.status !== 'RESULT_SUBMITTED' || state.result === null) {
    return fail('INVALID_STATUS', `Cannot confirm a match with status ${state.status}`);
  }

  const result = state.result;

  const alreadySet = side === 'HOME' ? result.homeConfirmed : result.awayConfirmed;
  if (alreadySet) {
    return ok({ kind: 'NOOP', side });
  }

  const homeConfirmed = result.homeConfirmed || side === 'HOME';
  const awayConfirmed = result.awayConfirmed || side === 'AWAY';
  return ok({
    kind: 'CONFIRM',
    side,
    homeConfirmed,
    awayConfirmed,
    completes: homeConfirmed && awayConfirmed,
  });
}

/**
 * Only the side that did not submit may dispute, and only before it confirms.
 */
export function planDispute(state: ConfirmationState, actorId: string): Outcome<MatchSide> {
  const actor = resolveActorSide(state, actorId);
  if (!actor.ok) return actor;
  const side = actor.value;

  if (state.status !== 'RESULT_SUBMITTED' || state.result === null) {
    return fail('INVALID_STATUS', `Cannot dispute a match with status ${state.status}`);
  }
  if (side === state.result.submittedBySide) {
    return fail('NOT_OPPOSING_SIDE', 'Only the opposing team can dispute a submitted result');
  }

  const alreadyConfirmed = side === 'HOME' ? state.result.homeConfirmed : state.result.awayConfirmed;
  if (alreadyConfirmed) {
    return fail('ALREADY_CONFIRMED', 'Result was already confirmed by your team');
  }

  return ok(side);
}

export type ResolutionAction = 'reopen' | 'force confirm';

/**
 * Administrative resolution applies only to disputed matches.
 * A forced score is validated exactly like a submission.
 */
export function planResolution(
  state: Pick<ConfirmationState, 'status' | 'stage'>,
  action: ResolutionAction,
  forcedScore: ScoreLine | null = null,
  penaltiesRequireLevelScore: boolean = true
): Outcome<ResolutionAction> {
  if (state.status !== 'DISPUTED') {
    return fail('INVALID_STATUS', `Cannot ${action} a match with status ${state.status}`);
  }

  if (forcedScore !== null) {
    const [scoreError] = validateScoreLine(forcedScore, {
      stage: state.stage,
      penaltiesRequireLevelScore,
    });
    if (scoreError) {
      return fail(scoreError.code, scoreError.message);
    }
  }

  return ok(action);
}

/**
 * What a confirmed match feeds: a group table, or a bracket node.
 */
export type RecomputeTrigger =
  | { kind: 'GROUP'; tournamentId: number; groupNumber: number }
  | {
      kind: 'KNOCKOUT';
      tournamentId: number;
      bracketNode: number;
      winnerSide: MatchSide;
    };

export interface TriggerSource {
  tournamentId: number;
  stage: MatchStage;
  groupNumber: number | null;
  bracketNode: number | null;
}

/**
 * Returns null when the match carries no group/bracket reference for its stage.
 */
export function recomputeTriggerFor(match: TriggerSource, score: ScoreLine): RecomputeTrigger | null {
  if (match.stage === 'GROUP') {
    if (match.groupNumber === null) return null;
    return { kind: 'GROUP', tournamentId: match.tournamentId, groupNumber: match.groupNumber };
  }

  const winnerSide = resolveWinnerSide(score);
  if (match.bracketNode === null || winnerSide === null) return null;
  return {
    kind: 'KNOCKOUT',
    tournamentId: match.tournamentId,
    bracketNode: match.bracketNode,
    winnerSide,
  };
}
