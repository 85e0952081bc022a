/**
 * Domain Module
 *
 * Pure tournament logic: result confirmation rules, group tables, seeding
 * and bracket advancement. Nothing here touches the database, the logger
 * or the container; services map their rows into these shapes.
 */

// Vocabulary and rules
export {
  TournamentStatus,
  MatchStatus,
  MatchSide,
  KnockoutStage,
  MatchStage,
  TOURNAMENT_STATUSES,
  MATCH_STATUSES,
  isTournamentStatus,
  isMatchStatus,
  isMatchSide,
  isMatchStage,
  oppositeSide,
  knockoutStageForRound,
  groupLabel,
} from './tournament/types';
export { TieBreaker, TournamentRules, DEFAULT_TOURNAMENT_RULES } from './tournament/rules';
export {
  RandomSource,
  GroupAssignment,
  Fixture,
  addDays,
  shuffle,
  drawGroups,
  roundRobinFixtures,
} from './tournament/schedule';

// Team registry
export {
  MIN_ROSTER_SIZE,
  MAX_ROSTER_SIZE,
  RegistrationStatus,
  getRegistrationStatus,
  isRegistrationComplete,
  canAddPlayer,
} from './roster/registration';

// Results
export {
  ScoreLine,
  ScoreError,
  ScoreErrorCode,
  validateScoreLine,
  resolveWinnerSide,
  sameScore,
} from './results/score';
export {
  ConfirmationError,
  ConfirmationErrorCode,
  ConfirmationPlan,
  ConfirmationState,
  Outcome,
  RecomputeTrigger,
  ResolutionAction,
  ResultSnapshot,
  SubmissionPlan,
  TriggerSource,
  resolveActorSide,
  planSubmission,
  planConfirmation,
  planDispute,
  planResolution,
  recomputeTriggerFor,
} from './results/confirmation';

// Standings
export {
  ConfirmedGroupMatch,
  GroupTableRow,
  GroupQualifier,
  PointsRules,
  RankingRules,
  computeGroupTable,
  inSchedulingOrder,
  selectQualifiers,
} from './standings/table';

// Bracket
export {
  SeededTeam,
  FirstRoundPair,
  orderQualifiers,
  bracketSize,
  standardSeedOrder,
  pairFirstRound,
} from './bracket/seeding';
export {
  BracketNodeData,
  BracketNodeState,
  BracketChange,
  BracketError,
  BracketErrorCode,
  isLeaf,
  rootIndex,
  roundCount,
  stageForNode,
  nodeTeams,
  settleBracket,
  buildBracket,
  advanceNode,
  championOf,
  validateBracket,
} from './bracket/tree';
