/**
 * Alert evaluation
 *
 * Fixed evaluator list applied to each run's snapshot and history:
 * - DominanceLow, M2Flattening, AltcoinPullback, TrendSpike
 * - FullExit, escalating when the first three fire together
 */

export { EvaluationCoordinator } from './evaluation-coordinator';

export {
  PRIMARY_EVALUATORS,
  dominanceLowEvaluator,
  m2FlatteningEvaluator,
  altcoinPullbackEvaluator,
  trendSpikeEvaluator,
} from './evaluators';

export { evaluateFullExit, FULL_EXIT_PREREQUISITES } from './full-exit.evaluator';

export { matchSocialTerms, coinbaseRank, socialFeed } from './social-terms';

export type {
  Evaluator,
  EvaluationContext,
  EvaluationOutcome,
  EvaluationReport,
  PrimaryAlertKind,
} from './evaluation.types';
