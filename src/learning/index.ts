/**
 * @fileoverview Learning Module
 *
 * The decision strategies, leaves of the orchestrator:
 * - Reinforcement learning over a persistent value table
 * - Few-shot matching of utterances against stored exemplars
 * - Meta-learning transfer between similar situations
 * - Historical k-NN voting and workflow detection
 * - Active learning from user answers
 */

export {
  ReinforcementLearner,
  stateFingerprint,
  OUTCOME_REWARDS,
  type ReinforcementLearnerOptions,
  type ReinforcementStats,
  type ValueUpdate,
} from './reinforcement_learner.js';

export {
  FewShotMatcher,
  boostedSimilarity,
  type FewShotMatcherOptions,
  type StoredExample,
} from './few_shot_matcher.js';

export {
  MetaLearner,
  MAX_TRANSFER_CONFIDENCE,
  situationTokens,
  transferConfidence,
  type MetaLearnerOptions,
  type SimilarSituation,
} from './meta_learner.js';

export {
  HistoricalVoter,
  mostCommonParams,
  type HistoricalVoterOptions,
  type WorkflowSuggestion,
} from './historical_voter.js';

export {
  ActiveLearner,
  USER_TAUGHT_CONFIDENCE,
  type ActiveLearnerOptions,
  type QueryDecision,
} from './active_learner.js';
