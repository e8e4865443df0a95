/**
 * @fileoverview Decision Orchestrator module
 *
 * @example
 * ```typescript
 * import { createDecisionEngine, resolveEngineConfig } from 'adaptive-action-engine';
 *
 * const engine = await createDecisionEngine({ config: resolveEngineConfig() });
 * const decision = await engine.orchestrator.selectAction('tired', context, ['dnd.on', 'music.pause']);
 * await engine.orchestrator.learnFromOutcome(null, 'tired', context, 'dnd.on', {}, 'success');
 * await engine.close();
 * ```
 *
 * @packageDocumentation
 */

export {
  DecisionOrchestrator,
  DEFAULT_GATES,
  type CombinedStats,
  type ConfidenceGates,
  type DecisionComponents,
  type DecisionOrchestratorOptions,
  type LearnOptions,
  type LearningReport,
  type SelectActionOptions,
} from './decision_orchestrator.js';

export {
  createDecisionEngine,
  type CreateDecisionEngineOptions,
  type DecisionEngine,
} from './create_engine.js';
