/**
 * @fileoverview Adaptive Action Engine
 *
 * Learns which action to take for a detected situation from the outcomes of
 * past actions. Strategies run in priority order behind confidence gates:
 * reinforcement learning, few-shot utterance matching, transfer from similar
 * situations and historical k-NN voting. When none is confident the user is
 * asked to disambiguate.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createDecisionEngine, createContextProvider, resolveEngineConfig } from 'adaptive-action-engine';
 *
 * const engine = await createDecisionEngine({ config: resolveEngineConfig() });
 * const context = createContextProvider().getCurrentContext({ situation: 'tired' });
 *
 * const decision = await engine.orchestrator.selectAction('tired', context, ['dnd.on', 'music.pause']);
 * // ...execute decision.action, then:
 * await engine.orchestrator.learnFromOutcome(null, 'tired', context, 'dnd.on', {}, 'success');
 * await engine.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export {
  createDecisionEngine,
  DecisionOrchestrator,
  DEFAULT_GATES,
  type CreateDecisionEngineOptions,
  type DecisionEngine,
  type CombinedStats,
  type ConfidenceGates,
  type DecisionComponents,
  type DecisionOrchestratorOptions,
  type LearnOptions,
  type LearningReport,
  type SelectActionOptions,
} from './orchestrator/index.js';

// ============================================================================
// DOMAIN TYPES
// ============================================================================

export {
  OUTCOME_CODES,
  type ActionParams,
  type ActionRecord,
  type ContextSnapshot,
  type DayOfWeek,
  type Outcome,
  type Prediction,
  type PredictionSource,
  type TimeOfDay,
} from './types.js';

// ============================================================================
// CONTEXT
// ============================================================================

export {
  buildContextSnapshot,
  contextSimilarity,
  createContextProvider,
  parseContextSnapshot,
  timeOfDayForHour,
  type ContextProvider,
  type DeviceSignals,
  type DeviceSignalReader,
  type SnapshotInput,
} from './context/context_snapshot.js';

// ============================================================================
// LEARNERS
// ============================================================================

export * from './learning/index.js';

// ============================================================================
// STORAGE
// ============================================================================

export {
  SqliteEventStore,
  openEventStore,
  IN_MEMORY_DB,
  type SqliteEventStoreOptions,
} from './storage/event_store.js';
export { SCHEMA_VERSION } from './storage/migrations.js';
export type * from './storage/types.js';

// ============================================================================
// EMBEDDINGS
// ============================================================================

export {
  HttpEmbeddingProvider,
  cosineSimilarity,
  type EmbeddingProvider,
  type HttpEmbeddingProviderOptions,
} from './embeddings/embedding_provider.js';

// ============================================================================
// CONFIGURATION, ERRORS, LOGGING
// ============================================================================

export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  loadEngineConfigFile,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config/index.js';

export {
  EngineError,
  StorageError,
  EmbeddingError,
  ConfigError,
  isEngineError,
  isStorageError,
  isEmbeddingError,
  type StorageOperation,
  type EmbeddingErrorReason,
} from './core/errors.js';

export { TimeoutError, AbortError } from './utils/async.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';
