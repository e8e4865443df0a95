/**
 * @fileoverview Engine factory
 *
 * Opens the Event Store named by the configuration and wires every learner
 * around it. Callers own the returned engine and must `close()` it.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/index.js';
import { HttpEmbeddingProvider, type EmbeddingProvider } from '../embeddings/embedding_provider.js';
import { ActiveLearner } from '../learning/active_learner.js';
import { FewShotMatcher } from '../learning/few_shot_matcher.js';
import { HistoricalVoter } from '../learning/historical_voter.js';
import { MetaLearner } from '../learning/meta_learner.js';
import { ReinforcementLearner } from '../learning/reinforcement_learner.js';
import { SqliteEventStore } from '../storage/event_store.js';
import type { EventStore } from '../storage/types.js';
import { logInfo } from '../telemetry/logger.js';
import { DecisionOrchestrator, type DecisionComponents } from './decision_orchestrator.js';

export interface CreateDecisionEngineOptions {
  config?: EngineConfig;
  /**
   * Overrides the provider built from `config.embedding`; null disables
   * the Few-Shot Matcher.
   */
  embeddingProvider?: EmbeddingProvider | null;
  /** Use this store instead of opening `config.dbPath`; it must be initialized */
  store?: EventStore;
  clock?: () => Date;
  random?: () => number;
}

export interface DecisionEngine extends DecisionComponents {
  config: EngineConfig;
  orchestrator: DecisionOrchestrator;
  close(): Promise<void>;
}

function buildProvider(config: EngineConfig): EmbeddingProvider | null {
  if (!config.embedding.url) return null;
  return new HttpEmbeddingProvider({
    baseUrl: config.embedding.url,
    model: config.embedding.model,
    timeoutMs: config.fewShot.embedTimeoutMs,
  });
}

export async function createDecisionEngine(options: CreateDecisionEngineOptions = {}): Promise<DecisionEngine> {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;

  let store: EventStore;
  if (options.store) {
    store = options.store;
  } else {
    const sqlite = new SqliteEventStore(config.dbPath, { clock: options.clock });
    await sqlite.initialize();
    store = sqlite;
  }

  const provider = options.embeddingProvider !== undefined ? options.embeddingProvider : buildProvider(config);

  const components: DecisionComponents = {
    store,
    reinforcement: new ReinforcementLearner(store, { ...config.reinforcement, random: options.random }),
    fewShot: new FewShotMatcher(store, provider, config.fewShot),
    meta: new MetaLearner(store, config.meta),
    voter: new HistoricalVoter(store, { ...config.knn, clock: options.clock }),
    active: new ActiveLearner(store, config.active),
  };

  const orchestrator = new DecisionOrchestrator(components, {
    gates: config.gates,
    deadlineMs: config.decisionDeadlineMs,
  });

  logInfo('[engine] ready', { dbPath: config.dbPath, embeddings: provider?.name ?? 'disabled' });

  return {
    ...components,
    config,
    orchestrator,
    close: () => store.close(),
  };
}
