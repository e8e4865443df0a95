/**
 * @fileoverview Decision Orchestrator
 *
 * Runs the strategies in fixed priority order, each behind its own
 * confidence gate. The first prediction to clear its gate wins; otherwise the
 * best sub-threshold prediction is returned, flagged for disambiguation when
 * the Active Learner judges it too uncertain.
 *
 * @example
 * ```typescript
 * const decision = await orchestrator.selectAction('tired', context, ['dnd.on', 'music.pause'], {
 *   userText: 'I am exhausted',
 * });
 * if (decision?.askUser) {
 *   console.log(orchestrator.formatDisambiguationPrompt('tired', decision.options ?? []));
 * }
 * ```
 */

import type { EventStore, ExemplarStats, LearningStats, TransferStats } from '../storage/types.js';
import type { ActionParams, ContextSnapshot, Outcome, Prediction } from '../types.js';
import type { ActiveLearner } from '../learning/active_learner.js';
import type { FewShotMatcher } from '../learning/few_shot_matcher.js';
import type { HistoricalVoter } from '../learning/historical_voter.js';
import type { MetaLearner } from '../learning/meta_learner.js';
import type { ReinforcementLearner, ReinforcementStats } from '../learning/reinforcement_learner.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { AbortError, createDeadlineSignal, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DecisionComponents {
  store: EventStore;
  reinforcement: ReinforcementLearner;
  fewShot: FewShotMatcher;
  meta: MetaLearner;
  voter: HistoricalVoter;
  active: ActiveLearner;
}

/** A prediction is accepted outright only when its confidence is strictly above its gate */
export interface ConfidenceGates {
  reinforcement: number;
  fewShot: number;
  meta: number;
  knn: number;
}

export const DEFAULT_GATES: Readonly<ConfidenceGates> = {
  reinforcement: 0.8,
  fewShot: 0.75,
  meta: 0.7,
  knn: 0.7,
};

export interface DecisionOrchestratorOptions {
  gates?: Partial<ConfidenceGates>;
  /** Upper bound on one selectAction call; 0 disables it (default 5000) */
  deadlineMs?: number;
}

export interface SelectActionOptions {
  /** The user's utterance; the Few-Shot Matcher only runs when it is given */
  userText?: string;
  signal?: AbortSignal;
}

export interface LearnOptions {
  durationMs?: number;
  /** State reached after the action; defaults to `context` */
  nextContext?: ContextSnapshot;
  signal?: AbortSignal;
}

/** Which learning steps took effect; a false entry was skipped or failed */
export interface LearningReport {
  recorded: boolean;
  valueUpdated: boolean;
  exemplarStored: boolean;
}

export interface CombinedStats {
  reinforcement: ReinforcementStats | null;
  knn: LearningStats | null;
  meta: TransferStats | null;
  fewShot: ExemplarStats | null;
}

type StrategyName = 'reinforcement' | 'fewShot' | 'meta' | 'knn';

interface Strategy {
  name: StrategyName;
  gate: number;
  run: (signal: AbortSignal) => Promise<Prediction | null>;
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class DecisionOrchestrator {
  private readonly components: DecisionComponents;
  private readonly gates: ConfidenceGates;
  private readonly deadlineMs: number;

  constructor(components: DecisionComponents, options: DecisionOrchestratorOptions = {}) {
    this.components = components;
    this.gates = { ...DEFAULT_GATES, ...options.gates };
    this.deadlineMs = options.deadlineMs ?? 5000;
  }

  /**
   * Pick an action for `situation` among `candidates`. Resolves to null when
   * no strategy produced anything; never rejects.
   */
  async selectAction(
    situation: string,
    context: ContextSnapshot,
    candidates: readonly string[],
    options: SelectActionOptions = {}
  ): Promise<Prediction | null> {
    const { reinforcement, fewShot, meta, voter } = this.components;
    const userText = options.userText?.trim() ?? '';

    const strategies: Strategy[] = [
      {
        name: 'reinforcement',
        gate: this.gates.reinforcement,
        run: () => reinforcement.selectAction(context, situation, candidates),
      },
    ];
    if (userText.length > 0) {
      strategies.push({
        name: 'fewShot',
        gate: this.gates.fewShot,
        run: (signal) => fewShot.predict(userText, situation, signal),
      });
    }
    strategies.push(
      { name: 'meta', gate: this.gates.meta, run: (signal) => meta.bootstrap(situation, signal) },
      { name: 'knn', gate: this.gates.knn, run: () => voter.predict(situation, context) }
    );

    const deadline = createDeadlineSignal(this.deadlineMs, options.signal);
    const collected: Prediction[] = [];
    try {
      for (const strategy of strategies) {
        if (deadline.signal.aborted) {
          logWarning('[orchestrator] decision deadline reached; skipping remaining strategies', {
            situation,
            next: strategy.name,
          });
          break;
        }
        const prediction = await this.runStrategy(strategy, situation, deadline.signal);
        if (!prediction) continue;
        if (prediction.confidence > strategy.gate) {
          logInfo(`[orchestrator] using ${strategy.name}: ${prediction.action} (${formatPercent(prediction.confidence)})`);
          return { ...prediction, askUser: false };
        }
        collected.push(prediction);
      }
    } finally {
      deadline.dispose();
    }

    return this.fallback(situation, collected);
  }

  private async runStrategy(strategy: Strategy, situation: string, signal: AbortSignal): Promise<Prediction | null> {
    try {
      return await withTimeout(strategy.run(signal), undefined, {
        signal,
        context: `${strategy.name} strategy`,
      });
    } catch (error) {
      if (error instanceof AbortError) {
        logWarning(`[orchestrator] ${strategy.name} interrupted by the decision deadline`, { situation });
      } else {
        logWarning(`[orchestrator] ${strategy.name} failed`, { situation, error: getErrorMessage(error) });
      }
      return null;
    }
  }

  private fallback(situation: string, predictions: readonly Prediction[]): Prediction | null {
    let best = predictions[0];
    if (!best) {
      logDebug('[orchestrator] no strategy produced a prediction', { situation });
      return null;
    }
    for (const prediction of predictions.slice(1)) {
      if (prediction.confidence > best.confidence) best = prediction;
    }

    const decision = this.components.active.shouldAsk(predictions);
    if (decision.ask) {
      logInfo(`[orchestrator] uncertain about '${situation}'; asking the user (top ${formatPercent(best.confidence)})`);
      return { ...best, askUser: true, options: decision.options };
    }
    logInfo(`[orchestrator] using best prediction: ${best.action} (${formatPercent(best.confidence)})`);
    return { ...best, askUser: false };
  }

  /**
   * Feed an executed action back into the learners: record it, update the
   * value table and, on success with a non-empty utterance, store an
   * exemplar. Each step fails on its own without stopping the others.
   */
  async learnFromOutcome(
    userText: string | null,
    situation: string,
    context: ContextSnapshot,
    action: string,
    params: ActionParams,
    outcome: Outcome,
    options: LearnOptions = {}
  ): Promise<LearningReport> {
    const { store, reinforcement, fewShot } = this.components;
    const report: LearningReport = { recorded: false, valueUpdated: false, exemplarStored: false };

    try {
      await store.record({ context, situation, action, params, outcome, durationMs: options.durationMs ?? 0 });
      report.recorded = true;
    } catch (error) {
      logWarning('[orchestrator] failed to record action', { situation, action, error: getErrorMessage(error) });
    }

    try {
      await reinforcement.update(context, situation, action, outcome, options.nextContext);
      report.valueUpdated = true;
    } catch (error) {
      logWarning('[orchestrator] value update failed', { situation, action, error: getErrorMessage(error) });
    }

    const text = userText?.trim() ?? '';
    if (outcome === 'success' && text.length > 0) {
      try {
        const stored = await fewShot.storeExample(text, action, situation, options.signal);
        report.exemplarStored = stored !== null;
      } catch (error) {
        logWarning('[orchestrator] failed to store exemplar', { situation, action, error: getErrorMessage(error) });
      }
    }

    return report;
  }

  formatDisambiguationPrompt(situation: string, options: readonly Prediction[]): string | null {
    return this.components.active.formatQuery(situation, options);
  }

  async applyUserChoice(
    situation: string,
    context: ContextSnapshot,
    options: readonly Prediction[],
    choice: string
  ): Promise<Prediction | null> {
    try {
      return await this.components.active.applyChoice(situation, context, options, choice);
    } catch (error) {
      logWarning('[orchestrator] failed to apply user choice', { situation, error: getErrorMessage(error) });
      return null;
    }
  }

  async getCombinedStats(): Promise<CombinedStats> {
    const { reinforcement, voter, meta, fewShot } = this.components;
    const [rl, knn, transfers, exemplars] = await Promise.all([
      settle('reinforcement', () => reinforcement.getStats()),
      settle('knn', () => voter.getStats()),
      settle('meta', () => meta.getStats()),
      settle('fewShot', () => fewShot.getStats()),
    ]);
    return { reinforcement: rl, knn, meta: transfers, fewShot: exemplars };
  }
}

async function settle<T>(name: StrategyName, read: () => Promise<T>): Promise<T | null> {
  try {
    return await read();
  } catch (error) {
    logWarning(`[orchestrator] ${name} stats unavailable`, { error: getErrorMessage(error) });
    return null;
  }
}

const formatPercent = (value: number): string => `${Math.round(value * 100)}%`;
