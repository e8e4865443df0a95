/**
 * @fileoverview Historical Voter (k-nearest neighbours)
 *
 * Predicts an action from past successful records of the same situation,
 * weighting each by how closely its context matches and how recent it is.
 * Also mines recurring action sequences (workflows) and learned parameters.
 */

import { contextSimilarity, parseContextSnapshot } from '../context/context_snapshot.js';
import type { EventStore, LearningStats } from '../storage/types.js';
import type { ActionParams, ContextSnapshot, Prediction } from '../types.js';
import { logDebug } from '../telemetry/logger.js';
import { clamp01, mostFrequent } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export interface HistoricalVoterOptions {
  /** Neighbours that vote (default 10); also the confidence denominator */
  k?: number;
  /** Minimum winning confidence (default 0.7) */
  minConfidence?: number;
  /** Records needed before voting at all (default 3) */
  minSamples?: number;
  /** Days over which a record's weight halves (default 30) */
  recencyDecayDays?: number;
  clock?: () => Date;
}

export interface WorkflowSuggestion {
  /** The trailing two actions that matched */
  pattern: string[];
  nextAction: string;
  /** Share of matches that continued with `nextAction` */
  confidence: number;
  occurrences: number;
}

interface ScoredRecord {
  action: string;
  params: ActionParams;
  score: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;
const WORKFLOW_GAP_MS = 10 * 60 * 1000;
const WORKFLOW_HISTORY = 100;
const MIN_SEQUENCE_LENGTH = 3;
const DEFAULT_MIN_PATTERN_COUNT = 5;
const PARAM_HISTORY = 20;
const PARAM_MIN_USES = 3;
const PARAM_SIMILARITY = 0.6;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Per key, the most common value across `paramList` (first seen wins ties).
 */
export function mostCommonParams(paramList: readonly ActionParams[]): ActionParams {
  const keys: string[] = [];
  for (const params of paramList) {
    for (const key of Object.keys(params)) {
      if (!keys.includes(key)) keys.push(key);
    }
  }

  const result: ActionParams = {};
  for (const key of keys) {
    const values = paramList.filter((params) => key in params).map((params) => params[key]);
    const winner = mostFrequent(values);
    if (winner) result[key] = winner.value;
  }
  return result;
}

// ============================================================================
// VOTER
// ============================================================================

export class HistoricalVoter {
  private readonly store: EventStore;
  private readonly k: number;
  private readonly minConfidence: number;
  private readonly minSamples: number;
  private readonly recencyDecayDays: number;
  private readonly clock: () => Date;

  constructor(store: EventStore, options: HistoricalVoterOptions = {}) {
    this.store = store;
    this.k = options.k ?? 10;
    this.minConfidence = options.minConfidence ?? 0.7;
    this.minSamples = options.minSamples ?? 3;
    this.recencyDecayDays = options.recencyDecayDays ?? 30;
    this.clock = options.clock ?? (() => new Date());
  }

  private recencyWeight(timestamp: string): number | null {
    const time = Date.parse(timestamp);
    if (Number.isNaN(time)) return null;
    const daysAgo = Math.floor((this.clock().getTime() - time) / DAY_MS);
    return 1 / (1 + daysAgo / this.recencyDecayDays);
  }

  async predict(situation: string, context: ContextSnapshot): Promise<Prediction | null> {
    const similar = await this.store.querySimilar(context, situation, this.k * 2);
    if (similar.length < this.minSamples) return null;

    const scored: ScoredRecord[] = [];
    for (const record of similar) {
      const past = parseContextSnapshot(record.contextJson);
      const recency = this.recencyWeight(record.timestamp);
      if (!past || recency === null) continue;
      scored.push({
        action: record.action,
        params: record.params,
        score: contextSimilarity(context, past) * recency * record.outcomeCode,
      });
    }
    if (scored.length === 0) return null;

    // Array#sort is stable: equal scores keep the store's order.
    const topK = [...scored].sort((a, b) => b.score - a.score).slice(0, this.k);

    const votes = new Map<string, { total: number; params: ActionParams[] }>();
    for (const item of topK) {
      const entry = votes.get(item.action) ?? { total: 0, params: [] };
      entry.total += item.score;
      entry.params.push(item.params);
      votes.set(item.action, entry);
    }

    let winner: { action: string; total: number; params: ActionParams[] } | null = null;
    for (const [action, entry] of votes) {
      if (!winner || entry.total > winner.total) winner = { action, ...entry };
    }
    if (!winner) return null;

    const confidence = clamp01(winner.total / this.k);
    if (confidence < this.minConfidence) {
      logDebug('[knn] below confidence', { situation, action: winner.action, confidence });
      return null;
    }

    const sampleSize = winner.params.length;
    return {
      action: winner.action,
      confidence,
      params: mostCommonParams(winner.params),
      source: 'knn',
      reason: `You did this ${sampleSize}/${this.k} times in similar contexts`,
      details: { sampleSize, voteTotal: winner.total },
    };
  }

  /**
   * Learned parameters for `action` in `context`, or `defaults` when there is
   * too little similar history.
   */
  async optimizeParameters(action: string, context: ContextSnapshot, defaults: ActionParams): Promise<ActionParams> {
    const uses = await this.store.successfulRecordsForAction(action, PARAM_HISTORY);
    if (uses.length < PARAM_MIN_USES) return defaults;

    const similarParams: ActionParams[] = [];
    for (const use of uses) {
      const past = parseContextSnapshot(use.contextJson);
      if (past && contextSimilarity(context, past) > PARAM_SIMILARITY) {
        similarParams.push(use.params);
      }
    }
    return similarParams.length > 0 ? mostCommonParams(similarParams) : defaults;
  }

  /**
   * Suggest the action that usually follows the last two of `recentActions`.
   * History is split into sessions at gaps over 10 minutes.
   */
  async detectWorkflow(
    recentActions: readonly string[],
    minPatternCount: number = DEFAULT_MIN_PATTERN_COUNT
  ): Promise<WorkflowSuggestion | null> {
    if (recentActions.length < 2) return null;

    const timeline = await this.store.successfulTimeline(WORKFLOW_HISTORY);

    // Timeline is newest first; sequences are rebuilt in chronological order.
    const sequences: string[][] = [];
    let current: string[] = [];
    let lastTime: number | null = null;
    for (const entry of timeline) {
      const time = Date.parse(entry.timestamp);
      if (lastTime !== null && lastTime - time > WORKFLOW_GAP_MS) {
        if (current.length >= MIN_SEQUENCE_LENGTH) sequences.push([...current].reverse());
        current = [];
      }
      current.push(entry.action);
      lastTime = time;
    }
    if (current.length >= MIN_SEQUENCE_LENGTH) sequences.push([...current].reverse());

    const pattern = recentActions.slice(-2);
    const [first, second] = pattern;
    const matches: string[] = [];
    for (const sequence of sequences) {
      for (let i = 0; i + 2 < sequence.length; i++) {
        const next = sequence[i + 2];
        if (sequence[i] === first && sequence[i + 1] === second && next !== undefined) {
          matches.push(next);
        }
      }
    }

    if (matches.length < minPatternCount) return null;
    const best = mostFrequent(matches);
    if (!best) return null;

    return {
      pattern: [...pattern],
      nextAction: best.value,
      confidence: best.count / matches.length,
      occurrences: best.count,
    };
  }

  getStats(): Promise<LearningStats> {
    return this.store.learningStats();
  }
}
