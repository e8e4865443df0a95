/**
 * @fileoverview Reinforcement Learner (tabular Q-learning)
 *
 * Keeps a value per (state fingerprint, action) and picks actions
 * epsilon-greedily. The table lives in memory, hydrated from the Event Store
 * on first use, and every update is written through.
 */

import { createHash } from 'node:crypto';
import type { EventStore } from '../storage/types.js';
import type { ContextSnapshot, Outcome, Prediction } from '../types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ReinforcementLearnerOptions {
  /** Step size α (default 0.1) */
  learningRate?: number;
  /** Discount γ (default 0.9) */
  discount?: number;
  /** Exploration probability ε (default 0.2) */
  epsilon?: number;
  /** Uniform [0, 1) source; injectable for deterministic tests */
  random?: () => number;
}

export interface ValueUpdate {
  stateHash: string;
  action: string;
  reward: number;
  previous: number;
  updated: number;
  /** False when the write-through failed and only memory holds the value */
  persisted: boolean;
}

export interface ReinforcementStats {
  totalValues: number;
  totalUpdates: number;
  explorations: number;
  exploitations: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const OUTCOME_REWARDS: Readonly<Record<Outcome, number>> = {
  success: 1.0,
  failure: -0.5,
  canceled: -1.0,
};

const DEFAULT_LEARNING_RATE = 0.1;
const DEFAULT_DISCOUNT = 0.9;
const DEFAULT_EPSILON = 0.2;

/** Battery level assumed when the device reports none */
const UNKNOWN_BATTERY = 50;

// ============================================================================
// STATE FINGERPRINT
// ============================================================================

function batteryTier(percent: number | null): 'high' | 'low' | 'medium' {
  const level = percent ?? UNKNOWN_BATTERY;
  if (level > 70) return 'high';
  if (level < 30) return 'low';
  return 'medium';
}

/**
 * 16-hex-char fingerprint of the coarse state a value is learned for.
 */
export function stateFingerprint(context: ContextSnapshot, situation: string): string {
  const state = [
    situation,
    context.timeOfDay,
    context.dayOfWeek,
    context.isCharging ? 'charging' : 'battery',
    batteryTier(context.batteryPercent),
  ];
  return createHash('md5').update(JSON.stringify(state)).digest('hex').slice(0, 16);
}

const valueKey = (stateHash: string, action: string): string => `${stateHash}\u0000${action}`;

// ============================================================================
// LEARNER
// ============================================================================

export class ReinforcementLearner {
  private readonly store: EventStore;
  private readonly learningRate: number;
  private readonly discount: number;
  private readonly epsilon: number;
  private readonly random: () => number;
  private values: Map<string, number> | null = null;
  private totalUpdates = 0;
  private explorations = 0;
  private exploitations = 0;

  constructor(store: EventStore, options: ReinforcementLearnerOptions = {}) {
    this.store = store;
    this.learningRate = options.learningRate ?? DEFAULT_LEARNING_RATE;
    this.discount = options.discount ?? DEFAULT_DISCOUNT;
    this.epsilon = options.epsilon ?? DEFAULT_EPSILON;
    this.random = options.random ?? Math.random;
  }

  private async table(): Promise<Map<string, number>> {
    if (this.values) return this.values;
    const entries = await this.store.loadValues();
    const values = new Map<string, number>();
    for (const entry of entries) {
      values.set(valueKey(entry.stateHash, entry.action), entry.value);
    }
    this.values = values;
    logDebug('[rl] value table hydrated', { entries: values.size });
    return values;
  }

  /** Stored value, 0 for unseen pairs */
  async getValue(stateHash: string, action: string): Promise<number> {
    const values = await this.table();
    return values.get(valueKey(stateHash, action)) ?? 0;
  }

  /**
   * Epsilon-greedy choice among `candidates`; null when there are none.
   */
  async selectAction(
    context: ContextSnapshot,
    situation: string,
    candidates: readonly string[]
  ): Promise<Prediction | null> {
    if (candidates.length === 0) return null;

    const values = await this.table();
    const stateHash = stateFingerprint(context, situation);
    const valueOf = (action: string): number => values.get(valueKey(stateHash, action)) ?? 0;

    let action: string;
    let method: 'explore' | 'exploit';
    if (this.random() < this.epsilon) {
      const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
      action = candidates[index] ?? candidates[0] ?? '';
      method = 'explore';
      this.explorations += 1;
    } else {
      action = candidates[0] ?? '';
      let best = valueOf(action);
      for (const candidate of candidates.slice(1)) {
        const value = valueOf(candidate);
        if (value > best) {
          best = value;
          action = candidate;
        }
      }
      method = 'exploit';
      this.exploitations += 1;
    }

    const value = valueOf(action);
    return {
      action,
      confidence: Math.min(Math.abs(value), 1),
      params: {},
      source: 'reinforcement_learning',
      reason: method === 'explore' ? 'Exploring an alternative action' : `Highest learned value (${value.toFixed(3)})`,
      details: { qValue: value, method, stateHash },
    };
  }

  /**
   * One Q-learning step: value += α(reward + γ·maxNext − value). The next
   * state defaults to the current one, and only the acted action is considered
   * there.
   */
  async update(
    context: ContextSnapshot,
    situation: string,
    action: string,
    outcome: Outcome,
    nextContext?: ContextSnapshot
  ): Promise<ValueUpdate> {
    const values = await this.table();
    const stateHash = stateFingerprint(context, situation);
    const nextHash = stateFingerprint(nextContext ?? context, situation);
    const reward = OUTCOME_REWARDS[outcome];

    const previous = values.get(valueKey(stateHash, action)) ?? 0;
    const maxNext = values.get(valueKey(nextHash, action)) ?? 0;
    const updated = previous + this.learningRate * (reward + this.discount * maxNext - previous);

    values.set(valueKey(stateHash, action), updated);
    this.totalUpdates += 1;

    let persisted = true;
    try {
      await this.store.upsertValue(stateHash, action, updated);
    } catch (error) {
      persisted = false;
      logWarning('[rl] failed to persist value; keeping it in memory', {
        action,
        stateHash,
        error: getErrorMessage(error),
      });
    }

    logDebug('[rl] value updated', { action, stateHash, previous, updated, reward });
    return { stateHash, action, reward, previous, updated, persisted };
  }

  /** Clear both the stored and the in-memory table; returns rows removed */
  async reset(): Promise<number> {
    const removed = await this.store.resetValues();
    this.values = new Map();
    return removed;
  }

  async getStats(): Promise<ReinforcementStats> {
    const values = await this.table();
    return {
      totalValues: values.size,
      totalUpdates: this.totalUpdates,
      explorations: this.explorations,
      exploitations: this.exploitations,
    };
  }
}
