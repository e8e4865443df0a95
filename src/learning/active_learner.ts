/**
 * @fileoverview Active Learner
 *
 * When no strategy is confident, ask the user to pick among the best
 * candidates and record the answer as a successful action, so one answer is
 * enough to learn from.
 */

import type { EventStore } from '../storage/types.js';
import type { ActionParams, ContextSnapshot, Prediction } from '../types.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface ActiveLearnerOptions {
  /** Ask when the best confidence is below this (default 0.6) */
  uncertaintyThreshold?: number;
  /** Options offered to the user (default 3) */
  maxOptions?: number;
}

export interface QueryDecision {
  ask: boolean;
  options: Prediction[];
}

/** Confidence given to an action the user picked themselves */
export const USER_TAUGHT_CONFIDENCE = 0.95;

const LETTER_A = 'A'.charCodeAt(0);

const letterFor = (index: number): string => String.fromCharCode(LETTER_A + index);

export class ActiveLearner {
  private readonly store: EventStore;
  private readonly threshold: number;
  private readonly maxOptions: number;

  constructor(store: EventStore, options: ActiveLearnerOptions = {}) {
    this.store = store;
    this.threshold = options.uncertaintyThreshold ?? 0.6;
    this.maxOptions = options.maxOptions ?? 3;
  }

  shouldAsk(predictions: readonly Prediction[]): QueryDecision {
    if (predictions.length === 0) return { ask: false, options: [] };

    const ranked = [...predictions].sort((a, b) => b.confidence - a.confidence);
    const top = ranked[0];
    if (top && top.confidence < this.threshold) {
      return { ask: true, options: ranked.slice(0, this.maxOptions) };
    }
    return { ask: false, options: [] };
  }

  formatQuery(situation: string, options: readonly Prediction[]): string | null {
    if (options.length === 0) return null;

    const lines = [`I'm not sure what to do for '${situation}'. Should I:`];
    options.forEach((option, index) => {
      lines.push(`  ${letterFor(index)}) ${option.action} (confidence: ${Math.round(option.confidence * 100)}%)`);
    });
    lines.push(`  ${letterFor(options.length)}) Something else`);
    lines.push('Your choice (A/B/C...):');
    return lines.join('\n');
  }

  /**
   * Resolve a single-letter answer. The chosen option is recorded as a
   * success; a letter outside the options (including "Something else") or
   * any other input yields null.
   */
  async applyChoice(
    situation: string,
    context: ContextSnapshot,
    options: readonly Prediction[],
    choice: string
  ): Promise<Prediction | null> {
    const letter = choice.trim().toUpperCase();
    if (!/^[A-Z]$/.test(letter)) return null;

    const selected = options[letter.charCodeAt(0) - LETTER_A];
    if (!selected) return null;

    await this.recordTeaching(situation, context, selected.action, selected.params);
    logInfo(`[active] user taught: ${situation} -> ${selected.action}`);

    return {
      action: selected.action,
      confidence: USER_TAUGHT_CONFIDENCE,
      params: selected.params,
      source: 'user_taught',
      reason: `You chose this for '${situation}'`,
    };
  }

  /** The user names the right action directly */
  async teach(situation: string, context: ContextSnapshot, action: string, params: ActionParams = {}): Promise<boolean> {
    const recorded = await this.recordTeaching(situation, context, action, params);
    logInfo(`[active] new teaching: ${situation} -> ${action}`);
    return recorded;
  }

  private async recordTeaching(
    situation: string,
    context: ContextSnapshot,
    action: string,
    params: ActionParams
  ): Promise<boolean> {
    try {
      await this.store.record({ context, situation, action, params, outcome: 'success', durationMs: 0 });
      return true;
    } catch (error) {
      logWarning('[active] failed to record user choice', { situation, action, error: getErrorMessage(error) });
      return false;
    }
  }
}
