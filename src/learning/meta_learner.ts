/**
 * @fileoverview Meta Learner
 *
 * Bootstraps a situation with little or no history by borrowing the best
 * actions of a lexically similar situation ("very_tired" from "tired").
 * Similarity is Jaccard overlap of the `_`-separated, lowercased tokens.
 */

import type { EventStore, TransferStats } from '../storage/types.js';
import type { Prediction } from '../types.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { clamp01, jaccard } from '../utils/math.js';

export interface MetaLearnerOptions {
  /** Minimum Jaccard score for a situation to count as similar (default 0.7) */
  similarityThreshold?: number;
  /** Successful records a source situation needs (default 3) */
  minSourceSuccesses?: number;
  /** Source actions must beat this success rate (default 0.7) */
  minTransferRate?: number;
  /** ...and have at least this many records (default 2) */
  minTransferFrequency?: number;
  /** Actions transferred per call (default 3) */
  maxTransfers?: number;
}

export interface SimilarSituation {
  situation: string;
  score: number;
}

const DEFAULT_OPTIONS: Required<MetaLearnerOptions> = {
  similarityThreshold: 0.7,
  minSourceSuccesses: 3,
  minTransferRate: 0.7,
  minTransferFrequency: 2,
  maxTransfers: 3,
};

export const MAX_TRANSFER_CONFIDENCE = 0.9;
const SOURCE_RATE_WEIGHT = 0.8;
const MAX_FREQUENCY_BONUS = 0.15;

export function situationTokens(situation: string): Set<string> {
  return new Set(situation.toLowerCase().split('_'));
}

/**
 * Confidence carried over from the source: a discounted success rate plus a
 * small frequency bonus, never above 0.9.
 */
export function transferConfidence(successRate: number, frequency: number): number {
  const base = successRate * SOURCE_RATE_WEIGHT;
  const bonus = Math.min(frequency / 10, MAX_FREQUENCY_BONUS);
  return Math.min(base + bonus, MAX_TRANSFER_CONFIDENCE);
}

export class MetaLearner {
  private readonly store: EventStore;
  private readonly options: Required<MetaLearnerOptions>;

  constructor(store: EventStore, options: MetaLearnerOptions = {}) {
    this.store = store;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async findSimilarSituations(target: string): Promise<SimilarSituation[]> {
    const candidates = await this.store.situationFrequencies(target, this.options.minSourceSuccesses);
    const targetTokens = situationTokens(target);

    const similar: SimilarSituation[] = [];
    for (const { situation } of candidates) {
      const tokens = situationTokens(situation);
      const overlap = [...targetTokens].some((token) => tokens.has(token));
      if (!overlap) continue;
      const score = jaccard(targetTokens, tokens);
      if (score >= this.options.similarityThreshold) {
        similar.push({ situation, score });
      }
    }
    // Stable sort keeps the store's frequency order among equal scores.
    return similar.sort((a, b) => b.score - a.score);
  }

  /**
   * Carry the best actions of `source` over to `target`, logging each transfer.
   * Once `signal` aborts no further Transfer Records are written and the
   * result is empty.
   */
  async transfer(source: string, target: string, signal?: AbortSignal): Promise<Prediction[]> {
    const actions = await this.store.transferableActions(
      source,
      this.options.minTransferRate,
      this.options.minTransferFrequency,
      this.options.maxTransfers
    );
    if (actions.length === 0) return [];

    const transferred: Prediction[] = [];
    for (const { action, frequency, successRate } of actions) {
      if (signal?.aborted) {
        logDebug('[meta] transfer abandoned', { source, target, logged: transferred.length });
        return [];
      }
      const confidence = transferConfidence(successRate, frequency);
      transferred.push({
        action,
        confidence: clamp01(confidence),
        params: {},
        source: 'meta_learning',
        reason: `Transferred from similar situation: ${source}`,
        details: { sourceSituation: source, successRate, frequency },
      });

      try {
        await this.store.insertTransfer({
          sourceSituation: source,
          targetSituation: target,
          patternType: 'action_transfer',
          action,
          confidence,
        });
      } catch (error) {
        logWarning('[meta] failed to log transfer', { source, target, action, error: getErrorMessage(error) });
      }
    }

    logInfo(`[meta] transferred ${transferred.length} pattern(s): ${source} -> ${target}`);
    return transferred;
  }

  /**
   * Best transferred prediction from the most similar situation, or null.
   */
  async bootstrap(newSituation: string, signal?: AbortSignal): Promise<Prediction | null> {
    const similar = await this.findSimilarSituations(newSituation);
    const best = similar[0];
    if (!best) return null;

    const transferred = await this.transfer(best.situation, newSituation, signal);
    const first = transferred[0];
    if (!first) return null;

    return {
      ...first,
      details: { ...first.details, metaSimilarity: best.score },
    };
  }

  getStats(): Promise<TransferStats> {
    return this.store.transferStats();
  }
}
