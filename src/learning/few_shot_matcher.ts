/**
 * @fileoverview Few-Shot Matcher
 *
 * Matches an utterance against stored (text, action) exemplars by embedding
 * similarity. Candidates are ranked by similarity boosted with their success
 * count, but the raw similarity is what is reported and gated: frequent
 * exemplars win ties without inflating the confidence shown to the user.
 */

import type { EmbeddingProvider } from '../embeddings/embedding_provider.js';
import { cosineSimilarity } from '../embeddings/embedding_provider.js';
import type { EventStore, ExemplarStats } from '../storage/types.js';
import type { Prediction } from '../types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { clamp01 } from '../utils/math.js';

export interface FewShotMatcherOptions {
  /** Minimum raw similarity to return a prediction (default 0.75) */
  threshold?: number;
  /** Limit on each embedding call (default 2000ms) */
  embedTimeoutMs?: number;
}

export interface StoredExample {
  id: number;
  /** False when an existing exemplar's success count was incremented */
  created: boolean;
}

interface ScoredExemplar {
  action: string;
  similarity: number;
  boosted: number;
  successCount: number;
}

const DEFAULT_THRESHOLD = 0.75;
const DEFAULT_EMBED_TIMEOUT_MS = 2000;
const MAX_COUNT_BOOST = 0.2;

/** Ranking score: similarity × (1 + min(count/10, 0.2)) */
export function boostedSimilarity(similarity: number, successCount: number): number {
  return similarity * (1 + Math.min(successCount / 10, MAX_COUNT_BOOST));
}

export class FewShotMatcher {
  private readonly store: EventStore;
  private readonly provider: EmbeddingProvider | null;
  private readonly threshold: number;
  private readonly embedTimeoutMs: number;

  constructor(store: EventStore, provider: EmbeddingProvider | null, options: FewShotMatcherOptions = {}) {
    this.store = store;
    this.provider = provider;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.embedTimeoutMs = options.embedTimeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
  }

  get enabled(): boolean {
    return this.provider !== null;
  }

  /** Null whenever the provider is absent, fails, or runs out of time */
  private async embed(text: string, signal?: AbortSignal): Promise<Float32Array | null> {
    const provider = this.provider;
    if (!provider) return null;
    try {
      return await withTimeout(provider.embed(text, signal), this.embedTimeoutMs, {
        context: `embedding via ${provider.name}`,
        signal,
      });
    } catch (error) {
      logWarning('[few-shot] embedding unavailable', { provider: provider.name, error: getErrorMessage(error) });
      return null;
    }
  }

  /**
   * Remember that `text` led to `action`. An existing exemplar for the same
   * (situation, action) has its success count incremented instead. Returns
   * null when no embedding could be produced.
   */
  async storeExample(
    text: string,
    action: string,
    situation: string | null,
    signal?: AbortSignal
  ): Promise<StoredExample | null> {
    const embedding = await this.embed(text, signal);
    if (!embedding) return null;

    const existing = await this.store.findExemplar(situation, action);
    if (existing) {
      await this.store.incrementExemplar(existing.id);
      logDebug('[few-shot] exemplar reinforced', { situation, action, count: existing.successCount + 1 });
      return { id: existing.id, created: false };
    }

    const id = await this.store.insertExemplar({ text, embedding, action, situation });
    logDebug('[few-shot] exemplar stored', { situation, action });
    return { id, created: true };
  }

  async predict(text: string, situation?: string | null, signal?: AbortSignal): Promise<Prediction | null> {
    if (!this.provider) return null;
    const exemplars = await this.store.listExemplars(situation);
    if (exemplars.length === 0) return null;

    const query = await this.embed(text, signal);
    if (!query) return null;

    let best: ScoredExemplar | null = null;
    for (const exemplar of exemplars) {
      if (exemplar.embedding.length !== query.length) continue;
      const similarity = cosineSimilarity(query, exemplar.embedding);
      const scored: ScoredExemplar = {
        action: exemplar.action,
        similarity,
        boosted: boostedSimilarity(similarity, exemplar.successCount),
        successCount: exemplar.successCount,
      };
      if (!best || scored.boosted > best.boosted) best = scored;
    }

    if (!best || best.similarity < this.threshold) return null;

    return {
      action: best.action,
      confidence: clamp01(best.similarity),
      params: {},
      source: 'few_shot',
      reason: `Semantic match (similarity: ${(best.similarity * 100).toFixed(2)}%)`,
      details: { similarity: best.similarity, boostedSimilarity: best.boosted, successCount: best.successCount },
    };
  }

  getStats(): Promise<ExemplarStats> {
    return this.store.exemplarStats();
  }
}
