/**
 * @fileoverview Embedding providers
 *
 * The Few-Shot Matcher only needs `embed(text) -> vector | null`. Models are
 * served out of process (an Ollama-compatible `/api/embeddings` endpoint);
 * nothing is downloaded or loaded in-process.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { EmbeddingError } from '../core/errors.js';
import { createDeadlineSignal, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EmbeddingProvider {
  readonly name: string;
  /**
   * Embed `text`. Resolves null when the provider has nothing to offer (empty
   * input, provider switched off); may reject with an EmbeddingError.
   */
  embed(text: string, signal?: AbortSignal): Promise<Float32Array | null>;
}

// ============================================================================
// SIMILARITY
// ============================================================================

/**
 * Cosine similarity of two equal-length vectors. Zero vectors score 0.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dot / denominator;
}

// ============================================================================
// HTTP PROVIDER
// ============================================================================

export interface HttpEmbeddingProviderOptions {
  /** Server root, e.g. http://127.0.0.1:11434 */
  baseUrl: string;
  model: string;
  /** Per-request limit; 0 disables it */
  timeoutMs?: number;
}

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const DEFAULT_TIMEOUT_MS = 2000;

export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  private readonly endpoint: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: HttpEmbeddingProviderOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/api/embeddings`;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.name = `http:${options.model}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array | null> {
    const prompt = text.trim();
    if (!prompt) return null;

    const deadline = createDeadlineSignal(this.timeoutMs, signal);
    let payload: unknown;
    try {
      let response: Response;
      try {
        response = await fetch(this.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify({ model: this.model, prompt }),
          signal: deadline.signal,
        });
      } catch (error) {
        throw this.requestError(deadline.signal, signal, error, 'network_error');
      }

      if (!response.ok) {
        throw new EmbeddingError(this.name, 'unavailable', response.status >= 500, `HTTP ${response.status}`);
      }

      // The body read stays under the same deadline as the request.
      try {
        payload = await withTimeout(response.json(), undefined, { signal: deadline.signal, context: 'embedding body' });
      } catch (error) {
        throw this.requestError(deadline.signal, signal, error, 'invalid_response');
      }
    } finally {
      deadline.dispose();
    }

    const parsed = EmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingError(this.name, 'invalid_response', false, 'missing embedding array');
    }
    return Float32Array.from(parsed.data.embedding);
  }

  private requestError(
    deadline: AbortSignal,
    caller: AbortSignal | undefined,
    error: unknown,
    otherwise: 'network_error' | 'invalid_response'
  ): EmbeddingError {
    if (deadline.aborted && !caller?.aborted) {
      return new EmbeddingError(this.name, 'timeout', true, `no response within ${this.timeoutMs}ms`);
    }
    if (deadline.aborted) {
      return new EmbeddingError(this.name, 'network_error', true, getErrorMessage(error));
    }
    return new EmbeddingError(this.name, otherwise, otherwise === 'network_error', getErrorMessage(error));
  }
}
