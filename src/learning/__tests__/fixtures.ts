import { buildContextSnapshot } from '../../context/context_snapshot.js';
import type { EmbeddingProvider } from '../../embeddings/embedding_provider.js';
import { openEventStore, type SqliteEventStore } from '../../storage/event_store.js';
import type { ContextSnapshot } from '../../types.js';

/** Tuesday, 10 March 2026, 23:00 local */
export const NOW = new Date(2026, 2, 10, 23, 0, 0);

export function contextAt(
  daysAgo: number,
  hour: number,
  extra: { situation?: string | null; batteryPercent?: number | null; isCharging?: boolean | null; minute?: number } = {}
): ContextSnapshot {
  const when = new Date(2026, 2, 10 - daysAgo, hour, extra.minute ?? 0, 0);
  return buildContextSnapshot(when, {
    situation: extra.situation ?? null,
    batteryPercent: extra.batteryPercent ?? null,
    isCharging: extra.isCharging ?? null,
  });
}

export function openTestStore(): Promise<SqliteEventStore> {
  return openEventStore(':memory:', { clock: () => NOW });
}

/**
 * Embeds by lookup; unknown text resolves null.
 */
export class LookupEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'lookup';
  readonly calls: string[] = [];

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(text: string): Promise<Float32Array | null> {
    this.calls.push(text);
    const vector = this.vectors[text];
    return vector ? Float32Array.from(vector) : null;
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'failing';
  calls = 0;

  async embed(): Promise<Float32Array | null> {
    this.calls += 1;
    throw new Error('model offline');
  }
}

export class HangingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hanging';

  embed(): Promise<Float32Array | null> {
    return new Promise(() => undefined);
  }
}
