/**
 * @fileoverview Tests for the Few-Shot Matcher
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { boostedSimilarity, FewShotMatcher } from '../few_shot_matcher.js';
import type { SqliteEventStore } from '../../storage/event_store.js';
import {
  FailingEmbeddingProvider,
  HangingEmbeddingProvider,
  LookupEmbeddingProvider,
  openTestStore,
} from './fixtures.js';

const cos = (x: number): number[] => [x, Math.sqrt(1 - x * x)];

describe('boostedSimilarity', () => {
  it('boosts by success count up to 20%', () => {
    expect(boostedSimilarity(0.5, 1)).toBeCloseTo(0.55, 10);
    expect(boostedSimilarity(0.5, 2)).toBeCloseTo(0.6, 10);
    expect(boostedSimilarity(0.5, 50)).toBeCloseTo(0.6, 10);
  });
});

describe('FewShotMatcher', () => {
  let store: SqliteEventStore;

  beforeEach(async () => {
    store = await openTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  async function seed(action: string, situation: string | null, vector: number[], successCount = 1): Promise<void> {
    const id = await store.insertExemplar({ text: action, embedding: Float32Array.from(vector), action, situation });
    for (let i = 1; i < successCount; i++) {
      await store.incrementExemplar(id);
    }
  }

  describe('storeExample', () => {
    it('increments the existing exemplar instead of adding a row', async () => {
      const provider = new LookupEmbeddingProvider({ 'order pizza': [1, 0], 'get me food': [0.9, 0.1] });
      const matcher = new FewShotMatcher(store, provider);

      const first = await matcher.storeExample('order pizza', 'food.order', 'hungry');
      const second = await matcher.storeExample('get me food', 'food.order', 'hungry');

      expect(first?.created).toBe(true);
      expect(second).toEqual({ id: first?.id, created: false });
      const exemplars = await store.listExemplars();
      expect(exemplars).toHaveLength(1);
      expect(exemplars[0]?.successCount).toBe(2);
      expect(exemplars[0]?.text).toBe('order pizza');
    });

    it('writes nothing without an embedding', async () => {
      const matcher = new FewShotMatcher(store, null);
      expect(matcher.enabled).toBe(false);
      expect(await matcher.storeExample('order pizza', 'food.order', 'hungry')).toBeNull();

      const failing = new FewShotMatcher(store, new FailingEmbeddingProvider());
      expect(await failing.storeExample('order pizza', 'food.order', 'hungry')).toBeNull();

      expect(await store.listExemplars()).toEqual([]);
    });
  });

  describe('predict', () => {
    it('returns the closest exemplar with its raw similarity', async () => {
      await seed('food.order', 'hungry', [1, 0]);
      await seed('music.play', 'hungry', [0, 1]);
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ 'feed me': [1, 0] }));

      const prediction = await matcher.predict('feed me', 'hungry');
      expect(prediction).toMatchObject({ action: 'food.order', source: 'few_shot' });
      expect(prediction?.confidence).toBeCloseTo(1, 6);
    });

    it('returns null below the threshold', async () => {
      await seed('food.order', 'hungry', [0.6, 0.8]);
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ 'feed me': [1, 0] }));
      expect(await matcher.predict('feed me', 'hungry')).toBeNull();
    });

    it('ranks by boosted similarity but reports the raw one', async () => {
      await seed('frequent', 'hungry', cos(0.9), 10); // boosted 1.08
      await seed('closer', 'hungry', cos(0.95), 1); // boosted 1.045
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ q: [1, 0] }));

      const prediction = await matcher.predict('q', 'hungry');
      expect(prediction?.action).toBe('frequent');
      expect(prediction?.confidence).toBeCloseTo(0.9, 5);
      expect(prediction?.details?.successCount).toBe(10);
    });

    it('gates on the raw similarity of the top-ranked exemplar', async () => {
      await seed('frequent', 'hungry', cos(0.74), 10); // boosted 0.888, raw below gate
      await seed('passing', 'hungry', cos(0.8), 1); // boosted 0.88
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ q: [1, 0] }));

      expect(await matcher.predict('q', 'hungry')).toBeNull();
    });

    it('falls back to the next exemplar when the boost is not enough', async () => {
      await seed('rare', 'hungry', cos(0.74), 1); // boosted 0.814
      await seed('passing', 'hungry', cos(0.8), 1); // boosted 0.88
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ q: [1, 0] }));

      const prediction = await matcher.predict('q', 'hungry');
      expect(prediction?.action).toBe('passing');
      expect(prediction?.confidence).toBeCloseTo(0.8, 5);
    });

    it('filters by situation when one is given', async () => {
      await seed('dnd.on', 'tired', [1, 0]);
      await seed('food.order', 'hungry', [0.8, 0.6]);
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ q: [1, 0] }));

      expect((await matcher.predict('q', 'hungry'))?.action).toBe('food.order');
      expect((await matcher.predict('q'))?.action).toBe('dnd.on');
    });

    it('skips exemplars of another dimension', async () => {
      await seed('old.model', 'hungry', [1, 0, 0]);
      await seed('food.order', 'hungry', [0.8, 0.6]);
      const matcher = new FewShotMatcher(store, new LookupEmbeddingProvider({ q: [1, 0] }));

      expect((await matcher.predict('q', 'hungry'))?.action).toBe('food.order');
    });

    it('never throws when the provider fails on every call', async () => {
      await seed('food.order', 'hungry', [1, 0]);
      const provider = new FailingEmbeddingProvider();
      const matcher = new FewShotMatcher(store, provider);

      for (const text of ['feed me', 'pizza', '']) {
        await expect(matcher.predict(text, 'hungry')).resolves.toBeNull();
        await expect(matcher.predict(text)).resolves.toBeNull();
      }
      expect(provider.calls).toBe(6);
    });

    it('gives up on a provider that does not answer in time', async () => {
      await seed('food.order', 'hungry', [1, 0]);
      const matcher = new FewShotMatcher(store, new HangingEmbeddingProvider(), { embedTimeoutMs: 20 });
      expect(await matcher.predict('feed me', 'hungry')).toBeNull();
    });

    it('stops when the caller aborts', async () => {
      await seed('food.order', 'hungry', [1, 0]);
      const matcher = new FewShotMatcher(store, new HangingEmbeddingProvider(), { embedTimeoutMs: 0 });
      const controller = new AbortController();
      const pending = matcher.predict('feed me', 'hungry', controller.signal);
      controller.abort();
      expect(await pending).toBeNull();
    });

    it('abstains without exemplars or provider', async () => {
      const provider = new LookupEmbeddingProvider({ q: [1, 0] });
      expect(await new FewShotMatcher(store, provider).predict('q')).toBeNull();
      expect(provider.calls).toEqual([]);

      await seed('food.order', 'hungry', [1, 0]);
      expect(await new FewShotMatcher(store, null).predict('q')).toBeNull();
    });
  });

  it('reports exemplar statistics', async () => {
    await seed('food.order', 'hungry', [1, 0], 3);
    await seed('dnd.on', 'tired', [0, 1]);
    const matcher = new FewShotMatcher(store, null);
    expect(await matcher.getStats()).toEqual({ totalExamples: 2, uniqueSituations: 2, totalUses: 4 });
  });
});
