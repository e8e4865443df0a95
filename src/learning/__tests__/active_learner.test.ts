/**
 * @fileoverview Tests for the Active Learner
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ActiveLearner } from '../active_learner.js';
import { StorageError } from '../../core/errors.js';
import type { SqliteEventStore } from '../../storage/event_store.js';
import type { Prediction } from '../../types.js';
import { contextAt, openTestStore } from './fixtures.js';

const prediction = (action: string, confidence: number, params: Prediction['params'] = {}): Prediction => ({
  action,
  confidence,
  params,
  source: 'knn',
  reason: 'test',
});

describe('ActiveLearner', () => {
  let store: SqliteEventStore;
  let learner: ActiveLearner;
  const ctx = contextAt(0, 23, { situation: 'tired' });

  beforeEach(async () => {
    store = await openTestStore();
    learner = new ActiveLearner(store);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('shouldAsk', () => {
    it('asks with the top three when the best is uncertain', () => {
      const decision = learner.shouldAsk([
        prediction('a', 0.5),
        prediction('b', 0.3),
        prediction('c', 0.55),
        prediction('d', 0.2),
      ]);
      expect(decision.ask).toBe(true);
      expect(decision.options.map((o) => o.action)).toEqual(['c', 'a', 'b']);
    });

    it('does not ask at or above the threshold, or with nothing to offer', () => {
      expect(learner.shouldAsk([prediction('a', 0.6), prediction('b', 0.1)])).toEqual({ ask: false, options: [] });
      expect(learner.shouldAsk([])).toEqual({ ask: false, options: [] });
    });
  });

  describe('formatQuery', () => {
    it('letters each option and adds a way out', () => {
      const text = learner.formatQuery('tired', [prediction('dnd.on', 0.55), prediction('music.calm', 0.304)]);
      expect(text).toBe(
        [
          "I'm not sure what to do for 'tired'. Should I:",
          '  A) dnd.on (confidence: 55%)',
          '  B) music.calm (confidence: 30%)',
          '  C) Something else',
          'Your choice (A/B/C...):',
        ].join('\n')
      );
    });

    it('returns null without options', () => {
      expect(learner.formatQuery('tired', [])).toBeNull();
    });
  });

  describe('applyChoice', () => {
    const options = [prediction('dnd.on', 0.5), prediction('lights.dim', 0.4, { level: 'low' }), prediction('music.calm', 0.3)];

    it('records the chosen option as a success and returns it at 0.95', async () => {
      const taught = await learner.applyChoice('tired', ctx, options, 'B');

      expect(taught).toMatchObject({
        action: 'lights.dim',
        confidence: 0.95,
        params: { level: 'low' },
        source: 'user_taught',
      });
      const stored = await store.querySimilar(ctx, 'tired', 10);
      expect(stored).toHaveLength(1);
      expect(stored[0]).toMatchObject({ action: 'lights.dim', outcomeCode: 1, params: { level: 'low' } });
    });

    it('accepts lowercase letters with whitespace', async () => {
      expect((await learner.applyChoice('tired', ctx, options, ' a '))?.action).toBe('dnd.on');
    });

    it('returns null for anything but a listed letter', async () => {
      for (const choice of ['D', 'AB', '', '1', 'dnd.on']) {
        expect(await learner.applyChoice('tired', ctx, options, choice)).toBeNull();
      }
      expect((await store.learningStats()).totalActions).toBe(0);
    });

    it('still returns the choice when recording fails', async () => {
      vi.spyOn(store, 'record').mockRejectedValue(new StorageError('write', false, 'disk full'));
      expect((await learner.applyChoice('tired', ctx, options, 'C'))?.action).toBe('music.calm');
    });
  });

  it('teach records a successful action', async () => {
    expect(await learner.teach('tired', ctx, 'tea.make', { strength: 'mild' })).toBe(true);

    const [stored] = await store.querySimilar(ctx, 'tired', 1);
    expect(stored?.action).toBe('tea.make');
    expect(stored?.params).toEqual({ strength: 'mild' });
  });
});
