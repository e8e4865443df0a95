import { describe, it, expect } from 'vitest';
import {
  buildContextSnapshot,
  contextSimilarity,
  createContextProvider,
  parseContextSnapshot,
  timeOfDayForHour,
} from '../context_snapshot.js';

describe('timeOfDayForHour', () => {
  it.each([
    [4, 'night'],
    [5, 'morning'],
    [11, 'morning'],
    [12, 'afternoon'],
    [16, 'afternoon'],
    [17, 'evening'],
    [20, 'evening'],
    [21, 'night'],
    [0, 'night'],
  ] as const)('hour %i is %s', (hour, expected) => {
    expect(timeOfDayForHour(hour)).toBe(expected);
  });
});

describe('buildContextSnapshot', () => {
  it('derives temporal fields from local time', () => {
    // Saturday, 7 March 2026
    const snapshot = buildContextSnapshot(new Date(2026, 2, 7, 23, 15), {
      situation: 'tired',
      detectionConfidence: 0.9,
      batteryPercent: 40,
      isCharging: false,
      recentActions: ['music.pause'],
    });

    expect(snapshot).toMatchObject({
      hour: 23,
      minute: 15,
      dayOfWeek: 'saturday',
      isWeekend: true,
      timeOfDay: 'night',
      batteryPercent: 40,
      isCharging: false,
      activeApp: null,
      recentActions: ['music.pause'],
      situation: 'tired',
      detectionConfidence: 0.9,
    });
  });

  it('defaults device and intent fields to null', () => {
    const snapshot = buildContextSnapshot(new Date(2026, 2, 9, 9, 0));
    expect(snapshot.dayOfWeek).toBe('monday');
    expect(snapshot.isWeekend).toBe(false);
    expect(snapshot.batteryPercent).toBeNull();
    expect(snapshot.situation).toBeNull();
    expect(snapshot.recentActions).toEqual([]);
  });
});

describe('createContextProvider', () => {
  it('merges device signals with the caller input', () => {
    const provider = createContextProvider({
      clock: () => new Date(2026, 2, 10, 8, 30),
      readSignals: () => ({ batteryPercent: 64, isCharging: true, activeApp: 'editor' }),
    });

    const snapshot = provider.getCurrentContext({ situation: 'focused' });
    expect(snapshot.timeOfDay).toBe('morning');
    expect(snapshot.batteryPercent).toBe(64);
    expect(snapshot.isCharging).toBe(true);
    expect(snapshot.activeApp).toBe('editor');
    expect(snapshot.situation).toBe('focused');
  });
});

describe('parseContextSnapshot', () => {
  it('accepts a stored snapshot', () => {
    const snapshot = buildContextSnapshot(new Date(2026, 2, 10, 8, 30), { situation: 'x' });
    expect(parseContextSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it('rejects malformed JSON and invalid shapes', () => {
    expect(parseContextSnapshot(null)).toBeNull();
    expect(parseContextSnapshot('{not json')).toBeNull();
    expect(parseContextSnapshot(JSON.stringify({ hour: 30 }))).toBeNull();
  });
});

describe('contextSimilarity', () => {
  const base = buildContextSnapshot(new Date(2026, 2, 10, 23, 0), { situation: 'tired', batteryPercent: 40 });

  it('scores identical contexts at 1', () => {
    expect(contextSimilarity(base, base)).toBeCloseTo(1, 10);
  });

  it('gives time credit for the same bucket and none for a distant hour', () => {
    // 21:00 is still night
    const lateEvening = buildContextSnapshot(new Date(2026, 2, 10, 21, 0), { situation: 'tired', batteryPercent: 40 });
    expect(contextSimilarity(base, lateEvening)).toBeCloseTo(1, 10);

    // 20:30 is evening and three hours away
    const early = buildContextSnapshot(new Date(2026, 2, 10, 20, 30), { situation: 'tired', batteryPercent: 40 });
    expect(contextSimilarity(base, early)).toBeCloseTo(0.7, 10);
  });

  it('gives half time credit for a nearby hour in another bucket', () => {
    const morning = buildContextSnapshot(new Date(2026, 2, 10, 11, 0), { situation: 'tired', batteryPercent: 40 });
    const noon = buildContextSnapshot(new Date(2026, 2, 10, 12, 0), { situation: 'tired', batteryPercent: 40 });
    expect(contextSimilarity(noon, morning)).toBeCloseTo(0.85, 10);
  });

  it('weights battery closeness and skips it when unknown', () => {
    const drained = { ...base, batteryPercent: 90 };
    expect(contextSimilarity(base, drained)).toBeCloseTo(0.9 + 0.1 * 0.5, 10);

    const unknown = { ...base, batteryPercent: null };
    expect(contextSimilarity(base, unknown)).toBeCloseTo(0.9, 10);
  });

  it('drops day and situation credit when they differ', () => {
    // Saturday 23:00, different situation
    const other = buildContextSnapshot(new Date(2026, 2, 14, 23, 0), { situation: 'bored', batteryPercent: 40 });
    expect(contextSimilarity(base, other)).toBeCloseTo(0.3 + 0.1, 10);
  });
});
