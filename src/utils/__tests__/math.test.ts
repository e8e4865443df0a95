import { describe, it, expect } from 'vitest';
import { clamp01, jaccard, mostFrequent } from '../math.js';

describe('clamp01', () => {
  it('bounds values and maps NaN to 0', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.4)).toBe(0.4);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe('jaccard', () => {
  it('divides the intersection by the union', () => {
    expect(jaccard(new Set(['late', 'night']), new Set(['late', 'night', 'work']))).toBeCloseTo(2 / 3, 10);
    expect(jaccard(new Set(['a']), new Set(['b']))).toBe(0);
    expect(jaccard(new Set(), new Set())).toBe(0);
  });
});

describe('mostFrequent', () => {
  it('counts structurally equal values together and keeps the first on ties', () => {
    expect(mostFrequent([{ v: 1 }, { v: 2 }, { v: 1 }])).toEqual({ value: { v: 1 }, count: 2 });
    expect(mostFrequent(['a', 'b'])).toEqual({ value: 'a', count: 1 });
    expect(mostFrequent([])).toBeNull();
  });
});
