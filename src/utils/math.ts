/**
 * @fileoverview Math utilities shared by the learners.
 */

/**
 * Clamp a value to [0, 1]. Every confidence handed to callers passes through here.
 * NaN maps to 0.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Jaccard overlap of two sets: |a ∩ b| / |a ∪ b|.
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection += 1;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Most frequent value; ties go to the value seen first.
 * Values are compared by their JSON encoding so objects and arrays count too.
 */
export function mostFrequent<T>(values: readonly T[]): { value: T; count: number } | null {
  const counts = new Map<string, { value: T; count: number }>();
  for (const value of values) {
    const key = JSON.stringify(value) ?? 'undefined';
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }
  let best: { value: T; count: number } | null = null;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) best = entry;
  }
  return best;
}
