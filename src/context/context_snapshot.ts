/**
 * @fileoverview Context snapshots
 *
 * Derives the temporal fields of a ContextSnapshot from a clock reading and
 * scores how alike two snapshots are. Device signals (battery, foreground app)
 * come from the host through a `DeviceSignalReader`; the engine never probes
 * the OS itself.
 */

import { z } from 'zod';
import type { ContextSnapshot, DayOfWeek, TimeOfDay } from '../types.js';
import { safeJsonParse } from '../utils/safe_json.js';

// ============================================================================
// SCHEMA
// ============================================================================

const DAYS: readonly DayOfWeek[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
];

export const ContextSnapshotSchema: z.ZodType<ContextSnapshot, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.string().min(1),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  dayOfWeek: z.enum(['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday']),
  isWeekend: z.boolean(),
  timeOfDay: z.enum(['morning', 'afternoon', 'evening', 'night']),
  batteryPercent: z.number().min(0).max(100).nullable(),
  isCharging: z.boolean().nullable(),
  activeApp: z.string().nullable().default(null),
  recentActions: z.array(z.string()).default([]),
  situation: z.string().nullable().default(null),
  detectionConfidence: z.number().nullable().default(null),
});

/**
 * Parse a stored snapshot. Returns null for malformed JSON or a shape that
 * fails validation.
 */
export function parseContextSnapshot(json: string | null): ContextSnapshot | null {
  if (!json) return null;
  const parsed = safeJsonParse(json);
  if (!parsed.ok) return null;
  const validated = ContextSnapshotSchema.safeParse(parsed.value);
  return validated.success ? validated.data : null;
}

// ============================================================================
// DERIVED FIELDS
// ============================================================================

export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 17) return 'afternoon';
  if (hour >= 17 && hour < 21) return 'evening';
  return 'night';
}

export interface DeviceSignals {
  batteryPercent: number | null;
  isCharging: boolean | null;
  activeApp: string | null;
}

export interface SnapshotInput extends Partial<DeviceSignals> {
  situation?: string | null;
  detectionConfidence?: number | null;
  recentActions?: string[];
}

/**
 * Build a snapshot for `now` (local time).
 */
export function buildContextSnapshot(now: Date, input: SnapshotInput = {}): ContextSnapshot {
  const hour = now.getHours();
  const day = now.getDay();
  return {
    timestamp: now.toISOString(),
    hour,
    minute: now.getMinutes(),
    dayOfWeek: DAYS[day] ?? 'sunday',
    isWeekend: day === 0 || day === 6,
    timeOfDay: timeOfDayForHour(hour),
    batteryPercent: input.batteryPercent ?? null,
    isCharging: input.isCharging ?? null,
    activeApp: input.activeApp ?? null,
    recentActions: input.recentActions ? [...input.recentActions] : [],
    situation: input.situation ?? null,
    detectionConfidence: input.detectionConfidence ?? null,
  };
}

// ============================================================================
// PROVIDER
// ============================================================================

export type DeviceSignalReader = () => DeviceSignals;

export interface ContextProvider {
  getCurrentContext(input?: Omit<SnapshotInput, keyof DeviceSignals>): ContextSnapshot;
}

const NO_SIGNALS: DeviceSignals = { batteryPercent: null, isCharging: null, activeApp: null };

/**
 * Context provider reading device signals from the host. Without a reader the
 * device fields stay null.
 */
export function createContextProvider(options: {
  readSignals?: DeviceSignalReader;
  clock?: () => Date;
} = {}): ContextProvider {
  const readSignals = options.readSignals ?? (() => NO_SIGNALS);
  const clock = options.clock ?? (() => new Date());
  return {
    getCurrentContext(input = {}) {
      return buildContextSnapshot(clock(), { ...readSignals(), ...input });
    },
  };
}

// ============================================================================
// SIMILARITY
// ============================================================================

export const CONTEXT_SIMILARITY_WEIGHTS = {
  timeOfDay: 0.3,
  nearbyHour: 0.15,
  dayOfWeek: 0.2,
  weekend: 0.1,
  battery: 0.1,
  situation: 0.3,
} as const;

/**
 * Weighted similarity of two snapshots in [0, 1]. The weights are not a
 * partition: a same-bucket match scores the full 0.3 and a near hour only 0.15.
 */
export function contextSimilarity(current: ContextSnapshot, past: ContextSnapshot): number {
  const w = CONTEXT_SIMILARITY_WEIGHTS;
  let score = 0;

  if (current.timeOfDay === past.timeOfDay) {
    score += w.timeOfDay;
  } else if (Math.abs(current.hour - past.hour) <= 2) {
    score += w.nearbyHour;
  }

  if (current.dayOfWeek === past.dayOfWeek) score += w.dayOfWeek;
  if (current.isWeekend === past.isWeekend) score += w.weekend;

  if (current.batteryPercent !== null && past.batteryPercent !== null) {
    const diff = Math.abs(current.batteryPercent - past.batteryPercent);
    score += w.battery * (1 - diff / 100);
  }

  if (current.situation === past.situation) score += w.situation;

  return score;
}

