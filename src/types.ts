/**
 * @fileoverview Shared record shapes for the action engine
 *
 * These are the only structures passed between strategies: the context
 * snapshot a decision is made in, the stored action history, and the
 * transient Prediction every strategy produces.
 */

// ============================================================================
// CONTEXT
// ============================================================================

export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'night';

export type DayOfWeek =
  | 'sunday'
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday';

/**
 * Structured snapshot of time, device and recent-activity signals.
 */
export interface ContextSnapshot {
  /** ISO-8601 capture time */
  timestamp: string;
  /** Local hour, 0-23 */
  hour: number;
  minute: number;
  dayOfWeek: DayOfWeek;
  isWeekend: boolean;
  timeOfDay: TimeOfDay;
  /** 0-100, null when the device reports no battery */
  batteryPercent: number | null;
  isCharging: boolean | null;
  activeApp: string | null;
  /** Most recent action identifiers, oldest first */
  recentActions: string[];
  /** Situation detected by the intent classifier, when known */
  situation: string | null;
  detectionConfidence: number | null;
}

// ============================================================================
// OUTCOMES & HISTORY
// ============================================================================

export type Outcome = 'success' | 'failure' | 'canceled';

/** Numeric encoding used by the action history table */
export const OUTCOME_CODES: Readonly<Record<Outcome, number>> = {
  success: 1,
  failure: 0,
  canceled: -1,
};

/** Opaque, JSON-serializable action parameters */
export type ActionParams = Record<string, unknown>;

/**
 * One executed (or user-taught) action. Immutable once written.
 */
export interface ActionRecord {
  id: number;
  timestamp: string;
  hour: number | null;
  dayOfWeek: string | null;
  isWeekend: boolean;
  timeOfDay: string | null;
  batteryPercent: number | null;
  situation: string | null;
  action: string;
  params: ActionParams;
  /** 1 success, 0 failure, -1 canceled */
  outcomeCode: number;
  durationMs: number;
  /** Raw serialized snapshot; validated when read by a strategy */
  contextJson: string | null;
  createdAt: string;
}

// ============================================================================
// PREDICTIONS
// ============================================================================

export type PredictionSource =
  | 'reinforcement_learning'
  | 'few_shot'
  | 'meta_learning'
  | 'knn'
  | 'user_taught';

/**
 * A strategy's proposal for the next action. Never persisted.
 */
export interface Prediction {
  action: string;
  /** Always within [0, 1] */
  confidence: number;
  params: ActionParams;
  source: PredictionSource;
  /** Human-readable justification */
  reason: string;
  /** Strategy-specific evidence (Q-value, similarity, sample size, ...) */
  details?: Readonly<Record<string, string | number>>;
  /** Set by the orchestrator when the user should disambiguate */
  askUser?: boolean;
  /** Ranked candidates to show the user when askUser is set */
  options?: Prediction[];
}
