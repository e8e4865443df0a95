/**
 * @fileoverview Event Store contract
 *
 * The single persistence seam of the engine. Strategies receive an
 * `EventStore` through their constructor; the SQLite implementation lives in
 * event_store.ts and tests run it against `:memory:`.
 */

import type { ActionParams, ActionRecord, ContextSnapshot, Outcome } from '../types.js';

// ============================================================================
// ACTION HISTORY
// ============================================================================

export interface RecordActionInput {
  context: ContextSnapshot;
  /** Defaults to `context.situation` */
  situation?: string | null;
  action: string;
  params?: ActionParams;
  outcome: Outcome;
  durationMs?: number;
}

export interface ActionAggregate {
  total: number;
  successes: number;
  /** successes / total, 0 when there are no records */
  successRate: number;
  /** Mean duration of successful records only */
  avgDurationMs: number;
}

export interface LearningStats {
  totalActions: number;
  uniqueSituations: number;
  uniqueActions: number;
  successRate: number;
  avgDurationMs: number;
}

export interface RecentAction {
  action: string;
  timestamp: string;
  situation: string | null;
}

export interface SituationCount {
  situation: string;
  count: number;
}

export interface ActionFrequency {
  action: string;
  frequency: number;
  successRate: number;
}

export interface TimelineEntry {
  action: string;
  timestamp: string;
}

export interface ActionUse {
  params: ActionParams;
  contextJson: string | null;
}

// ============================================================================
// VALUE TABLE
// ============================================================================

export interface ValueEntry {
  stateHash: string;
  action: string;
  value: number;
  updateCount: number;
  lastUpdated: string;
}

// ============================================================================
// EXEMPLARS
// ============================================================================

export interface NewExemplar {
  text: string;
  embedding: Float32Array;
  action: string;
  situation: string | null;
}

export interface Exemplar extends NewExemplar {
  id: number;
  dimension: number;
  successCount: number;
  createdAt: string;
}

export interface ExemplarStats {
  totalExamples: number;
  uniqueSituations: number;
  totalUses: number;
}

// ============================================================================
// TRANSFERS
// ============================================================================

export type TransferPatternType = 'action_transfer';

export interface NewTransfer {
  sourceSituation: string;
  targetSituation: string;
  patternType: TransferPatternType;
  action: string;
  confidence: number;
}

export interface TransferStats {
  totalTransfers: number;
  uniqueTargets: number;
  avgConfidence: number;
}

// ============================================================================
// STORE
// ============================================================================

export interface EventStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
  isInitialized(): boolean;

  /** Append an Action Record; returns its id */
  record(input: RecordActionInput): Promise<number>;
  /** Successful records of `situation`, closest context first */
  querySimilar(context: ContextSnapshot, situation: string, limit: number): Promise<ActionRecord[]>;
  aggregate(situation: string, action: string): Promise<ActionAggregate>;
  /** Delete records older than the window; returns the number removed */
  prune(retentionDays: number): Promise<number>;
  recentActions(limit: number): Promise<RecentAction[]>;
  learningStats(): Promise<LearningStats>;
  topSituations(limit: number): Promise<SituationCount[]>;
  /** Success counts per situation, excluding `exclude`, at least `minSuccesses` */
  situationFrequencies(exclude: string, minSuccesses: number): Promise<SituationCount[]>;
  transferableActions(
    source: string,
    minSuccessRate: number,
    minFrequency: number,
    limit: number
  ): Promise<ActionFrequency[]>;
  /** Newest-first successful actions */
  successfulTimeline(limit: number): Promise<TimelineEntry[]>;
  successfulRecordsForAction(action: string, limit: number): Promise<ActionUse[]>;

  loadValues(): Promise<ValueEntry[]>;
  upsertValue(stateHash: string, action: string, value: number): Promise<void>;
  topValues(limit: number): Promise<ValueEntry[]>;
  resetValues(): Promise<number>;

  findExemplar(situation: string | null, action: string): Promise<Exemplar | null>;
  insertExemplar(exemplar: NewExemplar): Promise<number>;
  incrementExemplar(id: number): Promise<void>;
  /** All exemplars, or only those of `situation` when given */
  listExemplars(situation?: string | null): Promise<Exemplar[]>;
  exemplarStats(): Promise<ExemplarStats>;

  insertTransfer(transfer: NewTransfer): Promise<number>;
  transferStats(): Promise<TransferStats>;
}
