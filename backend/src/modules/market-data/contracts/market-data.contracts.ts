/**
 * MARKET DATA CONTRACTS
 *
 * Canonical shapes shared by adapters, reconciler, store gateway and the
 * run coordinator.
 */

// ═══════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════

export type SourceName = 'bls' | 'metals' | 'fred';

export const SOURCE_NAMES: readonly SourceName[] = ['bls', 'metals', 'fred'];

export type RawPayload = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════
// OBSERVATION: adapter output
// ═══════════════════════════════════════════════════════════════

export interface Observation {
  readonly seriesType: string;
  readonly date: string;          // YYYY-MM-DD
  readonly value: number;
  readonly high: number;
  readonly low: number;
  readonly rawPayload: RawPayload;
}

// ═══════════════════════════════════════════════════════════════
// STORE SIDE
// ═══════════════════════════════════════════════════════════════

export type RecordId = string;

export interface ExistingRecord extends Observation {
  readonly id: RecordId;
}

export interface InsertRecord {
  seriesType: string;
  date: string;
  value: number;
  high: number;
  low: number;
  rawPayload: RawPayload;
}

export type ValueUpdate = Pick<InsertRecord, 'value' | 'high' | 'low' | 'rawPayload'>;

export type ExistingLookup = (seriesType: string, date: string) => Promise<ExistingRecord | null>;

// ═══════════════════════════════════════════════════════════════
// RECONCILIATION DECISION
// ═══════════════════════════════════════════════════════════════

export type NoOpReason = 'unchanged';

export type ReconciliationDecision =
  | { kind: 'INSERT'; observation: Observation }
  | { kind: 'UPDATE_VALUE'; id: RecordId; observation: Observation; previousValue: number }
  | { kind: 'NOOP'; observation: Observation; reason: NoOpReason };

export type ApplyOutcome = 'inserted' | 'updated' | 'unchanged';

// ═══════════════════════════════════════════════════════════════
// RUN SUMMARY
// ═══════════════════════════════════════════════════════════════

export interface SeriesCounts {
  inserted: number;
  updated: number;
  unchanged: number;
  skipped: number;
}

export interface SourceOutcome {
  source: SourceName;
  seriesType: string;
  ok: boolean;
  observations: number;
  dropped: number;
  error?: string;
  errorCode?: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  aborted: boolean;
  series: Record<string, SeriesCounts>;
  sources: SourceOutcome[];
}

export function emptyCounts(): SeriesCounts {
  return { inserted: 0, updated: 0, unchanged: 0, skipped: 0 };
}
