/**
 * SOURCE ADAPTER CONTRACT
 *
 * One adapter per external source. An adapter is a pure mapping from a
 * decoded payload to canonical observations: no I/O, no clock, no store.
 */

import type { z } from 'zod';
import { PayloadShapeError } from '../../../common/errors.js';
import type { Observation, SourceName } from '../contracts/market-data.contracts.js';
import { formatIssues } from '../contracts/source.payloads.js';

export interface DroppedEntry {
  index: number;
  reason: string;
  raw: unknown;
}

export interface AdapterDiagnostics {
  onDrop?: (entry: DroppedEntry) => void;
}

export interface SourceAdapter {
  readonly source: SourceName;
  produce(payload: unknown, seriesType: string, diagnostics?: AdapterDiagnostics): Observation[];
}

/**
 * Validate the top-level payload; a mismatch fails the whole call.
 */
export function parsePayload<S extends z.ZodTypeAny>(
  source: SourceName,
  schema: S,
  payload: unknown
): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadShapeError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// PER-RUN DEDUPLICATION
// ═══════════════════════════════════════════════════════════════

/**
 * Keeps one observation per date. A candidate replaces the held one only
 * when its rank is strictly higher, so among equals the first one wins.
 */
export class ObservationDeduper {
  private readonly byDate = new Map<string, { observation: Observation; rank: number; index: number }>();

  constructor(private readonly diagnostics?: AdapterDiagnostics) {}

  offer(observation: Observation, index: number, raw: unknown, rank = 0): void {
    const held = this.byDate.get(observation.date);
    if (!held) {
      this.byDate.set(observation.date, { observation, rank, index });
      return;
    }
    if (rank > held.rank) {
      this.diagnostics?.onDrop?.({
        index: held.index,
        reason: `duplicate period ${observation.date}, superseded by entry ${index}`,
        raw: held.observation.rawPayload,
      });
      this.byDate.set(observation.date, { observation, rank, index });
      return;
    }
    this.diagnostics?.onDrop?.({
      index,
      reason: `duplicate period ${observation.date}, kept entry ${held.index}`,
      raw,
    });
  }

  values(): Observation[] {
    return [...this.byDate.values()]
      .sort((a, b) => a.index - b.index)
      .map(h => h.observation);
  }
}
