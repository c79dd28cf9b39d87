/**
 * OBSERVATION NORMALIZER
 *
 * Stateless date/value coercion shared by the source adapters.
 */

import { ObservationParseError } from '../../../common/errors.js';
import type { Observation, RawPayload } from '../contracts/market-data.contracts.js';

const MONTH_CODE = /^M(0[1-9]|1[0-2])$/;
const DECIMAL = /^[+-]?\d+(\.\d+)?$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MISSING_VALUE_SENTINEL = '.';

// ═══════════════════════════════════════════════════════════════
// PERIODS & DATES
// ═══════════════════════════════════════════════════════════════

/**
 * `M01`..`M12` map to 1..12. Every other code (M13 annual average,
 * semiannual S01, quarterly Q01, ...) falls back to January.
 */
export function periodCodeToMonth(code: string): number {
  const match = MONTH_CODE.exec(code.trim());
  return match ? Number(match[1]) : 1;
}

export function isExplicitMonthCode(code: string): boolean {
  return MONTH_CODE.test(code.trim());
}

export function toIsoDate(year: number, month: number, day = 1): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const probe = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    probe.getUTCFullYear() === Number(y) &&
    probe.getUTCMonth() === Number(m) - 1 &&
    probe.getUTCDate() === Number(d)
  );
}

/**
 * Calendar-date part of an ISO-8601 timestamp, as written by the source.
 * The time of day and any offset are discarded, not converted.
 */
export function truncateTimestampToDate(timestamp: string): string | null {
  const datePart = timestamp.trim().split('T')[0] ?? '';
  return isIsoDate(datePart) ? datePart : null;
}

// ═══════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════

export function isBlankOrSentinel(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) return true;
  const trimmed = raw.trim();
  return trimmed === '' || trimmed === MISSING_VALUE_SENTINEL;
}

export function parseDecimal(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new ObservationParseError(String(raw), `not a finite number: ${raw}`);
    }
    return raw;
  }
  if (isBlankOrSentinel(raw)) {
    throw new ObservationParseError(raw, `no value published: "${raw}"`);
  }
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new ObservationParseError(raw, `not a decimal: "${raw}"`);
  }
  return Number(trimmed);
}

// ═══════════════════════════════════════════════════════════════
// OBSERVATION FACTORY
// ═══════════════════════════════════════════════════════════════

export function createObservation(fields: {
  seriesType: string;
  date: string;
  value: number;
  high?: number;
  low?: number;
  rawPayload: RawPayload;
}): Observation {
  return Object.freeze({
    seriesType: fields.seriesType,
    date: fields.date,
    value: fields.value,
    high: fields.high ?? fields.value,
    low: fields.low ?? fields.value,
    rawPayload: fields.rawPayload,
  });
}
