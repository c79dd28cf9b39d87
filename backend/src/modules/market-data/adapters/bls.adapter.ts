/**
 * BLS ADAPTER
 *
 * Labor-statistics time series (e.g. CPI-U, CUUR0000SA0).
 * Each data point carries a year and a period code; monthly points land
 * on the first day of their month.
 */

import { errorMessage } from '../../../common/errors.js';
import { BlsDataPointSchema, BlsResponseSchema } from '../contracts/source.payloads.js';
import {
  createObservation,
  isBlankOrSentinel,
  isExplicitMonthCode,
  parseDecimal,
  periodCodeToMonth,
  toIsoDate,
} from '../normalize/observation.normalizer.js';
import { ObservationDeduper, parsePayload, type AdapterDiagnostics, type SourceAdapter } from './source.adapter.js';

const YEAR = /^\d{4}$/;

// Explicit month codes outrank fallback-mapped periods on the same date.
const RANK_MONTH = 1;
const RANK_FALLBACK = 0;

export const blsAdapter: SourceAdapter = {
  source: 'bls',

  produce(payload: unknown, seriesType: string, diagnostics?: AdapterDiagnostics) {
    const body = parsePayload('bls', BlsResponseSchema, payload);
    const entries = body.Results.series[0]?.data ?? [];
    const deduper = new ObservationDeduper(diagnostics);

    entries.forEach((entry, index) => {
      const drop = (reason: string) => diagnostics?.onDrop?.({ index, reason, raw: entry });

      const point = BlsDataPointSchema.safeParse(entry);
      if (!point.success) {
        drop('malformed data point');
        return;
      }
      const { year, period, value } = point.data;

      // Blank value: period not published yet, not a zero reading
      if (value === null || value === undefined || isBlankOrSentinel(value)) {
        drop(`no value published for ${year} ${period}`);
        return;
      }
      if (!YEAR.test(year.trim())) {
        drop(`invalid year "${year}"`);
        return;
      }

      let parsed: number;
      try {
        parsed = parseDecimal(value);
      } catch (err) {
        drop(errorMessage(err));
        return;
      }

      const observation = createObservation({
        seriesType,
        date: toIsoDate(Number(year.trim()), periodCodeToMonth(period)),
        value: parsed,
        rawPayload: point.data,
      });
      deduper.offer(observation, index, entry, isExplicitMonthCode(period) ? RANK_MONTH : RANK_FALLBACK);
    });

    return deduper.values();
  },
};
