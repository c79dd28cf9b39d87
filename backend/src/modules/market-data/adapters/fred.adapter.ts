/**
 * FRED ADAPTER
 *
 * series/observations payload: date/value pairs already in calendar form.
 * FRED uses "." for missing values.
 */

import { errorMessage } from '../../../common/errors.js';
import { FredObservationSchema, FredSeriesResponseSchema } from '../contracts/source.payloads.js';
import { createObservation, isIsoDate, parseDecimal } from '../normalize/observation.normalizer.js';
import { ObservationDeduper, parsePayload, type AdapterDiagnostics, type SourceAdapter } from './source.adapter.js';

export const fredAdapter: SourceAdapter = {
  source: 'fred',

  produce(payload: unknown, seriesType: string, diagnostics?: AdapterDiagnostics) {
    const body = parsePayload('fred', FredSeriesResponseSchema, payload);
    const deduper = new ObservationDeduper(diagnostics);

    body.observations.forEach((entry, index) => {
      const drop = (reason: string) => diagnostics?.onDrop?.({ index, reason, raw: entry });

      const point = FredObservationSchema.safeParse(entry);
      if (!point.success) {
        drop('malformed observation');
        return;
      }
      const { date, value } = point.data;

      if (!isIsoDate(date)) {
        drop(`invalid date "${date}"`);
        return;
      }

      let parsed: number;
      try {
        parsed = parseDecimal(value);
      } catch (err) {
        drop(errorMessage(err));
        return;
      }

      deduper.offer(createObservation({ seriesType, date, value: parsed, rawPayload: point.data }), index, entry);
    });

    return deduper.values();
  },
};
