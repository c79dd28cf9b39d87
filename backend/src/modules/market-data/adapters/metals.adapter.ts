/**
 * METALS ADAPTER
 *
 * metals.dev spot reading: one rate object, one timestamp, one observation.
 * The timestamp's calendar date is authoritative even though the source is
 * polled more than once a day; later polls on the same date revise it.
 */

import { PayloadShapeError, errorMessage } from '../../../common/errors.js';
import { MetalsSpotResponseSchema } from '../contracts/source.payloads.js';
import { createObservation, parseDecimal, truncateTimestampToDate } from '../normalize/observation.normalizer.js';
import { parsePayload, type SourceAdapter } from './source.adapter.js';

function readNumber(field: string, raw: string | number): number {
  try {
    return parseDecimal(raw);
  } catch (err) {
    throw new PayloadShapeError('metals', [`rate.${field}: ${errorMessage(err)}`]);
  }
}

export const metalsAdapter: SourceAdapter = {
  source: 'metals',

  produce(payload: unknown, seriesType: string) {
    const body = parsePayload('metals', MetalsSpotResponseSchema, payload);

    const date = truncateTimestampToDate(body.timestamp);
    if (!date) {
      throw new PayloadShapeError('metals', [`timestamp: not an ISO-8601 date "${body.timestamp}"`]);
    }

    const price = readNumber('price', body.rate.price);
    const high = body.rate.high === null || body.rate.high === undefined ? price : readNumber('high', body.rate.high);
    const low = body.rate.low === null || body.rate.low === undefined ? price : readNumber('low', body.rate.low);

    return [
      createObservation({
        seriesType,
        date,
        value: price,
        high,
        low,
        rawPayload: body,
      }),
    ];
  },
};
