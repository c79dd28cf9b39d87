/**
 * SOURCE PAYLOADS
 *
 * Decoded response bodies as the transport clients hand them over.
 * Only the fields the adapters read are required; everything else passes
 * through untouched into rawPayload.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// BLS: public API v1, timeseries/data
// ═══════════════════════════════════════════════════════════════

export const BlsDataPointSchema = z
  .object({
    year: z.string(),
    period: z.string(),
    periodName: z.string().optional(),
    value: z.string().nullish(),
  })
  .passthrough();

export const BlsResponseSchema = z
  .object({
    status: z.string().optional(),
    message: z.array(z.string()).optional(),
    Results: z.object({
      series: z
        .array(
          z
            .object({
              seriesID: z.string().optional(),
              data: z.array(z.unknown()),
            })
            .passthrough()
        )
        .min(1, 'no series entries'),
    }),
  })
  .passthrough();

export type BlsDataPoint = z.infer<typeof BlsDataPointSchema>;
export type BlsResponse = z.infer<typeof BlsResponseSchema>;

// ═══════════════════════════════════════════════════════════════
// METALS.DEV: v1/metal/spot
// ═══════════════════════════════════════════════════════════════

const numeric = z.union([z.number(), z.string()]);

export const MetalsSpotResponseSchema = z
  .object({
    status: z.string().optional(),
    metal: z.string().optional(),
    currency: z.string().optional(),
    unit: z.string().optional(),
    timestamp: z.string().min(1),
    rate: z
      .object({
        price: numeric,
        high: numeric.nullish(),
        low: numeric.nullish(),
      })
      .passthrough(),
  })
  .passthrough();

export type MetalsSpotResponse = z.infer<typeof MetalsSpotResponseSchema>;

// ═══════════════════════════════════════════════════════════════
// FRED: series/observations
// ═══════════════════════════════════════════════════════════════

export const FredObservationSchema = z
  .object({
    date: z.string(),
    value: z.string(),
  })
  .passthrough();

export const FredSeriesResponseSchema = z
  .object({
    observations: z.array(z.unknown()),
  })
  .passthrough();

export type FredObservation = z.infer<typeof FredObservationSchema>;
export type FredSeriesResponse = z.infer<typeof FredSeriesResponseSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}
