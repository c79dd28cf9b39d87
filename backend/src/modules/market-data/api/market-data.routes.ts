/**
 * MARKET DATA ROUTES
 *
 * Endpoints:
 * - POST /api/market-data/admin/ingest       run one ingest now
 * - GET  /api/market-data/series/:seriesType  stored points, newest first
 * - GET  /api/market-data/sources             configured series and source state
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../../common/errors.js';
import type { IngestConfig } from '../../../config/ingest.config.js';
import { getMarketSeriesSpec } from '../data/market_sources.registry.js';
import type { RunCoordinator } from '../run/run.coordinator.js';
import type { StoreGateway } from '../storage/store.gateway.js';

export interface MarketDataRouteDeps {
  config: IngestConfig;
  coordinator: RunCoordinator;
  gateway: StoreGateway;
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const SeriesQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  limit: z.coerce.number().int().min(1).max(5000).optional(),
});

const SeriesParamsSchema = z.object({
  seriesType: z.string().min(1),
});

function parseOrThrow<T>(schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '), 400);
  }
  return parsed.data;
}

export async function registerMarketDataRoutes(fastify: FastifyInstance, deps: MarketDataRouteDeps): Promise<void> {
  const { config, coordinator, gateway } = deps;

  // ═══════════════════════════════════════════════════════════════
  // POST /api/market-data/admin/ingest
  // ═══════════════════════════════════════════════════════════════

  fastify.post('/api/market-data/admin/ingest', async () => {
    const summary = await coordinator.run();
    return { ok: true, summary };
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/market-data/series/:seriesType
  // ═══════════════════════════════════════════════════════════════

  fastify.get('/api/market-data/series/:seriesType', async req => {
    const { seriesType } = parseOrThrow(SeriesParamsSchema, req.params);
    const query = parseOrThrow(SeriesQuerySchema, req.query);

    const spec = config.series.find(s => s.seriesType === seriesType) ?? getMarketSeriesSpec(seriesType);
    if (!spec) {
      throw new AppError('UNKNOWN_SERIES', `Unknown series: ${seriesType}`, 404);
    }

    const points = await gateway.listSeries(seriesType, query);
    return {
      ok: true,
      seriesType,
      displayName: spec.displayName,
      units: spec.units,
      count: points.length,
      points: points.map(p => ({ date: p.date, value: p.value, high: p.high, low: p.low })),
    };
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/market-data/sources
  // ═══════════════════════════════════════════════════════════════

  fastify.get('/api/market-data/sources', async () => ({
    ok: true,
    running: coordinator.isRunning(),
    series: config.series.map(s => ({
      seriesType: s.seriesType,
      source: s.source,
      sourceSeriesId: s.sourceSeriesId,
      frequency: s.frequency,
      enabled: config.sources[s.source].enabled,
      credentialed: s.source === 'bls' || Boolean(config.sources[s.source].apiKey),
    })),
  }));

  fastify.log.info('[MarketData] Routes registered at /api/market-data/*');
}

export default registerMarketDataRoutes;
