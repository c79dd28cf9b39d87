/**
 * MARKET DATA MODULE INDEX
 *
 * Normalization and reconciliation of BLS, metals.dev and FRED series into
 * the canonical market_data store.
 */

import type { FastifyInstance } from 'fastify';
import { registerMarketDataRoutes, type MarketDataRouteDeps } from './api/market-data.routes.js';

export async function registerMarketDataModule(fastify: FastifyInstance, deps: MarketDataRouteDeps): Promise<void> {
  const enabled = deps.config.series.filter(s => deps.config.sources[s.source].enabled).map(s => s.seriesType);
  fastify.log.info({ enabled }, '[MarketData] Registering module');

  await registerMarketDataRoutes(fastify, deps);
}

export { RunCoordinator } from './run/run.coordinator.js';
export type { RunCoordinatorDeps, RunOptions } from './run/run.coordinator.js';
export { createSourceFetchers } from './run/source.fetchers.js';
export type { SourceFetcher, SourceFetchers } from './run/source.fetchers.js';
export { reconcile, applyDecision, gatewayLookup } from './reconcile/reconciler.js';
export { MongoStoreGateway } from './storage/mongo.store.gateway.js';
export { InMemoryStoreGateway } from './storage/memory.store.gateway.js';
export type { StoreGateway, SeriesQuery } from './storage/store.gateway.js';
export { startMarketDataCron, runScheduledIngest } from './jobs/market-data.cron.js';
export { MARKET_SERIES_REGISTRY, getMarketSeriesSpec, getDefaultMarketSeries } from './data/market_sources.registry.js';
export * from './contracts/market-data.contracts.js';
export type { MarketDataRouteDeps } from './api/market-data.routes.js';
