/**
 * Ingest configuration
 *
 * The explicit value handed to the run coordinator and the source clients.
 * A fixed set of options: per-source enable flag and credential, the store
 * descriptor, and run tuning.
 */

import type { SourceName } from '../modules/market-data/contracts/market-data.contracts.js';
import {
  getDefaultMarketSeries,
  type MarketSeriesSpec,
} from '../modules/market-data/data/market_sources.registry.js';
import type { Env } from './env.js';

export interface SourceSettings {
  enabled: boolean;
  apiKey?: string;
}

export interface StoreDescriptor {
  mongoUrl: string;
  dbName: string;
}

export interface IngestConfig {
  sources: Record<SourceName, SourceSettings>;
  store: StoreDescriptor;
  series: MarketSeriesSpec[];
  parallelSeries: boolean;
  httpTimeoutMs: number;
}

export function buildIngestConfig(
  env: Env,
  series: MarketSeriesSpec[] = getDefaultMarketSeries()
): IngestConfig {
  return {
    sources: {
      bls: { enabled: env.BLS_ENABLED, apiKey: env.BLS_API_KEY },
      metals: { enabled: env.METALS_ENABLED, apiKey: env.METALS_API_KEY },
      fred: { enabled: env.FRED_ENABLED, apiKey: env.FRED_API_KEY },
    },
    store: { mongoUrl: env.MONGO_URL, dbName: env.DB_NAME },
    series,
    parallelSeries: env.INGEST_PARALLEL_SERIES,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
  };
}

export function enabledSeries(config: IngestConfig): MarketSeriesSpec[] {
  return config.series.filter(s => config.sources[s.source].enabled);
}
