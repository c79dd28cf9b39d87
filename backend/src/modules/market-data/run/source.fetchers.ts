/**
 * Binds each source name to its transport client.
 */

import { BlsClient, FredClient, MetalsClient, type SourceClientConfig } from '../../../clients/index.js';
import type { IngestConfig } from '../../../config/ingest.config.js';
import type { SourceName } from '../contracts/market-data.contracts.js';

export type SourceFetcher = (sourceSeriesId: string) => Promise<unknown>;

export type SourceFetchers = Record<SourceName, SourceFetcher>;

export function createSourceFetchers(
  config: IngestConfig,
  transport: Partial<Pick<SourceClientConfig, 'adapter'>> = {}
): SourceFetchers {
  const timeout = config.httpTimeoutMs;

  const bls = new BlsClient({ timeout, apiKey: config.sources.bls.apiKey, ...transport });
  const metals = new MetalsClient({ timeout, apiKey: config.sources.metals.apiKey, ...transport });
  const fred = new FredClient({ timeout, apiKey: config.sources.fred.apiKey, ...transport });

  return {
    bls: id => bls.fetchSeries(id),
    metals: id => metals.fetchSpot(id),
    fred: id => fred.fetchObservations(id),
  };
}
