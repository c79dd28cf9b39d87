/**
 * Helpers behind scripts/run-market-data-ingest.ts
 */

import { ConfigError } from '../../../common/errors.js';
import type { RunSummary } from '../contracts/market-data.contracts.js';
import {
  MARKET_SERIES_REGISTRY,
  getDefaultMarketSeries,
  type MarketSeriesSpec,
} from '../data/market_sources.registry.js';

export interface IngestCliArgs {
  dryRun: boolean;
  series: MarketSeriesSpec[];
}

/**
 * `--dry-run` reconciles against an in-memory store.
 * `--series cpi,gold` restricts the run; unknown names are rejected.
 */
export function parseIngestArgs(argv: string[]): IngestCliArgs {
  let dryRun = false;
  let series = getDefaultMarketSeries();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--series' || arg.startsWith('--series=')) {
      const list = arg === '--series' ? argv[++i] : arg.slice('--series='.length);
      if (!list) {
        throw new ConfigError('--series needs a comma-separated list');
      }
      series = list.split(',').map(name => {
        const spec = MARKET_SERIES_REGISTRY.find(s => s.seriesType === name.trim());
        if (!spec) {
          const known = MARKET_SERIES_REGISTRY.map(s => s.seriesType).join(', ');
          throw new ConfigError(`Unknown series "${name}". Known: ${known}`);
        }
        return spec;
      });
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return { dryRun, series };
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = Object.entries(summary.series).map(
    ([seriesType, c]) =>
      `${seriesType}: ${c.inserted} new, ${c.updated} updated, ${c.unchanged} unchanged, ${c.skipped} skipped`
  );
  for (const s of summary.sources.filter(o => !o.ok)) {
    lines.push(`${s.seriesType} (${s.source}) skipped: ${s.error ?? 'unknown error'}`);
  }
  if (summary.aborted) {
    lines.push('run aborted before completion');
  }
  return lines;
}
