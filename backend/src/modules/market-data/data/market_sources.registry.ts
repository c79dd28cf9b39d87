/**
 * MARKET SOURCES REGISTRY
 *
 * Source of truth for which logical series is pulled from which source,
 * and under which source-side identifier.
 */

import type { SourceName } from '../contracts/market-data.contracts.js';

export type MarketFrequency = 'daily' | 'monthly';

export interface MarketSeriesSpec {
  seriesType: string;          // canonical key in market_data
  source: SourceName;
  sourceSeriesId: string;      // BLS series id, metal name, FRED series id
  displayName: string;
  frequency: MarketFrequency;
  units: string;
  enabledByDefault: boolean;
}

export const MARKET_SERIES_REGISTRY: readonly MarketSeriesSpec[] = [
  {
    seriesType: 'cpi',
    source: 'bls',
    sourceSeriesId: 'CUUR0000SA0',
    displayName: 'CPI-U, All Items (NSA)',
    frequency: 'monthly',
    units: 'index 1982-84=100',
    enabledByDefault: true,
  },
  {
    seriesType: 'gold',
    source: 'metals',
    sourceSeriesId: 'gold',
    displayName: 'Gold Spot',
    frequency: 'daily',
    units: 'USD/toz',
    enabledByDefault: true,
  },
  {
    seriesType: 'silver',
    source: 'metals',
    sourceSeriesId: 'silver',
    displayName: 'Silver Spot',
    frequency: 'daily',
    units: 'USD/toz',
    enabledByDefault: true,
  },
  {
    seriesType: 'fed_funds',
    source: 'fred',
    sourceSeriesId: 'FEDFUNDS',
    displayName: 'Fed Funds Rate',
    frequency: 'monthly',
    units: 'percent',
    enabledByDefault: true,
  },
  {
    seriesType: 'treasury_10y',
    source: 'fred',
    sourceSeriesId: 'DGS10',
    displayName: '10Y Treasury Yield',
    frequency: 'daily',
    units: 'percent',
    enabledByDefault: false,
  },
];

export function getMarketSeriesSpec(seriesType: string): MarketSeriesSpec | undefined {
  return MARKET_SERIES_REGISTRY.find(s => s.seriesType === seriesType);
}

export function getDefaultMarketSeries(): MarketSeriesSpec[] {
  return MARKET_SERIES_REGISTRY.filter(s => s.enabledByDefault);
}
