/**
 * Database Indexes
 * Run this on startup or via migration script
 */

import type { Logger } from '../common/logger.js';
import { MarketDataPointModel } from '../modules/market-data/storage/market_data.model.js';
import { mongoose } from './mongoose.js';

export async function ensureIndexes(logger: Logger): Promise<void> {
  if (!mongoose.connection.db) {
    logger.warn({}, '[DB] No database connection, skipping indexes');
    return;
  }

  // market_data: unique (seriesType, date) backs the no-duplicate guarantee,
  // so a failure here must stop startup.
  await MarketDataPointModel.createIndexes();
  logger.info({ collection: 'market_data' }, '[DB] market_data indexes ensured');
}
