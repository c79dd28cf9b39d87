/**
 * Market data backend entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { errorMessage } from './common/errors.js';
import { createLogger } from './common/logger.js';
import { loadEnv } from './config/env.js';
import { buildIngestConfig } from './config/ingest.config.js';
import { connectMongo, disconnectMongo, isMongoConnected } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { buildApp } from './app.js';
import {
  MongoStoreGateway,
  RunCoordinator,
  createSourceFetchers,
  startMarketDataCron,
} from './modules/market-data/index.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const config = buildIngestConfig(env);

  logger.info({ dbName: config.store.dbName }, '[Boot] Connecting to MongoDB...');
  await connectMongo(config.store, logger);
  await ensureIndexes(logger);

  const gateway = new MongoStoreGateway();
  const coordinator = new RunCoordinator(config, {
    gateway,
    fetchers: createSourceFetchers(config),
    logger,
  });

  const app = buildApp({
    env,
    marketData: { config, coordinator, gateway },
    isStoreConnected: isMongoConnected,
  });

  const cronTask = env.INGEST_CRON_ENABLED
    ? startMarketDataCron(coordinator, { expression: env.INGEST_CRON, logger })
    : null;

  const shutdown = async (signal: string) => {
    logger.info({ signal }, '[Boot] Shutting down...');
    cronTask?.stop();
    await app.close();
    await disconnectMongo();
    logger.info({}, '[Boot] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(err => {
      logger.error({ err: errorMessage(err) }, '[Boot] Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  logger.info({ port: env.PORT, cron: env.INGEST_CRON_ENABLED ? env.INGEST_CRON : 'off' }, '[Boot] Market data backend started');
}

main().catch(err => {
  console.error('[Boot] Fatal error:', errorMessage(err));
  process.exit(1);
});
