/**
 * MARKET DATA INGEST SCRIPT
 *
 * One ingest run from the command line.
 *
 * Run: npx tsx backend/scripts/run-market-data-ingest.ts [--dry-run] [--series cpi,gold]
 */

import 'dotenv/config';
import { errorMessage } from '../src/common/errors.js';
import { createLogger } from '../src/common/logger.js';
import { loadEnv } from '../src/config/env.js';
import { buildIngestConfig } from '../src/config/ingest.config.js';
import { connectMongo, disconnectMongo } from '../src/db/mongoose.js';
import { ensureIndexes } from '../src/db/indexes.js';
import {
  InMemoryStoreGateway,
  MongoStoreGateway,
  RunCoordinator,
  createSourceFetchers,
  type StoreGateway,
} from '../src/modules/market-data/index.js';
import { formatSummary, parseIngestArgs } from '../src/modules/market-data/run/ingest.cli.js';

async function run(): Promise<void> {
  const args = parseIngestArgs(process.argv.slice(2));
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const config = buildIngestConfig(env, args.series);

  let gateway: StoreGateway;
  if (args.dryRun) {
    gateway = new InMemoryStoreGateway();
  } else {
    await connectMongo(config.store, logger);
    await ensureIndexes(logger);
    gateway = new MongoStoreGateway();
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const coordinator = new RunCoordinator(config, {
      gateway,
      fetchers: createSourceFetchers(config),
      logger,
    });
    const summary = await coordinator.run({ signal: controller.signal });
    for (const line of formatSummary(summary)) {
      console.log(line);
    }
    console.log('Market data update complete');
  } finally {
    if (!args.dryRun) {
      await disconnectMongo();
    }
  }
}

run().catch(err => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
