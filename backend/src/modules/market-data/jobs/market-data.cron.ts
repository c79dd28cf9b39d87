/**
 * MARKET DATA CRON JOB
 */

import cron, { type ScheduledTask } from 'node-cron';
import { AppError, ConfigError, errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import type { RunCoordinator } from '../run/run.coordinator.js';

export interface MarketDataCronOptions {
  expression: string;
  timezone?: string;
  logger: Logger;
}

/**
 * Runs one ingest; a tick that lands while a run is going is skipped.
 */
export async function runScheduledIngest(coordinator: RunCoordinator, logger: Logger): Promise<void> {
  try {
    const summary = await coordinator.run();
    logger.info({ runId: summary.runId, series: summary.series }, '[MarketData Cron] Run finished');
  } catch (err) {
    if (err instanceof AppError && err.code === 'RUN_IN_PROGRESS') {
      logger.warn({}, '[MarketData Cron] Previous run still in progress, tick skipped');
      return;
    }
    logger.error({ err: errorMessage(err) }, '[MarketData Cron] Error');
  }
}

export function startMarketDataCron(coordinator: RunCoordinator, options: MarketDataCronOptions): ScheduledTask {
  if (!cron.validate(options.expression)) {
    throw new ConfigError(`Invalid cron expression: ${options.expression}`);
  }

  const task = cron.schedule(
    options.expression,
    () => runScheduledIngest(coordinator, options.logger),
    { timezone: options.timezone ?? 'UTC' }
  );

  options.logger.info({ expression: options.expression }, '[MarketData] Cron started');
  return task;
}
