/**
 * RUN COORDINATOR
 *
 * One ingest run: fetch and adapt every enabled series, then reconcile the
 * observations against the store and tally per-series counts.
 *
 * Failure isolation:
 * - a source that fails to fetch or adapt is recorded and skipped
 * - a store failure on one observation is counted as skipped for its series
 *
 * Observations are partitioned by seriesType. Inside a partition the
 * lookup → decide → write sequence runs strictly in order, so two
 * decisions for the same (seriesType, date) never race. Partitions may run
 * in parallel when `parallelSeries` is set.
 */

import { v4 as uuid } from 'uuid';
import { AppError, errorMessage } from '../../../common/errors.js';
import { silentLogger, type Logger } from '../../../common/logger.js';
import { enabledSeries, type IngestConfig } from '../../../config/ingest.config.js';
import { ADAPTERS, type SourceAdapter } from '../adapters/index.js';
import {
  emptyCounts,
  type Observation,
  type RunSummary,
  type SeriesCounts,
  type SourceName,
  type SourceOutcome,
} from '../contracts/market-data.contracts.js';
import type { MarketSeriesSpec } from '../data/market_sources.registry.js';
import { applyDecision, gatewayLookup, reconcile } from '../reconcile/reconciler.js';
import type { StoreGateway } from '../storage/store.gateway.js';
import type { SourceFetchers } from './source.fetchers.js';

export interface RunCoordinatorDeps {
  gateway: StoreGateway;
  fetchers: SourceFetchers;
  adapters?: Record<SourceName, SourceAdapter>;
  logger?: Logger;
  clock?: () => Date;
  newRunId?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunState {
  series: Record<string, SeriesCounts>;
  aborted: boolean;
}

export class RunCoordinator {
  private readonly adapters: Record<SourceName, SourceAdapter>;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly newRunId: () => string;
  private running = false;

  constructor(
    private readonly config: IngestConfig,
    private readonly deps: RunCoordinatorDeps
  ) {
    this.adapters = deps.adapters ?? ADAPTERS;
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? (() => new Date());
    this.newRunId = deps.newRunId ?? uuid;
  }

  isRunning(): boolean {
    return this.running;
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    if (this.running) {
      throw new AppError('RUN_IN_PROGRESS', 'An ingest run is already in progress', 409);
    }
    this.running = true;
    try {
      return await this.execute(options.signal);
    } finally {
      this.running = false;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // RUN
  // ═══════════════════════════════════════════════════════════════

  private async execute(signal?: AbortSignal): Promise<RunSummary> {
    const runId = this.newRunId();
    const started = this.clock();
    const state: RunState = { series: {}, aborted: false };
    const sources: SourceOutcome[] = [];
    const partitions = new Map<string, Observation[]>();

    const targets = enabledSeries(this.config);
    this.logger.info({ runId, series: targets.map(s => s.seriesType) }, '[MarketData] Run starting');

    for (const spec of targets) {
      if (signal?.aborted) {
        state.aborted = true;
        break;
      }
      const counts = this.countsFor(state, spec.seriesType);
      const { outcome, observations } = await this.collect(spec);
      sources.push(outcome);
      counts.skipped += outcome.dropped;

      const partition = partitions.get(spec.seriesType) ?? [];
      partition.push(...observations);
      partitions.set(spec.seriesType, partition);
    }

    if (!state.aborted) {
      const work = [...partitions.entries()];
      if (this.config.parallelSeries) {
        await Promise.all(work.map(([seriesType, obs]) => this.reconcilePartition(state, seriesType, obs, signal)));
      } else {
        for (const [seriesType, obs] of work) {
          await this.reconcilePartition(state, seriesType, obs, signal);
        }
      }
    }

    const finished = this.clock();
    const summary: RunSummary = {
      runId,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      aborted: state.aborted,
      series: state.series,
      sources,
    };

    this.logger.info(
      { runId, aborted: summary.aborted, series: summary.series, durationMs: summary.durationMs },
      '[MarketData] Run complete'
    );
    return summary;
  }

  private countsFor(state: RunState, seriesType: string): SeriesCounts {
    const existing = state.series[seriesType];
    if (existing) return existing;
    const fresh = emptyCounts();
    state.series[seriesType] = fresh;
    return fresh;
  }

  // ═══════════════════════════════════════════════════════════════
  // FETCH + ADAPT (per source)
  // ═══════════════════════════════════════════════════════════════

  private async collect(spec: MarketSeriesSpec): Promise<{ outcome: SourceOutcome; observations: Observation[] }> {
    const { source, seriesType, sourceSeriesId } = spec;
    let dropped = 0;

    try {
      const payload = await this.deps.fetchers[source](sourceSeriesId);
      const observations = this.adapters[source].produce(payload, seriesType, {
        onDrop: entry => {
          dropped++;
          this.logger.warn({ source, seriesType, index: entry.index, reason: entry.reason }, '[MarketData] Entry dropped');
        },
      });

      this.logger.info(
        { source, seriesType, observations: observations.length, dropped },
        `[MarketData] ${seriesType}: ${observations.length} observations from ${source}`
      );
      return {
        outcome: { source, seriesType, ok: true, observations: observations.length, dropped },
        observations,
      };
    } catch (err) {
      const errorCode = err instanceof AppError ? err.code : 'UNKNOWN';
      this.logger.warn(
        { source, seriesType, errorCode, err: errorMessage(err) },
        `[MarketData] Source skipped for this run: ${seriesType}`
      );
      return {
        outcome: { source, seriesType, ok: false, observations: 0, dropped, error: errorMessage(err), errorCode },
        observations: [],
      };
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // RECONCILE (per seriesType, strictly ordered)
  // ═══════════════════════════════════════════════════════════════

  private async reconcilePartition(
    state: RunState,
    seriesType: string,
    observations: Observation[],
    signal?: AbortSignal
  ): Promise<void> {
    const counts = this.countsFor(state, seriesType);
    const lookup = gatewayLookup(this.deps.gateway);

    for (const observation of observations) {
      if (signal?.aborted) {
        state.aborted = true;
        return;
      }
      try {
        const decision = await reconcile(observation, lookup);
        const outcome = await applyDecision(decision, this.deps.gateway);
        counts[outcome]++;

        if (decision.kind === 'UPDATE_VALUE') {
          this.logger.info(
            { seriesType, date: observation.date, from: decision.previousValue, to: observation.value },
            `[MarketData] Revised ${seriesType} for ${observation.date}`
          );
        } else if (decision.kind === 'INSERT') {
          this.logger.debug?.({ seriesType, date: observation.date, value: observation.value }, '[MarketData] Inserted');
        }
      } catch (err) {
        counts.skipped++;
        this.logger.error(
          { seriesType, date: observation.date, err: errorMessage(err) },
          '[MarketData] Store call failed, observation left for next run'
        );
      }
    }
  }
}
