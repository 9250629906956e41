/**
 * Collector Scheduler
 *
 * Runs the volatility and spot pipelines on their cron cadences. Each tick
 * walks every tracked asset through its pipeline:
 *
 *   VOLATILITY: IDLE -> FETCHING -> COMPUTING -> PERSISTING -> IDLE
 *   SPOT:       IDLE -> FETCHING -> PERSISTING -> IDLE
 *
 * A failure at any stage moves that asset to FAILED for the rest of the tick
 * and leaves the other assets alone. Ticks of the same pipeline never
 * overlap; a tick that fires while the previous one is still running is
 * skipped.
 */

import * as cron from 'node-cron';
import { FetchAbortedError } from '../adapters/http/errors';
import { ScheduleConfig } from '../config/collector-config';
import { Asset } from '../types/asset';
import { AssetFailure, PipelineKind, PipelineState, TickSummary } from '../types/collector';
import { MetricsStore } from '../types/metrics-store';
import { Clock, systemClock } from '../utils/clock';
import { mapWithConcurrency, shuffle } from '../utils/concurrency';
import { errorKindOf, errorMessageOf } from '../utils/errors';
import { logCollectorEvent } from '../utils/log';
import { OHLCFetcher } from './ohlc-fetcher';
import { SpotPriceFetcher } from './spot-price-fetcher';
import { VolatilityEngine } from './volatility';

const HOUR_MS = 60 * 60 * 1000;

export type CandleSource = Pick<OHLCFetcher, 'providerId' | 'supports' | 'fetchCandles'>;
export type SpotSource = Pick<SpotPriceFetcher, 'providerId' | 'supports' | 'fetchSpot'>;
export type VolatilityComputer = Pick<typeof VolatilityEngine, 'computeVolatility'>;

export interface CollectorSchedulerDeps {
  assets: Asset[];
  ohlcFetcher: CandleSource;
  spotFetcher: SpotSource;
  engine: VolatilityComputer;
  store: MetricsStore;
  config: ScheduleConfig;
  clock?: Clock;
  random?: () => number;
}

/**
 * The rolling volatility window for a tick: `hours` long, ending at the tick
 * time truncated to the hour
 */
export function volatilityWindow(now: Date, hours: number): { start: Date; end: Date } {
  const endMs = Math.floor(now.getTime() / HOUR_MS) * HOUR_MS;
  return {
    start: new Date(endMs - hours * HOUR_MS),
    end: new Date(endMs)
  };
}

export class CollectorScheduler {
  private readonly assets: Asset[];
  private readonly ohlcFetcher: CandleSource;
  private readonly spotFetcher: SpotSource;
  private readonly engine: VolatilityComputer;
  private readonly store: MetricsStore;
  private readonly config: ScheduleConfig;
  private readonly clock: Clock;
  private readonly random: () => number;

  private tasks: cron.ScheduledTask[] = [];
  private abortController = new AbortController();
  private readonly running = new Map<PipelineKind, Promise<TickSummary>>();

  constructor(deps: CollectorSchedulerDeps) {
    this.assets = deps.assets;
    this.ohlcFetcher = deps.ohlcFetcher;
    this.spotFetcher = deps.spotFetcher;
    this.engine = deps.engine;
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Schedule both pipelines (UTC). With runOnStart, one tick of each runs
   * immediately.
   */
  start(): void {
    if (this.tasks.length > 0) {
      return;
    }
    if (this.abortController.signal.aborted) {
      this.abortController = new AbortController();
    }

    this.tasks = [
      cron.schedule(this.config.volatilityCron, () => this.fire('VOLATILITY'), { timezone: 'UTC' }),
      cron.schedule(this.config.spotCron, () => this.fire('SPOT'), { timezone: 'UTC' })
    ];

    logCollectorEvent('INFO', 'COLLECTOR_STARTED', {
      assets: this.assets.map((a) => a.assetId),
      volatilityProvider: this.ohlcFetcher.providerId,
      spotProvider: this.spotFetcher.providerId,
      volatilityCron: this.config.volatilityCron,
      spotCron: this.config.spotCron
    });

    if (this.config.runOnStart) {
      this.fire('VOLATILITY');
      this.fire('SPOT');
    }
  }

  /**
   * Stop the cron tasks, abort in-flight fetches and wait for running ticks
   * to settle
   */
  async stop(): Promise<void> {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];

    this.abortController.abort();
    await Promise.allSettled(Array.from(this.running.values()));

    logCollectorEvent('INFO', 'COLLECTOR_STOPPED');
  }

  isRunning(pipeline: PipelineKind): boolean {
    return this.running.has(pipeline);
  }

  /**
   * Fetch, compute and persist the volatility record of every tracked asset
   *
   * @returns The tick summary, or null when the tick was skipped
   */
  runVolatilityTick(now: Date = new Date(this.clock.now())): Promise<TickSummary | null> {
    const window = volatilityWindow(now, this.config.volatilityWindowHours);

    return this.runTick('VOLATILITY', this.ohlcFetcher, async (asset, signal, transition) => {
      transition('FETCHING');
      const candles = await this.ohlcFetcher.fetchCandles(asset, window.start, window.end, signal);

      transition('COMPUTING');
      const record = this.engine.computeVolatility(asset, candles, {
        periodStart: window.start.toISOString(),
        periodEnd: window.end.toISOString(),
        providerId: this.ohlcFetcher.providerId,
        computedAt: new Date(this.clock.now()).toISOString()
      });

      throwIfAborted(signal);
      transition('PERSISTING');
      await this.store.upsertVolatility(record);

      logCollectorEvent('INFO', 'VOLATILITY_STORED', {
        assetId: record.assetId,
        periodStart: record.periodStart,
        volatility: record.volatility,
        mse: record.mse,
        candleCount: record.candleCount
      });
    });
  }

  /**
   * Fetch and persist one spot sample per tracked asset
   *
   * @returns The tick summary, or null when the tick was skipped
   */
  runSpotTick(): Promise<TickSummary | null> {
    return this.runTick('SPOT', this.spotFetcher, async (asset, signal, transition) => {
      transition('FETCHING');
      const sample = await this.spotFetcher.fetchSpot(asset, signal);

      throwIfAborted(signal);
      transition('PERSISTING');
      await this.store.upsertSpot(sample);

      logCollectorEvent('INFO', 'SPOT_STORED', {
        assetId: sample.assetId,
        observedAt: sample.observedAt,
        price: sample.price
      });
    });
  }

  private fire(pipeline: PipelineKind): void {
    const tick = pipeline === 'VOLATILITY' ? this.runVolatilityTick() : this.runSpotTick();
    tick.catch((error: unknown) => {
      logCollectorEvent('ERROR', 'TICK_FAILED', {
        pipeline,
        message: errorMessageOf(error)
      });
    });
  }

  private async runTick(
    pipeline: PipelineKind,
    source: { providerId: string; supports(asset: Asset): boolean },
    collect: (
      asset: Asset,
      signal: AbortSignal,
      transition: (state: PipelineState) => void
    ) => Promise<void>
  ): Promise<TickSummary | null> {
    const signal = this.abortController.signal;

    if (signal.aborted) {
      logCollectorEvent('WARN', 'TICK_SKIPPED', { pipeline, reason: 'STOPPED' });
      return null;
    }
    if (this.running.has(pipeline)) {
      logCollectorEvent('WARN', 'TICK_SKIPPED', { pipeline, reason: 'PREVIOUS_TICK_RUNNING' });
      return null;
    }

    const tick = this.executeTick(pipeline, source, signal, collect);
    this.running.set(pipeline, tick);
    try {
      return await tick;
    } finally {
      this.running.delete(pipeline);
    }
  }

  private async executeTick(
    pipeline: PipelineKind,
    source: { providerId: string; supports(asset: Asset): boolean },
    signal: AbortSignal,
    collect: (
      asset: Asset,
      signal: AbortSignal,
      transition: (state: PipelineState) => void
    ) => Promise<void>
  ): Promise<TickSummary> {
    const startedAt = new Date(this.clock.now()).toISOString();
    const succeeded: string[] = [];
    const failed: AssetFailure[] = [];
    const skipped: string[] = [];

    logCollectorEvent('INFO', 'TICK_STARTED', { pipeline, providerId: source.providerId });

    const assets = this.config.shuffleAssets ? shuffle(this.assets, this.random) : this.assets;

    await mapWithConcurrency(assets, this.config.maxConcurrency, async (asset) => {
      if (!source.supports(asset)) {
        skipped.push(asset.assetId);
        logCollectorEvent('WARN', 'ASSET_SKIPPED', {
          pipeline,
          assetId: asset.assetId,
          providerId: source.providerId,
          reason: 'NO_PROVIDER_ID'
        });
        return;
      }

      let stage: PipelineState = 'IDLE';
      const transition = (state: PipelineState): void => {
        stage = state;
        logCollectorEvent('INFO', 'PIPELINE_STATE', { pipeline, assetId: asset.assetId, state });
      };

      try {
        await collect(asset, signal, transition);
        transition('IDLE');
        succeeded.push(asset.assetId);
      } catch (error) {
        const failure: AssetFailure = {
          assetId: asset.assetId,
          kind: errorKindOf(error),
          stage,
          message: errorMessageOf(error)
        };
        failed.push(failure);
        transition('FAILED');
        logCollectorEvent(failure.kind === 'ABORTED' ? 'WARN' : 'ERROR', 'ASSET_FAILED', {
          pipeline,
          ...failure
        });
      }
    });

    const summary: TickSummary = {
      pipeline,
      startedAt,
      finishedAt: new Date(this.clock.now()).toISOString(),
      succeeded,
      failed,
      skipped
    };

    logCollectorEvent(failed.length > 0 ? 'WARN' : 'INFO', 'TICK_COMPLETED', {
      pipeline,
      succeeded: succeeded.length,
      failed: failed.length,
      skipped: skipped.length
    });

    return summary;
  }
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new FetchAbortedError('Stopped before persisting');
  }
}
