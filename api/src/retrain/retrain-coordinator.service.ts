import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DomainError, errorMessage } from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { Semaphore } from '../common/utils/concurrency.utils';
import { todayUTC } from '../common/utils/time.utils';
import type { AppConfig, TrainingConfig } from '../config/configuration';
import { MarketService } from '../market/market.service';
import { METRIC, MetricsService } from '../metrics/metrics.service';
import { PREDICTOR, Predictor } from '../predictor/predictor.interface';
import { ModelVersion } from '../registry/model-version.model';
import { ModelRegistryService } from '../registry/model-registry.service';
import { SeriesCacheService } from '../series/series-cache.service';

export type RetrainState = 'Idle' | 'Fetching' | 'Training' | 'Publishing' | 'Failed';

export type TriggerResult =
  | { status: 'accepted' }
  | { status: 'rejected'; reason: 'AlreadyRunning' };

export interface RetrainParams {
  epochs?: number;
  batchSize?: number;
}

export interface RetrainRun {
  startedAt: string;
  finishedAt?: string;
  epochs: number;
  batchSize: number;
  outcome?: 'published' | 'failed';
  version?: string;
  /** Stage the run failed in. */
  stage?: RetrainState;
  error?: { kind: string; message: string };
}

export interface RetrainStatus {
  instrumentId: string;
  state: RetrainState;
  current: RetrainRun | null;
  lastRun: RetrainRun | null;
  cacheMisses: number;
}

interface Slot {
  state: RetrainState;
  current: RetrainRun | null;
  lastRun: RetrainRun | null;
}

/**
 * Background retraining, one state machine per instrument:
 *
 *   Idle -> Fetching -> Training -> Publishing -> Idle
 *                 \________\____________\-> Failed -> Idle
 *
 * A trigger is accepted only from Idle and returns at once; the run continues
 * detached. A shared semaphore bounds how many instruments fit at the same time.
 * Nothing here holds a lock that prediction reads wait on.
 */
@Injectable()
export class RetrainCoordinatorService implements OnModuleDestroy {
  private readonly logger = new Logger(RetrainCoordinatorService.name);
  private readonly slots = new Map<string, Slot>();
  private readonly inflight = new Map<string, Promise<void>>();
  private readonly pool: Semaphore;
  private readonly training: TrainingConfig;
  private readonly lookback: number;

  constructor(
    private readonly market: MarketService,
    private readonly cache: SeriesCacheService,
    private readonly registry: ModelRegistryService,
    private readonly universe: InstrumentUniverse,
    private readonly metrics: MetricsService,
    @Inject(PREDICTOR) private readonly predictor: Predictor,
    config: ConfigService<AppConfig, true>,
  ) {
    this.training = config.get('training', { infer: true });
    this.lookback = config.get('lookbackWindow', { infer: true });
    this.pool = new Semaphore(this.training.maxConcurrent);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.inflight.size) {
      this.logger.log(`Waiting for ${this.inflight.size} retrain run(s) to finish`);
    }
    await this.whenIdle();
  }

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Starts a retrain unless one is already running for the instrument.
   */
  triggerRetrain(instrumentId: string, params: RetrainParams = {}): TriggerResult {
    const id = this.universe.assert(instrumentId);
    const slot = this.slot(id);
    if (slot.state !== 'Idle') {
      this.logger.warn(`${id}: retrain rejected, already ${slot.state}`);
      return { status: 'rejected', reason: 'AlreadyRunning' };
    }

    const run: RetrainRun = {
      startedAt: new Date().toISOString(),
      epochs: params.epochs ?? this.training.epochs,
      batchSize: params.batchSize ?? this.training.batchSize,
    };
    slot.current = run;
    this.enter(id, 'Fetching');

    const task: Promise<void> = this.execute(id, run)
      .catch((e: unknown) => this.logger.error(`${id}: retrain crashed: ${errorMessage(e)}`))
      .finally(() => {
        // a newer run may already own the slot
        if (this.inflight.get(id) === task) this.inflight.delete(id);
      });
    this.inflight.set(id, task);
    return { status: 'accepted' };
  }

  /**
   * Triggers every instrument independently.
   */
  triggerRetrainAll(params: RetrainParams = {}): Record<string, TriggerResult> {
    const out: Record<string, TriggerResult> = {};
    for (const id of this.universe.list()) out[id] = this.triggerRetrain(id, params);
    return out;
  }

  status(): RetrainStatus[] {
    return this.universe.list().map((id) => this.statusOf(id));
  }

  statusOf(instrumentId: string): RetrainStatus {
    const id = this.universe.assert(instrumentId);
    const slot = this.slot(id);
    return {
      instrumentId: id,
      state: slot.state,
      current: slot.current ? { ...slot.current } : null,
      lastRun: slot.lastRun ? { ...slot.lastRun } : null,
      cacheMisses: this.cache.missCount(id),
    };
  }

  /** Resolves once the given (or every) in-flight run has settled. */
  async whenIdle(instrumentId?: string): Promise<void> {
    if (instrumentId !== undefined) {
      await this.inflight.get(this.universe.assert(instrumentId));
      return;
    }
    await Promise.allSettled([...this.inflight.values()]);
  }

  /* ------------------------------- Stages ------------------------------- */

  private async execute(id: string, run: RetrainRun): Promise<void> {
    let reserved: ModelVersion | undefined;

    try {
      const asOf = todayUTC();
      const refreshed = await this.market.refresh(id, asOf, {
        force: true,
        historyDays: this.training.historyDays,
      });
      const series = await this.cache.upTo(id, asOf);
      this.logger.log(`${id}: ${refreshed.fetched} bars fetched, training on ${series.length}`);

      this.enter(id, 'Training');
      reserved = await this.registry.reserve(id);
      run.version = reserved.version;
      const fit = await this.pool.run(() =>
        this.predictor.fit(series, {
          epochs: run.epochs,
          batchSize: run.batchSize,
          lookback: this.lookback,
        }),
      );

      this.enter(id, 'Publishing');
      const published = await this.registry.publish(
        id,
        {
          artifact: fit.artifact,
          scaler: fit.scaler,
          metrics: fit.metrics,
          training: {
            epochs: run.epochs,
            batchSize: run.batchSize,
            trainedBars: fit.trainedBars,
            epochsRun: fit.epochsRun,
          },
        },
        reserved,
      );

      run.outcome = 'published';
      run.version = published.version;
      this.metrics.increment(METRIC.retrainRuns, { instrument: id, outcome: 'published' });
    } catch (e) {
      const stage = this.slot(id).state;
      run.outcome = 'failed';
      run.stage = stage;
      run.error = {
        kind: e instanceof DomainError ? e.kind : 'InternalError',
        message: errorMessage(e),
      };
      this.enter(id, 'Failed');
      this.logger.error(`${id}: retrain failed while ${stage}: ${errorMessage(e)}`);

      if (reserved) await this.failVersion(id, reserved, `${stage}: ${errorMessage(e)}`);
      this.metrics.increment(METRIC.retrainRuns, { instrument: id, outcome: 'failed' });
    } finally {
      run.finishedAt = new Date().toISOString();
      const slot = this.slot(id);
      slot.lastRun = run;
      slot.current = null;
      this.enter(id, 'Idle');
    }
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async failVersion(id: string, mv: ModelVersion, reason: string): Promise<void> {
    try {
      await this.registry.markFailed(id, mv.version, reason);
    } catch (e) {
      this.logger.error(`${id}: could not mark ${mv.version} failed: ${errorMessage(e)}`);
    }
  }

  private slot(id: string): Slot {
    let slot = this.slots.get(id);
    if (!slot) {
      slot = { state: 'Idle', current: null, lastRun: null };
      this.slots.set(id, slot);
    }
    return slot;
  }

  private enter(id: string, state: RetrainState): void {
    const slot = this.slot(id);
    this.logger.log(`${id}: ${slot.state} -> ${state}`);
    slot.state = state;
  }
}
