import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Cache } from 'cache-manager';
import {
  DomainError,
  ErrorContext,
  InsufficientHistoryError,
  VersionNotFoundError,
} from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { Series } from '../common/models/bar.model';
import { PredictionResult } from '../common/models/prediction.model';
import { closes, windowBefore } from '../common/utils/bars.utils';
import { TradingCalendar } from '../common/utils/calendar.utils';
import { todayUTC } from '../common/utils/time.utils';
import { MarketService } from '../market/market.service';
import { MinMaxScaler } from '../predictor/min-max-scaler';
import { PREDICTOR, Predictor } from '../predictor/predictor.interface';
import { LATEST, ModelVersion, VersionSelector } from '../registry/model-version.model';
import { ModelRegistryService } from '../registry/model-registry.service';
import { LoadedModel } from './loaded-model';

export const DEFAULT_HISTORY_DAYS = 7;
export const MAX_HISTORY_DAYS = 60;

/**
 * Serves predictions from ready model versions only.
 *
 * Loaded models live in a bounded LRU keyed "instrument:version"; concurrent
 * requests for a model that is not loaded yet share one load.
 */
@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private readonly loading = new Map<string, Promise<LoadedModel>>();

  constructor(
    private readonly registry: ModelRegistryService,
    private readonly market: MarketService,
    private readonly calendar: TradingCalendar,
    private readonly universe: InstrumentUniverse,
    @Inject(PREDICTOR) private readonly predictor: Predictor,
    @Inject(CACHE_MANAGER) private readonly models: Cache,
  ) {}

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Next-trading-day close predicted from the newest lookback window
   * at or before `asOf` (today by default).
   */
  async predictLatest(
    instrumentId: string,
    selector: VersionSelector = LATEST,
    asOf: string = todayUTC(),
  ): Promise<PredictionResult> {
    const id = this.universe.assert(instrumentId);
    const ctx: ErrorContext = { instrumentId: id, version: selector };

    try {
      const model = await this.modelFor(id, selector);
      ctx.version = model.version;

      const series = await this.market.loadSeries(id, asOf, model.lookback);
      const window = series.slice(-model.lookback);
      const newest = window[window.length - 1];
      if (!newest || window.length < model.lookback) {
        throw new InsufficientHistoryError(`No ${model.lookback}-bar window for ${id}`, ctx);
      }

      return {
        instrumentId: id,
        version: model.version,
        predictedPrice: model.predict(closes(window)),
        predictionDate: this.calendar.nextTradingDay(newest.date),
        metrics: { ...model.metrics },
        lastObservedPrice: newest.close,
      };
    } catch (e) {
      throw this.withContext(e, ctx);
    }
  }

  /**
   * Predictions for the newest `nDays` cached trading days, most recent first.
   * Each day is predicted only from bars dated strictly before it.
   *
   * The version and the series are fixed when this resolves; predictions are
   * computed as the sequence is consumed, and every iteration starts over.
   */
  async predictHistorical(
    instrumentId: string,
    selector: VersionSelector = LATEST,
    nDays: number = DEFAULT_HISTORY_DAYS,
    asOf: string = todayUTC(),
  ): Promise<AsyncIterable<PredictionResult>> {
    const id = this.universe.assert(instrumentId);
    const ctx: ErrorContext = { instrumentId: id, version: selector };
    if (!Number.isInteger(nDays) || nDays < 1 || nDays > MAX_HISTORY_DAYS) {
      throw new RangeError(`nDays must be an integer in [1, ${MAX_HISTORY_DAYS}], got ${nDays}`);
    }

    const { model, series } = await this.prepare(id, selector, nDays, asOf, ctx);
    const lookback = model.lookback;
    const first = series.length - nDays;

    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<PredictionResult> {
        for (let i = series.length - 1; i >= first; i--) {
          const target = series[i];
          const window = windowBefore(series, i, lookback);
          const last = window?.[window.length - 1];
          if (!target || !window || !last) return;

          yield {
            instrumentId: id,
            version: model.version,
            predictedPrice: model.predict(closes(window)),
            predictionDate: target.date,
            metrics: { ...model.metrics },
            lastObservedPrice: last.close,
            actualPrice: target.close,
          };
        }
      },
    };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async prepare(
    instrumentId: string,
    selector: VersionSelector,
    nDays: number,
    asOf: string,
    ctx: ErrorContext,
  ): Promise<{ model: LoadedModel; series: Series }> {
    try {
      const model = await this.modelFor(instrumentId, selector);
      ctx.version = model.version;
      const series = await this.market.loadSeries(instrumentId, asOf, model.lookback + nDays);
      return { model, series };
    } catch (e) {
      throw this.withContext(e, ctx);
    }
  }

  private async modelFor(instrumentId: string, selector: VersionSelector): Promise<LoadedModel> {
    const mv = await this.registry.resolve(instrumentId, selector);
    const key = `${mv.instrumentId}:${mv.version}`;

    const cached = await this.models.get(key);
    if (cached instanceof LoadedModel) return cached;

    const pending = this.loading.get(key);
    if (pending) return pending;

    const load = this.load(mv)
      .then(async (model) => {
        await this.models.set(key, model);
        return model;
      })
      .finally(() => this.loading.delete(key));
    this.loading.set(key, load);
    return load;
  }

  private async load(mv: ModelVersion): Promise<LoadedModel> {
    if (!mv.metrics) {
      throw new VersionNotFoundError(`${mv.instrumentId} ${mv.version} has no recorded metrics`, {
        instrumentId: mv.instrumentId,
        version: mv.version,
      });
    }
    const { artifact, scaler } = await this.registry.loadArtifacts(mv);
    const model = new LoadedModel(
      mv.instrumentId,
      mv.version,
      mv.metrics,
      this.predictor.load(artifact),
      MinMaxScaler.fromState(scaler),
    );
    this.logger.log(`Loaded ${mv.instrumentId} ${mv.version} (lookback ${model.lookback})`);
    return model;
  }

  private withContext(e: unknown, ctx: ErrorContext): unknown {
    return e instanceof DomainError ? e.withContext(ctx) : e;
  }
}
