import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { TrainingFailureError } from '../common/errors/domain.errors';
import { Series } from '../common/models/bar.model';
import { ModelMetrics } from '../common/models/prediction.model';
import { closes } from '../common/utils/bars.utils';
import type { AppConfig } from '../config/configuration';
import { MinMaxScaler } from './min-max-scaler';
import { FitOptions, FitResult, ModelArtifact, Predictor, PredictorHandle } from './predictor.interface';

const KIND = 'linear-ar';
const PATIENCE = 10; // epochs without validation improvement before stopping
const MIN_SAMPLES = 20;

interface LinearWeights {
  weights: number[];
  bias: number;
}

interface Sample {
  x: number[];
  y: number;
}

function dot(w: LinearWeights, x: number[]): number {
  let s = w.bias;
  for (let i = 0; i < x.length; i++) s += (w.weights[i] ?? 0) * (x[i] ?? 0);
  return s;
}

function mse(w: LinearWeights, samples: Sample[]): number {
  if (!samples.length) return 0;
  let s = 0;
  for (const { x, y } of samples) s += (dot(w, x) - y) ** 2;
  return s / samples.length;
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === 'number' && Number.isFinite(n));
}

class LinearHandle implements PredictorHandle {
  constructor(
    readonly lookback: number,
    private readonly w: LinearWeights,
  ) {}

  predict(window: number[]): number {
    if (window.length !== this.lookback) {
      throw new RangeError(`Expected a window of ${this.lookback} values, got ${window.length}`);
    }
    return dot(this.w, window);
  }
}

/**
 * Autoregressive linear model over the scaled closes of the lookback window,
 * trained with mini-batch gradient descent.
 *
 * - Weights start at the persistence forecast (tomorrow = today).
 * - 70/15/15 chronological split; the best validation epoch is kept and
 *   training stops after PATIENCE epochs without improvement.
 * - Yields to the event loop after every epoch so requests keep flowing.
 */
@Injectable()
export class LinearPredictor implements Predictor {
  private readonly logger = new Logger(LinearPredictor.name);
  private readonly learningRate: number;
  private readonly minBars: number;

  constructor(config: ConfigService<AppConfig, true>) {
    const training = config.get('training', { infer: true });
    this.learningRate = training.learningRate;
    this.minBars = training.minBars;
  }

  async fit(series: Series, options: FitOptions): Promise<FitResult> {
    const { lookback, epochs, batchSize } = options;
    const prices = closes(series);
    const instrumentId = series[0]?.instrumentId ?? 'unknown';

    if (prices.length < Math.max(this.minBars, lookback + MIN_SAMPLES)) {
      throw new TrainingFailureError(
        `Not enough history to train ${instrumentId}: ${prices.length} bars`,
        { instrumentId, bars: prices.length },
      );
    }

    const scaler = MinMaxScaler.fit(prices);
    const scaled = scaler.transform(prices);

    const samples: Sample[] = [];
    for (let i = 0; i + lookback < scaled.length; i++) {
      samples.push({ x: scaled.slice(i, i + lookback), y: scaled[i + lookback] ?? 0 });
    }
    const trainEnd = Math.floor(samples.length * 0.7);
    const valEnd = Math.floor(samples.length * 0.85);
    const train = samples.slice(0, trainEnd);
    const val = samples.slice(trainEnd, valEnd);
    const test = samples.slice(valEnd);

    const w: LinearWeights = { weights: new Array<number>(lookback).fill(0), bias: 0 };
    w.weights[lookback - 1] = 1;

    let best: LinearWeights = { weights: [...w.weights], bias: w.bias };
    let bestLoss = mse(w, val);
    let stale = 0;
    let epochsRun = 0;
    const size = Math.max(1, batchSize);

    for (let epoch = 1; epoch <= epochs; epoch++) {
      for (let start = 0; start < train.length; start += size) {
        this.step(w, train.slice(start, start + size));
      }
      epochsRun = epoch;

      const loss = mse(w, val);
      if (!Number.isFinite(loss)) {
        throw new TrainingFailureError(`Training diverged for ${instrumentId} at epoch ${epoch}`, {
          instrumentId,
          epoch,
        });
      }
      if (loss < bestLoss) {
        bestLoss = loss;
        best = { weights: [...w.weights], bias: w.bias };
        stale = 0;
      } else if (++stale >= PATIENCE) {
        this.logger.debug(`${instrumentId}: early stop at epoch ${epoch}`);
        break;
      }
      await yieldToLoop();
    }

    const metrics = this.evaluate(best, test, scaler);
    this.logger.log(
      `${instrumentId}: trained ${epochsRun} epoch(s) on ${train.length} samples; ` +
        `MAE=${metrics.mae.toFixed(4)} RMSE=${metrics.rmse.toFixed(4)} MAPE=${metrics.mape.toFixed(2)}%`,
    );

    const artifact: ModelArtifact = {
      kind: KIND,
      lookback,
      weights: best.weights,
      bias: best.bias,
    };
    return { artifact, scaler: scaler.toState(), metrics, trainedBars: prices.length, epochsRun };
  }

  load(artifact: unknown): PredictorHandle {
    if (typeof artifact !== 'object' || artifact === null) throw new Error('Corrupt model artifact');
    const kind: unknown = Reflect.get(artifact, 'kind');
    const lookback: unknown = Reflect.get(artifact, 'lookback');
    const weights: unknown = Reflect.get(artifact, 'weights');
    const bias: unknown = Reflect.get(artifact, 'bias');

    if (
      kind !== KIND ||
      typeof lookback !== 'number' ||
      !Number.isInteger(lookback) ||
      !isNumberArray(weights) ||
      weights.length !== lookback ||
      typeof bias !== 'number'
    ) {
      throw new Error('Corrupt model artifact');
    }
    return new LinearHandle(lookback, { weights: [...weights], bias });
  }

  /* ------------------------------- Helpers ------------------------------ */

  private step(w: LinearWeights, batch: Sample[]): void {
    if (!batch.length) return;
    const grad = new Array<number>(w.weights.length).fill(0);
    let gradBias = 0;

    for (const { x, y } of batch) {
      const err = dot(w, x) - y;
      for (let i = 0; i < grad.length; i++) grad[i] = (grad[i] ?? 0) + err * (x[i] ?? 0);
      gradBias += err;
    }

    const k = (2 * this.learningRate) / batch.length;
    for (let i = 0; i < grad.length; i++) {
      w.weights[i] = (w.weights[i] ?? 0) - k * (grad[i] ?? 0);
    }
    w.bias -= k * gradBias;
  }

  private evaluate(w: LinearWeights, test: Sample[], scaler: MinMaxScaler): ModelMetrics {
    if (!test.length) return { mae: 0, rmse: 0, mape: 0 };
    let abs = 0;
    let sq = 0;
    let pct = 0;
    for (const { x, y } of test) {
      const actual = scaler.inverse(y);
      const predicted = scaler.inverse(dot(w, x));
      const err = actual - predicted;
      abs += Math.abs(err);
      sq += err * err;
      pct += Math.abs(err / (actual + 1e-8));
    }
    const n = test.length;
    return { mae: abs / n, rmse: Math.sqrt(sq / n), mape: (pct / n) * 100 };
  }
}
