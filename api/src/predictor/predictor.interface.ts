import { Series } from '../common/models/bar.model';
import { ModelMetrics } from '../common/models/prediction.model';
import { ScalerState } from './min-max-scaler';

/** Serializable trained weights; the shape is owned by the Predictor. */
export type ModelArtifact = Record<string, unknown>;

export interface FitOptions {
  epochs: number;
  batchSize: number;
  lookback: number;
}

export interface FitResult {
  artifact: ModelArtifact;
  scaler: ScalerState;
  metrics: ModelMetrics;
  /** Bars the model was trained on. */
  trainedBars: number;
  epochsRun: number;
}

/**
 * A loaded model. Works in scaled space: the caller normalizes the window
 * with the version's scaler and denormalizes the output.
 */
export interface PredictorHandle {
  readonly lookback: number;
  predict(window: number[]): number;
}

/**
 * The trainable model capability behind the service.
 */
export interface Predictor {
  fit(series: Series, options: FitOptions): Promise<FitResult>;
  load(artifact: unknown): PredictorHandle;
}

export const PREDICTOR = Symbol('PREDICTOR');
