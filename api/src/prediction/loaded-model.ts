import { ModelMetrics } from '../common/models/prediction.model';
import { MinMaxScaler } from '../predictor/min-max-scaler';
import { PredictorHandle } from '../predictor/predictor.interface';

/**
 * A ready version's predictor together with the scaler it was trained with.
 * Takes and returns prices; scaling stays inside.
 */
export class LoadedModel {
  constructor(
    readonly instrumentId: string,
    readonly version: string,
    readonly metrics: ModelMetrics,
    private readonly handle: PredictorHandle,
    private readonly scaler: MinMaxScaler,
  ) {}

  get lookback(): number {
    return this.handle.lookback;
  }

  predict(closes: number[]): number {
    return this.scaler.inverse(this.handle.predict(this.scaler.transform(closes)));
  }
}
