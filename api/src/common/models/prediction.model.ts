/**
 * Accuracy of a trained version, measured on its held-out test split.
 */
export interface ModelMetrics {
  mae: number; // Mean absolute error, price units
  rmse: number; // Root mean squared error, price units
  mape: number; // Mean absolute percentage error, in %
}

/**
 * Model prediction for one instrument. Computed per request, never cached.
 */
export interface PredictionResult {
  instrumentId: string;
  version: string; // e.g. "v3"
  predictedPrice: number;
  predictionDate: string; // trading day the price is predicted for
  metrics: ModelMetrics;
  lastObservedPrice: number; // close of the newest bar in the input window
  actualPrice?: number; // historical predictions only: the real close that day
}
