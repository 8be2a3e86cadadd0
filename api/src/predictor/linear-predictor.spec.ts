import { TrainingFailureError } from '../common/errors/domain.errors';
import { makeBars, tradingDays } from '../testing/fixtures';
import { testConfig } from '../testing/test-config';
import { LinearPredictor } from './linear-predictor';

describe('LinearPredictor', () => {
  const predictor = new LinearPredictor(testConfig({ training: { minBars: 40 } }));
  const options = { epochs: 20, batchSize: 8, lookback: 5 };

  it('refuses to train on too little history', async () => {
    const bars = makeBars('PETR4', tradingDays('2024-01-02', 30));
    await expect(predictor.fit(bars, options)).rejects.toBeInstanceOf(TrainingFailureError);
  });

  it('trains a loadable model with test-split metrics', async () => {
    const bars = makeBars('PETR4', tradingDays('2024-01-02', 120), (i) => 20 + Math.sin(i / 5) + i / 20);
    const fit = await predictor.fit(bars, options);

    expect(fit.artifact).toMatchObject({ kind: 'linear-ar', lookback: 5 });
    expect(fit.trainedBars).toBe(120);
    expect(fit.epochsRun).toBeGreaterThanOrEqual(1);
    expect(fit.epochsRun).toBeLessThanOrEqual(20);
    expect(Number.isFinite(fit.metrics.mae)).toBe(true);
    expect(fit.metrics.rmse).toBeGreaterThanOrEqual(fit.metrics.mae);
    expect(fit.metrics.mae).toBeLessThan(1);

    const handle = predictor.load(JSON.parse(JSON.stringify(fit.artifact)));
    expect(handle.lookback).toBe(5);
    expect(Number.isFinite(handle.predict([0.5, 0.5, 0.5, 0.5, 0.5]))).toBe(true);
  });

  it('predicts with the stored weights', () => {
    const handle = predictor.load({ kind: 'linear-ar', lookback: 3, weights: [0, 0.5, 0.5], bias: 0.1 });
    expect(handle.predict([9, 0.2, 0.4])).toBeCloseTo(0.4);
    expect(() => handle.predict([0.1, 0.2])).toThrow(RangeError);
  });

  it('rejects artifacts it did not produce', () => {
    expect(() => predictor.load({ kind: 'lstm', lookback: 3, weights: [1, 1, 1], bias: 0 })).toThrow(
      'Corrupt model artifact',
    );
    expect(() => predictor.load({ kind: 'linear-ar', lookback: 3, weights: [1], bias: 0 })).toThrow(
      'Corrupt model artifact',
    );
    expect(() => predictor.load(null)).toThrow('Corrupt model artifact');
  });
});
