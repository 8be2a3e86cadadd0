export interface ScalerState {
  min: number;
  max: number;
}

function isScalerState(v: unknown): v is ScalerState {
  if (typeof v !== 'object' || v === null) return false;
  const min: unknown = Reflect.get(v, 'min');
  const max: unknown = Reflect.get(v, 'max');
  return typeof min === 'number' && typeof max === 'number' && Number.isFinite(min) && max >= min;
}

/**
 * Maps prices into [0, 1] using the range seen at fit time.
 * A flat range is treated as width 1 so it never divides by zero.
 */
export class MinMaxScaler {
  private readonly width: number;

  private constructor(private readonly state: ScalerState) {
    this.width = state.max - state.min || 1;
  }

  static fit(values: number[]): MinMaxScaler {
    if (!values.length) throw new RangeError('Cannot fit a scaler on an empty series');
    return new MinMaxScaler({ min: Math.min(...values), max: Math.max(...values) });
  }

  static fromState(state: unknown): MinMaxScaler {
    if (!isScalerState(state)) throw new Error('Corrupt scaler artifact');
    return new MinMaxScaler({ min: state.min, max: state.max });
  }

  toState(): ScalerState {
    return { ...this.state };
  }

  transform(values: number[]): number[] {
    return values.map((v) => (v - this.state.min) / this.width);
  }

  inverse(value: number): number {
    return value * this.width + this.state.min;
  }
}
