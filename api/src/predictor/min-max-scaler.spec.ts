import { MinMaxScaler } from './min-max-scaler';

describe('MinMaxScaler', () => {
  it('maps the fitted range onto [0, 1] and back', () => {
    const scaler = MinMaxScaler.fit([12, 10, 20]);
    expect(scaler.transform([10, 15, 20])).toEqual([0, 0.5, 1]);
    expect(scaler.inverse(0.25)).toBe(12.5);
    expect(scaler.toState()).toEqual({ min: 10, max: 20 });
  });

  it('uses a unit width for a flat series', () => {
    const scaler = MinMaxScaler.fit([5, 5, 5]);
    expect(scaler.transform([5, 6])).toEqual([0, 1]);
    expect(scaler.inverse(0)).toBe(5);
  });

  it('restores from persisted state and rejects anything else', () => {
    expect(MinMaxScaler.fromState({ min: 1, max: 3 }).inverse(1)).toBe(3);
    expect(() => MinMaxScaler.fromState({ min: 3, max: 1 })).toThrow('Corrupt scaler artifact');
    expect(() => MinMaxScaler.fromState('nope')).toThrow('Corrupt scaler artifact');
    expect(() => MinMaxScaler.fit([])).toThrow(RangeError);
  });
});
