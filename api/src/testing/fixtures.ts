import { Bar } from '../common/models/bar.model';
import { TradingCalendar } from '../common/utils/calendar.utils';

export const FETCHED_AT = '2024-01-01T00:00:00.000Z';

/** `n` consecutive trading days, the first on or after `from`. */
export function tradingDays(from: string, n: number, calendar = new TradingCalendar()): string[] {
  const out: string[] = [];
  let d = calendar.isTradingDay(from) ? from : calendar.nextTradingDay(from);
  while (out.length < n) {
    out.push(d);
    d = calendar.nextTradingDay(d);
  }
  return out;
}

/** `n` trading days ending on `to` (inclusive when it trades). */
export function tradingDaysUntil(to: string, n: number, calendar = new TradingCalendar()): string[] {
  const out: string[] = [];
  let d = calendar.isTradingDay(to) ? to : calendar.previousTradingDay(to);
  while (out.length < n) {
    out.unshift(d);
    d = calendar.previousTradingDay(d);
  }
  return out;
}

/**
 * Well-formed bars on the given dates. Close defaults to 20 + i / 10;
 * high and low sit half a unit around it.
 */
export function makeBars(
  instrumentId: string,
  dates: string[],
  close: (i: number) => number = (i) => 20 + i / 10,
): Bar[] {
  return dates.map((date, i) => {
    const c = close(i);
    return {
      instrumentId,
      date,
      open: c,
      high: c + 0.5,
      low: c - 0.5,
      close: c,
      volume: 1000 + i,
      fetchedAt: FETCHED_AT,
    };
  });
}
