// api/src/common/utils/calendar.utils.ts

import { addDays, parseDateUTC } from './time.utils';

/**
 * Daily trading calendar: Monday to Friday minus a configured holiday list.
 * Dates are YYYY-MM-DD strings in UTC; no intraday notion here.
 * Swap the holiday list for an exchange calendar feed if one becomes available.
 */
export class TradingCalendar {
  private readonly holidays: ReadonlySet<string>;

  constructor(holidays: Iterable<string> = []) {
    this.holidays = new Set(holidays);
  }

  isTradingDay(date: string): boolean {
    const dow = parseDateUTC(date).getUTCDay();
    if (dow === 0 || dow === 6) return false;
    return !this.holidays.has(date);
  }

  /** Closest trading day strictly before `date`. */
  previousTradingDay(date: string): string {
    let d = addDays(date, -1);
    while (!this.isTradingDay(d)) d = addDays(d, -1);
    return d;
  }

  /** Closest trading day strictly after `date`. */
  nextTradingDay(date: string): string {
    let d = addDays(date, 1);
    while (!this.isTradingDay(d)) d = addDays(d, 1);
    return d;
  }

  /**
   * Most recent session that has closed as seen on `asOf`.
   * The `asOf` session itself may still be trading, so it never counts.
   */
  lastCompletedTradingDay(asOf: string): string {
    return this.previousTradingDay(asOf);
  }

  /**
   * Number of trading days in (from, to]. Zero when `to <= from`.
   */
  tradingDaysBetween(from: string, to: string): number {
    if (to <= from) return 0;
    let n = 0;
    let d = from;
    while (d < to) {
      d = this.nextTradingDay(d);
      if (d <= to) n++;
    }
    return n;
  }
}
