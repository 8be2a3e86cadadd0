// api/src/common/models/bar.model.ts

/**
 * One daily OHLCV bar for one instrument.
 * Unique per (instrumentId, date).
 */
export interface Bar {
  instrumentId: string;
  date: string; // YYYY-MM-DD trading day
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  fetchedAt: string; // ISO 8601 UTC, when the source delivered it
}

/**
 * Bars for one instrument ordered by date ascending.
 * Gaps are not filled: a missing trading day is simply absent.
 */
export type Series = Bar[];

/**
 * Half-open date range [from, to).
 */
export interface DateRange {
  from: string;
  to: string;
}
