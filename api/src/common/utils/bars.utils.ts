// api/src/common/utils/bars.utils.ts

import { Bar } from '../models/bar.model';

export interface BarProblem {
  date: string;
  problem: string;
}

/**
 * First consistency problem of a bar, or null when it is sound:
 * positive prices, low <= open/close <= high, non-negative volume.
 */
export function barProblem(bar: Bar): string | null {
  const { open: o, high: h, low: l, close: c, volume: v } = bar;
  if (!(o > 0 && h > 0 && l > 0 && c > 0)) return 'non-positive price';
  if (l > h) return `low ${l} above high ${h}`;
  if (o < l || o > h) return `open ${o} outside [${l}, ${h}]`;
  if (c < l || c > h) return `close ${c} outside [${l}, ${h}]`;
  if (!(v >= 0)) return 'negative volume';
  return null;
}

/**
 * Every problem in a series, including dates that do not strictly increase.
 */
export function findBarProblems(bars: Bar[]): BarProblem[] {
  const out: BarProblem[] = [];
  bars.forEach((bar, i) => {
    const p = barProblem(bar);
    if (p) out.push({ date: bar.date, problem: p });
    const prev = bars[i - 1];
    if (prev && bar.date <= prev.date) {
      out.push({ date: bar.date, problem: `date not after ${prev.date}` });
    }
  });
  return out;
}

/**
 * Closing prices in series order.
 */
export function closes(bars: Bar[]): number[] {
  return bars.map((b) => b.close);
}

/**
 * The `size` bars immediately before index `i` (strictly earlier), or null
 * when fewer than `size` exist.
 */
export function windowBefore(bars: Bar[], i: number, size: number): Bar[] | null {
  if (i - size < 0) return null;
  return bars.slice(i - size, i);
}
