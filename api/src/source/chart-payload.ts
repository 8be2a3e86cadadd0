// api/src/source/chart-payload.ts
//
// Narrowing for the provider's chart response:
// { chart: { result: [{ meta: { gmtoffset }, timestamp: [...],
//   indicators: { quote: [{ open, high, low, close, volume }] } }], error } }

export interface RawDailyRow {
  timestamp: number;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface ChartPayload {
  gmtoffset: number;
  rows: RawDailyRow[];
}

type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function numberOrNull(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

function column(quote: UnknownRecord, key: string, length: number): Array<number | null> {
  const raw = quote[key];
  const values = Array.isArray(raw) ? raw : [];
  return Array.from({ length }, (_, i) => numberOrNull(values[i]));
}

/**
 * Returns the provider error description when the payload carries one.
 */
export function chartError(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.chart)) return undefined;
  const err = body.chart.error;
  if (!isRecord(err)) return undefined;
  const code = typeof err.code === 'string' ? err.code : 'error';
  const description = typeof err.description === 'string' ? err.description : '';
  return `${code}: ${description}`.trim();
}

/**
 * Extracts per-day rows; null when the payload does not have the chart shape.
 * A payload with no timestamps (no trading in range) parses to zero rows.
 */
export function parseChartPayload(body: unknown): ChartPayload | null {
  if (!isRecord(body) || !isRecord(body.chart)) return null;
  const results = body.chart.result;
  if (!Array.isArray(results)) return null;

  const first: unknown = results[0];
  if (!isRecord(first)) return null;

  const meta = isRecord(first.meta) ? first.meta : {};
  const gmtoffset = typeof meta.gmtoffset === 'number' ? meta.gmtoffset : 0;

  const timestamps = Array.isArray(first.timestamp) ? first.timestamp : [];
  const indicators = isRecord(first.indicators) ? first.indicators : {};
  const quotes = Array.isArray(indicators.quote) ? indicators.quote : [];
  const quote: unknown = quotes[0];
  if (timestamps.length && !isRecord(quote)) return null;

  const q = isRecord(quote) ? quote : {};
  const n = timestamps.length;
  const open = column(q, 'open', n);
  const high = column(q, 'high', n);
  const low = column(q, 'low', n);
  const close = column(q, 'close', n);
  const volume = column(q, 'volume', n);

  const rows: RawDailyRow[] = [];
  timestamps.forEach((ts: unknown, i: number) => {
    if (typeof ts !== 'number') return;
    rows.push({
      timestamp: ts,
      open: open[i] ?? null,
      high: high[i] ?? null,
      low: low[i] ?? null,
      close: close[i] ?? null,
      volume: volume[i] ?? null,
    });
  });

  return { gmtoffset, rows };
}
