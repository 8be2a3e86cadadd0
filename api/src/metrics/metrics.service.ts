import { Injectable } from '@nestjs/common';

export type MetricLabels = Record<string, string>;

interface MetricDefinition {
  name: string;
  help: string;
  type: 'counter' | 'histogram';
  buckets?: number[];
}

interface HistogramSeries {
  labels: MetricLabels;
  counts: number[]; // per bucket, non-cumulative
  sum: number;
  count: number;
}

interface CounterSeries {
  labels: MetricLabels;
  value: number;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/**
 * Well-known series exported by the service.
 */
export const METRIC = {
  httpRequests: 'http_requests_total',
  httpDuration: 'http_request_duration_seconds',
  cacheMisses: 'series_cache_misses_total',
  cacheRevisions: 'series_cache_revisions_total',
  sourceAttempts: 'source_fetch_attempts_total',
  retrainRuns: 'retrain_runs_total',
} as const;

function labelKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`)
    .join(',');
}

function escapeLabelValue(v: string): string {
  return v.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatLabels(labels: MetricLabels): string {
  const keys = Object.keys(labels).sort();
  if (!keys.length) return '';
  return `{${keys.map((k) => `${k}="${escapeLabelValue(labels[k] ?? '')}"`).join(',')}}`;
}

/**
 * In-process counters and histograms with Prometheus text exposition.
 */
@Injectable()
export class MetricsService {
  private readonly definitions = new Map<string, MetricDefinition>();
  private readonly counters = new Map<string, Map<string, CounterSeries>>();
  private readonly histograms = new Map<string, Map<string, HistogramSeries>>();

  constructor() {
    this.defineCounter(METRIC.httpRequests, 'HTTP requests by endpoint and status');
    this.defineHistogram(METRIC.httpDuration, 'HTTP request latency in seconds');
    this.defineCounter(METRIC.cacheMisses, 'Series cache misses by instrument and reason');
    this.defineCounter(METRIC.cacheRevisions, 'Cached bars overwritten by a differing fetch');
    this.defineCounter(METRIC.sourceAttempts, 'Data source fetch attempts by outcome');
    this.defineCounter(METRIC.retrainRuns, 'Finished retrain runs by outcome');
  }

  defineCounter(name: string, help: string): void {
    this.definitions.set(name, { name, help, type: 'counter' });
    if (!this.counters.has(name)) this.counters.set(name, new Map());
  }

  defineHistogram(name: string, help: string, buckets: number[] = DEFAULT_BUCKETS): void {
    const sorted = [...buckets].sort((a, b) => a - b);
    this.definitions.set(name, { name, help, type: 'histogram', buckets: sorted });
    if (!this.histograms.has(name)) this.histograms.set(name, new Map());
  }

  increment(name: string, labels: MetricLabels = {}, delta = 1): void {
    const series = this.counters.get(name);
    if (!series) throw new Error(`Unknown counter: ${name}`);
    const key = labelKey(labels);
    const hit = series.get(key);
    if (hit) hit.value += delta;
    else series.set(key, { labels: { ...labels }, value: delta });
  }

  observe(name: string, value: number, labels: MetricLabels = {}): void {
    const def = this.definitions.get(name);
    const series = this.histograms.get(name);
    if (!def?.buckets || !series) throw new Error(`Unknown histogram: ${name}`);

    const key = labelKey(labels);
    let h = series.get(key);
    if (!h) {
      h = { labels: { ...labels }, counts: def.buckets.map(() => 0), sum: 0, count: 0 };
      series.set(key, h);
    }
    const idx = def.buckets.findIndex((b) => value <= b);
    if (idx >= 0) h.counts[idx] = (h.counts[idx] ?? 0) + 1;
    h.sum += value;
    h.count++;
  }

  /** Current value of one counter series (0 when never incremented). */
  counterValue(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(name)?.get(labelKey(labels))?.value ?? 0;
  }

  /**
   * Prometheus text format, 0.0.4.
   * # HELP metric_name Description of metric
   * # TYPE metric_name counter
   */
  render(): string {
    const lines: string[] = [];

    for (const def of this.definitions.values()) {
      lines.push(`# HELP ${def.name} ${def.help}`);
      lines.push(`# TYPE ${def.name} ${def.type}`);

      if (def.type === 'counter') {
        for (const s of this.counters.get(def.name)?.values() ?? []) {
          lines.push(`${def.name}${formatLabels(s.labels)} ${s.value}`);
        }
        continue;
      }

      const buckets = def.buckets ?? [];
      for (const h of this.histograms.get(def.name)?.values() ?? []) {
        let cumulative = 0;
        buckets.forEach((le, i) => {
          cumulative += h.counts[i] ?? 0;
          lines.push(`${def.name}_bucket${formatLabels({ ...h.labels, le: String(le) })} ${cumulative}`);
        });
        lines.push(`${def.name}_bucket${formatLabels({ ...h.labels, le: '+Inf' })} ${h.count}`);
        lines.push(`${def.name}_sum${formatLabels(h.labels)} ${h.sum}`);
        lines.push(`${def.name}_count${formatLabels(h.labels)} ${h.count}`);
      }
    }

    return `${lines.join('\n')}\n`;
  }
}
