import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ValidationFailureError } from '../common/errors/domain.errors';
import { Bar, DateRange, Series } from '../common/models/bar.model';
import { TradingCalendar } from '../common/utils/calendar.utils';
import { KeyedMutex } from '../common/utils/concurrency.utils';
import type { AppConfig } from '../config/configuration';
import { METRIC, MetricsService } from '../metrics/metrics.service';
import { SqliteBarStore } from './bar-store';

export type CacheMissReason = 'Empty' | 'Stale' | 'Insufficient';

export type CacheLookup =
  | { hit: true; series: Series }
  | { hit: false; reason: CacheMissReason; series: Series };

export interface PutSummary {
  inserted: number;
  revised: number;
  unchanged: number;
  pruned: number;
}

/**
 * Persistent daily bars per instrument: the single answer to
 * "do we already have this data". Freshness is judged against the
 * trading calendar, never a wall-clock TTL.
 */
@Injectable()
export class SeriesCacheService {
  private readonly logger = new Logger(SeriesCacheService.name);
  private readonly writes = new KeyedMutex();
  private readonly misses = new Map<string, number>();
  private readonly retention: number;

  constructor(
    private readonly store: SqliteBarStore,
    private readonly calendar: TradingCalendar,
    private readonly metrics: MetricsService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.retention = config.get('cache', { infer: true }).retentionTradingDays;
  }

  /**
   * Bars dated on or before `asOf`, when there are at least `minBars` of them
   * and the newest is the last completed trading day (or later).
   * Otherwise a typed miss that still carries whatever is cached.
   */
  async get(instrumentId: string, asOf: string, minBars: number): Promise<CacheLookup> {
    const series = this.store.upTo(instrumentId, asOf);
    const reason = this.missReason(series, asOf, minBars);

    if (!reason) return { hit: true, series };

    this.recordMiss(instrumentId, reason);
    this.logger.debug(
      `miss ${instrumentId} as of ${asOf}: ${reason} (${series.length} bars, newest ${series.at(-1)?.date ?? 'none'})`,
    );
    return { hit: false, reason, series };
  }

  /**
   * Idempotent upsert keyed by (instrumentId, date). A bar that differs from the
   * stored one overwrites it and is reported as a data revision.
   */
  async put(instrumentId: string, bars: Bar[]): Promise<PutSummary> {
    this.assertBatch(instrumentId, bars);

    return this.writes.run(instrumentId, async () => {
      const summary: PutSummary = { inserted: 0, revised: 0, unchanged: 0, pruned: 0 };

      for (const r of this.store.upsert(bars)) {
        summary[r.outcome]++;
        if (r.outcome === 'revised' && r.previous) {
          this.metrics.increment(METRIC.cacheRevisions, { instrument: instrumentId });
          this.logger.warn(
            `data revision ${instrumentId} ${r.bar.date}: ` +
              `close ${r.previous.close} -> ${r.bar.close}, volume ${r.previous.volume} -> ${r.bar.volume}`,
          );
        }
      }

      if (this.retention > 0) {
        summary.pruned = this.store.retainNewest(instrumentId, this.retention);
      }

      if (summary.inserted || summary.revised || summary.pruned) {
        this.logger.log(
          `${instrumentId}: +${summary.inserted} new, ${summary.revised} revised, ${summary.pruned} pruned`,
        );
      }
      return summary;
    });
  }

  /** Everything cached up to `asOf`, with no freshness judgement. */
  async upTo(instrumentId: string, asOf: string): Promise<Series> {
    return this.store.upTo(instrumentId, asOf);
  }

  async latest(instrumentId: string): Promise<Bar | null> {
    return this.store.latest(instrumentId);
  }

  async range(instrumentId: string, range: DateRange): Promise<Series> {
    return this.store.range(instrumentId, range.from, range.to);
  }

  /** Misses recorded for one instrument since start-up. */
  missCount(instrumentId: string): number {
    return this.misses.get(instrumentId) ?? 0;
  }

  missCounts(): Record<string, number> {
    return Object.fromEntries(this.misses);
  }

  /* ------------------------------- Helpers ------------------------------ */

  private missReason(series: Series, asOf: string, minBars: number): CacheMissReason | null {
    const newest = series.at(-1);
    if (!newest) return 'Empty';
    if (newest.date < this.calendar.lastCompletedTradingDay(asOf)) return 'Stale';
    if (series.length < minBars) return 'Insufficient';
    return null;
  }

  private recordMiss(instrumentId: string, reason: CacheMissReason): void {
    this.misses.set(instrumentId, this.missCount(instrumentId) + 1);
    this.metrics.increment(METRIC.cacheMisses, { instrument: instrumentId, reason });
  }

  private assertBatch(instrumentId: string, bars: Bar[]): void {
    const seen = new Set<string>();
    for (const b of bars) {
      if (b.instrumentId !== instrumentId) {
        throw new ValidationFailureError(
          `Bar for ${b.instrumentId} submitted under ${instrumentId}`,
          { instrumentId, date: b.date },
        );
      }
      if (seen.has(b.date)) {
        throw new ValidationFailureError(`Duplicate bar date ${b.date}`, {
          instrumentId,
          date: b.date,
        });
      }
      seen.add(b.date);
    }
  }
}
