import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InsufficientHistoryError,
  errorMessage,
  isSourceError,
} from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { DateRange, Series } from '../common/models/bar.model';
import { TradingCalendar } from '../common/utils/calendar.utils';
import { KeyedMutex } from '../common/utils/concurrency.utils';
import { addDays, todayUTC } from '../common/utils/time.utils';
import type { AppConfig, SourceConfig } from '../config/configuration';
import { CacheLookup, PutSummary, SeriesCacheService } from '../series/series-cache.service';
import { SourceFetcherService } from '../source/source-fetcher.service';

export interface Quote {
  instrumentId: string;
  date: string;
  price: number;
  open: number;
  high: number;
  low: number;
  volume: number;
  previousClose: number | null;
  change: number | null;
  changePercent: number | null;
  fetchedAt: string;
}

export interface RefreshOptions {
  /** Re-fetch the whole window even when the cache is fresh. */
  force?: boolean;
  /** Calendar days of history to request when starting from scratch. */
  historyDays?: number;
}

export interface RefreshSummary extends PutSummary {
  instrumentId: string;
  range: DateRange | null; // null when the cache was already fresh
  fetched: number;
}

/**
 * Keeps the series cache filled from the data source.
 *
 * The one caller of SourceFetcher: every fetch-and-store for an instrument runs
 * under that instrument's lock, so overlapping ranges are never written twice
 * at the same time. Different instruments proceed in parallel.
 */
@Injectable()
export class MarketService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MarketService.name);
  private readonly locks = new KeyedMutex();
  private readonly cfg: SourceConfig;
  private timer: NodeJS.Timeout | undefined;
  private sweep: Promise<void> | undefined;

  constructor(
    private readonly cache: SeriesCacheService,
    private readonly source: SourceFetcherService,
    private readonly calendar: TradingCalendar,
    private readonly universe: InstrumentUniverse,
    config: ConfigService<AppConfig, true>,
  ) {
    this.cfg = config.get('source', { infer: true });
  }

  /* ------------------------------ Lifecycle ----------------------------- */

  onModuleInit(): void {
    const minutes = this.cfg.autoRefreshMinutes;
    if (minutes <= 0) return;
    this.timer = setInterval(() => this.startSweep(), minutes * 60_000);
    this.timer.unref();
    this.logger.log(`Auto-refresh every ${minutes} min for ${this.universe.list().join(', ')}`);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    await this.sweep;
  }

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Every cached bar up to `asOf`, refreshed from the source when the cache
   * misses. Fetches stop at the last completed session. Serves a stale series (with a warning) when the source cannot
   * provide newer bars but the cache already holds `minBars`.
   */
  async loadSeries(instrumentId: string, asOf: string, minBars: number): Promise<Series> {
    const id = this.universe.assert(instrumentId);

    return this.locks.run(id, async () => {
      const first = await this.cache.get(id, asOf, minBars);
      if (first.hit) return first.series;

      const range = this.missRange(first, asOf, minBars, this.cfg.historyDays);
      try {
        await this.fetchAndStore(id, range);
      } catch (e) {
        if (!isSourceError(e) || first.series.length < minBars) throw e;
        this.logger.warn(
          `${id}: refresh failed (${errorMessage(e)}); serving ${first.series.length} cached bars ` +
            `up to ${first.series.at(-1)?.date ?? '?'}`,
        );
        return first.series;
      }

      const second = await this.cache.get(id, asOf, minBars);
      if (second.hit) return second.series;

      if (second.reason === 'Stale' && second.series.length >= minBars) {
        this.logger.warn(
          `${id}: source has nothing after ${second.series.at(-1)?.date ?? '?'}; serving stale series`,
        );
        return second.series;
      }

      throw new InsufficientHistoryError(
        `${id} has ${second.series.length} usable bars up to ${asOf}; ${minBars} needed`,
        { instrumentId: id, asOf, bars: second.series.length, required: minBars },
      );
    });
  }

  /**
   * Brings the cache up to date for `asOf`. With `force` the whole history
   * window is fetched again, whatever the cache holds.
   */
  async refresh(instrumentId: string, asOf: string, opts: RefreshOptions = {}): Promise<RefreshSummary> {
    const id = this.universe.assert(instrumentId);
    const historyDays = opts.historyDays ?? this.cfg.historyDays;

    return this.locks.run(id, async () => {
      const to = this.fetchHorizon(asOf);
      let range: DateRange;
      if (opts.force) {
        range = { from: addDays(asOf, -historyDays), to };
      } else {
        const newest = await this.cache.latest(id);
        if (newest && newest.date >= this.calendar.lastCompletedTradingDay(asOf)) {
          return { instrumentId: id, range: null, fetched: 0, inserted: 0, revised: 0, unchanged: 0, pruned: 0 };
        }
        range = { from: newest ? addDays(newest.date, 1) : addDays(asOf, -historyDays), to };
      }
      return this.fetchAndStore(id, range);
    });
  }

  /**
   * Newest cached bar as a quote, refreshing first when the cache is stale.
   */
  async getQuote(instrumentId: string): Promise<Quote> {
    const series = await this.loadSeries(instrumentId, todayUTC(), 1);
    const last = series[series.length - 1];
    if (!last) {
      throw new InsufficientHistoryError(`No bars cached for ${instrumentId}`, { instrumentId });
    }
    const prev = series[series.length - 2];
    const previousClose = prev ? prev.close : null;
    const change = previousClose === null ? null : last.close - previousClose;

    return {
      instrumentId: last.instrumentId,
      date: last.date,
      price: last.close,
      open: last.open,
      high: last.high,
      low: last.low,
      volume: last.volume,
      previousClose,
      change,
      changePercent: change === null || !previousClose ? null : (change / previousClose) * 100,
      fetchedAt: last.fetchedAt,
    };
  }

  /**
   * Cached bars in [from, to). Defaults to the last 30 calendar days.
   */
  async getBars(instrumentId: string, from?: string, to?: string): Promise<Series> {
    const id = this.universe.assert(instrumentId);
    const end = to ?? addDays(todayUTC(), 1);
    const start = from ?? addDays(end, -30);
    return this.cache.range(id, { from: start, to: end });
  }

  /* ------------------------------- Helpers ------------------------------ */

  /**
   * Stale caches that are otherwise long enough only need the missing tail;
   * everything else is re-fetched over the full history window.
   */
  private missRange(miss: CacheLookup, asOf: string, minBars: number, historyDays: number): DateRange {
    const to = this.fetchHorizon(asOf);
    const newest = miss.series.at(-1);
    if (!miss.hit && miss.reason === 'Stale' && newest && miss.series.length >= minBars) {
      return { from: addDays(newest.date, 1), to };
    }
    return { from: addDays(asOf, -historyDays), to };
  }

  /**
   * Exclusive end of every fetch: the day after the last completed session.
   * The `asOf` session may still be trading and its bar is not final.
   */
  private fetchHorizon(asOf: string): string {
    return addDays(this.calendar.lastCompletedTradingDay(asOf), 1);
  }

  private async fetchAndStore(instrumentId: string, range: DateRange): Promise<RefreshSummary> {
    const received = await this.source.fetch(instrumentId, range);
    const bars = received.filter((b) => b.date >= range.from && b.date < range.to);
    if (bars.length < received.length) {
      const dropped = received.length - bars.length;
      this.logger.debug(`${instrumentId}: dropped ${dropped} bar(s) outside [${range.from}, ${range.to})`);
    }
    const summary = await this.cache.put(instrumentId, bars);
    return { instrumentId, range, fetched: bars.length, ...summary };
  }

  private startSweep(): void {
    if (this.sweep) return; // previous sweep still running
    this.sweep = this.refreshAll().finally(() => {
      this.sweep = undefined;
    });
  }

  private async refreshAll(): Promise<void> {
    const asOf = todayUTC();
    for (const id of this.universe.list()) {
      try {
        const r = await this.refresh(id, asOf);
        if (r.fetched) this.logger.log(`[auto-refresh] ${id}: ${r.fetched} bars fetched`);
      } catch (e) {
        this.logger.warn(`[auto-refresh] ${id} failed: ${errorMessage(e)}`);
      }
    }
  }
}
