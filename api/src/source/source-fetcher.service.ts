import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import {
  DomainError,
  EmptyResultError,
  RateLimitedError,
  SourceUnavailableError,
  ValidationFailureError,
  errorMessage,
} from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { Bar, DateRange, Series } from '../common/models/bar.model';
import { findBarProblems } from '../common/utils/bars.utils';
import { backoffDelay, withRetry } from '../common/utils/retry.utils';
import { toUnixSeconds, unixToISODate } from '../common/utils/time.utils';
import type { AppConfig, SourceConfig } from '../config/configuration';
import { METRIC, MetricsService } from '../metrics/metrics.service';
import { chartError, parseChartPayload } from './chart-payload';

type AttemptOutcome = 'ok' | 'rate_limited' | 'unavailable' | 'empty' | 'invalid';

/**
 * Fallback path to the external daily-bar provider.
 * Stateless: callers serialize work per instrument; different instruments
 * may be fetched concurrently.
 */
@Injectable()
export class SourceFetcherService {
  private readonly logger = new Logger(SourceFetcherService.name);
  private readonly cfg: SourceConfig;

  constructor(
    private readonly http: HttpService,
    private readonly universe: InstrumentUniverse,
    private readonly metrics: MetricsService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.cfg = config.get('source', { infer: true });
  }

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Validated bars in the half-open range [from, to), ascending.
   * RateLimited is retried with capped exponential backoff, SourceUnavailable a
   * fixed number of times; EmptyResult and ValidationFailure surface at once.
   */
  async fetch(instrumentId: string, range: DateRange): Promise<Series> {
    if (range.to <= range.from) return [];

    let rateLimited = 0;
    let unavailable = 0;

    return withRetry((attempt) => this.fetchOnce(instrumentId, range, attempt), {
      decide: (err) => {
        if (err instanceof RateLimitedError) {
          rateLimited++;
          return rateLimited < this.cfg.rateLimit.maxAttempts
            ? backoffDelay(rateLimited, this.cfg.rateLimit)
            : undefined;
        }
        if (err instanceof SourceUnavailableError) {
          unavailable++;
          return unavailable <= this.cfg.unavailable.retries ? this.cfg.unavailable.delayMs : undefined;
        }
        return undefined;
      },
      onRetry: (err, attempt, wait) =>
        this.logger.warn(
          `[fetch] ${instrumentId} attempt ${attempt} failed (${errorMessage(err)}); retrying in ${wait}ms`,
        ),
    });
  }

  /* ---------------------------- Provider fetch --------------------------- */

  private async fetchOnce(instrumentId: string, range: DateRange, attempt: number): Promise<Series> {
    const symbol = this.universe.providerSymbol(instrumentId);
    const url = `${this.cfg.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`;
    const ctx = { instrumentId, from: range.from, to: range.to, attempt };

    let body: unknown;
    try {
      const res = await firstValueFrom(
        this.http.get<unknown>(url, {
          params: {
            period1: toUnixSeconds(range.from),
            period2: toUnixSeconds(range.to),
            interval: '1d',
            events: 'history',
          },
          timeout: this.cfg.timeoutMs,
        }),
      );
      body = res.data;
    } catch (e: unknown) {
      throw this.fail(instrumentId, this.toSourceError(e, ctx));
    }

    const payload = parseChartPayload(body);
    if (!payload) {
      const detail = chartError(body) ?? 'unexpected payload shape';
      throw this.fail(
        instrumentId,
        new ValidationFailureError(`Provider returned an unusable payload for ${symbol}: ${detail}`, ctx),
      );
    }

    const fetchedAt = new Date().toISOString();
    const bars: Bar[] = [];
    let gaps = 0;

    for (const r of payload.rows) {
      const date = unixToISODate(r.timestamp, payload.gmtoffset);
      if (date < range.from || date >= range.to) continue;
      if (r.open === null || r.high === null || r.low === null || r.close === null) {
        gaps++; // provider gap, not bad data
        continue;
      }
      bars.push({
        instrumentId,
        date,
        open: r.open,
        high: r.high,
        low: r.low,
        close: r.close,
        volume: r.volume ?? 0,
        fetchedAt,
      });
    }

    const problems = findBarProblems(bars);
    const first = problems[0];
    if (first) {
      throw this.fail(
        instrumentId,
        new ValidationFailureError(
          `${problems.length} invalid bar(s) for ${instrumentId}; first at ${first.date}: ${first.problem}`,
          { ...ctx, date: first.date },
        ),
      );
    }

    if (!bars.length) {
      throw this.fail(
        instrumentId,
        new EmptyResultError(`No usable bars for ${instrumentId} in [${range.from}, ${range.to})`, ctx),
      );
    }

    this.countAttempt(instrumentId, 'ok');
    this.logger.log(
      `[bars] ${instrumentId} ${range.from}..${range.to} -> ${bars.length} bars` +
        (gaps ? ` (${gaps} incomplete rows skipped)` : ''),
    );
    return bars;
  }

  /* ------------------------------- Helpers ------------------------------ */

  private toSourceError(e: unknown, ctx: Record<string, string | number>): DomainError {
    if (isAxiosError(e)) {
      const status = e.response?.status;
      if (status === 429) {
        return new RateLimitedError(`Provider throttled ${ctx.instrumentId}`, ctx, { cause: e });
      }
      if (status === 404) {
        return new EmptyResultError(`Provider has no data for ${ctx.instrumentId}`, ctx, { cause: e });
      }
      const reason = status ? `HTTP ${status}` : (e.code ?? e.message);
      return new SourceUnavailableError(`Provider request failed: ${reason}`, ctx, { cause: e });
    }
    return new SourceUnavailableError(`Provider request failed: ${errorMessage(e)}`, ctx, { cause: e });
  }

  /** Counts the failed attempt and hands the error back for throwing. */
  private fail<E extends DomainError>(instrumentId: string, err: E): E {
    let outcome: AttemptOutcome = 'invalid';
    if (err instanceof RateLimitedError) outcome = 'rate_limited';
    else if (err instanceof SourceUnavailableError) outcome = 'unavailable';
    else if (err instanceof EmptyResultError) outcome = 'empty';
    this.countAttempt(instrumentId, outcome);
    return err;
  }

  private countAttempt(instrumentId: string, outcome: AttemptOutcome): void {
    this.metrics.increment(METRIC.sourceAttempts, { instrument: instrumentId, outcome });
  }
}
