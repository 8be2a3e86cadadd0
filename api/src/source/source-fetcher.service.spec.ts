import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import {
  EmptyResultError,
  RateLimitedError,
  SourceUnavailableError,
  ValidationFailureError,
} from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { toUnixSeconds } from '../common/utils/time.utils';
import { METRIC, MetricsService } from '../metrics/metrics.service';
import { testConfig } from '../testing/test-config';
import { SourceFetcherService } from './source-fetcher.service';

interface Row {
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

function row(date: string, close: number | null, extra: Partial<Row> = {}): Row {
  const c = close ?? 10;
  return { date, open: c, high: c + 1, low: c - 1, close, volume: 100, ...extra };
}

// Provider timestamps are the session open in UTC; B3 is UTC-3
function chartBody(rows: Row[]) {
  return {
    chart: {
      result: [
        {
          meta: { gmtoffset: -10800 },
          timestamp: rows.map((r) => toUnixSeconds(r.date) + 13 * 3600),
          indicators: {
            quote: [
              {
                open: rows.map((r) => r.open),
                high: rows.map((r) => r.high),
                low: rows.map((r) => r.low),
                close: rows.map((r) => r.close),
                volume: rows.map((r) => r.volume),
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

const config = { headers: new AxiosHeaders() };

function ok(body: unknown): AxiosResponse<unknown> {
  return { data: body, status: 200, statusText: 'OK', headers: {}, config };
}

function httpError(status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data: {},
    status,
    statusText: '',
    headers: {},
    config,
  });
}

describe('SourceFetcherService', () => {
  const range = { from: '2024-06-03', to: '2024-06-06' };
  const good = chartBody([row('2024-06-03', 10), row('2024-06-04', 11), row('2024-06-05', 12)]);

  let fetcher: SourceFetcherService;
  let metrics: MetricsService;
  let get: jest.Mock;

  beforeEach(async () => {
    get = jest.fn();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SourceFetcherService,
        MetricsService,
        { provide: HttpService, useValue: { get } },
        { provide: InstrumentUniverse, useValue: new InstrumentUniverse(['PETR4'], '.SA') },
        { provide: ConfigService, useValue: testConfig({ instruments: ['PETR4'] }) },
      ],
    }).compile();

    fetcher = moduleRef.get(SourceFetcherService);
    metrics = moduleRef.get(MetricsService);
  });

  const attempts = (outcome: string) =>
    metrics.counterValue(METRIC.sourceAttempts, { instrument: 'PETR4', outcome });

  it('requests daily bars for the provider symbol over the range', async () => {
    get.mockReturnValueOnce(of(ok(good)));
    await fetcher.fetch('PETR4', range);

    expect(get).toHaveBeenCalledWith('http://provider.test/v8/finance/chart/PETR4.SA', {
      params: {
        period1: toUnixSeconds('2024-06-03'),
        period2: toUnixSeconds('2024-06-06'),
        interval: '1d',
        events: 'history',
      },
      timeout: 10_000,
    });
  });

  it('keeps in-range rows, drops gap rows and zero-fills a missing volume', async () => {
    get.mockReturnValueOnce(
      of(
        ok(
          chartBody([
            row('2024-06-03', 10),
            row('2024-06-04', null),
            row('2024-06-05', 12, { volume: null }),
            row('2024-06-06', 13),
          ]),
        ),
      ),
    );

    const bars = await fetcher.fetch('PETR4', range);

    expect(bars).toEqual([
      { instrumentId: 'PETR4', date: '2024-06-03', open: 10, high: 11, low: 9, close: 10, volume: 100, fetchedAt: expect.any(String) },
      { instrumentId: 'PETR4', date: '2024-06-05', open: 12, high: 13, low: 11, close: 12, volume: 0, fetchedAt: expect.any(String) },
    ]);
  });

  it('succeeds on the fourth attempt after three rate limits', async () => {
    get
      .mockReturnValueOnce(throwError(() => httpError(429)))
      .mockReturnValueOnce(throwError(() => httpError(429)))
      .mockReturnValueOnce(throwError(() => httpError(429)))
      .mockReturnValueOnce(of(ok(good)));

    const bars = await fetcher.fetch('PETR4', range);

    expect(bars).toHaveLength(3);
    expect(get).toHaveBeenCalledTimes(4);
    expect(attempts('rate_limited')).toBe(3);
    expect(attempts('ok')).toBe(1);
  });

  it('gives up on rate limits after the configured attempts', async () => {
    get.mockImplementation(() => throwError(() => httpError(429)));

    await expect(fetcher.fetch('PETR4', range)).rejects.toBeInstanceOf(RateLimitedError);
    expect(get).toHaveBeenCalledTimes(5);
  });

  it('retries an unavailable source a fixed number of times', async () => {
    get.mockImplementation(() => throwError(() => httpError(503)));

    await expect(fetcher.fetch('PETR4', range)).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(get).toHaveBeenCalledTimes(3);
    expect(attempts('unavailable')).toBe(3);
  });

  it('treats a transport failure without a response as unavailable', async () => {
    get
      .mockReturnValueOnce(throwError(() => new Error('socket hang up')))
      .mockReturnValueOnce(of(ok(good)));

    await expect(fetcher.fetch('PETR4', range)).resolves.toHaveLength(3);
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('fails validation at once, without retrying', async () => {
    get.mockReturnValue(of(ok(chartBody([row('2024-06-03', 10, { low: 12 })]))));

    await expect(fetcher.fetch('PETR4', range)).rejects.toBeInstanceOf(ValidationFailureError);
    expect(get).toHaveBeenCalledTimes(1);
    expect(attempts('invalid')).toBe(1);
  });

  it.each<[string, Row[], string]>([
    ['a non-positive price', [row('2024-06-03', 10), row('2024-06-04', 11, { close: 0 })], '2024-06-04: non-positive price'],
    ['an open outside the range', [row('2024-06-03', 10), row('2024-06-04', 11, { open: 13 })], '2024-06-04: open 13 outside [10, 12]'],
    ['a close outside the range', [row('2024-06-03', 10), row('2024-06-04', 11, { close: 9 })], '2024-06-04: close 9 outside [10, 12]'],
    ['a negative volume', [row('2024-06-03', 10), row('2024-06-04', 11, { volume: -5 })], '2024-06-04: negative volume'],
    [
      'a repeated date',
      [row('2024-06-03', 10), row('2024-06-04', 11), row('2024-06-04', 12)],
      '2024-06-04: date not after 2024-06-04',
    ],
    ['a date going backwards', [row('2024-06-04', 11), row('2024-06-03', 10)], '2024-06-03: date not after 2024-06-04'],
  ])('rejects %s in a single attempt', async (_, rows, detail) => {
    get.mockReturnValue(of(ok(chartBody(rows))));

    const err: unknown = await fetcher.fetch('PETR4', range).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationFailureError);
    expect(err instanceof Error ? err.message : '').toBe(`1 invalid bar(s) for PETR4; first at ${detail}`);
    expect(get).toHaveBeenCalledTimes(1);
    expect(attempts('invalid')).toBe(1);
  });

  it('rejects a payload without the chart shape', async () => {
    get.mockReturnValue(of(ok({ chart: { result: null, error: { code: 'Not Found', description: 'No data' } } })));

    await expect(fetcher.fetch('PETR4', range)).rejects.toThrow(
      'Provider returned an unusable payload for PETR4.SA: Not Found: No data',
    );
  });

  it('reports an empty result for no rows or a 404, without retrying', async () => {
    get.mockReturnValueOnce(of(ok(chartBody([]))));
    await expect(fetcher.fetch('PETR4', range)).rejects.toBeInstanceOf(EmptyResultError);

    get.mockReturnValueOnce(throwError(() => httpError(404)));
    await expect(fetcher.fetch('PETR4', range)).rejects.toBeInstanceOf(EmptyResultError);

    expect(get).toHaveBeenCalledTimes(2);
    expect(attempts('empty')).toBe(2);
  });

  it('skips the provider for an empty range', async () => {
    await expect(fetcher.fetch('PETR4', { from: '2024-06-05', to: '2024-06-05' })).resolves.toEqual([]);
    expect(get).not.toHaveBeenCalled();
  });
});
