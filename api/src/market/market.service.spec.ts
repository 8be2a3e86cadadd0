import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { setImmediate as tick } from 'node:timers/promises';
import {
  InstrumentUnsupportedError,
  InsufficientHistoryError,
  SourceUnavailableError,
} from '../common/errors/domain.errors';
import { InstrumentUniverse } from '../common/instruments';
import { Bar, DateRange } from '../common/models/bar.model';
import { TradingCalendar } from '../common/utils/calendar.utils';
import { MetricsService } from '../metrics/metrics.service';
import { SqliteBarStore } from '../series/bar-store';
import { SeriesCacheService } from '../series/series-cache.service';
import { SourceFetcherService } from '../source/source-fetcher.service';
import { makeBars, tradingDays, tradingDaysUntil } from '../testing/fixtures';
import { testConfig } from '../testing/test-config';
import { MarketService } from './market.service';

describe('MarketService', () => {
  // Wednesday; the last completed session is Tuesday 2024-06-11
  const asOf = '2024-06-12';

  let market: MarketService;
  let cache: SeriesCacheService;
  let store: SqliteBarStore;
  let fetch: jest.Mock<Promise<Bar[]>, [string, DateRange]>;

  beforeEach(async () => {
    store = new SqliteBarStore(':memory:');
    fetch = jest.fn<Promise<Bar[]>, [string, DateRange]>();

    const moduleRef = await Test.createTestingModule({
      providers: [
        MarketService,
        SeriesCacheService,
        MetricsService,
        { provide: SqliteBarStore, useValue: store },
        { provide: SourceFetcherService, useValue: { fetch } },
        { provide: TradingCalendar, useValue: new TradingCalendar() },
        { provide: InstrumentUniverse, useValue: new InstrumentUniverse(['PETR4', 'VALE3'], '.SA') },
        { provide: ConfigService, useValue: testConfig() },
      ],
    }).compile();

    market = moduleRef.get(MarketService);
    cache = moduleRef.get(SeriesCacheService);
  });

  afterEach(() => {
    jest.useRealTimers();
    store.onModuleDestroy();
  });

  const seed = (dates: string[]) => cache.put('PETR4', makeBars('PETR4', dates));

  it('serves a fresh cache without touching the source', async () => {
    await seed(tradingDaysUntil('2024-06-11', 60));

    const series = await market.loadSeries('PETR4', asOf, 60);
    expect(series).toHaveLength(60);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('appends the missing days to a stale cache and then serves it', async () => {
    await seed(tradingDaysUntil('2024-06-10', 60));
    fetch.mockResolvedValueOnce(makeBars('PETR4', ['2024-06-11', '2024-06-12'], () => 30));

    const series = await market.loadSeries('PETR4', asOf, 60);

    expect(fetch).toHaveBeenCalledWith('PETR4', { from: '2024-06-11', to: '2024-06-12' });
    expect(series).toHaveLength(61);
    expect(series.at(-1)?.date).toBe('2024-06-11');
    expect(cache.missCount('PETR4')).toBe(1);
  });

  it('never stores the bar of a session that is still trading', async () => {
    await seed(tradingDaysUntil('2024-06-10', 60));
    fetch
      .mockResolvedValueOnce(makeBars('PETR4', ['2024-06-11', '2024-06-12'], () => 30))
      .mockResolvedValueOnce(makeBars('PETR4', ['2024-06-12'], () => 31));

    await market.loadSeries('PETR4', '2024-06-12', 60);
    expect(await cache.latest('PETR4')).toMatchObject({ date: '2024-06-11', close: 30 });

    const next = await market.loadSeries('PETR4', '2024-06-13', 60);

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch).toHaveBeenLastCalledWith('PETR4', { from: '2024-06-12', to: '2024-06-13' });
    expect(next.at(-1)).toMatchObject({ date: '2024-06-12', close: 31 });
  });

  it('fetches the whole history window for an empty cache', async () => {
    fetch.mockResolvedValueOnce(makeBars('PETR4', tradingDaysUntil('2024-06-11', 80)));

    await expect(market.loadSeries('pETR4', asOf, 60)).resolves.toHaveLength(80);
    expect(fetch).toHaveBeenCalledWith('PETR4', { from: '2023-06-13', to: '2024-06-12' });
  });

  it('falls back to the cached series when the refresh fails', async () => {
    await seed(tradingDaysUntil('2024-06-10', 60));
    fetch.mockRejectedValueOnce(new SourceUnavailableError('down'));

    const series = await market.loadSeries('PETR4', asOf, 60);
    expect(series.at(-1)?.date).toBe('2024-06-10');
  });

  it('serves a series the source cannot extend any further', async () => {
    await seed(tradingDaysUntil('2024-06-10', 60));
    fetch.mockResolvedValueOnce([]);

    await expect(market.loadSeries('PETR4', asOf, 60)).resolves.toHaveLength(60);
  });

  it('surfaces the source error when the cache cannot cover the request', async () => {
    await seed(tradingDaysUntil('2024-06-10', 10));
    fetch.mockRejectedValueOnce(new SourceUnavailableError('down'));

    await expect(market.loadSeries('PETR4', asOf, 60)).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('reports insufficient history when the source has too little', async () => {
    fetch.mockResolvedValueOnce(makeBars('PETR4', tradingDaysUntil('2024-06-11', 10)));

    await expect(market.loadSeries('PETR4', asOf, 60)).rejects.toThrow(
      'PETR4 has 10 usable bars up to 2024-06-12; 60 needed',
    );
  });

  it('fetches once when concurrent loads miss together', async () => {
    fetch.mockImplementation(async () => {
      await tick();
      return makeBars('PETR4', tradingDaysUntil('2024-06-11', 60));
    });

    const [a, b] = await Promise.all([
      market.loadSeries('PETR4', asOf, 60),
      market.loadSeries('PETR4', asOf, 60),
    ]);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(a).toEqual(b);
  });

  it('rejects instruments outside the universe', async () => {
    await expect(market.loadSeries('AAPL', asOf, 1)).rejects.toBeInstanceOf(InstrumentUnsupportedError);
    expect(fetch).not.toHaveBeenCalled();
  });

  describe('refresh', () => {
    it('does nothing when the cache is current', async () => {
      await seed(tradingDaysUntil('2024-06-11', 5));

      const summary = await market.refresh('PETR4', asOf);
      expect(summary).toMatchObject({ range: null, fetched: 0 });
      expect(fetch).not.toHaveBeenCalled();
    });

    it('re-fetches the whole window when forced', async () => {
      const full = makeBars('PETR4', tradingDaysUntil('2024-06-12', 21));
      await cache.put('PETR4', full.slice(15, 20)); // 06-05 .. 06-11
      fetch.mockResolvedValueOnce(full);

      const summary = await market.refresh('PETR4', asOf, { force: true, historyDays: 30 });

      // the 06-12 session is still open and is left out
      expect(fetch).toHaveBeenCalledWith('PETR4', { from: '2024-05-13', to: '2024-06-12' });
      expect(summary).toMatchObject({ fetched: 20, inserted: 15, revised: 0, unchanged: 5 });
      expect(await cache.latest('PETR4')).toMatchObject({ date: '2024-06-11' });
    });
  });

  it('quotes the newest bar against the previous close', async () => {
    jest.useFakeTimers({ now: new Date('2024-06-12T15:00:00Z'), doNotFake: ['nextTick', 'setImmediate'] });
    await seed(tradingDays('2024-06-03', 7)); // 06-03 .. 06-11

    const quote = await market.getQuote('PETR4');

    expect(quote).toMatchObject({ instrumentId: 'PETR4', date: '2024-06-11', previousClose: 20.5 });
    expect(quote.price).toBeCloseTo(20.6);
    expect(quote.change).toBeCloseTo(0.1);
    expect(quote.changePercent).toBeCloseTo((0.1 / 20.5) * 100);
  });

  it('reads cached bars for a date range', async () => {
    await seed(tradingDays('2024-06-03', 7));
    const bars = await market.getBars('PETR4', '2024-06-05', '2024-06-07');
    expect(bars.map((b) => b.date)).toEqual(['2024-06-05', '2024-06-06']);
  });
});
