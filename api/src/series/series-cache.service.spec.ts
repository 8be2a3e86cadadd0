import { ValidationFailureError } from '../common/errors/domain.errors';
import { TradingCalendar } from '../common/utils/calendar.utils';
import { METRIC, MetricsService } from '../metrics/metrics.service';
import { makeBars, tradingDaysUntil } from '../testing/fixtures';
import { testConfig } from '../testing/test-config';
import { SqliteBarStore } from './bar-store';
import { SeriesCacheService } from './series-cache.service';

describe('SeriesCacheService', () => {
  let store: SqliteBarStore;
  let metrics: MetricsService;
  let cache: SeriesCacheService;

  const build = (retentionTradingDays = 0) => {
    store = new SqliteBarStore(':memory:');
    metrics = new MetricsService();
    cache = new SeriesCacheService(
      store,
      new TradingCalendar(),
      metrics,
      testConfig({ cache: { retentionTradingDays } }),
    );
  };

  beforeEach(() => build());
  afterEach(() => store.onModuleDestroy());

  // 2024-06-12 is a Wednesday; the last completed session is Tuesday 06-11
  const asOf = '2024-06-12';

  it('returns exactly what was put', async () => {
    const bars = makeBars('PETR4', tradingDaysUntil('2024-06-11', 10));
    await cache.put('PETR4', bars);

    const lookup = await cache.get('PETR4', asOf, 10);
    expect(lookup).toEqual({ hit: true, series: bars });
  });

  it('never returns bars dated after as-of', async () => {
    const bars = makeBars('PETR4', tradingDaysUntil('2024-06-12', 6));
    await cache.put('PETR4', bars);

    const lookup = await cache.get('PETR4', '2024-06-11', 5);
    expect(lookup.hit).toBe(true);
    expect(lookup.series.map((b) => b.date)).toEqual(bars.slice(0, 5).map((b) => b.date));
  });

  it('reports Empty, then Stale, then Insufficient', async () => {
    expect(await cache.get('PETR4', asOf, 5)).toEqual({ hit: false, reason: 'Empty', series: [] });

    await cache.put('PETR4', makeBars('PETR4', tradingDaysUntil('2024-06-07', 3)));
    const stale = await cache.get('PETR4', asOf, 10);
    expect(stale.hit ? null : stale.reason).toBe('Stale');
    expect(stale.series).toHaveLength(3);

    await cache.put('PETR4', makeBars('PETR4', ['2024-06-10', '2024-06-11']));
    const short = await cache.get('PETR4', asOf, 10);
    expect(short.hit ? null : short.reason).toBe('Insufficient');
    expect(short.series).toHaveLength(5);
  });

  it('counts misses per instrument and reason', async () => {
    await cache.get('PETR4', asOf, 1);
    await cache.get('PETR4', asOf, 1);
    await cache.get('VALE3', asOf, 1);

    expect(cache.missCount('PETR4')).toBe(2);
    expect(cache.missCounts()).toEqual({ PETR4: 2, VALE3: 1 });
    expect(metrics.counterValue(METRIC.cacheMisses, { instrument: 'PETR4', reason: 'Empty' })).toBe(2);
  });

  it('overwrites a differing bar and reports it as a revision', async () => {
    const [bar] = makeBars('PETR4', ['2024-06-11']);
    if (!bar) throw new Error('fixture');
    await cache.put('PETR4', [bar]);

    const revised = { ...bar, close: bar.close + 0.25, fetchedAt: '2024-06-12T10:00:00.000Z' };
    const summary = await cache.put('PETR4', [revised]);

    expect(summary).toEqual({ inserted: 0, revised: 1, unchanged: 0, pruned: 0 });
    expect(await cache.latest('PETR4')).toEqual(revised);
    expect(metrics.counterValue(METRIC.cacheRevisions, { instrument: 'PETR4' })).toBe(1);
  });

  it('keeps the original fetch time when a bar comes back unchanged', async () => {
    const bars = makeBars('PETR4', ['2024-06-10', '2024-06-11']);
    await cache.put('PETR4', bars);

    const again = bars.map((b) => ({ ...b, fetchedAt: '2024-06-12T10:00:00.000Z' }));
    const summary = await cache.put('PETR4', again);

    expect(summary).toEqual({ inserted: 0, revised: 0, unchanged: 2, pruned: 0 });
    expect((await cache.latest('PETR4'))?.fetchedAt).toBe(bars[1]?.fetchedAt);
  });

  it('prunes to the newest N bars when retention is set', async () => {
    store.onModuleDestroy();
    build(5);
    const dates = tradingDaysUntil('2024-06-11', 8);
    const summary = await cache.put('PETR4', makeBars('PETR4', dates));

    expect(summary).toEqual({ inserted: 8, revised: 0, unchanged: 0, pruned: 3 });
    expect((await cache.upTo('PETR4', asOf)).map((b) => b.date)).toEqual(dates.slice(3));
  });

  it('reads a half-open range', async () => {
    const dates = tradingDaysUntil('2024-06-11', 5);
    await cache.put('PETR4', makeBars('PETR4', dates));

    const range = await cache.range('PETR4', { from: '2024-06-05', to: '2024-06-11' });
    expect(range.map((b) => b.date)).toEqual(['2024-06-05', '2024-06-06', '2024-06-07', '2024-06-10']);
  });

  it('rejects batches for another instrument or with duplicate dates', async () => {
    await expect(cache.put('PETR4', makeBars('VALE3', ['2024-06-11']))).rejects.toBeInstanceOf(
      ValidationFailureError,
    );
    await expect(
      cache.put('PETR4', makeBars('PETR4', ['2024-06-11', '2024-06-11'])),
    ).rejects.toBeInstanceOf(ValidationFailureError);
  });
});
