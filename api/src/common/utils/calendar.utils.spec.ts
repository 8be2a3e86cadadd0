import { TradingCalendar } from './calendar.utils';

describe('TradingCalendar', () => {
  const cal = new TradingCalendar(['2024-06-05']);

  it('treats weekends and configured holidays as closed', () => {
    expect(cal.isTradingDay('2024-06-03')).toBe(true); // Monday
    expect(cal.isTradingDay('2024-06-05')).toBe(false); // holiday
    expect(cal.isTradingDay('2024-06-08')).toBe(false); // Saturday
    expect(cal.isTradingDay('2024-06-09')).toBe(false); // Sunday
  });

  it('steps over weekends and holidays', () => {
    expect(cal.nextTradingDay('2024-06-07')).toBe('2024-06-10');
    expect(cal.previousTradingDay('2024-06-10')).toBe('2024-06-07');
    expect(cal.nextTradingDay('2024-06-04')).toBe('2024-06-06');
    expect(cal.previousTradingDay('2024-06-06')).toBe('2024-06-04');
  });

  it('never counts the as-of session as completed', () => {
    expect(cal.lastCompletedTradingDay('2024-06-07')).toBe('2024-06-06');
    expect(cal.lastCompletedTradingDay('2024-06-09')).toBe('2024-06-07');
  });

  it('counts trading days in (from, to]', () => {
    expect(cal.tradingDaysBetween('2024-06-03', '2024-06-10')).toBe(4);
    expect(cal.tradingDaysBetween('2024-06-10', '2024-06-03')).toBe(0);
    expect(cal.tradingDaysBetween('2024-06-07', '2024-06-09')).toBe(0);
  });

  it('rejects malformed dates', () => {
    expect(() => cal.isTradingDay('2024-6-3')).toThrow(RangeError);
  });
});
