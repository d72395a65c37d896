import {
  formatDateTime,
  formatDayFirstDateTime,
  formatDollars,
  subtractDays,
  toCents,
} from '../../src/utils/format';

describe('format', () => {
  const date = new Date('2026-03-02T06:05:09.000Z');

  it('should format report timestamps in UTC', () => {
    expect(formatDateTime(date)).toBe('2026-03-02 06:05:09');
  });

  it('should format day-first timestamps', () => {
    expect(formatDayFirstDateTime(date)).toBe('02/03/2026-06:05:09');
  });

  it('should render cents as dollars with two decimals', () => {
    expect(formatDollars(123456)).toBe('$1234.56');
    expect(formatDollars(0)).toBe('$0.00');
    expect(formatDollars(5)).toBe('$0.05');
  });

  it('should round dollars to whole cents', () => {
    expect(toCents(19.99)).toBe(1999);
    expect(toCents(0.1 + 0.2)).toBe(30);
  });

  it('should subtract whole days', () => {
    expect(subtractDays(date, 365).toISOString()).toBe('2025-03-02T06:05:09.000Z');
  });
});
