import { daysUntil, formatTimeToResolution } from '../time';

const NOW = new Date('2026-03-01T00:00:00Z');
const at = (ms: number) => new Date(NOW.getTime() + ms);

describe('daysUntil', () => {
  it('returns fractional days', () => {
    expect(daysUntil(at(36 * 3_600_000), NOW)).toBe(1.5);
  });

  it('is negative once the date has passed', () => {
    expect(daysUntil(at(-86_400_000), NOW)).toBe(-1);
  });

  it('is null without a date', () => {
    expect(daysUntil(undefined, NOW)).toBeNull();
  });
});

describe('formatTimeToResolution', () => {
  it('formats days and hours', () => {
    expect(formatTimeToResolution(at(2 * 86_400_000 + 5 * 3_600_000), NOW)).toBe('2 days, 5 hours');
  });

  it('formats hours and minutes under a day', () => {
    expect(formatTimeToResolution(at(3 * 3_600_000 + 15 * 60_000), NOW)).toBe('3 hours, 15 minutes');
  });

  it('formats minutes under an hour', () => {
    expect(formatTimeToResolution(at(42 * 60_000), NOW)).toBe('42 minutes');
  });

  it('reports resolved and unknown', () => {
    expect(formatTimeToResolution(NOW, NOW)).toBe('resolved');
    expect(formatTimeToResolution(undefined, NOW)).toBe('unknown');
  });
});
