import { exitCodeFor, formatStatus, parseCliArgs } from '../cli';

const COUNTS = { fetched: 3, filtered: 2, worthy: 1, researched: 1, judged: 1, ranked: 0 };

describe('parseCliArgs', () => {
  it('defaults to a single run', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { mode: 'once' } });
  });

  it('reads schedule with and without an interval', () => {
    expect(parseCliArgs(['--schedule'])).toEqual({ ok: true, command: { mode: 'schedule', intervalHours: null } });
    expect(parseCliArgs(['--schedule', '--interval', '12'])).toEqual({
      ok: true,
      command: { mode: 'schedule', intervalHours: 12 }
    });
    expect(parseCliArgs(['--interval=0.5', '--schedule'])).toEqual({
      ok: true,
      command: { mode: 'schedule', intervalHours: 0.5 }
    });
  });

  it('prefers help and status', () => {
    expect(parseCliArgs(['--schedule', '--help'])).toEqual({ ok: true, command: { mode: 'help' } });
    expect(parseCliArgs(['--status'])).toEqual({ ok: true, command: { mode: 'status' } });
  });

  it('rejects bad input', () => {
    expect(parseCliArgs(['--schedule', '--interval', '-2'])).toEqual({
      ok: false,
      error: '--interval expects a positive number of hours, got -2'
    });
    expect(parseCliArgs(['--schedule', '--interval'])).toEqual({
      ok: false,
      error: '--interval expects a positive number of hours, got nothing'
    });
    expect(parseCliArgs(['--interval', '3'])).toEqual({ ok: false, error: '--interval only applies with --schedule' });
    expect(parseCliArgs(['--verbose'])).toEqual({ ok: false, error: 'Unknown argument: --verbose' });
  });
});

describe('exitCodeFor', () => {
  it('is 0 only when opportunities were found', () => {
    expect(exitCodeFor({ status: 'empty', counts: COUNTS })).toBe(1);
    expect(exitCodeFor({ status: 'aborted', stage: 'fetch', reason: 'No markets fetched', counts: COUNTS })).toBe(1);
    expect(exitCodeFor({ status: 'ok', opportunities: [], counts: COUNTS })).toBe(1);
  });
});

describe('formatStatus', () => {
  it('renders an idle scheduler', () => {
    expect(
      formatStatus({ running: false, hasTask: false, tickInProgress: false, intervalMs: null, nextRunAt: null })
    ).toBe(
      [
        'Scheduler Status:',
        '  Running: false',
        '  Has Pipeline Task: false',
        '  Tick In Progress: false',
        '  Interval: N/A',
        '  Next Run: N/A'
      ].join('\n')
    );
  });

  it('renders a running scheduler', () => {
    const text = formatStatus({
      running: true,
      hasTask: true,
      tickInProgress: true,
      intervalMs: 6 * 3_600_000,
      nextRunAt: new Date('2026-03-01T06:00:00Z')
    });
    expect(text).toContain('  Interval: 6 hours');
    expect(text).toContain('  Next Run: 2026-03-01T06:00:00.000Z');
  });
});
