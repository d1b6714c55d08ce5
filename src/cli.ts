import type { PipelineResult } from './core/types.js';
import type { SchedulerStatus } from './pipeline/scheduler.js';

export type CliCommand =
  | { mode: 'once' }
  | { mode: 'schedule'; intervalHours: number | null }
  | { mode: 'status' }
  | { mode: 'help' };

export type CliParse = { ok: true; command: CliCommand } | { ok: false; error: string };

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

export function parseCliArgs(argv: readonly string[]): CliParse {
  if (argv.includes('--help') || argv.includes('-h')) return { ok: true, command: { mode: 'help' } };

  let schedule = false;
  let status = false;
  let intervalHours: number | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--schedule') {
      schedule = true;
    } else if (arg === '--status') {
      status = true;
    } else if (arg === '--interval' || arg.startsWith('--interval=')) {
      const raw = arg === '--interval' ? argv[++i] : arg.slice('--interval='.length);
      const hours = raw == null ? Number.NaN : Number(raw);
      if (!Number.isFinite(hours) || hours <= 0) {
        return { ok: false, error: `--interval expects a positive number of hours, got ${raw ?? 'nothing'}` };
      }
      intervalHours = hours;
    } else {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  if (status) return { ok: true, command: { mode: 'status' } };
  if (schedule) return { ok: true, command: { mode: 'schedule', intervalHours } };
  if (intervalHours != null) return { ok: false, error: '--interval only applies with --schedule' };
  return { ok: true, command: { mode: 'once' } };
}

export function exitCodeFor(result: PipelineResult): number {
  return result.status === 'ok' && result.opportunities.length > 0 ? EXIT_OK : EXIT_FAILURE;
}

export function formatStatus(status: SchedulerStatus): string {
  const interval = status.intervalMs != null ? `${status.intervalMs / 3_600_000} hours` : 'N/A';
  return [
    'Scheduler Status:',
    `  Running: ${status.running}`,
    `  Has Pipeline Task: ${status.hasTask}`,
    `  Tick In Progress: ${status.tickInProgress}`,
    `  Interval: ${interval}`,
    `  Next Run: ${status.nextRunAt ? status.nextRunAt.toISOString() : 'N/A'}`
  ].join('\n');
}

export function helpText(): string {
  return [
    'edge-scout - prediction market research pipeline',
    '',
    'Usage:',
    '  npm start                              Run the pipeline once',
    '  npm start -- --schedule                Run every SCAN_INTERVAL_HOURS (default 6)',
    '  npm start -- --schedule --interval 12  Run every 12 hours',
    '  npm start -- --status                  Show scheduler status',
    '',
    'Exit codes: 0 opportunities found, 1 failure or none, 2 bad arguments, 130 interrupted'
  ].join('\n');
}
