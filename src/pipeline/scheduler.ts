import { createLogger, type Logger } from '../core/logger.js';
import { describeError } from '../core/errors.js';

export type ScheduledTask = () => Promise<unknown>;

export interface SchedulerStatus {
  running: boolean;
  hasTask: boolean;
  tickInProgress: boolean;
  intervalMs: number | null;
  nextRunAt: Date | null;
}

export interface SchedulerOptions {
  logger?: Logger;
  clock?: () => number;
}

/**
 * Fixed-interval runner with a single-flight guard.
 *
 * A tick that fires while the previous one is still running is skipped, not
 * queued. stop() never interrupts a running tick, and the task stays registered so
 * runNow() still works after a stop.
 */
export class PipelineScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private task: ScheduledTask | null = null;
  private intervalMs: number | null = null;
  private lastFireAt = 0;
  private inFlight: Promise<void> | null = null;
  private skipped = 0;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(opts: SchedulerOptions = {}) {
    this.log = opts.logger ?? createLogger('scheduler');
    this.clock = opts.clock ?? Date.now;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  start(task: ScheduledTask, intervalMs: number): boolean {
    if (this.timer !== null) {
      this.log.warn('Scheduler is already running');
      return false;
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      this.log.error(`Invalid interval: ${intervalMs}ms`);
      return false;
    }

    this.task = task;
    this.intervalMs = intervalMs;
    this.lastFireAt = this.clock();
    this.timer = setInterval(() => {
      this.lastFireAt = this.clock();
      this.tick();
    }, intervalMs);

    this.log.info(`Scheduler started: every ${(intervalMs / 3_600_000).toFixed(2)} hours`);
    return true;
  }

  // Runs one guarded tick now; false when a tick is already in flight or nothing is registered
  runNow(): boolean {
    return this.tick();
  }

  private tick(): boolean {
    const task = this.task;
    if (!task) return false;

    if (this.inFlight) {
      this.skipped++;
      this.log.warn('Previous pipeline run still in progress, skipping this tick');
      return false;
    }

    let started: Promise<unknown>;
    try {
      started = task();
    } catch (err) {
      started = Promise.reject(err);
    }

    // Settles asynchronously, so the guard is always assigned before it is released
    const run: Promise<void> = started
      .then(
        () => undefined,
        (err: unknown) => {
          this.log.error(`Scheduled pipeline run failed: ${describeError(err)}`);
        }
      )
      .finally(() => {
        if (this.inFlight === run) this.inFlight = null;
      });
    this.inFlight = run;
    return true;
  }

  async stop(wait = false): Promise<boolean> {
    if (this.timer === null) {
      this.log.warn('Scheduler is not running');
      return false;
    }

    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Scheduler stopped');

    if (wait && this.inFlight) {
      this.log.info('Waiting for in-flight pipeline run to finish');
      await this.inFlight;
    }
    return true;
  }

  getStatus(): SchedulerStatus {
    const running = this.timer !== null;
    return {
      running,
      hasTask: this.task !== null,
      tickInProgress: this.inFlight !== null,
      intervalMs: running ? this.intervalMs : null,
      nextRunAt: running && this.intervalMs != null ? new Date(this.lastFireAt + this.intervalMs) : null
    };
  }
}
