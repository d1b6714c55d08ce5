import { createLogger, type Logger } from './logger.js';
import { describeError } from './errors.js';

export interface RetryOptions {
  attempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoff?: boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Explicit retry policy used at every provider call site.
 *
 * With backoff the wait before attempt n+1 is baseDelayMs * 2^(n-1), capped at
 * maxDelayMs. Without backoff failed attempts are retried immediately.
 */
export class RetryPolicy {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoff: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(opts: RetryOptions) {
    this.attempts = Math.max(1, Math.floor(opts.attempts));
    this.baseDelayMs = Math.max(0, opts.baseDelayMs ?? 0);
    this.maxDelayMs = Math.max(this.baseDelayMs, opts.maxDelayMs ?? this.baseDelayMs);
    this.backoff = opts.backoff ?? false;
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = opts.logger ?? createLogger('retry');
  }

  delayAfter(attempt: number): number {
    if (!this.backoff) return 0;
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
  }

  with(overrides: Partial<RetryOptions>): RetryPolicy {
    return new RetryPolicy({
      attempts: this.attempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      backoff: this.backoff,
      sleep: this.sleep,
      logger: this.log,
      ...overrides
    });
  }

  async run<T>(label: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown = new Error(`${label}: no attempts made`);

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        lastError = err;
        this.log.warn(`${label} attempt ${attempt}/${this.attempts} failed: ${describeError(err)}`);
        if (attempt < this.attempts) {
          const delay = this.delayAfter(attempt);
          if (delay > 0) await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }
}

export const EVIDENCE_RETRY = new RetryPolicy({ attempts: 3, baseDelayMs: 2000, maxDelayMs: 60_000, backoff: true });
export const JUDGMENT_RETRY = new RetryPolicy({ attempts: 2, backoff: false });
