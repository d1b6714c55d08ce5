import type { PipelineStage } from './types.js';

export type ErrorCode = 'CONFIG' | 'PROVIDER' | 'STAGE_EMPTY' | 'PERSISTENCE';

export class PipelineError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing credentials or out-of-range settings; fatal before any stage runs
export class ConfigurationError extends PipelineError {
  constructor(readonly problems: string[]) {
    super('CONFIG', `Invalid configuration: ${problems.join('; ')}`);
  }
}

// Timeout, transport failure, non-2xx reply or a reply that does not fit the schema
export class ProviderError extends PipelineError {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('PROVIDER', `${provider}: ${message}`, options);
  }
}

export class StageEmptyError extends PipelineError {
  constructor(readonly stage: PipelineStage, message: string) {
    super('STAGE_EMPTY', message);
  }
}

export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
