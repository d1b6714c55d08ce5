#!/usr/bin/env node
import { loadConfig, requireValidConfig, type AppConfig } from './config.js';
import { ConfigurationError, describeError } from './core/errors.js';
import { createLogger } from './core/logger.js';
import { Storage } from './db/index.js';
import { PipelineScheduler } from './pipeline/scheduler.js';
import { buildDeps, runWithReport } from './app.js';
import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_OK,
  EXIT_USAGE,
  exitCodeFor,
  formatStatus,
  helpText,
  parseCliArgs
} from './cli.js';

const log = createLogger('main');

function loadValidConfig(): AppConfig | null {
  try {
    return requireValidConfig(loadConfig());
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.error('Configuration errors:');
      for (const problem of err.problems) log.error(`  - ${problem}`);
      return null;
    }
    throw err;
  }
}

async function runOnce(config: AppConfig): Promise<number> {
  const storage = new Storage(config.dbPath);
  process.once('SIGINT', () => {
    log.warn('Interrupted by user');
    storage.close();
    process.exit(EXIT_INTERRUPTED);
  });

  try {
    const result = await runWithReport(config, buildDeps(config, storage));
    if (result.status === 'aborted') log.error(`Pipeline aborted at ${result.stage}: ${result.reason}`);
    else if (result.status === 'empty') log.warn('No opportunities found');
    return exitCodeFor(result);
  } finally {
    storage.close();
  }
}

function runScheduled(config: AppConfig, intervalHours: number): number {
  const storage = new Storage(config.dbPath);
  const deps = buildDeps(config, storage);
  const scheduler = new PipelineScheduler();

  const task = async () => {
    const result = await runWithReport(config, deps);
    log.info(`Scheduled run finished: ${result.status}`);
  };

  if (!scheduler.start(task, intervalHours * 3_600_000)) {
    storage.close();
    return EXIT_FAILURE;
  }
  scheduler.runNow();

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down scheduler`);
    scheduler
      .stop(true)
      .then(() => {
        storage.close();
        process.exit(EXIT_OK);
      })
      .catch((err: unknown) => {
        log.error(`Shutdown failed: ${describeError(err)}`);
        process.exit(EXIT_FAILURE);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  log.info('Scheduler running. Press Ctrl+C to stop.');
  return EXIT_OK;
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(helpText());
    process.exitCode = EXIT_USAGE;
    return;
  }

  const { command } = parsed;
  if (command.mode === 'help') {
    console.log(helpText());
    return;
  }
  if (command.mode === 'status') {
    // Scheduler state lives in the running process; a fresh process reports its own idle handle
    console.log(formatStatus(new PipelineScheduler().getStatus()));
    return;
  }

  const config = loadValidConfig();
  if (!config) {
    process.exitCode = EXIT_FAILURE;
    return;
  }

  if (command.mode === 'schedule') {
    process.exitCode = runScheduled(config, command.intervalHours ?? config.scanIntervalHours);
    return;
  }

  process.exitCode = await runOnce(config);
}

main().catch((error) => {
  log.error(`Fatal error: ${describeError(error)}`);
  process.exitCode = EXIT_FAILURE;
});
