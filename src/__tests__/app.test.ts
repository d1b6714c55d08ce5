/**
 * Run wiring tests
 *
 * Settings mapping and the report/notify steps around a pipeline run.
 * Providers, report writer and notifier are all stand-ins.
 */

import { runWithReport, settingsFrom } from '../app';
import { loadConfig } from '../config';
import { RetryPolicy } from '../core/retry';
import type { PipelineDeps } from '../pipeline/orchestrator';
import type { Market } from '../types';

const NOW = new Date('2026-03-01T00:00:00Z');
const CONFIG = loadConfig({ ANTHROPIC_API_KEY: 'test-anthropic', PERPLEXITY_API_KEY: 'test-perplexity' });

function electionMarket(): Market {
  return {
    id: 'election',
    title: 'Will the incumbent win the election?',
    description: '',
    probability: 0.5,
    liquidity: 60_000,
    volume24h: 6_000,
    endDate: new Date(NOW.getTime() + 20 * 86_400_000),
    category: 'crypto',
    slug: 'incumbent-election'
  };
}

function makeDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  const once = new RetryPolicy({ attempts: 1, logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() } });
  return {
    fetchMarkets: jest.fn().mockResolvedValue([electionMarket()]),
    evidenceProvider: jest.fn().mockResolvedValue('{"evidence_yes": ["Polls lean yes"], "source_quality": "medium"}'),
    judgmentProvider: jest.fn().mockResolvedValue(
      '{"estimated_probability": 0.7, "confidence_level": 0.8, "key_risks": [], "reasoning_summary": "Above the price."}'
    ),
    evidenceRetry: once,
    judgmentRetry: once,
    now: () => NOW,
    ...overrides
  };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('settingsFrom', () => {
  it('copies the pipeline limits', () => {
    expect(settingsFrom(CONFIG)).toEqual({
      minLiquidityUsd: 1000,
      minVolume24hUsd: 500,
      minDaysToResolution: 1,
      maxDaysToResolution: 90,
      maxMarketsToResearch: 10,
      maxMarketsToJudge: 5
    });
  });
});

describe('runWithReport', () => {
  it('prints, saves and sends the report after a successful run', async () => {
    const print = jest.fn();
    const saveReport = jest.fn().mockReturnValue('reports/x.txt');
    const notify = jest.fn().mockResolvedValue(true);

    const result = await runWithReport(CONFIG, makeDeps(), { print, saveReport, notify });

    expect(result.status).toBe('ok');
    expect(print).toHaveBeenCalledTimes(1);
    expect(String(print.mock.calls[0][0])).toContain('Opportunities Found: 1');
    expect(saveReport).toHaveBeenCalledWith(print.mock.calls[0][0], 'reports', expect.any(Date));
    expect(notify).toHaveBeenCalledWith(result.status === 'ok' ? result.opportunities : [], {
      token: '',
      chatId: '',
      timeoutMs: 30_000
    });
  });

  it('skips the report when the run aborts', async () => {
    const print = jest.fn();
    const notify = jest.fn();

    const result = await runWithReport(CONFIG, makeDeps({ fetchMarkets: jest.fn().mockResolvedValue([]) }), { print, notify });

    expect(result.status).toBe('aborted');
    expect(print).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it('still notifies when saving the report fails', async () => {
    const saveReport = jest.fn().mockImplementation(() => {
      throw new Error('read-only file system');
    });
    const notify = jest.fn().mockResolvedValue(false);

    const result = await runWithReport(CONFIG, makeDeps(), { print: jest.fn(), saveReport, notify });

    expect(result.status).toBe('ok');
    expect(notify).toHaveBeenCalledTimes(1);
  });
});
