import type { AppConfig } from './config.js';
import type { PipelineResult } from './core/types.js';
import { createLogger } from './core/logger.js';
import { createClaudeProvider } from './agents/claude.js';
import { createPerplexityProvider } from './agents/perplexity.js';
import type { Storage } from './db/index.js';
import { fetchMarkets } from './polymarket/client.js';
import { runPipeline, type PipelineDeps, type PipelineSettings } from './pipeline/orchestrator.js';
import { generateReport, saveReport } from './report/reporter.js';
import { notifyOpportunities } from './notify/telegram.js';

const log = createLogger('app');

export function settingsFrom(config: AppConfig): PipelineSettings {
  return {
    minLiquidityUsd: config.minLiquidityUsd,
    minVolume24hUsd: config.minVolume24hUsd,
    minDaysToResolution: config.minDaysToResolution,
    maxDaysToResolution: config.maxDaysToResolution,
    maxMarketsToResearch: config.maxMarketsToResearch,
    maxMarketsToJudge: config.maxMarketsToJudge
  };
}

export function buildDeps(config: AppConfig, storage: Storage): PipelineDeps {
  return {
    fetchMarkets: () =>
      fetchMarkets({ limit: config.maxMarketsToScan, baseUrl: config.polymarketApiUrl, timeoutMs: config.apiTimeoutMs }),
    evidenceProvider: createPerplexityProvider({
      apiKey: config.perplexityApiKey,
      model: config.perplexityModel,
      temperature: config.perplexityTemperature,
      maxTokens: config.perplexityMaxTokens,
      timeoutMs: config.researchTimeoutMs
    }),
    judgmentProvider: createClaudeProvider({
      apiKey: config.anthropicApiKey,
      model: config.claudeModel,
      maxTokens: config.claudeMaxTokens,
      temperature: config.claudeTemperature,
      timeoutMs: config.apiTimeoutMs
    }),
    storage
  };
}

export interface RunOutputs {
  print?: (text: string) => void;
  saveReport?: typeof saveReport;
  notify?: typeof notifyOpportunities;
}

/**
 * One full run: pipeline, then report (printed and saved) and notification when
 * there is something to report. Report and notification failures are logged only.
 */
export async function runWithReport(
  config: AppConfig,
  deps: PipelineDeps,
  outputs: RunOutputs = {}
): Promise<PipelineResult> {
  const result = await runPipeline(deps, settingsFrom(config));
  if (result.status !== 'ok') return result;

  const now = new Date();
  const report = generateReport(result.opportunities, { maxOpportunities: config.maxOpportunitiesInReport, now });
  (outputs.print ?? console.log)(report);

  try {
    (outputs.saveReport ?? saveReport)(report, config.reportOutputDir, now);
  } catch (err) {
    log.error(`Could not save report: ${err instanceof Error ? err.message : String(err)}`);
  }

  const sent = await (outputs.notify ?? notifyOpportunities)(result.opportunities, {
    token: config.telegramBotToken,
    chatId: config.telegramChatId,
    timeoutMs: config.apiTimeoutMs
  });
  if (sent) log.info('Telegram notification sent');
  else log.debug('Telegram notification skipped (not configured or failed)');

  return result;
}
