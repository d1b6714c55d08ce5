/**
 * Pipeline orchestrator
 *
 * fetch -> hard filter -> research-worthiness -> evidence -> judgment -> rank
 *
 * Stages run strictly in order and markets are processed one at a time. A stage
 * that yields nothing aborts the run, except ranking, whose empty result is a
 * normal outcome. Per-market failures are logged and skipped.
 */

import type { Decision, EvidenceRecord, FilterDecision, Market, PriorityLevel, RankedOpportunity } from '../types/index.js';
import type { PipelineResult, StageCounts, TextProvider } from '../core/types.js';
import { StageEmptyError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { EVIDENCE_RETRY, JUDGMENT_RETRY, type RetryPolicy } from '../core/retry.js';
import { daysUntil } from '../core/time.js';
import { researchMarket } from '../agents/evidence.js';
import { judgeMarket } from '../agents/judge.js';
import type { Storage } from '../db/index.js';
import { evaluateMarket } from './filter.js';
import { DEFAULT_MIN_EDGE, rankOpportunities } from './ranker.js';

const log = createLogger('pipeline');

// Sentinel for "no upper bound" on days to resolution
const OPEN_WINDOW_MAX_DAYS = 999;

export interface PipelineSettings {
  minLiquidityUsd: number;
  minVolume24hUsd: number;
  minDaysToResolution: number;
  maxDaysToResolution: number;
  maxMarketsToResearch: number;
  maxMarketsToJudge: number;
  minEdge?: number;
}

export type PipelineStore = Pick<Storage, 'saveMarket' | 'saveResearchReport' | 'saveDecision' | 'logPrediction'>;

export interface PipelineDeps {
  fetchMarkets: () => Promise<Market[]>;
  evidenceProvider: TextProvider;
  judgmentProvider: TextProvider;
  storage?: PipelineStore;
  evidenceRetry?: RetryPolicy;
  judgmentRetry?: RetryPolicy;
  now?: () => Date;
}

const PRIORITY_RANK: Record<PriorityLevel, number> = { high: 3, medium: 2, low: 1 };

function emptyCounts(): StageCounts {
  return { fetched: 0, filtered: 0, worthy: 0, researched: 0, judged: 0, ranked: 0 };
}

// Storage is best-effort: a failed write never stops the run
function persist(what: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn(`Could not store ${what}: ${describeError(err)}`);
  }
}

export function applyHardFilters(markets: readonly Market[], settings: PipelineSettings, now: Date): Market[] {
  const windowed = settings.minDaysToResolution > 0 || settings.maxDaysToResolution < OPEN_WINDOW_MAX_DAYS;

  return markets.filter(market => {
    if (market.liquidity < settings.minLiquidityUsd) {
      log.debug(`Market ${market.id} filtered: liquidity $${market.liquidity.toFixed(0)} < $${settings.minLiquidityUsd}`);
      return false;
    }
    if (market.volume24h < settings.minVolume24hUsd) {
      log.debug(`Market ${market.id} filtered: volume $${market.volume24h.toFixed(0)} < $${settings.minVolume24hUsd}`);
      return false;
    }

    const days = daysUntil(market.endDate, now);
    if (days == null) {
      if (windowed) log.debug(`Market ${market.id} filtered: no end date`);
      return !windowed;
    }
    if (days < settings.minDaysToResolution) {
      log.debug(`Market ${market.id} filtered: ${days.toFixed(1)} days < ${settings.minDaysToResolution} days`);
      return false;
    }
    if (days > settings.maxDaysToResolution) {
      log.debug(`Market ${market.id} filtered: ${days.toFixed(1)} days > ${settings.maxDaysToResolution} days`);
      return false;
    }
    return true;
  });
}

export function selectResearchWorthy(
  markets: readonly Market[],
  limit: number,
  now: Date
): Array<{ market: Market; verdict: FilterDecision }> {
  const worthy: Array<{ market: Market; verdict: FilterDecision }> = [];

  for (const market of markets) {
    try {
      const verdict = evaluateMarket(market, now);
      if (verdict.researchWorthy) {
        worthy.push({ market, verdict });
        log.debug(`Market ${market.id} is research-worthy (priority: ${verdict.priorityLevel})`);
      } else {
        log.debug(`Market ${market.id} not research-worthy: ${verdict.reasoningSummary}`);
      }
    } catch (err) {
      log.error(`Error evaluating market ${market.id}: ${describeError(err)}`);
    }
  }

  // Stable: equal priorities keep fetch order
  worthy.sort((a, b) => PRIORITY_RANK[b.verdict.priorityLevel] - PRIORITY_RANK[a.verdict.priorityLevel]);
  return worthy.slice(0, Math.max(0, limit));
}

async function gatherEvidence(
  markets: readonly Market[],
  deps: PipelineDeps
): Promise<Map<string, { market: Market; evidence: EvidenceRecord }>> {
  // Map keeps discovery order for the judgment stage
  const results = new Map<string, { market: Market; evidence: EvidenceRecord }>();

  for (const market of markets) {
    try {
      const evidence = await researchMarket(market, deps.evidenceProvider, deps.evidenceRetry ?? EVIDENCE_RETRY);
      if (!evidence) {
        log.warn(`Research failed for ${market.id}`);
        continue;
      }
      results.set(market.id, { market, evidence });
      persist(`research report for ${market.id}`, () => deps.storage?.saveResearchReport(market.id, evidence));
    } catch (err) {
      log.error(`Error researching market ${market.id}: ${describeError(err)}`);
    }
  }

  return results;
}

async function judgeAll(
  researched: Array<{ market: Market; evidence: EvidenceRecord }>,
  deps: PipelineDeps
): Promise<{ decisions: Decision[]; markets: Map<string, Market> }> {
  const decisions: Decision[] = [];
  const markets = new Map<string, Market>();

  for (const { market, evidence } of researched) {
    try {
      const decision = await judgeMarket(market, evidence, deps.judgmentProvider, deps.judgmentRetry ?? JUDGMENT_RETRY);
      if (!decision) {
        log.warn(`Decision failed for ${market.id}`);
        continue;
      }
      decisions.push(decision);
      markets.set(market.id, market);
      persist(`decision for ${market.id}`, () => deps.storage?.saveDecision(decision));
      persist(`prediction for ${market.id}`, () =>
        deps.storage?.logPrediction({
          marketId: decision.marketId,
          marketProbability: market.probability,
          estimatedProbability: decision.estimatedProbability,
          confidenceLevel: decision.confidenceLevel,
          edge: decision.edge,
          decision: decision.decision
        })
      );
      log.info(`Decision for ${market.id}: ${decision.decision} (edge: ${(decision.edge * 100).toFixed(1)}%)`);
    } catch (err) {
      log.error(`Error judging market ${market.id}: ${describeError(err)}`);
    }
  }

  return { decisions, markets };
}

async function executeStages(
  deps: PipelineDeps,
  settings: PipelineSettings,
  counts: StageCounts
): Promise<RankedOpportunity[]> {
  const now = deps.now ?? (() => new Date());

  log.info('Step 1: Fetching markets');
  let markets: Market[];
  try {
    markets = await deps.fetchMarkets();
  } catch (err) {
    throw new StageEmptyError('fetch', `Market fetch failed: ${describeError(err)}`);
  }
  counts.fetched = markets.length;
  if (markets.length === 0) throw new StageEmptyError('fetch', 'No markets fetched');
  log.info(`Fetched ${markets.length} markets`);

  for (const market of markets) {
    persist(`market ${market.id}`, () => deps.storage?.saveMarket(market));
  }

  log.info('Step 2: Applying hard filters');
  const filtered = applyHardFilters(markets, settings, now());
  counts.filtered = filtered.length;
  log.info(`Hard filters: ${markets.length} -> ${filtered.length} markets`);
  if (filtered.length === 0) throw new StageEmptyError('hard-filter', 'No markets passed basic filtering criteria');

  log.info('Step 3: Evaluating research-worthiness');
  const worthy = selectResearchWorthy(filtered, settings.maxMarketsToResearch, now());
  counts.worthy = worthy.length;
  log.info(`Research-worthiness: ${filtered.length} -> ${worthy.length} markets`);
  if (worthy.length === 0) throw new StageEmptyError('worthiness', 'No markets passed research-worthiness evaluation');

  log.info('Step 4: Gathering evidence');
  const researched = await gatherEvidence(worthy.map(w => w.market), deps);
  counts.researched = researched.size;
  log.info(`Evidence: ${worthy.length} -> ${researched.size} markets`);
  if (researched.size === 0) throw new StageEmptyError('evidence', 'No markets were successfully researched');

  log.info('Step 5: Judging markets');
  const toJudge = [...researched.values()].slice(0, Math.max(0, settings.maxMarketsToJudge));
  const { decisions, markets: judgedMarkets } = await judgeAll(toJudge, deps);
  counts.judged = decisions.length;
  log.info(`Judgment: ${toJudge.length} -> ${decisions.length} decisions`);
  if (decisions.length === 0) throw new StageEmptyError('judgment', 'No decisions were made');

  log.info('Step 6: Ranking opportunities');
  const opportunities = rankOpportunities(decisions, judgedMarkets, settings.minEdge ?? DEFAULT_MIN_EDGE, now());
  counts.ranked = opportunities.length;
  log.info(`Ranking: ${decisions.length} -> ${opportunities.length} opportunities`);

  return opportunities;
}

export async function runPipeline(deps: PipelineDeps, settings: PipelineSettings): Promise<PipelineResult> {
  const counts = emptyCounts();
  log.info('Starting prediction market research pipeline');

  try {
    const opportunities = await executeStages(deps, settings, counts);
    if (opportunities.length === 0) {
      log.warn('No opportunities found after ranking');
      return { status: 'empty', counts };
    }
    log.info(`Pipeline completed with ${opportunities.length} ranked opportunities`);
    return { status: 'ok', opportunities, counts };
  } catch (err) {
    if (err instanceof StageEmptyError) {
      log.error(`${err.message}. Pipeline aborted.`);
      return { status: 'aborted', stage: err.stage, reason: err.message, counts };
    }
    log.error(`Fatal error in pipeline: ${describeError(err)}`);
    return { status: 'aborted', stage: 'run', reason: describeError(err), counts };
  }
}
