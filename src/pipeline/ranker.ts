import type { Decision, Market, RankedOpportunity } from '../types/index.js';
import { createLogger } from '../core/logger.js';
import { daysUntil } from '../core/time.js';
import { clamp, formatUsd } from '../tools/utils.js';

const log = createLogger('rank');

export const RANK_WEIGHTS = {
  edge: 0.40,
  confidence: 0.30,
  liquidity: 0.20,
  time: 0.10
} as const;

export const DEFAULT_MIN_EDGE = 0.05;

// 20% edge saturates the score
export function edgeScore(edge: number): number {
  return Math.min(1, Math.abs(edge) / 0.2);
}

export function confidenceScore(confidence: number): number {
  return clamp(confidence);
}

// $1k = 0, $10k = 0.5, $100k and up = 1
export function liquidityScore(liquidity: number): number {
  if (!(liquidity > 0)) return 0;
  return clamp(Math.log10(liquidity / 1000) / 2);
}

export function timeScore(endDate: Date | undefined, now: Date): number {
  const days = daysUntil(endDate, now);
  if (days == null) return 0.5;
  if (days >= 7 && days <= 30) return 1;
  if (days >= 1 && days < 7) return 0.5 + ((days - 1) / 6) * 0.5;
  if (days > 30 && days <= 90) return 1 - ((days - 30) / 60) * 0.5;
  return 0;
}

function describeHorizon(endDate: Date | undefined, now: Date): string {
  if (!endDate) return 'unknown';
  const remaining = endDate.getTime() - now.getTime();
  if (remaining <= 0) return 'resolved';
  const days = Math.floor(remaining / 86_400_000);
  if (days > 0) return `${days} days`;
  return `${Math.floor(remaining / 3_600_000)} hours`;
}

export function explainOpportunity(
  market: Market,
  decision: Decision,
  composite: number,
  now: Date
): string {
  // Positive edge: the estimate sits above the market price
  const direction = decision.edge > 0 ? 'market underpriced' : 'market overpriced';
  return [
    `Score: ${composite.toFixed(3)}`,
    `Edge: ${(Math.abs(decision.edge) * 100).toFixed(1)}% (${direction})`,
    `Confidence: ${(decision.confidenceLevel * 100).toFixed(1)}%`,
    `Liquidity: ${formatUsd(market.liquidity)}`,
    `Time: ${describeHorizon(market.endDate, now)}`,
    `Decision: ${decision.decision.toUpperCase()}`
  ].join(' | ');
}

/**
 * Score and order decisions by expected value.
 *
 * Decisions without a market in the lookup, with |edge| below minEdge, or with
 * a pass verdict are dropped. Equal scores keep their input order.
 */
export function rankOpportunities(
  decisions: readonly Decision[],
  markets: ReadonlyMap<string, Market>,
  minEdge: number = DEFAULT_MIN_EDGE,
  now: Date = new Date()
): RankedOpportunity[] {
  log.info(`Ranking ${decisions.length} decisions with minimum edge ${minEdge}`);
  const opportunities: RankedOpportunity[] = [];

  for (const decision of decisions) {
    const market = markets.get(decision.marketId);
    if (!market) {
      log.warn(`Market ${decision.marketId} not found for decision`);
      continue;
    }
    if (Math.abs(decision.edge) < minEdge) {
      log.debug(`Skipping ${decision.marketId}: edge ${decision.edge.toFixed(3)} < ${minEdge}`);
      continue;
    }
    if (decision.decision === 'pass') {
      log.debug(`Skipping ${decision.marketId}: decision is pass`);
      continue;
    }

    const scores = {
      edgeScore: edgeScore(decision.edge),
      confidenceScore: confidenceScore(decision.confidenceLevel),
      liquidityScore: liquidityScore(market.liquidity),
      timeScore: timeScore(market.endDate, now)
    };
    const score =
      scores.edgeScore * RANK_WEIGHTS.edge +
      scores.confidenceScore * RANK_WEIGHTS.confidence +
      scores.liquidityScore * RANK_WEIGHTS.liquidity +
      scores.timeScore * RANK_WEIGHTS.time;

    opportunities.push({
      market,
      decision,
      score,
      ...scores,
      explanation: explainOpportunity(market, decision, score, now)
    });
  }

  // Array.prototype.sort is stable
  opportunities.sort((a, b) => b.score - a.score);

  log.info(`Ranked ${opportunities.length} opportunities`);
  return opportunities;
}
