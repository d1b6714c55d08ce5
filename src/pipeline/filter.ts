/**
 * Research-worthiness filter.
 *
 * Scores a market on five independent dimensions and decides whether it is
 * worth paying for evidence gathering and judgment. Pure and deterministic for
 * a given market and reference time.
 */

import type { FilterDecision, Market, PriorityLevel } from '../types/index.js';
import { daysUntil } from '../core/time.js';
import { clamp } from '../tools/utils.js';

const HIGH_INFO_KEYWORDS = [
  'election', 'vote', 'poll', 'candidate', 'president', 'senate', 'congress',
  'policy', 'regulation', 'fda', 'sec', 'approval', 'decision', 'announcement',
  'earnings', 'revenue', 'profit', 'quarterly', 'financial',
  'launch', 'release', 'product', 'feature', 'update',
  'trial', 'court', 'lawsuit', 'verdict', 'ruling',
  'economic', 'gdp', 'inflation', 'unemployment', 'rate',
  'sports', 'game', 'match', 'tournament', 'championship'
];

const LOW_INFO_KEYWORDS = [
  'coin', 'flip', 'dice', 'random', 'lottery', 'draw',
  'instant', 'immediate', 'second', 'minute'
];

const HIGH_ACCESS_KEYWORDS = [
  'official', 'announcement', 'press', 'release', 'statement',
  'public', 'government', 'federal', 'state', 'agency',
  'company', 'corporation', 'earnings', 'report',
  'election', 'poll', 'survey', 'data',
  'news', 'media', 'coverage'
];

const LOW_ACCESS_KEYWORDS = [
  'insider', 'private', 'confidential', 'secret',
  'internal', 'leak', 'rumor', 'speculation'
];

const RANDOMNESS_KEYWORDS = [
  'coin', 'flip', 'dice', 'roll', 'random', 'lottery', 'draw',
  'chance', 'luck', 'gamble', 'bet', 'instant'
];

const CRYPTO_CATEGORIES = ['crypto', 'bitcoin', 'ethereum'];
const SPORTS_CATEGORIES = ['sports', 'nfl', 'nba', 'mlb'];

export const FILTER_WEIGHTS = {
  infoDependence: 0.30,
  infoAccessibility: 0.25,
  efficiency: 0.20,
  time: 0.15,
  randomness: 0.10
} as const;

export const WORTHY_THRESHOLD = 0.6;
export const HIGH_PRIORITY_THRESHOLD = 0.8;
export const MEDIUM_PRIORITY_THRESHOLD = 0.65;

export interface FilterScores {
  infoDependence: number;
  infoAccessibility: number;
  efficiencyRisk: number;
  timeSufficiency: number;
  randomnessRisk: number;
}

function countMatches(text: string, keywords: readonly string[]): number {
  return keywords.filter(k => text.includes(k)).length;
}

function presenceBase(high: number, low: number, scores: [number, number, number, number]): number {
  if (high > 0 && low === 0) return scores[0];
  if (high > 0) return scores[1];
  if (low > 0) return scores[2];
  return scores[3];
}

function fullText(market: Market): string {
  return `${market.title} ${market.description} ${market.category}`.toLowerCase();
}

export function scoreInformationDependence(market: Market, now: Date): number {
  const text = fullText(market);
  const base = presenceBase(
    countMatches(text, HIGH_INFO_KEYWORDS),
    countMatches(text, LOW_INFO_KEYWORDS),
    [0.8, 0.6, 0.2, 0.5]
  );

  const days = daysUntil(market.endDate, now);
  let timeBonus = 0;
  if (days != null) {
    if (days <= 0) timeBonus = -0.2;
    else if (days >= 7) timeBonus = 0.1;
    else if (days >= 3) timeBonus = 0.05;
    else timeBonus = -0.1;
  }

  const probBonus = market.probability >= 0.1 && market.probability <= 0.9 ? 0.05 : 0;

  return clamp(base + timeBonus + probBonus);
}

export function scoreInformationAccessibility(market: Market): number {
  const text = fullText(market);
  const base = presenceBase(
    countMatches(text, HIGH_ACCESS_KEYWORDS),
    countMatches(text, LOW_ACCESS_KEYWORDS),
    [0.8, 0.6, 0.3, 0.5]
  );

  const liquidityBonus = market.liquidity >= 10_000 ? 0.1 : market.liquidity >= 5_000 ? 0.05 : 0;
  const volumeBonus = market.volume24h >= 1_000 ? 0.1 : market.volume24h >= 500 ? 0.05 : 0;

  return clamp(base + liquidityBonus + volumeBonus);
}

// Higher = market more likely already efficient
export function scoreEfficiencyRisk(market: Market): number {
  let liquidityRisk: number;
  if (market.liquidity >= 50_000) liquidityRisk = 0.8;
  else if (market.liquidity >= 20_000) liquidityRisk = 0.6;
  else if (market.liquidity >= 10_000) liquidityRisk = 0.4;
  else if (market.liquidity >= 5_000) liquidityRisk = 0.3;
  else liquidityRisk = 0.2;

  let volumeRisk: number;
  if (market.volume24h >= 5_000) volumeRisk = 0.3;
  else if (market.volume24h >= 2_000) volumeRisk = 0.2;
  else if (market.volume24h >= 1_000) volumeRisk = 0.1;
  else volumeRisk = 0;

  const category = market.category.toLowerCase();
  let categoryRisk = 0.1;
  if (CRYPTO_CATEGORIES.some(c => category.includes(c))) categoryRisk = 0.2;
  else if (SPORTS_CATEGORIES.some(c => category.includes(c))) categoryRisk = 0.3;

  const probRisk = market.probability >= 0.05 && market.probability <= 0.95 ? 0 : 0.2;

  return clamp(liquidityRisk * 0.4 + volumeRisk * 0.3 + categoryRisk * 0.2 + probRisk * 0.1);
}

export function scoreTimeSufficiency(market: Market, now: Date): number {
  const days = daysUntil(market.endDate, now);
  if (days == null) return 0.5;
  if (days <= 0) return 0;

  if (days >= 7 && days <= 30) return 1;
  if (days >= 3 && days < 7) return 0.6 + ((days - 3) / 4) * 0.4;
  if (days > 30 && days <= 90) return 1 - ((days - 30) / 60) * 0.5;
  if (days >= 1 && days < 3) return 0.3 + ((days - 1) / 2) * 0.3;
  if (days > 90) return 0.4;
  return 0.2;
}

// Higher = outcome closer to a coin toss
export function scoreRandomnessRisk(market: Market, now: Date): number {
  const text = `${market.title} ${market.description}`.toLowerCase();
  const hits = countMatches(text, RANDOMNESS_KEYWORDS);
  const base = hits >= 2 ? 0.8 : hits === 1 ? 0.5 : 0.2;

  const probRisk = market.probability >= 0.45 && market.probability <= 0.55 ? 0.2 : 0;

  const days = daysUntil(market.endDate, now);
  let timeRisk = 0;
  if (days != null && days > 0) {
    if (days < 1) timeRisk = 0.3;
    else if (days < 3) timeRisk = 0.1;
  }

  return clamp(base + probRisk + timeRisk);
}

export function scoreMarket(market: Market, now: Date): FilterScores {
  return {
    infoDependence: scoreInformationDependence(market, now),
    infoAccessibility: scoreInformationAccessibility(market),
    efficiencyRisk: scoreEfficiencyRisk(market),
    timeSufficiency: scoreTimeSufficiency(market, now),
    randomnessRisk: scoreRandomnessRisk(market, now)
  };
}

export function compositeScore(scores: FilterScores): number {
  return (
    scores.infoDependence * FILTER_WEIGHTS.infoDependence +
    scores.infoAccessibility * FILTER_WEIGHTS.infoAccessibility +
    (1 - scores.efficiencyRisk) * FILTER_WEIGHTS.efficiency +
    scores.timeSufficiency * FILTER_WEIGHTS.time +
    (1 - scores.randomnessRisk) * FILTER_WEIGHTS.randomness
  );
}

export function priorityFor(composite: number): PriorityLevel {
  if (composite >= HIGH_PRIORITY_THRESHOLD) return 'high';
  if (composite >= MEDIUM_PRIORITY_THRESHOLD) return 'medium';
  return 'low';
}

function flag(score: number, high: string, low: string): string | null {
  if (score >= 0.7) return high;
  if (score <= 0.3) return low;
  return null;
}

export function describeScores(composite: number, worthy: boolean, scores: FilterScores): string {
  const reasons = [
    worthy ? 'Research-worthy' : 'Not research-worthy',
    flag(scores.infoDependence, 'high info dependence', 'low info dependence'),
    flag(scores.infoAccessibility, 'accessible information', 'limited information access'),
    flag(scores.efficiencyRisk, 'high efficiency risk', 'lower efficiency risk'),
    flag(scores.timeSufficiency, 'sufficient time', 'limited time'),
    flag(scores.randomnessRisk, 'high randomness risk', 'lower randomness risk')
  ].filter((r): r is string => r !== null);

  return `Score: ${composite.toFixed(2)}. ${reasons.join(', ')}.`;
}

export function evaluateMarket(market: Market, now: Date = new Date()): FilterDecision {
  const scores = scoreMarket(market, now);
  const composite = compositeScore(scores);
  const researchWorthy = composite >= WORTHY_THRESHOLD;

  return {
    marketId: market.id,
    researchWorthy,
    priorityLevel: priorityFor(composite),
    reasoningSummary: describeScores(composite, researchWorthy, scores),
    infoDependencyScore: scores.infoDependence,
    infoAccessibilityScore: scores.infoAccessibility,
    efficiencyRiskScore: scores.efficiencyRisk,
    timeSufficiencyScore: scores.timeSufficiency,
    randomnessRiskScore: scores.randomnessRisk,
    compositeScore: composite
  };
}
