/**
 * Opportunity ranker tests
 *
 * Tests:
 * - Sub-score curves (edge, confidence, liquidity, time)
 * - Composite regression fixture
 * - Exclusions (pass, small edge, unknown market)
 * - Ordering and ties
 */

import { confidenceScore, edgeScore, explainOpportunity, liquidityScore, rankOpportunities, timeScore } from '../ranker';
import type { Decision, Market } from '../../types';

const NOW = new Date('2026-03-01T00:00:00Z');
const DAY = 86_400_000;

function daysAhead(days: number): Date {
  return new Date(NOW.getTime() + days * DAY);
}

function makeMarket(overrides: Partial<Market> = {}): Market {
  return {
    id: 'm-1',
    title: 'Will the bill pass the senate?',
    description: '',
    probability: 0.4,
    liquidity: 50_000,
    volume24h: 5_000,
    endDate: daysAhead(14),
    category: 'politics',
    slug: 'bill-senate',
    ...overrides
  };
}

function makeDecision(overrides: Partial<Decision> = {}): Decision {
  return {
    marketId: 'm-1',
    estimatedProbability: 0.52,
    confidenceLevel: 0.6,
    edge: 0.12,
    decision: 'yes',
    keyRisks: [],
    reasoningSummary: 'Whip count favours passage.',
    createdAt: NOW,
    ...overrides
  };
}

function lookup(...markets: Market[]): Map<string, Market> {
  return new Map(markets.map(m => [m.id, m]));
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// =============================================================================
// Sub-scores
// =============================================================================

describe('sub-scores', () => {
  it('edge saturates at 20% in either direction', () => {
    expect(edgeScore(0.1)).toBeCloseTo(0.5, 10);
    expect(edgeScore(-0.3)).toBe(1);
  });

  it('confidence is clamped', () => {
    expect(confidenceScore(1.3)).toBe(1);
    expect(confidenceScore(0.45)).toBe(0.45);
  });

  it('liquidity is logarithmic between $1k and $100k', () => {
    expect(liquidityScore(1_000)).toBe(0);
    expect(liquidityScore(10_000)).toBeCloseTo(0.5, 10);
    expect(liquidityScore(250_000)).toBe(1);
    expect(liquidityScore(500)).toBe(0);
    expect(liquidityScore(0)).toBe(0);
  });

  it('time prefers one to four weeks out', () => {
    expect(timeScore(daysAhead(14), NOW)).toBe(1);
    expect(timeScore(daysAhead(4), NOW)).toBeCloseTo(0.75, 10);
    expect(timeScore(daysAhead(60), NOW)).toBeCloseTo(0.75, 10);
    expect(timeScore(daysAhead(0.5), NOW)).toBe(0);
    expect(timeScore(daysAhead(120), NOW)).toBe(0);
    expect(timeScore(undefined, NOW)).toBe(0.5);
  });
});

// =============================================================================
// Regression fixture
// =============================================================================

describe('rankOpportunities: regression fixture', () => {
  it('scores edge 0.12, confidence 0.6, $50k, 14 days', () => {
    const [opp] = rankOpportunities([makeDecision()], lookup(makeMarket()), 0.05, NOW);

    expect(opp.edgeScore).toBeCloseTo(0.6, 10);
    expect(opp.confidenceScore).toBeCloseTo(0.6, 10);
    expect(opp.liquidityScore).toBeCloseTo(0.849485, 6);
    expect(opp.timeScore).toBe(1);
    expect(opp.score).toBeCloseTo(0.68990, 5);
  });

  it('explains the score in one line', () => {
    const [opp] = rankOpportunities([makeDecision()], lookup(makeMarket()), 0.05, NOW);
    expect(opp.explanation).toBe(
      'Score: 0.690 | Edge: 12.0% (market underpriced) | Confidence: 60.0% | Liquidity: $50,000 | Time: 14 days | Decision: YES'
    );
  });
});

describe('explainOpportunity', () => {
  it('labels a negative edge as overpriced and short horizons in hours', () => {
    const market = makeMarket({ endDate: new Date(NOW.getTime() + 5 * 3_600_000) });
    const decision = makeDecision({ edge: -0.08, decision: 'no' });
    expect(explainOpportunity(market, decision, 0.5, NOW)).toBe(
      'Score: 0.500 | Edge: 8.0% (market overpriced) | Confidence: 60.0% | Liquidity: $50,000 | Time: 5 hours | Decision: NO'
    );
  });
});

// =============================================================================
// Exclusions and ordering
// =============================================================================

describe('rankOpportunities', () => {
  it('drops pass decisions, small edges and unknown markets', () => {
    const decisions = [
      makeDecision({ marketId: 'a', decision: 'pass' }),
      makeDecision({ marketId: 'b', edge: 0.03 }),
      makeDecision({ marketId: 'missing' }),
      makeDecision({ marketId: 'c' })
    ];
    const markets = lookup(makeMarket({ id: 'a' }), makeMarket({ id: 'b' }), makeMarket({ id: 'c' }));

    const ranked = rankOpportunities(decisions, markets, 0.05, NOW);
    expect(ranked.map(o => o.market.id)).toEqual(['c']);
  });

  it('keeps an edge exactly at the minimum', () => {
    const ranked = rankOpportunities([makeDecision({ edge: 0.25 })], lookup(makeMarket()), 0.25, NOW);
    expect(ranked).toHaveLength(1);
  });

  it('orders by score descending', () => {
    const decisions = [
      makeDecision({ marketId: 'low', edge: 0.06, confidenceLevel: 0.5 }),
      makeDecision({ marketId: 'high', edge: -0.2, decision: 'no', confidenceLevel: 0.9 })
    ];
    const markets = lookup(makeMarket({ id: 'low' }), makeMarket({ id: 'high' }));

    expect(rankOpportunities(decisions, markets, 0.05, NOW).map(o => o.market.id)).toEqual(['high', 'low']);
  });

  it('keeps input order on ties', () => {
    const decisions = ['x', 'y', 'z'].map(id => makeDecision({ marketId: id }));
    const markets = lookup(makeMarket({ id: 'x' }), makeMarket({ id: 'y' }), makeMarket({ id: 'z' }));

    expect(rankOpportunities(decisions, markets, 0.05, NOW).map(o => o.market.id)).toEqual(['x', 'y', 'z']);
  });

  it('returns an empty list when nothing qualifies', () => {
    expect(rankOpportunities([makeDecision({ decision: 'pass' })], lookup(makeMarket()), 0.05, NOW)).toEqual([]);
  });
});
