/**
 * Research-worthiness filter tests
 *
 * Covers the five sub-scores, the composite weights, thresholds and the
 * reasoning summary.
 */

import {
  evaluateMarket,
  scoreMarket,
  compositeScore,
  priorityFor,
  describeScores,
  scoreInformationDependence,
  scoreInformationAccessibility,
  scoreEfficiencyRisk,
  scoreTimeSufficiency,
  scoreRandomnessRisk
} from '../filter';
import type { Market } from '../../types';

const NOW = new Date('2026-03-01T00:00:00Z');
const DAY = 86_400_000;

function daysAhead(days: number): Date {
  return new Date(NOW.getTime() + days * DAY);
}

function makeMarket(overrides: Partial<Market> = {}): Market {
  return {
    id: 'm-1',
    title: 'Will the incumbent win the election?',
    description: '',
    probability: 0.5,
    liquidity: 60_000,
    volume24h: 6_000,
    endDate: daysAhead(20),
    category: 'crypto',
    slug: 'incumbent-election',
    ...overrides
  };
}

// =============================================================================
// Regression fixture
// =============================================================================

describe('evaluateMarket: regression fixture', () => {
  it('reproduces every sub-score and the composite', () => {
    const scores = scoreMarket(makeMarket(), NOW);

    expect(scores.infoDependence).toBeCloseTo(0.95, 10);
    expect(scores.infoAccessibility).toBeCloseTo(1.0, 10);
    expect(scores.efficiencyRisk).toBeCloseTo(0.45, 10);
    expect(scores.timeSufficiency).toBe(1);
    expect(scores.randomnessRisk).toBeCloseTo(0.4, 10);
    expect(compositeScore(scores)).toBeCloseTo(0.855, 10);
  });

  it('marks the fixture research-worthy with high priority', () => {
    const decision = evaluateMarket(makeMarket(), NOW);

    expect(decision.marketId).toBe('m-1');
    expect(decision.researchWorthy).toBe(true);
    expect(decision.priorityLevel).toBe('high');
    expect(decision.infoDependencyScore).toBeCloseTo(0.95, 10);
    expect(decision.efficiencyRiskScore).toBeCloseTo(0.45, 10);
    expect(decision.randomnessRiskScore).toBeCloseTo(0.4, 10);
    expect(decision.reasoningSummary).toMatch(
      /^Score: 0\.8[56]\. Research-worthy, high info dependence, accessible information, sufficient time\.$/
    );
  });

  it('recomputes the verdict from the stored sub-scores', () => {
    const d = evaluateMarket(makeMarket({ liquidity: 3_000, volume24h: 200, probability: 0.97 }), NOW);
    const recomputed = compositeScore({
      infoDependence: d.infoDependencyScore,
      infoAccessibility: d.infoAccessibilityScore,
      efficiencyRisk: d.efficiencyRiskScore,
      timeSufficiency: d.timeSufficiencyScore,
      randomnessRisk: d.randomnessRiskScore
    });

    expect(recomputed).toBe(d.compositeScore);
    expect(d.researchWorthy).toBe(recomputed >= 0.6);
    expect(d.priorityLevel).toBe(priorityFor(recomputed));
  });
});

// =============================================================================
// Information dependence
// =============================================================================

describe('scoreInformationDependence', () => {
  it('uses 0.6 when both high and low info keywords are present', () => {
    const m = makeMarket({ title: 'Election coin', probability: 0.95 });
    expect(scoreInformationDependence(m, NOW)).toBeCloseTo(0.7, 10);
  });

  it('uses 0.2 for only randomness keywords and penalises a past end date', () => {
    const m = makeMarket({ title: 'Dice outcome', category: '', probability: 0.95, endDate: daysAhead(-1) });
    expect(scoreInformationDependence(m, NOW)).toBe(0);
  });

  it('uses 0.5 for neutral text without an end date', () => {
    const m = makeMarket({ title: 'Will it snow in Oslo', category: 'weather', endDate: undefined });
    expect(scoreInformationDependence(m, NOW)).toBeCloseTo(0.55, 10);
  });

  it('applies the short horizon bonuses', () => {
    const neutral = { title: 'Will it snow in Oslo', category: 'weather', probability: 0.95 };
    expect(scoreInformationDependence(makeMarket({ ...neutral, endDate: daysAhead(5) }), NOW)).toBeCloseTo(0.55, 10);
    expect(scoreInformationDependence(makeMarket({ ...neutral, endDate: daysAhead(2) }), NOW)).toBeCloseTo(0.4, 10);
  });
});

// =============================================================================
// Information accessibility
// =============================================================================

describe('scoreInformationAccessibility', () => {
  it('drops to 0.3 base for insider-only text', () => {
    const m = makeMarket({ title: 'Insider leak', category: '', liquidity: 100, volume24h: 0 });
    expect(scoreInformationAccessibility(m)).toBeCloseTo(0.3, 10);
  });

  it('adds the half bonuses at the lower thresholds', () => {
    const m = makeMarket({ title: 'Will it snow in Oslo', category: 'weather', liquidity: 5_000, volume24h: 500 });
    expect(scoreInformationAccessibility(m)).toBeCloseTo(0.6, 10);
  });
});

// =============================================================================
// Efficiency risk
// =============================================================================

describe('scoreEfficiencyRisk', () => {
  it('weights a thin sports market with an extreme price', () => {
    const m = makeMarket({ liquidity: 1_000, volume24h: 1_500, category: 'NBA', probability: 0.99 });
    // 0.2*0.4 + 0.1*0.3 + 0.3*0.2 + 0.2*0.1
    expect(scoreEfficiencyRisk(m)).toBeCloseTo(0.19, 10);
  });

  it('uses the default category risk for other categories', () => {
    const m = makeMarket({ liquidity: 25_000, volume24h: 2_500, category: 'politics' });
    // 0.6*0.4 + 0.2*0.3 + 0.1*0.2
    expect(scoreEfficiencyRisk(m)).toBeCloseTo(0.32, 10);
  });
});

// =============================================================================
// Time sufficiency
// =============================================================================

describe('scoreTimeSufficiency', () => {
  const at = (days: number | null) =>
    scoreTimeSufficiency(makeMarket({ endDate: days == null ? undefined : daysAhead(days) }), NOW);

  it('follows the piecewise curve', () => {
    expect(at(7)).toBe(1);
    expect(at(30)).toBe(1);
    expect(at(5)).toBeCloseTo(0.8, 10);
    expect(at(60)).toBeCloseTo(0.75, 10);
    expect(at(2)).toBeCloseTo(0.45, 10);
    expect(at(120)).toBe(0.4);
    expect(at(0.5)).toBe(0.2);
  });

  it('handles missing and past end dates', () => {
    expect(at(null)).toBe(0.5);
    expect(at(-3)).toBe(0);
  });
});

// =============================================================================
// Randomness risk
// =============================================================================

describe('scoreRandomnessRisk', () => {
  it('caps at 1 with many randomness keywords near 50/50 and short horizon', () => {
    const m = makeMarket({ title: 'Coin flip', probability: 0.5, endDate: daysAhead(0.5) });
    expect(scoreRandomnessRisk(m, NOW)).toBe(1);
  });

  it('adds the small time risk under three days', () => {
    const m = makeMarket({ title: 'Lottery winner', probability: 0.2, endDate: daysAhead(2) });
    expect(scoreRandomnessRisk(m, NOW)).toBeCloseTo(0.6, 10);
  });

  it('ignores the category text', () => {
    const m = makeMarket({ title: 'Will the incumbent win the election?', category: 'bet', probability: 0.2 });
    expect(scoreRandomnessRisk(m, NOW)).toBeCloseTo(0.2, 10);
  });
});

// =============================================================================
// Thresholds and reasoning
// =============================================================================

describe('priorityFor', () => {
  it('maps composite scores to priority levels', () => {
    expect(priorityFor(0.8)).toBe('high');
    expect(priorityFor(0.79)).toBe('medium');
    expect(priorityFor(0.65)).toBe('medium');
    expect(priorityFor(0.64)).toBe('low');
  });
});

describe('describeScores', () => {
  it('lists the low-side flags', () => {
    const text = describeScores(0.25, false, {
      infoDependence: 0.2,
      infoAccessibility: 0.3,
      efficiencyRisk: 0.9,
      timeSufficiency: 0.2,
      randomnessRisk: 0.8
    });
    expect(text).toBe(
      'Score: 0.25. Not research-worthy, low info dependence, limited information access, ' +
        'high efficiency risk, limited time, high randomness risk.'
    );
  });

  it('omits flags for middling scores', () => {
    const text = describeScores(0.5, false, {
      infoDependence: 0.5,
      infoAccessibility: 0.5,
      efficiencyRisk: 0.5,
      timeSufficiency: 0.5,
      randomnessRisk: 0.5
    });
    expect(text).toBe('Score: 0.50. Not research-worthy.');
  });
});
