// Normalized market record, as produced by the fetch client
export interface Market {
  id: string;
  title: string;
  description: string;
  probability: number;      // Implied YES probability, clamped to 0-1
  liquidity: number;        // USD
  volume24h: number;        // USD traded in the last 24h
  endDate?: Date;           // When the market resolves
  category: string;
  slug: string;
}

export type PriorityLevel = 'low' | 'medium' | 'high';

// Research-worthiness verdict for one market
export interface FilterDecision {
  marketId: string;
  researchWorthy: boolean;
  priorityLevel: PriorityLevel;
  reasoningSummary: string;
  infoDependencyScore: number;
  infoAccessibilityScore: number;
  efficiencyRiskScore: number;
  timeSufficiencyScore: number;
  randomnessRiskScore: number;
  compositeScore: number;
}

export type SourceQuality = 'high' | 'medium' | 'low' | 'unknown';

// Canonical evidence gathered for a market; every field is always present
export interface EvidenceRecord {
  recentDevelopments: string[];
  evidenceYes: string[];
  evidenceNo: string[];
  officialSignals: string[];
  timelineConstraints: string[];
  sourceQuality: SourceQuality;
}

export type EvidenceListField = Exclude<keyof EvidenceRecord, 'sourceQuality'>;

export type DecisionOutcome = 'yes' | 'no' | 'pass';

export interface Decision {
  readonly marketId: string;
  readonly estimatedProbability: number;
  readonly confidenceLevel: number;
  readonly edge: number;                    // estimated - market probability
  readonly decision: DecisionOutcome;
  readonly keyRisks: readonly string[];
  readonly reasoningSummary: string;
  readonly createdAt: Date;
}

export interface RankedOpportunity {
  market: Market;
  decision: Decision;
  score: number;
  edgeScore: number;
  confidenceScore: number;
  liquidityScore: number;
  timeScore: number;
  explanation: string;
}

// Row appended to the predictions log after every decision
export interface PredictionLogEntry {
  marketId: string;
  marketProbability: number;
  estimatedProbability: number;
  confidenceLevel: number;
  edge: number;
  decision: DecisionOutcome;
  loggedAt: string;
}
