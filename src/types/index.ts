export type {
  Market,
  PriorityLevel,
  FilterDecision,
  SourceQuality,
  EvidenceRecord,
  EvidenceListField,
  DecisionOutcome,
  Decision,
  RankedOpportunity,
  PredictionLogEntry
} from './market.js';
