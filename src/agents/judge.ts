import type { Decision, DecisionOutcome, EvidenceRecord, Market } from '../types/index.js';
import type { TextProvider } from '../core/types.js';
import { ProviderError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { parseJsonObject } from '../core/parse.js';
import { JUDGMENT_RETRY, type RetryPolicy } from '../core/retry.js';
import { formatTimeToResolution } from '../core/time.js';
import { isRecord, pickStringList, formatPercent, formatUsd } from '../tools/utils.js';
import { isEvidenceEmpty } from './evidence.js';

const log = createLogger('judge');

export const EDGE_THRESHOLD = 0.05;
export const MIN_CONFIDENCE = 0.4;
export const MAX_KEY_RISKS = 10;
export const MAX_REASONING_CHARS = 500;
const MAX_ITEMS_PER_SECTION = 10;

// Validated judgment payload, still in provider terms
export interface Judgment {
  estimatedProbability: number;
  confidenceLevel: number;
  keyRisks: unknown[];
  reasoningSummary: string;
}

export type JudgmentValidation = { ok: true; judgment: Judgment } | { ok: false; reason: string };

const EVIDENCE_SECTIONS: ReadonlyArray<[string, keyof Omit<EvidenceRecord, 'sourceQuality'>]> = [
  ['RECENT DEVELOPMENTS', 'recentDevelopments'],
  ['EVIDENCE SUPPORTING YES', 'evidenceYes'],
  ['EVIDENCE SUPPORTING NO', 'evidenceNo'],
  ['OFFICIAL SIGNALS', 'officialSignals'],
  ['TIMELINE CONSTRAINTS', 'timelineConstraints']
];

export function renderEvidence(evidence: EvidenceRecord): string {
  const lines: string[] = [];

  for (const [label, field] of EVIDENCE_SECTIONS) {
    const items = evidence[field];
    if (items.length === 0) continue;
    lines.push(`${label}:`);
    for (const item of items.slice(0, MAX_ITEMS_PER_SECTION)) {
      lines.push(`  - ${item}`);
    }
    lines.push('');
  }

  lines.push(`SOURCE QUALITY: ${evidence.sourceQuality.toUpperCase()}`);

  if (isEvidenceEmpty(evidence)) {
    lines.push('WARNING: Limited evidence available. Be very conservative.');
  }

  return lines.join('\n');
}

export function buildJudgmentPrompt(market: Market, evidence: EvidenceRecord, now: Date = new Date()): string {
  return `You are a conservative probability estimator for prediction markets. Your task is to estimate the TRUE probability of a market outcome based on available evidence, then compare it to the current market probability.

MARKET INFORMATION:
Question: ${market.title}
Description: ${market.description}
Current Market Probability: ${formatPercent(market.probability)}
Liquidity: ${formatUsd(market.liquidity)}
Time to Resolution: ${formatTimeToResolution(market.endDate, now)}

EVIDENCE:
${renderEvidence(evidence)}

INSTRUCTIONS:
1. Estimate the TRUE probability of a YES outcome (0.0 to 1.0)
2. Assess your confidence in this estimate (0.0 to 1.0)
3. Identify key risks that could affect the outcome
4. Provide a brief reasoning summary

CRITICAL RULES:
- Be CONSERVATIVE in probability estimates
- Express UNCERTAINTY when evidence is weak
- If source quality is "low" or evidence is insufficient, use confidence < 0.5
- Always identify risks, even for high-confidence estimates

Return ONLY valid JSON (no markdown, no code blocks, no explanatory text). Use this exact structure:

{
  "estimated_probability": 0.65,
  "confidence_level": 0.7,
  "key_risks": ["risk 1", "risk 2", ...],
  "reasoning_summary": "Brief summary of your reasoning (max 200 words)"
}

All probabilities must be between 0.0 and 1.0. Be conservative.`;
}

function unitInterval(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

export function validateJudgment(raw: unknown): JudgmentValidation {
  if (!isRecord(raw)) return { ok: false, reason: 'judgment is not an object' };

  for (const field of ['estimated_probability', 'confidence_level', 'key_risks', 'reasoning_summary']) {
    if (!(field in raw)) return { ok: false, reason: `missing required field '${field}'` };
  }

  const { estimated_probability, confidence_level, key_risks, reasoning_summary } = raw;

  if (!unitInterval(estimated_probability)) {
    return { ok: false, reason: `estimated_probability ${String(estimated_probability)} is not a number in [0, 1]` };
  }
  if (!unitInterval(confidence_level)) {
    return { ok: false, reason: `confidence_level ${String(confidence_level)} is not a number in [0, 1]` };
  }
  if (!Array.isArray(key_risks)) return { ok: false, reason: 'key_risks must be a list' };
  if (typeof reasoning_summary !== 'string') return { ok: false, reason: 'reasoning_summary must be a string' };

  return {
    ok: true,
    judgment: {
      estimatedProbability: estimated_probability,
      confidenceLevel: confidence_level,
      keyRisks: key_risks,
      reasoningSummary: reasoning_summary
    }
  };
}

export function decideOutcome(edge: number, confidence: number): DecisionOutcome {
  if (edge > EDGE_THRESHOLD && confidence > MIN_CONFIDENCE) return 'yes';
  if (edge < -EDGE_THRESHOLD && confidence > MIN_CONFIDENCE) return 'no';
  return 'pass';
}

export function buildDecision(market: Market, judgment: Judgment, now: Date = new Date()): Decision {
  const edge = judgment.estimatedProbability - market.probability;

  return Object.freeze({
    marketId: market.id,
    estimatedProbability: judgment.estimatedProbability,
    confidenceLevel: judgment.confidenceLevel,
    edge,
    decision: decideOutcome(edge, judgment.confidenceLevel),
    keyRisks: Object.freeze(pickStringList(judgment.keyRisks, MAX_KEY_RISKS)),
    reasoningSummary: judgment.reasoningSummary.trim().slice(0, MAX_REASONING_CHARS),
    createdAt: now
  });
}

/**
 * Ask the judgment provider for a probability estimate and turn it into a
 * Decision. Malformed replies are retried immediately; null after the last
 * attempt fails.
 */
export async function judgeMarket(
  market: Market,
  evidence: EvidenceRecord,
  provider: TextProvider,
  policy: RetryPolicy = JUDGMENT_RETRY
): Promise<Decision | null> {
  log.info(`Judging market: ${market.id} - ${market.title.slice(0, 50)}...`);
  const prompt = buildJudgmentPrompt(market, evidence);

  try {
    const decision = await policy.run(`judge ${market.id}`, async () => {
      const reply = await provider(prompt);
      const parsed = parseJsonObject(reply);
      if (!parsed.ok) throw new ProviderError('judgment', parsed.reason);
      const checked = validateJudgment(parsed.value);
      if (!checked.ok) throw new ProviderError('judgment', checked.reason);
      return buildDecision(market, checked.judgment);
    });
    log.info(`Judged market ${market.id}: edge=${decision.edge.toFixed(3)} decision=${decision.decision}`);
    return decision;
  } catch (err) {
    log.error(`Failed to judge market ${market.id} after ${policy.attempts} attempts: ${describeError(err)}`);
    return null;
  }
}
