import type { EvidenceListField, EvidenceRecord, Market, SourceQuality } from '../types/index.js';
import type { TextProvider } from '../core/types.js';
import { ProviderError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { parseJsonObject } from '../core/parse.js';
import { EVIDENCE_RETRY, type RetryPolicy } from '../core/retry.js';
import { isRecord, pickString, pickStringList } from '../tools/utils.js';

const log = createLogger('research');

export const MAX_EVIDENCE_ITEMS = 20;

// Wire name on the left, record field on the right
const LIST_FIELDS: ReadonlyArray<[string, EvidenceListField]> = [
  ['recent_developments', 'recentDevelopments'],
  ['evidence_yes', 'evidenceYes'],
  ['evidence_no', 'evidenceNo'],
  ['official_signals', 'officialSignals'],
  ['timeline_constraints', 'timelineConstraints']
];

const SOURCE_QUALITIES: readonly SourceQuality[] = ['high', 'medium', 'low', 'unknown'];

export function emptyEvidence(): EvidenceRecord {
  return {
    recentDevelopments: [],
    evidenceYes: [],
    evidenceNo: [],
    officialSignals: [],
    timelineConstraints: [],
    sourceQuality: 'unknown'
  };
}

function toSourceQuality(value: string): SourceQuality | null {
  return SOURCE_QUALITIES.find(q => q === value) ?? null;
}

/**
 * Normalize an untrusted evidence payload into a complete EvidenceRecord.
 *
 * Never throws. Accepts either the wire shape (snake_case) or an already
 * canonical record, so validating a validated record returns an equal record.
 */
export function validateEvidence(raw: unknown, marketId: string): EvidenceRecord {
  const evidence = emptyEvidence();
  if (!isRecord(raw)) {
    log.warn(`Evidence for market ${marketId} is not an object, using empty record`);
    return evidence;
  }

  for (const [wire, field] of LIST_FIELDS) {
    const value = wire in raw ? raw[wire] : raw[field];
    if (value === undefined || value === null) continue;
    if (!Array.isArray(value)) {
      log.warn(`Invalid type for ${wire} in market ${marketId}`);
      continue;
    }
    evidence[field] = pickStringList(value, MAX_EVIDENCE_ITEMS);
  }

  const rawQuality = 'source_quality' in raw ? raw.source_quality : raw.sourceQuality;
  if (rawQuality !== undefined && rawQuality !== null) {
    const normalized = pickString(rawQuality).trim().toLowerCase();
    const quality = toSourceQuality(normalized);
    if (quality) {
      evidence.sourceQuality = quality;
    } else {
      log.warn(`Invalid source_quality '${normalized}' in market ${marketId}, using 'unknown'`);
    }
  }

  return evidence;
}

export function isEvidenceEmpty(evidence: EvidenceRecord): boolean {
  return LIST_FIELDS.every(([, field]) => evidence[field].length === 0);
}

function formatResolutionDate(date: Date): string {
  // YYYY-MM-DD HH:MM:SS UTC
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function buildResearchPrompt(market: Market): string {
  const endDate = market.endDate ? `Resolution Date: ${formatResolutionDate(market.endDate)}` : '';

  return `Research the following prediction market question and provide ONLY factual evidence. Do NOT estimate probabilities or make predictions.

MARKET QUESTION: ${market.title}

DESCRIPTION: ${market.description}

${endDate}

INSTRUCTIONS:
1. Gather recent developments relevant to this question
2. List factual evidence that would support a YES outcome
3. List factual evidence that would support a NO outcome
4. Identify any official signals (announcements, statements, etc.)
5. Note timeline constraints or deadlines
6. Assess the quality of available sources

CRITICAL: Provide ONLY evidence and facts. NO reasoning, NO probability estimates, NO conclusions.

Return your response as valid JSON only (no markdown, no code blocks, no explanatory text). Use this exact structure:

{
  "recent_developments": ["fact 1", "fact 2", ...],
  "evidence_yes": ["evidence supporting yes", ...],
  "evidence_no": ["evidence supporting no", ...],
  "official_signals": ["official statement or announcement", ...],
  "timeline_constraints": ["deadline or time constraint", ...],
  "source_quality": "high|medium|low"
}

If information is unavailable, use empty arrays [] or "unknown" for source_quality. Do not fabricate sources or evidence.`;
}

/**
 * Gather evidence for one market. Empty or unparseable replies count as failed
 * attempts and are retried per the policy (exponential backoff by default).
 * Resolves null once attempts are exhausted.
 */
export async function researchMarket(
  market: Market,
  provider: TextProvider,
  policy: RetryPolicy = EVIDENCE_RETRY
): Promise<EvidenceRecord | null> {
  log.info(`Researching market: ${market.id} - ${market.title.slice(0, 50)}...`);
  const prompt = buildResearchPrompt(market);

  try {
    const evidence = await policy.run(`research ${market.id}`, async () => {
      const reply = await provider(prompt);
      const parsed = parseJsonObject(reply);
      if (!parsed.ok) throw new ProviderError('evidence', parsed.reason);
      return validateEvidence(parsed.value, market.id);
    });
    log.info(`Gathered evidence for market ${market.id}`);
    return evidence;
  } catch (err) {
    log.error(`Failed to gather evidence for market ${market.id} after ${policy.attempts} attempts: ${describeError(err)}`);
    return null;
  }
}
