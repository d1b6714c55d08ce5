import fs from 'fs';
import path from 'path';
import type { RankedOpportunity } from '../types/index.js';
import { createLogger } from '../core/logger.js';
import { formatTimeToResolution } from '../core/time.js';
import { formatPercent, formatUsd } from '../tools/utils.js';

const log = createLogger('report');

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);
const MAX_RISKS_SHOWN = 5;

export interface ReportOptions {
  maxOpportunities?: number;
  now?: Date;
}

function utcStamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function signedPercent(value: number): string {
  return `${value > 0 ? '+' : ''}${formatPercent(value)}`;
}

function renderHeader(count: number, now: Date): string {
  return [
    RULE,
    '  PREDICTION MARKET RESEARCH - OPPORTUNITY REPORT',
    RULE,
    `Generated: ${utcStamp(now)}`,
    `Opportunities Found: ${count}`,
    RULE
  ].join('\n');
}

function renderSummary(list: readonly RankedOpportunity[]): string {
  if (list.length === 0) return 'No opportunities found.';

  const total = list.length;
  const yes = list.filter(o => o.decision.decision === 'yes').length;
  const no = list.filter(o => o.decision.decision === 'no').length;
  const avg = (pick: (o: RankedOpportunity) => number) => list.reduce((sum, o) => sum + pick(o), 0) / total;
  const totalLiquidity = list.reduce((sum, o) => sum + o.market.liquidity, 0);

  return [
    'SUMMARY STATISTICS',
    THIN_RULE,
    `Total Opportunities: ${total}`,
    `  - YES Recommendations: ${yes}`,
    `  - NO Recommendations: ${no}`,
    '',
    'Average Metrics:',
    `  - Score: ${avg(o => o.score).toFixed(3)}`,
    `  - Edge: ${formatPercent(avg(o => Math.abs(o.decision.edge)))}`,
    `  - Confidence: ${formatPercent(avg(o => o.decision.confidenceLevel))}`,
    `  - Total Liquidity: ${formatUsd(totalLiquidity)}`
  ].join('\n');
}

export function formatOpportunity(rank: number, opp: RankedOpportunity, now: Date): string {
  const { market, decision } = opp;
  const lines = [
    `[${rank}] ${market.title}`,
    `    Market ID: ${market.id}`,
    `    Category: ${market.category || 'N/A'}`,
    '',
    `    SCORE: ${opp.score.toFixed(3)} (Edge: ${opp.edgeScore.toFixed(2)} | Conf: ${opp.confidenceScore.toFixed(2)} | ` +
      `Liq: ${opp.liquidityScore.toFixed(2)} | Time: ${opp.timeScore.toFixed(2)})`,
    '',
    '    KEY METRICS:',
    `      Market Probability: ${formatPercent(market.probability)}`,
    `      Estimated Probability: ${formatPercent(decision.estimatedProbability)}`,
    `      Edge: ${signedPercent(decision.edge)}`,
    `      Confidence: ${formatPercent(decision.confidenceLevel)}`,
    `      Liquidity: ${formatUsd(market.liquidity)}`,
    `      Volume (24h): ${formatUsd(market.volume24h)}`,
    `      Time to Resolution: ${formatTimeToResolution(market.endDate, now)}`,
    '',
    `    DECISION: ${decision.decision.toUpperCase()}`,
    '',
    '    REASONING:',
    `      ${decision.reasoningSummary}`
  ];

  if (decision.keyRisks.length > 0) {
    lines.push('', '    KEY RISKS:');
    for (const risk of decision.keyRisks.slice(0, MAX_RISKS_SHOWN)) {
      lines.push(`      - ${risk}`);
    }
  }

  return lines.join('\n');
}

export function generateReport(opportunities: readonly RankedOpportunity[], opts: ReportOptions = {}): string {
  const now = opts.now ?? new Date();
  const shown = opportunities.slice(0, opts.maxOpportunities ?? 10);

  const body = shown.length === 0
    ? 'No opportunities to display.'
    : ['RANKED OPPORTUNITIES', THIN_RULE, ...shown.map((o, i) => `${formatOpportunity(i + 1, o, now)}\n`)].join('\n');

  return `${renderHeader(shown.length, now)}\n\n${renderSummary(shown)}\n\n${body}`;
}

export function reportFileName(now: Date): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `opportunity_report_${stamp}.txt`;
}

// Writes the report under dir and returns the file path
export function saveReport(report: string, dir: string, now: Date = new Date()): string {
  fs.mkdirSync(dir, { recursive: true });
  const filepath = path.join(dir, reportFileName(now));
  fs.writeFileSync(filepath, report, 'utf-8');
  log.info(`Report saved to ${filepath}`);
  return filepath;
}
