/**
 * Telegram notifier - best-effort delivery of ranked opportunities.
 * Nothing here throws: failures are logged and reported as false.
 */

import type { RankedOpportunity } from '../types/index.js';
import { describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { formatPercent } from '../tools/utils.js';

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const MAX_RATIONALE_CHARS = 200;

const log = createLogger('telegram');

export interface TelegramOptions {
  token: string;
  chatId: string;
  timeoutMs?: number;
  baseUrl?: string;
}

function shorten(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// Legacy Markdown mode: these are the only characters that need a backslash
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, ch => `\\${ch}`);
}

export function formatOpportunities(opportunities: readonly RankedOpportunity[]): string {
  if (opportunities.length === 0) return 'No opportunities found.';

  const lines = ['*Prediction Market Opportunities*', `Found ${opportunities.length} ranked opportunities`, ''];

  opportunities.forEach((opp, idx) => {
    const { market, decision } = opp;
    const sign = decision.edge > 0 ? '+' : '';
    lines.push(`*${idx + 1}. ${escapeMarkdown(market.title)}*`);
    lines.push(`Market: ${formatPercent(market.probability)}`);
    lines.push(`Estimated: ${formatPercent(decision.estimatedProbability)}`);
    lines.push(`Edge: ${sign}${(decision.edge * 100).toFixed(1)}%`);
    lines.push(`Confidence: ${formatPercent(decision.confidenceLevel)}`);
    lines.push(`Decision: ${decision.decision.toUpperCase()}`);
    if (decision.reasoningSummary) {
      lines.push(`Why: ${escapeMarkdown(shorten(decision.reasoningSummary, MAX_RATIONALE_CHARS))}`);
    }
    lines.push('');
  });

  return lines.join('\n');
}

export async function sendTelegramMessage(text: string, opts: TelegramOptions): Promise<boolean> {
  if (!opts.token || !opts.chatId) {
    log.debug('Telegram not configured (missing token or chat id)');
    return false;
  }
  if (!text.trim()) {
    log.warn('Empty message, not sending');
    return false;
  }

  try {
    const response = await fetch(`${opts.baseUrl ?? TELEGRAM_API_BASE}/bot${opts.token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: opts.chatId,
        text,
        parse_mode: 'Markdown',
        disable_web_page_preview: true
      }),
      signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000)
    });

    if (!response.ok) {
      const body = await response.text();
      log.error(`Telegram API error: ${response.status} - ${body.slice(0, 200)}`);
      return false;
    }

    log.info('Telegram message sent');
    return true;
  } catch (err) {
    log.error(`Error sending Telegram message: ${describeError(err)}`);
    return false;
  }
}

export async function notifyOpportunities(
  opportunities: readonly RankedOpportunity[],
  opts: TelegramOptions
): Promise<boolean> {
  if (opportunities.length === 0) {
    log.debug('No opportunities to send');
    return false;
  }
  return sendTelegramMessage(formatOpportunities(opportunities), opts);
}
