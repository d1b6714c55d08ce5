import type { Market } from '../types/index.js';
import { ProviderError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { clamp, isRecord, pickNumber, pickString } from '../tools/utils.js';

const GAMMA_API_BASE = 'https://gamma-api.polymarket.com';

const log = createLogger('fetch');

export interface FetchMarketsOptions {
  limit?: number;
  offset?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

// Gamma returns some arrays as JSON-encoded strings: '["0.65", "0.35"]'
function jsonList(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value !== 'string') return null;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extractProbability(raw: Record<string, unknown>): number {
  const prices = jsonList(raw.outcomePrices);

  if (!prices || prices.length === 0) {
    const bid = pickNumber(raw.bestBid);
    const ask = pickNumber(raw.bestAsk);
    if (bid != null && ask != null && bid > 0 && ask > 0) return (bid + ask) / 2;
    return 0.5;
  }

  const outcomes = jsonList(raw.outcomes);
  const yesIndex = outcomes ? outcomes.indexOf('Yes') : -1;
  if (yesIndex >= 0 && yesIndex < prices.length) {
    const yes = pickNumber(prices[yesIndex]);
    if (yes != null) return yes;
  }

  return pickNumber(prices[0]) ?? 0.5;
}

function parseEndDate(value: unknown): Date | undefined {
  const text = pickString(value).trim();
  if (!text) return undefined;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseMarket(raw: unknown): Market | null {
  if (!isRecord(raw)) return null;

  const id = pickString(raw.id).trim();
  if (!id) return null;

  const title = pickString(raw.question) || pickString(raw.title) || 'Unknown Market';

  return {
    id,
    title,
    description: pickString(raw.description) || pickString(raw.question),
    probability: clamp(extractProbability(raw)),
    liquidity: Math.max(0, pickNumber(raw.liquidityNum) ?? pickNumber(raw.liquidity) ?? 0),
    volume24h: Math.max(0, pickNumber(raw.volume24hr) ?? pickNumber(raw.volume24h) ?? 0),
    endDate: parseEndDate(raw.endDate ?? raw.end_date),
    category: pickString(raw.category),
    slug: pickString(raw.slug)
  };
}

export function normalizeMarkets(data: unknown): Market[] {
  if (!Array.isArray(data)) {
    log.warn(`Expected list of markets, got ${typeof data}`);
    return [];
  }

  const markets: Market[] = [];
  data.forEach((entry, idx) => {
    const market = parseMarket(entry);
    if (market) markets.push(market);
    else log.debug(`Skipping market at index ${idx}: missing id`);
  });
  return markets;
}

export async function fetchMarkets(opts: FetchMarketsOptions = {}): Promise<Market[]> {
  const params = new URLSearchParams();
  params.append('closed', 'false');
  params.append('limit', String(opts.limit ?? 100));
  params.append('offset', String(opts.offset ?? 0));

  const url = `${opts.baseUrl ?? GAMMA_API_BASE}/markets?${params.toString()}`;
  log.info(`Fetching up to ${opts.limit ?? 100} active markets`);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000)
    });
  } catch (err) {
    throw new ProviderError('polymarket', `request failed: ${describeError(err)}`, undefined, { cause: err });
  }

  if (!response.ok) {
    throw new ProviderError('polymarket', `API error: ${response.status} ${response.statusText}`, response.status);
  }

  const data: unknown = await response.json();
  const markets = normalizeMarkets(data);
  log.info(`Normalized ${markets.length} markets`);
  return markets;
}
