/**
 * Perplexity agent - evidence gathering transport
 *
 * Sends a single user prompt to the chat completions endpoint and returns the
 * raw reply text. Parsing and validation happen in evidence.ts.
 */

import type { TextProvider } from '../core/types.js';
import { ProviderError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { isRecord, pickString } from '../tools/utils.js';

const PERPLEXITY_API_BASE = 'https://api.perplexity.ai';

const log = createLogger('perplexity');

export interface PerplexityOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  baseUrl?: string;
}

function replyContent(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) return '';
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return '';
  return pickString(first.message.content);
}

export async function perplexityChat(prompt: string, opts: PerplexityOptions): Promise<string> {
  if (!opts.apiKey) {
    throw new ProviderError('perplexity', 'PERPLEXITY_API_KEY not set in environment');
  }

  let response: Response;
  try {
    response = await fetch(`${opts.baseUrl ?? PERPLEXITY_API_BASE}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${opts.apiKey}`
      },
      body: JSON.stringify({
        model: opts.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: opts.temperature,
        max_tokens: opts.maxTokens
      }),
      signal: AbortSignal.timeout(opts.timeoutMs)
    });
  } catch (err) {
    throw new ProviderError('perplexity', `request failed: ${describeError(err)}`, undefined, { cause: err });
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new ProviderError('perplexity', `API error: ${response.status} - ${errorText.slice(0, 500)}`, response.status);
  }

  const data: unknown = await response.json();
  const content = replyContent(data);
  if (!content) {
    throw new ProviderError('perplexity', 'unexpected response structure');
  }

  log.debug(`Received response of length ${content.length}`);
  return content;
}

export function createPerplexityProvider(opts: PerplexityOptions): TextProvider {
  return prompt => perplexityChat(prompt, opts);
}
