import { isRecord } from '../tools/utils.js';

/**
 * Pull the JSON object out of a provider reply.
 *
 * Strips a leading ```json / ``` fence and a trailing ``` fence, then takes the
 * text from the first "{" to the last "}" inclusive. Returns null when there is
 * no such pair, which callers treat as a failed attempt.
 */
export function extractJsonBlock(text: string): string | null {
  let body = text.trim();

  if (body.startsWith('```json')) {
    body = body.slice(7);
  } else if (body.startsWith('```')) {
    body = body.slice(3);
  }
  if (body.endsWith('```')) {
    body = body.slice(0, -3);
  }
  body = body.trim();

  const first = body.indexOf('{');
  const last = body.lastIndexOf('}');
  if (first === -1 || last === -1 || last <= first) return null;

  return body.slice(first, last + 1);
}

export type JsonObjectResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

export function parseJsonObject(text: string): JsonObjectResult {
  if (!text.trim()) return { ok: false, reason: 'empty response' };

  const block = extractJsonBlock(text);
  if (block == null) return { ok: false, reason: 'no JSON object found in response' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `invalid JSON: ${message}` };
  }

  if (!isRecord(parsed)) return { ok: false, reason: 'response is not a JSON object' };
  return { ok: true, value: parsed };
}
