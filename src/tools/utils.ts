export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function pickString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return '';
}

export function pickNumber(value: unknown): number | null {
  if (typeof value === 'string' && value.trim() === '') return null;
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(n)) return null;
  return n;
}

export function pickInt(value: unknown, fallback: number, opts: { min?: number; max?: number } = {}): number {
  const raw = pickNumber(value);
  const n = raw == null ? fallback : Math.floor(raw);
  const min = opts.min ?? -Infinity;
  const max = opts.max ?? Infinity;
  return Math.max(min, Math.min(max, n));
}

// Trimmed, non-empty text items, at most `limit` of them
export function pickStringList(value: unknown[], limit: number): string[] {
  const out: string[] = [];
  for (const item of value) {
    if (out.length >= limit) break;
    const text = pickString(item).trim();
    if (text) out.push(text);
  }
  return out;
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

export function formatUsd(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

export function formatPercent(value: number, digits = 1): string {
  return `${(value * 100).toFixed(digits)}%`;
}
