import { createHash } from 'crypto';

export interface CacheKeySpec {
  provider: string;
  operation: string;
  params?: Record<string, unknown>;
}

type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical };

const SYMBOL_PARAMS = new Set(['symbol', 'symbols', 'ticker']);
const DATE_PARAMS = new Set(['date', 'startDate', 'endDate', 'start_date', 'end_date', 'from', 'to']);
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const pad = (n: number) => String(n).padStart(2, '0');

function normalizeDate(value: string | Date): string {
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  const trimmed = value.trim();
  if (ISO_DATE_PREFIX.test(trimmed)) return trimmed.slice(0, 10);
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return trimmed;
  return `${parsed.getFullYear()}-${pad(parsed.getMonth() + 1)}-${pad(parsed.getDate())}`;
}

function canonicalValue(name: string, value: unknown): Canonical | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;

  if (SYMBOL_PARAMS.has(name)) {
    if (typeof value === 'string') return value.trim().toUpperCase();
    if (Array.isArray(value)) {
      return value
        .filter((v): v is string => typeof v === 'string')
        .map((v) => v.trim().toUpperCase())
        .sort();
    }
  }

  if (DATE_PARAMS.has(name) && (typeof value === 'string' || value instanceof Date)) {
    return normalizeDate(value);
  }

  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) {
    return value.map((v) => canonicalValue('', v)).filter((v): v is Canonical => v !== undefined);
  }
  if (typeof value === 'object') {
    return canonicalizeParams(Object.fromEntries(Object.entries(value)));
  }
  return String(value);
}

/** Sorted keys, `undefined` dropped, symbols upper-cased, dates as `YYYY-MM-DD`. */
export function canonicalizeParams(params: Record<string, unknown> = {}): { [key: string]: Canonical } {
  const out: { [key: string]: Canonical } = {};
  for (const name of Object.keys(params).sort()) {
    const value = canonicalValue(name, params[name]);
    if (value !== undefined) out[name] = value;
  }
  return out;
}

export function deriveCacheKey(spec: CacheKeySpec): string {
  const canonical = JSON.stringify(canonicalizeParams(spec.params));
  const digest = createHash('sha1').update(canonical).digest('hex');
  return `mkt:${spec.provider}:${spec.operation}:${digest}`;
}
