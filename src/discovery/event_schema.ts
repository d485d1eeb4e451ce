/**
 * Strict parsing of Gamma event and market payloads.
 *
 * Gamma returns loosely typed JSON: numbers arrive as strings, booleans as
 * "true"/"1", token id lists as JSON-encoded strings. Every record passes
 * through these schemas before the pipeline sees it; unknown fields are
 * dropped and a record missing a required field is rejected on its own.
 */

import { z } from 'zod';

import { ValidationError } from '../core/errors.js';

export interface EventTag {
  id: string;
  slug: string;
  label: string;
}

export interface MarketLite {
  id: string;
  slug: string | null;
  question: string | null;
  endDate: string | null;
  enableOrderBook: boolean;
  acceptingOrders: boolean;
  closed: boolean;
  negRisk: boolean;
  orderMinSize: number | null;
  orderPriceMinTickSize: number | null;
  clobTokenIds: string[];
  bestBid: number | null;
  bestAsk: number | null;
  bestBidSize: number | null;
  bestAskSize: number | null;
  volume24hr: number | null;
  openInterest: number | null;
  liquidity: number | null;
}

export interface EventSummary {
  id: string;
  slug: string;
  title: string;
  active: boolean;
  closed: boolean;
  createdAt: string | null;
  startDate: string | null;
  endDate: string | null;
  liquidity: number | null;
  volume: number | null;
  openInterest: number | null;
  enableOrderBook: boolean;
  tags: EventTag[];
  marketsCount: number | null;
  url: string;
  negRisk: boolean;
  rules: string | null;
  markets: MarketLite[] | null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function coerceString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') {
    const text = value.trim();
    return text.length > 0 ? text : undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const text = coerceString(value);
  if (text === undefined) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'off', 'nan', 'none', 'null']);

export function coerceBool(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value !== 0 : fallback;
  const text = coerceString(value)?.toLowerCase();
  if (text === undefined) return fallback;
  if (TRUE_WORDS.has(text)) return true;
  if (FALSE_WORDS.has(text)) return false;
  return fallback;
}

export function coerceStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(coerceString).filter((item): item is string => item !== undefined);
  }
  const text = coerceString(value);
  if (text === undefined) return [];
  if (text.startsWith('[') && text.endsWith(']')) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed)) {
        return coerceStringList(parsed);
      }
    } catch {
      return [text];
    }
  }
  return [text];
}

const requiredText = z.preprocess(coerceString, z.string());
const optionalText = z.preprocess((v) => coerceString(v) ?? null, z.string().nullable());
const optionalNumber = z.preprocess((v) => coerceNumber(v) ?? null, z.number().nullable());
const flag = (fallback: boolean) => z.preprocess((v) => coerceBool(v, fallback), z.boolean());

const tagSchema = z.object({
  id: z.preprocess((v) => coerceString(v) ?? '', z.string()),
  slug: z.preprocess((v) => coerceString(v) ?? '', z.string()),
  label: z.preprocess((v) => coerceString(v) ?? '', z.string()),
});

const tagsSchema = z.preprocess((value) => {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord);
}, z.array(tagSchema));

const marketSchema = z.object({
  id: requiredText,
  slug: optionalText,
  question: optionalText,
  endDate: optionalText,
  enableOrderBook: flag(false),
  acceptingOrders: flag(true),
  closed: flag(false),
  negRisk: flag(false),
  orderMinSize: optionalNumber,
  orderPriceMinTickSize: optionalNumber,
  clobTokenIds: z.preprocess(coerceStringList, z.array(z.string())),
  bestBid: optionalNumber,
  bestAsk: optionalNumber,
  bestBidSize: optionalNumber,
  bestAskSize: optionalNumber,
  volume24hr: optionalNumber,
  openInterest: optionalNumber,
  liquidity: optionalNumber,
});

const eventSchema = z.object({
  id: requiredText,
  slug: requiredText,
  title: requiredText,
  active: flag(false),
  closed: flag(false),
  createdAt: optionalText,
  startDate: optionalText,
  endDate: optionalText,
  liquidity: optionalNumber,
  volume: optionalNumber,
  openInterest: optionalNumber,
  enableOrderBook: flag(false),
  tags: tagsSchema,
  negRisk: flag(false),
  rules: optionalText,
});

function toIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

function firstDefined(raw: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

/**
 * Parse one Gamma market. Field aliases seen across Gamma versions are folded
 * into the canonical names before validation.
 */
export function parseMarket(raw: unknown): MarketLite {
  if (!isRecord(raw)) {
    throw new ValidationError('Market payload is not an object', null);
  }
  const normalized = {
    ...raw,
    endDate: firstDefined(raw, ['endDate', 'end_date', 'endDateIso']),
    bestBid: firstDefined(raw, ['bestBid', 'bestBidPrice', 'bidPrice']),
    bestAsk: firstDefined(raw, ['bestAsk', 'bestAskPrice', 'askPrice']),
    orderPriceMinTickSize: firstDefined(raw, ['orderPriceMinTickSize', 'priceIncrement']),
    volume24hr: firstDefined(raw, ['volume24hrClob', 'volume24hr', 'volume24h', 'volume']),
    openInterest: firstDefined(raw, ['openInterest', 'openInterestClob']),
    clobTokenIds: firstDefined(raw, ['clobTokenIds', 'clobTokenId']),
  };
  const result = marketSchema.safeParse(normalized);
  if (!result.success) {
    throw new ValidationError(
      'Market payload failed validation',
      coerceString(raw.id) ?? null,
      toIssues(result.error)
    );
  }
  return result.data;
}

/** Markets that fail validation are left out; the event itself still parses. */
export function parseMarkets(raw: unknown): MarketLite[] | null {
  if (!Array.isArray(raw)) return null;
  const markets: MarketLite[] = [];
  for (const item of raw) {
    try {
      markets.push(parseMarket(item));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
    }
  }
  return markets;
}

export function parseEventSummary(raw: unknown): EventSummary {
  if (!isRecord(raw)) {
    throw new ValidationError('Event payload is not an object', null);
  }
  const result = eventSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      'Event payload failed validation',
      coerceString(raw.id) ?? null,
      toIssues(result.error)
    );
  }
  const event = result.data;
  const markets = parseMarkets(raw.markets);
  return {
    ...event,
    tags: event.tags.filter((tag) => tag.id || tag.slug || tag.label),
    marketsCount: Array.isArray(raw.markets) ? raw.markets.length : null,
    url: `https://polymarket.com/event/${event.slug}`,
    markets,
  };
}

export interface ParsedEvents {
  events: EventSummary[];
  rejected: ValidationError[];
}

export function parseEventSummaries(raw: unknown[]): ParsedEvents {
  const events: EventSummary[] = [];
  const rejected: ValidationError[] = [];
  for (const item of raw) {
    try {
      events.push(parseEventSummary(item));
    } catch (err) {
      if (err instanceof ValidationError) {
        rejected.push(err);
        continue;
      }
      throw err;
    }
  }
  return { events, rejected };
}
