/**
 * Pre-selection safety filters.
 *
 * These sit between eligibility and execution and never touch the viability
 * score: an event either passes them or is left out of the cycle.
 */

import type { EventSummary, MarketLite } from './event_schema.js';
import { compareScoreRecords, hoursUntil, type ScoreRecord } from './scorer.js';

const POSITIVE_RULE_KEYWORDS = [
  'official',
  'according to',
  'based on',
  'department of',
  'exchange',
  'index',
  'close price',
  'settlement price',
  'reported by',
  'government',
  'regulator',
  'data from',
  'per the rules',
] as const;

const NEGATIVE_RULE_KEYWORDS = [
  'jury',
  'judge',
  'panel',
  'subjective',
  'opinion',
  'community vote',
  'undefined',
  'sole discretion',
  'if no official',
  'admin',
  'moderator',
  'twitter poll',
  'social media',
  'meme',
] as const;

/**
 * True when the resolution rules point at a verifiable source and name no
 * judgement-based resolver.
 */
export function isObjectiveRule(rules: string | null): boolean {
  if (!rules) return false;
  const text = rules.toLowerCase();
  if (NEGATIVE_RULE_KEYWORDS.some((keyword) => text.includes(keyword))) return false;
  if (POSITIVE_RULE_KEYWORDS.some((keyword) => text.includes(keyword))) return true;
  return text.includes('http://') || text.includes('https://') || text.includes('source:');
}

/** 0-100; 45 without rules, 55 for neutral text. */
export function rulesObjectivity(rules: string | null): number {
  if (rules === null) return 45;
  const text = rules.toLowerCase();
  let score = 55;
  for (const keyword of POSITIVE_RULE_KEYWORDS) {
    if (text.includes(keyword)) score += 6;
  }
  for (const keyword of NEGATIVE_RULE_KEYWORDS) {
    if (text.includes(keyword)) score -= 10;
  }
  if (text.includes('resolve') && text.includes('official')) score += 5;
  if (text.includes('subject to change') || text.includes('ambiguous')) score -= 15;
  return Math.max(0, Math.min(100, score));
}

export interface TimeWindow {
  minHours: number;
  /** `null` leaves the window open-ended. */
  maxHours: number | null;
}

/** Events without a parseable end date are outside every window. */
export function withinTimeWindow(endDate: string | null, now: Date, window: TimeWindow): boolean {
  const hours = hoursUntil(endDate, now);
  if (hours === null || hours < window.minHours) return false;
  return window.maxHours === null || hours <= window.maxHours;
}

export interface SafetyFilterOptions {
  timeWindow?: TimeWindow | null;
  requireObjectiveRules?: boolean;
  /** Minimum `rulesObjectivity`; 0 disables the threshold. */
  minRulesObjectivity?: number;
}

/** Why an event fails the filters, or null when it passes. */
export function safetyRejection(event: EventSummary, options: SafetyFilterOptions, now: Date): string | null {
  if (options.timeWindow && !withinTimeWindow(event.endDate, now, options.timeWindow)) {
    return `Event ${event.id} ends outside the trading window`;
  }
  if (options.requireObjectiveRules && !isObjectiveRule(event.rules)) {
    return `Event ${event.id} has no objectively verifiable rules`;
  }
  const minimum = options.minRulesObjectivity ?? 0;
  if (minimum > 0 && rulesObjectivity(event.rules) < minimum) {
    return `Event ${event.id} rules score below ${minimum}`;
  }
  return null;
}

export interface TopOfBook {
  bid: number | null;
  ask: number | null;
  bidSize: number | null;
  askSize: number | null;
}

export function topOfBookFromSnapshot(market: MarketLite): TopOfBook {
  return {
    bid: market.bestBid,
    ask: market.bestAsk,
    bidSize: market.bestBidSize,
    askSize: market.bestAskSize,
  };
}

/**
 * Both sides quoted, ask above bid, spread within `maxSpreadTicks` ticks and
 * at least the market's minimum order size resting on each side.
 */
export function bookRejection(market: MarketLite, book: TopOfBook, maxSpreadTicks = 2): string | null {
  const { bid, ask, bidSize, askSize } = book;
  if (bid === null || ask === null || bidSize === null || askSize === null) {
    return `Market ${market.id} book is missing a side`;
  }
  if (ask <= bid) {
    return `Market ${market.id} book is crossed (${bid} / ${ask})`;
  }
  const tick = market.orderPriceMinTickSize ?? 0.01;
  if (ask - bid > tick * maxSpreadTicks + 1e-9) {
    return `Market ${market.id} spread ${(ask - bid).toFixed(4)} exceeds ${maxSpreadTicks} ticks`;
  }
  const minSize = market.orderMinSize ?? 1;
  if (bidSize < minSize || askSize < minSize) {
    return `Market ${market.id} book is thinner than the ${minSize} share minimum`;
  }
  return null;
}

/**
 * Selection order: score plus `bonus` for negRisk events, then the scorer's
 * own order. Scores themselves are left as they are.
 */
export function prioritizeNegRisk(
  ranked: ScoreRecord[],
  events: ReadonlyMap<string, EventSummary>,
  bonus: number
): ScoreRecord[] {
  if (bonus <= 0) return ranked;
  const boosted = (record: ScoreRecord): number =>
    record.score + (events.get(record.eventId)?.negRisk ? bonus : 0);
  return [...ranked].sort((a, b) => boosted(b) - boosted(a) || compareScoreRecords(a, b));
}
