import type { EventSummary, EventTag, MarketLite } from './event_schema.js';

export function isEligible(event: EventSummary): boolean {
  return event.active === true && event.closed === false && event.enableOrderBook === true;
}

export function isTradableMarket(market: MarketLite): boolean {
  if (!market.enableOrderBook || market.closed || !market.acceptingOrders) return false;
  if (market.clobTokenIds.length === 0) return false;
  const ask = market.bestAsk;
  return ask !== null && ask > 0 && ask < 1;
}

export function tradableMarkets(event: EventSummary): MarketLite[] {
  return (event.markets ?? []).filter(isTradableMarket);
}

export function normalizeTagTokens(tags: Iterable<string>): Set<string> {
  const tokens = new Set<string>();
  for (const tag of tags) {
    const text = tag.trim().toLowerCase();
    if (text) tokens.add(text);
  }
  return tokens;
}

/** An empty token set matches everything. */
export function matchesTags(tags: EventTag[], tokens: Set<string>): boolean {
  if (tokens.size === 0) return true;
  for (const tag of tags) {
    for (const value of [tag.id, tag.slug, tag.label]) {
      if (value && tokens.has(value.toLowerCase())) return true;
    }
  }
  return false;
}

export interface EligibilityOptions {
  /** Drop events whose hydrated markets contain nothing an order can be placed on. */
  requireTradableMarket?: boolean;
}

export function* filterEligible(
  events: Iterable<EventSummary>,
  options: EligibilityOptions = {}
): Generator<EventSummary> {
  for (const event of events) {
    if (!isEligible(event)) continue;
    if (options.requireTradableMarket && tradableMarkets(event).length === 0) continue;
    yield event;
  }
}
