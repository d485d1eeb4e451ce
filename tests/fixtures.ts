import type { EventSummary, MarketLite } from '../src/discovery/event_schema.js';
import type { OrderIntent, OrderResult } from '../src/execution/exchange.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export function hoursFromNow(hours: number): string {
  return new Date(NOW.getTime() + hours * 3_600_000).toISOString();
}

export function makeMarket(overrides: Partial<MarketLite> = {}): MarketLite {
  return {
    id: 'm-1',
    slug: 'market-one',
    question: 'Will it happen?',
    endDate: hoursFromNow(2),
    enableOrderBook: true,
    acceptingOrders: true,
    closed: false,
    negRisk: false,
    orderMinSize: 5,
    orderPriceMinTickSize: 0.01,
    clobTokenIds: ['tok-yes', 'tok-no'],
    bestBid: 0.48,
    bestAsk: 0.5,
    bestBidSize: 100,
    bestAskSize: 100,
    volume24hr: 1000,
    openInterest: 500,
    liquidity: 800,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<EventSummary> = {}): EventSummary {
  const id = overrides.id ?? 'E1';
  return {
    id,
    slug: `event-${id.toLowerCase()}`,
    title: `Event ${id}`,
    active: true,
    closed: false,
    createdAt: '2026-02-01T00:00:00Z',
    startDate: '2026-02-01T00:00:00Z',
    endDate: hoursFromNow(2),
    liquidity: 1000,
    volume: 5000,
    openInterest: null,
    enableOrderBook: true,
    tags: [{ id: '21', slug: 'crypto', label: 'Crypto' }],
    marketsCount: 1,
    url: `https://polymarket.com/event/event-${id.toLowerCase()}`,
    negRisk: false,
    rules: null,
    markets: [makeMarket({ id: `${id}-m1` })],
    ...overrides,
  };
}

export function makeIntent(overrides: Partial<OrderIntent> = {}): OrderIntent {
  return {
    eventId: 'E1',
    marketId: 'E1-m1',
    tokenId: 'tok-yes',
    side: 'BUY',
    size: 10,
    limitPrice: 0.5,
    tickSize: 0.01,
    negRisk: false,
    clientRequestId: 'req-e1',
    ...overrides,
  };
}

export function makeResult(overrides: Partial<OrderResult> = {}): OrderResult {
  return {
    status: 'Filled',
    clientRequestId: 'req-e1',
    externalOrderId: 'ord-1',
    filledSize: 10,
    avgPrice: 0.5,
    ...overrides,
  };
}
