import { createHash } from 'node:crypto';

import type { EventSummary, MarketLite } from '../discovery/event_schema.js';
import { tradableMarkets } from '../discovery/eligibility.js';
import { notionalUsd, type OrderIntent, type OrderSide } from './exchange.js';

export interface PlannerOptions {
  /** Target USD per order. */
  stakeUsd: number;
  side?: OrderSide;
  defaultTickSize?: number;
}

export type PlanOutcome =
  | { kind: 'planned'; intent: OrderIntent; notional: number; market: MarketLite }
  | { kind: 'none'; reason: string };

const SIZE_DECIMALS = 2;

/**
 * Same event, market and side always give the same key, so a later cycle can
 * find an order whose submission outcome was never learned.
 */
export function clientRequestIdFor(eventId: string, marketId: string, side: OrderSide): string {
  return createHash('sha256').update(`${eventId}:${marketId}:${side}`).digest('hex').slice(0, 32);
}

function decimalsOf(step: number): number {
  const text = String(step);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

export function roundToTick(price: number, tick: number, direction: 'up' | 'down'): number {
  const steps = price / tick;
  const rounded = direction === 'up' ? Math.ceil(steps - 1e-9) : Math.floor(steps + 1e-9);
  return Number((rounded * tick).toFixed(decimalsOf(tick)));
}

function spreadOf(market: MarketLite): number {
  const ask = market.bestAsk ?? 1;
  return market.bestBid === null ? ask : ask - market.bestBid;
}

/** Tightest spread first, then deeper liquidity, then id. */
export function pickMarket(markets: MarketLite[]): MarketLite | null {
  const sorted = [...markets].sort((a, b) => {
    const spread = spreadOf(a) - spreadOf(b);
    if (Math.abs(spread) > 1e-12) return spread;
    const liquidity = (b.liquidity ?? 0) - (a.liquidity ?? 0);
    if (liquidity !== 0) return liquidity;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
  return sorted[0] ?? null;
}

/**
 * Turn the selected event into one limit order on its first outcome token,
 * priced at the best ask.
 */
export function planOrder(event: EventSummary, options: PlannerOptions): PlanOutcome {
  const side = options.side ?? 'BUY';
  const market = pickMarket(tradableMarkets(event));
  if (!market) {
    return { kind: 'none', reason: `Event ${event.id} has no market accepting orders` };
  }
  const tokenId = market.clobTokenIds[0];
  const ask = market.bestAsk;
  if (tokenId === undefined || ask === null) {
    return { kind: 'none', reason: `Market ${market.id} has no order book price` };
  }

  const tickSize = market.orderPriceMinTickSize ?? options.defaultTickSize ?? 0.01;
  const limitPrice = roundToTick(ask, tickSize, side === 'BUY' ? 'up' : 'down');
  if (limitPrice <= 0 || limitPrice >= 1) {
    return { kind: 'none', reason: `Market ${market.id} price ${ask} leaves no room to trade` };
  }

  const factor = 10 ** SIZE_DECIMALS;
  const shares = Math.floor((options.stakeUsd / limitPrice) * factor) / factor;
  const size = Math.max(shares, market.orderMinSize ?? 0);
  if (!(size > 0)) {
    return { kind: 'none', reason: `Stake ${options.stakeUsd} buys nothing at ${limitPrice}` };
  }

  const intent: OrderIntent = {
    eventId: event.id,
    marketId: market.id,
    tokenId,
    side,
    size,
    limitPrice,
    tickSize,
    negRisk: market.negRisk || event.negRisk,
    clientRequestId: clientRequestIdFor(event.id, market.id, side),
  };
  return { kind: 'planned', intent, notional: notionalUsd(intent), market };
}
