import { describe, expect, it } from 'vitest';

import { clientRequestIdFor, pickMarket, planOrder, roundToTick } from '../../src/execution/planner.js';
import { makeEvent, makeMarket } from '../fixtures.js';

describe('clientRequestIdFor', () => {
  it('is stable per event, market and side', () => {
    const key = clientRequestIdFor('E1', 'm-1', 'BUY');
    expect(key).toMatch(/^[0-9a-f]{32}$/);
    expect(clientRequestIdFor('E1', 'm-1', 'BUY')).toBe(key);
    expect(clientRequestIdFor('E1', 'm-1', 'SELL')).not.toBe(key);
  });
});

describe('roundToTick', () => {
  it('rounds buys up and sells down onto the tick grid', () => {
    expect(roundToTick(0.503, 0.01, 'up')).toBe(0.51);
    expect(roundToTick(0.503, 0.01, 'down')).toBe(0.5);
    expect(roundToTick(0.5, 0.01, 'up')).toBe(0.5);
    expect(roundToTick(0.4567, 0.001, 'up')).toBe(0.457);
  });
});

describe('pickMarket', () => {
  it('prefers the tightest spread, then liquidity', () => {
    const wide = makeMarket({ id: 'wide', bestBid: 0.45 });
    const tight = makeMarket({ id: 'tight', bestBid: 0.48, liquidity: 10 });
    const deep = makeMarket({ id: 'deep', bestBid: 0.48, liquidity: 5000 });

    expect(pickMarket([wide, tight])?.id).toBe('tight');
    expect(pickMarket([wide, tight, deep])?.id).toBe('deep');
    expect(pickMarket([])).toBeNull();
  });
});

describe('planOrder', () => {
  it('buys the first outcome token at the ask', () => {
    const plan = planOrder(makeEvent(), { stakeUsd: 5 });
    expect(plan).toMatchObject({
      kind: 'planned',
      notional: 5,
      intent: {
        eventId: 'E1',
        marketId: 'E1-m1',
        tokenId: 'tok-yes',
        side: 'BUY',
        size: 10,
        limitPrice: 0.5,
        tickSize: 0.01,
        negRisk: false,
        clientRequestId: clientRequestIdFor('E1', 'E1-m1', 'BUY'),
      },
    });
  });

  it('raises the size to the market minimum', () => {
    const plan = planOrder(makeEvent(), { stakeUsd: 1 });
    expect(plan.kind === 'planned' && [plan.intent.size, plan.notional]).toEqual([5, 2.5]);
  });

  it('inherits neg-risk from the event', () => {
    const plan = planOrder(makeEvent({ negRisk: true }), { stakeUsd: 5 });
    expect(plan.kind === 'planned' && plan.intent.negRisk).toBe(true);
  });

  it('explains why nothing can be planned', () => {
    expect(planOrder(makeEvent({ markets: [] }), { stakeUsd: 5 })).toEqual({
      kind: 'none',
      reason: 'Event E1 has no market accepting orders',
    });
    expect(planOrder(makeEvent({ markets: [makeMarket({ id: 'E1-m1', bestAsk: 0.995 })] }), { stakeUsd: 5 })).toEqual({
      kind: 'none',
      reason: 'Market E1-m1 price 0.995 leaves no room to trade',
    });
  });
});
