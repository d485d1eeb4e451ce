import { describe, expect, it } from 'vitest';

import {
  bookRejection,
  isObjectiveRule,
  prioritizeNegRisk,
  rulesObjectivity,
  safetyRejection,
  topOfBookFromSnapshot,
  withinTimeWindow,
} from '../../src/discovery/safety.js';
import type { ScoreRecord } from '../../src/discovery/scorer.js';
import { NOW, hoursFromNow, makeEvent, makeMarket } from '../fixtures.js';

function record(eventId: string, score: number): ScoreRecord {
  return {
    eventId,
    score,
    rationale: '',
    liquidity: 0,
    components: { urgency: 0.5, liquidity: 0, volume: 0, openInterest: 0, estimate: null, hoursToEnd: null },
  };
}

describe('isObjectiveRule', () => {
  it('accepts rules that name a verifiable source', () => {
    expect(isObjectiveRule('Resolves to the official Binance close price.')).toBe(true);
    expect(isObjectiveRule('Source: https://example.com/data')).toBe(true);
  });

  it('rejects missing, vague and judgement-based rules', () => {
    expect(isObjectiveRule(null)).toBe(false);
    expect(isObjectiveRule('Will it rain?')).toBe(false);
    expect(isObjectiveRule('Per the official feed, at the sole discretion of the admin')).toBe(false);
  });
});

describe('rulesObjectivity', () => {
  it('scores missing and neutral rules near the middle', () => {
    expect(rulesObjectivity(null)).toBe(45);
    expect(rulesObjectivity('Will it rain?')).toBe(55);
  });

  it('rewards named sources and penalises discretion', () => {
    expect(rulesObjectivity('This market will resolve according to the official exchange close price.')).toBe(84);
    expect(rulesObjectivity('Decided by a community vote of the moderator panel')).toBe(25);
    expect(rulesObjectivity('Outcome subject to change')).toBe(40);
  });
});

describe('withinTimeWindow', () => {
  const window = { minHours: 1, maxHours: 48 };

  it('includes both bounds', () => {
    expect(withinTimeWindow(hoursFromNow(1), NOW, window)).toBe(true);
    expect(withinTimeWindow(hoursFromNow(48), NOW, window)).toBe(true);
  });

  it('leaves out events ending too soon, too late or never', () => {
    expect(withinTimeWindow(hoursFromNow(0.5), NOW, window)).toBe(false);
    expect(withinTimeWindow(hoursFromNow(49), NOW, window)).toBe(false);
    expect(withinTimeWindow(null, NOW, window)).toBe(false);
  });

  it('has no upper bound when maxHours is null', () => {
    expect(withinTimeWindow(hoursFromNow(1000), NOW, { minHours: 1, maxHours: null })).toBe(true);
  });
});

describe('safetyRejection', () => {
  const event = makeEvent({ id: 'E1', endDate: hoursFromNow(2), rules: 'Will it rain?' });

  it('passes when no filter is set', () => {
    expect(safetyRejection(event, {}, NOW)).toBeNull();
  });

  it('names the first failed filter', () => {
    expect(safetyRejection(event, { timeWindow: { minHours: 6, maxHours: null } }, NOW)).toBe(
      'Event E1 ends outside the trading window'
    );
    expect(safetyRejection(event, { requireObjectiveRules: true }, NOW)).toBe(
      'Event E1 has no objectively verifiable rules'
    );
    expect(safetyRejection(event, { minRulesObjectivity: 60 }, NOW)).toBe('Event E1 rules score below 60');
  });

  it('ignores a zero objectivity threshold', () => {
    expect(safetyRejection({ ...event, rules: null }, { minRulesObjectivity: 0 }, NOW)).toBeNull();
  });
});

describe('bookRejection', () => {
  const market = makeMarket({ id: 'm-1' });

  it('accepts a two-tick spread with enough size', () => {
    expect(bookRejection(market, topOfBookFromSnapshot(market))).toBeNull();
  });

  it('rejects a missing side', () => {
    expect(bookRejection(market, { bid: null, ask: 0.5, bidSize: null, askSize: 100 })).toBe(
      'Market m-1 book is missing a side'
    );
  });

  it('rejects a crossed book', () => {
    expect(bookRejection(market, { bid: 0.5, ask: 0.5, bidSize: 100, askSize: 100 })).toBe(
      'Market m-1 book is crossed (0.5 / 0.5)'
    );
  });

  it('rejects a wide spread', () => {
    expect(bookRejection(market, { bid: 0.45, ask: 0.5, bidSize: 100, askSize: 100 })).toBe(
      'Market m-1 spread 0.0500 exceeds 2 ticks'
    );
    expect(bookRejection(market, { bid: 0.45, ask: 0.5, bidSize: 100, askSize: 100 }, 5)).toBeNull();
  });

  it('rejects a side thinner than the minimum order', () => {
    expect(bookRejection(market, { bid: 0.48, ask: 0.5, bidSize: 100, askSize: 4 })).toBe(
      'Market m-1 book is thinner than the 5 share minimum'
    );
  });
});

describe('prioritizeNegRisk', () => {
  const events = new Map([
    ['A', makeEvent({ id: 'A' })],
    ['B', makeEvent({ id: 'B', negRisk: true })],
  ]);
  const ranked = [record('A', 0.6), record('B', 0.55)];

  it('lifts negRisk events by the bonus without changing scores', () => {
    const ordered = prioritizeNegRisk(ranked, events, 0.1);
    expect(ordered.map((r) => r.eventId)).toEqual(['B', 'A']);
    expect(ordered.map((r) => r.score)).toEqual([0.55, 0.6]);
    expect(ranked.map((r) => r.eventId)).toEqual(['A', 'B']);
  });

  it('keeps the ranking when the bonus is too small or off', () => {
    expect(prioritizeNegRisk(ranked, events, 0.01).map((r) => r.eventId)).toEqual(['A', 'B']);
    expect(prioritizeNegRisk(ranked, events, 0)).toBe(ranked);
  });
});
