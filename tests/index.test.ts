import { describe, expect, it } from 'vitest';

import { parseConfig } from '../src/core/config.js';
import { silentLogger } from '../src/core/logger.js';
import { PaperExchange } from '../src/execution/modes/paper.js';
import { MemorySpendingStateStore } from '../src/execution/wallet/limits.js';
import {
  MarketPilot,
  MemoryAuditLog,
  MemoryPendingOrderStore,
  MemorySeenEventStore,
  VERSION,
  type MarketPilotOverrides,
} from '../src/index.js';
import { makeEvent } from './fixtures.js';

function pilot(overrides: MarketPilotOverrides = {}, bookCheck: 'live' | 'snapshot' = 'snapshot') {
  const audit = new MemoryAuditLog();
  const exchange = new PaperExchange();
  const instance = new MarketPilot({
    config: parseConfig({
      execution: { stakeUsd: 5 },
      retry: { attempts: 1 },
      selection: { timeWindowHours: null, requireObjectiveRules: false, bookCheck },
    }),
    logger: silentLogger(),
    catalog: {
      fetchActiveEvents: async () => [
        makeEvent({ id: 'E1', liquidity: 1000, volume: 5000 }),
        makeEvent({ id: 'E2', liquidity: 50, volume: 10 }),
      ],
    },
    exchange,
    seenStore: new MemorySeenEventStore(),
    audit,
    spendingStore: new MemorySpendingStateStore(),
    pending: new MemoryPendingOrderStore(),
    sleep: async () => undefined,
    ...overrides,
  });
  return { instance, audit, exchange };
}

describe('MarketPilot', () => {
  it('exposes a version', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('refuses to run before start', async () => {
    await expect(pilot().instance.runCycle()).rejects.toThrow('MarketPilot not started. Call start() first.');
  });

  it('wires the pipeline from configuration and overrides', async () => {
    const { instance, audit, exchange } = pilot();
    await instance.start();

    const result = await instance.runCycle();

    expect(result).toMatchObject({ kind: 'executed', eventId: 'E1', decision: 'confirmed' });
    expect(instance.getRegistry()?.contains('E1')).toBe(true);
    expect(audit.size).toBe(1);
    expect(exchange.calls.submit).toBe(1);
    expect(instance.getConfig()?.execution.stakeUsd).toBe(5);

    await expect(instance.start()).rejects.toThrow('MarketPilot already started');
    await instance.stop();
    expect(instance.getController()).toBeUndefined();
  });

  it('checks live books before trading', async () => {
    const asked: string[] = [];
    const { instance, exchange } = pilot(
      {
        books: {
          topOfBook: async (tokenId) => {
            asked.push(tokenId);
            return { bid: 0.5, ask: 0.5, bidSize: 100, askSize: 100 };
          },
        },
      },
      'live'
    );
    await instance.start();

    await expect(instance.runCycle()).resolves.toMatchObject({ kind: 'skipped', reason: 'no_tradable_market' });
    expect(asked).toEqual(['tok-yes', 'tok-yes']);
    expect(exchange.calls.submit).toBe(0);
    await instance.stop();
  });
});
