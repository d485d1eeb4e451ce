import { describe, expect, it, vi } from 'vitest';

import { AmbiguousExecutionError, CapitalSafetyError } from '../../src/core/errors.js';
import type { RetryPolicy } from '../../src/core/retry.js';
import {
  OrderExecutionController,
  canTransition,
  type ControllerOptions,
  type ExecutionState,
} from '../../src/execution/controller.js';
import { PaperExchange } from '../../src/execution/modes/paper.js';
import { TradeReadinessGate } from '../../src/execution/readiness.js';
import { SpendingLimitEnforcer } from '../../src/execution/wallet/limits.js';
import { MemoryAuditLog } from '../../src/memory/audit.js';
import { MemoryPendingOrderStore } from '../../src/memory/pending.js';
import { MemorySeenEventStore, SeenEventRegistry, type SeenEventStore } from '../../src/memory/seen_registry.js';
import { NOW, makeIntent, makeResult } from '../fixtures.js';

const retry: RetryPolicy = { attempts: 3, initialDelayMs: 10, maxDelayMs: 100, jitter: false };
const noSleep = async (): Promise<void> => undefined;

function setup(options: { store?: SeenEventStore; balance?: number; controller?: ControllerOptions } = {}) {
  const exchange = new PaperExchange({ startingBalance: options.balance ?? 100 });
  const limiter = new SpendingLimitEnforcer({ daily: 100, perTrade: 25 }, undefined, () => NOW);
  const readiness = new TradeReadinessGate(exchange, { retry, sleep: noSleep, limiter });
  const registry = new SeenEventRegistry(options.store ?? new MemorySeenEventStore());
  registry.load();
  const audit = new MemoryAuditLog();
  const controller = new OrderExecutionController(
    { exchange, readiness, registry, audit },
    { retry, sleep: noSleep, now: () => NOW, ...options.controller }
  );
  return { exchange, limiter, registry, audit, controller };
}

const request = { intent: makeIntent(), notional: 5 };

describe('canTransition', () => {
  it('follows the execution state machine', () => {
    const allowed: Array<[ExecutionState, ExecutionState]> = [
      ['idle', 'selected'],
      ['readiness_verified', 'submitted'],
      ['timed_out', 'submitted'],
      ['confirmed', 'terminal'],
    ];
    for (const [from, to] of allowed) {
      expect(canTransition(from, to)).toBe(true);
    }
    expect(canTransition('selected', 'submitted')).toBe(false);
    expect(canTransition('terminal', 'idle')).toBe(false);
    expect(canTransition('confirmed', 'idle')).toBe(false);
  });
});

describe('OrderExecutionController', () => {
  it('submits once, marks the event seen and audits the outcome', async () => {
    const { exchange, limiter, registry, audit, controller } = setup();
    const transitions = vi.fn();
    controller.on('transition', transitions);

    const outcome = await controller.execute({ ...request, context: { title: 'Event E1' } });

    expect(outcome).toMatchObject({
      kind: 'terminal',
      decision: 'confirmed',
      result: { status: 'Filled', filledSize: 10 },
      history: ['idle', 'selected', 'readiness_verified', 'submitted', 'confirmed', 'terminal'],
    });
    expect(exchange.calls.submit).toBe(1);
    expect(registry.contains('E1')).toBe(true);
    expect(audit.list()).toHaveLength(1);
    expect(audit.findTerminal('E1')).toMatchObject({
      timestamp: NOW.toISOString(),
      decision: 'confirmed',
      context: { title: 'Event E1' },
    });
    expect(transitions).toHaveBeenCalledTimes(5);
    expect(transitions).toHaveBeenLastCalledWith({ eventId: 'E1', from: 'confirmed', to: 'terminal' });
    expect(limiter.getState()).toMatchObject({ todaySpent: 5, reserved: 0 });
  });

  it('does nothing when the exchange is unreachable', async () => {
    const { exchange, registry, audit, controller } = setup();
    exchange.injectFault('probe', 'transient', 'transient', 'transient');

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'skipped',
      reason: 'unreachable',
      history: ['idle', 'selected', 'idle'],
    });
    expect(exchange.calls.submit).toBe(0);
    expect(registry.contains('E1')).toBe(false);
    expect(audit.size).toBe(0);
  });

  it('never submits without sufficient balance', async () => {
    const { exchange, registry, controller } = setup({ balance: 1 });

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({ kind: 'skipped', reason: 'insufficient_balance' });
    const cause = outcome.kind === 'skipped' ? outcome.cause : undefined;
    expect(cause).toBeInstanceOf(CapitalSafetyError);
    expect(cause).toMatchObject({
      reason: 'insufficient_balance',
      details: { balance: { kind: 'Insufficient', available: 1, required: 5, shortfall: 4 } },
    });
    expect(exchange.calls.submit).toBe(0);
    expect(registry.contains('E1')).toBe(false);
  });

  it('adopts an order whose submit response was lost', async () => {
    const { exchange, controller } = setup();
    exchange.injectFault('submit', 'lost');

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'terminal',
      decision: 'confirmed',
      history: ['idle', 'selected', 'readiness_verified', 'submitted', 'timed_out', 'confirmed', 'terminal'],
    });
    expect(exchange.calls.submit).toBe(1);
    expect(exchange.orders()).toHaveLength(1);
  });

  it('resubmits under the same key when the first attempt never landed', async () => {
    const { exchange, controller } = setup();
    exchange.injectFault('submit', 'transient');

    const outcome = await controller.execute(request);

    expect(outcome.history).toEqual([
      'idle',
      'selected',
      'readiness_verified',
      'submitted',
      'timed_out',
      'submitted',
      'confirmed',
      'terminal',
    ]);
    expect(exchange.calls.submit).toBe(2);
    expect(exchange.orders()).toHaveLength(1);
  });

  it('skips without excluding the event once every submission attempt is confirmed absent', async () => {
    const { exchange, registry, audit, limiter, controller } = setup({ controller: { submitAttempts: 2 } });
    exchange.injectFault('submit', 'transient', 'timeout');

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'skipped',
      reason: 'transient',
      message: 'No order found after 2 submission attempts',
      history: ['idle', 'selected', 'readiness_verified', 'submitted', 'timed_out', 'submitted', 'timed_out', 'idle'],
    });
    expect(exchange.orders()).toHaveLength(0);
    expect(registry.contains('E1')).toBe(false);
    expect(audit.size).toBe(0);
    expect(controller.pendingIntent('E1')).toBeNull();
    expect(limiter.getState()).toMatchObject({ todaySpent: 0, reserved: 0 });
  });

  it('trades the event on a later run after transient submission failures', async () => {
    const { exchange, registry, controller } = setup();
    exchange.injectFault('submit', 'transient', 'transient', 'transient');

    await expect(controller.execute(request)).resolves.toMatchObject({ kind: 'skipped', reason: 'transient' });
    const retried = await controller.execute(request);

    expect(retried).toMatchObject({ kind: 'terminal', decision: 'confirmed' });
    expect(exchange.calls.submit).toBe(4);
    expect(exchange.orders()).toHaveLength(1);
    expect(registry.contains('E1')).toBe(true);
  });

  it('records a definitive rejection as terminal', async () => {
    const { exchange, registry, limiter, controller } = setup();
    exchange.injectFault('submit', 'reject');

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'terminal',
      decision: 'rejected',
      result: { status: 'Rejected', externalOrderId: null, message: 'Paper exchange rejected req-e1' },
    });
    expect(exchange.calls.submit).toBe(1);
    expect(registry.contains('E1')).toBe(true);
    expect(limiter.getState()).toMatchObject({ todaySpent: 0, reserved: 0 });
  });

  it('skips without a terminal state when the outcome cannot be reconciled', async () => {
    const { exchange, registry, audit, limiter, controller } = setup({
      controller: { statusPollAttempts: 2 },
    });
    exchange.injectFault('submit', 'lost');
    controller.on('submitted', () => exchange.injectFault('lookup', 'transient', 'transient'));

    const outcome = await controller.execute(request);

    expect(outcome).toEqual({
      kind: 'skipped',
      reason: 'unreconciled',
      message: 'Order req-e1 could not be reconciled: Paper exchange transient on lookup',
      intent: request.intent,
      history: ['idle', 'selected', 'readiness_verified', 'submitted', 'timed_out', 'idle'],
      cause: new AmbiguousExecutionError(
        'Order req-e1 could not be reconciled: Paper exchange transient on lookup',
        'req-e1'
      ),
    });
    expect(registry.contains('E1')).toBe(false);
    expect(audit.size).toBe(0);
    expect(limiter.getState().reserved).toBe(5);
    expect(controller.pendingIntent('E1')).toEqual(request.intent);
  });

  it('resumes the pending order when a later run plans a different market', async () => {
    const { exchange, audit, limiter, controller } = setup({ controller: { statusPollAttempts: 1 } });
    const first = makeIntent({ marketId: 'E1-a', clientRequestId: 'req-a' });
    exchange.injectFault('submit', 'lost');
    controller.once('submitted', () => exchange.injectFault('lookup', 'transient'));
    await expect(controller.execute({ intent: first, notional: 5 })).resolves.toMatchObject({
      reason: 'unreconciled',
    });

    const replanned = makeIntent({ marketId: 'E1-b', tokenId: 'tok-b', clientRequestId: 'req-b' });
    const outcome = await controller.execute({ intent: replanned, notional: 5 });

    expect(outcome).toMatchObject({ kind: 'terminal', decision: 'confirmed', intent: first });
    expect(exchange.calls.submit).toBe(1);
    expect(exchange.orders().map((order) => order.clientRequestId)).toEqual(['req-a']);
    expect(audit.findTerminal('E1')?.intent.clientRequestId).toBe('req-a');
    expect(controller.pendingIntent('E1')).toBeNull();
    expect(limiter.getState()).toMatchObject({ todaySpent: 5, todayTradeCount: 1, reserved: 0 });
  });

  it('holds one reservation per pending order across unresolved runs', async () => {
    const { exchange, limiter, controller } = setup({ controller: { statusPollAttempts: 1 } });
    exchange.injectFault('submit', 'lost');
    controller.once('submitted', () => exchange.injectFault('lookup', 'transient'));
    await controller.execute(request);

    exchange.injectFault('lookup', 'transient');
    await expect(controller.execute(request)).resolves.toMatchObject({ kind: 'skipped', reason: 'transient' });
    expect(limiter.getState().reserved).toBe(5);

    await expect(controller.execute(request)).resolves.toMatchObject({ kind: 'terminal', decision: 'confirmed' });
    expect(limiter.getState()).toMatchObject({ todaySpent: 5, reserved: 0 });
    expect(exchange.orders()).toHaveLength(1);
  });

  it('records the pending order before submitting and keeps it in the given store', async () => {
    const pending = new MemoryPendingOrderStore();
    const exchange = new PaperExchange();
    const readiness = new TradeReadinessGate(exchange, { retry, sleep: noSleep });
    const registry = new SeenEventRegistry(new MemorySeenEventStore());
    const controller = new OrderExecutionController(
      { exchange, readiness, registry, audit: new MemoryAuditLog(), pending },
      { retry, sleep: noSleep, now: () => NOW }
    );
    const seen: unknown[] = [];
    controller.on('submitted', () => seen.push(pending.get('E1')));

    await controller.execute(request);

    expect(seen).toEqual([{ eventId: 'E1', intent: request.intent, createdAt: NOW.toISOString() }]);
    expect(pending.list()).toEqual([]);
  });

  it('skips when the pre-submit lookup cannot reach the exchange', async () => {
    const { exchange, limiter, controller } = setup();
    exchange.injectFault('lookup', 'transient');

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'skipped',
      reason: 'transient',
      message: 'Could not check for an existing order: Paper exchange transient on lookup',
    });
    expect(exchange.calls.submit).toBe(0);
    expect(limiter.getState().reserved).toBe(0);
  });

  it('adopts an order already resting on the exchange instead of submitting again', async () => {
    const { exchange, controller } = setup();
    await exchange.submitOrder(request.intent);

    const outcome = await controller.execute(request);

    expect(outcome.history).toEqual(['idle', 'selected', 'readiness_verified', 'submitted', 'confirmed', 'terminal']);
    expect(exchange.calls.submit).toBe(1);
  });

  it('refuses to act on an event that already has an audit record', async () => {
    const { exchange, registry, audit, controller } = setup();
    audit.append({
      timestamp: NOW.toISOString(),
      eventId: 'E1',
      decision: 'confirmed',
      result: makeResult(),
      intent: makeIntent(),
    });

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'skipped',
      reason: 'already_executed',
      message: 'Event E1 already ended confirmed',
    });
    expect(exchange.calls.probe).toBe(0);
    expect(registry.contains('E1')).toBe(true);
  });

  it('reports a registry that could not persist the mark', async () => {
    const store: SeenEventStore = {
      read: () => [],
      write: () => {
        throw new Error('disk full');
      },
    };
    const { registry, audit, controller } = setup({ store });

    const outcome = await controller.execute(request);

    expect(outcome).toMatchObject({
      kind: 'terminal',
      decision: 'confirmed',
      registryError: 'Failed to persist seen event E1: disk full',
    });
    expect(registry.contains('E1')).toBe(true);
    expect(audit.size).toBe(1);
  });
});
