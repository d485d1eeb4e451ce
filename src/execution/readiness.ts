/**
 * Trade Readiness Gate
 *
 * Answers one question before any capital-affecting call: may this cycle
 * commit `required` USD right now? Every check fails closed.
 */

import { type CapitalSafetyReason, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  retryWithBackoff,
  withTimeout,
} from '../core/retry.js';
import type { ExchangeClient } from './exchange.js';
import type { SpendingLimitEnforcer } from './wallet/limits.js';

export type ConnectivityState = 'Healthy' | 'Degraded' | 'Unreachable';

export interface ConnectivityReport {
  state: ConnectivityState;
  attempts: number;
  latencyMs: number | null;
  error?: string;
}

export type BalanceCheck =
  | { kind: 'Sufficient'; available: number; required: number }
  | { kind: 'Insufficient'; available: number; required: number; shortfall: number }
  | { kind: 'Unavailable'; required: number; error: string };

export type ReadinessDecision =
  | {
      ready: true;
      connectivity: ConnectivityReport;
      balance: Extract<BalanceCheck, { kind: 'Sufficient' }>;
      /** USD reserved with the spending limiter; 0 when no limiter is configured. */
      reserved: number;
    }
  | {
      ready: false;
      reason: CapitalSafetyReason;
      message: string;
      connectivity: ConnectivityReport;
      balance?: BalanceCheck;
    };

export interface ReadinessOptions {
  retry?: RetryPolicy;
  probeTimeoutMs?: number;
  degradedLatencyMs?: number;
  blockOnDegraded?: boolean;
  collateralAsset?: string;
  limiter?: SpendingLimitEnforcer;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class TradeReadinessGate {
  private retry: RetryPolicy;
  private probeTimeoutMs: number;
  private degradedLatencyMs: number;
  private blockOnDegraded: boolean;
  private collateralAsset: string;
  private limiter?: SpendingLimitEnforcer;
  private logger?: Logger;
  private sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly exchange: ExchangeClient,
    options: ReadinessOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    this.degradedLatencyMs = options.degradedLatencyMs ?? 1_500;
    this.blockOnDegraded = options.blockOnDegraded ?? false;
    this.collateralAsset = options.collateralAsset ?? 'USDC';
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.sleep = options.sleep;
  }

  /**
   * Probe the venue with backoff. A probe that only succeeds after a retry, or
   * answers slower than the latency budget, is Degraded.
   */
  async checkConnectivity(): Promise<ConnectivityReport> {
    let attempts = 0;
    try {
      const probe = await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            this.exchange.checkConnectivity(),
            this.probeTimeoutMs,
            `${this.exchange.name} connectivity probe`
          );
        },
        {
          policy: this.retry,
          operation: 'connectivity probe',
          isRetryable: () => true,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            this.logger?.debug(`Connectivity probe ${attempt} failed; retrying in ${Math.round(delayMs)}ms`, {
              error: errorMessage(error),
            }),
        }
      );
      const slow = probe.latencyMs > this.degradedLatencyMs;
      return {
        state: attempts > 1 || slow ? 'Degraded' : 'Healthy',
        attempts,
        latencyMs: probe.latencyMs,
      };
    } catch (err) {
      return { state: 'Unreachable', attempts, latencyMs: null, error: errorMessage(err) };
    }
  }

  async checkBalance(required: number): Promise<BalanceCheck> {
    try {
      const snapshot = await retryWithBackoff(
        () =>
          withTimeout(
            this.exchange.getBalance(this.collateralAsset),
            this.probeTimeoutMs,
            `${this.exchange.name} balance query`
          ),
        { policy: this.retry, operation: 'balance query', sleep: this.sleep }
      );
      if (!Number.isFinite(snapshot.available)) {
        return { kind: 'Unavailable', required, error: 'balance is not a number' };
      }
      if (snapshot.available >= required) {
        return { kind: 'Sufficient', available: snapshot.available, required };
      }
      return {
        kind: 'Insufficient',
        available: snapshot.available,
        required,
        shortfall: required - snapshot.available,
      };
    } catch (err) {
      return { kind: 'Unavailable', required, error: errorMessage(err) };
    }
  }

  /**
   * Run every check in order. On success the amount is reserved with the
   * spending limiter; the caller must confirm or release it.
   */
  async authorize(required: number): Promise<ReadinessDecision> {
    const connectivity = await this.checkConnectivity();
    if (connectivity.state === 'Unreachable') {
      return this.block('unreachable', `Exchange unreachable after ${connectivity.attempts} attempts: ${connectivity.error ?? 'unknown error'}`, connectivity);
    }
    if (connectivity.state === 'Degraded') {
      if (this.blockOnDegraded) {
        return this.block('degraded', 'Exchange connectivity degraded', connectivity);
      }
      this.logger?.warn('Exchange connectivity degraded; proceeding', {
        attempts: connectivity.attempts,
        latencyMs: connectivity.latencyMs,
      });
    }

    const balance = await this.checkBalance(required);
    if (balance.kind === 'Unavailable') {
      return this.block('balance_unavailable', `Balance query failed: ${balance.error}`, connectivity, balance);
    }
    if (balance.kind === 'Insufficient') {
      return this.block(
        'insufficient_balance',
        `Insufficient ${this.collateralAsset}: have ${balance.available.toFixed(2)}, need ${required.toFixed(2)}`,
        connectivity,
        balance
      );
    }

    if (this.limiter) {
      const check = this.limiter.checkAndReserve(required);
      if (!check.allowed) {
        return this.block('spending_limit', check.reason ?? 'Spending limit reached', connectivity, balance);
      }
    }

    return { ready: true, connectivity, balance, reserved: this.limiter ? required : 0 };
  }

  /** Settle a reservation made by `authorize`. */
  settle(reserved: number, spent: boolean): void {
    if (!this.limiter || reserved <= 0) return;
    if (spent) {
      this.limiter.confirm(reserved);
    } else {
      this.limiter.release(reserved);
    }
  }

  private block(
    reason: CapitalSafetyReason,
    message: string,
    connectivity: ConnectivityReport,
    balance?: BalanceCheck
  ): ReadinessDecision {
    this.logger?.warn(`Trade readiness blocked (${reason}): ${message}`);
    return { ready: false, reason, message, connectivity, balance };
  }
}
