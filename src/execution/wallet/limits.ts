/**
 * Spending Limit Enforcement
 *
 * Checked before any order is signed. An amount is reserved while its order is
 * in flight, then either confirmed (counts towards today's spend) or released.
 */

import { EventEmitter } from 'eventemitter3';

import { openDatabase } from '../../memory/db.js';

export interface SpendingLimits {
  /** Maximum USD spend per UTC calendar day */
  daily: number;
  /** Maximum USD spend per single order */
  perTrade: number;
}

export interface SpendingState {
  todaySpent: number;
  /** YYYY-MM-DD (UTC) */
  lastResetDate: string;
  todayTradeCount: number;
}

export interface LimitCheckResult {
  allowed: boolean;
  reason?: string;
  remainingDaily?: number;
}

export interface LimitEvents {
  'limit-warning': (data: { type: string; current: number; limit: number }) => void;
  'limit-exceeded': (data: { type: 'daily' | 'per-trade'; attempted: number; limit: number }) => void;
  'daily-reset': (data: { previousSpent: number }) => void;
}

export interface SpendingStateStore {
  load(): SpendingState | null;
  save(state: SpendingState): void;
}

export class SqliteSpendingStateStore implements SpendingStateStore {
  constructor(private readonly dbPath?: string) {}

  load(): SpendingState | null {
    const db = openDatabase(this.dbPath);
    const row = db
      .prepare(
        `
          SELECT today_spent as todaySpent, last_reset_date as lastResetDate, today_trade_count as todayTradeCount
          FROM spending_state WHERE id = 1
        `
      )
      .get() as SpendingState | undefined;
    return row ?? null;
  }

  save(state: SpendingState): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT INTO spending_state (id, today_spent, last_reset_date, today_trade_count, updated_at)
        VALUES (1, @todaySpent, @lastResetDate, @todayTradeCount, datetime('now'))
        ON CONFLICT(id) DO UPDATE SET
          today_spent = excluded.today_spent,
          last_reset_date = excluded.last_reset_date,
          today_trade_count = excluded.today_trade_count,
          updated_at = datetime('now')
      `
    ).run(state);
  }
}

export class MemorySpendingStateStore implements SpendingStateStore {
  constructor(private state: SpendingState | null = null) {}

  load(): SpendingState | null {
    return this.state ? { ...this.state } : null;
  }

  save(state: SpendingState): void {
    this.state = { ...state };
  }
}

function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export class SpendingLimitEnforcer extends EventEmitter<LimitEvents> {
  private limits: SpendingLimits;
  private reserved = 0;

  constructor(
    limits: SpendingLimits,
    private readonly store: SpendingStateStore = new MemorySpendingStateStore(),
    private readonly now: () => Date = () => new Date()
  ) {
    super();
    this.limits = { ...limits };
  }

  /**
   * Check an amount against the caps and reserve it when allowed.
   */
  checkAndReserve(amount: number): LimitCheckResult {
    const state = this.currentState();

    if (!Number.isFinite(amount) || amount <= 0) {
      return { allowed: false, reason: 'Trade amount must be positive' };
    }

    if (amount > this.limits.perTrade) {
      this.emit('limit-exceeded', { type: 'per-trade', attempted: amount, limit: this.limits.perTrade });
      return {
        allowed: false,
        reason: `Amount $${amount.toFixed(2)} exceeds per-trade limit of $${this.limits.perTrade.toFixed(2)}`,
      };
    }

    const projectedDaily = state.todaySpent + this.reserved + amount;
    if (projectedDaily > this.limits.daily) {
      this.emit('limit-exceeded', { type: 'daily', attempted: amount, limit: this.limits.daily });
      return {
        allowed: false,
        reason:
          `Would exceed daily limit. Spent today: $${state.todaySpent.toFixed(2)}, ` +
          `Reserved: $${this.reserved.toFixed(2)}, Limit: $${this.limits.daily.toFixed(2)}`,
        remainingDaily: Math.max(0, this.limits.daily - state.todaySpent - this.reserved),
      };
    }

    if (projectedDaily > this.limits.daily * 0.8) {
      this.emit('limit-warning', { type: 'daily', current: projectedDaily, limit: this.limits.daily });
    }

    this.reserved += amount;
    return { allowed: true, remainingDaily: this.limits.daily - projectedDaily };
  }

  /** Move a reservation into today's spend. */
  confirm(amount: number): void {
    const state = this.currentState();
    this.reserved = Math.max(0, this.reserved - amount);
    this.store.save({
      ...state,
      todaySpent: state.todaySpent + amount,
      todayTradeCount: state.todayTradeCount + 1,
    });
  }

  release(amount: number): void {
    this.reserved = Math.max(0, this.reserved - amount);
  }

  getState(): Readonly<SpendingState & { reserved: number }> {
    return { ...this.currentState(), reserved: this.reserved };
  }

  getRemainingDaily(): number {
    const state = this.currentState();
    return Math.max(0, this.limits.daily - state.todaySpent - this.reserved);
  }

  private currentState(): SpendingState {
    const today = utcDate(this.now());
    const state = this.store.load() ?? { todaySpent: 0, lastResetDate: today, todayTradeCount: 0 };
    if (state.lastResetDate === today) {
      return state;
    }
    const reset: SpendingState = { todaySpent: 0, lastResetDate: today, todayTradeCount: 0 };
    this.store.save(reset);
    this.reserved = 0;
    this.emit('daily-reset', { previousSpent: state.todaySpent });
    return reset;
  }
}
