import { randomUUID } from 'node:crypto';

import { ExchangeRejectionError, TransientError } from '../../core/errors.js';
import {
  notionalUsd,
  type BalanceSnapshot,
  type ConnectivityProbe,
  type ExchangeClient,
  type OrderIntent,
  type OrderResult,
} from '../exchange.js';

export type PaperFault = 'transient' | 'timeout' | 'lost' | 'reject';

export interface PaperExchangeOptions {
  startingBalance?: number;
  /** Reported probe latency. */
  latencyMs?: number;
  /** Fill immediately at the limit price instead of resting. */
  fillOnSubmit?: boolean;
}

/**
 * In-memory venue. Orders are keyed by clientRequestId: submitting a key twice
 * returns the first order. Faults can be queued per operation to rehearse the
 * controller's recovery paths.
 */
export class PaperExchange implements ExchangeClient {
  readonly name = 'paper';
  private balance: number;
  private latencyMs: number;
  private fillOnSubmit: boolean;
  private ordersByKey = new Map<string, OrderResult>();
  private keysById = new Map<string, string>();
  private faults: Record<'probe' | 'balance' | 'submit' | 'lookup', PaperFault[]> = {
    probe: [],
    balance: [],
    submit: [],
    lookup: [],
  };
  readonly calls = { probe: 0, balance: 0, submit: 0, status: 0, lookup: 0 };

  constructor(options: PaperExchangeOptions = {}) {
    this.balance = options.startingBalance ?? 100;
    this.latencyMs = options.latencyMs ?? 5;
    this.fillOnSubmit = options.fillOnSubmit ?? true;
  }

  /**
   * Queue faults for the next calls of an operation. `lost` on submit records
   * the order and then reports a timeout, as a dropped response would.
   */
  injectFault(operation: 'probe' | 'balance' | 'submit' | 'lookup', ...faults: PaperFault[]): void {
    this.faults[operation].push(...faults);
  }

  setLatency(latencyMs: number): void {
    this.latencyMs = latencyMs;
  }

  orders(): OrderResult[] {
    return [...this.ordersByKey.values()].map((order) => ({ ...order }));
  }

  async checkConnectivity(): Promise<ConnectivityProbe> {
    this.calls.probe += 1;
    this.raise('probe');
    return { latencyMs: this.latencyMs };
  }

  async getBalance(asset: string): Promise<BalanceSnapshot> {
    this.calls.balance += 1;
    this.raise('balance');
    return { asset, available: this.balance };
  }

  async submitOrder(intent: OrderIntent): Promise<OrderResult> {
    this.calls.submit += 1;
    const fault = this.faults.submit.shift();
    if (fault === 'reject') {
      throw new ExchangeRejectionError(`Paper exchange rejected ${intent.clientRequestId}`, 400);
    }
    if (fault === 'transient' || fault === 'timeout') {
      throw new TransientError(`Paper exchange ${fault} on submit`, fault === 'timeout' ? 408 : 503);
    }

    const existing = this.ordersByKey.get(intent.clientRequestId);
    if (existing) {
      if (fault === 'lost') throw new TransientError('Paper exchange response lost', 504);
      return { ...existing };
    }

    const cost = notionalUsd(intent);
    if (intent.side === 'BUY' && cost > this.balance) {
      throw new ExchangeRejectionError(
        `Insufficient paper balance: ${this.balance.toFixed(2)} < ${cost.toFixed(2)}`,
        400
      );
    }

    const order: OrderResult = {
      status: this.fillOnSubmit ? 'Filled' : 'Accepted',
      clientRequestId: intent.clientRequestId,
      externalOrderId: `paper-${randomUUID()}`,
      filledSize: this.fillOnSubmit ? intent.size : 0,
      avgPrice: this.fillOnSubmit ? intent.limitPrice : null,
      message: 'paper order',
    };
    if (this.fillOnSubmit && intent.side === 'BUY') {
      this.balance -= cost;
    }
    this.ordersByKey.set(intent.clientRequestId, order);
    if (order.externalOrderId) {
      this.keysById.set(order.externalOrderId, intent.clientRequestId);
    }
    if (fault === 'lost') {
      throw new TransientError('Paper exchange response lost', 504);
    }
    return { ...order };
  }

  async getOrderStatus(externalOrderId: string): Promise<OrderResult | null> {
    this.calls.status += 1;
    this.raise('lookup');
    const key = this.keysById.get(externalOrderId);
    const order = key ? this.ordersByKey.get(key) : undefined;
    return order ? { ...order } : null;
  }

  async findOrderByClientRequestId(clientRequestId: string): Promise<OrderResult | null> {
    this.calls.lookup += 1;
    this.raise('lookup');
    const order = this.ordersByKey.get(clientRequestId);
    return order ? { ...order } : null;
  }

  private raise(operation: 'probe' | 'balance' | 'lookup'): void {
    const fault = this.faults[operation].shift();
    if (fault) {
      throw new TransientError(`Paper exchange ${fault} on ${operation}`, 503);
    }
  }
}
