/**
 * Exchange contract shared by the live CLOB client and the paper exchange.
 */

export type OrderSide = 'BUY' | 'SELL';

export type OrderStatus = 'Accepted' | 'Rejected' | 'PartiallyFilled' | 'Filled' | 'Failed';

export interface OrderIntent {
  eventId: string;
  marketId: string;
  tokenId: string;
  side: OrderSide;
  /** Shares. */
  size: number;
  limitPrice: number;
  tickSize: number;
  negRisk: boolean;
  /** Deterministic per logical order; the exchange-side idempotency key. */
  clientRequestId: string;
}

export interface OrderResult {
  status: OrderStatus;
  clientRequestId: string;
  externalOrderId: string | null;
  filledSize: number;
  avgPrice: number | null;
  message?: string;
  raw?: unknown;
}

export type ConnectivityProbe = {
  latencyMs: number;
};

export interface BalanceSnapshot {
  asset: string;
  /** Spendable amount in asset units (USDC for collateral). */
  available: number;
}

export interface ExchangeClient {
  readonly name: string;
  /** Resolves when the venue answered; throws (ideally a TransientError) otherwise. */
  checkConnectivity(): Promise<ConnectivityProbe>;
  getBalance(asset: string): Promise<BalanceSnapshot>;
  /**
   * Submit once. Throws ExchangeRejectionError on a definitive refusal and
   * TransientError (or TimeoutError) when the outcome is unknown.
   */
  submitOrder(intent: OrderIntent): Promise<OrderResult>;
  getOrderStatus(externalOrderId: string): Promise<OrderResult | null>;
  /** Returns null when the venue holds no order for the key. */
  findOrderByClientRequestId(clientRequestId: string): Promise<OrderResult | null>;
}

/** Resting orders (Accepted, PartiallyFilled) count as confirmed: they are live capital. */
export function isConfirmedStatus(status: OrderStatus): boolean {
  return status === 'Accepted' || status === 'PartiallyFilled' || status === 'Filled';
}

export function notionalUsd(intent: Pick<OrderIntent, 'size' | 'limitPrice'>): number {
  return Math.round(intent.size * intent.limitPrice * 1e6) / 1e6;
}
