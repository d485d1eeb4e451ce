/**
 * Live exchange client over the Polymarket CLOB.
 *
 * The CLOB has no client order id, so idempotency is kept locally: every
 * submission is journaled under its clientRequestId before it is posted, the
 * signed order is cached and re-posted unchanged on retry (same order hash),
 * and lookups go through the journaled order id, falling back to matching
 * open orders, then orders behind recent trades, on the same token, side,
 * price and size. A refusal that says the order already exists means an
 * earlier post landed, so it is reported as an unknown outcome.
 */

import {
  AssetType,
  ClobClient,
  OrderType,
  Side,
  type ApiKeyCreds,
  type UserOrder,
} from '@polymarket/clob-client';
import type { ethers } from 'ethers';
import { z } from 'zod';

import type { MarketPilotConfig } from '../../core/config.js';
import { ExchangeRejectionError, TransientError, errorMessage, isRetryableStatus } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { openDatabase } from '../../memory/db.js';
import type {
  BalanceSnapshot,
  ConnectivityProbe,
  ExchangeClient,
  OrderIntent,
  OrderResult,
  OrderSide,
  OrderStatus,
} from '../exchange.js';

export type SignedClobOrder = Awaited<ReturnType<ClobClient['createOrder']>>;

const TICK_SIZES = ['0.1', '0.01', '0.001', '0.0001'] as const;
type ClobTickSize = (typeof TICK_SIZES)[number];

/** The slice of ClobClient this module calls. Signed orders are opaque here. */
export interface ClobTradingApi<TSigned = SignedClobOrder> {
  getOk(): Promise<unknown>;
  getBalanceAllowance(params: { asset_type: AssetType }): Promise<unknown>;
  createOrder(order: UserOrder, options: { tickSize: ClobTickSize; negRisk: boolean }): Promise<TSigned>;
  postOrder(order: TSigned, orderType: OrderType.GTC): Promise<unknown>;
  getOrder(orderId: string): Promise<unknown>;
  getOpenOrders(params: { asset_id: string }, onlyFirstPage: boolean): Promise<unknown>;
  getTrades(params: { asset_id: string; after?: string }, onlyFirstPage: boolean): Promise<unknown>;
}

export interface JournalEntry {
  clientRequestId: string;
  orderId: string | null;
  tokenId: string;
  side: OrderSide;
  price: number;
  size: number;
  createdAt: string;
}

export interface OrderJournal {
  get(clientRequestId: string): JournalEntry | null;
  put(entry: JournalEntry): void;
}

export class MemoryOrderJournal implements OrderJournal {
  private entries = new Map<string, JournalEntry>();

  get(clientRequestId: string): JournalEntry | null {
    const entry = this.entries.get(clientRequestId);
    return entry ? { ...entry } : null;
  }

  put(entry: JournalEntry): void {
    this.entries.set(entry.clientRequestId, { ...entry });
  }
}

interface JournalRow {
  client_request_id: string;
  order_id: string | null;
  token_id: string;
  side: string;
  price: number;
  size: number;
  created_at: string;
}

export class SqliteOrderJournal implements OrderJournal {
  constructor(private readonly dbPath?: string) {}

  get(clientRequestId: string): JournalEntry | null {
    const db = openDatabase(this.dbPath);
    const row = db
      .prepare(
        `SELECT client_request_id, order_id, token_id, side, price, size, created_at
         FROM clob_order_journal WHERE client_request_id = ?`
      )
      .get(clientRequestId) as JournalRow | undefined;
    if (!row) return null;
    return {
      clientRequestId: row.client_request_id,
      orderId: row.order_id,
      tokenId: row.token_id,
      side: row.side === 'SELL' ? 'SELL' : 'BUY',
      price: row.price,
      size: row.size,
      createdAt: row.created_at,
    };
  }

  put(entry: JournalEntry): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT INTO clob_order_journal (client_request_id, order_id, token_id, side, price, size, created_at)
        VALUES (@clientRequestId, @orderId, @tokenId, @side, @price, @size, @createdAt)
        ON CONFLICT(client_request_id) DO UPDATE SET
          order_id = COALESCE(excluded.order_id, clob_order_journal.order_id)
      `
    ).run(entry);
  }
}

const numeric = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a number' });
    return z.NEVER;
  }
  return parsed;
});

const errorPayloadSchema = z.object({
  error: z.unknown(),
  status: z.number().optional(),
});

const postResponseSchema = z.object({
  success: z.boolean().optional(),
  errorMsg: z.string().optional(),
  orderID: z.string().optional(),
  status: z.string().optional(),
});

const openOrderSchema = z.object({
  id: z.string(),
  status: z.string(),
  asset_id: z.string().optional(),
  side: z.string().optional(),
  price: numeric.optional(),
  original_size: numeric.optional(),
  size_matched: numeric.optional(),
});

type OpenOrder = z.infer<typeof openOrderSchema>;

const tradeSchema = z.object({
  asset_id: z.string().optional(),
  taker_order_id: z.string().optional(),
  maker_orders: z
    .array(z.object({ order_id: z.string(), asset_id: z.string().optional() }))
    .optional(),
});

/** Trades that settled just before the journal entry was written still count. */
const TRADE_LOOKBACK_SECONDS = 60;
const MAX_TRADE_CANDIDATES = 20;

const DUPLICATE_REFUSAL = /duplicate|already exists|already (been )?(placed|posted|submitted)/i;

export function isDuplicateRefusal(detail: string): boolean {
  return DUPLICATE_REFUSAL.test(detail);
}

const balanceSchema = z.object({ balance: numeric });

const USDC_DECIMALS = 6;

export function toTickSize(tick: number): ClobTickSize | null {
  return TICK_SIZES.find((candidate) => Math.abs(Number(candidate) - tick) < 1e-12) ?? null;
}

/** CLOB helpers answer `{ error, status }` instead of throwing; surface those as errors. */
function raiseOnErrorPayload(payload: unknown, operation: string): void {
  const parsed = errorPayloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.error === undefined || parsed.data.error === null) return;
  const status = parsed.data.status;
  const detail = typeof parsed.data.error === 'string' ? parsed.data.error : JSON.stringify(parsed.data.error);
  const message = `${operation} failed${status ? ` (${status})` : ''}: ${detail}`;
  if (isRetryableStatus(status) || isDuplicateRefusal(detail)) {
    throw new TransientError(message, status);
  }
  throw new ExchangeRejectionError(message, status, payload);
}

function isMissing(payload: unknown): boolean {
  if (payload === null || payload === undefined || payload === '') return true;
  const parsed = errorPayloadSchema.safeParse(payload);
  return parsed.success && parsed.data.error !== undefined && parsed.data.status === 404;
}

export function mapOpenOrderStatus(order: OpenOrder): OrderStatus {
  const matched = order.size_matched ?? 0;
  const original = order.original_size ?? 0;
  switch (order.status.toUpperCase()) {
    case 'MATCHED':
      return 'Filled';
    case 'LIVE':
    case 'DELAYED':
      if (original > 0 && matched >= original) return 'Filled';
      return matched > 0 ? 'PartiallyFilled' : 'Accepted';
    case 'CANCELED':
    case 'CANCELLED':
    case 'CANCELED_MARKET_RESOLVED':
      return matched > 0 ? 'PartiallyFilled' : 'Failed';
    default:
      return 'Accepted';
  }
}

function openOrderToResult(clientRequestId: string, order: OpenOrder, raw: unknown): OrderResult {
  const filledSize = order.size_matched ?? 0;
  return {
    status: mapOpenOrderStatus(order),
    clientRequestId,
    externalOrderId: order.id,
    filledSize,
    avgPrice: filledSize > 0 ? order.price ?? null : null,
    raw,
  };
}

function sameOrder(order: OpenOrder, entry: JournalEntry): boolean {
  return (
    (order.side ?? '').toUpperCase() === entry.side &&
    order.price !== undefined &&
    Math.abs(order.price - entry.price) < 1e-9 &&
    order.original_size !== undefined &&
    Math.abs(order.original_size - entry.size) < 1e-6
  );
}

export interface ClobExchangeOptions {
  journal?: OrderJournal;
  logger?: Logger;
  now?: () => Date;
}

export class ClobExchangeClient<TSigned = SignedClobOrder> implements ExchangeClient {
  readonly name = 'polymarket-clob';
  private journal: OrderJournal;
  private signedOrders = new Map<string, TSigned>();
  private keysByOrderId = new Map<string, string>();
  private logger?: Logger;
  private now: () => Date;

  constructor(
    private readonly api: ClobTradingApi<TSigned>,
    options: ClobExchangeOptions = {}
  ) {
    this.journal = options.journal ?? new MemoryOrderJournal();
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async checkConnectivity(): Promise<ConnectivityProbe> {
    const started = Date.now();
    const response = await this.api.getOk();
    raiseOnErrorPayload(response, 'CLOB health check');
    return { latencyMs: Date.now() - started };
  }

  async getBalance(asset: string): Promise<BalanceSnapshot> {
    const response = await this.api.getBalanceAllowance({ asset_type: AssetType.COLLATERAL });
    raiseOnErrorPayload(response, 'Balance query');
    const parsed = balanceSchema.safeParse(response);
    if (!parsed.success) {
      throw new TransientError(`Balance response malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return { asset, available: parsed.data.balance / 10 ** USDC_DECIMALS };
  }

  async submitOrder(intent: OrderIntent): Promise<OrderResult> {
    const tickSize = toTickSize(intent.tickSize);
    if (!tickSize) {
      throw new ExchangeRejectionError(`Unsupported tick size ${intent.tickSize}`);
    }

    let signed = this.signedOrders.get(intent.clientRequestId);
    if (!signed) {
      signed = await this.api.createOrder(
        {
          tokenID: intent.tokenId,
          price: intent.limitPrice,
          size: intent.size,
          side: intent.side === 'BUY' ? Side.BUY : Side.SELL,
        },
        { tickSize, negRisk: intent.negRisk }
      );
      this.signedOrders.set(intent.clientRequestId, signed);
    }

    if (!this.journal.get(intent.clientRequestId)) {
      this.journal.put({
        clientRequestId: intent.clientRequestId,
        orderId: null,
        tokenId: intent.tokenId,
        side: intent.side,
        price: intent.limitPrice,
        size: intent.size,
        createdAt: this.now().toISOString(),
      });
    }

    let response: unknown;
    try {
      response = await this.api.postOrder(signed, OrderType.GTC);
    } catch (err) {
      throw new TransientError(`Order post failed: ${errorMessage(err)}`, undefined, { cause: err });
    }
    raiseOnErrorPayload(response, 'Order post');

    const parsed = postResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new TransientError('Order post returned an unrecognised response');
    }
    const body = parsed.data;
    if (body.success === false || (body.errorMsg && !body.orderID)) {
      if (body.errorMsg && isDuplicateRefusal(body.errorMsg)) {
        throw new TransientError(`Order post refused as a duplicate: ${body.errorMsg}`);
      }
      throw new ExchangeRejectionError(body.errorMsg || 'CLOB rejected order', undefined, response);
    }
    if (!body.orderID) {
      throw new TransientError('Order post returned no order id');
    }

    this.journal.put({
      clientRequestId: intent.clientRequestId,
      orderId: body.orderID,
      tokenId: intent.tokenId,
      side: intent.side,
      price: intent.limitPrice,
      size: intent.size,
      createdAt: this.now().toISOString(),
    });
    this.remember(body.orderID, intent.clientRequestId);
    this.logger?.info(`Posted order ${body.orderID} for ${intent.clientRequestId}`, { status: body.status });

    const status = (body.status ?? '').toLowerCase();
    return {
      status: status === 'matched' ? 'Filled' : status === 'unmatched' ? 'Failed' : 'Accepted',
      clientRequestId: intent.clientRequestId,
      externalOrderId: body.orderID,
      filledSize: status === 'matched' ? intent.size : 0,
      avgPrice: status === 'matched' ? intent.limitPrice : null,
      message: body.errorMsg || undefined,
      raw: response,
    };
  }

  async getOrderStatus(externalOrderId: string): Promise<OrderResult | null> {
    const response = await this.api.getOrder(externalOrderId);
    if (isMissing(response)) return null;
    raiseOnErrorPayload(response, `Order ${externalOrderId} lookup`);
    const parsed = openOrderSchema.safeParse(response);
    if (!parsed.success) return null;
    const key = this.keysByOrderId.get(externalOrderId) ?? externalOrderId;
    return openOrderToResult(key, parsed.data, response);
  }

  async findOrderByClientRequestId(clientRequestId: string): Promise<OrderResult | null> {
    const entry = this.journal.get(clientRequestId);
    if (!entry) return null;

    if (entry.orderId) {
      this.remember(entry.orderId, clientRequestId);
      const response = await this.api.getOrder(entry.orderId);
      if (isMissing(response)) return null;
      raiseOnErrorPayload(response, `Order ${entry.orderId} lookup`);
      const parsed = openOrderSchema.safeParse(response);
      return parsed.success ? openOrderToResult(clientRequestId, parsed.data, response) : null;
    }

    const response = await this.api.getOpenOrders({ asset_id: entry.tokenId }, true);
    raiseOnErrorPayload(response, 'Open orders query');
    const list = z.array(z.unknown()).safeParse(response);
    if (list.success) {
      for (const item of list.data) {
        const order = openOrderSchema.safeParse(item);
        if (order.success && sameOrder(order.data, entry)) {
          return this.adopt(entry, order.data, item);
        }
      }
    }
    return this.findFilledOrder(entry);
  }

  /** Orders that filled at once never show up as open; their trades do. */
  private async findFilledOrder(entry: JournalEntry): Promise<OrderResult | null> {
    const after = Math.floor(Date.parse(entry.createdAt) / 1000) - TRADE_LOOKBACK_SECONDS;
    const response = await this.api.getTrades({ asset_id: entry.tokenId, after: String(after) }, true);
    raiseOnErrorPayload(response, 'Trade history query');
    const list = z.array(tradeSchema).safeParse(response);
    if (!list.success) return null;

    const candidates = new Set<string>();
    for (const trade of list.data) {
      if (trade.taker_order_id && trade.asset_id === entry.tokenId) {
        candidates.add(trade.taker_order_id);
      }
      for (const maker of trade.maker_orders ?? []) {
        if (maker.asset_id === entry.tokenId) candidates.add(maker.order_id);
      }
    }

    for (const orderId of [...candidates].slice(0, MAX_TRADE_CANDIDATES)) {
      const item = await this.api.getOrder(orderId);
      if (isMissing(item)) continue;
      raiseOnErrorPayload(item, `Order ${orderId} lookup`);
      const order = openOrderSchema.safeParse(item);
      if (order.success && sameOrder(order.data, entry)) {
        return this.adopt(entry, order.data, item);
      }
    }
    return null;
  }

  private adopt(entry: JournalEntry, order: OpenOrder, raw: unknown): OrderResult {
    this.journal.put({ ...entry, orderId: order.id });
    this.remember(order.id, entry.clientRequestId);
    return openOrderToResult(entry.clientRequestId, order, raw);
  }

  private remember(orderId: string, clientRequestId: string): void {
    this.keysByOrderId.set(orderId, clientRequestId);
  }
}

function credsFromEnv(env: NodeJS.ProcessEnv): ApiKeyCreds | null {
  const key = env.POLYMARKET_API_KEY?.trim();
  const secret = env.POLYMARKET_API_SECRET?.trim();
  const passphrase = env.POLYMARKET_API_PASSPHRASE?.trim();
  if (key && secret && passphrase) {
    return { key, secret, passphrase };
  }
  return null;
}

/**
 * Build an authenticated CLOB client. L2 credentials come from env or are
 * derived from the wallet signature.
 */
export async function createClobExchange(
  config: MarketPilotConfig,
  wallet: ethers.Wallet,
  logger?: Logger,
  env: NodeJS.ProcessEnv = process.env
): Promise<ClobExchangeClient> {
  const { clobUrl, chainId, signatureType, funderAddress } = config.polymarket;
  let creds = credsFromEnv(env);
  if (!creds) {
    logger?.info('Deriving CLOB API credentials from wallet signature');
    creds = await new ClobClient(clobUrl, chainId, wallet).createOrDeriveApiKey();
  }
  const client = new ClobClient(clobUrl, chainId, wallet, creds, signatureType, funderAddress);
  return new ClobExchangeClient(client, {
    journal: new SqliteOrderJournal(config.memory.dbPath),
    logger,
  });
}
