import { ClobClient } from '@polymarket/clob-client';
import { z } from 'zod';

import type { MarketPilotConfig } from '../../core/config.js';
import { TransientError } from '../../core/errors.js';
import type { TopOfBook } from '../../discovery/safety.js';

/** Live best bid and ask for one outcome token. */
export interface OrderBookSource {
  topOfBook(tokenId: string): Promise<TopOfBook>;
}

/** The public, unauthenticated slice of ClobClient. */
export interface ClobBookApi {
  getOrderBook(tokenId: string): Promise<unknown>;
}

const numeric = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a number' });
    return z.NEVER;
  }
  return parsed;
});

const levelSchema = z.object({ price: numeric, size: numeric });

const bookSchema = z.object({
  bids: z.array(levelSchema).default([]),
  asks: z.array(levelSchema).default([]),
});

type Level = z.infer<typeof levelSchema>;

function best(levels: Level[], pick: 'max' | 'min'): Level | null {
  let chosen: Level | null = null;
  for (const level of levels) {
    if (level.size <= 0) continue;
    if (!chosen || (pick === 'max' ? level.price > chosen.price : level.price < chosen.price)) {
      chosen = level;
    }
  }
  return chosen;
}

export function parseTopOfBook(raw: unknown): TopOfBook {
  const parsed = bookSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TransientError(`Order book response malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  const bid = best(parsed.data.bids, 'max');
  const ask = best(parsed.data.asks, 'min');
  return {
    bid: bid?.price ?? null,
    ask: ask?.price ?? null,
    bidSize: bid?.size ?? null,
    askSize: ask?.size ?? null,
  };
}

export class ClobOrderBookSource implements OrderBookSource {
  constructor(private readonly api: ClobBookApi) {}

  async topOfBook(tokenId: string): Promise<TopOfBook> {
    return parseTopOfBook(await this.api.getOrderBook(tokenId));
  }
}

/** Books are public, so paper mode reads them too. */
export function createOrderBookSource(config: MarketPilotConfig): ClobOrderBookSource {
  return new ClobOrderBookSource(new ClobClient(config.polymarket.clobUrl, config.polymarket.chainId));
}
