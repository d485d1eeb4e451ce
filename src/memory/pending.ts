import type { OrderIntent } from '../execution/exchange.js';
import { openDatabase } from './db.js';

/** An order submitted for an event whose outcome was never learned. */
export interface PendingOrder {
  eventId: string;
  intent: OrderIntent;
  createdAt: string;
}

export interface PendingOrderStore {
  get(eventId: string): PendingOrder | null;
  put(order: PendingOrder): void;
  remove(eventId: string): void;
  list(): PendingOrder[];
}

interface PendingRow {
  event_id: string;
  intent_json: string;
  created_at: string;
}

function rowToPending(row: PendingRow): PendingOrder {
  return {
    eventId: row.event_id,
    intent: JSON.parse(row.intent_json) as OrderIntent,
    createdAt: row.created_at,
  };
}

export class SqlitePendingOrderStore implements PendingOrderStore {
  constructor(private readonly dbPath?: string) {}

  get(eventId: string): PendingOrder | null {
    const db = openDatabase(this.dbPath);
    const row = db
      .prepare('SELECT event_id, intent_json, created_at FROM pending_orders WHERE event_id = ?')
      .get(eventId) as PendingRow | undefined;
    return row ? rowToPending(row) : null;
  }

  /** The first intent recorded for an event is kept. */
  put(order: PendingOrder): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT OR IGNORE INTO pending_orders (event_id, client_request_id, intent_json, created_at)
        VALUES (@eventId, @clientRequestId, @intentJson, @createdAt)
      `
    ).run({
      eventId: order.eventId,
      clientRequestId: order.intent.clientRequestId,
      intentJson: JSON.stringify(order.intent),
      createdAt: order.createdAt,
    });
  }

  remove(eventId: string): void {
    const db = openDatabase(this.dbPath);
    db.prepare('DELETE FROM pending_orders WHERE event_id = ?').run(eventId);
  }

  list(): PendingOrder[] {
    const db = openDatabase(this.dbPath);
    const rows = db
      .prepare('SELECT event_id, intent_json, created_at FROM pending_orders ORDER BY created_at ASC')
      .all() as PendingRow[];
    return rows.map(rowToPending);
  }
}

export class MemoryPendingOrderStore implements PendingOrderStore {
  private orders = new Map<string, PendingOrder>();

  get(eventId: string): PendingOrder | null {
    return this.orders.get(eventId) ?? null;
  }

  put(order: PendingOrder): void {
    if (!this.orders.has(order.eventId)) {
      this.orders.set(order.eventId, { ...order, intent: { ...order.intent } });
    }
  }

  remove(eventId: string): void {
    this.orders.delete(eventId);
  }

  list(): PendingOrder[] {
    return [...this.orders.values()];
  }
}
