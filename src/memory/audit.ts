import type { OrderIntent, OrderResult } from '../execution/exchange.js';
import { openDatabase } from './db.js';

export type AuditDecision = 'confirmed' | 'rejected' | 'failed';

export interface AuditRecord {
  timestamp: string;
  eventId: string;
  decision: AuditDecision;
  result: OrderResult;
  intent: OrderIntent;
  context?: Record<string, unknown>;
}

/** Append-only; one record per terminal order outcome. */
export interface AuditLog {
  append(record: AuditRecord): void;
  list(limit?: number): AuditRecord[];
  findTerminal(eventId: string): AuditRecord | null;
}

interface AuditRow {
  created_at: string;
  event_id: string;
  decision: string;
  result_json: string;
  intent_json: string;
  context_json: string | null;
}

function isDecision(value: string): value is AuditDecision {
  return value === 'confirmed' || value === 'rejected' || value === 'failed';
}

function rowToRecord(row: AuditRow): AuditRecord {
  const decision = isDecision(row.decision) ? row.decision : 'failed';
  return {
    timestamp: row.created_at,
    eventId: row.event_id,
    decision,
    result: JSON.parse(row.result_json) as OrderResult,
    intent: JSON.parse(row.intent_json) as OrderIntent,
    context: row.context_json
      ? (JSON.parse(row.context_json) as Record<string, unknown>)
      : undefined,
  };
}

export class SqliteAuditLog implements AuditLog {
  constructor(private readonly dbPath?: string) {}

  append(record: AuditRecord): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT INTO order_audit_log (
          created_at,
          event_id,
          decision,
          status,
          client_request_id,
          external_order_id,
          filled_size,
          avg_price,
          result_json,
          intent_json,
          context_json
        ) VALUES (
          @createdAt,
          @eventId,
          @decision,
          @status,
          @clientRequestId,
          @externalOrderId,
          @filledSize,
          @avgPrice,
          @resultJson,
          @intentJson,
          @contextJson
        )
      `
    ).run({
      createdAt: record.timestamp,
      eventId: record.eventId,
      decision: record.decision,
      status: record.result.status,
      clientRequestId: record.result.clientRequestId,
      externalOrderId: record.result.externalOrderId,
      filledSize: record.result.filledSize,
      avgPrice: record.result.avgPrice,
      resultJson: JSON.stringify({ ...record.result, raw: undefined }),
      intentJson: JSON.stringify(record.intent),
      contextJson: record.context ? JSON.stringify(record.context) : null,
    });
  }

  list(limit = 50): AuditRecord[] {
    const db = openDatabase(this.dbPath);
    const rows = db
      .prepare(
        `
          SELECT created_at, event_id, decision, result_json, intent_json, context_json
          FROM order_audit_log
          ORDER BY id DESC
          LIMIT ?
        `
      )
      .all(limit) as AuditRow[];
    return rows.map(rowToRecord);
  }

  findTerminal(eventId: string): AuditRecord | null {
    const db = openDatabase(this.dbPath);
    const row = db
      .prepare(
        `
          SELECT created_at, event_id, decision, result_json, intent_json, context_json
          FROM order_audit_log
          WHERE event_id = ?
          ORDER BY id ASC
          LIMIT 1
        `
      )
      .get(eventId) as AuditRow | undefined;
    return row ? rowToRecord(row) : null;
  }
}

export class MemoryAuditLog implements AuditLog {
  private records: AuditRecord[] = [];

  append(record: AuditRecord): void {
    this.records.push({ ...record, result: { ...record.result }, intent: { ...record.intent } });
  }

  list(limit = 50): AuditRecord[] {
    return this.records.slice(-limit).reverse();
  }

  findTerminal(eventId: string): AuditRecord | null {
    return this.records.find((record) => record.eventId === eventId) ?? null;
  }

  get size(): number {
    return this.records.length;
  }
}
