import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import Database from 'better-sqlite3';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS order_audit_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at TEXT NOT NULL,
    event_id TEXT NOT NULL,
    decision TEXT NOT NULL,
    status TEXT NOT NULL,
    client_request_id TEXT NOT NULL,
    external_order_id TEXT,
    filled_size REAL,
    avg_price REAL,
    result_json TEXT NOT NULL,
    intent_json TEXT NOT NULL,
    context_json TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_order_audit_event ON order_audit_log (event_id);

  CREATE TABLE IF NOT EXISTS clob_order_journal (
    client_request_id TEXT PRIMARY KEY,
    order_id TEXT,
    token_id TEXT NOT NULL,
    side TEXT NOT NULL,
    price REAL NOT NULL,
    size REAL NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pending_orders (
    event_id TEXT PRIMARY KEY,
    client_request_id TEXT NOT NULL,
    intent_json TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS spending_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    today_spent REAL NOT NULL DEFAULT 0,
    last_reset_date TEXT NOT NULL,
    today_trade_count INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

let instance: Database.Database | null = null;
let instancePath: string | null = null;

export function resolveDbPath(): string {
  return process.env.MARKETPILOT_DB_PATH ?? join(homedir(), '.marketpilot', 'marketpilot.sqlite');
}

/**
 * Open (once per path) the process-wide database and make sure the schema exists.
 */
export function openDatabase(path: string = resolveDbPath()): Database.Database {
  if (instance && instancePath === path) {
    return instance;
  }
  if (instance) {
    instance.close();
  }
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  instance = db;
  instancePath = path;
  return db;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
    instancePath = null;
  }
}
