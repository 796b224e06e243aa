import type Database from "better-sqlite3";

/**
 * 初始化数据库表结构，避免首次运行缺表。
 */
export function ensureDbSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS symbol_states (
      symbol TEXT PRIMARY KEY,
      quantity TEXT NOT NULL,
      average_cost TEXT,
      realized_pnl TEXT NOT NULL,
      last_trade_price TEXT,
      current_band INTEGER,
      last_trade_at INTEGER,
      pending_order TEXT,
      applied_order_ids TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS orders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      exchange TEXT NOT NULL,
      symbol TEXT NOT NULL,
      exchange_symbol TEXT NOT NULL,
      client_order_id TEXT NOT NULL,
      exchange_order_id TEXT,
      side TEXT NOT NULL,
      order_type TEXT NOT NULL,
      price TEXT NOT NULL,
      quantity TEXT NOT NULL,
      quote_amount TEXT,
      filled_quantity TEXT,
      avg_fill_price TEXT,
      status TEXT NOT NULL,
      status_reason TEXT,
      decision_price TEXT,
      grid_band INTEGER,
      placed_at INTEGER NOT NULL,
      exchange_updated_at INTEGER NOT NULL,
      record_created_at INTEGER NOT NULL,
      record_updated_at INTEGER NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS orders_exchange_client_order_id
      ON orders (exchange, client_order_id);

    CREATE INDEX IF NOT EXISTS orders_symbol_status
      ON orders (symbol, status);
  `);
}
