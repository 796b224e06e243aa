import { eq } from "drizzle-orm";
import { PersistenceError } from "../../core/errors";
import type { StateStore, SymbolStateRecord } from "../../core/ledger/state-store";
import { decodeStateRecord, encodeStateRecord } from "../state/state-codec";
import type { AppDatabase } from "./index";
import { symbolStates } from "./schema";

type SymbolStateInsert = typeof symbolStates.$inferInsert;

/**
 * SQLite 状态存储。单条 upsert 即一次事务，崩溃后要么是旧记录要么是新记录。
 */
export class SqliteStateStore implements StateStore {
  public readonly kind = "sqlite";
  private readonly db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  public async load(symbol: string): Promise<SymbolStateRecord | null> {
    let row: typeof symbolStates.$inferSelect | undefined;
    try {
      row = this.db.select().from(symbolStates).where(eq(symbolStates.symbol, symbol)).get();
    } catch (error) {
      throw new PersistenceError(`读取交易对状态失败: ${symbol}`, { cause: error });
    }
    if (!row) {
      return null;
    }
    try {
      return decodeStateRecord({
        symbol: row.symbol,
        quantity: row.quantity,
        average_cost: row.averageCost,
        realized_pnl: row.realizedPnl,
        last_trade_price: row.lastTradePrice,
        current_band: row.currentBand,
        last_trade_at: row.lastTradeAt,
        pending_order: row.pendingOrder ? JSON.parse(row.pendingOrder) : null,
        applied_order_ids: JSON.parse(row.appliedOrderIds),
        updated_at: row.updatedAt,
      });
    } catch (error) {
      throw new PersistenceError(`交易对状态记录损坏: ${symbol}`, { cause: error });
    }
  }

  public async save(record: SymbolStateRecord): Promise<void> {
    const encoded = encodeStateRecord(record);
    const values: SymbolStateInsert = {
      symbol: encoded.symbol,
      quantity: encoded.quantity,
      averageCost: encoded.average_cost,
      realizedPnl: encoded.realized_pnl,
      lastTradePrice: encoded.last_trade_price,
      currentBand: encoded.current_band,
      lastTradeAt: encoded.last_trade_at,
      pendingOrder: encoded.pending_order ? JSON.stringify(encoded.pending_order) : null,
      appliedOrderIds: JSON.stringify(encoded.applied_order_ids),
      updatedAt: encoded.updated_at,
    };
    const { symbol: _symbol, ...updateSet } = values;
    try {
      this.db
        .insert(symbolStates)
        .values(values)
        .onConflictDoUpdate({ target: symbolStates.symbol, set: updateSet })
        .run();
    } catch (error) {
      throw new PersistenceError(`写入交易对状态失败: ${record.symbol}`, { cause: error });
    }
  }
}
