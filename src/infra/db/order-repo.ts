import type { SQLiteUpdateSetSource } from "drizzle-orm/sqlite-core";
import type { AppDatabase } from "./index";
import { orders } from "./schema";

/**
 * 订单表写入结构。
 */
export type OrderInsert = typeof orders.$inferInsert;

/**
 * 订单仓储，封装 upsert 逻辑。
 */
export class OrderRepository {
  private readonly db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  /**
   * 以 exchange + clientOrderId 为唯一键更新订单记录。
   */
  public async upsertOrder(values: OrderInsert): Promise<void> {
    this.db
      .insert(orders)
      .values(values)
      .onConflictDoUpdate({
        target: [orders.exchange, orders.clientOrderId],
        set: this.buildUpdateSet(values),
      })
      .run();
  }

  /**
   * 按客户端订单号查询，主要用于对账与测试。
   */
  public async findByClientOrderId(
    exchange: string,
    clientOrderId: string
  ): Promise<typeof orders.$inferSelect | undefined> {
    return this.db.query.orders.findFirst({
      where: (table, { and, eq }) =>
        and(eq(table.exchange, exchange), eq(table.clientOrderId, clientOrderId)),
    });
  }

  /**
   * 构建更新字段，避免覆盖 recordCreatedAt 与首次下单时间，未提供的字段保持原值。
   */
  private buildUpdateSet(values: OrderInsert): SQLiteUpdateSetSource<typeof orders> {
    const { recordCreatedAt: _created, placedAt: _placed, id: _id, ...rest } = values;
    const updateSet: SQLiteUpdateSetSource<typeof orders> = {};
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined) {
        Object.assign(updateSet, { [key]: value });
      }
    }
    return updateSet;
  }
}
