import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { orderSideEnum, orderStatusEnum } from "../state/state-codec";

/**
 * 下单类型枚举。
 */
export const orderTypeEnum = ["LIMIT", "MARKET"] as const;

/**
 * 交易对状态表，每个交易对一行：持仓、信号状态与未决订单。
 * 数值统一以十进制字符串保存，重启后可精确还原。
 */
export const symbolStates = sqliteTable("symbol_states", {
  symbol: text("symbol").primaryKey(),
  quantity: text("quantity").notNull(),
  averageCost: text("average_cost"),
  realizedPnl: text("realized_pnl").notNull(),
  lastTradePrice: text("last_trade_price"),
  currentBand: integer("current_band"),
  lastTradeAt: integer("last_trade_at"),
  // 未决订单（JSON），无则为空
  pendingOrder: text("pending_order"),
  // 最近已记账的幂等令牌（JSON 数组）
  appliedOrderIds: text("applied_order_ids").notNull(),
  updatedAt: integer("updated_at").notNull(),
});

/**
 * 订单流水表，记录网格订单全生命周期状态。
 */
export const orders = sqliteTable(
  "orders",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    exchange: text("exchange").notNull(),
    symbol: text("symbol").notNull(),
    exchangeSymbol: text("exchange_symbol").notNull(),
    clientOrderId: text("client_order_id").notNull(),
    exchangeOrderId: text("exchange_order_id"),
    side: text("side", { enum: orderSideEnum }).notNull(),
    orderType: text("order_type", { enum: orderTypeEnum }).notNull(),
    price: text("price").notNull(),
    quantity: text("quantity").notNull(),
    quoteAmount: text("quote_amount"),
    filledQuantity: text("filled_quantity"),
    avgFillPrice: text("avg_fill_price"),
    status: text("status", { enum: orderStatusEnum }).notNull(),
    statusReason: text("status_reason"),
    decisionPrice: text("decision_price"),
    gridBand: integer("grid_band"),
    placedAt: integer("placed_at").notNull(),
    exchangeUpdatedAt: integer("exchange_updated_at").notNull(),
    recordCreatedAt: integer("record_created_at").notNull(),
    recordUpdatedAt: integer("record_updated_at").notNull(),
  },
  (table) => ({
    exchangeClientOrderId: uniqueIndex("orders_exchange_client_order_id").on(
      table.exchange,
      table.clientOrderId
    ),
    symbolStatus: index("orders_symbol_status").on(table.symbol, table.status),
  })
);
