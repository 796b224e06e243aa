import { z } from "zod";
import type { PendingOrderRecord, SymbolStateRecord } from "../../core/ledger/state-store";
import { decimalToString, parseDecimalOrNull, Decimal } from "../../shared/number";

/**
 * 持久化订单状态枚举。
 */
export const orderStatusEnum = [
  "NEW",
  "SUBMITTED",
  "PARTIALLY_FILLED",
  "FILLED",
  "REJECTED",
  "CANCELLED",
] as const;

/**
 * 订单方向枚举。
 */
export const orderSideEnum = ["BUY", "SELL"] as const;

const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, "无效的十进制字符串");

const pendingOrderSchema = z.object({
  client_order_id: z.string().min(1),
  exchange_order_id: z.string().nullable(),
  side: z.enum(orderSideEnum),
  price: decimalString,
  quantity: decimalString,
  quote_amount: decimalString.nullable(),
  status: z.enum(orderStatusEnum),
  decision_price: decimalString,
  decision_band: z.number().int(),
  placed_at: z.number().int(),
});

/**
 * 落盘格式（snake_case，数值为十进制字符串）。
 */
export const persistedStateSchema = z.object({
  symbol: z.string().min(1),
  quantity: decimalString,
  average_cost: decimalString.nullable(),
  realized_pnl: decimalString,
  last_trade_price: decimalString.nullable(),
  current_band: z.number().int().nullable(),
  last_trade_at: z.number().int().nullable(),
  pending_order: pendingOrderSchema.nullable(),
  applied_order_ids: z.array(z.string()),
  updated_at: z.number().int(),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;
type PersistedPendingOrder = z.infer<typeof pendingOrderSchema>;

/**
 * 保留的幂等令牌数量上限。
 */
export const APPLIED_ORDER_ID_LIMIT = 200;

function requireDecimal(value: string): Decimal {
  const parsed = parseDecimalOrNull(value);
  if (parsed === null) {
    throw new Error("缺少数值字段");
  }
  return parsed;
}

function encodePendingOrder(order: PendingOrderRecord): PersistedPendingOrder {
  return {
    client_order_id: order.clientOrderId,
    exchange_order_id: order.exchangeOrderId ?? null,
    side: order.side,
    price: order.price.toFixed(),
    quantity: order.quantity.toFixed(),
    quote_amount: order.quoteAmount ? order.quoteAmount.toFixed() : null,
    status: order.status,
    decision_price: order.decisionPrice.toFixed(),
    decision_band: order.decisionBand,
    placed_at: order.placedAt,
  };
}

function decodePendingOrder(raw: PersistedPendingOrder): PendingOrderRecord {
  return {
    clientOrderId: raw.client_order_id,
    exchangeOrderId: raw.exchange_order_id ?? undefined,
    side: raw.side,
    price: requireDecimal(raw.price),
    quantity: requireDecimal(raw.quantity),
    quoteAmount: parseDecimalOrNull(raw.quote_amount) ?? undefined,
    status: raw.status,
    decisionPrice: requireDecimal(raw.decision_price),
    decisionBand: raw.decision_band,
    placedAt: raw.placed_at,
  };
}

/**
 * 内存记录转落盘格式。
 */
export function encodeStateRecord(record: SymbolStateRecord): PersistedState {
  return {
    symbol: record.symbol,
    quantity: record.position.quantity.toFixed(),
    average_cost: decimalToString(record.position.averageCost),
    realized_pnl: record.position.realizedPnl.toFixed(),
    last_trade_price: decimalToString(record.hysteresis.lastTradePrice),
    current_band: record.hysteresis.currentBand,
    last_trade_at: record.lastTradeAt,
    pending_order: record.pendingOrder ? encodePendingOrder(record.pendingOrder) : null,
    applied_order_ids: record.appliedOrderIds.slice(-APPLIED_ORDER_ID_LIMIT),
    updated_at: record.updatedAt,
  };
}

/**
 * 落盘格式校验并还原为内存记录。
 */
export function decodeStateRecord(raw: unknown): SymbolStateRecord {
  const result = persistedStateSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`状态记录格式错误: ${result.error.issues.map((i) => i.message).join("; ")}`);
  }
  const data = result.data;
  const quantity = requireDecimal(data.quantity);
  const averageCost = parseDecimalOrNull(data.average_cost);
  if (quantity.gt(0) && averageCost === null) {
    throw new Error(`状态记录不一致: ${data.symbol} 持仓 ${data.quantity} 但缺少均价`);
  }
  if (quantity.lt(0)) {
    throw new Error(`状态记录不一致: ${data.symbol} 持仓为负 ${data.quantity}`);
  }
  return {
    symbol: data.symbol,
    position: {
      quantity,
      averageCost: quantity.isZero() ? null : averageCost,
      realizedPnl: requireDecimal(data.realized_pnl),
    },
    hysteresis: {
      lastTradePrice: parseDecimalOrNull(data.last_trade_price),
      currentBand: data.current_band,
    },
    lastTradeAt: data.last_trade_at,
    pendingOrder: data.pending_order ? decodePendingOrder(data.pending_order) : null,
    appliedOrderIds: data.applied_order_ids,
    updatedAt: data.updated_at,
  };
}
