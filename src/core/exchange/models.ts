import type { Decimal } from "../../shared/number";

/**
 * 订单方向。
 */
export type OrderSide = "BUY" | "SELL";

/**
 * 订单状态：NEW → SUBMITTED → (PARTIALLY_FILLED) → FILLED / REJECTED / CANCELLED。
 */
export type OrderStatus =
  | "NEW"
  | "SUBMITTED"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "REJECTED"
  | "CANCELLED";

/**
 * 交易对，BASE/QUOTE 形式，配置后不可变。
 */
export interface TradingSymbol {
  /** 统一标识，例如 XRP_THB */
  readonly id: string;
  readonly base: string;
  readonly quote: string;
}

/**
 * 交易所观察到的最新成交价。
 */
export interface PriceTick {
  symbol: string;
  price: Decimal;
  /** 交易所成交时间（毫秒） */
  ts: number;
}

/**
 * 下单请求，clientOrderId 即幂等令牌，重试时保持不变。
 */
export interface OrderRequest {
  clientOrderId: string;
  symbol: TradingSymbol;
  side: OrderSide;
  type: "LIMIT" | "MARKET";
  /** 限价单价格 */
  price: Decimal;
  /** 基础币数量（买单为预计到手数量） */
  quantity: Decimal;
  /** 买单花费的计价币金额 */
  quoteAmount?: Decimal;
}

/**
 * 订单在交易所侧的定位信息。
 */
export interface OrderRef {
  clientOrderId: string;
  exchangeOrderId?: string;
  side: OrderSide;
}

/**
 * 下单/查询结果。filledQuantity 为已成交的基础币数量。
 */
export interface OrderResult {
  clientOrderId: string;
  exchangeOrderId?: string;
  status: OrderStatus;
  filledQuantity: Decimal;
  /** 成交均价，有成交时可用 */
  averageFillPrice?: Decimal;
  statusReason?: string;
  updatedAt: number;
}
