import type { Decimal } from "../../shared/number";
import type { OrderSide } from "../exchange/models";

/**
 * 单个交易对的持仓。仅做多，quantity >= 0；
 * averageCost 仅在 quantity > 0 时有值。
 */
export interface Position {
  quantity: Decimal;
  averageCost: Decimal | null;
  realizedPnl: Decimal;
}

/**
 * 一笔确认成交。
 */
export interface Fill {
  side: OrderSide;
  quantity: Decimal;
  price: Decimal;
}
