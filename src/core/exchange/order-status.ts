import type { OrderResult, OrderStatus } from "./models";

/**
 * 判断订单是否已进入终态。
 */
export function isTerminalOrderStatus(status: OrderStatus): boolean {
  return status === "FILLED" || status === "CANCELLED" || status === "REJECTED";
}

/**
 * 终态且有成交量的订单需要记入账本（含部分成交后撤单）。
 */
export function hasExecutedQuantity(result: OrderResult): boolean {
  return isTerminalOrderStatus(result.status) && result.filledQuantity.gt(0);
}
