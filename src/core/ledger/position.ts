import { InsufficientPositionError } from "../errors";
import { Decimal } from "../../shared/number";
import type { Fill, Position } from "./types";

/**
 * 空仓。
 */
export function emptyPosition(): Position {
  return { quantity: Decimal(0), averageCost: null, realizedPnl: Decimal(0) };
}

/**
 * 将一笔成交应用到持仓，返回新的持仓对象，不修改入参。
 *
 * 买入按数量加权更新均价；卖出按 (成交价 - 均价) × 数量 累计已实现盈亏，
 * 全部卖出后均价置空。
 */
export function applyFillToPosition(position: Position, fill: Fill): Position {
  if (fill.quantity.lte(0)) {
    throw new Error(`成交数量必须大于 0: ${fill.quantity.toFixed()}`);
  }
  if (fill.price.lte(0)) {
    throw new Error(`成交价格必须大于 0: ${fill.price.toFixed()}`);
  }

  if (fill.side === "BUY") {
    const quantity = position.quantity.plus(fill.quantity);
    const previousCost = position.averageCost
      ? position.averageCost.multipliedBy(position.quantity)
      : Decimal(0);
    const averageCost = previousCost
      .plus(fill.price.multipliedBy(fill.quantity))
      .dividedBy(quantity);
    return { quantity, averageCost, realizedPnl: position.realizedPnl };
  }

  if (fill.quantity.gt(position.quantity) || position.averageCost === null) {
    throw new InsufficientPositionError(
      `卖出数量超过持仓: 卖出 ${fill.quantity.toFixed()}，持仓 ${position.quantity.toFixed()}`
    );
  }
  const realizedPnl = position.realizedPnl.plus(
    fill.price.minus(position.averageCost).multipliedBy(fill.quantity)
  );
  const quantity = position.quantity.minus(fill.quantity);
  if (quantity.isZero()) {
    return { quantity, averageCost: null, realizedPnl };
  }
  return { quantity, averageCost: position.averageCost, realizedPnl };
}

/**
 * 未实现盈亏：(当前价 - 均价) × 持仓数量，空仓为 0。
 */
export function unrealizedPnl(position: Position, markPrice: Decimal): Decimal {
  if (position.averageCost === null) {
    return Decimal(0);
  }
  return markPrice.minus(position.averageCost).multipliedBy(position.quantity);
}
