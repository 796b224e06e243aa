import { Decimal, floorTo, roundTo } from "../../shared/number";
import type { OrderSide } from "./models";

/**
 * 下单规格参数。
 */
export interface OrderSizingConfig {
  /** 每格下单的计价币金额 */
  notional: Decimal;
  /** 限价相对观察价的滑点容忍（基点） */
  slippageBps: Decimal;
  /** 单边手续费率 */
  feeRate: Decimal;
  priceDecimals: number;
  quantityDecimals: number;
}

/**
 * 计算后的下单方案。
 */
export interface OrderPlan {
  side: OrderSide;
  price: Decimal;
  quantity: Decimal;
  /** 买单花费的计价币金额（整数） */
  quoteAmount?: Decimal;
}

/**
 * 无法下单的原因。
 */
export type OrderPlanSkip = {
  skip: "NO_POSITION" | "QUANTITY_TOO_SMALL" | "NOTIONAL_TOO_SMALL";
};

const BPS = Decimal(10000);

/**
 * 根据观察价与滑点计算限价：买单上浮、卖单下浮，保证可成交。
 */
export function limitPriceFor(side: OrderSide, price: Decimal, config: OrderSizingConfig): Decimal {
  const offset = config.slippageBps.dividedBy(BPS);
  const factor = side === "BUY" ? Decimal(1).plus(offset) : Decimal(1).minus(offset);
  return roundTo(price.multipliedBy(factor), config.priceDecimals);
}

/**
 * 构建下单方案。
 * 买单：花费 floor(notional) 计价币，预计到手 notional × (1 - fee) / 限价；
 * 卖单：数量为 notional / 限价 与当前持仓的较小值，无持仓时跳过。
 */
export function planOrder(
  side: OrderSide,
  price: Decimal,
  heldQuantity: Decimal,
  config: OrderSizingConfig
): OrderPlan | OrderPlanSkip {
  const limitPrice = limitPriceFor(side, price, config);
  if (side === "BUY") {
    const quoteAmount = config.notional.integerValue(Decimal.ROUND_FLOOR);
    if (quoteAmount.lte(0)) {
      return { skip: "NOTIONAL_TOO_SMALL" };
    }
    const quantity = floorTo(
      quoteAmount.multipliedBy(Decimal(1).minus(config.feeRate)).dividedBy(limitPrice),
      config.quantityDecimals
    );
    if (quantity.lte(0)) {
      return { skip: "QUANTITY_TOO_SMALL" };
    }
    return { side, price: limitPrice, quantity, quoteAmount };
  }

  if (heldQuantity.lte(0)) {
    return { skip: "NO_POSITION" };
  }
  const target = config.notional.dividedBy(limitPrice);
  const quantity = floorTo(Decimal.min(target, heldQuantity), config.quantityDecimals);
  if (quantity.lte(0)) {
    return { skip: "QUANTITY_TOO_SMALL" };
  }
  return { side, price: limitPrice, quantity };
}

/**
 * 类型守卫：方案是否被跳过。
 */
export function isSkippedPlan(plan: OrderPlan | OrderPlanSkip): plan is OrderPlanSkip {
  return "skip" in plan;
}
