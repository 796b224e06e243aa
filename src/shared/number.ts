import BigNumber from "bignumber.js";

/**
 * 统一使用 BigNumber 表示价格、数量与盈亏，避免浮点误差。
 */
export const Decimal = BigNumber;

export type Decimal = BigNumber;

/**
 * 按小数位截断（向下取整），用于下单数量。
 */
export function floorTo(value: Decimal, decimals: number): Decimal {
  return value.decimalPlaces(decimals, Decimal.ROUND_DOWN);
}

/**
 * 按小数位四舍五入，用于下单价格与网格线。
 */
export function roundTo(value: Decimal, decimals: number): Decimal {
  return value.decimalPlaces(decimals, Decimal.ROUND_HALF_UP);
}

/**
 * 解析持久化的十进制字符串，空值返回 null。
 */
export function parseDecimalOrNull(value: string | null | undefined): Decimal | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  const decimal = Decimal(value);
  if (decimal.isNaN() || !decimal.isFinite()) {
    throw new Error(`无效的数值: ${value}`);
  }
  return decimal;
}

/**
 * 序列化为定点字符串，null 原样保留。
 */
export function decimalToString(value: Decimal | null): string | null {
  return value === null ? null : value.toFixed();
}
