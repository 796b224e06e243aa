import { Decimal, roundTo } from "../../shared/number";
import type { GridConfig, GridLadder } from "./types";

/**
 * 校验网格边界。
 */
function requireBounds(config: GridConfig): void {
  if (config.lower.lte(0)) {
    throw new Error(`网格下界必须大于 0: ${config.lower.toFixed()}`);
  }
  if (config.lower.gte(config.upper)) {
    throw new Error(
      `网格下界必须小于上界: ${config.lower.toFixed()} >= ${config.upper.toFixed()}`
    );
  }
}

/**
 * 等分上下界生成网格线（含上下界）。
 */
function buildLinesByCount(config: GridConfig): Decimal[] {
  const count = config.lineCount;
  if (count === undefined || !Number.isInteger(count) || count < 2) {
    throw new Error(`网格线数必须为不小于 2 的整数: ${String(count)}`);
  }
  const step = config.upper.minus(config.lower).dividedBy(count - 1);
  const lines: Decimal[] = [];
  for (let i = 0; i < count - 1; i += 1) {
    lines.push(roundTo(config.lower.plus(step.multipliedBy(i)), config.priceDecimals));
  }
  // 最后一条线直接取上界，避免累计误差
  lines.push(roundTo(config.upper, config.priceDecimals));
  return lines;
}

/**
 * 按固定价差从下界向上生成网格线，最后一步不足时补齐上界。
 */
function buildLinesBySpacing(config: GridConfig): Decimal[] {
  const spacing = config.spacing;
  if (!spacing || spacing.lte(0)) {
    throw new Error("SPACING 模式必须提供大于 0 的 spacing");
  }
  const lines: Decimal[] = [];
  let current = config.lower;
  while (current.lte(config.upper)) {
    lines.push(roundTo(current, config.priceDecimals));
    current = current.plus(spacing);
  }
  const last = lines[lines.length - 1];
  if (last === undefined || last.lt(roundTo(config.upper, config.priceDecimals))) {
    lines.push(roundTo(config.upper, config.priceDecimals));
  }
  return lines;
}

/**
 * 根据配置构建网格阶梯。仅在启动或配置变更时调用，不在循环中重算。
 */
export function buildGridLadder(config: GridConfig): GridLadder {
  requireBounds(config);
  const lines = config.mode === "LINES" ? buildLinesByCount(config) : buildLinesBySpacing(config);
  for (let i = 1; i < lines.length; i += 1) {
    const prev = lines[i - 1];
    const current = lines[i];
    if (prev === undefined || current === undefined || current.lte(prev)) {
      throw new Error(`网格线在精度 ${config.priceDecimals} 下不再严格递增，请减少线数`);
    }
  }
  return Object.freeze({
    lines: Object.freeze(lines),
    bandCount: lines.length - 1,
  });
}

/**
 * 计算价格所在档位。
 * 档位为半开区间 [lines[i], lines[i+1])，恰好落在线上的价格属于较高档位；
 * 低于最低线返回 -1，不低于最高线返回 N。
 */
export function bandOf(price: Decimal, ladder: GridLadder): number {
  const lines = ladder.lines;
  let low = 0;
  let high = lines.length - 1;
  let result = -1;
  // 二分查找最后一条不高于价格的线
  while (low <= high) {
    const mid = (low + high) >> 1;
    const line = lines[mid];
    if (line !== undefined && line.lte(price)) {
      result = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return result;
}

/**
 * 相邻网格线之间的最小百分比间距，用于估算单格收益。
 */
export function minStepPct(ladder: GridLadder): Decimal {
  let min: Decimal | null = null;
  for (let i = 1; i < ladder.lines.length; i += 1) {
    const prev = ladder.lines[i - 1];
    const current = ladder.lines[i];
    if (prev === undefined || current === undefined) {
      continue;
    }
    const pct = current.minus(prev).dividedBy(prev).multipliedBy(100);
    if (min === null || pct.lt(min)) {
      min = pct;
    }
  }
  return min ?? Decimal(0);
}
