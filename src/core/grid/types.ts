import type { Decimal } from "../../shared/number";
import type { OrderSide } from "../exchange/models";

/**
 * 网格间距模式：固定线数（等分上下界）或固定价差。
 */
export type GridSpacingMode = "LINES" | "SPACING";

/**
 * 网格配置。lower < upper，线数至少 2，启动后不可变。
 */
export interface GridConfig {
  lower: Decimal;
  upper: Decimal;
  mode: GridSpacingMode;
  /** LINES 模式下的线数（含上下界） */
  lineCount?: number;
  /** SPACING 模式下的价差 */
  spacing?: Decimal;
  /** 网格线价格精度 */
  priceDecimals: number;
}

/**
 * 计算后的网格阶梯，lines 严格递增。
 * 价格所在档位为半开区间 [lines[i], lines[i+1])，低于最低线为 -1，不低于最高线为 N。
 */
export interface GridLadder {
  readonly lines: readonly Decimal[];
  /** 档位数量 N = lines.length - 1 */
  readonly bandCount: number;
}

/**
 * 信号状态：上次成交价与当时所在档位，仅在订单确认成交后更新。
 */
export interface HysteresisState {
  lastTradePrice: Decimal | null;
  currentBand: number | null;
}

/**
 * 信号判断参数。
 */
export interface HysteresisConfig {
  /** 距上次成交的最小变动比例，例如 0.01 表示 1% */
  minMoveFraction: Decimal;
}

/**
 * 信号决策。
 */
export type DecisionAction = OrderSide | "HOLD";

/**
 * HOLD 的原因，便于日志区分。
 */
export type HoldReason =
  | "NO_BAND_CHANGE"
  | "HYSTERESIS"
  | "INITIAL_ABOVE_ENTRY";

/**
 * 单次决策结果。
 */
export interface Decision {
  action: DecisionAction;
  price: Decimal;
  band: number;
  previousBand: number | null;
  /** 距上次成交的变动比例，无上次成交时为 null */
  movePct: Decimal | null;
  holdReason?: HoldReason;
}
