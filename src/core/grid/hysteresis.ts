import type { Decimal } from "../../shared/number";
import { bandOf } from "./ladder";
import type { Decision, GridLadder, HysteresisConfig, HysteresisState } from "./types";

/**
 * 初始状态：尚无成交。
 */
export function initialHysteresisState(): HysteresisState {
  return { lastTradePrice: null, currentBand: null };
}

/**
 * 计算距上次成交价的变动比例。
 */
export function moveFraction(price: Decimal, lastTradePrice: Decimal): Decimal {
  return price.minus(lastTradePrice).abs().dividedBy(lastTradePrice);
}

/**
 * 基于滞回的网格决策，纯函数。
 *
 * 1. 无上次成交时，价格位于最低档或更低则买入，否则观望；
 * 2. 距上次成交变动不足阈值时一律观望，抑制网格线附近的来回打单；
 * 3. 档位下降买入，档位上升卖出，否则观望。
 */
export function decide(
  state: HysteresisState,
  price: Decimal,
  ladder: GridLadder,
  config: HysteresisConfig
): Decision {
  const band = bandOf(price, ladder);
  const { lastTradePrice, currentBand } = state;

  if (lastTradePrice === null || currentBand === null) {
    if (band <= 0) {
      return { action: "BUY", price, band, previousBand: currentBand, movePct: null };
    }
    return {
      action: "HOLD",
      price,
      band,
      previousBand: currentBand,
      movePct: null,
      holdReason: "INITIAL_ABOVE_ENTRY",
    };
  }

  const movePct = moveFraction(price, lastTradePrice);
  if (movePct.lt(config.minMoveFraction)) {
    return {
      action: "HOLD",
      price,
      band,
      previousBand: currentBand,
      movePct,
      holdReason: "HYSTERESIS",
    };
  }
  if (band < currentBand) {
    return { action: "BUY", price, band, previousBand: currentBand, movePct };
  }
  if (band > currentBand) {
    return { action: "SELL", price, band, previousBand: currentBand, movePct };
  }
  return {
    action: "HOLD",
    price,
    band,
    previousBand: currentBand,
    movePct,
    holdReason: "NO_BAND_CHANGE",
  };
}

/**
 * 订单确认成交后的新状态：锚定触发该订单的观察价与档位，而非含滑点的成交价。
 */
export function stateAfterFill(decision: Pick<Decision, "price" | "band">): HysteresisState {
  return {
    lastTradePrice: decision.price,
    currentBand: decision.band,
  };
}
