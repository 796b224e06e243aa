import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { SymbolConfig } from "../../infra/config/schema";
import { Decimal } from "../../shared/number";
import { runBacktest, type BacktestTick } from "./backtest-runner";

const config: SymbolConfig = {
  symbol: { id: "XRP_THB", base: "XRP", quote: "THB" },
  grid: { lower: Decimal(90), upper: Decimal(110), mode: "LINES", lineCount: 3, priceDecimals: 2 },
  hysteresis: { minMoveFraction: Decimal("0.01") },
  sizing: {
    notional: Decimal(100),
    slippageBps: Decimal(0),
    feeRate: Decimal(0),
    priceDecimals: 2,
    quantityDecimals: 6,
  },
};

function ticks(points: Array<[number, number]>): BacktestTick[] {
  return points.map(([price, ts]) => ({ price: Decimal(price), ts }));
}

describe("runBacktest", () => {
  it("回放行情并汇总持仓、盈亏与余额", async () => {
    const result = await runBacktest({
      config,
      ticks: ticks([
        [100, 1000],
        [95, 2000],
        [94, 3000],
        [105, 4000],
      ]),
    });

    assert.deepEqual(
      result.reports.map((report) => report.outcome),
      ["HOLD", "FILLED", "HOLD", "FILLED"]
    );
    assert.deepEqual(
      result.fills.map((fill) => [fill.side, fill.quantity.toFixed(), fill.price.toFixed(), fill.ts]),
      [
        ["BUY", "1.052631", "95", 2000],
        ["SELL", "0.95238", "105", 4000],
      ]
    );
    assert.equal(result.fills[0]?.clientOrderId, "bt-XRP_THB-1");
    assert.equal(result.position.quantity.toFixed(), "0.100251");
    assert.equal(result.position.averageCost?.toFixed(), "95");
    assert.equal(result.position.realizedPnl.toFixed(), "9.5238");
    assert.equal(result.unrealizedPnl.toFixed(), "1.00251");
    assert.equal(result.balances.quote.toFixed(), "99999.9999");
    assert.equal(result.balances.base.toFixed(), "0.100251");
    assert.equal(result.halted, false);
  });

  it("冷却按行情时间计算", async () => {
    const result = await runBacktest({
      config,
      cooldownMs: 1500,
      ticks: ticks([
        [95, 1000],
        [80, 2000],
        [80, 3000],
      ]),
    });
    assert.deepEqual(
      result.reports.map((report) => report.outcome),
      ["FILLED", "COOLDOWN", "FILLED"]
    );
    assert.deepEqual(
      result.fills.map((fill) => fill.side),
      ["BUY", "BUY"]
    );
  });

  it("计价币不足时跳过买入", async () => {
    const result = await runBacktest({
      config,
      quoteBalance: Decimal(50),
      ticks: ticks([[95, 1000]]),
    });
    assert.equal(result.reports[0]?.outcome, "SKIPPED");
    assert.equal(result.reports[0]?.reason, "INSUFFICIENT_BALANCE");
    assert.equal(result.fills.length, 0);
  });

  it("没有行情时结果为空", async () => {
    const result = await runBacktest({ config, ticks: [] });
    assert.equal(result.reports.length, 0);
    assert.equal(result.unrealizedPnl.toFixed(), "0");
    assert.equal(result.balances.quote.toFixed(), "100000");
  });
});
