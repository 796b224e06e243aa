import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { InsufficientPositionError } from "../errors";
import { Decimal } from "../../shared/number";
import { applyFillToPosition, emptyPosition, unrealizedPnl } from "./position";
import type { Position } from "./types";

function buy(position: Position, quantity: number, price: number): Position {
  return applyFillToPosition(position, {
    side: "BUY",
    quantity: Decimal(quantity),
    price: Decimal(price),
  });
}

function sell(position: Position, quantity: number, price: number): Position {
  return applyFillToPosition(position, {
    side: "SELL",
    quantity: Decimal(quantity),
    price: Decimal(price),
  });
}

describe("applyFillToPosition", () => {
  it("买入按数量加权更新均价", () => {
    const first = buy(emptyPosition(), 10, 50);
    assert.equal(first.quantity.toFixed(), "10");
    assert.equal(first.averageCost?.toFixed(), "50");

    const second = buy(first, 10, 60);
    assert.equal(second.quantity.toFixed(), "20");
    assert.equal(second.averageCost?.toFixed(), "55");
    assert.equal(second.realizedPnl.toFixed(), "0");
  });

  it("部分卖出累计已实现盈亏且均价不变", () => {
    const position = sell(buy(buy(emptyPosition(), 10, 50), 10, 60), 10, 60);
    assert.equal(position.quantity.toFixed(), "10");
    assert.equal(position.averageCost?.toFixed(), "55");
    assert.equal(position.realizedPnl.toFixed(), "50");
  });

  it("全部卖出后均价置空", () => {
    const position = sell(buy(emptyPosition(), 10, 50), 10, 60);
    assert.equal(position.quantity.toFixed(), "0");
    assert.equal(position.averageCost, null);
    assert.equal(position.realizedPnl.toFixed(), "100");
  });

  it("均价始终介于历次买入价之间", () => {
    const prices = [12.5, 9.75, 11, 8.2, 10.4];
    let position = emptyPosition();
    for (const price of prices) {
      position = buy(position, 3, price);
      const cost = position.averageCost;
      assert.ok(cost !== null);
      assert.ok(cost.gte(Math.min(...prices)) && cost.lte(Math.max(...prices)));
    }
  });

  it("卖出超过持仓时报错且不修改原持仓", () => {
    const position = buy(emptyPosition(), 1, 50);
    assert.throws(() => sell(position, 2, 60), InsufficientPositionError);
    assert.throws(() => sell(emptyPosition(), 1, 60), InsufficientPositionError);
    assert.equal(position.quantity.toFixed(), "1");
  });

  it("拒绝非正数量与价格", () => {
    assert.throws(() => buy(emptyPosition(), 0, 50), /成交数量必须大于 0/);
    assert.throws(() => buy(emptyPosition(), 1, 0), /成交价格必须大于 0/);
  });
});

describe("unrealizedPnl", () => {
  it("按均价计算浮动盈亏，空仓为 0", () => {
    assert.equal(unrealizedPnl(buy(emptyPosition(), 4, 50), Decimal(45)).toFixed(), "-20");
    assert.equal(unrealizedPnl(emptyPosition(), Decimal(45)).toFixed(), "0");
  });
});
