import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Decimal } from "../../shared/number";
import {
  isSkippedPlan,
  limitPriceFor,
  planOrder,
  type OrderPlan,
  type OrderPlanSkip,
  type OrderSizingConfig,
} from "./order-sizing";

const config: OrderSizingConfig = {
  notional: Decimal(100),
  slippageBps: Decimal(8),
  feeRate: Decimal("0.0025"),
  priceDecimals: 2,
  quantityDecimals: 6,
};

function expectPlan(plan: OrderPlan | OrderPlanSkip): OrderPlan {
  if (isSkippedPlan(plan)) {
    assert.fail(`下单方案被跳过: ${plan.skip}`);
  }
  return plan;
}

describe("limitPriceFor", () => {
  it("买单上浮、卖单下浮并按精度取整", () => {
    assert.equal(limitPriceFor("BUY", Decimal(10), config).toFixed(), "10.01");
    assert.equal(limitPriceFor("SELL", Decimal(10), config).toFixed(), "9.99");
  });

  it("滑点为 0 时等于观察价", () => {
    const exact = { ...config, slippageBps: Decimal(0) };
    assert.equal(limitPriceFor("BUY", Decimal("95.5"), exact).toFixed(), "95.5");
  });
});

describe("planOrder", () => {
  it("买单按整数计价币金额下单，数量扣除手续费后向下取整", () => {
    const plan = expectPlan(planOrder("BUY", Decimal(10), Decimal(0), config));
    assert.equal(plan.price.toFixed(), "10.01");
    assert.equal(plan.quoteAmount?.toFixed(), "100");
    assert.equal(plan.quantity.toFixed(), "9.965034");
  });

  it("买单金额取整数部分", () => {
    const plan = expectPlan(
      planOrder("BUY", Decimal(10), Decimal(0), { ...config, notional: Decimal("150.7") })
    );
    assert.equal(plan.quoteAmount?.toFixed(), "150");
  });

  it("卖单数量不超过持仓", () => {
    const full = expectPlan(planOrder("SELL", Decimal(10), Decimal(20), config));
    assert.equal(full.price.toFixed(), "9.99");
    assert.equal(full.quantity.toFixed(), "10.01001");
    assert.equal(full.quoteAmount, undefined);

    const capped = expectPlan(planOrder("SELL", Decimal(10), Decimal(5), config));
    assert.equal(capped.quantity.toFixed(), "5");
  });

  it("无持仓时跳过卖单", () => {
    assert.deepEqual(planOrder("SELL", Decimal(10), Decimal(0), config), { skip: "NO_POSITION" });
  });

  it("金额不足一个计价单位时跳过买单", () => {
    assert.deepEqual(
      planOrder("BUY", Decimal(10), Decimal(0), { ...config, notional: Decimal("0.5") }),
      { skip: "NOTIONAL_TOO_SMALL" }
    );
  });

  it("数量取整后为 0 时跳过", () => {
    assert.deepEqual(
      planOrder("SELL", Decimal(10), Decimal("0.0000001"), config),
      { skip: "QUANTITY_TOO_SMALL" }
    );
  });
});
