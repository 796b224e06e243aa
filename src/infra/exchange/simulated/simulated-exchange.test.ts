import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ExchangeRequestError } from "../../../core/errors";
import type { OrderRequest, TradingSymbol } from "../../../core/exchange/models";
import { Decimal } from "../../../shared/number";
import { SimulatedExchangeClient } from "./simulated-exchange";

const XRP_THB: TradingSymbol = { id: "XRP_THB", base: "XRP", quote: "THB" };

function createExchange(): SimulatedExchangeClient {
  return new SimulatedExchangeClient({
    priceFeed: async (symbol) => ({ symbol: symbol.id, price: Decimal(10), ts: 1000 }),
    initialBalances: { thb: Decimal(1000) },
    feeRate: Decimal("0.0025"),
    now: () => 5000,
  });
}

function buyOrder(clientOrderId: string): OrderRequest {
  return {
    clientOrderId,
    symbol: XRP_THB,
    side: "BUY",
    type: "LIMIT",
    price: Decimal(10),
    quantity: Decimal("9.975"),
    quoteAmount: Decimal(100),
  };
}

describe("SimulatedExchangeClient", () => {
  it("行情来自注入的价格源", async () => {
    const tick = await createExchange().getPrice(XRP_THB);
    assert.equal(tick.price.toFixed(), "10");
    assert.equal(tick.ts, 1000);
  });

  it("买单按限价全部成交并更新余额", async () => {
    const exchange = createExchange();
    const result = await exchange.placeOrder(buyOrder("order-1"));
    assert.equal(result.status, "FILLED");
    assert.equal(result.exchangeOrderId, "sim-1");
    assert.equal(result.filledQuantity.toFixed(), "9.975");
    assert.equal(result.averageFillPrice?.toFixed(), "10");
    assert.equal(result.updatedAt, 5000);
    assert.equal((await exchange.getBalance("THB")).toFixed(), "900");
    assert.equal((await exchange.getBalance("xrp")).toFixed(), "9.975");
  });

  it("重复提交同一令牌返回首次结果且不重复扣款", async () => {
    const exchange = createExchange();
    const first = await exchange.placeOrder(buyOrder("order-1"));
    const second = await exchange.placeOrder(buyOrder("order-1"));
    assert.equal(second, first);
    assert.equal((await exchange.getBalance("THB")).toFixed(), "900");
  });

  it("卖单按扣费后金额入账", async () => {
    const exchange = createExchange();
    await exchange.placeOrder(buyOrder("order-1"));
    const result = await exchange.placeOrder({
      clientOrderId: "order-2",
      symbol: XRP_THB,
      side: "SELL",
      type: "LIMIT",
      price: Decimal(12),
      quantity: Decimal(5),
    });
    assert.equal(result.status, "FILLED");
    assert.equal((await exchange.getBalance("XRP")).toFixed(), "4.975");
    assert.equal((await exchange.getBalance("THB")).toFixed(), "959.85");
  });

  it("余额不足时拒单", async () => {
    const exchange = createExchange();
    const result = await exchange.placeOrder({
      clientOrderId: "order-3",
      symbol: XRP_THB,
      side: "SELL",
      type: "LIMIT",
      price: Decimal(12),
      quantity: Decimal(1),
    });
    assert.equal(result.status, "REJECTED");
    assert.equal(result.exchangeOrderId, undefined);
    assert.equal(result.statusReason, "XRP 余额不足");
    assert.equal((await exchange.getBalance("THB")).toFixed(), "1000");
  });

  it("按令牌查询订单，未知订单报错", async () => {
    const exchange = createExchange();
    const placed = await exchange.placeOrder(buyOrder("order-1"));
    assert.equal(await exchange.getOrder(XRP_THB, { clientOrderId: "order-1", side: "BUY" }), placed);
    await assert.rejects(
      exchange.getOrder(XRP_THB, { clientOrderId: "missing", side: "BUY" }),
      ExchangeRequestError
    );
  });
});
