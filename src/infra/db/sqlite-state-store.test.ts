import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import type { SymbolStateRecord } from "../../core/ledger/state-store";
import { Decimal } from "../../shared/number";
import { DbOrderRecorder } from "../../services/recorder/order-recorder";
import { createDbClient, type DbClient } from "./index";
import { OrderRepository } from "./order-repo";
import { SqliteStateStore } from "./sqlite-state-store";

function sampleRecord(overrides: Partial<SymbolStateRecord> = {}): SymbolStateRecord {
  return {
    symbol: "XRP_THB",
    position: { quantity: Decimal(10), averageCost: Decimal(50), realizedPnl: Decimal("1.5") },
    hysteresis: { lastTradePrice: Decimal(50), currentBand: 0 },
    lastTradeAt: 1000,
    pendingOrder: null,
    appliedOrderIds: ["order-1"],
    updatedAt: 1000,
    ...overrides,
  };
}

describe("SqliteStateStore", () => {
  let client: DbClient;

  beforeEach(() => {
    client = createDbClient({ path: ":memory:" });
  });

  afterEach(() => {
    client.sqlite.close();
  });

  it("写入后读取并覆盖同一交易对", async () => {
    const store = new SqliteStateStore(client.db);
    assert.equal(await store.load("XRP_THB"), null);

    await store.save(sampleRecord());
    await store.save(
      sampleRecord({
        position: { quantity: Decimal(4), averageCost: Decimal(50), realizedPnl: Decimal("7.5") },
        pendingOrder: {
          clientOrderId: "order-2",
          side: "BUY",
          price: Decimal(48),
          quantity: Decimal("2.08"),
          quoteAmount: Decimal(100),
          status: "NEW",
          decisionPrice: Decimal(48),
          decisionBand: 1,
          placedAt: 2000,
        },
        appliedOrderIds: ["order-1", "order-2"],
        updatedAt: 2000,
      })
    );

    const restored = await store.load("XRP_THB");
    assert.ok(restored);
    assert.equal(restored.position.quantity.toFixed(), "4");
    assert.equal(restored.position.realizedPnl.toFixed(), "7.5");
    assert.equal(restored.pendingOrder?.clientOrderId, "order-2");
    assert.equal(restored.pendingOrder?.quoteAmount?.toFixed(), "100");
    assert.equal(restored.pendingOrder?.exchangeOrderId, undefined);
    assert.deepEqual(restored.appliedOrderIds, ["order-1", "order-2"]);
    assert.equal(restored.updatedAt, 2000);

    const rows = client.sqlite.prepare("SELECT COUNT(*) AS total FROM symbol_states").get();
    assert.deepEqual(rows, { total: 1 });
  });
});

describe("DbOrderRecorder", () => {
  let client: DbClient;

  beforeEach(() => {
    client = createDbClient({ path: ":memory:" });
  });

  afterEach(() => {
    client.sqlite.close();
  });

  it("同一订单多次记录时更新状态并保留首次下单信息", async () => {
    const repo = new OrderRepository(client.db);
    const recorder = new DbOrderRecorder(repo);
    const base = {
      exchange: "bitkub",
      symbol: "XRP_THB",
      exchangeSymbol: "xrp_thb",
      clientOrderId: "order-1",
      side: "BUY" as const,
      orderType: "LIMIT" as const,
      price: Decimal(95),
      quantity: Decimal("1.052631"),
      quoteAmount: Decimal(100),
    };
    await recorder.recordOrder({
      ...base,
      status: "NEW",
      decisionPrice: Decimal(95),
      gridBand: 0,
      placedAt: 1000,
      exchangeUpdatedAt: 1000,
    });
    await recorder.recordOrder({
      ...base,
      exchangeOrderId: "ex-1",
      filledQuantity: Decimal("1.052631"),
      avgFillPrice: Decimal(95),
      status: "FILLED",
      placedAt: 5000,
      exchangeUpdatedAt: 3000,
    });

    const row = await repo.findByClientOrderId("bitkub", "order-1");
    assert.ok(row);
    assert.equal(row.status, "FILLED");
    assert.equal(row.exchangeOrderId, "ex-1");
    assert.equal(row.filledQuantity, "1.052631");
    assert.equal(row.avgFillPrice, "95");
    assert.equal(row.gridBand, 0);
    assert.equal(row.decisionPrice, "95");
    assert.equal(row.placedAt, 1000);
    assert.equal(row.exchangeUpdatedAt, 3000);
  });
});
