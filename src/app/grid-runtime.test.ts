import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { ClockStatus, ExchangeClient } from "../core/exchange/adapter";
import type {
  OrderRequest,
  OrderResult,
  PriceTick,
  TradingSymbol,
} from "../core/exchange/models";
import type { ExchangeSymbolMapper } from "../core/exchange/symbol-mapper";
import { PersistenceError } from "../core/errors";
import type { SymbolStateRecord } from "../core/ledger/state-store";
import type { SymbolConfig } from "../infra/config/schema";
import { MemoryStateStore } from "../infra/state/memory-state-store";
import { PositionLedger } from "../services/ledger/position-ledger";
import { TradeLoop } from "../services/trading/trade-loop";
import { RequestGate } from "../shared/concurrency";
import { Decimal } from "../shared/number";
import { GridRuntime } from "./grid-runtime";

const BTC_THB: TradingSymbol = { id: "BTC_THB", base: "BTC", quote: "THB" };
const XRP_THB: TradingSymbol = { id: "XRP_THB", base: "XRP", quote: "THB" };

function symbolConfig(symbol: TradingSymbol): SymbolConfig {
  return {
    symbol,
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
}

/**
 * 固定报价 100 的交易所桩，不允许下单。
 */
class FixedPriceExchange implements ExchangeClient {
  public readonly name = "fixed";
  public readonly capabilities = { supportsIdempotentOrders: true, simulated: true };
  public readonly symbolMapper: ExchangeSymbolMapper = {
    toExchangeSymbol: (symbol) => symbol.id,
    isSameMarket: (symbol, exchangeSymbol) => symbol.id === exchangeSymbol,
  };
  public connected = false;

  public async connect(): Promise<void> {
    this.connected = true;
  }

  public async disconnect(): Promise<void> {
    this.connected = false;
  }

  public async getServerTime(): Promise<number> {
    return 0;
  }

  public async syncClock(): Promise<number> {
    return 0;
  }

  public getClockStatus(): ClockStatus {
    return { offsetMs: 0, lastSyncAt: 0 };
  }

  public async getPrice(symbol: TradingSymbol): Promise<PriceTick> {
    return { symbol: symbol.id, price: Decimal(100), ts: 1000 };
  }

  public async getBalance(): Promise<Decimal> {
    return Decimal(0);
  }

  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    throw new Error(`不应下单: ${order.clientOrderId}`);
  }

  public async getOrder(): Promise<OrderResult> {
    throw new Error("不应查询订单");
  }

  public async cancelOrder(): Promise<void> {
    return;
  }
}

/**
 * 指定交易对读取失败的存储，failures 为失败次数，Infinity 表示一直失败。
 */
class FailingLoadStore extends MemoryStateStore {
  private readonly symbol: string;
  private readonly error: () => Error;
  private failures: number;

  constructor(symbol: string, error: () => Error, failures = Number.POSITIVE_INFINITY) {
    super();
    this.symbol = symbol;
    this.error = error;
    this.failures = failures;
  }

  public override async load(symbol: string): Promise<SymbolStateRecord | null> {
    if (symbol === this.symbol && this.failures > 0) {
      this.failures -= 1;
      throw this.error();
    }
    return super.load(symbol);
  }
}

function createRuntime(store: MemoryStateStore): {
  runtime: GridRuntime;
  exchange: FixedPriceExchange;
  loops: Record<"btc" | "xrp", TradeLoop>;
} {
  const exchange = new FixedPriceExchange();
  const ledger = new PositionLedger(store, () => 1000);
  const create = (symbol: TradingSymbol) =>
    new TradeLoop({
      config: symbolConfig(symbol),
      trading: { cooldownMs: 0, orderTimeoutMs: 120000 },
      exchange,
      ledger,
      now: () => 1000,
    });
  const loops = { btc: create(BTC_THB), xrp: create(XRP_THB) };
  const runtime = new GridRuntime(exchange, [loops.btc, loops.xrp], new RequestGate(2));
  return { runtime, exchange, loops };
}

describe("GridRuntime", () => {
  it("单个交易对状态损坏时只停止该交易对", async () => {
    const store = new FailingLoadStore(
      BTC_THB.id,
      () => new PersistenceError("状态文件损坏 BTC_THB")
    );
    const { runtime, exchange, loops } = createRuntime(store);

    await runtime.start();
    assert.ok(exchange.connected);
    assert.equal(loops.btc.isHalted(), true);
    assert.equal(loops.btc.getStatus().halted?.reason, "PersistenceError: 状态文件损坏 BTC_THB");
    assert.equal(loops.xrp.isHalted(), false);

    const btc = await loops.btc.runCycle();
    assert.equal(btc.outcome, "HALTED");
    const xrp = await loops.xrp.runCycle();
    assert.equal(xrp.outcome, "HOLD");
    assert.equal(xrp.reason, "INITIAL_ABOVE_ENTRY");
  });

  it("非致命的加载失败不停止交易对，首轮循环重新加载", async () => {
    const store = new FailingLoadStore(XRP_THB.id, () => new Error("暂时不可用"), 1);
    const { runtime, loops } = createRuntime(store);

    await runtime.start();
    assert.equal(loops.xrp.isHalted(), false);
    assert.equal(loops.xrp.getStatus().pendingOrder, null);

    const report = await loops.xrp.runCycle();
    assert.equal(report.outcome, "HOLD");
    assert.equal(loops.btc.isHalted(), false);
  });
});
