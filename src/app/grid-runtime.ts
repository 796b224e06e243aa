import type { ExchangeClient } from "../core/exchange/adapter";
import type { StateStore } from "../core/ledger/state-store";
import type { AppConfig } from "../infra/config/schema";
import { createExchangeClient } from "../infra/exchange/factory";
import { PositionLedger } from "../services/ledger/position-ledger";
import type { OrderRecorder } from "../services/recorder/order-recorder";
import { TradeLoop } from "../services/trading/trade-loop";
import { RequestGate } from "../shared/concurrency";

/**
 * 网格运行时，负责装配交易所、账本与各交易对的交易循环。
 */
export class GridRuntime {
  private readonly exchange: ExchangeClient;
  private readonly loops: TradeLoop[];
  private readonly gate: RequestGate;

  constructor(exchange: ExchangeClient, loops: TradeLoop[], gate: RequestGate) {
    this.exchange = exchange;
    this.loops = loops;
    this.gate = gate;
  }

  /**
   * 启动运行时：连接交易所并加载每个交易对的持久化状态。
   * 单个交易对加载失败只影响该交易对。
   */
  public async start(): Promise<void> {
    await this.exchange.connect();
    let ready = 0;
    for (const loop of this.loops) {
      if (await loop.start()) {
        ready += 1;
      }
    }
    if (ready < this.loops.length) {
      console.warn("部分交易对启动失败", {
        ready,
        total: this.loops.length,
        halted: this.loops.filter((loop) => loop.isHalted()).map((loop) => loop.symbol),
      });
    }
  }

  /**
   * 停止运行时：确认未决订单后断开交易所。
   */
  public async stop(): Promise<void> {
    await Promise.all(this.loops.map((loop) => loop.drainPendingOrder()));
    await this.exchange.disconnect();
  }

  public getExchange(): ExchangeClient {
    return this.exchange;
  }

  public getLoops(): readonly TradeLoop[] {
    return this.loops;
  }

  public getGate(): RequestGate {
    return this.gate;
  }
}

/**
 * 创建网格运行时。所有交易对共享同一个交易所客户端与请求闸门，各自拥有独立的交易循环。
 */
export function createGridRuntime(
  config: AppConfig,
  store: StateStore,
  orderRecorder?: OrderRecorder
): GridRuntime {
  const gate = new RequestGate(config.exchange.maxConcurrency);
  const exchange = createExchangeClient(config, gate);
  const ledger = new PositionLedger(store);
  const loops = config.symbols.map(
    (symbolConfig) =>
      new TradeLoop({
        config: symbolConfig,
        trading: config.trading,
        exchange,
        ledger,
        recorder: orderRecorder,
      })
  );
  return new GridRuntime(exchange, loops, gate);
}
