import { unrealizedPnl } from "../../core/ledger/position";
import type { Fill, Position } from "../../core/ledger/types";
import type { SymbolConfig } from "../../infra/config/schema";
import { SimulatedExchangeClient } from "../../infra/exchange/simulated/simulated-exchange";
import { MemoryStateStore } from "../../infra/state/memory-state-store";
import { Decimal } from "../../shared/number";
import { PositionLedger } from "../ledger/position-ledger";
import { TradeLoop, type CycleReport } from "../trading/trade-loop";

/**
 * 录制的行情点。
 */
export interface BacktestTick {
  price: Decimal;
  ts: number;
}

export interface BacktestInput {
  config: SymbolConfig;
  ticks: BacktestTick[];
  /** 初始计价币余额，默认 100000 */
  quoteBalance?: Decimal;
  /** 成交冷却（毫秒），按行情时间计算 */
  cooldownMs?: number;
}

export interface BacktestResult {
  reports: CycleReport[];
  fills: Array<Fill & { clientOrderId: string; ts: number }>;
  position: Position;
  /** 按最后一个行情点计算的浮动盈亏 */
  unrealizedPnl: Decimal;
  balances: { base: Decimal; quote: Decimal };
  /** 交易对是否因账本错误停止 */
  halted: boolean;
}

const DEFAULT_QUOTE_BALANCE = Decimal(100000);

/**
 * 以模拟撮合与内存存储驱动同一套交易循环，逐个行情点执行一轮。
 * 时间取自行情点，冷却判断与实盘一致。
 */
export async function runBacktest(input: BacktestInput): Promise<BacktestResult> {
  const { config } = input;
  const symbol = config.symbol;
  let current: BacktestTick | null = null;
  const now = () => current?.ts ?? 0;

  const exchange = new SimulatedExchangeClient({
    priceFeed: async (target) => {
      if (!current) {
        throw new Error("回测行情尚未开始");
      }
      return { symbol: target.id, price: current.price, ts: current.ts };
    },
    initialBalances: { [symbol.quote]: input.quoteBalance ?? DEFAULT_QUOTE_BALANCE },
    feeRate: config.sizing.feeRate,
    now,
  });
  const ledger = new PositionLedger(new MemoryStateStore(), now);
  let sequence = 0;
  const loop = new TradeLoop({
    config,
    trading: { cooldownMs: input.cooldownMs ?? 0, orderTimeoutMs: Number.MAX_SAFE_INTEGER },
    exchange,
    ledger,
    now,
    newOrderId: () => {
      sequence += 1;
      return `bt-${symbol.id}-${sequence}`;
    },
  });
  await loop.initialize();

  const reports: CycleReport[] = [];
  const fills: BacktestResult["fills"] = [];
  for (const tick of input.ticks) {
    current = tick;
    const report = await loop.runCycle();
    reports.push(report);
    if (report.fill) {
      fills.push({ ...report.fill, ts: tick.ts });
    }
    if (loop.isHalted()) {
      break;
    }
  }

  const position = ledger.getPosition(symbol.id);
  const lastTick = input.ticks[input.ticks.length - 1];
  const result: BacktestResult = {
    reports,
    fills,
    position,
    unrealizedPnl: lastTick ? unrealizedPnl(position, lastTick.price) : Decimal(0),
    balances: {
      base: await exchange.getBalance(symbol.base),
      quote: await exchange.getBalance(symbol.quote),
    },
    halted: loop.isHalted(),
  };
  console.info("回测完成", {
    symbol: symbol.id,
    ticks: input.ticks.length,
    fills: fills.length,
    quantity: position.quantity.toFixed(),
    realizedPnl: position.realizedPnl.toFixed(),
    unrealizedPnl: result.unrealizedPnl.toFixed(),
  });
  return result;
}
