import type { ExchangeClient } from "../../core/exchange/adapter";
import type { RequestGate } from "../../shared/concurrency";
import type { AppConfig } from "../config/schema";
import { BitkubExchangeClient } from "./bitkub/bitkub-client";
import { SimulatedExchangeClient } from "./simulated/simulated-exchange";

/**
 * 交易所客户端工厂，按配置创建对应的实现。
 * DRY_RUN 时使用模拟撮合，价格仍取自交易所公共行情。
 */
export function createExchangeClient(config: AppConfig, gate: RequestGate): ExchangeClient {
  if (config.exchange.name !== "bitkub") {
    throw new Error(`暂不支持交易所: ${config.exchange.name}`);
  }
  const live = new BitkubExchangeClient({ config: config.exchange, gate });
  if (!config.trading.dryRun) {
    return live;
  }
  const quotes = new Set(config.symbols.map((entry) => entry.symbol.quote));
  const initialBalances = Object.fromEntries(
    [...quotes].map((quote) => [quote, config.trading.dryRunQuoteBalance])
  );
  // 各交易对手续费一致，取第一个交易对的配置。
  const feeRate = config.symbols[0]?.sizing.feeRate;
  if (!feeRate) {
    throw new Error("未配置任何交易对");
  }
  return new SimulatedExchangeClient({
    priceFeed: (symbol, signal) => live.getPrice(symbol, signal),
    initialBalances,
    feeRate,
    symbolMapper: live.symbolMapper,
  });
}
