import type { TradingSymbol } from "./models";

/**
 * 交易对名称映射接口，用于统一处理不同交易所的命名规则。
 */
export interface ExchangeSymbolMapper {
  /** 将统一交易对转为交易所格式 */
  toExchangeSymbol(symbol: TradingSymbol): string;
  /** 判断两个交易对是否指向同一市场 */
  isSameMarket(symbol: TradingSymbol, exchangeSymbol: string): boolean;
}

/**
 * 统一清洗用户输入的交易对字符串。
 */
export function normalizeSymbolInput(symbol: string): string {
  return symbol.trim().toUpperCase().replace(/[/-]/g, "_");
}

/**
 * 解析 BASE_QUOTE 形式的交易对，例如 XRP_THB 或 XRP/THB。
 */
export function parseTradingSymbol(input: string): TradingSymbol {
  const normalized = normalizeSymbolInput(input);
  const parts = normalized.split("_");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`交易对格式应为 BASE_QUOTE: ${input}`);
  }
  return Object.freeze({ id: normalized, base: parts[0], quote: parts[1] });
}
