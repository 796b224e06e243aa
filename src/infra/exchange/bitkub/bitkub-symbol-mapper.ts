import type { ExchangeSymbolMapper } from "../../../core/exchange/symbol-mapper";
import { normalizeSymbolInput } from "../../../core/exchange/symbol-mapper";
import type { TradingSymbol } from "../../../core/exchange/models";

/**
 * Bitkub v3 市场名称为小写 base_quote，例如 xrp_thb。
 */
export const bitkubSymbolMapper: ExchangeSymbolMapper = {
  toExchangeSymbol: (symbol: TradingSymbol) => `${symbol.base}_${symbol.quote}`.toLowerCase(),
  isSameMarket: (symbol: TradingSymbol, exchangeSymbol: string) =>
    normalizeSymbolInput(exchangeSymbol) === symbol.id,
};
