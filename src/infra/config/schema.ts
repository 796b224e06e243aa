import type { Decimal } from "../../shared/number";
import type { TradingSymbol } from "../../core/exchange/models";
import type { OrderSizingConfig } from "../../core/exchange/order-sizing";
import type { GridConfig, HysteresisConfig } from "../../core/grid/types";

/**
 * 支持的交易所名称。
 */
export type ExchangeName = "bitkub";

/**
 * 状态存储后端：每个交易对一个 JSON 文件，或 SQLite 单表。
 */
export type StateBackend = "json" | "sqlite";

/**
 * 单个交易对的完整配置，启动后不可变。
 */
export interface SymbolConfig {
  symbol: TradingSymbol;
  grid: GridConfig;
  hysteresis: HysteresisConfig;
  sizing: OrderSizingConfig;
}

/**
 * 交易循环配置。
 */
export interface TradingConfig {
  /** 循环间隔（毫秒） */
  refreshMs: number;
  /** 成交后的冷却时间（毫秒），0 表示不限制 */
  cooldownMs: number;
  /** 挂单超时撤单（毫秒） */
  orderTimeoutMs: number;
  /** 是否使用模拟撮合 */
  dryRun: boolean;
  /** 模拟撮合的初始计价币余额 */
  dryRunQuoteBalance: Decimal;
}

/**
 * Bitkub 账户配置。
 */
export interface BitkubConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
}

/**
 * 重试参数。
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * 交易所配置。
 */
export interface ExchangeConfig {
  name: ExchangeName;
  bitkub: BitkubConfig;
  /** 单次 HTTP 请求超时，与重试次数相互独立 */
  httpTimeoutMs: number;
  /** 所有交易对共享的请求并发上限 */
  maxConcurrency: number;
  /** 时钟偏移刷新周期（毫秒） */
  timeSyncIntervalMs: number;
  retry: RetryConfig;
}

/**
 * 状态存储配置。
 */
export interface StateConfig {
  backend: StateBackend;
  /** JSON 后端的目录 */
  dir: string;
}

/**
 * 数据库配置。
 */
export interface DbConfig {
  /** SQLite 文件路径 */
  path: string;
}

/**
 * 应用总配置。
 */
export interface AppConfig {
  symbols: SymbolConfig[];
  trading: TradingConfig;
  exchange: ExchangeConfig;
  state: StateConfig;
  db: DbConfig;
}
