import type { Decimal } from "../../shared/number";
import type { OrderRef, OrderRequest, OrderResult, PriceTick, TradingSymbol } from "./models";
import type { ExchangeSymbolMapper } from "./symbol-mapper";

/**
 * 交易所能力描述，用于运行时选择兼容逻辑。
 */
export interface ExchangeCapabilities {
  /** 是否识别 clientOrderId 并对重复提交去重 */
  supportsIdempotentOrders: boolean;
  /** 是否为模拟撮合 */
  simulated: boolean;
}

/**
 * 交易所客户端接口，屏蔽不同交易所差异。
 * 重试、退避与时钟偏移校正均在实现内部完成，不修改持仓或信号状态。
 */
export interface ExchangeClient {
  readonly name: string;
  readonly capabilities: ExchangeCapabilities;
  readonly symbolMapper: ExchangeSymbolMapper;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** 交易所服务器时间（毫秒） */
  getServerTime(): Promise<number>;
  /** 强制刷新时钟偏移，返回新的偏移量 */
  syncClock(): Promise<number>;
  /** 最新成交价。signal 只取消重试与限流等待 */
  getPrice(symbol: TradingSymbol, signal?: AbortSignal): Promise<PriceTick>;
  /** 资产可用余额 */
  getBalance(asset: string, signal?: AbortSignal): Promise<Decimal>;
  /** 下单不接受取消信号，结果必须等到 */
  placeOrder(order: OrderRequest): Promise<OrderResult>;
  getOrder(symbol: TradingSymbol, ref: OrderRef, signal?: AbortSignal): Promise<OrderResult>;
  cancelOrder(symbol: TradingSymbol, ref: OrderRef): Promise<void>;
  /** 当前时钟偏移（serverTime - localTime）与最近同步时间 */
  getClockStatus(): ClockStatus;
}

/**
 * 时钟同步状态。
 */
export interface ClockStatus {
  offsetMs: number;
  lastSyncAt: number | null;
}
