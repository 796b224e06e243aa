import type { Decimal } from "../../shared/number";
import type { OrderSide, OrderStatus } from "../exchange/models";
import type { HysteresisState } from "../grid/types";
import type { Position } from "./types";

/**
 * 已提交但尚未得出最终结果的订单。
 */
export interface PendingOrderRecord {
  clientOrderId: string;
  exchangeOrderId?: string;
  side: OrderSide;
  /** 限价 */
  price: Decimal;
  quantity: Decimal;
  quoteAmount?: Decimal;
  status: OrderStatus;
  /** 触发该订单的观察价 */
  decisionPrice: Decimal;
  /** 触发该订单时观察价所在档位 */
  decisionBand: number;
  placedAt: number;
}

/**
 * 每个交易对一条的持久化记录：持仓、信号状态与未决订单。
 */
export interface SymbolStateRecord {
  symbol: string;
  position: Position;
  hysteresis: HysteresisState;
  lastTradeAt: number | null;
  pendingOrder: PendingOrderRecord | null;
  /** 最近已记账的幂等令牌，用于拒绝重复成交 */
  appliedOrderIds: string[];
  updatedAt: number;
}

/**
 * 状态存储接口。save 返回即表示已落盘，且写入对进程崩溃是原子的。
 */
export interface StateStore {
  readonly kind: string;
  load(symbol: string): Promise<SymbolStateRecord | null>;
  save(record: SymbolStateRecord): Promise<void>;
}
