import { PersistenceError } from "../../core/errors";
import type { OrderSide } from "../../core/exchange/models";
import { initialHysteresisState } from "../../core/grid/hysteresis";
import type { HysteresisState } from "../../core/grid/types";
import { applyFillToPosition, emptyPosition } from "../../core/ledger/position";
import type {
  PendingOrderRecord,
  StateStore,
  SymbolStateRecord,
} from "../../core/ledger/state-store";
import type { Position } from "../../core/ledger/types";
import { APPLIED_ORDER_ID_LIMIT } from "../../infra/state/state-codec";
import { KeyedMutex } from "../../shared/concurrency";
import type { Decimal } from "../../shared/number";

/**
 * 记账附加参数。
 */
export interface ApplyFillOptions {
  /** 幂等令牌，已记账的令牌不会重复记账 */
  clientOrderId?: string;
  /** 与持仓同一次落盘的信号状态 */
  hysteresis?: HysteresisState;
  /** 成交时间，用于冷却判断 */
  tradedAt?: number;
  /** 同时清除未决订单 */
  clearPendingOrder?: boolean;
}

/**
 * 持仓账本：维护每个交易对的持久化记录。
 * 每次变更先落盘再更新内存并返回；同一交易对的变更串行执行，不同交易对互不影响。
 */
export class PositionLedger {
  private readonly store: StateStore;
  private readonly now: () => number;
  private readonly mutex = new KeyedMutex();
  private readonly records = new Map<string, SymbolStateRecord>();

  constructor(store: StateStore, now: () => number = Date.now) {
    this.store = store;
    this.now = now;
  }

  /**
   * 加载交易对记录，不存在时以空仓初始化（不立即落盘）。
   */
  public async load(symbol: string): Promise<SymbolStateRecord> {
    return this.mutex.runExclusive(symbol, async () => {
      const stored = await this.store.load(symbol);
      const record = stored ?? this.freshRecord(symbol);
      this.records.set(symbol, record);
      if (stored) {
        console.info("持仓记录已加载", describeRecord(record));
      } else {
        console.info("未找到持仓记录，按空仓启动", { symbol });
      }
      return cloneRecord(record);
    });
  }

  /**
   * 当前持仓快照。
   */
  public getPosition(symbol: string): Position {
    return { ...this.requireRecord(symbol).position };
  }

  /**
   * 当前信号状态快照。
   */
  public getHysteresis(symbol: string): HysteresisState {
    return { ...this.requireRecord(symbol).hysteresis };
  }

  public getPendingOrder(symbol: string): PendingOrderRecord | null {
    const pending = this.requireRecord(symbol).pendingOrder;
    return pending ? { ...pending } : null;
  }

  public getLastTradeAt(symbol: string): number | null {
    return this.requireRecord(symbol).lastTradeAt;
  }

  /**
   * 完整记录快照，供健康检查与测试使用。
   */
  public getRecord(symbol: string): SymbolStateRecord {
    return cloneRecord(this.requireRecord(symbol));
  }

  /**
   * 幂等令牌是否已记账。
   */
  public isApplied(symbol: string, clientOrderId: string): boolean {
    return this.requireRecord(symbol).appliedOrderIds.includes(clientOrderId);
  }

  /**
   * 记入一笔成交并落盘后返回新持仓。
   * 卖出超过持仓时抛出 InsufficientPositionError；落盘失败抛出 PersistenceError 且内存状态不变。
   */
  public async applyFill(
    symbol: string,
    side: OrderSide,
    quantity: Decimal,
    price: Decimal,
    options: ApplyFillOptions = {}
  ): Promise<Position> {
    return this.mutex.runExclusive(symbol, async () => {
      const current = this.requireRecord(symbol);
      const { clientOrderId } = options;
      if (clientOrderId && current.appliedOrderIds.includes(clientOrderId)) {
        console.warn("成交已记账，忽略重复记账", { symbol, clientOrderId });
        return { ...current.position };
      }
      const position = applyFillToPosition(current.position, { side, quantity, price });
      const appliedOrderIds = clientOrderId
        ? [...current.appliedOrderIds, clientOrderId].slice(-APPLIED_ORDER_ID_LIMIT)
        : current.appliedOrderIds;
      const next: SymbolStateRecord = {
        ...current,
        position,
        hysteresis: options.hysteresis ?? current.hysteresis,
        lastTradeAt: options.tradedAt ?? current.lastTradeAt,
        pendingOrder: options.clearPendingOrder ? null : current.pendingOrder,
        appliedOrderIds,
        updatedAt: this.now(),
      };
      await this.commit(next);
      console.info("成交已记账", {
        symbol,
        side,
        quantity: quantity.toFixed(),
        price: price.toFixed(),
        clientOrderId,
        ...describePosition(position),
      });
      return { ...position };
    });
  }

  /**
   * 保存或清除未决订单。
   */
  public async setPendingOrder(symbol: string, order: PendingOrderRecord | null): Promise<void> {
    await this.mutex.runExclusive(symbol, async () => {
      const current = this.requireRecord(symbol);
      await this.commit({ ...current, pendingOrder: order, updatedAt: this.now() });
    });
  }

  /**
   * 先落盘，成功后才替换内存记录。
   */
  private async commit(next: SymbolStateRecord): Promise<void> {
    try {
      await this.store.save(next);
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`持仓记录落盘失败: ${next.symbol}`, { cause: error });
    }
    this.records.set(next.symbol, next);
  }

  private requireRecord(symbol: string): SymbolStateRecord {
    const record = this.records.get(symbol);
    if (!record) {
      throw new Error(`交易对 ${symbol} 的持仓记录尚未加载`);
    }
    return record;
  }

  private freshRecord(symbol: string): SymbolStateRecord {
    return {
      symbol,
      position: emptyPosition(),
      hysteresis: initialHysteresisState(),
      lastTradeAt: null,
      pendingOrder: null,
      appliedOrderIds: [],
      updatedAt: this.now(),
    };
  }
}

function cloneRecord(record: SymbolStateRecord): SymbolStateRecord {
  return {
    ...record,
    position: { ...record.position },
    hysteresis: { ...record.hysteresis },
    pendingOrder: record.pendingOrder ? { ...record.pendingOrder } : null,
    appliedOrderIds: [...record.appliedOrderIds],
  };
}

/**
 * 持仓日志字段。
 */
export function describePosition(position: Position): Record<string, string | null> {
  return {
    quantity: position.quantity.toFixed(),
    averageCost: position.averageCost?.toFixed() ?? null,
    realizedPnl: position.realizedPnl.toFixed(),
  };
}

function describeRecord(record: SymbolStateRecord): Record<string, unknown> {
  return {
    symbol: record.symbol,
    ...describePosition(record.position),
    lastTradePrice: record.hysteresis.lastTradePrice?.toFixed() ?? null,
    currentBand: record.hysteresis.currentBand,
    pendingOrder: record.pendingOrder?.clientOrderId ?? null,
  };
}
