import type { GridRuntime } from "../grid-runtime";

/**
 * 健康检查阈值配置。
 */
export interface GridHealthThresholds {
  /** 交易循环过期阈值 */
  cycleStaleMs: number;
  /** 未决订单过期阈值 */
  pendingOrderStaleMs: number;
  /** 时钟偏移过期阈值 */
  clockStaleMs: number;
}

/**
 * 单个交易对的健康状态。
 */
export interface SymbolHealth {
  symbol: string;
  lastCycleAt: number | null;
  cycleAgeMs: number | null;
  lastOutcome: string | null;
  halted: boolean;
  haltReason: string | null;
  pendingOrder: { clientOrderId: string; status: string; ageMs: number } | null;
}

/**
 * 健康检查输出结构。
 */
export interface GridHealthReport {
  ok: boolean;
  now: number;
  warnings: string[];
  symbols: SymbolHealth[];
  clock: {
    offsetMs: number;
    lastSyncAt: number | null;
    syncAgeMs: number | null;
  };
  gate: { active: number; queued: number };
}

const DEFAULT_THRESHOLDS: GridHealthThresholds = {
  cycleStaleMs: 180000,
  pendingOrderStaleMs: 360000,
  clockStaleMs: 900000,
};

/**
 * 网格运行健康检查器，输出关键状态与告警提示。
 */
export class GridHealthChecker {
  private readonly runtime: GridRuntime;
  private readonly thresholds: GridHealthThresholds;
  private readonly now: () => number;

  constructor(
    runtime: GridRuntime,
    thresholds?: Partial<GridHealthThresholds>,
    now: () => number = Date.now
  ) {
    this.runtime = runtime;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.now = now;
  }

  /**
   * 获取当前健康检查报告。
   */
  public check(): GridHealthReport {
    const now = this.now();
    const warnings: string[] = [];
    const symbols = this.runtime.getLoops().map((loop): SymbolHealth => {
      const status = loop.getStatus();
      const cycleAgeMs = ageFrom(now, status.lastCycleAt);
      if (status.halted) {
        warnings.push(`${status.symbol} 已停止交易: ${status.halted.reason}`);
      }
      if (cycleAgeMs !== null && cycleAgeMs > this.thresholds.cycleStaleMs) {
        warnings.push(`${status.symbol} 交易循环延迟: ${cycleAgeMs}ms`);
      }
      const pending = status.pendingOrder;
      const pendingAgeMs = pending ? Math.max(0, now - pending.placedAt) : null;
      if (pending && pendingAgeMs !== null && pendingAgeMs > this.thresholds.pendingOrderStaleMs) {
        warnings.push(`${status.symbol} 订单长时间未完成: ${pending.clientOrderId}`);
      }
      return {
        symbol: status.symbol,
        lastCycleAt: status.lastCycleAt,
        cycleAgeMs,
        lastOutcome: status.lastOutcome,
        halted: status.halted !== null,
        haltReason: status.halted?.reason ?? null,
        pendingOrder:
          pending && pendingAgeMs !== null
            ? { clientOrderId: pending.clientOrderId, status: pending.status, ageMs: pendingAgeMs }
            : null,
      };
    });

    const exchange = this.runtime.getExchange();
    const clock = exchange.getClockStatus();
    const syncAgeMs = ageFrom(now, clock.lastSyncAt);
    if (!exchange.capabilities.simulated) {
      if (syncAgeMs === null) {
        warnings.push("尚未同步服务器时间");
      } else if (syncAgeMs > this.thresholds.clockStaleMs) {
        warnings.push(`服务器时间同步过期: ${syncAgeMs}ms`);
      }
    }

    return {
      ok: warnings.length === 0,
      now,
      warnings,
      symbols,
      clock: { offsetMs: clock.offsetMs, lastSyncAt: clock.lastSyncAt, syncAgeMs },
      gate: this.runtime.getGate().getLoad(),
    };
  }
}

/**
 * 统一计算时间差，缺失时返回 null。
 */
function ageFrom(now: number, ts: number | null): number | null {
  if (ts === null) {
    return null;
  }
  return Math.max(0, now - ts);
}
