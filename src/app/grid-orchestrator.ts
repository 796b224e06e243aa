import { describeError } from "../core/errors";
import { GridHealthChecker } from "./health/grid-health-checker";
import { TickDriver, type TickTask } from "./schedulers/tick-driver";
import type { GridRuntime } from "./grid-runtime";

/**
 * 运行编排配置项。
 */
export interface GridOrchestratorOptions {
  /** 交易循环间隔（毫秒） */
  refreshMs: number;
  /** 订单超时（毫秒），用于推导健康检查阈值 */
  orderTimeoutMs: number;
  /** 时钟同步间隔（毫秒） */
  timeSyncIntervalMs: number;
  /** 健康检查间隔（毫秒） */
  healthCheckIntervalMs: number;
}

const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 60000;

/**
 * 网格运行编排器，负责生命周期、健康检查与定时任务调度。
 * 每个交易对一个独立任务，互不阻塞。
 */
export class GridOrchestrator {
  private readonly runtime: GridRuntime;
  private readonly healthChecker: GridHealthChecker;
  private readonly tickDriver: TickDriver;
  private started = false;

  constructor(
    runtime: GridRuntime,
    options: Omit<GridOrchestratorOptions, "healthCheckIntervalMs"> &
      Partial<Pick<GridOrchestratorOptions, "healthCheckIntervalMs">>
  ) {
    this.runtime = runtime;
    const healthCheckIntervalMs = options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;

    this.healthChecker = new GridHealthChecker(runtime, {
      cycleStaleMs: options.refreshMs * 3,
      pendingOrderStaleMs: options.orderTimeoutMs + options.refreshMs * 3,
      clockStaleMs: options.timeSyncIntervalMs * 3,
    });

    const cycleTasks: TickTask[] = runtime.getLoops().map((loop) => ({
      name: `cycle:${loop.symbol}`,
      intervalMs: options.refreshMs,
      run: async (signal) => {
        if (loop.isHalted()) {
          return;
        }
        await loop.runCycle(signal);
      },
      runOnStart: true,
    }));

    this.tickDriver = new TickDriver([
      ...cycleTasks,
      {
        name: "clock-sync",
        intervalMs: options.timeSyncIntervalMs,
        run: () => this.syncClock(),
      },
      {
        name: "health-check",
        intervalMs: healthCheckIntervalMs,
        run: () => this.reportHealth(),
      },
    ]);
  }

  /**
   * 启动运行时并开启调度器。
   */
  public async start(): Promise<void> {
    if (this.started) {
      return;
    }
    await this.runtime.start();
    this.tickDriver.start();
    this.started = true;
  }

  /**
   * 停止调度器（等待进行中的循环结束），再关闭运行时。
   */
  public async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    await this.tickDriver.stop();
    await this.runtime.stop();
    this.started = false;
  }

  private async syncClock(): Promise<void> {
    try {
      await this.runtime.getExchange().syncClock();
    } catch (error) {
      console.warn("服务器时间同步失败", { error: describeError(error) });
    }
  }

  /**
   * 输出健康检查结果，异常时升级为 warn。
   */
  private reportHealth(): void {
    const report = this.healthChecker.check();
    if (report.ok) {
      console.info("健康检查正常", { symbols: report.symbols.length, gate: report.gate });
      return;
    }
    console.warn("健康检查异常", {
      warnings: report.warnings,
      symbols: report.symbols,
      clock: report.clock,
    });
  }
}
