import { loadAppConfig } from "../infra/config/env";
import type { AppConfig } from "../infra/config/schema";
import { createGridRuntime } from "../app/grid-runtime";
import { GridOrchestrator } from "../app/grid-orchestrator";
import type { StateStore } from "../core/ledger/state-store";
import { createDbClient, type DbClient } from "../infra/db";
import { OrderRepository } from "../infra/db/order-repo";
import { SqliteStateStore } from "../infra/db/sqlite-state-store";
import { JsonFileStateStore } from "../infra/state/json-state-store";
import { DbOrderRecorder } from "../services/recorder/order-recorder";

/**
 * 脱敏输出配置，避免日志泄露敏感信息。
 */
function maskConfig(config: AppConfig): Record<string, unknown> {
  const mask = (value: string) => (value ? "***" : "");
  return {
    symbols: config.symbols.map((entry) => ({
      symbol: entry.symbol.id,
      lower: entry.grid.lower.toFixed(),
      upper: entry.grid.upper.toFixed(),
      mode: entry.grid.mode,
      lineCount: entry.grid.lineCount,
      spacing: entry.grid.spacing?.toFixed(),
      notional: entry.sizing.notional.toFixed(),
      minMovePct: entry.hysteresis.minMoveFraction.multipliedBy(100).toFixed(),
    })),
    trading: {
      ...config.trading,
      dryRunQuoteBalance: config.trading.dryRunQuoteBalance.toFixed(),
    },
    exchange: {
      ...config.exchange,
      bitkub: {
        ...config.exchange.bitkub,
        apiKey: mask(config.exchange.bitkub.apiKey),
        apiSecret: mask(config.exchange.bitkub.apiSecret),
      },
    },
    state: config.state,
    db: config.db,
  };
}

/**
 * 按配置选择状态存储后端。
 */
function createStateStore(config: AppConfig, dbClient: DbClient): StateStore {
  if (config.state.backend === "sqlite") {
    return new SqliteStateStore(dbClient.db);
  }
  return new JsonFileStateStore(config.state.dir);
}

/**
 * 启动网格应用，负责配置加载与运行时装配。
 */
export async function startGridApp(): Promise<void> {
  const config = loadAppConfig();
  console.info("配置加载成功", maskConfig(config));
  const dbClient = createDbClient(config.db);
  const orderRecorder = new DbOrderRecorder(new OrderRepository(dbClient.db));
  const store = createStateStore(config, dbClient);
  const runtime = createGridRuntime(config, store, orderRecorder);
  const orchestrator = new GridOrchestrator(runtime, {
    refreshMs: config.trading.refreshMs,
    orderTimeoutMs: config.trading.orderTimeoutMs,
    timeSyncIntervalMs: config.exchange.timeSyncIntervalMs,
  });
  registerProcessHooks(async (reason) => {
    await shutdownApp(orchestrator, dbClient, reason);
  });
  await orchestrator.start();
  console.info("交易所接入完成", {
    exchange: runtime.getExchange().name,
    dryRun: config.trading.dryRun,
    stateBackend: store.kind,
    symbols: config.symbols.map((entry) => entry.symbol.id),
  });
}

/**
 * 统一处理进程退出流程，确保资源释放与日志输出。
 */
async function shutdownApp(
  orchestrator: GridOrchestrator,
  dbClient: DbClient,
  reason: ShutdownReason
): Promise<void> {
  if (reason.error) {
    console.error("运行异常，即将退出", reason.error);
  } else {
    console.info("收到退出信号，准备退出", { reason: reason.reason });
  }
  try {
    await orchestrator.stop();
  } catch (error) {
    console.error("停止运行编排失败", error);
  }
  try {
    dbClient.sqlite.close();
  } catch (error) {
    console.warn("关闭数据库失败", error);
  }
  console.info("退出流程完成");
  process.exit(reason.error ? 1 : 0);
}

/**
 * 注册进程信号与异常处理入口。
 */
function registerProcessHooks(onShutdown: (reason: ShutdownReason) => Promise<void>): void {
  let shuttingDown = false;
  const runOnce = (reason: ShutdownReason) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    void onShutdown(reason);
  };
  process.once("SIGINT", () => runOnce({ reason: "SIGINT" }));
  process.once("SIGTERM", () => runOnce({ reason: "SIGTERM" }));
  process.once("uncaughtException", (error) => runOnce({ reason: "uncaughtException", error }));
  process.once("unhandledRejection", (error) => runOnce({ reason: "unhandledRejection", error }));
}

/**
 * 退出原因描述，便于统一日志输出。
 */
type ShutdownReason = {
  reason: string;
  error?: unknown;
};
