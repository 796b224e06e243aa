import { randomUUID } from "node:crypto";
import type { ExchangeClient } from "../../core/exchange/adapter";
import type { OrderRef, OrderRequest, OrderResult } from "../../core/exchange/models";
import { isSkippedPlan, planOrder } from "../../core/exchange/order-sizing";
import { hasExecutedQuantity, isTerminalOrderStatus } from "../../core/exchange/order-status";
import {
  AuthClockSkewError,
  describeError,
  isFatalForSymbol,
  OrderRejectedError,
  RateLimitedError,
  TransientNetworkError,
} from "../../core/errors";
import { decide, stateAfterFill } from "../../core/grid/hysteresis";
import { buildGridLadder, minStepPct } from "../../core/grid/ladder";
import type { Decision, GridLadder } from "../../core/grid/types";
import type { PendingOrderRecord } from "../../core/ledger/state-store";
import type { Fill, Position } from "../../core/ledger/types";
import type { SymbolConfig, TradingConfig } from "../../infra/config/schema";
import { isAbortError } from "../../shared/async";
import type { Decimal } from "../../shared/number";
import type { PositionLedger } from "../ledger/position-ledger";
import type { OrderRecorder } from "../recorder/order-recorder";

/**
 * 单轮循环的结果类型。
 */
export type CycleOutcome =
  | "HALTED"
  | "STALE_TICK"
  | "COOLDOWN"
  | "HOLD"
  | "SKIPPED"
  | "PENDING"
  | "FILLED"
  | "REJECTED"
  | "CANCELLED"
  | "FAILED"
  | "ABORTED";

/**
 * 单轮循环报告，供日志、健康检查与回测使用。
 */
export interface CycleReport {
  symbol: string;
  outcome: CycleOutcome;
  at: number;
  price?: Decimal;
  decision?: Decision;
  fill?: Fill & { clientOrderId: string };
  position?: Position;
  reason?: string;
}

/**
 * 交易对运行状态。
 */
export interface TradeLoopStatus {
  symbol: string;
  lastCycleAt: number | null;
  lastOutcome: CycleOutcome | null;
  lastPrice: Decimal | null;
  halted: { reason: string; at: number } | null;
  pendingOrder: PendingOrderRecord | null;
}

export interface TradeLoopOptions {
  config: SymbolConfig;
  trading: Pick<TradingConfig, "cooldownMs" | "orderTimeoutMs">;
  exchange: ExchangeClient;
  ledger: PositionLedger;
  recorder?: OrderRecorder;
  now?: () => number;
  /** 幂等令牌生成器 */
  newOrderId?: () => string;
}

/**
 * 单个交易对的交易循环：取价 → 决策 → 下单 → 成交后更新信号状态与持仓。
 * 同一交易对的步骤严格串行；持久化或账本一致性错误会停止该交易对，其余错误等待下一轮。
 */
export class TradeLoop {
  public readonly symbol: string;
  private readonly config: SymbolConfig;
  private readonly trading: Pick<TradingConfig, "cooldownMs" | "orderTimeoutMs">;
  private readonly exchange: ExchangeClient;
  private readonly ledger: PositionLedger;
  private readonly recorder?: OrderRecorder;
  private readonly now: () => number;
  private readonly newOrderId: () => string;
  private readonly ladder: GridLadder;

  private lastTickTs: number | null = null;
  private lastPrice: Decimal | null = null;
  private lastCycleAt: number | null = null;
  private lastOutcome: CycleOutcome | null = null;
  private halted: { reason: string; at: number } | null = null;
  private initialized = false;

  constructor(options: TradeLoopOptions) {
    this.config = options.config;
    this.symbol = options.config.symbol.id;
    this.trading = options.trading;
    this.exchange = options.exchange;
    this.ledger = options.ledger;
    this.recorder = options.recorder;
    this.now = options.now ?? Date.now;
    this.newOrderId = options.newOrderId ?? randomUUID;
    this.ladder = buildGridLadder(options.config.grid);
  }

  /**
   * 加载持久化状态并输出网格概览。
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.ledger.load(this.symbol);
    this.logGridSummary();
    this.initialized = true;
  }

  /**
   * 启动时加载状态。致命错误只停止该交易对，其余错误留待首轮循环重试；返回是否加载成功。
   */
  public async start(): Promise<boolean> {
    try {
      await this.initialize();
      return true;
    } catch (error) {
      if (isFatalForSymbol(error)) {
        this.halt(error);
      } else {
        console.warn("加载交易对状态失败，下一轮重试", {
          symbol: this.symbol,
          error: describeError(error),
        });
      }
      return false;
    }
  }

  public isHalted(): boolean {
    return this.halted !== null;
  }

  public getStatus(): TradeLoopStatus {
    return {
      symbol: this.symbol,
      lastCycleAt: this.lastCycleAt,
      lastOutcome: this.lastOutcome,
      lastPrice: this.lastPrice,
      halted: this.halted ? { ...this.halted } : null,
      pendingOrder: this.initialized ? this.ledger.getPendingOrder(this.symbol) : null,
    };
  }

  /**
   * 执行一轮循环，不向外抛出非致命错误。
   * signal 触发时放弃行情与查询的等待；已发出的下单请求仍等待结果。
   */
  public async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    if (this.halted) {
      return this.report({ outcome: "HALTED", reason: this.halted.reason });
    }
    try {
      await this.initialize();
      return this.report(await this.cycle(signal));
    } catch (error) {
      if (isAbortError(error)) {
        console.info("交易循环已取消", { symbol: this.symbol });
        return this.report({ outcome: "ABORTED" });
      }
      if (isFatalForSymbol(error)) {
        this.halt(error);
        return this.report({ outcome: "HALTED", reason: describeError(error) });
      }
      console.warn("交易循环异常，等待下一轮", {
        symbol: this.symbol,
        error: describeError(error),
      });
      return this.report({ outcome: "FAILED", reason: describeError(error) });
    }
  }

  /**
   * 停机前确认未决订单的结果：已进入终态则记账，否则保留在持久化记录中，重启后继续跟踪。
   */
  public async drainPendingOrder(): Promise<CycleReport | null> {
    if (!this.initialized || this.halted) {
      return null;
    }
    const pending = this.ledger.getPendingOrder(this.symbol);
    if (!pending?.exchangeOrderId) {
      return null;
    }
    try {
      const result = await this.exchange.getOrder(this.config.symbol, toOrderRef(pending));
      if (!isTerminalOrderStatus(result.status)) {
        console.warn("停机时订单仍未完成，重启后继续跟踪", {
          symbol: this.symbol,
          clientOrderId: pending.clientOrderId,
          status: result.status,
        });
        return null;
      }
      return this.report(await this.handleResult(pending, result));
    } catch (error) {
      if (isFatalForSymbol(error)) {
        this.halt(error);
      }
      console.warn("停机前确认订单失败", { symbol: this.symbol, error: describeError(error) });
      return null;
    }
  }

  private async cycle(signal?: AbortSignal): Promise<Omit<CycleReport, "symbol" | "at">> {
    const pending = this.ledger.getPendingOrder(this.symbol);
    if (pending) {
      return this.settlePendingOrder(pending, signal);
    }

    const tick = await this.exchange.getPrice(this.config.symbol, signal);
    if (this.lastTickTs !== null && tick.ts < this.lastTickTs) {
      console.warn("行情时间戳倒退，忽略本轮", {
        symbol: this.symbol,
        ts: tick.ts,
        lastTs: this.lastTickTs,
      });
      return { outcome: "STALE_TICK", price: tick.price };
    }
    this.lastTickTs = tick.ts;
    this.lastPrice = tick.price;
    const price = tick.price;

    const lastTradeAt = this.ledger.getLastTradeAt(this.symbol);
    if (
      this.trading.cooldownMs > 0 &&
      lastTradeAt !== null &&
      this.now() - lastTradeAt < this.trading.cooldownMs
    ) {
      return { outcome: "COOLDOWN", price };
    }

    const decision = decide(
      this.ledger.getHysteresis(this.symbol),
      price,
      this.ladder,
      this.config.hysteresis
    );
    console.info("网格决策", {
      symbol: this.symbol,
      price: price.toFixed(),
      action: decision.action,
      band: decision.band,
      previousBand: decision.previousBand,
      movePct: decision.movePct?.multipliedBy(100).toFixed(4) ?? null,
      holdReason: decision.holdReason,
    });
    if (decision.action === "HOLD") {
      return { outcome: "HOLD", price, decision, reason: decision.holdReason };
    }

    const position = this.ledger.getPosition(this.symbol);
    const plan = planOrder(decision.action, price, position.quantity, this.config.sizing);
    if (isSkippedPlan(plan)) {
      console.warn("信号无法下单，跳过", {
        symbol: this.symbol,
        action: decision.action,
        reason: plan.skip,
      });
      return { outcome: "SKIPPED", price, decision, reason: plan.skip };
    }

    if (plan.side === "BUY" && plan.quoteAmount) {
      const available = await this.exchange.getBalance(this.config.symbol.quote, signal);
      if (available.lt(plan.quoteAmount)) {
        console.warn("计价币余额不足，跳过买入", {
          symbol: this.symbol,
          available: available.toFixed(),
          required: plan.quoteAmount.toFixed(),
        });
        return { outcome: "SKIPPED", price, decision, reason: "INSUFFICIENT_BALANCE" };
      }
    }

    const order: PendingOrderRecord = {
      clientOrderId: this.newOrderId(),
      side: plan.side,
      price: plan.price,
      quantity: plan.quantity,
      quoteAmount: plan.quoteAmount,
      status: "NEW",
      decisionPrice: price,
      decisionBand: decision.band,
      placedAt: this.now(),
    };
    // 先落盘再提交，崩溃后以同一令牌重新提交
    await this.ledger.setPendingOrder(this.symbol, order);
    await this.record(order, { status: "NEW", updatedAt: order.placedAt }, decision.band);
    return { ...(await this.submit(order, signal)), price, decision };
  }

  /**
   * 处理上一轮遗留的订单：未确认的重新提交，已确认的查询结果，超时则撤单。
   */
  private async settlePendingOrder(
    pending: PendingOrderRecord,
    signal?: AbortSignal
  ): Promise<Omit<CycleReport, "symbol" | "at">> {
    if (!pending.exchangeOrderId) {
      console.info("以相同令牌重新提交未确认的订单", {
        symbol: this.symbol,
        clientOrderId: pending.clientOrderId,
      });
      return this.submit(pending, signal);
    }
    const ref = toOrderRef(pending);
    let result = await this.exchange.getOrder(this.config.symbol, ref, signal);
    const ageMs = this.now() - pending.placedAt;
    if (!isTerminalOrderStatus(result.status) && ageMs >= this.trading.orderTimeoutMs) {
      console.warn("订单超时未完成，撤单", {
        symbol: this.symbol,
        clientOrderId: pending.clientOrderId,
        ageMs,
      });
      await this.exchange.cancelOrder(this.config.symbol, ref);
      result = await this.exchange.getOrder(this.config.symbol, ref);
      if (!isTerminalOrderStatus(result.status)) {
        result = { ...result, status: "CANCELLED", statusReason: "撤单后交易所尚未更新状态" };
      }
    }
    return this.handleResult(pending, result);
  }

  /**
   * 提交订单。瞬时错误在重试耗尽后保留未决订单，下一轮以同一令牌重新提交；拒单与签名错误直接结束订单。
   */
  private async submit(
    pending: PendingOrderRecord,
    signal?: AbortSignal
  ): Promise<Omit<CycleReport, "symbol" | "at">> {
    let result: OrderResult;
    try {
      result = await this.exchange.placeOrder(this.toOrderRequest(pending));
    } catch (error) {
      // 校正时钟后签名仍被拒绝，视为不可恢复
      if (error instanceof OrderRejectedError || error instanceof AuthClockSkewError) {
        return this.finishWithoutFill(pending, {
          status: "REJECTED",
          statusReason: error.message,
          updatedAt: this.now(),
        });
      }
      if (error instanceof TransientNetworkError || error instanceof RateLimitedError) {
        console.warn("下单结果未知，保留订单待下一轮重新提交", {
          symbol: this.symbol,
          clientOrderId: pending.clientOrderId,
          error: describeError(error),
        });
        return { outcome: "PENDING", reason: describeError(error) };
      }
      throw error;
    }

    if (isTerminalOrderStatus(result.status) || !result.exchangeOrderId) {
      return this.handleResult(pending, result);
    }
    // 已受理未成交：先记下交易所编号，再立即确认一次
    const submitted: PendingOrderRecord = {
      ...pending,
      exchangeOrderId: result.exchangeOrderId,
      status: result.status,
    };
    await this.ledger.setPendingOrder(this.symbol, submitted);
    await this.record(submitted, result);
    try {
      const confirmed = await this.exchange.getOrder(
        this.config.symbol,
        toOrderRef(submitted),
        signal
      );
      return this.handleResult(submitted, confirmed);
    } catch (error) {
      if (isFatalForSymbol(error) || isAbortError(error)) {
        throw error;
      }
      console.warn("订单已提交，确认失败，下一轮继续查询", {
        symbol: this.symbol,
        clientOrderId: submitted.clientOrderId,
        error: describeError(error),
      });
      return { outcome: "PENDING", reason: describeError(error) };
    }
  }

  /**
   * 根据订单结果更新状态：有成交即记账并以下单时的观察价与档位更新信号状态；终态无成交清除订单；否则继续等待。
   */
  private async handleResult(
    pending: PendingOrderRecord,
    result: OrderResult
  ): Promise<Omit<CycleReport, "symbol" | "at">> {
    if (hasExecutedQuantity(result)) {
      return this.applyExecution(pending, result);
    }
    if (isTerminalOrderStatus(result.status)) {
      return this.finishWithoutFill(pending, result);
    }

    const updated: PendingOrderRecord = {
      ...pending,
      exchangeOrderId: result.exchangeOrderId ?? pending.exchangeOrderId,
      status: result.status,
    };
    if (updated.status !== pending.status || updated.exchangeOrderId !== pending.exchangeOrderId) {
      await this.ledger.setPendingOrder(this.symbol, updated);
      await this.record(updated, result);
    }
    console.info("订单未完成，等待下一轮", {
      symbol: this.symbol,
      clientOrderId: pending.clientOrderId,
      status: result.status,
      filledQuantity: result.filledQuantity.toFixed(),
    });
    return { outcome: "PENDING", reason: result.status };
  }

  private async applyExecution(
    pending: PendingOrderRecord,
    result: OrderResult
  ): Promise<Omit<CycleReport, "symbol" | "at">> {
    await this.record(pending, result);
    const fillPrice = result.averageFillPrice ?? pending.price;
    const fill = {
      side: pending.side,
      quantity: result.filledQuantity,
      price: fillPrice,
      clientOrderId: pending.clientOrderId,
    };
    if (this.ledger.isApplied(this.symbol, pending.clientOrderId)) {
      console.warn("成交已记账，仅清除未决订单", {
        symbol: this.symbol,
        clientOrderId: pending.clientOrderId,
      });
      await this.ledger.setPendingOrder(this.symbol, null);
      return { outcome: "FILLED", fill, position: this.ledger.getPosition(this.symbol) };
    }
    const position = await this.ledger.applyFill(
      this.symbol,
      pending.side,
      result.filledQuantity,
      fillPrice,
      {
        clientOrderId: pending.clientOrderId,
        hysteresis: stateAfterFill({ price: pending.decisionPrice, band: pending.decisionBand }),
        tradedAt: result.updatedAt,
        clearPendingOrder: true,
      }
    );
    return {
      outcome: "FILLED",
      fill,
      position,
      reason: result.status === "FILLED" ? undefined : `部分成交后${result.status}`,
    };
  }

  private async finishWithoutFill(
    pending: PendingOrderRecord,
    result: Pick<OrderResult, "status" | "statusReason" | "updatedAt">
  ): Promise<Omit<CycleReport, "symbol" | "at">> {
    await this.ledger.setPendingOrder(this.symbol, null);
    await this.record(pending, result);
    console.warn("订单未成交，状态保持不变", {
      symbol: this.symbol,
      clientOrderId: pending.clientOrderId,
      status: result.status,
      reason: result.statusReason,
    });
    return {
      outcome: result.status === "REJECTED" ? "REJECTED" : "CANCELLED",
      reason: result.statusReason,
    };
  }

  private toOrderRequest(pending: PendingOrderRecord): OrderRequest {
    return {
      clientOrderId: pending.clientOrderId,
      symbol: this.config.symbol,
      side: pending.side,
      type: "LIMIT",
      price: pending.price,
      quantity: pending.quantity,
      quoteAmount: pending.quoteAmount,
    };
  }

  /**
   * 写入订单流水，失败只记录日志。
   */
  private async record(
    pending: PendingOrderRecord,
    result: Pick<OrderResult, "status" | "updatedAt"> & Partial<OrderResult>,
    gridBand?: number
  ): Promise<void> {
    if (!this.recorder) {
      return;
    }
    try {
      await this.recorder.recordOrder({
        exchange: this.exchange.name,
        symbol: this.symbol,
        exchangeSymbol: this.exchange.symbolMapper.toExchangeSymbol(this.config.symbol),
        clientOrderId: pending.clientOrderId,
        exchangeOrderId: result.exchangeOrderId ?? pending.exchangeOrderId,
        side: pending.side,
        orderType: "LIMIT",
        price: pending.price,
        quantity: pending.quantity,
        quoteAmount: pending.quoteAmount,
        filledQuantity: result.filledQuantity,
        avgFillPrice: result.averageFillPrice,
        status: result.status,
        statusReason: result.statusReason,
        decisionPrice: pending.decisionPrice,
        gridBand,
        placedAt: pending.placedAt,
        exchangeUpdatedAt: result.updatedAt,
      });
    } catch (error) {
      console.warn("订单流水写入失败", {
        symbol: this.symbol,
        clientOrderId: pending.clientOrderId,
        error: describeError(error),
      });
    }
  }

  private halt(error: unknown): void {
    this.halted = { reason: describeError(error), at: this.now() };
    console.error("交易对已停止交易", { symbol: this.symbol, error: describeError(error) });
  }

  private report(partial: Omit<CycleReport, "symbol" | "at">): CycleReport {
    const at = this.now();
    this.lastCycleAt = at;
    this.lastOutcome = partial.outcome;
    return { symbol: this.symbol, at, ...partial };
  }

  /**
   * 启动时输出网格范围与单格收益估算（最小格距 − 双边手续费），不为正时告警。
   */
  private logGridSummary(): void {
    const stepPct = minStepPct(this.ladder);
    const feePct = this.config.sizing.feeRate.multipliedBy(100);
    const estimatePct = stepPct.minus(feePct.multipliedBy(2));
    const summary = {
      symbol: this.symbol,
      lower: this.ladder.lines[0]?.toFixed(),
      upper: this.ladder.lines[this.ladder.lines.length - 1]?.toFixed(),
      lines: this.ladder.lines.length,
      minStepPct: stepPct.toFixed(4),
      estimatedProfitPct: estimatePct.toFixed(4),
      notional: this.config.sizing.notional.toFixed(),
      minMovePct: this.config.hysteresis.minMoveFraction.multipliedBy(100).toFixed(),
    };
    if (estimatePct.lte(0)) {
      console.warn("单格收益估算不为正，网格过密或手续费过高", summary);
      return;
    }
    console.info("网格已就绪", summary);
  }
}

function toOrderRef(pending: PendingOrderRecord): OrderRef {
  return {
    clientOrderId: pending.clientOrderId,
    exchangeOrderId: pending.exchangeOrderId,
    side: pending.side,
  };
}

