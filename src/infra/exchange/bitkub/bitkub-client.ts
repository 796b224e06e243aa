import type { ClockStatus, ExchangeCapabilities, ExchangeClient } from "../../../core/exchange/adapter";
import type {
  OrderRef,
  OrderRequest,
  OrderResult,
  PriceTick,
  TradingSymbol,
} from "../../../core/exchange/models";
import { ExchangeRequestError, OrderRejectedError } from "../../../core/errors";
import { RetryPolicy } from "../../../core/retry/retry-policy";
import type { SleepFn } from "../../../shared/async";
import type { RequestGate } from "../../../shared/concurrency";
import { Decimal } from "../../../shared/number";
import type { ExchangeConfig } from "../../config/schema";
import { ClockOffsetTracker } from "../clock-offset";
import { RateLimitGuard } from "../rate-limit";
import { BitkubHttpClient, type FetchFn } from "./bitkub-http";
import {
  balancesResultSchema,
  cancelResultSchema,
  orderInfoSchema,
  placeOrderResultSchema,
  tradeEntrySchema,
  tradesResultSchema,
  type BitkubOrderInfo,
  type BitkubTrade,
} from "./bitkub-schemas";
import { bitkubSymbolMapper } from "./bitkub-symbol-mapper";
import { normalizeOrderStatus, toBitkubSide, toMillis } from "./bitkub-utils";

const TRADES_LIMIT = 10;

export interface BitkubClientOptions {
  config: ExchangeConfig;
  /** 所有交易对共享的请求闸门 */
  gate: RequestGate;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
  rateLimit?: RateLimitGuard;
}

/**
 * Bitkub v3 交易所客户端。
 */
export class BitkubExchangeClient implements ExchangeClient {
  public readonly name = "bitkub";
  public readonly capabilities: ExchangeCapabilities = {
    supportsIdempotentOrders: true,
    simulated: false,
  };
  public readonly symbolMapper = bitkubSymbolMapper;

  private readonly http: BitkubHttpClient;
  private readonly clock: ClockOffsetTracker;
  private readonly now: () => number;

  constructor(options: BitkubClientOptions) {
    const { config } = options;
    this.now = options.now ?? Date.now;
    this.clock = new ClockOffsetTracker(config.timeSyncIntervalMs, this.now);
    this.http = new BitkubHttpClient({
      config: config.bitkub,
      timeoutMs: config.httpTimeoutMs,
      policy: new RetryPolicy({
        maxAttempts: config.retry.maxAttempts,
        baseDelayMs: config.retry.baseDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
      }),
      gate: options.gate,
      clock: this.clock,
      rateLimit: options.rateLimit ?? new RateLimitGuard({ now: this.now, sleep: options.sleep }),
      fetchFn: options.fetchFn,
      sleep: options.sleep,
    });
  }

  /**
   * 启动时同步一次服务器时间。
   */
  public async connect(): Promise<void> {
    await this.syncClock();
  }

  public async disconnect(): Promise<void> {
    return;
  }

  public getServerTime(): Promise<number> {
    return this.http.fetchServerTime();
  }

  /**
   * 强制刷新时钟偏移，由调度器按周期调用。
   */
  public async syncClock(): Promise<number> {
    return this.clock.refresh(() => this.http.fetchServerTime());
  }

  public getClockStatus(): ClockStatus {
    return this.clock.getStatus();
  }

  /**
   * 最新成交价：取最近若干笔成交中时间最新的一笔。
   */
  public async getPrice(symbol: TradingSymbol, signal?: AbortSignal): Promise<PriceTick> {
    const raw = await this.http.request({
      method: "GET",
      path: "/api/v3/market/trades",
      query: { sym: bitkubSymbolMapper.toExchangeSymbol(symbol), lmt: TRADES_LIMIT },
      signed: false,
      retryTransient: true,
      envelope: true,
      schema: tradesResultSchema,
      signal,
    });
    const latest = pickLatestTrade(raw);
    if (!latest) {
      throw new ExchangeRequestError(`${symbol.id} 没有有效的成交记录`);
    }
    return { symbol: symbol.id, price: latest.rate, ts: toMillis(latest.ts) };
  }

  /**
   * 资产可用余额，账户中不存在的资产视为 0。
   */
  public async getBalance(asset: string, signal?: AbortSignal): Promise<Decimal> {
    const balances = await this.http.request({
      method: "POST",
      path: "/api/v3/market/balances",
      signed: true,
      retryTransient: true,
      envelope: true,
      schema: balancesResultSchema,
      signal,
    });
    return balances[asset.toUpperCase()]?.available ?? Decimal(0);
  }

  /**
   * 提交限价单，client_id 携带幂等令牌，因此瞬时错误可安全重试。
   * 买单按计价币金额下单，卖单按基础币数量下单。
   */
  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    const amount = order.side === "BUY" ? order.quoteAmount : order.quantity;
    if (!amount) {
      throw new OrderRejectedError(`买单缺少计价币金额: ${order.clientOrderId}`);
    }
    try {
      const placed = await this.http.request({
        method: "POST",
        path: order.side === "BUY" ? "/api/v3/market/place-bid" : "/api/v3/market/place-ask",
        body: {
          sym: bitkubSymbolMapper.toExchangeSymbol(order.symbol),
          amt: amount.toNumber(),
          rat: order.price.toNumber(),
          typ: order.type === "LIMIT" ? "limit" : "market",
          client_id: order.clientOrderId,
        },
        signed: true,
        retryTransient: this.capabilities.supportsIdempotentOrders,
        envelope: true,
        schema: placeOrderResultSchema,
      });
      return {
        clientOrderId: order.clientOrderId,
        exchangeOrderId: placed.id,
        status: "SUBMITTED",
        filledQuantity: Decimal(0),
        updatedAt: this.now(),
      };
    } catch (error) {
      if (error instanceof ExchangeRequestError) {
        throw new OrderRejectedError(error.message, { cause: error, errorCode: error.errorCode });
      }
      throw error;
    }
  }

  /**
   * 查询订单状态与成交量。
   */
  public async getOrder(
    symbol: TradingSymbol,
    ref: OrderRef,
    signal?: AbortSignal
  ): Promise<OrderResult> {
    const exchangeOrderId = requireExchangeOrderId(ref);
    const info = await this.http.request({
      method: "GET",
      path: "/api/v3/market/order-info",
      query: {
        sym: bitkubSymbolMapper.toExchangeSymbol(symbol),
        id: exchangeOrderId,
        sd: toBitkubSide(ref.side),
      },
      signed: true,
      retryTransient: true,
      envelope: true,
      schema: orderInfoSchema,
      signal,
    });
    return toOrderResult(ref, info, this.now());
  }

  public async cancelOrder(symbol: TradingSymbol, ref: OrderRef): Promise<void> {
    const exchangeOrderId = requireExchangeOrderId(ref);
    await this.http.request({
      method: "POST",
      path: "/api/v3/market/cancel-order",
      body: {
        sym: bitkubSymbolMapper.toExchangeSymbol(symbol),
        id: exchangeOrderId,
        sd: toBitkubSide(ref.side),
      },
      signed: true,
      retryTransient: true,
      envelope: true,
      schema: cancelResultSchema,
    });
  }
}

/**
 * 逐条解析成交记录，过滤无效条目后返回时间最新的一笔。
 */
export function pickLatestTrade(raw: unknown[]): BitkubTrade | null {
  let latest: BitkubTrade | null = null;
  for (const entry of raw) {
    const parsed = tradeEntrySchema.safeParse(entry);
    if (!parsed.success) {
      continue;
    }
    const trade = parsed.data;
    if (trade.rate.lte(0) || trade.amount.lte(0)) {
      continue;
    }
    if (!latest || trade.ts >= latest.ts) {
      latest = trade;
    }
  }
  return latest;
}

/**
 * 将 order-info 转为统一结果。
 * 买单明细以计价币计，扣除手续费后按成交价折算为基础币数量；卖单明细直接为基础币数量。
 */
export function toOrderResult(ref: OrderRef, info: BitkubOrderInfo, now: number): OrderResult {
  const status = normalizeOrderStatus(info.status, info.partial_filled ?? false);
  let filledQuantity = Decimal(0);
  let filledCost = Decimal(0);
  for (const fill of info.history ?? []) {
    if (fill.rate.lte(0)) {
      continue;
    }
    const quantity =
      ref.side === "BUY"
        ? fill.amount.minus(fill.fee ?? 0).dividedBy(fill.rate)
        : fill.amount;
    filledQuantity = filledQuantity.plus(quantity);
    filledCost = filledCost.plus(quantity.multipliedBy(fill.rate));
  }
  if (filledQuantity.isZero() && info.filled && info.filled.gt(0) && info.rate.gt(0)) {
    filledQuantity = ref.side === "BUY" ? info.filled.dividedBy(info.rate) : info.filled;
    filledCost = filledQuantity.multipliedBy(info.rate);
  }
  return {
    clientOrderId: ref.clientOrderId,
    exchangeOrderId: info.id,
    status,
    filledQuantity,
    averageFillPrice: filledQuantity.gt(0) ? filledCost.dividedBy(filledQuantity) : undefined,
    statusReason: info.status,
    updatedAt: now,
  };
}

function requireExchangeOrderId(ref: OrderRef): string {
  if (!ref.exchangeOrderId) {
    throw new ExchangeRequestError(`订单缺少交易所编号: ${ref.clientOrderId}`);
  }
  return ref.exchangeOrderId;
}
