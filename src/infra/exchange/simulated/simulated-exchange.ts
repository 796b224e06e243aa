import type { ClockStatus, ExchangeCapabilities, ExchangeClient } from "../../../core/exchange/adapter";
import type {
  OrderRef,
  OrderRequest,
  OrderResult,
  PriceTick,
  TradingSymbol,
} from "../../../core/exchange/models";
import type { ExchangeSymbolMapper } from "../../../core/exchange/symbol-mapper";
import { ExchangeRequestError } from "../../../core/errors";
import { Decimal } from "../../../shared/number";

/**
 * 价格来源：回测时为录制序列，DRY_RUN 时为交易所公共行情。
 */
export type PriceFeed = (symbol: TradingSymbol, signal?: AbortSignal) => Promise<PriceTick>;

export interface SimulatedExchangeOptions {
  priceFeed: PriceFeed;
  /** 初始资产余额，例如 { THB: 100000 } */
  initialBalances: Record<string, Decimal>;
  feeRate: Decimal;
  /** 与真实交易所保持一致的市场命名，默认使用统一标识 */
  symbolMapper?: ExchangeSymbolMapper;
  now?: () => number;
}

const canonicalSymbolMapper: ExchangeSymbolMapper = {
  toExchangeSymbol: (symbol) => symbol.id,
  isSameMarket: (symbol, exchangeSymbol) => symbol.id === exchangeSymbol,
};

/**
 * 模拟撮合：所有订单按限价立即全部成交，余额在内存中维护。
 * 相同 clientOrderId 重复提交时返回首次结果。
 */
export class SimulatedExchangeClient implements ExchangeClient {
  public readonly name = "simulated";
  public readonly capabilities: ExchangeCapabilities = {
    supportsIdempotentOrders: true,
    simulated: true,
  };
  public readonly symbolMapper: ExchangeSymbolMapper;

  private readonly priceFeed: PriceFeed;
  private readonly feeRate: Decimal;
  private readonly now: () => number;
  private readonly balances = new Map<string, Decimal>();
  private readonly orders = new Map<string, OrderResult>();
  private sequence = 0;

  constructor(options: SimulatedExchangeOptions) {
    this.priceFeed = options.priceFeed;
    this.feeRate = options.feeRate;
    this.symbolMapper = options.symbolMapper ?? canonicalSymbolMapper;
    this.now = options.now ?? Date.now;
    for (const [asset, amount] of Object.entries(options.initialBalances)) {
      this.balances.set(asset.toUpperCase(), amount);
    }
  }

  public async connect(): Promise<void> {
    return;
  }

  public async disconnect(): Promise<void> {
    return;
  }

  public async getServerTime(): Promise<number> {
    return this.now();
  }

  public async syncClock(): Promise<number> {
    return 0;
  }

  public getClockStatus(): ClockStatus {
    return { offsetMs: 0, lastSyncAt: this.now() };
  }

  public getPrice(symbol: TradingSymbol, signal?: AbortSignal): Promise<PriceTick> {
    return this.priceFeed(symbol, signal);
  }

  public async getBalance(asset: string): Promise<Decimal> {
    return this.balances.get(asset.toUpperCase()) ?? Decimal(0);
  }

  /**
   * 按限价立即成交。买单扣除计价币金额并计入预计到手数量；卖单扣除基础币并按扣费后金额入账。
   * 余额不足时拒单。
   */
  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    const existing = this.orders.get(order.clientOrderId);
    if (existing) {
      return existing;
    }
    const { base, quote } = order.symbol;
    const result =
      order.side === "BUY" ? this.fillBuy(order, base, quote) : this.fillSell(order, base, quote);
    this.orders.set(order.clientOrderId, result);
    return result;
  }

  public async getOrder(_symbol: TradingSymbol, ref: OrderRef): Promise<OrderResult> {
    const result = this.orders.get(ref.clientOrderId);
    if (!result) {
      throw new ExchangeRequestError(`模拟撮合中不存在订单: ${ref.clientOrderId}`);
    }
    return result;
  }

  /**
   * 订单均已立即成交，撤单只校验订单存在。
   */
  public async cancelOrder(symbol: TradingSymbol, ref: OrderRef): Promise<void> {
    await this.getOrder(symbol, ref);
  }

  private fillBuy(order: OrderRequest, base: string, quote: string): OrderResult {
    const spend = order.quoteAmount ?? order.quantity.multipliedBy(order.price);
    const available = this.balanceOf(quote);
    if (available.lt(spend)) {
      return this.rejected(order, `${quote} 余额不足`);
    }
    this.balances.set(quote, available.minus(spend));
    this.balances.set(base, this.balanceOf(base).plus(order.quantity));
    return this.filled(order);
  }

  private fillSell(order: OrderRequest, base: string, quote: string): OrderResult {
    const held = this.balanceOf(base);
    if (held.lt(order.quantity)) {
      return this.rejected(order, `${base} 余额不足`);
    }
    const proceeds = order.quantity
      .multipliedBy(order.price)
      .multipliedBy(Decimal(1).minus(this.feeRate));
    this.balances.set(base, held.minus(order.quantity));
    this.balances.set(quote, this.balanceOf(quote).plus(proceeds));
    return this.filled(order);
  }

  private filled(order: OrderRequest): OrderResult {
    this.sequence += 1;
    return {
      clientOrderId: order.clientOrderId,
      exchangeOrderId: `sim-${this.sequence}`,
      status: "FILLED",
      filledQuantity: order.quantity,
      averageFillPrice: order.price,
      updatedAt: this.now(),
    };
  }

  private rejected(order: OrderRequest, reason: string): OrderResult {
    return {
      clientOrderId: order.clientOrderId,
      status: "REJECTED",
      filledQuantity: Decimal(0),
      statusReason: reason,
      updatedAt: this.now(),
    };
  }

  private balanceOf(asset: string): Decimal {
    return this.balances.get(asset) ?? Decimal(0);
  }
}
