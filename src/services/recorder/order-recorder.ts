import type { Decimal } from "../../shared/number";
import type { OrderSide, OrderStatus } from "../../core/exchange/models";
import type { OrderRepository } from "../../infra/db/order-repo";

/**
 * 订单记录输入，统一为网格系统内的抽象格式。
 */
export interface OrderRecordInput {
  exchange: string;
  symbol: string;
  exchangeSymbol: string;
  clientOrderId: string;
  exchangeOrderId?: string;
  side: OrderSide;
  orderType: "LIMIT" | "MARKET";
  price: Decimal;
  quantity: Decimal;
  quoteAmount?: Decimal;
  filledQuantity?: Decimal;
  avgFillPrice?: Decimal;
  status: OrderStatus;
  statusReason?: string;
  decisionPrice?: Decimal;
  gridBand?: number;
  placedAt: number;
  exchangeUpdatedAt: number;
}

/**
 * 订单记录器接口。
 */
export interface OrderRecorder {
  recordOrder(input: OrderRecordInput): Promise<void>;
}

/**
 * 基于 SQLite 的订单记录实现。
 */
export class DbOrderRecorder implements OrderRecorder {
  private readonly repo: OrderRepository;

  constructor(repo: OrderRepository) {
    this.repo = repo;
  }

  /**
   * 订单写入入口，按唯一键进行 upsert。
   */
  public async recordOrder(input: OrderRecordInput): Promise<void> {
    const now = Date.now();
    await this.repo.upsertOrder({
      exchange: input.exchange,
      symbol: input.symbol,
      exchangeSymbol: input.exchangeSymbol,
      clientOrderId: input.clientOrderId,
      exchangeOrderId: input.exchangeOrderId,
      side: input.side,
      orderType: input.orderType,
      price: input.price.toFixed(),
      quantity: input.quantity.toFixed(),
      quoteAmount: input.quoteAmount?.toFixed(),
      filledQuantity: input.filledQuantity?.toFixed(),
      avgFillPrice: input.avgFillPrice?.toFixed(),
      status: input.status,
      statusReason: input.statusReason,
      decisionPrice: input.decisionPrice?.toFixed(),
      gridBand: input.gridBand,
      placedAt: input.placedAt,
      exchangeUpdatedAt: input.exchangeUpdatedAt,
      recordCreatedAt: now,
      recordUpdatedAt: now,
    });
  }
}
