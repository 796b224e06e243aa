import { createHmac } from "node:crypto";
import {
  AuthClockSkewError,
  ExchangeRequestError,
  TransientNetworkError,
  type TradingError,
} from "../../../core/errors";
import type { OrderSide, OrderStatus } from "../../../core/exchange/models";

/** 6: 签名无效，8: 时间戳无效 */
const CLOCK_SKEW_CODES = new Set([6, 8]);
/** 90: 服务器内部错误 */
const TRANSIENT_CODES = new Set([90]);

/**
 * v3 签名：HMAC_SHA256(timestamp + METHOD + requestPath + body)，十六进制输出。
 * GET 请求的 requestPath 包含查询串。
 */
export function signRequest(
  secret: string,
  timestamp: string,
  method: string,
  requestPath: string,
  body: string
): string {
  return createHmac("sha256", secret)
    .update(`${timestamp}${method.toUpperCase()}${requestPath}${body}`)
    .digest("hex");
}

/**
 * 将 Bitkub 业务错误码映射为统一错误类型。
 */
export function errorForCode(code: number, context: string, status?: number): TradingError {
  const message = `Bitkub 返回错误码 ${code} (${context})`;
  if (CLOCK_SKEW_CODES.has(code)) {
    return new AuthClockSkewError(message, { errorCode: code });
  }
  if (TRANSIENT_CODES.has(code)) {
    return new TransientNetworkError(message, { status });
  }
  return new ExchangeRequestError(message, { status, errorCode: code });
}

/**
 * 从任意响应体中提取 error 字段。
 */
export function extractErrorCode(payload: unknown): number | null {
  if (typeof payload !== "object" || payload === null || !("error" in payload)) {
    return null;
  }
  const code = payload.error;
  return typeof code === "number" && code !== 0 ? code : null;
}

/**
 * 将交易所订单状态映射为内部统一状态。
 * 未识别的状态按未完成处理，等待下一轮查询或超时撤单。
 */
export function normalizeOrderStatus(status: string, partiallyFilled: boolean): OrderStatus {
  const normalized = status.trim().toLowerCase();
  if (normalized === "filled") {
    return "FILLED";
  }
  if (normalized === "cancelled" || normalized === "canceled") {
    return "CANCELLED";
  }
  if (normalized === "rejected") {
    return "REJECTED";
  }
  return partiallyFilled ? "PARTIALLY_FILLED" : "SUBMITTED";
}

/**
 * 订单方向对应的 sd 参数。
 */
export function toBitkubSide(side: OrderSide): "buy" | "sell" {
  return side === "BUY" ? "buy" : "sell";
}

/**
 * 成交时间可能为秒或毫秒，统一为毫秒。
 */
export function toMillis(ts: number): number {
  return ts < 1e12 ? ts * 1000 : ts;
}
