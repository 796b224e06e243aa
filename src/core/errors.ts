/**
 * 交易系统错误码，日志与健康检查按 code 归类。
 */
export type TradingErrorCode =
  | "TRANSIENT_NETWORK"
  | "AUTH_CLOCK_SKEW"
  | "RATE_LIMITED"
  | "EXCHANGE_REQUEST"
  | "ORDER_REJECTED"
  | "INSUFFICIENT_POSITION"
  | "PERSISTENCE";

/**
 * 所有交易相关错误的基类。
 */
export abstract class TradingError extends Error {
  public abstract readonly code: TradingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 超时、5xx、连接重置等可重试的网络错误。
 */
export class TransientNetworkError extends TradingError {
  public readonly code = "TRANSIENT_NETWORK";
  public readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * 时间戳或签名被交易所拒绝，刷新时钟偏移后允许重试一次。
 */
export class AuthClockSkewError extends TradingError {
  public readonly code = "AUTH_CLOCK_SKEW";
  public readonly errorCode?: number;

  constructor(message: string, options?: { cause?: unknown; errorCode?: number }) {
    super(message, options);
    this.errorCode = options?.errorCode;
  }
}

/**
 * 触发限流，retryAfterMs 来自 Retry-After 头（若有）。
 */
export class RateLimitedError extends TradingError {
  public readonly code = "RATE_LIMITED";
  public readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * 不可恢复的请求错误（非限流 4xx、业务错误码）。
 */
export class ExchangeRequestError extends TradingError {
  public readonly code = "EXCHANGE_REQUEST";
  public readonly status?: number;
  public readonly errorCode?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number; errorCode?: number }
  ) {
    super(message, options);
    this.status = options?.status;
    this.errorCode = options?.errorCode;
  }
}

/**
 * 订单被交易所拒绝，本轮终止且状态不变。
 */
export class OrderRejectedError extends TradingError {
  public readonly code = "ORDER_REJECTED";
  public readonly errorCode?: number;

  constructor(message: string, options?: { cause?: unknown; errorCode?: number }) {
    super(message, options);
    this.errorCode = options?.errorCode;
  }
}

/**
 * 卖出数量超过持仓。正确的信号时序下不应出现，出现即视为状态不一致。
 */
export class InsufficientPositionError extends TradingError {
  public readonly code = "INSUFFICIENT_POSITION";
}

/**
 * 状态落盘失败，该交易对不得继续交易。
 */
export class PersistenceError extends TradingError {
  public readonly code = "PERSISTENCE";
}

/**
 * 是否需要停止该交易对的交易循环。
 */
export function isFatalForSymbol(error: unknown): boolean {
  return error instanceof InsufficientPositionError || error instanceof PersistenceError;
}

/**
 * 统一提取错误信息，便于日志输出。
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
