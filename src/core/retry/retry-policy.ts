import { AuthClockSkewError, RateLimitedError, TransientNetworkError } from "../errors";
import type { SleepFn } from "../../shared/async";

/**
 * 重试策略参数。
 */
export interface RetryPolicyOptions {
  /** 瞬时错误的最大尝试次数（含首次） */
  maxAttempts: number;
  /** 首次重试前的基础等待 */
  baseDelayMs: number;
  /** 每次重试的等待倍率 */
  multiplier: number;
  /** 单次等待上限（不含抖动） */
  maxDelayMs: number;
  /** 抖动函数，输入为退避时长，返回额外等待毫秒数 */
  jitter: (delayMs: number) => number;
  /** 连续限流等待的上限，防止无限冷却 */
  maxRateLimitWaits: number;
}

const MAX_JITTER_MS = 200;

/**
 * 随机抖动 [0, maxJitterMs)。
 */
export function randomJitter(maxJitterMs: number = MAX_JITTER_MS): (delayMs: number) => number {
  return () => Math.floor(Math.random() * maxJitterMs);
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 4,
  baseDelayMs: 600,
  multiplier: 2,
  maxDelayMs: 10000,
  jitter: randomJitter(),
  maxRateLimitWaits: 8,
};

/**
 * 指数退避策略对象，所有调用点共用同一套参数。
 */
export class RetryPolicy {
  public readonly options: RetryPolicyOptions;

  constructor(options?: Partial<RetryPolicyOptions>) {
    const resolved = { ...DEFAULT_RETRY_POLICY, ...options };
    if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
      throw new Error(`maxAttempts 必须为正整数: ${resolved.maxAttempts}`);
    }
    if (resolved.baseDelayMs < 0 || resolved.maxDelayMs < 0 || resolved.multiplier < 1) {
      throw new Error("重试等待参数无效");
    }
    this.options = resolved;
  }

  /**
   * 第 retryIndex 次重试（从 0 开始）前的等待时长。
   */
  public delayFor(retryIndex: number): number {
    const exponential = this.options.baseDelayMs * this.options.multiplier ** retryIndex;
    const capped = Math.min(exponential, this.options.maxDelayMs);
    return capped + Math.max(0, this.options.jitter(capped));
  }
}

/**
 * 单次重试的上下文，便于日志输出。
 */
export interface RetryEvent {
  kind: "TRANSIENT" | "RATE_LIMIT" | "CLOCK_SKEW";
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * 重试执行参数。
 */
export interface ExecuteWithRetryOptions {
  policy: RetryPolicy;
  sleep: SleepFn;
  /**
   * 是否允许重试瞬时错误。非幂等操作只有携带幂等令牌时才可开启。
   */
  retryTransient: boolean;
  /** 限流冷却，默认按 Retry-After 或退避时长等待 */
  onRateLimit?: (error: RateLimitedError) => Promise<void>;
  /** 时钟偏移刷新，提供时签名/时间戳错误允许重试一次 */
  onClockSkew?: (error: AuthClockSkewError) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
  signal?: AbortSignal;
}

/**
 * 按错误类别执行重试：
 * - 瞬时网络错误按退避重试，受 maxAttempts 约束；
 * - 限流错误冷却后重试，不计入瞬时错误次数；
 * - 时钟偏移错误刷新偏移后仅重试一次；
 * - 其他错误立即抛出。
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: ExecuteWithRetryOptions
): Promise<T> {
  const { policy } = options;
  let attempt = 0;
  let transientFailures = 0;
  let rateLimitWaits = 0;
  let clockSkewRetried = false;

  for (;;) {
    options.signal?.throwIfAborted();
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof RateLimitedError) {
        rateLimitWaits += 1;
        if (rateLimitWaits > policy.options.maxRateLimitWaits) {
          throw error;
        }
        const delayMs = error.retryAfterMs ?? policy.delayFor(rateLimitWaits - 1);
        options.onRetry?.({ kind: "RATE_LIMIT", attempt, delayMs, error });
        if (options.onRateLimit) {
          await options.onRateLimit(error);
        } else {
          await options.sleep(delayMs, options.signal);
        }
        continue;
      }
      if (error instanceof AuthClockSkewError) {
        if (clockSkewRetried || !options.onClockSkew) {
          throw error;
        }
        clockSkewRetried = true;
        options.onRetry?.({ kind: "CLOCK_SKEW", attempt, delayMs: 0, error });
        await options.onClockSkew(error);
        continue;
      }
      if (error instanceof TransientNetworkError && options.retryTransient) {
        transientFailures += 1;
        if (transientFailures >= policy.options.maxAttempts) {
          throw error;
        }
        const delayMs = policy.delayFor(transientFailures - 1);
        options.onRetry?.({ kind: "TRANSIENT", attempt, delayMs, error });
        await options.sleep(delayMs, options.signal);
        continue;
      }
      throw error;
    }
  }
}
