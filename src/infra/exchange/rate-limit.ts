import { sleep as defaultSleep, type SleepFn } from "../../shared/async";

const DEFAULT_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 60000;
const MAX_JITTER_MS = 250;

/**
 * 限流守卫：收到 429 后进入冷却窗口，所有交易对共享同一窗口，避免继续撞限流。
 */
export class RateLimitGuard {
  private blockedUntil = 0;
  private backoffMs = 0;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly jitter: () => number;

  constructor(options?: { now?: () => number; sleep?: SleepFn; jitter?: () => number }) {
    this.now = options?.now ?? Date.now;
    this.sleep = options?.sleep ?? defaultSleep;
    this.jitter = options?.jitter ?? (() => Math.floor(Math.random() * MAX_JITTER_MS));
  }

  /**
   * 若处于冷却窗口，等待到允许时间后再继续执行。
   */
  public async wait(signal?: AbortSignal): Promise<void> {
    const remaining = this.blockedUntil - this.now();
    if (remaining <= 0) {
      return;
    }
    await this.sleep(remaining, signal);
  }

  /**
   * 收到 429 后延长冷却窗口：优先使用 Retry-After，否则指数退避，并加入轻微抖动。
   */
  public onRateLimit(retryAfterMs?: number | null): number {
    const nextBackoff = retryAfterMs ?? this.nextBackoffMs();
    const cooldown = nextBackoff + this.jitter();
    this.backoffMs = nextBackoff;
    this.blockedUntil = Math.max(this.blockedUntil, this.now() + cooldown);
    return cooldown;
  }

  /**
   * 成功请求后重置退避状态，避免持续延长窗口。
   */
  public onSuccess(): void {
    this.backoffMs = 0;
  }

  private nextBackoffMs(): number {
    if (this.backoffMs <= 0) {
      return DEFAULT_BACKOFF_MS;
    }
    return Math.min(this.backoffMs * 2, MAX_BACKOFF_MS);
  }
}

/**
 * 解析 Retry-After 头（秒数或 HTTP 日期），转换为毫秒。
 */
export function parseRetryAfterMs(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const retrySeconds = Number(value);
  if (Number.isFinite(retrySeconds)) {
    return Math.max(0, Math.round(retrySeconds * 1000));
  }
  const retryAt = Date.parse(value);
  if (Number.isNaN(retryAt)) {
    return null;
  }
  return Math.max(0, retryAt - now);
}
