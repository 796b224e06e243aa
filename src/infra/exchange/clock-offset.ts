import type { ClockStatus } from "../../core/exchange/adapter";

/**
 * 本地时钟与交易所时钟的偏移（serverTime - localTime）。
 * 签名请求统一使用 localTime + offset，偏移按周期刷新，签名/时间戳被拒时强制刷新。
 */
export class ClockOffsetTracker {
  private readonly refreshIntervalMs: number;
  private readonly now: () => number;
  private offsetMs = 0;
  private lastSyncAt: number | null = null;
  private inflight: Promise<number> | null = null;

  constructor(refreshIntervalMs: number, now: () => number = Date.now) {
    this.refreshIntervalMs = refreshIntervalMs;
    this.now = now;
  }

  /**
   * 校正后的当前时间戳（毫秒）。
   */
  public timestamp(): number {
    return this.now() + this.offsetMs;
  }

  public isStale(): boolean {
    return this.lastSyncAt === null || this.now() - this.lastSyncAt >= this.refreshIntervalMs;
  }

  /**
   * 拉取服务器时间并更新偏移，以请求往返的中点作为本地参考时间。
   * 并发调用共享同一次刷新。
   */
  public refresh(fetchServerTime: () => Promise<number>): Promise<number> {
    if (this.inflight) {
      return this.inflight;
    }
    this.inflight = (async () => {
      const startedAt = this.now();
      const serverTime = await fetchServerTime();
      const finishedAt = this.now();
      const localMid = Math.round((startedAt + finishedAt) / 2);
      this.offsetMs = serverTime - localMid;
      this.lastSyncAt = finishedAt;
      console.info("服务器时间已同步", { offsetMs: this.offsetMs, rttMs: finishedAt - startedAt });
      return this.offsetMs;
    })();
    return this.inflight.finally(() => {
      this.inflight = null;
    });
  }

  /**
   * 偏移过期时刷新。
   */
  public async ensureFresh(fetchServerTime: () => Promise<number>): Promise<void> {
    if (this.isStale()) {
      await this.refresh(fetchServerTime);
    }
  }

  public getStatus(): ClockStatus {
    return { offsetMs: this.offsetMs, lastSyncAt: this.lastSyncAt };
  }
}
