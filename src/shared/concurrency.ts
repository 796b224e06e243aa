/**
 * 有界并发闸门（FIFO 信号量）。
 * 所有交易对共享同一个闸门，按排队顺序放行，单个交易对的重试不会长期占用名额。
 */
export class RequestGate {
  private readonly capacity: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`并发上限必须为正整数: ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * 在闸门内执行任务，结束后自动释放名额。
   */
  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * 当前执行中与排队中的数量，供健康检查使用。
   */
  public getLoad(): { active: number; queued: number } {
    return { active: this.active, queued: this.waiters.length };
  }

  private acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/**
 * 按 key 串行化的互斥锁，不同 key 之间互不阻塞。
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * 对同一 key 的任务按提交顺序依次执行。
   */
  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    try {
      return await task();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
