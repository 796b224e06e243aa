import { describeError } from "../../core/errors";
import { isAbortError } from "../../shared/async";

/**
 * 统一的定时调度器，负责按固定间隔驱动异步任务。
 * 重点保证同一任务不会并发执行，避免状态被重复修改。
 */
export interface TickTask {
  /** 任务名称，用于日志与并发控制 */
  name: string;
  /** 任务间隔（毫秒），从上一次执行结束开始计算 */
  intervalMs: number;
  /** 任务执行函数，signal 在停止调度时触发 */
  run: (signal: AbortSignal) => Promise<void> | void;
  /** 是否在启动时立即执行一次 */
  runOnStart?: boolean;
}

/**
 * 基于链式 setTimeout 的轻量调度器。
 * 每个任务执行结束后才安排下一次，停止时取消等待并等待执行中的任务结束。
 */
export class TickDriver {
  private readonly tasks: TickTask[];
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly inflight = new Map<string, Promise<void>>();
  private controller: AbortController | null = null;

  constructor(tasks: TickTask[]) {
    this.tasks = tasks;
  }

  /**
   * 启动所有任务调度，重复调用不会产生副作用。
   */
  public start(): void {
    if (this.controller) {
      return;
    }
    this.controller = new AbortController();
    for (const task of this.tasks) {
      if (task.runOnStart) {
        this.trigger(task);
      } else {
        this.schedule(task);
      }
    }
  }

  /**
   * 停止调度：清理定时器、发出取消信号，并等待执行中的任务结束。
   */
  public async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = null;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    controller.abort();
    await Promise.all(this.inflight.values());
  }

  public isRunning(): boolean {
    return this.controller !== null;
  }

  private schedule(task: TickTask): void {
    if (!this.controller) {
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(task.name);
      this.trigger(task);
    }, task.intervalMs);
    this.timers.set(task.name, timer);
  }

  /**
   * 触发指定任务执行，自动跳过并发重入。
   */
  private trigger(task: TickTask): void {
    const controller = this.controller;
    if (!controller || this.inflight.has(task.name)) {
      return;
    }
    const run = Promise.resolve()
      .then(() => task.run(controller.signal))
      .catch((error: unknown) => {
        if (!isAbortError(error)) {
          console.warn(`调度任务执行失败: ${task.name}`, { error: describeError(error) });
        }
      })
      .finally(() => {
        this.inflight.delete(task.name);
        if (this.controller === controller) {
          this.schedule(task);
        }
      });
    this.inflight.set(task.name, run);
  }
}
