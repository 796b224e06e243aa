/**
 * 可取消的等待，signal 触发时立即以 AbortError 结束。
 */
export function sleep(durationMs: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortError(signal));
  }
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, durationMs));
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * 等待函数签名，测试中可替换为立即返回的实现。
 */
export type SleepFn = (durationMs: number, signal?: AbortSignal) => Promise<void>;

/**
 * 判断错误是否来自取消信号。
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function abortError(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.name === "AbortError") {
    return reason;
  }
  const error = new Error("操作已取消");
  error.name = "AbortError";
  return error;
}
