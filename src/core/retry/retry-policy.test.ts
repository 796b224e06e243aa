import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  AuthClockSkewError,
  ExchangeRequestError,
  RateLimitedError,
  TransientNetworkError,
} from "../errors";
import { executeWithRetry, RetryPolicy, type RetryEvent } from "./retry-policy";

const noJitter = () => 0;

function policy(maxAttempts: number): RetryPolicy {
  return new RetryPolicy({
    maxAttempts,
    baseDelayMs: 100,
    multiplier: 2,
    maxDelayMs: 300,
    jitter: noJitter,
    maxRateLimitWaits: 2,
  });
}

/**
 * 依次抛出给定错误，全部抛完后返回 "ok"。
 */
function scripted(errors: Error[]): { operation: () => Promise<string>; calls: () => number } {
  let calls = 0;
  return {
    operation: async () => {
      const error = errors[calls];
      calls += 1;
      if (error) {
        throw error;
      }
      return "ok";
    },
    calls: () => calls,
  };
}

describe("RetryPolicy", () => {
  it("指数退避并受上限约束", () => {
    const retry = policy(4);
    assert.deepEqual([0, 1, 2, 3].map((index) => retry.delayFor(index)), [100, 200, 300, 300]);
  });

  it("拒绝无效参数", () => {
    assert.throws(() => new RetryPolicy({ maxAttempts: 0 }), /maxAttempts/);
    assert.throws(() => new RetryPolicy({ multiplier: 0.5 }), /重试等待参数无效/);
  });
});

describe("executeWithRetry", () => {
  it("瞬时错误按退避重试直到成功", async () => {
    const sleeps: number[] = [];
    const script = scripted([new TransientNetworkError("timeout"), new TransientNetworkError("reset")]);
    const result = await executeWithRetry(script.operation, {
      policy: policy(4),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      retryTransient: true,
    });
    assert.equal(result, "ok");
    assert.equal(script.calls(), 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it("瞬时错误达到最大尝试次数后抛出", async () => {
    const script = scripted([
      new TransientNetworkError("a"),
      new TransientNetworkError("b"),
      new TransientNetworkError("c"),
    ]);
    await assert.rejects(
      executeWithRetry(script.operation, {
        policy: policy(3),
        sleep: async () => undefined,
        retryTransient: true,
      }),
      TransientNetworkError
    );
    assert.equal(script.calls(), 3);
  });

  it("不允许重试瞬时错误时立即抛出", async () => {
    const script = scripted([new TransientNetworkError("timeout")]);
    await assert.rejects(
      executeWithRetry(script.operation, {
        policy: policy(4),
        sleep: async () => undefined,
        retryTransient: false,
      }),
      TransientNetworkError
    );
    assert.equal(script.calls(), 1);
  });

  it("限流等待不计入瞬时错误次数", async () => {
    const sleeps: number[] = [];
    const events: RetryEvent["kind"][] = [];
    const script = scripted([
      new RateLimitedError("429", 50),
      new RateLimitedError("429", null),
      new TransientNetworkError("timeout"),
    ]);
    const result = await executeWithRetry(script.operation, {
      policy: policy(2),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      retryTransient: true,
      onRetry: (event) => events.push(event.kind),
    });
    assert.equal(result, "ok");
    assert.equal(script.calls(), 4);
    assert.deepEqual(sleeps, [50, 200, 100]);
    assert.deepEqual(events, ["RATE_LIMIT", "RATE_LIMIT", "TRANSIENT"]);
  });

  it("连续限流超过上限后抛出", async () => {
    const script = scripted([
      new RateLimitedError("429", 10),
      new RateLimitedError("429", 10),
      new RateLimitedError("429", 10),
    ]);
    await assert.rejects(
      executeWithRetry(script.operation, {
        policy: policy(4),
        sleep: async () => undefined,
        retryTransient: true,
      }),
      RateLimitedError
    );
    assert.equal(script.calls(), 3);
  });

  it("限流时优先调用 onRateLimit", async () => {
    const cooled: Array<number | null> = [];
    const script = scripted([new RateLimitedError("429", 1500)]);
    await executeWithRetry(script.operation, {
      policy: policy(4),
      sleep: async () => {
        throw new Error("不应直接等待");
      },
      retryTransient: true,
      onRateLimit: async (error) => {
        cooled.push(error.retryAfterMs);
      },
    });
    assert.deepEqual(cooled, [1500]);
  });

  it("时钟偏移错误刷新后只重试一次", async () => {
    let refreshed = 0;
    const once = scripted([new AuthClockSkewError("bad ts")]);
    const result = await executeWithRetry(once.operation, {
      policy: policy(4),
      sleep: async () => undefined,
      retryTransient: true,
      onClockSkew: async () => {
        refreshed += 1;
      },
    });
    assert.equal(result, "ok");
    assert.equal(refreshed, 1);

    const twice = scripted([new AuthClockSkewError("bad ts"), new AuthClockSkewError("bad ts")]);
    await assert.rejects(
      executeWithRetry(twice.operation, {
        policy: policy(4),
        sleep: async () => undefined,
        retryTransient: true,
        onClockSkew: async () => undefined,
      }),
      AuthClockSkewError
    );
    assert.equal(twice.calls(), 2);
  });

  it("未提供时钟刷新时直接抛出偏移错误", async () => {
    const script = scripted([new AuthClockSkewError("bad ts")]);
    await assert.rejects(
      executeWithRetry(script.operation, {
        policy: policy(4),
        sleep: async () => undefined,
        retryTransient: true,
      }),
      AuthClockSkewError
    );
    assert.equal(script.calls(), 1);
  });

  it("其他错误不重试", async () => {
    const script = scripted([new ExchangeRequestError("bad request")]);
    await assert.rejects(
      executeWithRetry(script.operation, {
        policy: policy(4),
        sleep: async () => undefined,
        retryTransient: true,
      }),
      ExchangeRequestError
    );
    assert.equal(script.calls(), 1);
  });
});
