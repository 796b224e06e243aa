import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { KeyedMutex, RequestGate } from "./concurrency";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("RequestGate", () => {
  it("并发不超过上限，并按排队顺序放行", async () => {
    const gate = new RequestGate(1);
    const order: string[] = [];
    const first = deferred();
    const a = gate.run(async () => {
      order.push("a:start");
      await first.promise;
      order.push("a:end");
    });
    const b = gate.run(async () => {
      order.push("b");
    });
    const c = gate.run(async () => {
      order.push("c");
    });
    await Promise.resolve();
    assert.deepEqual(gate.getLoad(), { active: 1, queued: 2 });
    first.resolve();
    await Promise.all([a, b, c]);
    assert.deepEqual(order, ["a:start", "a:end", "b", "c"]);
    assert.deepEqual(gate.getLoad(), { active: 0, queued: 0 });
  });

  it("任务失败后释放名额", async () => {
    const gate = new RequestGate(1);
    await assert.rejects(
      gate.run(async () => {
        throw new Error("boom");
      }),
      /boom/
    );
    assert.equal(await gate.run(async () => 42), 42);
  });

  it("拒绝非法的并发上限", () => {
    assert.throws(() => new RequestGate(0), /并发上限/);
  });
});

describe("KeyedMutex", () => {
  it("同一 key 串行，不同 key 并行", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gateA = deferred();
    const a1 = mutex.runExclusive("A", async () => {
      events.push("a1:start");
      await gateA.promise;
      events.push("a1:end");
    });
    const a2 = mutex.runExclusive("A", async () => {
      events.push("a2");
    });
    const b1 = mutex.runExclusive("B", async () => {
      events.push("b1");
    });
    await b1;
    assert.deepEqual(events, ["a1:start", "b1"]);
    gateA.resolve();
    await Promise.all([a1, a2]);
    assert.deepEqual(events, ["a1:start", "b1", "a1:end", "a2"]);
  });

  it("前一个任务失败不阻塞后续任务", async () => {
    const mutex = new KeyedMutex();
    await assert.rejects(
      mutex.runExclusive("A", async () => {
        throw new Error("fail");
      })
    );
    assert.equal(await mutex.runExclusive("A", async () => "ok"), "ok");
  });
});
