import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { afterEach, describe, it } from "node:test";
import { TickDriver } from "./tick-driver";

describe("TickDriver", () => {
  let driver: TickDriver | null = null;

  afterEach(async () => {
    await driver?.stop();
    driver = null;
  });

  it("启动时立即执行并按间隔重复", async () => {
    let runs = 0;
    driver = new TickDriver([
      {
        name: "counter",
        intervalMs: 5,
        runOnStart: true,
        run: () => {
          runs += 1;
        },
      },
    ]);
    driver.start();
    assert.ok(driver.isRunning());
    await delay(60);
    assert.ok(runs >= 2, `仅执行了 ${runs} 次`);
  });

  it("未设置 runOnStart 时等待一个间隔后执行", async () => {
    let runs = 0;
    driver = new TickDriver([
      {
        name: "delayed",
        intervalMs: 1000,
        run: () => {
          runs += 1;
        },
      },
    ]);
    driver.start();
    await delay(20);
    assert.equal(runs, 0);
  });

  it("同一任务不会并发执行", async () => {
    let active = 0;
    let maxActive = 0;
    driver = new TickDriver([
      {
        name: "slow",
        intervalMs: 1,
        runOnStart: true,
        run: async () => {
          active += 1;
          maxActive = Math.max(maxActive, active);
          await delay(15);
          active -= 1;
        },
      },
    ]);
    driver.start();
    await delay(60);
    assert.equal(maxActive, 1);
  });

  it("任务失败不影响后续调度", async () => {
    let runs = 0;
    driver = new TickDriver([
      {
        name: "failing",
        intervalMs: 5,
        runOnStart: true,
        run: () => {
          runs += 1;
          throw new Error("boom");
        },
      },
    ]);
    driver.start();
    await delay(60);
    assert.ok(runs >= 2, `仅执行了 ${runs} 次`);
  });

  it("停止时发出取消信号并等待执行中的任务结束", async () => {
    let finished = false;
    let aborted = false;
    const current = new TickDriver([
      {
        name: "long",
        intervalMs: 1000,
        runOnStart: true,
        run: async (signal) => {
          await delay(30);
          aborted = signal.aborted;
          finished = true;
        },
      },
    ]);
    current.start();
    await delay(5);
    await current.stop();
    assert.equal(finished, true);
    assert.equal(aborted, true);
    assert.equal(current.isRunning(), false);
  });
});
