import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Decimal } from "../../shared/number";
import { bandOf, buildGridLadder, minStepPct } from "./ladder";
import type { GridConfig } from "./types";

function linesConfig(overrides: Partial<GridConfig> = {}): GridConfig {
  return {
    lower: Decimal(90),
    upper: Decimal(110),
    mode: "LINES",
    lineCount: 3,
    priceDecimals: 2,
    ...overrides,
  };
}

function linePrices(config: GridConfig): string[] {
  return buildGridLadder(config).lines.map((line) => line.toFixed());
}

describe("buildGridLadder", () => {
  it("LINES 模式等分上下界", () => {
    assert.deepEqual(linePrices(linesConfig()), ["90", "100", "110"]);
    assert.deepEqual(linePrices(linesConfig({ lineCount: 5 })), ["90", "95", "100", "105", "110"]);
    assert.equal(buildGridLadder(linesConfig()).bandCount, 2);
  });

  it("SPACING 模式最后一步不足时补齐上界", () => {
    const config = linesConfig({
      upper: Decimal(105),
      mode: "SPACING",
      lineCount: undefined,
      spacing: Decimal(10),
    });
    assert.deepEqual(linePrices(config), ["90", "100", "105"]);
  });

  it("按价格精度取整网格线", () => {
    const config = linesConfig({ lower: Decimal(1), upper: Decimal(2), lineCount: 4 });
    assert.deepEqual(linePrices(config), ["1", "1.33", "1.67", "2"]);
  });

  it("拒绝无效配置", () => {
    assert.throws(() => buildGridLadder(linesConfig({ lower: Decimal(110) })), /下界必须小于上界/);
    assert.throws(() => buildGridLadder(linesConfig({ lower: Decimal(0) })), /下界必须大于 0/);
    assert.throws(() => buildGridLadder(linesConfig({ lineCount: 1 })), /线数/);
    assert.throws(
      () =>
        buildGridLadder(linesConfig({ mode: "SPACING", lineCount: undefined, spacing: undefined })),
      /spacing/
    );
  });

  it("精度不足导致网格线重合时报错", () => {
    const config = linesConfig({ lower: Decimal(1), upper: Decimal("1.01"), lineCount: 5 });
    assert.throws(() => buildGridLadder(config), /不再严格递增/);
  });
});

describe("bandOf", () => {
  const ladder = buildGridLadder(linesConfig());

  it("档位为左闭右开区间", () => {
    assert.equal(bandOf(Decimal("89.99"), ladder), -1);
    assert.equal(bandOf(Decimal(90), ladder), 0);
    assert.equal(bandOf(Decimal("99.99"), ladder), 0);
    assert.equal(bandOf(Decimal(100), ladder), 1);
    assert.equal(bandOf(Decimal("109.99"), ladder), 1);
  });

  it("不低于最高线时返回 N", () => {
    assert.equal(bandOf(Decimal(110), ladder), 2);
    assert.equal(bandOf(Decimal(500), ladder), 2);
  });

  it("价格越高档位不降低", () => {
    let previous = -1;
    for (let price = 80; price <= 120; price += 0.5) {
      const band = bandOf(Decimal(price), ladder);
      assert.ok(band >= previous, `价格 ${price} 的档位 ${band} 小于 ${previous}`);
      previous = band;
    }
  });
});

describe("minStepPct", () => {
  it("取相邻网格线的最小百分比间距", () => {
    assert.equal(minStepPct(buildGridLadder(linesConfig())).toFixed(), "10");
  });
});
