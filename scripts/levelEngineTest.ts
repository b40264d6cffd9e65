import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { buildLevels, computeStop, isClose, orbFromSessionBars } from "../src/rules/levelEngine.js";
import { risingOpeningBars } from "./fixtures.js";

const ORB = { high: 105, low: 100, range: 5 };

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

describe("orbFromSessionBars", () => {
  it("spans the first five bars", () => {
    assert.deepEqual(orbFromSessionBars(risingOpeningBars()), ORB);
  });

  it("waits for all five", () => {
    assert.equal(orbFromSessionBars(risingOpeningBars().slice(0, 4)), null);
  });
});

describe("isClose", () => {
  it("uses the smaller of the two tolerances", () => {
    // min(0.25% of 100, 20% of 5) = 0.25
    assert.equal(isClose(100, 100.2, 100, 5), true);
    assert.equal(isClose(100, 100.3, 100, 5), false);
    // min(0.2625, 1.0)
    assert.equal(isClose(105, 105.1, 105, 5), true);
  });

  it("drops a tolerance that is not positive", () => {
    assert.equal(isClose(100, 100.2, 100, 0), true);
    assert.equal(isClose(100, 100, 0, 0), false);
  });

  it("is false for a missing level", () => {
    assert.equal(isClose(100, Number.NaN, 100, 5), false);
  });
});

describe("computeStop", () => {
  it("uses the opposite ORB edge with the trend", () => {
    assert.equal(computeStop("BULL", "BULL", ORB, null, 105), 100);
    assert.equal(computeStop("BEAR", "BEAR", ORB, { open: 101, high: 106, low: 98, close: 102 }, 100), 105);
  });

  it("prefers a prior-day extreme sitting right at the ORB edge", () => {
    assert.equal(computeStop("BEAR", "BEAR", ORB, { open: 101, high: 105.1, low: 98, close: 102 }, 100), 105.1);
    assert.equal(computeStop("BULL", "BULL", ORB, { open: 101, high: 108, low: 99.9, close: 102 }, 105), 99.9);
  });

  it("uses the double-range edge against or without a trend", () => {
    assert.equal(computeStop("BULL", "BEAR", ORB, null, 105), 95);
    assert.equal(computeStop("BEAR", "BULL", ORB, null, 100), 110);
    assert.equal(computeStop("BULL", "TR", ORB, null, 105), 95);
  });
});

describe("buildLevels", () => {
  it("builds 1R and 2R targets from the ORB", () => {
    assert.deepEqual(buildLevels("BULL", "BULL", ORB, null), {
      ok: true,
      levels: { entryRef: 105, stop: 100, t1: 110, t2: 115, riskPerShare: 5 },
    });
  });

  it("builds short levels off the prior-day high", () => {
    const result = buildLevels("BEAR", "BEAR", ORB, { open: 101, high: 105.1, low: 98, close: 102 });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.levels.entryRef, 100);
    assert.equal(result.levels.stop, 105.1);
    near(result.levels.t1, 94.9);
    near(result.levels.t2, 89.8);
  });

  it("builds counter-trend levels off the double range", () => {
    assert.deepEqual(buildLevels("BEAR", "BULL", ORB, null), {
      ok: true,
      levels: { entryRef: 100, stop: 110, t1: 90, t2: 80, riskPerShare: 10 },
    });
  });

  it("rejects a flat opening range", () => {
    const result = buildLevels("BULL", "BULL", { high: 100, low: 100, range: 0 }, null);
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.reason, "ZERO_RISK_PER_SHARE");
  });

  it("keeps the 2R target at twice the stop distance", () => {
    for (const [dir, ot] of [["BULL", "BULL"], ["BULL", "BEAR"], ["BEAR", "BEAR"], ["BEAR", null]] as const) {
      const result = buildLevels(dir, ot, ORB, null);
      assert.equal(result.ok, true);
      if (!result.ok) continue;
      const { entryRef, stop, t2 } = result.levels;
      assert.ok(Math.abs(t2 - entryRef) + 1e-9 >= 2 * Math.abs(entryRef - stop));
    }
  });
});
