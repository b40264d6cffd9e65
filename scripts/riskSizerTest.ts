import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { qtyFromRisk, riskPerSymbol } from "../src/rules/riskSizer.js";

describe("qtyFromRisk", () => {
  it("floors to whole shares", () => {
    assert.equal(qtyFromRisk(500, 5), 100);
    assert.equal(qtyFromRisk(1000, 10), 100);
    assert.equal(qtyFromRisk(1000, 3), 333);
    assert.equal(qtyFromRisk(4, 5), 0);
  });

  it("is zero for an unusable stop distance", () => {
    assert.equal(qtyFromRisk(500, 0), 0);
    assert.equal(qtyFromRisk(500, -1), 0);
    assert.equal(qtyFromRisk(500, Number.NaN), 0);
  });
});

describe("riskPerSymbol", () => {
  it("gives every symbol the full budget unless split", () => {
    assert.equal(riskPerSymbol(1000, 3, "none"), 1000);
    assert.equal(riskPerSymbol(1000, 3, "equal"), 333);
    assert.equal(riskPerSymbol(1000, 1, "equal"), 1000);
  });
});
