import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TagLocker, emptyTagSet } from "../src/rules/tagLocker.js";
import { risingOpeningBars } from "./fixtures.js";

const PREV = { open: 100, high: 110, low: 99, close: 109 };

describe("TagLocker", () => {
  it("locks each tag once and never re-evaluates it", () => {
    const locker = new TagLocker();
    const tags = emptyTagSet();

    assert.equal(locker.lock("PDC", tags, { sessionBars: [], prevDay: PREV }), true);
    assert.equal(tags.pdc, "BULL");

    // A different prior day after the lock changes nothing
    const bearish = { open: 110, high: 111, low: 100, close: 101 };
    assert.equal(locker.lock("PDC", tags, { sessionBars: [], prevDay: bearish }), false);
    assert.equal(tags.pdc, "BULL");
  });

  it("locks OL from the first session open", () => {
    const locker = new TagLocker();
    const tags = emptyTagSet();
    locker.lock("OL", tags, { sessionBars: risingOpeningBars(), prevDay: PREV });
    // 100.5 sits in the bottom 30% of 99..110
    assert.equal(tags.ol, "OOL");
    assert.equal(tags.lockedOl, true);
  });

  it("locks a null OL when no bar has been seen", () => {
    const locker = new TagLocker();
    const tags = emptyTagSet();
    assert.equal(locker.lock("OL", tags, { sessionBars: [], prevDay: PREV }), true);
    assert.equal(tags.ol, null);
    assert.equal(locker.lock("OL", tags, { sessionBars: risingOpeningBars(), prevDay: PREV }), false);
    assert.equal(tags.ol, null);
  });

  it("locks OT together with first candle type and range status", () => {
    const locker = new TagLocker();
    const tags = emptyTagSet();
    const ctx = { sessionBars: risingOpeningBars(), prevDay: PREV };
    locker.lock("PDC", tags, ctx);
    locker.lock("OL", tags, ctx);
    assert.equal(locker.isFullyLocked(tags), false);

    locker.lock("OT", tags, ctx);
    assert.equal(tags.ot, "BULL");
    assert.equal(tags.firstCandleType, "NORMAL");
    assert.equal(tags.rangeStatus, "SWR");
    assert.equal(locker.isFullyLocked(tags), true);
  });
});
