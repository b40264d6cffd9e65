import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { DomainEvent, SymbolSnapshot } from "../src/types.js";
import { formatEventText, formatPlanText, formatStatusText } from "../src/telegram/telegramFormatter.js";
import { orderEvents } from "../src/telegram/messageOrder.js";
import { emptyPlan } from "../src/orchestrator/decisionManager.js";
import { emptyTagSet } from "../src/rules/tagLocker.js";
import { testConfig } from "./fixtures.js";

const ARMED_PLAN = {
  ...emptyPlan(testConfig()),
  direction: "BULL" as const,
  confidence: 90,
  level: "L2" as const,
  entryRef: 105,
  trigger: 105,
  stop: 100,
  t1: 110,
  t2: 115,
  qty: 100,
  status: "ARMED" as const,
};

const event = (type: DomainEvent["type"], data: DomainEvent["data"], symbol = "SBIN", timestamp = 1000): DomainEvent => ({
  type,
  timestamp,
  symbol,
  sessionDate: "2025-03-04",
  data,
});

describe("formatEventText", () => {
  it("formats tag locks", () => {
    const text = formatEventText(
      event("TAGS_LOCKED", { tags: { ot: "BULL", firstCandleType: "NORMAL", rangeStatus: null }, reason: "OT" })
    );
    assert.equal(text, "🔒 SBIN tags locked (OT): OT=BULL FCT=NORMAL RS=n/a");
  });

  it("formats the pick and the armed plan", () => {
    assert.equal(formatEventText(event("PICK", { plan: ARMED_PLAN })), "🎯 SBIN pick 🟢 BULL 90% @L2");
    assert.equal(
      formatEventText(event("PLAN_ARMED", { status: "ARMED", plan: ARMED_PLAN })),
      "🟢 SBIN ARMED BULL qty 100\nTrigger: 105.00  Stop: 100.00\nT1: 110.00  T2: 115.00"
    );
  });

  it("formats order progress", () => {
    assert.equal(formatEventText(event("ORDER_SENT", { price: 105.2 })), "📤 SBIN order sent @ 105.20");
    assert.equal(formatEventText(event("ORDER_FILLED", { price: 105 })), "✅ SBIN filled @ 105.00");
    assert.equal(formatEventText(event("TARGET1_HIT", { price: 110 })), "🎯 SBIN T1 reached @ 110.00");
  });

  it("formats closes with signed P&L", () => {
    assert.equal(
      formatEventText(event("POSITION_CLOSED", { exitReason: "STOP_HIT", price: 99, realizedPnl: -600 })),
      "🏁 SBIN FLAT (STOP_HIT) @ 99.00  P&L -600.00"
    );
    assert.equal(
      formatEventText(event("POSITION_CLOSED", { exitReason: "EOD", price: 107, realizedPnl: 200 })),
      "🏁 SBIN FLAT (EOD) @ 107.00  P&L +200.00"
    );
  });

  it("formats abstain, miss and kill switch", () => {
    assert.equal(formatEventText(event("PLAN_ABSTAINED", { reason: "ZERO_QTY" })), "⚪ SBIN ABSTAINED: ZERO_QTY");
    assert.equal(formatEventText(event("PLAN_MISSED", { reason: "kill switch" })), "⏭️ SBIN MISSED: kill switch");
    assert.equal(formatEventText(event("KILL_SWITCH", { reason: "manual" }, "*")), "🛑 KILL SWITCH: manual");
    assert.equal(formatEventText(event("KILL_SWITCH", { reason: "reset" }, "*")), "▶️ Kill switch reset, new entries allowed");
  });

  it("returns null when the payload is missing", () => {
    assert.equal(formatEventText(event("PICK", {})), null);
  });
});

describe("orderEvents", () => {
  it("sorts a batch into lifecycle order", () => {
    const batch = [
      event("POSITION_CLOSED", {}, "SBIN", 5),
      event("PICK", {}, "SBIN", 3),
      event("PICK", {}, "LT", 3),
      event("KILL_SWITCH", {}, "*", 9),
      event("TAGS_LOCKED", {}, "SBIN", 7),
    ];
    assert.deepEqual(
      orderEvents(batch).map((e) => `${e.type}:${e.symbol}`),
      ["KILL_SWITCH:*", "TAGS_LOCKED:SBIN", "PICK:LT", "PICK:SBIN", "POSITION_CLOSED:SBIN"]
    );
  });
});

describe("status text", () => {
  const live: SymbolSnapshot = {
    symbol: "SBIN",
    ltp: 107,
    tags: { pdc: "TR", ol: "OIM", ot: "BULL", first_candle_type: "NORMAL", range_status: "SWR" },
    plan: {
      direction: "BULL",
      confidence: 100,
      level: "L1",
      entry_ref: 105,
      trigger: 105,
      stop: 100,
      t1: 110,
      t2: 115,
      qty: 100,
      status: "LIVE",
    },
    unrealized_pnl: 200,
    realized_pnl: 0,
    has_position: true,
  };

  it("summarizes the session", () => {
    const text = formatStatusText(
      { sessionDate: "2025-03-04", killSwitch: { tripped: false, reason: null, at: null }, totalPnl: 200, symbols: [live] },
      "ACTIVE"
    );
    assert.equal(
      text,
      [
        "=== Session Status ===",
        "Session: 2025-03-04  Mode: ACTIVE",
        "Kill switch: OFF",
        "Day P&L: +200.00",
        "",
        "SBIN  LTP 107.00  BULL 100% @L1  LIVE qty 100  uPnL +200.00  rPnL +0.00",
      ].join("\n")
    );
  });

  it("shows a tripped kill switch before the first session", () => {
    const text = formatStatusText(
      { sessionDate: null, killSwitch: { tripped: true, reason: "manual /kill", at: 1 }, totalPnl: 0, symbols: [] },
      "QUIET"
    );
    assert.equal(text.split("\n")[1], "Session: not started  Mode: QUIET");
    assert.equal(text.split("\n")[2], "Kill switch: ON (manual /kill)");
    assert.equal(text.split("\n")[5], "No symbols yet");
  });

  it("renders an idle plan", () => {
    const text = formatPlanText({
      symbol: "SBIN",
      lastPrice: null,
      tags: emptyTagSet(),
      plan: emptyPlan(testConfig()),
      realizedPnl: 0,
      unrealizedPnl: 0,
      hasPosition: false,
    });
    assert.equal(
      text,
      ["⚪ SBIN IDLE", "Tags: PDC=n/a OL=n/a OT=n/a FCT=n/a RS=n/a", "Pick: NONE 0% @NA", "LTP: n/a  P&L: +0.00"].join("\n")
    );
  });

  it("renders an armed plan with levels", () => {
    const text = formatPlanText({
      symbol: "SBIN",
      lastPrice: 103,
      tags: { ...emptyTagSet(), pdc: "TR", ot: "BULL" },
      plan: ARMED_PLAN,
      realizedPnl: 0,
      unrealizedPnl: 0,
      hasPosition: false,
    });
    assert.deepEqual(text.split("\n").slice(0, 6), [
      "🟢 SBIN ARMED",
      "Tags: PDC=TR OL=n/a OT=BULL FCT=n/a RS=n/a",
      "Pick: BULL 90% @L2",
      "Entry ref: 105.00  Qty: 100",
      "Trigger: 105.00  Stop: 100.00",
      "T1: 110.00  T2: 115.00",
    ]);
  });
});
