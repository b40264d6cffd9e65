import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { Bar, DomainEvent } from "../src/types.js";
import { DecisionManager } from "../src/orchestrator/decisionManager.js";
import { FrequencyIndex } from "../src/rules/frequencyIndex.js";
import type { MasterRow } from "../src/rules/frequencyIndex.js";
import { OrderSimulator } from "../src/execution/orderSimulator.js";
import { KillSwitch } from "../src/execution/killSwitch.js";
import { SESSION_DATE, bullishMasters, risingOpeningBars, testConfig } from "./fixtures.js";

const NOW = 1_741_061_400_000;

function setup(opts: { masters?: MasterRow[]; riskBudget?: number } = {}) {
  const events: DomainEvent[] = [];
  const oms = new OrderSimulator();
  const killSwitch = new KillSwitch();
  const manager = new DecisionManager("SBIN", {
    config: testConfig(),
    sessionDate: SESSION_DATE,
    prevDay: null,
    riskBudget: opts.riskBudget ?? 500,
    frequencyIndex: new FrequencyIndex(opts.masters ?? bullishMasters()),
    oms,
    killSwitch,
    emit: (e) => events.push(e),
  });
  return { manager, events, oms, killSwitch };
}

function runMorning(manager: DecisionManager, bars: Bar[] = risingOpeningBars()): void {
  manager.onCheckpoint("LOCK_PDC", bars.slice(0, 2), NOW);
  manager.onCheckpoint("LOCK_OL", bars.slice(0, 3), NOW);
  manager.onCheckpoint("LOCK_OT", bars, NOW);
  manager.onCheckpoint("ARM", bars, NOW);
}

const types = (events: DomainEvent[]): string[] => events.map((e) => e.type);

describe("DecisionManager", () => {
  it("locks tags, picks and arms at the checkpoints", () => {
    const { manager, events } = setup();
    runMorning(manager);

    assert.deepEqual(types(events), ["TAGS_LOCKED", "TAGS_LOCKED", "TAGS_LOCKED", "PICK", "PLAN_ARMED"]);
    assert.deepEqual(events[0]?.data, { tags: { pdc: "TR" }, reason: "PDC" });
    assert.deepEqual(events[2]?.data.tags, { ot: "BULL", firstCandleType: null, rangeStatus: null });

    const plan = manager.state.plan;
    assert.equal(manager.status, "ARMED");
    assert.equal(plan.direction, "BULL");
    assert.equal(plan.confidence, 100);
    assert.equal(plan.level, "L1");
    assert.equal(plan.entryRef, 105);
    assert.equal(plan.trigger, 105);
    assert.equal(plan.stop, 100);
    assert.equal(plan.t1, 110);
    assert.equal(plan.t2, 115);
    assert.equal(plan.qty, 100);
  });

  it("enters on the trigger and stops out", () => {
    const { manager, events, oms } = setup();
    runMorning(manager);
    events.length = 0;

    manager.onPrice(103, NOW);
    assert.equal(manager.status, "ARMED");

    manager.onPrice(105, NOW);
    assert.equal(manager.status, "LIVE");
    assert.deepEqual(types(events), ["ORDER_SENT", "ORDER_FILLED"]);
    assert.equal(events[1]?.data.price, 105);

    manager.onPrice(107, NOW);
    assert.equal(manager.state.unrealizedPnl, 200);
    assert.equal(manager.state.hasPosition, true);

    manager.onPrice(99, NOW);
    assert.equal(manager.status, "FLAT");
    assert.equal(manager.state.realizedPnl, -600);
    assert.equal(manager.state.unrealizedPnl, 0);
    assert.equal(manager.state.hasPosition, false);
    assert.equal(oms.hasOrder("SBIN"), false);

    const closed = events[events.length - 1];
    assert.equal(closed?.type, "POSITION_CLOSED");
    assert.deepEqual(closed?.data, { status: "FLAT", exitReason: "STOP_HIT", price: 99, realizedPnl: -600 });
  });

  it("reports the near target and exits at the far one", () => {
    const { manager, events } = setup();
    runMorning(manager);
    events.length = 0;

    manager.onPrice(105, NOW);
    manager.onPrice(110, NOW);
    manager.onPrice(115, NOW);
    assert.deepEqual(types(events), ["ORDER_SENT", "ORDER_FILLED", "TARGET1_HIT", "POSITION_CLOSED"]);
    assert.equal(events[3]?.data.exitReason, "T2_HIT");
    assert.equal(manager.state.realizedPnl, 1000);
  });

  it("flattens an open position at end of day at the last price", () => {
    const { manager, events } = setup();
    runMorning(manager);
    manager.onPrice(105, NOW);
    manager.onPrice(107, NOW);
    events.length = 0;

    manager.onCheckpoint("EOD", [], NOW);
    assert.equal(manager.status, "FLAT");
    assert.equal(manager.state.realizedPnl, 200);
    assert.deepEqual(events[0]?.data, { status: "FLAT", exitReason: "EOD", price: 107, realizedPnl: 200 });
  });

  it("closes an unfilled armed plan flat at end of day", () => {
    const { manager, events } = setup();
    runMorning(manager);
    manager.onPrice(103, NOW);
    events.length = 0;

    manager.onCheckpoint("EOD", [], NOW);
    assert.equal(manager.status, "FLAT");
    assert.equal(manager.state.realizedPnl, 0);
    assert.equal(events[0]?.data.exitReason, "EOD");
  });

  it("marks an idle plan missed at end of day", () => {
    const { manager, events } = setup();
    manager.onCheckpoint("EOD", [], NOW);
    assert.equal(manager.status, "MISSED");
    assert.deepEqual(types(events), ["PLAN_MISSED"]);
  });

  it("abstains when no tier qualifies", () => {
    const { manager, events } = setup({ masters: [] });
    runMorning(manager);
    assert.equal(manager.status, "ABSTAINED");
    assert.equal(manager.state.plan.abstainReason, "NO_QUALIFYING_TIER");
    assert.deepEqual(types(events), ["TAGS_LOCKED", "TAGS_LOCKED", "TAGS_LOCKED", "PLAN_ABSTAINED"]);

    manager.onCheckpoint("EOD", [], NOW);
    assert.equal(manager.status, "ABSTAINED");
  });

  it("abstains at arm without five opening bars", () => {
    const { manager } = setup();
    runMorning(manager, risingOpeningBars().slice(0, 4));
    assert.equal(manager.status, "ABSTAINED");
    assert.equal(manager.state.plan.abstainReason, "INSUFFICIENT_BARS");
  });

  it("abstains when the budget buys no shares", () => {
    const { manager } = setup({ riskBudget: 4 });
    runMorning(manager);
    assert.equal(manager.status, "ABSTAINED");
    assert.equal(manager.state.plan.abstainReason, "ZERO_QTY");
    assert.equal(manager.state.plan.qty, 0);
  });

  it("does not arm until every tag is locked", () => {
    const { manager, events } = setup();
    manager.onCheckpoint("ARM", risingOpeningBars(), NOW);
    assert.equal(manager.status, "IDLE");
    assert.deepEqual(events, []);
  });

  it("retires an armed plan when the kill switch trips", () => {
    const { manager, events, killSwitch } = setup();
    runMorning(manager);
    killSwitch.trip("manual", NOW);
    manager.onKillSwitch(NOW);

    assert.equal(manager.status, "MISSED");
    assert.equal(events[events.length - 1]?.type, "PLAN_MISSED");

    manager.onPrice(106, NOW);
    assert.equal(manager.status, "MISSED");
  });

  it("flattens a live position when the kill switch trips", () => {
    const { manager, events, killSwitch, oms } = setup();
    runMorning(manager);
    manager.onPrice(105, NOW);
    manager.onPrice(104, NOW);
    killSwitch.trip("manual", NOW);
    manager.onKillSwitch(NOW);

    assert.equal(manager.status, "FLAT");
    assert.equal(manager.state.realizedPnl, -100);
    assert.equal(oms.hasOrder("SBIN"), false);
    assert.equal(events[events.length - 1]?.data.exitReason, "KILL_SWITCH");
  });

  it("skips the pick and arming while the kill switch is on", () => {
    const { manager, events, killSwitch } = setup();
    killSwitch.trip("manual", NOW);
    runMorning(manager);
    assert.equal(manager.status, "IDLE");
    assert.deepEqual(types(events), ["TAGS_LOCKED", "TAGS_LOCKED", "TAGS_LOCKED"]);
  });

  it("exposes the wire snapshot", () => {
    const { manager } = setup();
    runMorning(manager);
    manager.onPrice(103, NOW);
    const snap = manager.snapshot();
    assert.equal(snap.ltp, 103);
    assert.deepEqual(snap.tags, { pdc: "TR", ol: null, ot: "BULL", first_candle_type: null, range_status: null });
    assert.equal(snap.plan.entry_ref, 105);
    assert.equal(snap.plan.status, "ARMED");
    assert.equal(snap.has_position, false);
  });
});
