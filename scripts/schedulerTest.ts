import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { BotMode } from "../src/types.js";
import { Scheduler } from "../src/scheduler/scheduler.js";
import { SessionEngine } from "../src/orchestrator/sessionEngine.js";
import { MessageGovernor } from "../src/governor/messageGovernor.js";
import { at, testConfig } from "./fixtures.js";

function makeScheduler() {
  const config = testConfig();
  const engine = new SessionEngine(config);
  const governor = new MessageGovernor();
  const modes: BotMode[] = [];
  const scheduler = new Scheduler(engine, config, governor, { onModeChange: (m) => modes.push(m) });
  return { scheduler, engine, governor, modes };
}

describe("Scheduler", () => {
  it("is ACTIVE from the open until five minutes after the flatten", () => {
    const { scheduler } = makeScheduler();
    assert.equal(scheduler.modeAt(at("09:14:59") * 1000), "QUIET");
    assert.equal(scheduler.modeAt(at("09:15") * 1000), "ACTIVE");
    assert.equal(scheduler.modeAt(at("15:09:59") * 1000), "ACTIVE");
    assert.equal(scheduler.modeAt(at("15:10") * 1000), "QUIET");
  });

  it("is QUIET all weekend", () => {
    const { scheduler } = makeScheduler();
    assert.equal(scheduler.modeAt(at("11:00", "2025-03-09") * 1000), "QUIET");
  });

  it("switches the governor and advances the engine clock", () => {
    const { scheduler, engine, governor, modes } = makeScheduler();
    scheduler.runOnce(at("09:45") * 1000);

    assert.equal(governor.getMode(), "ACTIVE");
    assert.deepEqual(modes, ["ACTIVE"]);
    assert.equal(engine.getSessionDate(), "2025-03-04");
    assert.equal(engine.hasFired("ARM"), true);
    assert.equal(engine.hasFired("EOD"), false);

    scheduler.runOnce(at("09:46") * 1000);
    assert.deepEqual(modes, ["ACTIVE"]);

    scheduler.runOnce(at("16:00") * 1000);
    assert.equal(governor.getMode(), "QUIET");
    assert.equal(engine.hasFired("EOD"), true);
  });

  it("names the next checkpoint", () => {
    const { scheduler } = makeScheduler();
    assert.equal(scheduler.nextCheckpoint(at("08:00") * 1000), "PDC lock at 09:25");
    assert.equal(scheduler.nextCheckpoint(at("09:26") * 1000), "OL lock at 09:30");
    assert.equal(scheduler.nextCheckpoint(at("09:35") * 1000), "OT lock at 09:39:50");
    assert.equal(scheduler.nextCheckpoint(at("12:00") * 1000), "EOD flatten at 15:05");
    assert.equal(scheduler.nextCheckpoint(at("16:00") * 1000), "PDC lock tomorrow at 09:25");
  });

  it("stops its timer", () => {
    const { scheduler } = makeScheduler();
    scheduler.start();
    scheduler.stop();
    scheduler.stop();
  });
});
