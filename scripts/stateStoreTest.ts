import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { StateStore } from "../src/persistence/stateStore.js";
import type { PersistedEngineState } from "../src/persistence/persistedState.js";

const STATE: PersistedEngineState = {
  version: 1,
  instanceId: "test",
  savedAt: 1741061700000,
  sessionDate: "2025-03-04",
  killSwitch: { tripped: true, reason: "manual /kill", at: 1741061600000 },
  totalPnl: -600,
  symbols: [],
  governor: { dedupe: { "2025-03-04_SBIN_PICK": 1741061400000 } },
};

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "state-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

describe("StateStore", () => {
  it("returns null before anything is saved", async () => {
    await withDir(async (dir) => {
      const store = new StateStore("test", path.join(dir, "state.json"));
      assert.equal(await store.load(), null);
    });
  });

  it("round-trips a saved state, creating the directory", async () => {
    await withDir(async (dir) => {
      const file = path.join(dir, "nested", "state.json");
      const store = new StateStore("test", file);
      await store.save(STATE);
      assert.equal(store.getPath(), file);
      assert.deepEqual(await store.load(), STATE);
      await assert.rejects(fs.access(`${file}.tmp`));
    });
  });

  it("ignores a corrupt or foreign file", async () => {
    await withDir(async (dir) => {
      const file = path.join(dir, "state.json");
      const store = new StateStore("test", file);
      await fs.writeFile(file, "{ half", "utf8");
      assert.equal(await store.load(), null);
      await fs.writeFile(file, JSON.stringify({ version: 2, symbols: [] }), "utf8");
      assert.equal(await store.load(), null);
    });
  });
});
