import { promises as fs } from "node:fs";
import path from "node:path";
import type { PersistedEngineState } from "./persistedState.js";

function getDefaultStateFile(instanceId: string): string {
  return path.join("data", `state-${instanceId}.json`);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isPersistedState(value: unknown): value is PersistedEngineState {
  if (typeof value !== "object" || value === null) return false;
  const field = (key: string): unknown => Reflect.get(value, key);
  const ks = field("killSwitch");
  return (
    field("version") === 1 &&
    typeof field("instanceId") === "string" &&
    typeof field("savedAt") === "number" &&
    (field("sessionDate") === null || typeof field("sessionDate") === "string") &&
    typeof ks === "object" &&
    ks !== null &&
    typeof Reflect.get(ks, "tripped") === "boolean" &&
    Array.isArray(field("symbols"))
  );
}

export class StateStore {
  private stateFile: string;

  constructor(instanceId: string, stateFile?: string) {
    this.stateFile = stateFile || process.env.STATE_FILE || getDefaultStateFile(instanceId);
  }

  getPath(): string {
    return this.stateFile;
  }

  async load(): Promise<PersistedEngineState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.stateFile, "utf8");
    } catch (err: unknown) {
      if (errorCode(err) === "ENOENT") {
        // File doesn't exist yet - that's fine
        return null;
      }
      console.warn(`[persist] Failed to load state: ${errorMessage(err)}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      console.warn(`[persist] State file is not valid JSON, ignoring: ${errorMessage(err)}`);
      return null;
    }
    if (!isPersistedState(parsed)) {
      console.warn(`[persist] Unsupported state shape in ${this.stateFile}, ignoring`);
      return null;
    }
    return parsed;
  }

  async save(state: PersistedEngineState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
      const tmp = `${this.stateFile}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf8");
      await fs.rename(tmp, this.stateFile);
    } catch (err: unknown) {
      console.warn(`[persist] Failed to save state: ${errorMessage(err)}`);
      throw err;
    }
  }
}
