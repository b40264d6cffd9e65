import type { EntryMode, Tier } from "../types.js";
import { formatClockTime, isValidTimeZone, parseClockTime } from "./timeUtils.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type RiskSplit = "none" | "equal";

export type Checkpoints = {
  sessionOpen: number;  // seconds since local midnight
  lockPdc: number;
  lockOl: number;
  lockOt: number;
  arm: number;
  eod: number;
};

export type PickerConfig = {
  minSample: Record<Tier, number>;
  minConfidence: number;
  requireOtAlign: boolean;
};

export type SessionConfig = {
  symbols: string[];
  riskBudget: number;
  riskSplit: RiskSplit;
  dailyLossCap: number;
  entryMode: EntryMode;
  picker: PickerConfig;
  barSeconds: number;
  timeZone: string;
  checkpoints: Checkpoints;
  lookbackYears: number;
  mastersDir: string;
  prevDayFile: string;
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const v = env[name]?.trim();
  return v ? v : fallback;
}

function readNumber(env: Env, name: string, fallback: number, opts: { min?: number; max?: number; integer?: boolean } = {}): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) throw new ConfigError(`${name} must be a number (got "${raw}")`);
  if (opts.integer && !Number.isInteger(parsed)) throw new ConfigError(`${name} must be an integer (got "${raw}")`);
  if (opts.min !== undefined && parsed < opts.min) throw new ConfigError(`${name} must be >= ${opts.min} (got ${parsed})`);
  if (opts.max !== undefined && parsed > opts.max) throw new ConfigError(`${name} must be <= ${opts.max} (got ${parsed})`);
  return parsed;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ConfigError(`${name} must be true or false (got "${raw}")`);
}

function readClock(env: Env, name: string, fallback: string): number {
  const raw = readString(env, name, fallback);
  const secs = parseClockTime(raw);
  if (secs === null) throw new ConfigError(`${name} must be HH:MM or HH:MM:SS (got "${raw}")`);
  return secs;
}

/**
 * Read and validate the session configuration once, before any tick is processed.
 * Throws ConfigError on anything malformed.
 */
export function loadSessionConfig(env: Env = process.env): SessionConfig {
  const symbols = readString(env, "SYMBOLS", "TATAMOTORS,LT,SBIN")
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
  if (symbols.length === 0) throw new ConfigError("SYMBOLS must name at least one symbol");

  const riskBudget = readNumber(env, "RISK_BUDGET", 1000, { min: 0 });

  const riskSplitRaw = readString(env, "RISK_SPLIT", "none").toLowerCase();
  if (riskSplitRaw !== "none" && riskSplitRaw !== "equal") {
    throw new ConfigError(`RISK_SPLIT must be "none" or "equal" (got "${riskSplitRaw}")`);
  }

  const entryModeRaw = readString(env, "ENTRY_MODE", "5TH_BAR").toUpperCase();
  if (entryModeRaw !== "5TH_BAR") throw new ConfigError(`ENTRY_MODE "${entryModeRaw}" is not supported`);

  const minSample: Record<Tier, number> = {
    L3: readNumber(env, "PICKER_MIN_L3", 8, { min: 0, integer: true }),
    L2: readNumber(env, "PICKER_MIN_L2", 6, { min: 0, integer: true }),
    L1: readNumber(env, "PICKER_MIN_L1", 4, { min: 0, integer: true }),
    L0: readNumber(env, "PICKER_MIN_L0", 3, { min: 0, integer: true }),
  };
  if (!(minSample.L3 >= minSample.L2 && minSample.L2 >= minSample.L1 && minSample.L1 >= minSample.L0)) {
    throw new ConfigError(
      `PICKER_MIN_L3..L0 must be non-increasing (got ${minSample.L3}/${minSample.L2}/${minSample.L1}/${minSample.L0})`
    );
  }

  const timeZone = readString(env, "SESSION_TZ", "Asia/Kolkata");
  if (!isValidTimeZone(timeZone)) throw new ConfigError(`SESSION_TZ "${timeZone}" is not a valid IANA timezone`);

  const checkpoints: Checkpoints = {
    sessionOpen: readClock(env, "SESSION_OPEN", "09:15"),
    lockPdc: readClock(env, "T_LOCK_PDC", "09:25"),
    lockOl: readClock(env, "T_LOCK_OL", "09:30"),
    lockOt: readClock(env, "T_LOCK_OT", "09:39:50"),
    arm: readClock(env, "T_ARM", "09:40"),
    eod: readClock(env, "T_EOD", "15:05"),
  };
  const order: Array<[string, number]> = [
    ["T_LOCK_PDC", checkpoints.lockPdc],
    ["T_LOCK_OL", checkpoints.lockOl],
    ["T_LOCK_OT", checkpoints.lockOt],
    ["T_ARM", checkpoints.arm],
    ["T_EOD", checkpoints.eod],
  ];
  for (let i = 1; i < order.length; i++) {
    const [prevName, prevAt] = order[i - 1]!;
    const [name, at] = order[i]!;
    if (at <= prevAt) {
      throw new ConfigError(`${name} (${formatClockTime(at)}) must be after ${prevName} (${formatClockTime(prevAt)})`);
    }
  }
  if (checkpoints.sessionOpen >= checkpoints.lockOl) {
    throw new ConfigError("SESSION_OPEN must be before T_LOCK_OL");
  }

  return {
    symbols,
    riskBudget,
    riskSplit: riskSplitRaw,
    dailyLossCap: readNumber(env, "DAILY_LOSS_CAP", riskBudget, { min: 0 }),
    entryMode: entryModeRaw,
    picker: {
      minSample,
      minConfidence: readNumber(env, "PICKER_CONF_MIN", 55, { min: 0, max: 100, integer: true }),
      requireOtAlign: readBool(env, "PICKER_REQUIRE_OT_ALIGN", true),
    },
    barSeconds: readNumber(env, "BAR_SECONDS", 300, { min: 1, integer: true }),
    timeZone,
    checkpoints,
    lookbackYears: readNumber(env, "LOOKBACK_YEARS", 6, { min: 1, integer: true }),
    mastersDir: readString(env, "MASTERS_DIR", "data/masters"),
    prevDayFile: readString(env, "PREV_DAY_FILE", "data/prev_day.json"),
  };
}
