import type { Bar, Tick } from "../src/types.js";
import type { MasterRow } from "../src/rules/frequencyIndex.js";
import { loadSessionConfig } from "../src/utils/config.js";
import type { SessionConfig } from "../src/utils/config.js";
import { sessionTimeToEpochMs } from "../src/utils/timeUtils.js";

export const TZ = "Asia/Kolkata";
export const SESSION_DATE = "2025-03-04"; // Tuesday

export function testConfig(env: Record<string, string> = {}): SessionConfig {
  return loadSessionConfig({ SYMBOLS: "SBIN", RISK_BUDGET: "500", DAILY_LOSS_CAP: "0", ...env });
}

/** Epoch seconds of a session-local clock time. */
export function at(clock: string, date: string = SESSION_DATE): number {
  const [h, m, s] = clock.split(":").map(Number);
  return sessionTimeToEpochMs(date, (h ?? 0) * 3600 + (m ?? 0) * 60 + (s ?? 0), TZ) / 1000;
}

export function bar(bucketStart: number, open: number, high: number, low: number, close: number): Bar {
  return { bucketStart, open, high, low, close, volume: 4 };
}

/**
 * Five rising opening bars: ORB 100..105, opening trend BULL.
 */
export function risingOpeningBars(date: string = SESSION_DATE): Bar[] {
  const t0 = at("09:15", date);
  return [
    bar(t0, 100.5, 101.5, 100, 101.5),
    bar(t0 + 300, 101.5, 102.5, 101, 102.5),
    bar(t0 + 600, 102.5, 103.5, 102, 103.5),
    bar(t0 + 900, 103.5, 104.5, 103, 104.5),
    bar(t0 + 1200, 104, 105, 103.8, 104.8),
  ];
}

/** Ticks that rebuild the given bars: open, high, low, close inside each bucket. */
export function ticksForBars(symbol: string, bars: Bar[]): Tick[] {
  const ticks: Tick[] = [];
  for (const b of bars) {
    ticks.push({ symbol, ts: b.bucketStart, price: b.open });
    ticks.push({ symbol, ts: b.bucketStart + 60, price: b.high });
    ticks.push({ symbol, ts: b.bucketStart + 120, price: b.low });
    ticks.push({ symbol, ts: b.bucketStart + 240, price: b.close });
  }
  return ticks;
}

/** Five weekday rows before SESSION_DATE where a BULL open went on to close BULL. */
export function bullishMasters(): MasterRow[] {
  return ["2025-02-24", "2025-02-25", "2025-02-26", "2025-02-27", "2025-02-28"].map((date) => ({
    date,
    openingTrend: "BULL",
    openLocation: "OIM",
    prevDayContext: "TR",
    result: "BULL",
  }));
}
