import type { AbstainReason, Bar, Direction, PrevDayOhlc, TrendTag } from "../types.js";
import { OPENING_BARS } from "./tagRules.js";

const CLOSE_PCT = 0.0025;     // of entry
const CLOSE_FR_ORB = 0.2;     // of ORB range
const RR_EPS = 1e-9;

export type OpeningRange = {
  high: number;
  low: number;
  range: number;
};

export type Levels = {
  entryRef: number;
  stop: number;
  t1: number;
  t2: number;
  riskPerShare: number;
};

export type LevelResult =
  | { ok: true; levels: Levels }
  | { ok: false; reason: AbstainReason; detail: string };

/**
 * Opening range from the first five session bars; null until all five exist.
 */
export function orbFromSessionBars(sessionBars: readonly Bar[]): OpeningRange | null {
  if (sessionBars.length < OPENING_BARS) return null;
  const win = sessionBars.slice(0, OPENING_BARS);
  const high = Math.max(...win.map((b) => b.high));
  const low = Math.min(...win.map((b) => b.low));
  return { high, low, range: Math.max(0, high - low) };
}

/**
 * |a - b| <= min(0.25% of entry, 20% of ORB range), using only the parts that are finite and positive.
 */
export function isClose(a: number, b: number, entry: number, orbRange: number): boolean {
  if (!Number.isFinite(a) || !Number.isFinite(b)) return false;
  const parts: number[] = [];
  if (Number.isFinite(entry) && entry > 0) parts.push(CLOSE_PCT * entry);
  if (Number.isFinite(orbRange) && orbRange > 0) parts.push(CLOSE_FR_ORB * orbRange);
  if (parts.length === 0) return false;
  return Math.abs(a - b) <= Math.min(...parts);
}

export function entryRefFor(direction: Direction, orb: OpeningRange): number {
  return direction === "BULL" ? orb.high : orb.low;
}

/**
 * Stop by direction x opening trend:
 * with the trend, the opposite ORB edge (or the prior day's extreme on that side when close);
 * against the trend or with no trend, the double-range edge.
 */
export function computeStop(
  direction: Direction,
  openingTrend: TrendTag | null,
  orb: OpeningRange,
  prevDay: PrevDayOhlc | null,
  entryRef: number
): number {
  const dblHigh = orb.high + orb.range;
  const dblLow = orb.low - orb.range;

  if (direction !== openingTrend) {
    return direction === "BULL" ? dblLow : dblHigh;
  }

  if (direction === "BULL") {
    const prevLow = prevDay?.low ?? Number.NaN;
    return isClose(orb.low, prevLow, entryRef, orb.range) ? prevLow : orb.low;
  }
  const prevHigh = prevDay?.high ?? Number.NaN;
  return isClose(orb.high, prevHigh, entryRef, orb.range) ? prevHigh : orb.high;
}

/**
 * Entry, stop and 1R/2R targets. A plan that cannot be sized or breaks the
 * 1:2 risk:reward floor comes back as a rejection, never a throw.
 */
export function buildLevels(
  direction: Direction,
  openingTrend: TrendTag | null,
  orb: OpeningRange,
  prevDay: PrevDayOhlc | null
): LevelResult {
  const entryRef = entryRefFor(direction, orb);
  const stop = computeStop(direction, openingTrend, orb, prevDay, entryRef);

  // Signed: a stop on the wrong side of entry is as unusable as a zero distance
  const riskPerShare = direction === "BULL" ? entryRef - stop : stop - entryRef;
  if (!Number.isFinite(riskPerShare) || riskPerShare <= 0) {
    return { ok: false, reason: "ZERO_RISK_PER_SHARE", detail: `entry=${entryRef} stop=${stop}` };
  }

  const sign = direction === "BULL" ? 1 : -1;
  const t1 = entryRef + sign * riskPerShare;
  const t2 = entryRef + sign * 2 * riskPerShare;

  if (Math.abs(t2 - entryRef) + RR_EPS < 2 * Math.abs(entryRef - stop)) {
    return {
      ok: false,
      reason: "RR_FLOOR_VIOLATION",
      detail: `entry=${entryRef} stop=${stop} t2=${t2}`,
    };
  }

  return { ok: true, levels: { entryRef, stop, t1, t2, riskPerShare } };
}
