import type { Bar, FirstCandleType, OpenLocation, PrevDayOhlc, RangeStatus, TrendTag } from "../types.js";

// PrevDayContext thresholds
const TH_NARROW = 1.0;        // % range => TR
const TH_BODY_STRONG = 0.45;
const TH_BODY_WEAK = 0.25;
const TH_CLV_BULL = 0.65;
const TH_CLV_BEAR = 0.35;

// OpeningTrend thresholds (opening window = first five session bars)
const TH_MOVE = 0.35;         // % net move open -> last close
const TH_RANGE = 0.8;         // % range considered tight
const TH_TINY_MOVE = 0.3;
const TH_POS_TOP = 0.6;
const TH_POS_BOTTOM = 0.4;
const TH_DIR = 2;             // min (#up - #down)
const TH_OVERLAP = 0.5;

const OPEN_BAND = 0.3;
export const OPENING_BARS = 5;

const EPS = 1e-9;

function isFiniteOhlc(p: PrevDayOhlc | null | undefined): p is PrevDayOhlc {
  return !!p && [p.open, p.high, p.low, p.close].every((x) => typeof x === "number" && Number.isFinite(x));
}

/**
 * Daily OHLC of a bar list (first open, max high, min low, last close)
 */
export function sessionOhlc(bars: readonly Bar[]): PrevDayOhlc | null {
  if (bars.length === 0) return null;
  return {
    open: bars[0]!.open,
    high: Math.max(...bars.map((b) => b.high)),
    low: Math.min(...bars.map((b) => b.low)),
    close: bars[bars.length - 1]!.close,
  };
}

export function computePrevDayContext(prev: PrevDayOhlc | null | undefined): TrendTag {
  if (!isFiniteOhlc(prev)) return "TR";
  const { open: O, high: H, low: L, close: C } = prev;

  const rng = Math.max(EPS, H - L);
  const rangePct = (100 * rng) / Math.max(EPS, C);
  const bodyFrac = Math.abs(C - O) / rng;
  const clv = (C - L) / rng; // 0 = close at low, 1 = close at high

  if (rangePct <= TH_NARROW || bodyFrac <= TH_BODY_WEAK) return "TR";
  if (clv >= TH_CLV_BULL && bodyFrac >= TH_BODY_STRONG) return "BULL";
  if (clv <= TH_CLV_BEAR && bodyFrac >= TH_BODY_STRONG) return "BEAR";
  return "TR";
}

export function computeOpenLocation(dayOpen: number | undefined, prev: PrevDayOhlc | null | undefined): OpenLocation | null {
  if (dayOpen === undefined || !Number.isFinite(dayOpen) || !isFiniteOhlc(prev)) return null;
  const { high: H, low: L } = prev;
  if (H <= L) return null;
  const rng = H - L;
  if (dayOpen < L) return "OBR";
  if (dayOpen <= L + OPEN_BAND * rng) return "OOL";
  if (dayOpen > H) return "OAR";
  if (dayOpen >= H - OPEN_BAND * rng) return "OOH";
  return "OIM";
}

function overlapScore(bars: readonly Bar[]): number {
  if (bars.length < 2) return 0;
  let sum = 0;
  for (let i = 1; i < bars.length; i++) {
    const a = bars[i - 1]!;
    const b = bars[i]!;
    const num = Math.max(0, Math.min(b.high, a.high) - Math.max(b.low, a.low));
    const den = Math.max(EPS, Math.max(b.high, a.high) - Math.min(b.low, a.low));
    sum += num / den;
  }
  return sum / (bars.length - 1);
}

function dirCount(bars: readonly Bar[]): number {
  let up = 0;
  let down = 0;
  for (const b of bars) {
    if (b.close > b.open) up++;
    else if (b.close < b.open) down++;
  }
  return up - down;
}

function vote(value: number, hi: number, lo: number): number {
  if (value >= hi) return 1;
  if (value <= lo) return -1;
  return 0;
}

/**
 * Opening trend over the opening window: three votes (distance, close position,
 * persistence) with a chop override for tight, overlapping tape.
 */
export function computeOpeningTrend(sessionBars: readonly Bar[]): TrendTag {
  const win = sessionBars.slice(0, OPENING_BARS);
  if (win.length === 0) return "TR";

  const o0 = win[0]!.open;
  const cn = win[win.length - 1]!.close;
  const hMax = Math.max(...win.map((b) => b.high));
  const lMin = Math.min(...win.map((b) => b.low));

  const movePct = (100 * (cn - o0)) / Math.max(EPS, o0);
  const rangePct = (100 * (hMax - lMin)) / Math.max(EPS, o0);
  const pos = hMax <= lMin ? 0.5 : (cn - lMin) / (hMax - lMin);
  const dcount = dirCount(win);
  const ovl = overlapScore(win);

  if (rangePct < TH_RANGE && Math.abs(movePct) < TH_TINY_MOVE && ovl > TH_OVERLAP) return "TR";

  const score = vote(movePct, TH_MOVE, -TH_MOVE) + vote(pos, TH_POS_TOP, TH_POS_BOTTOM) + vote(dcount, TH_DIR, -TH_DIR);
  if (score >= 2) return "BULL";
  if (score <= -2) return "BEAR";
  return "TR";
}

function isPureDoji(b: Bar): boolean {
  const rng = b.high - b.low;
  if (rng === 0) return false;
  if (Math.abs(b.close - b.open) > 0.5 * rng) return false;
  const bodyCenter = (b.open + b.close) / 2;
  const rangeCenter = (b.high + b.low) / 2;
  if (Math.abs(bodyCenter - rangeCenter) > 0.2 * rng) return false;
  const upperWick = b.high - Math.max(b.open, b.close);
  const lowerWick = Math.min(b.open, b.close) - b.low;
  return upperWick >= 0.05 * rng && lowerWick >= 0.05 * rng;
}

export function computeFirstCandleType(sessionBars: readonly Bar[], prev: PrevDayOhlc | null | undefined): FirstCandleType | null {
  const first = sessionBars[0];
  if (!first || !isFiniteOhlc(prev)) return null;
  const rngPrev = prev.high - prev.low;
  if (rngPrev <= 0) return null;
  const rngBar1 = first.high - first.low;
  if (rngBar1 <= 0) return null;

  if (isPureDoji(first)) return "DOJI";
  if (rngBar1 > 0.7 * rngPrev) return "HUGE OPEN";

  const n = Math.min(OPENING_BARS, sessionBars.length);
  for (let i = 1; i < n; i++) {
    const b = sessionBars[i]!;
    for (const x of [first.high, first.low]) {
      for (const y of [b.high, b.low]) {
        if (Math.abs(x - y) > 0.9 * rngPrev) return "HUGE OPEN";
      }
    }
  }
  return "NORMAL";
}

export function computeRangeStatus(
  sessionBars: readonly Bar[],
  openLocation: OpenLocation | null,
  prev: PrevDayOhlc | null | undefined
): RangeStatus | null {
  const n = Math.min(OPENING_BARS, sessionBars.length);
  if (n === 0 || !isFiniteOhlc(prev)) return null;
  const { high: H, low: L } = prev;
  if (H <= L) return null;

  let inRange = false;
  let above = false;
  let below = false;
  for (let i = 0; i < n; i++) {
    const { open: o, close: c } = sessionBars[i]!;
    if ((L <= o && o <= H) || (L <= c && c <= H)) inRange = true;
    if (o > H || c > H) above = true;
    if (o < L || c < L) below = true;
  }

  if (openLocation === "OBR") {
    if (!inRange && below) return "SBR";
    if (inRange && above) return "WAR";
    if (inRange && !above) return "SWR";
    if (above && !inRange) return "WAR";
  } else if (openLocation === "OAR") {
    if (!inRange && above) return "SAR";
    if (inRange && below) return "WBR";
    if (inRange && !below) return "SWR";
    if (below && !inRange) return "WBR";
  } else {
    if (above && !below) return "WAR";
    if (below && !above) return "WBR";
    if (inRange && !above && !below) return "SWR";
  }
  return null;
}
