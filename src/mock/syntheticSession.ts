import type { Tick } from "../types.js";
import { sessionTimeToEpochMs } from "../utils/timeUtils.js";

export type SyntheticSessionOptions = {
  symbol: string;
  date: string;            // YYYY-MM-DD, session timezone
  timeZone: string;
  basePrice: number;
  driftPerStep?: number;   // fraction of price added each step
  volatility?: number;     // fraction of price, uniform noise per step
  stepSeconds?: number;
  startSeconds?: number;   // seconds of day
  endSeconds?: number;
  seed?: number;
};

// mulberry32: small deterministic PRNG so a seed replays the same tape
function makeRng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic random-walk tape for one symbol and one session.
 */
export function generateSessionTicks(opts: SyntheticSessionOptions): Tick[] {
  const step = opts.stepSeconds ?? 10;
  const start = opts.startSeconds ?? 9 * 3600 + 15 * 60;
  const end = opts.endSeconds ?? 15 * 3600 + 30 * 60;
  const drift = opts.driftPerStep ?? 0;
  const vol = opts.volatility ?? 0.0008;
  const rng = makeRng(opts.seed ?? 1);

  const t0 = sessionTimeToEpochMs(opts.date, start, opts.timeZone) / 1000;
  const ticks: Tick[] = [];
  let price = opts.basePrice;
  for (let s = 0; s <= end - start; s += step) {
    const noise = (rng() * 2 - 1) * vol;
    price = Math.max(0.05, price * (1 + drift + noise));
    ticks.push({ symbol: opts.symbol, ts: t0 + s, price: Math.round(price * 100) / 100 });
  }
  return ticks;
}

/** Merge per-symbol tapes into one stream ordered by time, then symbol. */
export function mergeTapes(tapes: Tick[][]): Tick[] {
  return tapes.flat().sort((a, b) => a.ts - b.ts || a.symbol.localeCompare(b.symbol));
}
