import type { Tick } from "../types.js";

function field(obj: object, ...keys: string[]): unknown {
  for (const k of keys) {
    const v: unknown = Reflect.get(obj, k);
    if (v !== undefined) return v;
  }
  return undefined;
}

function toNumber(v: unknown): number {
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "") return Number(v);
  return Number.NaN;
}

/**
 * Normalize one wire tick. Timestamps above 1e12 are taken as milliseconds.
 * Returns null for anything without a symbol, a finite timestamp and a finite price.
 */
export function parseTick(raw: unknown): Tick | null {
  if (typeof raw !== "object" || raw === null) return null;
  const symbolRaw = field(raw, "symbol", "S");
  const symbol = typeof symbolRaw === "string" ? symbolRaw.trim().toUpperCase() : "";
  let ts = toNumber(field(raw, "ts", "timestamp", "t"));
  const price = toNumber(field(raw, "price", "ltp", "p"));
  if (!symbol || !Number.isFinite(ts) || !Number.isFinite(price)) return null;
  if (ts > 1e12) ts = ts / 1000;

  const volume = toNumber(field(raw, "volume", "v"));
  return Number.isFinite(volume) ? { symbol, ts, price, volume } : { symbol, ts, price };
}

/** One object or an array of them. */
export function parseTickMessage(raw: unknown): Tick[] {
  const items: unknown[] = Array.isArray(raw) ? raw : [raw];
  const ticks: Tick[] = [];
  for (const item of items) {
    const tick = parseTick(item);
    if (tick) ticks.push(tick);
  }
  return ticks;
}
