import { promises as fs } from "node:fs";
import type { PrevDayOhlc } from "../types.js";

function readOhlc(raw: unknown): PrevDayOhlc | null {
  if (typeof raw !== "object" || raw === null) return null;
  const num = (key: string): number => {
    const v: unknown = Reflect.get(raw, key);
    return typeof v === "number" ? v : Number.NaN;
  };
  const ohlc = { open: num("open"), high: num("high"), low: num("low"), close: num("close") };
  if (![ohlc.open, ohlc.high, ohlc.low, ohlc.close].every(Number.isFinite)) return null;
  if (ohlc.high < ohlc.low) return null;
  return ohlc;
}

/**
 * `{ "SBIN": {open, high, low, close}, ... }` keyed by symbol. Bad entries are skipped with a warning.
 */
export function parsePrevDay(raw: unknown): Map<string, PrevDayOhlc> {
  const out = new Map<string, PrevDayOhlc>();
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return out;
  for (const [symbol, value] of Object.entries(raw)) {
    const ohlc = readOhlc(value);
    if (ohlc) out.set(symbol.trim().toUpperCase(), ohlc);
    else console.warn(`[PrevDay] ${symbol}: malformed OHLC, ignored`);
  }
  return out;
}

export async function loadPrevDay(file: string): Promise<Map<string, PrevDayOhlc>> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      console.warn(`[PrevDay] no file at ${file}, previous-day context starts empty`);
      return new Map();
    }
    throw err;
  }
  return parsePrevDay(JSON.parse(raw));
}
