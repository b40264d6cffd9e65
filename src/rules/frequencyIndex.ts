import { promises as fs } from "node:fs";
import path from "node:path";
import type { FrequencyTable, OpenLocation, TagSet, Tier, TrendTag } from "../types.js";

export type MasterRow = {
  date: string;  // YYYY-MM-DD
  openingTrend: TrendTag;
  openLocation: OpenLocation;
  prevDayContext: TrendTag;
  result: TrendTag;
};

export type MasterParseResult = {
  rows: MasterRow[];
  rejected: number;
};

const TREND_TAGS: ReadonlySet<string> = new Set<TrendTag>(["BULL", "BEAR", "TR"]);
const OPEN_LOCATIONS: ReadonlySet<string> = new Set<OpenLocation>(["OAR", "OOH", "OIM", "OOL", "OBR"]);

export const TIERS: readonly Tier[] = ["L3", "L2", "L1", "L0"];

function isTrendTag(v: string): v is TrendTag {
  return TREND_TAGS.has(v);
}

function isOpenLocation(v: string): v is OpenLocation {
  return OPEN_LOCATIONS.has(v);
}

function norm(v: unknown): string {
  return typeof v === "string" ? v.trim().toUpperCase() : "";
}

function parseRow(raw: unknown): MasterRow | null {
  if (typeof raw !== "object" || raw === null) return null;
  const field = (key: string): unknown => Reflect.get(raw, key);
  const rawDate = field("date");
  const date = typeof rawDate === "string" ? rawDate.trim() : "";
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || Number.isNaN(Date.parse(`${date}T00:00:00Z`))) return null;

  const ot = norm(field("openingTrend"));
  const ol = norm(field("openLocation"));
  const pdc = norm(field("prevDayContext"));
  const result = norm(field("result"));
  if (!isTrendTag(ot) || !isOpenLocation(ol) || !isTrendTag(pdc) || !isTrendTag(result)) return null;

  return { date, openingTrend: ot, openLocation: ol, prevDayContext: pdc, result };
}

/**
 * Validate untyped master history. Rows that do not parse are counted, not thrown.
 */
export function parseMasterRows(raw: unknown): MasterParseResult {
  if (!Array.isArray(raw)) return { rows: [], rejected: 0 };
  const rows: MasterRow[] = [];
  let rejected = 0;
  for (const item of raw) {
    const row = parseRow(item);
    if (row) rows.push(row);
    else rejected++;
  }
  rows.sort((a, b) => a.date.localeCompare(b.date));
  return { rows, rejected };
}

function shiftYears(date: string, years: number): string {
  const y = Number(date.slice(0, 4));
  return `${String(y - years).padStart(4, "0")}${date.slice(4)}`;
}

function isWeekday(date: string): boolean {
  const dow = new Date(`${date}T00:00:00Z`).getUTCDay();
  return dow >= 1 && dow <= 5;
}

export class FrequencyIndex {
  constructor(
    private readonly rows: readonly MasterRow[],
    private readonly lookbackYears: number = 6
  ) {}

  size(): number {
    return this.rows.length;
  }

  /** Weekday rows strictly before the session date, inside the lookback window. */
  private window(sessionDate: string): MasterRow[] {
    const start = shiftYears(sessionDate, this.lookbackYears);
    return this.rows.filter((r) => r.date < sessionDate && r.date >= start && isWeekday(r.date));
  }

  /**
   * Per-tier BULL/BEAR counts for the locked tag signature, most specific tier first.
   * A tier whose required tag is missing counts nothing.
   */
  tablesFor(sessionDate: string, tags: Pick<TagSet, "ot" | "ol" | "pdc">): FrequencyTable[] {
    const base = this.window(sessionDate);
    const { ot, ol, pdc } = tags;

    const matchers: Record<Tier, (r: MasterRow) => boolean> = {
      L3: (r) => ot !== null && ol !== null && pdc !== null && r.openingTrend === ot && r.openLocation === ol && r.prevDayContext === pdc,
      L2: (r) => ot !== null && ol !== null && r.openingTrend === ot && r.openLocation === ol,
      L1: (r) => ot !== null && r.openingTrend === ot,
      L0: () => true,
    };

    return TIERS.map((tier) => {
      let bull = 0;
      let bear = 0;
      for (const r of base) {
        if (!matchers[tier](r)) continue;
        if (r.result === "BULL") bull++;
        else if (r.result === "BEAR") bear++;
      }
      return { tier, bull, bear };
    });
  }
}

/**
 * Load data/masters/<SYMBOL>.json. A missing file yields an empty index.
 */
export async function loadFrequencyIndex(mastersDir: string, symbol: string, lookbackYears: number): Promise<FrequencyIndex> {
  const file = path.join(mastersDir, `${symbol.toUpperCase()}.json`);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      console.warn(`[Masters] ${symbol}: no master file at ${file}, picks will abstain`);
      return new FrequencyIndex([], lookbackYears);
    }
    throw err;
  }

  const { rows, rejected } = parseMasterRows(JSON.parse(raw));
  if (rejected > 0) {
    console.warn(`[Masters] ${symbol}: rejected ${rejected} malformed row(s)`);
  }
  console.log(`[Masters] ${symbol}: ${rows.length} row(s) loaded`);
  return new FrequencyIndex(rows, lookbackYears);
}
