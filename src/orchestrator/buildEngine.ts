import type { SessionConfig } from "../utils/config.js";
import type { FrequencyIndex } from "../rules/frequencyIndex.js";
import { loadFrequencyIndex } from "../rules/frequencyIndex.js";
import { loadPrevDay } from "../datafeed/prevDay.js";
import { SessionEngine } from "./sessionEngine.js";

/**
 * Load per-symbol masters and the previous-day file, then build the engine.
 */
export async function buildEngine(config: SessionConfig): Promise<SessionEngine> {
  const indexes = new Map<string, FrequencyIndex>();
  for (const symbol of config.symbols) {
    indexes.set(symbol, await loadFrequencyIndex(config.mastersDir, symbol, config.lookbackYears));
  }
  const prevDay = await loadPrevDay(config.prevDayFile);
  for (const symbol of config.symbols) {
    if (!prevDay.has(symbol)) console.warn(`[PrevDay] ${symbol}: no previous-day OHLC, PDC will be TR`);
  }
  return new SessionEngine(config, { frequencyIndexes: indexes, prevDay });
}
