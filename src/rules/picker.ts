import type { Direction, FrequencyTable, PickResult, Tier, TrendTag } from "../types.js";
import type { PickerConfig } from "../utils/config.js";
import { TIERS } from "./frequencyIndex.js";

export const ABSTAIN: PickResult = Object.freeze({ direction: "NONE", confidence: 0, level: "NA" });

function chooseDirection(bull: number, bear: number): { direction: Direction; confidence: number } {
  const total = bull + bear;
  const direction: Direction = bull >= bear ? "BULL" : "BEAR";
  const confidence = Math.round((100 * Math.max(bull, bear)) / total);
  return { direction, confidence };
}

/**
 * Frequency pick L3 -> L0 with sample and confidence gates.
 * First qualifying tier wins; no qualifying tier is an ABSTAIN, not an error.
 */
export function pickWithGates(
  tables: readonly FrequencyTable[],
  openingTrend: TrendTag | null,
  config: PickerConfig
): PickResult {
  const byTier = new Map<Tier, FrequencyTable>(tables.map((t) => [t.tier, t]));

  for (const tier of TIERS) {
    const counts = byTier.get(tier);
    const bull = counts?.bull ?? 0;
    const bear = counts?.bear ?? 0;
    const total = bull + bear;
    if (total === 0 || total < config.minSample[tier]) continue;

    const { direction, confidence } = chooseDirection(bull, bear);
    if (config.requireOtAlign && (openingTrend === "BULL" || openingTrend === "BEAR") && direction !== openingTrend) {
      continue;
    }
    if (confidence < config.minConfidence) continue;

    return { direction, confidence, level: tier };
  }
  return ABSTAIN;
}
