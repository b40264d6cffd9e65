import type { RiskSplit } from "../utils/config.js";

/**
 * Whole shares that fit the risk budget. Zero when the stop distance is unusable.
 */
export function qtyFromRisk(riskBudget: number, riskPerShare: number): number {
  if (!Number.isFinite(riskBudget) || !Number.isFinite(riskPerShare) || riskPerShare <= 0) return 0;
  return Math.max(0, Math.floor(riskBudget / riskPerShare));
}

export function riskPerSymbol(budget: number, symbolCount: number, split: RiskSplit): number {
  if (split === "none" || symbolCount <= 1) return budget;
  return Math.floor(budget / symbolCount);
}
