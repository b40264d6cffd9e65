import type { SymbolSnapshot } from "../types.js";

/**
 * Persisted state schema (versioned)
 */
export interface PersistedEngineStateV1 {
  version: 1;
  instanceId: string;
  savedAt: number;
  sessionDate: string | null;   // session-timezone date "YYYY-MM-DD"
  killSwitch: {
    tripped: boolean;
    reason: string | null;
    at: number | null;
  };
  totalPnl: number;
  symbols: SymbolSnapshot[];
  governor?: GovernorPersistedState;
}

export type GovernorPersistedState = {
  dedupe?: Record<string, number>; // key -> timestamp when sent
};

export type PersistedEngineState = PersistedEngineStateV1;
