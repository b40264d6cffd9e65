import type { BotMode, DomainEvent, DomainEventType } from "../types.js";
import type { GovernorPersistedState } from "../persistence/persistedState.js";

// Outside market hours only these still reach the chat
const QUIET_ALLOWED: ReadonlySet<DomainEventType> = new Set<DomainEventType>(["KILL_SWITCH", "POSITION_CLOSED"]);

export class MessageGovernor {
  private mode: BotMode = "QUIET";
  private dedupe: Map<string, number> = new Map();
  private readonly dedupeMaxKeys: number;
  private readonly dedupeTtlMs: number;

  constructor(initial?: GovernorPersistedState, private readonly now: () => number = Date.now) {
    this.dedupeMaxKeys = Number(process.env.DEDUPE_MAX_KEYS || 2500);
    this.dedupeTtlMs = Number(process.env.DEDUPE_TTL_MS || 48 * 60 * 60 * 1000); // 48h

    if (initial?.dedupe) {
      for (const [k, v] of Object.entries(initial.dedupe)) {
        if (typeof v === "number" && Number.isFinite(v)) this.dedupe.set(k, v);
      }
      this.pruneDedupe(this.now());
    }
  }

  setMode(mode: BotMode): void {
    this.mode = mode;
  }

  getMode(): BotMode {
    return this.mode;
  }

  exportState(): GovernorPersistedState {
    const dedupe: Record<string, number> = {};
    for (const [k, v] of this.dedupe.entries()) dedupe[k] = v;
    return {
      dedupe: Object.keys(dedupe).length ? dedupe : undefined,
    };
  }

  private pruneDedupe(nowMs: number): void {
    // TTL prune
    for (const [k, v] of this.dedupe.entries()) {
      if (nowMs - v > this.dedupeTtlMs) this.dedupe.delete(k);
    }

    // Size prune (remove oldest)
    if (this.dedupe.size <= this.dedupeMaxKeys) return;
    const entries = [...this.dedupe.entries()].sort((a, b) => a[1] - b[1]);
    const toRemove = this.dedupe.size - this.dedupeMaxKeys;
    for (let i = 0; i < toRemove; i++) this.dedupe.delete(entries[i]![0]);
  }

  private hasDedupe(key: string): boolean {
    const v = this.dedupe.get(key);
    if (typeof v !== "number") return false;
    if (this.now() - v > this.dedupeTtlMs) {
      this.dedupe.delete(key);
      return false;
    }
    return true;
  }

  private markDedupe(key: string, atMs: number): void {
    this.dedupe.set(key, atMs);
    this.pruneDedupe(atMs);
  }

  /**
   * One key per plan transition per symbol per session, so a replayed or
   * restarted session never re-announces the same step.
   */
  getDedupeKey(event: DomainEvent): string {
    const base = `${event.sessionDate}_${event.symbol}_${event.type}`;
    switch (event.type) {
      case "KILL_SWITCH":
        return `${base}_${event.timestamp}`;
      case "TAGS_LOCKED":
        return `${base}_${event.data.reason ?? ""}`;
      case "POSITION_CLOSED":
        return `${base}_${event.data.exitReason ?? ""}`;
      default:
        return base;
    }
  }

  /**
   * Single choke point for all Telegram messages
   * Returns true if message should be sent, false if blocked
   */
  shouldSend(event: DomainEvent): boolean {
    if (this.mode === "QUIET" && !QUIET_ALLOWED.has(event.type)) return false;

    const key = this.getDedupeKey(event);
    if (this.hasDedupe(key)) return false;
    this.markDedupe(key, this.now());
    return true;
  }
}
