import type { Bar, DomainEvent, PrevDayOhlc, SymbolSnapshot, SymbolState, Tick } from "../types.js";
import type { Checkpoints, SessionConfig } from "../utils/config.js";
import { formatClockTime, getSessionParts, sessionTimeToEpochMs } from "../utils/timeUtils.js";
import { BarAggregator } from "../datafeed/barAggregator.js";
import { FrequencyIndex } from "../rules/frequencyIndex.js";
import { riskPerSymbol } from "../rules/riskSizer.js";
import { sessionOhlc } from "../rules/tagRules.js";
import { KillSwitch } from "../execution/killSwitch.js";
import type { KillSwitchState } from "../execution/killSwitch.js";
import { OrderSimulator } from "../execution/orderSimulator.js";
import { CHECKPOINT_ORDER, DecisionManager } from "./decisionManager.js";
import type { Checkpoint } from "./decisionManager.js";

export type SessionEngineDeps = {
  frequencyIndexes?: Map<string, FrequencyIndex>;
  prevDay?: Map<string, PrevDayOhlc>;
  killSwitch?: KillSwitch;
  oms?: OrderSimulator;
};

export type EngineSnapshot = {
  sessionDate: string | null;
  killSwitch: KillSwitchState;
  totalPnl: number;
  symbols: SymbolSnapshot[];
};

type Worker = {
  manager: DecisionManager;
  aggregator: BarAggregator;
  closedBars: Bar[];
};

type EventListener = (event: DomainEvent) => void;

function checkpointTime(checkpoints: Checkpoints, cp: Checkpoint): number {
  switch (cp) {
    case "LOCK_PDC":
      return checkpoints.lockPdc;
    case "LOCK_OL":
      return checkpoints.lockOl;
    case "LOCK_OT":
      return checkpoints.lockOt;
    case "ARM":
      return checkpoints.arm;
    case "EOD":
      return checkpoints.eod;
  }
}

/**
 * Owns one worker per configured symbol for the current session date and drives
 * the wall-clock checkpoints. Each checkpoint fires exactly once per session, whether
 * or not a tick arrives, as long as advanceClock() is called past it.
 */
export class SessionEngine {
  readonly killSwitch: KillSwitch;
  readonly oms: OrderSimulator;

  private readonly frequencyIndexes: Map<string, FrequencyIndex>;
  private readonly prevDay: Map<string, PrevDayOhlc>;
  private readonly riskBudget: number;
  private workers: Map<string, Worker> = new Map();
  private listeners: EventListener[] = [];
  private fired: Set<Checkpoint> = new Set();
  private sessionDate: string | null = null;
  private sessionOpenSec = 0;
  private droppedTicks = 0;

  constructor(
    private readonly config: SessionConfig,
    deps: SessionEngineDeps = {}
  ) {
    this.frequencyIndexes = deps.frequencyIndexes ?? new Map();
    this.prevDay = new Map(deps.prevDay ?? []);
    this.killSwitch = deps.killSwitch ?? new KillSwitch();
    this.oms = deps.oms ?? new OrderSimulator();
    this.riskBudget = riskPerSymbol(config.riskBudget, config.symbols.length, config.riskSplit);

    this.killSwitch.onChange((state) => this.handleKillSwitch(state));
  }

  onEvent(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getSessionDate(): string | null {
    return this.sessionDate;
  }

  getRiskPerSymbol(): number {
    return this.riskBudget;
  }

  getSymbols(): string[] {
    return [...this.config.symbols];
  }

  getDroppedTickCount(): number {
    let stale = 0;
    for (const w of this.workers.values()) stale += w.aggregator.getStaleTickCount();
    return this.droppedTicks + stale;
  }

  hasFired(cp: Checkpoint): boolean {
    return this.fired.has(cp);
  }

  /**
   * Fire every checkpoint due at `nowMs` that has not fired yet this session.
   * A new session date rolls every worker over first.
   */
  advanceClock(nowMs: number): void {
    if (!Number.isFinite(nowMs)) return;
    const { date, secondsOfDay, weekday } = getSessionParts(nowMs, this.config.timeZone);

    if (this.sessionDate === null || date > this.sessionDate) {
      this.rollover(date, nowMs);
    } else if (date < this.sessionDate) {
      return;
    }

    if (weekday === 0 || weekday === 6) return;

    for (const cp of CHECKPOINT_ORDER) {
      if (this.fired.has(cp)) continue;
      const at = checkpointTime(this.config.checkpoints, cp);
      if (secondsOfDay < at) break;
      this.fire(cp, nowMs);
    }
  }

  /**
   * Process one tick. Returns false when the tick was dropped.
   */
  onTick(tick: Tick): boolean {
    const symbol = typeof tick.symbol === "string" ? tick.symbol.trim().toUpperCase() : "";
    if (!Number.isFinite(tick.ts) || !Number.isFinite(tick.price) || tick.price <= 0) {
      this.droppedTicks++;
      return false;
    }

    const nowMs = tick.ts * 1000;
    this.advanceClock(nowMs);

    const worker = this.workers.get(symbol);
    if (!worker || getSessionParts(nowMs, this.config.timeZone).date !== this.sessionDate) {
      this.droppedTicks++;
      return false;
    }

    const { outcome, closed } = worker.aggregator.push(tick.ts, tick.price);
    if (outcome === "stale" || outcome === "ignored") return false;
    if (closed) worker.closedBars.push(closed);

    worker.manager.onPrice(tick.price, nowMs);
    this.checkLossCap(nowMs);
    return true;
  }

  /** Closed session bars plus the one still forming. */
  getSessionBars(symbol: string): Bar[] {
    const worker = this.workers.get(symbol.toUpperCase());
    return worker ? this.sessionBars(worker) : [];
  }

  getSymbolState(symbol: string): Readonly<SymbolState> | null {
    return this.workers.get(symbol.toUpperCase())?.manager.state ?? null;
  }

  getSnapshot(symbol: string): SymbolSnapshot | null {
    return this.workers.get(symbol.toUpperCase())?.manager.snapshot() ?? null;
  }

  totalPnl(): number {
    let total = 0;
    for (const w of this.workers.values()) {
      total += w.manager.state.realizedPnl + w.manager.state.unrealizedPnl;
    }
    return total;
  }

  snapshot(): EngineSnapshot {
    return {
      sessionDate: this.sessionDate,
      killSwitch: this.killSwitch.getState(),
      totalPnl: this.totalPnl(),
      symbols: [...this.workers.values()].map((w) => w.manager.snapshot()),
    };
  }

  private sessionBars(worker: Worker): Bar[] {
    const bars = [...worker.closedBars];
    const forming = worker.aggregator.peek();
    if (forming) bars.push(forming);
    return bars.filter((b) => b.bucketStart >= this.sessionOpenSec);
  }

  private fire(cp: Checkpoint, nowMs: number): void {
    this.fired.add(cp);
    const at = formatClockTime(checkpointTime(this.config.checkpoints, cp));
    console.log(`[Engine] ${this.sessionDate} checkpoint ${cp} (${at})`);
    for (const w of this.workers.values()) {
      w.manager.onCheckpoint(cp, this.sessionBars(w), nowMs);
    }
  }

  private rollover(date: string, nowMs: number): void {
    if (this.sessionDate !== null) {
      if (this.fired.size > 0 && !this.fired.has("EOD")) this.fire("EOD", nowMs);
      for (const [symbol, w] of this.workers) {
        const ohlc = sessionOhlc(this.sessionBars(w));
        if (ohlc) this.prevDay.set(symbol, ohlc);
      }
      console.log(`[Engine] session ${this.sessionDate} closed, total P&L ${this.totalPnl().toFixed(2)}`);
    }

    this.sessionDate = date;
    this.sessionOpenSec = Math.floor(
      sessionTimeToEpochMs(date, this.config.checkpoints.sessionOpen, this.config.timeZone) / 1000
    );
    this.fired.clear();
    this.oms.reset();
    this.killSwitch.reset(nowMs);

    this.workers = new Map();
    for (const symbol of this.config.symbols) {
      const manager = new DecisionManager(symbol, {
        config: this.config,
        sessionDate: date,
        prevDay: this.prevDay.get(symbol) ?? null,
        riskBudget: this.riskBudget,
        frequencyIndex: this.frequencyIndexes.get(symbol) ?? new FrequencyIndex([], this.config.lookbackYears),
        oms: this.oms,
        killSwitch: this.killSwitch,
        emit: (event) => this.dispatch(event),
      });
      this.workers.set(symbol, {
        manager,
        aggregator: new BarAggregator(this.config.barSeconds),
        closedBars: [],
      });
    }
    console.log(`[Engine] session ${date} opened for ${this.config.symbols.join(",")} (risk/symbol ${this.riskBudget})`);
  }

  private checkLossCap(nowMs: number): void {
    const cap = this.config.dailyLossCap;
    if (cap <= 0 || this.killSwitch.isTripped()) return;
    const pnl = this.totalPnl();
    if (pnl <= -cap) {
      this.killSwitch.trip(`daily loss cap ${cap} reached (P&L ${pnl.toFixed(2)})`, nowMs);
    }
  }

  private handleKillSwitch(state: KillSwitchState): void {
    const nowMs = state.at ?? Date.now();
    if (state.tripped) {
      for (const w of this.workers.values()) w.manager.onKillSwitch(nowMs);
    }
    this.dispatch({
      type: "KILL_SWITCH",
      timestamp: nowMs,
      symbol: "*",
      sessionDate: this.sessionDate ?? "",
      data: { reason: state.tripped ? (state.reason ?? "tripped") : "reset" },
    });
  }

  private dispatch(event: DomainEvent): void {
    for (const l of this.listeners) {
      try {
        l(event);
      } catch (err: unknown) {
        console.error(`[Engine] event listener failed for ${event.type}:`, err);
      }
    }
  }
}
