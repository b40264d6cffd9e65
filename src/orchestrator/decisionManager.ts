import type {
  AbstainReason,
  Bar,
  DomainEvent,
  DomainEventType,
  ExitReason,
  Plan,
  PlanStatus,
  PrevDayOhlc,
  SymbolSnapshot,
  SymbolState,
} from "../types.js";
import type { SessionConfig } from "../utils/config.js";
import type { FrequencyIndex } from "../rules/frequencyIndex.js";
import type { KillSwitch } from "../execution/killSwitch.js";
import type { OmsSignal, OrderSimulator, PlanLevels } from "../execution/orderSimulator.js";
import { TagLocker, emptyTagSet } from "../rules/tagLocker.js";
import type { TagCheckpoint } from "../rules/tagLocker.js";
import { pickWithGates } from "../rules/picker.js";
import { buildLevels, orbFromSessionBars } from "../rules/levelEngine.js";
import { qtyFromRisk } from "../rules/riskSizer.js";

export type Checkpoint = "LOCK_PDC" | "LOCK_OL" | "LOCK_OT" | "ARM" | "EOD";

export const CHECKPOINT_ORDER: readonly Checkpoint[] = ["LOCK_PDC", "LOCK_OL", "LOCK_OT", "ARM", "EOD"];

const TAG_CHECKPOINT: Partial<Record<Checkpoint, TagCheckpoint>> = {
  LOCK_PDC: "PDC",
  LOCK_OL: "OL",
  LOCK_OT: "OT",
};

const OPEN_STATUSES: ReadonlySet<PlanStatus> = new Set<PlanStatus>(["ARMED", "ORDER_SENT", "LIVE"]);

export type DecisionContext = {
  config: SessionConfig;
  sessionDate: string;
  prevDay: PrevDayOhlc | null;
  riskBudget: number;       // already split per symbol
  frequencyIndex: FrequencyIndex;
  oms: OrderSimulator;
  killSwitch: KillSwitch;
  emit: (event: DomainEvent) => void;
};

export function emptyPlan(config: Pick<SessionConfig, "entryMode">): Plan {
  return {
    mode: config.entryMode,
    direction: "NONE",
    confidence: 0,
    level: "NA",
    entryRef: null,
    trigger: null,
    stop: null,
    t1: null,
    t2: null,
    qty: 0,
    status: "IDLE",
  };
}

export function toSnapshot(state: SymbolState): SymbolSnapshot {
  const { tags, plan } = state;
  return {
    symbol: state.symbol,
    ltp: state.lastPrice,
    tags: {
      pdc: tags.pdc,
      ol: tags.ol,
      ot: tags.ot,
      first_candle_type: tags.firstCandleType,
      range_status: tags.rangeStatus,
    },
    plan: {
      direction: plan.direction,
      confidence: plan.confidence,
      level: plan.level,
      entry_ref: plan.entryRef,
      trigger: plan.trigger,
      stop: plan.stop,
      t1: plan.t1,
      t2: plan.t2,
      qty: plan.qty,
      status: plan.status,
    },
    unrealized_pnl: state.unrealizedPnl,
    realized_pnl: state.realizedPnl,
    has_position: state.hasPosition,
  };
}

/**
 * Per-symbol plan state machine:
 * IDLE -> ARMED -> ORDER_SENT -> LIVE -> FLAT, with ABSTAINED and MISSED side exits.
 * Checkpoints arrive from the session clock; prices arrive from ticks.
 */
export class DecisionManager {
  readonly state: SymbolState;
  private readonly locker = new TagLocker();
  private fillPx: number | null = null;

  constructor(
    symbol: string,
    private readonly ctx: DecisionContext
  ) {
    this.state = {
      symbol,
      lastPrice: null,
      tags: emptyTagSet(),
      plan: emptyPlan(ctx.config),
      realizedPnl: 0,
      unrealizedPnl: 0,
      hasPosition: false,
    };
  }

  get symbol(): string {
    return this.state.symbol;
  }

  get status(): PlanStatus {
    return this.state.plan.status;
  }

  isOpen(): boolean {
    return OPEN_STATUSES.has(this.state.plan.status);
  }

  /**
   * Run one wall-clock checkpoint. The caller guarantees each fires once per session, in order.
   */
  onCheckpoint(checkpoint: Checkpoint, sessionBars: readonly Bar[], nowMs: number): void {
    const tagCheckpoint = TAG_CHECKPOINT[checkpoint];
    if (tagCheckpoint) {
      const locked = this.locker.lock(tagCheckpoint, this.state.tags, { sessionBars, prevDay: this.ctx.prevDay });
      if (locked) this.emitTagLock(tagCheckpoint, nowMs);
      if (tagCheckpoint === "OT") this.runPicker(nowMs);
      return;
    }
    if (checkpoint === "ARM") {
      this.arm(sessionBars, nowMs);
      return;
    }
    this.endOfDay(nowMs);
  }

  /**
   * Apply a validated price. Trigger detection while ARMED, then OMS sync while an order is live.
   */
  onPrice(price: number, nowMs: number): void {
    if (!Number.isFinite(price)) return;
    this.state.lastPrice = price;
    const plan = this.state.plan;

    if (plan.status === "ARMED" && !this.ctx.killSwitch.isTripped() && plan.trigger !== null) {
      const crossed = plan.direction === "BULL" ? price >= plan.trigger : price <= plan.trigger;
      if (crossed && plan.direction !== "NONE") {
        this.ctx.oms.placeEntry(this.symbol, plan.direction, plan.trigger, plan.qty);
        this.transition("ORDER_SENT", nowMs, "ORDER_SENT", { price });
      }
    }

    if (plan.status === "ORDER_SENT" || plan.status === "LIVE") {
      const levels = this.planLevels();
      if (levels) {
        const signal = this.ctx.oms.sync(this.symbol, price, levels);
        if (signal) this.applySignal(signal, nowMs);
      }
    }

    this.markToMarket();
  }

  /**
   * Kill switch tripped: flatten anything open, retire armed plans, leave terminal states alone.
   */
  onKillSwitch(nowMs: number): void {
    const status = this.state.plan.status;
    if (status === "ORDER_SENT" || status === "LIVE") {
      this.flatten("KILL_SWITCH", nowMs);
    } else if (status === "ARMED") {
      this.transition("MISSED", nowMs, "PLAN_MISSED", { reason: "kill switch" });
    }
  }

  snapshot(): SymbolSnapshot {
    return toSnapshot(this.state);
  }

  private runPicker(nowMs: number): void {
    const plan = this.state.plan;
    if (plan.status !== "IDLE" && plan.status !== "ABSTAINED") return;
    if (this.ctx.killSwitch.isTripped()) return;

    const { tags } = this.state;
    const tables = this.ctx.frequencyIndex.tablesFor(this.ctx.sessionDate, tags);
    const pick = pickWithGates(tables, tags.ot, this.ctx.config.picker);

    plan.direction = pick.direction;
    plan.confidence = pick.confidence;
    plan.level = pick.level;

    if (pick.direction === "NONE") {
      this.abstain("NO_QUALIFYING_TIER", nowMs);
      return;
    }
    console.log(`[Engine] ${this.symbol} pick ${pick.direction} ${pick.confidence}% @${pick.level}`);
    this.emit("PICK", nowMs, { plan: { ...plan } });
  }

  private arm(sessionBars: readonly Bar[], nowMs: number): void {
    const plan = this.state.plan;
    if (plan.status !== "IDLE") return;
    if (this.ctx.killSwitch.isTripped()) return;
    if (!this.locker.isFullyLocked(this.state.tags)) return;
    if (plan.direction === "NONE") {
      this.abstain("NO_DIRECTION", nowMs);
      return;
    }

    const orb = orbFromSessionBars(sessionBars);
    if (!orb) {
      this.abstain("INSUFFICIENT_BARS", nowMs);
      return;
    }

    const result = buildLevels(plan.direction, this.state.tags.ot, orb, this.ctx.prevDay);
    if (!result.ok) {
      if (result.reason === "RR_FLOOR_VIOLATION") {
        console.error(`[Engine] ${this.symbol} refusing to arm, risk:reward floor broken (${result.detail})`);
      }
      this.abstain(result.reason, nowMs);
      return;
    }

    const { levels } = result;
    plan.entryRef = levels.entryRef;
    plan.stop = levels.stop;
    plan.t1 = levels.t1;
    plan.t2 = levels.t2;

    const qty = qtyFromRisk(this.ctx.riskBudget, levels.riskPerShare);
    if (qty <= 0) {
      this.abstain("ZERO_QTY", nowMs);
      return;
    }
    plan.qty = qty;
    plan.trigger = levels.entryRef;
    this.transition("ARMED", nowMs, "PLAN_ARMED", { plan: { ...plan } });
  }

  private endOfDay(nowMs: number): void {
    const status = this.state.plan.status;
    if (OPEN_STATUSES.has(status)) {
      this.flatten("EOD", nowMs);
    } else if (status === "IDLE") {
      this.transition("MISSED", nowMs, "PLAN_MISSED", { reason: "end of day before arming" });
    }
  }

  /** Unconditional close. Forced exits settle at the last seen price. */
  private flatten(reason: ExitReason, nowMs: number): void {
    this.ctx.oms.forceExit(this.symbol);
    const px = this.state.lastPrice;
    if (this.fillPx !== null && px !== null) this.realize(px);
    this.closePosition();
    this.transition("FLAT", nowMs, "POSITION_CLOSED", {
      exitReason: reason,
      price: px ?? undefined,
      realizedPnl: this.state.realizedPnl,
    });
  }

  private applySignal(signal: OmsSignal, nowMs: number): void {
    switch (signal.event) {
      case "PENDING":
      case "HOLD":
        return;
      case "FILLED":
        this.fillPx = signal.price;
        this.state.hasPosition = true;
        this.transition("LIVE", nowMs, "ORDER_FILLED", { price: signal.price });
        return;
      case "T1_HIT":
        console.log(`[Engine] ${this.symbol} T1 reached at ${signal.price}`);
        this.emit("TARGET1_HIT", nowMs, { price: signal.price });
        return;
      case "STOP_HIT":
      case "T2_HIT":
        this.realize(signal.price);
        this.closePosition();
        this.transition("FLAT", nowMs, "POSITION_CLOSED", {
          exitReason: signal.event,
          price: signal.price,
          realizedPnl: this.state.realizedPnl,
        });
        return;
    }
  }

  private realize(exitPx: number): void {
    if (this.fillPx === null) return;
    const sign = this.state.plan.direction === "BEAR" ? -1 : 1;
    this.state.realizedPnl += sign * (exitPx - this.fillPx) * this.state.plan.qty;
  }

  private closePosition(): void {
    this.fillPx = null;
    this.state.hasPosition = false;
    this.state.unrealizedPnl = 0;
  }

  private markToMarket(): void {
    const px = this.state.lastPrice;
    if (this.fillPx === null || px === null) {
      this.state.unrealizedPnl = 0;
      return;
    }
    const sign = this.state.plan.direction === "BEAR" ? -1 : 1;
    this.state.unrealizedPnl = sign * (px - this.fillPx) * this.state.plan.qty;
  }

  private planLevels(): PlanLevels | null {
    const { trigger, stop, t1, t2 } = this.state.plan;
    if (trigger === null || stop === null || t1 === null || t2 === null) return null;
    return { trigger, stop, t1, t2 };
  }

  private abstain(reason: AbstainReason, nowMs: number): void {
    this.state.plan.abstainReason = reason;
    this.transition("ABSTAINED", nowMs, "PLAN_ABSTAINED", { reason });
  }

  private transition(next: PlanStatus, nowMs: number, type: DomainEventType, data: DomainEvent["data"]): void {
    const prev = this.state.plan.status;
    this.state.plan.status = next;
    if (prev !== next) console.log(`[Engine] ${this.symbol} ${prev} -> ${next}`);
    this.emit(type, nowMs, { status: next, ...data });
  }

  private emitTagLock(checkpoint: TagCheckpoint, nowMs: number): void {
    const t = this.state.tags;
    const tags =
      checkpoint === "PDC"
        ? { pdc: t.pdc }
        : checkpoint === "OL"
          ? { ol: t.ol }
          : { ot: t.ot, firstCandleType: t.firstCandleType, rangeStatus: t.rangeStatus };
    this.emit("TAGS_LOCKED", nowMs, { tags, reason: checkpoint });
  }

  private emit(type: DomainEventType, nowMs: number, data: DomainEvent["data"]): void {
    this.ctx.emit({ type, timestamp: nowMs, symbol: this.symbol, sessionDate: this.ctx.sessionDate, data });
  }
}
