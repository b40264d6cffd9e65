import type { BotMode, DomainEvent, Plan, SymbolSnapshot, SymbolState, TagSet } from "../types.js";
import type { EngineSnapshot } from "../orchestrator/sessionEngine.js";

const formatPrice = (value: number | null | undefined): string =>
  typeof value === "number" && Number.isFinite(value) ? value.toFixed(2) : "n/a";

const formatPnl = (value: number): string => `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;

function getDirectionEmoji(direction: string): string {
  if (direction === "BULL") return "🟢";
  if (direction === "BEAR") return "🔴";
  return "⚪";
}

function formatTags(tags: Partial<TagSet>): string {
  const parts: string[] = [];
  if ("pdc" in tags) parts.push(`PDC=${tags.pdc ?? "n/a"}`);
  if ("ol" in tags) parts.push(`OL=${tags.ol ?? "n/a"}`);
  if ("ot" in tags) parts.push(`OT=${tags.ot ?? "n/a"}`);
  if ("firstCandleType" in tags) parts.push(`FCT=${tags.firstCandleType ?? "n/a"}`);
  if ("rangeStatus" in tags) parts.push(`RS=${tags.rangeStatus ?? "n/a"}`);
  return parts.join(" ");
}

function formatLevels(plan: Pick<Plan, "trigger" | "stop" | "t1" | "t2">): string[] {
  return [
    `Trigger: ${formatPrice(plan.trigger)}  Stop: ${formatPrice(plan.stop)}`,
    `T1: ${formatPrice(plan.t1)}  T2: ${formatPrice(plan.t2)}`,
  ];
}

/**
 * One Telegram message per domain event. Null for events that carry nothing to show.
 */
export function formatEventText(event: DomainEvent): string | null {
  const sym = event.symbol;
  const d = event.data;

  switch (event.type) {
    case "TAGS_LOCKED":
      return d.tags ? `🔒 ${sym} tags locked (${d.reason ?? "?"}): ${formatTags(d.tags)}` : null;
    case "PICK":
      return d.plan
        ? `🎯 ${sym} pick ${getDirectionEmoji(d.plan.direction)} ${d.plan.direction} ${d.plan.confidence}% @${d.plan.level}`
        : null;
    case "PLAN_ABSTAINED":
      return `⚪ ${sym} ABSTAINED: ${d.reason ?? "no reason"}`;
    case "PLAN_ARMED":
      if (!d.plan) return null;
      return [
        `${getDirectionEmoji(d.plan.direction)} ${sym} ARMED ${d.plan.direction} qty ${d.plan.qty}`,
        ...formatLevels(d.plan),
      ].join("\n");
    case "ORDER_SENT":
      return `📤 ${sym} order sent @ ${formatPrice(d.price)}`;
    case "ORDER_FILLED":
      return `✅ ${sym} filled @ ${formatPrice(d.price)}`;
    case "TARGET1_HIT":
      return `🎯 ${sym} T1 reached @ ${formatPrice(d.price)}`;
    case "POSITION_CLOSED":
      return `🏁 ${sym} FLAT (${d.exitReason ?? "?"}) @ ${formatPrice(d.price)}  P&L ${formatPnl(d.realizedPnl ?? 0)}`;
    case "PLAN_MISSED":
      return `⏭️ ${sym} MISSED: ${d.reason ?? "no reason"}`;
    case "KILL_SWITCH":
      return d.reason === "reset" ? "▶️ Kill switch reset, new entries allowed" : `🛑 KILL SWITCH: ${d.reason ?? "tripped"}`;
  }
}

function formatSymbolLine(s: SymbolSnapshot): string {
  const p = s.plan;
  const pick = p.direction === "NONE" ? "no pick" : `${p.direction} ${p.confidence}% @${p.level}`;
  const pos = s.has_position ? `  uPnL ${formatPnl(s.unrealized_pnl)}` : "";
  return `${s.symbol}  LTP ${formatPrice(s.ltp)}  ${pick}  ${p.status}${p.qty > 0 ? ` qty ${p.qty}` : ""}${pos}  rPnL ${formatPnl(s.realized_pnl)}`;
}

export function formatStatusText(snapshot: EngineSnapshot, mode: BotMode): string {
  const ks = snapshot.killSwitch;
  return [
    "=== Session Status ===",
    `Session: ${snapshot.sessionDate ?? "not started"}  Mode: ${mode}`,
    `Kill switch: ${ks.tripped ? `ON (${ks.reason ?? "manual"})` : "OFF"}`,
    `Day P&L: ${formatPnl(snapshot.totalPnl)}`,
    "",
    ...(snapshot.symbols.length ? snapshot.symbols.map(formatSymbolLine) : ["No symbols yet"]),
  ].join("\n");
}

export function formatPlanText(state: Readonly<SymbolState>): string {
  const { plan, tags } = state;
  const lines = [
    `${getDirectionEmoji(plan.direction)} ${state.symbol} ${plan.status}`,
    `Tags: ${formatTags(tags)}`,
    `Pick: ${plan.direction} ${plan.confidence}% @${plan.level}`,
  ];
  if (plan.entryRef !== null) {
    lines.push(`Entry ref: ${formatPrice(plan.entryRef)}  Qty: ${plan.qty}`);
    lines.push(...formatLevels(plan));
  }
  if (plan.abstainReason) lines.push(`Abstain reason: ${plan.abstainReason}`);
  lines.push(`LTP: ${formatPrice(state.lastPrice)}  P&L: ${formatPnl(state.realizedPnl + state.unrealizedPnl)}`);
  return lines.join("\n");
}
