import type { SessionEngine } from "./orchestrator/sessionEngine.js";
import type { MessageGovernor } from "./governor/messageGovernor.js";
import { formatPlanText, formatStatusText } from "./telegram/telegramFormatter.js";

export class CommandHandler {
  private readonly startedAt: number;

  constructor(
    private engine: SessionEngine,
    private governor: MessageGovernor,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = this.now();
  }

  async status(): Promise<string> {
    const uptime = Math.floor((this.now() - this.startedAt) / 1000);
    return [
      formatStatusText(this.engine.snapshot(), this.governor.getMode()),
      "",
      `Uptime: ${uptime}s  Dropped ticks: ${this.engine.getDroppedTickCount()}`,
    ].join("\n");
  }

  async plan(symbolArg?: string): Promise<string> {
    const symbol = symbolArg?.trim().toUpperCase();
    if (!symbol) {
      return `Usage: /plan SYMBOL (one of ${this.engine.getSymbols().join(", ")})`;
    }
    const state = this.engine.getSymbolState(symbol);
    if (!state) {
      return `❌ ${symbol} is not traded this session (symbols: ${this.engine.getSymbols().join(", ")})`;
    }
    return formatPlanText(state);
  }

  async kill(reason?: string): Promise<string> {
    const why = reason?.trim() || "manual /kill";
    if (!this.engine.killSwitch.trip(why, this.now())) {
      return "🛑 Kill switch already ON";
    }
    return `🛑 Kill switch ON (${why}). Open orders flattened, no new entries.`;
  }

  async resume(): Promise<string> {
    if (!this.engine.killSwitch.reset(this.now())) {
      return "Kill switch is already OFF";
    }
    return "▶️ Kill switch OFF. Plans that were not retired can still arm and enter.";
  }
}
