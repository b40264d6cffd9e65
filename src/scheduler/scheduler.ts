import type { BotMode } from "../types.js";
import type { SessionConfig } from "../utils/config.js";
import { formatClockTime, getSessionParts } from "../utils/timeUtils.js";
import type { MessageGovernor } from "../governor/messageGovernor.js";
import type { SessionEngine } from "../orchestrator/sessionEngine.js";

// Alerts keep flowing this long after the end-of-day flatten
const ACTIVE_GRACE_SECONDS = 5 * 60;

export type SchedulerOptions = {
  intervalMs?: number;
  now?: () => number;
  onModeChange?: (mode: BotMode) => void;
};

/**
 * Wall-clock driver: advances the engine clock every interval so checkpoints fire on a
 * quiet market, and flips the governor between ACTIVE (session hours) and QUIET.
 */
export class Scheduler {
  private checkInterval: NodeJS.Timeout | null = null;
  private lastLogTime: number = 0;
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(
    private engine: SessionEngine,
    private config: SessionConfig,
    private governor: MessageGovernor,
    private options: SchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    this.checkInterval = setInterval(() => {
      this.runOnce(this.now());
    }, this.intervalMs);

    // Initial tick
    this.runOnce(this.now());
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  modeAt(nowMs: number): BotMode {
    const { secondsOfDay, weekday } = getSessionParts(nowMs, this.config.timeZone);
    if (weekday === 0 || weekday === 6) return "QUIET";
    const { sessionOpen, eod } = this.config.checkpoints;
    return secondsOfDay >= sessionOpen && secondsOfDay < eod + ACTIVE_GRACE_SECONDS ? "ACTIVE" : "QUIET";
  }

  runOnce(nowMs: number): void {
    const mode = this.modeAt(nowMs);
    if (this.governor.getMode() !== mode) {
      const at = formatClockTime(getSessionParts(nowMs, this.config.timeZone).secondsOfDay);
      console.log(`[Scheduler] Switching to ${mode} mode (${at} ${this.config.timeZone})`);
      this.governor.setMode(mode);
      this.options.onModeChange?.(mode);
    }

    this.engine.advanceClock(nowMs);

    // Log the clock once per minute to avoid spam
    if (!this.lastLogTime || nowMs - this.lastLogTime >= 60000) {
      const at = formatClockTime(getSessionParts(nowMs, this.config.timeZone).secondsOfDay);
      console.log(`[Scheduler] ${this.engine.getSessionDate() ?? "-"} ${at} | Mode: ${mode} | Next: ${this.nextCheckpoint(nowMs)}`);
      this.lastLogTime = nowMs;
    }
  }

  /**
   * Next checkpoint still to fire today, for the heartbeat log
   */
  nextCheckpoint(nowMs: number): string {
    const { secondsOfDay } = getSessionParts(nowMs, this.config.timeZone);
    const c = this.config.checkpoints;
    const upcoming: Array<[string, number]> = [
      ["PDC lock", c.lockPdc],
      ["OL lock", c.lockOl],
      ["OT lock", c.lockOt],
      ["arm", c.arm],
      ["EOD flatten", c.eod],
    ];
    for (const [name, at] of upcoming) {
      if (secondsOfDay < at) return `${name} at ${formatClockTime(at)}`;
    }
    return `PDC lock tomorrow at ${formatClockTime(c.lockPdc)}`;
  }
}
