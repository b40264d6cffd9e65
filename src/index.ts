import "dotenv/config";
import { ConfigError, loadSessionConfig } from "./utils/config.js";
import type { SessionConfig } from "./utils/config.js";
import { formatClockTime } from "./utils/timeUtils.js";
import { initTelegram } from "./telegram/telegram.js";
import { MessagePublisher } from "./telegram/messagePublisher.js";
import { MessageGovernor } from "./governor/messageGovernor.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { CommandHandler } from "./commands.js";
import { buildEngine } from "./orchestrator/buildEngine.js";
import type { SessionEngine } from "./orchestrator/sessionEngine.js";
import { TickFeed } from "./datafeed/tickFeed.js";
import { readTickFile, replayTicks } from "./datafeed/tickReplay.js";
import { StateStore } from "./persistence/stateStore.js";
import type { PersistedEngineState } from "./persistence/persistedState.js";
import type { DomainEvent } from "./types.js";

const instanceId = process.env.INSTANCE_ID || "orb-desk-001";
const NODE_ENV = process.env.NODE_ENV || "development";

let config: SessionConfig;
try {
  config = loadSessionConfig();
} catch (err: unknown) {
  if (err instanceof ConfigError) {
    console.error(`[Config] ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const c = config.checkpoints;
console.log("=== STARTUP INVENTORY ===");
console.log(`INSTANCE_ID: ${instanceId}`);
console.log(`NODE_ENV: ${NODE_ENV}`);
console.log(`SYMBOLS: ${config.symbols.join(",")}`);
console.log(`RISK_BUDGET: ${config.riskBudget} (split=${config.riskSplit}, loss cap=${config.dailyLossCap})`);
console.log(`ENTRY_MODE: ${config.entryMode}  BAR_SECONDS: ${config.barSeconds}  TZ: ${config.timeZone}`);
console.log(
  `CHECKPOINTS: open=${formatClockTime(c.sessionOpen)} pdc=${formatClockTime(c.lockPdc)} ol=${formatClockTime(c.lockOl)} ` +
    `ot=${formatClockTime(c.lockOt)} arm=${formatClockTime(c.arm)} eod=${formatClockTime(c.eod)}`
);
console.log(`TELEGRAM: ${process.env.TELEGRAM_BOT_TOKEN ? "on" : "off"}`);
console.log("=========================");

function logStructuredPulse(engine: SessionEngine, governor: MessageGovernor): void {
  const snap = engine.snapshot();
  const pulse = {
    mode: governor.getMode(),
    sessionDate: snap.sessionDate,
    killSwitch: snap.killSwitch.tripped,
    totalPnl: Number(snap.totalPnl.toFixed(2)),
    droppedTicks: engine.getDroppedTickCount(),
    symbols: snap.symbols.map((s) => ({
      symbol: s.symbol,
      ltp: s.ltp,
      status: s.plan.status,
      direction: s.plan.direction,
      level: s.plan.level,
      qty: s.plan.qty,
      pnl: Number((s.realized_pnl + s.unrealized_pnl).toFixed(2)),
    })),
  };
  // Log as single JSON line
  console.log(`[PULSE] ${JSON.stringify(pulse)}`);
}

const engine = await buildEngine(config);

// Load persisted state
const store = new StateStore(instanceId);
const persisted = await store.load();
const governor = new MessageGovernor(persisted?.governor);

function buildPersistedState(): PersistedEngineState {
  const snap = engine.snapshot();
  return {
    version: 1,
    instanceId,
    savedAt: Date.now(),
    sessionDate: snap.sessionDate,
    killSwitch: snap.killSwitch,
    totalPnl: snap.totalPnl,
    symbols: snap.symbols,
    governor: governor.exportState(),
  };
}

// Telegram is optional; without it alerts only go to the console
const telegram = initTelegram();
const publisher = telegram ? new MessagePublisher(governor, telegram.bot, telegram.chatId, instanceId) : null;

// Events from one tick or checkpoint go out as one ordered batch
let pending: DomainEvent[] = [];
engine.onEvent((event) => {
  if (!publisher) return;
  pending.push(event);
  if (pending.length > 1) return;
  queueMicrotask(() => {
    const batch = pending;
    pending = [];
    publisher.publishOrdered(batch).catch((err: unknown) => {
      console.error("[PUB] batch failed:", err instanceof Error ? err.message : err);
    });
  });
});

const replayFile = process.env.REPLAY_FILE?.trim();
const wsUrl = process.env.TICK_WS_URL?.trim();

let scheduler: Scheduler | null = null;
let feed: TickFeed | null = null;

async function shutdown(signal: string): Promise<void> {
  console.log(`[${instanceId}] ${signal} received, shutting down`);
  scheduler?.stop();
  feed?.stop();
  try {
    await store.save(buildPersistedState());
  } catch (err: unknown) {
    console.error("[persist] final save failed:", err instanceof Error ? err.message : err);
  }
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

if (replayFile) {
  // Replay: the clock follows recorded tick time, never the wall clock
  governor.setMode("ACTIVE");
  console.log(`[${instanceId}] Replaying ${replayFile}`);
  const stats = await replayTicks(engine, readTickFile(replayFile));
  console.log(`[${instanceId}] Replay done: lines=${stats.lines} accepted=${stats.accepted} dropped=${stats.dropped}`);
  logStructuredPulse(engine, governor);
  await store.save(buildPersistedState());
  process.exit(0);
}

// Live: establish today's session, then restore a same-day kill switch
engine.advanceClock(Date.now());
if (persisted?.killSwitch.tripped && persisted.sessionDate === engine.getSessionDate()) {
  engine.killSwitch.trip(persisted.killSwitch.reason ?? "restored from state file", Date.now());
  console.warn(`[persist] kill switch restored for ${persisted.sessionDate}`);
}

scheduler = new Scheduler(engine, config, governor);
scheduler.start();

// Structured pulse timer (every 60 seconds, runs in all modes)
setInterval(() => {
  logStructuredPulse(engine, governor);
}, 60000);

// Periodic state persistence (every 15 seconds)
setInterval(() => {
  store.save(buildPersistedState()).catch((err: unknown) => {
    console.warn(`[persist] save failed: ${err instanceof Error ? err.message : String(err)}`);
  });
}, 15000);

if (telegram && publisher) {
  const { bot, chatId } = telegram;
  const commands = new CommandHandler(engine, governor);
  const reply = (text: string): void => {
    publisher.sendText(text).catch((err: unknown) => {
      console.error("[Telegram] reply failed:", err instanceof Error ? err.message : err);
    });
  };

  // Register commands (only from the configured chat)
  bot.onText(/^\/status\b/, async (msg) => {
    if (msg.chat.id !== chatId) return;
    reply(await commands.status());
  });

  bot.onText(/^\/plan\b(?:\s+(\S+))?/, async (msg, match) => {
    if (msg.chat.id !== chatId) return;
    reply(await commands.plan(match?.[1]));
  });

  bot.onText(/^\/kill\b(?:\s+(.+))?/, async (msg, match) => {
    if (msg.chat.id !== chatId) return;
    reply(await commands.kill(match?.[1]));
  });

  bot.onText(/^\/resume\b/, async (msg) => {
    if (msg.chat.id !== chatId) return;
    reply(await commands.resume());
  });

  reply(`[${instanceId}] ✅ Online. Mode: ${governor.getMode()} Symbols: ${config.symbols.join(",")}`);
}

if (wsUrl) {
  const tickFeed = new TickFeed({ url: wsUrl, symbols: config.symbols });
  feed = tickFeed;
  (async () => {
    for await (const tick of tickFeed.ticks()) {
      try {
        engine.onTick(tick);
      } catch (processError: unknown) {
        // Log processing errors but continue the loop
        console.error(`[${instanceId}] Error processing tick ${tick.symbol}@${tick.ts}:`, processError);
      }
    }
  })().catch((err: unknown) => console.error("[Feed] loop ended with error:", err));
} else {
  console.log(`[${instanceId}] ⚠️  No TICK_WS_URL - running on the clock only (checkpoints still fire)`);
}
