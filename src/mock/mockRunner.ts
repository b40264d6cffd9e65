import "dotenv/config";
import { loadSessionConfig } from "../utils/config.js";
import { buildEngine } from "../orchestrator/buildEngine.js";
import { replayTicks } from "../datafeed/tickReplay.js";
import { formatEventText, formatStatusText } from "../telegram/telegramFormatter.js";
import { sessionTimeToEpochMs } from "../utils/timeUtils.js";
import { generateSessionTicks, mergeTapes } from "./syntheticSession.js";

// Replays one synthetic session through the full engine and prints every alert.

const config = loadSessionConfig();
const engine = await buildEngine(config);
const date = process.env.MOCK_DATE || "2025-03-03";
const seed = Number(process.env.MOCK_SEED || 7);

const tapes = config.symbols.map((symbol, i) =>
  generateSessionTicks({
    symbol,
    date,
    timeZone: config.timeZone,
    basePrice: 100 * (i + 1),
    driftPerStep: i % 2 === 0 ? 0.00004 : -0.00004,
    seed: seed + i,
  })
);

engine.onEvent((e) => {
  const text = formatEventText(e);
  if (text) console.log(`[MOCK] ${text}`);
});

const finalClock = sessionTimeToEpochMs(date, config.checkpoints.eod, config.timeZone);
const stats = await replayTicks(engine, mergeTapes(tapes), finalClock);

console.log(`[MOCK] ticks=${stats.lines} accepted=${stats.accepted} dropped=${stats.dropped}`);
console.log(formatStatusText(engine.snapshot(), "ACTIVE"));
