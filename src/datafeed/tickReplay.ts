import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Tick } from "../types.js";
import type { SessionEngine } from "../orchestrator/sessionEngine.js";
import { parseTick } from "./tickParse.js";

export type ReplayStats = {
  lines: number;
  accepted: number;
  dropped: number;
};

/** One JSON Lines row. Blank lines and # comments yield null. */
export function parseTickLine(line: string): Tick | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  try {
    return parseTick(JSON.parse(trimmed));
  } catch {
    return null;
  }
}

/**
 * Stream ticks from a JSON Lines file, in file order.
 */
export async function* readTickFile(file: string): AsyncGenerator<Tick, void, unknown> {
  const rl = createInterface({ input: createReadStream(file, "utf8"), crlfDelay: Infinity });
  for await (const line of rl) {
    const tick = parseTickLine(line);
    if (tick) yield tick;
  }
}

/**
 * Drive the engine from recorded ticks. The clock follows tick time, and once the
 * input is exhausted it is advanced to `finalClockMs` (if given) so trailing
 * checkpoints such as the end-of-day flatten still fire.
 */
export async function replayTicks(
  engine: SessionEngine,
  source: AsyncIterable<Tick> | Iterable<Tick>,
  finalClockMs?: number
): Promise<ReplayStats> {
  const stats: ReplayStats = { lines: 0, accepted: 0, dropped: 0 };
  for await (const tick of source) {
    stats.lines++;
    if (engine.onTick(tick)) stats.accepted++;
    else stats.dropped++;
  }
  if (finalClockMs !== undefined) engine.advanceClock(finalClockMs);
  return stats;
}
