// src/datafeed/barAggregator.ts
import type { Bar } from "../types.js";

export type TickOutcome = "opened" | "updated" | "rolled" | "ignored" | "stale";

export class BarAggregator {
  private barSeconds: number;
  private cur: Bar | null = null;
  private staleTicks = 0;

  constructor(barSeconds: number = 300) {
    this.barSeconds = Math.max(1, Math.floor(barSeconds));
  }

  private floorToBucket(ts: number): number {
    return Math.floor(ts / this.barSeconds) * this.barSeconds;
  }

  /**
   * Feed one tick; returns the CLOSED bar when the tick opens a new bucket.
   *
   * Ticks with a missing or non-finite timestamp/price are ignored. A tick whose bucket
   * is older than the open bar is dropped (out-of-order across buckets).
   */
  onTick(ts: number, price: number): Bar | null {
    return this.push(ts, price).closed;
  }

  push(ts: number, price: number): { outcome: TickOutcome; closed: Bar | null } {
    if (typeof ts !== "number" || typeof price !== "number" || !Number.isFinite(ts) || !Number.isFinite(price)) {
      return { outcome: "ignored", closed: null };
    }
    const start = this.floorToBucket(ts);

    if (this.cur === null) {
      this.cur = { bucketStart: start, open: price, high: price, low: price, close: price, volume: 1 };
      return { outcome: "opened", closed: null };
    }

    if (start === this.cur.bucketStart) {
      const c = this.cur;
      c.high = Math.max(c.high, price);
      c.low = Math.min(c.low, price);
      c.close = price;
      c.volume += 1;
      return { outcome: "updated", closed: null };
    }

    if (start < this.cur.bucketStart) {
      this.staleTicks++;
      return { outcome: "stale", closed: null };
    }

    const finished = Object.freeze({ ...this.cur });
    this.cur = { bucketStart: start, open: price, high: price, low: price, close: price, volume: 1 };
    return { outcome: "rolled", closed: finished };
  }

  /** The in-progress bar, if any (copy). */
  peek(): Bar | null {
    return this.cur ? { ...this.cur } : null;
  }

  /** Close out the in-progress bar without a new tick (session end). */
  flush(): Bar | null {
    if (!this.cur) return null;
    const finished = Object.freeze({ ...this.cur });
    this.cur = null;
    return finished;
  }

  getStaleTickCount(): number {
    return this.staleTicks;
  }

  getBarSeconds(): number {
    return this.barSeconds;
  }
}
