/**
 * Streaming tick feed over WebSocket.
 * Messages are JSON ticks {symbol, ts, price, volume?}, one object or an array.
 */

import WebSocket from "ws";
import type { Tick } from "../types.js";
import { parseTickMessage } from "./tickParse.js";

export interface TickFeedConfig {
  url: string;
  symbols: string[];
  idleTimeoutMs?: number;   // how long to wait for a tick before checking the socket again
}

export class TickFeed {
  private config: Required<TickFeedConfig>;
  private ws: WebSocket | null = null;
  private isConnected: boolean = false;
  private stopped: boolean = false;
  private tickQueue: Tick[] = [];
  private resolveQueue: Array<{ resolve: (value: Tick | null) => void; timer: NodeJS.Timeout }> = [];
  private reconnectBackoff: number = 5000; // Start with 5 seconds
  private maxBackoff: number = 60000; // Max 60 seconds
  private received: number = 0;

  constructor(config: TickFeedConfig) {
    this.config = { idleTimeoutMs: 60000, ...config };
  }

  getReceivedCount(): number {
    return this.received;
  }

  /**
   * Async iterator of ticks; reconnects with backoff until stop() is called.
   */
  async *ticks(): AsyncGenerator<Tick, void, unknown> {
    while (!this.stopped) {
      try {
        this.dropSocket();
        console.log(`[Feed] Connecting to ${this.config.url} (backoff: ${this.reconnectBackoff}ms)...`);

        await this.connectWebSocket();
        this.subscribe();

        // Reset backoff on successful connection
        this.reconnectBackoff = 5000;

        while (this.isConnected && !this.stopped) {
          const tick = await this.waitForTick();
          if (tick) yield tick;
        }
      } catch (error: unknown) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error("[Feed] WebSocket error in generator loop:", errorMsg);
        this.isConnected = false;
      }

      if (this.stopped) break;
      this.dropSocket();
      this.reconnectBackoff = Math.min(this.reconnectBackoff * 1.5, this.maxBackoff);
      console.log(`[Feed] Will reconnect in ${this.reconnectBackoff / 1000}s...`);
      await new Promise((resolve) => setTimeout(resolve, this.reconnectBackoff));
    }
  }

  private async connectWebSocket(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      this.ws = ws;

      ws.on("open", () => {
        console.log(`[Feed] WebSocket connected`);
        this.isConnected = true;
        resolve();
      });

      ws.on("error", (error) => {
        console.error("[Feed] WebSocket error:", error.message);
        this.isConnected = false;
        reject(error);
      });

      ws.on("close", (code: number, reason: Buffer) => {
        console.log(`[Feed] WebSocket closed (code: ${code}, reason: ${reason.toString() || "none"})`);
        this.isConnected = false;
        // Wake the iterator so the outer loop can reconnect
        this.flushWaiters();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        let message: unknown;
        try {
          message = JSON.parse(data.toString());
        } catch (error: unknown) {
          console.error("[Feed] Message parse error:", error instanceof Error ? error.message : error);
          return;
        }
        this.handleMessage(message);
      });
    });
  }

  private subscribe(): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error("WebSocket not connected");
    }
    this.ws.send(JSON.stringify({ action: "subscribe", symbols: this.config.symbols }));
    console.log(`[Feed] Subscribed to ${this.config.symbols.join(",")}`);
  }

  private handleMessage(message: unknown): void {
    for (const tick of parseTickMessage(message)) {
      this.received++;
      const waiter = this.resolveQueue.shift();
      if (waiter) {
        clearTimeout(waiter.timer);
        waiter.resolve(tick);
      } else {
        this.tickQueue.push(tick);
      }
    }
  }

  private async waitForTick(): Promise<Tick | null> {
    return new Promise((resolve) => {
      const queued = this.tickQueue.shift();
      if (queued) {
        resolve(queued);
        return;
      }

      const timer = setTimeout(() => {
        const index = this.resolveQueue.findIndex((w) => w.timer === timer);
        if (index > -1) {
          this.resolveQueue.splice(index, 1);
          resolve(null);
        }
      }, this.config.idleTimeoutMs);
      this.resolveQueue.push({ resolve, timer });
    });
  }

  private flushWaiters(): void {
    const waiters = this.resolveQueue;
    this.resolveQueue = [];
    for (const w of waiters) {
      clearTimeout(w.timer);
      w.resolve(null);
    }
  }

  private dropSocket(): void {
    if (!this.ws) return;
    this.ws.removeAllListeners();
    // A late error from a socket being torn down has nowhere useful to go
    this.ws.on("error", () => undefined);
    this.ws.close();
    this.ws = null;
  }

  stop(): void {
    this.stopped = true;
    this.isConnected = false;
    this.dropSocket();
    this.flushWaiters();
  }
}
