import type { Direction } from "../types.js";

export type OrderSide = "BUY" | "SELL";

export type Order = {
  symbol: string;
  side: OrderSide;
  direction: Direction;
  entryPx: number;    // trigger the order waits on
  qty: number;
  filled: boolean;
  fillPx: number | null;
  stopHit: boolean;
  t1Hit: boolean;
  t2Hit: boolean;
};

export type PlanLevels = {
  trigger: number;
  stop: number;
  t1: number;
  t2: number;
};

export type OmsEvent = "PENDING" | "FILLED" | "HOLD" | "T1_HIT" | "STOP_HIT" | "T2_HIT";

export type OmsSignal =
  | { status: "ORDER_SENT"; event: "PENDING"; price: number }
  | { status: "LIVE"; event: "FILLED" | "HOLD" | "T1_HIT"; price: number }
  | { status: "FLAT"; event: "STOP_HIT" | "T2_HIT"; price: number };

function crossed(direction: Direction, price: number, level: number): boolean {
  return direction === "BULL" ? price >= level : price <= level;
}

function breached(direction: Direction, price: number, stop: number): boolean {
  return direction === "BULL" ? price <= stop : price >= stop;
}

/**
 * Paper order book: one live order per symbol, filled on a trigger cross and
 * walked through stop / target checks on each later price.
 */
export class OrderSimulator {
  private live: Map<string, Order> = new Map();
  private closed: Map<string, Order> = new Map();

  placeEntry(symbol: string, direction: Direction, triggerPrice: number, qty: number): Order {
    if (this.live.has(symbol)) {
      throw new Error(`[OMS] ${symbol}: an order is already live`);
    }
    if (!Number.isFinite(triggerPrice) || !Number.isInteger(qty) || qty <= 0) {
      throw new Error(`[OMS] ${symbol}: invalid entry trigger=${triggerPrice} qty=${qty}`);
    }
    const order: Order = {
      symbol,
      side: direction === "BULL" ? "BUY" : "SELL",
      direction,
      entryPx: triggerPrice,
      qty,
      filled: false,
      fillPx: null,
      stopHit: false,
      t1Hit: false,
      t2Hit: false,
    };
    this.live.set(symbol, order);
    this.closed.delete(symbol);
    return order;
  }

  /**
   * Advance the symbol's order with the latest price. Null when no order is live.
   */
  sync(symbol: string, lastPrice: number, levels: PlanLevels): OmsSignal | null {
    const order = this.live.get(symbol);
    if (!order) return null;
    if (!Number.isFinite(lastPrice)) {
      return order.filled
        ? { status: "LIVE", event: "HOLD", price: lastPrice }
        : { status: "ORDER_SENT", event: "PENDING", price: lastPrice };
    }

    const dir = order.direction;

    if (!order.filled) {
      if (!crossed(dir, lastPrice, levels.trigger)) {
        return { status: "ORDER_SENT", event: "PENDING", price: lastPrice };
      }
      order.filled = true;
      order.fillPx = levels.trigger;
      return { status: "LIVE", event: "FILLED", price: levels.trigger };
    }

    // Stop first, then the far target, then the near one
    if (!order.stopHit && breached(dir, lastPrice, levels.stop)) {
      order.stopHit = true;
      this.close(symbol, order);
      return { status: "FLAT", event: "STOP_HIT", price: lastPrice };
    }
    if (!order.t2Hit && crossed(dir, lastPrice, levels.t2)) {
      order.t2Hit = true;
      this.close(symbol, order);
      return { status: "FLAT", event: "T2_HIT", price: lastPrice };
    }
    if (!order.t1Hit && crossed(dir, lastPrice, levels.t1)) {
      order.t1Hit = true;
      return { status: "LIVE", event: "T1_HIT", price: lastPrice };
    }
    return { status: "LIVE", event: "HOLD", price: lastPrice };
  }

  /** Drop the symbol's order unconditionally. Returns what was removed. */
  forceExit(symbol: string): Order | null {
    const order = this.live.get(symbol);
    if (!order) return null;
    this.close(symbol, order);
    return order;
  }

  getOrder(symbol: string): Order | null {
    return this.live.get(symbol) ?? null;
  }

  /** Most recent order that left the book for this symbol. */
  getLastClosed(symbol: string): Order | null {
    return this.closed.get(symbol) ?? null;
  }

  hasOrder(symbol: string): boolean {
    return this.live.has(symbol);
  }

  openSymbols(): string[] {
    return [...this.live.keys()];
  }

  reset(): void {
    this.live.clear();
    this.closed.clear();
  }

  private close(symbol: string, order: Order): void {
    this.live.delete(symbol);
    this.closed.set(symbol, order);
  }
}
