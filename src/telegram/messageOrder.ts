import type { DomainEvent, DomainEventType } from "../types.js";

/**
 * Message priority order (lower number = sent first within one batch).
 * A batch from one tick or checkpoint reads in lifecycle order.
 */
const PRIORITY: Record<DomainEventType, number> = {
  KILL_SWITCH: 0,
  TAGS_LOCKED: 1,
  PICK: 2,
  PLAN_ABSTAINED: 3,
  PLAN_ARMED: 4,
  ORDER_SENT: 5,
  ORDER_FILLED: 6,
  TARGET1_HIT: 7,
  POSITION_CLOSED: 8,
  PLAN_MISSED: 9,
};

/**
 * Sort events by priority, then by timestamp, then by symbol
 */
export function orderEvents(events: DomainEvent[]): DomainEvent[] {
  return [...events].sort((a, b) => {
    const pa = PRIORITY[a.type];
    const pb = PRIORITY[b.type];
    if (pa !== pb) return pa - pb;
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    return a.symbol.localeCompare(b.symbol);
  });
}
