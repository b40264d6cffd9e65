import type { Bar, PrevDayOhlc, TagSet } from "../types.js";
import {
  computeFirstCandleType,
  computeOpenLocation,
  computeOpeningTrend,
  computePrevDayContext,
  computeRangeStatus,
} from "./tagRules.js";

export type TagContext = {
  sessionBars: readonly Bar[];   // session bars observed so far, oldest first
  prevDay: PrevDayOhlc | null;
};

export type TagCheckpoint = "PDC" | "OL" | "OT";

export function emptyTagSet(): TagSet {
  return {
    pdc: null,
    ol: null,
    ot: null,
    firstCandleType: null,
    rangeStatus: null,
    lockedPdc: false,
    lockedOl: false,
    lockedOt: false,
  };
}

/**
 * Computes tags from what has been observed so far and commits each one exactly once.
 * The lock flag is the source of truth: a locked field is never re-evaluated.
 */
export class TagLocker {
  /** Returns true when this call performed the lock. */
  lock(checkpoint: TagCheckpoint, tags: TagSet, ctx: TagContext): boolean {
    switch (checkpoint) {
      case "PDC":
        if (tags.lockedPdc) return false;
        tags.pdc = computePrevDayContext(ctx.prevDay);
        tags.lockedPdc = true;
        return true;

      case "OL":
        if (tags.lockedOl) return false;
        tags.ol = computeOpenLocation(ctx.sessionBars[0]?.open, ctx.prevDay);
        tags.lockedOl = true;
        return true;

      case "OT": {
        if (tags.lockedOt) return false;
        // RangeStatus reads OL; use the locked value when present so both agree
        const ol = tags.lockedOl ? tags.ol : computeOpenLocation(ctx.sessionBars[0]?.open, ctx.prevDay);
        tags.ot = computeOpeningTrend(ctx.sessionBars);
        tags.firstCandleType = computeFirstCandleType(ctx.sessionBars, ctx.prevDay);
        tags.rangeStatus = computeRangeStatus(ctx.sessionBars, ol, ctx.prevDay);
        tags.lockedOt = true;
        return true;
      }
    }
  }

  isFullyLocked(tags: TagSet): boolean {
    return tags.lockedPdc && tags.lockedOl && tags.lockedOt;
  }
}
