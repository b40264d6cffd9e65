export type BotMode = "QUIET" | "ACTIVE";

export type Direction = "BULL" | "BEAR";
export type PickDirection = Direction | "NONE";

// Prev-day context and opening trend share one vocabulary
export type TrendTag = "BULL" | "BEAR" | "TR";
export type OpenLocation = "OAR" | "OOH" | "OIM" | "OOL" | "OBR";
export type FirstCandleType = "DOJI" | "HUGE OPEN" | "NORMAL";
export type RangeStatus = "SBR" | "WAR" | "SWR" | "SAR" | "WBR";

export type Tier = "L3" | "L2" | "L1" | "L0";
export type PickLevel = Tier | "NA";

export type PlanStatus =
  | "IDLE"
  | "ARMED"
  | "ORDER_SENT"
  | "LIVE"
  | "FLAT"
  | "ABSTAINED"
  | "MISSED";

export type EntryMode = "5TH_BAR";

export type AbstainReason =
  | "NO_QUALIFYING_TIER"
  | "NO_DIRECTION"
  | "INSUFFICIENT_BARS"
  | "ZERO_RISK_PER_SHARE"
  | "ZERO_QTY"
  | "RR_FLOOR_VIOLATION"
  | "KILL_SWITCH";

export type Tick = {
  symbol: string;
  ts: number;       // epoch seconds (fractional allowed)
  price: number;
  volume?: number;
};

export type Bar = {
  bucketStart: number;  // epoch seconds
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type PrevDayOhlc = {
  open: number;
  high: number;
  low: number;
  close: number;
};

export type TagSet = {
  pdc: TrendTag | null;
  ol: OpenLocation | null;
  ot: TrendTag | null;
  firstCandleType: FirstCandleType | null;
  rangeStatus: RangeStatus | null;
  lockedPdc: boolean;
  lockedOl: boolean;
  lockedOt: boolean;
};

export type FrequencyTable = {
  tier: Tier;
  bull: number;
  bear: number;
};

export type PickResult = {
  direction: PickDirection;
  confidence: number;
  level: PickLevel;
};

export type Plan = {
  mode: EntryMode;
  direction: PickDirection;
  confidence: number;
  level: PickLevel;
  entryRef: number | null;
  trigger: number | null;
  stop: number | null;
  t1: number | null;
  t2: number | null;
  qty: number;
  status: PlanStatus;
  abstainReason?: AbstainReason;
};

export interface SymbolState {
  symbol: string;
  lastPrice: number | null;
  tags: TagSet;
  plan: Plan;
  realizedPnl: number;
  unrealizedPnl: number;
  hasPosition: boolean;
}

/**
 * Wire shape consumed by persistence and UI layers.
 * Field names are a compatibility contract: do not rename.
 */
export type SymbolSnapshot = {
  symbol: string;
  ltp: number | null;
  tags: {
    pdc: TrendTag | null;
    ol: OpenLocation | null;
    ot: TrendTag | null;
    first_candle_type: FirstCandleType | null;
    range_status: RangeStatus | null;
  };
  plan: {
    direction: PickDirection;
    confidence: number;
    level: PickLevel;
    entry_ref: number | null;
    trigger: number | null;
    stop: number | null;
    t1: number | null;
    t2: number | null;
    qty: number;
    status: PlanStatus;
  };
  unrealized_pnl: number;
  realized_pnl: number;
  has_position: boolean;
};

export type DomainEventType =
  | "TAGS_LOCKED"
  | "PICK"
  | "PLAN_ARMED"
  | "PLAN_ABSTAINED"
  | "ORDER_SENT"
  | "ORDER_FILLED"
  | "TARGET1_HIT"
  | "POSITION_CLOSED"
  | "PLAN_MISSED"
  | "KILL_SWITCH";

export type ExitReason = "STOP_HIT" | "T2_HIT" | "EOD" | "KILL_SWITCH";

export interface DomainEvent {
  type: DomainEventType;
  timestamp: number;  // ms epoch
  symbol: string;
  sessionDate: string;
  data: {
    status?: PlanStatus;
    price?: number;
    plan?: Plan;
    tags?: Partial<TagSet>;
    exitReason?: ExitReason;
    realizedPnl?: number;
    reason?: string;
  };
}
