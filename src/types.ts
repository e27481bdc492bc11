/* =========================================================
 * Market data
 * ========================================================= */

/**
 * One price bar of the traded instrument.
 * `time` is the bar timestamp in epoch milliseconds; calendar fields
 * (day of week, time of day) are derived from it with the instrument's UTC offset.
 */
export interface Bar {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tickSize: number;
}

export type Weekday =
  | "sunday"
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday";

/**
 * Calendar position of a bar, already shifted into the session's local time
 */
export interface BarClock {
  weekday: Weekday;
  secondsOfDay: number;
}

/* =========================================================
 * Indicator output
 * ========================================================= */

export interface IndicatorData {
  // Momentum
  stochK?: number;
  stochD?: number;

  // Trend strength
  adx?: number;
  plusDI?: number;
  minusDI?: number;

  // Trend direction (slope only)
  sma?: number;
}

/* =========================
 * Orders
 * ========================= */

export type OrderSide = "BUY" | "SELL";

export type OrderType = "MARKET" | "STOP" | "LIMIT";

export interface Order {
  id: string;
  side: OrderSide;
  type: OrderType;
  quantity: 1;
  price?: number; // required for STOP / LIMIT, absent for MARKET
  label: string;
  linkedOrderId?: string; // OCO counterpart: filling this order cancels the linked one
}

export interface Fill {
  orderId: string;
  side: OrderSide;
  price: number;
  quantity: number;
  time: number;
}

/* =========================
 * Trading primitives
 * ========================= */

export type PositionSide = "LONG" | "SHORT";

export type EntryReason = "STOCH_CROSS_UP" | "STOCH_CROSS_DOWN";

export type ExitReason =
  | "TRAILING_STOP_CROSSED"
  | "STOP_FILLED"
  | "TARGET_FILLED"
  | "SESSION_END"
  | "MANUAL_EXIT";

/* =========================
 * Position State Machine
 * ========================= */

export type PositionState = "FLAT" | "OPEN";

/**
 * Per-trade trailing stop state, created on entry and discarded on exit
 */
export interface TrailingState {
  acceleration: number;
  furthestClose: number; // most favorable close since entry
}

export interface Position {
  side: PositionSide;
  entryPrice: number;
  entryTime: number;

  // Protective OCO pair, each naming the other through linkedOrderId
  stopOrder: Order;
  targetOrder: Order;

  trailing: TrailingState;

  reason?: EntryReason;
}

/* =========================================================
 * Strategy layer
 * ========================================================= */

export type SignalType = "ENTRY" | "HOLD";

export interface StrategySignal {
  type: SignalType;
  side?: PositionSide;
  reason?: EntryReason;
}

/* =========================================================
 * Trade logging & analytics
 * ========================================================= */

export interface TradeRecord {
  side: PositionSide;

  entryPrice: number;
  entryTime: number;

  exitPrice: number;
  exitTime: number;

  quantity: number;

  pnl: number;
  commission: number;

  equityAfterTrade: number;

  reason: ExitReason;
}

/* =========================================================
 * Backtest results
 * ========================================================= */

export interface BacktestResult {
  initialCapital: number;
  finalEquity: number;
  trades: TradeRecord[];

  stats: {
    totalTrades: number;
    winRate: number;
    netPnl: number;
    maxDrawdown: number;
    profitFactor: number;
    averageWin: number;
    averageLoss: number;
    totalReturn: number; // Percentage return
  };
}
