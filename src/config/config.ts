/**
 * Configuration for the stochastic crossover engine
 * Instance-specific configuration (strategy + runtime)
 * Global infrastructure config is in globalConfig.ts
 */

import { Weekday } from "../types";

/**
 * Strategy configuration (per-instance)
 * The parameter set that drives filters, signals and exits
 */
export interface StrategyConfig {
  // Indicator parameters (PURE math, no strategy meaning)
  indicators: {
    stochastic: {
      period: number;  // %K lookback, e.g. 68
    };
    adx: {
      period: number;  // e.g. 14 (strict Wilder)
    };
    sma: {
      period: number;  // e.g. 78
    };
  };

  // Entry filters (all must pass before a signal is considered)
  filters: {
    tradingDays: Partial<Record<Weekday, boolean>>; // false = no entries that day
    session: {
      start: string; // "HH:mm" or "HH:mm:ss", inclusive
      end: string;   // inclusive; end < start wraps past midnight
    };
    volatility: {
      lookback: number;  // N bars for max(high) - min(low)
      minRange: number;  // range must be strictly greater
    };
    minAdxLong: number;
    minAdxShort: number;
  };

  // Stochastic %D bands
  signal: {
    buyLevel: number;  // upward crossing => long
    sellLevel: number; // downward crossing => short
  };

  // Protective exits
  risk: {
    stopTicks: number;        // initial stop distance from entry close
    profitTicks: number;      // target distance from entry close
    stopAcceleration: number; // base trailing acceleration, reset on every entry
  };
}

/**
 * Runtime configuration (per-instance)
 * Instrument metadata, simulated execution and backtest window
 */
export interface RuntimeConfig {
  instrument: {
    symbol: string;
    tickSize: number;
    sessionClose: string;     // any open position is flattened at this time of day
    utcOffsetMinutes: number; // shift applied to bar timestamps before calendar filters
  };

  account: {
    initialCapital: number;
  };

  execution: {
    commissionPerContract: number; // per fill
    slippageTicks: number;         // applied adversely to market fills
    pointValue: number;            // currency per 1.0 price move per contract
  };

  // Backtest-specific settings (optional, only needed when bars are fetched)
  backtest?: {
    interval: string;  // e.g. "30m"
    startDate: string; // ISO date string, e.g. "2025-01-01"
    endDate: string;
  };
}

/**
 * Complete instance configuration
 */
export interface Config extends StrategyConfig, RuntimeConfig {}

export const defaultConfig: Config = {
  indicators: {
    stochastic: {
      period: 68,
    },
    adx: {
      period: 14,
    },
    sma: {
      period: 78,
    },
  },

  filters: {
    tradingDays: {
      monday: true,
      tuesday: true,
      wednesday: false,
      thursday: false,
      friday: true,
    },
    session: {
      start: "18:00",
      end: "06:00",
    },
    volatility: {
      lookback: 10,
      minRange: 0.002,
    },
    minAdxLong: 12,
    minAdxShort: 12,
  },

  signal: {
    buyLevel: 51,
    sellLevel: 49,
  },

  risk: {
    stopTicks: 24,
    profitTicks: 77,
    stopAcceleration: 0.2,
  },

  instrument: {
    symbol: "EURUSDT",
    tickSize: 0.0001,
    sessionClose: "16:00",
    utcOffsetMinutes: 0,
  },

  account: {
    initialCapital: 10_000,
  },

  execution: {
    commissionPerContract: 0,
    slippageTicks: 0,
    pointValue: 125_000, // contract multiplier of a euro FX future
  },

  backtest: {
    interval: "30m",
    startDate: "2025-01-01",
    endDate: "2025-07-01",
  },
};
