import { Bar, PositionState, Weekday } from '../../types';
import { Config } from '../../config/config';
import { MarketView } from '../../data/marketView';
import { getBarClock, parseTimeOfDay } from '../../utils/timeUtils';
import { normalizePrice } from '../../utils/priceUtils';

/**
 * Entry Filters
 *
 * Pure predicates evaluated fresh on every bar. Each one is an independent gate;
 * the long and short eligibilities combine them and are evaluated separately.
 */

/**
 * Filter parameters resolved once from the config (session times parsed to seconds)
 */
export interface FilterSettings {
  tradingDays: Partial<Record<Weekday, boolean>>;
  sessionStart: number; // seconds of day, inclusive
  sessionEnd: number;   // seconds of day, inclusive
  rangeLookback: number;
  minRange: number;
  minAdxLong: number;
  minAdxShort: number;
  utcOffsetMinutes: number;
}

export interface EntryFilterResult {
  dayAllowed: boolean;
  timeAllowed: boolean;
  volatilityAllowed: boolean;
  longEligible: boolean;
  shortEligible: boolean;
}

export function compileFilterSettings(config: Config): FilterSettings {
  return {
    tradingDays: config.filters.tradingDays,
    sessionStart: parseTimeOfDay(config.filters.session.start),
    sessionEnd: parseTimeOfDay(config.filters.session.end),
    rangeLookback: config.filters.volatility.lookback,
    minRange: config.filters.volatility.minRange,
    minAdxLong: config.filters.minAdxLong,
    minAdxShort: config.filters.minAdxShort,
    utcOffsetMinutes: config.instrument.utcOffsetMinutes,
  };
}

/**
 * A day is blocked only by an explicit `false`; days without a flag trade
 */
export function isDayAllowed(day: Weekday, tradingDays: Partial<Record<Weekday, boolean>>): boolean {
  return tradingDays[day] !== false;
}

/**
 * Session window check, inclusive at both ends.
 * start > end means the window wraps past midnight.
 */
export function isTimeAllowed(secondsOfDay: number, start: number, end: number): boolean {
  if (start <= end) {
    return secondsOfDay >= start && secondsOfDay <= end;
  }
  return secondsOfDay >= start || secondsOfDay <= end;
}

/**
 * max(high) - min(low) over the first `lookback` bars must be strictly above minRange.
 * The range is normalised first so float residue cannot lift it over the threshold.
 * Fewer bars than the lookback is not enough information to trade.
 */
export function isVolatilityAllowed(bars: Bar[], lookback: number, minRange: number): boolean {
  if (bars.length < lookback) {
    return false;
  }

  const window = bars.slice(0, lookback);
  const highest = Math.max(...window.map((b) => b.high));
  const lowest = Math.min(...window.map((b) => b.low));

  return normalizePrice(highest - lowest) > minRange;
}

export function isTrendStrengthAllowed(adxNow: number, minAdx: number): boolean {
  return adxNow >= minAdx;
}

/** SMA strictly rising on the last bar */
export function isBullishTrend(smaNow: number, smaPrev: number): boolean {
  return smaNow > smaPrev;
}

/** SMA strictly falling on the last bar */
export function isBearishTrend(smaNow: number, smaPrev: number): boolean {
  return smaNow < smaPrev;
}

/**
 * Evaluate every gate for the current bar of `view`
 */
export function evaluateEntryFilters(
  view: MarketView,
  settings: FilterSettings,
  positionState: PositionState
): EntryFilterResult {
  const blocked: EntryFilterResult = {
    dayAllowed: false,
    timeAllowed: false,
    volatilityAllowed: false,
    longEligible: false,
    shortEligible: false,
  };

  const bar = view.bar(0);
  if (!bar) {
    return blocked;
  }

  const clock = getBarClock(bar.time, settings.utcOffsetMinutes);
  const dayAllowed = isDayAllowed(clock.weekday, settings.tradingDays);
  const timeAllowed = isTimeAllowed(clock.secondsOfDay, settings.sessionStart, settings.sessionEnd);

  const recent = view.recentBars(settings.rangeLookback);
  const volatilityAllowed =
    recent !== undefined && isVolatilityAllowed(recent, settings.rangeLookback, settings.minRange);

  const baseAllowed = dayAllowed && timeAllowed && volatilityAllowed && positionState === 'FLAT';

  const adxNow = view.adx(0);
  const smaNow = view.sma(0);
  const smaPrev = view.sma(1);

  if (!baseAllowed || adxNow === undefined || smaNow === undefined || smaPrev === undefined) {
    return { ...blocked, dayAllowed, timeAllowed, volatilityAllowed };
  }

  return {
    dayAllowed,
    timeAllowed,
    volatilityAllowed,
    longEligible:
      isTrendStrengthAllowed(adxNow, settings.minAdxLong) && isBullishTrend(smaNow, smaPrev),
    shortEligible:
      isTrendStrengthAllowed(adxNow, settings.minAdxShort) && isBearishTrend(smaNow, smaPrev),
  };
}
