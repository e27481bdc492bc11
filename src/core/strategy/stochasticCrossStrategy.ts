import { PositionState, StrategySignal } from '../../types';
import { Config } from '../../config/config';
import { MarketView } from '../../data/marketView';
import { EntryFilterResult, FilterSettings, evaluateEntryFilters } from '../filters/entryFilters';

/**
 * Stochastic %D Band Crossing Strategy
 *
 * Responsibilities:
 * - Only decide WHEN to enter (exits belong to the trailing stop and the OCO pair)
 * - No order construction, no position mutation
 * - Deterministic & backtest-safe
 *
 * ENTRY Rules (only when FLAT):
 * - LONG:  long filters pass AND D[1] <= buyLevel AND D[0] > buyLevel
 * - SHORT: short filters pass AND D[1] >= sellLevel AND D[0] < sellLevel
 * - LONG is evaluated before SHORT
 */

export type SignalLevels = Config['signal'];

const HOLD: StrategySignal = { type: 'HOLD' };

/**
 * Combine filter eligibility with the oscillator crossing.
 * Undefined oscillator values (warm-up) never produce a signal.
 */
export function detectCrossSignal(
  eligibility: Pick<EntryFilterResult, 'longEligible' | 'shortEligible'>,
  dPrev: number | undefined,
  dNow: number | undefined,
  levels: SignalLevels
): StrategySignal {
  if (dPrev === undefined || dNow === undefined) {
    return HOLD;
  }

  // The previous value sitting exactly on the level has not crossed yet
  if (eligibility.longEligible && dPrev <= levels.buyLevel && dNow > levels.buyLevel) {
    return { type: 'ENTRY', side: 'LONG', reason: 'STOCH_CROSS_UP' };
  }

  if (eligibility.shortEligible && dPrev >= levels.sellLevel && dNow < levels.sellLevel) {
    return { type: 'ENTRY', side: 'SHORT', reason: 'STOCH_CROSS_DOWN' };
  }

  return HOLD;
}

export function stochasticCrossStrategy(context: {
  view: MarketView;
  settings: FilterSettings;
  levels: SignalLevels;
  positionState: PositionState;
}): StrategySignal {
  const { view, settings, levels, positionState } = context;

  // While a position is open the trailing stop controller owns the bar
  if (positionState !== 'FLAT') {
    return HOLD;
  }

  const filters = evaluateEntryFilters(view, settings, positionState);
  return detectCrossSignal(filters, view.stochD(1), view.stochD(0), levels);
}
