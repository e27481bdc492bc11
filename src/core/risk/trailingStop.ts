import { Position, TrailingState } from '../../types';
import { logDebug } from '../../utils/logger';

/**
 * Accelerating Trailing Stop
 *
 * Runs once per bar while a position is open:
 * - No new favorable close => nothing changes
 * - New favorable close    => furthestClose moves to it and
 *                             acceleration *= |furthestClose - stop|
 * - Trail by `acceleration` if the new stop stays on the protective side of the close,
 *   otherwise flatten instead of placing a stop through the market
 *
 * The acceleration compounds by the unrealized stop distance rather than a fixed
 * increment, so step sizes are path-dependent.
 */

export type TrailingDecision =
  | { action: 'NONE' }
  | { action: 'TRAIL'; stopPrice: number; trailing: TrailingState }
  | { action: 'EXIT'; trailing: TrailingState };

export function evaluateTrailingStop(position: Position, close: number): TrailingDecision {
  const { side, trailing, stopOrder } = position;
  const stop = stopOrder.price;

  if (stop === undefined) {
    throw new Error(`Stop order ${stopOrder.id} has no price`);
  }

  if (side === 'LONG') {
    if (close <= trailing.furthestClose) {
      return { action: 'NONE' };
    }

    const next: TrailingState = {
      furthestClose: close,
      acceleration: trailing.acceleration * (close - stop),
    };
    const candidate = stop + next.acceleration;

    logDebug('Trailing long', { close, stop, acceleration: next.acceleration, candidate });

    // Stop only moves up, and only while it stays below the market
    if (candidate < close) {
      return { action: 'TRAIL', stopPrice: candidate, trailing: next };
    }
    return { action: 'EXIT', trailing: next };
  }

  if (close >= trailing.furthestClose) {
    return { action: 'NONE' };
  }

  const next: TrailingState = {
    furthestClose: close,
    acceleration: trailing.acceleration * Math.abs(stop - close),
  };
  const candidate = stop - next.acceleration;

  logDebug('Trailing short', { close, stop, acceleration: next.acceleration, candidate });

  // Stop only moves down, and only while it stays above the market
  if (candidate > close) {
    return { action: 'TRAIL', stopPrice: candidate, trailing: next };
  }
  return { action: 'EXIT', trailing: next };
}
