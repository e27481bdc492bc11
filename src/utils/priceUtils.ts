/**
 * Price arithmetic utilities
 * Tick conversions and slippage for order prices
 */

import { OrderSide } from '../types';

/**
 * Strip binary floating-point residue (1.1 - 0.0024 => 1.0976, not 1.0976000000000001)
 */
export function normalizePrice(price: number): number {
  return Math.round(price * 1e10) / 1e10;
}

/**
 * Convert a distance in ticks into a price offset
 */
export function ticksToPrice(ticks: number, tickSize: number): number {
  return normalizePrice(ticks * tickSize);
}

/**
 * Apply slippage against the order side
 * @param price Reference execution price
 * @param slippageTicks Ticks of adverse movement
 * @param tickSize Instrument tick size
 * @param side BUY pays more, SELL receives less
 * @returns Price with slippage applied
 */
export function applySlippage(
  price: number,
  slippageTicks: number,
  tickSize: number,
  side: OrderSide
): number {
  const offset = slippageTicks * tickSize;
  return normalizePrice(side === 'BUY' ? price + offset : price - offset);
}
