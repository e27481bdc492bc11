/**
 * Technical indicators calculation
 *
 * This module serves as a small, reusable indicator library:
 * - Low-level numeric APIs (`sma`, `stochastic`, `adx`) return full-length series with NaN for warm-up periods.
 * - It is intentionally decoupled from Config and project-specific data structures.
 */

import { Bar } from "../types";

// NOTE:
// ADX first valid value at index = period * 2 - 1 (strict Wilder definition)
// Stochastic %D first valid value at index = kPeriod + slowing + dPeriod - 3

/**
 * Simple Moving Average (SMA) series.
 * A window containing NaN yields NaN, so series with their own warm-up can be chained.
 * @param values Input price or value series
 * @param period Lookback period
 * @returns SMA series as number[] with NaN for undefined entries
 */
export function sma(values: number[], period: number): number[] {
  const smaSeries: number[] = [];

  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      smaSeries.push(Number.NaN);
      continue;
    }

    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += values[j];
    }
    smaSeries.push(sum / period);
  }

  return smaSeries;
}

/**
 * Slow stochastic oscillator.
 * fast %K = 100 * (close - lowest low) / (highest high - lowest low) over kPeriod,
 * slow %K = SMA(slowing) of fast %K, %D = SMA(dPeriod) of slow %K.
 * A flat window (zero range) reads as the midpoint, 50.
 * @returns slow %K and %D series with NaN for undefined entries
 */
export function stochastic(
  bars: Bar[],
  kPeriod: number,
  slowing: number = 3,
  dPeriod: number = 3
): {
  k: number[];
  d: number[];
} {
  const fastK: number[] = new Array(bars.length).fill(Number.NaN);

  for (let i = kPeriod - 1; i < bars.length; i++) {
    let highest = -Infinity;
    let lowest = Infinity;
    for (let j = i - kPeriod + 1; j <= i; j++) {
      highest = Math.max(highest, bars[j].high);
      lowest = Math.min(lowest, bars[j].low);
    }

    const range = highest - lowest;
    fastK[i] = range === 0 ? 50 : (100 * (bars[i].close - lowest)) / range;
  }

  const k = sma(fastK, slowing);
  const d = sma(k, dPeriod);

  return { k, d };
}

/**
 * ADX and DI series (Wilder's definition) as generic numeric series.
 * Uses NaN for warm-up region (before DI/ADX are statistically defined).
 * @param bars OHLC series
 * @param period Lookback period
 * @returns ADX, +DI, -DI numeric series with NaN for undefined entries
 */
export function adx(
  bars: Bar[],
  period: number
): {
  adx: number[];
  plusDI: number[];
  minusDI: number[];
} {
  const len = bars.length;

  const plusDM: number[] = new Array(len).fill(0);
  const minusDM: number[] = new Array(len).fill(0);
  const trList: number[] = new Array(len).fill(0);

  // 1. True range and directional movement
  for (let i = 1; i < len; i++) {
    const curr = bars[i];
    const prev = bars[i - 1];

    const upMove = curr.high - prev.high;
    const downMove = prev.low - curr.low;

    plusDM[i] = upMove > downMove && upMove > 0 ? upMove : 0;
    minusDM[i] = downMove > upMove && downMove > 0 ? downMove : 0;

    trList[i] = Math.max(
      curr.high - curr.low,
      Math.abs(curr.high - prev.close),
      Math.abs(curr.low - prev.close)
    );
  }

  const plusDI: number[] = new Array(len).fill(Number.NaN);
  const minusDI: number[] = new Array(len).fill(Number.NaN);
  const adxSeries: number[] = new Array(len).fill(Number.NaN);

  if (len <= period) {
    return { adx: adxSeries, plusDI, minusDI };
  }

  // 2. Wilder smoothing, seeded with the plain sum of the first `period` moves
  let smoothedTR = 0;
  let smoothedPlusDM = 0;
  let smoothedMinusDM = 0;
  const dx: number[] = new Array(len).fill(Number.NaN);

  for (let i = 1; i < len; i++) {
    if (i <= period) {
      smoothedTR += trList[i];
      smoothedPlusDM += plusDM[i];
      smoothedMinusDM += minusDM[i];
      if (i < period) continue;
    } else {
      smoothedTR = smoothedTR - smoothedTR / period + trList[i];
      smoothedPlusDM = smoothedPlusDM - smoothedPlusDM / period + plusDM[i];
      smoothedMinusDM = smoothedMinusDM - smoothedMinusDM / period + minusDM[i];
    }

    // 3. +DI, -DI, DX
    if (smoothedTR === 0) {
      plusDI[i] = 0;
      minusDI[i] = 0;
      dx[i] = 0;
      continue;
    }

    const pdi = (100 * smoothedPlusDM) / smoothedTR;
    const mdi = (100 * smoothedMinusDM) / smoothedTR;
    plusDI[i] = pdi;
    minusDI[i] = mdi;

    const sum = pdi + mdi;
    dx[i] = sum === 0 ? 0 : (100 * Math.abs(pdi - mdi)) / sum;
  }

  // 4. ADX: mean of the first `period` DX values, then Wilder smoothing
  const firstAdxIndex = period * 2 - 1;

  if (len > firstAdxIndex) {
    let dxSum = 0;
    for (let i = period; i <= firstAdxIndex; i++) {
      dxSum += dx[i];
    }
    adxSeries[firstAdxIndex] = dxSum / period;

    for (let i = firstAdxIndex + 1; i < len; i++) {
      adxSeries[i] = (adxSeries[i - 1] * (period - 1) + dx[i]) / period;
    }
  }

  return { adx: adxSeries, plusDI, minusDI };
}
