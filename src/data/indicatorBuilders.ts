import { Config } from "../config/config";
import { Bar, IndicatorData } from "../types";
import { sma, stochastic, adx } from "./indicators";

/** Standard slow-stochastic smoothing lengths */
export const STOCHASTIC_SLOWING = 3;
export const STOCHASTIC_D_PERIOD = 3;

function defined(value: number): number | undefined {
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Build per-bar IndicatorData from bars and config.
 * This is a project-specific adapter on top of the generic indicator series;
 * warm-up entries come back as undefined.
 */
export function buildIndicators(bars: Bar[], config: Config["indicators"]): IndicatorData[] {
  const closes = bars.map((b) => b.close);

  const { k, d } = stochastic(bars, config.stochastic.period, STOCHASTIC_SLOWING, STOCHASTIC_D_PERIOD);
  const { adx: adxSeries, plusDI, minusDI } = adx(bars, config.adx.period);
  const smaSeries = sma(closes, config.sma.period);

  return bars.map((_, i) => ({
    stochK: defined(k[i]),
    stochD: defined(d[i]),

    adx: defined(adxSeries[i]),
    plusDI: defined(plusDI[i]),
    minusDI: defined(minusDI[i]),

    sma: defined(smaSeries[i]),
  }));
}

/**
 * Number of bars before every indicator the engine reads has two defined values
 */
export function getWarmupBars(config: Config["indicators"]): number {
  const stochasticFirst = config.stochastic.period + STOCHASTIC_SLOWING + STOCHASTIC_D_PERIOD - 3;
  const adxFirst = config.adx.period * 2 - 1;
  const smaFirst = config.sma.period - 1;
  // +1: the previous value must be defined as well
  return Math.max(stochasticFirst, adxFirst, smaFirst) + 2;
}
