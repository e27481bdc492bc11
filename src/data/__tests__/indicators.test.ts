/**
 * Unit tests for indicator series
 */

import { adx, sma, stochastic } from "../indicators";
import { buildIndicators, getWarmupBars } from "../indicatorBuilders";
import { defaultConfig } from "../../config/config";
import { Bar } from "../../types";

function createBar(i: number, low: number, high: number, close: number): Bar {
  return {
    time: i * 1_800_000,
    open: close,
    high,
    low,
    close,
    volume: 1000,
    tickSize: 0.0001,
  };
}

// Each bar one point above the previous, closing on its high
function risingBars(count: number): Bar[] {
  const bars: Bar[] = [];
  for (let i = 0; i < count; i++) {
    bars.push(createBar(i, i, i + 1, i + 1));
  }
  return bars;
}

function flatBars(count: number): Bar[] {
  const bars: Bar[] = [];
  for (let i = 0; i < count; i++) {
    bars.push(createBar(i, 1, 1, 1));
  }
  return bars;
}

describe("sma", () => {
  it("should average the trailing window", () => {
    expect(sma([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
  });

  it("should propagate NaN from the input window", () => {
    expect(sma([NaN, 1, 2, 3], 2)).toEqual([NaN, NaN, 1.5, 2.5]);
  });
});

describe("stochastic", () => {
  it("should warm up for kPeriod + slowing + dPeriod - 3 bars", () => {
    const { k, d } = stochastic(flatBars(8), 3, 3, 3);
    expect(k[3]).toBeNaN();
    expect(k[4]).toBe(50);
    expect(d[5]).toBeNaN();
    expect(d[6]).toBe(50);
  });

  it("should read a flat window as the midpoint", () => {
    const { d } = stochastic(flatBars(10), 3);
    expect(d[9]).toBe(50);
  });

  it("should read closes on the highest high as 100", () => {
    const { k, d } = stochastic(risingBars(10), 3);
    expect(k[9]).toBe(100);
    expect(d[9]).toBe(100);
  });
});

describe("adx", () => {
  it("should return series of the input length", () => {
    const result = adx(risingBars(20), 3);
    expect(result.adx).toHaveLength(20);
    expect(result.plusDI).toHaveLength(20);
    expect(result.minusDI).toHaveLength(20);
  });

  it("should start DI at index period and ADX at index period * 2 - 1", () => {
    const result = adx(risingBars(10), 3);
    expect(result.plusDI[2]).toBeNaN();
    expect(result.plusDI[3]).toBe(100);
    expect(result.minusDI[3]).toBe(0);
    expect(result.adx[4]).toBeNaN();
    expect(result.adx[5]).toBe(100);
    expect(result.adx[9]).toBe(100);
  });

  it("should stay undefined when there are not more bars than the period", () => {
    const result = adx(risingBars(3), 3);
    expect(result.adx.every((v) => Number.isNaN(v))).toBe(true);
    expect(result.plusDI.every((v) => Number.isNaN(v))).toBe(true);
  });
});

describe("buildIndicators", () => {
  const config = {
    stochastic: { period: 3 },
    adx: { period: 3 },
    sma: { period: 2 },
  };

  it("should map warm-up values to undefined", () => {
    const indicators = buildIndicators(risingBars(8), config);
    expect(indicators).toHaveLength(8);
    expect(indicators[0]).toEqual({
      stochK: undefined,
      stochD: undefined,
      adx: undefined,
      plusDI: undefined,
      minusDI: undefined,
      sma: undefined,
    });
    expect(indicators[1].sma).toBe(1.5);
    expect(indicators[7].stochD).toBe(100);
    expect(indicators[7].adx).toBe(100);
  });

  it("getWarmupBars should cover the slowest indicator plus its previous value", () => {
    expect(getWarmupBars(config)).toBe(8);
    // SMA(78) dominates the default parameter set
    expect(getWarmupBars(defaultConfig.indicators)).toBe(79);
  });
});
