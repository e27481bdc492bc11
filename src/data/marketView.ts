import { Bar, IndicatorData } from "../types";

/**
 * Read-only window onto the bar history and indicator values as of one bar.
 *
 * Look-back is explicit: `nBack = 0` is the current bar, `1` the previous one.
 * Every accessor returns undefined when the history is too short or the
 * indicator has not warmed up yet; callers treat that as "no information".
 */
export interface MarketView {
  bar(nBack?: number): Bar | undefined;

  /** Last `count` bars, most recent first, or undefined if fewer exist */
  recentBars(count: number): Bar[] | undefined;

  stochD(nBack?: number): number | undefined;
  adx(nBack?: number): number | undefined;
  sma(nBack?: number): number | undefined;
}

/**
 * MarketView over chronological arrays of bars and precomputed indicators
 */
export class SeriesMarketView implements MarketView {
  private readonly bars: Bar[];
  private readonly indicators: IndicatorData[];
  private readonly cursor: number;

  constructor(bars: Bar[], indicators: IndicatorData[], cursor: number) {
    if (bars.length !== indicators.length) {
      throw new Error(
        `Bars and indicators must be aligned (${bars.length} bars, ${indicators.length} indicator rows)`
      );
    }
    if (cursor < 0 || cursor >= bars.length) {
      throw new Error(`Cursor ${cursor} outside bar series of length ${bars.length}`);
    }
    this.bars = bars;
    this.indicators = indicators;
    this.cursor = cursor;
  }

  /**
   * Create a view positioned on the bar at `index`
   */
  static at(bars: Bar[], indicators: IndicatorData[], index: number): SeriesMarketView {
    return new SeriesMarketView(bars, indicators, index);
  }

  bar(nBack: number = 0): Bar | undefined {
    const index = this.indexOf(nBack);
    return index === undefined ? undefined : this.bars[index];
  }

  recentBars(count: number): Bar[] | undefined {
    if (count <= 0 || count > this.cursor + 1) {
      return undefined;
    }
    return this.bars.slice(this.cursor - count + 1, this.cursor + 1).reverse();
  }

  stochD(nBack: number = 0): number | undefined {
    return this.indicator("stochD", nBack);
  }

  adx(nBack: number = 0): number | undefined {
    return this.indicator("adx", nBack);
  }

  sma(nBack: number = 0): number | undefined {
    return this.indicator("sma", nBack);
  }

  private indicator(key: keyof IndicatorData, nBack: number): number | undefined {
    const index = this.indexOf(nBack);
    return index === undefined ? undefined : this.indicators[index][key];
  }

  private indexOf(nBack: number): number | undefined {
    if (!Number.isInteger(nBack) || nBack < 0 || nBack > this.cursor) {
      return undefined;
    }
    return this.cursor - nBack;
  }
}
