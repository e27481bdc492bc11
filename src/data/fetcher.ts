/**
 * Bar fetcher
 * Historical klines from a Binance-compatible REST API
 */

import axios from "axios";
import { Bar } from "../types";
import { globalConfig } from "../config/globalConfig";

/**
 * Raw kline row: [openTime, open, high, low, close, volume, closeTime, ...]
 */
export type KlineRow = [number, string, string, string, string, string, number, ...unknown[]];

/**
 * Convert one kline row into a Bar stamped with the bar's end time
 */
export function toBar(row: KlineRow, tickSize: number): Bar {
  return {
    // closeTime is the last millisecond of the bar
    time: row[6] + 1,
    open: parseFloat(row[1]),
    high: parseFloat(row[2]),
    low: parseFloat(row[3]),
    close: parseFloat(row[4]),
    volume: parseFloat(row[5]),
    tickSize,
  };
}

export class DataFetcher {
  private baseUrl: string;
  private tickSize: number;
  private pageLimit: number;

  constructor(
    tickSize: number,
    baseUrl: string = globalConfig.exchange.baseUrl,
    pageLimit: number = globalConfig.exchange.maxKlinesPerRequest
  ) {
    this.tickSize = tickSize;
    this.baseUrl = baseUrl;
    this.pageLimit = pageLimit;
  }

  /**
   * Fetch one page of klines
   * @param symbol Trading pair (e.g., "EURUSDT")
   * @param interval Timeframe (e.g., "30m")
   * @param limit Number of candles to fetch
   * @param startTime Optional start timestamp in ms (kline open time)
   */
  async fetchKlines(
    symbol: string,
    interval: string,
    limit: number = 500,
    startTime?: number
  ): Promise<Bar[]> {
    const params: Record<string, string | number> = { symbol, interval, limit };
    if (startTime !== undefined) {
      params.startTime = startTime;
    }

    try {
      const response = await axios.get<KlineRow[]>(`${this.baseUrl}/api/v3/klines`, { params });
      return response.data.map((row) => toBar(row, this.tickSize));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to fetch klines: ${message}`);
    }
  }

  /**
   * Fetch every bar from startTime that has closed by endTime, paging forward
   */
  async fetchBarsForBacktest(
    symbol: string,
    interval: string,
    startTime: number,
    endTime: number
  ): Promise<Bar[]> {
    const bars: Bar[] = [];
    let cursor = startTime;

    while (cursor < endTime) {
      const page = await this.fetchKlines(symbol, interval, this.pageLimit, cursor);
      if (page.length === 0) break;

      for (const bar of page) {
        if (bar.time <= endTime) {
          bars.push(bar);
        }
      }

      const last = page[page.length - 1];
      if (page.length < this.pageLimit || last.time >= endTime) {
        break;
      }
      // Next page starts where the last bar ended
      cursor = last.time;
    }

    return bars;
  }
}
