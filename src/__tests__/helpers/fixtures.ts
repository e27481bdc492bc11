/**
 * Shared test fixtures: bars, a hand-fed MarketView and a recording ExecutionService
 */

import { Bar, Order } from '../../types';
import { MarketView } from '../../data/marketView';
import { ExecutionService } from '../../engine/IExecutionService';

export const HALF_HOUR = 1_800_000;

// 2025-01-06 is a Monday
export const MONDAY_18 = Date.UTC(2025, 0, 6, 18, 0);
export const MONDAY_12 = Date.UTC(2025, 0, 6, 12, 0);
export const WEDNESDAY_18 = Date.UTC(2025, 0, 8, 18, 0);

/**
 * Bar with a 30-pip range around its close
 */
export function makeBar(time: number, close: number, overrides: Partial<Bar> = {}): Bar {
  return {
    time,
    open: close,
    high: close + 0.0015,
    low: close - 0.0015,
    close,
    volume: 0,
    tickSize: 0.0001,
    ...overrides,
  };
}

export interface StubSeries {
  bars: Bar[]; // most recent first
  stochD?: Array<number | undefined>;
  adx?: Array<number | undefined>;
  sma?: Array<number | undefined>;
}

/**
 * MarketView fed directly with look-back values (index 0 = current bar)
 */
export class StubMarketView implements MarketView {
  private series: StubSeries;

  constructor(series: StubSeries) {
    this.series = series;
  }

  bar(nBack: number = 0): Bar | undefined {
    return this.series.bars[nBack];
  }

  recentBars(count: number): Bar[] | undefined {
    return count <= this.series.bars.length ? this.series.bars.slice(0, count) : undefined;
  }

  stochD(nBack: number = 0): number | undefined {
    return this.series.stochD?.[nBack];
  }

  adx(nBack: number = 0): number | undefined {
    return this.series.adx?.[nBack];
  }

  sma(nBack: number = 0): number | undefined {
    return this.series.sma?.[nBack];
  }
}

/**
 * A view on which every default filter passes for a long entry and %D crosses 51 upward
 */
export function longSetupView(
  options: { time?: number; close?: number; stochD?: number[]; adx?: number; sma?: number[] } = {}
): StubMarketView {
  const time = options.time ?? MONDAY_18;
  const close = options.close ?? 1.1;
  const bars: Bar[] = [];
  for (let i = 0; i < 10; i++) {
    bars.push(makeBar(time - i * HALF_HOUR, close));
  }
  return new StubMarketView({
    bars,
    stochD: options.stochD ?? [52, 50],
    adx: [options.adx ?? 20],
    sma: options.sma ?? [1.1001, 1.1],
  });
}

/**
 * A one-bar view, enough for the trailing stop while a position is open
 */
export function closeView(close: number, time: number = MONDAY_18 + HALF_HOUR): StubMarketView {
  return new StubMarketView({ bars: [makeBar(time, close)] });
}

export type ExecutionCall =
  | { op: 'insert'; order: Order }
  | { op: 'modify'; order: Order }
  | { op: 'cancel'; orderId: string };

/**
 * ExecutionService that records every request in order
 */
export class RecordingExecution implements ExecutionService {
  calls: ExecutionCall[] = [];
  failOn?: ExecutionCall['op'];
  rejectInsert?: (order: Order) => boolean;

  insertOrder(order: Order): void {
    if (this.rejectInsert?.(order)) {
      throw new Error(`venue rejected order ${order.id}`);
    }
    this.record({ op: 'insert', order });
  }

  modifyOrder(order: Order): void {
    this.record({ op: 'modify', order });
  }

  cancelOrder(orderId: string): void {
    this.record({ op: 'cancel', orderId });
  }

  private record(call: ExecutionCall): void {
    if (this.failOn === call.op) {
      throw new Error(`venue rejected ${call.op}`);
    }
    this.calls.push(call);
  }
}
