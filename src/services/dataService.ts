/**
 * Data Service
 * Loads bars for an instance and computes its indicator series
 */

import { DataFetcher } from '../data/fetcher';
import { loadBarsFromFile } from '../data/barFile';
import { buildIndicators } from '../data/indicatorBuilders';
import { Config } from '../config/config';
import { Bar, IndicatorData } from '../types';
import { getIntervalMs } from '../utils/timeUtils';
import { validateDataQuality, ValidationResult } from './backtestValidationService';

export type BarSource =
  | { kind: 'file'; path: string }
  | { kind: 'exchange'; fetcher?: DataFetcher };

export interface BacktestData {
  bars: Bar[];
  indicators: IndicatorData[];
  validation: ValidationResult;
}

/**
 * Parse the backtest window; dates are taken as UTC midnight
 */
export function resolveBacktestWindow(config: Config): { interval: string; startTime: number; endTime: number } {
  if (!config.backtest) {
    throw new Error('backtest config is required to fetch bars from the exchange');
  }
  const startTime = Date.parse(config.backtest.startDate);
  const endTime = Date.parse(config.backtest.endDate);

  if (Number.isNaN(startTime)) {
    throw new Error(`Invalid startDate: ${config.backtest.startDate}`);
  }
  if (Number.isNaN(endTime)) {
    throw new Error(`Invalid endDate: ${config.backtest.endDate}`);
  }
  if (startTime >= endTime) {
    throw new Error(`startDate (${config.backtest.startDate}) must be before endDate (${config.backtest.endDate})`);
  }
  return { interval: config.backtest.interval, startTime, endTime };
}

async function loadBars(config: Config, source: BarSource): Promise<Bar[]> {
  if (source.kind === 'file') {
    return loadBarsFromFile(source.path, config.instrument.tickSize);
  }

  const { interval, startTime, endTime } = resolveBacktestWindow(config);
  const fetcher = source.fetcher ?? new DataFetcher(config.instrument.tickSize);
  return fetcher.fetchBarsForBacktest(config.instrument.symbol, interval, startTime, endTime);
}

/**
 * Load bars, sort them chronologically, check their quality and build indicators.
 * Indicators are only computed for data that passed validation.
 */
export async function prepareBacktestData(config: Config, source: BarSource): Promise<BacktestData> {
  const loaded = await loadBars(config, source);
  const bars = [...loaded].sort((a, b) => a.time - b.time);

  // File bars carry their own spacing; exchange bars must match the requested interval
  const expectedIntervalMs =
    source.kind === 'exchange' && config.backtest ? getIntervalMs(config.backtest.interval) : undefined;
  const validation = validateDataQuality(bars, expectedIntervalMs);
  const indicators = validation.isValid ? buildIndicators(bars, config.indicators) : [];

  return { bars, indicators, validation };
}
