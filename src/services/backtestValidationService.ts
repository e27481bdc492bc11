/**
 * Backtest Validation Service
 * Validates bar data quality before a backtest runs
 */

import { Bar } from '../types';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

// Tolerance for floating point and exchange rounding
const EPS = 1e-10;

function at(bar: Bar): string {
  return new Date(bar.time).toISOString();
}

function warnGaps(bars: Bar[], spacingMs: number, warnings: string[]): void {
  if (spacingMs <= 0) {
    return;
  }
  let gaps = 0;
  for (let i = 1; i < bars.length; i++) {
    if (bars[i].time - bars[i - 1].time > spacingMs * 2) {
      gaps++;
    }
  }
  if (gaps > 0) {
    warnings.push(`${gaps} time gap(s) larger than twice the bar spacing (${spacingMs}ms)`);
  }
}

/**
 * Validate data quality for backtest.
 * Broken bars are errors; irregular spacing (weekends, holidays, session breaks) is only a warning.
 */
export function validateDataQuality(bars: Bar[], expectedIntervalMs?: number): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (bars.length === 0) {
    errors.push('No bar data provided');
    return { isValid: false, errors, warnings };
  }

  // Duplicates and ordering
  const timeSet = new Set<number>();
  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    if (timeSet.has(bar.time)) {
      errors.push(`Duplicate bar found at time ${at(bar)}`);
    } else if (i > 0 && bar.time < bars[i - 1].time) {
      errors.push(`Bar at ${at(bar)} is out of order`);
    }
    timeSet.add(bar.time);
  }

  // Price anomalies
  for (const bar of bars) {
    if (bar.high < bar.low - EPS) {
      errors.push(`Invalid price: high (${bar.high}) < low (${bar.low}) at ${at(bar)}`);
    }
    if (bar.open < bar.low - EPS || bar.open > bar.high + EPS) {
      errors.push(`Open price (${bar.open}) outside high/low range at ${at(bar)}`);
    }
    if (bar.close < bar.low - EPS || bar.close > bar.high + EPS) {
      errors.push(`Close price (${bar.close}) outside high/low range at ${at(bar)}`);
    }
    if (bar.open <= 0 || bar.high <= 0 || bar.low <= 0 || bar.close <= 0) {
      errors.push(`Zero or negative price found at ${at(bar)}`);
    }
    if (!(bar.tickSize > 0)) {
      errors.push(`Non-positive tick size (${bar.tickSize}) at ${at(bar)}`);
    }
  }

  // Time gaps against the configured interval, or else the most common spacing
  if (expectedIntervalMs !== undefined) {
    warnGaps(bars, expectedIntervalMs, warnings);
  } else if (bars.length > 2) {
    const intervals: number[] = [];
    for (let i = 1; i < bars.length; i++) {
      intervals.push(bars[i].time - bars[i - 1].time);
    }

    const intervalCounts = new Map<number, number>();
    for (const interval of intervals) {
      intervalCounts.set(interval, (intervalCounts.get(interval) ?? 0) + 1);
    }
    let mostCommonInterval = intervals[0];
    let bestCount = 0;
    for (const [interval, count] of intervalCounts) {
      if (count > bestCount) {
        mostCommonInterval = interval;
        bestCount = count;
      }
    }

    warnGaps(bars, mostCommonInterval, warnings);
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
