/**
 * Backtest engine
 * Replays bars in strict time order through one strategy instance
 */

import { Bar, BacktestResult, IndicatorData } from "../types";
import { SimulatedExecution } from "../engine/simulatedExecution";
import { StrategyInstance, StrategyInstanceConfig } from "../instance/strategyInstance";
import { StrategyInstanceRunner } from "../instance/strategyInstanceRunner";
import { SeriesMarketView } from "../data/marketView";
import { isSessionEnd } from "../utils/timeUtils";
import { logInfo } from "../utils/logger";

export interface BacktestOptions {
  silent?: boolean;
}

export class BacktestEngine {
  private instance: StrategyInstance;
  private runner: StrategyInstanceRunner;
  private execution: SimulatedExecution;

  constructor(instanceConfig: StrategyInstanceConfig, options: BacktestOptions = {}) {
    this.execution = new SimulatedExecution({
      slippageTicks: instanceConfig.config.execution.slippageTicks,
      instanceId: instanceConfig.instanceId,
    });
    this.instance = new StrategyInstance(instanceConfig, this.execution);
    this.instance.getLogger().setSilent(options.silent ?? false);
    this.runner = new StrategyInstanceRunner(this.instance);
    this.execution.onFill((fill) => this.runner.onFill(fill));
  }

  /**
   * Per bar:
   * 1. resting stop/target orders are matched against the bar
   * 2. the strategy sees the bar close
   * 3. at the last bar of a session an open position is flattened
   * 4. market orders sent during the bar fill at its close
   */
  run(bars: Bar[], indicators: IndicatorData[]): BacktestResult {
    const { instrument } = this.instance.config;

    if (bars.length > 0) {
      logInfo("Starting backtest", {
        bars: bars.length,
        symbol: instrument.symbol,
        start: new Date(bars[0].time).toISOString(),
        end: new Date(bars[bars.length - 1].time).toISOString(),
      }, this.instance.instanceId);
    }

    for (let i = 0; i < bars.length; i++) {
      const bar = bars[i];
      const next = i + 1 < bars.length ? bars[i + 1] : undefined;

      this.execution.processBar(bar);
      this.runner.onBar(SeriesMarketView.at(bars, indicators, i));

      if (isSessionEnd(bar.time, next?.time, this.instance.sessionCloseSeconds, instrument.utcOffsetMinutes)) {
        this.runner.onSessionEnd(bar);
      }

      this.execution.settlePending(bar);
    }

    return this.instance.getLogger().getResults();
  }

  getInstance(): StrategyInstance {
    return this.instance;
  }

  getExecution(): SimulatedExecution {
    return this.execution;
  }
}

/**
 * Run a full backtest of one instance over prepared bars and indicators
 */
export function runBacktest(
  bars: Bar[],
  indicators: IndicatorData[],
  instanceConfig: StrategyInstanceConfig,
  options: BacktestOptions = {}
): BacktestResult {
  return new BacktestEngine(instanceConfig, options).run(bars, indicators);
}
