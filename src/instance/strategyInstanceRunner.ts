import { StrategyInstance } from './strategyInstance';
import { stochasticCrossStrategy } from '../core/strategy/stochasticCrossStrategy';
import { evaluateTrailingStop } from '../core/risk/trailingStop';
import { trailingStopLabel } from '../core/state/positionManager';
import { MarketView } from '../data/marketView';
import { Bar, Fill } from '../types';
import { logDebug } from '../utils/logger';

/**
 * Drives one StrategyInstance, one bar at a time.
 *
 * Execution order per bar:
 * - FLAT: entry filters -> crossing signal -> enter
 * - OPEN: trailing stop -> modify stop, or flatten
 *
 * A bar is all-or-nothing: if anything throws, position state is rolled back
 * to what it was before the bar and the error is rethrown.
 */
export class StrategyInstanceRunner {
  private instance: StrategyInstance;

  constructor(instance: StrategyInstance) {
    this.instance = instance;
  }

  onBar(view: MarketView): void {
    const bar = view.bar(0);
    if (!bar) {
      logDebug('No current bar; skipping', undefined, this.instance.instanceId);
      return;
    }
    this.atomically(() => this.processBar(view, bar));
  }

  /**
   * Mandatory intraday flatten at the end of the trading session
   */
  onSessionEnd(bar: Bar): void {
    const positionManager = this.instance.getPositionManager();
    if (positionManager.getState() === 'FLAT') {
      return;
    }
    logDebug('Session end with open position', { time: bar.time }, this.instance.instanceId);
    this.atomically(() => {
      positionManager.exit('SESSION_END');
    });
  }

  /**
   * Fills reported by the execution service (OCO leg fills close the position)
   */
  onFill(fill: Fill): void {
    this.instance.getPositionManager().onFill(fill);
  }

  private processBar(view: MarketView, bar: Bar): void {
    const positionManager = this.instance.getPositionManager();
    const config = this.instance.config;
    const position = positionManager.getPosition();

    /* =========================
     * 1. FLAT: look for an entry
     * ========================= */
    if (!position) {
      const signal = stochasticCrossStrategy({
        view,
        settings: this.instance.filterSettings,
        levels: config.signal,
        positionState: 'FLAT',
      });

      if (signal.type === 'ENTRY' && signal.side) {
        positionManager.enter({
          side: signal.side,
          close: bar.close,
          tickSize: bar.tickSize,
          stopTicks: config.risk.stopTicks,
          profitTicks: config.risk.profitTicks,
          baseAcceleration: config.risk.stopAcceleration,
          time: bar.time,
          reason: signal.reason,
        });
      }
      return;
    }

    /* =========================
     * 2. OPEN: trail or flatten
     * ========================= */
    const decision = evaluateTrailingStop(position, bar.close);

    switch (decision.action) {
      case 'NONE':
        return;
      case 'TRAIL':
        positionManager.updateTrailing(decision.trailing);
        positionManager.modifyStop(decision.stopPrice, trailingStopLabel(position.side));
        return;
      case 'EXIT':
        positionManager.exit('TRAILING_STOP_CROSSED');
        return;
    }
  }

  private atomically(work: () => void): void {
    const positionManager = this.instance.getPositionManager();
    const snapshot = positionManager.snapshot();
    try {
      work();
    } catch (error) {
      positionManager.restore(snapshot);
      throw error;
    }
  }
}
