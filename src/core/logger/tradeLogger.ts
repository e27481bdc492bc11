import { BacktestResult, Fill, PositionSide, TradeRecord } from '../../types';
import { TradeEvent } from '../state/positionManager';
import { logInfo, logWarn } from '../../utils/logger';

interface OpenTrade {
  side: PositionSide;
  entryPrice: number;
  entryTime: number;
  quantity: number;
}

/**
 * Pairs entry and exit fills into round-trip trades and keeps running equity
 */
export class TradeLogger {
  private trades: TradeRecord[] = [];
  private openTrade: OpenTrade | null = null;
  private initialCapital: number = 0;
  private currentEquity: number = 0;
  private pointValue: number = 1;
  private commissionPerContract: number = 0;
  private silent: boolean = false;
  private instanceId?: string;

  constructor(options: { pointValue?: number; commissionPerContract?: number; instanceId?: string } = {}) {
    this.pointValue = options.pointValue ?? 1;
    this.commissionPerContract = options.commissionPerContract ?? 0;
    this.instanceId = options.instanceId;
  }

  setInitialCapital(capital: number) {
    this.initialCapital = capital;
    this.currentEquity = capital;
  }

  setSilent(silent: boolean) {
    this.silent = silent;
  }

  getCurrentEquity(): number {
    return this.currentEquity;
  }

  /**
   * Trade event listener, suitable for PositionManager.addTradeListener
   */
  readonly onTradeEvent = (event: TradeEvent): void => {
    if (event.kind === 'ENTRY_FILLED') {
      this.logEntry(event.side, event.fill);
    } else {
      this.logExit(event.side, event.fill, event.reason);
    }
  };

  logEntry(side: PositionSide, fill: Fill) {
    if (this.openTrade) {
      logWarn('Entry fill while a trade is already open; replacing it', { order: fill.orderId }, this.instanceId);
    }
    this.openTrade = {
      side,
      entryPrice: fill.price,
      entryTime: fill.time,
      quantity: fill.quantity,
    };

    if (!this.silent) {
      logInfo(`[ENTRY] ${side} @ ${fill.price}`, { order: fill.orderId }, this.instanceId);
    }
  }

  logExit(side: PositionSide, fill: Fill, reason: TradeRecord['reason']) {
    const open = this.openTrade;
    if (!open) {
      logWarn('Exit fill without a recorded entry; skipped', { order: fill.orderId, reason }, this.instanceId);
      return;
    }
    this.openTrade = null;

    const move = side === 'LONG' ? fill.price - open.entryPrice : open.entryPrice - fill.price;
    // Entry + exit
    const commission = this.commissionPerContract * open.quantity * 2;
    const pnl = move * open.quantity * this.pointValue - commission;

    this.currentEquity += pnl;

    const trade: TradeRecord = {
      side,
      entryPrice: open.entryPrice,
      entryTime: open.entryTime,
      exitPrice: fill.price,
      exitTime: fill.time,
      quantity: open.quantity,
      pnl,
      commission,
      equityAfterTrade: this.currentEquity,
      reason,
    };
    this.trades.push(trade);

    if (!this.silent) {
      logInfo(
        `[EXIT] ${side} @ ${fill.price} | PnL=${pnl.toFixed(2)} | reason=${reason}`,
        undefined,
        this.instanceId
      );
    }
  }

  getTrades(): TradeRecord[] {
    return [...this.trades];
  }

  getResults(): BacktestResult {
    const totalTrades = this.trades.length;
    const wins = this.trades.filter(t => t.pnl > 0);
    const losses = this.trades.filter(t => t.pnl < 0);
    const winRate = totalTrades > 0 ? (wins.length / totalTrades) * 100 : 0;

    const totalWin = wins.reduce((sum, t) => sum + t.pnl, 0);
    const totalLoss = Math.abs(losses.reduce((sum, t) => sum + t.pnl, 0));
    const profitFactor = totalLoss > 0 ? totalWin / totalLoss : 0;

    const avgWin = wins.length > 0 ? totalWin / wins.length : 0;
    const avgLoss = losses.length > 0 ? totalLoss / losses.length : 0;

    const totalReturn = this.initialCapital > 0
      ? ((this.currentEquity - this.initialCapital) / this.initialCapital) * 100
      : 0;

    let maxEquity = this.initialCapital;
    let maxDrawdown = 0;
    for (const trade of this.trades) {
      if (trade.equityAfterTrade > maxEquity) {
        maxEquity = trade.equityAfterTrade;
      }
      const drawdown = maxEquity - trade.equityAfterTrade;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }

    return {
      initialCapital: this.initialCapital,
      finalEquity: this.currentEquity,
      trades: this.getTrades(),
      stats: {
        totalTrades,
        winRate,
        netPnl: this.currentEquity - this.initialCapital,
        maxDrawdown,
        profitFactor,
        averageWin: avgWin,
        averageLoss: avgLoss,
        totalReturn,
      },
    };
  }

  /**
   * Plain-text summary lines for the console
   */
  formatSummary(): string[] {
    const results = this.getResults();
    return [
      '====================',
      'Backtest Summary',
      '====================',
      `Trades: ${results.stats.totalTrades}`,
      `Win rate: ${results.stats.winRate.toFixed(2)}%`,
      `Net PnL: ${results.stats.netPnl.toFixed(2)}`,
      `Profit factor: ${results.stats.profitFactor.toFixed(2)}`,
      `Final Equity: ${results.finalEquity.toFixed(2)}`,
      `Max Drawdown: ${results.stats.maxDrawdown.toFixed(2)}`,
    ];
  }
}
