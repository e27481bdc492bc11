import { PositionManager } from '../core/state/positionManager';
import { TradeLogger } from '../core/logger/tradeLogger';
import { Config } from '../config/config';
import { parseConfig } from '../config/configSchema';
import { FilterSettings, compileFilterSettings } from '../core/filters/entryFilters';
import { ExecutionService } from '../engine/IExecutionService';
import { parseTimeOfDay } from '../utils/timeUtils';

export interface StrategyInstanceConfig {
  instanceId: string; // unique id, e.g. "EURUSDT_STOCH_CROSS_V1"
  config: Config;     // full parameter set
}

/**
 * One configured strategy on one instrument.
 * Config is validated here, once; an invalid parameter set never reaches the bar loop.
 */
export class StrategyInstance {
  readonly instanceId: string;
  readonly config: Readonly<Config>;
  readonly filterSettings: FilterSettings;
  readonly sessionCloseSeconds: number;

  private positionManager: PositionManager;
  private logger: TradeLogger;

  constructor(instanceConfig: StrategyInstanceConfig, execution: ExecutionService) {
    this.instanceId = instanceConfig.instanceId;
    this.config = parseConfig(instanceConfig.config);
    this.filterSettings = compileFilterSettings(this.config);
    this.sessionCloseSeconds = parseTimeOfDay(this.config.instrument.sessionClose);

    // Each instance owns independent state
    this.positionManager = new PositionManager(execution, { instanceId: this.instanceId });
    this.logger = new TradeLogger({
      pointValue: this.config.execution.pointValue,
      commissionPerContract: this.config.execution.commissionPerContract,
      instanceId: this.instanceId,
    });
    this.logger.setInitialCapital(this.config.account.initialCapital);
    this.positionManager.addTradeListener(this.logger.onTradeEvent);
  }

  getPositionManager(): PositionManager {
    return this.positionManager;
  }

  getLogger(): TradeLogger {
    return this.logger;
  }
}
