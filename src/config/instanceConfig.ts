import { Config, defaultConfig } from './config';
import { StrategyInstanceConfig } from '../instance/strategyInstance';

/**
 * Config Registry: one entry per named strategy instance
 * Adding an instance = adding a config entry
 */
export interface InstanceConfigRegistry {
  [instanceId: string]: StrategyInstanceConfig;
}

const euroFxHalfHour: Config = {
  ...defaultConfig,
  instrument: { ...defaultConfig.instrument, symbol: "EURUSDT", tickSize: 0.0001 },
};

export const instanceConfigs: InstanceConfigRegistry = {
  "EURUSDT_STOCH_CROSS_V1": {
    instanceId: "EURUSDT_STOCH_CROSS_V1",
    config: euroFxHalfHour,
  },
  "EURUSDT_STOCH_CROSS_ALL_DAYS": {
    instanceId: "EURUSDT_STOCH_CROSS_ALL_DAYS",
    config: {
      ...euroFxHalfHour,
      filters: {
        ...euroFxHalfHour.filters,
        tradingDays: { monday: true, tuesday: true, wednesday: true, thursday: true, friday: true },
      },
    },
  },
};

export const DEFAULT_INSTANCE_ID = "EURUSDT_STOCH_CROSS_V1";
