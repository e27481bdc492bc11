/**
 * Backtest command: load data, validate it, run one instance and print the summary
 */

import { BacktestEngine } from "../backtest/backtestEngine";
import { instanceConfigs, DEFAULT_INSTANCE_ID } from "../config/instanceConfig";
import { loadConfigFile } from "../config/configSchema";
import { ConfigurationError } from "../core/errors";
import { StrategyInstanceConfig } from "../instance/strategyInstance";
import { prepareBacktestData, BarSource } from "../services/dataService";
import { BacktestResult } from "../types";
import { logInfo, logWarn, logError } from "../utils/logger";

export interface BacktestCommandOptions {
  instanceId?: string;
  configPath?: string;
  barsPath?: string;
  source?: BarSource;
}

export type BacktestOutcome =
  | { ok: true; result: BacktestResult; summary: string[] }
  | { ok: false; errors: string[] };

/**
 * Resolve the instance to run: a registered one, optionally with its config
 * overridden from a JSON file
 * @throws ConfigurationError for unknown instances or invalid config files
 */
export function resolveInstance(options: BacktestCommandOptions): StrategyInstanceConfig {
  const instanceId = options.instanceId ?? DEFAULT_INSTANCE_ID;
  const registered = instanceConfigs[instanceId];
  if (!registered) {
    const known = Object.keys(instanceConfigs).join(", ");
    throw new ConfigurationError([`instance: unknown "${instanceId}" (known: ${known})`]);
  }

  if (!options.configPath) {
    return registered;
  }
  return {
    instanceId,
    config: loadConfigFile(options.configPath, registered.config),
  };
}

/**
 * Run a backtest and return its result; data validation failures are reported, not thrown
 */
export async function runBacktestCommand(options: BacktestCommandOptions = {}): Promise<BacktestOutcome> {
  const instanceConfig = resolveInstance(options);
  const { instanceId, config } = instanceConfig;

  const source: BarSource =
    options.source ?? (options.barsPath ? { kind: "file", path: options.barsPath } : { kind: "exchange" });

  logInfo(`Loading bars from ${source.kind === "file" ? source.path : "exchange"}`, undefined, instanceId);
  const data = await prepareBacktestData(config, source);

  if (data.validation.warnings.length > 0) {
    logWarn("Validation warnings", { warnings: data.validation.warnings }, instanceId);
  }
  if (!data.validation.isValid) {
    logError("Validation FAILED", { errors: data.validation.errors }, instanceId);
    return { ok: false, errors: data.validation.errors };
  }
  logInfo(`Validation passed (${data.bars.length} bars)`, undefined, instanceId);

  const engine = new BacktestEngine(instanceConfig);
  const result = engine.run(data.bars, data.indicators);
  const summary = [`[${instanceId}] ${config.instrument.symbol}`, ...engine.getInstance().getLogger().formatSummary()];

  return { ok: true, result, summary };
}
