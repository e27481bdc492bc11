#!/usr/bin/env node
/**
 * Main entry point
 * Usage: --mode=backtest [--instance=ID] [--config=path.json] [--bars=path.json] [--log-level=debug|info|warn|error]
 */

import { runBacktestCommand, BacktestCommandOptions } from "./commands/backtest";
import { ConfigurationError } from "./core/errors";
import { logError, logger, parseLogLevel } from "./utils/logger";

export interface CliArgs extends BacktestCommandOptions {
  mode: string;
  logLevel?: string;
}

/**
 * Parse `--key=value` flags; unknown flags are ignored
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { mode: "backtest" };
  for (const arg of argv) {
    const match = /^--([a-z-]+)=(.*)$/.exec(arg);
    if (!match) continue;
    const [, key, value] = match;
    switch (key) {
      case "mode":
        args.mode = value;
        break;
      case "instance":
        args.instanceId = value;
        break;
      case "config":
        args.configPath = value;
        break;
      case "bars":
        args.barsPath = value;
        break;
      case "log-level":
        args.logLevel = value;
        break;
    }
  }
  return args;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.logLevel) {
    logger.setLevel(parseLogLevel(args.logLevel));
  }

  if (args.mode !== "backtest") {
    console.log("Unknown mode. Use --mode=backtest");
    return 1;
  }

  console.log("=".repeat(60));
  console.log("Stochastic Cross Engine - Backtest Mode");
  console.log("=".repeat(60));

  const outcome = await runBacktestCommand(args);
  if (!outcome.ok) {
    logError("Backtest validation failed. Please fix data quality issues before running backtest.");
    return 1;
  }

  for (const line of outcome.summary) {
    console.log(line);
  }
  return 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof ConfigurationError) {
        logError(error.message, { issues: error.issues });
      } else if (error instanceof Error) {
        console.error("Backtest failed:", error.message);
        console.error(error.stack);
      } else {
        console.error("Backtest failed:", error);
      }
      process.exitCode = 1;
    });
}
