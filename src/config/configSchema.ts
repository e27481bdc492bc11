import * as fs from "fs";
import { z } from "zod";
import { Config, defaultConfig } from "./config";
import { ConfigurationError } from "../core/errors";

/**
 * Configuration validation schema
 * Every parameter is checked once at load time; the engine never runs on an invalid set
 */

const timeOfDay = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, "must be HH:mm or HH:mm:ss");

const positiveInt = z.number().int().positive();
const oscillatorLevel = z.number().min(0).max(100);

const tradingDaysSchema = z.object({
  sunday: z.boolean().optional(),
  monday: z.boolean().optional(),
  tuesday: z.boolean().optional(),
  wednesday: z.boolean().optional(),
  thursday: z.boolean().optional(),
  friday: z.boolean().optional(),
  saturday: z.boolean().optional(),
});

export const configSchema = z
  .object({
    indicators: z.object({
      stochastic: z.object({ period: positiveInt }),
      adx: z.object({ period: positiveInt }),
      sma: z.object({ period: positiveInt }),
    }),

    filters: z.object({
      tradingDays: tradingDaysSchema,
      session: z.object({
        start: timeOfDay,
        end: timeOfDay,
      }),
      volatility: z.object({
        lookback: positiveInt,
        minRange: z.number().nonnegative(),
      }),
      minAdxLong: z.number().nonnegative(),
      minAdxShort: z.number().nonnegative(),
    }),

    signal: z.object({
      buyLevel: oscillatorLevel,
      sellLevel: oscillatorLevel,
    }),

    risk: z.object({
      stopTicks: positiveInt,
      profitTicks: positiveInt,
      stopAcceleration: z.number().positive(),
    }),

    instrument: z.object({
      symbol: z.string().min(1),
      tickSize: z.number().positive(),
      sessionClose: timeOfDay,
      utcOffsetMinutes: z.number().int().min(-720).max(840),
    }),

    account: z.object({
      initialCapital: z.number().positive(),
    }),

    execution: z.object({
      commissionPerContract: z.number().nonnegative(),
      slippageTicks: z.number().int().nonnegative(),
      pointValue: z.number().positive(),
    }),

    backtest: z
      .object({
        interval: z.string().regex(/^\d+[mhdw]$/, "must look like 30m, 1h, 1d"),
        startDate: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO date"),
        endDate: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO date"),
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    if (config.signal.buyLevel <= config.signal.sellLevel) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["signal", "buyLevel"],
        message: `must be greater than sellLevel (${config.signal.sellLevel})`,
      });
    }
    if (config.backtest && Date.parse(config.backtest.startDate) >= Date.parse(config.backtest.endDate)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["backtest", "endDate"],
        message: "must be after startDate",
      });
    }
  });

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively overlay `override` onto `base`; arrays and scalars replace
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a complete configuration object
 * @throws ConfigurationError listing every offending parameter
 */
export function parseConfig(input: unknown): Readonly<Config> {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(issues);
  }
  return deepFreeze(result.data);
}

/**
 * Overlay a partial configuration onto the defaults and validate the result
 */
export function loadConfig(overrides: unknown = {}, base: Config = defaultConfig): Readonly<Config> {
  return parseConfig(deepMerge(base, overrides));
}

/**
 * Read a JSON file of overrides and load it on top of `base`
 */
export function loadConfigFile(filePath: string, base: Config = defaultConfig): Readonly<Config> {
  let overrides: unknown;
  try {
    overrides = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${filePath}: ${message}`]);
  }
  return loadConfig(overrides, base);
}
