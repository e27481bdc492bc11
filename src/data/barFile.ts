import fs from "fs";
import { z } from "zod";
import { Bar } from "../types";

const barRowSchema = z.object({
  time: z.union([z.number().int(), z.string()]),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative().optional(),
});

const barFileSchema = z.array(barRowSchema);

function toEpochMs(time: number | string, index: number): number {
  if (typeof time === "number") {
    return time;
  }
  const parsed = Date.parse(time);
  if (Number.isNaN(parsed)) {
    throw new Error(`Bar ${index}: invalid time "${time}"`);
  }
  return parsed;
}

/**
 * Parse bar rows (epoch ms or ISO-8601 times) into Bars for an instrument
 */
export function parseBars(input: unknown, tickSize: number): Bar[] {
  const result = barFileSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid bar data at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }

  return result.data.map((row, index) => ({
    time: toEpochMs(row.time, index),
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume ?? 0,
    tickSize,
  }));
}

/**
 * Load bars from a JSON file holding an array of
 * `{ time, open, high, low, close, volume? }`
 */
export function loadBarsFromFile(filePath: string, tickSize: number): Bar[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read bars from ${filePath}: ${message}`);
  }
  return parseBars(raw, tickSize);
}
