/**
 * Time utility functions
 */

import { BarClock, Weekday } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAYS: Weekday[] = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

/**
 * Convert timeframe string to milliseconds
 * Supports: 1m, 3m, 5m, 15m, 30m, 1h, 2h, 4h, 6h, 8h, 12h, 1d, 3d, 1w
 */
export function getIntervalMs(interval: string): number {
  const unit = interval.slice(-1);
  const value = parseInt(interval.slice(0, -1));

  switch (unit) {
    case 'm': // minutes
      return value * 60 * 1000;
    case 'h': // hours
      return value * 60 * 60 * 1000;
    case 'd': // days
      return value * 24 * 60 * 60 * 1000;
    case 'w': // weeks
      return value * 7 * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown interval unit: ${unit}`);
  }
}

/**
 * Parse "HH:mm" or "HH:mm:ss" into seconds since midnight
 */
export function parseTimeOfDay(value: string): number {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  const [, hh, mm, ss] = match;
  return Number(hh) * 3600 + Number(mm) * 60 + (ss === undefined ? 0 : Number(ss));
}

/**
 * Weekday and time of day of a timestamp, shifted by the session's UTC offset
 */
export function getBarClock(time: number, utcOffsetMinutes: number = 0): BarClock {
  const local = new Date(time + utcOffsetMinutes * 60_000);
  return {
    weekday: WEEKDAYS[local.getUTCDay()],
    secondsOfDay: local.getUTCHours() * 3600 + local.getUTCMinutes() * 60 + local.getUTCSeconds(),
  };
}

/**
 * First session close at or after `time` (epoch ms)
 */
export function getNextSessionClose(
  time: number,
  sessionCloseSeconds: number,
  utcOffsetMinutes: number = 0
): number {
  const offsetMs = utcOffsetMinutes * 60_000;
  const local = time + offsetMs;
  const dayStart = Math.floor(local / DAY_MS) * DAY_MS;

  let close = dayStart + sessionCloseSeconds * 1000;
  if (close < local) {
    close += DAY_MS;
  }
  return close - offsetMs;
}

/**
 * Whether this is the last bar of its session.
 * Bars are stamped with their end time, so a bar stamped at the close is the last one;
 * otherwise the session ends here when the next bar lies past the close.
 * With no next bar the feed has ended, which also closes the session.
 */
export function isSessionEnd(
  barTime: number,
  nextBarTime: number | undefined,
  sessionCloseSeconds: number,
  utcOffsetMinutes: number = 0
): boolean {
  if (nextBarTime === undefined) {
    return true;
  }
  const close = getNextSessionClose(barTime, sessionCloseSeconds, utcOffsetMinutes);
  return barTime === close || nextBarTime > close;
}
