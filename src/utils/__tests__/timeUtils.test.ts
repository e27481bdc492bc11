/**
 * Unit tests for time utilities
 */

import {
  getBarClock,
  getIntervalMs,
  getNextSessionClose,
  isSessionEnd,
  parseTimeOfDay,
} from '../timeUtils';

const CLOSE_16 = 16 * 3600;

describe('timeUtils', () => {
  describe('getIntervalMs', () => {
    it('should convert timeframe strings to milliseconds', () => {
      expect(getIntervalMs('30m')).toBe(1_800_000);
      expect(getIntervalMs('4h')).toBe(14_400_000);
      expect(getIntervalMs('1d')).toBe(86_400_000);
    });

    it('should reject unknown units', () => {
      expect(() => getIntervalMs('5x')).toThrow('Unknown interval unit: x');
    });
  });

  describe('parseTimeOfDay', () => {
    it('should parse HH:mm and HH:mm:ss', () => {
      expect(parseTimeOfDay('18:00')).toBe(64_800);
      expect(parseTimeOfDay('06:00:30')).toBe(21_630);
      expect(parseTimeOfDay('00:00')).toBe(0);
    });

    it('should reject malformed values', () => {
      expect(() => parseTimeOfDay('6:00')).toThrow('Invalid time of day: 6:00');
    });
  });

  describe('getBarClock', () => {
    // 2025-01-06 is a Monday
    const mondayEvening = Date.UTC(2025, 0, 6, 18, 0, 0);

    it('should derive weekday and seconds of day in UTC', () => {
      expect(getBarClock(mondayEvening)).toEqual({ weekday: 'monday', secondsOfDay: 64_800 });
    });

    it('should apply the UTC offset before deriving calendar fields', () => {
      expect(getBarClock(mondayEvening, -300)).toEqual({ weekday: 'monday', secondsOfDay: 46_800 });
      // 18:00 UTC + 8h crosses into Tuesday 02:00
      expect(getBarClock(mondayEvening, 480)).toEqual({ weekday: 'tuesday', secondsOfDay: 7_200 });
    });
  });

  describe('getNextSessionClose', () => {
    it('should return the close later the same day', () => {
      const t = Date.UTC(2025, 0, 6, 15, 30);
      expect(getNextSessionClose(t, CLOSE_16)).toBe(Date.UTC(2025, 0, 6, 16, 0));
    });

    it('should return the close itself for a time stamped at the close', () => {
      expect(getNextSessionClose(Date.UTC(2025, 0, 6, 16, 0), CLOSE_16)).toBe(Date.UTC(2025, 0, 6, 16, 0));
    });

    it('should roll to the next day after the close', () => {
      expect(getNextSessionClose(Date.UTC(2025, 0, 6, 16, 0, 1), CLOSE_16)).toBe(Date.UTC(2025, 0, 7, 16, 0));
      expect(getNextSessionClose(Date.UTC(2025, 0, 6, 20, 0), CLOSE_16)).toBe(Date.UTC(2025, 0, 7, 16, 0));
    });

    it('should honour the UTC offset', () => {
      // 16:00 at UTC-5 is 21:00 UTC
      const t = Date.UTC(2025, 0, 6, 18, 0);
      expect(getNextSessionClose(t, CLOSE_16, -300)).toBe(Date.UTC(2025, 0, 6, 21, 0));
    });
  });

  describe('isSessionEnd', () => {
    it('should be true for the bar stamped at the close', () => {
      expect(isSessionEnd(Date.UTC(2025, 0, 6, 16, 0), Date.UTC(2025, 0, 6, 16, 30), CLOSE_16)).toBe(true);
    });

    it('should be false for the bar before the close bar', () => {
      expect(isSessionEnd(Date.UTC(2025, 0, 6, 15, 30), Date.UTC(2025, 0, 6, 16, 0), CLOSE_16)).toBe(false);
    });

    it('should be false while the next bar is still inside the session', () => {
      expect(isSessionEnd(Date.UTC(2025, 0, 6, 15, 0), Date.UTC(2025, 0, 6, 15, 30), CLOSE_16)).toBe(false);
    });

    it('should be true across a gap that skips the close', () => {
      expect(isSessionEnd(Date.UTC(2025, 0, 6, 15, 0), Date.UTC(2025, 0, 6, 18, 0), CLOSE_16)).toBe(true);
    });

    it('should be true when there is no next bar', () => {
      expect(isSessionEnd(Date.UTC(2025, 0, 6, 10, 0), undefined, CLOSE_16)).toBe(true);
    });
  });
});
