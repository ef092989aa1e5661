/**
 * Clock and calendar helper tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatClock,
  formatHourMinute,
  isValidCalendarDay,
  parseCalendarDate,
  parseClock,
} from '../../../core/utils/time.js';

describe('time utilities', () => {
  describe('parseClock', () => {
    it('should accept H:MM, HH:MM and HH:MM:SS.fff', () => {
      expect(parseClock('0:05')).toBe(300);
      expect(parseClock('01:02')).toBe(3720);
      expect(parseClock('01:02:03.75')).toBe(3723);
    });

    it('should reject out-of-range and malformed values', () => {
      expect(parseClock('24:00')).toBeUndefined();
      expect(parseClock('12:60')).toBeUndefined();
      expect(parseClock('12-30')).toBeUndefined();
    });
  });

  it('should format clocks with zero padding', () => {
    expect(formatClock(3723)).toBe('01:02:03');
    expect(formatHourMinute(62)).toBe('01:02');
    expect(formatHourMinute(1439)).toBe('23:59');
  });

  describe('calendar', () => {
    it('should know leap years', () => {
      expect(isValidCalendarDay(2012, 2, 29)).toBe(true);
      expect(isValidCalendarDay(2011, 2, 29)).toBe(false);
      expect(isValidCalendarDay(2011, 13, 1)).toBe(false);
    });

    it('should normalise the supported date layouts to ISO', () => {
      expect(parseCalendarDate('2010.01.15')).toBe('2010-01-15');
      expect(parseCalendarDate('2010-1-5')).toBe('2010-01-05');
      expect(parseCalendarDate('1/15/2010')).toBe('2010-01-15');
      expect(parseCalendarDate('2010.02.30')).toBeUndefined();
      expect(parseCalendarDate('55211.0')).toBeUndefined();
    });
  });
});
