import { describe, it, expect } from 'vitest';
import {
  formatDailyNumber,
  isValidBusinessDateFormat,
  isValidRolloverTime,
  isValidTimezone,
  resolveBusinessDate,
  toDayKey,
} from '../business-date.js';
import { formatMoney, lineSubtotal } from '../money.js';

describe('Business date', () => {
  describe('resolveBusinessDate', () => {
    it('uses the calendar day with the default midnight rollover in UTC', () => {
      expect(resolveBusinessDate('2024-03-15T00:00:00.000Z')).toBe('2024-03-15');
      expect(resolveBusinessDate('2024-03-15T23:59:59.000Z')).toBe('2024-03-15');
    });

    it('assigns times before the rollover to the previous day', () => {
      const settings = { timezone: 'UTC', rolloverTime: '04:00' };
      expect(resolveBusinessDate('2024-03-16T03:59:00.000Z', settings)).toBe('2024-03-15');
      expect(resolveBusinessDate('2024-03-16T04:00:00.000Z', settings)).toBe('2024-03-16');
    });

    it('reads the clock in the configured timezone', () => {
      // Africa/Douala is UTC+1 all year
      const settings = { timezone: 'Africa/Douala', rolloverTime: '00:00' };
      expect(resolveBusinessDate('2024-03-15T23:30:00.000Z', settings)).toBe('2024-03-16');
    });

    it('crosses month and year boundaries when rolling back', () => {
      const settings = { timezone: 'UTC', rolloverTime: '05:00' };
      expect(resolveBusinessDate('2024-03-01T02:00:00.000Z', settings)).toBe('2024-02-29');
      expect(resolveBusinessDate('2025-01-01T02:00:00.000Z', settings)).toBe('2024-12-31');
    });

    it('accepts Date instances', () => {
      expect(resolveBusinessDate(new Date('2024-07-04T12:00:00.000Z'))).toBe('2024-07-04');
    });
  });

  describe('validation', () => {
    it('checks YYYY-MM-DD dates that exist', () => {
      expect(isValidBusinessDateFormat('2024-02-29')).toBe(true);
      expect(isValidBusinessDateFormat('2023-02-29')).toBe(false);
      expect(isValidBusinessDateFormat('2024-3-1')).toBe(false);
      expect(isValidBusinessDateFormat(undefined)).toBe(false);
    });

    it('checks HH:MM rollover times', () => {
      expect(isValidRolloverTime('04:30')).toBe(true);
      expect(isValidRolloverTime('24:00')).toBe(false);
      expect(isValidRolloverTime('4:30')).toBe(false);
    });

    it('checks IANA timezones', () => {
      expect(isValidTimezone('Africa/Douala')).toBe(true);
      expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
    });
  });

  describe('daily numbers', () => {
    it('formats prefix, day key and a four digit sequence', () => {
      expect(toDayKey('2024-03-15')).toBe('20240315');
      expect(formatDailyNumber('ORD', '2024-03-15', 7)).toBe('ORD-20240315-0007');
      expect(formatDailyNumber('PAY', '2024-03-15', 12345)).toBe('PAY-20240315-12345');
    });
  });
});

describe('Money', () => {
  it('formats minor units with the currency precision', () => {
    expect(formatMoney(2500, { code: 'XAF', decimals: 0 })).toBe('2500 XAF');
    expect(formatMoney(1999, { code: 'EUR', decimals: 2 })).toBe('19.99 EUR');
  });

  it('rounds fractional line subtotals to whole minor units', () => {
    expect(lineSubtotal(2, 1000)).toBe(2000);
    expect(lineSubtotal(0.5, 333)).toBe(167);
    expect(lineSubtotal(1.25, 800)).toBe(1000);
  });
});
