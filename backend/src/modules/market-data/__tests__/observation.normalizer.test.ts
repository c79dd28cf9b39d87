import { describe, it, expect } from 'vitest';
import { ObservationParseError } from '../../../common/errors.js';
import {
  createObservation,
  isBlankOrSentinel,
  isIsoDate,
  parseDecimal,
  periodCodeToMonth,
  toIsoDate,
  truncateTimestampToDate,
} from '../normalize/observation.normalizer.js';

describe('Observation normalizer', () => {

  describe('periodCodeToMonth', () => {
    it('maps M01..M12 to calendar months', () => {
      expect(periodCodeToMonth('M01')).toBe(1);
      expect(periodCodeToMonth('M05')).toBe(5);
      expect(periodCodeToMonth('M12')).toBe(12);
    });

    it('falls back to January for any other code', () => {
      expect(periodCodeToMonth('M13')).toBe(1);
      expect(periodCodeToMonth('S01')).toBe(1);
      expect(periodCodeToMonth('Q03')).toBe(1);
      expect(periodCodeToMonth('M00')).toBe(1);
      expect(periodCodeToMonth('')).toBe(1);
    });
  });

  describe('isBlankOrSentinel', () => {
    it('is true for empty, whitespace and the dot sentinel', () => {
      expect(isBlankOrSentinel('')).toBe(true);
      expect(isBlankOrSentinel('   ')).toBe(true);
      expect(isBlankOrSentinel('.')).toBe(true);
      expect(isBlankOrSentinel(' . ')).toBe(true);
    });

    it('is false for numeric strings', () => {
      expect(isBlankOrSentinel('0')).toBe(false);
      expect(isBlankOrSentinel('310.1')).toBe(false);
    });
  });

  describe('parseDecimal', () => {
    it('parses fixed-precision decimals', () => {
      expect(parseDecimal('310.1')).toBe(310.1);
      expect(parseDecimal(' 3.20 ')).toBe(3.2);
      expect(parseDecimal('-0.5')).toBe(-0.5);
      expect(parseDecimal('300')).toBe(300);
    });

    it('passes finite numbers through', () => {
      expect(parseDecimal(2345.67)).toBe(2345.67);
    });

    it('rejects sentinels and non-decimal text', () => {
      expect(() => parseDecimal('.')).toThrow(ObservationParseError);
      expect(() => parseDecimal('')).toThrow(ObservationParseError);
      expect(() => parseDecimal('12abc')).toThrow('not a decimal: "12abc"');
      expect(() => parseDecimal('1e3')).toThrow(ObservationParseError);
      expect(() => parseDecimal('NaN')).toThrow(ObservationParseError);
      expect(() => parseDecimal(Number.POSITIVE_INFINITY)).toThrow(ObservationParseError);
    });
  });

  describe('dates', () => {
    it('formats ISO dates with padding', () => {
      expect(toIsoDate(2024, 5)).toBe('2024-05-01');
      expect(toIsoDate(2024, 12, 31)).toBe('2024-12-31');
    });

    it('validates real calendar dates only', () => {
      expect(isIsoDate('2024-02-29')).toBe(true);
      expect(isIsoDate('2023-02-29')).toBe(false);
      expect(isIsoDate('2024-13-01')).toBe(false);
      expect(isIsoDate('2024-1-01')).toBe(false);
    });

    it('keeps the calendar-date part of a timestamp and discards the time', () => {
      expect(truncateTimestampToDate('2024-06-01T23:59:59.123Z')).toBe('2024-06-01');
      expect(truncateTimestampToDate('2024-06-01T01:00:00+05:00')).toBe('2024-06-01');
      expect(truncateTimestampToDate('2024-06-01')).toBe('2024-06-01');
      expect(truncateTimestampToDate('yesterday')).toBeNull();
    });
  });

  describe('createObservation', () => {
    it('collapses high/low to the value when absent and freezes the record', () => {
      const obs = createObservation({ seriesType: 'cpi', date: '2024-05-01', value: 310.1, rawPayload: {} });
      expect(obs).toEqual({ seriesType: 'cpi', date: '2024-05-01', value: 310.1, high: 310.1, low: 310.1, rawPayload: {} });
      expect(Object.isFrozen(obs)).toBe(true);
    });
  });
});
