import { describe, it, expect } from 'vitest';
import { parseIsoDate, formatDate, daysInMonth, isLeapYear } from '../../src/parsers/date-parser.js';

describe('parseIsoDate', () => {
  it.each([
    '2021-01-01',
    '2024-02-29',
    '1999-12-31',
    '0001-01-01',
  ])('accepts %s', (input) => {
    expect(parseIsoDate(input)).toBe(input);
  });

  it.each([
    '2021-00-10',
    '2021-13-01',
    '2021-04-31',
    '2021-02-29',
    '2021-01-00',
    '21-01-01',
    '2021-1-1',
    '2021/01/01',
    ' 2021-01-01',
    '',
  ])('rejects "%s"', (input) => {
    expect(parseIsoDate(input)).toBeNull();
  });
});

describe('daysInMonth', () => {
  it('handles February in leap and common years', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
  });

  it('returns 0 for a month outside 1-12', () => {
    expect(daysInMonth(2024, 0)).toBe(0);
    expect(daysInMonth(2024, 13)).toBe(0);
  });
});

describe('isLeapYear', () => {
  it('follows the Gregorian rule', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
  });
});

describe('formatDate', () => {
  it('formats local dates as yyyy-MM-dd', () => {
    expect(formatDate(new Date(2026, 1, 8))).toBe('2026-02-08');
    expect(formatDate(new Date(2021, 11, 31))).toBe('2021-12-31');
  });
});
