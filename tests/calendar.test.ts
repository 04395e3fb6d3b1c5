import { expect, test } from '@playwright/test';
import {
  allCongressNumbers,
  getCongressNumbers,
  getCongressYears,
  getCurrentCongress,
  getEndYear,
  getStartYear,
  getYearRangeByYear,
  isValidCongressNumber,
  MAX_CONGRESS_NUMBER,
  normalizeCongress,
} from '../src/congress/calendar';
import { OutOfRangeError } from '../src/errors';

// Mid-2026 falls in the 119th Congress (2025-2027)
const NOW = new Date(2026, 5, 1);

test.describe('Congress calendar', () => {
  test('Congress 0 is the Continental Congress', () => {
    expect(getCongressYears(0)).toEqual({ number: 0, startYear: 1786, endYear: 1789 });
  });

  test('numbered Congresses span two years from 1789', () => {
    expect(getCongressYears(1)).toEqual({ number: 1, startYear: 1789, endYear: 1791 });
    expect(getStartYear(69)).toBe(1925);
    expect(getEndYear(69)).toBe(1927);
    expect(getStartYear(100)).toBe(1987);
    expect(getStartYear(116)).toBe(2019);
    expect(getEndYear(MAX_CONGRESS_NUMBER)).toBe(2089);
  });

  test('consecutive Congresses share their boundary year', () => {
    for (let n = 1; n <= MAX_CONGRESS_NUMBER; n++) {
      expect(getEndYear(n - 1)).toBe(getStartYear(n));
    }
  });

  test('unknown Congress numbers are rejected', () => {
    expect(() => getStartYear(-1)).toThrow(OutOfRangeError);
    expect(() => getEndYear(151)).toThrow(OutOfRangeError);
    expect(() => getCongressYears(1.5)).toThrow(OutOfRangeError);
    expect(isValidCongressNumber(150)).toBe(true);
    expect(isValidCongressNumber(151)).toBe(false);
  });

  test('a boundary year belongs to both Congresses', () => {
    expect([...getCongressNumbers(2019)].sort((a, b) => a - b)).toEqual([115, 116]);
    expect([...getCongressNumbers(2020)]).toEqual([116]);
    expect([...getCongressNumbers(1789)].sort((a, b) => a - b)).toEqual([0, 1]);
    expect(getCongressNumbers(1700).size).toBe(0);
  });

  test('year range lookup picks the most recent Congress', () => {
    expect(getYearRangeByYear(2019)).toEqual([2019, 2021]);
    expect(getYearRangeByYear(2020)).toEqual([2019, 2021]);
    expect(getYearRangeByYear(1787)).toEqual([1786, 1789]);
    expect(() => getYearRangeByYear(1700)).toThrow(OutOfRangeError);
  });

  test('the outgoing Congress is current until January 3rd', () => {
    expect(getCurrentCongress(new Date(2021, 0, 2))).toBe(116);
    expect(getCurrentCongress(new Date(2021, 0, 3))).toBe(117);
    expect(getCurrentCongress(NOW)).toBe(119);
  });

  test('allCongressNumbers runs from 0 to the current Congress', () => {
    const numbers = allCongressNumbers(NOW);
    expect(numbers).toHaveLength(120);
    expect(numbers[0]).toBe(0);
    expect(numbers[numbers.length - 1]).toBe(119);
  });
});

test.describe('normalizeCongress', () => {
  test('defaults to the current Congress', () => {
    expect(normalizeCongress(undefined, NOW)).toBe(119);
    expect(normalizeCongress(null, NOW)).toBe(119);
  });

  test('the current year and later years resolve to the current Congress', () => {
    expect(normalizeCongress(2026, NOW)).toBe(119);
    expect(normalizeCongress(2100, NOW)).toBe(119);
  });

  test('past years resolve to the latest Congress containing them', () => {
    expect(normalizeCongress(1789, NOW)).toBe(1);
    expect(normalizeCongress(1790, NOW)).toBe(1);
    expect(normalizeCongress(1786, NOW)).toBe(0);
    expect(normalizeCongress(2019, NOW)).toBe(116);
    expect(normalizeCongress(2020, NOW)).toBe(116);
  });

  test('valid Congress numbers are returned unchanged', () => {
    for (let n = 0; n <= 119; n++) {
      expect(normalizeCongress(n, NOW)).toBe(n);
    }
  });

  test('numbers past the current Congress but below 1786 resolve to the current Congress', () => {
    expect(normalizeCongress(120, NOW)).toBe(119);
    expect(normalizeCongress(1785, NOW)).toBe(119);
  });

  test('negative numbers resolve to Congress 0', () => {
    expect(normalizeCongress(-5, NOW)).toBe(0);
  });
});
