import { OutOfRangeError } from '../errors';

export interface CongressYears {
  readonly number: number;
  readonly startYear: number;
  readonly endYear: number;
}

// Congress 0 is the Continental Congress (1786-1789); the 1st Congress sat in 1789.
export const FIRST_VALID_YEAR = 1786;
export const FIRST_CONGRESS_YEAR = 1789;
export const MAX_CONGRESS_NUMBER = 150;

export function isValidCongressNumber(number: number): boolean {
  return Number.isInteger(number) && number >= 0 && number <= MAX_CONGRESS_NUMBER;
}

export function getCongressYears(number: number): CongressYears {
  if (!isValidCongressNumber(number)) {
    throw new OutOfRangeError(number);
  }
  if (number === 0) {
    return { number, startYear: FIRST_VALID_YEAR, endYear: FIRST_CONGRESS_YEAR };
  }
  const startYear = FIRST_CONGRESS_YEAR + 2 * (number - 1);
  return { number, startYear, endYear: startYear + 2 };
}

export function getStartYear(number: number): number {
  return getCongressYears(number).startYear;
}

export function getEndYear(number: number): number {
  return getCongressYears(number).endYear;
}

/**
 * Every Congress whose inclusive year range contains `year`. Boundary years
 * (e.g. 2019) belong to both the outgoing and the incoming Congress.
 */
export function getCongressNumbers(year: number): Set<number> {
  const numbers = new Set<number>();
  for (let number = 0; number <= MAX_CONGRESS_NUMBER; number++) {
    const { startYear, endYear } = getCongressYears(number);
    if (endYear >= year && year >= startYear) {
      numbers.add(number);
    }
  }
  return numbers;
}

/**
 * Start and end year of the most recent Congress containing `year`.
 */
export function getYearRangeByYear(year: number): [number, number] {
  for (let number = MAX_CONGRESS_NUMBER; number >= 0; number--) {
    const { startYear, endYear } = getCongressYears(number);
    if (endYear >= year && year >= startYear) {
      return [startYear, endYear];
    }
  }
  throw new OutOfRangeError(year);
}

export function getCurrentCongress(now: Date = new Date()): number {
  const congresses = [...getCongressNumbers(now.getFullYear())];
  if (congresses.length === 0) {
    throw new OutOfRangeError(now.getFullYear());
  }

  // A new Congress convenes on January 3rd
  if (now.getMonth() === 0 && now.getDate() < 3) {
    return Math.min(...congresses);
  }
  return Math.max(...congresses);
}

export function allCongressNumbers(now: Date = new Date()): number[] {
  const current = getCurrentCongress(now);
  return Array.from({ length: current + 1 }, (_, number) => number);
}

export function allCongressTerms(now: Date = new Date()): CongressYears[] {
  return allCongressNumbers(now).map((number) => getCongressYears(number));
}

/**
 * Turns a year, a Congress number or nothing into a Congress number.
 * Years at or past the current one, and numbers too large to be a Congress
 * but too small to be a year, both resolve to the current Congress.
 */
export function normalizeCongress(value?: number | null, now: Date = new Date()): number {
  const currentCongress = getCurrentCongress(now);

  if (value === undefined || value === null) {
    return currentCongress;
  }
  if (value >= now.getFullYear()) {
    return currentCongress;
  }
  if (value >= FIRST_VALID_YEAR) {
    return Math.max(...getCongressNumbers(value));
  }
  if (value > currentCongress) {
    return currentCongress;
  }
  if (value >= 0) {
    return Math.trunc(value);
  }
  return 0;
}
