import {
  FIRST_VALID_YEAR,
  getCongressNumbers,
  isValidCongressNumber,
} from '../../congress/calendar';
import {
  InvalidPartyError,
  InvalidPositionError,
  InvalidStateError,
  OutOfRangeError,
} from '../../errors';
import searchOptions from './search-options.json';
import type { SearchCriteria } from './types';

export const POSITIONS: readonly string[] = searchOptions.positions;

export const PARTIES: readonly string[] = [
  ...searchOptions.parties.current,
  ...searchOptions.parties.historical,
  ...searchOptions.parties.dataEntryVariants,
];

export const STATES: readonly string[] = searchOptions.states;

export function isValidPosition(position: string): boolean {
  return POSITIONS.includes(position);
}

export function isValidParty(party: string): boolean {
  return PARTIES.includes(party);
}

export function isValidState(state: string): boolean {
  return STATES.includes(state.toUpperCase());
}

// YearOrCongress takes either a Congress number or a year within the calendar
export function isValidYearOrCongress(value: number): boolean {
  if (!Number.isInteger(value)) return false;
  if (value >= FIRST_VALID_YEAR) return getCongressNumbers(value).size > 0;
  return isValidCongressNumber(value);
}

/**
 * Rejects unknown filter values before any request is sent.
 */
export function validateSearchCriteria(criteria: SearchCriteria): void {
  if (criteria.position !== undefined && !isValidPosition(criteria.position)) {
    throw new InvalidPositionError(criteria.position);
  }
  if (criteria.party !== undefined && !isValidParty(criteria.party)) {
    throw new InvalidPartyError(criteria.party);
  }
  if (criteria.state !== undefined && !isValidState(criteria.state)) {
    throw new InvalidStateError(criteria.state);
  }
  if (criteria.congress !== undefined && !isValidYearOrCongress(criteria.congress)) {
    throw new OutOfRangeError(criteria.congress);
  }
}
