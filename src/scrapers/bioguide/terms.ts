import { PRESIDING_OFFICER_POSITION, withTermChanges } from '../../records';
import type { TermRecord } from '../../types';
import { BIOGUIDE_CONFIG } from './constants';

const EXCLUDED_POSITIONS: readonly string[] = BIOGUIDE_CONFIG.EXCLUDED_POSITIONS;

/**
 * Collapses a member's terms to one per Congress.
 *
 * Member documents list one entry per position held, so a Congress can
 * appear several times: a party switch mid-term, or a Speaker listed both as
 * Representative and as Speaker. Terms are read in document order, which is
 * assumed chronological; when parties conflict the later entry wins.
 */
export function mergeTerms(terms: Iterable<TermRecord>): TermRecord[] {
  const merged = new Map<number, TermRecord>();

  for (const term of terms) {
    if (EXCLUDED_POSITIONS.includes(term.position)) continue;

    let stored = merged.get(term.congressNumber);
    if (stored === undefined) {
      merged.set(term.congressNumber, term);
      continue;
    }

    if (stored.party !== term.party) {
      stored = term;
    }

    // The flag survives once set; only a stored Speaker entry takes the chamber position
    if (stored.position === PRESIDING_OFFICER_POSITION && !term.isPresidingOfficer) {
      stored = withTermChanges(stored, { position: term.position, isPresidingOfficer: true });
    } else if (term.isPresidingOfficer) {
      stored = withTermChanges(stored, { isPresidingOfficer: true });
    }

    merged.set(term.congressNumber, stored);
  }

  return [...merged.values()];
}
