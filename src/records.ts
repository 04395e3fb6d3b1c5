import { getCongressYears, isValidCongressNumber } from './congress/calendar';
import { InvalidRecordError } from './errors';
import type { CongressRecord, MemberRecord, TermRecord } from './types';

export const PRESIDING_OFFICER_POSITION = 'speaker of the house';

export interface RawTerm {
  congressNumber: number;
  position: string;
  state: string;
  party: string | null;
}

export interface RawMember {
  bioguideId: string;
  firstName: string;
  lastName: string;
  nickname?: string | null;
  suffix?: string | null;
  birthYear?: string | null;
  deathYear?: string | null;
  biography?: string | null;
  terms: readonly TermRecord[];
}

/**
 * Builds a term, deriving its years from the Congress number.
 */
export function createTermRecord(raw: RawTerm): TermRecord {
  if (!isValidCongressNumber(raw.congressNumber)) {
    throw new InvalidRecordError('term', [`unknown congress ${raw.congressNumber}`]);
  }

  const { startYear, endYear } = getCongressYears(raw.congressNumber);
  const position = raw.position.trim().toLowerCase();

  return Object.freeze({
    congressNumber: raw.congressNumber,
    startYear,
    endYear,
    position,
    state: raw.state.trim().toUpperCase(),
    party: raw.party === null ? null : raw.party.trim().toLowerCase(),
    isPresidingOfficer: position === PRESIDING_OFFICER_POSITION,
  });
}

export function withTermChanges(
  term: TermRecord,
  changes: Partial<Pick<TermRecord, 'position' | 'isPresidingOfficer'>>
): TermRecord {
  return Object.freeze({ ...term, ...changes });
}

export function termsEqual(a: TermRecord, b: TermRecord): boolean {
  return (
    a.congressNumber === b.congressNumber &&
    a.startYear === b.startYear &&
    a.endYear === b.endYear &&
    a.position === b.position &&
    a.state === b.state &&
    a.party === b.party
  );
}

export function validateMemberData(raw: RawMember): string[] {
  const problems: string[] = [];
  if (!raw.bioguideId?.trim()) problems.push('missing bioguide id');
  if (!raw.firstName?.trim()) problems.push('missing first name');
  if (!raw.lastName?.trim()) problems.push('missing last name');
  if (raw.terms.length === 0) problems.push('no terms');

  const congresses = new Set(raw.terms.map((t) => t.congressNumber));
  if (congresses.size !== raw.terms.length) problems.push('duplicate congress terms');

  return problems;
}

export function createMemberRecord(raw: RawMember): MemberRecord {
  const problems = validateMemberData(raw);
  if (problems.length > 0) {
    throw new InvalidRecordError('member', problems);
  }

  return Object.freeze({
    bioguideId: raw.bioguideId.trim().toUpperCase(),
    firstName: raw.firstName.trim(),
    lastName: raw.lastName.trim(),
    nickname: raw.nickname ?? null,
    suffix: raw.suffix ?? null,
    birthYear: raw.birthYear ?? null,
    deathYear: raw.deathYear ?? null,
    biography: raw.biography ?? null,
    terms: Object.freeze([...raw.terms]),
  });
}

export function membersEqual(a: MemberRecord, b: MemberRecord): boolean {
  return (
    a.bioguideId === b.bioguideId &&
    a.terms.length === b.terms.length &&
    a.terms.every((term, i) => {
      const other = b.terms[i];
      return other !== undefined && termsEqual(term, other);
    })
  );
}

/**
 * Members unique by Bioguide ID, keeping the first occurrence.
 */
export function uniqueMembers(members: Iterable<MemberRecord>): MemberRecord[] {
  const seen = new Set<string>();
  const unique: MemberRecord[] = [];
  for (const member of members) {
    if (seen.has(member.bioguideId)) continue;
    seen.add(member.bioguideId);
    unique.push(member);
  }
  return unique;
}

export function createCongressRecord(number: number, members: Iterable<MemberRecord>): CongressRecord {
  if (!isValidCongressNumber(number)) {
    throw new InvalidRecordError('congress', [`unknown congress ${number}`]);
  }

  const { startYear, endYear } = getCongressYears(number);
  return Object.freeze({
    number,
    startYear,
    endYear,
    members: Object.freeze(uniqueMembers(members)),
  });
}

export function congressesEqual(a: CongressRecord, b: CongressRecord): boolean {
  const byId = new Map(b.members.map((m) => [m.bioguideId, m]));
  return (
    a.number === b.number &&
    a.members.length === b.members.length &&
    a.members.every((member) => {
      const other = byId.get(member.bioguideId);
      return other !== undefined && membersEqual(member, other);
    })
  );
}

/**
 * Members across several Congresses, unique by Bioguide ID.
 */
export function mergeCongressMembers(congresses: readonly CongressRecord[]): MemberRecord[] {
  return uniqueMembers(congresses.flatMap((congress) => congress.members));
}
