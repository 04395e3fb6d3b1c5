/**
 * Zod schemas for the JSON files written under out/.
 *
 * Cached files are validated against these before they are used, so a file
 * from an older layout is refetched rather than trusted.
 */

import { z } from 'zod';
import { createCongressRecord, createMemberRecord, createTermRecord, withTermChanges } from './records';
import type { CongressMember, CongressRecord, MemberRecord, ScrapeResult } from './types';

const termSchema = z.object({
  congressNumber: z.number().int().nonnegative(),
  startYear: z.number().int(),
  endYear: z.number().int(),
  position: z.string(),
  state: z.string(),
  party: z.string().nullable(),
  isPresidingOfficer: z.boolean(),
});

export const memberSchema = z.object({
  bioguideId: z.string().min(1),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  nickname: z.string().nullable(),
  suffix: z.string().nullable(),
  birthYear: z.string().nullable(),
  deathYear: z.string().nullable(),
  biography: z.string().nullable(),
  terms: z.array(termSchema).min(1),
});

export const congressSchema = z.object({
  number: z.number().int().nonnegative(),
  startYear: z.number().int(),
  endYear: z.number().int(),
  members: z.array(memberSchema),
});

export const congressMemberSchema = z.object({
  bioguideId: z.string().nullable(),
  bioguide: memberSchema.nullable(),
  directory: z.record(z.unknown()).nullable(),
});

export function scrapeResultSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    data,
    scrapedAt: z.string(),
    source: z.enum(['bioguide', 'govinfo']),
  });
}

export const congressesResultSchema = scrapeResultSchema(z.array(congressSchema));
export const membersResultSchema = scrapeResultSchema(z.array(memberSchema));
export const congressMembersResultSchema = scrapeResultSchema(z.array(congressMemberSchema));

// Validated JSON goes back through the record constructors so cached and
// freshly scraped records are indistinguishable
export function reviveMember(member: z.infer<typeof memberSchema>): MemberRecord {
  return createMemberRecord({
    ...member,
    terms: member.terms.map((term) =>
      withTermChanges(createTermRecord(term), { isPresidingOfficer: term.isPresidingOfficer })
    ),
  });
}

export function reviveCongress(congress: z.infer<typeof congressSchema>): CongressRecord {
  return createCongressRecord(congress.number, congress.members.map(reviveMember));
}

export function reviveCongresses(
  result: z.infer<typeof congressesResultSchema>
): ScrapeResult<CongressRecord[]> {
  return { ...result, data: result.data.map(reviveCongress) };
}

export function reviveMembers(
  result: z.infer<typeof membersResultSchema>
): ScrapeResult<MemberRecord[]> {
  return { ...result, data: result.data.map(reviveMember) };
}

export function reviveCongressMembers(
  result: z.infer<typeof congressMembersResultSchema>
): ScrapeResult<CongressMember[]> {
  return {
    ...result,
    data: result.data.map((entry) => ({
      bioguideId: entry.bioguideId,
      bioguide: entry.bioguide === null ? null : reviveMember(entry.bioguide),
      directory: entry.directory,
    })),
  };
}
