import { z } from 'zod';
import type { CongressMember, CongressRecord, DirectoryEntry, MemberRecord } from './types';

const directoryKeySchema = z
  .object({
    members: z
      .array(z.object({ bioGuideId: z.string().trim().min(1) }).passthrough())
      .min(1),
  })
  .passthrough();

/**
 * The Bioguide ID a directory entry is keyed by, or null when the entry
 * carries none.
 */
export function directoryBioguideId(entry: DirectoryEntry): string | null {
  const parsed = directoryKeySchema.safeParse(entry);
  if (!parsed.success) return null;

  const [first] = parsed.data.members;
  return first ? first.bioGuideId.toUpperCase() : null;
}

/**
 * Pairs Bioguide members with directory entries by Bioguide ID.
 *
 * Every Bioguide member appears first, in roster order, with its entry or
 * null. Entries left over, whether keyless or matching nobody, follow as
 * directory-only members. Neither input is modified.
 */
export function crossReferenceDirectory(
  congress: CongressRecord | readonly MemberRecord[],
  entries: readonly DirectoryEntry[]
): CongressMember[] {
  const members = 'members' in congress ? congress.members : congress;

  const byId = new Map<string, DirectoryEntry>();
  const unkeyed: DirectoryEntry[] = [];
  for (const entry of entries) {
    const id = directoryBioguideId(entry);
    if (id === null) {
      unkeyed.push(entry);
    } else if (byId.has(id)) {
      // Only the first entry per ID is paired; repeats are kept as directory-only
      unkeyed.push(entry);
    } else {
      byId.set(id, entry);
    }
  }

  const matched = new Set<string>();
  const result: CongressMember[] = members.map((member) => {
    const directory = byId.get(member.bioguideId) ?? null;
    if (directory) matched.add(member.bioguideId);
    return { bioguideId: member.bioguideId, bioguide: member, directory };
  });

  for (const [id, entry] of byId) {
    if (!matched.has(id)) {
      result.push({ bioguideId: id, bioguide: null, directory: entry });
    }
  }
  for (const entry of unkeyed) {
    result.push({ bioguideId: directoryBioguideId(entry), bioguide: null, directory: entry });
  }

  return result;
}
