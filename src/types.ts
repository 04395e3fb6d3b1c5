export interface TermRecord {
  readonly congressNumber: number;
  readonly startYear: number;
  readonly endYear: number;
  readonly position: string;
  readonly state: string;
  readonly party: string | null;
  readonly isPresidingOfficer: boolean;
}

export interface MemberRecord {
  readonly bioguideId: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly nickname: string | null;
  readonly suffix: string | null;
  // Kept verbatim: historical entries carry values like "1885c" or "Unknown"
  readonly birthYear: string | null;
  readonly deathYear: string | null;
  readonly biography: string | null;
  readonly terms: readonly TermRecord[];
}

export interface CongressRecord {
  readonly number: number;
  readonly startYear: number;
  readonly endYear: number;
  readonly members: readonly MemberRecord[];
}

/**
 * A granule summary from the GovInfo congressional directory. Only the
 * `members[0].bioGuideId` key is read; everything else passes through.
 */
export type DirectoryEntry = Readonly<Record<string, unknown>>;

export interface CongressMember {
  readonly bioguideId: string | null;
  readonly bioguide: MemberRecord | null;
  readonly directory: DirectoryEntry | null;
}

export interface ScrapeResult<T> {
  data: T;
  scrapedAt: string;
  source: 'bioguide' | 'govinfo';
}
