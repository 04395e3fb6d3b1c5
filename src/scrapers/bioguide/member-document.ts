import * as cheerio from 'cheerio';
import { XMLValidator } from 'fast-xml-parser';
import { SCRAPING_CONFIG } from '../../constants';
import { XmlParseError } from '../../errors';
import { assertOk, getOnce, type HttpClient, withRetries } from '../../http';
import { createMemberRecord, createTermRecord, type RawMember } from '../../records';
import type { MemberRecord, TermRecord } from '../../types';
import { BIOGUIDE_CONFIG } from './constants';
import { fixLastNameCasing, parseFirstNames } from './names';
import { mergeTerms } from './terms';

// Anything outside this allow-list is dropped before the second parse attempt
const DISALLOWED_XML_CHARACTERS = /[^a-zA-Z0-9\s~`!@#$%^&*()_+=:{}[;<,>.?/\\\-\]"']/g;

export function sanitizeXml(text: string): string {
  return text.replace(DISALLOWED_XML_CHARACTERS, '');
}

export function memberDocumentUrl(bioguideId: string): string {
  const id = bioguideId.trim().toUpperCase();
  return `${BIOGUIDE_CONFIG.URLS.MEMBER_XML}/${id.charAt(0)}/${id}.xml`;
}

function validXml(text: string, url: string): string {
  if (XMLValidator.validate(text) === true) {
    return text;
  }

  const sanitized = sanitizeXml(text);
  const result = XMLValidator.validate(sanitized);
  if (result !== true) {
    throw new XmlParseError(url, `${result.err.msg} (line ${result.err.line})`);
  }
  return sanitized;
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseParty(value: string): string | null {
  const party = value.trim();
  return party === '' || party.toUpperCase() === 'NA' ? null : party;
}

/**
 * Reads the fields of one member document without validating them. Terms are
 * merged to one per Congress; terms without a readable Congress number are
 * skipped.
 */
export function readMemberDocument(text: string, url = 'member document'): RawMember {
  const $ = cheerio.load(validXml(text, url), { xml: true });
  const root = $.root().children().first();
  const personalInfo = root.children('personal-info').first();
  const name = personalInfo.children('name').first();

  const terms: TermRecord[] = [];
  personalInfo.children('term').each((_, element) => {
    const term = $(element);
    const congressNumber = Number.parseInt(term.children('congress-number').text().trim(), 10);
    if (Number.isNaN(congressNumber)) return;

    terms.push(
      createTermRecord({
        congressNumber,
        position: term.children('term-position').text(),
        state: term.children('term-state').text(),
        party: parseParty(term.children('term-party').text()),
      })
    );
  });

  const { firstName, nickname, suffix } = parseFirstNames(name.children('firstnames').text());
  const biography = root.children('biography').first();

  return {
    bioguideId: root.attr('id') ?? '',
    firstName,
    lastName: fixLastNameCasing(name.children('lastname').text()),
    nickname,
    suffix,
    birthYear: optionalText(personalInfo.children('birth-year').text()),
    deathYear: optionalText(personalInfo.children('death-year').text()),
    biography:
      biography.length > 0
        ? optionalText(biography.text().replace(/\s*\r?\n\s*/g, ' '))
        : null,
    terms: mergeTerms(terms),
  };
}

export function parseMemberDocument(text: string, url = 'member document'): MemberRecord {
  return createMemberRecord(readMemberDocument(text, url));
}

export interface MemberDocumentFetcherOptions {
  maxAttempts?: number;
  // Retry n waits 2 * n units
  backoffUnitMs?: number;
}

/**
 * Downloads and parses member documents. Connection failures are retried
 * with a growing delay; HTTP errors and unparseable documents are not.
 */
export class MemberDocumentFetcher {
  private readonly maxAttempts: number;
  private readonly backoffUnitMs: number;

  constructor(
    private readonly client: HttpClient,
    options: MemberDocumentFetcherOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? SCRAPING_CONFIG.MAX_REQUEST_ATTEMPTS;
    this.backoffUnitMs = options.backoffUnitMs ?? BIOGUIDE_CONFIG.BACKOFF_UNIT_MS;
  }

  async fetchMember(bioguideId: string, signal?: AbortSignal): Promise<MemberRecord> {
    return createMemberRecord(await this.fetchRaw(bioguideId, signal));
  }

  /**
   * Like fetchMember, but resolves to null for members whose only terms are
   * executive ones. Rosters list vice presidents who never sat in Congress.
   */
  async fetchRosterMember(bioguideId: string, signal?: AbortSignal): Promise<MemberRecord | null> {
    const raw = await this.fetchRaw(bioguideId, signal);
    return raw.terms.length === 0 ? null : createMemberRecord(raw);
  }

  private async fetchRaw(bioguideId: string, signal?: AbortSignal): Promise<RawMember> {
    const url = memberDocumentUrl(bioguideId);
    const text = await withRetries(url, () => this.download(url), {
      maxAttempts: this.maxAttempts,
      backoffMs: (attempt) => 2 * attempt * this.backoffUnitMs,
      ...(signal && { signal }),
    });
    return readMemberDocument(text, url);
  }

  private async download(url: string): Promise<string> {
    return assertOk(await getOnce(this.client, url)).body;
  }
}
