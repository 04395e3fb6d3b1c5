import {
  allCongressTerms,
  FIRST_VALID_YEAR,
  getCurrentCongress,
  normalizeCongress,
} from '../../congress/calendar';
import { SCRAPING_CONFIG } from '../../constants';
import { InvalidRangeError } from '../../errors';
import { type HttpClient, PlaywrightHttpClient, throwIfAborted } from '../../http';
import { createCongressRecord } from '../../records';
import type { CongressRecord, MemberRecord } from '../../types';
import { runWorkerPool } from '../../worker-pool';
import { BIOGUIDE_CONFIG } from './constants';
import { MemberDocumentFetcher } from './member-document';
import { validateSearchCriteria } from './options';
import { extractBioguideIds } from './roster';
import { RosterIndex } from './roster-index';
import { SearchSession } from './search-session';
import type {
  RosterResult,
  ScrapeCongressOptions,
  ScrapeMembersOptions,
  SearchCriteria,
} from './types';

export interface BioguideScraperOptions {
  // Roster snapshot consulted before crawling; loaded from BIOGUIDE_INDEX_PATH when omitted
  index?: RosterIndex | null;
  maxAttempts?: number;
  backoffUnitMs?: number;
}

export class BioguideScraper {
  private client: HttpClient | null = null;
  private index: RosterIndex | null;
  private indexLoaded: boolean;

  constructor(private readonly options: BioguideScraperOptions = {}) {
    this.index = options.index ?? null;
    this.indexLoaded = options.index !== undefined;
  }

  async initialize(): Promise<void> {
    if (!this.indexLoaded) {
      this.indexLoaded = true;
      if (BIOGUIDE_CONFIG.INDEX_PATH) {
        this.index = await RosterIndex.fromFile(BIOGUIDE_CONFIG.INDEX_PATH);
        console.log(`Loaded roster index from ${BIOGUIDE_CONFIG.INDEX_PATH}`);
      }
    }
    if (this.client) return; // already injected
    this.client = new PlaywrightHttpClient();
  }

  async close(): Promise<void> {
    this.client = null;
  }

  // Share an external HTTP client (owned by caller)
  public useHttpClient(client: HttpClient): void {
    this.client = client;
  }

  private requireClient(): HttpClient {
    if (!this.client) {
      throw new Error('HTTP client not initialized. Call initialize() or useHttpClient() first.');
    }
    return this.client;
  }

  private fetcher(): MemberDocumentFetcher {
    return new MemberDocumentFetcher(this.requireClient(), {
      ...(this.options.maxAttempts !== undefined && { maxAttempts: this.options.maxAttempts }),
      ...(this.options.backoffUnitMs !== undefined && {
        backoffUnitMs: this.options.backoffUnitMs,
      }),
    });
  }

  /**
   * Bioguide IDs matching one search, across every result page, in the
   * order they were first seen.
   */
  async searchBioguideIds(criteria: SearchCriteria, signal?: AbortSignal): Promise<string[]> {
    validateSearchCriteria(criteria);
    throwIfAborted(signal);

    const session = new SearchSession(this.requireClient(), criteria, {
      ...(this.options.maxAttempts !== undefined && { maxAttempts: this.options.maxAttempts }),
      ...(signal && { signal }),
    });
    const ids = new Set<string>();

    for await (const page of session) {
      throwIfAborted(signal);
      for (const id of extractBioguideIds(page.html)) {
        ids.add(id);
      }
      console.log(`  Page ${page.pageNumber}/${page.finalPageNumber}: ${ids.size} members so far`);
    }

    return [...ids];
  }

  /**
   * Crawls the search pages for one Congress. Congress 0 is searched once
   * per Continental Congress position so that later presidents are left out.
   */
  async crawlRoster(congress: number, signal?: AbortSignal): Promise<string[]> {
    const searches: SearchCriteria[] =
      congress === 0
        ? BIOGUIDE_CONFIG.CONTINENTAL_CONGRESS_POSITIONS.map((position) => ({
            congress,
            position,
          }))
        : [{ congress }];

    const ids = new Set<string>();
    for (const criteria of searches) {
      for (const id of await this.searchBioguideIds(criteria, signal)) {
        ids.add(id);
      }
    }
    return [...ids];
  }

  /**
   * Fetches every member document through the worker pool. Members come
   * back in the order of `bioguideIds`; members with no legislative terms
   * are left out.
   */
  async fetchMembers(
    bioguideIds: readonly string[],
    options: ScrapeMembersOptions = {}
  ): Promise<RosterResult<MemberRecord>> {
    const fetcher = this.fetcher();
    const { results, failures } = await runWorkerPool(
      bioguideIds,
      async (id, signal) => {
        const member = await fetcher.fetchRosterMember(id, signal);
        if (!member) {
          console.log(`  Left out ${id}: no legislative terms`);
        }
        return member;
      },
      {
        concurrency: options.maxConcurrentRequests ?? SCRAPING_CONFIG.MAX_CONCURRENT_REQUESTS,
        onError: options.onMemberError ?? 'abort',
        ...(options.signal && { signal: options.signal }),
      }
    );

    for (const failure of failures) {
      console.warn(`  Skipped member ${failure.item}:`, failure.error);
    }

    const position = new Map(bioguideIds.map((id, i) => [id.toUpperCase(), i]));
    const members = results
      .filter((member): member is MemberRecord => member !== null)
      .sort(
        (a, b) =>
          (position.get(a.bioguideId) ?? Number.MAX_SAFE_INTEGER) -
          (position.get(b.bioguideId) ?? Number.MAX_SAFE_INTEGER)
      );
    return { members, failures };
  }

  async scrapeMember(bioguideId: string): Promise<MemberRecord> {
    return this.fetcher().fetchMember(bioguideId);
  }

  async searchMembers(
    criteria: SearchCriteria,
    options: ScrapeMembersOptions = {}
  ): Promise<MemberRecord[]> {
    const ids = await this.searchBioguideIds(criteria, options.signal);
    console.log(`Found ${ids.length} members matching search`);
    return (await this.fetchMembers(ids, options)).members;
  }

  /**
   * Members of one Congress, given by number or by year. Defaults to the
   * current Congress.
   */
  async scrapeCongress(
    numberOrYear?: number | null,
    options: ScrapeCongressOptions = {}
  ): Promise<CongressRecord> {
    const congress = normalizeCongress(numberOrYear);
    console.log(`Scraping members of Congress ${congress}...`);

    let ids = options.scrape ? null : (this.index?.lookup(congress) ?? null);
    if (ids) {
      console.log(`Using ${ids.length} IDs from the roster index`);
    } else {
      ids = await this.crawlRoster(congress, options.signal);
      console.log(`Found ${ids.length} members in search results`);
    }

    const { members } = await this.fetchMembers(ids, options);
    return createCongressRecord(congress, members);
  }

  /**
   * Congresses from `start` to `end`, read either as Congress numbers or as
   * years. Year ranges cover every Congress that starts within them.
   */
  async scrapeCongressRange(
    start: number,
    end?: number,
    options: ScrapeCongressOptions = {}
  ): Promise<CongressRecord[]> {
    if (end !== undefined && start < FIRST_VALID_YEAR && end > FIRST_VALID_YEAR) {
      throw new InvalidRangeError(start, end);
    }

    const numbers: number[] = [];
    if (start >= FIRST_VALID_YEAR) {
      const lastYear = end ?? new Date().getFullYear();
      for (const term of allCongressTerms()) {
        if (term.startYear >= start && term.startYear <= lastYear) {
          numbers.push(term.number);
        }
      }
    } else {
      const last = Math.min(end ?? getCurrentCongress(), getCurrentCongress());
      for (let number = Math.max(0, start); number <= last; number++) {
        numbers.push(number);
      }
    }

    const congresses: CongressRecord[] = [];
    for (const number of numbers) {
      throwIfAborted(options.signal);
      congresses.push(await this.scrapeCongress(number, options));
    }
    return congresses;
  }
}
