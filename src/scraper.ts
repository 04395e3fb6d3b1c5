import { normalizeCongress } from './congress/calendar';
import { crossReferenceDirectory } from './cross-reference';
import { type HttpClient, PlaywrightHttpClient } from './http';
import { mergeCongressMembers } from './records';
import { BioguideScraper, type BioguideScraperOptions } from './scrapers/bioguide';
import type { ScrapeCongressOptions, ScrapeMembersOptions, SearchCriteria } from './scrapers/bioguide/types';
import { type DirectoryOptions, type GovInfoConfig, GovInfoDirectoryClient } from './scrapers/govinfo';
import type {
  CongressMember,
  CongressRecord,
  DirectoryEntry,
  MemberRecord,
  ScrapeResult,
} from './types';

export interface CongressScraperOptions {
  bioguide?: BioguideScraperOptions;
  // GovInfo directory lookups are unavailable without a config
  govInfo?: GovInfoConfig | null;
}

function result<T>(data: T, source: ScrapeResult<T>['source']): ScrapeResult<T> {
  return { data, scrapedAt: new Date().toISOString(), source };
}

export class CongressScraper {
  private client: HttpClient | null = null;
  private readonly bioguideScraper: BioguideScraper;
  private readonly govInfo: GovInfoConfig | null;

  constructor(options: CongressScraperOptions = {}) {
    this.bioguideScraper = new BioguideScraper(options.bioguide);
    this.govInfo = options.govInfo ?? null;
  }

  async initialize(): Promise<void> {
    if (!this.client) {
      this.client = new PlaywrightHttpClient();
    }
    // Share the same client
    this.bioguideScraper.useHttpClient(this.client);
    await this.bioguideScraper.initialize();
  }

  async close(): Promise<void> {
    await this.bioguideScraper.close();
    this.client = null;
  }

  // Share external HTTP client (owned by caller)
  public useHttpClient(client: HttpClient): void {
    this.client = client;
    this.bioguideScraper.useHttpClient(client);
  }

  private directoryClient(): GovInfoDirectoryClient {
    if (!this.client) {
      throw new Error('HTTP client not initialized. Call initialize() first.');
    }
    if (!this.govInfo) {
      throw new Error('GovInfo is not configured. Set GOVINFO_API_KEY to read the directory.');
    }
    return new GovInfoDirectoryClient(this.govInfo, this.client);
  }

  async scrapeCongress(
    numberOrYear?: number | null,
    options: ScrapeCongressOptions = {}
  ): Promise<ScrapeResult<CongressRecord>> {
    return result(await this.bioguideScraper.scrapeCongress(numberOrYear, options), 'bioguide');
  }

  async scrapeCongressRange(
    start: number,
    end?: number,
    options: ScrapeCongressOptions = {}
  ): Promise<ScrapeResult<CongressRecord[]>> {
    return result(await this.bioguideScraper.scrapeCongressRange(start, end, options), 'bioguide');
  }

  async scrapeMember(bioguideId: string): Promise<ScrapeResult<MemberRecord>> {
    return result(await this.bioguideScraper.scrapeMember(bioguideId), 'bioguide');
  }

  async searchMembers(
    criteria: SearchCriteria,
    options: ScrapeMembersOptions = {}
  ): Promise<ScrapeResult<MemberRecord[]>> {
    return result(await this.bioguideScraper.searchMembers(criteria, options), 'bioguide');
  }

  /**
   * Members across several Congresses, each listed once.
   */
  mergeMembers(congresses: readonly CongressRecord[]): MemberRecord[] {
    return mergeCongressMembers(congresses);
  }

  async scrapeDirectory(
    numberOrYear?: number | null,
    options: DirectoryOptions = {}
  ): Promise<ScrapeResult<DirectoryEntry[]>> {
    const congress = normalizeCongress(numberOrYear);
    return result(await this.directoryClient().congressionalDirectory(congress, options), 'govinfo');
  }

  /**
   * One Bioguide member paired with their entry in the directory of their
   * last completed term, or with null when no directory lists them.
   */
  async scrapeMemberDirectory(bioguideId: string): Promise<ScrapeResult<CongressMember>> {
    const member = await this.bioguideScraper.scrapeMember(bioguideId);
    const directory = await this.directoryClient().memberDirectory(member);
    if (!directory) {
      console.warn(`No directory entry found for ${member.bioguideId}`);
    }
    return result({ bioguideId: member.bioguideId, bioguide: member, directory }, 'bioguide');
  }

  /**
   * Bioguide members of a Congress paired with their GovInfo directory entries.
   */
  async scrapeCrossReferenced(
    numberOrYear?: number | null,
    options: ScrapeCongressOptions = {}
  ): Promise<ScrapeResult<CongressMember[]>> {
    const congress = await this.bioguideScraper.scrapeCongress(numberOrYear, options);
    const entries = await this.directoryClient().congressionalDirectory(congress.number, {
      ...(options.signal && { signal: options.signal }),
      ...(options.maxConcurrentRequests !== undefined && {
        maxConcurrentRequests: options.maxConcurrentRequests,
      }),
    });
    console.log(`Matching ${congress.members.length} members with ${entries.length} directory entries`);
    return result(crossReferenceDirectory(congress, entries), 'bioguide');
  }
}
