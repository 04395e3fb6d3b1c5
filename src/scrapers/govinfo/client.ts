import type { z } from 'zod';
import { getCurrentCongress } from '../../congress/calendar';
import { SCRAPING_CONFIG } from '../../constants';
import { directoryBioguideId } from '../../cross-reference';
import { HttpStatusError, InvalidResponseError } from '../../errors';
import { getOnce, type HttpClient, type QueryParams, withRetries } from '../../http';
import type { DirectoryEntry, MemberRecord, TermRecord } from '../../types';
import { runWorkerPool } from '../../worker-pool';
import { GOVINFO_CONFIG } from './constants';
import {
  collectionPageSchema,
  type DirectoryOptions,
  type GovInfoConfig,
  type GovInfoGranule,
  type GovInfoPackage,
  type GranuleSummary,
  granuleSummarySchema,
  granulesPageSchema,
} from './types';

const MEMBER_SUB_GRANULE_CLASSES: readonly string[] = GOVINFO_CONFIG.MEMBER_SUB_GRANULE_CLASSES;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function latestPackage(packages: readonly GovInfoPackage[]): GovInfoPackage | null {
  return packages.reduce<GovInfoPackage | null>(
    (best, pkg) => (best === null || pkg.dateIssued > best.dateIssued ? pkg : best),
    null
  );
}

/**
 * The term whose directory should list the member: the latest one that ended
 * before the member died, outside the current Congress. Death years that are
 * not plain numbers ("1885c", "Unknown") are ignored.
 */
export function directoryTerm(member: MemberRecord, currentCongress: number): TermRecord | null {
  const deathYear = member.deathYear?.trim() ?? '';
  const died = /^\d+$/.test(deathYear) ? Number(deathYear) : null;

  let last: TermRecord | null = null;
  for (const term of member.terms) {
    if (died !== null && term.endYear >= died) continue;
    // The current Congress has no directory yet
    if (term.congressNumber === currentCongress) continue;
    if (last === null || term.congressNumber > last.congressNumber) {
      last = term;
    }
  }
  return last;
}

// yyyy-MM-ddThh:mm:ssZ
export function formatApiDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Reads the congressional directory (CDIR) collection. The API key and base
 * URL are fixed at construction and sent with every request.
 */
export class GovInfoDirectoryClient {
  private readonly config: GovInfoConfig;

  constructor(
    config: GovInfoConfig,
    private readonly http: HttpClient,
    private readonly options: { maxAttempts?: number; now?: () => Date } = {}
  ) {
    this.config = Object.freeze({ ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') });
  }

  /**
   * GET a path and validate the JSON body. Errors name the path, never the
   * query string, so the API key stays out of logs.
   */
  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    params: QueryParams,
    schema: S
  ): Promise<z.infer<S>> {
    const url = `${this.config.baseUrl}${path}`;
    const response = await withRetries(
      url,
      () => getOnce(this.http, url, { api_key: this.config.apiKey, ...params }),
      { maxAttempts: this.options.maxAttempts ?? SCRAPING_CONFIG.MAX_REQUEST_ATTEMPTS }
    );
    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(url, response.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch (error) {
      throw new InvalidResponseError(url, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidResponseError(url, { cause: parsed.error });
    }
    return parsed.data;
  }

  /**
   * Walks offset pagination until `count` items have been requested or the
   * API's offset ceiling is reached.
   */
  private async paginate<T>(
    fetchPage: (offset: number, pageSize: number) => Promise<{ count: number; items: T[] }>
  ): Promise<T[]> {
    const pageSize = GOVINFO_CONFIG.PAGE_SIZE;
    const items: T[] = [];
    let pages = 1;

    for (let offset = 0; offset < pages * pageSize; offset += pageSize) {
      if (offset >= GOVINFO_CONFIG.MAX_OFFSET) {
        console.warn(`  Stopped paging at offset ${offset}`);
        break;
      }
      const page = await fetchPage(offset, pageSize);
      items.push(...page.items);
      pages = Math.max(pages, Math.ceil(page.count / pageSize));
    }
    return items;
  }

  async packagesByCongress(congress: number): Promise<GovInfoPackage[]> {
    const now = this.options.now?.() ?? new Date();
    const path = `/collections/${GOVINFO_CONFIG.COLLECTION}/${GOVINFO_CONFIG.MODIFIED_SINCE}/${formatApiDate(now)}`;

    return this.paginate(async (offset, pageSize) => {
      const page = await this.getJson(path, { offset, pageSize, congress }, collectionPageSchema);
      return { count: page.count, items: page.packages };
    });
  }

  async hasDirectory(congress: number): Promise<boolean> {
    return (await this.packagesByCongress(congress)).length > 0;
  }

  async granules(packageId: string): Promise<GovInfoGranule[]> {
    const path = `/packages/${encodeURIComponent(packageId)}/granules`;

    return this.paginate(async (offset, pageSize) => {
      const page = await this.getJson(path, { offset, pageSize }, granulesPageSchema);
      return { count: page.count, items: page.granules };
    });
  }

  async granuleSummary(packageId: string, granuleId: string): Promise<GranuleSummary> {
    const path = `/packages/${encodeURIComponent(packageId)}/granules/${encodeURIComponent(granuleId)}/summary`;
    return this.getJson(path, {}, granuleSummarySchema);
  }

  /**
   * Member entries from the most recently issued directory for a Congress.
   * A Congress without a directory yields an empty list.
   */
  async congressionalDirectory(
    congress: number,
    options: DirectoryOptions = {}
  ): Promise<DirectoryEntry[]> {
    const latest = latestPackage(await this.packagesByCongress(congress));
    if (!latest) {
      console.warn(`No congressional directory found for Congress ${congress}`);
      return [];
    }

    console.log(`Reading congressional directory ${latest.packageId}...`);
    const memberGranules = (await this.granules(latest.packageId)).filter(
      (granule) => granule.granuleClass === GOVINFO_CONFIG.MEMBER_GRANULE_CLASS
    );
    console.log(`Found ${memberGranules.length} member granules`);

    const { results, failures } = await runWorkerPool(
      memberGranules,
      async (granule) => this.granuleSummary(latest.packageId, granule.granuleId),
      {
        concurrency: options.maxConcurrentRequests ?? SCRAPING_CONFIG.MAX_CONCURRENT_REQUESTS,
        onError: options.onGranuleError ?? 'abort',
        ...(options.signal && { signal: options.signal }),
      }
    );
    for (const failure of failures) {
      console.warn(`  Skipped granule ${failure.item.granuleId}:`, failure.error);
    }

    return results.filter(
      (summary) =>
        summary.subGranuleClass !== undefined &&
        MEMBER_SUB_GRANULE_CLASSES.includes(summary.subGranuleClass)
    );
  }

  /**
   * The directory entry for one member, from the directory of their last
   * completed term. Granules are narrowed by state and chamber before any
   * summary is read. Resolves to null when no directory lists the member.
   */
  async memberDirectory(member: MemberRecord): Promise<DirectoryEntry | null> {
    const now = this.options.now?.() ?? new Date();
    const term = directoryTerm(member, getCurrentCongress(now));
    if (!term) return null;

    const latest = latestPackage(await this.packagesByCongress(term.congressNumber));
    if (!latest) return null;

    const chamber = term.position === 'senator' ? 'S' : 'H';
    const granuleId = new RegExp(
      `^${escapeRegExp(latest.packageId)}-${escapeRegExp(term.state)}-${chamber}(-\\d+)?$`
    );

    for (const granule of await this.granules(latest.packageId)) {
      if (granule.granuleClass !== GOVINFO_CONFIG.MEMBER_GRANULE_CLASS) continue;
      if (!granuleId.test(granule.granuleId)) continue;

      const summary = await this.granuleSummary(latest.packageId, granule.granuleId);
      if (directoryBioguideId(summary) === member.bioguideId) {
        return summary;
      }
    }
    return null;
  }
}

export function createGovInfoConfig(apiKey: string, baseUrl: string = GOVINFO_CONFIG.URLS.BASE_URL): GovInfoConfig {
  return Object.freeze({ apiKey, baseUrl });
}
