import type { WorkerPoolFailure } from '../../../worker-pool';

export interface SearchCriteria {
  lastName?: string;
  firstName?: string;
  position?: string;
  state?: string;
  party?: string;
  // A Congress number or a year, sent as YearOrCongress
  congress?: number;
}

export type SearchState = 'need-token' | 'has-token' | 'submitted' | 'paginating' | 'done';

export interface SearchPage {
  pageNumber: number;
  finalPageNumber: number;
  html: string;
}

export interface ParsedName {
  firstName: string;
  nickname: string | null;
  suffix: string | null;
}

export interface ScrapeMembersOptions {
  maxConcurrentRequests?: number;
  signal?: AbortSignal;
  // 'abort' fails the whole roster on the first member that cannot be fetched
  onMemberError?: 'abort' | 'skip';
}

export interface ScrapeCongressOptions extends ScrapeMembersOptions {
  // Crawl the search pages even when the roster index has this Congress
  scrape?: boolean;
}

export interface RosterResult<T> {
  members: T[];
  failures: WorkerPoolFailure<string>[];
}
