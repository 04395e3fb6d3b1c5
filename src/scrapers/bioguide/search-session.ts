import * as cheerio from 'cheerio';
import { SCRAPING_CONFIG } from '../../constants';
import { TokenFetchError } from '../../errors';
import {
  assertOk,
  type HttpClient,
  type HttpSession,
  type QueryParams,
  type RetryOptions,
  withRetries,
} from '../../http';
import { BIOGUIDE_CONFIG } from './constants';
import { validateSearchCriteria } from './options';
import { extractFinalPageNumber } from './roster';
import type { SearchCriteria, SearchPage, SearchState } from './types';

export function extractVerificationToken(html: string): string | null {
  const $ = cheerio.load(html);
  const value = $(BIOGUIDE_CONFIG.SELECTORS.VERIFICATION_TOKEN).first().attr('value')?.trim();
  return value ? value : null;
}

export function searchForm(criteria: SearchCriteria, token: string): QueryParams {
  const form: QueryParams = {};
  if (criteria.lastName) form.LastName = criteria.lastName;
  if (criteria.firstName) form.FirstName = criteria.firstName;
  if (criteria.position) form.Position = criteria.position;
  if (criteria.state) form.State = criteria.state.toUpperCase();
  if (criteria.party) form.Party = criteria.party;
  if (criteria.congress !== undefined) form.YearOrCongress = criteria.congress;
  form.submitButton = 'submit';
  form.__RequestVerificationToken = token;
  return form;
}

export interface SearchSessionOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * One search against the Bioguide form.
 *
 * The form is protected by an anti-forgery token tied to a cookie, so a
 * search fetches the token, posts the query and then walks the result pages
 * inside a single cookie scope. When a request fails to connect the scope
 * is thrown away and the search is replayed with a fresh token before the
 * request is tried again.
 */
export class SearchSession implements AsyncIterable<SearchPage> {
  private currentState: SearchState = 'need-token';
  private session: HttpSession | null = null;
  private token: string | null = null;
  private finalPage: number | null = null;
  private readonly maxAttempts: number;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly client: HttpClient,
    readonly criteria: SearchCriteria,
    options: SearchSessionOptions = {}
  ) {
    validateSearchCriteria(criteria);
    this.maxAttempts = options.maxAttempts ?? SCRAPING_CONFIG.MAX_REQUEST_ATTEMPTS;
    this.signal = options.signal;
  }

  private retryOptions(): RetryOptions {
    return {
      maxAttempts: this.maxAttempts,
      beforeRetry: () => this.reset(),
      ...(this.signal && { signal: this.signal }),
    };
  }

  get state(): SearchState {
    return this.currentState;
  }

  // Known once the first page has been received
  get finalPageNumber(): number | null {
    return this.finalPage;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<SearchPage, void, undefined> {
    try {
      const first = await withRetries(
        BIOGUIDE_CONFIG.URLS.SEARCH_RESULTS,
        () => this.start(),
        this.retryOptions()
      );
      yield first;

      for (let pageNumber = 2; pageNumber <= first.finalPageNumber; pageNumber++) {
        yield await withRetries(
          `${BIOGUIDE_CONFIG.URLS.SEARCH_RESULTS}?page=${pageNumber}`,
          async (attempt) => {
            if (attempt > 1) {
              await this.start();
            }
            return this.fetchPage(pageNumber);
          },
          this.retryOptions()
        );
      }
    } finally {
      await this.close();
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.token = null;
    this.currentState = 'done';
    await session?.dispose();
  }

  // Fetch a token and submit the query in a fresh cookie scope
  private async start(): Promise<SearchPage> {
    await this.fetchToken();
    return this.submit();
  }

  private async reset(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.token = null;
    this.currentState = 'need-token';
    await session?.dispose();
  }

  private async fetchToken(): Promise<void> {
    if (this.session) {
      await this.reset();
    }
    this.session = await this.client.newSession();

    const url = BIOGUIDE_CONFIG.URLS.ROOT;
    const response = assertOk(await this.session.get(url));
    const token = extractVerificationToken(response.body);
    if (!token) {
      throw new TokenFetchError(url);
    }

    this.token = token;
    this.currentState = 'has-token';
  }

  private async submit(): Promise<SearchPage> {
    const { session, token } = this;
    if (!session || !token || this.currentState !== 'has-token') {
      throw new Error(`Cannot submit a search in state ${this.currentState}`);
    }

    const response = assertOk(
      await session.post(BIOGUIDE_CONFIG.URLS.SEARCH_RESULTS, searchForm(this.criteria, token))
    );
    this.finalPage = extractFinalPageNumber(response.body);
    this.currentState = 'submitted';
    return { pageNumber: 1, finalPageNumber: this.finalPage, html: response.body };
  }

  private async fetchPage(pageNumber: number): Promise<SearchPage> {
    const { session } = this;
    if (!session || (this.currentState !== 'submitted' && this.currentState !== 'paginating')) {
      throw new Error(`Cannot fetch page ${pageNumber} in state ${this.currentState}`);
    }

    const response = assertOk(
      await session.get(BIOGUIDE_CONFIG.URLS.SEARCH_RESULTS, { page: pageNumber })
    );
    this.currentState = 'paginating';
    return { pageNumber, finalPageNumber: this.finalPage ?? pageNumber, html: response.body };
  }
}
