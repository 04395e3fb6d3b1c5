import { type APIRequestContext, request } from 'playwright';
import { SCRAPING_CONFIG } from './constants';
import { AbortError, ConnectionError, HttpStatusError } from './errors';

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
}

/**
 * A cookie scope. Cookies set by one response are sent with every later
 * request on the same session and never leak into another session.
 */
export interface HttpSession {
  get(url: string, params?: QueryParams): Promise<HttpResponse>;
  post(url: string, form: QueryParams): Promise<HttpResponse>;
  dispose(): Promise<void>;
}

export interface HttpClient {
  newSession(): Promise<HttpSession>;
}

export function assertOk(response: HttpResponse): HttpResponse {
  if (response.status < 200 || response.status >= 300) {
    throw new HttpStatusError(response.url, response.status);
  }
  return response;
}

/**
 * A single GET in a throwaway session, for resources that need no cookies.
 */
export async function getOnce(
  client: HttpClient,
  url: string,
  params?: QueryParams
): Promise<HttpResponse> {
  const session = await client.newSession();
  try {
    return await session.get(url, params);
  } finally {
    await session.dispose();
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError({ cause: signal.reason });
  }
}

/**
 * Waits `ms`, rejecting with AbortError as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError({ cause: signal.reason }));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError({ cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

class PlaywrightHttpSession implements HttpSession {
  constructor(private readonly context: APIRequestContext) {}

  async get(url: string, params?: QueryParams): Promise<HttpResponse> {
    try {
      const response = await this.context.get(url, params ? { params } : {});
      return { url: response.url(), status: response.status(), body: await response.text() };
    } catch (error) {
      throw new ConnectionError(url, 1, { cause: error });
    }
  }

  async post(url: string, form: QueryParams): Promise<HttpResponse> {
    try {
      const response = await this.context.post(url, { form });
      return { url: response.url(), status: response.status(), body: await response.text() };
    } catch (error) {
      throw new ConnectionError(url, 1, { cause: error });
    }
  }

  async dispose(): Promise<void> {
    await this.context.dispose();
  }
}

/**
 * HTTP client backed by Playwright's APIRequestContext. No browser is
 * launched; each session is an independent request context with its own
 * cookie storage.
 */
export class PlaywrightHttpClient implements HttpClient {
  constructor(
    private readonly options: { userAgent?: string; timeout?: number } = {}
  ) {}

  async newSession(): Promise<HttpSession> {
    const context = await request.newContext({
      userAgent: this.options.userAgent ?? SCRAPING_CONFIG.USER_AGENT,
      timeout: this.options.timeout ?? SCRAPING_CONFIG.TIMEOUTS.REQUEST,
    });
    return new PlaywrightHttpSession(context);
  }
}

export interface RetryOptions {
  maxAttempts: number;
  // Delay before retry number `attempt` (1-based)
  backoffMs?: (attempt: number) => number;
  // Runs before each retry, e.g. to rebuild session state
  beforeRetry?: (attempt: number, error: ConnectionError) => Promise<void>;
  // Stops further attempts and cuts the backoff short
  signal?: AbortSignal;
}

/**
 * Retries `operation` on ConnectionError only. Once `maxAttempts` is reached
 * the last failure is rethrown as a terminal ConnectionError. An aborted
 * `signal` ends the loop with AbortError.
 */
export async function withRetries<T>(
  url: string,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof ConnectionError)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new ConnectionError(url, attempt, { cause: error });
      }

      const delay = options.backoffMs?.(attempt) ?? 0;
      console.warn(`  ${error.message}, retrying (${attempt}/${maxAttempts - 1})...`);
      if (delay > 0) {
        await sleep(delay, options.signal);
      }
      throwIfAborted(options.signal);
      await options.beforeRetry?.(attempt, error);
    }
  }
}
