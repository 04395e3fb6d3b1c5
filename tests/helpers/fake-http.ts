import { ConnectionError } from '../../src/errors';
import type { HttpClient, HttpResponse, HttpSession, QueryParams } from '../../src/http';

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  params?: QueryParams;
  form?: QueryParams;
  session: number;
}

// A body, a status with a body, or a connection failure
export type FakeReply = string | { status: number; body?: string } | ConnectionError;

export type Route = (request: RecordedRequest, client: FakeHttpClient) => FakeReply;

class FakeSession implements HttpSession {
  constructor(
    private readonly client: FakeHttpClient,
    readonly id: number
  ) {}

  async get(url: string, params?: QueryParams): Promise<HttpResponse> {
    return this.client.handle({ method: 'GET', url, ...(params && { params }), session: this.id });
  }

  async post(url: string, form: QueryParams): Promise<HttpResponse> {
    return this.client.handle({ method: 'POST', url, form, session: this.id });
  }

  async dispose(): Promise<void> {
    this.client.disposed.push(this.id);
  }
}

/**
 * In-process stand-in for the Playwright-backed client. Every request is
 * recorded with the session it was sent on.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  readonly disposed: number[] = [];
  private sessions = 0;

  constructor(private readonly route: Route) {}

  get sessionsOpened(): number {
    return this.sessions;
  }

  async newSession(): Promise<HttpSession> {
    this.sessions += 1;
    return new FakeSession(this, this.sessions);
  }

  handle(request: RecordedRequest): HttpResponse {
    this.requests.push(request);
    const reply = this.route(request, this);
    if (reply instanceof ConnectionError) {
      throw reply;
    }
    if (typeof reply === 'string') {
      return { url: request.url, status: 200, body: reply };
    }
    return { url: request.url, status: reply.status, body: reply.body ?? '' };
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url === url);
  }
}

export function connectionFailure(url: string): ConnectionError {
  return new ConnectionError(url, 1, { cause: new Error('socket hang up') });
}
