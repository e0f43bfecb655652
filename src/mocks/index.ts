/**
 * Mocks for testing code that talks to WAPI.
 */

import { TransportError } from '../errors/index.js';
import type { HttpResponse, HttpTransport, WapiRequest } from '../transport/index.js';

/**
 * Mock request matcher. A string path matches by substring.
 */
export interface MockMatcher {
  method?: WapiRequest['method'];
  path?: string | RegExp;
}

/**
 * Canned response. `body` is serialized as JSON unless it is a string.
 */
export interface MockResponse {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  500: 'Internal Server Error',
};

/**
 * Wraps a result the way WAPI does under `_return_as_object=1`.
 */
export function envelope(result: unknown, nextPageId?: string): Record<string, unknown> {
  return nextPageId === undefined ? { result } : { result, next_page_id: nextPageId };
}

function toHttpResponse(response: MockResponse): HttpResponse {
  const status = response.status ?? 200;
  const body =
    typeof response.body === 'string' ? response.body : JSON.stringify(response.body ?? null);
  return {
    status,
    statusText: response.statusText ?? STATUS_TEXT[status] ?? '',
    headers: { 'content-type': 'application/json', ...response.headers },
    body,
  };
}

/**
 * Mock HTTP transport for testing.
 *
 * Matched mocks are consumed in the order they were added; an unmatched
 * request fails with a `TransportError`.
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: Array<{ matcher: MockMatcher; response: MockResponse | Error }> = [];
  private calls: WapiRequest[] = [];
  private closed = false;

  /**
   * Queue a response for the next request matching `matcher`.
   */
  mock(matcher: MockMatcher, response: MockResponse | Error): this {
    this.mocks.push({ matcher, response });
    return this;
  }

  /**
   * Queue a 2xx `{ result }` envelope.
   */
  mockResult(matcher: MockMatcher, result: unknown, nextPageId?: string): this {
    return this.mock(matcher, { body: envelope(result, nextPageId) });
  }

  getCalls(): WapiRequest[] {
    return this.calls;
  }

  /** Mocks not yet consumed. */
  pendingMocks(): number {
    return this.mocks.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  reset(): this {
    this.mocks = [];
    this.calls = [];
    return this;
  }

  async send(request: WapiRequest): Promise<HttpResponse> {
    this.calls.push(request);

    const index = this.mocks.findIndex(({ matcher }) => matches(matcher, request));
    if (index === -1) {
      throw new TransportError(`No mock for ${request.method} ${request.path}`);
    }
    const [entry] = this.mocks.splice(index, 1);
    if (entry === undefined) {
      throw new TransportError(`No mock for ${request.method} ${request.path}`);
    }
    if (entry.response instanceof Error) {
      throw entry.response;
    }
    return toHttpResponse(entry.response);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function matches(matcher: MockMatcher, request: WapiRequest): boolean {
  if (matcher.method && matcher.method !== request.method) {
    return false;
  }
  if (matcher.path !== undefined) {
    if (typeof matcher.path === 'string') {
      return request.path.includes(matcher.path);
    }
    return matcher.path.test(request.path);
  }
  return true;
}
