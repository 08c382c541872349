/**
 * In-process stand-in for the global fetch.
 *
 * Tests enqueue responses and inspect the requests the client sent.
 *
 * @example
 * ```typescript
 * const mockFetch = new MockFetch();
 * vi.stubGlobal('fetch', mockFetch.fetch);
 * mockFetch.enqueueJsonResponse(200, [{ id: '2-1', summary: 'First' }]);
 *
 * await youtrack.issues.search('#Unresolved');
 *
 * expect(mockFetch.getLastRequest()?.url).toContain('/api/issues');
 * ```
 */

export interface MockResponse {
  status: number;
  body: string | null;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: RequestInit['body'];
}

type QueuedResponse = { kind: 'response'; response: MockResponse } | { kind: 'failure'; error: Error };

export class MockFetch {
  private queue: QueuedResponse[] = [];
  private requests: RecordedRequest[] = [];

  /**
   * Drop-in replacement for the global fetch.
   */
  readonly fetch = async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;

    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    this.requests.push({
      url,
      method: init.method ?? 'GET',
      headers,
      body: init.body,
    });

    const next = this.queue.shift();
    if (!next) {
      throw new Error(`No response configured in MockFetch for ${init.method ?? 'GET'} ${url}`);
    }
    if (next.kind === 'failure') {
      throw next.error;
    }

    return new Response(next.response.body, {
      status: next.response.status,
      headers: next.response.headers,
    });
  };

  enqueueResponse(response: MockResponse): this {
    this.queue.push({ kind: 'response', response });
    return this;
  }

  enqueueJsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): this {
    return this.enqueueResponse({
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json', ...headers },
    });
  }

  /**
   * YouTrack-style error body.
   */
  enqueueErrorResponse(
    status: number,
    description: string,
    headers: Record<string, string> = {}
  ): this {
    return this.enqueueJsonResponse(
      status,
      { error: 'error', error_description: description },
      headers
    );
  }

  /**
   * Success with no body, as YouTrack sends for many PUTs.
   */
  enqueueEmptyResponse(status: number = 200): this {
    return this.enqueueResponse({ status, body: null });
  }

  /**
   * Makes the next call reject, as fetch does on connection failures.
   */
  enqueueNetworkFailure(error: Error = new TypeError('fetch failed')): this {
    this.queue.push({ kind: 'failure', error });
    return this;
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Parsed JSON body of a recorded request.
   */
  getJsonBody(index: number = this.requests.length - 1): unknown {
    const body = this.requests[index]?.body;
    if (typeof body !== 'string') {
      throw new Error(`Request ${index} has no JSON body`);
    }
    return JSON.parse(body);
  }

  /**
   * Number of responses not yet consumed.
   */
  pendingResponses(): number {
    return this.queue.length;
  }

  reset(): void {
    this.queue = [];
    this.requests = [];
  }
}
