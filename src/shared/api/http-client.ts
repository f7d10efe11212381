/**
 * HTTP client utilities for making API requests
 */

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
}

export interface RequestOptions extends RequestInit {
  params?: Record<string, string | number | boolean | undefined>;
}

/** Default request timeout */
const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, path: string, params?: RequestOptions['params']): string {
  const url = baseUrl ? new URL(path, baseUrl) : new URL(path);

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Create an HTTP client with default options
 */
export function createHttpClient(options: HttpClientOptions = {}) {
  const {
    baseUrl = '',
    headers: defaultHeaders = {},
    timeout = DEFAULT_TIMEOUT_MS,
    fetch: fetchImpl = fetch,
  } = options;

  async function send(url: string, init: RequestInit): Promise<Response> {
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(timeout),
      ...init,
    });

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, await response.text());
    }

    return response;
  }

  function postInit(body: unknown, requestOptions: RequestOptions): RequestInit {
    const { headers, ...fetchOptions } = requestOptions;
    return {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...defaultHeaders,
        ...headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      ...fetchOptions,
    };
  }

  return {
    /**
     * Make a GET request
     */
    async get<T>(path: string, requestOptions: RequestOptions = {}): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      const response = await send(url, {
        method: 'GET',
        headers: {
          ...defaultHeaders,
          ...headers,
        },
        ...fetchOptions,
      });

      return response.json() as Promise<T>;
    },

    /**
     * Make a POST request with a JSON body
     *
     * Empty response bodies (204, webhooks answering with no content) resolve to null.
     */
    async post<T>(path: string, body?: unknown, requestOptions: RequestOptions = {}): Promise<T | null> {
      const { params, ...rest } = requestOptions;
      const response = await send(buildUrl(baseUrl, path, params), postInit(body, rest));

      const text = await response.text();
      return text ? (JSON.parse(text) as T) : null;
    },

    /**
     * POST a JSON body where only the status matters; the response body is discarded
     * (webhooks answer with `ok`, HTML or nothing at all)
     */
    async submit(path: string, body?: unknown, requestOptions: RequestOptions = {}): Promise<number> {
      const { params, ...rest } = requestOptions;
      const response = await send(buildUrl(baseUrl, path, params), postInit(body, rest));

      await response.body?.cancel();
      return response.status;
    },

    /**
     * Fetch binary data (e.g., images)
     */
    async fetchBytes(url: string): Promise<{ data: Uint8Array; contentType: string }> {
      const response = await send(url, {
        headers: defaultHeaders,
      });

      return {
        data: new Uint8Array(await response.arrayBuffer()),
        contentType: response.headers.get('content-type') || 'image/jpeg',
      };
    },
  };
}

/**
 * Type for an HTTP client instance
 */
export type HttpClient = ReturnType<typeof createHttpClient>;

/**
 * HTTP error with status code and response body
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';
  }

  /**
   * Check if error is a client error (4xx)
   */
  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  /**
   * Check if error is a server error (5xx)
   */
  isServerError(): boolean {
    return this.status >= 500;
  }

  /**
   * Check if error is retryable (5xx or 429 Too Many Requests)
   */
  isRetryable(): boolean {
    return this.isServerError() || this.status === 429;
  }
}

/**
 * Check whether an error came from the network layer rather than an HTTP response
 * (connection resets, DNS failures, request timeouts)
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }
  // undici rejects with `TypeError: fetch failed` and the socket/DNS error as cause
  return error instanceof TypeError && (error.message === 'fetch failed' || error.cause instanceof Error);
}
