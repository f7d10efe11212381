/**
 * In-process fetch stand-in for tests
 */

export interface RecordedRequest {
  url: URL;
  init?: RequestInit;
}

export type FetchHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/**
 * Create a fetch that answers every request with `handler` and records the calls
 */
export function createFakeFetch(handler: FetchHandler) {
  const calls: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    calls.push({ url, init });
    return handler(url, init);
  };

  return { fetch: fakeFetch, calls };
}

/**
 * JSON response with the given status
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Error response in the Google API envelope
 */
export function googleErrorResponse(status: number, reason: string, message = 'Request failed'): Response {
  return jsonResponse({ error: { code: status, message, errors: [{ reason, message }] } }, status);
}
