import { describe, it, expect } from 'vitest';
import { createFakeFetch, jsonResponse } from '../../testing';
import { HttpError, createHttpClient, isNetworkError } from '../http-client';

describe('createHttpClient', () => {
  it('builds the URL from the base URL and skips undefined params', async () => {
    const { fetch, calls } = createFakeFetch(() => jsonResponse({ ok: true }));
    const http = createHttpClient({ baseUrl: 'https://api.test/v3/', fetch });

    const result = await http.get<{ ok: boolean }>('videos', {
      params: { id: 'abc', part: undefined, maxResults: 5 },
    });

    expect(result).toEqual({ ok: true });
    expect(calls[0].url.toString()).toBe('https://api.test/v3/videos?id=abc&maxResults=5');
    expect(calls[0].init?.method).toBe('GET');
  });

  it('throws an HttpError carrying status and body for non-2xx responses', async () => {
    const { fetch } = createFakeFetch(
      () => new Response('nope', { status: 403, statusText: 'Forbidden' })
    );
    const http = createHttpClient({ baseUrl: 'https://api.test/', fetch });

    const error = await http.get('thing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 403, statusText: 'Forbidden', body: 'nope' });
  });

  it('posts JSON and resolves to null for an empty body', async () => {
    const { fetch, calls } = createFakeFetch(() => new Response(null, { status: 204 }));
    const http = createHttpClient({ fetch });

    const result = await http.post('https://hooks.test/in', { hello: 'world' });

    expect(result).toBeNull();
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('{"hello":"world"}');
    expect(calls[0].init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('parses a JSON response to a post', async () => {
    const { fetch } = createFakeFetch(() => jsonResponse({ id: 7 }));
    const http = createHttpClient({ fetch });

    await expect(http.post('https://hooks.test/in', {})).resolves.toEqual({ id: 7 });
  });

  it('submits a JSON body and ignores a plain-text reply', async () => {
    const { fetch, calls } = createFakeFetch(() => new Response('ok', { status: 200 }));
    const http = createHttpClient({ fetch });

    await expect(http.submit('https://hooks.test/in', { text: 'hi' })).resolves.toBe(200);
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('{"text":"hi"}');
  });

  it('rejects a submit that gets a non-2xx reply', async () => {
    const { fetch } = createFakeFetch(() => new Response('gone', { status: 410, statusText: 'Gone' }));
    const http = createHttpClient({ fetch });

    const error = await http.submit('https://hooks.test/in', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 410, body: 'gone' });
  });

  it('fetches bytes with the response content type', async () => {
    const { fetch } = createFakeFetch(
      () => new Response(new Uint8Array([1, 2, 3]), { headers: { 'content-type': 'image/png' } })
    );
    const http = createHttpClient({ fetch });

    const { data, contentType } = await http.fetchBytes('https://img.test/a.png');

    expect(Array.from(data)).toEqual([1, 2, 3]);
    expect(contentType).toBe('image/png');
  });

  it('falls back to image/jpeg when no content type is sent', async () => {
    const { fetch } = createFakeFetch(() => new Response(new Uint8Array([9])));
    const http = createHttpClient({ fetch });

    const { contentType } = await http.fetchBytes('https://img.test/a');

    expect(contentType).toBe('image/jpeg');
  });
});

describe('HttpError', () => {
  it('classifies status codes', () => {
    expect(new HttpError(404, 'Not Found', '').isClientError()).toBe(true);
    expect(new HttpError(404, 'Not Found', '').isRetryable()).toBe(false);
    expect(new HttpError(429, 'Too Many Requests', '').isRetryable()).toBe(true);
    expect(new HttpError(503, 'Service Unavailable', '').isServerError()).toBe(true);
    expect(new HttpError(503, 'Service Unavailable', '').isRetryable()).toBe(true);
  });

  it('includes status and body in the message', () => {
    expect(new HttpError(400, 'Bad Request', 'bad').message).toBe('HTTP 400 Bad Request: bad');
  });
});

describe('isNetworkError', () => {
  it('recognises fetch failures and timeouts', () => {
    expect(isNetworkError(new TypeError('fetch failed'))).toBe(true);
    expect(
      isNetworkError(new TypeError('terminated', { cause: new Error('other side closed') }))
    ).toBe(true);
    expect(isNetworkError(Object.assign(new Error('timed out'), { name: 'TimeoutError' }))).toBe(true);
  });

  it('rejects other errors', () => {
    expect(isNetworkError(new Error('boom'))).toBe(false);
    expect(isNetworkError(new HttpError(500, 'Internal Server Error', ''))).toBe(false);
    expect(isNetworkError('fetch failed')).toBe(false);
  });

  it('does not treat programming errors as network failures', () => {
    expect(isNetworkError(new TypeError("Cannot read properties of undefined (reading 'id')"))).toBe(
      false
    );
  });
});
