/**
 * Classification of YouTube Data API errors
 *
 * Google wraps errors in an envelope like
 * `{ "error": { "code": 403, "message": "...", "errors": [{ "reason": "quotaExceeded" }],
 *   "details": [{ "reason": "API_KEY_INVALID" }] } }`.
 */

import { HttpError, isNetworkError } from '../../../shared/api';

/**
 * What went wrong, as far as key rotation and retries are concerned
 */
export type YouTubeErrorKind =
  | 'quota'
  | 'invalid-key'
  | 'rate-limit'
  | 'not-found'
  | 'transient'
  | 'other';

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);

const RATE_LIMIT_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'RATE_LIMIT_EXCEEDED',
]);

const INVALID_KEY_REASONS = new Set([
  'keyInvalid',
  'keyExpired',
  'accessNotConfigured',
  'ipRefererBlocked',
  'API_KEY_INVALID',
  'API_KEY_EXPIRED',
  'API_KEY_SERVICE_BLOCKED',
  'API_KEY_HTTP_REFERRER_BLOCKED',
  'API_KEY_IP_ADDRESS_BLOCKED',
  'SERVICE_DISABLED',
]);

const NOT_FOUND_REASONS = new Set([
  'notFound',
  'channelNotFound',
  'playlistNotFound',
  'videoNotFound',
]);

interface GoogleErrorDetails {
  message?: string;
  reasons: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function collectReasons(list: unknown): string[] {
  if (!Array.isArray(list)) {
    return [];
  }
  return list.flatMap((entry) =>
    isRecord(entry) && typeof entry.reason === 'string' ? [entry.reason] : []
  );
}

/**
 * Pull the message and reason codes out of a Google error body
 */
export function parseGoogleError(body: string): GoogleErrorDetails {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { reasons: [] };
  }

  if (!isRecord(parsed) || !isRecord(parsed.error)) {
    return { reasons: [] };
  }

  const { error } = parsed;
  return {
    message: typeof error.message === 'string' ? error.message : undefined,
    reasons: [...collectReasons(error.errors), ...collectReasons(error.details)],
  };
}

/**
 * Classify any error thrown while calling the API
 */
export function classifyError(error: unknown): YouTubeErrorKind {
  if (error instanceof YouTubeApiError) {
    return error.kind;
  }

  if (error instanceof HttpError) {
    const { message = '', reasons } = parseGoogleError(error.body);
    const has = (set: Set<string>) => reasons.some((reason) => set.has(reason));

    if (has(QUOTA_REASONS)) return 'quota';
    if (has(INVALID_KEY_REASONS) || /API key (not valid|expired)/i.test(message)) {
      return 'invalid-key';
    }
    if (has(RATE_LIMIT_REASONS) || error.status === 429) return 'rate-limit';
    if (has(NOT_FOUND_REASONS) || error.status === 404) return 'not-found';
    if (error.isServerError()) return 'transient';
    return 'other';
  }

  if (isNetworkError(error)) {
    return 'transient';
  }

  return 'other';
}

/**
 * Error raised by the YouTube client once retries and key rotation are done
 */
export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly kind: YouTubeErrorKind,
    public readonly status?: number,
    public readonly reasons: string[] = []
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }

  /**
   * Wrap an arbitrary error, keeping HTTP status and Google reason codes
   */
  static from(error: unknown, context?: string): YouTubeApiError {
    if (error instanceof YouTubeApiError) {
      return error;
    }

    const kind = classifyError(error);
    const prefix = context ? `${context}: ` : '';

    if (error instanceof HttpError) {
      const { message, reasons } = parseGoogleError(error.body);
      return new YouTubeApiError(
        `${prefix}YouTube API ${error.status}${message ? ` - ${message}` : ''}`,
        kind,
        error.status,
        reasons
      );
    }

    const detail = error instanceof Error ? error.message : String(error);
    return new YouTubeApiError(`${prefix}${detail}`, kind);
  }
}
