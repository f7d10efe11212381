/**
 * Error reporting via Sentry
 *
 * When no DSN is configured the reporter is a no-op, so callers never need to check.
 */

import * as Sentry from '@sentry/node';

export interface ReportContext {
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
}

export interface ErrorReporter {
  captureException(error: unknown, context?: ReportContext): void;
  captureMessage(message: string, level: 'info' | 'warning' | 'error', context?: ReportContext): void;
  /** Wait for queued events to be sent (call before exit) */
  flush(timeoutMs?: number): Promise<boolean>;
}

export function createErrorReporter(options: { dsn?: string; release?: string } = {}): ErrorReporter {
  if (!options.dsn) {
    return {
      captureException: () => undefined,
      captureMessage: () => undefined,
      flush: async () => true,
    };
  }

  Sentry.init({
    dsn: options.dsn,
    release: options.release,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 1.0,
  });

  return {
    captureException(error, context = {}) {
      Sentry.captureException(error, { tags: context.tags, extra: context.extra });
    },

    captureMessage(message, level, context = {}) {
      Sentry.captureMessage(message, { level, tags: context.tags, extra: context.extra });
    },

    flush(timeoutMs = 2000) {
      return Sentry.flush(timeoutMs);
    },
  };
}
