/**
 * Build the configured delivery target
 */

import { createBlueskyNotifier, createLogNotifier, createWebhookNotifier } from '../api';
import type { Notifier, NotifierConfig } from '../model';

export function createNotifier(config: NotifierConfig, options: { fetch?: typeof fetch } = {}): Notifier {
  switch (config.kind) {
    case 'webhook':
      return createWebhookNotifier(config.url, { fetch: options.fetch });
    case 'bluesky':
      return createBlueskyNotifier(config.credentials, {
        service: config.service,
        fetch: options.fetch,
      });
    case 'log':
      return createLogNotifier();
  }
}
