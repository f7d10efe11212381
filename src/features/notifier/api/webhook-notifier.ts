/**
 * Webhook notifier
 *
 * POSTs a JSON document per notification to a fixed URL
 */

import { createHttpClient } from '../../../shared/api';
import type { Notification, Notifier } from '../model';

/**
 * JSON body sent to the webhook
 */
export interface WebhookPayload {
  title: string;
  message: string;
  url: string;
  thumbnailUrl?: string;
  channel: {
    id: string;
    name: string;
  };
  video: {
    id: string;
    title: string;
    publishedAt: string;
  };
}

/**
 * Build the webhook body for a notification
 */
export function buildWebhookPayload(notification: Notification): WebhookPayload {
  const { item } = notification;

  return {
    title: notification.title,
    message: notification.body,
    url: item.url,
    ...(item.thumbnailUrl && { thumbnailUrl: item.thumbnailUrl }),
    channel: {
      id: item.channelId,
      name: item.channelTitle,
    },
    video: {
      id: item.id,
      title: item.title,
      publishedAt: item.publishedAt.toISOString(),
    },
  };
}

export function createWebhookNotifier(
  webhookUrl: string,
  options: { fetch?: typeof fetch; timeout?: number; headers?: Record<string, string> } = {}
): Notifier {
  const http = createHttpClient({
    fetch: options.fetch,
    timeout: options.timeout,
    headers: options.headers,
  });

  return {
    kind: 'webhook',

    async send(notification) {
      await http.submit(webhookUrl, buildWebhookPayload(notification));
      return {};
    },
  };
}
