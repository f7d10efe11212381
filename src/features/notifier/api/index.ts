export { createWebhookNotifier, buildWebhookPayload, type WebhookPayload } from './webhook-notifier';
export { createBlueskyNotifier, formatPostText } from './bluesky-client';
export { createLogNotifier } from './log-notifier';
