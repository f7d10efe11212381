/**
 * Notifier feature - public API
 *
 * Formats alerts for new uploads and delivers them to the configured target
 */

// Delivery targets
export { createWebhookNotifier, createBlueskyNotifier, createLogNotifier } from './api';

// Types
export type {
  Notifier,
  NotifierKind,
  NotifierConfig,
  Notification,
  DeliveryReceipt,
  DeliveryResult,
  BlueskyCredentials,
} from './model';

// Formatting and delivery
export {
  createNotifier,
  formatNotification,
  formatUploadedAt,
  deliverNotification,
  deliverInOrder,
  type DeliveryRetryOptions,
} from './lib';
