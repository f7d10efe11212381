/**
 * Notifier model exports
 */
export type {
  NotifierKind,
  Notification,
  DeliveryReceipt,
  Notifier,
  DeliveryResult,
  BlueskyCredentials,
  NotifierConfig,
} from './types';
