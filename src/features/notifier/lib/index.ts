export { formatNotification, formatUploadedAt, truncateText, type FormatOptions } from './message-formatter';
export {
  deliverNotification,
  deliverInOrder,
  isRetryableDeliveryError,
  type DeliveryRetryOptions,
  type DeliverInOrderOptions,
} from './deliver';
export { createNotifier } from './create-notifier';
