/**
 * Delivery with retries
 */

import { HttpError } from '../../../shared/api';
import { createLogger, sleep as defaultSleep, withRetry, type RetryOptions } from '../../../shared/lib';
import type { DeliveryResult, Notification, Notifier } from '../model';

const log = createLogger('notifier');

export type DeliveryRetryOptions = Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;

/**
 * Client errors (bad URL, rejected payload) will not succeed on retry; 429 and 5xx might
 */
export function isRetryableDeliveryError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.isRetryable();
  }
  return true;
}

/**
 * Deliver one notification, retrying transient failures
 */
export async function deliverNotification(
  notifier: Notifier,
  notification: Notification,
  retry: DeliveryRetryOptions = {}
): Promise<DeliveryResult> {
  const { item } = notification;

  try {
    const receipt = await withRetry(() => notifier.send(notification), {
      ...retry,
      shouldRetry: isRetryableDeliveryError,
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          `Delivery of ${item.id} via ${notifier.kind} failed (attempt ${attempt}), retrying in ${delayMs}ms:`,
          error instanceof Error ? error.message : error
        );
      },
    });

    return { success: true, item, reference: receipt.reference };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log.error(`Failed to deliver ${item.id} via ${notifier.kind}: ${errorMessage}`);

    return { success: false, item, error: errorMessage };
  }
}

export interface DeliverInOrderOptions {
  retry?: DeliveryRetryOptions;

  /** Pause between deliveries to respect rate limits (default 1000ms) */
  delayMs?: number;

  /**
   * Called after each successful delivery, before the next one starts.
   * Resolving to false stops the remaining deliveries.
   */
  onDelivered?: (result: DeliveryResult) => Promise<boolean | void>;

  sleep?: (ms: number) => Promise<void>;
}

/**
 * Deliver notifications one by one, in order.
 *
 * Stops at the first failure so that nothing after a failed item is
 * delivered ahead of it; the remaining items are left for the next cycle.
 */
export async function deliverInOrder(
  notifier: Notifier,
  notifications: Notification[],
  options: DeliverInOrderOptions = {}
): Promise<DeliveryResult[]> {
  const { delayMs = 1000, onDelivered, sleep = defaultSleep } = options;
  const results: DeliveryResult[] = [];

  for (const [index, notification] of notifications.entries()) {
    const result = await deliverNotification(notifier, notification, options.retry);
    results.push(result);

    if (!result.success) {
      break;
    }

    if ((await onDelivered?.(result)) === false) {
      break;
    }

    // Small delay between deliveries to be respectful of rate limits
    if (index < notifications.length - 1) {
      await sleep(delayMs);
    }
  }

  return results;
}
