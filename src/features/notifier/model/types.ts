/**
 * Notification types
 */

import type { ActivityItem } from '../../../entities/activity-item';

/**
 * Delivery targets; exactly one is active per process
 */
export type NotifierKind = 'webhook' | 'bluesky' | 'log';

/**
 * A formatted alert about one new item
 */
export interface Notification {
  /** Headline, e.g. "Some Channel has uploaded a new video to YouTube!" */
  title: string;

  /** Video title, link and upload time, one per line */
  body: string;

  /** The item being announced */
  item: ActivityItem;
}

/**
 * What a notifier returns after a successful delivery
 */
export interface DeliveryReceipt {
  /** Target-specific reference (e.g. the Bluesky post URI) */
  reference?: string;
}

/**
 * A delivery target
 */
export interface Notifier {
  readonly kind: NotifierKind;

  /** Deliver one notification; throws on failure */
  send(notification: Notification): Promise<DeliveryReceipt>;
}

/**
 * Result of delivering one notification (after retries)
 */
export interface DeliveryResult {
  /** Whether the delivery was successful */
  success: boolean;

  /** The item that was announced */
  item: ActivityItem;

  /** Target-specific reference (if successful) */
  reference?: string;

  /** Error message (if failed) */
  error?: string;
}

/**
 * Credentials for Bluesky authentication
 */
export interface BlueskyCredentials {
  /** Bluesky handle (e.g., your-handle.bsky.social) */
  identifier: string;

  /** App password (not main password) */
  password: string;
}

/**
 * Settings for the active delivery target
 */
export type NotifierConfig =
  | { kind: 'webhook'; url: string }
  | { kind: 'bluesky'; credentials: BlueskyCredentials; service?: string }
  | { kind: 'log' };
