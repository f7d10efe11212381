/**
 * Notification formatting
 *
 * Formats activity items into human-readable alerts
 */

import type { ActivityItem } from '../../../entities/activity-item';
import type { Notification } from '../model';

export interface FormatOptions {
  /** IANA time zone used for the upload time (default UTC) */
  timeZone?: string;
}

/**
 * Truncate text to fit within a maximum length
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Format an upload time like "February 20, 2026 12:00 PM"
 */
export function formatUploadedAt(date: Date, timeZone = 'UTC'): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('month')} ${part('day')}, ${part('year')} ${part('hour')}:${part('minute')} ${part('dayPeriod')}`;
}

/**
 * Build the alert for a new upload
 */
export function formatNotification(item: ActivityItem, options: FormatOptions = {}): Notification {
  return {
    title: `${item.channelTitle} has uploaded a new video to YouTube!`,
    body: `${item.title}\n${item.url}\nUploaded at: ${formatUploadedAt(item.publishedAt, options.timeZone)}`,
    item,
  };
}
