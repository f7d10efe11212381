/**
 * Activity item types - a single upload detected on a watched channel
 */

/**
 * Live broadcast state as reported by the YouTube API
 */
export type BroadcastState = 'none' | 'live' | 'upcoming';

/**
 * A new piece of content that can be announced
 */
export interface ActivityItem {
  /** Unique identifier (the YouTube video ID) */
  id: string;

  /** ID of the channel that published the item */
  channelId: string;

  /** Channel display name */
  channelTitle: string;

  /** Title of the video */
  title: string;

  /** Watch URL */
  url: string;

  /** Video description */
  description?: string;

  /** URL to thumbnail image */
  thumbnailUrl?: string;

  /** Publication date */
  publishedAt: Date;

  /** Duration in seconds, when known */
  durationSeconds?: number;

  broadcast: BroadcastState;
}

/**
 * Position of an item in the per-channel ordering
 */
export interface ItemPosition {
  id: string;
  publishedAt: Date;
}
