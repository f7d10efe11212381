/**
 * YouTube video types
 */

import type { BroadcastState } from '../../../entities/activity-item';

/**
 * YouTube video data from the API
 */
export interface YouTubeVideo {
  /** YouTube video ID */
  videoId: string;

  /** Video title */
  title: string;

  /** Video description */
  description: string;

  /** Thumbnail URL (best available quality) */
  thumbnailUrl: string;

  /** Publication date */
  publishedAt: Date;

  /** Channel ID */
  channelId: string;

  /** Channel title */
  channelTitle: string;

  /** Duration in seconds (undefined when the videos endpoint did not return it) */
  durationSeconds?: number;

  /** Live broadcast state */
  broadcast: BroadcastState;
}

/**
 * Options for fetching recent uploads
 */
export interface FetchUploadsOptions {
  /** Maximum number of videos to return (default 10) */
  maxResults?: number;

  /** Videos shorter than this are dropped as Shorts; 0 keeps everything (default 60) */
  minDurationSeconds?: number;

  /** Keep live and upcoming broadcasts (default false) */
  includeLivestreams?: boolean;
}

/**
 * YouTube API playlist items response
 */
export interface YouTubePlaylistItemsResponse {
  kind: string;
  etag: string;
  nextPageToken?: string;
  pageInfo: {
    totalResults: number;
    resultsPerPage: number;
  };
  items: YouTubePlaylistItem[];
}

/**
 * Individual playlist item from the API
 */
export interface YouTubePlaylistItem {
  kind: string;
  etag: string;
  id: string;
  snippet: {
    publishedAt: string;
    channelId: string;
    title: string;
    description: string;
    thumbnails: YouTubeThumbnails;
    channelTitle: string;
    playlistId: string;
    position: number;
    resourceId: {
      kind: string;
      videoId: string;
    };
    videoOwnerChannelId?: string;
    videoOwnerChannelTitle?: string;
  };
  contentDetails?: {
    videoId: string;
    /** Absent for private or deleted videos */
    videoPublishedAt?: string;
  };
  status?: {
    privacyStatus: 'public' | 'unlisted' | 'private' | 'privacyStatusUnspecified';
  };
}

/**
 * Thumbnail set keyed by quality
 */
export interface YouTubeThumbnails {
  default?: YouTubeThumbnail;
  medium?: YouTubeThumbnail;
  high?: YouTubeThumbnail;
  standard?: YouTubeThumbnail;
  maxres?: YouTubeThumbnail;
}

/**
 * YouTube thumbnail data
 */
export interface YouTubeThumbnail {
  url: string;
  width: number;
  height: number;
}

/**
 * YouTube channels response
 */
export interface YouTubeChannelResponse {
  kind: string;
  etag: string;
  pageInfo: {
    totalResults: number;
    resultsPerPage: number;
  };
  items?: YouTubeChannel[];
}

/**
 * YouTube channel data
 */
export interface YouTubeChannel {
  kind: string;
  etag: string;
  id: string;
  snippet?: {
    title: string;
    description: string;
    customUrl?: string;
  };
  contentDetails?: {
    relatedPlaylists: {
      likes?: string;
      uploads: string;
    };
  };
}

/**
 * Response from the videos endpoint (duration and live state)
 */
export interface YouTubeVideosResponse {
  items: Array<{
    id: string;
    contentDetails?: {
      duration: string;
    };
    snippet?: {
      liveBroadcastContent: BroadcastState;
    };
  }>;
}

/**
 * Outcome of checking a single API key
 */
export type KeyCheckResult = 'valid' | 'invalid' | 'exhausted' | 'error';
