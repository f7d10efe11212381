/**
 * YouTube Monitor feature - public API
 *
 * Polls watched channels for new uploads
 */

// API client
export {
  createYouTubeClient,
  YouTubeApiError,
  classifyError,
  type YouTubeClient,
  type YouTubeClientOptions,
  type YouTubeErrorKind,
} from './api';

// Types
export type { YouTubeVideo, FetchUploadsOptions, KeyCheckResult } from './model';

// Detection logic
export {
  fetchNewVideos,
  fetchRecentItems,
  videoToActivityItem,
  buildVideoUrl,
  calculatePollInterval,
} from './lib';
