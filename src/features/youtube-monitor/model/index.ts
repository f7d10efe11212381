/**
 * YouTube monitor model exports
 */
export type {
  YouTubeVideo,
  FetchUploadsOptions,
  YouTubePlaylistItemsResponse,
  YouTubePlaylistItem,
  YouTubeThumbnails,
  YouTubeThumbnail,
  YouTubeChannelResponse,
  YouTubeChannel,
  YouTubeVideosResponse,
  KeyCheckResult,
} from './types';
