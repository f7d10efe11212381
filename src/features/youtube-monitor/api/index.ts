export {
  createYouTubeClient,
  uploadsPlaylistIdFor,
  getBestThumbnailUrl,
  parseIsoDuration,
  type YouTubeClient,
  type YouTubeClientOptions,
} from './youtube-client';
export { YouTubeApiError, classifyError, parseGoogleError, type YouTubeErrorKind } from './youtube-error';
