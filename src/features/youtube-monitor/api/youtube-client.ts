/**
 * YouTube Data API v3 client
 *
 * Uses playlistItems.list to fetch videos from the uploads playlist,
 * which is much cheaper than search.list (1 unit vs 100 per call).
 *
 * Every request draws a key from the credential set. Transient failures are
 * retried with backoff on the same key; quota, invalid-key and persistent
 * rate-limit errors move on to the next key.
 */

import { createHttpClient } from '../../../shared/api';
import { HEALTHCHECK_CHANNEL_ID, YOUTUBE_API_BASE } from '../../../shared/config';
import { createLogger, withRetry, type RetryOptions } from '../../../shared/lib';
import type { Channel, ResolvedChannel } from '../../../entities/channel';
import { NoUsableCredentialsError, type CredentialSet } from '../../credential-set';
import type {
  FetchUploadsOptions,
  KeyCheckResult,
  YouTubeChannelResponse,
  YouTubePlaylistItemsResponse,
  YouTubeThumbnails,
  YouTubeVideo,
  YouTubeVideosResponse,
} from '../model';
import { YouTubeApiError, classifyError } from './youtube-error';

const log = createLogger('youtube');

type Endpoint = 'channels' | 'playlistItems' | 'videos';

/** Quota cost per call of each endpoint */
const QUOTA_COST: Record<Endpoint, number> = {
  channels: 1,
  playlistItems: 1,
  videos: 1,
};

/** Minimum duration in seconds - videos shorter than this are filtered out */
const DEFAULT_MIN_DURATION_SECONDS = 60;

/** The API caps maxResults at 50 */
const MAX_PAGE_SIZE = 50;

type QueryParams = Record<string, string | number | undefined>;

export interface YouTubeClientOptions {
  /** fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;

  /** Per-request timeout in milliseconds */
  timeout?: number;

  /** Backoff settings for transient failures */
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;
}

/**
 * Create a YouTube API client
 */
export function createYouTubeClient(credentials: CredentialSet, options: YouTubeClientOptions = {}) {
  const http = createHttpClient({
    baseUrl: YOUTUBE_API_BASE,
    fetch: options.fetch,
    timeout: options.timeout,
  });

  /**
   * One call with a given key, retrying transient failures and rate limits
   */
  function callWithKey<T>(endpoint: Endpoint, params: QueryParams, key: string): Promise<T> {
    return withRetry(() => http.get<T>(endpoint, { params: { ...params, key } }), {
      ...options.retry,
      shouldRetry: (error) => {
        const kind = classifyError(error);
        return kind === 'transient' || kind === 'rate-limit';
      },
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          `${endpoint} attempt ${attempt} failed (${classifyError(error)}), retrying in ${delayMs}ms`
        );
      },
    });
  }

  /**
   * Call an endpoint, rotating through the credential set. Each key is tried at most once.
   */
  async function request<T>(endpoint: Endpoint, params: QueryParams): Promise<T> {
    const tried = new Set<string>();
    let lastError: unknown;

    for (;;) {
      const credential = credentials.current();
      if (!credential || tried.has(credential.key)) {
        throw new NoUsableCredentialsError(`No usable API key left for ${endpoint}`, lastError);
      }
      tried.add(credential.key);

      try {
        const response = await callWithKey<T>(endpoint, params, credential.key);
        credentials.recordUsage(credential.key, QUOTA_COST[endpoint]);
        return response;
      } catch (error) {
        lastError = error;
        const apiError = YouTubeApiError.from(error, endpoint);

        if (apiError.kind === 'quota') {
          credentials.markExhausted(credential.key);
        } else if (apiError.kind === 'invalid-key') {
          credentials.markInvalid(credential.key);
        } else if (apiError.kind === 'rate-limit') {
          credentials.skip(credential.key);
        } else {
          // Failed calls still count against the quota
          credentials.recordUsage(credential.key, QUOTA_COST[endpoint]);
          throw apiError;
        }

        log.warn(`${endpoint} failed with ${credential.label} (${apiError.kind}), trying next key`);
      }
    }
  }

  return {
    /**
     * Look up a configured channel: canonical ID, display name and uploads playlist
     */
    async resolveChannel(channel: Channel): Promise<ResolvedChannel> {
      const lookup = channel.id.startsWith('@') ? { forHandle: channel.id } : { id: channel.id };

      const response = await request<YouTubeChannelResponse>('channels', {
        part: 'snippet,contentDetails',
        ...lookup,
      });

      const item = response.items?.[0];
      if (!item) {
        throw new YouTubeApiError(`Channel not found: ${channel.id}`, 'not-found', 404);
      }

      return {
        id: item.id,
        name: channel.name || item.snippet?.title || item.id,
        uploadsPlaylistId:
          item.contentDetails?.relatedPlaylists.uploads ?? uploadsPlaylistIdFor(item.id),
      };
    },

    /**
     * Fetch durations and live state for a batch of videos
     */
    async fetchVideoDetails(
      videoIds: string[]
    ): Promise<Map<string, Pick<YouTubeVideo, 'durationSeconds' | 'broadcast'>>> {
      const details = new Map<string, Pick<YouTubeVideo, 'durationSeconds' | 'broadcast'>>();
      if (videoIds.length === 0) {
        return details;
      }

      const response = await request<YouTubeVideosResponse>('videos', {
        part: 'contentDetails,snippet',
        id: videoIds.slice(0, MAX_PAGE_SIZE).join(','),
      });

      for (const item of response.items) {
        details.set(item.id, {
          durationSeconds: item.contentDetails
            ? parseIsoDuration(item.contentDetails.duration)
            : undefined,
          broadcast: item.snippet?.liveBroadcastContent ?? 'none',
        });
      }
      return details;
    },

    /**
     * Fetch recent public videos from a playlist, newest first
     */
    async fetchPlaylistVideos(
      playlistId: string,
      fetchOptions: FetchUploadsOptions = {}
    ): Promise<YouTubeVideo[]> {
      const {
        maxResults = 10,
        minDurationSeconds = DEFAULT_MIN_DURATION_SECONDS,
        includeLivestreams = false,
      } = fetchOptions;

      const filtering = minDurationSeconds > 0 || !includeLivestreams;
      // Fetch more videos if filtering, to ensure we get enough results
      const fetchCount = Math.min(filtering ? maxResults * 3 : maxResults, MAX_PAGE_SIZE);

      const response = await request<YouTubePlaylistItemsResponse>('playlistItems', {
        part: 'snippet,status,contentDetails',
        playlistId,
        maxResults: fetchCount,
      });

      log.debug(`Fetched ${response.items.length} items from playlist ${playlistId}`);

      const publicItems = response.items.filter((item) => {
        const privacy = item.status?.privacyStatus ?? 'public';
        if (privacy !== 'public') {
          log.info(`Skipping "${item.snippet.title}" (${privacy})`);
          return false;
        }
        return true;
      });

      const videos: YouTubeVideo[] = publicItems.map((item) => ({
        videoId: item.contentDetails?.videoId ?? item.snippet.resourceId.videoId,
        title: item.snippet.title,
        description: item.snippet.description,
        thumbnailUrl: getBestThumbnailUrl(item.snippet.thumbnails),
        publishedAt: new Date(item.contentDetails?.videoPublishedAt ?? item.snippet.publishedAt),
        channelId: item.snippet.videoOwnerChannelId ?? item.snippet.channelId,
        channelTitle: item.snippet.videoOwnerChannelTitle ?? item.snippet.channelTitle,
        broadcast: 'none',
      }));

      const details = await this.fetchVideoDetails(videos.map((v) => v.videoId));

      const kept = videos
        .map((video) => ({ ...video, ...details.get(video.videoId) }))
        .filter((video) => {
          if (!includeLivestreams && video.broadcast !== 'none') {
            log.debug(`  ✗ "${video.title}" - ${video.broadcast} broadcast, filtering out`);
            return false;
          }
          if (video.durationSeconds === undefined) {
            log.debug(`  ? "${video.title}" - no duration found, including`);
            return true;
          }
          const isTooShort = minDurationSeconds > 0 && video.durationSeconds < minDurationSeconds;
          if (isTooShort) {
            log.debug(
              `  ✗ "${video.title}" (${video.durationSeconds}s) - under ${minDurationSeconds}s, filtering out`
            );
          } else {
            log.debug(`  ✓ "${video.title}" (${video.durationSeconds}s)`);
          }
          return !isTooShort;
        });

      const filteredCount = videos.length - kept.length;
      if (filteredCount > 0) {
        log.debug(`Filtered out ${filteredCount} shorts/livestreams`);
      }

      return kept
        .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
        .slice(0, maxResults);
    },

    /**
     * Fetch recent uploads from a resolved channel
     */
    async fetchChannelUploads(
      channel: ResolvedChannel,
      fetchOptions: FetchUploadsOptions = {}
    ): Promise<YouTubeVideo[]> {
      return this.fetchPlaylistVideos(channel.uploadsPlaylistId, fetchOptions);
    },

    /**
     * Check a single key against a well-known channel, bypassing rotation
     */
    async checkKey(key: string): Promise<KeyCheckResult> {
      try {
        const response = await callWithKey<YouTubeChannelResponse>(
          'channels',
          { part: 'id', id: HEALTHCHECK_CHANNEL_ID },
          key
        );
        credentials.recordUsage(key, QUOTA_COST.channels);
        return response.items && response.items.length > 0 ? 'valid' : 'error';
      } catch (error) {
        const kind = classifyError(error);
        if (kind === 'invalid-key') return 'invalid';
        if (kind === 'quota') return 'exhausted';
        log.warn('Key check failed:', YouTubeApiError.from(error).message);
        return 'error';
      }
    },
  };
}

/**
 * Uploads playlist of a channel: the `UC` prefix of the channel ID becomes `UU`
 */
export function uploadsPlaylistIdFor(channelId: string): string {
  return channelId.startsWith('UC') ? `UU${channelId.slice(2)}` : channelId;
}

/**
 * Get the best available thumbnail URL
 */
export function getBestThumbnailUrl(thumbnails: YouTubeThumbnails): string {
  return (
    thumbnails.maxres?.url ||
    thumbnails.standard?.url ||
    thumbnails.high?.url ||
    thumbnails.medium?.url ||
    thumbnails.default?.url ||
    ''
  );
}

/**
 * Parse ISO 8601 duration to seconds
 * YouTube returns durations like "PT1H2M30S", "PT30S", "PT5M" or "P0D" (live streams)
 */
export function parseIsoDuration(duration: string): number {
  const match = duration.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/);
  if (!match) {
    log.warn(`Could not parse duration: ${duration}`);
    return 0;
  }

  const days = parseInt(match[1] || '0', 10);
  const hours = parseInt(match[2] || '0', 10);
  const minutes = parseInt(match[3] || '0', 10);
  const seconds = parseInt(match[4] || '0', 10);

  return days * 86400 + hours * 3600 + minutes * 60 + seconds;
}

/**
 * Type for the YouTube client
 */
export type YouTubeClient = ReturnType<typeof createYouTubeClient>;
