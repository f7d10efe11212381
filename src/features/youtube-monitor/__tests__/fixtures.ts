/**
 * Fake YouTube Data API for tests
 */

import { googleErrorResponse, jsonResponse } from '../../../shared/testing';
import type { YouTubeChannelResponse, YouTubePlaylistItem, YouTubeVideosResponse } from '../model';

export interface FakeVideo {
  id: string;
  title?: string;
  publishedAt: string;
  privacy?: 'public' | 'unlisted' | 'private';
  /** ISO 8601 duration; omitted from the videos response when undefined */
  duration?: string;
  broadcast?: 'none' | 'live' | 'upcoming';
}

export interface FakeChannel {
  id: string;
  title: string;
  handle?: string;
  videos: FakeVideo[];
}

export function playlistItem(channel: FakeChannel, video: FakeVideo): YouTubePlaylistItem {
  return {
    kind: 'youtube#playlistItem',
    etag: `etag-${video.id}`,
    id: `item-${video.id}`,
    snippet: {
      publishedAt: video.publishedAt,
      channelId: channel.id,
      title: video.title ?? `Video ${video.id}`,
      description: `Description of ${video.id}`,
      thumbnails: {
        default: { url: `https://i.ytimg.com/vi/${video.id}/default.jpg`, width: 120, height: 90 },
        high: { url: `https://i.ytimg.com/vi/${video.id}/hqdefault.jpg`, width: 480, height: 360 },
      },
      channelTitle: channel.title,
      playlistId: `UU${channel.id.slice(2)}`,
      position: 0,
      resourceId: { kind: 'youtube#video', videoId: video.id },
    },
    contentDetails: { videoId: video.id, videoPublishedAt: video.publishedAt },
    status: { privacyStatus: video.privacy ?? 'public' },
  };
}

/**
 * Serve channels, playlistItems and videos for a set of fake channels.
 * `reject` may return an error response for a request before it is served.
 */
export function createYouTubeHandler(
  channels: FakeChannel[],
  reject?: (endpoint: string, url: URL) => Response | undefined
) {
  return (url: URL): Response => {
    const endpoint = url.pathname.split('/').pop() ?? '';
    const rejection = reject?.(endpoint, url);
    if (rejection) {
      return rejection;
    }

    const params = url.searchParams;

    if (endpoint === 'channels') {
      const handle = params.get('forHandle');
      const id = params.get('id');
      const found = channels.filter((channel) =>
        handle ? channel.handle === handle : channel.id === id
      );
      const body: YouTubeChannelResponse = {
        kind: 'youtube#channelListResponse',
        etag: 'etag',
        pageInfo: { totalResults: found.length, resultsPerPage: 5 },
        items: found.map((channel) => ({
          kind: 'youtube#channel',
          etag: 'etag',
          id: channel.id,
          snippet: { title: channel.title, description: '' },
          contentDetails: { relatedPlaylists: { uploads: `UU${channel.id.slice(2)}` } },
        })),
      };
      return jsonResponse(body);
    }

    if (endpoint === 'playlistItems') {
      const channel = channels.find(
        (candidate) => `UU${candidate.id.slice(2)}` === params.get('playlistId')
      );
      if (!channel) {
        return googleErrorResponse(404, 'playlistNotFound', 'Playlist not found');
      }
      const limit = Number(params.get('maxResults') ?? '5');
      const items = [...channel.videos]
        .sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt))
        .slice(0, limit)
        .map((video) => playlistItem(channel, video));
      return jsonResponse({
        kind: 'youtube#playlistItemListResponse',
        etag: 'etag',
        pageInfo: { totalResults: items.length, resultsPerPage: limit },
        items,
      });
    }

    if (endpoint === 'videos') {
      const ids = (params.get('id') ?? '').split(',');
      const all = channels.flatMap((channel) => channel.videos);
      const body: YouTubeVideosResponse = {
        items: all
          .filter((video) => ids.includes(video.id) && video.duration !== undefined)
          .map((video) => ({
            id: video.id,
            contentDetails: { duration: video.duration ?? 'PT0S' },
            snippet: { liveBroadcastContent: video.broadcast ?? 'none' },
          })),
      };
      return jsonResponse(body);
    }

    return jsonResponse({ error: { code: 404, message: 'Unknown endpoint' } }, 404);
  };
}

/** Retry settings that never wait */
export const NO_WAIT_RETRY = { sleep: async () => undefined };
