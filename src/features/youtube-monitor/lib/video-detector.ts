/**
 * Video detection logic
 *
 * Fetches recent uploads and keeps only the ones newer than the channel's marker
 */

import type { ActivityItem } from '../../../entities/activity-item';
import { sortOldestFirst } from '../../../entities/activity-item';
import type { ResolvedChannel } from '../../../entities/channel';
import type { StateManager } from '../../../entities/posted-state';
import { YOUTUBE_WATCH_URL } from '../../../shared/config';
import type { YouTubeClient } from '../api';
import type { FetchUploadsOptions, YouTubeVideo } from '../model';

/**
 * Build a YouTube video URL from a video ID
 */
export function buildVideoUrl(videoId: string): string {
  return `${YOUTUBE_WATCH_URL}?v=${videoId}`;
}

/**
 * Convert a YouTube video to an ActivityItem
 */
export function videoToActivityItem(video: YouTubeVideo, channel: ResolvedChannel): ActivityItem {
  return {
    id: video.videoId,
    channelId: channel.id,
    channelTitle: channel.name,
    title: video.title,
    url: buildVideoUrl(video.videoId),
    description: video.description,
    thumbnailUrl: video.thumbnailUrl || undefined,
    publishedAt: video.publishedAt,
    durationSeconds: video.durationSeconds,
    broadcast: video.broadcast,
  };
}

/**
 * Fetch recent uploads for a channel as activity items, newest first
 */
export async function fetchRecentItems(
  youtubeClient: YouTubeClient,
  channel: ResolvedChannel,
  options: FetchUploadsOptions = {}
): Promise<ActivityItem[]> {
  const videos = await youtubeClient.fetchChannelUploads(channel, options);
  return videos.map((video) => videoToActivityItem(video, channel));
}

/**
 * Fetch new videos that haven't been announced yet, oldest first
 */
export async function fetchNewVideos(
  youtubeClient: YouTubeClient,
  stateManager: StateManager,
  channel: ResolvedChannel,
  options: FetchUploadsOptions = {}
): Promise<ActivityItem[]> {
  const items = await fetchRecentItems(youtubeClient, channel, options);

  // Filter out items at or before the marker
  const newItems = await stateManager.filterNewItems(channel.id, items);

  // Oldest first so they're announced in chronological order
  return sortOldestFirst(newItems);
}
