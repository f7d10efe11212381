import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createStateManager, type StateManager } from '../../../entities/posted-state';
import { createSqliteStore, type KeyValueStore } from '../../../shared/storage';
import { createFakeFetch } from '../../../shared/testing';
import { createCredentialSet } from '../../credential-set';
import { createYouTubeClient, type YouTubeClient } from '../api';
import { buildVideoUrl, fetchNewVideos, fetchRecentItems, videoToActivityItem } from '../lib/video-detector';
import { NO_WAIT_RETRY, createYouTubeHandler, type FakeChannel } from './fixtures';

const CHANNEL: FakeChannel = {
  id: 'UCchan',
  title: 'API Title',
  videos: [
    { id: 'a', publishedAt: '2026-02-01T10:00:00Z', duration: 'PT10M' },
    { id: 'b', publishedAt: '2026-02-02T10:00:00Z', duration: 'PT10M' },
    { id: 'c', publishedAt: '2026-02-03T10:00:00Z', duration: 'PT10M' },
  ],
};

const RESOLVED = { id: 'UCchan', name: 'Configured Name', uploadsPlaylistId: 'UUchan' };

describe('video detection', () => {
  let store: KeyValueStore;
  let stateManager: StateManager;
  let client: YouTubeClient;

  beforeEach(() => {
    store = createSqliteStore(':memory:');
    stateManager = createStateManager(store);
    const { fetch } = createFakeFetch(createYouTubeHandler([CHANNEL]));
    client = createYouTubeClient(createCredentialSet(['test-key-aaaa1111']), {
      fetch,
      retry: NO_WAIT_RETRY,
    });
  });

  afterEach(() => {
    store.close();
  });

  it('builds watch URLs', () => {
    expect(buildVideoUrl('abc123')).toBe('https://www.youtube.com/watch?v=abc123');
  });

  it('converts videos to activity items under the resolved channel name', () => {
    const item = videoToActivityItem(
      {
        videoId: 'abc123',
        title: 'Title',
        description: 'Text',
        thumbnailUrl: '',
        publishedAt: new Date('2026-02-01T10:00:00Z'),
        channelId: 'UCchan',
        channelTitle: 'API Title',
        durationSeconds: 90,
        broadcast: 'none',
      },
      RESOLVED
    );

    expect(item).toEqual({
      id: 'abc123',
      channelId: 'UCchan',
      channelTitle: 'Configured Name',
      title: 'Title',
      url: 'https://www.youtube.com/watch?v=abc123',
      description: 'Text',
      thumbnailUrl: undefined,
      publishedAt: new Date('2026-02-01T10:00:00Z'),
      durationSeconds: 90,
      broadcast: 'none',
    });
  });

  it('fetches recent uploads newest first', async () => {
    const items = await fetchRecentItems(client, RESOLVED);
    expect(items.map((item) => item.id)).toEqual(['c', 'b', 'a']);
  });

  it('returns only uploads after the marker, oldest first', async () => {
    await stateManager.setLastSeen('UCchan', { id: 'a', publishedAt: new Date('2026-02-01T10:00:00Z') });

    const items = await fetchNewVideos(client, stateManager, RESOLVED);

    expect(items.map((item) => item.id)).toEqual(['b', 'c']);
  });

  it('returns nothing once the newest upload has been announced', async () => {
    await stateManager.setLastSeen('UCchan', { id: 'c', publishedAt: new Date('2026-02-03T10:00:00Z') });

    await expect(fetchNewVideos(client, stateManager, RESOLVED)).resolves.toEqual([]);
  });
});
