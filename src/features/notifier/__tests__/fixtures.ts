import type { ActivityItem } from '../../../entities/activity-item';

export function makeItem(overrides: Partial<ActivityItem> = {}): ActivityItem {
  return {
    id: 'vid123',
    channelId: 'UCchan',
    channelTitle: 'Test Channel',
    title: 'A New Video',
    url: 'https://www.youtube.com/watch?v=vid123',
    description: 'About the video',
    thumbnailUrl: 'https://i.ytimg.com/vi/vid123/hqdefault.jpg',
    publishedAt: new Date('2026-02-20T12:00:00Z'),
    durationSeconds: 600,
    broadcast: 'none',
    ...overrides,
  };
}
