import { describe, it, expect } from 'vitest';
import { HttpError } from '../../../shared/api';
import { createFakeFetch } from '../../../shared/testing';
import { buildWebhookPayload, createWebhookNotifier } from '../api/webhook-notifier';
import { deliverInOrder } from '../lib/deliver';
import { formatNotification } from '../lib/message-formatter';
import { makeItem } from './fixtures';

describe('buildWebhookPayload', () => {
  it('includes the message, channel and video', () => {
    const notification = formatNotification(makeItem());

    expect(buildWebhookPayload(notification)).toEqual({
      title: 'Test Channel has uploaded a new video to YouTube!',
      message: notification.body,
      url: 'https://www.youtube.com/watch?v=vid123',
      thumbnailUrl: 'https://i.ytimg.com/vi/vid123/hqdefault.jpg',
      channel: { id: 'UCchan', name: 'Test Channel' },
      video: { id: 'vid123', title: 'A New Video', publishedAt: '2026-02-20T12:00:00.000Z' },
    });
  });

  it('leaves out a missing thumbnail', () => {
    const payload = buildWebhookPayload(formatNotification(makeItem({ thumbnailUrl: undefined })));
    expect('thumbnailUrl' in payload).toBe(false);
  });
});

describe('createWebhookNotifier', () => {
  it('posts the payload as JSON to the webhook URL', async () => {
    const { fetch, calls } = createFakeFetch(() => new Response(null, { status: 204 }));
    const notifier = createWebhookNotifier('https://hooks.test/youtube', { fetch });
    const notification = formatNotification(makeItem());

    await expect(notifier.send(notification)).resolves.toEqual({});

    expect(notifier.kind).toBe('webhook');
    expect(calls).toHaveLength(1);
    expect(calls[0].url.toString()).toBe('https://hooks.test/youtube');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe(JSON.stringify(buildWebhookPayload(notification)));
  });

  it('rejects with an HttpError when the webhook fails', async () => {
    const { fetch } = createFakeFetch(
      () => new Response('down', { status: 502, statusText: 'Bad Gateway' })
    );
    const notifier = createWebhookNotifier('https://hooks.test/youtube', { fetch });

    const error = await notifier.send(formatNotification(makeItem())).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 502 });
  });

  it('accepts a 200 reply with a plain-text body', async () => {
    const { fetch, calls } = createFakeFetch(() => new Response('ok', { status: 200 }));
    const notifier = createWebhookNotifier('https://hooks.test/youtube', { fetch });
    const seen: string[] = [];

    const results = await deliverInOrder(notifier, [formatNotification(makeItem())], {
      delayMs: 0,
      onDelivered: async (result) => {
        seen.push(result.item.id);
      },
    });

    expect(results).toEqual([{ success: true, item: makeItem(), reference: undefined }]);
    expect(seen).toEqual(['vid123']);
    expect(calls).toHaveLength(1);
  });
});
