/**
 * Bluesky notifier
 *
 * Posts each alert with an external embed (link card) and the video thumbnail
 */

import { BskyAgent, RichText, type BlobRef } from '@atproto/api';
import { createHttpClient } from '../../../shared/api';
import { createLogger } from '../../../shared/lib';
import { truncateText } from '../lib/message-formatter';
import type { BlueskyCredentials, Notification, Notifier } from '../model';

const log = createLogger('bluesky');

/** Default Bluesky PDS */
const DEFAULT_SERVICE = 'https://bsky.social';

/**
 * Maximum length for Bluesky post text (300 characters)
 */
const MAX_POST_LENGTH = 300;

/** Maximum length of the link card description */
const MAX_DESCRIPTION_LENGTH = 300;

/** Maximum image size for Bluesky (1MB) */
const MAX_IMAGE_SIZE_BYTES = 1_000_000;

/**
 * Post text: the headline, then the video title
 */
export function formatPostText(notification: Notification): string {
  return truncateText(`${notification.title}\n\n${notification.item.title}`, MAX_POST_LENGTH);
}

/**
 * Create a Bluesky notifier. Login happens on the first delivery and is reused afterwards.
 * `fetch` is used for the PDS and for thumbnail downloads.
 */
export function createBlueskyNotifier(
  credentials: BlueskyCredentials,
  options: { service?: string; fetch?: typeof fetch } = {}
): Notifier {
  const agent = new BskyAgent({
    service: options.service ?? DEFAULT_SERVICE,
    fetch: options.fetch,
  });
  const http = createHttpClient({ fetch: options.fetch });

  let login: Promise<void> | null = null;

  function ensureLoggedIn(): Promise<void> {
    if (!login) {
      login = agent
        .login({
          identifier: credentials.identifier,
          password: credentials.password,
        })
        .then(
          () => {
            log.info(`Logged in to Bluesky as ${credentials.identifier}`);
          },
          (error: unknown) => {
            // Allow the next delivery to try again
            login = null;
            throw error;
          }
        );
    }
    return login;
  }

  /**
   * Upload an image from a URL; returns null (post without thumbnail) when it cannot be used
   */
  async function uploadImageFromUrl(imageUrl: string): Promise<BlobRef | null> {
    try {
      const { data, contentType } = await http.fetchBytes(imageUrl);

      if (data.byteLength > MAX_IMAGE_SIZE_BYTES) {
        const sizeMB = (data.byteLength / 1_000_000).toFixed(2);
        log.warn(`Thumbnail too large (${sizeMB}MB). Posting without thumbnail.`);
        return null;
      }

      const uploadResponse = await agent.uploadBlob(data, { encoding: contentType });
      log.debug(`Uploaded image: ${(data.byteLength / 1000).toFixed(0)}KB`);
      return uploadResponse.data.blob;
    } catch (error) {
      log.warn(`Failed to upload thumbnail: ${error}. Posting without thumbnail.`);
      return null;
    }
  }

  return {
    kind: 'bluesky',

    async send(notification) {
      await ensureLoggedIn();

      const { item } = notification;
      const thumb = item.thumbnailUrl ? await uploadImageFromUrl(item.thumbnailUrl) : null;

      // Create rich text to detect mentions, links, etc.
      const rt = new RichText({ text: formatPostText(notification) });
      await rt.detectFacets(agent);

      // Bluesky clients render external embeds with YouTube URLs as playable videos
      const response = await agent.post({
        text: rt.text,
        facets: rt.facets,
        embed: {
          $type: 'app.bsky.embed.external',
          external: {
            uri: item.url,
            title: item.title,
            description: truncateText(item.description ?? '', MAX_DESCRIPTION_LENGTH),
            ...(thumb && { thumb }),
          },
        },
      });

      return { reference: response.uri };
    },
  };
}
