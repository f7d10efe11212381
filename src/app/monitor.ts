/**
 * Poll cycle orchestration
 *
 * Polls every channel, delivers new uploads in order and advances each
 * channel's marker only after its notification went out.
 */

import { sortOldestFirst } from '../entities/activity-item';
import type { Channel, ResolvedChannel } from '../entities/channel';
import type { ChannelState, StateManager } from '../entities/posted-state';
import type { CredentialSet, CredentialSnapshot } from '../features/credential-set';
import {
  deliverInOrder,
  formatNotification,
  type DeliveryResult,
  type DeliveryRetryOptions,
  type Notifier,
} from '../features/notifier';
import {
  YouTubeApiError,
  fetchNewVideos,
  fetchRecentItems,
  type FetchUploadsOptions,
  type YouTubeClient,
} from '../features/youtube-monitor';
import { createErrorReporter, createLogger, type ErrorReporter } from '../shared/lib';

const log = createLogger('monitor');

/** Number of consecutive failures before alerting */
export const ALERT_FAILURE_THRESHOLD = 3;

export interface MonitorOptions {
  /** Uploads fetched per channel per cycle (default 10) */
  maxResults?: number;
  minDurationSeconds?: number;
  includeLivestreams?: boolean;

  /** Announce the newest upload of a channel that has no marker yet (default false) */
  notifyOnFirstRun?: boolean;

  /** Time zone of the upload time in notifications (default UTC) */
  timeZone?: string;

  /** Pause between two deliveries (default 1000ms) */
  deliveryDelayMs?: number;

  retry?: DeliveryRetryOptions;
  sleep?: (ms: number) => Promise<void>;
}

export interface MonitorDeps {
  youtube: YouTubeClient;
  credentials: CredentialSet;
  stateManager: StateManager;
  notifier: Notifier;
  channels: Channel[];
  reporter?: ErrorReporter;
  options?: MonitorOptions;
}

export interface CycleSummary {
  channelsChecked: number;
  channelsFailed: number;
  itemsFound: number;
  itemsDelivered: number;
  /** Items left for the next cycle after a failed delivery */
  itemsFailed: number;

  /** Channels whose marker could not be saved after a delivery */
  stateFailures: number;
}

export interface InitializeResult {
  channelId: string;
  name: string;
  markedAsSeen: number;
  skippedLatest?: string;
  error?: string;
}

export interface ChannelStatus extends Omit<ChannelState, 'postedIds'> {
  channelId: string;
  name?: string;
  postedCount: number;
}

export interface MonitorStatus {
  channels: ChannelStatus[];
  credentials: CredentialSnapshot[];
}

interface ChannelOutcome {
  found: number;
  delivered: number;
  failed: number;
  stateFailed: boolean;
}

const NOTHING_NEW: ChannelOutcome = { found: 0, delivered: 0, failed: 0, stateFailed: false };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create the monitor
 */
export function createMonitor(deps: MonitorDeps) {
  const { youtube, credentials, stateManager, notifier, channels } = deps;
  const reporter = deps.reporter ?? createErrorReporter();
  const {
    maxResults = 10,
    minDurationSeconds,
    includeLivestreams,
    notifyOnFirstRun = false,
    timeZone = 'UTC',
    deliveryDelayMs = 1000,
    retry,
    sleep,
  } = deps.options ?? {};

  const fetchOptions: FetchUploadsOptions = { maxResults, minDurationSeconds, includeLivestreams };

  /** Resolved channels, keyed by the configured ID */
  const resolved = new Map<string, ResolvedChannel>();

  /** Configured IDs that do not exist on YouTube */
  const missing = new Set<string>();

  async function recordPollFailure(channel: ResolvedChannel, error: unknown): Promise<void> {
    log.error(`[${channel.name}] Polling failed: ${errorMessage(error)}`);

    let failureCount: number;
    try {
      failureCount = await stateManager.recordFailure(channel.id);
    } catch (stateError) {
      log.error(`[${channel.name}] Could not record failure:`, stateError);
      reporter.captureException(stateError, { tags: { channel: channel.id, source: 'state' } });
      return;
    }

    // Report to Sentry if we've hit the threshold
    if (failureCount >= ALERT_FAILURE_THRESHOLD) {
      reporter.captureException(error, {
        tags: { source: 'youtube', channel: channel.id },
        extra: { channelName: channel.name, consecutiveFailures: failureCount },
      });
    }
  }

  function reportFailedDelivery(channel: ResolvedChannel, result: DeliveryResult): void {
    reporter.captureMessage(`Failed to deliver notification: ${result.item.title}`, 'warning', {
      tags: { channel: channel.id, notifier: notifier.kind },
      extra: { itemId: result.item.id, error: result.error },
    });
  }

  /**
   * Seed a channel that has no marker with its current uploads, without notifying.
   * A channel with nothing to mark is still recorded as seeded, so its first upload gets announced.
   */
  async function seedChannel(channel: ResolvedChannel): Promise<ChannelOutcome> {
    const items = await fetchRecentItems(youtube, channel, fetchOptions);
    if (items.length === 0) {
      await stateManager.markSeeded(channel.id);
      log.info(`[${channel.name}] First run: no uploads yet, watching from now on`);
      return NOTHING_NEW;
    }

    const marked = await stateManager.markManyAsSeen(channel.id, items);
    log.info(
      `[${channel.name}] First run: marked ${marked} existing uploads as seen, newest is "${items[0].title}"`
    );
    return NOTHING_NEW;
  }

  async function pollChannel(channel: ResolvedChannel): Promise<ChannelOutcome> {
    const seeded = await stateManager.isSeeded(channel.id);

    if (!seeded && !notifyOnFirstRun) {
      const outcome = await seedChannel(channel);
      await stateManager.recordCheck(channel.id);
      await stateManager.resetFailures(channel.id);
      return outcome;
    }

    let newItems = await fetchNewVideos(youtube, stateManager, channel, fetchOptions);
    await stateManager.recordCheck(channel.id);
    await stateManager.resetFailures(channel.id);

    if (!seeded && newItems.length === 0) {
      await stateManager.markSeeded(channel.id);
    }

    if (!seeded && newItems.length > 1) {
      // Only the newest upload is announced for a channel seen for the first time
      newItems = sortOldestFirst(newItems).slice(-1);
    }

    if (newItems.length === 0) {
      log.debug(`[${channel.name}] No new uploads`);
      return NOTHING_NEW;
    }

    log.info(`[${channel.name}] Found ${newItems.length} new uploads`);

    let stateFailed = false;
    const notifications = newItems.map((item) => formatNotification(item, { timeZone }));
    const results = await deliverInOrder(notifier, notifications, {
      retry,
      delayMs: deliveryDelayMs,
      sleep,
      onDelivered: async (result) => {
        log.info(`[${channel.name}] ✓ Delivered: ${result.item.title}`);
        try {
          await stateManager.setLastSeen(channel.id, result.item);
          return true;
        } catch (error) {
          stateFailed = true;
          log.error(`[${channel.name}] Could not save marker after delivering ${result.item.id}:`, error);
          reporter.captureException(error, {
            tags: { channel: channel.id, source: 'state' },
            extra: { itemId: result.item.id },
          });
          return false;
        }
      },
    });

    const delivered = results.filter((result) => result.success).length;
    for (const result of results) {
      if (!result.success) {
        log.error(`[${channel.name}] ✗ Failed to deliver: ${result.item.title} - ${result.error}`);
        reportFailedDelivery(channel, result);
      }
    }

    return { found: newItems.length, delivered, failed: newItems.length - delivered, stateFailed };
  }

  return {
    /**
     * Resolve configured channels once; failures other than "not found" are retried on the next call
     */
    async resolveChannels(): Promise<ResolvedChannel[]> {
      for (const channel of channels) {
        if (resolved.has(channel.id) || missing.has(channel.id)) {
          continue;
        }

        try {
          const result = await youtube.resolveChannel(channel);
          resolved.set(channel.id, result);
          log.info(`Watching ${result.name} (${result.id})`);
        } catch (error) {
          if (error instanceof YouTubeApiError && error.kind === 'not-found') {
            missing.add(channel.id);
            log.error(`Channel ${channel.id} does not exist, leaving it out`);
          } else {
            log.error(`Could not resolve channel ${channel.id}: ${errorMessage(error)}`);
          }
        }
      }

      return channels.flatMap((channel) => {
        const result = resolved.get(channel.id);
        return result ? [result] : [];
      });
    },

    /**
     * Poll every channel once and deliver what is new
     */
    async runCycle(): Promise<CycleSummary> {
      const summary: CycleSummary = {
        channelsChecked: 0,
        channelsFailed: 0,
        itemsFound: 0,
        itemsDelivered: 0,
        itemsFailed: 0,
        stateFailures: 0,
      };

      const watched = await this.resolveChannels();
      if (watched.length === 0) {
        log.warn('No channel could be resolved, nothing to poll');
        return summary;
      }

      for (const channel of watched) {
        summary.channelsChecked++;
        try {
          const outcome = await pollChannel(channel);
          summary.itemsFound += outcome.found;
          summary.itemsDelivered += outcome.delivered;
          summary.itemsFailed += outcome.failed;
          if (outcome.stateFailed) {
            summary.stateFailures++;
          }
        } catch (error) {
          summary.channelsFailed++;
          await recordPollFailure(channel, error);
        }
      }

      log.info(
        `Cycle done: ${summary.channelsChecked - summary.channelsFailed}/${summary.channelsChecked} channels ok, ` +
          `${summary.itemsDelivered}/${summary.itemsFound} notifications delivered`
      );
      return summary;
    },

    /**
     * Mark current uploads as seen without notifying.
     * With `skipLatest` the newest upload of each channel is left out, so it is announced next cycle.
     */
    async initialize(options: { skipLatest?: boolean } = {}): Promise<InitializeResult[]> {
      const { skipLatest = false } = options;
      const results: InitializeResult[] = [];

      for (const channel of await this.resolveChannels()) {
        const result: InitializeResult = { channelId: channel.id, name: channel.name, markedAsSeen: 0 };

        try {
          const items = await fetchRecentItems(youtube, channel, fetchOptions);

          let toMark = items;
          if (skipLatest && items.length > 0) {
            const [skipped] = items;
            toMark = items.slice(1);
            result.skippedLatest = `${skipped.title} (${skipped.id})`;
            log.info(`[${channel.name}] Skipping latest upload for testing: ${skipped.title}`);
          }

          if (toMark.length > 0) {
            result.markedAsSeen = await stateManager.markManyAsSeen(channel.id, toMark);
          } else if (skipLatest && items.length > 0) {
            // Seed just before the skipped upload so the next cycle announces it
            const justBefore = new Date(items[0].publishedAt.getTime() - 1);
            await stateManager.markSeeded(channel.id, justBefore);
          } else {
            await stateManager.markSeeded(channel.id);
          }
          log.info(`[${channel.name}] Marked ${result.markedAsSeen} uploads as seen`);
        } catch (error) {
          result.error = errorMessage(error);
          log.error(`[${channel.name}] Initialization failed: ${result.error}`);
        }

        results.push(result);
      }

      return results;
    },

    /**
     * Stored state of every channel plus the key pool, without calling the API
     */
    async status(): Promise<MonitorStatus> {
      const names = new Map<string, string>();
      for (const channel of channels) {
        if (channel.name) names.set(channel.id, channel.name);
      }
      for (const channel of resolved.values()) {
        names.set(channel.id, channel.name);
      }

      const channelStatuses: ChannelStatus[] = [];
      for (const channelId of await stateManager.listChannels()) {
        const { postedIds, ...state } = await stateManager.getChannelState(channelId);
        channelStatuses.push({
          channelId,
          name: names.get(channelId),
          postedCount: postedIds.length,
          ...state,
        });
      }

      return { channels: channelStatuses, credentials: credentials.snapshot() };
    },
  };
}

/**
 * Type for the monitor
 */
export type Monitor = ReturnType<typeof createMonitor>;
