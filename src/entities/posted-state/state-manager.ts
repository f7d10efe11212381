/**
 * State manager for persistent per-channel state
 *
 * Each channel is stored under its own key, so a write only touches one channel.
 * Writes for the same channel are serialized through a promise chain.
 */

import type { KeyValueStore } from '../../shared/storage';
import { createLogger } from '../../shared/lib';
import { compareItems, isAfter, newestItem, type ItemPosition } from '../activity-item';
import { type ChannelState, type LastSeenMarker, DEFAULT_CHANNEL_STATE } from './types';

/** Key prefix for channel state entries */
const KEY_PREFIX = 'channel-state:';

/** Maximum number of posted IDs to keep per channel (to prevent unbounded growth) */
const MAX_POSTED_IDS = 1000;

const log = createLogger('state');

function stateKey(channelId: string): string {
  return `${KEY_PREFIX}${channelId}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}

function parseMarker(value: unknown): LastSeenMarker | null {
  if (!isRecord(value) || typeof value.itemId !== 'string' || !isIsoDate(value.publishedAt)) {
    return null;
  }
  return { itemId: value.itemId, publishedAt: value.publishedAt };
}

/**
 * Parse a stored state value, falling back to defaults for missing or malformed fields
 */
export function parseChannelState(raw: string): ChannelState {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    log.warn('Stored channel state is not valid JSON, starting fresh:', error);
    return structuredClone(DEFAULT_CHANNEL_STATE);
  }

  if (!isRecord(value)) {
    return structuredClone(DEFAULT_CHANNEL_STATE);
  }

  return {
    lastSeen: parseMarker(value.lastSeen),
    seededAt: isIsoDate(value.seededAt) ? value.seededAt : null,
    postedIds: Array.isArray(value.postedIds)
      ? value.postedIds.filter((id): id is string => typeof id === 'string')
      : [],
    lastCheckedAt: isIsoDate(value.lastCheckedAt)
      ? value.lastCheckedAt
      : DEFAULT_CHANNEL_STATE.lastCheckedAt,
    lastUpdatedAt: isIsoDate(value.lastUpdatedAt)
      ? value.lastUpdatedAt
      : DEFAULT_CHANNEL_STATE.lastUpdatedAt,
    consecutiveFailures:
      typeof value.consecutiveFailures === 'number' && value.consecutiveFailures >= 0
        ? value.consecutiveFailures
        : 0,
  };
}

/**
 * Position of the marker in the item ordering
 */
export function markerPosition(marker: LastSeenMarker): ItemPosition {
  return { id: marker.itemId, publishedAt: new Date(marker.publishedAt) };
}

/**
 * Create a state manager on top of a key/value store
 */
export function createStateManager(store: KeyValueStore, options: { now?: () => Date } = {}) {
  const now = options.now ?? (() => new Date());

  /** Tail of the pending write chain per channel */
  const locks = new Map<string, Promise<void>>();

  function withChannelLock<T>(channelId: string, fn: () => Promise<T>): Promise<T> {
    const previous = locks.get(channelId) ?? Promise.resolve();
    const run = previous.then(fn);
    locks.set(
      channelId,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }

  async function read(channelId: string): Promise<ChannelState> {
    const raw = await store.get(stateKey(channelId));
    return raw === null ? structuredClone(DEFAULT_CHANNEL_STATE) : parseChannelState(raw);
  }

  async function write(channelId: string, state: ChannelState): Promise<void> {
    await store.put(stateKey(channelId), JSON.stringify(state));
  }

  /**
   * Read-modify-write under the channel lock; the write is skipped when `mutate` reports no change
   */
  function update<T>(
    channelId: string,
    mutate: (state: ChannelState) => { changed: boolean; result: T }
  ): Promise<T> {
    return withChannelLock(channelId, async () => {
      const state = await read(channelId);
      const { changed, result } = mutate(state);
      if (changed) {
        await write(channelId, state);
      }
      return result;
    });
  }

  return {
    /**
     * Get the stored state for a channel (defaults when never polled)
     */
    async getChannelState(channelId: string): Promise<ChannelState> {
      return read(channelId);
    },

    /**
     * Get the newest announced item for a channel
     */
    async getLastSeen(channelId: string): Promise<LastSeenMarker | null> {
      const state = await read(channelId);
      return state.lastSeen;
    },

    /**
     * Advance the marker to `item` after a successful notification.
     *
     * The marker never moves backwards: returns false (and changes nothing)
     * when the item is not strictly newer than the current marker.
     */
    setLastSeen(channelId: string, item: ItemPosition): Promise<boolean> {
      return update(channelId, (state) => {
        if (state.lastSeen && !isAfter(item, markerPosition(state.lastSeen))) {
          log.warn(
            `[${channelId}] Refusing to move marker back from ${state.lastSeen.itemId} to ${item.id}`
          );
          return { changed: false, result: false };
        }

        state.lastSeen = { itemId: item.id, publishedAt: item.publishedAt.toISOString() };
        state.postedIds = [item.id, ...state.postedIds.filter((id) => id !== item.id)].slice(
          0,
          MAX_POSTED_IDS
        );
        state.lastUpdatedAt = now().toISOString();
        state.consecutiveFailures = 0;
        return { changed: true, result: true };
      });
    },

    /**
     * Mark several items as seen without notifying (used to seed state).
     * Returns the number of IDs added.
     */
    markManyAsSeen(channelId: string, items: ItemPosition[]): Promise<number> {
      return update(channelId, (state) => {
        const known = new Set(state.postedIds);
        const newest = newestItem(items);
        const added = [...items]
          .sort((a, b) => compareItems(b, a))
          .map((item) => item.id)
          .filter((id) => !known.has(id));

        const advances =
          newest !== undefined &&
          (!state.lastSeen || isAfter(newest, markerPosition(state.lastSeen)));

        if (added.length === 0 && !advances) {
          return { changed: false, result: 0 };
        }

        if (advances && newest) {
          state.lastSeen = { itemId: newest.id, publishedAt: newest.publishedAt.toISOString() };
        }
        state.postedIds = [...added, ...state.postedIds].slice(0, MAX_POSTED_IDS);
        state.lastUpdatedAt = now().toISOString();
        return { changed: true, result: added.length };
      });
    },

    /**
     * Record that a channel without a marker has been seeded at `at`.
     * Does nothing once the channel has a marker.
     */
    markSeeded(channelId: string, at: Date = now()): Promise<boolean> {
      return update(channelId, (state) => {
        if (state.lastSeen) {
          return { changed: false, result: false };
        }
        state.seededAt = at.toISOString();
        state.lastUpdatedAt = now().toISOString();
        return { changed: true, result: true };
      });
    },

    /**
     * Whether the channel has been seeded, either with a marker or an empty seed
     */
    async isSeeded(channelId: string): Promise<boolean> {
      const state = await read(channelId);
      return state.lastSeen !== null || state.seededAt !== null;
    },

    /**
     * Filter out items at or before the marker, and items already posted.
     * Without a marker, items published at or before `seededAt` are not new either.
     */
    async filterNewItems<T extends ItemPosition>(channelId: string, items: T[]): Promise<T[]> {
      const state = await read(channelId);
      const postedSet = new Set(state.postedIds);
      const marker = state.lastSeen ? markerPosition(state.lastSeen) : null;
      const seededAt = marker === null && state.seededAt ? Date.parse(state.seededAt) : null;

      log.debug(
        `[${channelId}] Checking ${items.length} items against marker ${state.lastSeen?.itemId ?? '(none)'} and ${postedSet.size} posted IDs`
      );

      return items.filter((item) => {
        const isNew =
          !postedSet.has(item.id) &&
          (marker === null || isAfter(item, marker)) &&
          (seededAt === null || item.publishedAt.getTime() > seededAt);
        log.debug(`  ${isNew ? '+' : '-'} ${item.id}: ${isNew ? 'NEW' : 'already seen'}`);
        return isNew;
      });
    },

    /**
     * Record that the channel was just polled
     */
    recordCheck(channelId: string): Promise<void> {
      return update(channelId, (state) => {
        state.lastCheckedAt = now().toISOString();
        return { changed: true, result: undefined };
      });
    },

    /**
     * Record a failure for a channel
     * Returns the new failure count
     */
    recordFailure(channelId: string): Promise<number> {
      return update(channelId, (state) => {
        state.consecutiveFailures += 1;
        state.lastUpdatedAt = now().toISOString();
        return { changed: true, result: state.consecutiveFailures };
      });
    },

    /**
     * Reset failure count for a channel
     * Only writes if the count was actually non-zero
     */
    resetFailures(channelId: string): Promise<void> {
      return update(channelId, (state) => {
        if (state.consecutiveFailures === 0) {
          return { changed: false, result: undefined };
        }
        state.consecutiveFailures = 0;
        state.lastUpdatedAt = now().toISOString();
        return { changed: true, result: undefined };
      });
    },

    /**
     * IDs of all channels that have stored state
     */
    async listChannels(): Promise<string[]> {
      const keys = await store.list(KEY_PREFIX);
      return keys.map((key) => key.slice(KEY_PREFIX.length));
    },

    /**
     * Forget everything about one channel
     */
    clearChannel(channelId: string): Promise<void> {
      return withChannelLock(channelId, () => store.delete(stateKey(channelId)));
    },

    /**
     * Clear all state - useful for resetting after config changes
     */
    async clearAllState(): Promise<number> {
      const channelIds = await this.listChannels();
      for (const channelId of channelIds) {
        await this.clearChannel(channelId);
      }
      return channelIds.length;
    },
  };
}

/**
 * Type for the state manager
 */
export type StateManager = ReturnType<typeof createStateManager>;
