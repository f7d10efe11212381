/**
 * Posted state types for persistent storage
 */

/**
 * Newest item already announced for a channel
 */
export interface LastSeenMarker {
  /** Item (video) ID */
  itemId: string;

  /** Publication timestamp (ISO 8601) */
  publishedAt: string;
}

/**
 * State stored for each channel
 */
export interface ChannelState {
  /** Newest announced item, null until the channel has been seeded */
  lastSeen: LastSeenMarker | null;

  /**
   * When a channel with nothing to mark was first seeded. Until a marker exists,
   * only items published after this instant are new.
   */
  seededAt: string | null;

  /** IDs of recently announced items, newest first */
  postedIds: string[];

  /** Timestamp of the last poll attempt */
  lastCheckedAt: string;

  /** Timestamp of last state update (only when content was posted or errors occurred) */
  lastUpdatedAt: string;

  /** Count of consecutive failures */
  consecutiveFailures: number;
}

/**
 * Default state for a channel that has never been polled
 */
export const DEFAULT_CHANNEL_STATE: ChannelState = {
  lastSeen: null,
  seededAt: null,
  postedIds: [],
  lastCheckedAt: new Date(0).toISOString(),
  lastUpdatedAt: new Date(0).toISOString(),
  consecutiveFailures: 0,
};
