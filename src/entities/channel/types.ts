/**
 * Channel types
 */

/**
 * A channel as configured by the user
 */
export interface Channel {
  /** Channel ID (UC...) or handle (@name) */
  id: string;

  /** Human-readable name; overrides the title reported by the API */
  name?: string;
}

/**
 * A channel after it has been looked up on the API
 */
export interface ResolvedChannel {
  /** Canonical channel ID (UC...) */
  id: string;

  /** Display name */
  name: string;

  /** Playlist holding the channel's uploads */
  uploadsPlaylistId: string;
}
