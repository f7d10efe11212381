/**
 * Constants shared across features
 */

/**
 * YouTube Data API v3 base URL
 */
export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3/';

/**
 * Base URL for watch links
 */
export const YOUTUBE_WATCH_URL = 'https://www.youtube.com/watch';

/**
 * Daily quota per API key, in units
 */
export const DEFAULT_QUOTA_PER_KEY = 10_000;

/**
 * YouTube quota resets at midnight Pacific time
 */
export const QUOTA_RESET_TIMEZONE = 'America/Los_Angeles';

/**
 * Well-known public channel used to check that an API key works
 */
export const HEALTHCHECK_CHANNEL_ID = 'UC_x5XG1OV2P6uZZ5FSM9Ttw';
