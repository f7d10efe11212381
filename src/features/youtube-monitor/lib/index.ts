export { buildVideoUrl, videoToActivityItem, fetchRecentItems, fetchNewVideos } from './video-detector';
export {
  calculatePollInterval,
  UNITS_PER_CHANNEL,
  MIN_POLL_INTERVAL_SECONDS,
  type PollIntervalInput,
} from './poll-interval';
