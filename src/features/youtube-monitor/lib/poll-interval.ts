/**
 * Poll interval derived from the available quota
 */

import { DEFAULT_QUOTA_PER_KEY } from '../../../shared/config';

const SECONDS_PER_DAY = 24 * 60 * 60;

/** Quota units spent per channel per cycle (playlistItems + videos) */
export const UNITS_PER_CHANNEL = 2;

/** Never poll more often than this */
export const MIN_POLL_INTERVAL_SECONDS = 60;

export interface PollIntervalInput {
  channelCount: number;
  keyCount: number;
  quotaPerKey?: number;
  unitsPerChannel?: number;
}

/**
 * Seconds between cycles so that a day of polling fits in the combined daily quota
 */
export function calculatePollInterval(input: PollIntervalInput): number {
  const {
    channelCount,
    keyCount,
    quotaPerKey = DEFAULT_QUOTA_PER_KEY,
    unitsPerChannel = UNITS_PER_CHANNEL,
  } = input;

  const unitsPerCycle = Math.max(channelCount, 1) * unitsPerChannel;
  const cyclesPerDay = Math.floor((keyCount * quotaPerKey) / unitsPerCycle);

  if (cyclesPerDay <= 0) {
    return SECONDS_PER_DAY;
  }

  return Math.max(Math.ceil(SECONDS_PER_DAY / cyclesPerDay), MIN_POLL_INTERVAL_SECONDS);
}
