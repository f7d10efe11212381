/**
 * Daily quota window calculations
 *
 * The YouTube quota resets at midnight Pacific time. All results are UTC instants.
 */

import { QUOTA_RESET_TIMEZONE } from '../../../shared/config';

const DAY_MS = 24 * 60 * 60 * 1000;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock reading of an instant in a time zone
 */
function wallClock(instant: Date, timeZone: string): WallClock {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

function wallClockAsUtcMs(clock: WallClock): number {
  return Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second);
}

/**
 * Offset of the time zone from UTC at the given instant, in milliseconds
 * (negative west of Greenwich)
 */
export function timeZoneOffsetMs(instant: Date, timeZone: string): number {
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return wallClockAsUtcMs(wallClock(instant, timeZone)) - wholeSeconds;
}

/**
 * Next daily reset after `now`, as a UTC instant
 */
export function nextDailyResetUtc(
  now: Date,
  options: { timeZone?: string; resetHour?: number; resetMinute?: number } = {}
): Date {
  const { timeZone = QUOTA_RESET_TIMEZONE, resetHour = 0, resetMinute = 0 } = options;

  const local = wallClock(now, timeZone);
  const nowLocalMs = wallClockAsUtcMs(local);

  let candidateLocalMs = Date.UTC(local.year, local.month - 1, local.day, resetHour, resetMinute);
  if (candidateLocalMs <= nowLocalMs) {
    candidateLocalMs += DAY_MS;
  }

  // Two passes so the offset used is the one in effect at the reset itself (DST changes)
  let utcMs = candidateLocalMs - timeZoneOffsetMs(new Date(candidateLocalMs), timeZone);
  utcMs = candidateLocalMs - timeZoneOffsetMs(new Date(utcMs), timeZone);

  return new Date(utcMs);
}
