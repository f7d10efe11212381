/**
 * Environment configuration
 *
 * Everything the service reads from the environment is parsed and validated here
 * into a typed AppConfig. Invalid configuration is fatal at startup.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { mergeChannels, parseChannelList, parseSubscriptionsCsv, type Channel } from '../entities/channel';
import type { NotifierConfig, NotifierKind } from '../features/notifier';
import { DEFAULT_QUOTA_PER_KEY } from '../shared/config';
import { isLogLevel, type LogLevel } from '../shared/lib';

/** File name of the state database inside DATA_DIR */
export const STATE_FILE_NAME = 'bsn.db';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  apiKeys: string[];
  channels: Channel[];
  statePath: string;

  /** Fixed interval; derived from the quota when undefined */
  pollIntervalSeconds?: number;
  maxResultsPerChannel: number;
  minVideoDurationSeconds: number;
  includeLivestreams: boolean;
  notifyOnFirstRun: boolean;
  quotaPerKey: number;

  notifier: NotifierConfig;
  timeZone: string;

  sentryDsn?: string;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

const NOTIFIER_KINDS: readonly NotifierKind[] = ['webhook', 'bluesky', 'log'];

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string, reason: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new ConfigError(`${name} is required ${reason}`);
  }
  return value;
}

/**
 * Parse a boolean flag: true/false, 1/0, yes/no (case-insensitive)
 */
export function parseBoolean(value: string | undefined, name: string, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be true or false, got "${value}"`);
  }
}

/**
 * Parse a non-negative integer
 */
export function parseNonNegativeInt(value: string | undefined, name: string): number | undefined;
export function parseNonNegativeInt(value: string | undefined, name: string, fallback: number): number;
export function parseNonNegativeInt(
  value: string | undefined,
  name: string,
  fallback?: number
): number | undefined {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

function isNotifierKind(value: string): value is NotifierKind {
  return NOTIFIER_KINDS.some((kind) => kind === value);
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function loadNotifierConfig(env: Env): NotifierConfig {
  const kind = (optional(env, 'NOTIFIER') ?? 'webhook').toLowerCase();
  if (!isNotifierKind(kind)) {
    throw new ConfigError(`NOTIFIER must be one of ${NOTIFIER_KINDS.join(', ')}, got "${kind}"`);
  }

  switch (kind) {
    case 'webhook': {
      const url = required(env, 'NOTIFY_WEBHOOK_URL', 'when NOTIFIER=webhook');
      try {
        new URL(url);
      } catch {
        throw new ConfigError(`NOTIFY_WEBHOOK_URL is not a valid URL: ${url}`);
      }
      return { kind, url };
    }
    case 'bluesky':
      return {
        kind,
        credentials: {
          identifier: required(env, 'BLUESKY_IDENTIFIER', 'when NOTIFIER=bluesky'),
          password: required(env, 'BLUESKY_PASSWORD', 'when NOTIFIER=bluesky'),
        },
        service: optional(env, 'BLUESKY_SERVICE'),
      };
    case 'log':
      return { kind };
  }
}

function loadChannels(env: Env, readFile: (file: string) => string): Channel[] {
  const fromList = parseChannelList(env.YOUTUBE_CHANNEL_IDS ?? '');

  const csvPath = optional(env, 'SUBSCRIPTIONS_CSV');
  let fromCsv: Channel[] = [];
  if (csvPath) {
    let content: string;
    try {
      content = readFile(csvPath);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not read SUBSCRIPTIONS_CSV (${csvPath}): ${detail}`);
    }
    try {
      fromCsv = parseSubscriptionsCsv(content);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid SUBSCRIPTIONS_CSV (${csvPath}): ${detail}`);
    }
  }

  const channels = mergeChannels(fromList, fromCsv);
  if (channels.length === 0) {
    throw new ConfigError('At least one channel is required (YOUTUBE_CHANNEL_IDS or SUBSCRIPTIONS_CSV)');
  }
  return channels;
}

function loadApiKeys(env: Env): string[] {
  const raw = optional(env, 'YOUTUBE_API_KEYS') ?? optional(env, 'YOUTUBE_API_KEY') ?? '';
  const keys = [
    ...new Set(
      raw
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    ),
  ];
  if (keys.length === 0) {
    throw new ConfigError('At least one API key is required (YOUTUBE_API_KEYS)');
  }
  return keys;
}

/**
 * Load and validate configuration from an environment object
 */
export function loadConfig(
  env: Env = process.env,
  options: { readFile?: (file: string) => string } = {}
): AppConfig {
  const readFile = options.readFile ?? ((file: string) => readFileSync(file, 'utf8'));

  const dataDir = optional(env, 'DATA_DIR') ?? './data';
  const statePath = optional(env, 'STATE_PATH') ?? path.join(dataDir, STATE_FILE_NAME);

  const pollIntervalSeconds = parseNonNegativeInt(env.POLL_INTERVAL_SECONDS, 'POLL_INTERVAL_SECONDS');
  if (pollIntervalSeconds === 0) {
    throw new ConfigError('POLL_INTERVAL_SECONDS must be greater than 0');
  }

  const maxResultsPerChannel = parseNonNegativeInt(
    env.MAX_RESULTS_PER_CHANNEL,
    'MAX_RESULTS_PER_CHANNEL',
    10
  );
  if (maxResultsPerChannel < 1 || maxResultsPerChannel > 50) {
    throw new ConfigError('MAX_RESULTS_PER_CHANNEL must be between 1 and 50');
  }

  const quotaPerKey = parseNonNegativeInt(
    env.YOUTUBE_QUOTA_PER_KEY,
    'YOUTUBE_QUOTA_PER_KEY',
    DEFAULT_QUOTA_PER_KEY
  );
  if (quotaPerKey === 0) {
    throw new ConfigError('YOUTUBE_QUOTA_PER_KEY must be greater than 0');
  }

  const timeZone = optional(env, 'NOTIFY_TIMEZONE') ?? 'UTC';
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`NOTIFY_TIMEZONE is not a known time zone: ${timeZone}`);
  }

  const logLevel = (optional(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`);
  }

  return {
    apiKeys: loadApiKeys(env),
    channels: loadChannels(env, readFile),
    statePath,
    pollIntervalSeconds,
    maxResultsPerChannel,
    minVideoDurationSeconds: parseNonNegativeInt(
      env.MIN_VIDEO_DURATION_SECONDS,
      'MIN_VIDEO_DURATION_SECONDS',
      60
    ),
    includeLivestreams: parseBoolean(env.INCLUDE_LIVESTREAMS, 'INCLUDE_LIVESTREAMS', false),
    notifyOnFirstRun: parseBoolean(env.NOTIFY_ON_FIRST_RUN, 'NOTIFY_ON_FIRST_RUN', false),
    quotaPerKey,
    notifier: loadNotifierConfig(env),
    timeZone,
    sentryDsn: optional(env, 'SENTRY_DSN'),
    logLevel,
  };
}
