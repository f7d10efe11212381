import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, parseBoolean, parseNonNegativeInt, type Env } from '../config';

const BASE_ENV: Env = {
  YOUTUBE_API_KEYS: 'test-key-one, test-key-two',
  YOUTUBE_CHANNEL_IDS: 'UCabc=Some Channel,@other',
  NOTIFY_WEBHOOK_URL: 'https://hooks.test/youtube',
};

const noFiles = (file: string): string => {
  throw new Error(`ENOENT: no such file, open '${file}'`);
};

function load(overrides: Env = {}, readFile: (file: string) => string = noFiles) {
  return loadConfig({ ...BASE_ENV, ...overrides }, { readFile });
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(load()).toEqual({
      apiKeys: ['test-key-one', 'test-key-two'],
      channels: [{ id: 'UCabc', name: 'Some Channel' }, { id: '@other' }],
      statePath: 'data/bsn.db',
      pollIntervalSeconds: undefined,
      maxResultsPerChannel: 10,
      minVideoDurationSeconds: 60,
      includeLivestreams: false,
      notifyOnFirstRun: false,
      quotaPerKey: 10_000,
      notifier: { kind: 'webhook', url: 'https://hooks.test/youtube' },
      timeZone: 'UTC',
      sentryDsn: undefined,
      logLevel: 'info',
    });
  });

  it('accepts a single YOUTUBE_API_KEY and removes duplicate keys', () => {
    expect(load({ YOUTUBE_API_KEYS: undefined, YOUTUBE_API_KEY: 'test-key-one' }).apiKeys).toEqual([
      'test-key-one',
    ]);
    expect(load({ YOUTUBE_API_KEYS: 'k1,k2,k1' }).apiKeys).toEqual(['k1', 'k2']);
  });

  it('requires at least one key', () => {
    expect(() => load({ YOUTUBE_API_KEYS: ' , ' })).toThrow(ConfigError);
  });

  it('requires at least one channel', () => {
    expect(() => load({ YOUTUBE_CHANNEL_IDS: '' })).toThrow(
      'At least one channel is required (YOUTUBE_CHANNEL_IDS or SUBSCRIPTIONS_CSV)'
    );
  });

  it('merges channels from a subscriptions export', () => {
    const csv = 'Channel Id,Channel Url,Channel Title\nUCabc,u,Other Name\nUCnew,u,New Channel\n';
    const config = load({ SUBSCRIPTIONS_CSV: 'subs.csv' }, () => csv);

    expect(config.channels).toEqual([
      { id: 'UCabc', name: 'Some Channel' },
      { id: '@other' },
      { id: 'UCnew', name: 'New Channel' },
    ]);
  });

  it('reports an unreadable subscriptions export', () => {
    expect(() => load({ SUBSCRIPTIONS_CSV: 'missing.csv' })).toThrow(
      "Could not read SUBSCRIPTIONS_CSV (missing.csv): ENOENT: no such file, open 'missing.csv'"
    );
  });

  it('builds the state path from DATA_DIR unless STATE_PATH is set', () => {
    expect(load({ DATA_DIR: '/var/lib/bsn' }).statePath).toBe('/var/lib/bsn/bsn.db');
    expect(load({ DATA_DIR: '/var/lib/bsn', STATE_PATH: '/tmp/state.db' }).statePath).toBe('/tmp/state.db');
  });

  it('parses polling options', () => {
    const config = load({
      POLL_INTERVAL_SECONDS: '300',
      MAX_RESULTS_PER_CHANNEL: '25',
      MIN_VIDEO_DURATION_SECONDS: '0',
      INCLUDE_LIVESTREAMS: 'yes',
      NOTIFY_ON_FIRST_RUN: '1',
      YOUTUBE_QUOTA_PER_KEY: '5000',
    });

    expect(config).toMatchObject({
      pollIntervalSeconds: 300,
      maxResultsPerChannel: 25,
      minVideoDurationSeconds: 0,
      includeLivestreams: true,
      notifyOnFirstRun: true,
      quotaPerKey: 5000,
    });
  });

  it('rejects invalid numbers', () => {
    expect(() => load({ POLL_INTERVAL_SECONDS: '0' })).toThrow('POLL_INTERVAL_SECONDS must be greater than 0');
    expect(() => load({ MAX_RESULTS_PER_CHANNEL: '51' })).toThrow(
      'MAX_RESULTS_PER_CHANNEL must be between 1 and 50'
    );
    expect(() => load({ MIN_VIDEO_DURATION_SECONDS: '-5' })).toThrow(
      'MIN_VIDEO_DURATION_SECONDS must be a non-negative integer, got "-5"'
    );
  });

  it('requires a webhook URL for the webhook notifier', () => {
    expect(() => load({ NOTIFY_WEBHOOK_URL: undefined })).toThrow(
      'NOTIFY_WEBHOOK_URL is required when NOTIFIER=webhook'
    );
    expect(() => load({ NOTIFY_WEBHOOK_URL: 'not a url' })).toThrow(
      'NOTIFY_WEBHOOK_URL is not a valid URL: not a url'
    );
  });

  it('requires Bluesky credentials for the Bluesky notifier', () => {
    expect(() => load({ NOTIFIER: 'bluesky', BLUESKY_IDENTIFIER: 'someone.test' })).toThrow(
      'BLUESKY_PASSWORD is required when NOTIFIER=bluesky'
    );

    expect(
      load({
        NOTIFIER: 'bluesky',
        BLUESKY_IDENTIFIER: 'someone.test',
        BLUESKY_PASSWORD: 'test-secret',
        BLUESKY_SERVICE: 'https://pds.test',
      }).notifier
    ).toEqual({
      kind: 'bluesky',
      credentials: { identifier: 'someone.test', password: 'test-secret' },
      service: 'https://pds.test',
    });
  });

  it('accepts the log notifier without further settings', () => {
    expect(load({ NOTIFIER: 'LOG', NOTIFY_WEBHOOK_URL: undefined }).notifier).toEqual({ kind: 'log' });
  });

  it('rejects an unknown notifier', () => {
    expect(() => load({ NOTIFIER: 'email' })).toThrow(
      'NOTIFIER must be one of webhook, bluesky, log, got "email"'
    );
  });

  it('validates the time zone and log level', () => {
    expect(load({ NOTIFY_TIMEZONE: 'Europe/London' }).timeZone).toBe('Europe/London');
    expect(() => load({ NOTIFY_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'NOTIFY_TIMEZONE is not a known time zone: Mars/Olympus'
    );
    expect(load({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(() => load({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});

describe('parseBoolean', () => {
  it('accepts true/false, 1/0 and yes/no', () => {
    expect(parseBoolean('TRUE', 'X', false)).toBe(true);
    expect(parseBoolean('no', 'X', true)).toBe(false);
    expect(parseBoolean('0', 'X', true)).toBe(false);
    expect(parseBoolean(undefined, 'X', true)).toBe(true);
    expect(() => parseBoolean('maybe', 'X', false)).toThrow('X must be true or false, got "maybe"');
  });
});

describe('parseNonNegativeInt', () => {
  it('parses digits only', () => {
    expect(parseNonNegativeInt('42', 'N')).toBe(42);
    expect(parseNonNegativeInt('', 'N')).toBeUndefined();
    expect(parseNonNegativeInt(undefined, 'N', 7)).toBe(7);
    expect(() => parseNonNegativeInt('1.5', 'N')).toThrow(ConfigError);
  });
});
