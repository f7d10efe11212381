#!/usr/bin/env node
/**
 * Better Social Notifications
 *
 * Watches YouTube channels for new uploads and sends an alert for each one.
 *
 * Usage: bsn [run|once|initialize|status|clear|healthcheck] [--skip-latest]
 */

import { parseArgs } from 'node:util';
import { config as loadDotenv } from 'dotenv';
import { createStateManager } from '../entities/posted-state';
import { createCredentialSet, createQuotaLedger, type CredentialSet } from '../features/credential-set';
import { createNotifier } from '../features/notifier';
import { calculatePollInterval, createYouTubeClient, type YouTubeClient } from '../features/youtube-monitor';
import { createSqliteStore } from '../shared/storage';
import { createErrorReporter, createLogger, setLogLevel, sleep, type ErrorReporter } from '../shared/lib';
import { ConfigError, loadConfig, type AppConfig, type Env } from './config';
import { createMonitor } from './monitor';

const log = createLogger('app');

const COMMANDS = ['run', 'once', 'initialize', 'status', 'clear', 'healthcheck'] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: bsn [${COMMANDS.join('|')}] [--skip-latest]

  run          poll forever (default)
  once         run a single poll cycle and exit
  initialize   mark current uploads as seen without notifying
               (--skip-latest leaves the newest upload of each channel out)
  status       print stored channel state and key status
  clear        delete all stored state
  healthcheck  exit 0 when at least one API key works`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Check every key once at startup; rejected keys are disabled before the first cycle
 */
async function validateKeys(
  config: AppConfig,
  youtube: YouTubeClient,
  credentials: CredentialSet
): Promise<number> {
  let valid = 0;

  for (const key of config.apiKeys) {
    const result = await youtube.checkKey(key);
    if (result === 'invalid') {
      credentials.markInvalid(key);
    } else if (result === 'exhausted') {
      credentials.markExhausted(key);
    } else if (result === 'valid') {
      valid++;
    }
  }

  log.info(`${valid}/${config.apiKeys.length} API keys verified`);
  return valid;
}

/**
 * Poll until SIGINT/SIGTERM; the running cycle always finishes first
 */
async function pollForever(
  monitor: ReturnType<typeof createMonitor>,
  intervalSeconds: number,
  reporter: ErrorReporter
): Promise<void> {
  const controller = new AbortController();

  const stop = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down after the current cycle`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  log.info(`Polling every ${intervalSeconds}s`);

  while (!controller.signal.aborted) {
    try {
      await monitor.runCycle();
    } catch (error) {
      log.error('Error in poll cycle:', error);
      reporter.captureException(error, { tags: { source: 'cycle' } });
    }

    if (controller.signal.aborted) {
      break;
    }
    await sleep(intervalSeconds * 1000, controller.signal);
  }
}

export interface CliDeps {
  /** Environment to read; `.env` is only loaded when this is left out */
  env?: Env;

  /** fetch used for YouTube API calls */
  fetch?: typeof fetch;
}

async function execute(
  command: Command,
  config: AppConfig,
  skipLatest: boolean,
  deps: CliDeps
): Promise<number> {
  const reporter = createErrorReporter({ dsn: config.sentryDsn });
  const store = createSqliteStore(config.statePath);
  const quotaLedger = createQuotaLedger(store);

  try {
    const stateManager = createStateManager(store);

    if (command === 'clear') {
      const cleared = await stateManager.clearAllState();
      log.info(`All state cleared (${cleared} channels)`);
      return 0;
    }

    const credentials = createCredentialSet(config.apiKeys, {
      quotaPerKey: config.quotaPerKey,
      initialUsage: await quotaLedger.load(config.apiKeys),
      onUsageChange: quotaLedger.record,
    });
    const youtube = createYouTubeClient(credentials, { fetch: deps.fetch });
    const monitor = createMonitor({
      youtube,
      credentials,
      stateManager,
      notifier: createNotifier(config.notifier),
      channels: config.channels,
      reporter,
      options: {
        maxResults: config.maxResultsPerChannel,
        minDurationSeconds: config.minVideoDurationSeconds,
        includeLivestreams: config.includeLivestreams,
        notifyOnFirstRun: config.notifyOnFirstRun,
        timeZone: config.timeZone,
      },
    });

    if (command === 'status') {
      console.log(JSON.stringify(await monitor.status(), null, 2));
      return 0;
    }

    const validKeys = await validateKeys(config, youtube, credentials);

    if (command === 'healthcheck') {
      return validKeys > 0 ? 0 : 1;
    }

    if (!credentials.hasUsable()) {
      log.error('None of the configured API keys can be used');
      reporter.captureMessage('No usable YouTube API key at startup', 'error', {
        extra: { credentials: credentials.snapshot() },
      });
      return 1;
    }

    if (command === 'initialize') {
      if (skipLatest) {
        log.info('Initialize called with --skip-latest (testing mode)');
      }
      const results = await monitor.initialize({ skipLatest });
      console.log(JSON.stringify(results, null, 2));
      return results.some((result) => result.error) ? 1 : 0;
    }

    if (command === 'once') {
      const summary = await monitor.runCycle();
      console.log(JSON.stringify(summary, null, 2));
      const failed = summary.channelsFailed + summary.itemsFailed + summary.stateFailures;
      return failed > 0 ? 1 : 0;
    }

    const intervalSeconds =
      config.pollIntervalSeconds ??
      calculatePollInterval({
        channelCount: config.channels.length,
        keyCount: credentials.size,
        quotaPerKey: config.quotaPerKey,
      });

    await pollForever(monitor, intervalSeconds, reporter);
    return 0;
  } catch (error) {
    log.error('Fatal error:', error);
    reporter.captureException(error, { tags: { source: 'fatal', command } });
    return 1;
  } finally {
    await quotaLedger.flush();
    store.close();
    await reporter.flush();
  }
}

/**
 * CLI entrypoint; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  let values: { 'skip-latest'?: boolean; help?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      options: {
        'skip-latest': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
    }));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const command = positionals[0] ?? 'run';
  if (!isCommand(command) || positionals.length > 1) {
    console.error(USAGE);
    return 2;
  }

  if (!deps.env) {
    loadDotenv();
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  setLogLevel(config.logLevel);

  return execute(command, config, values['skip-latest'] ?? false, deps);
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection:', reason);
  });

  process.on('uncaughtException', (error) => {
    log.error('Uncaught exception:', error);
    process.exit(1);
  });

  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      log.error('Fatal error:', error);
      process.exit(1);
    }
  );
}
