/**
 * Leveled console logger
 *
 * Level is read from LOG_LEVEL (debug | info | warn | error, default info).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

let currentLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

/**
 * Override the active log level (used once config has been loaded)
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString();
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines are prefixed with a scope, e.g. `[youtube]`
 */
export function createLogger(scope?: string): Logger {
  const prefix = (level: string) => `[${timestamp()}] [${level}]${scope ? ` [${scope}]` : ''}`;

  return {
    debug: (message, ...args) => {
      if (shouldLog('debug')) {
        console.log(`${prefix('DEBUG')} ${message}`, ...args);
      }
    },

    info: (message, ...args) => {
      if (shouldLog('info')) {
        console.log(`${prefix('INFO')} ${message}`, ...args);
      }
    },

    warn: (message, ...args) => {
      if (shouldLog('warn')) {
        console.warn(`${prefix('WARN')} ${message}`, ...args);
      }
    },

    error: (message, ...args) => {
      if (shouldLog('error')) {
        console.error(`${prefix('ERROR')} ${message}`, ...args);
      }
    },
  };
}

export const logger = createLogger();
