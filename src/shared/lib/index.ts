/**
 * Shared library utilities
 */
export { createLogger, logger, setLogLevel, isLogLevel, type Logger, type LogLevel } from './logger';
export { sleep, type SleepFn } from './sleep';
export { withRetry, backoffDelay, type RetryOptions } from './retry';
export { createErrorReporter, type ErrorReporter, type ReportContext } from './error-reporter';
