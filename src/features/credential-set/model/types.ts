/**
 * Credential set types
 */

/**
 * Usability of an API key
 * - active: can be used
 * - exhausted: out of quota until the next daily reset
 * - invalid: rejected by the API, never retried
 */
export type KeyStatus = 'active' | 'exhausted' | 'invalid';

/**
 * An API key handed out for a request
 */
export interface Credential {
  /** The raw key (never log this) */
  key: string;

  /** Masked label safe for logs, e.g. `key#2 (…f3a9)` */
  label: string;
}

/**
 * Loggable view of a key's state
 */
export interface CredentialSnapshot {
  label: string;
  status: KeyStatus;

  /** Quota units used in the current window */
  unitsUsed: number;

  /** When an exhausted key becomes usable again (ISO 8601) */
  exhaustedUntil?: string;
}

/**
 * Quota usage of one key in its current daily window, as persisted between runs
 */
export interface QuotaUsage {
  unitsUsed: number;

  /** End of the daily window the units count against (ISO 8601) */
  windowEnd: string;

  /** Set while the key is out of quota (ISO 8601) */
  exhaustedUntil?: string;
}

/**
 * Thrown when every key in the set is invalid, exhausted or already tried
 */
export class NoUsableCredentialsError extends Error {
  constructor(
    message = 'No usable API key left in the credential set',
    public readonly lastError?: unknown
  ) {
    super(message);
    this.name = 'NoUsableCredentialsError';
  }
}
