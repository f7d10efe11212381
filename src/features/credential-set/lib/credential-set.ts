/**
 * API key pool with a cursor
 *
 * Keys are tried in order. The cursor moves past a key when it turns out to be
 * invalid, runs out of quota, or keeps getting rate-limited.
 */

import { DEFAULT_QUOTA_PER_KEY, QUOTA_RESET_TIMEZONE } from '../../../shared/config';
import { createLogger } from '../../../shared/lib';
import type { Credential, CredentialSnapshot, KeyStatus, QuotaUsage } from '../model';
import { nextDailyResetUtc } from './quota-window';

const log = createLogger('credentials');

export interface CredentialSetOptions {
  /** Daily quota per key, in units */
  quotaPerKey?: number;

  /** Time zone of the daily quota reset */
  resetTimeZone?: string;

  now?: () => Date;

  /** Usage saved by an earlier run, by raw key; entries from a past window are ignored */
  initialUsage?: ReadonlyMap<string, QuotaUsage>;

  /** Called whenever a key's usage or exhaustion changes */
  onUsageChange?: (key: string, usage: QuotaUsage) => void;
}

interface KeyEntry extends Credential {
  status: KeyStatus;
  exhaustedUntil: Date | null;
  unitsUsed: number;
  windowEnd: Date;
}

/**
 * Mask a key for logging, keeping only the last four characters
 */
export function maskKey(key: string): string {
  return key.length > 8 ? `…${key.slice(-4)}` : '****';
}

/**
 * Create a credential set from an ordered list of keys (duplicates are dropped)
 */
export function createCredentialSet(keys: string[], options: CredentialSetOptions = {}) {
  const {
    quotaPerKey = DEFAULT_QUOTA_PER_KEY,
    resetTimeZone = QUOTA_RESET_TIMEZONE,
    now = () => new Date(),
    initialUsage,
    onUsageChange,
  } = options;

  const uniqueKeys = [...new Set(keys.map((key) => key.trim()).filter((key) => key.length > 0))];
  if (uniqueKeys.length === 0) {
    throw new Error('At least one API key is required');
  }

  const nextReset = () => nextDailyResetUtc(now(), { timeZone: resetTimeZone });

  function restore(key: string, label: string): KeyEntry {
    const entry: KeyEntry = {
      key,
      label,
      status: 'active',
      exhaustedUntil: null,
      unitsUsed: 0,
      windowEnd: nextReset(),
    };

    const saved = initialUsage?.get(key);
    const current = now().getTime();
    if (!saved || Date.parse(saved.windowEnd) <= current) {
      return entry;
    }

    entry.unitsUsed = saved.unitsUsed;
    entry.windowEnd = new Date(saved.windowEnd);
    if (saved.exhaustedUntil && Date.parse(saved.exhaustedUntil) > current) {
      entry.status = 'exhausted';
      entry.exhaustedUntil = new Date(saved.exhaustedUntil);
    }
    log.debug(`${label} resumes with ${entry.unitsUsed} units used (${entry.status})`);
    return entry;
  }

  const entries: KeyEntry[] = uniqueKeys.map((key, index) =>
    restore(key, `key#${index + 1} (${maskKey(key)})`)
  );

  function persist(entry: KeyEntry): void {
    onUsageChange?.(entry.key, {
      unitsUsed: entry.unitsUsed,
      windowEnd: entry.windowEnd.toISOString(),
      ...(entry.exhaustedUntil && { exhaustedUntil: entry.exhaustedUntil.toISOString() }),
    });
  }

  let cursor = 0;

  /**
   * Roll the quota window over and revive exhausted keys whose reset has passed
   */
  function refresh(entry: KeyEntry): void {
    const current = now();
    if (current >= entry.windowEnd) {
      entry.unitsUsed = 0;
      entry.windowEnd = nextReset();
    }
    if (entry.status === 'exhausted' && entry.exhaustedUntil && current >= entry.exhaustedUntil) {
      log.info(`${entry.label} quota window reset, key is usable again`);
      entry.status = 'active';
      entry.exhaustedUntil = null;
    }
  }

  function find(key: string): KeyEntry | undefined {
    return entries.find((entry) => entry.key === key);
  }

  /**
   * Move the cursor past `entry` if it currently points at it
   */
  function advancePast(entry: KeyEntry): void {
    const index = entries.indexOf(entry);
    if (index === cursor) {
      cursor = (cursor + 1) % entries.length;
    }
  }

  function exhaust(entry: KeyEntry, reason: string): void {
    entry.status = 'exhausted';
    entry.exhaustedUntil = nextReset();
    advancePast(entry);
    log.warn(`${entry.label} ${reason}; unusable until ${entry.exhaustedUntil.toISOString()}`);
  }

  return {
    /** Number of keys in the set */
    get size(): number {
      return entries.length;
    },

    /**
     * First usable key at or after the cursor, or null when none is usable
     */
    current(): Credential | null {
      for (let offset = 0; offset < entries.length; offset++) {
        const index = (cursor + offset) % entries.length;
        const entry = entries[index];
        refresh(entry);
        if (entry.status === 'active') {
          cursor = index;
          return { key: entry.key, label: entry.label };
        }
      }
      return null;
    },

    /**
     * Whether any key is currently usable
     */
    hasUsable(): boolean {
      return this.current() !== null;
    },

    /**
     * Count quota units spent with a key; a key reaching its daily quota is exhausted
     */
    recordUsage(key: string, units: number): void {
      const entry = find(key);
      if (!entry) return;
      refresh(entry);
      entry.unitsUsed += units;
      if (entry.status === 'active' && entry.unitsUsed >= quotaPerKey) {
        exhaust(entry, `used its daily quota (${entry.unitsUsed}/${quotaPerKey} units)`);
      }
      persist(entry);
    },

    /**
     * The API reported the key's quota as exceeded
     */
    markExhausted(key: string): void {
      const entry = find(key);
      if (entry && entry.status !== 'invalid') {
        exhaust(entry, 'quota exceeded');
        persist(entry);
      }
    },

    /**
     * The API rejected the key; it is never used again
     */
    markInvalid(key: string): void {
      const entry = find(key);
      if (!entry) return;
      entry.status = 'invalid';
      entry.exhaustedUntil = null;
      advancePast(entry);
      log.error(`${entry.label} was rejected by the API and has been disabled`);
    },

    /**
     * Move on from a key without changing its status (e.g. it stays rate-limited)
     */
    skip(key: string): void {
      const entry = find(key);
      if (entry) {
        advancePast(entry);
        log.warn(`${entry.label} skipped after repeated rate limiting`);
      }
    },

    /**
     * Loggable state of every key
     */
    snapshot(): CredentialSnapshot[] {
      return entries.map((entry) => {
        refresh(entry);
        return {
          label: entry.label,
          status: entry.status,
          unitsUsed: entry.unitsUsed,
          ...(entry.exhaustedUntil && { exhaustedUntil: entry.exhaustedUntil.toISOString() }),
        };
      });
    },
  };
}

/**
 * Type for the credential set
 */
export type CredentialSet = ReturnType<typeof createCredentialSet>;
