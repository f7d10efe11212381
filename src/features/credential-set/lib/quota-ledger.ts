/**
 * Quota usage persisted between runs
 *
 * One entry per key under `quota:<hash>`; the raw key never reaches the store.
 */

import { createHash } from 'node:crypto';
import { createLogger } from '../../../shared/lib';
import type { KeyValueStore } from '../../../shared/storage';
import type { QuotaUsage } from '../model';

const KEY_PREFIX = 'quota:';

const log = createLogger('credentials');

/**
 * Store key for an API key
 */
export function quotaStoreKey(apiKey: string): string {
  const hash = createHash('sha256').update(apiKey).digest('hex');
  return `${KEY_PREFIX}${hash.substring(0, 16)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}

function parseUsage(raw: string): QuotaUsage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    !isRecord(value) ||
    typeof value.unitsUsed !== 'number' ||
    value.unitsUsed < 0 ||
    !isIsoDate(value.windowEnd)
  ) {
    return null;
  }

  return {
    unitsUsed: value.unitsUsed,
    windowEnd: value.windowEnd,
    ...(isIsoDate(value.exhaustedUntil) && { exhaustedUntil: value.exhaustedUntil }),
  };
}

export function createQuotaLedger(store: KeyValueStore) {
  let pending: Promise<void> = Promise.resolve();

  return {
    /**
     * Saved usage for the given keys; keys without a valid entry are left out
     */
    async load(apiKeys: string[]): Promise<Map<string, QuotaUsage>> {
      const usage = new Map<string, QuotaUsage>();
      for (const apiKey of apiKeys) {
        const raw = await store.get(quotaStoreKey(apiKey));
        if (raw === null) continue;

        const parsed = parseUsage(raw);
        if (parsed) {
          usage.set(apiKey, parsed);
        } else {
          log.warn(`Ignoring malformed quota entry ${quotaStoreKey(apiKey)}`);
        }
      }
      return usage;
    },

    /**
     * Queue a write; writes land in call order
     */
    record(apiKey: string, usage: QuotaUsage): void {
      pending = pending
        .then(() => store.put(quotaStoreKey(apiKey), JSON.stringify(usage)))
        .catch((error: unknown) => {
          log.error('Could not save quota usage:', error);
        });
    },

    /**
     * Wait for queued writes
     */
    flush(): Promise<void> {
      return pending;
    },
  };
}

/**
 * Type for the quota ledger
 */
export type QuotaLedger = ReturnType<typeof createQuotaLedger>;
