/**
 * Credential Set feature - public API
 *
 * Ordered pool of YouTube API keys with quota tracking and rotation
 */

// Key pool
export {
  createCredentialSet,
  createQuotaLedger,
  maskKey,
  nextDailyResetUtc,
  type CredentialSet,
  type CredentialSetOptions,
  type QuotaLedger,
} from './lib';

// Types
export {
  NoUsableCredentialsError,
  type Credential,
  type CredentialSnapshot,
  type KeyStatus,
  type QuotaUsage,
} from './model';
