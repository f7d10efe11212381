/**
 * Credential set model exports
 */
export {
  type KeyStatus,
  type Credential,
  type CredentialSnapshot,
  type QuotaUsage,
  NoUsableCredentialsError,
} from './types';
