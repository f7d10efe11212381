export { createCredentialSet, maskKey, type CredentialSet, type CredentialSetOptions } from './credential-set';
export { createQuotaLedger, quotaStoreKey, type QuotaLedger } from './quota-ledger';
export { nextDailyResetUtc, timeZoneOffsetMs } from './quota-window';
