/**
 * Compliance Module
 *
 * Exports the consent ledger and data-classification rules.
 *
 * @packageDocumentation
 */

// Consent Ledger exports
export { ConsentLedger, CURRENT_POLICY_VERSION, createConsentLedger } from './consent-ledger.js';

export type {
  ConsentGrants,
  ConsentCategory,
  ConsentState,
  ConsentStatus,
  RecordConsentRequest,
  AccessLogEntry,
  DataExport,
  ConsentLedgerConfig,
} from './consent-ledger.js';

// Data Classification exports
export {
  SensitiveDataType,
  retentionDays,
  requiresEncryption,
  canShareWithThirdParty,
  isRetentionExpired,
  PRIVACY_RIGHTS,
  DATA_CATEGORIES,
} from './data-classification.js';

export type { PrivacyRight, DataCategory } from './data-classification.js';
