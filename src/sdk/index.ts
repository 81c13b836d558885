/**
 * SDK Module
 *
 * Exports the Data Protection SDK composition root.
 *
 * @packageDocumentation
 */

export { DataProtectionSDK, createDataProtectionSDK } from './data-protection-sdk.js';

export type {
  SDKConfig,
  InitializationReport,
  AccountDeletionStep,
  AccountDeletionReport,
} from './data-protection-sdk.js';
