/**
 * Offline Privacy Kit
 *
 * On-device data protection and consent for offline-first apps: at-rest
 * field obfuscation with key lifecycle management, a GDPR/DPDP consent
 * ledger, input validation and an allowlisted outbound HTTP gateway.
 *
 * @packageDocumentation
 */

// =============================================================================
// Error exports
// =============================================================================
export {
  DataGuardError,
  ValidationError,
  StorageError,
  SecurityViolationError,
  GatewayError,
  toError,
} from './errors.js';

export type { ErrorCategory, GatewayErrorCode } from './errors.js';

// =============================================================================
// Configuration exports
// =============================================================================
export { DEFAULT_ALLOWED_DOMAINS, DEFAULT_CONFIG, loadConfigFromEnv } from './config.js';

export type { PrivacyKitConfig } from './config.js';

// =============================================================================
// Secure Gateway exports
// =============================================================================
export {
  SecureGateway,
  DEFAULT_USER_AGENT,
  LARGE_RESPONSE_BYTES,
  mergeHeaders,
  createSecureGateway,
} from './secure-gateway.js';

export type {
  HttpMethod,
  HttpRequestInit,
  HttpResponse,
  HttpTransport,
  GatewayResponse,
  GatewayRequestOptions,
  GatewayPostOptions,
  GatewayConfig,
} from './secure-gateway.js';

// =============================================================================
// Module exports
// =============================================================================
export * from './security/index.js';
export * from './compliance/index.js';
export * from './storage/index.js';
export * from './utils/index.js';
export * from './sdk/index.js';
