/**
 * Security Module
 *
 * Exports key management, the field cipher, input validation, masking,
 * rate limiting and the security event log.
 *
 * @packageDocumentation
 */

// Key Vault exports
export {
  SecureKeyVault,
  KeyVaultError,
  KEY_ALPHABET,
  KEY_LENGTH,
  generateSecureToken,
  createKeyVault,
} from './key-vault.js';

export type { KeyVaultConfig } from './key-vault.js';

// Cipher exports
export {
  FieldCipher,
  encode,
  decode,
  tryEncode,
  tryDecode,
  encodeStructured,
  decodeStructured,
} from './cipher.js';

export type { StructuredValue } from './cipher.js';

// Input Guard exports
export {
  INJECTION_PATTERNS,
  sanitize,
  isValidEmail,
  validateEmail,
  isValidUrl,
  isValidPhone,
  detectInjectionPattern,
  containsInjectionPattern,
  passwordStrength,
  describePasswordStrength,
  isKnownWeakPassword,
  sanitizeFilename,
} from './input-guard.js';

export type { PasswordStrength, InjectionPattern } from './input-guard.js';

// Masking exports
export {
  maskEmail,
  maskPhone,
  maskSensitiveData,
  maskToken,
  fingerprint,
  redactSensitiveData,
} from './masking.js';

export type { RedactionConfig } from './masking.js';

// Rate Limiter exports
export { CooldownRateLimiter, createRateLimiter } from './rate-limiter.js';

export type { RateLimitDecision, RateLimiterConfig } from './rate-limiter.js';

// Security Event exports
export { SecurityEventLog, SecurityEventType, createSecurityEventLog } from './security-events.js';

export type { SecurityEvent, SecurityEventLogConfig } from './security-events.js';
