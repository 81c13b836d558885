/**
 * Display Masking Module
 *
 * Deterministic transforms that hide most of a value while keeping it
 * recognisable in logs and UI. None of them can be reversed.
 *
 * @packageDocumentation
 */

/**
 * Configuration for {@link redactSensitiveData}
 */
export interface RedactionConfig {
  /** Field names (substring match, case-insensitive) replaced entirely */
  alwaysRedact?: string[];
  /** Field names masked with {@link maskSensitiveData} */
  partialRedact?: string[];
  /** Characters left visible for partial redaction */
  partialShowChars?: number;
  /** Replacement for fully redacted values */
  redactedPlaceholder?: string;
}

/**
 * Key-name patterns that always hide the value
 */
const SENSITIVE_PATTERNS = [
  /key/i,
  /secret/i,
  /password/i,
  /passphrase/i,
  /token/i,
  /credential/i,
  /authorization/i,
  /cookie/i,
];

const DEFAULT_REDACT_FIELDS = ['encryptionKey', 'apiKey', 'accessToken', 'refreshToken', 'password'];

const DEFAULT_PARTIAL_REDACT_FIELDS = ['url', 'userId', 'deviceId'];

/**
 * Masks an email, keeping the first and last character of the local part.
 *
 * `john@example.com` → `j**n@example.com`, `ab@example.com` → `a***@example.com`
 */
export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  if (email.length === 0 || at === -1) {
    return email;
  }

  const name = email.slice(0, at);
  const domain = email.slice(at + 1);

  if (name.length === 0) {
    return `***@${domain}`;
  }

  if (name.length <= 2) {
    return `${name[0]}***@${domain}`;
  }

  return `${name[0]}${'*'.repeat(name.length - 2)}${name[name.length - 1]}@${domain}`;
}

/**
 * Masks all but the last four characters of a phone number
 */
export function maskPhone(phone: string): string {
  if (phone.length < 4) {
    return phone;
  }
  return `${'*'.repeat(phone.length - 4)}${phone.slice(-4)}`;
}

/**
 * Keeps the first `visibleChars` characters and stars the rest.
 * Values no longer than `visibleChars` are starred entirely.
 */
export function maskSensitiveData(data: string, visibleChars = 4): string {
  if (data.length <= visibleChars) {
    return '*'.repeat(data.length);
  }
  return data.slice(0, visibleChars) + '*'.repeat(data.length - visibleChars);
}

/**
 * Masks a token or key for display: first and last four characters kept
 */
export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '*'.repeat(token.length);
  }
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

/**
 * 32-bit rolling hash rendered as 8 hex digits.
 *
 * Correlates log lines that concern the same value without printing it.
 * Not collision resistant.
 */
export function fingerprint(data: string): string {
  if (data.length === 0) {
    return '';
  }

  let hash = 0;
  for (let i = 0; i < data.length; i++) {
    hash = (Math.imul(hash, 31) + data.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16).padStart(8, '0');
}

/**
 * Returns a copy of `obj` with sensitive fields redacted, recursing into
 * nested objects and arrays.
 *
 * @example
 * ```typescript
 * redactSensitiveData({ url: 'https://a.io', apiKey: 'k' });
 * // { url: 'http********', apiKey: '[REDACTED]' }
 * ```
 */
export function redactSensitiveData(
  obj: Record<string, unknown>,
  config?: RedactionConfig
): Record<string, unknown> {
  const settings: Required<RedactionConfig> = {
    alwaysRedact: config?.alwaysRedact ?? DEFAULT_REDACT_FIELDS,
    partialRedact: config?.partialRedact ?? DEFAULT_PARTIAL_REDACT_FIELDS,
    partialShowChars: config?.partialShowChars ?? 4,
    redactedPlaceholder: config?.redactedPlaceholder ?? '[REDACTED]',
  };

  return redactRecord(obj, settings, new WeakSet());
}

function redactRecord(
  obj: Record<string, unknown>,
  config: Required<RedactionConfig>,
  seen: WeakSet<object>
): Record<string, unknown> {
  seen.add(obj);
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = redactValue(key, value, config, seen);
  }
  return result;
}

function redactNested(value: unknown, config: Required<RedactionConfig>, seen: WeakSet<object>): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }

  if (seen.has(value)) {
    return '[CIRCULAR]';
  }

  if (Array.isArray(value)) {
    seen.add(value);
    return value.map((item) => redactNested(item, config, seen));
  }

  if (value instanceof Date) {
    return value;
  }

  if (Buffer.isBuffer(value) || value instanceof Uint8Array) {
    return config.redactedPlaceholder;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  return redactRecord(Object.fromEntries(Object.entries(value)), config, seen);
}

function redactValue(
  key: string,
  value: unknown,
  config: Required<RedactionConfig>,
  seen: WeakSet<object>
): unknown {
  const lowerKey = key.toLowerCase();

  if (config.alwaysRedact.some((field) => lowerKey.includes(field.toLowerCase()))) {
    return config.redactedPlaceholder;
  }

  if (config.partialRedact.some((field) => field.toLowerCase() === lowerKey)) {
    return typeof value === 'string'
      ? maskSensitiveData(value, config.partialShowChars)
      : config.redactedPlaceholder;
  }

  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
    return config.redactedPlaceholder;
  }

  if (lowerKey.includes('email') && typeof value === 'string') {
    return maskEmail(value);
  }

  if (lowerKey.includes('phone') && typeof value === 'string') {
    return maskPhone(value);
  }

  return redactNested(value, config, seen);
}
