/**
 * Input Guard Module
 *
 * Stateless validators and sanitizers for untrusted strings, plus
 * heuristic detectors for script and SQL injection. Nothing here throws on
 * bad input: predicates return false, sanitizers return a cleaned string.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors.js';
import { Result, ok, err } from '../utils/result.js';
import { defaultLogger } from '../utils/logger.js';
import { SecurityEventLog, SecurityEventType } from './security-events.js';

export type PasswordStrength = 'weak' | 'medium' | 'strong';

/**
 * A named injection heuristic
 */
export interface InjectionPattern {
  readonly name: string;
  readonly pattern: RegExp;
}

/**
 * Markup and handler patterns removed by {@link sanitize}
 */
const STRIP_PATTERNS: readonly RegExp[] = [
  /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi,
  /<iframe\b[^>]*>[\s\S]*?<\/iframe\s*>/gi,
  /javascript:/gi,
  /on\w+\s*=/gi,
];

/**
 * Matched in order; the first hit names the event
 */
export const INJECTION_PATTERNS: readonly InjectionPattern[] = [
  { name: 'quote-or-tautology', pattern: /'\s*OR\s*'1'\s*=\s*'1/i },
  { name: 'quote-or-numeric-tautology', pattern: /'\s*OR\s*1\s*=\s*1/i },
  { name: 'sql-comment', pattern: /--/ },
  { name: 'drop-table', pattern: /;\s*DROP\s+TABLE/i },
  { name: 'delete-from', pattern: /;\s*DELETE\s+FROM/i },
  { name: 'union-select', pattern: /UNION\s+SELECT/i },
  { name: 'script-tag', pattern: /<script/i },
];

const KNOWN_WEAK_PASSWORDS = new Set([
  '123456',
  'password',
  '123456789',
  '12345678',
  '12345',
  '1234567',
  '1234567890',
  'qwerty',
  'abc123',
  'password123',
  '111111',
  '123123',
  'admin',
  'letmein',
  'welcome',
]);

const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const MAX_EMAIL_LENGTH = 254;
const MAX_FILENAME_LENGTH = 255;
const DEFAULT_FILENAME = 'unnamed_file';
const SPECIAL_CHARS = /[!@#$%^&*(),.?":{}|<>]/;

/**
 * Removes script/iframe blocks, `javascript:` and inline event handlers,
 * HTML-escapes `& < > " '` and trims.
 *
 * Stripping repeats until nothing more matches, and an `&` that already
 * opens one of the produced entities is not escaped again, so
 * `sanitize(sanitize(x)) === sanitize(x)`.
 *
 * @example
 * ```typescript
 * sanitize('<b onclick="x()">Hi</b>');
 * // '&lt;b &quot;x()&quot;&gt;Hi&lt;/b&gt;'
 * ```
 */
export function sanitize(text: string): string {
  if (text.length === 0) {
    return text;
  }

  let stripped = text;
  let previous: string;
  do {
    previous = stripped;
    for (const pattern of STRIP_PATTERNS) {
      stripped = stripped.replace(pattern, '');
    }
  } while (stripped !== previous);

  return escapeHtml(stripped).trim();
}

function escapeHtml(text: string): string {
  return text
    .replace(/&(?!(?:amp|lt|gt|quot|#x27);)/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function isValidEmail(email: string): boolean {
  if (email.length === 0) {
    return false;
  }
  return email.length <= MAX_EMAIL_LENGTH && EMAIL_REGEX.test(email);
}

/**
 * Like {@link isValidEmail}, but returns the trimmed address or a typed failure
 */
export function validateEmail(email: string): Result<string, ValidationError> {
  const trimmed = email.trim();
  if (trimmed.length === 0) {
    return err(new ValidationError('Email is required', 'EMAIL_REQUIRED', 'email'));
  }
  if (!isValidEmail(trimmed)) {
    return err(new ValidationError('Email format is invalid', 'EMAIL_INVALID', 'email'));
  }
  return ok(trimmed);
}

/**
 * True for absolute http(s) URLs with a host
 */
export function isValidUrl(url: string): boolean {
  if (url.length === 0) {
    return false;
  }

  const lower = url.trim().toLowerCase();
  if (lower.startsWith('javascript:') || lower.startsWith('data:')) {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return false;
  }

  return parsed.hostname.length > 0;
}

/**
 * 10 to 15 digits once spaces, dashes, parentheses and `+` are removed
 */
export function isValidPhone(phone: string): boolean {
  if (phone.length === 0) {
    return false;
  }
  const cleaned = phone.replace(/[\s\-()+]/g, '');
  return /^\d{10,15}$/.test(cleaned);
}

/**
 * Name of the first matching injection heuristic, or null
 */
export function detectInjectionPattern(text: string): string | null {
  for (const { name, pattern } of INJECTION_PATTERNS) {
    if (pattern.test(text)) {
      return name;
    }
  }
  return null;
}

/**
 * True if `text` matches any injection heuristic. A match is reported to
 * `events` (or the default logger) with the pattern name and input length.
 */
export function containsInjectionPattern(text: string, events?: SecurityEventLog): boolean {
  const name = detectInjectionPattern(text);
  if (name === null) {
    return false;
  }

  const details = { pattern: name, inputLength: text.length };
  if (events) {
    events.record(SecurityEventType.INJECTION_DETECTED, details);
  } else {
    defaultLogger.warn(SecurityEventType.INJECTION_DETECTED, details);
  }
  return true;
}

export function passwordStrength(password: string): PasswordStrength {
  if (password.length < 6) {
    return 'weak';
  }

  let score = 0;
  if (password.length >= 8) score++;
  if (password.length >= 12) score++;
  if (/[A-Z]/.test(password)) score++;
  if (/[a-z]/.test(password)) score++;
  if (/[0-9]/.test(password)) score++;
  if (SPECIAL_CHARS.test(password)) score++;

  if (score >= 5) return 'strong';
  if (score >= 3) return 'medium';
  return 'weak';
}

/**
 * User-facing label and hint for a strength rating
 */
export function describePasswordStrength(strength: PasswordStrength): {
  label: string;
  hint: string;
} {
  switch (strength) {
    case 'weak':
      return { label: 'Weak', hint: 'Too weak. Add uppercase, numbers, and symbols.' };
    case 'medium':
      return { label: 'Medium', hint: 'Fair. Add more characters or symbols.' };
    case 'strong':
      return { label: 'Strong', hint: 'Strong password!' };
  }
}

export function isKnownWeakPassword(password: string): boolean {
  return KNOWN_WEAK_PASSWORDS.has(password.toLowerCase());
}

/**
 * Strips path traversal and reserved filesystem characters
 */
export function sanitizeFilename(name: string): string {
  if (name.length === 0) {
    return DEFAULT_FILENAME;
  }

  let cleaned = name.replace(/\.\./g, '').replace(/[/\\:*?"<>|]/g, '');

  if (cleaned.length > MAX_FILENAME_LENGTH) {
    cleaned = cleaned.slice(0, MAX_FILENAME_LENGTH);
  }

  cleaned = cleaned.trim();
  return cleaned.length > 0 ? cleaned : DEFAULT_FILENAME;
}
