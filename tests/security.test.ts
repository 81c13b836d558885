/**
 * Security Module Tests
 *
 * Tests for input validation, sanitization, masking and the security
 * event log.
 */

import { jest } from '@jest/globals';
import {
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
  maskEmail,
  maskPhone,
  maskSensitiveData,
  maskToken,
  fingerprint,
  redactSensitiveData,
  SecurityEventLog,
  SecurityEventType,
  SecurityEvent,
  Logger,
  LogLevel,
} from '../src/index.js';

const silent = new Logger({ level: LogLevel.SILENT });

describe('Input Guard', () => {
  describe('sanitize', () => {
    it('should remove script blocks', () => {
      expect(sanitize('<script>alert(1)</script>Hello')).toBe('Hello');
    });

    it('should remove iframes and trim the result', () => {
      expect(sanitize('  <iframe src="x"></iframe> text ')).toBe('text');
    });

    it('should remove inline event handlers', () => {
      expect(sanitize('<b onclick="x()">Hi</b>')).toBe('&lt;b &quot;x()&quot;&gt;Hi&lt;/b&gt;');
    });

    it('should strip nested script tags until none remain', () => {
      expect(sanitize('<scr<script></script>ipt>alert(1)</script>')).toBe('');
    });

    it('should strip javascript: rebuilt by a previous removal', () => {
      expect(sanitize('<a href="javajavascript:script:x">')).toBe('&lt;a href=&quot;x&quot;&gt;');
    });

    it('should escape ampersands and quotes', () => {
      expect(sanitize('Tom & Jerry')).toBe('Tom &amp; Jerry');
      expect(sanitize("It's")).toBe('It&#x27;s');
    });

    it('should return empty input unchanged', () => {
      expect(sanitize('')).toBe('');
    });

    it('should be idempotent', () => {
      const inputs = [
        'plain text',
        '<script>x</script>',
        'a & b &amp; c',
        '&lt;already escaped&gt;',
        '"quoted" \'single\'',
        'onload=run()',
        '  javascript:void(0)  ',
        '&#x27 without semicolon',
        '<<script>script>alert(1)<</script>/script>',
      ];

      for (const input of inputs) {
        const once = sanitize(input);
        expect(sanitize(once)).toBe(once);
      }
    });
  });

  describe('email', () => {
    it('should accept a well-formed address', () => {
      expect(isValidEmail('student@example.com')).toBe(true);
    });

    it('should reject malformed addresses', () => {
      expect(isValidEmail('')).toBe(false);
      expect(isValidEmail('bad@')).toBe(false);
      expect(isValidEmail('no-at.example.com')).toBe(false);
    });

    it('should reject addresses longer than 254 characters', () => {
      expect(isValidEmail(`${'a'.repeat(250)}@x.io`)).toBe(false);
    });

    it('should return the trimmed address from validateEmail', () => {
      const result = validateEmail('  a@b.co ');
      expect(result).toEqual({ ok: true, value: 'a@b.co' });
    });

    it('should return typed failures from validateEmail', () => {
      const empty = validateEmail('   ');
      const invalid = validateEmail('nope');

      expect(empty.ok).toBe(false);
      expect(invalid.ok).toBe(false);
      if (!empty.ok && !invalid.ok) {
        expect(empty.error.code).toBe('EMAIL_REQUIRED');
        expect(invalid.error.code).toBe('EMAIL_INVALID');
        expect(invalid.error.field).toBe('email');
        expect(invalid.error.category).toBe('validation');
      }
    });
  });

  describe('isValidUrl', () => {
    it('should accept http and https URLs', () => {
      expect(isValidUrl('https://example.com/path')).toBe(true);
      expect(isValidUrl('http://localhost:8080')).toBe(true);
    });

    it('should reject script, data and other schemes', () => {
      expect(isValidUrl('javascript:alert(1)')).toBe(false);
      expect(isValidUrl('data:text/html,x')).toBe(false);
      expect(isValidUrl('ftp://files.example.com')).toBe(false);
    });

    it('should reject unparseable input', () => {
      expect(isValidUrl('')).toBe(false);
      expect(isValidUrl('not a url')).toBe(false);
    });
  });

  describe('isValidPhone', () => {
    it('should accept 10 to 15 digits after removing separators', () => {
      expect(isValidPhone('+1 (555) 123-4567')).toBe(true);
      expect(isValidPhone('9876543210')).toBe(true);
    });

    it('should reject too few digits or letters', () => {
      expect(isValidPhone('12345')).toBe(false);
      expect(isValidPhone('98765abc10')).toBe(false);
      expect(isValidPhone('')).toBe(false);
    });
  });

  describe('injection detection', () => {
    it('should detect a SQL drop statement', () => {
      expect(containsInjectionPattern("'; DROP TABLE users; --")).toBe(true);
    });

    it('should not flag ordinary text', () => {
      expect(containsInjectionPattern('hello world')).toBe(false);
    });

    it('should name the first matching pattern', () => {
      expect(detectInjectionPattern("admin' OR '1'='1")).toBe('quote-or-tautology');
      expect(detectInjectionPattern("x' OR 1=1")).toBe('quote-or-numeric-tautology');
      expect(detectInjectionPattern("'; DROP TABLE users; --")).toBe('sql-comment');
      expect(detectInjectionPattern('1; drop table users')).toBe('drop-table');
      expect(detectInjectionPattern('1; DELETE FROM notes')).toBe('delete-from');
      expect(detectInjectionPattern('1 UNION SELECT password FROM users')).toBe('union-select');
      expect(detectInjectionPattern('<SCRIPT src=x>')).toBe('script-tag');
      expect(detectInjectionPattern('hello world')).toBeNull();
    });

    it('should record the pattern and input length, never the input', () => {
      const events = new SecurityEventLog({ logger: silent });
      const input = "'; DROP TABLE users; --";

      containsInjectionPattern(input, events);

      const recorded = events.list(SecurityEventType.INJECTION_DETECTED);
      expect(recorded).toHaveLength(1);
      expect(recorded[0]?.details).toEqual({ pattern: 'sql-comment', inputLength: input.length });
    });
  });

  describe('passwords', () => {
    it('should rate short passwords weak', () => {
      expect(passwordStrength('abc')).toBe('weak');
    });

    it('should score length and character classes', () => {
      expect(passwordStrength('abcdefgh')).toBe('weak');
      expect(passwordStrength('Abcdefgh1')).toBe('medium');
      expect(passwordStrength('Abcdefgh1!xyz')).toBe('strong');
    });

    it('should describe each rating', () => {
      expect(describePasswordStrength('weak').label).toBe('Weak');
      expect(describePasswordStrength('medium').label).toBe('Medium');
      expect(describePasswordStrength('strong')).toEqual({ label: 'Strong', hint: 'Strong password!' });
    });

    it('should match the denylist case-insensitively', () => {
      expect(isKnownWeakPassword('PASSWORD')).toBe(true);
      expect(isKnownWeakPassword('letmein')).toBe(true);
      expect(isKnownWeakPassword('correct-horse')).toBe(false);
    });
  });

  describe('sanitizeFilename', () => {
    it('should remove traversal and reserved characters', () => {
      expect(sanitizeFilename('../../etc/passwd')).toBe('etcpasswd');
      expect(sanitizeFilename('report:2024?.pdf')).toBe('report2024.pdf');
    });

    it('should fall back when nothing usable remains', () => {
      expect(sanitizeFilename('')).toBe('unnamed_file');
      expect(sanitizeFilename('***')).toBe('unnamed_file');
      expect(sanitizeFilename('  ')).toBe('unnamed_file');
    });

    it('should cap the length at 255 characters', () => {
      expect(sanitizeFilename('a'.repeat(300))).toHaveLength(255);
    });
  });
});

describe('Masking', () => {
  it('should mask the local part of an email', () => {
    expect(maskEmail('john@example.com')).toBe('j**n@example.com');
    expect(maskEmail('ab@example.com')).toBe('a***@example.com');
    expect(maskEmail('@example.com')).toBe('***@example.com');
    expect(maskEmail('no-at')).toBe('no-at');
  });

  it('should keep the last four digits of a phone number', () => {
    expect(maskPhone('9876543210')).toBe('******3210');
    expect(maskPhone('123')).toBe('123');
  });

  it('should keep the leading characters of sensitive data', () => {
    expect(maskSensitiveData('sk-test-secret')).toBe('sk-t**********');
    expect(maskSensitiveData('abc')).toBe('***');
    expect(maskSensitiveData('https://example.com/a', 8)).toBe('https://*************');
  });

  it('should mask tokens for display', () => {
    expect(maskToken('abcd1234efgh5678')).toBe('abcd...5678');
    expect(maskToken('short')).toBe('*****');
  });

  it('should fingerprint values as 8 hex digits', () => {
    expect(fingerprint('')).toBe('');
    expect(fingerprint('a')).toBe('00000061');
    expect(fingerprint('ab')).toBe('00000c21');
    expect(fingerprint('student@example.com')).toMatch(/^[0-9a-f]{8}$/);
  });

  describe('redactSensitiveData', () => {
    it('should redact secrets and partially mask URLs', () => {
      expect(redactSensitiveData({ url: 'https://a.io', apiKey: 'k' })).toEqual({
        url: 'http********',
        apiKey: '[REDACTED]',
      });
    });

    it('should recurse into nested objects and arrays', () => {
      const redacted = redactSensitiveData({
        user: { email: 'john@example.com', password: 'test-secret' },
        tags: ['a'],
        count: 2,
      });

      expect(redacted).toEqual({
        user: { email: 'j**n@example.com', password: '[REDACTED]' },
        tags: ['a'],
        count: 2,
      });
    });

    it('should redact by key-name pattern', () => {
      expect(redactSensitiveData({ sessionToken: 'x', clientSecret: 'y', slot: 'z' })).toEqual({
        sessionToken: '[REDACTED]',
        clientSecret: '[REDACTED]',
        slot: 'z',
      });
    });

    it('should handle circular references', () => {
      const node: Record<string, unknown> = { name: 'x' };
      node.self = node;

      expect(redactSensitiveData(node)).toEqual({ name: 'x', self: '[CIRCULAR]' });
    });

    it('should reduce errors to name and message', () => {
      expect(redactSensitiveData({ cause: new TypeError('boom') })).toEqual({
        cause: { name: 'TypeError', message: 'boom' },
      });
    });
  });
});

describe('SecurityEventLog', () => {
  it('should keep events oldest first and filter by type', () => {
    const events = new SecurityEventLog({ logger: silent });

    events.record(SecurityEventType.BLOCKED_DOMAIN, { host: 'a.test' });
    events.record(SecurityEventType.FIELD_DROPPED, { field: 'note' });
    events.record(SecurityEventType.BLOCKED_DOMAIN, { host: 'b.test' });

    expect(events.count()).toBe(3);
    expect(events.list(SecurityEventType.BLOCKED_DOMAIN).map((e) => e.details.host)).toEqual(['a.test', 'b.test']);
  });

  it('should drop the oldest events beyond capacity', () => {
    const events = new SecurityEventLog({ maxEvents: 2, logger: silent });

    events.record(SecurityEventType.NETWORK_RETRY, { retry: 1 });
    events.record(SecurityEventType.NETWORK_RETRY, { retry: 2 });
    events.record(SecurityEventType.NETWORK_RETRY, { retry: 3 });

    expect(events.list().map((e) => e.details.retry)).toEqual([2, 3]);
  });

  it('should forward events to onEvent', () => {
    const onEvent = jest.fn<(event: SecurityEvent) => void>();
    const events = new SecurityEventLog({ onEvent, logger: silent });

    events.record(SecurityEventType.INVALID_JSON, { status: 200 });

    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(onEvent.mock.calls[0]?.[0].type).toBe(SecurityEventType.INVALID_JSON);
  });

  it('should survive a throwing onEvent handler', () => {
    const events = new SecurityEventLog({
      onEvent: () => {
        throw new Error('handler failed');
      },
      logger: silent,
    });

    expect(() => events.record(SecurityEventType.CLIENT_ERROR)).not.toThrow();
    expect(events.count()).toBe(1);
  });

  it('should log routine events at debug and threats at warn', () => {
    const lines: string[] = [];
    const logger = new Logger({ level: LogLevel.WARN, timestamps: false, sink: (_level, line) => lines.push(line) });
    const events = new SecurityEventLog({ logger });

    events.record(SecurityEventType.OUTBOUND_REQUEST, { method: 'GET' });
    events.record(SecurityEventType.BLOCKED_SCHEME, { scheme: 'javascript' });

    expect(lines).toEqual(['[PrivacyKit:Security] [WARN] BLOCKED_SCHEME {"scheme":"javascript"}']);
  });

  it('should stamp events with the injected clock', () => {
    const events = new SecurityEventLog({ logger: silent }, () => Date.parse('2026-03-01T12:00:00.000Z'));

    const event = events.record(SecurityEventType.INVALID_URL, { inputLength: 3 });

    expect(event.timestamp.toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });

  it('should clear all events', () => {
    const events = new SecurityEventLog({ logger: silent });
    events.record(SecurityEventType.FIELD_DROPPED);
    events.clear();
    expect(events.count()).toBe(0);
  });
});
