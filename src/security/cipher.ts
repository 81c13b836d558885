/**
 * Field Cipher Module
 *
 * Reversible XOR stream obfuscation for at-rest fields.
 *
 * WARNING: this is obfuscation, not encryption. There is no IV and no
 * integrity tag: anyone holding the device can recover the key from the
 * store, and a ciphertext decoded with the wrong key yields garbage rather
 * than an error. An implementation that needs confidentiality must swap in
 * an authenticated cipher behind the same functions.
 *
 * Envelope: `base64(utf8(plaintext) XOR cycle(utf8(key)))`.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { Result, ok, err } from '../utils/result.js';
import { SecureKeyVault } from './key-vault.js';

/**
 * JSON-like value accepted by the structured helpers
 */
export type StructuredValue = Record<string, unknown>;

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function xorWithKey(data: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ key[i % key.length];
  }
  return out;
}

/**
 * Encodes `plaintext`, or fails on an empty key
 */
export function tryEncode(plaintext: string, key: string): Result<string, ValidationError> {
  if (plaintext.length === 0) {
    return ok('');
  }
  if (key.length === 0) {
    return err(new ValidationError('Cipher key is empty', 'EMPTY_KEY'));
  }

  const combined = xorWithKey(Buffer.from(plaintext, 'utf8'), Buffer.from(key, 'utf8'));
  return ok(combined.toString('base64'));
}

/**
 * Decodes `ciphertext`, or fails on an empty key or non-base64 input.
 * A wrong key is not detected.
 */
export function tryDecode(ciphertext: string, key: string): Result<string, ValidationError> {
  if (ciphertext.length === 0) {
    return ok('');
  }
  if (key.length === 0) {
    return err(new ValidationError('Cipher key is empty', 'EMPTY_KEY'));
  }
  if (!BASE64_REGEX.test(ciphertext)) {
    return err(new ValidationError('Ciphertext is not base64', 'MALFORMED_CIPHERTEXT'));
  }

  const combined = xorWithKey(Buffer.from(ciphertext, 'base64'), Buffer.from(key, 'utf8'));
  return ok(combined.toString('utf8'));
}

/**
 * Length-preserving XOR with the cycled key, rendered as base64.
 * Returns `plaintext` unchanged if it cannot be encoded.
 */
export function encode(plaintext: string, key: string): string {
  const result = tryEncode(plaintext, key);
  return result.ok ? result.value : plaintext;
}

/**
 * Inverse of {@link encode}. Returns `ciphertext` unchanged if it is not a
 * valid envelope.
 */
export function decode(ciphertext: string, key: string): string {
  const result = tryDecode(ciphertext, key);
  return result.ok ? result.value : ciphertext;
}

/**
 * JSON-serializes `value` and encodes it. Returns `''` when the value
 * cannot be serialized (cycles, BigInt).
 */
export function encodeStructured(value: StructuredValue, key: string): string {
  let json: string;
  try {
    json = JSON.stringify(value);
  } catch {
    return '';
  }
  return encode(json, key);
}

/**
 * Decodes and parses an envelope produced by {@link encodeStructured}.
 * Returns `{}` when the text is malformed, was made with another key, or
 * does not hold a plain object.
 */
export function decodeStructured(text: string, key: string): StructuredValue {
  const decoded = tryDecode(text, key);
  if (!decoded.ok || decoded.value.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(decoded.value);
  } catch {
    return {};
  }

  return isPlainObject(parsed) ? parsed : {};
}

function isPlainObject(value: unknown): value is StructuredValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Binds the cipher functions to the vault's active key and logs whenever
 * a value falls back to plaintext.
 *
 * @example
 * ```typescript
 * const cipher = new FieldCipher(vault);
 * const stored = await cipher.encrypt('student@example.com');
 * const email = await cipher.decrypt(stored);
 * ```
 */
export class FieldCipher {
  private readonly logger: Logger;

  constructor(
    private readonly vault: SecureKeyVault,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger).child('Cipher');
  }

  async encrypt(plaintext: string): Promise<string> {
    const result = tryEncode(plaintext, await this.vault.currentKey());
    if (!result.ok) {
      this.logger.warn('Encryption degraded to plaintext', { code: result.error.code });
      return plaintext;
    }
    return result.value;
  }

  async decrypt(ciphertext: string): Promise<string> {
    const result = tryDecode(ciphertext, await this.vault.currentKey());
    if (!result.ok) {
      this.logger.warn('Decryption returned input unchanged', { code: result.error.code });
      return ciphertext;
    }
    return result.value;
  }

  async encryptObject(value: StructuredValue): Promise<string> {
    return encodeStructured(value, await this.vault.currentKey());
  }

  async decryptObject(text: string): Promise<StructuredValue> {
    return decodeStructured(text, await this.vault.currentKey());
  }
}
