/**
 * Key Vault Module
 *
 * Owns the single symmetric secret used for at-rest field obfuscation:
 * creation, persistence, rotation schedule and erasure.
 *
 * SECURITY NOTES:
 * - The key NEVER appears in log output, error messages or serialization
 * - Rotation is lossy: ciphertexts produced under the old key become
 *   unreadable. Re-encrypt what you still need (see `DataProtectionSDK.rotateKey`)
 *
 * @packageDocumentation
 */

import { randomInt } from 'crypto';
import { DataGuardError, StorageError, toError } from '../errors.js';
import { KeyValueStore, StoreKeys } from '../storage/interfaces.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { Result, ok, err } from '../utils/result.js';
import { SerialQueue } from '../utils/serial-queue.js';

/**
 * Alphabet of generated keys and tokens
 */
export const KEY_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Nominal key length in characters
 */
export const KEY_LENGTH = 32;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface KeyVaultConfig {
  /** Days after which {@link SecureKeyVault.needsRotation} reports true (default: 90) */
  rotationDays?: number;
  logger?: Logger;
}

/**
 * Error raised by key vault operations. Never includes key material.
 */
export class KeyVaultError extends DataGuardError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, 'transient', { cause });
    this.name = 'KeyVaultError';
  }
}

/**
 * Random string over {@link KEY_ALPHABET} from the platform CSPRNG
 */
export function generateSecureToken(length: number = KEY_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += KEY_ALPHABET[randomInt(KEY_ALPHABET.length)];
  }
  return token;
}

/**
 * Secure Key Vault
 *
 * Mutations (first load, creation, rotation, wipe) run one at a time
 * through a {@link SerialQueue}, so concurrent first-run callers create a
 * single key and a rotation is visible to the next caller immediately.
 *
 * Store failures never throw: they are logged and returned as failed
 * results, and {@link currentKey} falls back to an ephemeral in-memory key.
 *
 * @example
 * ```typescript
 * const vault = new SecureKeyVault(store);
 * await vault.ensureKey();
 *
 * if (await vault.needsRotation()) {
 *   await vault.rotate();
 * }
 * ```
 */
export class SecureKeyVault {
  private readonly store: KeyValueStore;
  private readonly queue: SerialQueue;
  private readonly logger: Logger;
  private readonly rotationDays: number;
  private readonly getNow: () => number;

  private cachedKey: string | null = null;
  private ephemeral = false;

  /**
   * @param getNow - Optional clock (for testing)
   */
  constructor(store: KeyValueStore, config: KeyVaultConfig = {}, getNow?: () => number) {
    this.store = store;
    this.queue = new SerialQueue('KeyVault');
    this.logger = (config.logger ?? defaultLogger).child('KeyVault');
    this.rotationDays = config.rotationDays ?? 90;
    this.getNow = getNow ?? (() => Date.now());

    if (this.rotationDays <= 0) {
      throw new Error('rotationDays must be positive');
    }
  }

  /**
   * Creates and persists a key if the store holds none. Idempotent.
   */
  ensureKey(): Promise<Result<void>> {
    return this.queue.run(async () => {
      try {
        const existing = await this.store.getString(StoreKeys.ENCRYPTION_KEY);
        if (existing) {
          this.adopt(existing);
          return ok();
        }

        // an ephemeral key already encrypted data this session; keep it
        await this.persistNewKey(this.ephemeral ? this.cachedKey : null);
        this.logger.info('Encryption key created');
        return ok();
      } catch (error) {
        return this.fail('ensureKey', error);
      }
    });
  }

  /**
   * The active key. Never empty.
   *
   * Loads from the store on a cache miss, creating a key if none exists.
   * If the store is unavailable an ephemeral key is generated and cached
   * for this process only.
   */
  async currentKey(): Promise<string> {
    if (this.cachedKey !== null) {
      return this.cachedKey;
    }

    return this.queue.run(async () => {
      if (this.cachedKey !== null) {
        return this.cachedKey;
      }

      try {
        const stored = await this.store.getString(StoreKeys.ENCRYPTION_KEY);
        if (stored) {
          this.adopt(stored);
          return stored;
        }
        return await this.persistNewKey();
      } catch (error) {
        const key = generateSecureToken();
        this.cachedKey = key;
        this.ephemeral = true;
        this.logger.warn('Store unavailable, using ephemeral key', { slot: StoreKeys.ENCRYPTION_KEY }, toError(error));
        return key;
      }
    });
  }

  /**
   * True when no creation timestamp is stored, it cannot be parsed, or the
   * key is at least `rotationDays` old. False if the store cannot be read.
   */
  async needsRotation(): Promise<boolean> {
    let createdAt: string | null;
    try {
      createdAt = await this.store.getString(StoreKeys.KEY_CREATED_AT);
    } catch (error) {
      this.logger.warn('Rotation check failed', { slot: StoreKeys.KEY_CREATED_AT }, toError(error));
      return false;
    }

    if (createdAt === null) {
      return true;
    }

    const created = Date.parse(createdAt);
    if (Number.isNaN(created)) {
      return true;
    }

    const daysSinceCreation = Math.floor((this.getNow() - created) / MS_PER_DAY);
    return daysSinceCreation >= this.rotationDays;
  }

  /**
   * Replaces the key. Every ciphertext made with the previous key becomes
   * undecryptable.
   */
  rotate(): Promise<Result<void>> {
    return this.queue.run(async () => {
      try {
        await this.persistNewKey();
        this.logger.info('Encryption key rotated');
        return ok();
      } catch (error) {
        return this.fail('rotate', error);
      }
    });
  }

  /**
   * Removes the key and its timestamp from the store and clears the cache.
   * The cache is cleared even when the store refuses the removal.
   */
  wipe(): Promise<Result<void>> {
    return this.queue.run(async () => {
      this.forget();
      try {
        await this.store.remove(StoreKeys.ENCRYPTION_KEY);
        await this.store.remove(StoreKeys.KEY_CREATED_AT);
        this.logger.info('Encryption key wiped');
        return ok();
      } catch (error) {
        return this.fail('wipe', error);
      }
    });
  }

  /**
   * Creation time of the stored key, or null if unknown
   */
  async keyCreatedAt(): Promise<Date | null> {
    try {
      const createdAt = await this.store.getString(StoreKeys.KEY_CREATED_AT);
      if (createdAt === null) {
        return null;
      }
      const parsed = new Date(createdAt);
      return Number.isNaN(parsed.getTime()) ? null : parsed;
    } catch (error) {
      this.logger.warn('Could not read key timestamp', {}, toError(error));
      return null;
    }
  }

  /**
   * True when the cached key only lives in memory because the store failed
   */
  isEphemeral(): boolean {
    return this.ephemeral;
  }

  /**
   * Writes `candidate` (or a fresh key), then its timestamp, then updates the cache.
   * A crash between the two writes leaves a key without a timestamp, which
   * {@link needsRotation} treats as due.
   */
  private async persistNewKey(candidate: string | null = null): Promise<string> {
    const key = candidate ?? generateSecureToken();
    await this.store.setString(StoreKeys.ENCRYPTION_KEY, key);
    await this.store.setString(StoreKeys.KEY_CREATED_AT, new Date(this.getNow()).toISOString());
    this.adopt(key);
    return key;
  }

  private adopt(key: string): void {
    this.cachedKey = key;
    this.ephemeral = false;
  }

  private forget(): void {
    this.cachedKey = null;
    this.ephemeral = false;
  }

  private fail(operation: string, error: unknown): Result<void> {
    const cause = toError(error);
    this.logger.error(`Key vault ${operation} failed`, { operation }, cause);
    const failure =
      error instanceof StorageError
        ? error
        : new KeyVaultError(`Key vault ${operation} failed`, 'KEY_VAULT_FAILURE', cause);
    return err(failure);
  }

  toString(): string {
    return `[SecureKeyVault: ${this.cachedKey === null ? 'no key loaded' : 'key loaded'}]`;
  }

  toJSON(): object {
    return {
      type: 'SecureKeyVault',
      keyLoaded: this.cachedKey !== null,
      ephemeral: this.ephemeral,
    };
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.toString();
  }
}

export function createKeyVault(
  store: KeyValueStore,
  config?: KeyVaultConfig,
  getNow?: () => number
): SecureKeyVault {
  return new SecureKeyVault(store, config, getNow);
}
