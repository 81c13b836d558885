/**
 * Data Protection SDK
 *
 * Composition root for the data-protection layer. Builds exactly one of
 * each service over a single store and hands them to callers; nothing in
 * the library keeps process-wide state.
 *
 * @packageDocumentation
 */

import { DEFAULT_CONFIG, PrivacyKitConfig } from '../config.js';
import { ConsentLedger } from '../compliance/consent-ledger.js';
import { DataGuardError, ValidationError } from '../errors.js';
import { HttpTransport, SecureGateway } from '../secure-gateway.js';
import { FieldCipher, tryDecode, tryEncode } from '../security/cipher.js';
import { SecureKeyVault } from '../security/key-vault.js';
import { CooldownRateLimiter, RateLimiterConfig } from '../security/rate-limiter.js';
import { SecurityEvent, SecurityEventLog } from '../security/security-events.js';
import { KeyValueStore } from '../storage/interfaces.js';
import { Logger } from '../utils/logger.js';
import { Result, ok, err } from '../utils/result.js';

/**
 * SDK configuration
 */
export interface SDKConfig {
  /** Persistent store shared by the key vault and the consent ledger */
  store: KeyValueStore;
  /** Overrides for {@link DEFAULT_CONFIG}, e.g. from `loadConfigFromEnv` */
  config?: Partial<PrivacyKitConfig>;
  /** Default: built from `config.logLevel` and `config.logJson` */
  logger?: Logger;
  /** Default: global fetch */
  transport?: HttpTransport;
  /** Days before the key is due for rotation (default: 90) */
  keyRotationDays?: number;
  rateLimiter?: RateLimiterConfig;
  /** Forward security events, e.g. to a crash reporter */
  onSecurityEvent?: (event: SecurityEvent) => void;
  /** Clock (for testing) */
  getNow?: () => number;
  /** Gateway retry delay implementation (for testing) */
  sleep?: (ms: number) => Promise<void>;
}

export interface InitializationReport {
  /** The key was due and has been replaced */
  rotated: boolean;
}

export type AccountDeletionStep = 'erase' | 'wipe';

export interface AccountDeletionReport {
  /** Both steps succeeded */
  complete: boolean;
  failedSteps: AccountDeletionStep[];
  errors: DataGuardError[];
}

/**
 * Data Protection SDK
 *
 * @example
 * ```typescript
 * const sdk = createDataProtectionSDK({
 *   store: new MemoryKeyValueStore(),
 *   config: loadConfigFromEnv(process.env),
 * });
 *
 * await sdk.initialize();
 * await sdk.consent.recordConsent({ dataProcessing: true, analytics: false });
 *
 * const stored = await sdk.cipher.encrypt('student@example.com');
 * ```
 */
export class DataProtectionSDK {
  readonly config: PrivacyKitConfig;
  readonly logger: Logger;
  readonly events: SecurityEventLog;
  readonly keyVault: SecureKeyVault;
  readonly cipher: FieldCipher;
  readonly consent: ConsentLedger;
  readonly rateLimiter: CooldownRateLimiter;
  readonly gateway: SecureGateway;

  constructor(sdkConfig: SDKConfig) {
    this.config = { ...DEFAULT_CONFIG, ...sdkConfig.config };
    this.logger = sdkConfig.logger ?? new Logger({ level: this.config.logLevel, json: this.config.logJson });

    this.events = new SecurityEventLog(
      { onEvent: sdkConfig.onSecurityEvent, logger: this.logger },
      sdkConfig.getNow
    );
    this.keyVault = new SecureKeyVault(
      sdkConfig.store,
      { rotationDays: sdkConfig.keyRotationDays, logger: this.logger },
      sdkConfig.getNow
    );
    this.cipher = new FieldCipher(this.keyVault, this.logger);
    this.consent = new ConsentLedger(
      sdkConfig.store,
      { policyVersion: this.config.policyVersion, logger: this.logger },
      sdkConfig.getNow
    );
    this.rateLimiter = new CooldownRateLimiter(sdkConfig.rateLimiter, sdkConfig.getNow);
    this.gateway = new SecureGateway({
      allowedDomains: this.config.allowedDomains,
      developmentMode: this.config.developmentMode,
      timeoutMs: this.config.httpTimeoutMs,
      transport: sdkConfig.transport,
      events: this.events,
      logger: this.logger,
      sleep: sdkConfig.sleep,
    });

    if (this.config.developmentMode) {
      this.logger.warn('Development mode: every http(s) destination is allowed');
    }
  }

  /**
   * Ensures a key exists and rotates it when due.
   *
   * Rotation here is lossy: fields encrypted under the old key are not
   * migrated. Use {@link rotateKey} when ciphertexts must survive.
   */
  async initialize(): Promise<Result<InitializationReport>> {
    const ensured = await this.keyVault.ensureKey();
    if (!ensured.ok) {
      return ensured;
    }

    if (!(await this.keyVault.needsRotation())) {
      return ok({ rotated: false });
    }

    const rotated = await this.keyVault.rotate();
    if (!rotated.ok) {
      return rotated;
    }
    return ok({ rotated: true });
  }

  /**
   * Right to be Forgotten: erases the store, then wipes the key.
   *
   * The key is wiped even when the erase fails. A crash between the two
   * steps can leave the key in place with no consent record; calling this
   * again completes the deletion.
   */
  async deleteAccount(): Promise<AccountDeletionReport> {
    const failedSteps: AccountDeletionStep[] = [];
    const errors: DataGuardError[] = [];

    const erased = await this.consent.eraseAll();
    if (!erased.ok) {
      failedSteps.push('erase');
      errors.push(erased.error);
    }

    const wiped = await this.keyVault.wipe();
    if (!wiped.ok) {
      failedSteps.push('wipe');
      errors.push(wiped.error);
    }

    const complete = failedSteps.length === 0;
    if (complete) {
      this.logger.info('Account deleted');
    } else {
      this.logger.error('Account deletion incomplete', { failedSteps });
    }
    return { complete, failedSteps, errors };
  }

  /**
   * Rotates the key and re-encrypts `ciphertexts` under the new one,
   * returned in the same order. Nothing is rotated if any input is not a
   * valid envelope.
   */
  async rotateKey(ciphertexts: readonly string[]): Promise<Result<string[]>> {
    const oldKey = await this.keyVault.currentKey();

    const plaintexts: string[] = [];
    for (const [index, ciphertext] of ciphertexts.entries()) {
      const decoded = tryDecode(ciphertext, oldKey);
      if (!decoded.ok) {
        return err(
          new ValidationError(`Ciphertext at index ${index} is not a valid envelope`, decoded.error.code, String(index))
        );
      }
      plaintexts.push(decoded.value);
    }

    const rotated = await this.keyVault.rotate();
    if (!rotated.ok) {
      return rotated;
    }

    const newKey = await this.keyVault.currentKey();
    const reencrypted: string[] = [];
    for (const plaintext of plaintexts) {
      const encoded = tryEncode(plaintext, newKey);
      if (!encoded.ok) {
        return encoded;
      }
      reencrypted.push(encoded.value);
    }

    this.logger.info('Encryption key rotated with re-encryption', { fields: reencrypted.length });
    return ok(reencrypted);
  }
}

export function createDataProtectionSDK(config: SDKConfig): DataProtectionSDK {
  return new DataProtectionSDK(config);
}
