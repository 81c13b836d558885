/**
 * Consent Ledger Module
 *
 * Persisted consent state machine and data-subject rights (GDPR, DPDP Act):
 *
 *   NO_CONSENT → GRANTED → (STALE | WITHDRAWN) → GRANTED (re-consent)
 *
 * One record governs every category. Consent is STALE once the privacy
 * policy version changes or twelve months (of 30 days) have passed, and
 * must then be obtained again before processing continues.
 *
 * Every operation returns a {@link Result}; store failures are logged and
 * reported, never thrown into UI code.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { DataGuardError, StorageError, ValidationError, toError } from '../errors.js';
import { KeyValueStore, StoreKeys, StoredValue, isReservedKey } from '../storage/interfaces.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { Result, ok, err } from '../utils/result.js';
import { SerialQueue } from '../utils/serial-queue.js';

/**
 * Individually grantable consent categories
 */
export interface ConsentGrants {
  dataProcessing: boolean;
  analytics: boolean;
  marketing: boolean;
  thirdPartySharing: boolean;
}

export type ConsentCategory = keyof ConsentGrants;

export type ConsentState = 'NO_CONSENT' | 'GRANTED' | 'STALE' | 'WITHDRAWN';

export interface RecordConsentRequest {
  dataProcessing: boolean;
  analytics: boolean;
  marketing?: boolean;
  thirdPartySharing?: boolean;
  /** The user is under 18; `hasParentalConsent` is then recorded */
  isMinor?: boolean;
  hasParentalConsent?: boolean;
}

export interface ConsentStatus extends ConsentGrants {
  state: ConsentState;
  /** Master consent flag */
  hasConsent: boolean;
  policyVersion: string | null;
  consentDate: Date | null;
  ageVerified: boolean;
  hasParentalConsent: boolean;
  /** Recorded against the current policy version */
  isCurrentPolicy: boolean;
  /** No consent date, or twelve months have elapsed */
  needsRenewal: boolean;
  /** Processing may continue: granted, data processing on, current and fresh */
  isValid: boolean;
}

export interface AccessLogEntry {
  /** ISO-8601 */
  timestamp: string;
  dataType: string;
  purpose: string;
  accessedBy: string;
}

/**
 * Portable snapshot of everything stored about the user
 */
export interface DataExport {
  exportDate: string;
  appName: string;
  dataFormatVersion: '1.0';
  userData: Record<string, StoredValue>;
  consentHistory: Record<string, StoredValue>;
  preferences: Record<string, StoredValue>;
}

export interface ConsentLedgerConfig {
  /** Current privacy policy version (default: '1.0.0') */
  policyVersion?: string;
  /** Name written into exports (default: 'Offline Learning App') */
  appName?: string;
  /** Access-log capacity (default: 100) */
  maxAccessLogEntries?: number;
  /** Months (of 30 days) a consent stays fresh (default: 12) */
  consentValidityMonths?: number;
  logger?: Logger;
}

export const CURRENT_POLICY_VERSION = '1.0.0';

const DAYS_PER_MONTH = 30;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ADULT_AGE = 18;

const GRANT_SLOTS: Record<ConsentCategory, string> = {
  dataProcessing: StoreKeys.DATA_PROCESSING,
  analytics: StoreKeys.ANALYTICS,
  marketing: StoreKeys.MARKETING,
  thirdPartySharing: StoreKeys.THIRD_PARTY,
};

const CATEGORIES: readonly ConsentCategory[] = ['dataProcessing', 'analytics', 'marketing', 'thirdPartySharing'];

const accessLogEntrySchema = z.object({
  timestamp: z.string(),
  dataType: z.string(),
  purpose: z.string(),
  accessedBy: z.string(),
});

/**
 * Consent Ledger
 *
 * @example
 * ```typescript
 * const ledger = new ConsentLedger(store);
 *
 * await ledger.recordConsent({ dataProcessing: true, analytics: false });
 *
 * const status = await ledger.status();
 * if (status.ok && !status.value.isValid) {
 *   showConsentScreen();
 * }
 * ```
 */
export class ConsentLedger {
  private readonly store: KeyValueStore;
  private readonly logger: Logger;
  private readonly policyVersion: string;
  private readonly appName: string;
  private readonly maxAccessLogEntries: number;
  private readonly validityDays: number;
  private readonly accessLogQueue: SerialQueue;
  private readonly getNow: () => number;

  /**
   * @param getNow - Optional clock (for testing)
   */
  constructor(store: KeyValueStore, config: ConsentLedgerConfig = {}, getNow?: () => number) {
    this.store = store;
    this.logger = (config.logger ?? defaultLogger).child('ConsentLedger');
    this.policyVersion = config.policyVersion ?? CURRENT_POLICY_VERSION;
    this.appName = config.appName ?? 'Offline Learning App';
    this.maxAccessLogEntries = config.maxAccessLogEntries ?? 100;
    this.validityDays = (config.consentValidityMonths ?? 12) * DAYS_PER_MONTH;
    this.accessLogQueue = new SerialQueue('AccessLog');
    this.getNow = getNow ?? (() => Date.now());

    if (this.maxAccessLogEntries <= 0) {
      throw new Error('maxAccessLogEntries must be positive');
    }
  }

  getPolicyVersion(): string {
    return this.policyVersion;
  }

  /**
   * Records an explicit grant against the current policy version.
   *
   * The master flag is written last, so a failure part-way leaves the
   * previous master state in place.
   */
  async recordConsent(request: RecordConsentRequest): Promise<Result<void>> {
    const grants: ConsentGrants = {
      dataProcessing: request.dataProcessing,
      analytics: request.analytics,
      marketing: request.marketing ?? false,
      thirdPartySharing: request.thirdPartySharing ?? false,
    };

    return this.attempt('recordConsent', async () => {
      for (const category of CATEGORIES) {
        await this.store.setBool(GRANT_SLOTS[category], grants[category]);
      }
      await this.store.setString(StoreKeys.CONSENT_VERSION, this.policyVersion);
      await this.store.setString(StoreKeys.CONSENT_TIMESTAMP, new Date(this.getNow()).toISOString());

      if (request.isMinor) {
        await this.store.setBool(StoreKeys.PARENTAL_CONSENT, request.hasParentalConsent ?? false);
      }

      await this.store.setBool(StoreKeys.CONSENT, true);
      this.logger.info('Consent recorded', { policyVersion: this.policyVersion, ...grants });
    });
  }

  async status(): Promise<Result<ConsentStatus>> {
    return this.attempt('status', async () => {
      const hasConsent = (await this.store.getBool(StoreKeys.CONSENT)) ?? false;
      const grants: ConsentGrants = {
        dataProcessing: (await this.store.getBool(StoreKeys.DATA_PROCESSING)) ?? false,
        analytics: (await this.store.getBool(StoreKeys.ANALYTICS)) ?? false,
        marketing: (await this.store.getBool(StoreKeys.MARKETING)) ?? false,
        thirdPartySharing: (await this.store.getBool(StoreKeys.THIRD_PARTY)) ?? false,
      };
      const policyVersion = await this.store.getString(StoreKeys.CONSENT_VERSION);
      const consentDate = parseDate(await this.store.getString(StoreKeys.CONSENT_TIMESTAMP));
      const ageVerified = (await this.store.getBool(StoreKeys.AGE_VERIFIED)) ?? false;
      const hasParentalConsent = (await this.store.getBool(StoreKeys.PARENTAL_CONSENT)) ?? false;

      const isCurrentPolicy = policyVersion === this.policyVersion;
      const needsRenewal = this.isExpired(consentDate);
      const state = deriveState(hasConsent, grants.dataProcessing, consentDate, isCurrentPolicy, needsRenewal);

      return {
        state,
        hasConsent,
        ...grants,
        policyVersion,
        consentDate,
        ageVerified,
        hasParentalConsent,
        isCurrentPolicy,
        needsRenewal,
        isValid: state === 'GRANTED',
      };
    });
  }

  /**
   * True only when processing may continue; false on any failure
   */
  async hasValidConsent(): Promise<boolean> {
    const status = await this.status();
    return status.ok && status.value.isValid;
  }

  /**
   * Clears the given grants, or every grant and the master flag for `'all'`.
   * The access log is left intact.
   */
  async withdraw(which: readonly ConsentCategory[] | 'all'): Promise<Result<void>> {
    const categories = which === 'all' ? CATEGORIES : which;

    return this.attempt('withdraw', async () => {
      if (which === 'all') {
        await this.store.setBool(StoreKeys.CONSENT, false);
      }
      for (const category of categories) {
        await this.store.setBool(GRANT_SLOTS[category], false);
      }
      this.logger.info('Consent withdrawn', { categories: [...categories] });
    });
  }

  /**
   * Records age verification. Under 18 also records the parental-consent flag.
   */
  async verifyAge(age: number, hasParentalConsent: boolean): Promise<Result<void>> {
    if (!Number.isInteger(age) || age < 0 || age > 150) {
      return err(new ValidationError('Age must be a whole number between 0 and 150', 'INVALID_AGE', 'age'));
    }

    return this.attempt('verifyAge', async () => {
      await this.store.setBool(StoreKeys.AGE_VERIFIED, true);
      if (age < ADULT_AGE) {
        await this.store.setBool(StoreKeys.PARENTAL_CONSENT, hasParentalConsent);
      }
      this.logger.info('Age verification recorded', { minor: age < ADULT_AGE });
    });
  }

  canUseAnalytics(): Promise<boolean> {
    return this.readFlag(StoreKeys.ANALYTICS);
  }

  canSendMarketing(): Promise<boolean> {
    return this.readFlag(StoreKeys.MARKETING);
  }

  canShareWithThirdParty(): Promise<boolean> {
    return this.readFlag(StoreKeys.THIRD_PARTY);
  }

  hasAcknowledgedDataRetention(): Promise<boolean> {
    return this.readFlag(StoreKeys.DATA_RETENTION_ACK);
  }

  async acknowledgeDataRetention(): Promise<Result<void>> {
    return this.attempt('acknowledgeDataRetention', async () => {
      await this.store.setBool(StoreKeys.DATA_RETENTION_ACK, true);
    });
  }

  /**
   * Right to Data Portability: every stored key except the key-vault slots,
   * bucketed by name into consent history, preferences and user data.
   */
  async exportAll(): Promise<Result<DataExport>> {
    return this.attempt('exportAll', async () => {
      const snapshot: DataExport = {
        exportDate: new Date(this.getNow()).toISOString(),
        appName: this.appName,
        dataFormatVersion: '1.0',
        userData: {},
        consentHistory: {},
        preferences: {},
      };

      for (const key of await this.store.keys()) {
        if (key.includes('encryption')) {
          continue;
        }

        const value = await this.store.get(key);
        if (value === null) {
          continue;
        }

        if (key.includes('consent') || key.includes('privacy')) {
          snapshot.consentHistory[key] = value;
        } else if (key.includes('pref') || key.includes('setting')) {
          snapshot.preferences[key] = value;
        } else {
          snapshot.userData[key] = value;
        }
      }

      this.logger.info('User data exported', {
        userData: Object.keys(snapshot.userData).length,
        consentHistory: Object.keys(snapshot.consentHistory).length,
        preferences: Object.keys(snapshot.preferences).length,
      });
      return snapshot;
    });
  }

  /**
   * Right to be Forgotten: clears the entire store. Irreversible.
   *
   * Whether the key-vault slots go with it depends on the store; wipe the
   * vault separately (`DataProtectionSDK.deleteAccount` does both).
   */
  async eraseAll(): Promise<Result<void>> {
    return this.attempt('eraseAll', async () => {
      await this.accessLogQueue.run(() => this.store.clear());
      this.logger.info('All user data erased');
    });
  }

  /**
   * Right to Rectification: overwrites one stored field. Integral numbers
   * are stored as int, other numbers as float. Reserved slots are refused.
   */
  async rectify(key: string, value: string | number | boolean): Promise<Result<void>> {
    if (key.trim().length === 0) {
      return err(new ValidationError('Field name is required', 'FIELD_REQUIRED', 'key'));
    }
    if (isReservedKey(key)) {
      return err(new ValidationError(`Field '${key}' is managed internally`, 'RESERVED_KEY', key));
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      return err(new ValidationError(`Value for '${key}' is not a finite number`, 'INVALID_NUMBER', key));
    }

    return this.attempt('rectify', async () => {
      if (typeof value === 'string') {
        await this.store.setString(key, value);
      } else if (typeof value === 'boolean') {
        await this.store.setBool(key, value);
      } else if (Number.isInteger(value)) {
        await this.store.setInt(key, value);
      } else {
        await this.store.setFloat(key, value);
      }
      this.logger.info('User data rectified', { field: key });
    });
  }

  /**
   * Appends to the bounded access log, evicting the oldest entries
   */
  async logAccess(dataType: string, purpose: string, actor = 'system'): Promise<Result<void>> {
    const entry: AccessLogEntry = {
      timestamp: new Date(this.getNow()).toISOString(),
      dataType,
      purpose,
      accessedBy: actor,
    };

    return this.attempt('logAccess', () =>
      this.accessLogQueue.run(async () => {
        const log = (await this.store.getStringList(StoreKeys.ACCESS_LOG)) ?? [];
        log.push(JSON.stringify(entry));
        const trimmed = log.length > this.maxAccessLogEntries ? log.slice(log.length - this.maxAccessLogEntries) : log;
        await this.store.setStringList(StoreKeys.ACCESS_LOG, trimmed);
      })
    );
  }

  /**
   * Access-log entries, oldest first. Unreadable entries are skipped.
   */
  async accessLog(): Promise<Result<AccessLogEntry[]>> {
    return this.attempt('accessLog', async () => {
      const raw = (await this.store.getStringList(StoreKeys.ACCESS_LOG)) ?? [];
      const entries: AccessLogEntry[] = [];
      let skipped = 0;

      for (const line of raw) {
        const parsed = accessLogEntrySchema.safeParse(parseJsonSafe(line));
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          skipped++;
        }
      }

      if (skipped > 0) {
        this.logger.warn('Skipped unreadable access-log entries', { skipped });
      }
      return entries;
    });
  }

  private isExpired(consentDate: Date | null): boolean {
    if (consentDate === null) {
      return true;
    }
    const elapsedDays = Math.floor((this.getNow() - consentDate.getTime()) / MS_PER_DAY);
    return elapsedDays >= this.validityDays;
  }

  private async readFlag(slot: string): Promise<boolean> {
    try {
      return (await this.store.getBool(slot)) ?? false;
    } catch (error) {
      this.logger.warn('Consent flag unreadable, treating as not granted', { slot }, toError(error));
      return false;
    }
  }

  /**
   * Runs a store operation, converting any failure into a logged Err
   */
  private async attempt<T>(operation: string, task: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await task());
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Consent ledger ${operation} failed`, { operation }, cause);
      const failure =
        error instanceof DataGuardError ? error : new StorageError(`Consent ledger ${operation} failed`, operation, cause);
      return err(failure);
    }
  }
}

function deriveState(
  hasConsent: boolean,
  dataProcessing: boolean,
  consentDate: Date | null,
  isCurrentPolicy: boolean,
  needsRenewal: boolean
): ConsentState {
  if (!hasConsent) {
    return consentDate === null ? 'NO_CONSENT' : 'WITHDRAWN';
  }
  if (!isCurrentPolicy || needsRenewal) {
    return 'STALE';
  }
  return dataProcessing ? 'GRANTED' : 'WITHDRAWN';
}

function parseDate(value: string | null): Date | null {
  if (value === null) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createConsentLedger(
  store: KeyValueStore,
  config?: ConsentLedgerConfig,
  getNow?: () => number
): ConsentLedger {
  return new ConsentLedger(store, config, getNow);
}
