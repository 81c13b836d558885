/**
 * Storage Interfaces Module
 *
 * The persistent key-value store that backs the key vault and the consent
 * ledger. On a device this is the platform preferences store; the library
 * ships an in-memory implementation for development and testing.
 *
 * Implementations are expected to be crash-consistent per key but need not
 * be transactional across keys. Callers order their writes so that a
 * partial failure leaves recoverable state.
 *
 * @packageDocumentation
 */

/**
 * Any value the store can hold
 */
export type StoredValue = string | number | boolean | string[];

/**
 * Type tag of a stored value
 */
export type StoredValueKind = 'string' | 'int' | 'float' | 'bool' | 'stringList';

/**
 * Key-Value Store Interface
 *
 * Typed getters return `null` when the key is absent or holds a value of
 * another kind. Every method may reject with a `StorageError` when the
 * backing store is unavailable.
 *
 * @example
 * ```typescript
 * // Adapter over a preferences plugin
 * class PreferencesStore implements KeyValueStore {
 *   async getString(key: string): Promise<string | null> {
 *     const { value } = await Preferences.get({ key });
 *     return value;
 *   }
 *   // ...
 * }
 * ```
 */
export interface KeyValueStore {
  getString(key: string): Promise<string | null>;
  getBool(key: string): Promise<boolean | null>;
  getInt(key: string): Promise<number | null>;
  getFloat(key: string): Promise<number | null>;
  getStringList(key: string): Promise<string[] | null>;

  setString(key: string, value: string): Promise<void>;
  setBool(key: string, value: boolean): Promise<void>;
  /**
   * @throws ValidationError if `value` is not an integer
   */
  setInt(key: string, value: number): Promise<void>;
  setFloat(key: string, value: number): Promise<void>;
  setStringList(key: string, value: string[]): Promise<void>;

  /**
   * Value under `key` regardless of its kind
   */
  get(key: string): Promise<StoredValue | null>;

  keys(): Promise<string[]>;

  containsKey(key: string): Promise<boolean>;

  remove(key: string): Promise<void>;

  /**
   * Removes every key, including reserved slots
   */
  clear(): Promise<void>;
}

/**
 * Reserved slots written by this library
 */
export const StoreKeys = {
  ENCRYPTION_KEY: 'app_encryption_key',
  KEY_CREATED_AT: 'encryption_key_created_at',
  CONSENT: 'user_privacy_consent',
  CONSENT_TIMESTAMP: 'consent_timestamp',
  CONSENT_VERSION: 'consent_version',
  DATA_PROCESSING: 'data_processing_consent',
  ANALYTICS: 'analytics_consent',
  MARKETING: 'marketing_consent',
  THIRD_PARTY: 'third_party_consent',
  DATA_RETENTION_ACK: 'data_retention_acknowledged',
  AGE_VERIFIED: 'age_verified',
  PARENTAL_CONSENT: 'parental_consent',
  ACCESS_LOG: 'data_access_log',
} as const;

export type StoreKey = (typeof StoreKeys)[keyof typeof StoreKeys];

const RESERVED = new Set<string>(Object.values(StoreKeys));

/**
 * True if `key` is one of the library's reserved slots
 */
export function isReservedKey(key: string): boolean {
  return RESERVED.has(key);
}
