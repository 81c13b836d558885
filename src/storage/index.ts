/**
 * Storage Module
 *
 * The key-value store contract behind the key vault and the consent
 * ledger, and an in-memory implementation for development and testing.
 *
 * @packageDocumentation
 */

export { StoreKeys, isReservedKey } from './interfaces.js';

export type { KeyValueStore, StoredValue, StoredValueKind, StoreKey } from './interfaces.js';

export { MemoryKeyValueStore, createMemoryStore } from './memory.js';

export type { MemoryStoreOptions } from './memory.js';
