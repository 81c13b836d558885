/**
 * In-Memory Storage Implementation
 *
 * Development and testing implementation of {@link KeyValueStore}.
 * NOT suitable for production: data is lost when the process exits.
 *
 * @packageDocumentation
 */

import { StorageError, ValidationError } from '../errors.js';
import { KeyValueStore, StoredValue, StoredValueKind } from './interfaces.js';

type Entry =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'stringList'; value: string[] };

export interface MemoryStoreOptions {
  /** Artificial delay before each operation settles, in ms (for testing races) */
  latencyMs?: number;
  /** Initial contents; numbers are stored as int when integral, float otherwise */
  initial?: Record<string, StoredValue>;
}

/**
 * In-Memory Key-Value Store
 *
 * @example
 * ```typescript
 * const store = new MemoryKeyValueStore();
 * await store.setBool('dark_mode', true);
 * await store.getBool('dark_mode'); // true
 * await store.getString('dark_mode'); // null (different kind)
 * ```
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries: Map<string, Entry>;
  private readonly latencyMs: number;
  private outage = false;

  constructor(options: MemoryStoreOptions = {}) {
    this.entries = new Map();
    this.latencyMs = options.latencyMs ?? 0;

    for (const [key, value] of Object.entries(options.initial ?? {})) {
      this.entries.set(key, toEntry(value));
    }
  }

  async getString(key: string): Promise<string | null> {
    const entry = await this.read('getString', key);
    return entry?.kind === 'string' ? entry.value : null;
  }

  async getBool(key: string): Promise<boolean | null> {
    const entry = await this.read('getBool', key);
    return entry?.kind === 'bool' ? entry.value : null;
  }

  async getInt(key: string): Promise<number | null> {
    const entry = await this.read('getInt', key);
    return entry?.kind === 'int' ? entry.value : null;
  }

  async getFloat(key: string): Promise<number | null> {
    const entry = await this.read('getFloat', key);
    return entry?.kind === 'float' || entry?.kind === 'int' ? entry.value : null;
  }

  async getStringList(key: string): Promise<string[] | null> {
    const entry = await this.read('getStringList', key);
    return entry?.kind === 'stringList' ? [...entry.value] : null;
  }

  async setString(key: string, value: string): Promise<void> {
    await this.write('setString', key, { kind: 'string', value });
  }

  async setBool(key: string, value: boolean): Promise<void> {
    await this.write('setBool', key, { kind: 'bool', value });
  }

  async setInt(key: string, value: number): Promise<void> {
    if (!Number.isInteger(value)) {
      throw new ValidationError(`Value for '${key}' is not an integer`, 'NOT_AN_INTEGER', key);
    }
    await this.write('setInt', key, { kind: 'int', value });
  }

  async setFloat(key: string, value: number): Promise<void> {
    await this.write('setFloat', key, { kind: 'float', value });
  }

  async setStringList(key: string, value: string[]): Promise<void> {
    await this.write('setStringList', key, { kind: 'stringList', value: [...value] });
  }

  async get(key: string): Promise<StoredValue | null> {
    const entry = await this.read('get', key);
    if (!entry) {
      return null;
    }
    return entry.kind === 'stringList' ? [...entry.value] : entry.value;
  }

  async keys(): Promise<string[]> {
    await this.settle('keys');
    return Array.from(this.entries.keys());
  }

  async containsKey(key: string): Promise<boolean> {
    return (await this.read('containsKey', key)) !== undefined;
  }

  async remove(key: string): Promise<void> {
    await this.settle('remove');
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    await this.settle('clear');
    this.entries.clear();
  }

  /**
   * Makes every subsequent operation reject with a StorageError (for testing)
   */
  simulateOutage(enabled: boolean): void {
    this.outage = enabled;
  }

  /**
   * Kind of the value under `key` (for testing)
   */
  kindOf(key: string): StoredValueKind | undefined {
    return this.entries.get(key)?.kind;
  }

  /**
   * Number of stored keys (for testing)
   */
  size(): number {
    return this.entries.size;
  }

  private async read(operation: string, key: string): Promise<Entry | undefined> {
    await this.settle(operation);
    return this.entries.get(key);
  }

  private async write(operation: string, key: string, entry: Entry): Promise<void> {
    await this.settle(operation);
    this.entries.set(key, entry);
  }

  private async settle(operation: string): Promise<void> {
    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }
    if (this.outage) {
      throw new StorageError('Store unavailable', operation);
    }
  }
}

function toEntry(value: StoredValue): Entry {
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (typeof value === 'boolean') {
    return { kind: 'bool', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'float', value };
  }
  return { kind: 'stringList', value: [...value] };
}

export function createMemoryStore(options?: MemoryStoreOptions): MemoryKeyValueStore {
  return new MemoryKeyValueStore(options);
}
