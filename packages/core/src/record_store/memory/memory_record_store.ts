import type { RecordStore } from '../record_store';

/**
 * Options for MemoryRecordStore
 */
export interface MemoryRecordStoreOptions<T> {
  /** Initial data; insertion order becomes list() order */
  initial?: Map<string, T> | Array<{ id: string; value: T }>;

  /** Clone data on get/put (default: true) */
  deepClone?: boolean;
}

/**
 * MemoryRecordStore<T> - In-memory implementation of RecordStore<T>
 *
 * Backs the CLI and unit tests. Clones values on get/put by default so
 * callers cannot mutate stored snapshots.
 *
 * @example
 * const store = new MemoryRecordStore<OrgUnitRecord>();
 * await store.put('OPS_G3', { id: 'OPS_G3', name: 'G-3 Operations', echelon: 'Staff' });
 * expect(await store.exists('OPS_G3')).toBe(true);
 */
export class MemoryRecordStore<T> implements RecordStore<T> {
  private readonly data: Map<string, T>;
  private readonly deepClone: boolean;

  constructor(options: MemoryRecordStoreOptions<T> = {}) {
    const initial = options.initial;
    if (Array.isArray(initial)) {
      this.data = new Map(initial.map(({ id, value }) => [id, value]));
    } else {
      this.data = initial ?? new Map();
    }
    this.deepClone = options.deepClone ?? true;
  }

  private clone(value: T): T {
    if (!this.deepClone) return value;
    return structuredClone(value);
  }

  async get(id: string): Promise<T | null> {
    const value = this.data.get(id);
    return value !== undefined ? this.clone(value) : null;
  }

  async put(id: string, value: T): Promise<void> {
    this.data.set(id, this.clone(value));
  }

  async putMany(entries: Array<{ id: string; value: T }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    this.data.delete(id);
  }

  async list(): Promise<string[]> {
    return Array.from(this.data.keys());
  }

  async exists(id: string): Promise<boolean> {
    return this.data.has(id);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of RecordStore<T>)
  // ─────────────────────────────────────────────────────────

  /** Clears all records from the store */
  clear(): void {
    this.data.clear();
  }

  /** Returns the number of records */
  size(): number {
    return this.data.size;
  }
}
