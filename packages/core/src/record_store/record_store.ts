/**
 * RecordStore<V> - Generic interface for record persistence
 *
 * Abstracts CRUD operations without assuming storage backend.
 * Each implementation decides how to persist (memory, db, remote).
 * `list()` must return ids in a stable order: the authority lookup relies on
 * it as the within-tier tie-break.
 *
 * @typeParam V - Value type (the record being stored)
 */
export interface RecordStore<V> {
  /**
   * Gets a record by ID
   * @returns The record or null if it doesn't exist
   */
  get(id: string): Promise<V | null>;

  /**
   * Persists a record
   */
  put(id: string, value: V): Promise<void>;

  /**
   * Persists multiple records, in order.
   */
  putMany(entries: Array<{ id: string; value: V }>): Promise<void>;

  /**
   * Deletes a record
   */
  delete(id: string): Promise<void>;

  /**
   * Lists all record IDs
   */
  list(): Promise<string[]>;

  /**
   * Checks if a record exists
   */
  exists(id: string): Promise<boolean>;
}
