/**
 * Persistence contract shared by every backend.
 *
 * Four collections are addressed by primary key: `materials` (material_code),
 * `settings` (the literal key `global`), `drums` (drum_number) and
 * `pallets` (pallet_id). Field names are the snake_case names stored in the
 * backend; see `schema.ts`.
 */

export type CollectionName = 'materials' | 'settings' | 'drums' | 'pallets';

export type FieldValue = string | number | boolean;

export type DocumentData = Record<string, FieldValue>;

export interface StoredDocument {
  key: string;
  data: DocumentData;
}

export interface ListQuery {
  where?: Record<string, FieldValue>;
  orderBy?: string;
  direction?: 'asc' | 'desc';
}

export interface SetOptions {
  /** Merge into the existing document instead of replacing it. */
  merge?: boolean;
}

export interface PersistenceReader {
  get(collection: CollectionName, key: string): Promise<DocumentData | null>;
  /** Ties in `orderBy` keep insertion order. */
  list(collection: CollectionName, query?: ListQuery): Promise<StoredDocument[]>;
}

/**
 * Writes are buffered and applied when the transaction function resolves.
 * Reads see the committed state plus this transaction's pending writes.
 */
export interface TransactionContext extends PersistenceReader {
  set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): void;
  delete(collection: CollectionName, key: string): void;
}

export interface PersistenceAdapter extends PersistenceReader {
  readonly name: string;
  /** False when a failed commit may leave some writes applied (see DESIGN.md). */
  readonly atomic: boolean;
  set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): Promise<void>;
  delete(collection: CollectionName, key: string): Promise<void>;
  runTransaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export const COLLECTIONS: readonly CollectionName[] = ['materials', 'settings', 'drums', 'pallets'];

export const SETTINGS_KEY = 'global';
