import type {
  CollectionName,
  DocumentData,
  ListQuery,
  PersistenceReader,
  SetOptions,
  StoredDocument,
  TransactionContext
} from './persistence.js';
import { applyQuery } from './query.js';

export type PendingWrite =
  | { type: 'set'; collection: CollectionName; key: string; data: DocumentData; merge: boolean }
  | { type: 'delete'; collection: CollectionName; key: string };

/**
 * Transaction context for backends that cannot hold a native transaction open
 * across awaits. Writes are queued in order and replayed by the adapter on
 * commit; reads go to `reader` and are overlaid with the queued writes.
 */
export class TransactionBuffer implements TransactionContext {
  private readonly writes: PendingWrite[] = [];

  constructor(private readonly reader: PersistenceReader) {}

  getWrites(): PendingWrite[] {
    return [...this.writes];
  }

  set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): void {
    this.writes.push({ type: 'set', collection, key, data: { ...data }, merge: Boolean(options?.merge) });
  }

  delete(collection: CollectionName, key: string): void {
    this.writes.push({ type: 'delete', collection, key });
  }

  async get(collection: CollectionName, key: string): Promise<DocumentData | null> {
    const base = await this.reader.get(collection, key);
    return this.overlay(collection, key, base);
  }

  async list(collection: CollectionName, query?: ListQuery): Promise<StoredDocument[]> {
    const touched = this.writes.filter(write => write.collection === collection);
    if (touched.length === 0) {
      return this.reader.list(collection, query);
    }

    // Pending writes can move documents in or out of the filter, so
    // overlay the whole collection before applying the query.
    const base = await this.reader.list(collection);
    const docs = new Map<string, DocumentData>(base.map(doc => [doc.key, doc.data]));
    for (const write of touched) {
      if (write.type === 'delete') {
        docs.delete(write.key);
        continue;
      }
      const previous = docs.get(write.key);
      docs.set(write.key, write.merge && previous ? { ...previous, ...write.data } : { ...write.data });
    }

    const merged = Array.from(docs, ([key, data]) => ({ key, data }));
    return applyQuery(merged, query);
  }

  private overlay(collection: CollectionName, key: string, base: DocumentData | null): DocumentData | null {
    let current = base;
    for (const write of this.writes) {
      if (write.collection !== collection || write.key !== key) {
        continue;
      }
      if (write.type === 'delete') {
        current = null;
      } else {
        current = write.merge && current ? { ...current, ...write.data } : { ...write.data };
      }
    }
    return current;
  }
}
