import type {
  CollectionName,
  DocumentData,
  ListQuery,
  PersistenceAdapter,
  SetOptions,
  StoredDocument,
  TransactionContext
} from './persistence.js';
import { COLLECTIONS } from './persistence.js';
import { applyQuery } from './query.js';
import { SerialQueue } from './serialQueue.js';
import { TransactionBuffer, type PendingWrite } from './transactionBuffer.js';

type Seed = Partial<Record<CollectionName, Record<string, DocumentData>>>;

/**
 * In-process backend. Transactions run one at a time and their buffered
 * writes are applied in a single synchronous step, so a throw anywhere in the
 * transaction leaves the store untouched.
 */
export class MemoryAdapter implements PersistenceAdapter {
  readonly name = 'memory';
  readonly atomic = true;
  private readonly collections = new Map<CollectionName, Map<string, DocumentData>>();
  private readonly queue = new SerialQueue();

  constructor(seed: Seed = {}) {
    for (const collection of COLLECTIONS) {
      const docs = new Map<string, DocumentData>();
      for (const [key, data] of Object.entries(seed[collection] ?? {})) {
        docs.set(key, { ...data });
      }
      this.collections.set(collection, docs);
    }
  }

  async get(collection: CollectionName, key: string): Promise<DocumentData | null> {
    const doc = this.docs(collection).get(key);
    return doc ? { ...doc } : null;
  }

  async list(collection: CollectionName, query?: ListQuery): Promise<StoredDocument[]> {
    const docs = Array.from(this.docs(collection), ([key, data]) => ({ key, data: { ...data } }));
    return applyQuery(docs, query);
  }

  async set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): Promise<void> {
    await this.queue.run(async () => {
      this.apply([{ type: 'set', collection, key, data, merge: Boolean(options?.merge) }]);
    });
  }

  async delete(collection: CollectionName, key: string): Promise<void> {
    await this.queue.run(async () => {
      this.apply([{ type: 'delete', collection, key }]);
    });
  }

  runTransaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const tx = new TransactionBuffer(this);
      const result = await work(tx);
      this.apply(tx.getWrites());
      return result;
    });
  }

  async close(): Promise<void> {
    // Nothing to release.
  }

  private docs(collection: CollectionName): Map<string, DocumentData> {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    return docs;
  }

  private apply(writes: PendingWrite[]): void {
    for (const write of writes) {
      const docs = this.docs(write.collection);
      if (write.type === 'delete') {
        docs.delete(write.key);
        continue;
      }
      const previous = docs.get(write.key);
      docs.set(write.key, write.merge && previous ? { ...previous, ...write.data } : { ...write.data });
    }
  }
}
