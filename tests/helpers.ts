import { fromMaterial } from '../src/records.js';
import { MemoryAdapter } from '../src/storage/memoryAdapter.js';
import type { DocumentData, PersistenceAdapter, TransactionContext } from '../src/storage/persistence.js';
import type { Clock, Material } from '../src/types.js';

export const FILM: Material = {
  materialCode: '60115949',
  description: 'Rewind film',
  maxQty: 20,
  prefix: 'SL-5959',
  allowIncomplete: true,
  active: true
};

export const LINER: Material = {
  materialCode: '70220011',
  description: 'Release liner',
  maxQty: 3,
  prefix: 'LN-',
  allowIncomplete: false,
  active: true
};

/** Each call returns one second later than the previous one. */
export function tickingClock(start = '2026-03-02T08:00:00.000Z'): Clock {
  let next = Date.parse(start);
  return () => {
    const now = new Date(next);
    next += 1000;
    return now;
  };
}

export function seededStore(materials: Material[], counter?: number): MemoryAdapter {
  const materialDocs: Record<string, DocumentData> = {};
  for (const material of materials) {
    materialDocs[material.materialCode] = fromMaterial(material);
  }
  return new MemoryAdapter({
    materials: materialDocs,
    settings: counter === undefined ? {} : { global: { key: 'global', global_pallet_counter: counter } }
  });
}

export function drumNumber(index: number): string {
  return String(15518000 + index);
}

/** Delegates everything but fails every transaction after its work has run. */
export class FailingCommitAdapter implements PersistenceAdapter {
  readonly name = 'failing';
  readonly atomic = true;

  constructor(readonly inner: PersistenceAdapter) {}

  get: PersistenceAdapter['get'] = (collection, key) => this.inner.get(collection, key);
  list: PersistenceAdapter['list'] = (collection, query) => this.inner.list(collection, query);
  set: PersistenceAdapter['set'] = (collection, key, data, options) => this.inner.set(collection, key, data, options);
  delete: PersistenceAdapter['delete'] = (collection, key) => this.inner.delete(collection, key);
  close: PersistenceAdapter['close'] = () => this.inner.close();

  runTransaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    return this.inner.runTransaction(async tx => {
      await work(tx);
      throw new Error('commit rejected by backend');
    });
  }
}
