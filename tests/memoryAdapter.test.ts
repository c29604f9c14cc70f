import { describe, expect, it } from 'vitest';
import { MemoryAdapter } from '../src/storage/memoryAdapter.js';
import { applyQuery } from '../src/storage/query.js';
import { TransactionBuffer } from '../src/storage/transactionBuffer.js';

describe('applyQuery', () => {
  const docs = [
    { key: 'a', data: { status: 'ACTIVE', timestamp: '2026-03-02T08:00:01.000Z' } },
    { key: 'b', data: { status: 'COMPLETED', timestamp: '2026-03-02T08:00:00.000Z' } },
    { key: 'c', data: { status: 'ACTIVE', timestamp: '2026-03-02T08:00:00.000Z' } },
    { key: 'd', data: { status: 'ACTIVE', timestamp: '2026-03-02T08:00:00.000Z' } }
  ];

  it('filters by equality and keeps insertion order for ties', () => {
    const result = applyQuery(docs, { where: { status: 'ACTIVE' }, orderBy: 'timestamp' });
    expect(result.map(doc => doc.key)).toEqual(['c', 'd', 'a']);
  });

  it('sorts descending without reversing ties', () => {
    const result = applyQuery(docs, { orderBy: 'timestamp', direction: 'desc' });
    expect(result.map(doc => doc.key)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('sorts numbers numerically', () => {
    const result = applyQuery(
      [
        { key: 'x', data: { count: 10 } },
        { key: 'y', data: { count: 9 } }
      ],
      { orderBy: 'count' }
    );
    expect(result.map(doc => doc.key)).toEqual(['y', 'x']);
  });
});

describe('TransactionBuffer', () => {
  it('overlays pending writes on reads', async () => {
    const store = new MemoryAdapter({ drums: { '1': { drum_number: '1', status: 'ACTIVE' } } });
    const tx = new TransactionBuffer(store);

    tx.set('drums', '1', { status: 'COMPLETED' }, { merge: true });
    tx.set('drums', '2', { drum_number: '2', status: 'ACTIVE' });

    expect(await tx.get('drums', '1')).toEqual({ drum_number: '1', status: 'COMPLETED' });
    expect((await tx.list('drums', { where: { status: 'ACTIVE' } })).map(doc => doc.key)).toEqual(['2']);

    tx.delete('drums', '2');
    expect(await tx.get('drums', '2')).toBeNull();
    expect(await store.get('drums', '1')).toEqual({ drum_number: '1', status: 'ACTIVE' });
    expect(tx.getWrites()).toHaveLength(3);
  });
});

describe('MemoryAdapter', () => {
  it('applies transaction writes only when the work resolves', async () => {
    const store = new MemoryAdapter();

    await expect(
      store.runTransaction(async tx => {
        tx.set('pallets', 'P-1', { pallet_id: 'P-1' });
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await store.get('pallets', 'P-1')).toBeNull();

    await store.runTransaction(async tx => {
      tx.set('pallets', 'P-1', { pallet_id: 'P-1', count: 2 });
    });
    expect(await store.get('pallets', 'P-1')).toEqual({ pallet_id: 'P-1', count: 2 });
  });

  it('replaces or merges on set', async () => {
    const store = new MemoryAdapter({ settings: { global: { key: 'global', global_pallet_counter: 4 } } });

    await store.set('settings', 'global', { report_email: 'reports@example.com' }, { merge: true });
    expect(await store.get('settings', 'global')).toEqual({
      key: 'global',
      global_pallet_counter: 4,
      report_email: 'reports@example.com'
    });

    await store.set('settings', 'global', { key: 'global' });
    expect(await store.get('settings', 'global')).toEqual({ key: 'global' });
  });

  it('runs transactions one after another', async () => {
    const store = new MemoryAdapter({ settings: { global: { key: 'global', global_pallet_counter: 0 } } });
    const increment = () =>
      store.runTransaction(async tx => {
        const doc = await tx.get('settings', 'global');
        const value = Number(doc?.global_pallet_counter ?? 0);
        await Promise.resolve();
        tx.set('settings', 'global', { global_pallet_counter: value + 1 }, { merge: true });
      });

    await Promise.all([increment(), increment(), increment()]);

    expect(await store.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 3 });
  });
});
