import { describe, expect, it } from 'vitest';
import { AdminService } from '../src/adminService.js';
import { CounterAllocator } from '../src/counterAllocator.js';
import { InvalidCounterValueError, InvalidEmailError, InvalidMaterialError } from '../src/errors.js';
import { MaterialCatalog } from '../src/materialCatalog.js';
import { PackingSession } from '../src/packingSession.js';
import { MemoryAdapter } from '../src/storage/memoryAdapter.js';
import { FILM, LINER, seededStore, tickingClock } from './helpers.js';

describe('CounterAllocator', () => {
  it('allocates inside a transaction and returns the stored value', async () => {
    const store = seededStore([], 41);
    const counter = new CounterAllocator(store);

    const value = await store.runTransaction(tx => counter.next(tx));

    expect(value).toBe(41);
    expect(await counter.current()).toBe(42);
  });

  it('allows moving the counter backwards', async () => {
    const counter = new CounterAllocator(seededStore([], 41));

    await counter.set(3);

    expect(await counter.current()).toBe(3);
  });

  it('rejects negative and fractional values', async () => {
    const counter = new CounterAllocator(seededStore([]));

    await expect(counter.set(-1)).rejects.toBeInstanceOf(InvalidCounterValueError);
    await expect(counter.set(1.5)).rejects.toThrow('Pallet counter must be a non-negative integer, got "1.5".');
    await expect(counter.set(Number.NaN)).rejects.toBeInstanceOf(InvalidCounterValueError);
  });
});

describe('MaterialCatalog', () => {
  it('decodes spreadsheet style values and falls back to the document key', async () => {
    const catalog = new MaterialCatalog(
      new MemoryAdapter({
        materials: {
          '60115949': { description: 'Rewind film', max_qty: '20', prefix: 'SL-5959', allow_incomplete: 'yes' }
        }
      })
    );

    expect(await catalog.get('60115949')).toEqual({
      materialCode: '60115949',
      description: 'Rewind film',
      maxQty: 20,
      prefix: 'SL-5959',
      allowIncomplete: true,
      active: true
    });
    expect(await catalog.get('00000000')).toBeNull();
  });

  it('returns unusable max quantities as stored', async () => {
    const catalog = new MaterialCatalog(
      new MemoryAdapter({ materials: { M1: { material_code: 'M1', max_qty: 'n/a' } } })
    );

    const material = await catalog.get('M1');

    expect(material?.maxQty).toBe(0);
    expect(material && MaterialCatalog.isPackable(material)).toBe(false);
    expect(MaterialCatalog.isPackable(FILM)).toBe(true);
  });

  it('lists active materials ordered by code', async () => {
    const catalog = new MaterialCatalog(
      seededStore([LINER, FILM, { ...FILM, materialCode: '50000000', active: false }])
    );

    expect((await catalog.listActive()).map(material => material.materialCode)).toEqual(['60115949', '70220011']);
  });
});

describe('AdminService', () => {
  it('creates and then updates a material', async () => {
    const store = seededStore([]);
    const admin = new AdminService(store);

    const created = await admin.saveMaterial({ materialCode: ' 60115949 ', maxQty: 20, prefix: 'SL-5959' });
    expect(created).toEqual({
      created: true,
      material: {
        materialCode: '60115949',
        description: '',
        maxQty: 20,
        prefix: 'SL-5959',
        allowIncomplete: false,
        active: true
      }
    });

    const updated = await admin.saveMaterial({ materialCode: '60115949', maxQty: 24, description: 'Rewind film' });
    expect(updated.created).toBe(false);
    expect(updated.material).toMatchObject({ maxQty: 24, prefix: 'SL-5959', description: 'Rewind film' });
    expect(await new MaterialCatalog(store).get('60115949')).toEqual(updated.material);
  });

  it('validates material input', async () => {
    const admin = new AdminService(seededStore([]));

    await expect(admin.saveMaterial({ materialCode: ' ', maxQty: 5 })).rejects.toThrow('Material code is required.');
    await expect(admin.saveMaterial({ materialCode: 'M1', maxQty: 0 })).rejects.toBeInstanceOf(InvalidMaterialError);
    await expect(admin.saveMaterial({ materialCode: 'M1', maxQty: 2.5 })).rejects.toBeInstanceOf(InvalidMaterialError);
  });

  it('stores the report email next to the counter', async () => {
    const admin = new AdminService(seededStore([], 12));

    await admin.setReportEmail(' reports@example.com ');

    expect(await admin.getSettings()).toEqual({ globalPalletCounter: 12, reportEmail: 'reports@example.com' });
    await expect(admin.setReportEmail('not-an-address')).rejects.toBeInstanceOf(InvalidEmailError);
    await admin.setReportEmail('');
    expect((await admin.getSettings()).reportEmail).toBe('');
  });

  it('sets the counter used by the next pallet', async () => {
    const store = seededStore([FILM], 7);
    const admin = new AdminService(store);
    const session = new PackingSession(store, tickingClock());
    await session.scan('60115949', 'DWP1500_LV 1', {
      labelMaterialCode: '60115949',
      standardQty: '1',
      operator: '',
      deviceId: 'station-1'
    });

    await admin.setCounter(100);
    const pallet = await session.generate('60115949', 'INCOMPLETE');

    expect(pallet.palletId).toBe('SL-5959100');
    expect((await admin.getSettings()).globalPalletCounter).toBe(101);
  });

  it('finds drums and pallet details', async () => {
    const store = seededStore([FILM], 0);
    const admin = new AdminService(store);
    const session = new PackingSession(store, tickingClock());
    for (const number of ['1001', '1002']) {
      await session.scan('60115949', `DWP1500_LV ${number}`, {
        labelMaterialCode: '60115949',
        standardQty: '900',
        operator: 'ana',
        deviceId: 'station-1'
      });
    }
    await session.generate('60115949', 'INCOMPLETE');

    expect(await admin.searchDrum(' 1002 ')).toMatchObject({ status: 'COMPLETED', palletId: 'SL-59590' });
    expect(await admin.searchDrum('9999')).toBeNull();

    const details = await admin.palletDetails('SL-59590');
    expect(details?.pallet).toMatchObject({ count: 2, completeType: 'INCOMPLETE' });
    expect(details?.drums.map(drum => drum.drumNumber)).toEqual(['1001', '1002']);
    expect(await admin.palletDetails('SL-0')).toBeNull();
  });

  it('filters history by period and material', async () => {
    const store = new MemoryAdapter({
      pallets: {
        'SL-59591': { pallet_id: 'SL-59591', material_code: '60115949', created_at: '2026-03-02T07:00:00.000Z' },
        'SL-59590': { pallet_id: 'SL-59590', material_code: '60115949', created_at: '2026-02-27T07:00:00.000Z' },
        'LN-1': { pallet_id: 'LN-1', material_code: '70220011', created_at: '2026-03-02T06:00:00.000Z' }
      },
      drums: {
        '1001': { drum_number: '1001', material_code: '60115949', timestamp: '2025-12-31T23:00:00.000Z' },
        '2001': { drum_number: '2001', material_code: '70220011', timestamp: '2026-03-01T10:00:00.000Z' }
      }
    });
    const admin = new AdminService(store, () => new Date('2026-03-02T12:00:00.000Z'));

    const today = await admin.history({ period: 'today' });
    expect(today.pallets.map(pallet => pallet.palletId)).toEqual(['LN-1', 'SL-59591']);
    expect(today.drums).toEqual([]);

    const film = await admin.history({ period: 'all', materialFilter: '5949' });
    expect(film.pallets.map(pallet => pallet.palletId)).toEqual(['SL-59590', 'SL-59591']);
    expect(film.drums.map(drum => drum.drumNumber)).toEqual(['1001']);

    const month = await admin.history({ period: 'month' });
    expect(month.pallets.map(pallet => pallet.palletId)).toEqual(['LN-1', 'SL-59591']);
    expect(month.drums.map(drum => drum.drumNumber)).toEqual(['2001']);
  });
});
