import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import initSqlJs from 'sql.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DrumLedger } from '../src/drumLedger.js';
import { BackendError } from '../src/errors.js';
import { PackingSession } from '../src/packingSession.js';
import { fromMaterial } from '../src/records.js';
import { SqliteAdapter } from '../src/storage/sqliteAdapter.js';
import { FILM, drumNumber, tickingClock } from './helpers.js';

describe('SqliteAdapter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'drum-scanner-tests-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('stores typed fields and decodes them on read', async () => {
    const store = await SqliteAdapter.create(null);

    await store.set('materials', FILM.materialCode, fromMaterial(FILM));

    expect(await store.get('materials', '60115949')).toEqual({
      material_code: '60115949',
      description: 'Rewind film',
      max_qty: 20,
      prefix: 'SL-5959',
      allow_incomplete: true,
      active: true
    });
    expect(await store.get('materials', 'missing')).toBeNull();
    await store.close();
  });

  it('filters, orders and keeps insertion order for ties', async () => {
    const store = await SqliteAdapter.create(null);
    await store.set('drums', '3', { material_code: 'M1', status: 'ACTIVE', timestamp: '2026-03-02T08:00:01.000Z' });
    await store.set('drums', '1', { material_code: 'M1', status: 'ACTIVE', timestamp: '2026-03-02T08:00:00.000Z' });
    await store.set('drums', '2', { material_code: 'M1', status: 'ACTIVE', timestamp: '2026-03-02T08:00:00.000Z' });
    await store.set('drums', '4', { material_code: 'M2', status: 'ACTIVE', timestamp: '2026-03-02T07:00:00.000Z' });

    const docs = await store.list('drums', { where: { material_code: 'M1' }, orderBy: 'timestamp' });

    expect(docs.map(doc => doc.key)).toEqual(['1', '2', '3']);
    await store.close();
  });

  it('rolls back a failed transaction', async () => {
    const store = await SqliteAdapter.create(null);
    await store.set('settings', 'global', { global_pallet_counter: 5 });

    await expect(
      store.runTransaction(async tx => {
        tx.set('settings', 'global', { global_pallet_counter: 6 }, { merge: true });
        expect(await tx.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 6 });
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await store.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 5 });
    await store.close();
  });

  it('rejects unknown query fields', async () => {
    const store = await SqliteAdapter.create(null);

    await expect(store.list('drums', { where: { colour: 'red' } })).rejects.toBeInstanceOf(BackendError);
    await store.close();
  });

  it('persists a packing run to the database file', async () => {
    const dbPath = path.join(tempDir, 'data', 'scanner.sqlite');
    const store = await SqliteAdapter.create(dbPath);
    await store.set('materials', FILM.materialCode, fromMaterial({ ...FILM, maxQty: 3 }));
    const session = new PackingSession(store, tickingClock());
    for (let i = 0; i < 3; i += 1) {
      await session.scan('60115949', `DWP1500_LV ${drumNumber(i)}`, {
        labelMaterialCode: '60115949',
        standardQty: '1200',
        operator: 'ana',
        deviceId: 'station-1'
      });
    }
    const pallet = await session.generate('60115949', 'FULL');
    await store.close();

    const reopened = await SqliteAdapter.create(dbPath);
    expect(pallet.palletId).toBe('SL-59590');
    expect(await reopened.get('pallets', 'SL-59590')).toMatchObject({ count: 3, complete_type: 'FULL' });
    expect(await reopened.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 1 });
    expect(await reopened.list('drums', { where: { status: 'ACTIVE' } })).toEqual([]);
    await reopened.close();
  });

  it('passes errors from transaction code through unchanged', async () => {
    const store = await SqliteAdapter.create(null);
    const failure = new RangeError('counter overflow');

    const error = await store
      .runTransaction(async () => {
        throw failure;
      })
      .catch((err: unknown) => err);

    expect(error).toBe(failure);
    await store.close();
  });

  it('leaves nothing visible when the database file cannot be written', async () => {
    const dataDir = path.join(tempDir, 'data');
    const store = await SqliteAdapter.create(path.join(dataDir, 'scanner.sqlite'));
    await store.set('materials', FILM.materialCode, fromMaterial(FILM));
    const ledger = new DrumLedger(store, tickingClock());
    const scan = {
      material: FILM,
      labelMaterialCode: '60115949',
      drumNumber: drumNumber(0),
      drumType: 'DWP1500_LV',
      standardQty: '1200',
      operator: 'ana',
      deviceId: 'station-1'
    };

    await fs.rm(dataDir, { recursive: true, force: true });
    await fs.writeFile(dataDir, 'not a directory');

    await expect(ledger.append(scan)).rejects.toBeInstanceOf(BackendError);
    expect(await ledger.listActive('60115949')).toEqual([]);
    expect(await store.get('materials', '60115949')).toMatchObject({ max_qty: 20 });

    await fs.rm(dataDir);
    await ledger.append(scan);
    expect(await ledger.listActive('60115949')).toHaveLength(1);
    await store.close();
  });

  it('adds columns missing from an older database file', async () => {
    const SQL = await initSqlJs();
    const legacy = new SQL.Database();
    legacy.run('CREATE TABLE "pallets" ("pallet_id" TEXT PRIMARY KEY, "material_code" TEXT, "count" INTEGER)');
    legacy.run('INSERT INTO "pallets" VALUES (?, ?, ?)', ['SL-59591', '60115949', 4]);
    const dbPath = path.join(tempDir, 'legacy.sqlite');
    await fs.writeFile(dbPath, Buffer.from(legacy.export()));
    legacy.close();

    const store = await SqliteAdapter.create(dbPath);
    await store.set('pallets', 'SL-59591', { email_subject: '2026-03-02 - Rewinding 60115949 - SL-59591' }, { merge: true });

    expect(await store.get('pallets', 'SL-59591')).toEqual({
      pallet_id: 'SL-59591',
      material_code: '60115949',
      count: 4,
      email_subject: '2026-03-02 - Rewinding 60115949 - SL-59591'
    });
    await store.close();
  });

  it('refuses work after close', async () => {
    const store = await SqliteAdapter.create(null);
    await store.close();

    await expect(store.get('drums', '1')).rejects.toThrow('SQLite store is closed');
  });
});
