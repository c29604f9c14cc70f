import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackendError, PartialCommitError } from '../src/errors.js';
import { AppsScriptAdapter, parseScriptResponse } from '../src/storage/appsScriptAdapter.js';
import type { ScriptRequest, ScriptTransport } from '../src/storage/appsScriptAdapter.js';

/** In-process stand-in for the deployed script: one grid of strings per tab. */
class FakeScript implements ScriptTransport {
  readonly tabs = new Map<string, string[][]>();
  readonly calls: ScriptRequest[] = [];
  failAppendsTo: string | null = null;

  async post(_url: string, payload: ScriptRequest): Promise<{ data: unknown }> {
    this.calls.push(payload);
    return { data: this.handle(payload) };
  }

  private handle(payload: ScriptRequest): unknown {
    const rows = this.tabs.get(payload.sheet) ?? [];
    this.tabs.set(payload.sheet, rows);

    switch (payload.action) {
      case 'ensure':
        if (rows.length === 0) {
          rows.push([...payload.headers]);
        }
        return { ok: true };
      case 'get':
        return { ok: true, values: rows };
      case 'row':
        return { ok: true, values: rows[payload.row - 1] ?? [] };
      case 'append':
        if (this.failAppendsTo === payload.sheet) {
          return { ok: false, error: 'quota exceeded' };
        }
        rows.push([...payload.values]);
        return { ok: true };
      case 'update': {
        const row = rows[payload.row - 1];
        while (row.length < payload.col) {
          row.push('');
        }
        row[payload.col - 1] = payload.value;
        return { ok: true };
      }
      case 'delete':
        rows.splice(payload.row - 1, 1);
        return { ok: true };
    }
  }
}

describe('parseScriptResponse', () => {
  it('treats an error field as a rejection', () => {
    expect(parseScriptResponse({ error: 'bad key' })).toEqual({ ok: false, error: 'bad key', values: [] });
    expect(parseScriptResponse({ values: [['a']] })).toEqual({ ok: true, error: undefined, values: [['a']] });
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseScriptResponse('<html>')).toThrow('Apps Script invalid response');
  });
});

describe('AppsScriptAdapter', () => {
  let script: FakeScript;
  let store: AppsScriptAdapter;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    script = new FakeScript();
    store = new AppsScriptAdapter({
      url: 'https://script.example.test/exec',
      apiKey: 'test-secret',
      sheetId: 'sheet-1',
      transport: script
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ensures every tab with its header row and sends the key and sheet id', async () => {
    expect(await store.list('drums')).toEqual([]);

    expect(Array.from(script.tabs.keys())).toEqual(['materials', 'settings', 'drums', 'pallets']);
    expect(script.tabs.get('settings')).toEqual([['key', 'global_pallet_counter', 'report_email']]);
    expect(script.calls[0]).toEqual({
      action: 'ensure',
      sheet: 'materials',
      headers: ['material_code', 'description', 'max_qty', 'prefix', 'allow_incomplete', 'active'],
      sheetId: 'sheet-1',
      apiKey: 'test-secret'
    });
  });

  it('adds columns missing from an older header row', async () => {
    script.tabs.set('settings', [['key', 'global_pallet_counter'], ['global', '4']]);

    expect(await store.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 4 });
    expect(script.tabs.get('settings')?.[0]).toEqual(['key', 'global_pallet_counter', 'report_email']);
  });

  it('appends new rows and updates only the cells that changed', async () => {
    await store.set('materials', '60115949', { max_qty: 20, prefix: 'SL-5959', allow_incomplete: true });
    script.calls.length = 0;

    await store.set('materials', '60115949', { description: 'Rewind film' }, { merge: true });

    expect(script.tabs.get('materials')?.[1]).toEqual(['60115949', 'Rewind film', '20', 'SL-5959', 'TRUE', '']);
    expect(script.calls.filter(call => call.action === 'update')).toEqual([
      { action: 'update', sheet: 'materials', row: 2, col: 2, value: 'Rewind film', sheetId: 'sheet-1', apiKey: 'test-secret' }
    ]);
    expect(await store.get('materials', '60115949')).toEqual({
      material_code: '60115949',
      description: 'Rewind film',
      max_qty: 20,
      prefix: 'SL-5959',
      allow_incomplete: true
    });
  });

  it('deletes the row holding the key', async () => {
    await store.set('drums', '1001', { status: 'ACTIVE' });
    await store.set('drums', '1002', { status: 'ACTIVE' });

    await store.delete('drums', '1001');

    expect((await store.list('drums')).map(doc => doc.key)).toEqual(['1002']);
  });

  it('restores earlier rows when a commit write fails', async () => {
    await store.set('settings', 'global', { global_pallet_counter: 7 });
    await store.set('drums', '1001', { material_code: 'M1', status: 'ACTIVE' });
    script.failAppendsTo = 'pallets';

    const error = await store
      .runTransaction(async tx => {
        tx.set('drums', '1001', { status: 'COMPLETED', pallet_id: 'SL-59597' }, { merge: true });
        tx.set('settings', 'global', { global_pallet_counter: 8 }, { merge: true });
        tx.set('pallets', 'SL-59597', { pallet_id: 'SL-59597', count: 1 });
      })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PartialCommitError);
    expect(error).toMatchObject({ compensated: true });
    expect(await store.get('drums', '1001')).toEqual({ drum_number: '1001', material_code: 'M1', status: 'ACTIVE' });
    expect(await store.get('settings', 'global')).toEqual({ key: 'global', global_pallet_counter: 7 });
    expect(await store.list('pallets')).toEqual([]);
    expect(store.atomic).toBe(false);
  });

  it('wraps script and transport failures', async () => {
    const rejected = new AppsScriptAdapter({
      url: 'https://script.example.test/exec',
      transport: { post: async () => ({ data: { ok: false, error: 'bad key' } }) }
    });
    await expect(rejected.get('drums', '1')).rejects.toThrow('Apps Script rejected ensure: bad key');

    const offline = new AppsScriptAdapter({
      url: 'https://script.example.test/exec',
      transport: {
        post: async () => {
          throw new Error('socket hang up');
        }
      }
    });
    const error = await offline.get('drums', '1').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ message: 'Apps Script unreachable', code: 'BACKEND_FAILURE' });
  });
});
