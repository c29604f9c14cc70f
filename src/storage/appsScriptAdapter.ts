/**
 * HTTP proxy script backend.
 *
 * Talks to a deployed spreadsheet script over a single POST endpoint using
 * row operations: `ensure`, `get`, `row`, `append`, `update` and `delete`.
 * Like the Sheets backend, rows are keyed by the schema's key column and
 * transactions are replayed at commit with a compensating rollback
 * (`atomic` is false).
 */

import axios from 'axios';
import { BackendError, isScannerError } from '../errors.js';
import { applyWithCompensation } from './compensation.js';
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
import { COLLECTION_SCHEMAS, decodeDocument, getHeaders, recordToRow, rowToRecord } from './schema.js';
import { SerialQueue } from './serialQueue.js';
import { TransactionBuffer, type PendingWrite } from './transactionBuffer.js';

export type ScriptPayload =
  | { action: 'ensure'; sheet: CollectionName; headers: string[] }
  | { action: 'get'; sheet: CollectionName }
  | { action: 'row'; sheet: CollectionName; row: number }
  | { action: 'append'; sheet: CollectionName; values: string[] }
  | { action: 'update'; sheet: CollectionName; row: number; col: number; value: string }
  | { action: 'delete'; sheet: CollectionName; row: number };

export type ScriptRequest = ScriptPayload & { sheetId?: string; apiKey?: string };

export interface ScriptTransport {
  post(url: string, payload: ScriptRequest): Promise<{ data: unknown }>;
}

export interface AppsScriptAdapterOptions {
  url: string;
  apiKey?: string;
  sheetId?: string;
  timeoutMs?: number;
  transport?: ScriptTransport;
}

/** `values` is the grid of a tab for `get`, and one flat row for `row`. */
interface ScriptResponse {
  ok: boolean;
  error?: string;
  values: unknown[];
}

interface ScriptRow {
  rowNumber: number;
  key: string;
  data: DocumentData;
}

interface ScriptTab {
  headers: string[];
  rows: ScriptRow[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseScriptResponse(body: unknown): ScriptResponse {
  if (!isRecord(body)) {
    throw new BackendError('Apps Script invalid response');
  }
  const values: unknown[] = Array.isArray(body.values) ? body.values : [];
  const error = typeof body.error === 'string' ? body.error : undefined;
  return { ok: body.ok !== false && error === undefined, error, values };
}

export class AppsScriptAdapter implements PersistenceAdapter {
  readonly name = 'script';
  readonly atomic = false;
  private readonly queue = new SerialQueue();
  private readonly transport: ScriptTransport;
  private ready: Promise<void> | null = null;

  constructor(private readonly options: AppsScriptAdapterOptions) {
    this.transport =
      options.transport ??
      axios.create({
        timeout: options.timeoutMs ?? 20000,
        headers: { 'Content-Type': 'application/json' }
      });
  }

  async get(collection: CollectionName, key: string): Promise<DocumentData | null> {
    const tab = await this.readTab(collection);
    return tab.rows.find(row => row.key === key)?.data ?? null;
  }

  async list(collection: CollectionName, query?: ListQuery): Promise<StoredDocument[]> {
    const tab = await this.readTab(collection);
    return applyQuery(
      tab.rows.map(row => ({ key: row.key, data: row.data })),
      query
    );
  }

  async set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): Promise<void> {
    await this.queue.run(async () => {
      await this.applyWrite({ type: 'set', collection, key, data, merge: Boolean(options?.merge) });
    });
  }

  async delete(collection: CollectionName, key: string): Promise<void> {
    await this.queue.run(async () => {
      await this.applyWrite({ type: 'delete', collection, key });
    });
  }

  runTransaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const tx = new TransactionBuffer(this);
      const result = await work(tx);
      await applyWithCompensation(tx.getWrites(), {
        apply: write => this.applyWrite(write),
        restore: async (collection, key, previous) => {
          if (previous) {
            await this.applyWrite({ type: 'set', collection, key, data: previous, merge: false });
          } else {
            await this.applyWrite({ type: 'delete', collection, key });
          }
        }
      });
      return result;
    });
  }

  async close(): Promise<void> {
    await this.queue.run(async () => undefined);
  }

  private async applyWrite(write: PendingWrite): Promise<DocumentData | null> {
    const tab = await this.readTab(write.collection);
    const existing = tab.rows.find(row => row.key === write.key);

    if (write.type === 'delete') {
      if (existing) {
        await this.call({ action: 'delete', sheet: write.collection, row: existing.rowNumber });
      }
      return existing?.data ?? null;
    }

    const { keyField } = COLLECTION_SCHEMAS[write.collection];
    const merged: DocumentData = {
      ...(write.merge && existing ? existing.data : {}),
      ...write.data,
      [keyField]: write.key
    };
    const values = recordToRow(tab.headers, merged);

    if (!existing) {
      await this.call({ action: 'append', sheet: write.collection, values });
      return null;
    }

    // The script updates one cell per call; only changed cells are sent.
    const current = recordToRow(tab.headers, existing.data);
    for (let idx = 0; idx < values.length; idx += 1) {
      if (values[idx] !== current[idx]) {
        await this.call({
          action: 'update',
          sheet: write.collection,
          row: existing.rowNumber,
          col: idx + 1,
          value: values[idx]
        });
      }
    }
    return existing.data;
  }

  private async readTab(collection: CollectionName): Promise<ScriptTab> {
    await this.ensureTabs();
    const { values } = await this.call({ action: 'get', sheet: collection });
    const grid = values.filter((row: unknown): row is unknown[] => Array.isArray(row));
    const headers = (grid[0] ?? []).map(value => String(value ?? '').trim());
    const { keyField } = COLLECTION_SCHEMAS[collection];
    const rows: ScriptRow[] = [];

    grid.slice(1).forEach((row, idx) => {
      const data = decodeDocument(collection, rowToRecord(headers, row));
      const key = String(data[keyField] ?? '');
      if (key) {
        rows.push({ rowNumber: idx + 2, key, data });
      }
    });

    return { headers: headers.length > 0 ? headers : getHeaders(collection), rows };
  }

  private ensureTabs(): Promise<void> {
    if (!this.ready) {
      this.ready = this.prepareTabs().catch(error => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  // `ensure` only writes headers into an empty tab; columns added since the
  // tab was created are appended to the header row here.
  private async prepareTabs(): Promise<void> {
    for (const collection of COLLECTIONS) {
      const headers = getHeaders(collection);
      await this.call({ action: 'ensure', sheet: collection, headers });
      const { values } = await this.call({ action: 'row', sheet: collection, row: 1 });
      const existing = values.map(value => String(value ?? '').trim());
      const missing = headers.filter(header => !existing.includes(header));
      for (let idx = 0; idx < missing.length; idx += 1) {
        await this.call({
          action: 'update',
          sheet: collection,
          row: 1,
          col: existing.length + idx + 1,
          value: missing[idx]
        });
      }
    }
  }

  private async call(payload: ScriptPayload): Promise<ScriptResponse> {
    const request: ScriptRequest = { ...payload };
    if (this.options.sheetId) {
      request.sheetId = this.options.sheetId;
    }
    if (this.options.apiKey) {
      request.apiKey = this.options.apiKey;
    }

    let body: unknown;
    try {
      const response = await this.transport.post(this.options.url, request);
      body = response.data;
    } catch (error) {
      if (isScannerError(error)) {
        throw error;
      }
      if (axios.isAxiosError(error) && error.response) {
        throw new BackendError(`Apps Script error: ${error.response.status}`, { cause: error });
      }
      throw new BackendError('Apps Script unreachable', { cause: error });
    }

    const parsed = parseScriptResponse(body);
    if (!parsed.ok) {
      throw new BackendError(`Apps Script rejected ${payload.action}: ${parsed.error ?? 'unknown error'}`);
    }
    return parsed;
  }
}
