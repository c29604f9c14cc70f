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

const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets';

export interface TokenProvider {
  getToken(): Promise<string>;
}

export interface SheetsAdapterOptions {
  spreadsheetId: string;
  tokenProvider: TokenProvider;
  fetchImpl?: typeof fetch;
}

interface SheetRow {
  rowNumber: number;
  key: string;
  data: DocumentData;
}

interface SheetTab {
  headers: string[];
  rows: SheetRow[];
}

interface SheetProperties {
  title?: string;
  sheetId?: number;
}

function extractSheets(metadata: unknown): SheetProperties[] {
  if (typeof metadata !== 'object' || metadata === null || !('sheets' in metadata) || !Array.isArray(metadata.sheets)) {
    return [];
  }
  return metadata.sheets.map((sheet: unknown) => {
    if (typeof sheet !== 'object' || sheet === null || !('properties' in sheet)) {
      return {};
    }
    const { properties } = sheet;
    if (typeof properties !== 'object' || properties === null) {
      return {};
    }
    return {
      title: 'title' in properties ? String(properties.title) : undefined,
      sheetId: 'sheetId' in properties ? Number(properties.sheetId) : undefined
    };
  });
}

function extractValues(body: unknown): unknown[][] {
  if (typeof body !== 'object' || body === null || !('values' in body) || !Array.isArray(body.values)) {
    return [];
  }
  return body.values.filter((row: unknown): row is unknown[] => Array.isArray(row));
}

/**
 * Google Sheets backend: one tab per collection, header row first, one row
 * per document keyed by the schema's key column.
 *
 * Sheets has no multi-row transactions. Transactions are serialized within
 * this process only, and their writes are replayed in order at commit with a
 * compensating rollback on failure (`atomic` is false).
 */
export class SheetsAdapter implements PersistenceAdapter {
  readonly name = 'sheets';
  readonly atomic = false;
  private readonly queue = new SerialQueue();
  private readonly fetchImpl: typeof fetch;
  private readonly sheetIds = new Map<CollectionName, number>();
  private ready: Promise<void> | null = null;

  constructor(private readonly options: SheetsAdapterOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
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
    const title = this.tabTitle(write.collection);

    if (write.type === 'delete') {
      if (existing) {
        const sheetId = this.sheetIds.get(write.collection);
        if (sheetId === undefined) {
          throw new BackendError(`Tab ${title} has no known sheet id; cannot delete ${write.key}`);
        }
        await this.request(`${SHEETS_API}/${this.options.spreadsheetId}:batchUpdate`, {
          method: 'POST',
          body: {
            requests: [
              {
                deleteDimension: {
                  range: {
                    sheetId,
                    dimension: 'ROWS',
                    startIndex: existing.rowNumber - 1,
                    endIndex: existing.rowNumber
                  }
                }
              }
            ]
          }
        });
      }
      return existing?.data ?? null;
    }

    const { keyField } = COLLECTION_SCHEMAS[write.collection];
    const merged: DocumentData = {
      ...(write.merge && existing ? existing.data : {}),
      ...write.data,
      [keyField]: write.key
    };
    const values = [recordToRow(tab.headers, merged)];

    if (existing) {
      const range = encodeURIComponent(`'${title}'!A${existing.rowNumber}`);
      await this.request(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}?valueInputOption=RAW`, {
        method: 'PUT',
        body: { values }
      });
    } else {
      const range = encodeURIComponent(`'${title}'!A1`);
      await this.request(
        `${SHEETS_API}/${this.options.spreadsheetId}/values/${range}:append?valueInputOption=RAW&insertDataOption=INSERT_ROWS`,
        { method: 'POST', body: { values } }
      );
    }
    return existing?.data ?? null;
  }

  private async readTab(collection: CollectionName): Promise<SheetTab> {
    await this.ensureTabs();
    const range = encodeURIComponent(`'${this.tabTitle(collection)}'`);
    const body = await this.request(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}`);
    const values = extractValues(body);
    const headers = (values[0] ?? []).map(value => String(value ?? '').trim());
    const { keyField } = COLLECTION_SCHEMAS[collection];
    const rows: SheetRow[] = [];

    values.slice(1).forEach((row, idx) => {
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
      this.ready = this.createMissingTabs().catch(error => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  private async createMissingTabs(): Promise<void> {
    const metadata = await this.request(`${SHEETS_API}/${this.options.spreadsheetId}`);
    const sheets = extractSheets(metadata);

    for (const collection of COLLECTIONS) {
      const title = this.tabTitle(collection);
      let sheet = sheets.find(entry => entry.title === title);
      if (!sheet) {
        const response = await this.request(`${SHEETS_API}/${this.options.spreadsheetId}:batchUpdate`, {
          method: 'POST',
          body: { requests: [{ addSheet: { properties: { title } } }] }
        });
        sheet = this.extractAddedSheet(response);
      }
      if (sheet.sheetId !== undefined) {
        this.sheetIds.set(collection, sheet.sheetId);
      }
      await this.ensureHeaders(collection);
    }
  }

  private extractAddedSheet(response: unknown): SheetProperties {
    if (typeof response === 'object' && response !== null && 'replies' in response && Array.isArray(response.replies)) {
      const reply: unknown = response.replies[0];
      if (typeof reply === 'object' && reply !== null && 'addSheet' in reply) {
        return extractSheets({ sheets: [reply.addSheet] })[0] ?? {};
      }
    }
    return {};
  }

  // Tabs created by older tools may lack newer columns; append the missing
  // names so that every schema field has a column.
  private async ensureHeaders(collection: CollectionName): Promise<void> {
    const title = this.tabTitle(collection);
    const range = encodeURIComponent(`'${title}'!1:1`);
    const body = await this.request(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}`);
    const existing = (extractValues(body)[0] ?? []).map(value => String(value ?? '').trim());
    const missing = getHeaders(collection).filter(header => !existing.includes(header));
    if (missing.length === 0) {
      return;
    }

    const target = encodeURIComponent(`'${title}'!A1`);
    await this.request(`${SHEETS_API}/${this.options.spreadsheetId}/values/${target}?valueInputOption=RAW`, {
      method: 'PUT',
      body: { values: [[...existing, ...missing]] }
    });
  }

  private tabTitle(collection: CollectionName): string {
    return collection;
  }

  private async request(url: string, options: { method?: string; body?: unknown } = {}): Promise<unknown> {
    const { method = 'GET', body } = options;
    let response: Response;
    try {
      const token = await this.options.tokenProvider.getToken();
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json'
        },
        body: body ? JSON.stringify(body) : undefined
      });
    } catch (error) {
      if (isScannerError(error)) {
        throw error;
      }
      throw new BackendError('Google Sheets unreachable', { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new BackendError(`Google Sheets API error (${response.status}): ${text}`);
    }

    if (response.status === 204) {
      return null;
    }

    return response.json();
  }
}
