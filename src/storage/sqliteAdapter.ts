import chalk from 'chalk';
import fs from 'fs/promises';
import path from 'path';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { BackendError, isScannerError } from '../errors.js';
import type {
  CollectionName,
  DocumentData,
  FieldValue,
  ListQuery,
  PersistenceAdapter,
  SetOptions,
  StoredDocument,
  TransactionContext
} from './persistence.js';
import { COLLECTIONS } from './persistence.js';
import { COLLECTION_SCHEMAS, decodeDocument, isKnownField } from './schema.js';
import { SerialQueue } from './serialQueue.js';

function toSqlValue(value: FieldValue | undefined): SqlValue {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function quote(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Embedded SQLite file (sql.js). The database lives in memory and is written
 * back to `dbPath` after every committed change; pass `null` for a purely
 * in-memory store. When the write fails the database is reloaded from the
 * last bytes that reached the file, so a failed change is never visible.
 * All access goes through one queue because sql.js has a single connection:
 * an open transaction would otherwise be visible to other sessions.
 */
export class SqliteAdapter implements PersistenceAdapter {
  readonly name = 'sqlite';
  readonly atomic = true;
  private readonly queue = new SerialQueue();
  private closed = false;
  private persisted: Uint8Array | null = null;

  private constructor(
    private readonly SQL: SqlJsStatic,
    private db: Database,
    private readonly dbPath: string | null
  ) {
    this.ensureSchema();
    if (dbPath) {
      this.persisted = db.export();
    }
  }

  static async create(dbPath: string | null): Promise<SqliteAdapter> {
    const SQL = await initSqlJs();
    let db: Database;

    if (!dbPath) {
      return new SqliteAdapter(SQL, new SQL.Database(), null);
    }

    try {
      const file = await fs.readFile(dbPath);
      db = new SQL.Database(new Uint8Array(file));
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw new BackendError(`Cannot open SQLite file ${dbPath}`, { cause: error });
      }
      db = new SQL.Database();
    }

    return new SqliteAdapter(SQL, db, dbPath);
  }

  get(collection: CollectionName, key: string): Promise<DocumentData | null> {
    return this.run(async () => this.guard(`read ${collection}`, () => this.readOne(collection, key)));
  }

  list(collection: CollectionName, query?: ListQuery): Promise<StoredDocument[]> {
    return this.run(async () => this.guard(`list ${collection}`, () => this.readMany(collection, query)));
  }

  async set(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): Promise<void> {
    await this.run(async () => {
      this.guard(`write ${collection}`, () => this.write(collection, key, data, options));
      await this.flush();
    });
  }

  async delete(collection: CollectionName, key: string): Promise<void> {
    await this.run(async () => {
      this.guard(`delete ${collection}`, () => this.remove(collection, key));
      await this.flush();
    });
  }

  runTransaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    return this.run(async () => {
      const tx: TransactionContext = {
        get: async (collection, key) => this.guard(`read ${collection}`, () => this.readOne(collection, key)),
        list: async (collection, query) => this.guard(`list ${collection}`, () => this.readMany(collection, query)),
        set: (collection, key, data, options) =>
          this.guard(`write ${collection}`, () => this.write(collection, key, data, options)),
        delete: (collection, key) => this.guard(`delete ${collection}`, () => this.remove(collection, key))
      };

      this.guard('begin', () => this.db.run('BEGIN'));
      let result: T;
      try {
        result = await work(tx);
        this.guard('commit', () => this.db.run('COMMIT'));
      } catch (error) {
        this.rollback();
        throw error;
      }

      await this.flush();
      return result;
    });
  }

  async close(): Promise<void> {
    await this.queue.run(async () => {
      if (this.closed) {
        return;
      }
      await this.flush();
      this.db.close();
      this.closed = true;
    });
  }

  private async run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (this.closed) {
        throw new BackendError('SQLite store is closed');
      }
      return task();
    });
  }

  /** Wraps errors raised by sql.js; errors from caller code pass through. */
  private guard<T>(action: string, task: () => T): T {
    try {
      return task();
    } catch (error) {
      if (isScannerError(error)) {
        throw error;
      }
      throw new BackendError(`SQLite ${action} failed`, { cause: error });
    }
  }

  private rollback(): void {
    try {
      this.db.run('ROLLBACK');
    } catch (rollbackError) {
      console.warn(chalk.yellow('SQLite rollback failed:'), rollbackError);
    }
  }

  private readOne(collection: CollectionName, key: string): DocumentData | null {
    const { keyField } = COLLECTION_SCHEMAS[collection];
    const rows = this.select(`SELECT * FROM ${quote(collection)} WHERE ${quote(keyField)} = ?`, [key]);
    return rows.length > 0 ? decodeDocument(collection, rows[0]) : null;
  }

  private readMany(collection: CollectionName, query?: ListQuery): StoredDocument[] {
    const { keyField } = COLLECTION_SCHEMAS[collection];
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    for (const [field, value] of Object.entries(query?.where ?? {})) {
      this.assertField(collection, field);
      clauses.push(`${quote(field)} = ?`);
      params.push(toSqlValue(value));
    }

    let sql = `SELECT * FROM ${quote(collection)}`;
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    if (query?.orderBy) {
      this.assertField(collection, query.orderBy);
      const direction = query.direction === 'desc' ? 'DESC' : 'ASC';
      sql += ` ORDER BY ${quote(query.orderBy)} ${direction}, rowid ASC`;
    } else {
      sql += ' ORDER BY rowid ASC';
    }

    return this.select(sql, params).map(row => ({
      key: String(row[keyField] ?? ''),
      data: decodeDocument(collection, row)
    }));
  }

  private write(collection: CollectionName, key: string, data: DocumentData, options?: SetOptions): void {
    const { keyField, fields } = COLLECTION_SCHEMAS[collection];
    const existing = options?.merge ? this.readOne(collection, key) : null;
    const merged: DocumentData = { ...(existing ?? {}), ...data, [keyField]: key };

    const columns = Object.keys(fields);
    const updates = columns
      .filter(column => column !== keyField)
      .map(column => `${quote(column)} = excluded.${quote(column)}`);

    this.db.run(
      `INSERT INTO ${quote(collection)} (${columns.map(quote).join(', ')})
       VALUES (${columns.map(() => '?').join(', ')})
       ON CONFLICT(${quote(keyField)}) DO UPDATE SET ${updates.join(', ')}`,
      columns.map(column => toSqlValue(merged[column]))
    );
  }

  private remove(collection: CollectionName, key: string): void {
    const { keyField } = COLLECTION_SCHEMAS[collection];
    this.db.run(`DELETE FROM ${quote(collection)} WHERE ${quote(keyField)} = ?`, [key]);
  }

  private select(sql: string, params: SqlValue[]): Record<string, SqlValue>[] {
    const stmt = this.db.prepare(sql);
    const rows: Record<string, SqlValue>[] = [];
    try {
      stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  private assertField(collection: CollectionName, field: string): void {
    if (!isKnownField(collection, field)) {
      throw new BackendError(`Unknown field "${field}" in ${collection}`);
    }
  }

  private async flush(): Promise<void> {
    if (!this.dbPath) {
      return;
    }
    const data = this.db.export();
    try {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      await fs.writeFile(this.dbPath, Buffer.from(data));
    } catch (error) {
      this.restore();
      throw new BackendError(`Cannot write SQLite file ${this.dbPath}`, { cause: error });
    }
    this.persisted = data;
  }

  private restore(): void {
    this.db.close();
    this.db = this.persisted ? new this.SQL.Database(this.persisted) : new this.SQL.Database();
    this.ensureSchema();
  }

  private ensureSchema(): void {
    for (const collection of COLLECTIONS) {
      const { keyField, fields } = COLLECTION_SCHEMAS[collection];
      const columns = Object.entries(fields).map(([field, type]) => {
        const sqlType = type === 'text' ? 'TEXT' : 'INTEGER';
        return field === keyField ? `${quote(field)} TEXT PRIMARY KEY` : `${quote(field)} ${sqlType}`;
      });
      this.db.run(`CREATE TABLE IF NOT EXISTS ${quote(collection)} (${columns.join(', ')})`);

      // Files written before a column existed get it added.
      const present = new Set(this.select(`PRAGMA table_info(${quote(collection)})`, []).map(row => String(row.name)));
      for (const [field, type] of Object.entries(fields)) {
        if (!present.has(field)) {
          this.db.run(`ALTER TABLE ${quote(collection)} ADD COLUMN ${quote(field)} ${type === 'text' ? 'TEXT' : 'INTEGER'}`);
        }
      }
    }
    this.db.run(
      `CREATE INDEX IF NOT EXISTS "drums_material_status" ON "drums" ("material_code", "status", "timestamp")`
    );
  }
}
