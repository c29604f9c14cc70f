import fs from 'fs/promises';
import type { ScannerConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { AppsScriptAdapter } from './appsScriptAdapter.js';
import { ServiceAccountTokenProvider, parseServiceAccountJson } from './googleAuth.js';
import { MemoryAdapter } from './memoryAdapter.js';
import type { PersistenceAdapter } from './persistence.js';
import { SheetsAdapter } from './sheetsAdapter.js';
import { SqliteAdapter } from './sqliteAdapter.js';

async function readServiceAccount(config: ScannerConfig): Promise<string> {
  if (config.serviceAccountJson) {
    return config.serviceAccountJson;
  }
  if (!config.serviceAccountFile) {
    throw new ConfigError('No service account configured.');
  }
  try {
    return await fs.readFile(config.serviceAccountFile, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read service account file ${config.serviceAccountFile}: ${String(error)}`);
  }
}

export async function createAdapter(config: ScannerConfig): Promise<PersistenceAdapter> {
  switch (config.backend) {
    case 'memory':
      return new MemoryAdapter();
    case 'sqlite':
      return SqliteAdapter.create(config.sqlitePath);
    case 'script':
      if (!config.scriptUrl) {
        throw new ConfigError('GOOGLE_APPS_SCRIPT_URL is required for the script backend.');
      }
      return new AppsScriptAdapter({
        url: config.scriptUrl,
        apiKey: config.scriptKey,
        sheetId: config.sheetId,
        timeoutMs: config.requestTimeoutMs
      });
    case 'sheets': {
      if (!config.sheetId) {
        throw new ConfigError('GOOGLE_SHEET_ID is required for the sheets backend.');
      }
      const key = parseServiceAccountJson(await readServiceAccount(config));
      return new SheetsAdapter({
        spreadsheetId: config.sheetId,
        tokenProvider: new ServiceAccountTokenProvider(key)
      });
    }
  }
}

export type { PersistenceAdapter } from './persistence.js';
