import os from 'os';
import path from 'path';
import { ConfigError } from './errors.js';

export type BackendKind = 'sqlite' | 'sheets' | 'script' | 'memory';

export interface ScannerConfig {
  backend: BackendKind;
  sqlitePath: string;
  sheetId?: string;
  serviceAccountJson?: string;
  serviceAccountFile?: string;
  scriptUrl?: string;
  scriptKey?: string;
  requestTimeoutMs: number;
  operator: string;
  deviceId: string;
  reportDir: string;
}

const BACKENDS: BackendKind[] = ['sqlite', 'sheets', 'script', 'memory'];
const DEFAULT_TIMEOUT_MS = 20000;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const backendRaw = (optional(env.SCANNER_BACKEND) ?? 'sqlite').toLowerCase();
  const backend = BACKENDS.find(kind => kind === backendRaw);
  if (!backend) {
    throw new ConfigError(`SCANNER_BACKEND must be one of ${BACKENDS.join(', ')}, got "${backendRaw}".`);
  }

  const timeoutRaw = optional(env.SCANNER_REQUEST_TIMEOUT_MS);
  const requestTimeoutMs = timeoutRaw ? Number.parseInt(timeoutRaw, 10) : DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
    throw new ConfigError('SCANNER_REQUEST_TIMEOUT_MS must be a positive number of milliseconds.');
  }

  const config: ScannerConfig = {
    backend,
    sqlitePath: optional(env.SCANNER_SQLITE_PATH) ?? path.join(process.cwd(), 'data', 'scanner.sqlite'),
    sheetId: optional(env.GOOGLE_SHEET_ID),
    serviceAccountJson: optional(env.GOOGLE_SERVICE_ACCOUNT_JSON),
    serviceAccountFile: optional(env.GOOGLE_SERVICE_ACCOUNT_FILE),
    scriptUrl: optional(env.GOOGLE_APPS_SCRIPT_URL),
    scriptKey: optional(env.GOOGLE_APPS_SCRIPT_KEY),
    requestTimeoutMs,
    operator: optional(env.OPERATOR) ?? '',
    deviceId: optional(env.DEVICE_ID) ?? os.hostname(),
    reportDir: optional(env.SCANNER_REPORT_DIR) ?? path.join(process.cwd(), 'reports')
  };

  if (backend === 'sheets') {
    if (!config.sheetId) {
      throw new ConfigError('GOOGLE_SHEET_ID is required for the sheets backend.');
    }
    if (!config.serviceAccountJson && !config.serviceAccountFile) {
      throw new ConfigError(
        'Set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_FILE for the sheets backend.'
      );
    }
  }

  if (backend === 'script' && !config.scriptUrl) {
    throw new ConfigError('GOOGLE_APPS_SCRIPT_URL is required for the script backend.');
  }

  return config;
}
