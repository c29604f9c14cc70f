import type { CollectionName, DocumentData, FieldValue } from './persistence.js';

export type FieldType = 'text' | 'integer' | 'boolean';

export interface CollectionSchema {
  keyField: string;
  fields: Record<string, FieldType>;
}

// Column order is also the header order of spreadsheet tabs.
export const COLLECTION_SCHEMAS: Record<CollectionName, CollectionSchema> = {
  materials: {
    keyField: 'material_code',
    fields: {
      material_code: 'text',
      description: 'text',
      max_qty: 'integer',
      prefix: 'text',
      allow_incomplete: 'boolean',
      active: 'boolean'
    }
  },
  settings: {
    keyField: 'key',
    fields: {
      key: 'text',
      global_pallet_counter: 'integer',
      report_email: 'text'
    }
  },
  drums: {
    keyField: 'drum_number',
    fields: {
      timestamp: 'text',
      material_code: 'text',
      drum_number: 'text',
      drum_type: 'text',
      standard_qty: 'text',
      pallet_id: 'text',
      status: 'text',
      device_id: 'text',
      operator: 'text'
    }
  },
  pallets: {
    keyField: 'pallet_id',
    fields: {
      pallet_id: 'text',
      material_code: 'text',
      description: 'text',
      created_at: 'text',
      count: 'integer',
      complete_type: 'text',
      email_subject: 'text',
      email_body: 'text'
    }
  }
};

export function getHeaders(collection: CollectionName): string[] {
  return Object.keys(COLLECTION_SCHEMAS[collection].fields);
}

export function isKnownField(collection: CollectionName, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(COLLECTION_SCHEMAS[collection].fields, field);
}

export function normalizeBool(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value !== 'string') {
    return false;
  }
  return ['TRUE', '1', 'YES', 'Y'].includes(value.trim().toUpperCase());
}

export function toInteger(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return 0;
}

export function decodeField(type: FieldType, value: unknown): FieldValue {
  switch (type) {
    case 'integer':
      return toInteger(value);
    case 'boolean':
      return normalizeBool(value);
    default:
      return value === null || value === undefined ? '' : String(value);
  }
}

/**
 * Decodes raw backend values (spreadsheet strings, SQLite integers) into
 * typed fields. Empty cells are left out so that record mappers can apply
 * their own defaults.
 */
export function decodeDocument(collection: CollectionName, raw: Record<string, unknown>): DocumentData {
  const { fields } = COLLECTION_SCHEMAS[collection];
  const data: DocumentData = {};
  for (const [field, value] of Object.entries(raw)) {
    if (value === null || value === undefined || value === '') {
      continue;
    }
    const type = fields[field];
    data[field] = type ? decodeField(type, value) : String(value);
  }
  return data;
}

export function encodeCell(value: FieldValue | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  return String(value);
}

export function rowToRecord(headers: string[], row: unknown[]): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  headers.forEach((header, idx) => {
    if (header) {
      record[header] = row[idx] ?? '';
    }
  });
  return record;
}

export function recordToRow(headers: string[], data: DocumentData): string[] {
  return headers.map(header => encodeCell(data[header]));
}
