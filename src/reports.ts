import { createObjectCsvWriter } from 'csv-writer';
import ExcelJS from 'exceljs';
import fs from 'fs/promises';
import path from 'path';
import type { HistoryView } from './history.js';
import { fromDrum, fromPallet } from './records.js';
import type { CollectionName, DocumentData } from './storage/persistence.js';
import { encodeCell, getHeaders } from './storage/schema.js';
import type { Drum, Pallet } from './types.js';

export interface PalletSummary {
  subject: string;
  body: string;
}

export type PalletHeading = Pick<Pallet, 'palletId' | 'materialCode' | 'description' | 'createdAt'>;

export function buildPalletSummary(pallet: PalletHeading, drums: Drum[]): PalletSummary {
  const date = pallet.createdAt.slice(0, 10);
  const lines = [`Material ${pallet.materialCode} - Pallet ${pallet.palletId}`];
  if (pallet.description) {
    lines.push(`Description: ${pallet.description}`);
  }
  lines.push('Drum Number | Standard Quantity');
  for (const drum of drums) {
    lines.push(`${drum.drumNumber} | ${drum.standardQty}`);
  }
  return {
    subject: `${date} - Rewinding ${pallet.materialCode} - ${pallet.palletId}`,
    body: lines.join('\n')
  };
}

function toRows(collection: CollectionName, docs: DocumentData[]): Array<Record<string, string>> {
  const headers = getHeaders(collection);
  return docs.map(doc => Object.fromEntries(headers.map(header => [header, encodeCell(doc[header])])));
}

async function writeCsv(filePath: string, collection: CollectionName, docs: DocumentData[]): Promise<void> {
  const writer = createObjectCsvWriter({
    path: filePath,
    header: getHeaders(collection).map(id => ({ id, title: id }))
  });
  await writer.writeRecords(toRows(collection, docs));
}

export async function exportCsv(dir: string, view: HistoryView): Promise<[string, string]> {
  await fs.mkdir(dir, { recursive: true });
  const palletsPath = path.join(dir, 'pallets.csv');
  const drumsPath = path.join(dir, 'drums.csv');
  await writeCsv(palletsPath, 'pallets', view.pallets.map(fromPallet));
  await writeCsv(drumsPath, 'drums', view.drums.map(fromDrum));
  return [palletsPath, drumsPath];
}

function addSheet(workbook: ExcelJS.Workbook, collection: CollectionName, docs: DocumentData[]): void {
  const sheet = workbook.addWorksheet(collection);
  const headers = getHeaders(collection);
  sheet.columns = headers.map(header => ({ header, key: header, width: Math.max(12, header.length + 2) }));
  sheet.getRow(1).font = { bold: true };
  for (const doc of docs) {
    sheet.addRow(headers.map(header => doc[header] ?? ''));
  }
}

export async function exportWorkbook(filePath: string, view: HistoryView): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const workbook = new ExcelJS.Workbook();
  addSheet(workbook, 'pallets', view.pallets.map(fromPallet));
  addSheet(workbook, 'drums', view.drums.map(fromDrum));
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}
