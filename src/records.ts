import type { DocumentData, FieldValue } from './storage/persistence.js';
import { normalizeBool, toInteger } from './storage/schema.js';
import type { CompleteType, Drum, DrumStatus, Material, Pallet, Settings } from './types.js';

function text(value: FieldValue | undefined): string {
  return value === undefined ? '' : String(value).trim();
}

function drumStatus(value: FieldValue | undefined): DrumStatus {
  return text(value).toUpperCase() === 'COMPLETED' ? 'COMPLETED' : 'ACTIVE';
}

function completeType(value: FieldValue | undefined): CompleteType {
  return text(value).toUpperCase() === 'INCOMPLETE' ? 'INCOMPLETE' : 'FULL';
}

export function toMaterial(key: string, data: DocumentData): Material {
  return {
    materialCode: text(data.material_code) || key,
    description: text(data.description),
    maxQty: toInteger(data.max_qty),
    prefix: text(data.prefix),
    allowIncomplete: normalizeBool(data.allow_incomplete),
    active: data.active === undefined ? true : normalizeBool(data.active)
  };
}

export function fromMaterial(material: Material): DocumentData {
  return {
    material_code: material.materialCode,
    description: material.description,
    max_qty: material.maxQty,
    prefix: material.prefix,
    allow_incomplete: material.allowIncomplete,
    active: material.active
  };
}

export function toDrum(key: string, data: DocumentData): Drum {
  return {
    drumNumber: text(data.drum_number) || key,
    drumType: text(data.drum_type),
    materialCode: text(data.material_code),
    standardQty: text(data.standard_qty),
    status: drumStatus(data.status),
    palletId: text(data.pallet_id),
    timestamp: text(data.timestamp),
    operator: text(data.operator),
    deviceId: text(data.device_id)
  };
}

export function fromDrum(drum: Drum): DocumentData {
  return {
    timestamp: drum.timestamp,
    material_code: drum.materialCode,
    drum_number: drum.drumNumber,
    drum_type: drum.drumType,
    standard_qty: drum.standardQty,
    pallet_id: drum.palletId,
    status: drum.status,
    device_id: drum.deviceId,
    operator: drum.operator
  };
}

export function toPallet(key: string, data: DocumentData): Pallet {
  return {
    palletId: text(data.pallet_id) || key,
    materialCode: text(data.material_code),
    description: text(data.description),
    createdAt: text(data.created_at),
    count: toInteger(data.count),
    completeType: completeType(data.complete_type),
    emailSubject: text(data.email_subject),
    emailBody: data.email_body === undefined ? '' : String(data.email_body)
  };
}

export function fromPallet(pallet: Pallet): DocumentData {
  return {
    pallet_id: pallet.palletId,
    material_code: pallet.materialCode,
    description: pallet.description,
    created_at: pallet.createdAt,
    count: pallet.count,
    complete_type: pallet.completeType,
    email_subject: pallet.emailSubject,
    email_body: pallet.emailBody
  };
}

export function toSettings(data: DocumentData | null): Settings {
  return {
    globalPalletCounter: toInteger(data?.global_pallet_counter),
    reportEmail: text(data?.report_email)
  };
}
