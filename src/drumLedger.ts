import { DuplicateDrumError, MaterialMismatchError, MissingQuantityError } from './errors.js';
import { fromDrum, toDrum, toPallet } from './records.js';
import type { PersistenceAdapter, PersistenceReader } from './storage/persistence.js';
import type { AppendDrumInput, Clock, Drum, UndoResult } from './types.js';

export async function readActiveDrums(reader: PersistenceReader, materialCode: string): Promise<Drum[]> {
  const docs = await reader.list('drums', {
    where: { material_code: materialCode, status: 'ACTIVE' },
    orderBy: 'timestamp',
    direction: 'asc'
  });
  return docs.map(doc => toDrum(doc.key, doc.data));
}

export class DrumLedger {
  constructor(
    private readonly store: PersistenceAdapter,
    private readonly clock: Clock = () => new Date()
  ) {}

  listActive(materialCode: string): Promise<Drum[]> {
    return readActiveDrums(this.store, materialCode);
  }

  async find(drumNumber: string): Promise<Drum | null> {
    const key = drumNumber.trim();
    if (!key) {
      return null;
    }
    const doc = await this.store.get('drums', key);
    return doc ? toDrum(key, doc) : null;
  }

  async activeCounts(): Promise<Record<string, number>> {
    const docs = await this.store.list('drums', { where: { status: 'ACTIVE' } });
    const counts: Record<string, number> = {};
    for (const doc of docs) {
      const { materialCode } = toDrum(doc.key, doc.data);
      counts[materialCode] = (counts[materialCode] ?? 0) + 1;
    }
    return counts;
  }

  append(input: AppendDrumInput): Promise<Drum> {
    const drumNumber = input.drumNumber.trim();
    const labelMaterialCode = input.labelMaterialCode.trim();
    const standardQty = input.standardQty.trim();

    return this.store.runTransaction(async tx => {
      const existing = await tx.get('drums', drumNumber);
      if (existing) {
        const prior = toDrum(drumNumber, existing);
        let priorCreatedAt: string | null = null;
        if (prior.palletId) {
          const pallet = await tx.get('pallets', prior.palletId);
          priorCreatedAt = pallet ? toPallet(prior.palletId, pallet).createdAt || null : null;
        }
        throw new DuplicateDrumError(drumNumber, prior.palletId, priorCreatedAt, prior.materialCode);
      }

      if (labelMaterialCode !== input.material.materialCode) {
        throw new MaterialMismatchError(input.material.materialCode, labelMaterialCode);
      }

      if (!input.material.allowIncomplete && !standardQty) {
        throw new MissingQuantityError(drumNumber);
      }

      const drum: Drum = {
        drumNumber,
        drumType: input.drumType.trim(),
        materialCode: input.material.materialCode,
        standardQty,
        status: 'ACTIVE',
        palletId: '',
        timestamp: this.clock().toISOString(),
        operator: input.operator,
        deviceId: input.deviceId
      };
      tx.set('drums', drumNumber, fromDrum(drum));
      return drum;
    });
  }

  undoLast(materialCode: string): Promise<UndoResult> {
    return this.store.runTransaction<UndoResult>(async tx => {
      const active = await readActiveDrums(tx, materialCode);
      const latest = active[active.length - 1];
      if (!latest) {
        return { removed: false };
      }
      tx.delete('drums', latest.drumNumber);
      return { removed: true, drum: latest };
    });
  }
}
