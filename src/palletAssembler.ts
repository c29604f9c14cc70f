import { CounterAllocator } from './counterAllocator.js';
import { GenerationNotAllowedError, PalletIdConflictError } from './errors.js';
import { fromPallet, toDrum } from './records.js';
import { buildPalletSummary } from './reports.js';
import type { PersistenceAdapter } from './storage/persistence.js';
import type { Clock, CompleteType, Drum, Material, Pallet } from './types.js';

export function checkGeneration(material: Material, completeType: CompleteType, count: number): string | null {
  if (completeType === 'FULL') {
    if (material.maxQty <= 0) {
      return `Material ${material.materialCode} has no valid max quantity; a full pallet cannot be generated.`;
    }
    if (count < material.maxQty) {
      return `Pallet is not full yet (${count}/${material.maxQty}).`;
    }
    return null;
  }

  if (!material.allowIncomplete) {
    return `Material ${material.materialCode} does not allow incomplete pallets.`;
  }
  if (count === 0) {
    return 'No drums scanned for this pallet.';
  }
  if (count >= material.maxQty) {
    return `Pallet is full (${count}/${material.maxQty}); generate a full pallet instead.`;
  }
  return null;
}

/**
 * Seals the active drums of one material into a pallet. The counter
 * increment, every drum transition and the pallet record are written in a
 * single transaction.
 */
export class PalletAssembler {
  private readonly counter: CounterAllocator;

  constructor(
    private readonly store: PersistenceAdapter,
    private readonly clock: Clock = () => new Date(),
    counter?: CounterAllocator
  ) {
    this.counter = counter ?? new CounterAllocator(store);
  }

  async assemble(material: Material, completeType: CompleteType, activeDrums: Drum[]): Promise<Pallet> {
    const seen = new Set<string>();
    for (const drum of activeDrums) {
      if (seen.has(drum.drumNumber)) {
        throw new GenerationNotAllowedError(`Drum ${drum.drumNumber} is listed more than once.`);
      }
      seen.add(drum.drumNumber);
    }

    const rejection = checkGeneration(material, completeType, activeDrums.length);
    if (rejection) {
      throw new GenerationNotAllowedError(rejection);
    }

    return this.store.runTransaction(async tx => {
      for (const drum of activeDrums) {
        const doc = await tx.get('drums', drum.drumNumber);
        const current = doc ? toDrum(drum.drumNumber, doc) : null;
        if (!current || current.status !== 'ACTIVE' || current.materialCode !== material.materialCode) {
          throw new GenerationNotAllowedError(
            `Drum ${drum.drumNumber} is no longer on the open pallet for ${material.materialCode}. Reload and try again.`
          );
        }
      }

      const sequence = await this.counter.next(tx);
      const palletId = `${material.prefix}${sequence}`;
      if (await tx.get('pallets', palletId)) {
        throw new PalletIdConflictError(palletId);
      }

      for (const drum of activeDrums) {
        tx.set('drums', drum.drumNumber, { status: 'COMPLETED', pallet_id: palletId }, { merge: true });
      }

      const heading = {
        palletId,
        materialCode: material.materialCode,
        description: material.description,
        createdAt: this.clock().toISOString()
      };
      const summary = buildPalletSummary(heading, activeDrums);
      const pallet: Pallet = {
        ...heading,
        count: activeDrums.length,
        completeType,
        emailSubject: summary.subject,
        emailBody: summary.body
      };
      tx.set('pallets', palletId, fromPallet(pallet));
      return pallet;
    });
  }
}
