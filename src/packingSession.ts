import { DrumLedger, readActiveDrums } from './drumLedger.js';
import { MaterialNotFoundError } from './errors.js';
import { MaterialCatalog } from './materialCatalog.js';
import { PalletAssembler, checkGeneration } from './palletAssembler.js';
import { parseScan } from './scanParser.js';
import type { PersistenceAdapter } from './storage/persistence.js';
import type { Clock, CompleteType, Drum, Material, MaterialStatus, Pallet, PalletState, UndoResult } from './types.js';

export interface ScanDetails {
  labelMaterialCode: string;
  standardQty: string;
  operator: string;
  deviceId: string;
}

export function palletState(count: number, maxQty: number): PalletState {
  if (count === 0) {
    return 'EMPTY';
  }
  return maxQty > 0 && count >= maxQty ? 'FULL' : 'IN_PROGRESS';
}

export function describeStatus(material: Material, count: number): MaterialStatus {
  return {
    material,
    count,
    state: palletState(count, material.maxQty),
    canGenerateFull: checkGeneration(material, 'FULL', count) === null,
    canGenerateIncomplete: checkGeneration(material, 'INCOMPLETE', count) === null
  };
}

/**
 * What the station screen works against. Nothing is cached between calls:
 * each one names its material and reads the active set from the backend.
 */
export class PackingSession {
  readonly catalog: MaterialCatalog;
  readonly ledger: DrumLedger;
  private readonly assembler: PalletAssembler;

  constructor(
    private readonly store: PersistenceAdapter,
    clock: Clock = () => new Date()
  ) {
    this.catalog = new MaterialCatalog(store);
    this.ledger = new DrumLedger(store, clock);
    this.assembler = new PalletAssembler(store, clock);
  }

  async overview(): Promise<MaterialStatus[]> {
    const [materials, counts] = await Promise.all([this.catalog.listActive(), this.ledger.activeCounts()]);
    return materials.map(material => describeStatus(material, counts[material.materialCode] ?? 0));
  }

  async status(materialCode: string): Promise<MaterialStatus | null> {
    const material = await this.catalog.get(materialCode);
    if (!material) {
      return null;
    }
    const active = await this.ledger.listActive(material.materialCode);
    return describeStatus(material, active.length);
  }

  activeDrums(materialCode: string): Promise<Drum[]> {
    return readActiveDrums(this.store, materialCode.trim());
  }

  async scan(materialCode: string, raw: string, details: ScanDetails): Promise<Drum> {
    const parsed = parseScan(raw);
    const material = await this.requireMaterial(materialCode);
    return this.ledger.append({
      material,
      labelMaterialCode: details.labelMaterialCode,
      drumNumber: parsed.drumNumber,
      drumType: parsed.drumType,
      standardQty: details.standardQty,
      operator: details.operator,
      deviceId: details.deviceId
    });
  }

  undo(materialCode: string): Promise<UndoResult> {
    return this.ledger.undoLast(materialCode.trim());
  }

  async generate(materialCode: string, completeType: CompleteType): Promise<Pallet> {
    const material = await this.requireMaterial(materialCode);
    const active = await this.ledger.listActive(material.materialCode);
    return this.assembler.assemble(material, completeType, active);
  }

  private async requireMaterial(materialCode: string): Promise<Material> {
    const material = await this.catalog.get(materialCode);
    if (!material || !material.active) {
      throw new MaterialNotFoundError(materialCode.trim());
    }
    return material;
  }
}
