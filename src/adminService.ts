import { CounterAllocator } from './counterAllocator.js';
import { DrumLedger } from './drumLedger.js';
import { InvalidEmailError, InvalidMaterialError } from './errors.js';
import { type HistoryFilter, type HistoryView, filterHistory } from './history.js';
import { fromMaterial, toDrum, toMaterial, toPallet, toSettings } from './records.js';
import type { PersistenceAdapter } from './storage/persistence.js';
import { SETTINGS_KEY } from './storage/persistence.js';
import type { Clock, Drum, Material, Pallet, Settings } from './types.js';

export interface MaterialInput {
  materialCode: string;
  description?: string;
  maxQty: number;
  prefix?: string;
  allowIncomplete?: boolean;
  active?: boolean;
}

export class AdminService {
  readonly counter: CounterAllocator;
  private readonly ledger: DrumLedger;

  constructor(
    private readonly store: PersistenceAdapter,
    private readonly clock: Clock = () => new Date()
  ) {
    this.counter = new CounterAllocator(store);
    this.ledger = new DrumLedger(store, clock);
  }

  setCounter(value: number): Promise<void> {
    return this.counter.set(value);
  }

  async getSettings(): Promise<Settings> {
    return toSettings(await this.store.get('settings', SETTINGS_KEY));
  }

  async setReportEmail(email: string): Promise<void> {
    const value = email.trim();
    if (value && !value.includes('@')) {
      throw new InvalidEmailError(value);
    }
    await this.store.set('settings', SETTINGS_KEY, { key: SETTINGS_KEY, report_email: value }, { merge: true });
  }

  async listMaterials(): Promise<Material[]> {
    const docs = await this.store.list('materials', { orderBy: 'material_code' });
    return docs.map(doc => toMaterial(doc.key, doc.data));
  }

  async saveMaterial(input: MaterialInput): Promise<{ created: boolean; material: Material }> {
    const materialCode = input.materialCode.trim();
    if (!materialCode) {
      throw new InvalidMaterialError('Material code is required.');
    }
    if (!Number.isSafeInteger(input.maxQty) || input.maxQty < 1) {
      throw new InvalidMaterialError(`Max quantity must be a whole number of at least 1, got ${input.maxQty}.`);
    }

    return this.store.runTransaction(async tx => {
      const existingDoc = await tx.get('materials', materialCode);
      const existing = existingDoc ? toMaterial(materialCode, existingDoc) : null;
      const material: Material = {
        materialCode,
        description: input.description?.trim() ?? existing?.description ?? '',
        maxQty: input.maxQty,
        prefix: input.prefix?.trim() ?? existing?.prefix ?? '',
        allowIncomplete: input.allowIncomplete ?? existing?.allowIncomplete ?? false,
        active: input.active ?? existing?.active ?? true
      };
      tx.set('materials', materialCode, fromMaterial(material), { merge: true });
      return { created: existing === null, material };
    });
  }

  searchDrum(drumNumber: string): Promise<Drum | null> {
    return this.ledger.find(drumNumber);
  }

  async palletDetails(palletId: string): Promise<{ pallet: Pallet; drums: Drum[] } | null> {
    const key = palletId.trim();
    const doc = key ? await this.store.get('pallets', key) : null;
    if (!doc) {
      return null;
    }
    const drums = await this.store.list('drums', { where: { pallet_id: key }, orderBy: 'timestamp' });
    return { pallet: toPallet(key, doc), drums: drums.map(entry => toDrum(entry.key, entry.data)) };
  }

  async history(filter: HistoryFilter): Promise<HistoryView> {
    const [pallets, drums] = await Promise.all([
      this.store.list('pallets', { orderBy: 'created_at' }),
      this.store.list('drums', { orderBy: 'timestamp' })
    ]);
    return filterHistory(
      {
        pallets: pallets.map(doc => toPallet(doc.key, doc.data)),
        drums: drums.map(doc => toDrum(doc.key, doc.data))
      },
      filter,
      this.clock()
    );
  }
}
