import { toMaterial } from './records.js';
import type { PersistenceReader } from './storage/persistence.js';
import type { Material } from './types.js';

export class MaterialCatalog {
  constructor(private readonly store: PersistenceReader) {}

  async get(materialCode: string): Promise<Material | null> {
    const code = materialCode.trim();
    if (!code) {
      return null;
    }
    const doc = await this.store.get('materials', code);
    return doc ? toMaterial(code, doc) : null;
  }

  async listActive(): Promise<Material[]> {
    const docs = await this.store.list('materials');
    return docs
      .map(doc => toMaterial(doc.key, doc.data))
      .filter(material => material.active)
      .sort((a, b) => (a.materialCode < b.materialCode ? -1 : a.materialCode > b.materialCode ? 1 : 0));
  }

  /** A material with no positive `maxQty` can never fill a pallet. */
  static isPackable(material: Material): boolean {
    return material.maxQty > 0;
  }
}
