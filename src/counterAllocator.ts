import { InvalidCounterValueError } from './errors.js';
import { toSettings } from './records.js';
import type { PersistenceAdapter, PersistenceReader, TransactionContext } from './storage/persistence.js';
import { SETTINGS_KEY } from './storage/persistence.js';

/**
 * The global pallet sequence, stored on the settings document. Allocation
 * only happens inside a caller's transaction so the increment commits
 * together with the pallet that uses it.
 */
export class CounterAllocator {
  constructor(private readonly store: PersistenceAdapter) {}

  async next(tx: TransactionContext): Promise<number> {
    const value = await this.read(tx);
    tx.set('settings', SETTINGS_KEY, { key: SETTINGS_KEY, global_pallet_counter: value + 1 }, { merge: true });
    return value;
  }

  current(): Promise<number> {
    return this.read(this.store);
  }

  // Administrative override; may move the counter backwards.
  async set(value: number): Promise<void> {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidCounterValueError(String(value));
    }
    await this.store.set('settings', SETTINGS_KEY, { key: SETTINGS_KEY, global_pallet_counter: value }, { merge: true });
  }

  private async read(reader: PersistenceReader): Promise<number> {
    const doc = await reader.get('settings', SETTINGS_KEY);
    return toSettings(doc).globalPalletCounter;
  }
}
