import chalk from 'chalk';
import { PartialCommitError, describeError } from '../errors.js';
import type { CollectionName, DocumentData } from './persistence.js';
import type { PendingWrite } from './transactionBuffer.js';

export interface CompensatingWriter {
  /** Applies one write and returns the document as it was before. */
  apply(write: PendingWrite): Promise<DocumentData | null>;
  /** Puts a document back to `previous`, deleting it when `previous` is null. */
  restore(collection: CollectionName, key: string, previous: DocumentData | null): Promise<void>;
}

/**
 * Replays buffered writes one by one on a backend without multi-record
 * transactions. When a write fails, every write already applied is undone in
 * reverse order before the failure is reported.
 */
export async function applyWithCompensation(writes: PendingWrite[], writer: CompensatingWriter): Promise<void> {
  const applied: Array<{ collection: CollectionName; key: string; previous: DocumentData | null }> = [];

  for (const write of writes) {
    try {
      const previous = await writer.apply(write);
      applied.push({ collection: write.collection, key: write.key, previous });
    } catch (error) {
      let compensated = true;
      for (const entry of applied.reverse()) {
        try {
          await writer.restore(entry.collection, entry.key, entry.previous);
        } catch (restoreError) {
          compensated = false;
          console.error(
            chalk.red(`Could not restore ${entry.collection}/${entry.key}:`),
            describeError(restoreError)
          );
        }
      }
      if (applied.length > 0) {
        console.warn(
          chalk.yellow(`Rolled back ${applied.length} write(s) after a failed commit`) +
            (compensated ? '' : chalk.red(' (incomplete)'))
        );
      }
      throw new PartialCommitError(
        `Saving ${write.collection}/${write.key} failed: ${describeError(error)}.`,
        compensated,
        { cause: error }
      );
    }
  }
}
