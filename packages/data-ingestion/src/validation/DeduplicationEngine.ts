import { SourcedRecord } from '@sheetreplica/types';
import { cleanText } from './CellCleaner';

export interface DeduplicationResult {
  records: SourcedRecord[];
  duplicatesRemoved: number;
  duplicateKeys: string[];
}

/**
 * Primary-key deduplication for the sync pipeline.
 * Rows appended later to a sheet override earlier ones with the same key
 * ("latest write wins"), while the output keeps the order in which keys first appeared.
 */
export class DeduplicationEngine {
  /**
   * Key used to group records; the primary key value with text cleaning applied
   */
  generateKey(record: SourcedRecord, pkColumn: string): string | null {
    const value = record.values[pkColumn];
    if (value === undefined) return null;
    return cleanText(String(value));
  }

  dedupe(records: SourcedRecord[], pkColumn?: string | null): DeduplicationResult {
    if (!pkColumn) {
      return { records, duplicatesRemoved: 0, duplicateKeys: [] };
    }

    // Records without a key get a slot of their own so they are never collapsed
    const slots = new Map<string | symbol, SourcedRecord>();
    const duplicateKeys = new Set<string>();
    let duplicatesRemoved = 0;

    for (const record of records) {
      const key = this.generateKey(record, pkColumn);

      if (key === null) {
        slots.set(Symbol('unkeyed'), record);
        continue;
      }

      if (slots.has(key)) {
        duplicatesRemoved++;
        duplicateKeys.add(key);
      }
      // Map.set on an existing key keeps its original insertion position
      slots.set(key, record);
    }

    return {
      records: Array.from(slots.values()),
      duplicatesRemoved,
      duplicateKeys: Array.from(duplicateKeys)
    };
  }
}

export default DeduplicationEngine;
