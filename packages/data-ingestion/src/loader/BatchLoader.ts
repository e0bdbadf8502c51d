import { CleanedRecord, LoadStats, StoreClient } from '@sheetreplica/types';
import { z } from 'zod';
import defaultLogger, { Logger } from '../utils/logger';
import { getErrorMessage, truncateMessage } from '../utils/errorUtils';

export const DEFAULT_BATCH_SIZE = 50;

const LoaderOptionsSchema = z.object({
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE)
});

export type LoaderOptions = z.input<typeof LoaderOptionsSchema> & {
  logger?: Logger;
};

export interface LoadOptions {
  // Set to false when the caller already emptied the table
  clear?: boolean;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Full-replace loader: clears the target table, then inserts in fixed-size batches.
 * A failed batch is retried record by record so one bad record never blocks the others.
 * Records must already be validated and deduplicated.
 */
export class BatchLoader {
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(private readonly store: StoreClient, options: LoaderOptions = {}) {
    const { batchSize } = LoaderOptionsSchema.parse({ batchSize: options.batchSize });
    this.batchSize = batchSize;
    this.logger = options.logger ?? defaultLogger;
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  /**
   * Best-effort delete of every row; a failure is logged, not thrown
   */
  async clear(tableName: string): Promise<boolean> {
    try {
      await this.store.clearTable(tableName);
      this.logger.debug('Table cleared', { table: tableName });
      return true;
    } catch (error) {
      this.logger.warn('Could not clear table, inserting anyway', {
        table: tableName,
        error: getErrorMessage(error)
      });
      return false;
    }
  }

  async load(tableName: string, records: CleanedRecord[], options: LoadOptions = {}): Promise<LoadStats> {
    const stats: LoadStats = {
      inserted: 0,
      insertErrors: 0,
      batches: 0,
      failedBatches: 0,
      cleared: false,
      failedRecords: []
    };

    if (options.clear ?? true) {
      stats.cleared = await this.clear(tableName);
    }

    const batches = chunk(records, this.batchSize);

    for (const [index, batch] of batches.entries()) {
      stats.batches++;
      const batchNumber = index + 1;

      try {
        await this.store.insertBatch(tableName, batch);
        stats.inserted += batch.length;
        this.logger.debug('Batch inserted', { table: tableName, batch: batchNumber, size: batch.length });
      } catch (error) {
        stats.failedBatches++;
        this.logger.warn('Batch insert failed, falling back to single-record inserts', {
          table: tableName,
          batch: batchNumber,
          size: batch.length,
          error: truncateMessage(getErrorMessage(error))
        });

        await this.insertIndividually(tableName, batch, index * this.batchSize, stats);
      }
    }

    return stats;
  }

  private async insertIndividually(
    tableName: string,
    batch: CleanedRecord[],
    offset: number,
    stats: LoadStats
  ): Promise<void> {
    for (const [index, record] of batch.entries()) {
      try {
        await this.store.insertBatch(tableName, [record]);
        stats.inserted++;
      } catch (error) {
        stats.insertErrors++;
        stats.failedRecords.push(record);
        this.logger.error('Record insert failed', {
          table: tableName,
          record: offset + index + 1,
          error: truncateMessage(getErrorMessage(error)),
          data: record
        });
      }
    }
  }
}

export default BatchLoader;
