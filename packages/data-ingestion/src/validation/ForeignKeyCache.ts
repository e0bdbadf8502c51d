import { StoreClient } from '@sheetreplica/types';
import defaultLogger, { Logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errorUtils';

export interface ForeignKeyCacheStats {
  size: number;
  hits: number;
  misses: number;
  failures: number;
}

/**
 * Run-scoped memo of the key values present in referenced tables.
 * Entries are filled lazily, one store query per (table, column), and are
 * never invalidated: referenced tables are fully loaded before anything reads them.
 * Not safe to share between concurrent runs.
 */
export class ForeignKeyCache {
  private readonly entries = new Map<string, Set<string>>();
  private stats = { hits: 0, misses: 0, failures: 0 };

  constructor(
    private readonly store: Pick<StoreClient, 'selectColumn'>,
    private readonly logger: Logger = defaultLogger
  ) {}

  private static keyOf(table: string, column: string): string {
    return `${table}.${column}`;
  }

  has(table: string, column: string): boolean {
    return this.entries.has(ForeignKeyCache.keyOf(table, column));
  }

  /**
   * Existing key values of `table.column`, trimmed to their string form.
   * A failed query yields an empty set for this call and is retried on the next one.
   */
  async lookup(table: string, column: string): Promise<Set<string>> {
    const key = ForeignKeyCache.keyOf(table, column);
    const cached = this.entries.get(key);
    if (cached) {
      this.stats.hits++;
      return cached;
    }

    this.stats.misses++;
    this.logger.debug('Loading existing keys', { table, column });

    try {
      const values = await this.store.selectColumn(table, column);
      const keys = new Set<string>();
      for (const value of values) {
        if (value === null || value === undefined) continue;
        const text = String(value).trim();
        if (text) keys.add(text);
      }

      this.entries.set(key, keys);
      this.logger.debug('Existing keys loaded', { table, column, count: keys.size });
      return keys;
    } catch (error) {
      this.stats.failures++;
      this.logger.error('Failed to load existing keys', {
        table,
        column,
        error: getErrorMessage(error)
      });
      return new Set<string>();
    }
  }

  // Bound lookup usable as a KeyLookup
  readonly keyLookup = (table: string, column: string): Promise<Set<string>> => this.lookup(table, column);

  getStats(): ForeignKeyCacheStats {
    return { size: this.entries.size, ...this.stats };
  }

  clear(): void {
    this.entries.clear();
    this.stats = { hits: 0, misses: 0, failures: 0 };
  }
}

export default ForeignKeyCache;
