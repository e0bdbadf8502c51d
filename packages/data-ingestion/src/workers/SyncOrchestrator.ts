import {
  RawRow,
  SourceReader,
  StoreClient,
  SyncRunReport,
  SyncRunTotals,
  SyncStatistics,
  SyncStep,
  TableSyncReport,
  emptyStatistics
} from '@sheetreplica/types';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { RecordValidator } from '../validation/RecordValidator';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { ForeignKeyCache } from '../validation/ForeignKeyCache';
import { validateForeignKeys } from '../validation/ForeignKeyValidator';
import { BatchLoader, DEFAULT_BATCH_SIZE } from '../loader/BatchLoader';
import defaultLogger, { Logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errorUtils';

export const DEFAULT_ERROR_SAMPLE_SIZE = 5;

export interface SyncOrchestratorOptions {
  source: SourceReader;
  store: StoreClient;
  registry: SchemaRegistry;
  batchSize?: number;
  errorSampleSize?: number;
  dryRun?: boolean;
  logger?: Logger;
  onProgress?: (table: string, step: SyncStep) => void;
}

const STATISTIC_KEYS: Array<keyof SyncStatistics> = [
  'rowsRead',
  'emptyRows',
  'validRows',
  'invalidRows',
  'duplicatesRemoved',
  'fkRejected',
  'inserted',
  'insertErrors'
];

// Header is row 1, so the first data row is row 2
const FIRST_DATA_ROW = 2;

export function toRawRows(rows: readonly string[][]): RawRow[] {
  return rows.map((cells, index) => ({ position: index + FIRST_DATA_ROW, cells }));
}

export function summarizeRun(tables: TableSyncReport[]): SyncRunTotals {
  const totals: SyncRunTotals = { ...emptyStatistics(), failedTables: 0, errors: 0 };

  for (const table of tables) {
    for (const key of STATISTIC_KEYS) {
      totals[key] += table.stats[key];
    }
    if (table.status === 'failed') {
      totals.failedTables++;
    }
  }

  totals.errors = totals.invalidRows + totals.fkRejected + totals.insertErrors + totals.failedTables;
  return totals;
}

/**
 * Sync Orchestrator runs the validation-and-load pipeline table by table.
 * All tables of a run are emptied first, in reverse dependency order; they are then
 * processed strictly one after another in dependency order, so a table's foreign
 * keys are only checked against tables already loaded in this run.
 * Failures are recovered per table and end up in the report; the run never aborts early.
 */
export class SyncOrchestrator {
  private readonly source: SourceReader;
  private readonly registry: SchemaRegistry;
  private readonly loader: BatchLoader;
  private readonly validator = new RecordValidator();
  private readonly deduplicationEngine = new DeduplicationEngine();
  private readonly errorSampleSize: number;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly onProgress?: (table: string, step: SyncStep) => void;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.source = options.source;
    this.registry = options.registry;
    this.logger = options.logger ?? defaultLogger;
    this.errorSampleSize = options.errorSampleSize ?? DEFAULT_ERROR_SAMPLE_SIZE;
    this.dryRun = options.dryRun ?? false;
    this.onProgress = options.onProgress;
    this.loader = new BatchLoader(options.store, {
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      logger: this.logger
    });
  }

  /**
   * Sync the given tables (all registered tables by default) in dependency order
   */
  async run(tables?: string[]): Promise<SyncRunReport> {
    const started = Date.now();
    const order = this.registry.dependencyOrder(tables);
    const fkCache = new ForeignKeyCache(this.options.store, this.logger);
    const reports: TableSyncReport[] = [];

    this.logger.info('Sync run started', {
      tables: order,
      batchSize: this.loader.getBatchSize(),
      dryRun: this.dryRun
    });

    const cleared = this.dryRun ? new Set<string>() : await this.clearTables(order);

    for (const table of order) {
      reports.push(await this.syncTable(table, fkCache, cleared));
    }

    const finished = Date.now();
    const totals = summarizeRun(reports);

    this.logger.info('Sync run finished', {
      inserted: totals.inserted,
      errors: totals.errors,
      failedTables: totals.failedTables,
      durationMs: finished - started
    });

    return {
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
      dryRun: this.dryRun,
      tables: reports,
      totals
    };
  }

  /**
   * Empty the run's tables before anything is loaded. Referencing tables go
   * first so the store never holds a row pointing at a deleted key.
   */
  private async clearTables(order: string[]): Promise<Set<string>> {
    const cleared = new Set<string>();
    for (const table of [...order].reverse()) {
      if (await this.loader.clear(table)) {
        cleared.add(table);
      }
    }
    this.logger.info('Tables cleared', { cleared: cleared.size, tables: order.length });
    return cleared;
  }

  /**
   * read → validate → dedupe → foreign keys → load, for one table.
   * Tables listed in `cleared` are not cleared again before their load.
   */
  async syncTable(
    table: string,
    fkCache: ForeignKeyCache,
    cleared: ReadonlySet<string> = new Set()
  ): Promise<TableSyncReport> {
    const started = Date.now();
    const schema = this.registry.get(table);
    const sheet = this.registry.sheetOf(table);
    const stats = emptyStatistics();
    const log = this.logger.child(table);

    const report = (
      status: TableSyncReport['status'],
      extra: Partial<TableSyncReport> = {}
    ): TableSyncReport => ({
      table,
      sheet,
      status,
      stats,
      validationErrors: [],
      fkErrors: [],
      warnings: [],
      durationMs: Date.now() - started,
      ...extra
    });

    // 1. Read
    this.onProgress?.(table, 'reading');
    let headers: string[];
    let rows: RawRow[];
    try {
      const contents = await this.source.listRows(sheet);
      headers = contents.headers;
      rows = toRawRows(contents.rows);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error('Reading the sheet failed', { sheet, error: message });
      return report('failed', { error: message });
    }

    stats.rowsRead = rows.length;
    log.info('Sheet read', { sheet, columns: headers.length, rows: rows.length });

    if (headers.length === 0) {
      return report('skipped', { skippedReason: 'sheet has no header row' });
    }

    // 2. Validate
    this.onProgress?.(table, 'validating');
    const validation = this.validator.validateRows(rows, schema, headers);
    stats.emptyRows = validation.emptyRows;
    stats.validRows = validation.records.length;
    stats.invalidRows = validation.invalidRows;

    const validationErrors = validation.errors.slice(0, this.errorSampleSize);
    const warnings = validation.warnings.slice(0, this.errorSampleSize);

    if (validation.invalidRows > 0) {
      log.warn('Rows failed validation', {
        invalidRows: validation.invalidRows,
        firstErrors: validationErrors.map((error) => error.message)
      });
    }
    for (const warning of warnings) {
      log.warn(warning.message);
    }

    if (validation.records.length === 0) {
      return report('skipped', { validationErrors, warnings, skippedReason: 'no valid rows' });
    }

    // 3. Deduplicate
    this.onProgress?.(table, 'deduplicating');
    const deduplicated = this.deduplicationEngine.dedupe(validation.records, schema.primaryKey);
    stats.duplicatesRemoved = deduplicated.duplicatesRemoved;
    if (deduplicated.duplicatesRemoved > 0) {
      log.info('Duplicate keys collapsed, keeping the latest row', {
        primaryKey: schema.primaryKey,
        duplicatesRemoved: deduplicated.duplicatesRemoved
      });
    }

    // 4. Foreign keys
    this.onProgress?.(table, 'foreign_keys');
    const foreignKeys = await validateForeignKeys(deduplicated.records, schema, fkCache.keyLookup);
    stats.fkRejected = foreignKeys.rejectedRecords.length;
    const fkErrors = foreignKeys.rejected.slice(0, this.errorSampleSize);

    if (stats.fkRejected > 0) {
      log.warn('Rows rejected by foreign key checks', {
        fkRejected: stats.fkRejected,
        firstErrors: fkErrors.map((error) => error.message)
      });
    }

    if (foreignKeys.valid.length === 0) {
      return report('skipped', {
        validationErrors,
        fkErrors,
        warnings,
        skippedReason: 'no rows with valid foreign keys'
      });
    }

    if (this.dryRun) {
      log.info('Dry run, load skipped', { wouldInsert: foreignKeys.valid.length });
      this.onProgress?.(table, 'completed');
      return report('completed', { validationErrors, fkErrors, warnings });
    }

    // 5. Load
    this.onProgress?.(table, 'loading');
    const loadStats = await this.loader.load(
      table,
      foreignKeys.valid.map((record) => record.values),
      { clear: !cleared.has(table) }
    );
    stats.inserted = loadStats.inserted;
    stats.insertErrors = loadStats.insertErrors;

    if (loadStats.insertErrors > 0) {
      log.warn('Table loaded with insert errors', {
        inserted: loadStats.inserted,
        insertErrors: loadStats.insertErrors
      });
    } else {
      log.success('Table loaded', { inserted: loadStats.inserted });
    }

    this.onProgress?.(table, 'completed');
    return report(loadStats.insertErrors > 0 ? 'partial' : 'completed', {
      validationErrors,
      fkErrors,
      warnings
    });
  }
}

export default SyncOrchestrator;
