import { Command } from 'commander';
import { SyncOrchestrator } from '@sheetreplica/data-ingestion';
import type { Logger, SchemaRegistry } from '@sheetreplica/data-ingestion';
import type { SourceReader, StoreClient, SyncRunReport } from '@sheetreplica/types';
import { loadConfig } from '../config';
import { RunOutcome, classifyRun, exitCodeFor, formatRunReport } from '../report';
import { GlobalOptions, createCliLogger, createSource, createStore, loadRegistry } from '../runtime';

export interface SyncDeps {
  source: SourceReader;
  store: StoreClient;
  registry: SchemaRegistry;
  logger: Logger;
}

export interface SyncCommandOptions {
  tables?: string[];
  batchSize: number;
  errorSampleSize: number;
  warningThreshold: number;
  dryRun: boolean;
}

export interface SyncCommandResult {
  report: SyncRunReport;
  outcome: RunOutcome;
  exitCode: number;
  output: string;
}

export async function runSync(deps: SyncDeps, options: SyncCommandOptions): Promise<SyncCommandResult> {
  const orchestrator = new SyncOrchestrator({
    source: deps.source,
    store: deps.store,
    registry: deps.registry,
    logger: deps.logger,
    batchSize: options.batchSize,
    errorSampleSize: options.errorSampleSize,
    dryRun: options.dryRun,
    onProgress: (table, step) => deps.logger.debug('Progress', { table, step })
  });

  const tables = options.tables && options.tables.length > 0 ? options.tables : undefined;
  const report = await orchestrator.run(tables);
  const outcome = classifyRun(report, options.warningThreshold);

  return {
    report,
    outcome,
    exitCode: exitCodeFor(outcome),
    output: formatRunReport(report, options.warningThreshold)
  };
}

interface SyncFlags {
  batchSize?: string;
  dryRun: boolean;
}

export const syncCommand = new Command('sync')
  .description('Replicate the spreadsheet tabs into the store, in dependency order')
  .argument('[tables...]', 'Tables to sync (default: every registered table)')
  .option('--batch-size <n>', 'Records per insert batch')
  .option('--dry-run', 'Validate and report without writing to the store', false)
  .action(async (tables: string[], flags: SyncFlags, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(process.env, { batchSize: flags.batchSize, schemaFile: globals.schema });
    const logger = createCliLogger(config);
    const registry = await loadRegistry(config);

    const result = await runSync(
      {
        source: createSource(config, logger),
        // Dry runs still read the store for foreign key checks
        store: createStore(config, registry),
        registry,
        logger
      },
      {
        tables,
        batchSize: config.batchSize,
        errorSampleSize: config.errorSampleSize,
        warningThreshold: config.warningThreshold,
        dryRun: flags.dryRun
      }
    );

    console.log(result.output);
    process.exitCode = result.exitCode;
  });
