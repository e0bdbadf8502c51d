import { Command } from 'commander';
import { getErrorMessage } from '@sheetreplica/data-ingestion';
import type { SchemaRegistry } from '@sheetreplica/data-ingestion';
import type { SourceReader, StoreClient } from '@sheetreplica/types';
import { loadConfig } from '../config';
import { GlobalOptions, createCliLogger, createSource, createStore, loadRegistry } from '../runtime';

export interface TableCheck {
  table: string;
  sheet: string;
  sheetFound: boolean | null;
  storeReachable: boolean;
  error?: string;
}

export interface CheckResult {
  sheets: string[];
  sourceError?: string;
  tables: TableCheck[];
  ok: boolean;
}

/**
 * Connectivity check: lists the spreadsheet tabs and pings every table in the store
 */
export async function runCheck(
  source: SourceReader,
  store: StoreClient,
  registry: SchemaRegistry
): Promise<CheckResult> {
  let sheets: string[] = [];
  let sourceError: string | undefined;
  let sheetsListed = false;

  if (source.listSheets) {
    try {
      sheets = await source.listSheets();
      sheetsListed = true;
    } catch (error) {
      sourceError = getErrorMessage(error);
    }
  }

  const tables: TableCheck[] = [];
  for (const table of registry.dependencyOrder()) {
    const sheet = registry.sheetOf(table);
    const check: TableCheck = {
      table,
      sheet,
      sheetFound: sheetsListed ? sheets.includes(sheet) : null,
      storeReachable: true
    };

    if (store.ping) {
      try {
        await store.ping(table);
      } catch (error) {
        check.storeReachable = false;
        check.error = getErrorMessage(error);
      }
    }

    tables.push(check);
  }

  const ok = sourceError === undefined &&
    tables.every((check) => check.storeReachable && check.sheetFound !== false);

  return { sheets, sourceError, tables, ok };
}

export function formatCheckResult(result: CheckResult): string {
  const lines: string[] = [];

  if (result.sourceError) {
    lines.push(`Spreadsheet: unreachable (${result.sourceError})`);
  } else {
    lines.push(`Spreadsheet: ${result.sheets.length} tabs (${result.sheets.join(', ')})`);
  }

  for (const check of result.tables) {
    const sheet = check.sheetFound === false ? `tab '${check.sheet}' missing` : `tab '${check.sheet}'`;
    const store = check.storeReachable ? 'store ok' : `store unreachable (${check.error ?? 'unknown error'})`;
    lines.push(`  ${check.table}: ${sheet}, ${store}`);
  }

  lines.push(result.ok ? 'All checks passed' : 'Some checks failed');
  return lines.join('\n');
}

export const checkCommand = new Command('check')
  .description('Check access to the spreadsheet and to every table in the store')
  .action(async (_flags: Record<string, never>, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(process.env, { schemaFile: globals.schema });
    const logger = createCliLogger(config);
    const registry = await loadRegistry(config);

    const result = await runCheck(createSource(config, logger), createStore(config, registry), registry);

    console.log(formatCheckResult(result));
    process.exitCode = result.ok ? 0 : 1;
  });
