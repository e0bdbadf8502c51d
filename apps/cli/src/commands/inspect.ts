import { Command } from 'commander';
import { normalizeColumnName } from '@sheetreplica/data-ingestion';
import type { SchemaRegistry } from '@sheetreplica/data-ingestion';
import type { SourceReader, TableSchema } from '@sheetreplica/types';
import { loadConfig } from '../config';
import { GlobalOptions, createCliLogger, createSource, loadRegistry } from '../runtime';

export const DEFAULT_INSPECT_ROWS = 3;

export interface HeaderDiagnostic {
  index: number;
  header: string;
  normalized: string;
  column: string | null;
}

export interface InspectResult {
  sheet: string;
  table: string | null;
  headers: HeaderDiagnostic[];
  missingColumns: string[];
  rowCount: number;
  sampleRows: string[][];
}

export function findTableForSheet(registry: SchemaRegistry, sheet: string): TableSchema | undefined {
  return registry.list().find((schema) => (schema.sheet ?? schema.name) === sheet);
}

/**
 * Header diagnostics for one tab: how each header normalizes and which schema column it feeds
 */
export async function runInspect(
  source: SourceReader,
  registry: SchemaRegistry,
  sheet: string,
  rows: number = DEFAULT_INSPECT_ROWS
): Promise<InspectResult> {
  const contents = await source.listRows(sheet);
  const schema = findTableForSheet(registry, sheet);

  const columnsByKey = new Map<string, string>();
  for (const column of schema?.columns ?? []) {
    columnsByKey.set(normalizeColumnName(column), column);
  }

  const matched = new Set<string>();
  const headers = contents.headers.map((header, index) => {
    const normalized = normalizeColumnName(header);
    const column = columnsByKey.get(normalized);
    // Only the first header with a given name is read
    const feeds = column !== undefined && !matched.has(column) ? column : null;
    if (feeds) matched.add(feeds);
    return { index, header, normalized, column: feeds };
  });

  return {
    sheet,
    table: schema?.name ?? null,
    headers,
    missingColumns: (schema?.columns ?? []).filter((column) => !matched.has(column)),
    rowCount: contents.rows.length,
    sampleRows: contents.rows.slice(0, rows)
  };
}

export function formatInspectResult(result: InspectResult): string {
  const lines = [
    `Sheet '${result.sheet}': ${result.headers.length} columns, ${result.rowCount} data rows`,
    result.table ? `Table: ${result.table}` : 'Table: (no table reads this sheet)',
    'Headers:'
  ];

  for (const header of result.headers) {
    const target = header.column ?? '(ignored)';
    lines.push(`  [${header.index}] '${header.header}' -> ${header.normalized || '(empty)'} -> ${target}`);
  }

  if (result.missingColumns.length > 0) {
    lines.push(`Missing columns: ${result.missingColumns.join(', ')}`);
  }

  if (result.sampleRows.length > 0) {
    lines.push('First rows:');
    result.sampleRows.forEach((row, index) => {
      lines.push(`  Row ${index + 2}: ${JSON.stringify(row)}`);
    });
  }

  return lines.join('\n');
}

interface InspectFlags {
  rows: string;
}

export const inspectCommand = new Command('inspect')
  .description('Show how the headers of one tab map to the schema columns')
  .argument('<sheet>', 'Tab name')
  .option('--rows <n>', 'Number of data rows to print', String(DEFAULT_INSPECT_ROWS))
  .action(async (sheet: string, flags: InspectFlags, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(process.env, { schemaFile: globals.schema });
    const logger = createCliLogger(config);
    const registry = await loadRegistry(config);

    const rows = Number.parseInt(flags.rows, 10);
    const result = await runInspect(
      createSource(config, logger),
      registry,
      sheet,
      Number.isNaN(rows) || rows < 0 ? DEFAULT_INSPECT_ROWS : rows
    );

    console.log(formatInspectResult(result));
  });
