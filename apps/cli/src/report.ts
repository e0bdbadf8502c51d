import type { SyncRunReport, SyncStatistics, TableSyncReport } from '@sheetreplica/types';
import { DEFAULT_WARNING_THRESHOLD } from './config';

export type RunOutcome = 'success' | 'warning' | 'failure';

/**
 * Exit policy: no errors is a success, fewer than the threshold a warning, anything else a failure
 */
export function classifyRun(report: SyncRunReport, warningThreshold: number = DEFAULT_WARNING_THRESHOLD): RunOutcome {
  const { errors } = report.totals;
  if (errors === 0) return 'success';
  if (errors < warningThreshold) return 'warning';
  return 'failure';
}

export function exitCodeFor(outcome: RunOutcome): number {
  return outcome === 'failure' ? 1 : 0;
}

export function formatStatistics(stats: SyncStatistics): string {
  return [
    `read ${stats.rowsRead}`,
    `valid ${stats.validRows}`,
    `invalid ${stats.invalidRows}`,
    `duplicates ${stats.duplicatesRemoved}`,
    `fk rejected ${stats.fkRejected}`,
    `inserted ${stats.inserted}`,
    `insert errors ${stats.insertErrors}`
  ].join(', ');
}

export function formatTableReport(table: TableSyncReport): string[] {
  const lines = [`${table.table} [${table.status}]: ${formatStatistics(table.stats)}`];

  if (table.skippedReason) lines.push(`  skipped: ${table.skippedReason}`);
  if (table.error) lines.push(`  error: ${table.error}`);

  for (const error of [...table.validationErrors, ...table.fkErrors]) {
    lines.push(`  - ${error.message}`);
  }
  for (const warning of table.warnings) {
    lines.push(`  ! ${warning.message}`);
  }

  return lines;
}

const OUTCOME_MESSAGES: Record<RunOutcome, (errors: number) => string> = {
  success: () => 'Sync completed without errors',
  warning: (errors) => `Sync completed with ${errors} errors`,
  failure: (errors) => `Sync finished with ${errors} errors, review the source data`
};

export function formatRunReport(report: SyncRunReport, warningThreshold: number = DEFAULT_WARNING_THRESHOLD): string {
  const { totals } = report;
  const lines: string[] = [];

  if (report.dryRun) {
    lines.push('Dry run: nothing was written to the store');
  }

  for (const table of report.tables) {
    lines.push(...formatTableReport(table));
  }

  lines.push(
    `Total: ${formatStatistics(totals)}, failed tables ${totals.failedTables}, errors ${totals.errors}`,
    OUTCOME_MESSAGES[classifyRun(report, warningThreshold)](totals.errors)
  );

  return lines.join('\n');
}
