/**
 * Summary Reporter
 *
 * Folds a plan and its execution into one report, and renders the report
 * as the text block the CLI prints.
 */

import type { ExecutionResult, ImportPlan, ImportReport, ValidationErrorKind } from './types.js';

export function summarize(result: ExecutionResult, plan: ImportPlan): ImportReport {
  const byKind: Record<ValidationErrorKind, number> = {
    MissingTable: 0,
    UnknownTable: 0,
    MissingMetadataId: 0,
    MissingStartTs: 0,
    UnknownMetadataId: 0,
    InvalidValue: 0,
  };
  for (const error of plan.errors) {
    byKind[error.kind]++;
  }

  return {
    mode: result.mode,
    totalRows: plan.totalRows,
    skipped: plan.skipped,
    invalid: {
      rows: plan.invalidLines.length,
      byKind,
      errors: plan.errors,
    },
    conflicts: {
      count: plan.conflicts.length,
      entries: plan.conflicts,
    },
    inserted: result.counts.inserted,
    updated: result.counts.updated,
    deleted: result.counts.deleted,
    insertedIds: result.mode === 'apply' ? result.insertedIds : [],
    statements: result.mode === 'dry-run' ? result.statements : [],
  };
}

/**
 * Render a report as plain lines, without colour
 */
export function formatReport(report: ImportReport): string[] {
  const dryRun = report.mode === 'dry-run';
  const label = (past: string, future: string): string => `${dryRun ? `Would ${future}` : past}:`.padEnd(18);

  const lines = [
    `Rows read:        ${report.totalRows}`,
    `Skipped:          ${report.skipped}`,
    `Invalid rows:     ${report.invalid.rows}`,
    `Conflicts:        ${report.conflicts.count}`,
    `${label('Inserted', 'insert')}${report.inserted}`,
    `${label('Updated', 'update')}${report.updated}`,
    `${label('Deleted', 'delete')}${report.deleted}`,
  ];

  for (const error of report.invalid.errors) {
    lines.push(`  line ${error.line}: [${error.kind}] ${error.message}`);
  }

  for (const conflict of report.conflicts.entries) {
    lines.push(
      `  ${conflict.table} id ${conflict.id}: line ${conflict.overriddenLine} (${conflict.overriddenKind}) ` +
        `overridden by line ${conflict.winningLine} (${conflict.winningKind})`
    );
  }

  return lines;
}
