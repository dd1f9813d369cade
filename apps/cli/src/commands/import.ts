/**
 * Import Command
 *
 * Applies an edited CSV to the statistics tables in one transaction, or
 * prints the SQL it would run.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { formatReport, readImportRows, runImport, type ImportReport } from '@recstat/core';
import { withRecorder, type GlobalOptions } from '../context.js';

export interface ImportOptions extends GlobalOptions {
  dryRun?: boolean;
  json?: boolean;
}

function printReport(report: ImportReport): void {
  if (report.mode === 'dry-run') {
    console.log(chalk.yellow.bold('DRY RUN: no changes were made'));
    console.log();
    for (const statement of report.statements) {
      console.log(statement);
    }
    console.log();
  }

  for (const line of formatReport(report)) {
    console.log(line);
  }
}

/**
 * Execute the import command
 */
export async function importCommand(csvFile: string, options: ImportOptions): Promise<ImportReport> {
  const spinner = ora({ isSilent: options.json });

  spinner.start(`Reading ${csvFile}...`);
  const source = await readFile(resolve(options.cwd ?? process.cwd(), csvFile));
  const { rows, ignoredColumns } = await readImportRows(source).catch((error: unknown) => {
    spinner.fail(`Could not read ${csvFile}`);
    throw error;
  });
  spinner.succeed(`Read ${rows.length} rows from ${csvFile}`);

  if (ignoredColumns.length > 0) {
    console.error(chalk.yellow(`Warning: ignoring unknown columns: ${ignoredColumns.join(', ')}`));
  }

  return withRecorder(options, ({ store, logger }) => {
    spinner.start(options.dryRun ? 'Planning import...' : 'Applying import...');
    let report: ImportReport;
    try {
      report = runImport(rows, store, { dryRun: options.dryRun, logger });
    } catch (error) {
      spinner.fail('Import failed, nothing was committed');
      throw error;
    }
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }

    return report;
  });
}
