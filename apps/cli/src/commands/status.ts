/**
 * Status Command
 *
 * Shows database type, schema version and the size of every table.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { summarizeTables, type StatusReport } from '@recstat/core';
import { withRecorder, type GlobalOptions } from '../context.js';

export interface StatusOptions extends GlobalOptions {
  json?: boolean;
  /** Clock used for the "Time" line */
  now?: Date;
}

const RULE = '-'.repeat(70);
const MB = 1024 ** 2;

export function formatStatus(report: StatusReport, now: Date): string[] {
  const table = new Table({
    head: ['Table', 'Rows', 'Cols', 'Records', '% total', '~ MB'].map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: [],
    },
  });

  for (const t of report.tables) {
    table.push([
      t.name,
      String(t.rows),
      String(t.columns),
      String(t.records),
      `${t.percent.toFixed(1)}%`,
      (t.bytes / MB).toFixed(1),
    ]);
  }

  return [
    `Database type: ${report.dialect}, schema ${report.schemaVersion ?? 'unknown'}`,
    `Time: ${now.toISOString().replace('T', ' ').slice(0, 19)} UTC`,
    RULE,
    table.toString(),
    RULE,
    `TOTAL RECORDS: ${report.totalRecords.toLocaleString('en-US')}`,
    `TOTAL SIZE: ${(report.totalBytes / MB).toFixed(2)} MB`,
  ];
}

/**
 * Execute the status command
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  await withRecorder(options, ({ store }) => {
    const report = summarizeTables(store);

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    for (const line of formatStatus(report, options.now ?? new Date())) {
      console.log(line);
    }
  });
}
