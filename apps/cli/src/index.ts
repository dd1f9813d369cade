#!/usr/bin/env node

/**
 * recstat CLI
 *
 * Inspect, export and bulk-edit the long- and short-term statistics tables
 * of a recorder database.
 *
 * Commands:
 *   recstat status                 Table sizes and schema version
 *   recstat list                   Entities with counts and date range
 *   recstat export <entities...>   Records as CSV
 *   recstat import <csv-file>      Apply an edited CSV (or --dry-run)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_DB_URL, toExitCode } from '@recstat/core';
import type { GlobalOptions } from './context.js';
import { statusCommand, type StatusOptions } from './commands/status.js';
import { listCommand, type ListOptions } from './commands/list.js';
import { exportCommand, type ExportOptions } from './commands/export.js';
import { importCommand, type ImportOptions } from './commands/import.js';

const program = new Command();

program
  .name('recstat')
  .description('Recorder statistics toolkit')
  .version('0.1.0')
  .option('--db-url <url>', `Database URL (env HA_DB_URL, default ${DEFAULT_DB_URL})`)
  .option('-v, --verbose', 'Debug logging on stderr');

function globals(): GlobalOptions {
  return program.opts<{ dbUrl?: string; verbose?: boolean }>();
}

function fail(error: unknown): void {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(toExitCode(error));
}

// =============================================================================
// Inspection
// =============================================================================

program
  .command('status')
  .description('Summarize tables: rows, columns, records, share and size')
  .option('--json', 'Output as JSON')
  .action(async (options: StatusOptions) => {
    try {
      await statusCommand({ ...globals(), ...options });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('list')
  .description('List entities with count, first/last sample, size and unit')
  .option('--sort <key>', 'Sort by count, first, last or kb')
  .option('--reverse', 'Reverse sort order')
  .option('--csv', 'Output as CSV')
  .option('--after <date>', 'Only samples at or after this UTC date')
  .option('--before <date>', 'Only samples at or before this UTC date')
  .action(async (options: ListOptions) => {
    try {
      await listCommand({ ...globals(), ...options });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('export <entities...>')
  .description('Export records of the given entities as CSV')
  .option('--above <n>', 'Only rows where mean, min or max is above n')
  .option('--below <n>', 'Only rows where mean, min or max is below n')
  .option('--after <date>', 'Only samples at or after this UTC date')
  .option('--before <date>', 'Only samples at or before this UTC date')
  .action(async (entities: string[], options: ExportOptions) => {
    try {
      await exportCommand(entities, { ...globals(), ...options });
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Import
// =============================================================================

program
  .command('import <csv-file>')
  .description('Insert, update or delete statistics rows from a CSV')
  .option('--dry-run', 'Print the SQL instead of executing it')
  .option('--json', 'Output the report as JSON')
  .action(async (csvFile: string, options: ImportOptions) => {
    try {
      await importCommand(csvFile, { ...globals(), ...options });
    } catch (error) {
      fail(error);
    }
  });

program.addHelpText(
  'after',
  `
CSV format:
  table,entity,date,id,metadata_id,created_ts,start_ts,mean,min,max,last_reset,last_reset_ts,state,sum

  id + values     update only the given fields of that row
  id, no values   delete that row
  no id           insert (metadata_id and start_ts required)

Environment:
  HA_DB_URL   Database URL (sqlite:///relative.db or sqlite:////absolute.db)
  LOG_LEVEL   DEBUG, INFO, NOTICE, WARNING or ERROR (default WARNING)
`
);

program.parseAsync().catch(fail);
