/**
 * Export Command
 *
 * Writes the records of the named entities as CSV in the import format.
 */

import chalk from 'chalk';
import { ConfigurationError, exportRecords, formatCsv, parseDateOption } from '@recstat/core';
import { withRecorder, type GlobalOptions } from '../context.js';

export interface ExportOptions extends GlobalOptions {
  above?: string;
  below?: string;
  after?: string;
  before?: string;
}

function parseThreshold(value: string | undefined, optionName: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`Invalid ${optionName} "${value}": expected a number`, {
      code: 'INVALID_OPTION',
    });
  }
  return parsed;
}

/**
 * Execute the export command
 */
export async function exportCommand(entities: string[], options: ExportOptions): Promise<void> {
  const filter = {
    above: parseThreshold(options.above, '--above'),
    below: parseThreshold(options.below, '--below'),
    after: options.after !== undefined ? parseDateOption(options.after, '--after') : undefined,
    before: options.before !== undefined ? parseDateOption(options.before, '--before') : undefined,
  };

  await withRecorder(options, ({ store, logger }) => {
    const result = exportRecords(store, entities, filter);

    for (const entity of result.missing) {
      console.error(chalk.yellow(`Warning: Entity '${entity}' not found`));
    }
    logger.debug('Export complete', { rows: result.rows.length, missing: result.missing.length });

    process.stdout.write(formatCsv(result.header, result.rows));
  });
}
