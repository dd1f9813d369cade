/**
 * List Command
 *
 * One line per entity: record count, first and last sample, estimated
 * size and unit, merged across both statistics tables.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  ConfigurationError,
  ENTITY_SORT_KEYS,
  formatCsv,
  formatUtc,
  isEntitySortKey,
  listEntities,
  parseDateOption,
  type EntitySummary,
} from '@recstat/core';
import { withRecorder, type GlobalOptions } from '../context.js';

export interface ListOptions extends GlobalOptions {
  sort?: string;
  reverse?: boolean;
  csv?: boolean;
  after?: string;
  before?: string;
}

const HEADERS = ['Entity', 'Count', 'First', 'Last', '~ KB', 'Unit'];

function toCells(e: EntitySummary): string[] {
  return [e.entity, String(e.count), formatUtc(e.first), formatUtc(e.last), e.kb.toFixed(1), e.unit];
}

/**
 * Execute the list command
 */
export async function listCommand(options: ListOptions): Promise<void> {
  const { sort } = options;
  if (sort !== undefined && !isEntitySortKey(sort)) {
    throw new ConfigurationError(
      `Invalid --sort "${sort}" (expected one of ${ENTITY_SORT_KEYS.join(', ')})`,
      { code: 'INVALID_OPTION' }
    );
  }

  const after = options.after !== undefined ? parseDateOption(options.after, '--after') : undefined;
  const before = options.before !== undefined ? parseDateOption(options.before, '--before') : undefined;

  await withRecorder(options, ({ store }) => {
    const entities = listEntities(store, { after, before, sort, reverse: options.reverse });

    if (options.csv) {
      process.stdout.write(formatCsv(HEADERS, entities.map(toCells)));
      return;
    }

    if (entities.length === 0) {
      console.log(chalk.dim('No statistics found.'));
      return;
    }

    const table = new Table({
      head: HEADERS.map((h) => chalk.bold(h)),
      style: {
        head: [],
        border: [],
      },
    });
    for (const entity of entities) {
      table.push(toCells(entity));
    }
    console.log(table.toString());
  });
}
