/**
 * Record export in the CSV contract shared with import
 */

import { CSV_COLUMNS, STATISTIC_COLUMN_NAMES, STATISTICS_TABLES } from '../catalog/index.js';
import type { RecorderStore, SqlValue, TimeRange } from '../database/store.js';
import { formatReal } from '../import/statements.js';
import { formatUtc } from './time.js';

export interface ExportOptions extends TimeRange {
  above?: number;
  below?: number;
}

export interface ExportResult {
  header: readonly string[];
  /** Cells already rendered as text, in header order */
  rows: string[][];
  /** Requested entities with no statistics_meta row */
  missing: string[];
}

function formatCell(value: SqlValue, column: string): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  return column === 'id' || column === 'metadata_id' ? String(value) : formatReal(value);
}

/**
 * Export records of the named entities, long-term table before short-term
 */
export function exportRecords(
  store: RecorderStore,
  entities: readonly string[],
  options: ExportOptions = {}
): ExportResult {
  const rows: string[][] = [];
  const missing: string[] = [];

  for (const entity of entities) {
    const meta = store.findMetadataByStatisticId(entity);
    if (!meta) {
      missing.push(entity);
      continue;
    }

    for (const table of STATISTICS_TABLES) {
      const records = store.queryRecords(table, { ...options, metadataId: meta.id });
      for (const record of records) {
        rows.push([
          table,
          entity,
          record.start_ts === null ? '' : formatUtc(record.start_ts),
          ...STATISTIC_COLUMN_NAMES.map((column) => formatCell(record[column], column)),
        ]);
      }
    }
  }

  return { header: CSV_COLUMNS, rows, missing };
}
