/**
 * CSV Import Reader
 *
 * Tokenizes with csv-parser and shapes the records into ImportRows keyed by
 * header name. Structural problems (no header, no `table` column, a record
 * whose width differs from the header) reject the whole file: a shifted
 * column would silently write values into the wrong fields.
 */

import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { CSV_COLUMNS } from '../catalog/index.js';
import { CsvStructureError } from '../reliability/errors.js';
import type { ImportRow } from '../import/types.js';

/** Header spellings written by older exports */
const HEADER_ALIASES: Record<string, string> = {
  'entity (ignored)': 'entity',
  'date (ignored)': 'date',
};

export interface CsvReadResult {
  /** Normalized header names in file order */
  header: string[];
  rows: ImportRow[];
  /** Header columns outside the CSV contract; their values are ignored */
  ignoredColumns: string[];
}

function normalizeHeader(cell: string, index: number): string {
  const trimmed = (index === 0 ? cell.replace(/^\uFEFF/, '') : cell).trim();
  return HEADER_ALIASES[trimmed] ?? trimmed;
}

async function readRecords(source: string | Buffer): Promise<string[][]> {
  const records: string[][] = [];
  const stream = Readable.from([source]).pipe(csvParser({ headers: false }));

  for await (const row of stream) {
    const record: Record<string, string> = row;
    records.push(Object.values(record));
  }

  return records;
}

/**
 * Read an import CSV into rows
 *
 * Line numbers count records with the header as line 1.
 */
export async function readImportRows(source: string | Buffer): Promise<CsvReadResult> {
  let records: string[][];
  try {
    records = await readRecords(source);
  } catch (error) {
    throw new CsvStructureError(
      `Error reading CSV: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const headerRecord = records[0];
  if (!headerRecord || headerRecord.every((cell) => cell.trim() === '')) {
    throw new CsvStructureError('CSV file is empty: a header row is required', { line: 1 });
  }

  const header = headerRecord.map(normalizeHeader);

  if (!header.includes('table')) {
    throw new CsvStructureError('CSV header must include a "table" column', { line: 1 });
  }

  const seen = new Set<string>();
  for (const name of header) {
    if (name !== '' && seen.has(name)) {
      throw new CsvStructureError(`Duplicate CSV column "${name}"`, { line: 1 });
    }
    seen.add(name);
  }

  const ignoredColumns = header.filter((name) => !CSV_COLUMNS.includes(name));

  const rows: ImportRow[] = [];
  for (let r = 1; r < records.length; r++) {
    const record = records[r];
    const line = r + 1;

    // A physically empty line, as opposed to a row of empty cells
    if (record.length === 0 || (record.length === 1 && record[0] === '' && header.length > 1)) {
      continue;
    }

    if (record.length !== header.length) {
      throw new CsvStructureError(
        `CSV structure error at line ${line}: expected ${header.length} columns, got ${record.length}`,
        { line }
      );
    }

    const fields: Record<string, string> = {};
    header.forEach((name, idx) => {
      if (name !== '' && CSV_COLUMNS.includes(name)) {
        fields[name] = record[idx];
      }
    });

    rows.push({ line, fields });
  }

  return { header, rows, ignoredColumns };
}
