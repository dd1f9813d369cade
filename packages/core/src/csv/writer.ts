/**
 * CSV Writer
 *
 * RFC 4180 quoting; `\n` line endings. The reader accepts everything this
 * writes, so an export can be edited and imported back unchanged.
 */

export type CsvCell = string | number | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(cells: readonly CsvCell[]): string {
  return cells.map(formatCsvCell).join(',');
}

/**
 * Format a header and rows as CSV text, one `\n`-terminated line per row
 */
export function formatCsv(header: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  return [header, ...rows].map((cells) => `${formatCsvRow(cells)}\n`).join('');
}
