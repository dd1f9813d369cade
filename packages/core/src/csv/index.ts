export { readImportRows, type CsvReadResult } from './reader.js';
export { formatCsv, formatCsvRow, formatCsvCell, type CsvCell } from './writer.js';
