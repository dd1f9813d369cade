/**
 * Database status: size of every table as rows × columns
 */

import { BYTES_PER_FIELD } from '../catalog/index.js';
import type { RecorderStore } from '../database/store.js';

export interface TableStatus {
  name: string;
  rows: number;
  columns: number;
  /** rows × columns */
  records: number;
  /** Share of all records, 0-100 */
  percent: number;
  /** Estimate: records × 8 */
  bytes: number;
}

export interface StatusReport {
  dialect: string;
  schemaVersion: number | null;
  tables: TableStatus[];
  totalRecords: number;
  totalBytes: number;
}

export function summarizeTables(store: RecorderStore): StatusReport {
  const measured = store.listTables().map((name) => {
    const rows = store.countRows(name);
    const columns = store.countColumns(name);
    const records = rows * columns;
    return { name, rows, columns, records, bytes: records * BYTES_PER_FIELD };
  });

  const totalRecords = measured.reduce((sum, t) => sum + t.records, 0);
  const totalBytes = measured.reduce((sum, t) => sum + t.bytes, 0);

  return {
    dialect: store.dialect,
    schemaVersion: store.getSchemaVersion(),
    tables: measured.map((t) => ({
      ...t,
      percent: totalRecords > 0 ? (t.records / totalRecords) * 100 : 0,
    })),
    totalRecords,
    totalBytes,
  };
}
