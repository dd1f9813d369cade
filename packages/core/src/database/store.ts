/**
 * Recorder Store Interface
 *
 * The storage seam of the toolkit: every read and write the catalog,
 * import engine and inspection queries need, expressed against the
 * recorder's tables. The import engine only ever sees this interface and a
 * store is passed explicitly to each run.
 */

import type { StatisticsTable } from '../catalog/index.js';

// =============================================================================
// Types
// =============================================================================

export type SqlValue = number | string | null;

/**
 * A parameterised statement: `?` placeholders in `text`, one param each
 */
export interface SqlStatement {
  text: string;
  params: SqlValue[];
}

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface EntityMetadata {
  id: number;
  statistic_id: string | null;
  source: string | null;
  unit_of_measurement: string | null;
}

export interface StatisticRecord {
  id: number;
  metadata_id: number;
  created_ts: number | null;
  start_ts: number | null;
  mean: number | null;
  min: number | null;
  max: number | null;
  last_reset: string | null;
  last_reset_ts: number | null;
  state: number | null;
  sum: number | null;
}

/** Inclusive bounds on `start_ts`, seconds since epoch */
export interface TimeRange {
  after?: number;
  before?: number;
}

export interface RecordFilter extends TimeRange {
  metadataId: number;
  /** Match when mean, min or max is strictly above */
  above?: number;
  /** Match when mean, min or max is strictly below */
  below?: number;
}

export interface MetadataAggregate {
  metadataId: number;
  count: number;
  first: number;
  last: number;
}

// =============================================================================
// Store Interface
// =============================================================================

export interface RecorderStore {
  /** Engine name, for display */
  readonly dialect: string;

  /** Latest recorded schema version, null when the recorder keeps none */
  getSchemaVersion(): number | null;

  /** One batched lookup: which of `ids` exist in statistics_meta */
  findExistingMetadataIds(ids: readonly number[]): Set<number>;
  findMetadataByStatisticId(statisticId: string): EntityMetadata | null;
  listMetadata(): EntityMetadata[];

  /** Run `fn` in one write transaction: commit on return, roll back on throw */
  transaction<T>(fn: () => T): T;
  run(statement: SqlStatement): RunResult;

  getRecord(table: StatisticsTable, id: number): StatisticRecord | null;
  countRecords(table: StatisticsTable): number;

  listTables(): string[];
  countRows(table: string): number;
  countColumns(table: string): number;

  aggregateByMetadata(table: StatisticsTable, range: TimeRange): MetadataAggregate[];
  queryRecords(table: StatisticsTable, filter: RecordFilter): StatisticRecord[];
}
