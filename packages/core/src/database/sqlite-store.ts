/**
 * SQLite Recorder Store
 *
 * RecorderStore over better-sqlite3. Synchronous, like the import run
 * itself: every call blocks only on the database.
 */

import Database from 'better-sqlite3';
import { METADATA_TABLE, SCHEMA_CHANGES_TABLE, type StatisticsTable } from '../catalog/index.js';
import type {
  EntityMetadata,
  MetadataAggregate,
  RecordFilter,
  RecorderStore,
  RunResult,
  SqlStatement,
  SqlValue,
  StatisticRecord,
  TimeRange,
} from './store.js';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Quote an identifier for SQLite
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function appendRange(clauses: string[], params: SqlValue[], range: TimeRange): void {
  if (range.after !== undefined) {
    clauses.push('start_ts >= ?');
    params.push(range.after);
  }
  if (range.before !== undefined) {
    clauses.push('start_ts <= ?');
    params.push(range.before);
  }
}

// =============================================================================
// SQLite Store
// =============================================================================

export class SqliteRecorderStore implements RecorderStore {
  readonly dialect = 'sqlite';

  constructor(private db: Database.Database) {}

  getSchemaVersion(): number | null {
    if (!this.tableExists(SCHEMA_CHANGES_TABLE)) {
      return null;
    }

    const row = this.db
      .prepare<[], { schema_version: number | null }>(
        `SELECT schema_version FROM ${SCHEMA_CHANGES_TABLE} ORDER BY change_id DESC LIMIT 1`
      )
      .get();

    return row?.schema_version ?? null;
  }

  findExistingMetadataIds(ids: readonly number[]): Set<number> {
    const distinct = [...new Set(ids)];
    if (distinct.length === 0) {
      return new Set();
    }

    const placeholders = distinct.map(() => '?').join(', ');
    const rows = this.db
      .prepare<number[], { id: number }>(
        `SELECT id FROM ${METADATA_TABLE} WHERE id IN (${placeholders})`
      )
      .all(...distinct);

    return new Set(rows.map((r) => r.id));
  }

  findMetadataByStatisticId(statisticId: string): EntityMetadata | null {
    const row = this.db
      .prepare<[string], EntityMetadata>(
        `SELECT id, statistic_id, source, unit_of_measurement
         FROM ${METADATA_TABLE} WHERE statistic_id = ? ORDER BY id LIMIT 1`
      )
      .get(statisticId);

    return row ?? null;
  }

  listMetadata(): EntityMetadata[] {
    return this.db
      .prepare<[], EntityMetadata>(
        `SELECT id, statistic_id, source, unit_of_measurement FROM ${METADATA_TABLE} ORDER BY id`
      )
      .all();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  run(statement: SqlStatement): RunResult {
    const result = this.db.prepare(statement.text).run(...statement.params);
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    };
  }

  getRecord(table: StatisticsTable, id: number): StatisticRecord | null {
    const row = this.db
      .prepare<[number], StatisticRecord>(
        `SELECT id, metadata_id, created_ts, start_ts, mean, min, max,
                last_reset, last_reset_ts, state, sum
         FROM ${table} WHERE id = ?`
      )
      .get(id);

    return row ?? null;
  }

  countRecords(table: StatisticsTable): number {
    return this.countRows(table);
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master
         WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
         ORDER BY name`
      )
      .all()
      .map((r) => r.name);
  }

  countRows(table: string): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`)
      .get();
    return row?.count ?? 0;
  }

  countColumns(table: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM pragma_table_info(?)')
      .get(table);
    return row?.count ?? 0;
  }

  aggregateByMetadata(table: StatisticsTable, range: TimeRange): MetadataAggregate[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];
    appendRange(clauses, params, range);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    return this.db
      .prepare<SqlValue[], MetadataAggregate>(
        `SELECT metadata_id AS metadataId,
                MIN(start_ts) AS first,
                MAX(start_ts) AS last,
                COUNT(*) AS count
         FROM ${table}
         ${where}
         GROUP BY metadata_id
         ORDER BY metadata_id`
      )
      .all(...params);
  }

  queryRecords(table: StatisticsTable, filter: RecordFilter): StatisticRecord[] {
    const clauses: string[] = ['metadata_id = ?'];
    const params: SqlValue[] = [filter.metadataId];
    appendRange(clauses, params, filter);

    const { above, below } = filter;
    const columns = ['mean', 'min', 'max'];
    if (above !== undefined && below !== undefined) {
      clauses.push(`(${columns.map((c) => `(${c} > ? AND ${c} < ?)`).join(' OR ')})`);
      for (let i = 0; i < columns.length; i++) params.push(above, below);
    } else if (above !== undefined) {
      clauses.push(`(${columns.map((c) => `${c} > ?`).join(' OR ')})`);
      for (let i = 0; i < columns.length; i++) params.push(above);
    } else if (below !== undefined) {
      clauses.push(`(${columns.map((c) => `${c} < ?`).join(' OR ')})`);
      for (let i = 0; i < columns.length; i++) params.push(below);
    }

    return this.db
      .prepare<SqlValue[], StatisticRecord>(
        `SELECT id, metadata_id, created_ts, start_ts, mean, min, max,
                last_reset, last_reset_ts, state, sum
         FROM ${table}
         WHERE ${clauses.join(' AND ')}
         ORDER BY start_ts, id`
      )
      .all(...params);
  }

  private tableExists(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`
      )
      .get(name);
    return row !== undefined;
  }
}

/**
 * Create a store over an open better-sqlite3 database
 */
export function createRecorderStore(db: Database.Database): SqliteRecorderStore {
  return new SqliteRecorderStore(db);
}
