/**
 * @recstat/core/database - Recorder database access
 *
 * Provides SQLite connection management and the RecorderStore seam.
 */

export {
  DatabaseConnection,
  createConnection,
  createInMemoryConnection,
  type DatabaseConfig,
} from './connection.js';

export {
  SqliteRecorderStore,
  createRecorderStore,
  quoteIdentifier,
} from './sqlite-store.js';

export type {
  RecorderStore,
  SqlStatement,
  SqlValue,
  RunResult,
  EntityMetadata,
  StatisticRecord,
  TimeRange,
  RecordFilter,
  MetadataAggregate,
} from './store.js';
