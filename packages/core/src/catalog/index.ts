export {
  describeTable,
  knownTables,
  isStatisticsTable,
  columnSpec,
  checkSchemaVersion,
  STATISTICS_TABLES,
  METADATA_TABLE,
  SCHEMA_CHANGES_TABLE,
  KNOWN_SCHEMA_VERSION,
  BYTES_PER_FIELD,
  STATISTIC_COLUMN_NAMES,
  STATISTIC_COLUMN_KINDS,
  VALUE_FIELDS,
  DISPLAY_COLUMNS,
  CSV_COLUMNS,
  type ColumnKind,
  type ColumnSpec,
  type TableSpec,
  type StatisticsTable,
  type StatisticColumn,
  type StatisticValueField,
  type SchemaCheck,
} from './schema-catalog.js';
