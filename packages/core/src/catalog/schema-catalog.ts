/**
 * Schema Catalog
 *
 * Static description of the recorder tables this toolkit reads and writes,
 * and the schema-version compatibility check. Column assumptions were taken
 * from recorder schema version 50.
 *
 * @module @recstat/core/catalog
 */

import { UnknownTableError } from '../reliability/errors.js';

// =============================================================================
// Types
// =============================================================================

export type ColumnKind = 'integer' | 'real' | 'text';

export interface ColumnSpec {
  name: string;
  kind: ColumnKind;
  nullable: boolean;
}

export interface TableSpec {
  name: string;
  /** Columns in storage and CSV order */
  columns: readonly ColumnSpec[];
  primaryKey: string;
  /** Fields an import row must carry to become an insert (empty for read-only tables) */
  requiredForInsert: readonly string[];
  /** Fields an insert may carry besides the required ones */
  optionalForInsert: readonly string[];
  /** Measurement fields; all blank on a row with an id means delete */
  valueFields: readonly string[];
  /** Whether import may write to this table */
  writable: boolean;
}

/** The two importable, structurally identical statistics tables */
export const STATISTICS_TABLES = ['statistics', 'statistics_short_term'] as const;
export type StatisticsTable = (typeof STATISTICS_TABLES)[number];

export const METADATA_TABLE = 'statistics_meta';
export const SCHEMA_CHANGES_TABLE = 'schema_changes';

export const KNOWN_SCHEMA_VERSION = 50;

/** Estimated bytes per stored field, used for size estimates */
export const BYTES_PER_FIELD = 8;

// =============================================================================
// Column Definitions
// =============================================================================

export type StatisticColumn =
  | 'id'
  | 'metadata_id'
  | 'created_ts'
  | 'start_ts'
  | 'mean'
  | 'min'
  | 'max'
  | 'last_reset'
  | 'last_reset_ts'
  | 'state'
  | 'sum';

export type StatisticValueField = Exclude<StatisticColumn, 'id' | 'metadata_id' | 'created_ts' | 'start_ts'>;

/** Kind of every statistics column */
export const STATISTIC_COLUMN_KINDS: Readonly<Record<StatisticColumn, ColumnKind>> = {
  id: 'integer',
  metadata_id: 'integer',
  created_ts: 'real',
  start_ts: 'real',
  mean: 'real',
  min: 'real',
  max: 'real',
  last_reset: 'text',
  last_reset_ts: 'real',
  state: 'real',
  sum: 'real',
};

/** Statistics columns in storage and CSV order */
export const STATISTIC_COLUMN_NAMES: readonly StatisticColumn[] = [
  'id',
  'metadata_id',
  'created_ts',
  'start_ts',
  'mean',
  'min',
  'max',
  'last_reset',
  'last_reset_ts',
  'state',
  'sum',
];

const STATISTIC_COLUMNS: readonly ColumnSpec[] = STATISTIC_COLUMN_NAMES.map((name) => ({
  name,
  kind: STATISTIC_COLUMN_KINDS[name],
  nullable: name !== 'id' && name !== 'metadata_id',
}));

export const VALUE_FIELDS: readonly StatisticValueField[] = [
  'mean',
  'min',
  'max',
  'last_reset',
  'last_reset_ts',
  'state',
  'sum',
];

/** Display-only CSV columns, written on export and ignored on import */
export const DISPLAY_COLUMNS = ['entity', 'date'] as const;

/** CSV contract shared by export and import */
export const CSV_COLUMNS: readonly string[] = ['table', ...DISPLAY_COLUMNS, ...STATISTIC_COLUMN_NAMES];

function statisticsTable(name: StatisticsTable): TableSpec {
  return {
    name,
    columns: STATISTIC_COLUMNS,
    primaryKey: 'id',
    requiredForInsert: ['metadata_id', 'start_ts'],
    optionalForInsert: ['created_ts', ...VALUE_FIELDS],
    valueFields: VALUE_FIELDS,
    writable: true,
  };
}

const CATALOG: ReadonlyMap<string, TableSpec> = new Map<string, TableSpec>([
  ['statistics', statisticsTable('statistics')],
  ['statistics_short_term', statisticsTable('statistics_short_term')],
  [
    METADATA_TABLE,
    {
      name: METADATA_TABLE,
      columns: [
        { name: 'id', kind: 'integer', nullable: false },
        { name: 'statistic_id', kind: 'text', nullable: true },
        { name: 'source', kind: 'text', nullable: true },
        { name: 'unit_of_measurement', kind: 'text', nullable: true },
      ],
      primaryKey: 'id',
      requiredForInsert: [],
      optionalForInsert: [],
      valueFields: [],
      writable: false,
    },
  ],
  [
    SCHEMA_CHANGES_TABLE,
    {
      name: SCHEMA_CHANGES_TABLE,
      columns: [
        { name: 'change_id', kind: 'integer', nullable: false },
        { name: 'schema_version', kind: 'integer', nullable: true },
        { name: 'changed', kind: 'text', nullable: false },
      ],
      primaryKey: 'change_id',
      requiredForInsert: [],
      optionalForInsert: [],
      valueFields: [],
      writable: false,
    },
  ],
]);

// =============================================================================
// Lookups
// =============================================================================

/**
 * Describe a known table
 *
 * @throws UnknownTableError when the name is not in the catalog
 */
export function describeTable(tableName: string): TableSpec {
  const spec = CATALOG.get(tableName);
  if (!spec) {
    throw new UnknownTableError(tableName);
  }
  return spec;
}

export function knownTables(): string[] {
  return [...CATALOG.keys()];
}

export function isStatisticsTable(name: string): name is StatisticsTable {
  return STATISTICS_TABLES.some((table) => table === name);
}

export function columnSpec(tableName: string, column: string): ColumnSpec | undefined {
  return describeTable(tableName).columns.find((c) => c.name === column);
}

// =============================================================================
// Schema Version
// =============================================================================

export interface SchemaCheck {
  observedVersion: number | null;
  knownVersion: number;
  compatible: boolean;
  /** Set when column assumptions may be stale; callers still proceed */
  warning: string | null;
}

export function checkSchemaVersion(
  observedVersion: number | null,
  knownVersion: number = KNOWN_SCHEMA_VERSION
): SchemaCheck {
  if (observedVersion !== null && observedVersion > knownVersion) {
    return {
      observedVersion,
      knownVersion,
      compatible: false,
      warning:
        `Detected schema version ${observedVersion} > ${knownVersion}. ` +
        'This may indicate compatibility issues. Proceed with caution.',
    };
  }

  return { observedVersion, knownVersion, compatible: true, warning: null };
}
