/**
 * Import Engine Types
 *
 * A CSV row is decided exactly once, by the classifier, into one of the
 * tagged unions below. Nothing downstream looks at raw strings again.
 *
 * @module @recstat/core/import/types
 */

import type { StatisticsTable } from '../catalog/index.js';

// =============================================================================
// Input
// =============================================================================

/**
 * One parsed CSV record, keyed by header name
 *
 * An empty string means "not specified", which is not the same as `0`.
 */
export interface ImportRow {
  /** 1-based record number; the header is line 1 */
  line: number;
  fields: Readonly<Record<string, string>>;
}

// =============================================================================
// Field Values
// =============================================================================

/**
 * Typed values of every column an intent may write
 */
export interface StatisticFields {
  metadata_id: number;
  created_ts: number;
  start_ts: number;
  mean: number;
  min: number;
  max: number;
  last_reset: string;
  last_reset_ts: number;
  state: number;
  sum: number;
}

export type WritableColumn = keyof StatisticFields;
export type TextColumn = 'last_reset';
export type NumericColumn = Exclude<WritableColumn, TextColumn>;

/** Sparse set of columns to overwrite; absent keys stay untouched */
export type FieldPatch = Partial<StatisticFields>;

export type InsertValues = Pick<StatisticFields, 'metadata_id' | 'start_ts' | 'created_ts'> & FieldPatch;

// =============================================================================
// Mutation Intents
// =============================================================================

export interface InsertIntent {
  kind: 'insert';
  table: StatisticsTable;
  line: number;
  values: InsertValues;
}

export interface UpdateIntent {
  kind: 'update';
  table: StatisticsTable;
  line: number;
  id: number;
  patch: FieldPatch;
}

export interface DeleteIntent {
  kind: 'delete';
  table: StatisticsTable;
  line: number;
  id: number;
}

export type MutationIntent = InsertIntent | UpdateIntent | DeleteIntent;
export type MutationKind = MutationIntent['kind'];

// =============================================================================
// Validation
// =============================================================================

export type ValidationErrorKind =
  | 'MissingTable'
  | 'UnknownTable'
  | 'MissingMetadataId'
  | 'MissingStartTs'
  | 'UnknownMetadataId'
  | 'InvalidValue';

export const VALIDATION_ERROR_KINDS: readonly ValidationErrorKind[] = [
  'MissingTable',
  'UnknownTable',
  'MissingMetadataId',
  'MissingStartTs',
  'UnknownMetadataId',
  'InvalidValue',
];

/**
 * A row-level problem. Collected, never thrown: the row is excluded from
 * execution and the run continues.
 */
export interface RowValidationError {
  line: number;
  kind: ValidationErrorKind;
  table?: string;
  field?: string;
  value?: string;
  message: string;
}

export type Classification =
  | { outcome: 'intent'; intent: MutationIntent }
  | { outcome: 'skipped'; line: number }
  | { outcome: 'invalid'; line: number; errors: RowValidationError[] };

// =============================================================================
// Planning
// =============================================================================

/**
 * Two rows targeted the same (table, id); the later one won
 */
export interface Conflict {
  table: StatisticsTable;
  id: number;
  overriddenLine: number;
  overriddenKind: Exclude<MutationKind, 'insert'>;
  winningLine: number;
  winningKind: Exclude<MutationKind, 'insert'>;
}

export interface ImportPlan {
  /** Execution order: per table, deletes then updates then inserts */
  intents: MutationIntent[];
  byTable: Record<StatisticsTable, MutationIntent[]>;
  /** Every validation error, ordered by line */
  errors: RowValidationError[];
  /** Lines that produced at least one error */
  invalidLines: number[];
  conflicts: Conflict[];
  skipped: number;
  totalRows: number;
}

/** One batched existence check against statistics_meta */
export type MetadataLookup = (ids: readonly number[]) => ReadonlySet<number>;

// =============================================================================
// Execution
// =============================================================================

export type ExecutionMode = 'apply' | 'dry-run';

export interface MutationCounts {
  inserted: number;
  updated: number;
  deleted: number;
}

export interface AppliedExecution {
  mode: 'apply';
  counts: MutationCounts;
  /** Literal form of what ran, for logs */
  statements: string[];
  /** Row ids generated by inserts, in execution order */
  insertedIds: number[];
}

export interface DryRunExecution {
  mode: 'dry-run';
  counts: MutationCounts;
  /** Executable SQL, in plan order */
  statements: string[];
}

export type ExecutionResult = AppliedExecution | DryRunExecution;

// =============================================================================
// Report
// =============================================================================

export interface ImportReport {
  mode: ExecutionMode;
  totalRows: number;
  skipped: number;
  invalid: {
    rows: number;
    byKind: Record<ValidationErrorKind, number>;
    errors: RowValidationError[];
  };
  conflicts: {
    count: number;
    entries: Conflict[];
  };
  /** Applied, or would apply in dry-run */
  inserted: number;
  updated: number;
  deleted: number;
  insertedIds: number[];
  /** Dry-run only: the statements an apply would issue */
  statements: string[];
}
