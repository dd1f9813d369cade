/**
 * Row Classifier
 *
 * Decides what one CSV row asks for: insert, update, delete, skip, or a
 * list of validation errors. Rules, in order:
 *
 * 1. Entirely blank row (table included) is skipped.
 * 2. Missing table is MissingTable; a table outside the two statistics
 *    tables is UnknownTable.
 * 3. Every non-empty field must parse for its column kind (InvalidValue).
 * 4. With an id: all value fields blank deletes, anything else is a sparse
 *    update of exactly the non-empty columns. An id always wins over
 *    insert-looking fields.
 * 5. Without an id: no value fields and neither metadata_id nor start_ts is
 *    skipped; otherwise an insert, which needs metadata_id and start_ts.
 *    created_ts defaults to start_ts.
 *
 * Whether metadata_id exists is decided later, in one batched lookup by
 * the planner.
 */

import {
  STATISTIC_COLUMN_KINDS,
  STATISTIC_COLUMN_NAMES,
  STATISTICS_TABLES,
  VALUE_FIELDS,
  isStatisticsTable,
} from '../catalog/index.js';
import type {
  Classification,
  FieldPatch,
  ImportRow,
  MutationIntent,
  RowValidationError,
  WritableColumn,
} from './types.js';
import { expectedSyntax, isNumericColumn, parseInteger, parseValue } from './values.js';

const WRITABLE_COLUMNS: readonly WritableColumn[] = [
  'metadata_id',
  'created_ts',
  'start_ts',
  ...VALUE_FIELDS,
];

function intent(value: MutationIntent): Classification {
  return { outcome: 'intent', intent: value };
}

function invalid(line: number, errors: RowValidationError[]): Classification {
  return { outcome: 'invalid', line, errors };
}

function assignField(patch: FieldPatch, column: WritableColumn, value: number | string): void {
  if (isNumericColumn(column)) {
    if (typeof value === 'number') patch[column] = value;
  } else if (typeof value === 'string') {
    patch[column] = value;
  }
}

function hasValueFields(patch: FieldPatch): boolean {
  return VALUE_FIELDS.some((field) => patch[field] !== undefined);
}

/**
 * Classify one import row
 */
export function classify(row: ImportRow): Classification {
  const { line, fields } = row;
  const raw = (name: string): string => (fields[name] ?? '').trim();

  const tableName = raw('table');
  const anySpecified = STATISTIC_COLUMN_NAMES.some((column) => raw(column) !== '');

  if (tableName === '' && !anySpecified) {
    return { outcome: 'skipped', line };
  }

  if (tableName === '') {
    return invalid(line, [{ line, kind: 'MissingTable', message: 'Row has no table' }]);
  }

  if (!isStatisticsTable(tableName)) {
    return invalid(line, [
      {
        line,
        kind: 'UnknownTable',
        table: tableName,
        message: `Unknown table "${tableName}" (expected ${STATISTICS_TABLES.join(' or ')})`,
      },
    ]);
  }

  const table = tableName;
  const errors: RowValidationError[] = [];
  const invalidValue = (field: string, value: string, expected: string): RowValidationError => ({
    line,
    kind: 'InvalidValue',
    table,
    field,
    value,
    message: `${field}: "${value}" is not ${expected}`,
  });

  let id: number | undefined;
  const rawId = raw('id');
  if (rawId !== '') {
    const parsedId = parseInteger(rawId);
    if (parsedId === null) {
      errors.push(invalidValue('id', rawId, expectedSyntax('integer')));
    } else {
      id = parsedId;
    }
  }

  const patch: FieldPatch = {};
  for (const column of WRITABLE_COLUMNS) {
    const value = raw(column);
    if (value === '') continue;

    const kind = STATISTIC_COLUMN_KINDS[column];
    const parsed = parseValue(kind, value);
    if (!parsed.ok) {
      errors.push(invalidValue(column, value, expectedSyntax(kind)));
      continue;
    }
    assignField(patch, column, parsed.value);
  }

  if (errors.length > 0) {
    return invalid(line, errors);
  }

  if (id !== undefined) {
    if (!hasValueFields(patch)) {
      return intent({ kind: 'delete', table, line, id });
    }
    return intent({ kind: 'update', table, line, id, patch });
  }

  const { metadata_id, start_ts } = patch;

  if (!hasValueFields(patch) && metadata_id === undefined && start_ts === undefined) {
    return { outcome: 'skipped', line };
  }

  if (metadata_id === undefined) {
    errors.push({
      line,
      kind: 'MissingMetadataId',
      table,
      field: 'metadata_id',
      message: 'Insert requires metadata_id',
    });
  }
  if (start_ts === undefined) {
    errors.push({
      line,
      kind: 'MissingStartTs',
      table,
      field: 'start_ts',
      message: 'Insert requires start_ts',
    });
  }
  if (metadata_id === undefined || start_ts === undefined) {
    return invalid(line, errors);
  }

  return intent({
    kind: 'insert',
    table,
    line,
    values: { ...patch, metadata_id, start_ts, created_ts: patch.created_ts ?? start_ts },
  });
}

/**
 * Classify every row, preserving input order
 */
export function classifyAll(rows: readonly ImportRow[]): Classification[] {
  return rows.map(classify);
}
