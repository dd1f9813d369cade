/**
 * Statement rendering
 *
 * One intent becomes one statement, in two forms: parameterised for
 * execution, literal for dry-run output. Both list columns in catalog order
 * and both are built from the same column/value pairs, so the literal text
 * is exactly what an apply would do.
 */

import { STATISTIC_COLUMN_NAMES, STATISTIC_COLUMN_KINDS, type ColumnKind } from '../catalog/index.js';
import type { SqlStatement, SqlValue } from '../database/store.js';
import type { FieldPatch, MutationIntent, WritableColumn } from './types.js';

interface Assignment {
  column: WritableColumn;
  kind: ColumnKind;
  value: number | string;
}

function assignments(fields: FieldPatch): Assignment[] {
  const result: Assignment[] = [];
  for (const column of STATISTIC_COLUMN_NAMES) {
    if (column === 'id') continue;
    const value = fields[column];
    if (value !== undefined) {
      result.push({ column, kind: STATISTIC_COLUMN_KINDS[column], value });
    }
  }
  return result;
}

// =============================================================================
// Literals
// =============================================================================

/**
 * Render a real so SQLite reads it back as REAL: `21` becomes `21.0`
 */
export function formatReal(value: number): string {
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function quoteText(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function formatLiteral(kind: ColumnKind, value: SqlValue): string {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'string') {
    return quoteText(value);
  }
  return kind === 'real' ? formatReal(value) : String(value);
}

// =============================================================================
// Statements
// =============================================================================

export function toParameterized(intent: MutationIntent): SqlStatement {
  switch (intent.kind) {
    case 'insert': {
      const pairs = assignments(intent.values);
      return {
        text:
          `INSERT INTO ${intent.table} (${pairs.map((p) => p.column).join(', ')}) ` +
          `VALUES (${pairs.map(() => '?').join(', ')})`,
        params: pairs.map((p) => p.value),
      };
    }
    case 'update': {
      const pairs = assignments(intent.patch);
      return {
        text: `UPDATE ${intent.table} SET ${pairs.map((p) => `${p.column} = ?`).join(', ')} WHERE id = ?`,
        params: [...pairs.map((p) => p.value), intent.id],
      };
    }
    case 'delete':
      return {
        text: `DELETE FROM ${intent.table} WHERE id = ?`,
        params: [intent.id],
      };
  }
}

/**
 * Render an intent as one executable SQL statement, terminated by `;`
 */
export function toLiteralSql(intent: MutationIntent): string {
  switch (intent.kind) {
    case 'insert': {
      const pairs = assignments(intent.values);
      const columns = pairs.map((p) => p.column).join(', ');
      const values = pairs.map((p) => formatLiteral(p.kind, p.value)).join(', ');
      return `INSERT INTO ${intent.table} (${columns}) VALUES (${values});`;
    }
    case 'update': {
      const sets = assignments(intent.patch)
        .map((p) => `${p.column} = ${formatLiteral(p.kind, p.value)}`)
        .join(', ');
      return `UPDATE ${intent.table} SET ${sets} WHERE id = ${intent.id};`;
    }
    case 'delete':
      return `DELETE FROM ${intent.table} WHERE id = ${intent.id};`;
  }
}
