/**
 * Field value parsing
 *
 * Explicit syntax only: no hex, no `Infinity`, no locale separators, no
 * empty-string-as-zero. A value either matches its column kind exactly or
 * the row is invalid.
 */

import type { ColumnKind } from '../catalog/index.js';
import type { NumericColumn, WritableColumn } from './types.js';

const INTEGER_SYNTAX = /^[+-]?\d+$/;
const REAL_SYNTAX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export type ParsedValue =
  | { ok: true; value: number | string }
  | { ok: false };

export function parseInteger(raw: string): number | null {
  if (!INTEGER_SYNTAX.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseReal(raw: string): number | null {
  if (!REAL_SYNTAX.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a trimmed, non-empty raw value for a column of the given kind
 */
export function parseValue(kind: ColumnKind, raw: string): ParsedValue {
  switch (kind) {
    case 'integer': {
      const value = parseInteger(raw);
      return value === null ? { ok: false } : { ok: true, value };
    }
    case 'real': {
      const value = parseReal(raw);
      return value === null ? { ok: false } : { ok: true, value };
    }
    case 'text':
      return { ok: true, value: raw };
  }
}

export function isNumericColumn(column: WritableColumn): column is NumericColumn {
  return column !== 'last_reset';
}

export function expectedSyntax(kind: ColumnKind): string {
  switch (kind) {
    case 'integer':
      return 'an integer';
    case 'real':
      return 'a number';
    case 'text':
      return 'text';
  }
}
