import { CellValue, ColumnTypeTag } from '../models/tabular-source';

const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;
const ISO_TEMPORAL_PATTERN =
  /^\d{4}-\d{2}-\d{2}([ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Maps a declared SQL column type to a type tag, following SQLite's
 * affinity rules for the numeric/text/blob split.
 *
 * @param declaredType - The declared SQL column type string
 */
export function normalizeDeclaredType(declaredType: string): ColumnTypeTag {
  const type = declaredType.trim().toUpperCase();

  if (type === '') {
    // Untyped columns in practice hold text
    return 'text';
  }

  if (type.includes('BOOL')) return 'boolean';
  if (type.includes('DATE') || type.includes('TIME')) return 'temporal';
  if (type.includes('INT')) return 'numeric';
  if (type.includes('CHAR') || type.includes('CLOB') || type.includes('TEXT')) return 'text';
  if (type.includes('BLOB') || type.includes('BINARY')) return 'blob';
  if (
    type.includes('REAL') ||
    type.includes('FLOA') ||
    type.includes('DOUB') ||
    type.includes('NUM') ||
    type.includes('DEC')
  ) {
    return 'numeric';
  }

  return 'text';
}

/**
 * Checks if a raw text value is a date or date-time in ISO 8601 form
 */
export function isTemporalText(value: string): boolean {
  return ISO_TEMPORAL_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

/**
 * Infers a column type from raw text values of a delimited file. Empty
 * strings are treated as nulls and ignored. A column without any value
 * is text.
 */
export function inferTextColumnType(values: readonly string[]): ColumnTypeTag {
  const present = values.filter((value) => value.trim() !== '');

  if (present.length === 0) {
    return 'text';
  }

  if (present.every((value) => NUMERIC_PATTERN.test(value.trim()))) return 'numeric';
  if (present.every((value) => BOOLEAN_PATTERN.test(value.trim()))) return 'boolean';
  if (present.every((value) => isTemporalText(value.trim()))) return 'temporal';

  return 'text';
}

/**
 * Converts a raw text value to the cell value for its inferred column type.
 * Temporal values keep their original text.
 */
export function convertTextCell(value: string, type: ColumnTypeTag): CellValue {
  const trimmed = value.trim();

  if (trimmed === '') {
    return null;
  }

  switch (type) {
    case 'numeric':
      return Number(trimmed);
    case 'boolean':
      return trimmed.toLowerCase() === 'true';
    case 'temporal':
    case 'text':
    case 'blob':
      return value;
    default: {
      const _: never = type;
      return _;
    }
  }
}

/**
 * Infers a column type from already typed values (e.g. spreadsheet cells).
 * Mixed columns fall back to text.
 */
export function inferValueColumnType(values: readonly CellValue[]): ColumnTypeTag {
  const present = values.filter((value) => value !== null);

  if (present.length === 0) {
    return 'text';
  }

  if (present.every((value) => typeof value === 'number' || typeof value === 'bigint')) {
    return 'numeric';
  }
  if (present.every((value) => typeof value === 'boolean')) return 'boolean';
  if (present.every((value) => value instanceof Date)) return 'temporal';
  if (present.every((value) => value instanceof Uint8Array)) return 'blob';

  return 'text';
}

export function isSortableType(type: ColumnTypeTag): boolean {
  return type !== 'blob';
}
