import {
  CellValue,
  ColumnTypeTag,
  DataRow,
  SortDirection,
  SortSpec,
} from '../models/tabular-source';
import { toDisplayText } from './display';

type Comparable = number | string;

export function toggleSortDirection(current: SortDirection | null): SortDirection | null {
  switch (current) {
    case 'asc':
      return 'desc';
    case 'desc':
      return null;
    case null:
      return 'asc';
    default: {
      const _: never = current;
      return _;
    }
  }
}

/**
 * Toggles the sort direction of the given column given the current sort.
 *
 * As the result of this operation, you will always get 0 or 1 sorted
 * column. A different column than the currently sorted one starts
 * from ascending, and toggling past descending restores source order.
 *
 * @param current The current sort spec
 * @param columnIndex The column to toggle
 * @return The new sort spec
 */
export function toggleColumnSort(current: SortSpec, columnIndex: number): SortSpec {
  const currentDirection = current?.columnIndex === columnIndex ? current.direction : null;
  const direction = toggleSortDirection(currentDirection);

  if (direction === null) {
    return null;
  }

  return { columnIndex, direction };
}

export function isSameSortSpec(a: SortSpec, b: SortSpec): boolean {
  if (a === null || b === null) {
    return a === b;
  }

  return a.columnIndex === b.columnIndex && a.direction === b.direction;
}

function toNumber(value: CellValue): number | null {
  if (value === null || value instanceof Uint8Array) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'boolean') return value ? 1 : 0;

  const num = typeof value === 'string' ? (value.trim() === '' ? NaN : Number(value)) : Number(value);
  return Number.isNaN(num) ? null : num;
}

function toTimestamp(value: CellValue): number | null {
  if (value === null || value instanceof Uint8Array || typeof value === 'boolean') return null;
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === 'string') {
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : time;
  }
  return Number(value);
}

function toBooleanRank(value: CellValue): number | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) === 0 ? 0 : 1;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return 1;
    if (normalized === 'false' || normalized === '0') return 0;
  }
  return null;
}

/**
 * Converts a cell into the key it is ordered by. Values that can't be
 * coerced to the column type are treated like nulls.
 */
export function toSortKey(value: CellValue, type: ColumnTypeTag): Comparable | null {
  switch (type) {
    case 'numeric':
      return toNumber(value);
    case 'temporal':
      return toTimestamp(value);
    case 'boolean':
      return toBooleanRank(value);
    case 'text':
      return value === null ? null : toDisplayText(value);
    case 'blob':
      return null;
    default: {
      const _: never = type;
      return _;
    }
  }
}

function compareKeys(a: Comparable, b: Comparable): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return Math.sign(a - b);
  }

  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Returns row indices ordered by the given column. Nulls go last in both
 * directions and equal keys keep their source order.
 */
export function sortRowIndices(
  rows: readonly DataRow[],
  columnIndex: number,
  type: ColumnTypeTag,
  direction: SortDirection,
  indices: readonly number[] = rows.map((_, index) => index),
): number[] {
  const sign = direction === 'asc' ? 1 : -1;
  const keyed = indices.map((rowIndex) => ({
    rowIndex,
    key: toSortKey(rows[rowIndex][columnIndex] ?? null, type),
  }));

  keyed.sort((a, b) => {
    if (a.key === null || b.key === null) {
      if (a.key === b.key) return a.rowIndex - b.rowIndex;
      return a.key === null ? 1 : -1;
    }

    return compareKeys(a.key, b.key) * sign || a.rowIndex - b.rowIndex;
  });

  return keyed.map(({ rowIndex }) => rowIndex);
}
