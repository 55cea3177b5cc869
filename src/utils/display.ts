import { CellValue, DataRow } from '../models/tabular-source';

/**
 * Text used to match a cell against a search query. Binary cells never match.
 */
export const toDisplayText = (value: CellValue): string => {
  if (value === null || value instanceof Uint8Array) {
    return '';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }

  return String(value);
};

/**
 * Normalizes a user search query. Empty or whitespace-only queries mean
 * no filter.
 */
export const normalizeSearchQuery = (query: string | null | undefined): string | null => {
  const trimmed = query?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Builds a case-insensitive row predicate for a search query, or `null`
 * if the query is empty.
 */
export const makeRowMatcher = (
  searchQuery: string | null | undefined,
): ((row: DataRow) => boolean) | null => {
  const normalized = normalizeSearchQuery(searchQuery);

  if (normalized === null) {
    return null;
  }

  const needle = normalized.toLowerCase();
  return (row) => row.some((cell) => toDisplayText(cell).toLowerCase().includes(needle));
};
